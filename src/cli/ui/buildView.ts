import process from "node:process";
import boxen from "boxen";
import chalk from "chalk";
import ora from "ora";
import type { BuildEvent } from "../../engine/events.js";
import type { BackendSummary } from "../../engine/registry.js";
import type { Diagnostic } from "../../engine/types.js";
import type { BuildOutcome } from "../../workflow/state.js";

const truncate = (value: string | undefined, max = 200): string | undefined => {
  if (!value) return value;
  return value.length > max ? `${value.slice(0, max)}...` : value;
};

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const node = diagnostic.node ? ` [${diagnostic.node.kind} ${diagnostic.node.name}]` : "";
  return `${diagnostic.stage} ${diagnostic.componentId}${node}: ${diagnostic.message}`;
};

export const formatBackend = (summary: BackendSummary): string[] => {
  const title = summary.deprecated ? `${summary.id} (deprecated)` : summary.id;
  const lines = [title];
  if (summary.description) lines.push(`  ${summary.description}`);
  if (summary.outputFormats.length > 0) lines.push(`  formats: ${summary.outputFormats.join(", ")}`);
  lines.push(`  generators: ${summary.generators.join(" -> ") || "-"}`);
  if (summary.hooks.length > 0) lines.push(`  hooks: ${summary.hooks.join(", ")}`);
  if (summary.deprecation) {
    lines.push(`  removal in ${summary.deprecation.removal}: ${summary.deprecation.migrationHint}`);
  }
  return lines;
};

export const createBuildView = (): {
  onEvent: (event: BuildEvent) => void;
  renderOutcome: (outcome: BuildOutcome) => void;
} => {
  let activeSpinner: ReturnType<typeof ora> | undefined;
  const interactive = Boolean(process.stdout.isTTY);

  const stopSpinner = (): void => {
    if (activeSpinner?.isSpinning) activeSpinner.stop();
    activeSpinner = undefined;
  };

  const onEvent = (event: BuildEvent): void => {
    switch (event.type) {
      case "stage_start":
        stopSpinner();
        console.log(chalk.bold(event.stage));
        break;
      case "deprecation":
        console.log(
          chalk.yellow(
            `stack ${event.notice.stackId} is deprecated since ${event.notice.since} and will be removed in ${event.notice.removal}: ${event.notice.migrationHint}`
          )
        );
        break;
      case "order_resolved":
        console.log(`order: ${event.order.join(" -> ") || "-"}`);
        break;
      case "unit_start":
        if (interactive) {
          stopSpinner();
          activeSpinner = ora(event.unitId).start();
        }
        break;
      case "unit_end": {
        const note = truncate(event.note);
        const line = `${event.unitId}${note ? ` ${note}` : ""}`;
        if (activeSpinner?.isSpinning) {
          if (event.ok) activeSpinner.succeed(line);
          else activeSpinner.fail(line);
          activeSpinner = undefined;
        } else {
          console.log(`${event.ok ? chalk.green("✓") : chalk.red("✗")} ${line}`);
        }
        break;
      }
      case "files_flushed":
        if (event.paths.length > 0) console.log(chalk.dim(`  wrote ${event.paths.join(", ")}`));
        break;
      case "warning":
        console.log(chalk.yellow(`warning: ${formatDiagnostic(event.diagnostic)}`));
        break;
      case "failed":
        stopSpinner();
        break;
      case "done":
        stopSpinner();
        break;
      default:
        break;
    }
  };

  const renderOutcome = (outcome: BuildOutcome): void => {
    if (!outcome.ok) {
      const { error } = outcome;
      const body = [
        `${chalk.bold("Stage")}: ${error.stage}`,
        `${chalk.bold("Unit")}: ${error.componentId}`,
        `${chalk.bold("Error")}: ${error.message}`,
        `${chalk.bold("Completed")}: ${error.completedGenerators.join(", ") || "-"}`,
        `${chalk.bold("Files written")}: ${error.writtenFiles.length}`
      ].join("\n");
      console.error(boxen(body, { borderColor: "red", padding: { left: 1, right: 1, top: 0, bottom: 0 }, title: "Build failed" }));
      return;
    }

    const { result } = outcome;
    const lines = [
      `${chalk.bold("Stack")}: ${result.stackId}`,
      `${chalk.bold("Output")}: ${result.outputDir}`,
      `${chalk.bold("Files")}: ${result.writtenFiles.length}`,
      `${chalk.bold("Warnings")}: ${result.warnings.length}`
    ];
    result.notes.forEach((note) => lines.push(`${chalk.bold(note.componentId)}: ${note.message}`));
    Object.entries(result.displayed).forEach(([key, value]) => {
      lines.push(`${chalk.bold(key)}: ${typeof value === "string" ? value : JSON.stringify(value)}`);
    });
    console.log(boxen(lines.join("\n"), { borderColor: "green", padding: { left: 1, right: 1, top: 0, bottom: 0 }, title: "Build complete" }));
  };

  return { onEvent, renderOutcome };
};
