#!/usr/bin/env node
/**
 * Run examples:
 * - `npm run dev -- list`
 * - `npm run dev -- build --stack openapi --ir ./app.ir.json --out ./generated --option format=json`
 * - `npm run dev -- build --stack express_micro --ir ./app.ir.json --out ./service --option node_version=20 --audit ./audit`
 * - `npm run dev -- build --stack openapi,express_micro --ir ./app.ir.json --out ./generated` writes one subdirectory per stack
 *
 * Environment (also read from `.env`):
 * - `STACKWEAVE_DEFAULT_STACK` stack used when `--stack` is omitted
 * - `STACKWEAVE_CONCURRENCY`, `STACKWEAVE_UNIT_TIMEOUT_MS` build defaults
 * - `STACKWEAVE_AUDIT_DIR` writes an audit record for every build
 */
import process from "node:process";
import { ZodError } from "zod";
import { parseArgs, usageLines, type BuildCommand } from "./cli/args.js";
import { createBuildView, formatBackend } from "./cli/ui/buildView.js";
import { loadEngineConfig, loadEnvFile, type EngineConfig } from "./config/loadEnv.js";
import { EngineError } from "./engine/errors.js";
import type { BuildEvent } from "./engine/events.js";
import { loadIR } from "./ir/loadIR.js";
import { BuildAudit } from "./runtime/audit.js";
import { build, buildStacks, listBackends } from "./workflow/build.js";
import type { BuildOutcome } from "./workflow/state.js";

const printValidationErrors = (error: ZodError): void => {
  console.error("IR validation failed:");
  error.issues.forEach((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    console.error(`- ${path}: ${issue.message}`);
  });
};

const usage = (): void => {
  usageLines().forEach((line) => console.error(line));
};

const runList = (): number => {
  listBackends().forEach((summary) => {
    formatBackend(summary).forEach((line) => console.log(line));
  });
  return 0;
};

const runBuild = async (command: BuildCommand, config: EngineConfig): Promise<number> => {
  if (!command.irPath || !command.outDir) {
    usage();
    return 2;
  }

  const ir = await loadIR(command.irPath);
  const view = createBuildView();
  const audit = new BuildAudit();
  const auditTarget = command.auditPath ?? config.auditDir;

  const stacks = (command.stack ?? config.defaultStack)
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
  const shared = {
    concurrency: command.concurrency ?? config.concurrency,
    unitTimeoutMs: command.timeoutMs ?? config.unitTimeoutMs,
    onEvent: (event: BuildEvent) => {
      audit.record(event);
      view.onEvent(event);
    }
  };

  let outcomes: BuildOutcome[];
  if (stacks.length === 1) {
    outcomes = [await build(stacks[0], ir, command.outDir, { ...shared, stackOptions: command.options })];
  } else {
    const stackOptions = Object.fromEntries(stacks.map((id) => [id, command.options]));
    const multi = await buildStacks(stacks, ir, command.outDir, { ...shared, stackOptions });
    outcomes = multi.results.map((result): BuildOutcome => ({ ok: true, result }));
    if (!multi.ok) outcomes.push({ ok: false, error: multi.error });
  }
  outcomes.forEach((outcome) => view.renderOutcome(outcome));

  const last = outcomes[outcomes.length - 1];
  if (auditTarget && last) {
    const path = await audit.flush(auditTarget, last);
    console.log(`Audit log: ${path}`);
  }
  return outcomes.every((outcome) => outcome.ok) ? 0 : 1;
};

const main = async (): Promise<void> => {
  try {
    loadEnvFile();
    const config = loadEngineConfig();
    const command = parseArgs(process.argv.slice(2));

    switch (command.command) {
      case "help":
        usage();
        process.exitCode = 0;
        return;
      case "invalid":
        console.error(command.message);
        usage();
        process.exitCode = 2;
        return;
      case "list":
        process.exitCode = runList();
        return;
      case "build":
        process.exitCode = await runBuild(command, config);
        return;
    }
  } catch (error) {
    if (error instanceof ZodError) {
      printValidationErrors(error);
      process.exitCode = 2;
      return;
    }

    if (error instanceof EngineError) {
      console.error(`${error.stage} ${error.componentId}: ${error.message}`);
      process.exitCode = 2;
      return;
    }

    if (error instanceof Error) {
      console.error(error.message);
      process.exitCode = 2;
      return;
    }

    console.error("Unknown error");
    process.exitCode = 2;
  }
};

void main();
