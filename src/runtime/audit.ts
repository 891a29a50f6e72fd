import { mkdir, readdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { BuildEvent, BuildEventListener } from "../engine/events.js";
import type { Diagnostic } from "../engine/types.js";
import type { BuildOutcome } from "../workflow/state.js";

export type AuditEntry = {
  event: BuildEvent;
  ts: number;
};

export type AuditRecord = {
  stackId: string;
  ok: boolean;
  failure?: Diagnostic;
  files: string[];
  warnings: number;
  events: AuditEntry[];
};

const nextRecordNumber = async (dir: string): Promise<number> => {
  let files: string[];
  try {
    files = await readdir(dir);
  } catch {
    return 1;
  }
  const numbers = files
    .map((name) => {
      const match = name.match(/^(\d+)\.json$/);
      return match ? Number(match[1]) : -1;
    })
    .filter((num) => num >= 0);
  return numbers.length === 0 ? 1 : Math.max(...numbers) + 1;
};

/** Collects build events and writes them, with the outcome, as one JSON record. */
export class BuildAudit {
  private entries: AuditEntry[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  readonly listener: BuildEventListener = (event) => {
    this.record(event);
  };

  record(event: BuildEvent): void {
    this.entries.push({ event, ts: this.now() });
  }

  all(): AuditEntry[] {
    return [...this.entries];
  }

  toRecord(outcome: BuildOutcome): AuditRecord {
    const events = this.all();
    if (outcome.ok) {
      return {
        stackId: outcome.result.stackId,
        ok: true,
        files: outcome.result.writtenFiles.map((file) => file.path),
        warnings: outcome.result.warnings.length,
        events
      };
    }

    const { kind, stage, componentId, message, node, details } = outcome.error;
    const failure: Diagnostic = { kind, stage, componentId, message };
    if (node) failure.node = node;
    if (details) failure.details = details;
    return {
      stackId: outcome.error.stackId,
      ok: false,
      failure,
      files: outcome.error.writtenFiles.map((file) => file.path),
      warnings: outcome.error.warnings.length,
      events
    };
  }

  /**
   * Writes the record to `target` when it names a .json file, otherwise to the next numbered file
   * inside the `target` directory. Returns the path written.
   */
  async flush(target: string, outcome: BuildOutcome): Promise<string> {
    const path = target.endsWith(".json") ? target : join(target, `${await nextRecordNumber(target)}.json`);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${JSON.stringify(this.toRecord(outcome), null, 2)}\n`, "utf8");
    return path;
  }
}
