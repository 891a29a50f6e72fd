import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { defineBackend } from "../src/engine/backend.js";
import { createBackendRegistry } from "../src/engine/registry.js";
import { BuildAudit } from "../src/runtime/audit.js";
import { build } from "../src/workflow/build.js";
import { namesGenerator, sampleIR, tempDir } from "./helpers/fixtures.js";

const counterClock = (): (() => number) => {
  let tick = 0;
  return () => {
    tick += 1;
    return tick;
  };
};

const registry = () => createBackendRegistry([defineBackend({ id: "one", generators: [namesGenerator("A", "A.names")] })]);

describe("BuildAudit", () => {
  test("records every event with its timestamp", async () => {
    const audit = new BuildAudit(counterClock());

    const outcome = await build("one", sampleIR(), join(await tempDir("audit"), "out"), {
      registry: registry(),
      onEvent: audit.listener
    });
    const record = audit.toRecord(outcome);

    expect(record.stackId).toBe("one");
    expect(record.ok).toBe(true);
    expect(record.failure).toBeUndefined();
    expect(record.files).toEqual(["a/Task.txt", "a/User.txt"]);
    expect(record.warnings).toBe(0);
    expect(record.events.map((entry) => entry.ts)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(record.events[0].event).toEqual({ type: "stage_start", stage: "INIT" });
    expect(record.events[9].event).toEqual({ type: "done", fileCount: 2 });
  });

  test("keeps the failure diagnostic of a failed build", async () => {
    const audit = new BuildAudit(counterClock());

    const outcome = await build("nope", sampleIR(), join(await tempDir("audit"), "out"), {
      registry: registry(),
      onEvent: audit.listener
    });
    const record = audit.toRecord(outcome);

    expect(record).toEqual({
      stackId: "nope",
      ok: false,
      failure: {
        kind: "configuration",
        stage: "INIT",
        componentId: "nope",
        message: "unknown stack nope; registered stacks: one",
        details: { known: ["one"] }
      },
      files: [],
      warnings: 0,
      events: audit.all()
    });
    expect(record.events.map((entry) => entry.event.type)).toEqual(["stage_start", "failed"]);
  });

  test("writes to a named file or the next numbered file in a directory", async () => {
    const root = await tempDir("audit-out");
    const audit = new BuildAudit(counterClock());
    const outcome = await build("one", sampleIR(), join(root, "out"), { registry: registry(), onEvent: audit.listener });

    const named = await audit.flush(join(root, "runs/latest.json"), outcome);
    expect(named).toBe(join(root, "runs/latest.json"));

    const dir = join(root, "history");
    expect(await audit.flush(dir, outcome)).toBe(join(dir, "1.json"));
    expect(await audit.flush(dir, outcome)).toBe(join(dir, "2.json"));
    expect((await readdir(dir)).sort()).toEqual(["1.json", "2.json"]);

    const written = await readFile(named, "utf8");
    expect(written.endsWith("}\n")).toBe(true);
    expect(JSON.parse(written)).toEqual(JSON.parse(JSON.stringify(audit.toRecord(outcome))));
  });
});
