import { existsSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { defineBackend } from "../src/engine/backend.js";
import { defineGenerator, emitFile, writeArtifact, type Generator } from "../src/engine/generator.js";
import { createBackendRegistry } from "../src/engine/registry.js";
import type { WrittenFile } from "../src/engine/types.js";
import { build } from "../src/workflow/build.js";
import { recordEvents, sampleIR, sleep, tempDir } from "./helpers/fixtures.js";

type Tracker = { running: number; peak: number };

const tracked = (tracker: Tracker, generator: Omit<Generator, "run" | "requires" | "produces"> & {
  requires?: string[];
  produces?: string[];
  delayMs: number;
  fail?: boolean;
}): Generator =>
  defineGenerator({
    ...generator,
    outputs: [`${generator.id}.txt`],
    run: async () => {
      tracker.running += 1;
      tracker.peak = Math.max(tracker.peak, tracker.running);
      await sleep(generator.delayMs);
      tracker.running -= 1;
      if (generator.fail) throw new Error("boom");
      return {
        files: [emitFile(`${generator.id}.txt`, generator.id)],
        artifacts: (generator.produces ?? []).map((key) => writeArtifact(key, generator.id))
      };
    }
  });

const threeUnits = (tracker: Tracker, failSlow = false) =>
  defineBackend({
    id: "three",
    generators: [
      tracked(tracker, { id: "slow", produces: ["slow.done"], delayMs: 40, fail: failSlow }),
      tracked(tracker, { id: "fast", delayMs: 5 }),
      tracked(tracker, { id: "after", requires: ["slow.done"], delayMs: 5 })
    ]
  });

describe("concurrent generation", () => {
  test("overlaps independent generators but commits in resolved order", async () => {
    const tracker: Tracker = { running: 0, peak: 0 };
    const { events, onEvent } = recordEvents();
    const registry = createBackendRegistry([threeUnits(tracker)]);

    const outcome = await build("three", sampleIR(), join(await tempDir("conc"), "out"), { registry, concurrency: 2, onEvent });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(tracker.peak).toBe(2);
    expect(outcome.result.writtenFiles.map((file) => file.path)).toEqual(["slow.txt", "fast.txt", "after.txt"]);
    expect(outcome.result.completedGenerators).toEqual(["slow", "fast", "after"]);

    const generateEvents = events
      .filter((event) => event.type === "unit_start" || event.type === "files_flushed")
      .map((event) => (event.type === "unit_start" ? `start:${event.unitId}` : `flush:${event.generatorId}`));
    expect(generateEvents).toEqual([
      "start:slow",
      "start:fast",
      "flush:slow",
      "flush:fast",
      "start:after",
      "flush:after"
    ]);
  });

  test("matches the sequential result", async () => {
    const sequential = await build("three", sampleIR(), join(await tempDir("seq"), "out"), {
      registry: createBackendRegistry([threeUnits({ running: 0, peak: 0 })])
    });
    const parallel = await build("three", sampleIR(), join(await tempDir("par"), "out"), {
      registry: createBackendRegistry([threeUnits({ running: 0, peak: 0 })]),
      concurrency: 3
    });

    if (!sequential.ok || !parallel.ok) throw new Error("expected both builds to succeed");
    const fingerprint = (files: WrittenFile[]) => files.map((file) => [file.path, file.checksum]);
    expect(fingerprint(parallel.result.writtenFiles)).toEqual(fingerprint(sequential.result.writtenFiles));
  });

  test("runs one generator at a time by default", async () => {
    const tracker: Tracker = { running: 0, peak: 0 };

    await build("three", sampleIR(), join(await tempDir("one"), "out"), {
      registry: createBackendRegistry([threeUnits(tracker)])
    });

    expect(tracker.peak).toBe(1);
  });

  test("discards later generators that finished before an earlier one failed", async () => {
    const tracker: Tracker = { running: 0, peak: 0 };
    const outDir = join(await tempDir("fail"), "out");

    const outcome = await build("three", sampleIR(), outDir, {
      registry: createBackendRegistry([threeUnits(tracker, true)]),
      concurrency: 2
    });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.componentId).toBe("slow");
    expect(outcome.error.message).toBe("slow failed: boom");
    expect(outcome.error.writtenFiles).toEqual([]);
    expect(outcome.error.completedGenerators).toEqual([]);
    expect(existsSync(join(outDir, "fast.txt"))).toBe(false);
  });
});
