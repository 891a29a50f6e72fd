import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { defineBackend } from "../src/engine/backend.js";
import { defineGenerator, emitFile } from "../src/engine/generator.js";
import { createBackendRegistry } from "../src/engine/registry.js";
import { createDefaultRegistry } from "../src/stacks/index.js";
import { buildStacks } from "../src/workflow/build.js";
import { namesGenerator, sampleIR, tempDir } from "./helpers/fixtures.js";

const source = defineBackend({ id: "source", generators: [namesGenerator("A", "A.names")] });

const consumer = defineBackend({
  id: "consumer",
  generators: [
    defineGenerator({
      id: "report",
      outputs: ["report.txt"],
      run: (ctx) => {
        const upstreamNames = ctx.upstream["source"]?.["A.names"];
        const names = Array.isArray(upstreamNames) ? upstreamNames.join(",") : "none";
        const extended = Reflect.set(ctx.upstream, "extra", {});
        return { files: [emitFile("report.txt", `${Object.keys(ctx.upstream).join(",")}|${names}|${String(extended)}\n`)] };
      }
    })
  ]
});

const registry = () => createBackendRegistry([source, consumer]);

describe("buildStacks", () => {
  test("builds each stack into its own directory and hands artifacts forward", async () => {
    const root = join(await tempDir("stacks"), "out");

    const outcome = await buildStacks(["source", "consumer"], sampleIR(), root, { registry: registry() });

    expect(outcome.ok).toBe(true);
    expect(outcome.results.map((result) => [result.stackId, result.outputDir])).toEqual([
      ["source", join(root, "source")],
      ["consumer", join(root, "consumer")]
    ]);
    expect(await readFile(join(root, "source/a/Task.txt"), "utf8")).toBe("Task\n");
    expect(await readFile(join(root, "consumer/report.txt"), "utf8")).toBe("source|Task,User|false\n");
  });

  test("gives the first stack no upstream artifacts", async () => {
    const root = join(await tempDir("stacks-first"), "out");

    const outcome = await buildStacks(["consumer", "source"], sampleIR(), root, { registry: registry() });

    expect(outcome.ok).toBe(true);
    expect(await readFile(join(root, "consumer/report.txt"), "utf8")).toBe("|none|false\n");
  });

  test("writes a single stack straight into the output directory", async () => {
    const root = join(await tempDir("stacks-single"), "out");

    const outcome = await buildStacks(["source"], sampleIR(), root, { registry: registry() });

    expect(outcome.ok).toBe(true);
    expect(outcome.results[0].outputDir).toBe(root);
    expect(existsSync(join(root, "a/User.txt"))).toBe(true);
  });

  test("stops at the first failing stack", async () => {
    const root = join(await tempDir("stacks-fail"), "out");

    const outcome = await buildStacks(["source", "missing", "consumer"], sampleIR(), root, { registry: registry() });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.results.map((result) => result.stackId)).toEqual(["source"]);
    expect(outcome.error.stackId).toBe("missing");
    expect(outcome.error.stage).toBe("INIT");
    expect(outcome.error.message).toBe("unknown stack missing; registered stacks: source, consumer");
    expect(existsSync(join(root, "consumer"))).toBe(false);
  });

  test("rejects an empty or repeated stack list before building", async () => {
    const root = join(await tempDir("stacks-list"), "out");

    const empty = await buildStacks([], sampleIR(), root, { registry: registry() });
    expect(empty.ok).toBe(false);
    if (!empty.ok) expect(empty.error.message).toBe("no stacks to build");

    const repeated = await buildStacks(["source", "source"], sampleIR(), root, { registry: registry() });
    expect(repeated.ok).toBe(false);
    if (!repeated.ok) {
      expect(repeated.error.kind).toBe("configuration");
      expect(repeated.error.componentId).toBe("source");
      expect(repeated.error.message).toBe("stack source is listed more than once");
    }
    expect(existsSync(root)).toBe(false);
  });

  test("passes per-stack options to the built-in stacks", async () => {
    const root = join(await tempDir("stacks-builtin"), "out");

    const outcome = await buildStacks(["openapi", "express_micro"], sampleIR(), root, {
      registry: createDefaultRegistry(),
      stackOptions: { openapi: { format: "json" }, express_micro: { port: 8080 } }
    });

    expect(outcome.ok).toBe(true);
    expect(outcome.results.map((result) => result.writtenFiles.length)).toEqual([1, 7]);
    expect(existsSync(join(root, "openapi/openapi.json"))).toBe(true);
    expect(outcome.results[1].displayed.instructions).toBe(
      [`cd ${join(root, "express_micro")}`, "npm install", "npm start", "open http://localhost:8080 and sign in as admin"].join("\n")
    );
    expect(existsSync(join(root, "express_micro.admin_credentials"))).toBe(true);
  });
});
