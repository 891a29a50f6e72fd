import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { defineGenerator, emitFile, writeArtifact, type Generator } from "../../src/engine/generator.js";
import type { BuildEvent } from "../../src/engine/events.js";
import { parseIR } from "../../src/ir/loadIR.js";
import type { AppIRInput, IRSnapshot } from "../../src/ir/schema.js";

export const sampleIRInput: AppIRInput = {
  name: "task_board",
  title: "Task Board",
  entities: [
    {
      name: "Task",
      fields: [
        { name: "id", type: { kind: "uuid" }, modifiers: ["pk"] },
        { name: "title", type: { kind: "str", max_length: 200 }, modifiers: ["required"] },
        { name: "status", type: { kind: "enum", enum_values: ["todo", "done"] }, modifiers: ["required"], default: "todo" },
        { name: "owner", type: { kind: "ref", ref_entity: "User" } }
      ]
    },
    {
      name: "User",
      fields: [
        { name: "id", type: { kind: "uuid" }, modifiers: ["pk"] },
        { name: "email", type: { kind: "email" }, modifiers: ["required", "unique"] }
      ]
    }
  ],
  surfaces: [
    { name: "task_list", title: "Tasks", entity_ref: "Task", mode: "list" },
    { name: "task_create", entity_ref: "Task", mode: "create" },
    { name: "task_detail", entity_ref: "Task", mode: "view" },
    { name: "dashboard", mode: "custom" }
  ]
};

export const sampleIR = (): IRSnapshot => parseIR(sampleIRInput);

export const tempDir = (prefix: string): Promise<string> => mkdtemp(join(tmpdir(), `stackweave-${prefix}-`));

export const recordEvents = (): { events: BuildEvent[]; onEvent: (event: BuildEvent) => void } => {
  const events: BuildEvent[] = [];
  return { events, onEvent: (event) => events.push(event) };
};

/** Writes `<dir>/<Entity>.txt` per entity and publishes the entity names under `key`. */
export const namesGenerator = (id: string, key: string, dir = id.toLowerCase()): Generator =>
  defineGenerator({
    id,
    produces: [key],
    outputs: [`${dir}/*.txt`],
    run: (ctx) => ({
      files: ctx.ir.entities.map((entity) => emitFile(`${dir}/${entity.name}.txt`, `${entity.name}\n`)),
      artifacts: [writeArtifact(key, ctx.ir.entities.map((entity) => entity.name))]
    })
  });

/** Reads `key` and writes one file listing its values. */
export const listingGenerator = (id: string, key: string, path = `${id.toLowerCase()}/listing.txt`): Generator =>
  defineGenerator({
    id,
    requires: [key],
    outputs: [path],
    run: (ctx) => {
      const names = ctx.artifacts.get(key);
      return { files: [emitFile(path, `${Array.isArray(names) ? names.join(",") : ""}\n`)] };
    }
  });

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));
