import { describe, expect, test } from "vitest";
import { defineBackend } from "../src/engine/backend.js";
import { ConfigurationError } from "../src/engine/errors.js";
import { defineGenerator, emitFile, writeArtifact } from "../src/engine/generator.js";
import { defineHook } from "../src/engine/hooks.js";
import { resolveOrder, validateBackend } from "../src/engine/resolve.js";
import { listingGenerator, namesGenerator } from "./helpers/fixtures.js";

const catchError = (fn: () => unknown): ConfigurationError => {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error("expected a ConfigurationError");
};

const ids = (backend: Parameters<typeof resolveOrder>[0]): string[] => resolveOrder(backend).order.map((generator) => generator.id);

describe("resolveOrder", () => {
  test("orders producers before consumers regardless of declaration order", () => {
    const backend = defineBackend({
      id: "pair",
      generators: [listingGenerator("B", "A.names"), namesGenerator("A", "A.names")]
    });

    expect(ids(backend)).toEqual(["A", "B"]);
    expect(resolveOrder(backend).dependencies.get("B")).toEqual(["A"]);
  });

  test("reports an unresolved requirement by unit and key", () => {
    const backend = defineBackend({ id: "orphan", generators: [listingGenerator("B", "A.names")] });

    const error = catchError(() => resolveOrder(backend));
    expect(error.message).toBe("B requires A.names, unresolved.");
    expect(error.stage).toBe("RESOLVE_ORDER");
    expect(error.componentId).toBe("B");
  });

  test("breaks ties between independent generators by declaration order", () => {
    const backend = defineBackend({
      id: "independent",
      generators: [namesGenerator("C", "C.names"), namesGenerator("A", "A.names"), namesGenerator("B", "B.names")]
    });

    expect(ids(backend)).toEqual(["C", "A", "B"]);
    const reversed = new Map([
      ["C", 2],
      ["A", 1],
      ["B", 0]
    ]);
    expect(resolveOrder(backend, reversed).order.map((generator) => generator.id)).toEqual(["B", "A", "C"]);
  });

  test("names every member of a dependency cycle", () => {
    const loop = (id: string, requires: string, produces: string) =>
      defineGenerator({ id, requires: [requires], produces: [produces], run: () => ({}) });
    const backend = defineBackend({
      id: "cyclic",
      generators: [loop("A", "c.out", "a.out"), loop("B", "a.out", "b.out"), loop("C", "b.out", "c.out")]
    });

    const error = catchError(() => resolveOrder(backend));
    expect(error.message).toBe("generator dependency cycle: A -> B -> C -> A");
    expect(error.details).toEqual({ cycle: ["A", "B", "C"], blocked: ["A", "B", "C"] });
  });

  test("rejects two writers of one artifact without an override", () => {
    const backend = defineBackend({
      id: "conflict",
      generators: [namesGenerator("A", "shared"), namesGenerator("B", "shared")]
    });

    expect(() => validateBackend(backend)).toThrow("artifact shared is produced by A and B without an override declaration");
  });

  test("runs an overriding writer after the original", () => {
    const original = namesGenerator("A", "shared");
    const override = defineGenerator({
      id: "Z",
      produces: ["shared"],
      overrides: ["shared"],
      run: () => ({ artifacts: [writeArtifact("shared", [])] })
    });
    const backend = defineBackend({ id: "override", generators: [override, original] });

    const plan = resolveOrder(backend);
    expect(plan.order.map((generator) => generator.id)).toEqual(["A", "Z"]);
    expect(plan.overridable).toEqual(["shared"]);
  });

  test("rejects overlapping output patterns", () => {
    const wide = defineGenerator({ id: "wide", outputs: ["src/**"], run: () => ({ files: [emitFile("src/a.ts", "")] }) });
    const narrow = defineGenerator({ id: "narrow", outputs: ["src/a.ts"], run: () => ({}) });

    expect(() => validateBackend(defineBackend({ id: "overlap", generators: [wide, narrow] }))).toThrow(
      "output paths of wide (src/**) and narrow (src/a.ts) overlap"
    );
  });

  test("rejects patterns that overlap through wildcards on both sides", () => {
    const generatorWith = (id: string, outputs: string[]) => defineGenerator({ id, outputs, run: () => ({}) });

    expect(() =>
      validateBackend(defineBackend({ id: "js", generators: [generatorWith("models", ["models/**"]), generatorWith("scripts", ["**/*.js"])] }))
    ).toThrow("output paths of models (models/**) and scripts (**/*.js) overlap");
    expect(() =>
      validateBackend(defineBackend({ id: "ts", generators: [generatorWith("left", ["a/*.ts"]), generatorWith("right", ["*/b.ts"])] }))
    ).toThrow("output paths of left (a/*.ts) and right (*/b.ts) overlap");
    expect(() =>
      validateBackend(
        defineBackend({ id: "src", generators: [generatorWith("sources", ["src/**/*.ts"]), generatorWith("entry", ["src/index.ts"])] })
      )
    ).toThrow("output paths of sources (src/**/*.ts) and entry (src/index.ts) overlap");
  });

  test("rejects duplicate unit ids and misplaced hooks", () => {
    const hook = defineHook({ id: "A", phase: "pre_build", run: () => ({}) });
    expect(() =>
      validateBackend(defineBackend({ id: "dupe", generators: [namesGenerator("A", "a")], hooks: { pre_build: [hook] } }))
    ).toThrow("duplicate unit id A in backend dupe");

    const post = defineHook({ id: "late", phase: "post_build", run: () => ({}) });
    expect(() => validateBackend(defineBackend({ id: "misplaced", generators: [], hooks: { pre_build: [post] } }))).toThrow(
      "hook late declares phase post_build but is listed under pre_build"
    );
  });

  test("lets generators read pre_build artifacts without ordering edges", () => {
    const setup = defineHook({
      id: "setup",
      phase: "pre_build",
      produces: ["runtime"],
      run: () => ({ artifacts: [writeArtifact("runtime", { version: 3 })] })
    });
    const backend = defineBackend({
      id: "prehook",
      generators: [listingGenerator("B", "runtime")],
      hooks: { pre_build: [setup] }
    });

    const plan = resolveOrder(backend);
    expect(plan.order.map((generator) => generator.id)).toEqual(["B"]);
    expect(plan.dependencies.get("B")).toEqual([]);
  });

  test("requires pre_build hooks to read only earlier pre_build output", () => {
    const reader = defineHook({ id: "reader", phase: "pre_build", requires: ["A.names"], run: () => ({}) });
    const backend = defineBackend({
      id: "early",
      generators: [namesGenerator("A", "A.names")],
      hooks: { pre_build: [reader] }
    });

    expect(() => resolveOrder(backend)).toThrow("reader requires A.names, unresolved.");
  });

  test("allows post_build hooks to read generator output", () => {
    const reader = defineHook({ id: "reader", phase: "post_build", requires: ["A.names"], run: () => ({}) });
    const backend = defineBackend({
      id: "late",
      generators: [namesGenerator("A", "A.names")],
      hooks: { post_build: [reader] }
    });

    expect(ids(backend)).toEqual(["A"]);
  });
});
