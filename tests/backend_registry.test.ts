import { describe, expect, test } from "vitest";
import { defineBackend } from "../src/engine/backend.js";
import { defineGenerator } from "../src/engine/generator.js";
import { BackendRegistry, createBackendRegistry } from "../src/engine/registry.js";
import { createDefaultRegistry, defaultRegistry } from "../src/stacks/index.js";
import { listingGenerator, namesGenerator } from "./helpers/fixtures.js";

const pair = defineBackend({
  id: "pair",
  description: "two generators",
  outputFormats: ["txt"],
  generators: [listingGenerator("B", "A.names"), namesGenerator("A", "A.names")]
});

describe("backend registry", () => {
  test("registers backends and summarises them in resolved order", () => {
    const registry = createBackendRegistry([pair]);

    expect(registry.ids()).toEqual(["pair"]);
    expect(registry.list()).toEqual([
      {
        id: "pair",
        description: "two generators",
        outputFormats: ["txt"],
        deprecated: false,
        generators: ["A", "B"],
        hooks: []
      }
    ]);
  });

  test("rejects duplicate ids and registration after freeze", () => {
    const registry = new BackendRegistry().register(pair);
    expect(() => registry.register(pair)).toThrow("backend pair is already registered");

    registry.freeze();
    expect(registry.isFrozen).toBe(true);
    const other = defineBackend({ id: "other", generators: [] });
    expect(() => registry.register(other)).toThrow("backend registry is frozen; cannot register other");
  });

  test("fails registration for an unsatisfiable backend", () => {
    const broken = defineBackend({ id: "broken", generators: [listingGenerator("B", "A.names")] });
    const registry = new BackendRegistry();

    expect(() => registry.register(broken)).toThrow("B requires A.names, unresolved.");
    expect(registry.has("broken")).toBe(false);
  });

  test("refuses backends whose declared outputs overlap", () => {
    const overlapping = defineBackend({
      id: "overlapping",
      generators: [
        defineGenerator({ id: "models", outputs: ["models/**"], run: () => ({}) }),
        defineGenerator({ id: "scripts", outputs: ["**/*.js"], run: () => ({}) })
      ]
    });
    const registry = new BackendRegistry();

    expect(() => registry.register(overlapping)).toThrow("output paths of models (models/**) and scripts (**/*.js) overlap");
    expect(registry.has("overlapping")).toBe(false);
  });

  test("defers checks when validation is disabled", () => {
    const cyclic = defineBackend({
      id: "cyclic",
      generators: [
        defineGenerator({ id: "A", requires: ["b"], produces: ["a"], run: () => ({}) }),
        defineGenerator({ id: "B", requires: ["a"], produces: ["b"], run: () => ({}) })
      ]
    });
    const registry = new BackendRegistry({ validate: false }).register(cyclic);

    expect(registry.get("cyclic")?.plan).toBeNull();
    expect(registry.list()[0].generators).toEqual(["A", "B"]);
  });

  test("names the registered stacks when a lookup misses", () => {
    const registry = createBackendRegistry([pair]);
    expect(() => registry.require("nope")).toThrow("unknown stack nope; registered stacks: pair");
    expect(() => new BackendRegistry().require("nope")).toThrow("unknown stack nope; registered stacks: none");
  });

  test("ships the built-in stacks in a frozen default registry", () => {
    expect(defaultRegistry.isFrozen).toBe(true);
    expect(defaultRegistry.ids()).toEqual(["openapi", "express_micro"]);

    const fresh = createDefaultRegistry();
    expect(fresh.isFrozen).toBe(false);
    expect(fresh).not.toBe(defaultRegistry);

    const [openapi, express] = fresh.list();
    expect(openapi.generators).toEqual(["openapi_schemas", "openapi_document"]);
    expect(express.generators).toEqual(["express_models", "express_project", "express_routes"]);
    expect(express.hooks).toEqual(["check_node_version", "create_admin_credentials", "setup_instructions"]);
    expect(express.deprecated).toBe(true);
    expect(express.deprecation).toEqual({
      since: "0.9.0",
      removal: "1.0.0",
      migrationHint: "use the openapi stack and generate a server from the document"
    });
  });
});
