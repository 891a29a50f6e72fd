import { allHooks, hooksFor, type Backend } from "./backend.js";
import { ConfigurationError } from "./errors.js";
import { producedKeys, requiredKeys, type Generator } from "./generator.js";
import { patternsOverlap } from "./paths.js";

export type ResolvedPlan = {
  backendId: string;
  /** Generators in execution order. */
  order: Generator[];
  /** Generator id to the ids of the generators it must wait for. */
  dependencies: ReadonlyMap<string, readonly string[]>;
  /** Artifact keys with at least one declared override. */
  overridable: string[];
};

type WriterKind = "generator" | "pre_build" | "post_build";

type Writer = {
  id: string;
  kind: WriterKind;
  position: number;
  overrides: boolean;
};

const configError = (message: string, componentId: string, details: Record<string, unknown>): ConfigurationError =>
  new ConfigurationError(message, { stage: "RESOLVE_ORDER", componentId, details });

const unresolved = (unitId: string, key: string): ConfigurationError =>
  configError(`${unitId} requires ${key}, unresolved.`, unitId, { unit: unitId, key });

/** Checks that hold for any backend regardless of ordering: unique ids, hook phases, disjoint outputs. */
export const validateBackendStructure = (backend: Backend): void => {
  const seen = new Set<string>();
  for (const unit of [...backend.generators, ...allHooks(backend)]) {
    if (seen.has(unit.id)) {
      throw configError(`duplicate unit id ${unit.id} in backend ${backend.id}`, unit.id, { unit: unit.id });
    }
    seen.add(unit.id);
  }

  (["pre_build", "post_build"] as const).forEach((phase) => {
    hooksFor(backend, phase).forEach((hook) => {
      if (hook.phase !== phase) {
        throw configError(`hook ${hook.id} declares phase ${hook.phase} but is listed under ${phase}`, hook.id, {
          unit: hook.id
        });
      }
    });
  });

  const generators = backend.generators;
  for (let i = 0; i < generators.length; i += 1) {
    for (let j = i + 1; j < generators.length; j += 1) {
      const left = generators[i];
      const right = generators[j];
      for (const leftPattern of left.outputs ?? []) {
        const clash = (right.outputs ?? []).find((rightPattern) => patternsOverlap(leftPattern, rightPattern));
        if (clash !== undefined) {
          throw configError(
            `output paths of ${left.id} (${leftPattern}) and ${right.id} (${clash}) overlap`,
            right.id,
            { generators: [left.id, right.id], patterns: [leftPattern, clash] }
          );
        }
      }
    }
  }
};

const collectWriters = (backend: Backend): Map<string, Writer[]> => {
  const writers = new Map<string, Writer[]>();
  const add = (key: string, writer: Writer): void => {
    writers.set(key, [...(writers.get(key) ?? []), writer]);
  };

  backend.generators.forEach((generator, position) => {
    const overrides = new Set(generator.overrides ?? []);
    producedKeys(generator).forEach((key) => {
      add(key, { id: generator.id, kind: "generator", position, overrides: overrides.has(key) });
    });
  });
  (["pre_build", "post_build"] as const).forEach((phase) => {
    hooksFor(backend, phase).forEach((hook, position) => {
      producedKeys(hook).forEach((key) => add(key, { id: hook.id, kind: phase, position, overrides: false }));
    });
  });

  return writers;
};

const checkSingleWriter = (writers: Map<string, Writer[]>): void => {
  writers.forEach((list, key) => {
    if (list.length < 2) return;
    const originals = list.filter((writer) => !writer.overrides);
    if (originals.length !== 1) {
      const ids = list.map((writer) => writer.id);
      throw configError(`artifact ${key} is produced by ${ids.join(" and ")} without an override declaration`, ids[1], {
        key,
        writers: ids
      });
    }
  });
};

const findCycle = (
  remaining: ReadonlySet<string>,
  dependencies: ReadonlyMap<string, Set<string>>,
  indexOf: (id: string) => number
): string[] => {
  const byIndex = (left: string, right: string): number => indexOf(left) - indexOf(right);
  const start = Array.from(remaining).sort(byIndex)[0];
  const path: string[] = [];
  const positions = new Map<string, number>();
  let current = start;

  // Every unordered generator still waits on another unordered one, so this walk must revisit a node.
  while (!positions.has(current)) {
    positions.set(current, path.length);
    path.push(current);
    const next = Array.from(dependencies.get(current) ?? [])
      .filter((id) => remaining.has(id))
      .sort(byIndex)[0];
    if (next === undefined) break;
    current = next;
  }

  const loop = path.slice(positions.get(current) ?? 0).reverse();
  const first = loop.reduce((best, id, i) => (indexOf(id) < indexOf(loop[best]) ? i : best), 0);
  return [...loop.slice(first), ...loop.slice(0, first)];
};

/**
 * Computes the generator execution order from `requires`/`produces` edges. Ties are broken by
 * the stable index (declaration position unless the registry assigned one), so equal inputs
 * always yield the same order.
 */
export const resolveOrder = (backend: Backend, stableIndex?: ReadonlyMap<string, number>): ResolvedPlan => {
  validateBackendStructure(backend);
  const writers = collectWriters(backend);
  checkSingleWriter(writers);

  const declared = new Map(backend.generators.map((generator, position) => [generator.id, position]));
  const indexOf = (id: string): number => stableIndex?.get(id) ?? declared.get(id) ?? Number.MAX_SAFE_INTEGER;

  hooksFor(backend, "pre_build").forEach((hook, position) => {
    requiredKeys(hook).forEach((key) => {
      const ok = (writers.get(key) ?? []).some((writer) => writer.kind === "pre_build" && writer.position < position);
      if (!ok) throw unresolved(hook.id, key);
    });
  });

  const dependencies = new Map<string, Set<string>>(backend.generators.map((generator) => [generator.id, new Set()]));
  backend.generators.forEach((generator) => {
    const deps = dependencies.get(generator.id) ?? new Set<string>();
    requiredKeys(generator).forEach((key) => {
      const usable = (writers.get(key) ?? []).filter(
        (writer) => writer.id !== generator.id && (writer.kind === "generator" || writer.kind === "pre_build")
      );
      if (usable.length === 0) throw unresolved(generator.id, key);
      usable.filter((writer) => writer.kind === "generator").forEach((writer) => deps.add(writer.id));
    });
  });

  // Overriding writers run after the original writer, and after each other in stable order.
  const overridable: string[] = [];
  writers.forEach((list, key) => {
    const overriders = list.filter((writer) => writer.overrides).sort((left, right) => indexOf(left.id) - indexOf(right.id));
    if (overriders.length === 0) return;
    overridable.push(key);
    const original = list.find((writer) => !writer.overrides);
    let previous = original?.kind === "generator" ? original.id : undefined;
    overriders.forEach((writer) => {
      if (previous !== undefined) dependencies.get(writer.id)?.add(previous);
      previous = writer.id;
    });
  });

  hooksFor(backend, "post_build").forEach((hook, position) => {
    requiredKeys(hook).forEach((key) => {
      const ok = (writers.get(key) ?? []).some(
        (writer) =>
          writer.kind === "generator" ||
          writer.kind === "pre_build" ||
          (writer.kind === "post_build" && writer.position < position)
      );
      if (!ok) throw unresolved(hook.id, key);
    });
  });

  const pending = new Map<string, number>();
  const dependents = new Map<string, string[]>();
  dependencies.forEach((deps, id) => {
    pending.set(id, deps.size);
    deps.forEach((dep) => dependents.set(dep, [...(dependents.get(dep) ?? []), id]));
  });

  const byId = new Map(backend.generators.map((generator) => [generator.id, generator]));
  const ready = Array.from(pending.entries())
    .filter(([, count]) => count === 0)
    .map(([id]) => id);
  const order: Generator[] = [];

  while (ready.length > 0) {
    ready.sort((left, right) => indexOf(left) - indexOf(right));
    const id = ready.shift();
    if (id === undefined) break;
    const generator = byId.get(id);
    if (generator) order.push(generator);
    pending.delete(id);
    (dependents.get(id) ?? []).forEach((dependent) => {
      const count = (pending.get(dependent) ?? 0) - 1;
      pending.set(dependent, count);
      if (count === 0) ready.push(dependent);
    });
  }

  if (pending.size > 0) {
    const remaining = new Set(pending.keys());
    const cycle = findCycle(remaining, dependencies, indexOf);
    const blocked = Array.from(remaining).sort((left, right) => indexOf(left) - indexOf(right));
    throw configError(`generator dependency cycle: ${[...cycle, cycle[0]].join(" -> ")}`, backend.id, {
      cycle,
      blocked
    });
  }

  return {
    backendId: backend.id,
    order,
    dependencies: new Map(Array.from(dependencies.entries()).map(([id, deps]) => [id, Array.from(deps)])),
    overridable
  };
};

/** Runs every static check on a backend without registering it. */
export const validateBackend = (backend: Backend): ResolvedPlan => resolveOrder(backend);
