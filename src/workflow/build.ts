import { join, resolve } from "node:path";
import { ConfigurationError } from "../engine/errors.js";
import type { BackendRegistry, BackendSummary } from "../engine/registry.js";
import { deepFreeze, freezeSnapshot } from "../ir/loadIR.js";
import type { IRSnapshot } from "../ir/schema.js";
import { defaultRegistry } from "../stacks/index.js";
import { invokeBuildGraph } from "./graph.js";
import {
  createInitialState,
  type BuildOptions,
  type BuildOutcome,
  type BuildRequest,
  type BuildResult,
  type BuildState,
  type StacksBuildOptions,
  type StacksOutcome
} from "./state.js";

const toOutcome = (state: BuildState): BuildOutcome => {
  const { request } = state;
  if (state.failure) {
    return {
      ok: false,
      error: {
        ...state.failure,
        stackId: request.stackId,
        outputDir: request.outputDir,
        writtenFiles: state.writtenFiles,
        completedGenerators: state.completedGenerators,
        warnings: state.warnings,
        deprecationNotices: state.deprecationNotices
      }
    };
  }

  return {
    ok: true,
    result: {
      stackId: request.stackId,
      outputDir: request.outputDir,
      writtenFiles: state.writtenFiles,
      artifacts: state.artifacts?.snapshot() ?? {},
      displayed: state.artifacts?.displayed() ?? {},
      warnings: state.warnings,
      notes: state.notes,
      deprecationNotices: state.deprecationNotices,
      completedGenerators: state.completedGenerators
    }
  };
};

/**
 * Builds the output tree for `stackId` from an IR snapshot. Never throws for build failures; the
 * outcome carries either the result or a single diagnostic with the stage and unit that failed.
 */
export const build = async (
  stackId: string,
  ir: IRSnapshot,
  outputDir: string,
  opts: BuildOptions = {}
): Promise<BuildOutcome> => {
  const request: BuildRequest = {
    stackId,
    ir: freezeSnapshot(ir),
    outputDir: resolve(outputDir),
    stackOptions: { ...(opts.stackOptions ?? {}) },
    registry: opts.registry ?? defaultRegistry,
    concurrency: opts.concurrency ?? 1,
    unitTimeoutMs: opts.unitTimeoutMs,
    signal: opts.signal,
    onEvent: opts.onEvent,
    upstream: deepFreeze({ ...(opts.upstream ?? {}) })
  };

  const state = await invokeBuildGraph(createInitialState(request));
  return toOutcome(state);
};

const invalidStackList = (stackIds: readonly string[], outputDir: string): ConfigurationError | null => {
  if (stackIds.length === 0) {
    return new ConfigurationError("no stacks to build", { stage: "INIT" });
  }
  const duplicate = stackIds.find((id, index) => stackIds.indexOf(id) !== index);
  if (duplicate !== undefined) {
    return new ConfigurationError(`stack ${duplicate} is listed more than once`, {
      stage: "INIT",
      componentId: duplicate,
      details: { stacks: [...stackIds], outputDir }
    });
  }
  return null;
};

/**
 * Builds several stacks from one IR, in the given order, stopping at the first failure. With more
 * than one stack each writes into `<outputDir>/<stackId>`. Every later stack reads the artifacts of
 * the stacks before it through `ctx.upstream`.
 */
export const buildStacks = async (
  stackIds: readonly string[],
  ir: IRSnapshot,
  outputDir: string,
  opts: StacksBuildOptions = {}
): Promise<StacksOutcome> => {
  const root = resolve(outputDir);
  const invalid = invalidStackList(stackIds, root);
  if (invalid) {
    return {
      ok: false,
      results: [],
      error: {
        ...invalid.toDiagnostic(),
        stackId: stackIds.join(","),
        outputDir: root,
        writtenFiles: [],
        completedGenerators: [],
        warnings: [],
        deprecationNotices: []
      }
    };
  }

  const { stackOptions = {}, ...shared } = opts;
  const results: BuildResult[] = [];
  const upstream: Record<string, Record<string, unknown>> = {};

  for (const stackId of stackIds) {
    const target = stackIds.length === 1 ? root : join(root, stackId);
    const outcome = await build(stackId, ir, target, { ...shared, stackOptions: stackOptions[stackId], upstream });
    if (!outcome.ok) return { ok: false, results, error: outcome.error };
    results.push(outcome.result);
    upstream[stackId] = outcome.result.artifacts;
  }

  return { ok: true, results };
};

export const listBackends = (registry: BackendRegistry = defaultRegistry): BackendSummary[] => registry.list();
