import { ArtifactRegistry } from "../engine/artifacts.js";
import { hooksFor, type Backend } from "../engine/backend.js";
import {
  CancelledError,
  ConfigurationError,
  EngineError,
  OutputIOError,
  errorMessage
} from "../engine/errors.js";
import type { BuildEvent } from "../engine/events.js";
import { executeGenerator } from "../engine/generator.js";
import { executeHook, type Hook } from "../engine/hooks.js";
import type { RegisteredBackend } from "../engine/registry.js";
import { resolveOrder } from "../engine/resolve.js";
import { runScheduled } from "../engine/schedule.js";
import type {
  ArtifactWrite,
  DeprecationNotice,
  Diagnostic,
  FailureStage,
  RunContextBase,
  StackOptions
} from "../engine/types.js";
import { toUnitError } from "../engine/units.js";
import { assertOutputUsable, flushFiles } from "../engine/writer.js";
import type { BuildState } from "./state.js";

type Update = Partial<BuildState>;

const emit = (state: BuildState, event: BuildEvent): void => {
  state.request.onEvent?.(event);
};

const failWith = (state: BuildState, error: EngineError, extra: Update = {}): Update => {
  const diagnostic = error.toDiagnostic();
  emit(state, { type: "failed", diagnostic });
  return { ...extra, stage: "FAILED", failure: diagnostic };
};

const asEngineError = (error: unknown, stage: FailureStage, componentId = "engine"): EngineError =>
  error instanceof EngineError
    ? error
    : new ConfigurationError(errorMessage(error, `${stage} failed`), { stage, componentId, cause: error });

const cancelledAt = (state: BuildState, stage: FailureStage, componentId = "engine"): CancelledError | null =>
  state.request.signal?.aborted
    ? new CancelledError(`build cancelled before ${stage}`, { stage, componentId })
    : null;

const warningOf = (stage: FailureStage, componentId: string, message: string): Diagnostic => ({
  kind: "warning",
  stage,
  componentId,
  message
});

const runContextOf = (state: BuildState): RunContextBase => ({
  stackId: state.request.stackId,
  outputDir: state.request.outputDir,
  ir: state.request.ir,
  options: state.options,
  upstream: state.request.upstream
});

const publish = (registry: ArtifactRegistry, writer: string, artifacts: ArtifactWrite[]): void => {
  artifacts.forEach((artifact) => {
    registry.put(artifact.key, artifact.value, { writer, display: artifact.display });
  });
};

const parseOptions = (backend: Backend, raw: Record<string, unknown>): StackOptions => {
  if (!backend.optionsSchema) return Object.freeze({ ...raw });

  const parsed = backend.optionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigurationError(`invalid options for stack ${backend.id}: ${issues.join("; ")}`, {
      stage: "INIT",
      componentId: backend.id,
      details: { issues }
    });
  }
  return Object.freeze({ ...parsed.data });
};

const assertRunSettings = (request: BuildState["request"]): void => {
  if (!Number.isInteger(request.concurrency) || request.concurrency < 1) {
    throw new ConfigurationError(`concurrency must be a positive integer, got ${String(request.concurrency)}`, {
      stage: "INIT",
      details: { concurrency: request.concurrency }
    });
  }
  const timeout = request.unitTimeoutMs;
  if (timeout !== undefined && (!Number.isFinite(timeout) || timeout <= 0)) {
    throw new ConfigurationError(`unit timeout must be a positive number of milliseconds, got ${String(timeout)}`, {
      stage: "INIT",
      details: { unitTimeoutMs: timeout }
    });
  }
};

const lookupBackend = (state: BuildState): RegisteredBackend | EngineError => {
  try {
    return state.request.registry.require(state.request.stackId);
  } catch (error) {
    return asEngineError(error, "INIT", state.request.stackId);
  }
};

export const node_init = async (state: BuildState): Promise<Update> => {
  emit(state, { type: "stage_start", stage: "INIT" });

  const registered = lookupBackend(state);
  if (registered instanceof EngineError) return failWith(state, registered);

  const { backend } = registered;
  const deprecationNotices: DeprecationNotice[] = backend.deprecation
    ? [{ stackId: backend.id, ...backend.deprecation }]
    : [];
  deprecationNotices.forEach((notice) => emit(state, { type: "deprecation", notice }));

  try {
    assertRunSettings(state.request);
    const options = parseOptions(backend, state.request.stackOptions);
    await assertOutputUsable(state.request.outputDir);
    const cancelled = cancelledAt(state, "INIT");
    if (cancelled) throw cancelled;
    return { stage: "INIT", backend: registered, options, deprecationNotices };
  } catch (error) {
    return failWith(state, asEngineError(error, "INIT", backend.id), { backend: registered, deprecationNotices });
  }
};

export const node_resolve_order = async (state: BuildState): Promise<Update> => {
  emit(state, { type: "stage_start", stage: "RESOLVE_ORDER" });
  const cancelled = cancelledAt(state, "RESOLVE_ORDER");
  if (cancelled) return failWith(state, cancelled);

  const registered = state.backend;
  if (!registered) {
    return failWith(state, new ConfigurationError("no backend selected", { stage: "RESOLVE_ORDER" }));
  }

  try {
    const plan = resolveOrder(registered.backend, registered.stableIndex);
    const artifacts = new ArtifactRegistry({
      overridable: plan.overridable,
      definitions: registered.backend.artifacts ?? []
    });
    emit(state, { type: "order_resolved", order: plan.order.map((generator) => generator.id) });
    return { stage: "RESOLVE_ORDER", plan, artifacts };
  } catch (error) {
    return failWith(state, asEngineError(error, "RESOLVE_ORDER", registered.backend.id));
  }
};

type HookPass = {
  warnings: Diagnostic[];
  notes: Diagnostic[];
};

const runHook = async (
  state: BuildState,
  hook: Hook,
  registry: ArtifactRegistry,
  pass: HookPass
): Promise<void> => {
  const stage = hook.phase === "pre_build" ? "PRE_BUILD" : "POST_BUILD";
  emit(state, { type: "unit_start", stage, unitId: hook.id });
  const run = await executeHook(
    hook,
    { ...runContextOf(state), writtenFiles: state.writtenFiles },
    registry,
    state.request.unitTimeoutMs
  );
  try {
    publish(registry, hook.id, run.artifacts);
  } catch (error) {
    throw toUnitError(error, { kind: "hook", stage, componentId: hook.id });
  }

  run.warnings.forEach((message) => {
    const diagnostic = warningOf(stage, hook.id, message);
    pass.warnings.push(diagnostic);
    emit(state, { type: "warning", diagnostic });
  });
  if (run.message) {
    pass.notes.push({ kind: "info", stage, componentId: hook.id, message: run.message });
  }
  emit(state, { type: "unit_end", stage, unitId: hook.id, ok: true, note: run.message });
};

export const node_pre_build = async (state: BuildState): Promise<Update> => {
  emit(state, { type: "stage_start", stage: "PRE_BUILD" });
  const registered = state.backend;
  const registry = state.artifacts;
  if (!registered || !registry) {
    return failWith(state, new ConfigurationError("pre_build started without a resolved plan", { stage: "PRE_BUILD" }));
  }

  const pass: HookPass = { warnings: [...state.warnings], notes: [...state.notes] };
  for (const hook of hooksFor(registered.backend, "pre_build")) {
    const cancelled = cancelledAt(state, "PRE_BUILD", hook.id);
    if (cancelled) return failWith(state, cancelled, pass);
    try {
      await runHook(state, hook, registry, pass);
    } catch (error) {
      const failure = asEngineError(error, "PRE_BUILD", hook.id);
      emit(state, { type: "unit_end", stage: "PRE_BUILD", unitId: hook.id, ok: false, note: failure.message });
      return failWith(state, failure, pass);
    }
  }

  return { stage: "PRE_BUILD", ...pass };
};

export const node_generate = async (state: BuildState): Promise<Update> => {
  emit(state, { type: "stage_start", stage: "GENERATE" });
  const { request } = state;
  const plan = state.plan;
  const registry = state.artifacts;
  if (!plan || !registry) {
    return failWith(state, new ConfigurationError("generation started without a resolved plan", { stage: "GENERATE" }));
  }

  const base = runContextOf(state);
  const writtenFiles = [...state.writtenFiles];
  const completedGenerators = [...state.completedGenerators];
  const warnings = [...state.warnings];
  const owners = new Map<string, string>();

  const failure = await runScheduled({
    order: plan.order,
    dependencies: plan.dependencies,
    concurrency: request.concurrency,
    signal: request.signal,
    onStart: (generator) => emit(state, { type: "unit_start", stage: "GENERATE", unitId: generator.id }),
    execute: (generator) => executeGenerator(generator, base, registry, request.unitTimeoutMs),
    publish: (generator, run) => publish(registry, generator.id, run.artifacts),
    commit: async (generator, run) => {
      run.files.forEach((file) => {
        const owner = owners.get(file.path);
        if (owner !== undefined) {
          throw new ConfigurationError(`duplicate output path ${file.path} emitted by ${owner} and ${generator.id}`, {
            stage: "GENERATE",
            componentId: generator.id,
            details: { path: file.path, generators: [owner, generator.id] }
          });
        }
      });
      run.files.forEach((file) => owners.set(file.path, generator.id));

      const flushed = await flushFiles(request.outputDir, generator.id, run.files).catch((error: unknown) => {
        if (error instanceof OutputIOError) writtenFiles.push(...error.written);
        throw error;
      });
      writtenFiles.push(...flushed);
      completedGenerators.push(generator.id);
      emit(state, { type: "files_flushed", generatorId: generator.id, paths: flushed.map((file) => file.path) });

      run.warnings.forEach((message) => {
        const diagnostic = warningOf("GENERATE", generator.id, message);
        warnings.push(diagnostic);
        emit(state, { type: "warning", diagnostic });
      });
      emit(state, { type: "unit_end", stage: "GENERATE", unitId: generator.id, ok: true });
    }
  });

  const progress: Update = { writtenFiles, completedGenerators, warnings };
  if (failure) {
    if (failure.kind !== "cancelled") {
      emit(state, { type: "unit_end", stage: "GENERATE", unitId: failure.componentId, ok: false, note: failure.message });
    }
    return failWith(state, failure, progress);
  }
  return { stage: "GENERATE", ...progress };
};

export const node_post_build = async (state: BuildState): Promise<Update> => {
  emit(state, { type: "stage_start", stage: "POST_BUILD" });
  const registered = state.backend;
  const registry = state.artifacts;
  if (!registered || !registry) {
    return failWith(state, new ConfigurationError("post_build started without a resolved plan", { stage: "POST_BUILD" }));
  }

  const pass: HookPass = { warnings: [...state.warnings], notes: [...state.notes] };
  for (const hook of hooksFor(registered.backend, "post_build")) {
    const cancelled = cancelledAt(state, "POST_BUILD", hook.id);
    if (cancelled) return failWith(state, cancelled, pass);
    try {
      await runHook(state, hook, registry, pass);
    } catch (error) {
      const failure = asEngineError(error, "POST_BUILD", hook.id);
      emit(state, { type: "unit_end", stage: "POST_BUILD", unitId: hook.id, ok: false, note: failure.message });
      if (hook.critical) return failWith(state, failure, pass);

      const diagnostic = failure.toDiagnostic();
      pass.warnings.push(diagnostic);
      emit(state, { type: "warning", diagnostic });
    }
  }

  return { stage: "POST_BUILD", ...pass };
};

export const node_done = async (state: BuildState): Promise<Update> => {
  emit(state, { type: "done", fileCount: state.writtenFiles.length });
  return { stage: "DONE" };
};
