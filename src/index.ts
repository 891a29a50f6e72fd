export { parseIR, loadIR } from "./ir/loadIR.js";
export type {
  AppIR,
  AppIRInput,
  EntitySpec,
  FieldSpec,
  IRNodeKind,
  IRNodeRef,
  IRSnapshot,
  ModuleSpec,
  ServiceSpec,
  SurfaceSpec,
  WorkspaceSpec
} from "./ir/schema.js";

export { ArtifactRegistry, defineArtifact } from "./engine/artifacts.js";
export type { ArtifactDefinition, ArtifactReader, ArtifactRef } from "./engine/artifacts.js";
export { defineGenerator, emitFile, runGeneratorInIsolation, writeArtifact } from "./engine/generator.js";
export type { Generator, GeneratorContext, GeneratorOutput } from "./engine/generator.js";
export { defineHook } from "./engine/hooks.js";
export type { Hook, HookContext, HookOutput } from "./engine/hooks.js";
export { defineBackend } from "./engine/backend.js";
export type { Backend, BackendHooks } from "./engine/backend.js";
export { BackendRegistry, createBackendRegistry } from "./engine/registry.js";
export type { BackendSummary, RegisteredBackend } from "./engine/registry.js";
export { resolveOrder, validateBackend } from "./engine/resolve.js";
export type { ResolvedPlan } from "./engine/resolve.js";
export {
  CancelledError,
  ConfigurationError,
  EngineError,
  GenerationError,
  HookError,
  OutputIOError,
  UnitTimeoutError
} from "./engine/errors.js";
export type { BuildEvent, BuildEventListener } from "./engine/events.js";
export type {
  BuildStage,
  DeprecationInfo,
  DeprecationNotice,
  Diagnostic,
  DiagnosticKind,
  EmittedFile,
  HookPhase,
  StackOptions,
  UpstreamArtifacts,
  WrittenFile
} from "./engine/types.js";

export { build, buildStacks, listBackends } from "./workflow/build.js";
export type {
  BuildError,
  BuildOptions,
  BuildOutcome,
  BuildResult,
  StacksBuildOptions,
  StacksOutcome
} from "./workflow/state.js";

export { createDefaultRegistry, defaultRegistry, expressMicroBackend, openapiBackend } from "./stacks/index.js";
export { loadEngineConfig, loadEnvFile } from "./config/loadEnv.js";
export type { EngineConfig } from "./config/loadEnv.js";
export { BuildAudit } from "./runtime/audit.js";
export type { AuditEntry, AuditRecord } from "./runtime/audit.js";
