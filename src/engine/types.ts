import type { IRNodeRef, IRSnapshot } from "../ir/schema.js";

export type BuildStage = "INIT" | "RESOLVE_ORDER" | "PRE_BUILD" | "GENERATE" | "POST_BUILD" | "DONE" | "FAILED";

export type FailureStage = Exclude<BuildStage, "DONE" | "FAILED">;

export type HookPhase = "pre_build" | "post_build";

export type DiagnosticKind =
  | "configuration"
  | "generation"
  | "hook"
  | "io"
  | "cancelled"
  | "timeout"
  | "warning"
  | "info";

export type Diagnostic = {
  kind: DiagnosticKind;
  stage: FailureStage;
  componentId: string;
  message: string;
  node?: IRNodeRef;
  details?: Record<string, unknown>;
};

export type StackOptions = Readonly<Record<string, unknown>>;

export type FileContent = string | Uint8Array;

export type EmittedFile = {
  path: string;
  content: FileContent;
};

export type ArtifactWrite = {
  key: string;
  value: unknown;
  /** Surface the value to the caller in `BuildResult.displayed`. */
  display?: boolean;
};

export type WrittenFile = {
  path: string;
  byteLength: number;
  checksum: string;
  generatorId: string;
};

export type DeprecationInfo = {
  since: string;
  removal: string;
  migrationHint: string;
};

export type DeprecationNotice = DeprecationInfo & {
  stackId: string;
};

/** Artifact snapshots of stacks built earlier in the same invocation, keyed by stack id. */
export type UpstreamArtifacts = Readonly<Record<string, Readonly<Record<string, unknown>>>>;

export type RunContextBase = {
  stackId: string;
  outputDir: string;
  ir: IRSnapshot;
  options: StackOptions;
  upstream: UpstreamArtifacts;
};
