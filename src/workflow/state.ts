import { Annotation } from "@langchain/langgraph";
import type { ArtifactRegistry } from "../engine/artifacts.js";
import type { BuildEventListener } from "../engine/events.js";
import type { BackendRegistry, RegisteredBackend } from "../engine/registry.js";
import type { ResolvedPlan } from "../engine/resolve.js";
import type {
  BuildStage,
  DeprecationNotice,
  Diagnostic,
  StackOptions,
  UpstreamArtifacts,
  WrittenFile
} from "../engine/types.js";
import type { IRSnapshot } from "../ir/schema.js";

export type BuildOptions = {
  /** Options passed to every generator and hook, validated by the backend's options schema. */
  stackOptions?: Record<string, unknown>;
  /** Defaults to the process-wide registry of built-in stacks. */
  registry?: BackendRegistry;
  /** Maximum number of independent generators run at once. Defaults to 1. */
  concurrency?: number;
  /** Applied to every generator and hook that does not set its own timeout. */
  unitTimeoutMs?: number;
  signal?: AbortSignal;
  onEvent?: BuildEventListener;
  /** Artifacts of stacks built before this one, readable as `ctx.upstream`. */
  upstream?: UpstreamArtifacts;
};

export type BuildRequest = {
  stackId: string;
  ir: IRSnapshot;
  outputDir: string;
  stackOptions: Record<string, unknown>;
  registry: BackendRegistry;
  concurrency: number;
  unitTimeoutMs?: number;
  signal?: AbortSignal;
  onEvent?: BuildEventListener;
  upstream: UpstreamArtifacts;
};

export type BuildResult = {
  stackId: string;
  outputDir: string;
  writtenFiles: WrittenFile[];
  /** Every artifact value at the end of the run, in write order. */
  artifacts: Record<string, unknown>;
  /** The subset marked for display, such as generated credentials. */
  displayed: Record<string, unknown>;
  warnings: Diagnostic[];
  notes: Diagnostic[];
  deprecationNotices: DeprecationNotice[];
  completedGenerators: string[];
};

export type BuildError = Diagnostic & {
  stackId: string;
  outputDir: string;
  writtenFiles: WrittenFile[];
  completedGenerators: string[];
  warnings: Diagnostic[];
  deprecationNotices: DeprecationNotice[];
};

export type BuildOutcome = { ok: true; result: BuildResult } | { ok: false; error: BuildError };

export type StacksBuildOptions = Omit<BuildOptions, "stackOptions" | "upstream"> & {
  /** Options per stack id. */
  stackOptions?: Record<string, Record<string, unknown>>;
};

/** Results of the stacks that completed, in build order, and the first failure if any. */
export type StacksOutcome =
  | { ok: true; results: BuildResult[] }
  | { ok: false; results: BuildResult[]; error: BuildError };

export const BuildStateAnnotation = Annotation.Root({
  request: Annotation<BuildRequest>,
  stage: Annotation<BuildStage>,
  backend: Annotation<RegisteredBackend | null>,
  options: Annotation<StackOptions>,
  plan: Annotation<ResolvedPlan | null>,
  artifacts: Annotation<ArtifactRegistry | null>,
  writtenFiles: Annotation<WrittenFile[]>,
  completedGenerators: Annotation<string[]>,
  warnings: Annotation<Diagnostic[]>,
  notes: Annotation<Diagnostic[]>,
  deprecationNotices: Annotation<DeprecationNotice[]>,
  failure: Annotation<Diagnostic | null>
});

export type BuildState = typeof BuildStateAnnotation.State;

export const createInitialState = (request: BuildRequest): BuildState => ({
  request,
  stage: "INIT",
  backend: null,
  options: {},
  plan: null,
  artifacts: null,
  writtenFiles: [],
  completedGenerators: [],
  warnings: [],
  notes: [],
  deprecationNotices: [],
  failure: null
});
