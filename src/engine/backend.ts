import type { z } from "zod";
import type { ErasedArtifactDefinition } from "./artifacts.js";
import type { Generator } from "./generator.js";
import type { Hook } from "./hooks.js";
import type { DeprecationInfo, HookPhase } from "./types.js";

export type BackendHooks = {
  pre_build?: readonly Hook[];
  post_build?: readonly Hook[];
};

/**
 * A named stack: an unordered set of generators, ordered hooks per phase and metadata. The
 * generator order is computed from `requires`/`produces`, never from declaration order alone.
 */
export interface Backend {
  readonly id: string;
  readonly description?: string;
  readonly outputFormats?: readonly string[];
  readonly generators: readonly Generator[];
  readonly hooks?: BackendHooks;
  /** Typed contracts for artifact keys; writes to these keys are validated. */
  readonly artifacts?: readonly ErasedArtifactDefinition[];
  /** Parses caller options in INIT; units receive the parsed value. */
  readonly optionsSchema?: z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>;
  readonly deprecation?: DeprecationInfo;
}

export const defineBackend = (definition: Backend): Backend =>
  Object.freeze({
    ...definition,
    generators: Object.freeze([...definition.generators]),
    hooks: Object.freeze({
      pre_build: Object.freeze([...(definition.hooks?.pre_build ?? [])]),
      post_build: Object.freeze([...(definition.hooks?.post_build ?? [])])
    })
  });

export const hooksFor = (backend: Backend, phase: HookPhase): readonly Hook[] => backend.hooks?.[phase] ?? [];

export const allHooks = (backend: Backend): Hook[] => [...hooksFor(backend, "pre_build"), ...hooksFor(backend, "post_build")];
