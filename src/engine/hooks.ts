import { scopedReader, type ArtifactReader, type ArtifactRef } from "./artifacts.js";
import { HookError } from "./errors.js";
import { producedKeys, requiredKeys } from "./generator.js";
import { toUnitError, withTimeout } from "./units.js";
import type { ArtifactWrite, HookPhase, RunContextBase, WrittenFile } from "./types.js";

export type HookContext = RunContextBase & {
  hookId: string;
  phase: HookPhase;
  artifacts: ArtifactReader;
  /** Files flushed so far; always empty for `pre_build` hooks. */
  writtenFiles: readonly WrittenFile[];
};

export type HookOutput = {
  artifacts?: ArtifactWrite[];
  warnings?: string[];
  message?: string;
};

export type HookRun = {
  artifacts: ArtifactWrite[];
  warnings: string[];
  message?: string;
};

/**
 * A unit with side effects outside the output tree, bound to one lifecycle phase. A failing
 * `post_build` hook only becomes a build error when it is `critical`.
 */
export interface Hook {
  readonly id: string;
  readonly description?: string;
  readonly phase: HookPhase;
  readonly requires?: readonly ArtifactRef[];
  readonly produces?: readonly ArtifactRef[];
  readonly critical?: boolean;
  readonly timeoutMs?: number;
  run(ctx: HookContext): HookOutput | Promise<HookOutput>;
}

export const defineHook = (definition: Hook): Hook => Object.freeze({ ...definition });

const stageOf = (phase: HookPhase): "PRE_BUILD" | "POST_BUILD" => (phase === "pre_build" ? "PRE_BUILD" : "POST_BUILD");

export const executeHook = async (
  hook: Hook,
  base: RunContextBase & { writtenFiles: readonly WrittenFile[] },
  registry: ArtifactReader,
  timeoutMs?: number
): Promise<HookRun> => {
  const stage = stageOf(hook.phase);
  try {
    const ctx: HookContext = {
      ...base,
      hookId: hook.id,
      phase: hook.phase,
      artifacts: scopedReader(registry, requiredKeys(hook), hook.id)
    };
    const output = await withTimeout(hook.id, () => hook.run(ctx), hook.timeoutMs ?? timeoutMs);
    const declared = new Set(producedKeys(hook));
    const artifacts = output.artifacts ?? [];
    const undeclared = artifacts.find((artifact) => !declared.has(artifact.key));
    if (undeclared) {
      throw new HookError(`${hook.id} wrote undeclared artifact ${undeclared.key}`, {
        componentId: hook.id,
        details: { key: undeclared.key }
      });
    }
    return { artifacts: [...artifacts], warnings: [...(output.warnings ?? [])], message: output.message };
  } catch (error) {
    throw toUnitError(error, { kind: "hook", stage, componentId: hook.id });
  }
};
