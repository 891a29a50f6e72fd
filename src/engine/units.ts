import { EngineError, GenerationError, HookError, UnitTimeoutError, errorMessage } from "./errors.js";
import type { FailureStage } from "./types.js";

/**
 * Races a unit against its timeout. The unit itself is not interrupted; its late result is dropped.
 */
export const withTimeout = async <T>(componentId: string, work: () => T | Promise<T>, timeoutMs?: number): Promise<T> => {
  const pending = Promise.resolve().then(work);
  if (timeoutMs === undefined || timeoutMs <= 0 || !Number.isFinite(timeoutMs)) {
    return pending;
  }

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new UnitTimeoutError(componentId, timeoutMs)), timeoutMs);
  });
  pending.catch(() => undefined);

  try {
    return await Promise.race([pending, expired]);
  } finally {
    clearTimeout(timer);
  }
};

/** Attributes any failure raised inside a unit to that unit and its stage. */
export const toUnitError = (
  error: unknown,
  unit: { kind: "generation" | "hook"; stage: FailureStage; componentId: string }
): EngineError => {
  if (error instanceof EngineError) {
    error.stage = unit.stage;
    if (error.componentId === "engine") error.componentId = unit.componentId;
    return error;
  }

  const message = `${unit.componentId} failed: ${errorMessage(error, "unknown error")}`;
  return unit.kind === "generation"
    ? new GenerationError(message, { stage: unit.stage, componentId: unit.componentId, cause: error })
    : new HookError(message, { stage: unit.stage, componentId: unit.componentId, cause: error });
};
