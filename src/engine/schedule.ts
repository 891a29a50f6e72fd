import { CancelledError, type EngineError } from "./errors.js";
import type { Generator, GeneratorRun } from "./generator.js";
import { toUnitError } from "./units.js";

type Status = "waiting" | "running" | "done" | "failed";

export type ScheduleArgs = {
  order: readonly Generator[];
  dependencies: ReadonlyMap<string, readonly string[]>;
  concurrency: number;
  signal?: AbortSignal;
  execute: (generator: Generator) => Promise<GeneratorRun>;
  /** Called as soon as a generator finishes, so dependents can read its artifacts. */
  publish: (generator: Generator, run: GeneratorRun) => void;
  /** Called strictly in resolved order for the successful prefix of the run. */
  commit: (generator: Generator, run: GeneratorRun) => Promise<void>;
  onStart?: (generator: Generator) => void;
};

/**
 * Runs generators in resolved order, optionally overlapping independent ones. Commits always follow
 * resolved order and stop at the first failing position, so the outcome matches a sequential run.
 */
export const runScheduled = async (args: ScheduleArgs): Promise<EngineError | null> => {
  const { order } = args;
  const limit = Math.max(1, Math.floor(args.concurrency));
  const positionOf = new Map(order.map((generator, index) => [generator.id, index]));
  const status: Status[] = order.map(() => "waiting");
  const results: Array<GeneratorRun | undefined> = order.map(() => undefined);
  const inFlight = new Set<Promise<void>>();

  const outcome: { failureIndex: number; failure: EngineError | null } = { failureIndex: order.length, failure: null };
  let cancelled = false;
  let nextCommit = 0;

  const markFailed = (index: number, error: unknown): void => {
    status[index] = "failed";
    if (index < outcome.failureIndex) {
      outcome.failureIndex = index;
      outcome.failure = toUnitError(error, { kind: "generation", stage: "GENERATE", componentId: order[index].id });
    }
  };

  const depsDone = (generator: Generator): boolean =>
    (args.dependencies.get(generator.id) ?? []).every((dep) => status[positionOf.get(dep) ?? -1] === "done");

  const launch = (index: number): void => {
    const generator = order[index];
    status[index] = "running";
    args.onStart?.(generator);
    const task: Promise<void> = args
      .execute(generator)
      .then(
        (run) => {
          args.publish(generator, run);
          results[index] = run;
          status[index] = "done";
        },
        (error: unknown) => markFailed(index, error)
      )
      .catch((error: unknown) => markFailed(index, error))
      .finally(() => {
        inFlight.delete(task);
      });
    inFlight.add(task);
  };

  for (;;) {
    while (nextCommit < outcome.failureIndex && status[nextCommit] === "done") {
      const run = results[nextCommit];
      try {
        if (run) await args.commit(order[nextCommit], run);
      } catch (error) {
        markFailed(nextCommit, error);
        break;
      }
      nextCommit += 1;
    }

    if (!cancelled && args.signal?.aborted) {
      cancelled = true;
    }

    if (!cancelled) {
      for (let index = 0; index < outcome.failureIndex && inFlight.size < limit; index += 1) {
        if (status[index] === "waiting" && depsDone(order[index])) {
          launch(index);
        }
      }
    }

    if (inFlight.size === 0) break;
    await Promise.race(inFlight);
  }

  if (outcome.failure) return outcome.failure;
  if (cancelled && nextCommit < order.length) {
    return new CancelledError("build cancelled during generation", {
      stage: "GENERATE",
      componentId: order[nextCommit]?.id ?? "engine"
    });
  }
  return null;
};
