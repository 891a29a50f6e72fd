import type { BuildStage, DeprecationNotice, Diagnostic, FailureStage } from "./types.js";

export type BuildEvent =
  | { type: "stage_start"; stage: BuildStage }
  | { type: "deprecation"; notice: DeprecationNotice }
  | { type: "order_resolved"; order: string[] }
  | { type: "unit_start"; stage: FailureStage; unitId: string }
  | { type: "unit_end"; stage: FailureStage; unitId: string; ok: boolean; note?: string }
  | { type: "files_flushed"; generatorId: string; paths: string[] }
  | { type: "warning"; diagnostic: Diagnostic }
  | { type: "failed"; diagnostic: Diagnostic }
  | { type: "done"; fileCount: number };

export type BuildEventListener = (event: BuildEvent) => void;
