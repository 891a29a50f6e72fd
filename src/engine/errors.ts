import type { IRNodeRef } from "../ir/schema.js";
import type { Diagnostic, DiagnosticKind, FailureStage, WrittenFile } from "./types.js";

type EngineErrorInit = {
  stage?: FailureStage;
  componentId?: string;
  node?: IRNodeRef;
  details?: Record<string, unknown>;
  cause?: unknown;
};

export class EngineError extends Error {
  readonly kind: DiagnosticKind;
  stage: FailureStage;
  componentId: string;
  node?: IRNodeRef;
  details?: Record<string, unknown>;

  constructor(kind: DiagnosticKind, message: string, init: EngineErrorInit = {}) {
    super(message, init.cause === undefined ? undefined : { cause: init.cause });
    this.name = new.target.name;
    this.kind = kind;
    this.stage = init.stage ?? "INIT";
    this.componentId = init.componentId ?? "engine";
    this.node = init.node;
    this.details = init.details;
  }

  toDiagnostic(): Diagnostic {
    const diagnostic: Diagnostic = {
      kind: this.kind,
      stage: this.stage,
      componentId: this.componentId,
      message: this.message
    };
    if (this.node) diagnostic.node = { ...this.node };
    if (this.details) diagnostic.details = { ...this.details };
    return diagnostic;
  }
}

/** Invalid backend or run configuration. Detected before any file is written and never retried. */
export class ConfigurationError extends EngineError {
  constructor(message: string, init: EngineErrorInit = {}) {
    super("configuration", message, init);
  }
}

export class GenerationError extends EngineError {
  constructor(message: string, init: EngineErrorInit = {}) {
    super("generation", message, { stage: "GENERATE", ...init });
  }
}

export class HookError extends EngineError {
  constructor(message: string, init: EngineErrorInit = {}) {
    super("hook", message, init);
  }
}

export class OutputIOError extends EngineError {
  readonly path: string;
  /** Files of the failing flush that reached the disk before the error. */
  readonly written: WrittenFile[];

  constructor(message: string, path: string, init: EngineErrorInit = {}, written: WrittenFile[] = []) {
    super("io", message, { ...init, details: { path, ...init.details } });
    this.path = path;
    this.written = written;
  }
}

export class CancelledError extends EngineError {
  constructor(message = "build cancelled", init: EngineErrorInit = {}) {
    super("cancelled", message, init);
  }
}

export class UnitTimeoutError extends EngineError {
  constructor(componentId: string, timeoutMs: number, init: EngineErrorInit = {}) {
    super("timeout", `${componentId} timed out after ${timeoutMs}ms`, {
      componentId,
      ...init,
      details: { timeoutMs, ...init.details }
    });
  }
}

export const errorMessage = (error: unknown, fallback: string): string =>
  error instanceof Error ? error.message : typeof error === "string" ? error : fallback;
