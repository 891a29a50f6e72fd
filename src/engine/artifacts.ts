import type { z } from "zod";
import { ConfigurationError } from "./errors.js";

/** A closed producer/consumer contract for one artifact key. */
export type ArtifactDefinition<T> = {
  key: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
};

export type ErasedArtifactDefinition = {
  key: string;
  schema: z.ZodTypeAny;
};

export type ArtifactRef = string | ErasedArtifactDefinition;

export const defineArtifact = <T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): ArtifactDefinition<T> => ({
  key,
  schema
});

export const artifactKeyOf = (ref: ArtifactRef): string => (typeof ref === "string" ? ref : ref.key);

export interface ArtifactReader {
  get<T>(definition: ArtifactDefinition<T>): T;
  get(key: string): unknown;
  lookup(ref: ArtifactRef): unknown;
  has(key: string): boolean;
  keys(): string[];
}

type Entry = {
  value: unknown;
  writer: string;
  display: boolean;
  validated: boolean;
};

export type PutOptions = {
  writer: string;
  display?: boolean;
};

/**
 * Per-run key/value store shared by generators and hooks. Keys are single-writer unless
 * marked overridable when the registry is created.
 */
export class ArtifactRegistry implements ArtifactReader {
  private readonly entries = new Map<string, Entry>();
  private readonly schemas = new Map<string, z.ZodTypeAny>();
  private readonly overridable: Set<string>;

  constructor(opts: { overridable?: Iterable<string>; definitions?: Iterable<ErasedArtifactDefinition> } = {}) {
    this.overridable = new Set(opts.overridable ?? []);
    for (const definition of opts.definitions ?? []) {
      this.schemas.set(definition.key, definition.schema);
    }
  }

  put(ref: ArtifactRef, value: unknown, opts: PutOptions): void {
    const key = artifactKeyOf(ref);
    const existing = this.entries.get(key);
    if (existing && !this.overridable.has(key)) {
      throw new ConfigurationError(
        `artifact ${key} already written by ${existing.writer}; ${opts.writer} cannot write it again without an override`,
        { componentId: opts.writer, details: { key, firstWriter: existing.writer } }
      );
    }

    const schema = typeof ref === "string" ? this.schemas.get(key) : ref.schema;
    let stored = value;
    if (schema) {
      const parsed = schema.safeParse(value);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
          .join("; ");
        throw new ConfigurationError(`artifact ${key} written by ${opts.writer} does not match its contract: ${issues}`, {
          componentId: opts.writer,
          details: { key }
        });
      }
      stored = parsed.data;
    }

    this.entries.set(key, {
      value: stored,
      writer: opts.writer,
      display: opts.display ?? existing?.display ?? false,
      validated: schema !== undefined
    });
  }

  get<T>(definition: ArtifactDefinition<T>): T;
  get(key: string): unknown;
  get(ref: ArtifactRef): unknown {
    return this.lookup(ref);
  }

  lookup(ref: ArtifactRef): unknown {
    const key = artifactKeyOf(ref);
    const entry = this.entries.get(key);
    if (!entry) {
      throw new ConfigurationError(`artifact ${key} has not been produced`, { details: { key } });
    }
    if (typeof ref !== "string" && !entry.validated) {
      const parsed = ref.schema.safeParse(entry.value);
      if (!parsed.success) {
        throw new ConfigurationError(`artifact ${key} written by ${entry.writer} does not match the reader's contract`, {
          details: { key }
        });
      }
      return parsed.data;
    }
    return entry.value;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  writerOf(key: string): string | undefined {
    return this.entries.get(key)?.writer;
  }

  displayed(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    this.entries.forEach((entry, key) => {
      if (entry.display) out[key] = entry.value;
    });
    return out;
  }

  snapshot(): Record<string, unknown> {
    return Object.fromEntries(Array.from(this.entries.entries()).map(([key, entry]) => [key, entry.value]));
  }
}

/** Read-only view limited to the keys a unit declared in `requires`. */
export const scopedReader = (registry: ArtifactReader, allowed: Iterable<string>, componentId: string): ArtifactReader => {
  const declared = new Set(allowed);
  const assertDeclared = (key: string): void => {
    if (!declared.has(key)) {
      throw new ConfigurationError(`${componentId} read artifact ${key} without declaring it in requires`, {
        componentId,
        details: { key }
      });
    }
  };

  const lookup = (ref: ArtifactRef): unknown => {
    assertDeclared(artifactKeyOf(ref));
    return registry.lookup(ref);
  };

  function get<T>(definition: ArtifactDefinition<T>): T;
  function get(key: string): unknown;
  function get(ref: ArtifactRef): unknown {
    return lookup(ref);
  }

  return {
    get,
    lookup,
    has: (key) => declared.has(key) && registry.has(key),
    keys: () => registry.keys().filter((key) => declared.has(key))
  };
};
