import type { IRNodeRef, IRSnapshot } from "../ir/schema.js";
import {
  ArtifactRegistry,
  artifactKeyOf,
  scopedReader,
  type ArtifactDefinition,
  type ArtifactReader,
  type ArtifactRef
} from "./artifacts.js";
import { ConfigurationError, GenerationError } from "./errors.js";
import { matchesAny, normalizeRelativePath } from "./paths.js";
import { toUnitError, withTimeout } from "./units.js";
import type {
  ArtifactWrite,
  EmittedFile,
  FileContent,
  RunContextBase,
  StackOptions,
  UpstreamArtifacts
} from "./types.js";

export type GeneratorContext = RunContextBase & {
  generatorId: string;
  /** Only the artifacts listed in `requires` are readable. */
  artifacts: ArtifactReader;
  fail: (node: IRNodeRef, message: string) => never;
};

export type GeneratorOutput = {
  files?: EmittedFile[];
  artifacts?: ArtifactWrite[];
  warnings?: string[];
};

export type GeneratorRun = {
  files: EmittedFile[];
  artifacts: ArtifactWrite[];
  warnings: string[];
};

/**
 * A unit producing a bounded slice of the output tree. `run` must depend only on the IR, the
 * options and the artifacts named in `requires`.
 */
export interface Generator {
  readonly id: string;
  readonly description?: string;
  readonly requires: readonly ArtifactRef[];
  readonly produces: readonly ArtifactRef[];
  /** Glob patterns (relative, posix) covering every file the generator may emit. */
  readonly outputs?: readonly string[];
  /** Artifact keys this generator may overwrite after their first writer. */
  readonly overrides?: readonly string[];
  readonly timeoutMs?: number;
  run(ctx: GeneratorContext): GeneratorOutput | Promise<GeneratorOutput>;
}

export type GeneratorDefinition = Omit<Generator, "requires" | "produces"> &
  Partial<Pick<Generator, "requires" | "produces">>;

export const defineGenerator = (definition: GeneratorDefinition): Generator =>
  Object.freeze({
    ...definition,
    requires: Object.freeze([...(definition.requires ?? [])]),
    produces: Object.freeze([...(definition.produces ?? [])])
  });

export const emitFile = (path: string, content: FileContent): EmittedFile => ({ path, content });

export function writeArtifact<T>(definition: ArtifactDefinition<T>, value: T, opts?: { display?: boolean }): ArtifactWrite;
export function writeArtifact(key: string, value: unknown, opts?: { display?: boolean }): ArtifactWrite;
export function writeArtifact(ref: ArtifactRef, value: unknown, opts: { display?: boolean } = {}): ArtifactWrite {
  const write: ArtifactWrite = { key: artifactKeyOf(ref), value };
  if (opts.display) write.display = true;
  return write;
}

export const requiredKeys = (unit: { requires?: readonly ArtifactRef[] }): string[] =>
  (unit.requires ?? []).map(artifactKeyOf);

export const producedKeys = (unit: { produces?: readonly ArtifactRef[] }): string[] =>
  (unit.produces ?? []).map(artifactKeyOf);

export const createGeneratorContext = (
  generator: Generator,
  base: RunContextBase,
  registry: ArtifactReader
): GeneratorContext => ({
  ...base,
  generatorId: generator.id,
  artifacts: scopedReader(registry, requiredKeys(generator), generator.id),
  fail: (node, message) => {
    throw new GenerationError(`${generator.id} failed on ${node.kind} ${node.name}: ${message}`, {
      componentId: generator.id,
      node
    });
  }
});

const checkOutput = (generator: Generator, output: GeneratorOutput): GeneratorRun => {
  const files: EmittedFile[] = [];
  const seen = new Set<string>();
  for (const file of output.files ?? []) {
    const path = normalizeRelativePath(file.path);
    if (!path) {
      throw new GenerationError(`${generator.id} emitted an invalid output path: ${file.path}`, {
        componentId: generator.id,
        details: { path: file.path }
      });
    }
    if (generator.outputs && !matchesAny(path, generator.outputs)) {
      throw new GenerationError(`${generator.id} emitted ${path} outside its declared outputs`, {
        componentId: generator.id,
        details: { path, outputs: [...generator.outputs] }
      });
    }
    if (seen.has(path)) {
      throw new ConfigurationError(`duplicate output path ${path} emitted by ${generator.id}`, {
        stage: "GENERATE",
        componentId: generator.id,
        details: { path }
      });
    }
    seen.add(path);
    files.push({ path, content: file.content });
  }

  const declared = new Set(producedKeys(generator));
  const artifacts = output.artifacts ?? [];
  for (const artifact of artifacts) {
    if (!declared.has(artifact.key)) {
      throw new GenerationError(`${generator.id} wrote undeclared artifact ${artifact.key}`, {
        componentId: generator.id,
        details: { key: artifact.key }
      });
    }
  }
  const written = new Set(artifacts.map((artifact) => artifact.key));
  const missing = Array.from(declared).filter((key) => !written.has(key));
  if (missing.length > 0) {
    throw new GenerationError(`${generator.id} did not produce declared artifact(s): ${missing.join(", ")}`, {
      componentId: generator.id,
      details: { missing }
    });
  }

  return { files, artifacts: [...artifacts], warnings: [...(output.warnings ?? [])] };
};

/** Runs one generator and validates its output against its declaration. Nothing is written. */
export const executeGenerator = async (
  generator: Generator,
  base: RunContextBase,
  registry: ArtifactReader,
  timeoutMs?: number
): Promise<GeneratorRun> => {
  try {
    const ctx = createGeneratorContext(generator, base, registry);
    const output = await withTimeout(generator.id, () => generator.run(ctx), generator.timeoutMs ?? timeoutMs);
    return checkOutput(generator, output);
  } catch (error) {
    throw toUnitError(error, { kind: "generation", stage: "GENERATE", componentId: generator.id });
  }
};

/**
 * Runs a generator against a synthetic context holding only the given artifacts, for unit tests
 * and tooling.
 */
export const runGeneratorInIsolation = async (
  generator: Generator,
  args: {
    ir: IRSnapshot;
    artifacts?: Record<string, unknown>;
    options?: StackOptions;
    stackId?: string;
    outputDir?: string;
    upstream?: UpstreamArtifacts;
  }
): Promise<GeneratorRun> => {
  const registry = new ArtifactRegistry();
  Object.entries(args.artifacts ?? {}).forEach(([key, value]) => {
    registry.put(key, value, { writer: "isolation" });
  });
  return executeGenerator(
    generator,
    {
      stackId: args.stackId ?? "isolation",
      outputDir: args.outputDir ?? ".",
      ir: args.ir,
      options: args.options ?? {},
      upstream: args.upstream ?? {}
    },
    registry
  );
};
