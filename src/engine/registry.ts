import { allHooks, type Backend } from "./backend.js";
import { ConfigurationError } from "./errors.js";
import { resolveOrder, type ResolvedPlan } from "./resolve.js";
import type { DeprecationInfo } from "./types.js";

export type RegisteredBackend = {
  backend: Backend;
  /** Tie-break index per generator id, fixed when the backend is registered. */
  stableIndex: ReadonlyMap<string, number>;
  /** Resolution computed at registration; null when registered without validation. */
  plan: ResolvedPlan | null;
};

export type BackendSummary = {
  id: string;
  description?: string;
  outputFormats: string[];
  deprecated: boolean;
  deprecation?: DeprecationInfo;
  generators: string[];
  hooks: string[];
};

export type BackendRegistryOptions = {
  /**
   * Resolve every backend when it is registered so cycles, unsatisfied requires and artifact
   * conflicts surface at process start. Defaults to true.
   */
  validate?: boolean;
};

export class BackendRegistry {
  private readonly entries = new Map<string, RegisteredBackend>();
  private readonly validate: boolean;
  private frozen = false;

  constructor(opts: BackendRegistryOptions = {}) {
    this.validate = opts.validate ?? true;
  }

  register(backend: Backend): this {
    if (this.frozen) {
      throw new ConfigurationError(`backend registry is frozen; cannot register ${backend.id}`, {
        componentId: backend.id
      });
    }
    if (this.entries.has(backend.id)) {
      throw new ConfigurationError(`backend ${backend.id} is already registered`, { componentId: backend.id });
    }

    const stableIndex = new Map(backend.generators.map((generator, index) => [generator.id, index]));
    const plan = this.validate ? resolveOrder(backend, stableIndex) : null;
    this.entries.set(backend.id, { backend, stableIndex, plan });
    return this;
  }

  /** Marks the registry read-only; later `register` calls fail. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get(id: string): RegisteredBackend | undefined {
    return this.entries.get(id);
  }

  require(id: string): RegisteredBackend {
    const entry = this.entries.get(id);
    if (!entry) {
      const known = this.ids();
      throw new ConfigurationError(`unknown stack ${id}; registered stacks: ${known.length > 0 ? known.join(", ") : "none"}`, {
        stage: "INIT",
        componentId: id,
        details: { known }
      });
    }
    return entry;
  }

  ids(): string[] {
    return Array.from(this.entries.keys());
  }

  list(): BackendSummary[] {
    return Array.from(this.entries.values()).map(({ backend, plan }) => {
      const summary: BackendSummary = {
        id: backend.id,
        outputFormats: [...(backend.outputFormats ?? [])],
        deprecated: backend.deprecation !== undefined,
        generators: (plan?.order ?? backend.generators).map((generator) => generator.id),
        hooks: allHooks(backend).map((hook) => hook.id)
      };
      if (backend.description) summary.description = backend.description;
      if (backend.deprecation) summary.deprecation = { ...backend.deprecation };
      return summary;
    });
  }
}

export const createBackendRegistry = (backends: Backend[] = [], opts: BackendRegistryOptions = {}): BackendRegistry => {
  const registry = new BackendRegistry(opts);
  backends.forEach((backend) => registry.register(backend));
  return registry;
};
