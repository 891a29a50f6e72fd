import { BackendRegistry } from "../engine/registry.js";
import { expressMicroBackend } from "./express_micro/index.js";
import { openapiBackend } from "./openapi/index.js";

export { expressMicroBackend } from "./express_micro/index.js";
export { openapiBackend } from "./openapi/index.js";

/** A fresh, unfrozen registry holding the built-in stacks. */
export const createDefaultRegistry = (): BackendRegistry =>
  new BackendRegistry().register(openapiBackend).register(expressMicroBackend);

export const defaultRegistry: BackendRegistry = createDefaultRegistry().freeze();
