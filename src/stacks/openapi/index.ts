import { defineBackend } from "../../engine/backend.js";
import { openapiOptionsSchema, openapiSchemasArtifact } from "./artifacts.js";
import { openapiDocumentGenerator } from "./document.js";
import { openapiSchemasGenerator } from "./schemas.js";

export { openapiOptionsSchema, openapiSchemasArtifact } from "./artifacts.js";
export type { OpenapiOptions, OpenapiSchemas } from "./artifacts.js";

export const openapiBackend = defineBackend({
  id: "openapi",
  description: "OpenAPI 3 document describing the app's entities and surfaces",
  outputFormats: ["openapi-yaml", "openapi-json"],
  generators: [openapiDocumentGenerator, openapiSchemasGenerator],
  artifacts: [openapiSchemasArtifact],
  optionsSchema: openapiOptionsSchema
});
