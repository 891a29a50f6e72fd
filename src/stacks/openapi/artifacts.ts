import { z } from "zod";
import { defineArtifact } from "../../engine/artifacts.js";

const jsonSchemaObject = z.record(z.string(), z.unknown());

export const openapiSchemasArtifact = defineArtifact("openapi.schemas", z.record(z.string(), jsonSchemaObject));

export type OpenapiSchemas = z.infer<typeof openapiSchemasArtifact.schema>;

export const openapiOptionsSchema = z.object({
  format: z.enum(["yaml", "json"]).default("yaml"),
  server_url: z.string().url().optional()
});

export type OpenapiOptions = z.infer<typeof openapiOptionsSchema>;
