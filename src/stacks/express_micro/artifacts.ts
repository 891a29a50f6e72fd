import { z } from "zod";
import { defineArtifact } from "../../engine/artifacts.js";

const modelSchema = z.object({
  entity: z.string(),
  className: z.string(),
  file: z.string(),
  route: z.string(),
  fields: z.array(z.string()),
  required: z.array(z.string())
});

export type ExpressModel = z.infer<typeof modelSchema>;

export const expressModelsArtifact = defineArtifact("express.models", z.array(modelSchema));

export const expressRuntimeArtifact = defineArtifact(
  "express.runtime",
  z.object({ node_version: z.number().int().positive() })
);

export const adminUsernameArtifact = defineArtifact("admin_username", z.string().min(1));

export const adminPasswordArtifact = defineArtifact("admin_password", z.string().min(12));

export const instructionsArtifact = defineArtifact("instructions", z.string().min(1));

export const expressOptionsSchema = z.object({
  node_version: z.coerce.number().int().positive().default(20),
  port: z.coerce.number().int().positive().max(65535).default(3000),
  admin_username: z.string().min(1).default("admin")
});

export type ExpressOptions = z.infer<typeof expressOptionsSchema>;

/** Oldest Node.js major the generated project runs on. */
export const MIN_NODE_VERSION = 18;
