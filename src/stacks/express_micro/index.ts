import { defineBackend } from "../../engine/backend.js";
import {
  adminPasswordArtifact,
  adminUsernameArtifact,
  expressModelsArtifact,
  expressOptionsSchema,
  expressRuntimeArtifact,
  instructionsArtifact
} from "./artifacts.js";
import { expressModelsGenerator, expressProjectGenerator, expressRoutesGenerator } from "./generators.js";
import { checkNodeVersionHook, createAdminCredentialsHook, setupInstructionsHook } from "./hooks.js";

export { CREDENTIALS_SUFFIX, credentialsPathFor } from "./hooks.js";
export type { ExpressModel, ExpressOptions } from "./artifacts.js";

export const expressMicroBackend = defineBackend({
  id: "express_micro",
  description: "Express.js microservice with in-memory models",
  outputFormats: ["node-express"],
  generators: [expressProjectGenerator, expressRoutesGenerator, expressModelsGenerator],
  hooks: {
    pre_build: [checkNodeVersionHook],
    post_build: [createAdminCredentialsHook, setupInstructionsHook]
  },
  artifacts: [
    expressModelsArtifact,
    expressRuntimeArtifact,
    adminUsernameArtifact,
    adminPasswordArtifact,
    instructionsArtifact
  ],
  optionsSchema: expressOptionsSchema,
  deprecation: {
    since: "0.9.0",
    removal: "1.0.0",
    migrationHint: "use the openapi stack and generate a server from the document"
  }
});
