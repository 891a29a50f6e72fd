import { randomBytes } from "node:crypto";
import { writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { writeArtifact } from "../../engine/generator.js";
import { HookError } from "../../engine/errors.js";
import { defineHook } from "../../engine/hooks.js";
import {
  MIN_NODE_VERSION,
  adminPasswordArtifact,
  adminUsernameArtifact,
  expressOptionsSchema,
  expressRuntimeArtifact,
  instructionsArtifact
} from "./artifacts.js";

export const CREDENTIALS_SUFFIX = ".admin_credentials";

/** The credentials file sits beside the output directory, outside the generated tree. */
export const credentialsPathFor = (outputDir: string): string =>
  join(dirname(outputDir), `${basename(outputDir)}${CREDENTIALS_SUFFIX}`);

export const checkNodeVersionHook = defineHook({
  id: "check_node_version",
  description: `Rejects target Node.js versions older than ${MIN_NODE_VERSION}`,
  phase: "pre_build",
  produces: [expressRuntimeArtifact],
  run: (ctx) => {
    const { node_version } = expressOptionsSchema.parse(ctx.options);
    if (node_version < MIN_NODE_VERSION) {
      throw new HookError(`node_version ${node_version} is not supported; use ${MIN_NODE_VERSION} or newer`, {
        componentId: ctx.hookId,
        details: { node_version, minimum: MIN_NODE_VERSION }
      });
    }
    return { artifacts: [writeArtifact(expressRuntimeArtifact, { node_version })] };
  }
});

export const createAdminCredentialsHook = defineHook({
  id: "create_admin_credentials",
  description: `Generates an admin login and stores it in <output>${CREDENTIALS_SUFFIX}`,
  phase: "post_build",
  produces: [adminUsernameArtifact, adminPasswordArtifact],
  critical: true,
  run: async (ctx) => {
    const { admin_username } = expressOptionsSchema.parse(ctx.options);
    const password = randomBytes(18).toString("base64url");
    const credentialsPath = credentialsPathFor(ctx.outputDir);
    await writeFile(credentialsPath, `username=${admin_username}\npassword=${password}\n`, {
      encoding: "utf8",
      mode: 0o600
    });
    return {
      artifacts: [
        writeArtifact(adminUsernameArtifact, admin_username, { display: true }),
        writeArtifact(adminPasswordArtifact, password, { display: true })
      ],
      message: `admin credentials saved to ${credentialsPath}`
    };
  }
});

export const setupInstructionsHook = defineHook({
  id: "setup_instructions",
  description: "Summarises how to start the generated service",
  phase: "post_build",
  requires: [adminUsernameArtifact],
  produces: [instructionsArtifact],
  run: (ctx) => {
    const { port } = expressOptionsSchema.parse(ctx.options);
    const username = ctx.artifacts.get(adminUsernameArtifact);
    const instructions = [
      `cd ${ctx.outputDir}`,
      "npm install",
      "npm start",
      `open http://localhost:${port} and sign in as ${username}`
    ].join("\n");
    return {
      artifacts: [writeArtifact(instructionsArtifact, instructions, { display: true })],
      message: `${ctx.writtenFiles.length} files ready; run npm install && npm start`
    };
  }
});
