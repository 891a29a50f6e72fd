import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../engine/errors.js";

const parseLine = (line: string): { key: string; value: string } | null => {
  const trimmed = line.trim();
  if (trimmed.length === 0 || trimmed.startsWith("#")) return null;

  const withoutExport = trimmed.startsWith("export ") ? trimmed.slice(7).trim() : trimmed;
  const idx = withoutExport.indexOf("=");
  if (idx <= 0) return null;

  const key = withoutExport.slice(0, idx).trim();
  let value = withoutExport.slice(idx + 1).trim();

  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    value = value.slice(1, -1);
  }

  return { key, value };
};

/** Copies `KEY=value` lines from a dotenv file into `env` without overwriting keys already set. */
export const loadEnvFile = (filePath = ".env", env: NodeJS.ProcessEnv = process.env): string[] => {
  const absolute = resolve(process.cwd(), filePath);
  if (!existsSync(absolute)) return [];

  const loaded: string[] = [];
  const content = readFileSync(absolute, "utf8");
  content.split(/\r?\n/).forEach((line) => {
    const parsed = parseLine(line);
    if (!parsed) return;
    if (env[parsed.key] === undefined) {
      env[parsed.key] = parsed.value;
      loaded.push(parsed.key);
    }
  });
  return loaded;
};

const engineEnvSchema = z.object({
  STACKWEAVE_DEFAULT_STACK: z.string().min(1).default("openapi"),
  STACKWEAVE_CONCURRENCY: z.coerce.number().int().positive().default(1),
  STACKWEAVE_UNIT_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  STACKWEAVE_AUDIT_DIR: z.string().min(1).optional()
});

export type EngineConfig = {
  defaultStack: string;
  concurrency: number;
  unitTimeoutMs?: number;
  auditDir?: string;
};

export const loadEngineConfig = (env: NodeJS.ProcessEnv = process.env): EngineConfig => {
  // Blank values count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith("STACKWEAVE_") && value !== undefined && value.trim() !== "")
  );
  const parsed = engineEnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`invalid environment configuration: ${issues.join("; ")}`, {
      stage: "INIT",
      componentId: "config",
      details: { issues }
    });
  }

  const config: EngineConfig = {
    defaultStack: parsed.data.STACKWEAVE_DEFAULT_STACK,
    concurrency: parsed.data.STACKWEAVE_CONCURRENCY
  };
  if (parsed.data.STACKWEAVE_UNIT_TIMEOUT_MS !== undefined) config.unitTimeoutMs = parsed.data.STACKWEAVE_UNIT_TIMEOUT_MS;
  if (parsed.data.STACKWEAVE_AUDIT_DIR !== undefined) config.auditDir = parsed.data.STACKWEAVE_AUDIT_DIR;
  return config;
};
