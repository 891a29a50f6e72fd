export type BuildCommand = {
  command: "build";
  stack?: string;
  irPath?: string;
  outDir?: string;
  options: Record<string, string>;
  concurrency?: number;
  timeoutMs?: number;
  auditPath?: string;
};

export type CliCommand = { command: "list" } | { command: "help" } | BuildCommand | { command: "invalid"; message: string };

const parseOption = (raw: string | undefined): [string, string] | null => {
  if (!raw) return null;
  const idx = raw.indexOf("=");
  if (idx <= 0) return null;
  return [raw.slice(0, idx).trim(), raw.slice(idx + 1).trim()];
};

const parseBuildArgs = (argv: string[]): BuildCommand | { command: "invalid"; message: string } => {
  const parsed: BuildCommand = { command: "build", options: {} };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const value = argv[i + 1];

    if (arg === "--stack") {
      parsed.stack = value;
      i += 1;
      continue;
    }
    if (arg === "--ir") {
      parsed.irPath = value;
      i += 1;
      continue;
    }
    if (arg === "--out") {
      parsed.outDir = value;
      i += 1;
      continue;
    }
    if (arg === "--option") {
      const option = parseOption(value);
      if (!option) return { command: "invalid", message: `--option expects key=value, got ${value ?? "nothing"}` };
      parsed.options[option[0]] = option[1];
      i += 1;
      continue;
    }
    if (arg === "--concurrency") {
      parsed.concurrency = Number(value);
      i += 1;
      continue;
    }
    if (arg === "--timeout") {
      parsed.timeoutMs = Number(value);
      i += 1;
      continue;
    }
    if (arg === "--audit") {
      parsed.auditPath = value;
      i += 1;
      continue;
    }

    if (!arg.startsWith("-") && !parsed.irPath) {
      parsed.irPath = arg;
      continue;
    }
    return { command: "invalid", message: `unknown argument ${arg}` };
  }

  if (!parsed.irPath) return { command: "invalid", message: "build requires --ir <file>" };
  if (!parsed.outDir) return { command: "invalid", message: "build requires --out <dir>" };
  return parsed;
};

export const parseArgs = (argv: string[]): CliCommand => {
  const [command, ...rest] = argv;
  if (command === undefined || command === "help" || command === "--help" || command === "-h") {
    return { command: "help" };
  }
  if (command === "list") return { command: "list" };
  if (command === "build") return parseBuildArgs(rest);
  return { command: "invalid", message: `unknown command ${command}` };
};

export const usageLines = (): string[] => [
  "Usage:",
  "- stackweave list",
  "- stackweave build --ir <file> --out <dir> [--stack <id>[,<id>...]] [--option key=value]... [--concurrency N] [--timeout MS] [--audit <file|dir>]"
];
