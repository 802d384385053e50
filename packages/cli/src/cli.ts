import {
  ExtractError,
  planExtraction,
  resolveExtractConfig,
  runExtraction,
  type ExtractConfig,
  type ExtractConfigOverrides,
} from "@scene-extract/core";

export class CliError extends Error {
  public readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.code = code;
  }
}

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: NodeJS.ProcessEnv;
  cwd: string;
}

export const defaultIo: CliIo = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
  env: process.env,
  cwd: process.cwd(),
};

const COMMANDS = ["extract", "status", "help"] as const;

const PATH_FLAGS = new Map<string, keyof ExtractConfigOverrides>([
  ["--root", "rootDir"],
  ["--source-dir", "sourceDir"],
  ["--text-dir", "textOutDir"],
  ["--select-dir", "selectOutDir"],
  ["--manifest", "manifestPath"],
  ["--timestamp", "timestampPath"],
]);

function parseArgs(argv: string[]): { command: string; args: string[]; json: boolean } {
  let json = false;
  const filtered: string[] = [];
  for (const a of argv) {
    if (a === "--json") {
      json = true;
      continue;
    }
    filtered.push(a);
  }

  // Allow `scene-extract --root dir` without naming the command.
  const first = filtered[0];
  if (first === undefined || (first.startsWith("--") && !isHelpToken(first))) {
    return { command: "extract", args: filtered, json };
  }
  return { command: first, args: filtered.slice(1), json };
}

function isHelpToken(value: string | undefined): boolean {
  return value === "--help" || value === "-h" || value === "help";
}

// Help tokens count only where a flag name is expected: `--root help` names a directory.
function parseOverrides(args: string[]): { overrides: ExtractConfigOverrides; help: boolean } {
  const overrides: ExtractConfigOverrides = {};
  let help = false;
  for (let i = 0; i < args.length; i += 1) {
    const a = args[i];
    if (!a) continue;
    if (isHelpToken(a)) {
      help = true;
      continue;
    }
    const key = PATH_FLAGS.get(a);
    if (!key) throw new CliError("UNKNOWN_FLAG", `Unknown flag: ${a}`);
    const next = args[i + 1];
    if (!next || next.startsWith("--")) throw new CliError("MISSING_FLAG_VALUE", `Missing value for ${a}`);
    overrides[key] = next;
    i += 1;
  }
  return { overrides, help };
}

function printHelp(io: CliIo, json: boolean): void {
  const usage = "scene-extract <command> [--root DIR] [--source-dir DIR] [--text-dir DIR] [--select-dir DIR] [--manifest FILE] [--timestamp FILE] [--json]";
  if (json) {
    io.stdout(JSON.stringify({ ok: true, command: "help", usage, commands: COMMANDS }));
    return;
  }
  io.stdout("Usage:");
  io.stdout(`  ${usage}`);
  io.stdout("");
  io.stdout("Commands:");
  io.stdout("  - extract  write text/select transcripts for sources changed since the last run (default)");
  io.stdout("  - status   list the sources the next extract would process");
  io.stdout("  - help     show this message");
}

function cmdExtract(io: CliIo, config: ExtractConfig, json: boolean): void {
  const report = runExtraction(config, { log: io.stderr });
  if (!json) return;
  io.stdout(
    JSON.stringify({
      ok: true,
      command: "extract",
      files: report.files.map((f) => ({ name: f.name, status: f.status, text_path: f.textPath, select_path: f.selectPath })),
      timestamp_updated: report.timestampUpdated,
    }),
  );
}

function cmdStatus(io: CliIo, config: ExtractConfig, json: boolean): void {
  const plan = planExtraction(config);
  if (json) {
    io.stdout(JSON.stringify({ ok: true, command: "status", manifest_count: plan.manifest.length, modified: plan.modified }));
    return;
  }
  io.stdout(`Manifest: ${config.manifestPath} (${plan.manifest.length} files)`);
  if (plan.modified.length === 0) {
    io.stdout("Up to date.");
    return;
  }
  io.stdout(`Pending (${plan.modified.length}):`);
  for (const name of plan.modified) io.stdout(`  - ${name}`);
}

export function runCli(argv: string[], io: CliIo = defaultIo): number {
  const { command, args, json } = parseArgs(argv);

  try {
    if (isHelpToken(command)) {
      printHelp(io, json);
      return 0;
    }

    const { overrides, help } = parseOverrides(args);
    if (help) {
      printHelp(io, json);
      return 0;
    }

    const config = resolveExtractConfig(overrides, io.env, io.cwd);
    switch (command) {
      case "extract":
        cmdExtract(io, config, json);
        return 0;
      case "status":
        cmdStatus(io, config, json);
        return 0;
      default:
        throw new CliError("UNKNOWN_COMMAND", `Unknown command: ${command}\nUsage: scene-extract [${COMMANDS.join("|")}]`);
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (json) {
      const errorCode = err instanceof CliError || err instanceof ExtractError ? err.code : undefined;
      io.stdout(JSON.stringify({ ok: false, command, ...(errorCode ? { error_code: errorCode } : {}), error: message }));
      return 1;
    }
    io.stderr(message);
    return 1;
  }
}
