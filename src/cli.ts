#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { AnalyzeCommand } from "./cli/AnalyzeCommand.js";
import { createProcessIO, type CommandIO } from "./cli/CommandIO.js";
import { DoctorCommand } from "./cli/DoctorCommand.js";
import { isAnalysisError } from "./runtime/AnalysisErrors.js";

const HELP_TEXT =
  'Usage: repoprobe analyze <project_path> --prompt "<text>" [options]\n' +
  "   or: repoprobe doctor [--base-url <url>] [--model <name>]\n" +
  "\n" +
  "Commands:\n" +
  "  analyze  Pick the files relevant to a request and analyze them with a local model.\n" +
  "  doctor   Check the runtime, the inference service and the configured model.\n" +
  "\n" +
  "Analyze options:\n" +
  "  --prompt, -p <text>      Analysis request (required)\n" +
  "  --model <name>           Model name (default: codegemma)\n" +
  "  --base-url <url>         Inference service URL (default: http://127.0.0.1:11434)\n" +
  "  --timeout-ms <n>         Per-request timeout (default: 120000)\n" +
  "  --temperature <n>        Sampling temperature\n" +
  "  --config <file>          Config file (JSON or YAML)\n" +
  "  --exclude <a,b>          Extra directory names to skip while scanning\n" +
  "  --no-follow-symlinks     Do not follow symbolic links\n" +
  "  --max-file-bytes <n>     Bytes read per file (default: 64000)\n" +
  "  --max-total-bytes <n>    Bytes read across all files (default: 256000)\n" +
  "  --keep-unknown-paths     Keep suggested paths that the scan did not list\n" +
  "  --log-dir <dir>          Run log directory\n" +
  "  --no-log                 Do not write a run log\n" +
  "  --quiet, -q              Only print the analysis\n" +
  "\n" +
  "Options:\n" +
  "  --help, -h     Show help\n" +
  "  --version, -v  Show version\n";

const resolveReal = (value: string): string => {
  try {
    return fs.realpathSync(value);
  } catch {
    return path.resolve(value);
  }
};

const readVersion = (): string => {
  const here = path.dirname(fileURLToPath(import.meta.url));
  // src/ and dist/ both sit one level below the package root.
  const candidates = [path.resolve(here, "..", "package.json"), path.resolve(here, "package.json")];
  for (const candidate of candidates) {
    if (!fs.existsSync(candidate)) continue;
    const parsed: unknown = JSON.parse(fs.readFileSync(candidate, "utf8"));
    if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
  }
  return "dev";
};

const reportError = (error: unknown, io: CommandIO): number => {
  if (isAnalysisError(error)) {
    const lines = [error.describe(), ...error.remediation.map((hint) => `hint: ${hint}`)];
    io.stderr(`${lines.join("\n")}\n`);
    return error.exitCode;
  }
  io.stderr(`${error instanceof Error ? error.message : String(error)}\n`);
  return 1;
};

/** Runs one command and resolves to the process exit code. */
export const runCli = async (
  argv: string[] = process.argv.slice(2),
  io: CommandIO = createProcessIO(),
): Promise<number> => {
  const [command, ...rest] = argv;
  if (command === undefined || command === "--help" || command === "-h" || command === "help") {
    io.stdout(HELP_TEXT);
    return 0;
  }
  if (command === "--version" || command === "-v" || command === "version") {
    io.stdout(`${readVersion()}\n`);
    return 0;
  }
  if (rest.includes("--help") || rest.includes("-h")) {
    io.stdout(HELP_TEXT);
    return 0;
  }

  try {
    if (command === "analyze") {
      await AnalyzeCommand.run(rest, io);
      return 0;
    }
    if (command === "doctor") {
      return await DoctorCommand.run(rest, io);
    }
    throw new Error(`Unknown command: ${command}\n\n${HELP_TEXT}`);
  } catch (error) {
    return reportError(error, io);
  }
};

const isMain = (() => {
  const scriptPath = process.argv[1];
  if (!scriptPath) return false;
  const current = fileURLToPath(import.meta.url);
  return resolveReal(scriptPath) === resolveReal(current);
})();

if (isMain) {
  runCli().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      // eslint-disable-next-line no-console
      console.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    },
  );
}
