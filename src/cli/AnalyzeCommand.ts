import { randomUUID } from "node:crypto";
import { AnalysisPipeline, type AnalysisPipelineResult, type PipelineEvent } from "../analysis/AnalysisPipeline.js";
import { ContentAnalyzer } from "../analysis/ContentAnalyzer.js";
import { ContentReader } from "../analysis/ContentReader.js";
import { RelevanceSelector } from "../analysis/RelevanceSelector.js";
import type { RepoprobeConfig } from "../config/Config.js";
import { loadConfig, type ConfigSource } from "../config/ConfigLoader.js";
import { FrameworkDetector, formatFrameworks } from "../frameworks/FrameworkDetector.js";
import { OllamaGenerateProvider } from "../providers/OllamaGenerateProvider.js";
import { RunLogger } from "../runtime/RunLogger.js";
import { getDefaultLogDir } from "../runtime/StoragePaths.js";
import { DirectoryScanner } from "../scanner/DirectoryScanner.js";
import { createProcessIO, type CommandIO } from "./CommandIO.js";

export const ANALYZE_USAGE = 'Usage: repoprobe analyze <project_path> --prompt "<text>" [options]';

export interface ParsedArgs {
  projectPath?: string;
  prompt?: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  temperature?: number;
  configPath?: string;
  exclude?: string[];
  followSymlinks?: boolean;
  maxFileBytes?: number;
  maxTotalBytes?: number;
  keepUnknownPaths?: boolean;
  logDir?: string;
  log?: boolean;
  quiet?: boolean;
}

const parseNumberArg = (flag: string, value?: string): number => {
  const parsed = value === undefined ? Number.NaN : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Option ${flag} expects a number.`);
  }
  return parsed;
};

const parseListArg = (value?: string): string[] =>
  (value ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);

const VALUE_FLAGS = new Set([
  "--prompt",
  "-p",
  "--model",
  "--base-url",
  "--timeout-ms",
  "--temperature",
  "--config",
  "--exclude",
  "--max-file-bytes",
  "--max-total-bytes",
  "--log-dir",
]);

export const parseArgs = (argv: string[]): ParsedArgs => {
  const parsed: ParsedArgs = {};
  const positionals: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const raw = argv[i];
    if (raw === undefined) continue;
    const eq = raw.startsWith("--") ? raw.indexOf("=") : -1;
    const arg = eq > 0 ? raw.slice(0, eq) : raw;
    let inline: string | undefined = eq > 0 ? raw.slice(eq + 1) : undefined;
    if (VALUE_FLAGS.has(arg) && inline === undefined) {
      inline = argv[i + 1];
      if (inline === undefined) {
        throw new Error(`Option ${arg} expects a value.`);
      }
      i += 1;
    }
    switch (arg) {
      case "--prompt":
      case "-p":
        parsed.prompt = inline;
        break;
      case "--model":
        parsed.model = inline;
        break;
      case "--base-url":
        parsed.baseUrl = inline;
        break;
      case "--timeout-ms":
        parsed.timeoutMs = parseNumberArg(arg, inline);
        break;
      case "--temperature":
        parsed.temperature = parseNumberArg(arg, inline);
        break;
      case "--config":
        parsed.configPath = inline;
        break;
      case "--exclude":
        parsed.exclude = [...(parsed.exclude ?? []), ...parseListArg(inline)];
        break;
      case "--max-file-bytes":
        parsed.maxFileBytes = parseNumberArg(arg, inline);
        break;
      case "--max-total-bytes":
        parsed.maxTotalBytes = parseNumberArg(arg, inline);
        break;
      case "--log-dir":
        parsed.logDir = inline;
        break;
      case "--no-follow-symlinks":
        parsed.followSymlinks = false;
        break;
      case "--keep-unknown-paths":
        parsed.keepUnknownPaths = true;
        break;
      case "--no-log":
        parsed.log = false;
        break;
      case "--quiet":
      case "-q":
        parsed.quiet = true;
        break;
      default:
        if (arg.startsWith("-") && arg !== "-") {
          throw new Error(`Unknown option: ${arg}\n${ANALYZE_USAGE}`);
        }
        positionals.push(raw);
    }
  }
  if (positionals.length > 1) {
    throw new Error(`Unexpected argument: ${positionals[1]}\n${ANALYZE_USAGE}`);
  }
  if (positionals[0] !== undefined) parsed.projectPath = positionals[0];
  return parsed;
};

export const toConfigSource = (parsed: ParsedArgs): ConfigSource => {
  const cli: ConfigSource = {};
  if (parsed.projectPath) cli.projectPath = parsed.projectPath;

  const inference: NonNullable<ConfigSource["inference"]> = {};
  if (parsed.model) inference.model = parsed.model;
  if (parsed.baseUrl) inference.baseUrl = parsed.baseUrl;
  if (parsed.timeoutMs !== undefined) inference.timeoutMs = parsed.timeoutMs;
  if (parsed.temperature !== undefined) inference.temperature = parsed.temperature;
  if (Object.keys(inference).length) cli.inference = inference;

  const scan: NonNullable<ConfigSource["scan"]> = {};
  if (parsed.exclude?.length) scan.extraExcludeDirs = parsed.exclude;
  if (parsed.followSymlinks !== undefined) scan.followSymlinks = parsed.followSymlinks;
  if (Object.keys(scan).length) cli.scan = scan;

  const read: NonNullable<ConfigSource["read"]> = {};
  if (parsed.maxFileBytes !== undefined) read.maxFileBytes = parsed.maxFileBytes;
  if (parsed.maxTotalBytes !== undefined) read.maxTotalBytes = parsed.maxTotalBytes;
  if (Object.keys(read).length) cli.read = read;

  if (parsed.keepUnknownPaths) cli.selection = { dropUnknownPaths: false };

  const logging: NonNullable<ConfigSource["logging"]> = {};
  if (parsed.log === false) logging.enabled = false;
  if (parsed.logDir) logging.directory = parsed.logDir;
  if (Object.keys(logging).length) cli.logging = logging;
  return cli;
};

const describeEvent = (event: PipelineEvent): string | undefined => {
  switch (event.type) {
    case "scan":
      return event.truncated
        ? `Scanned ${event.fileCount} files (stopped at the scan.maxFiles limit).`
        : `Scanned ${event.fileCount} files.`;
    case "frameworks":
      return `Detected frameworks: ${formatFrameworks(event.frameworks)}`;
    case "selection": {
      const { accepted, dropped } = event.selection;
      const lines = [`Relevant files: ${accepted.length ? accepted.join(", ") : "none"}`];
      for (const entry of dropped) {
        lines.push(`Ignored suggested path ${entry.path} (${entry.reason.replace(/_/g, " ")}).`);
      }
      return lines.join("\n");
    }
    case "file_skipped":
      return `Skipped ${event.skip.path} (${event.skip.reason.replace(/_/g, " ")}).`;
    case "log_failed":
      return `Could not write the run log: ${event.message}`;
    default:
      return undefined;
  }
};

export class AnalyzeCommand {
  static async run(argv: string[], io: CommandIO = createProcessIO()): Promise<AnalysisPipelineResult> {
    const parsed = parseArgs(argv);
    if (!parsed.prompt || !parsed.prompt.trim()) {
      throw new Error(`Missing required --prompt.\n${ANALYZE_USAGE}`);
    }
    if (!parsed.projectPath) {
      throw new Error(`Missing required <project_path>.\n${ANALYZE_USAGE}`);
    }
    const cwd = io.cwd ?? process.cwd();
    const env = io.env ?? process.env;
    const config = await loadConfig({
      cwd,
      env,
      cli: toConfigSource(parsed),
      configPath: parsed.configPath,
    });
    return AnalyzeCommand.execute(config, parsed.prompt, io, { quiet: parsed.quiet ?? false });
  }

  static async execute(
    config: RepoprobeConfig,
    request: string,
    io: CommandIO,
    options: { quiet: boolean },
  ): Promise<AnalysisPipelineResult> {
    const env = io.env ?? process.env;
    const runId = randomUUID();
    const logger = config.logging.enabled
      ? new RunLogger(config.logging.directory ?? getDefaultLogDir(config.projectPath, env), runId)
      : undefined;
    const provider =
      io.provider ??
      new OllamaGenerateProvider({
        baseUrl: config.inference.baseUrl,
        model: config.inference.model,
        timeoutMs: config.inference.timeoutMs,
        temperature: config.inference.temperature,
      });

    const pipeline = new AnalysisPipeline({
      scanner: new DirectoryScanner(config.scan),
      detector: new FrameworkDetector({ catalog: io.catalog, env }),
      selector: new RelevanceSelector({ provider, logger }),
      reader: new ContentReader(config.read),
      analyzer: new ContentAnalyzer({ provider, logger }),
      selection: config.selection,
      logger,
      onEvent: (event) => {
        if (options.quiet && event.type !== "log_failed") return;
        const line = describeEvent(event);
        if (line) io.stderr(`${line}\n`);
      },
    });

    const startedAt = Date.now();
    await logger?.log("run_start", {
      run_id: runId,
      project_path: config.projectPath,
      request,
      provider: provider.name,
      model: provider.model,
      base_url: config.inference.baseUrl,
    });
    let result: AnalysisPipelineResult;
    try {
      result = await pipeline.run(config.projectPath, request);
    } catch (error) {
      try {
        await logger?.log("run_summary", {
          status: "failed",
          phases: pipeline.history,
          duration_ms: Date.now() - startedAt,
        });
      } catch (logError) {
        io.stderr(`Could not write the run log: ${logError instanceof Error ? logError.message : String(logError)}\n`);
      }
      throw error;
    }
    await logger?.log("run_summary", {
      status: "done",
      phases: pipeline.history,
      duration_ms: Date.now() - startedAt,
      files_read: result.read.files.length,
      files_skipped: result.read.skipped.length,
    });
    const text = result.analysis.text;
    io.stdout(text.endsWith("\n") ? text : `${text}\n`);
    if (logger && !options.quiet) {
      io.stderr(`Run log: ${logger.logPath}\n`);
    }
    return result;
  }
}
