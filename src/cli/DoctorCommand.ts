import { DEFAULT_BASE_URL, DEFAULT_MODEL } from "../config/Config.js";
import { loadConfig } from "../config/ConfigLoader.js";
import { OllamaGenerateProvider, findInstalledModel } from "../providers/OllamaGenerateProvider.js";
import { EXIT_CODES } from "../runtime/AnalysisErrors.js";
import { createProcessIO, type CommandIO } from "./CommandIO.js";

export const DOCTOR_USAGE = "Usage: repoprobe doctor [--base-url <url>] [--model <name>] [--config <file>]";

export interface DoctorArgs {
  baseUrl?: string;
  model?: string;
  configPath?: string;
}

export const parseDoctorArgs = (argv: string[]): DoctorArgs => {
  const parsed: DoctorArgs = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    if ((arg === "--base-url" || arg === "--model" || arg === "--config") && next === undefined) {
      throw new Error(`Option ${arg} expects a value.`);
    }
    if (arg === "--base-url" && next) {
      parsed.baseUrl = next;
      i += 1;
      continue;
    }
    if (arg === "--model" && next) {
      parsed.model = next;
      i += 1;
      continue;
    }
    if (arg === "--config" && next) {
      parsed.configPath = next;
      i += 1;
      continue;
    }
    throw new Error(`Unknown argument: ${String(arg)}\n${DOCTOR_USAGE}`);
  }
  return parsed;
};

export class DoctorCommand {
  /** Prints runtime and inference-service diagnostics; resolves to the process exit code. */
  static async run(argv: string[], io: CommandIO = createProcessIO()): Promise<number> {
    const parsed = parseDoctorArgs(argv);
    const config = await loadConfig({
      cwd: io.cwd ?? process.cwd(),
      env: io.env ?? process.env,
      configPath: parsed.configPath,
      cli: {
        inference: {
          ...(parsed.baseUrl ? { baseUrl: parsed.baseUrl } : {}),
          ...(parsed.model ? { model: parsed.model } : {}),
        },
      },
    });
    const provider = new OllamaGenerateProvider({
      baseUrl: config.inference.baseUrl,
      model: config.inference.model,
      timeoutMs: config.inference.timeoutMs,
    });
    const health = await provider.healthCheck();

    const lines = [
      "repoprobe doctor",
      `Node: ${process.version}`,
      `Platform: ${process.platform} ${process.arch}`,
      `Base URL: ${config.inference.baseUrl}${config.inference.baseUrl === DEFAULT_BASE_URL ? " (default)" : ""}`,
      `Model: ${config.inference.model}${config.inference.model === DEFAULT_MODEL ? " (default)" : ""}`,
      `Generate Endpoint: ${provider.endpoint}`,
    ];
    if (health.status !== "healthy") {
      lines.push(`Service: unreachable (${health.reason ?? "no response"})`);
      lines.push("hint: start the inference service with `ollama serve` or pass --base-url.");
      io.stdout(`${lines.join("\n")}\n`);
      return EXIT_CODES.service_unavailable;
    }

    lines.push(`Service: reachable (${health.latencyMs ?? 0}ms, ${health.models.length} models)`);
    const installed = findInstalledModel(config.inference.model, health.models);
    if (!installed) {
      lines.push("Model Installed: no");
      lines.push(`hint: ollama pull ${config.inference.model}`);
      io.stdout(`${lines.join("\n")}\n`);
      return EXIT_CODES.service_unavailable;
    }
    lines.push(`Model Installed: yes (${installed})`);
    io.stdout(`${lines.join("\n")}\n`);
    return 0;
  }
}
