import {
  createMalformedResponseError,
  createServiceUnavailableError,
} from "../runtime/AnalysisErrors.js";
import type {
  GenerateMetrics,
  GenerateRequest,
  GenerateResponse,
  Provider,
  ProviderConfig,
  ProviderHealth,
} from "./ProviderTypes.js";

const isObject = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

const normalizeBaseUrl = (baseUrl: string): string => {
  return baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
};

const parseModelNotFound = (errorBody: string): string | undefined => {
  const match = errorBody.match(/model ['"]?([^'"]+)['"]? not found/i);
  return match?.[1];
};

const describeFetchError = (error: unknown, timeoutMs: number): string => {
  if (error instanceof Error) {
    if (error.name === "TimeoutError" || error.name === "AbortError") {
      return `request timed out after ${timeoutMs}ms`;
    }
    const cause: unknown = error.cause;
    if (cause instanceof Error && cause.message) {
      return `${error.message} (${cause.message})`;
    }
    return error.message;
  }
  return String(error);
};

const extractMetrics = (data: Record<string, unknown>): GenerateMetrics | undefined => {
  const metrics: GenerateMetrics = {};
  if (typeof data.prompt_eval_count === "number") metrics.promptEvalCount = data.prompt_eval_count;
  if (typeof data.eval_count === "number") metrics.evalCount = data.eval_count;
  if (typeof data.total_duration === "number") metrics.totalDurationNs = data.total_duration;
  if (Object.keys(metrics).length === 0) return undefined;
  return metrics;
};

/**
 * Resolves the installed tag for a requested model. A bare name such as `codegemma`
 * matches `codegemma:latest`, mirroring how the inference service resolves names.
 */
export const findInstalledModel = (requested: string, available: string[]): string | undefined => {
  const normalized = requested.toLowerCase();
  const exact = available.find((name) => name.toLowerCase() === normalized);
  if (exact) return exact;
  if (normalized.includes(":")) return undefined;
  return available.find((name) => name.toLowerCase() === `${normalized}:latest`);
};

export class OllamaGenerateProvider implements Provider {
  name = "ollama";

  constructor(private config: ProviderConfig) {}

  get model(): string {
    return this.config.model;
  }

  get endpoint(): string {
    return new URL("api/generate", normalizeBaseUrl(this.config.baseUrl)).toString();
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    try {
      return await fetch(url, { ...init, signal: AbortSignal.timeout(this.config.timeoutMs) });
    } catch (error) {
      throw createServiceUnavailableError({
        endpoint: url,
        reason: describeFetchError(error, this.config.timeoutMs),
        model: this.config.model,
      });
    }
  }

  private async readBody(url: string, response: Response): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      throw createServiceUnavailableError({
        endpoint: url,
        reason: describeFetchError(error, this.config.timeoutMs),
        status: response.status,
        model: this.config.model,
      });
    }
  }

  async generate(request: GenerateRequest): Promise<GenerateResponse> {
    const url = this.endpoint;
    const model = this.config.model;
    const body: Record<string, unknown> = {
      model,
      prompt: request.prompt,
      stream: false,
    };
    const temperature = request.temperature ?? this.config.temperature;
    if (temperature !== undefined) {
      body.options = { temperature };
    }

    const response = await this.request(url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });
    const text = await this.readBody(url, response);
    if (!response.ok) {
      const missingModel = response.status === 404 ? parseModelNotFound(text) : undefined;
      throw createServiceUnavailableError({
        endpoint: url,
        reason: text || response.statusText || "empty error body",
        status: response.status,
        model,
        missingModel,
      });
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      throw createMalformedResponseError({ expected: "a JSON response body", received: text });
    }
    if (!isObject(data) || typeof data.response !== "string") {
      throw createMalformedResponseError({
        expected: 'a JSON object with a string "response" field',
        received: text,
      });
    }

    return {
      text: data.response,
      model: typeof data.model === "string" ? data.model : model,
      metrics: extractMetrics(data),
      raw: data,
    };
  }

  async listModels(): Promise<string[]> {
    const url = new URL("api/tags", normalizeBaseUrl(this.config.baseUrl)).toString();
    const response = await this.request(url, { method: "GET" });
    const text = await this.readBody(url, response);
    if (!response.ok) {
      throw createServiceUnavailableError({
        endpoint: url,
        reason: text || response.statusText || "empty error body",
        status: response.status,
      });
    }
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      throw createMalformedResponseError({ expected: "a JSON model list", received: text });
    }
    const models = isObject(data) && Array.isArray(data.models) ? data.models : [];
    return models
      .map((entry: unknown) => (isObject(entry) && typeof entry.name === "string" ? entry.name : undefined))
      .filter((name): name is string => Boolean(name));
  }

  async healthCheck(): Promise<ProviderHealth> {
    const endpoint = new URL("api/tags", normalizeBaseUrl(this.config.baseUrl)).toString();
    const started = Date.now();
    try {
      const models = await this.listModels();
      return {
        status: "healthy",
        endpoint,
        lastCheckedAt: new Date().toISOString(),
        latencyMs: Date.now() - started,
        models,
      };
    } catch (error) {
      return {
        status: "unreachable",
        endpoint,
        lastCheckedAt: new Date().toISOString(),
        models: [],
        reason: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
