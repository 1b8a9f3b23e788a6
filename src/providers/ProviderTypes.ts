export interface ProviderConfig {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  temperature?: number;
}

export interface GenerateRequest {
  prompt: string;
  temperature?: number;
}

export interface GenerateMetrics {
  promptEvalCount?: number;
  evalCount?: number;
  totalDurationNs?: number;
}

export interface GenerateResponse {
  text: string;
  model: string;
  metrics?: GenerateMetrics;
  raw: unknown;
}

export type ProviderHealthStatus = "healthy" | "unreachable";

export interface ProviderHealth {
  status: ProviderHealthStatus;
  endpoint: string;
  lastCheckedAt: string;
  latencyMs?: number;
  models: string[];
  reason?: string;
}

export interface Provider {
  name: string;
  model: string;
  generate(request: GenerateRequest): Promise<GenerateResponse>;
}
