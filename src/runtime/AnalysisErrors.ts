export type AnalysisErrorCode =
  | "invalid_project_path"
  | "service_unavailable"
  | "malformed_model_response";

export type PipelinePhase = "scanning" | "selecting" | "reading" | "analyzing" | "done" | "failed";

export type FailurePhase = Exclude<PipelinePhase, "done" | "failed">;

export type AnalysisErrorDetails = Record<string, unknown>;

type AnalysisErrorInput = {
  code: AnalysisErrorCode;
  message: string;
  remediation?: string[];
  details?: AnalysisErrorDetails;
  phase?: FailurePhase;
  name?: string;
};

const PHASE_LABELS: Record<FailurePhase, string> = {
  scanning: "Scan",
  selecting: "Selection",
  reading: "Read",
  analyzing: "Analysis",
};

export const EXIT_CODES: Record<AnalysisErrorCode, number> = {
  invalid_project_path: 2,
  service_unavailable: 3,
  malformed_model_response: 4,
};

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;
  readonly remediation: string[];
  readonly details?: AnalysisErrorDetails;
  readonly phase?: FailurePhase;

  constructor({ code, message, remediation, details, phase, name }: AnalysisErrorInput) {
    super(message);
    this.name = name ?? "AnalysisError";
    this.code = code;
    this.remediation = remediation ?? [];
    this.details = details;
    this.phase = phase;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /** Single-line summary naming the phase that failed. */
  describe(): string {
    const label = this.phase ? PHASE_LABELS[this.phase] : "Run";
    return `${label} failed: ${this.message}`;
  }

  withPhase(phase: FailurePhase): AnalysisError {
    if (this.phase) return this;
    return new AnalysisError({
      code: this.code,
      message: this.message,
      remediation: this.remediation,
      details: this.details,
      phase,
      name: this.name,
    });
  }
}

export const isAnalysisError = (error: unknown): error is AnalysisError => error instanceof AnalysisError;

/** Rethrow helper for phase runners: tags analysis errors with the phase, leaves others untouched. */
export const attachPhase = (error: unknown, phase: FailurePhase): unknown =>
  isAnalysisError(error) ? error.withPhase(phase) : error;

const singleLine = (value: string, maxLength = 200): string => {
  const flattened = value.replace(/\s+/g, " ").trim();
  return flattened.length > maxLength ? `${flattened.slice(0, maxLength)}...` : flattened;
};

export const createInvalidProjectPathError = (
  projectPath: string,
  reason: "missing" | "not_directory" | "unreadable",
  errorCode?: string,
): AnalysisError => {
  const messages: Record<typeof reason, string> = {
    missing: "does not exist",
    not_directory: "is not a directory",
    unreadable: "cannot be read",
  };
  return new AnalysisError({
    code: "invalid_project_path",
    message: `Invalid project path: ${projectPath} ${messages[reason]}.`,
    remediation: ["Pass an existing project directory, for example `.`."],
    details: { projectPath, reason, ...(errorCode ? { errorCode } : {}) },
    phase: "scanning",
    name: "InvalidProjectPathError",
  });
};

export const createServiceUnavailableError = (input: {
  endpoint: string;
  reason: string;
  status?: number;
  model?: string;
  missingModel?: string;
}): AnalysisError => {
  const remediation = input.missingModel
    ? [`Pull the model first: ollama pull ${input.missingModel}`]
    : ["Check that the inference service is running (ollama serve) and the base URL is correct."];
  const statusPart = input.status !== undefined ? ` (HTTP ${input.status})` : "";
  return new AnalysisError({
    code: "service_unavailable",
    message: `Inference service unavailable at ${input.endpoint}${statusPart}: ${singleLine(input.reason)}`,
    remediation,
    details: { ...input },
    name: "ServiceUnavailableError",
  });
};

export const createMalformedResponseError = (input: {
  expected: string;
  received: string;
}): AnalysisError =>
  new AnalysisError({
    code: "malformed_model_response",
    message: `Malformed model response: expected ${input.expected}, received "${singleLine(input.received, 120)}".`,
    remediation: ["Retry with a model that follows formatting instructions more reliably (--model)."],
    details: { ...input },
    name: "MalformedModelResponseError",
  });
