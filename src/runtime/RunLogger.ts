import { promises as fs } from "node:fs";
import path from "node:path";

export interface RunLogEvent {
  type: string;
  timestamp: string;
  data: Record<string, unknown>;
}

export class RunLogger {
  readonly logPath: string;
  readonly logDir: string;
  readonly runId: string;

  constructor(logDir: string, runId: string) {
    this.logDir = path.resolve(logDir);
    this.runId = runId;
    this.logPath = path.join(this.logDir, `${runId}.jsonl`);
  }

  async log(type: string, data: Record<string, unknown>): Promise<void> {
    await fs.mkdir(path.dirname(this.logPath), { recursive: true });
    const event: RunLogEvent = {
      type,
      timestamp: new Date().toISOString(),
      data,
    };
    await fs.appendFile(this.logPath, `${JSON.stringify(event)}\n`, "utf8");
  }

  /** Stores a prompt or raw response next to the run log and returns its path. */
  async writePhaseArtifact(phase: string, kind: string, payload: unknown): Promise<string> {
    const phaseDir = path.join(this.logDir, "phase");
    await fs.mkdir(phaseDir, { recursive: true });
    const safePhase = phase.replace(/[^a-z0-9_-]/gi, "_");
    const safeKind = kind.replace(/[^a-z0-9_-]/gi, "_");
    const ext = typeof payload === "string" ? "txt" : "json";
    const filename = `${this.runId}-${safePhase}-${safeKind}.${ext}`;
    const filePath = path.join(phaseDir, filename);
    const content = typeof payload === "string" ? payload : JSON.stringify(payload, null, 2);
    await fs.writeFile(filePath, content, "utf8");
    return filePath;
  }
}
