import type { SelectionConfig } from "../config/Config.js";
import type { DetectedFramework, FrameworkDetector } from "../frameworks/FrameworkDetector.js";
import {
  attachPhase,
  type FailurePhase,
  type PipelinePhase,
} from "../runtime/AnalysisErrors.js";
import type { RunLogger } from "../runtime/RunLogger.js";
import { formatListing, type DirectoryScanner, type ScanResult } from "../scanner/DirectoryScanner.js";
import type { AnalysisOutput, ContentAnalyzer } from "./ContentAnalyzer.js";
import type { ContentReader, ReadResult, SkippedFile } from "./ContentReader.js";
import type { RelevanceSelector, SelectionResult } from "./RelevanceSelector.js";
import { reconcileSelection, type ReconciledSelection } from "./SelectionReconciler.js";

export type PipelineEvent =
  | { type: "phase"; phase: PipelinePhase }
  | { type: "scan"; fileCount: number; truncated: boolean; skippedDirectories: string[] }
  | { type: "frameworks"; frameworks: DetectedFramework[] }
  | { type: "selection"; selection: ReconciledSelection }
  | { type: "file_skipped"; skip: SkippedFile }
  | { type: "log_failed"; message: string };

export interface AnalysisPipelineOptions {
  scanner: DirectoryScanner;
  detector: FrameworkDetector;
  selector: RelevanceSelector;
  reader: ContentReader;
  analyzer: ContentAnalyzer;
  selection: SelectionConfig;
  logger?: RunLogger;
  onEvent?: (event: PipelineEvent) => void;
}

export interface AnalysisPipelineResult {
  scan: ScanResult;
  frameworks: DetectedFramework[];
  selection: SelectionResult;
  reconciled: ReconciledSelection;
  read: ReadResult;
  analysis: AnalysisOutput;
}

const NEXT_PHASES: Record<PipelinePhase, PipelinePhase[]> = {
  scanning: ["selecting", "failed"],
  selecting: ["reading", "failed"],
  reading: ["analyzing", "failed"],
  analyzing: ["done", "failed"],
  done: [],
  failed: [],
};

const isFailurePhase = (phase: PipelinePhase | undefined): phase is FailurePhase =>
  phase !== undefined && phase !== "done" && phase !== "failed";

export class AnalysisPipeline {
  private options: AnalysisPipelineOptions;
  private current: PipelinePhase | undefined;
  private readonly visited: PipelinePhase[] = [];

  constructor(options: AnalysisPipelineOptions) {
    this.options = options;
  }

  get phase(): PipelinePhase | undefined {
    return this.current;
  }

  /** Every phase entered so far, in order. */
  get history(): PipelinePhase[] {
    return [...this.visited];
  }

  async run(projectPath: string, request: string): Promise<AnalysisPipelineResult> {
    if (this.current !== undefined) {
      throw new Error("AnalysisPipeline instances run once; create a new pipeline per invocation.");
    }
    try {
      await this.transition("scanning");
      const scan = await this.options.scanner.scan(projectPath);
      await this.log("scan_complete", {
        root: scan.root,
        file_count: scan.files.length,
        truncated: scan.truncated,
        skipped_directories: scan.skippedDirectories,
      });
      this.emit({
        type: "scan",
        fileCount: scan.files.length,
        truncated: scan.truncated,
        skippedDirectories: scan.skippedDirectories,
      });
      const frameworks = await this.options.detector.detect(scan);
      await this.log("frameworks_detected", { frameworks });
      this.emit({ type: "frameworks", frameworks });

      await this.transition("selecting");
      const selection = await this.options.selector.select({
        listing: formatListing(scan.files),
        request,
        frameworks,
      });
      await this.log("selection_parsed", { paths: selection.paths });
      const reconciled = reconcileSelection(selection.paths, scan.files, this.options.selection);
      if (reconciled.dropped.length) {
        await this.log("selection_dropped", { dropped: reconciled.dropped });
      }
      this.emit({ type: "selection", selection: reconciled });

      await this.transition("reading");
      const read = await this.options.reader.readAll(scan.root, reconciled.accepted);
      for (const skip of read.skipped) {
        await this.log("file_skipped", { path: skip.path, reason: skip.reason });
        this.emit({ type: "file_skipped", skip });
      }

      await this.transition("analyzing");
      const analysis = await this.options.analyzer.analyze({ files: read.files, request, frameworks });
      await this.log("analysis_complete", {
        model: analysis.model,
        files: read.files.map((file) => file.path),
        total_bytes: read.totalBytes,
        metrics: analysis.metrics ?? null,
      });

      await this.transition("done");
      return { scan, frameworks, selection, reconciled, read, analysis };
    } catch (error) {
      const failedIn = this.current;
      const tagged = isFailurePhase(failedIn) ? attachPhase(error, failedIn) : error;
      if (this.current !== "failed" && this.current !== "done") {
        this.current = "failed";
        this.visited.push("failed");
        this.emit({ type: "phase", phase: "failed" });
      }
      try {
        await this.log("run_failed", {
          phase: failedIn ?? null,
          error: tagged instanceof Error ? tagged.message : String(tagged),
        });
        await this.log("phase_transition", { from: failedIn ?? null, to: "failed" });
      } catch (logError) {
        // Callers always receive the run error.
        this.emit({ type: "log_failed", message: logError instanceof Error ? logError.message : String(logError) });
      }
      throw tagged;
    }
  }

  private async transition(next: PipelinePhase): Promise<void> {
    const allowed: PipelinePhase[] = this.current ? NEXT_PHASES[this.current] : ["scanning"];
    if (!allowed.includes(next)) {
      throw new Error(`Invalid pipeline transition: ${this.current ?? "start"} -> ${next}`);
    }
    const from = this.current;
    this.current = next;
    this.visited.push(next);
    await this.log("phase_transition", { from: from ?? null, to: next });
    this.emit({ type: "phase", phase: next });
  }

  private async log(type: string, data: Record<string, unknown>): Promise<void> {
    if (!this.options.logger) return;
    await this.options.logger.log(type, data);
  }

  private emit(event: PipelineEvent): void {
    this.options.onEvent?.(event);
  }
}
