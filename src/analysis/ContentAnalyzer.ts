import type { DetectedFramework } from "../frameworks/FrameworkDetector.js";
import type { GenerateMetrics, Provider } from "../providers/ProviderTypes.js";
import { attachPhase } from "../runtime/AnalysisErrors.js";
import type { RunLogger } from "../runtime/RunLogger.js";
import type { FileContent } from "./ContentReader.js";
import { buildAnalysisPrompt } from "./Prompts.js";

export interface ContentAnalyzerOptions {
  provider: Provider;
  logger?: RunLogger;
  temperature?: number;
}

export interface AnalysisInput {
  files: FileContent[];
  request: string;
  frameworks: DetectedFramework[];
}

export interface AnalysisOutput {
  text: string;
  model: string;
  metrics?: GenerateMetrics;
}

export class ContentAnalyzer {
  constructor(private options: ContentAnalyzerOptions) {}

  async analyze(input: AnalysisInput): Promise<AnalysisOutput> {
    const prompt = buildAnalysisPrompt(input);
    try {
      await this.options.logger?.writePhaseArtifact("analyzing", "prompt", prompt);
      const response = await this.options.provider.generate({
        prompt,
        temperature: this.options.temperature,
      });
      await this.options.logger?.writePhaseArtifact("analyzing", "response", response.text);
      return { text: response.text, model: response.model, metrics: response.metrics };
    } catch (error) {
      throw attachPhase(error, "analyzing");
    }
  }
}
