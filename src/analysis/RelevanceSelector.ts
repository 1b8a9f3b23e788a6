import type { DetectedFramework } from "../frameworks/FrameworkDetector.js";
import type { Provider } from "../providers/ProviderTypes.js";
import { attachPhase } from "../runtime/AnalysisErrors.js";
import type { RunLogger } from "../runtime/RunLogger.js";
import { parseFilePathArray } from "./ModelResponseParser.js";
import { buildSelectionPrompt } from "./Prompts.js";

export interface RelevanceSelectorOptions {
  provider: Provider;
  logger?: RunLogger;
  temperature?: number;
}

export interface SelectionInput {
  listing: string;
  request: string;
  frameworks: DetectedFramework[];
}

export interface SelectionResult {
  paths: string[];
  raw: string;
}

export class RelevanceSelector {
  constructor(private options: RelevanceSelectorOptions) {}

  async select(input: SelectionInput): Promise<SelectionResult> {
    const prompt = buildSelectionPrompt(input);
    try {
      await this.options.logger?.writePhaseArtifact("selecting", "prompt", prompt);
      const response = await this.options.provider.generate({
        prompt,
        temperature: this.options.temperature,
      });
      await this.options.logger?.writePhaseArtifact("selecting", "response", response.text);
      return { paths: parseFilePathArray(response.text), raw: response.text };
    } catch (error) {
      throw attachPhase(error, "selecting");
    }
  }
}
