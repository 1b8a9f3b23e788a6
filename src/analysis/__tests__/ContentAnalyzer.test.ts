import test from "node:test";
import assert from "node:assert/strict";
import type { GenerateRequest, GenerateResponse, Provider } from "../../providers/ProviderTypes.js";
import { AnalysisError, createServiceUnavailableError } from "../../runtime/AnalysisErrors.js";
import { ContentAnalyzer } from "../ContentAnalyzer.js";

class ScriptedProvider implements Provider {
  name = "scripted";
  model = "test-model";
  prompts: string[] = [];

  constructor(private reply: string | Error) {}

  async generate(request: GenerateRequest): Promise<GenerateResponse> {
    this.prompts.push(request.prompt);
    if (this.reply instanceof Error) throw this.reply;
    return { text: this.reply, model: this.model, metrics: { evalCount: 7 }, raw: {} };
  }
}

test("ContentAnalyzer sends file sections and returns the free-form answer", { concurrency: false }, async () => {
  const provider = new ScriptedProvider("The entry point is src/main.py.");
  const analyzer = new ContentAnalyzer({ provider });
  const output = await analyzer.analyze({
    files: [
      { path: "src/main.py", content: "print('hi')\n", bytes: 12, truncated: false },
      { path: "README.md", content: "# Demo", bytes: 6, truncated: false },
    ],
    request: "Where does it start?",
    frameworks: [],
  });
  assert.deepEqual(output, {
    text: "The entry point is src/main.py.",
    model: "test-model",
    metrics: { evalCount: 7 },
  });
  const prompt = provider.prompts[0] ?? "";
  assert.match(prompt, /=== FILE: src\/main\.py ===\nprint\('hi'\)\n\n\n=== FILE: README\.md ===\n# Demo/);
  assert.match(prompt, /DETECTED FRAMEWORKS:\n- none detected/);
  assert.ok(prompt.endsWith("USER REQUEST:\nWhere does it start?"));
});

test("ContentAnalyzer notes when no file could be read", { concurrency: false }, async () => {
  const provider = new ScriptedProvider("Nothing to analyze.");
  await new ContentAnalyzer({ provider }).analyze({ files: [], request: "Explain", frameworks: [] });
  assert.match(provider.prompts[0] ?? "", /FILE CONTENTS:\n\(no readable files were selected\)/);
});

test("ContentAnalyzer tags failures with the analyzing phase", { concurrency: false }, async () => {
  const failure = createServiceUnavailableError({ endpoint: "http://127.0.0.1:11434/api/generate", reason: "fetch failed" });
  const analyzer = new ContentAnalyzer({ provider: new ScriptedProvider(failure) });
  await assert.rejects(
    () => analyzer.analyze({ files: [], request: "Explain", frameworks: [] }),
    (error: unknown) => {
      assert.ok(error instanceof AnalysisError);
      assert.equal(
        error.describe(),
        "Analysis failed: Inference service unavailable at http://127.0.0.1:11434/api/generate: fetch failed",
      );
      return true;
    },
  );
});
