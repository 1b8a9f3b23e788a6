import type { DetectedFramework } from "../frameworks/FrameworkDetector.js";
import type { FileContent } from "./ContentReader.js";

export const SELECTION_PROMPT = [
  "ROLE: Code Navigator",
  "TASK: Choose the project files that are relevant to the USER REQUEST.",
  "CONSTRAINTS:",
  "- Pick paths only from the FILE LISTING; copy them exactly as listed.",
  "- Prefer source, configuration and documentation files that answer the request.",
  "- Return an empty array when no listed file is relevant.",
  "OUTPUT FORMAT:",
  "- Respond with ONLY a JSON array of file path strings.",
  "- No prose, no markdown fences, no keys, no comments.",
  'EXAMPLE: ["src/app.ts", "README.md"]',
].join("\n");

export const ANALYSIS_PROMPT = [
  "ROLE: Senior Software Engineer",
  "TASK: Answer the USER REQUEST using the FILE CONTENTS below.",
  "CONSTRAINTS:",
  "- Ground every statement in the provided files and cite their paths.",
  "- Say so when the files do not contain enough information.",
  "- Content ending in /* ...truncated... */ was cut off at a size limit.",
].join("\n");

const describeFrameworks = (frameworks: DetectedFramework[]): string =>
  frameworks.length
    ? frameworks.map((framework) => `- ${framework.name} (${framework.evidence.join(", ")})`).join("\n")
    : "- none detected";

export const buildSelectionPrompt = (input: {
  listing: string;
  request: string;
  frameworks: DetectedFramework[];
}): string =>
  [
    SELECTION_PROMPT,
    "",
    "DETECTED FRAMEWORKS:",
    describeFrameworks(input.frameworks),
    "",
    "FILE LISTING:",
    input.listing || "(no files found)",
    "",
    "USER REQUEST:",
    input.request,
  ].join("\n");

export const buildAnalysisPrompt = (input: {
  files: FileContent[];
  request: string;
  frameworks: DetectedFramework[];
}): string => {
  const sections = input.files.length
    ? input.files.map((file) => [`=== FILE: ${file.path} ===`, file.content].join("\n")).join("\n\n")
    : "(no readable files were selected)";
  return [
    ANALYSIS_PROMPT,
    "",
    "DETECTED FRAMEWORKS:",
    describeFrameworks(input.frameworks),
    "",
    "FILE CONTENTS:",
    sections,
    "",
    "USER REQUEST:",
    input.request,
  ].join("\n");
};
