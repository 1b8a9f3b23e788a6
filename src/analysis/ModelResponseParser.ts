import { createMalformedResponseError } from "../runtime/AnalysisErrors.js";

const EXPECTED_ARRAY = "a JSON array of file path strings";

/**
 * The single boundary for the selection call's format contract: the generated text must be a
 * bare JSON array of strings. No fence stripping or repair is attempted.
 */
export const parseFilePathArray = (text: string): string[] => {
  const trimmed = text.trim();
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    throw createMalformedResponseError({ expected: EXPECTED_ARRAY, received: text });
  }
  if (!Array.isArray(parsed)) {
    throw createMalformedResponseError({ expected: EXPECTED_ARRAY, received: text });
  }
  const paths: string[] = [];
  const seen = new Set<string>();
  for (const entry of parsed) {
    if (typeof entry !== "string") {
      throw createMalformedResponseError({ expected: EXPECTED_ARRAY, received: text });
    }
    const value = entry.trim();
    if (!value || seen.has(value)) continue;
    seen.add(value);
    paths.push(value);
  }
  return paths;
};
