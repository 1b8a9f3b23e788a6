import path from "node:path";

export type DropReason = "outside_root" | "not_in_listing";

export interface DroppedPath {
  path: string;
  reason: DropReason;
}

export interface ReconciledSelection {
  accepted: string[];
  dropped: DroppedPath[];
}

export interface ReconcileOptions {
  dropUnknownPaths: boolean;
}

/** Normalizes a model-suggested path to the listing's relative `/` form, or undefined when it escapes the root. */
export const normalizeSelectedPath = (value: string): string | undefined => {
  const slashed = value.trim().replace(/\\/g, "/");
  if (!slashed || slashed.startsWith("/") || /^[A-Za-z]:\//.test(slashed)) return undefined;
  const normalized = path.posix.normalize(slashed);
  if (normalized === ".." || normalized.startsWith("../") || normalized === ".") return undefined;
  return normalized.replace(/\/+$/, "");
};

export const reconcileSelection = (
  paths: string[],
  listing: string[],
  options: ReconcileOptions,
): ReconciledSelection => {
  const known = new Set(listing);
  const accepted: string[] = [];
  const dropped: DroppedPath[] = [];
  const seen = new Set<string>();
  for (const candidate of paths) {
    const normalized = normalizeSelectedPath(candidate);
    if (!normalized) {
      dropped.push({ path: candidate, reason: "outside_root" });
      continue;
    }
    if (seen.has(normalized)) continue;
    if (!known.has(normalized) && options.dropUnknownPaths) {
      dropped.push({ path: candidate, reason: "not_in_listing" });
      continue;
    }
    seen.add(normalized);
    accepted.push(normalized);
  }
  return { accepted, dropped };
};
