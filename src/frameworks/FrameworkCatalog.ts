import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";

export type ManifestKind = "npm" | "composer" | "pypi" | "gems";

export const MANIFEST_KINDS: ManifestKind[] = ["npm", "composer", "pypi", "gems"];

export interface FrameworkDefinition {
  name: string;
  files: string[];
  dirs: string[];
  packages: Record<ManifestKind, string[]>;
}

export type FrameworkCatalog = FrameworkDefinition[];

let cache: FrameworkCatalog | null = null;

export const resolveCatalogPath = (env: NodeJS.ProcessEnv = process.env): string | undefined => {
  const override = env.REPOPROBE_FRAMEWORK_CATALOG?.trim();
  return override || undefined;
};

const bundledCatalogPath = (): string => {
  // Same relative location from src/frameworks and from dist/frameworks.
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "..", "..", "data", "frameworks.yaml");
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readStringList = (value: unknown, label: string): string[] => {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new Error(`Invalid framework catalog: ${label} must be a list.`);
  }
  return value.map((entry: unknown) => {
    if (typeof entry !== "string" || !entry.trim()) {
      throw new Error(`Invalid framework catalog: ${label} must contain non-empty strings.`);
    }
    return entry.trim();
  });
};

export const parseFrameworkCatalog = (raw: string): FrameworkCatalog => {
  const parsed: unknown = YAML.parse(raw);
  const frameworks = isRecord(parsed) ? parsed.frameworks : undefined;
  if (!Array.isArray(frameworks)) {
    throw new Error("Invalid framework catalog: expected a top-level `frameworks` list.");
  }
  return frameworks.map((record: unknown, index: number): FrameworkDefinition => {
    if (!isRecord(record)) {
      throw new Error(`Invalid framework catalog: entry ${index} must be an object.`);
    }
    const rawName = record.name;
    if (typeof rawName !== "string" || !rawName.trim()) {
      throw new Error(`Invalid framework catalog: entry ${index} needs a name.`);
    }
    const name = rawName.trim();
    return {
      name,
      files: readStringList(record.files, `${name}.files`),
      dirs: readStringList(record.dirs, `${name}.dirs`),
      packages: {
        npm: readStringList(record.npm, `${name}.npm`),
        composer: readStringList(record.composer, `${name}.composer`),
        pypi: readStringList(record.pypi, `${name}.pypi`).map((entry) => entry.toLowerCase()),
        gems: readStringList(record.gems, `${name}.gems`),
      },
    };
  });
};

/** Loads the catalog at `catalogPath`, or the bundled one (cached) when no path is given. */
export const loadFrameworkCatalog = (catalogPath?: string): FrameworkCatalog => {
  if (!catalogPath && cache) return cache;
  const resolved = catalogPath ?? bundledCatalogPath();
  const catalog = parseFrameworkCatalog(fs.readFileSync(resolved, "utf8"));
  if (!catalogPath) cache = catalog;
  return catalog;
};
