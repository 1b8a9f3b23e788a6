import path from "node:path";
import { readWindow, trimPartialCodePoint } from "../analysis/ContentReader.js";
import type { ScanResult } from "../scanner/DirectoryScanner.js";
import {
  MANIFEST_KINDS,
  loadFrameworkCatalog,
  resolveCatalogPath,
  type FrameworkCatalog,
  type FrameworkDefinition,
  type ManifestKind,
} from "./FrameworkCatalog.js";

export interface DetectedFramework {
  name: string;
  evidence: string[];
}

/** Dependency name to the manifest that declared it, per ecosystem. */
export type ManifestDependencies = Record<ManifestKind, Map<string, string>>;

const MANIFEST_FILES: Record<string, ManifestKind> = {
  "package.json": "npm",
  "composer.json": "composer",
  "requirements.txt": "pypi",
  "pyproject.toml": "pypi",
  Pipfile: "pypi",
  Gemfile: "gems",
};

const MAX_MANIFESTS = 50;
const MAX_MANIFEST_BYTES = 256_000;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const objectKeys = (value: unknown): string[] => (isRecord(value) ? Object.keys(value) : []);

const parseJsonManifest = (content: string, sections: string[]): string[] => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return [];
  }
  if (!isRecord(parsed)) return [];
  return sections.flatMap((section) => objectKeys(parsed[section]));
};

const parseRequirements = (content: string): string[] =>
  content
    .split(/\r?\n/)
    .map((line) => line.replace(/#.*$/, "").trim())
    .filter((line) => line && !line.startsWith("-"))
    .map((line) => line.match(/^([A-Za-z0-9_.-]+)/)?.[1]?.toLowerCase())
    .filter((name): name is string => Boolean(name));

const parsePythonProject = (content: string): string[] => {
  const names: string[] = [];
  const quoted = /["']([A-Za-z][A-Za-z0-9_.-]*)\s*(?:\[[^\]]*\])?\s*(?:[<>=!~;][^"']*)?["']/g;
  let match: RegExpExecArray | null;
  while ((match = quoted.exec(content)) !== null) {
    if (match[1]) names.push(match[1].toLowerCase());
  }
  for (const line of content.split(/\r?\n/)) {
    const key = line.match(/^\s*([A-Za-z][A-Za-z0-9_.-]*)\s*=/)?.[1];
    if (key) names.push(key.toLowerCase());
  }
  return names;
};

const parseGemfile = (content: string): string[] =>
  content
    .split(/\r?\n/)
    .map((line) => line.match(/^\s*gem\s+["']([^"']+)["']/)?.[1])
    .filter((name): name is string => Boolean(name));

export const parseManifest = (fileName: string, content: string): string[] => {
  switch (fileName) {
    case "package.json":
      return parseJsonManifest(content, [
        "dependencies",
        "devDependencies",
        "peerDependencies",
        "optionalDependencies",
      ]);
    case "composer.json":
      return parseJsonManifest(content, ["require", "require-dev"]);
    case "requirements.txt":
      return parseRequirements(content);
    case "pyproject.toml":
    case "Pipfile":
      return parsePythonProject(content);
    case "Gemfile":
      return parseGemfile(content);
    default:
      return [];
  }
};

const readManifest = async (absolutePath: string): Promise<string | undefined> => {
  try {
    const window = await readWindow(absolutePath, MAX_MANIFEST_BYTES);
    return trimPartialCodePoint(window).toString("utf8");
  } catch {
    return undefined;
  }
};

export const collectManifestDependencies = async (scan: ScanResult): Promise<ManifestDependencies> => {
  const dependencies: ManifestDependencies = {
    npm: new Map(),
    composer: new Map(),
    pypi: new Map(),
    gems: new Map(),
  };
  const manifests = scan.files
    .filter((file) => Object.prototype.hasOwnProperty.call(MANIFEST_FILES, path.posix.basename(file)))
    .slice(0, MAX_MANIFESTS);
  for (const manifest of manifests) {
    const fileName = path.posix.basename(manifest);
    const kind = MANIFEST_FILES[fileName];
    if (!kind) continue;
    const content = await readManifest(path.join(scan.root, manifest));
    if (content === undefined) continue;
    for (const name of parseManifest(fileName, content)) {
      if (!dependencies[kind].has(name)) dependencies[kind].set(name, manifest);
    }
  }
  return dependencies;
};

const matchFile = (files: string[], marker: string): string | undefined =>
  files.find((file) => file === marker || file.endsWith(`/${marker}`));

const matchDir = (files: string[], dir: string): boolean =>
  files.some((file) => file.startsWith(`${dir}/`) || file.includes(`/${dir}/`));

export const matchFramework = (
  framework: FrameworkDefinition,
  files: string[],
  dependencies: ManifestDependencies,
): DetectedFramework | undefined => {
  const evidence: string[] = [];
  for (const marker of framework.files) {
    const matched = matchFile(files, marker);
    if (matched) evidence.push(matched);
  }
  for (const dir of framework.dirs) {
    if (matchDir(files, dir)) evidence.push(`${dir}/`);
  }
  for (const kind of MANIFEST_KINDS) {
    for (const name of framework.packages[kind]) {
      const manifest = dependencies[kind].get(name);
      if (manifest) evidence.push(`${manifest}: ${name}`);
    }
  }
  return evidence.length ? { name: framework.name, evidence } : undefined;
};

export interface FrameworkDetectorOptions {
  catalog?: FrameworkCatalog;
  /** Read for `REPOPROBE_FRAMEWORK_CATALOG`; defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

export class FrameworkDetector {
  private catalog: FrameworkCatalog | undefined;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: FrameworkDetectorOptions = {}) {
    this.catalog = options.catalog;
    this.env = options.env ?? process.env;
  }

  /** Loaded on first detection, after the scan has validated the project root. */
  private getCatalog(): FrameworkCatalog {
    if (!this.catalog) {
      this.catalog = loadFrameworkCatalog(resolveCatalogPath(this.env));
    }
    return this.catalog;
  }

  async detect(scan: ScanResult): Promise<DetectedFramework[]> {
    const catalog = this.getCatalog();
    const dependencies = await collectManifestDependencies(scan);
    return catalog
      .map((framework) => matchFramework(framework, scan.files, dependencies))
      .filter((entry): entry is DetectedFramework => entry !== undefined);
  }
}

export const formatFrameworks = (frameworks: DetectedFramework[]): string =>
  frameworks.length ? frameworks.map((framework) => framework.name).join(", ") : "none detected";
