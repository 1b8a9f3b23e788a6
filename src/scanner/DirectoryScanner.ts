import type { Dirent, Stats } from "node:fs";
import { readdir, realpath, stat } from "node:fs/promises";
import path from "node:path";
import { DEFAULT_SCAN, type ScanConfig } from "../config/Config.js";
import { createInvalidProjectPathError } from "../runtime/AnalysisErrors.js";

export interface ScanResult {
  /** Absolute, symlink-resolved project root. */
  root: string;
  /** Relative `/`-separated file paths in traversal order. */
  files: string[];
  skippedDirectories: string[];
  truncated: boolean;
}

export type ScanOptions = Partial<ScanConfig>;

const compareNames = (left: string, right: string): number => {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
};

const joinRelative = (parent: string, name: string): string => (parent ? `${parent}/${name}` : name);

const errorCode = (error: unknown): string | undefined => {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
};

export const buildExcludeMatcher = (names: string[]): ((name: string) => boolean) => {
  const exact = new Set(names);
  const lower = new Set(names.map((name) => name.toLowerCase()));
  return (name: string) => exact.has(name) || lower.has(name.toLowerCase());
};

interface WalkState {
  files: string[];
  skippedDirectories: string[];
  truncated: boolean;
}

export class DirectoryScanner {
  private readonly isExcluded: (name: string) => boolean;
  private readonly followSymlinks: boolean;
  private readonly maxFiles: number;

  constructor(options: ScanOptions = {}) {
    const excludeDirs = options.excludeDirs ?? DEFAULT_SCAN.excludeDirs;
    const extraExcludeDirs = options.extraExcludeDirs ?? DEFAULT_SCAN.extraExcludeDirs;
    this.isExcluded = buildExcludeMatcher([...excludeDirs, ...extraExcludeDirs]);
    this.followSymlinks = options.followSymlinks ?? DEFAULT_SCAN.followSymlinks;
    this.maxFiles = options.maxFiles ?? DEFAULT_SCAN.maxFiles;
  }

  async scan(projectPath: string): Promise<ScanResult> {
    const resolved = path.resolve(projectPath);
    let stats: Stats;
    let root: string;
    try {
      stats = await stat(resolved);
      root = await realpath(resolved);
    } catch (error) {
      const code = errorCode(error);
      const reason = code === "ENOENT" || code === "ENOTDIR" ? "missing" : "unreadable";
      throw createInvalidProjectPathError(projectPath, reason, code);
    }
    if (!stats.isDirectory()) {
      throw createInvalidProjectPathError(projectPath, "not_directory");
    }

    let rootEntries: Dirent[];
    try {
      rootEntries = await readdir(root, { withFileTypes: true });
    } catch {
      throw createInvalidProjectPathError(projectPath, "unreadable");
    }

    const state: WalkState = { files: [], skippedDirectories: [], truncated: false };
    await this.walkEntries(root, "", rootEntries, new Set([root]), state);
    return { root, ...state };
  }

  private async walkDirectory(
    absolutePath: string,
    relativePath: string,
    ancestors: Set<string>,
    state: WalkState,
  ): Promise<void> {
    let realDir: string;
    let entries: Dirent[];
    try {
      realDir = await realpath(absolutePath);
      // A directory already on the descent chain means a symlink loop.
      if (ancestors.has(realDir)) return;
      entries = await readdir(absolutePath, { withFileTypes: true });
    } catch {
      state.skippedDirectories.push(relativePath);
      return;
    }
    const chain = new Set(ancestors);
    chain.add(realDir);
    await this.walkEntries(absolutePath, relativePath, entries, chain, state);
  }

  private async walkEntries(
    absoluteDir: string,
    relativeDir: string,
    entries: Dirent[],
    ancestors: Set<string>,
    state: WalkState,
  ): Promise<void> {
    const sorted = [...entries].sort((left, right) => compareNames(left.name, right.name));
    for (const entry of sorted) {
      if (state.truncated) return;
      const absolutePath = path.join(absoluteDir, entry.name);
      const relativePath = joinRelative(relativeDir, entry.name);

      let isDirectory = entry.isDirectory();
      let isFile = entry.isFile();
      if (entry.isSymbolicLink()) {
        if (!this.followSymlinks) continue;
        const target = await stat(absolutePath).catch(() => undefined);
        // Broken links have no target to list.
        if (!target) continue;
        isDirectory = target.isDirectory();
        isFile = target.isFile();
      }

      if (isDirectory) {
        if (this.isExcluded(entry.name)) continue;
        await this.walkDirectory(absolutePath, relativePath, ancestors, state);
        continue;
      }
      if (!isFile) continue;
      if (state.files.length >= this.maxFiles) {
        state.truncated = true;
        return;
      }
      state.files.push(relativePath);
    }
  }
}

export const formatListing = (files: string[]): string => files.join("\n");
