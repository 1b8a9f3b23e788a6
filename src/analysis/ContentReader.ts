import { promises as fs } from "node:fs";
import path from "node:path";
import { DEFAULT_READ, type ReadConfig } from "../config/Config.js";

export const TRUNCATION_MARKER = "\n/* ...truncated... */";

export interface FileContent {
  path: string;
  content: string;
  /** Bytes taken from disk, excluding the truncation marker. */
  bytes: number;
  truncated: boolean;
}

export type SkipReason =
  | "outside_root"
  | "missing"
  | "not_file"
  | "unreadable"
  | "binary"
  | "invalid_utf8"
  | "budget_exhausted";

export interface SkippedFile {
  path: string;
  reason: SkipReason;
}

export interface ReadResult {
  files: FileContent[];
  skipped: SkippedFile[];
  totalBytes: number;
}

const errorCode = (error: unknown): string | undefined => {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
};

const resolveInside = (root: string, relativePath: string): string | undefined => {
  const resolved = path.resolve(root, relativePath);
  const relative = path.relative(root, resolved);
  if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) return undefined;
  return resolved;
};

/** Drops a multi-byte sequence cut off by the read window so strict decoding judges only whole characters. */
export const trimPartialCodePoint = (buffer: Buffer): Buffer => {
  let index = buffer.length - 1;
  let continuation = 0;
  while (index >= 0 && continuation < 3 && (buffer[index] & 0xc0) === 0x80) {
    index -= 1;
    continuation += 1;
  }
  if (index < 0) return buffer;
  const lead = buffer[index];
  const expected = lead >= 0xf0 ? 4 : lead >= 0xe0 ? 3 : lead >= 0xc0 ? 2 : 1;
  return expected > continuation + 1 ? buffer.subarray(0, index) : buffer;
};

/** Reads at most `limit` bytes from the start of a file without loading the rest. */
export const readWindow = async (filePath: string, limit: number): Promise<Buffer> => {
  const handle = await fs.open(filePath, "r");
  try {
    const { size } = await handle.stat();
    const length = Math.max(0, Math.floor(Math.min(limit, size)));
    const buffer = Buffer.alloc(length);
    let offset = 0;
    while (offset < length) {
      const { bytesRead } = await handle.read(buffer, offset, length - offset, offset);
      if (bytesRead === 0) break;
      offset += bytesRead;
    }
    return buffer.subarray(0, offset);
  } finally {
    await handle.close();
  }
};

export class ContentReader {
  private readonly options: ReadConfig;
  private readonly decoder = new TextDecoder("utf-8", { fatal: true });

  constructor(options: Partial<ReadConfig> = {}) {
    this.options = {
      maxFileBytes: options.maxFileBytes ?? DEFAULT_READ.maxFileBytes,
      maxTotalBytes: options.maxTotalBytes ?? DEFAULT_READ.maxTotalBytes,
    };
  }

  async readAll(root: string, paths: string[]): Promise<ReadResult> {
    const files: FileContent[] = [];
    const skipped: SkippedFile[] = [];
    let totalBytes = 0;
    for (const relativePath of paths) {
      const remaining = this.options.maxTotalBytes - totalBytes;
      if (remaining <= 0) {
        skipped.push({ path: relativePath, reason: "budget_exhausted" });
        continue;
      }
      const outcome = await this.readOne(root, relativePath, Math.min(this.options.maxFileBytes, remaining));
      if ("reason" in outcome) {
        skipped.push(outcome);
        continue;
      }
      files.push(outcome);
      totalBytes += outcome.bytes;
    }
    return { files, skipped, totalBytes };
  }

  async readOne(root: string, relativePath: string, limit: number): Promise<FileContent | SkippedFile> {
    const absolutePath = resolveInside(root, relativePath);
    if (!absolutePath) return { path: relativePath, reason: "outside_root" };

    let size: number;
    let raw: Buffer;
    try {
      const stats = await fs.stat(absolutePath);
      if (!stats.isFile()) return { path: relativePath, reason: "not_file" };
      size = stats.size;
      raw = await readWindow(absolutePath, limit);
    } catch (error) {
      const code = errorCode(error);
      const reason: SkipReason = code === "ENOENT" || code === "ENOTDIR" ? "missing" : "unreadable";
      return { path: relativePath, reason };
    }

    if (raw.includes(0)) return { path: relativePath, reason: "binary" };
    const truncated = size > raw.length;
    const window = truncated ? trimPartialCodePoint(raw) : raw;
    let text: string;
    try {
      text = this.decoder.decode(window);
    } catch {
      return { path: relativePath, reason: "invalid_utf8" };
    }
    return {
      path: relativePath,
      content: truncated ? `${text}${TRUNCATION_MARKER}` : text,
      bytes: window.length,
      truncated,
    };
  }
}
