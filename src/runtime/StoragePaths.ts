import os from "node:os";
import path from "node:path";
import { createHash } from "node:crypto";

const normalizePathCase = (value: string): string => {
  const normalized = path.normalize(value);
  return process.platform === "win32" ? normalized.toLowerCase() : normalized;
};

export const getGlobalRepoprobeDir = (env: NodeJS.ProcessEnv = process.env): string => {
  const envHome = env.HOME ?? env.USERPROFILE;
  const homeDir = envHome && envHome.trim().length > 0 ? envHome : os.homedir();
  return path.join(homeDir, ".repoprobe");
};

export const getProjectStorageDir = (projectRoot: string, env: NodeJS.ProcessEnv = process.env): string => {
  const normalizedRoot = normalizePathCase(path.resolve(projectRoot));
  const hash = createHash("sha256").update(normalizedRoot).digest("hex").slice(0, 12);
  const rawName = path.basename(normalizedRoot) || "project";
  const safeName = rawName.replace(/[^a-zA-Z0-9._-]+/g, "_").slice(0, 32) || "project";
  return path.join(getGlobalRepoprobeDir(env), "workspaces", `${safeName}-${hash}`);
};

export const getDefaultLogDir = (projectRoot: string, env: NodeJS.ProcessEnv = process.env): string =>
  path.join(getProjectStorageDir(projectRoot, env), "logs");
