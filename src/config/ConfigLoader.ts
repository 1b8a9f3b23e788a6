import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import {
  DEFAULT_INFERENCE,
  DEFAULT_LOGGING,
  DEFAULT_READ,
  DEFAULT_SCAN,
  DEFAULT_SELECTION,
  type InferenceConfig,
  type LoggingConfig,
  type ReadConfig,
  type RepoprobeConfig,
  type ScanConfig,
  type SelectionConfig,
} from "./Config.js";

export interface ConfigSource {
  projectPath?: string;
  inference?: Partial<InferenceConfig>;
  scan?: Partial<ScanConfig>;
  read?: Partial<ReadConfig>;
  selection?: Partial<SelectionConfig>;
  logging?: Partial<LoggingConfig>;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  cli?: ConfigSource;
  configPath?: string;
}

export const CONFIG_FILE_CANDIDATES = [
  "repoprobe.config.json",
  "repoprobe.config.yaml",
  "repoprobe.config.yml",
  ".repoproberc",
];

const parseNumber = (value: string | undefined): number | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const parseBoolean = (value: string | undefined): boolean | undefined => {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return undefined;
};

const parseList = (value: string | undefined): string[] | undefined => {
  if (!value) return undefined;
  const items = value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
  return items.length ? items : undefined;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const expectSection = (value: unknown, label: string): Record<string, unknown> | undefined => {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new Error(`Invalid ${label}: expected object.`);
  }
  return value;
};

const normalizeNumberField = (value: unknown, label: string): number | undefined => {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`Invalid ${label}: expected number.`);
  }
  return value;
};

const normalizeBooleanField = (value: unknown, label: string): boolean | undefined => {
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new Error(`Invalid ${label}: expected boolean.`);
  }
  return value;
};

const normalizeStringField = (value: unknown, label: string): string | undefined => {
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new Error(`Invalid ${label}: expected string.`);
  }
  return value;
};

const normalizeStringListField = (value: unknown, label: string): string[] | undefined => {
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === "string")) {
    throw new Error(`Invalid ${label}: expected list of strings.`);
  }
  return value;
};

const normalizeInference = (value: unknown, label: string): Partial<InferenceConfig> | undefined => {
  const section = expectSection(value, label);
  if (!section) return undefined;
  const normalized: Partial<InferenceConfig> = {};
  const baseUrl = normalizeStringField(section.baseUrl, `${label}.baseUrl`);
  if (baseUrl !== undefined) normalized.baseUrl = baseUrl;
  const model = normalizeStringField(section.model, `${label}.model`);
  if (model !== undefined) normalized.model = model;
  const timeoutMs = normalizeNumberField(section.timeoutMs, `${label}.timeoutMs`);
  if (timeoutMs !== undefined) normalized.timeoutMs = timeoutMs;
  const temperature = normalizeNumberField(section.temperature, `${label}.temperature`);
  if (temperature !== undefined) normalized.temperature = temperature;
  return normalized;
};

const normalizeScan = (value: unknown, label: string): Partial<ScanConfig> | undefined => {
  const section = expectSection(value, label);
  if (!section) return undefined;
  const normalized: Partial<ScanConfig> = {};
  const excludeDirs = normalizeStringListField(section.excludeDirs, `${label}.excludeDirs`);
  if (excludeDirs !== undefined) normalized.excludeDirs = excludeDirs;
  const extraExcludeDirs = normalizeStringListField(section.extraExcludeDirs, `${label}.extraExcludeDirs`);
  if (extraExcludeDirs !== undefined) normalized.extraExcludeDirs = extraExcludeDirs;
  const followSymlinks = normalizeBooleanField(section.followSymlinks, `${label}.followSymlinks`);
  if (followSymlinks !== undefined) normalized.followSymlinks = followSymlinks;
  const maxFiles = normalizeNumberField(section.maxFiles, `${label}.maxFiles`);
  if (maxFiles !== undefined) normalized.maxFiles = maxFiles;
  return normalized;
};

const normalizeRead = (value: unknown, label: string): Partial<ReadConfig> | undefined => {
  const section = expectSection(value, label);
  if (!section) return undefined;
  const normalized: Partial<ReadConfig> = {};
  const maxFileBytes = normalizeNumberField(section.maxFileBytes, `${label}.maxFileBytes`);
  if (maxFileBytes !== undefined) normalized.maxFileBytes = maxFileBytes;
  const maxTotalBytes = normalizeNumberField(section.maxTotalBytes, `${label}.maxTotalBytes`);
  if (maxTotalBytes !== undefined) normalized.maxTotalBytes = maxTotalBytes;
  return normalized;
};

const normalizeSelection = (value: unknown, label: string): Partial<SelectionConfig> | undefined => {
  const section = expectSection(value, label);
  if (!section) return undefined;
  const normalized: Partial<SelectionConfig> = {};
  const dropUnknownPaths = normalizeBooleanField(section.dropUnknownPaths, `${label}.dropUnknownPaths`);
  if (dropUnknownPaths !== undefined) normalized.dropUnknownPaths = dropUnknownPaths;
  return normalized;
};

const normalizeLogging = (value: unknown, label: string): Partial<LoggingConfig> | undefined => {
  const section = expectSection(value, label);
  if (!section) return undefined;
  const normalized: Partial<LoggingConfig> = {};
  const enabled = normalizeBooleanField(section.enabled, `${label}.enabled`);
  if (enabled !== undefined) normalized.enabled = enabled;
  const directory = normalizeStringField(section.directory, `${label}.directory`);
  if (directory !== undefined) normalized.directory = directory;
  return normalized;
};

/** Validates a parsed config file so that only known, well-typed fields reach the merge. */
export const normalizeConfigSource = (value: unknown, label = "config"): ConfigSource => {
  if (!isRecord(value)) {
    throw new Error(`Invalid ${label}: expected object.`);
  }
  const source: ConfigSource = {
    inference: normalizeInference(value.inference, `${label}.inference`),
    scan: normalizeScan(value.scan, `${label}.scan`),
    read: normalizeRead(value.read, `${label}.read`),
    selection: normalizeSelection(value.selection, `${label}.selection`),
    logging: normalizeLogging(value.logging, `${label}.logging`),
  };
  const projectPath = normalizeStringField(value.projectPath, `${label}.projectPath`);
  if (projectPath !== undefined) source.projectPath = projectPath;
  return source;
};

const findConfigFile = (cwd: string): string | undefined => {
  for (const candidate of CONFIG_FILE_CANDIDATES) {
    const candidatePath = path.join(cwd, candidate);
    if (existsSync(candidatePath)) {
      return candidatePath;
    }
  }
  return undefined;
};

const isYamlPath = (filePath: string): boolean => {
  const ext = path.extname(filePath).toLowerCase();
  return ext === ".yaml" || ext === ".yml";
};

const readConfigFile = async (configPath?: string): Promise<ConfigSource | undefined> => {
  if (!configPath) return undefined;
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }
  const content = await readFile(configPath, "utf8");
  if (!content.trim()) return undefined;
  let parsed: unknown;
  try {
    parsed = isYamlPath(configPath) ? YAML.parse(content) : JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to parse config file ${configPath}: ${reason}`);
  }
  return normalizeConfigSource(parsed, path.basename(configPath));
};

const loadEnvConfig = (env: NodeJS.ProcessEnv): ConfigSource => {
  const inference: Partial<InferenceConfig> = {};
  if (env.REPOPROBE_BASE_URL) inference.baseUrl = env.REPOPROBE_BASE_URL;
  if (env.REPOPROBE_MODEL) inference.model = env.REPOPROBE_MODEL;
  const timeoutMs = parseNumber(env.REPOPROBE_TIMEOUT_MS);
  if (timeoutMs !== undefined) inference.timeoutMs = timeoutMs;
  const temperature = parseNumber(env.REPOPROBE_TEMPERATURE);
  if (temperature !== undefined) inference.temperature = temperature;

  const scan: Partial<ScanConfig> = {};
  const excludeDirs = parseList(env.REPOPROBE_SCAN_EXCLUDE_DIRS);
  if (excludeDirs) scan.excludeDirs = excludeDirs;
  const extraExcludeDirs = parseList(env.REPOPROBE_SCAN_EXTRA_EXCLUDE_DIRS);
  if (extraExcludeDirs) scan.extraExcludeDirs = extraExcludeDirs;
  const followSymlinks = parseBoolean(env.REPOPROBE_SCAN_FOLLOW_SYMLINKS);
  if (followSymlinks !== undefined) scan.followSymlinks = followSymlinks;
  const maxFiles = parseNumber(env.REPOPROBE_SCAN_MAX_FILES);
  if (maxFiles !== undefined) scan.maxFiles = maxFiles;

  const read: Partial<ReadConfig> = {};
  const maxFileBytes = parseNumber(env.REPOPROBE_READ_MAX_FILE_BYTES);
  if (maxFileBytes !== undefined) read.maxFileBytes = maxFileBytes;
  const maxTotalBytes = parseNumber(env.REPOPROBE_READ_MAX_TOTAL_BYTES);
  if (maxTotalBytes !== undefined) read.maxTotalBytes = maxTotalBytes;

  const selection: Partial<SelectionConfig> = {};
  const dropUnknownPaths = parseBoolean(env.REPOPROBE_SELECTION_DROP_UNKNOWN);
  if (dropUnknownPaths !== undefined) selection.dropUnknownPaths = dropUnknownPaths;

  const logging: Partial<LoggingConfig> = {};
  const loggingEnabled = parseBoolean(env.REPOPROBE_LOG_ENABLED);
  if (loggingEnabled !== undefined) logging.enabled = loggingEnabled;
  if (env.REPOPROBE_LOG_DIR) logging.directory = env.REPOPROBE_LOG_DIR;

  return { inference, scan, read, selection, logging };
};

const mergeConfigs = (
  defaults: RepoprobeConfig,
  fileConfig?: ConfigSource,
  envConfig?: ConfigSource,
  cliConfig?: ConfigSource,
): RepoprobeConfig => {
  const inference = {
    ...defaults.inference,
    ...fileConfig?.inference,
    ...envConfig?.inference,
    ...cliConfig?.inference,
  };
  const scan = {
    ...defaults.scan,
    ...fileConfig?.scan,
    ...envConfig?.scan,
    ...cliConfig?.scan,
  };
  const read = {
    ...defaults.read,
    ...fileConfig?.read,
    ...envConfig?.read,
    ...cliConfig?.read,
  };
  const selection = {
    ...defaults.selection,
    ...fileConfig?.selection,
    ...envConfig?.selection,
    ...cliConfig?.selection,
  };
  const logging = {
    ...defaults.logging,
    ...fileConfig?.logging,
    ...envConfig?.logging,
    ...cliConfig?.logging,
  };

  return {
    projectPath:
      cliConfig?.projectPath ?? envConfig?.projectPath ?? fileConfig?.projectPath ?? defaults.projectPath,
    inference,
    scan,
    read,
    selection,
    logging,
  };
};

const finalizeConfig = (cwd: string, config: RepoprobeConfig): RepoprobeConfig => {
  const baseUrl = config.inference.baseUrl.trim();
  return {
    ...config,
    projectPath: path.resolve(cwd, config.projectPath),
    inference: {
      ...config.inference,
      baseUrl: baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl,
      model: config.inference.model.trim(),
    },
    logging: {
      ...config.logging,
      directory: config.logging.directory ? path.resolve(cwd, config.logging.directory) : undefined,
    },
  };
};

const assertRequired = (config: RepoprobeConfig): void => {
  const missing: string[] = [];
  if (!config.inference.baseUrl) missing.push("inference.baseUrl");
  if (!config.inference.model) missing.push("inference.model");
  if (missing.length) {
    throw new Error(`Missing required config: ${missing.join(", ")}`);
  }
};

// Largest delay a Node timer accepts.
const MAX_TIMEOUT_MS = 4_294_967_295;

const isPositiveInteger = (value: number, max = Number.MAX_SAFE_INTEGER): boolean =>
  Number.isInteger(value) && value > 0 && value <= max;

const assertValid = (config: RepoprobeConfig): void => {
  const errors: string[] = [];
  if (!/^https?:\/\//i.test(config.inference.baseUrl)) errors.push("inference.baseUrl");
  if (!isPositiveInteger(config.inference.timeoutMs, MAX_TIMEOUT_MS)) errors.push("inference.timeoutMs");
  const { temperature } = config.inference;
  if (temperature !== undefined && temperature < 0) errors.push("inference.temperature");
  if (!isPositiveInteger(config.scan.maxFiles)) errors.push("scan.maxFiles");
  if (!isPositiveInteger(config.read.maxFileBytes)) errors.push("read.maxFileBytes");
  if (!isPositiveInteger(config.read.maxTotalBytes)) errors.push("read.maxTotalBytes");
  if (errors.length) {
    throw new Error(`Invalid config values: ${errors.join(", ")}`);
  }
};

export const loadConfig = async (options: LoadConfigOptions = {}): Promise<RepoprobeConfig> => {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const configPath = options.configPath
    ? path.resolve(cwd, options.configPath)
    : findConfigFile(cwd);
  const fileConfig = await readConfigFile(configPath);
  const envConfig = loadEnvConfig(env);

  const defaults: RepoprobeConfig = {
    projectPath: ".",
    inference: DEFAULT_INFERENCE,
    scan: DEFAULT_SCAN,
    read: DEFAULT_READ,
    selection: DEFAULT_SELECTION,
    logging: DEFAULT_LOGGING,
  };

  const merged = mergeConfigs(defaults, fileConfig, envConfig, options.cli);
  const finalized = finalizeConfig(cwd, merged);
  assertRequired(finalized);
  assertValid(finalized);
  return finalized;
};
