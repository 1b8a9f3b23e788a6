export interface InferenceConfig {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  temperature?: number;
}

export interface ScanConfig {
  excludeDirs: string[];
  extraExcludeDirs: string[];
  followSymlinks: boolean;
  maxFiles: number;
}

export interface ReadConfig {
  maxFileBytes: number;
  maxTotalBytes: number;
}

export interface SelectionConfig {
  /** Drop model-suggested paths that the scan did not list. Paths outside the root are always dropped. */
  dropUnknownPaths: boolean;
}

export interface LoggingConfig {
  enabled: boolean;
  directory?: string;
}

export interface RepoprobeConfig {
  projectPath: string;
  inference: InferenceConfig;
  scan: ScanConfig;
  read: ReadConfig;
  selection: SelectionConfig;
  logging: LoggingConfig;
}

export const DEFAULT_BASE_URL = "http://127.0.0.1:11434";
export const DEFAULT_MODEL = "codegemma";

export const DEFAULT_EXCLUDED_DIRS: string[] = [
  ".git",
  ".svn",
  ".hg",
  "node_modules",
  "bower_components",
  "vendor",
  "dist",
  "build",
  "out",
  "target",
  ".next",
  ".nuxt",
  ".venv",
  "venv",
  "env",
  "__pycache__",
  ".mypy_cache",
  ".pytest_cache",
  ".tox",
  "coverage",
  ".idea",
  ".gradle",
];

export const DEFAULT_INFERENCE: InferenceConfig = {
  baseUrl: DEFAULT_BASE_URL,
  model: DEFAULT_MODEL,
  timeoutMs: 120_000,
};

export const DEFAULT_SCAN: ScanConfig = {
  excludeDirs: DEFAULT_EXCLUDED_DIRS,
  extraExcludeDirs: [],
  followSymlinks: true,
  maxFiles: 10_000,
};

export const DEFAULT_READ: ReadConfig = {
  maxFileBytes: 64_000,
  maxTotalBytes: 256_000,
};

export const DEFAULT_SELECTION: SelectionConfig = {
  dropUnknownPaths: true,
};

export const DEFAULT_LOGGING: LoggingConfig = {
  enabled: true,
};
