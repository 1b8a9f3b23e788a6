import type { FrameworkCatalog } from "../frameworks/FrameworkCatalog.js";
import type { Provider } from "../providers/ProviderTypes.js";

/** Output sinks and process context for a command; tests pass their own. */
export interface CommandIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Replaces the inference client built from config. */
  provider?: Provider;
  catalog?: FrameworkCatalog;
}

export const createProcessIO = (): CommandIO => ({
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
});
