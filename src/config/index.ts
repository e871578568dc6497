import { loadModeEnvFile, parseEnv, type Env } from "./env.js";

export type { DistanceMetric, Env } from "./env.js";
export { envSchema, loadModeEnvFile, parseEnv } from "./env.js";

export type Config = Readonly<Env>;

export interface LoadConfigOptions {
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  skipEnvFile?: boolean;
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  const processEnv = options.processEnv ?? process.env;
  if (!options.skipEnvFile) {
    loadModeEnvFile({ cwd: options.cwd, processEnv });
  }
  return Object.freeze({ ...parseEnv(processEnv) });
}
