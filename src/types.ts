import type { IoError } from './errors';

/**
 * Read-only view of the runtime environment, taken once per run
 */
export type EnvironmentSnapshot = Readonly<Record<string, string | undefined>>;

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface InjectOptions {
  prefix?: string;        // Namespace prefix selecting env keys (default: MY_APP_)
  extensions?: string[];  // Eligible file extensions (default: .js, .css)
  strict?: boolean;       // Fail when no env key matches the prefix
  delimiter?: string;     // Wrapped around a key to form its token (default: '')
  timeoutMs?: number;     // Overall time budget, 0 disables (default: 30000)
  concurrency?: number;   // Files processed in parallel (default: 1)
  dryRun?: boolean;       // Count replacements without writing
  logValues?: boolean;    // Include values in replacement log lines
  logger?: Logger;
}

export type ResolvedInjectOptions = Required<InjectOptions>;

export interface SubstitutionEntry {
  key: string;
  token: string;
  value: string;
}

export interface ReplacementRecord {
  key: string;
  token: string;
}

export interface FileOutcome {
  path: string;           // Relative to rootDir, '/' separated
  replacements: number;
  written: boolean;
  error?: IoError;
}

export interface InjectResult {
  rootDir: string;
  records: ReplacementRecord[];
  files: FileOutcome[];
  modified: string[];
  failures: IoError[];
  ok: boolean;
  dryRun: boolean;
  durationMs: number;
}

export interface ServeConfig {
  enabled: boolean;
  port: number;
  spaFallback: boolean;
}

/**
 * Fully resolved CLI configuration (defaults < config file < flags)
 */
export interface Config {
  rootDir: string;
  prefix: string;
  extensions: string[];
  delimiter: string;
  strict: boolean;
  timeoutMs: number;
  concurrency: number;
  dryRun: boolean;
  logValues: boolean;
  serve: ServeConfig;
}

/**
 * Shape accepted from the YAML file and from command-line flags
 */
export type PartialConfig = Partial<Omit<Config, 'serve'>> & {
  serve?: Partial<ServeConfig>;
};
