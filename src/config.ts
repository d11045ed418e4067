import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { normalizeExtension } from './asset-files';
import { ConfigError } from './errors';
import { DEFAULT_EXTENSIONS, DEFAULT_PREFIX, DEFAULT_TIMEOUT_MS } from './injector';
import { Config, PartialConfig } from './types';

export const DEFAULT_CONFIG_PATH = 'env-inject.yaml';

export function defaultConfig(): Config {
  return {
    rootDir: 'dist',
    prefix: DEFAULT_PREFIX,
    extensions: [...DEFAULT_EXTENSIONS],
    delimiter: '',
    strict: false,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    concurrency: 1,
    dryRun: false,
    logValues: false,
    serve: {
      enabled: false,
      port: 3000,
      spaFallback: true,
    },
  };
}

/**
 * Read the optional YAML config file.
 * A missing file is fine unless it was named explicitly.
 */
export function loadConfigFile(
  configPath: string = DEFAULT_CONFIG_PATH,
  explicit: boolean = false
): PartialConfig {
  let fileContents: string;

  try {
    fileContents = fs.readFileSync(configPath, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT' && !explicit) {
      return {};
    }
    throw new ConfigError(`Config file not readable: ${configPath}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = yaml.load(fileContents);
  } catch (error) {
    throw new ConfigError(
      `Invalid YAML in ${configPath}: ${(error as Error).message}`,
      { cause: error }
    );
  }

  if (raw === undefined || raw === null) {
    return {};
  }
  return validateConfigFile(raw, configPath);
}

/**
 * Check field types of a parsed config document
 */
export function validateConfigFile(raw: unknown, source: string): PartialConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${source}: expected a mapping at the top level`);
  }

  const config: PartialConfig = {};
  const field = (name: string) => `${source}: "${name}"`;

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new ConfigError(`${source}: unknown option "${key}"`);
    }
  }

  if (raw.rootDir !== undefined) config.rootDir = expectString(raw.rootDir, field('rootDir'));
  if (raw.prefix !== undefined) config.prefix = expectString(raw.prefix, field('prefix'));
  if (raw.delimiter !== undefined) config.delimiter = expectString(raw.delimiter, field('delimiter'));
  if (raw.strict !== undefined) config.strict = expectBoolean(raw.strict, field('strict'));
  if (raw.dryRun !== undefined) config.dryRun = expectBoolean(raw.dryRun, field('dryRun'));
  if (raw.logValues !== undefined) config.logValues = expectBoolean(raw.logValues, field('logValues'));
  if (raw.timeoutMs !== undefined) config.timeoutMs = expectNumber(raw.timeoutMs, field('timeoutMs'));
  if (raw.concurrency !== undefined) config.concurrency = expectNumber(raw.concurrency, field('concurrency'));

  if (raw.extensions !== undefined) {
    if (!Array.isArray(raw.extensions)) {
      throw new ConfigError(`${field('extensions')} must be a list`);
    }
    config.extensions = raw.extensions.map((ext) => expectString(ext, field('extensions')));
  }

  if (raw.serve !== undefined) {
    if (!isRecord(raw.serve)) {
      throw new ConfigError(`${field('serve')} must be a mapping`);
    }
    const serve = raw.serve;
    config.serve = {};
    if (serve.enabled !== undefined) config.serve.enabled = expectBoolean(serve.enabled, field('serve.enabled'));
    if (serve.port !== undefined) config.serve.port = expectNumber(serve.port, field('serve.port'));
    if (serve.spaFallback !== undefined) {
      config.serve.spaFallback = expectBoolean(serve.spaFallback, field('serve.spaFallback'));
    }
  }

  return config;
}

/**
 * Merge layers left to right; later layers win
 */
export function mergeConfig(base: Config, ...layers: PartialConfig[]): Config {
  const merged: Config = { ...base, serve: { ...base.serve } };

  for (const layer of layers) {
    const { serve, ...rest } = layer;
    for (const [key, value] of Object.entries(rest)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
    if (serve) {
      merged.serve = {
        enabled: serve.enabled ?? merged.serve.enabled,
        port: serve.port ?? merged.serve.port,
        spaFallback: serve.spaFallback ?? merged.serve.spaFallback,
      };
    }
  }

  merged.extensions = merged.extensions.map(normalizeExtension);

  if (!Number.isInteger(merged.serve.port) || merged.serve.port < 0 || merged.serve.port > 65535) {
    throw new ConfigError(`serve.port must be an integer between 0 and 65535, got ${merged.serve.port}`);
  }

  return merged;
}

export function parsePort(value: string, source: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65535) {
    throw new ConfigError(`${source} must be a port number, got "${value}"`);
  }
  return port;
}

const KNOWN_KEYS = new Set([
  'rootDir',
  'prefix',
  'extensions',
  'delimiter',
  'strict',
  'timeoutMs',
  'concurrency',
  'dryRun',
  'logValues',
  'serve',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectString(value: unknown, name: string): string {
  if (typeof value !== 'string') {
    throw new ConfigError(`${name} must be a string`);
  }
  return value;
}

function expectBoolean(value: unknown, name: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${name} must be true or false`);
  }
  return value;
}

function expectNumber(value: unknown, name: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number`);
  }
  return value;
}
