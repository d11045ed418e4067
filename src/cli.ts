import { defaultConfig, DEFAULT_CONFIG_PATH, loadConfigFile, mergeConfig, parsePort } from './config';
import { ConfigError, InjectorError } from './errors';
import { inject } from './injector';
import { consoleLogger } from './logger';
import { AssetServerOptions, startAssetServer } from './server';
import { snapshotEnvironment } from './substitution';
import { Config, Logger, PartialConfig } from './types';

export interface CliArgs {
  configPath?: string;
  overrides: PartialConfig;
  help: boolean;
}

export const USAGE = `Usage: env-inject [rootDir] [options]

Rewrites placeholder tokens in built assets with runtime environment values.

Options:
  -c, --config <file>       YAML config file (default: ${DEFAULT_CONFIG_PATH} if present)
  -p, --prefix <prefix>     namespace prefix (default: MY_APP_)
  -e, --ext <list>          comma-separated extensions (default: .js,.css)
  -d, --delimiter <text>    text around each key in the assets (default: none)
  -s, --strict              fail when no variable matches the prefix
  -t, --timeout <ms>        time budget in milliseconds, 0 disables (default: 30000)
  -j, --concurrency <n>     files processed in parallel (default: 1)
      --dry-run             report what would change without writing
      --log-values          print injected values in the log
      --serve               start the asset server after a successful injection
      --port <port>         asset server port (default: PORT or 3000)
      --no-spa-fallback     do not answer unknown routes with index.html
  -h, --help                show this help`;

export enum ExitCode {
  Success = 0,
  IoFailure = 1,
  ConfigFailure = 2,
  Timeout = 3,
  Unexpected = 70,
}

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof InjectorError) {
    switch (error.code) {
      case 'CONFIG':
        return ExitCode.ConfigFailure;
      case 'TIMEOUT':
        return ExitCode.Timeout;
      case 'IO':
        return ExitCode.IoFailure;
    }
  }
  return ExitCode.Unexpected;
}

const ALIASES: Record<string, string> = {
  '-c': '--config',
  '-p': '--prefix',
  '-e': '--ext',
  '-d': '--delimiter',
  '-s': '--strict',
  '-t': '--timeout',
  '-j': '--concurrency',
  '-h': '--help',
};

/**
 * Parse argv (without node and script). Accepts `--flag value` and `--flag=value`.
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { overrides: {}, help: false };
  const overrides = args.overrides;
  const serve: NonNullable<PartialConfig['serve']> = {};
  let i = 0;

  const takeValue = (flag: string, inline: string | undefined): string => {
    if (inline !== undefined) {
      return inline;
    }
    const value = argv[++i];
    if (value === undefined) {
      throw new ConfigError(`Option ${flag} requires a value`);
    }
    return value;
  };

  for (; i < argv.length; i++) {
    const arg = argv[i];

    if (!arg.startsWith('-') || arg === '-') {
      if (overrides.rootDir !== undefined) {
        throw new ConfigError(`Unexpected argument: ${arg}`);
      }
      overrides.rootDir = arg;
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);
    const flag = ALIASES[name] ?? name;

    switch (flag) {
      case '--config':
        args.configPath = takeValue(flag, inline);
        break;
      case '--prefix':
        overrides.prefix = takeValue(flag, inline);
        break;
      case '--ext':
        overrides.extensions = takeValue(flag, inline)
          .split(',')
          .map((ext) => ext.trim())
          .filter((ext) => ext.length > 0);
        break;
      case '--delimiter':
        overrides.delimiter = takeValue(flag, inline);
        break;
      case '--strict':
        rejectValue(flag, inline);
        overrides.strict = true;
        break;
      case '--timeout':
        overrides.timeoutMs = parseInteger(takeValue(flag, inline), flag);
        break;
      case '--concurrency':
        overrides.concurrency = parseInteger(takeValue(flag, inline), flag);
        break;
      case '--dry-run':
        rejectValue(flag, inline);
        overrides.dryRun = true;
        break;
      case '--log-values':
        rejectValue(flag, inline);
        overrides.logValues = true;
        break;
      case '--serve':
        rejectValue(flag, inline);
        serve.enabled = true;
        break;
      case '--port':
        serve.port = parsePort(takeValue(flag, inline), flag);
        break;
      case '--no-spa-fallback':
        rejectValue(flag, inline);
        serve.spaFallback = false;
        break;
      case '--help':
        rejectValue(flag, inline);
        args.help = true;
        break;
      default:
        throw new ConfigError(`Unknown option: ${arg}`);
    }
  }

  if (Object.keys(serve).length > 0) {
    overrides.serve = serve;
  }

  return args;
}

/**
 * defaults < PORT < config file < command-line flags.
 * PORT is only read when the server will start.
 */
export function resolveConfig(args: CliArgs, env: NodeJS.ProcessEnv = process.env): Config {
  const fromFile = loadConfigFile(args.configPath ?? DEFAULT_CONFIG_PATH, args.configPath !== undefined);
  const config = mergeConfig(defaultConfig(), fromFile, args.overrides);

  const portGiven = fromFile.serve?.port !== undefined || args.overrides.serve?.port !== undefined;
  if (config.serve.enabled && !portGiven && env.PORT) {
    config.serve.port = parsePort(env.PORT, 'PORT');
  }

  return config;
}

export type StartServer = (rootDir: string, port: number, options: AssetServerOptions) => Promise<unknown>;

export interface RunDeps {
  logger?: Logger;
  startServer?: StartServer;
}

/**
 * Inject, then serve if asked. The server is only started after an
 * injection that finished without errors. Never throws.
 */
export async function run(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  deps: RunDeps = {}
): Promise<ExitCode> {
  const logger = deps.logger ?? consoleLogger;
  const startServer = deps.startServer ?? startAssetServer;

  try {
    const args = parseArgs(argv);
    if (args.help) {
      logger.info(USAGE);
      return ExitCode.Success;
    }

    const config = resolveConfig(args, env);

    logger.info('Starting runtime environment injection...');
    logger.info(`Assets: ${config.rootDir}`);
    logger.info(`Prefix: ${config.prefix}  Extensions: ${config.extensions.join(', ')}\n`);

    const result = await inject(config.rootDir, snapshotEnvironment(env), {
      prefix: config.prefix,
      extensions: config.extensions,
      delimiter: config.delimiter,
      strict: config.strict,
      timeoutMs: config.timeoutMs,
      concurrency: config.concurrency,
      dryRun: config.dryRun,
      logValues: config.logValues,
      logger,
    });

    if (!result.ok) {
      return ExitCode.IoFailure;
    }

    if (config.serve.enabled) {
      await startServer(config.rootDir, config.serve.port, {
        spaFallback: config.serve.spaFallback,
        logger,
      });
    }

    return ExitCode.Success;
  } catch (error) {
    logger.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    return exitCodeFor(error);
  }
}

function rejectValue(flag: string, inline: string | undefined): void {
  if (inline !== undefined) {
    throw new ConfigError(`Option ${flag} does not take a value`);
  }
}

function parseInteger(value: string, flag: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigError(`${flag} must be a non-negative integer, got "${value}"`);
  }
  return Number(value);
}
