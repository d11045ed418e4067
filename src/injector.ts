import * as fs from 'fs';
import * as path from 'path';
import { listAssetFiles, normalizeExtension } from './asset-files';
import { ConfigError, IoError, TimeoutError } from './errors';
import { consoleLogger } from './logger';
import {
  assertNoTokenCollisions,
  deriveSubstitutionSet,
  replaceAllLiteral,
} from './substitution';
import {
  EnvironmentSnapshot,
  FileOutcome,
  InjectOptions,
  InjectResult,
  ResolvedInjectOptions,
  SubstitutionEntry,
} from './types';

export const DEFAULT_PREFIX = 'MY_APP_';
export const DEFAULT_EXTENSIONS = ['.js', '.css'];
export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Apply defaults and validate. Throws ConfigError on bad values.
 */
export function resolveInjectOptions(options: InjectOptions = {}): ResolvedInjectOptions {
  const resolved: ResolvedInjectOptions = {
    prefix: options.prefix ?? DEFAULT_PREFIX,
    extensions: (options.extensions ?? DEFAULT_EXTENSIONS).map(normalizeExtension),
    strict: options.strict ?? false,
    delimiter: options.delimiter ?? '',
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    concurrency: options.concurrency ?? 1,
    dryRun: options.dryRun ?? false,
    logValues: options.logValues ?? false,
    logger: options.logger ?? consoleLogger,
  };

  if (resolved.prefix === '') {
    throw new ConfigError('prefix must not be empty');
  }
  if (resolved.extensions.length === 0 || resolved.extensions.includes('.')) {
    throw new ConfigError('extensions must list at least one non-empty extension');
  }
  if (!Number.isInteger(resolved.concurrency) || resolved.concurrency < 1) {
    throw new ConfigError(`concurrency must be a positive integer, got ${resolved.concurrency}`);
  }
  if (!Number.isFinite(resolved.timeoutMs) || resolved.timeoutMs < 0) {
    throw new ConfigError(`timeoutMs must be zero or a positive number, got ${resolved.timeoutMs}`);
  }

  return resolved;
}

/**
 * Rewrite placeholder tokens under rootDir with values from env.
 *
 * Tokens are env keys starting with `prefix` (wrapped in `delimiter`).
 * Every ConfigError is raised before any file is touched. Per-file I/O
 * failures are collected in `failures` and make `ok` false. Running twice
 * with the same env is a no-op, unless a value contains another token of
 * the same set.
 */
export async function inject(
  rootDir: string,
  env: EnvironmentSnapshot,
  options: InjectOptions = {}
): Promise<InjectResult> {
  const opts = resolveInjectOptions(options);
  const startedAt = Date.now();
  const controller = new AbortController();

  const run = async (): Promise<InjectResult> => {
    await assertAccessibleDirectory(rootDir);

    const entries = deriveSubstitutionSet(env, opts.prefix, opts.delimiter);
    if (entries.length === 0 && opts.strict) {
      throw new ConfigError(
        `No environment variables start with "${opts.prefix}" (strict mode)`
      );
    }
    assertNoTokenCollisions(entries);

    const records = entries.map(({ key, token }) => ({ key, token }));
    for (const entry of entries) {
      opts.logger.info(
        opts.logValues
          ? `🔧 Injecting ${entry.key} = ${entry.value}`
          : `🔧 Injecting ${entry.key}`
      );
    }

    const result: InjectResult = {
      rootDir,
      records,
      files: [],
      modified: [],
      failures: [],
      ok: true,
      dryRun: opts.dryRun,
      durationMs: 0,
    };

    if (entries.length === 0) {
      opts.logger.warn(`⚠️  No environment variables start with "${opts.prefix}", nothing to inject`);
      result.durationMs = Date.now() - startedAt;
      return result;
    }

    const assets = await listAssetFiles(rootDir, opts.extensions);
    result.failures.push(...assets.errors);

    const encoded = entries.map(toByteString);
    result.files = await processInPool(assets.files, opts.concurrency, controller.signal, (file) =>
      rewriteFile(rootDir, file, encoded, opts.dryRun, controller.signal)
    );

    // Timed out: the caller already has a TimeoutError, report nothing else
    if (controller.signal.aborted) {
      return result;
    }

    for (const outcome of result.files) {
      if (outcome.error) {
        result.failures.push(outcome.error);
      } else if (outcome.replacements > 0) {
        result.modified.push(outcome.path);
        opts.logger.info(opts.dryRun ? `  ↪ Would patch ${outcome.path}` : `  ✏️  Patched ${outcome.path}`);
      }
    }

    for (const failure of result.failures) {
      opts.logger.error(`❌ ${failure.message}`);
    }

    result.ok = result.failures.length === 0;
    result.durationMs = Date.now() - startedAt;

    const summary =
      `${entries.length} variable(s) into ${result.modified.length} of ${result.files.length} file(s) ` +
      `in ${result.durationMs}ms`;
    if (result.ok) {
      opts.logger.info(opts.dryRun ? `✅ Dry run: would inject ${summary}` : `✅ Injected ${summary}`);
    } else {
      opts.logger.error(`❌ Injected ${summary} with ${result.failures.length} failure(s)`);
    }

    return result;
  };

  return withTimeBudget(run(), opts.timeoutMs, controller);
}

/**
 * Reject with TimeoutError once the budget elapses and stop new work
 */
async function withTimeBudget<T>(
  work: Promise<T>,
  timeoutMs: number,
  controller: AbortController
): Promise<T> {
  if (timeoutMs === 0) {
    return work;
  }

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([work, expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run `task` over items with at most `concurrency` in flight.
 * Results keep the order of `items`.
 */
async function processInPool<T, R>(
  items: T[],
  concurrency: number,
  signal: AbortSignal,
  task: (item: T) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length && !signal.aborted) {
      const index = next++;
      results[index] = await task(items[index]);
    }
  };

  const workerCount = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}

/**
 * Map tokens and values to their UTF-8 bytes, one char per byte
 */
function toByteString(entry: SubstitutionEntry): SubstitutionEntry {
  return {
    ...entry,
    token: Buffer.from(entry.token, 'utf8').toString('latin1'),
    value: Buffer.from(entry.value, 'utf8').toString('latin1'),
  };
}

/**
 * Files go through latin1 so every byte outside a token is written back as read.
 * `entries` must come from toByteString.
 */
async function rewriteFile(
  rootDir: string,
  relativePath: string,
  entries: SubstitutionEntry[],
  dryRun: boolean,
  signal: AbortSignal
): Promise<FileOutcome> {
  const absolutePath = path.join(rootDir, relativePath);
  let content: string;

  try {
    content = (await fs.promises.readFile(absolutePath)).toString('latin1');
  } catch (error) {
    return { path: relativePath, replacements: 0, written: false, error: new IoError(relativePath, 'read', error) };
  }

  let replacements = 0;
  for (const entry of entries) {
    const replaced = replaceAllLiteral(content, entry.token, entry.value);
    content = replaced.content;
    replacements += replaced.count;
  }

  // Untouched files keep their mtime
  if (replacements === 0 || dryRun || signal.aborted) {
    return { path: relativePath, replacements, written: false };
  }

  try {
    await fs.promises.writeFile(absolutePath, Buffer.from(content, 'latin1'));
  } catch (error) {
    return { path: relativePath, replacements, written: false, error: new IoError(relativePath, 'write', error) };
  }

  return { path: relativePath, replacements, written: true };
}

async function assertAccessibleDirectory(rootDir: string): Promise<void> {
  let stats: fs.Stats;

  try {
    stats = await fs.promises.stat(rootDir);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigError(`Asset directory not found: ${rootDir}`, { cause: error });
    }
    throw new ConfigError(`Cannot access asset directory: ${rootDir}`, { cause: error });
  }

  if (!stats.isDirectory()) {
    throw new ConfigError(`Asset path is not a directory: ${rootDir}`);
  }

  try {
    await fs.promises.access(rootDir, fs.constants.R_OK | fs.constants.W_OK);
  } catch (error) {
    throw new ConfigError(`Asset directory must be readable and writable: ${rootDir}`, { cause: error });
  }
}
