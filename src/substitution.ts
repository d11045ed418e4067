import { ConfigError } from './errors';
import { EnvironmentSnapshot, SubstitutionEntry } from './types';

/**
 * Copy the environment once so a run never sees later mutations
 */
export function snapshotEnvironment(
  env: NodeJS.ProcessEnv = process.env
): EnvironmentSnapshot {
  const snapshot: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      snapshot[key] = value;
    }
  }
  return Object.freeze(snapshot);
}

/**
 * Select the entries whose key starts with `prefix`, sorted by key.
 * Token is `delimiter + key + delimiter`; values are taken verbatim.
 */
export function deriveSubstitutionSet(
  env: EnvironmentSnapshot,
  prefix: string,
  delimiter: string = ''
): SubstitutionEntry[] {
  const entries: SubstitutionEntry[] = [];

  for (const key of Object.keys(env)) {
    const value = env[key];
    if (value === undefined || !key.startsWith(prefix)) {
      continue;
    }
    entries.push({ key, token: `${delimiter}${key}${delimiter}`, value });
  }

  return entries.sort((a, b) => compareStrings(a.key, b.key));
}

export interface TokenCollision {
  inner: SubstitutionEntry;
  outer: SubstitutionEntry;
}

/**
 * Find pairs where one token occurs inside another. Replacing the shorter
 * token first would corrupt every occurrence of the longer one.
 */
export function findTokenCollisions(entries: SubstitutionEntry[]): TokenCollision[] {
  const collisions: TokenCollision[] = [];

  for (const inner of entries) {
    for (const outer of entries) {
      if (inner !== outer && outer.token.includes(inner.token)) {
        collisions.push({ inner, outer });
      }
    }
  }

  return collisions;
}

export function assertNoTokenCollisions(entries: SubstitutionEntry[]): void {
  const collisions = findTokenCollisions(entries);
  if (collisions.length === 0) {
    return;
  }

  const pairs = collisions
    .map(({ inner, outer }) => `${inner.key} is contained in ${outer.key}`)
    .join(', ');
  throw new ConfigError(
    `Placeholder tokens overlap: ${pairs}. ` +
    'Rename the variables so that no token is a substring of another.'
  );
}

/**
 * Replace every literal occurrence of `token`. No regex, no `$` expansion.
 */
export function replaceAllLiteral(
  content: string,
  token: string,
  value: string
): { content: string; count: number } {
  if (token === '') {
    return { content, count: 0 };
  }

  const parts = content.split(token);
  return { content: parts.join(value), count: parts.length - 1 };
}

/**
 * Code-unit ordering, independent of locale
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
