import * as fs from 'fs';
import * as path from 'path';
import { IoError } from './errors';
import { compareStrings } from './substitution';

export interface AssetFileSet {
  files: string[];     // Relative to rootDir, '/' separated, sorted
  errors: IoError[];   // Subdirectories that could not be listed
}

/**
 * Lowercase and ensure a leading dot: 'JS' -> '.js'
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

/**
 * Recursively list regular files under rootDir whose extension is selected.
 * Symbolic links are not followed.
 */
export async function listAssetFiles(
  rootDir: string,
  extensions: string[]
): Promise<AssetFileSet> {
  const wanted = new Set(extensions.map(normalizeExtension));
  const files: string[] = [];
  const errors: IoError[] = [];

  async function walk(relativeDir: string): Promise<void> {
    const absoluteDir = path.join(rootDir, relativeDir);
    let entries: fs.Dirent[];

    try {
      entries = await fs.promises.readdir(absoluteDir, { withFileTypes: true });
    } catch (error) {
      errors.push(new IoError(relativeDir === '' ? '.' : toPosix(relativeDir), 'list', error));
      return;
    }

    for (const entry of entries) {
      const relativePath = relativeDir === '' ? entry.name : path.join(relativeDir, entry.name);

      if (entry.isDirectory()) {
        await walk(relativePath);
      } else if (entry.isFile() && wanted.has(path.extname(entry.name).toLowerCase())) {
        files.push(toPosix(relativePath));
      }
    }
  }

  await walk('');

  files.sort(compareStrings);
  return { files, errors };
}

function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}
