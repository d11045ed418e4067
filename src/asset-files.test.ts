import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { listAssetFiles, normalizeExtension } from './asset-files';

describe('normalizeExtension', () => {
  it('adds the dot and lowercases', () => {
    expect(normalizeExtension('JS')).toBe('.js');
    expect(normalizeExtension(' .Css ')).toBe('.css');
  });
});

describe('listAssetFiles', () => {
  let rootDir: string;

  const write = (relativePath: string, content = '') => {
    const target = path.join(rootDir, relativePath);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  };

  beforeEach(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'env-inject-files-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  it('walks recursively, filters by extension and sorts', async () => {
    write('a.js');
    write('Z.js');
    write('b.CSS');
    write('logo.png');
    write('app.js.map');
    write('index.html');
    write('nested/deep/e.css');
    write('nested/d.js');

    const { files, errors } = await listAssetFiles(rootDir, ['.js', '.css']);

    expect(files).toEqual(['Z.js', 'a.js', 'b.CSS', 'nested/d.js', 'nested/deep/e.css']);
    expect(errors).toEqual([]);
  });

  it('honours a custom extension set', async () => {
    write('index.html');
    write('main.js');

    const { files } = await listAssetFiles(rootDir, ['html']);

    expect(files).toEqual(['index.html']);
  });

  it('does not treat a directory with a matching name as a file', async () => {
    write('chunks.js/inner.js');

    const { files } = await listAssetFiles(rootDir, ['.js']);

    expect(files).toEqual(['chunks.js/inner.js']);
  });

  it('returns the same order on repeated runs', async () => {
    write('c.js');
    write('a.js');
    write('b/x.js');

    const first = await listAssetFiles(rootDir, ['.js']);
    const second = await listAssetFiles(rootDir, ['.js']);

    expect(second.files).toEqual(first.files);
  });

  it('records a subdirectory that cannot be listed and keeps walking', async () => {
    write('a.js');
    write('private/b.js');
    const realReaddir = fs.promises.readdir;
    vi.spyOn(fs.promises, 'readdir')
      .mockImplementationOnce(realReaddir)
      .mockRejectedValueOnce(new Error('EACCES: permission denied'));

    const { files, errors } = await listAssetFiles(rootDir, ['.js']);

    expect(files).toEqual(['a.js']);
    expect(errors).toHaveLength(1);
    expect(errors[0].path).toBe('private');
    expect(errors[0].operation).toBe('list');
    expect(errors[0].message).toBe('Failed to list private: EACCES: permission denied');
  });
});
