import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { collectArtifacts, isNotFound, resetDirectory } from './artifacts.js';

describe('artifacts', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'artifacts-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should list files sorted by name with their sizes', async () => {
    await fs.writeFile(path.join(dir, 'b.png'), 'bb');
    await fs.writeFile(path.join(dir, 'a.png'), 'a');
    await fs.mkdir(path.join(dir, 'nested.png'));

    expect(await collectArtifacts(dir)).toEqual([
      { name: 'a.png', path: path.join(dir, 'a.png'), size: 1 },
      { name: 'b.png', path: path.join(dir, 'b.png'), size: 2 },
    ]);
  });

  it('should apply the filter', async () => {
    await fs.writeFile(path.join(dir, 'out.pdf'), 'pdf');
    await fs.writeFile(path.join(dir, 'out.log'), 'log');

    const artifacts = await collectArtifacts(dir, /\.pdf$/);

    expect(artifacts.map((x) => x.name)).toEqual(['out.pdf']);
  });

  it('should return no artifacts for a missing directory', async () => {
    expect(await collectArtifacts(path.join(dir, 'missing'))).toEqual([]);
  });

  it('should recognize not found errors by code', () => {
    expect(isNotFound({ code: 'ENOENT', message: 'no such file' })).toBe(true);
    expect(isNotFound({ code: 'EACCES' })).toBe(false);
    expect(isNotFound('ENOENT')).toBe(false);
    expect(isNotFound(null)).toBe(false);
  });

  it('should empty an existing directory', async () => {
    const output = path.join(dir, 'output');
    await fs.mkdir(output);
    await fs.writeFile(path.join(output, 'stale.png'), 'old');

    await resetDirectory(output);

    expect(await fs.readdir(output)).toEqual([]);
  });
});
