import { Dirent } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { ArtifactInfo } from '../types/job.js';

/**
 * Lists the regular files directly inside `dir`, sorted by name. A missing
 * directory yields no artifacts.
 */
export const collectArtifacts = async (
  dir: string,
  filter?: RegExp,
): Promise<ArtifactInfo[]> => {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }

  const files = entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => !filter || filter.test(name))
    .sort();

  return Promise.all(
    files.map(async (name) => {
      const filePath = path.join(dir, name);
      const stats = await fs.stat(filePath);
      return { name, path: filePath, size: stats.size };
    }),
  );
};

export const resetDirectory = async (dir: string): Promise<void> => {
  await fs.rm(dir, { recursive: true, force: true });
  await fs.mkdir(dir, { recursive: true });
};

// fs errors can come from another realm and fail instanceof Error.
export const isNotFound = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  error.code === 'ENOENT';
