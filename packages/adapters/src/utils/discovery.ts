import type { Dirent } from 'fs';
import { promises as fs } from 'fs';
import path from 'path';

import { describeError, errorCode } from '@reqtrace/core';
import { minimatch } from 'minimatch';

import type { ParseResult } from '../types';

const SKIPPED_DIRECTORIES = new Set(['node_modules', '.git']);

/** Directories that vanish or cannot be listed are reported and skipped. */
const UNREADABLE_DIRECTORY_CODES = new Set(['ENOENT', 'ENOTDIR', 'EACCES', 'EPERM']);

const toPosix = (relativePath: string): string => relativePath.split(path.sep).join('/');

const matchesAny = (relativePath: string, patterns: string[]): boolean =>
  patterns.some((pattern) => minimatch(relativePath, pattern, { dot: true }));

const readDirectory = async (directory: string, warnings: string[]): Promise<Dirent[]> => {
  try {
    return await fs.readdir(directory, { withFileTypes: true });
  } catch (error) {
    const code = errorCode(error);
    if (code === undefined || !UNREADABLE_DIRECTORY_CODES.has(code)) {
      throw error;
    }
    warnings.push(`Skipped directory ${directory}: ${describeError(error)}`);
    return [];
  }
};

const walk = async (root: string, directory: string, exclude: string[], warnings: string[]): Promise<string[]> => {
  const entries = await readDirectory(directory, warnings);
  const nested = await Promise.all(
    entries.map(async (entry) => {
      const absolute = path.join(directory, entry.name);
      const relative = toPosix(path.relative(root, absolute));
      if (matchesAny(relative, exclude)) {
        return [];
      }
      if (entry.isDirectory()) {
        return SKIPPED_DIRECTORIES.has(entry.name) ? [] : walk(root, absolute, exclude, warnings);
      }
      return entry.isFile() ? [absolute] : [];
    }),
  );
  return nested.flat();
};

/**
 * Files under `root` whose POSIX-style relative path matches one of
 * `patterns` and none of `exclude`, as sorted absolute paths. A missing root
 * yields no files; every directory that could not be listed adds a warning.
 */
export const discoverFiles = async (
  root: string,
  patterns: string[],
  exclude: string[] = [],
): Promise<ParseResult<string[]>> => {
  const base = path.resolve(root);
  if (patterns.length === 0) {
    return { data: [], warnings: [] };
  }
  const warnings: string[] = [];
  const files = await walk(base, base, exclude, warnings);
  const matched = files.filter((file) => matchesAny(toPosix(path.relative(base, file)), patterns));
  return { data: Array.from(new Set(matched)).sort(), warnings };
};

/** POSIX-style path of `file` relative to `root`, for logs and warnings. */
export const relativeTo = (root: string, file: string): string => toPosix(path.relative(path.resolve(root), file));
