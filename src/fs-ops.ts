import { constants } from 'node:fs';
import {
  access,
  copyFile,
  link,
  lstat,
  mkdir,
  open,
  rename,
  rm,
  rmdir,
  stat,
  symlink,
  unlink,
  utimes,
} from 'node:fs/promises';
import { dirname, relative, isAbsolute, resolve } from 'node:path';
import pRetry, { AbortError } from 'p-retry';
import { SetupError, errorMessage, isTransientError } from './errors.js';
import type { Logger } from './logger.js';

export type LinkKind = 'hard' | 'symbolic';

function hasCode(error: unknown, ...codes: string[]): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    codes.includes(error.code)
  );
}

/** Retries transient errno failures only; anything else fails on the first attempt. */
export async function withRetry<T>(operation: () => Promise<T>, retries: number): Promise<T> {
  return pRetry(
    async () => {
      try {
        return await operation();
      } catch (error) {
        if (isTransientError(error)) {
          throw error;
        }

        throw new AbortError(error instanceof Error ? error : String(error));
      }
    },
    { retries, minTimeout: 25, maxTimeout: 250 }
  );
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch (error) {
    if (hasCode(error, 'ENOENT', 'ENOTDIR')) {
      return false;
    }

    throw error;
  }
}

export async function assertReadableFile(path: string): Promise<void> {
  const info = await stat(path);

  if (!info.isFile()) {
    throw Object.assign(new Error(`Not a regular file: ${path}`), { code: 'EISDIR' });
  }

  await access(path, constants.R_OK);
}

/**
 * The directory at `path`, or its nearest existing ancestor, must be a
 * writable directory. Throws a SetupError naming `label` otherwise.
 */
export async function assertWritableLocation(path: string, label: string): Promise<void> {
  let dir = resolve(path);

  while (!(await pathExists(dir))) {
    const parent = dirname(dir);

    if (parent === dir) {
      break;
    }

    dir = parent;
  }

  try {
    const info = await stat(dir);

    if (!info.isDirectory()) {
      throw new SetupError(`${label} ${path} is blocked by a file at ${dir}`);
    }

    await access(dir, constants.W_OK);
  } catch (error) {
    if (error instanceof SetupError) {
      throw error;
    }

    throw new SetupError(`${label} ${path} is not writable: ${errorMessage(error)}`);
  }
}

/** Creates the directory tree and returns the top-most directory it had to create. */
export async function ensureDirectory(dir: string): Promise<string | undefined> {
  return mkdir(dir, { recursive: true });
}

async function copyTimestamps(source: string, target: string): Promise<void> {
  const info = await stat(source);
  await utimes(target, info.atime, info.mtime);
}

/** Never overwrites; a partially written target is removed before the error is rethrown. */
export async function copyPreserving(source: string, target: string): Promise<void> {
  try {
    await copyFile(source, target, constants.COPYFILE_EXCL);
    await copyTimestamps(source, target);
  } catch (error) {
    if (!hasCode(error, 'EEXIST')) {
      await rm(target, { force: true });
    }

    throw error;
  }
}

export async function moveFile(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!hasCode(error, 'EXDEV')) {
      throw error;
    }

    await copyPreserving(source, target);

    try {
      await unlink(source);
    } catch (unlinkError) {
      await rm(target, { force: true });
      throw unlinkError;
    }
  }
}

export async function linkFile(source: string, target: string): Promise<LinkKind> {
  try {
    await link(source, target);
    return 'hard';
  } catch (error) {
    if (!hasCode(error, 'EXDEV', 'EPERM', 'ENOTSUP')) {
      throw error;
    }

    await symlink(source, target);
    return 'symbolic';
  }
}

function isWithin(dir: string, root: string): boolean {
  const rel = relative(root, dir);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

/**
 * Removes now-empty directories from `start` upwards, never climbing above
 * `createdRoot`, the first directory a batch created.
 */
export async function removeEmptyDirectories(start: string, createdRoot: string): Promise<void> {
  let dir = start;

  while (isWithin(dir, createdRoot)) {
    try {
      await rmdir(dir);
    } catch (error) {
      if (hasCode(error, 'ENOTEMPTY', 'EEXIST', 'ENOENT')) {
        return;
      }

      throw error;
    }

    if (dir === createdRoot) {
      return;
    }

    dir = dirname(dir);
  }
}

/** Cleanup after a failed or undone operation: a failure here is logged, never thrown. */
export async function pruneCreatedDirectories(start: string, createdRoot: string, logger: Logger): Promise<void> {
  try {
    await removeEmptyDirectories(start, createdRoot);
  } catch (error) {
    logger.warn(`Could not remove empty directories under ${createdRoot}: ${errorMessage(error)}`);
  }
}

/** Writes through a flushed temp file and renames it over the destination. */
export async function writeFileDurable(path: string, data: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });

  const tempPath = `${path}.${process.pid}.tmp`;
  const handle = await open(tempPath, 'w');

  try {
    await handle.writeFile(data, 'utf-8');
    await handle.sync();
  } finally {
    await handle.close();
  }

  await rename(tempPath, path);
}
