import { readdir } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import { logger as defaultLogger, type Logger } from './logger.js';
import { extractMetadata } from './metadata.js';
import type { TrackStore } from './track-store.js';

export interface ScanOptions {
  extensions: string[];
  onFile?: (path: string) => void;
}

/** Recursively lists audio files by extension, in sorted path order. */
export async function findMusicFiles(dir: string, options: ScanOptions): Promise<string[]> {
  const wanted = new Set(options.extensions.map((ext) => `.${ext.replace(/^\./, '').toLowerCase()}`));

  return walk(resolve(dir), wanted, options.onFile);
}

async function walk(dir: string, wanted: Set<string>, onFile?: (path: string) => void): Promise<string[]> {
  const musicFiles: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      const nestedFiles = await walk(fullPath, wanted, onFile);
      musicFiles.push(...nestedFiles);
      continue;
    }

    if (entry.isFile() && wanted.has(extname(entry.name).toLowerCase())) {
      musicFiles.push(fullPath);
      onFile?.(fullPath);
    }
  }

  return musicFiles;
}

export interface IngestOptions {
  extensions: string[];
  logger?: Logger;
  onProgress?: (path: string, done: number, total: number) => void;
}

export interface IngestSummary {
  discovered: number;
  stored: number;
  unreadable: string[];
}

/** Reads tags for every audio file under `dir` and upserts them into the store. */
export async function ingestDirectory(
  dir: string,
  store: TrackStore,
  options: IngestOptions
): Promise<IngestSummary> {
  const logger = options.logger ?? defaultLogger;
  const files = await findMusicFiles(dir, { extensions: options.extensions });
  const unreadable: string[] = [];
  let stored = 0;

  await store.batch(async () => {
    for (const [index, filePath] of files.entries()) {
      const input = await extractMetadata(filePath, logger);

      if (input) {
        await store.upsert(input);
        stored++;
      } else {
        unreadable.push(filePath);
      }

      options.onProgress?.(filePath, index + 1, files.length);
    }
  });

  if (unreadable.length > 0) {
    logger.warn(`${unreadable.length} files could not be read`);
  }

  return { discovered: files.length, stored, unreadable };
}
