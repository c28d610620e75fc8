import { readFile, unlink } from 'node:fs/promises';
import { dirname } from 'node:path';
import trash from 'trash';
import { SetupError, classifyFsError, errorMessage } from './errors.js';
import {
  assertWritableLocation,
  ensureDirectory,
  moveFile,
  pathExists,
  pruneCreatedDirectories,
  withRetry,
  writeFileDurable,
} from './fs-ops.js';
import { logger as defaultLogger, type Logger } from './logger.js';
import { withStoreBatch, type TrackStore } from './track-store.js';
import type {
  FailureDetail,
  FailureReason,
  PurgeReport,
  UndoBatch,
  UndoBatchSummary,
  UndoEntry,
  UndoEntryResult,
  UndoReport,
} from './types.js';

export interface ArchivedBatch extends UndoBatch {
  undoneAt: string;
  failures: FailureDetail[];
}

interface UndoLogFile {
  version: 1;
  batches: UndoBatch[];
  archived: ArchivedBatch[];
}

export interface UndoOptions {
  store?: TrackStore;
  logger?: Logger;
  retries?: number;
  onProgress?: (result: UndoEntryResult, done: number, total: number) => void;
}

function isBatchList(value: unknown): value is UndoBatch[] {
  return (
    Array.isArray(value) &&
    value.every(
      (batch) =>
        typeof batch === 'object' &&
        batch !== null &&
        'id' in batch &&
        typeof batch.id === 'string' &&
        'entries' in batch &&
        Array.isArray(batch.entries)
    )
  );
}

function isArchiveList(value: unknown): value is ArchivedBatch[] {
  return isBatchList(value) && value.every((batch) => 'undoneAt' in batch);
}

function emptyLog(): UndoLogFile {
  return { version: 1, batches: [], archived: [] };
}

function failed(entry: UndoEntry, failure: FailureReason, message: string): UndoEntryResult {
  return { entry, state: 'Failed', failure, message };
}

/**
 * Durable LIFO record of executed batches. Each sealed batch can be undone as
 * a unit; undone batches move to the archive for audit.
 */
export class UndoLog {
  constructor(readonly file: string) {}

  private async read(): Promise<UndoLogFile> {
    let data: string;

    try {
      data = await readFile(this.file, 'utf-8');
    } catch (error) {
      if (classifyFsError(error) === 'SourceMissing') {
        return emptyLog();
      }

      throw error;
    }

    const parsed: unknown = JSON.parse(data);

    if (typeof parsed !== 'object' || parsed === null) {
      return emptyLog();
    }

    const batches = 'batches' in parsed ? parsed.batches : [];
    const archived = 'archived' in parsed ? parsed.archived : [];

    return {
      version: 1,
      batches: isBatchList(batches) ? batches : [],
      archived: isArchiveList(archived) ? archived : [],
    };
  }

  private async write(log: UndoLogFile): Promise<void> {
    await writeFileDurable(this.file, JSON.stringify(log, null, 2));
  }

  /** Fails before any file is touched when the log cannot be read or rewritten. */
  async assertWritable(): Promise<void> {
    try {
      await this.read();
    } catch (error) {
      throw new SetupError(`Undo log ${this.file} cannot be read: ${errorMessage(error)}`);
    }

    await assertWritableLocation(dirname(this.file), 'Undo log directory');
  }

  async seal(batch: UndoBatch): Promise<void> {
    const log = await this.read();
    log.batches.push(batch);
    await this.write(log);
  }

  async list(): Promise<UndoBatchSummary[]> {
    const log = await this.read();

    return log.batches
      .map((batch) => ({
        id: batch.id,
        mode: batch.mode,
        sealedAt: batch.sealedAt,
        entryCount: batch.entries.length,
      }))
      .reverse();
  }

  async peek(): Promise<UndoBatch | null> {
    const log = await this.read();
    return log.batches.at(-1) ?? null;
  }

  async archive(): Promise<ArchivedBatch[]> {
    const log = await this.read();
    return log.archived;
  }

  async undoLastBatch(options: UndoOptions = {}): Promise<UndoReport> {
    const log = await this.read();
    const batch = log.batches.pop();

    if (!batch) {
      return { batchId: null, attempted: 0, succeeded: 0, failed: 0, results: [], failures: [] };
    }

    const logger = options.logger ?? defaultLogger;
    const pending = [...batch.entries].reverse();
    const results: UndoEntryResult[] = [];

    const undoAll = async (): Promise<void> => {
      for (const entry of pending) {
        const result = await undoEntry(entry, options, logger);
        results.push(result);

        if (result.state === 'Failed') {
          logger.warn(`Undo failed for ${entry.target}: ${result.failure} (${result.message})`);
        }

        options.onProgress?.(result, results.length, pending.length);
      }
    };

    await withStoreBatch(options.store, undoAll, logger);

    const failures: FailureDetail[] = results
      .filter((result) => result.state === 'Failed')
      .map((result) => ({
        source: result.entry.source,
        target: result.entry.target,
        reason: result.failure ?? 'IOError',
        message: result.message ?? '',
      }));

    log.archived.push({ ...batch, undoneAt: new Date().toISOString(), failures });
    await this.write(log);

    const succeeded = results.length - failures.length;
    logger.info(`Undid batch ${batch.id}: ${succeeded} restored, ${failures.length} failed`);

    return {
      batchId: batch.id,
      attempted: results.length,
      succeeded,
      failed: failures.length,
      results,
      failures,
    };
  }

  /**
   * Sends safe-trash files to the system trash. Purged entries leave their
   * batch, so they are no longer reversible.
   */
  async purgeTrash(batchId?: string, options: { logger?: Logger } = {}): Promise<PurgeReport> {
    const logger = options.logger ?? defaultLogger;
    const log = await this.read();
    const report: PurgeReport = { purged: 0, failed: 0, method: { trash: 0, permanent: 0 } };

    for (const batch of log.batches) {
      if (batchId && batch.id !== batchId) {
        continue;
      }

      const kept: UndoEntry[] = [];

      for (const entry of batch.entries) {
        if (entry.operation !== 'trash') {
          kept.push(entry);
          continue;
        }

        if (!(await pathExists(entry.target))) {
          continue;
        }

        const method = await discardFile(entry.target, logger);

        if (!method) {
          report.failed++;
          kept.push(entry);
          continue;
        }

        report.purged++;
        report.method[method]++;

        if (entry.createdDir) {
          await pruneCreatedDirectories(dirname(entry.target), entry.createdDir, logger);
        }
      }

      batch.entries = kept;
    }

    await this.write(log);

    return report;
  }
}

async function discardFile(path: string, logger: Logger): Promise<'trash' | 'permanent' | null> {
  try {
    await trash(path);
    return 'trash';
  } catch {
    logger.warn(`Could not move ${path} to the system trash, deleting permanently`);
  }

  try {
    await unlink(path);
    return 'permanent';
  } catch (error) {
    logger.error(`Could not delete ${path}`, error);
    return null;
  }
}

async function restoreRecord(entry: UndoEntry, store: TrackStore, logger: Logger): Promise<void> {
  try {
    if (entry.operation === 'trash') {
      await store.markRestored(entry.trackId, entry.source);
    } else {
      await store.updatePath(entry.trackId, entry.source);
    }
  } catch (error) {
    logger.warn(`File restored but track ${String(entry.trackId)} was not updated: ${errorMessage(error)}`);
  }
}

async function undoEntry(entry: UndoEntry, options: UndoOptions, logger: Logger): Promise<UndoEntryResult> {
  const retries = options.retries ?? 3;

  try {
    if (entry.operation === 'copy' || entry.operation === 'link') {
      if (await pathExists(entry.target)) {
        await withRetry(() => unlink(entry.target), retries);
      }
    } else {
      if (!(await pathExists(entry.target))) {
        return failed(entry, 'SourceMissing', `${entry.target} no longer exists`);
      }

      if (await pathExists(entry.source)) {
        return failed(entry, 'ConflictOnUndo', `${entry.source} is occupied by another file`);
      }

      await ensureDirectory(dirname(entry.source));
      await withRetry(() => moveFile(entry.target, entry.source), retries);

      if (options.store) {
        await restoreRecord(entry, options.store, logger);
      }
    }

    if (entry.createdDir) {
      await pruneCreatedDirectories(dirname(entry.target), entry.createdDir, logger);
    }

    return { entry, state: 'Undone' };
  } catch (error) {
    return failed(entry, classifyFsError(error), errorMessage(error));
  }
}
