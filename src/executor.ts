import { randomUUID } from 'node:crypto';
import { dirname } from 'node:path';
import { SetupError, classifyFsError, errorMessage } from './errors.js';
import {
  assertReadableFile,
  assertWritableLocation,
  copyPreserving,
  ensureDirectory,
  linkFile,
  moveFile,
  pathExists,
  pruneCreatedDirectories,
  withRetry,
  type LinkKind,
} from './fs-ops.js';
import { logger as defaultLogger, type Logger } from './logger.js';
import { withStoreBatch, type TrackStore } from './track-store.js';
import type { UndoLog } from './undo-log.js';
import type {
  EntryResult,
  ExecutionMode,
  ExecutionReport,
  FailureDetail,
  FailureReason,
  Plan,
  PlanEntry,
  UndoEntry,
  UndoOperation,
} from './types.js';

export interface FileOperations {
  move(source: string, target: string): Promise<void>;
  copy(source: string, target: string): Promise<void>;
  link(source: string, target: string): Promise<LinkKind>;
}

const NODE_FILE_OPERATIONS: FileOperations = {
  move: moveFile,
  copy: copyPreserving,
  link: linkFile,
};

export interface ExecuteOptions {
  undoLog?: UndoLog;
  store?: TrackStore;
  logger?: Logger;
  retries?: number;
  signal?: AbortSignal;
  operations?: Partial<FileOperations>;
  onProgress?: (result: EntryResult, done: number, total: number) => void;
}

class EntryFailure extends Error {
  constructor(
    public readonly reason: FailureReason,
    message: string
  ) {
    super(message);
    this.name = 'EntryFailure';
  }
}

function toFailure(error: unknown): EntryFailure {
  return error instanceof EntryFailure ? error : new EntryFailure(classifyFsError(error), errorMessage(error));
}

function isActionable(entry: PlanEntry): entry is PlanEntry & { operation: UndoOperation } {
  return entry.operation !== 'noop' && entry.operation !== 'conflict';
}

async function verifyEntry(entry: PlanEntry): Promise<void> {
  try {
    await assertReadableFile(entry.source);
  } catch (error) {
    throw toFailure(error);
  }

  if (await pathExists(entry.target)) {
    throw new EntryFailure('TargetExists', `${entry.target} already exists`);
  }
}

async function simulate(plan: Plan, logger: Logger): Promise<ExecutionReport> {
  const results: EntryResult[] = [];

  for (const entry of plan.entries) {
    if (!isActionable(entry)) {
      results.push({ entry, state: 'Pending' });
      continue;
    }

    try {
      await verifyEntry(entry);
      results.push({ entry, state: 'Pending' });
    } catch (error) {
      const failure = toFailure(error);
      results.push({ entry, state: 'Failed', failure: failure.reason, message: failure.message });
    }
  }

  const report = buildReport(null, 'simulate', results, false);
  logger.info(`Simulation: ${report.succeeded} would apply, ${report.failed} would fail`);

  return report;
}

function buildReport(
  batchId: string | null,
  mode: ExecutionMode,
  results: EntryResult[],
  cancelled: boolean
): ExecutionReport {
  const failures: FailureDetail[] = [];
  let attempted = 0;
  let succeeded = 0;
  let skipped = 0;
  let conflicts = 0;

  for (const result of results) {
    const { entry } = result;

    if (entry.operation === 'noop') {
      skipped++;
      continue;
    }

    if (entry.operation === 'conflict') {
      conflicts++;
      continue;
    }

    if (result.state === 'Failed') {
      attempted++;
      failures.push({
        source: entry.source,
        target: entry.target,
        reason: result.failure ?? 'IOError',
        message: result.message ?? '',
      });
    } else if (result.state === 'Committed' || mode === 'simulate') {
      attempted++;
      succeeded++;
    }
  }

  return {
    batchId,
    mode,
    attempted,
    succeeded,
    failed: failures.length,
    skipped,
    conflicts,
    cancelled,
    results,
    failures,
  };
}

/**
 * Applies a plan entry by entry. Each entry is verified, applied and
 * committed on its own, so one failure never stops the rest of the batch.
 * Committed entries are sealed into the undo log as a single batch.
 */
export async function executePlan(
  plan: Plan,
  mode: ExecutionMode,
  options: ExecuteOptions = {}
): Promise<ExecutionReport> {
  const logger = options.logger ?? defaultLogger;

  if (mode === 'simulate') {
    return simulate(plan, logger);
  }

  if (mode !== plan.operation) {
    throw new SetupError(`Plan was built for ${plan.operation} but execution mode is ${mode}`);
  }

  const { undoLog } = options;

  if (!undoLog) {
    throw new SetupError('An undo log is required to execute a plan');
  }

  await assertWritableLocation(plan.destinationRoot, 'Destination');
  await undoLog.assertWritable();

  const retries = options.retries ?? 3;
  const operations: FileOperations = { ...NODE_FILE_OPERATIONS, ...options.operations };
  const results: EntryResult[] = [];
  const undoEntries: UndoEntry[] = [];
  let cancelled = false;

  const applyAll = async (): Promise<void> => {
    for (const entry of plan.entries) {
      if (!isActionable(entry)) {
        results.push({ entry, state: 'Pending' });
        continue;
      }

      if (cancelled || options.signal?.aborted) {
        cancelled = true;
        results.push({ entry, state: 'Pending' });
        continue;
      }

      const result = await applyEntry(entry, operations, retries, logger);
      results.push(result.outcome);

      if (result.undo) {
        undoEntries.push(result.undo);

        if (options.store) {
          await commitRecord(entry, options.store, logger);
        }
      } else {
        logger.warn(`${entry.source}: ${result.outcome.failure} (${result.outcome.message})`);
      }

      options.onProgress?.(result.outcome, results.length, plan.entries.length);
    }
  };

  await withStoreBatch(options.store, applyAll, logger);

  const batchId = randomUUID();

  await undoLog.seal({
    id: batchId,
    planId: plan.id,
    mode,
    sealedAt: new Date().toISOString(),
    entries: undoEntries,
  });

  const report = buildReport(batchId, mode, results, cancelled);

  logger.info(
    `Batch ${batchId}: ${report.succeeded} committed, ${report.failed} failed, ` +
      `${report.conflicts} conflicts, ${report.skipped} unchanged`
  );

  if (cancelled) {
    logger.warn('Execution was cancelled; remaining entries were left pending');
  }

  return report;
}

async function applyEntry(
  entry: PlanEntry & { operation: UndoOperation },
  operations: FileOperations,
  retries: number,
  logger: Logger
): Promise<{ outcome: EntryResult; undo?: UndoEntry }> {
  let createdDir: string | undefined;

  try {
    await verifyEntry(entry);
    createdDir = await withRetry(() => ensureDirectory(dirname(entry.target)), retries);

    let linkKind: LinkKind | undefined;

    switch (entry.operation) {
      case 'copy':
        await withRetry(() => operations.copy(entry.source, entry.target), retries);
        break;
      case 'link':
        linkKind = await withRetry(() => operations.link(entry.source, entry.target), retries);
        break;
      default:
        await withRetry(() => operations.move(entry.source, entry.target), retries);
    }

    const undo: UndoEntry = {
      trackId: entry.trackId,
      source: entry.source,
      target: entry.target,
      operation: entry.operation,
      appliedAt: new Date().toISOString(),
    };

    if (linkKind) {
      undo.linkKind = linkKind;
    }

    if (createdDir) {
      undo.createdDir = createdDir;
    }

    if (entry.operation === 'trash') {
      undo.trashPath = entry.target;
    }

    return { outcome: { entry, state: 'Committed' }, undo };
  } catch (error) {
    if (createdDir) {
      await pruneCreatedDirectories(dirname(entry.target), createdDir, logger);
    }

    const failure = toFailure(error);

    return { outcome: { entry, state: 'Failed', failure: failure.reason, message: failure.message } };
  }
}

async function commitRecord(entry: PlanEntry, store: TrackStore, logger: Logger): Promise<void> {
  try {
    switch (entry.operation) {
      case 'move':
      case 'quarantine':
        await store.updatePath(entry.trackId, entry.target);
        break;
      case 'trash':
        await store.markDeleted(entry.trackId);
        break;
      default:
        break;
    }
  } catch (error) {
    logger.warn(`File applied but track ${String(entry.trackId)} was not updated: ${errorMessage(error)}`);
  }
}
