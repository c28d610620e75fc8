import { readFile } from 'node:fs/promises';
import { resolve, sep } from 'node:path';
import { StoreError, errorMessage } from './errors.js';
import { writeFileDurable } from './fs-ops.js';
import type { Logger } from './logger.js';
import type { TrackFilter, TrackId, TrackInput, TrackRecord } from './types.js';

export interface TrackStore {
  load(filter?: TrackFilter): Promise<TrackRecord[]>;
  get(id: TrackId): Promise<TrackRecord | null>;
  upsert(input: TrackInput): Promise<TrackRecord>;
  updatePath(id: TrackId, newPath: string): Promise<void>;
  markDeleted(id: TrackId): Promise<void>;
  markRestored(id: TrackId, path: string): Promise<void>;
  /** Runs `work` with every change inside it written once, when it settles. */
  batch<T>(work: () => Promise<T>): Promise<T>;
}

/**
 * Runs `work` as one store batch. Once `work` has finished, a failure to save
 * the records is logged rather than thrown, since the files have already changed.
 */
export async function withStoreBatch(
  store: TrackStore | undefined,
  work: () => Promise<void>,
  logger: Logger
): Promise<void> {
  if (!store) {
    await work();
    return;
  }

  let finished = false;

  try {
    await store.batch(async () => {
      await work();
      finished = true;
    });
  } catch (error) {
    if (!finished) {
      throw error;
    }

    logger.warn(`Track records could not be saved: ${errorMessage(error)}`);
  }
}

function isWithinPrefix(path: string, prefix: string): boolean {
  return path === prefix || path.startsWith(prefix.endsWith(sep) ? prefix : prefix + sep);
}

export class MemoryTrackStore implements TrackStore {
  protected readonly records = new Map<TrackId, TrackRecord>();
  private nextId = 1;
  private batchDepth = 0;
  private dirty = false;

  constructor(records: TrackRecord[] = []) {
    for (const record of records) {
      this.adopt(record);
    }
  }

  protected adopt(record: TrackRecord): void {
    this.records.set(record.id, { ...record });

    if (typeof record.id === 'number' && record.id >= this.nextId) {
      this.nextId = record.id + 1;
    }
  }

  protected async ready(): Promise<void> {}

  protected async persist(): Promise<void> {}

  private async changed(): Promise<void> {
    if (this.batchDepth > 0) {
      this.dirty = true;
      return;
    }

    await this.persist();
  }

  async batch<T>(work: () => Promise<T>): Promise<T> {
    await this.ready();
    this.batchDepth++;

    try {
      return await work();
    } finally {
      this.batchDepth--;

      if (this.batchDepth === 0 && this.dirty) {
        this.dirty = false;
        await this.persist();
      }
    }
  }

  private activeHolder(path: string): TrackRecord | null {
    for (const record of this.records.values()) {
      if (!record.deleted && record.path === path) {
        return record;
      }
    }

    return null;
  }

  private require(id: TrackId): TrackRecord {
    const record = this.records.get(id);

    if (!record) {
      throw new StoreError(`Unknown track ${String(id)}`);
    }

    return record;
  }

  private assertPathFree(path: string, id: TrackId): void {
    const holder = this.activeHolder(path);

    if (holder && holder.id !== id) {
      throw new StoreError(`Path ${path} already belongs to track ${String(holder.id)}`);
    }
  }

  async load(filter: TrackFilter = {}): Promise<TrackRecord[]> {
    await this.ready();

    const prefix = filter.pathPrefix ? resolve(filter.pathPrefix) : null;
    const ids = filter.ids ? new Set<TrackId>(filter.ids) : null;

    return Array.from(this.records.values())
      .filter((record) => filter.includeDeleted || !record.deleted)
      .filter((record) => !prefix || isWithinPrefix(record.path, prefix))
      .filter((record) => !filter.requireYear || Boolean(record.year))
      .filter((record) => !ids || ids.has(record.id))
      .map((record) => ({ ...record }));
  }

  async get(id: TrackId): Promise<TrackRecord | null> {
    await this.ready();

    const record = this.records.get(id);

    return record ? { ...record } : null;
  }

  async upsert(input: TrackInput): Promise<TrackRecord> {
    await this.ready();

    const path = resolve(input.path);
    const existing = this.activeHolder(path);
    const record: TrackRecord = existing
      ? { ...existing, ...input, path, id: existing.id }
      : { ...input, path, id: this.nextId++ };

    this.records.set(record.id, record);
    await this.changed();

    return { ...record };
  }

  async updatePath(id: TrackId, newPath: string): Promise<void> {
    await this.ready();

    const record = this.require(id);
    const path = resolve(newPath);

    this.assertPathFree(path, id);
    record.path = path;
    await this.changed();
  }

  async markDeleted(id: TrackId): Promise<void> {
    await this.ready();

    this.require(id).deleted = true;
    await this.changed();
  }

  async markRestored(id: TrackId, path: string): Promise<void> {
    await this.ready();

    const record = this.require(id);
    const restoredPath = resolve(path);

    this.assertPathFree(restoredPath, id);
    record.path = restoredPath;
    record.deleted = false;
    await this.changed();
  }
}

function optionalString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

function optionalNumber(value: unknown): value is number | null {
  return value === null || typeof value === 'number';
}

export function parseTrackRecord(line: string): TrackRecord | null {
  const value: unknown = JSON.parse(line);

  if (typeof value !== 'object' || value === null) {
    return null;
  }

  const record: Record<string, unknown> = { ...value };
  const { id, path, size, duration, format, bitrate } = record;

  if (
    (typeof id !== 'number' && typeof id !== 'string') ||
    typeof path !== 'string' ||
    typeof size !== 'number' ||
    typeof duration !== 'number' ||
    typeof format !== 'string' ||
    !optionalNumber(bitrate ?? null)
  ) {
    return null;
  }

  const text = (key: string): string | null => {
    const field = record[key] ?? null;
    return optionalString(field) ? field : null;
  };

  const num = (key: string): number | null => {
    const field = record[key] ?? null;
    return optionalNumber(field) ? field : null;
  };

  return {
    id,
    path,
    size,
    duration,
    format,
    bitrate: num('bitrate'),
    title: text('title'),
    artist: text('artist'),
    album: text('album'),
    albumArtist: text('albumArtist'),
    genre: text('genre'),
    year: num('year'),
    trackNumber: num('trackNumber'),
    releaseId: text('releaseId'),
    contentHash: text('contentHash'),
    deleted: record.deleted === true,
  };
}

/** One JSON record per line, rewritten whole after every change or batch of changes. */
export class NdjsonTrackStore extends MemoryTrackStore {
  private loaded = false;

  constructor(private readonly file: string) {
    super();
  }

  protected override async ready(): Promise<void> {
    if (this.loaded) {
      return;
    }

    let data: string;

    try {
      data = await readFile(this.file, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.loaded = true;
        return;
      }

      throw error;
    }

    for (const line of data.split('\n').filter(Boolean)) {
      const record = parseTrackRecord(line);

      if (record) {
        this.adopt(record);
      }
    }

    this.loaded = true;
  }

  protected override async persist(): Promise<void> {
    const lines = Array.from(this.records.values()).map((record) => JSON.stringify(record));
    await writeFileDurable(this.file, lines.length > 0 ? lines.join('\n') + '\n' : '');
  }
}
