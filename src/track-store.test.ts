import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { StoreError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { MemoryTrackStore, NdjsonTrackStore, parseTrackRecord, withStoreBatch } from './track-store.js';
import type { TrackInput } from './types.js';

const createInput = (path: string, overrides: Partial<TrackInput> = {}): TrackInput => ({
  path,
  size: 1000,
  duration: 200,
  format: 'mp3',
  bitrate: 320,
  title: 'Song',
  artist: 'Artist',
  album: 'Album',
  albumArtist: null,
  genre: null,
  year: 2001,
  trackNumber: 1,
  releaseId: null,
  ...overrides,
});

describe('MemoryTrackStore', () => {
  let store: MemoryTrackStore;

  beforeEach(() => {
    store = new MemoryTrackStore();
  });

  it('assigns ids and keeps them when a path is ingested again', async () => {
    const first = await store.upsert(createInput('/music/a.mp3'));
    const second = await store.upsert(createInput('/music/b.mp3'));
    const again = await store.upsert(createInput('/music/a.mp3', { title: 'Renamed' }));

    expect([first.id, second.id, again.id]).toEqual([1, 2, 1]);
    expect((await store.get(1))?.title).toBe('Renamed');
    expect(await store.load()).toHaveLength(2);
  });

  it('continues numbering after adopted records', async () => {
    const seeded = new MemoryTrackStore([{ ...createInput('/music/a.mp3'), id: 7 }]);

    expect((await seeded.upsert(createInput('/music/b.mp3'))).id).toBe(8);
  });

  it('filters by prefix, year, ids and deletion', async () => {
    await store.upsert(createInput('/music/rock/a.mp3'));
    await store.upsert(createInput('/music/jazz/b.mp3', { year: null }));
    await store.upsert(createInput('/music/rockabilly/c.mp3'));
    await store.markDeleted(3);

    expect((await store.load({ pathPrefix: '/music/rock' })).map((track) => track.id)).toEqual([1]);
    expect((await store.load({ requireYear: true })).map((track) => track.id)).toEqual([1]);
    expect((await store.load({ ids: [2, 3] })).map((track) => track.id)).toEqual([2]);
    expect((await store.load({ includeDeleted: true })).map((track) => track.id)).toEqual([1, 2, 3]);
  });

  it('returns copies', async () => {
    await store.upsert(createInput('/music/a.mp3'));

    const [loaded] = await store.load();
    loaded.path = '/elsewhere.mp3';

    expect((await store.get(1))?.path).toBe('/music/a.mp3');
  });

  it('keeps active paths unique', async () => {
    await store.upsert(createInput('/music/a.mp3'));
    await store.upsert(createInput('/music/b.mp3'));

    await expect(store.updatePath(2, '/music/a.mp3')).rejects.toThrow(StoreError);
    await expect(store.updatePath(9, '/music/c.mp3')).rejects.toThrow('Unknown track 9');
  });

  it('restores a deleted record at its original path', async () => {
    await store.upsert(createInput('/music/a.mp3'));
    await store.updatePath(1, '/trash/a.mp3');
    await store.markDeleted(1);
    await store.markRestored(1, '/music/a.mp3');

    expect(await store.get(1)).toMatchObject({ path: '/music/a.mp3', deleted: false });
  });
});

describe('NdjsonTrackStore', () => {
  let tempDir: string;
  let file: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'tidytracks-store-'));
    file = join(tempDir, 'tracks.ndjson');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', async () => {
    expect(await new NdjsonTrackStore(file).load()).toEqual([]);
  });

  it('persists one record per line and reloads them', async () => {
    const store = new NdjsonTrackStore(file);

    await store.upsert(createInput('/music/a.mp3'));
    await store.upsert(createInput('/music/b.mp3'));
    await store.updatePath(2, '/library/b.mp3');

    const lines = (await readFile(file, 'utf-8')).trim().split('\n');
    const reloaded = new NdjsonTrackStore(file);

    expect(lines).toHaveLength(2);
    expect((await reloaded.get(2))?.path).toBe('/library/b.mp3');
    expect((await reloaded.upsert(createInput('/music/c.mp3'))).id).toBe(3);
  });

  it('reads the file again when the first read failed', async () => {
    await mkdir(file);
    const store = new NdjsonTrackStore(file);

    await expect(store.load()).rejects.toMatchObject({ code: 'EISDIR' });

    await rm(file, { recursive: true });
    await writeFile(file, JSON.stringify({ ...createInput('/music/a.mp3'), id: 1 }) + '\n');

    expect((await store.load()).map((track) => track.id)).toEqual([1]);
  });

  it('writes a batch of changes once, when the batch settles', async () => {
    const store = new NdjsonTrackStore(file);
    const storedPaths = async (): Promise<string[]> =>
      (await readFile(file, 'utf-8'))
        .trim()
        .split('\n')
        .map((line) => parseTrackRecord(line)?.path ?? '');

    await store.upsert(createInput('/music/a.mp3'));

    await store.batch(async () => {
      await store.updatePath(1, '/library/a.mp3');
      await store.upsert(createInput('/music/b.mp3'));

      expect(await storedPaths()).toEqual(['/music/a.mp3']);
    });

    expect(await storedPaths()).toEqual(['/library/a.mp3', '/music/b.mp3']);
  });

  it('skips lines that are not track records', async () => {
    await writeFile(
      file,
      [JSON.stringify({ ...createInput('/music/a.mp3'), id: 1 }), JSON.stringify({ id: 2, path: '/music/b.mp3' }), ''].join('\n')
    );

    expect((await new NdjsonTrackStore(file).load()).map((track) => track.id)).toEqual([1]);
  });
});

describe('withStoreBatch', () => {
  class UnsavableStore extends MemoryTrackStore {
    protected override async persist(): Promise<void> {
      throw new Error('disk full');
    }
  }

  it('logs records that could not be saved after the work finished', async () => {
    const store = new UnsavableStore([{ ...createInput('/music/a.mp3'), id: 1 }]);
    const warn = vi.fn<(message: string) => void>();
    const logger: Logger = { ...createLogger('silent'), warn };

    await withStoreBatch(store, () => store.markDeleted(1), logger);

    expect(warn).toHaveBeenCalledWith('Track records could not be saved: disk full');
    expect((await store.get(1))?.deleted).toBe(true);
  });

  it('passes on failures of the work itself', async () => {
    const store = new MemoryTrackStore();

    await expect(withStoreBatch(store, () => store.updatePath(4, '/x.mp3'), createLogger('silent'))).rejects.toThrow(
      'Unknown track 4'
    );
  });
});

describe('parseTrackRecord', () => {
  it('fills absent tags with null', () => {
    expect(
      parseTrackRecord(JSON.stringify({ id: 'x1', path: '/a.mp3', size: 1, duration: 2, format: 'mp3' }))
    ).toEqual({
      id: 'x1',
      path: '/a.mp3',
      size: 1,
      duration: 2,
      format: 'mp3',
      bitrate: null,
      title: null,
      artist: null,
      album: null,
      albumArtist: null,
      genre: null,
      year: null,
      trackNumber: null,
      releaseId: null,
      contentHash: null,
      deleted: false,
    });
  });

  it('rejects records with mistyped fields', () => {
    expect(parseTrackRecord(JSON.stringify({ id: 1, path: '/a.mp3', size: '1', duration: 2, format: 'mp3' }))).toBeNull();
    expect(parseTrackRecord('"just a string"')).toBeNull();
  });
});
