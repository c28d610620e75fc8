import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, readFile, readdir, rm, unlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join, relative } from 'node:path';
import { SetupError } from './errors.js';
import { executePlan } from './executor.js';
import { copyPreserving } from './fs-ops.js';
import { createLogger } from './logger.js';
import { buildPlan, planDisposals, withDisposals } from './planner.js';
import { compileTemplate } from './template.js';
import { MemoryTrackStore } from './track-store.js';
import { UndoLog } from './undo-log.js';
import type { Plan, TrackRecord } from './types.js';

const silent = createLogger('silent');
const template = compileTemplate('{Artista}/{Álbum}/{TrackNo - Título}.{ext}');

async function listTree(root: string): Promise<string[]> {
  const entries = await readdir(root, { recursive: true });
  return entries.map((entry) => relative(root, join(root, entry))).sort();
}

describe('executePlan', () => {
  let tempDir: string;
  let inDir: string;
  let libDir: string;
  let undoLog: UndoLog;

  const createTrack = async (id: number, name: string, title: string): Promise<TrackRecord> => {
    const path = join(inDir, name);
    const content = `audio-${id}-${title}`;

    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content);

    return {
      id,
      path,
      size: content.length,
      duration: 200,
      format: 'mp3',
      bitrate: 320,
      title,
      artist: 'Band',
      album: 'Record',
      albumArtist: null,
      genre: null,
      year: 2001,
      trackNumber: id,
      releaseId: null,
    };
  };

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'tidytracks-exec-'));
    inDir = join(tempDir, 'in');
    libDir = join(tempDir, 'lib');
    undoLog = new UndoLog(join(tempDir, 'data', 'undo-log.json'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('simulates without touching the filesystem', async () => {
    const tracks = [await createTrack(1, 'a.mp3', 'One'), await createTrack(2, 'b.mp3', 'Two')];
    const plan = buildPlan(tracks, template, libDir, 'move');

    await unlink(tracks[1].path);

    const report = await executePlan(plan, 'simulate', { logger: silent });

    expect(report.batchId).toBeNull();
    expect(report.succeeded).toBe(1);
    expect(report.failed).toBe(1);
    expect(report.failures[0].reason).toBe('SourceMissing');
    expect(existsSync(libDir)).toBe(false);
    expect(existsSync(tracks[0].path)).toBe(true);
    expect(await undoLog.list()).toEqual([]);
  });

  it('rejects a mode that differs from the plan', async () => {
    const plan = buildPlan([await createTrack(1, 'a.mp3', 'One')], template, libDir, 'move');

    await expect(executePlan(plan, 'copy', { undoLog, logger: silent })).rejects.toThrow(SetupError);
    await expect(executePlan(plan, 'move', { logger: silent })).rejects.toThrow('An undo log is required');
  });

  it('rejects a destination blocked by a file before any change', async () => {
    const track = await createTrack(1, 'a.mp3', 'One');
    await writeFile(libDir, 'not a directory');
    const plan = buildPlan([track], template, join(libDir, 'music'), 'move');

    await expect(executePlan(plan, 'move', { undoLog, logger: silent })).rejects.toThrow(SetupError);
    expect(existsSync(track.path)).toBe(true);
  });

  it('refuses a corrupt undo log before moving any file', async () => {
    const track = await createTrack(1, 'a.mp3', 'One');
    const plan = buildPlan([track], template, libDir, 'move');

    await mkdir(join(tempDir, 'data'), { recursive: true });
    await writeFile(undoLog.file, '{not json');

    await expect(executePlan(plan, 'move', { undoLog, logger: silent })).rejects.toThrow(
      `Undo log ${undoLog.file} cannot be read`
    );
    expect(existsSync(track.path)).toBe(true);
    expect(existsSync(libDir)).toBe(false);
  });

  it('refuses an undo log whose directory is blocked by a file', async () => {
    const track = await createTrack(1, 'a.mp3', 'One');
    const plan = buildPlan([track], template, libDir, 'move');

    await writeFile(join(tempDir, 'data'), 'not a directory');

    await expect(executePlan(plan, 'move', { undoLog, logger: silent })).rejects.toThrow(SetupError);
    expect(existsSync(track.path)).toBe(true);
    expect(existsSync(libDir)).toBe(false);
  });

  it('keeps committed copies when one entry fails and undoes exactly those', async () => {
    const tracks = [
      await createTrack(1, 'a.mp3', 'One'),
      await createTrack(2, 'b.mp3', 'Two'),
      await createTrack(3, 'c.mp3', 'Three'),
    ];
    const plan = buildPlan(tracks, template, libDir, 'copy');
    const copy = vi.fn(async (source: string, target: string) => {
      if (source === tracks[1].path) {
        throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
      }

      await copyPreserving(source, target);
    });

    const report = await executePlan(plan, 'copy', { undoLog, logger: silent, operations: { copy } });

    expect(report.attempted).toBe(3);
    expect(report.succeeded).toBe(2);
    expect(report.failed).toBe(1);
    expect(report.failures).toEqual([
      {
        source: tracks[1].path,
        target: join(libDir, 'Band', 'Record', '02 - Two.mp3'),
        reason: 'PermissionDenied',
        message: 'EACCES: permission denied',
      },
    ]);
    expect(report.results.map((result) => result.state)).toEqual(['Committed', 'Failed', 'Committed']);

    const batch = await undoLog.peek();

    expect(batch?.id).toBe(report.batchId);
    expect(batch?.entries.map((entry) => entry.target)).toEqual([
      join(libDir, 'Band', 'Record', '01 - One.mp3'),
      join(libDir, 'Band', 'Record', '03 - Three.mp3'),
    ]);

    const undo = await undoLog.undoLastBatch({ logger: silent });

    expect(undo.succeeded).toBe(2);
    expect(undo.failed).toBe(0);
    expect(existsSync(libDir)).toBe(false);
    expect(tracks.every((track) => existsSync(track.path))).toBe(true);
  });

  it('restores paths and layout after undoing a move', async () => {
    const tracks = [await createTrack(1, 'a.mp3', 'One'), await createTrack(2, 'sub/b.mp3', 'Two')];
    const store = new MemoryTrackStore(tracks);
    const before = await listTree(inDir);
    const contents = await Promise.all(tracks.map((track) => readFile(track.path, 'utf-8')));
    const plan = buildPlan(tracks, template, libDir, 'move');

    const report = await executePlan(plan, 'move', { undoLog, store, logger: silent });

    expect(report.succeeded).toBe(2);
    expect(existsSync(tracks[0].path)).toBe(false);
    expect(await readFile(join(libDir, 'Band', 'Record', '01 - One.mp3'), 'utf-8')).toBe('audio-1-One');
    expect((await store.get(1))?.path).toBe(join(libDir, 'Band', 'Record', '01 - One.mp3'));

    const undo = await undoLog.undoLastBatch({ store, logger: silent });

    expect(undo.succeeded).toBe(2);
    expect(await listTree(inDir)).toEqual(before);
    expect(await Promise.all(tracks.map((track) => readFile(track.path, 'utf-8')))).toEqual(contents);
    expect((await store.get(1))?.path).toBe(tracks[0].path);
    expect((await store.get(2))?.path).toBe(tracks[1].path);
    expect(existsSync(libDir)).toBe(false);
  });

  it('never overwrites an existing target', async () => {
    const track = await createTrack(1, 'a.mp3', 'One');
    const plan = buildPlan([track], template, libDir, 'move');
    const target = plan.entries[0].target;

    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, 'someone else');

    const report = await executePlan(plan, 'move', { undoLog, logger: silent });

    expect(report.failures.map((failure) => failure.reason)).toEqual(['TargetExists']);
    expect(await readFile(target, 'utf-8')).toBe('someone else');
    expect(existsSync(track.path)).toBe(true);
    expect((await undoLog.peek())?.entries).toEqual([]);
  });

  it('does not attempt no-ops or conflicts', async () => {
    const tracks = [await createTrack(1, 'a.mp3', 'One'), { ...(await createTrack(2, 'b.mp3', 'Two')), title: null }];
    const plan = buildPlan(tracks, template, inDir, 'move');
    const inPlace: Plan = {
      ...plan,
      entries: [{ trackId: 1, source: tracks[0].path, target: tracks[0].path, operation: 'noop' }, plan.entries[1]],
    };

    const report = await executePlan(inPlace, 'move', { undoLog, logger: silent });

    expect(report.attempted).toBe(0);
    expect(report.skipped).toBe(1);
    expect(report.conflicts).toBe(1);
    expect(await undoLog.list()).toHaveLength(1);
  });

  it('stops between entries when cancelled and still seals the batch', async () => {
    const tracks = [
      await createTrack(1, 'a.mp3', 'One'),
      await createTrack(2, 'b.mp3', 'Two'),
      await createTrack(3, 'c.mp3', 'Three'),
    ];
    const plan = buildPlan(tracks, template, libDir, 'copy');
    const controller = new AbortController();

    const report = await executePlan(plan, 'copy', {
      undoLog,
      logger: silent,
      signal: controller.signal,
      onProgress: () => controller.abort(),
    });

    expect(report.cancelled).toBe(true);
    expect(report.succeeded).toBe(1);
    expect(report.results.map((result) => result.state)).toEqual(['Committed', 'Pending', 'Pending']);
    expect((await undoLog.peek())?.entries).toHaveLength(1);
  });

  it('moves duplicate losers into the safe-trash and restores them on undo', async () => {
    const keeper = await createTrack(1, 'keep/song.mp3', 'Song');
    const loser = await createTrack(2, 'other/song.mp3', 'Song');
    const store = new MemoryTrackStore([keeper, loser]);
    const trashDir = join(tempDir, 'data', 'trash', 'p1');
    const base = buildPlan([keeper], template, libDir, 'move');
    const plan = withDisposals(
      base,
      planDisposals(
        [{ id: 'group-1', members: [1, 2], keeper: 1, losers: [2], matchReasons: [], ruleApplied: 'path' }],
        [keeper, loser],
        'delete',
        { trashDir }
      )
    );

    const report = await executePlan(plan, 'move', { undoLog, store, logger: silent });

    expect(report.succeeded).toBe(2);
    expect(existsSync(join(trashDir, 'song.mp3'))).toBe(true);
    expect((await store.get(2))?.deleted).toBe(true);
    expect((await undoLog.peek())?.entries[1]).toMatchObject({ operation: 'trash', trashPath: join(trashDir, 'song.mp3') });

    await undoLog.undoLastBatch({ store, logger: silent });

    expect(existsSync(loser.path)).toBe(true);
    expect(await store.get(2)).toMatchObject({ path: loser.path, deleted: false });
  });
});
