import { describe, it, expect, vi } from 'vitest';
import { findDuplicates, groupByCoarseKey, selectKeeper, splitByHash } from './duplicates.js';
import { createLogger } from './logger.js';
import type { TrackId, TrackRecord } from './types.js';

const silent = createLogger('silent');

const createTrack = (overrides: Partial<TrackRecord> & Pick<TrackRecord, 'id' | 'path'>): TrackRecord => ({
  size: 8_388_608,
  duration: 245,
  format: 'mp3',
  bitrate: 320,
  title: 'Song',
  artist: 'Artist',
  album: 'Album',
  albumArtist: null,
  genre: null,
  year: null,
  trackNumber: null,
  releaseId: null,
  ...overrides,
});

function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) {
    return [items];
  }

  return items.flatMap((item, index) =>
    permutations([...items.slice(0, index), ...items.slice(index + 1)]).map((rest) => [item, ...rest])
  );
}

describe('findDuplicates', () => {
  it('groups tracks matching on duration, size and format and keeps the higher bitrate', async () => {
    const low = createTrack({ id: 1, path: '/music/a.mp3', bitrate: 128 });
    const high = createTrack({ id: 2, path: '/music/b.mp3', bitrate: 320, duration: 245.4 });

    const groups = await findDuplicates([low, high]);

    expect(groups).toEqual([
      {
        id: 'group-1',
        members: [1, 2],
        keeper: 2,
        losers: [1],
        matchReasons: ['duration', 'size', 'format'],
        ruleApplied: 'bitrate',
      },
    ]);
  });

  it('does not emit groups of one', async () => {
    const groups = await findDuplicates([
      createTrack({ id: 1, path: '/music/a.mp3' }),
      createTrack({ id: 2, path: '/music/b.mp3', size: 100 }),
      createTrack({ id: 3, path: '/music/c.mp3', format: 'ogg' }),
    ]);

    expect(groups).toEqual([]);
  });

  it('ignores tracks with unknown duration, size or format', async () => {
    const groups = await findDuplicates([
      createTrack({ id: 1, path: '/music/a.mp3', duration: 0 }),
      createTrack({ id: 2, path: '/music/b.mp3', duration: 0 }),
      createTrack({ id: 3, path: '/music/c.mp3', deleted: true }),
      createTrack({ id: 4, path: '/music/d.mp3' }),
    ]);

    expect(groups).toEqual([]);
  });

  it('produces the same groups for every input order', async () => {
    const tracks = [
      createTrack({ id: 1, path: '/music/a.mp3', bitrate: 192 }),
      createTrack({ id: 2, path: '/music/b.mp3', bitrate: 320, duration: 244.5 }),
      createTrack({ id: 3, path: '/music/c.mp3', bitrate: 320, duration: 245.5 }),
      createTrack({ id: 4, path: '/music/d.mp3', size: 42 }),
    ];

    const expected = await findDuplicates(tracks);

    expect(expected).toHaveLength(1);
    expect(expected[0].members).toEqual([1, 2, 3]);

    for (const order of permutations(tracks)) {
      expect(await findDuplicates(order)).toEqual(expected);
    }
  });

  it('splits coarse groups whose content hashes disagree', async () => {
    const hashes: Record<string, string> = {
      '/music/a.mp3': 'h1',
      '/music/b.mp3': 'h1',
      '/music/c.mp3': 'h2',
    };
    const hasher = vi.fn(async (path: string) => hashes[path]);

    const groups = await findDuplicates(
      [
        createTrack({ id: 1, path: '/music/a.mp3' }),
        createTrack({ id: 2, path: '/music/b.mp3' }),
        createTrack({ id: 3, path: '/music/c.mp3' }),
      ],
      { useContentHash: true, hasher, logger: silent }
    );

    expect(hasher).toHaveBeenCalledTimes(3);
    expect(groups).toHaveLength(1);
    expect(groups[0].members).toEqual([1, 2]);
    expect(groups[0].matchReasons).toEqual(['duration', 'size', 'format', 'content-hash']);
  });

  it('falls back to the coarse match when a file cannot be hashed', async () => {
    const hasher = vi.fn(async (path: string) => {
      if (path === '/music/c.mp3') {
        throw new Error('EACCES: permission denied');
      }

      return 'h1';
    });

    const groups = await findDuplicates(
      [
        createTrack({ id: 1, path: '/music/a.mp3' }),
        createTrack({ id: 2, path: '/music/b.mp3' }),
        createTrack({ id: 3, path: '/music/c.mp3' }),
      ],
      { useContentHash: true, hasher, logger: silent }
    );

    expect(groups).toHaveLength(1);
    expect(groups[0].members).toEqual([1, 2, 3]);
  });

  it('reuses stored content hashes', async () => {
    const hasher = vi.fn(async () => 'fresh');

    await findDuplicates(
      [
        createTrack({ id: 1, path: '/music/a.mp3', contentHash: 'stored' }),
        createTrack({ id: 2, path: '/music/b.mp3', contentHash: 'stored' }),
      ],
      { useContentHash: true, hasher, logger: silent }
    );

    expect(hasher).not.toHaveBeenCalled();
  });
});

describe('groupByCoarseKey', () => {
  it('bounds each group by the tolerance from its shortest member', () => {
    const groups = groupByCoarseKey([
      createTrack({ id: 1, path: '/music/a.mp3', duration: 100 }),
      createTrack({ id: 2, path: '/music/b.mp3', duration: 100.8 }),
      createTrack({ id: 3, path: '/music/c.mp3', duration: 101.5 }),
    ]);

    expect(groups.map((group) => group.map((track) => track.id))).toEqual([[1, 2]]);
  });
});

describe('splitByHash', () => {
  it('drops subgroups left with a single member', () => {
    const a = createTrack({ id: 1, path: '/music/a.mp3' });
    const b = createTrack({ id: 2, path: '/music/b.mp3' });

    const groups = splitByHash(
      [a, b],
      new Map<TrackId, string | null>([
        [1, 'h1'],
        [2, 'h2'],
      ])
    );

    expect(groups).toEqual([]);
  });
});

describe('selectKeeper', () => {
  it('prefers a lossless track regardless of order', () => {
    const flac = createTrack({ id: 1, path: '/music/z.flac', format: 'flac', bitrate: 900 });
    const mp3 = createTrack({ id: 2, path: '/music/a.mp3', format: 'mp3', bitrate: 900 });

    expect(selectKeeper([flac, mp3])).toEqual({ keeper: flac, ruleApplied: 'lossless' });
    expect(selectKeeper([mp3, flac])).toEqual({ keeper: flac, ruleApplied: 'lossless' });
  });

  it('prefers the duration closest to the median', () => {
    const short = createTrack({ id: 1, path: '/music/a.mp3', duration: 200 });
    const middle = createTrack({ id: 2, path: '/music/b.mp3', duration: 200.5 });
    const long = createTrack({ id: 3, path: '/music/c.mp3', duration: 201 });

    expect(selectKeeper([short, middle, long])).toEqual({ keeper: middle, ruleApplied: 'duration' });
  });

  it('falls back to the smallest path', () => {
    const a = createTrack({ id: 1, path: '/music/b.mp3' });
    const b = createTrack({ id: 2, path: '/music/a.mp3' });

    expect(selectKeeper([a, b])).toEqual({ keeper: b, ruleApplied: 'path' });
  });
});
