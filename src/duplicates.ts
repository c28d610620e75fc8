import pLimit from 'p-limit';
import { computePartialHash, DEFAULT_SAMPLE_BYTES } from './hash.js';
import { errorMessage } from './errors.js';
import { logger as defaultLogger, type Logger } from './logger.js';
import type { DuplicateGroup, KeeperRule, TrackId, TrackRecord } from './types.js';

export const LOSSLESS_FORMATS = new Set(['flac', 'wav', 'aiff', 'aif', 'alac', 'ape', 'wv']);

export interface DetectOptions {
  durationToleranceSeconds?: number;
  useContentHash?: boolean;
  hashSampleBytes?: number;
  hashConcurrency?: number;
  hasher?: (path: string, sampleBytes: number) => Promise<string>;
  onHashed?: (done: number, total: number) => void;
  logger?: Logger;
}

interface KeeperChoice {
  keeper: TrackRecord;
  ruleApplied: KeeperRule;
}

export function isLossless(format: string): boolean {
  return LOSSLESS_FORMATS.has(format.trim().toLowerCase());
}

export function compareTrackIds(a: TrackId, b: TrackId): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }

  if (typeof a === 'number') {
    return -1;
  }

  if (typeof b === 'number') {
    return 1;
  }

  return comparePaths(a, b);
}

export function comparePaths(a: string, b: string): number {
  if (a < b) {
    return -1;
  }

  return a > b ? 1 : 0;
}

function isCandidate(track: TrackRecord): boolean {
  return (
    !track.deleted &&
    Number.isFinite(track.duration) &&
    track.duration > 0 &&
    track.size > 0 &&
    track.format.trim() !== ''
  );
}

function byDurationThenPath(a: TrackRecord, b: TrackRecord): number {
  return a.duration - b.duration || comparePaths(a.path, b.path) || compareTrackIds(a.id, b.id);
}

/**
 * Buckets tracks by format and exact size, then sweeps each bucket in
 * duration order so that no two members of a group differ by more than the
 * tolerance. Tracks with unknown duration, size or format never group.
 */
export function groupByCoarseKey(tracks: TrackRecord[], toleranceSeconds: number = 1): TrackRecord[][] {
  const buckets = new Map<string, TrackRecord[]>();

  for (const track of tracks) {
    if (!isCandidate(track)) {
      continue;
    }

    const key = `${track.format.trim().toLowerCase()}|${track.size}`;
    const bucket = buckets.get(key) ?? [];
    bucket.push(track);
    buckets.set(key, bucket);
  }

  const groups: TrackRecord[][] = [];

  for (const bucket of buckets.values()) {
    const sorted = [...bucket].sort(byDurationThenPath);
    let current: TrackRecord[] = [];
    let windowStart = 0;

    for (const track of sorted) {
      if (current.length > 0 && track.duration - windowStart <= toleranceSeconds) {
        current.push(track);
        continue;
      }

      if (current.length > 1) {
        groups.push(current);
      }

      current = [track];
      windowStart = track.duration;
    }

    if (current.length > 1) {
      groups.push(current);
    }
  }

  return groups;
}

async function computeHashes(
  tracks: TrackRecord[],
  options: DetectOptions,
  log: Logger
): Promise<Map<TrackId, string | null>> {
  const limit = pLimit(Math.max(1, options.hashConcurrency ?? 4));
  const hasher = options.hasher ?? computePartialHash;
  const sampleBytes = options.hashSampleBytes ?? DEFAULT_SAMPLE_BYTES;
  let done = 0;

  const results = await Promise.all(
    tracks.map((track) =>
      limit(async (): Promise<[TrackId, string | null]> => {
        if (track.contentHash) {
          return [track.id, track.contentHash];
        }

        try {
          return [track.id, await hasher(track.path, sampleBytes)];
        } catch (error) {
          log.warn(`Could not hash ${track.path}, using size/duration match only: ${errorMessage(error)}`);
          return [track.id, null];
        } finally {
          done++;
          options.onHashed?.(done, tracks.length);
        }
      })
    )
  );

  return new Map(results);
}

/**
 * Splits a coarse group by content hash. Tracks that could not be hashed keep
 * their coarse match and join the largest hash subgroup.
 */
export function splitByHash(group: TrackRecord[], hashes: Map<TrackId, string | null>): TrackRecord[][] {
  const byHash = new Map<string, TrackRecord[]>();
  const unhashed: TrackRecord[] = [];

  for (const track of group) {
    const hash = hashes.get(track.id);

    if (!hash) {
      unhashed.push(track);
      continue;
    }

    const members = byHash.get(hash) ?? [];
    members.push(track);
    byHash.set(hash, members);
  }

  if (byHash.size === 0) {
    return [group];
  }

  const subgroups = Array.from(byHash.values());

  if (unhashed.length > 0) {
    let largest = subgroups[0];

    for (const subgroup of subgroups) {
      if (subgroup.length > largest.length) {
        largest = subgroup;
      }
    }

    largest.push(...unhashed);
    largest.sort(byDurationThenPath);
  }

  return subgroups.filter((subgroup) => subgroup.length > 1);
}

function medianDuration(tracks: TrackRecord[]): number {
  const durations = tracks.map((t) => t.duration).sort((a, b) => a - b);
  const middle = Math.floor(durations.length / 2);

  if (durations.length % 2 === 1) {
    return durations[middle];
  }

  return (durations[middle - 1] + durations[middle]) / 2;
}

/**
 * Applies lossless, bitrate, closeness to the median duration, then smallest
 * path, stopping at the first rule that leaves a single candidate.
 */
export function selectKeeper(members: TrackRecord[]): KeeperChoice {
  const median = medianDuration(members);
  const rules: Array<[KeeperRule, (track: TrackRecord) => number]> = [
    ['lossless', (track) => (isLossless(track.format) ? 1 : 0)],
    ['bitrate', (track) => track.bitrate ?? 0],
    ['duration', (track) => -Math.abs(track.duration - median)],
  ];

  let candidates = members;

  for (const [rule, score] of rules) {
    const best = Math.max(...candidates.map(score));
    const remaining = candidates.filter((track) => score(track) === best);

    if (remaining.length === 1) {
      return { keeper: remaining[0], ruleApplied: rule };
    }

    candidates = remaining;
  }

  const [keeper] = [...candidates].sort((a, b) => comparePaths(a.path, b.path));

  return { keeper, ruleApplied: 'path' };
}

export async function findDuplicates(
  tracks: TrackRecord[],
  options: DetectOptions = {}
): Promise<DuplicateGroup[]> {
  const log = options.logger ?? defaultLogger;
  const useContentHash = options.useContentHash === true;
  let groups = groupByCoarseKey(tracks, options.durationToleranceSeconds ?? 1);

  if (useContentHash && groups.length > 0) {
    const hashes = await computeHashes(groups.flat(), options, log);
    groups = groups.flatMap((group) => splitByHash(group, hashes));
  }

  const matchReasons = useContentHash
    ? ['duration', 'size', 'format', 'content-hash']
    : ['duration', 'size', 'format'];

  return groups
    .map((group) => [...group].sort((a, b) => comparePaths(a.path, b.path)))
    .sort((a, b) => comparePaths(a[0].path, b[0].path))
    .map((members, index) => {
      const { keeper, ruleApplied } = selectKeeper(members);

      return {
        id: `group-${index + 1}`,
        members: members.map((track) => track.id),
        keeper: keeper.id,
        losers: members.filter((track) => track !== keeper).map((track) => track.id),
        matchReasons,
        ruleApplied,
      };
    });
}
