import { randomUUID } from 'node:crypto';
import { basename, dirname, extname, join, resolve } from 'node:path';
import { RenderError, SetupError } from './errors.js';
import { albumKey, findCompilations, renderPath } from './template.js';
import type {
  Disposition,
  DuplicateGroup,
  FileOperation,
  Plan,
  PlanAdjustment,
  PlanEntry,
  PlanOperation,
  PlanRow,
  SkippedTrack,
  TemplatePlan,
  TrackId,
  TrackRecord,
} from './types.js';

const MAX_DISAMBIGUATION = 1000;

export interface PlanOptions {
  requireYear?: boolean;
  albumMode?: 'tags' | 'release';
  fallbackToTags?: boolean;
  fallbackTemplate?: TemplatePlan;
  exclude?: Iterable<TrackId>;
}

export interface DisposalOptions {
  quarantineDir?: string | null;
  trashDir: string;
}

interface RenderedTrack {
  track: TrackRecord;
  source: string;
  target: string | null;
  missingField?: string;
}

export function disambiguatedPath(path: string, n: number): string {
  const ext = extname(path);
  const stem = basename(path, ext);

  return join(dirname(path), `${stem} (${n})${ext}`);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** True when `source` is `target` renamed with a " (n)" suffix by an earlier run. */
export function isSuffixedVariant(source: string, target: string): boolean {
  if (dirname(source) !== dirname(target)) {
    return false;
  }

  const ext = extname(target);
  const stem = basename(target, ext);
  const pattern = new RegExp(`^${escapeRegExp(stem)} \\(([2-9]|[1-9]\\d+)\\)${escapeRegExp(ext)}$`);

  return pattern.test(basename(source));
}

function isInPlace(item: RenderedTrack): boolean {
  return item.target !== null && (item.target === item.source || isSuffixedVariant(item.source, item.target));
}

function isIdenticalContent(a: TrackRecord, b: TrackRecord): boolean {
  return Boolean(a.contentHash) && a.contentHash === b.contentHash && a.size === b.size;
}

function selectTracks(
  tracks: TrackRecord[],
  template: TemplatePlan,
  options: PlanOptions
): { selected: Array<[TrackRecord, TemplatePlan]>; skipped: SkippedTrack[] } {
  const excluded = new Set<TrackId>(options.exclude ?? []);
  const selected: Array<[TrackRecord, TemplatePlan]> = [];
  const skipped: SkippedTrack[] = [];

  for (const track of tracks) {
    if (track.deleted) {
      continue;
    }

    if (excluded.has(track.id)) {
      skipped.push({ trackId: track.id, path: track.path, reason: 'duplicate-loser' });
      continue;
    }

    if (options.requireYear && !track.year) {
      skipped.push({ trackId: track.id, path: track.path, reason: 'missing-year' });
      continue;
    }

    if (options.albumMode === 'release' && !track.releaseId) {
      if (!options.fallbackToTags || !options.fallbackTemplate) {
        skipped.push({ trackId: track.id, path: track.path, reason: 'missing-release' });
        continue;
      }

      selected.push([track, options.fallbackTemplate]);
      continue;
    }

    selected.push([track, template]);
  }

  return { selected, skipped };
}

function renderAll(
  selected: Array<[TrackRecord, TemplatePlan]>,
  root: string,
  compilations: Set<string>
): RenderedTrack[] {
  return selected.map(([track, template]) => {
    const source = resolve(track.path);
    const key = albumKey(track);

    try {
      const relative = renderPath(template, track, { compilation: key !== null && compilations.has(key) });
      return { track, source, target: resolve(root, relative) };
    } catch (error) {
      if (error instanceof RenderError) {
        return { track, source, target: null, missingField: error.field };
      }

      throw error;
    }
  });
}

/**
 * Maps every track to its target under the destination root. Tracks already
 * in place claim their path first; remaining collisions get a " (n)" suffix in
 * input order. A target that is the source of another moving track is a
 * conflict, never a swap.
 */
export function buildPlan(
  tracks: TrackRecord[],
  template: TemplatePlan,
  destinationRoot: string,
  operation: FileOperation,
  options: PlanOptions = {}
): Plan {
  const root = resolve(destinationRoot);
  const { selected, skipped } = selectTracks(tracks, template, options);
  const compilations = findCompilations(
    selected.map(([track]) => track),
    template.rules
  );
  const rendered = renderAll(selected, root, compilations);

  const occupants = new Map<string, TrackRecord>();

  for (const track of tracks) {
    if (!track.deleted) {
      occupants.set(resolve(track.path), track);
    }
  }

  const claims = new Map<string, RenderedTrack>();
  const vacating = new Set<string>();

  for (const item of rendered) {
    if (isInPlace(item)) {
      claims.set(item.source, item);
    } else if (operation === 'move' && item.target !== null) {
      vacating.add(item.source);
    }
  }

  const entries: PlanEntry[] = [];
  const adjustments: PlanAdjustment[] = [];

  for (const item of rendered) {
    const { track, source, target } = item;

    if (target === null) {
      entries.push({
        trackId: track.id,
        source,
        target: '',
        operation: 'conflict',
        conflictReason: 'MissingField',
        detail: `missing ${item.missingField ?? 'field'}`,
      });
      continue;
    }

    if (isInPlace(item)) {
      entries.push({ trackId: track.id, source, target: source, operation: 'noop' });
      continue;
    }

    const entry = resolveCollision(item, target, operation, claims, occupants, vacating);

    if (entry.disambiguated && entry.operation !== 'conflict') {
      adjustments.push({ trackId: track.id, renderedTarget: target, target: entry.target });
    }

    entries.push(entry);
  }

  return {
    id: randomUUID(),
    createdAt: new Date().toISOString(),
    destinationRoot: root,
    operation,
    template: template.source,
    entries,
    adjustments,
    skipped,
  };
}

function resolveCollision(
  item: RenderedTrack,
  target: string,
  operation: FileOperation,
  claims: Map<string, RenderedTrack>,
  occupants: Map<string, TrackRecord>,
  vacating: Set<string>
): PlanEntry {
  const { track, source } = item;

  for (let n = 1; n <= MAX_DISAMBIGUATION; n++) {
    const candidate = n === 1 ? target : disambiguatedPath(target, n);
    const disambiguated = n > 1;

    if (candidate === source) {
      claims.set(candidate, item);
      return { trackId: track.id, source, target: candidate, operation: 'noop', disambiguated };
    }

    const claimer = claims.get(candidate);

    if (claimer) {
      if (isInPlace(claimer) && isIdenticalContent(track, claimer.track)) {
        return {
          trackId: track.id,
          source,
          target: candidate,
          operation: 'noop',
          identicalTo: claimer.track.id,
        };
      }

      continue;
    }

    const occupant = occupants.get(candidate);

    if (occupant && occupant.id !== track.id) {
      if (vacating.has(candidate)) {
        return {
          trackId: track.id,
          source,
          target: candidate,
          operation: 'conflict',
          conflictReason: 'SwapRequired',
          detail: `target is the current path of track ${String(occupant.id)}`,
          disambiguated,
        };
      }

      continue;
    }

    claims.set(candidate, item);
    return { trackId: track.id, source, target: candidate, operation, disambiguated };
  }

  return {
    trackId: track.id,
    source,
    target,
    operation: 'conflict',
    conflictReason: 'TargetCollision',
    detail: `no free name after ${MAX_DISAMBIGUATION} attempts`,
  };
}

/**
 * Turns duplicate losers into plan entries: quarantine moves them aside,
 * delete moves them into the safe-trash so the batch stays reversible.
 */
export function planDisposals(
  groups: DuplicateGroup[],
  tracks: TrackRecord[],
  disposition: Disposition,
  options: DisposalOptions
): PlanEntry[] {
  if (disposition === 'skip') {
    return [];
  }

  let baseDir: string;
  let operation: PlanOperation;

  if (disposition === 'quarantine') {
    if (!options.quarantineDir) {
      throw new SetupError('A quarantine directory is required for the quarantine disposition');
    }

    baseDir = resolve(options.quarantineDir);
    operation = 'quarantine';
  } else {
    baseDir = resolve(options.trashDir);
    operation = 'trash';
  }

  const byId = new Map<TrackId, TrackRecord>(tracks.map((track) => [track.id, track]));
  const taken = new Set<string>();
  const entries: PlanEntry[] = [];

  for (const group of groups) {
    for (const loserId of group.losers) {
      const loser = byId.get(loserId);

      if (!loser || loser.deleted) {
        continue;
      }

      const preferred = join(baseDir, basename(loser.path));
      let target = preferred;

      for (let n = 2; taken.has(target); n++) {
        target = disambiguatedPath(preferred, n);
      }

      taken.add(target);
      entries.push({
        trackId: loser.id,
        source: resolve(loser.path),
        target,
        operation,
        disambiguated: target !== preferred,
      });
    }
  }

  return entries;
}

export function withDisposals(plan: Plan, disposals: PlanEntry[]): Plan {
  return { ...plan, entries: [...plan.entries, ...disposals] };
}

export function summarizePlan(plan: Plan): Record<PlanOperation, number> {
  const counts: Record<PlanOperation, number> = {
    noop: 0,
    move: 0,
    copy: 0,
    link: 0,
    quarantine: 0,
    trash: 0,
    conflict: 0,
  };

  for (const entry of plan.entries) {
    counts[entry.operation]++;
  }

  return counts;
}

export function planToRows(plan: Plan): PlanRow[] {
  return plan.entries.map((entry) => ({
    source: entry.source,
    target: entry.target,
    operation: entry.operation,
    reason: entry.conflictReason
      ? [entry.conflictReason, entry.detail].filter(Boolean).join(': ')
      : entry.identicalTo !== undefined
        ? `identical to track ${String(entry.identicalTo)}`
        : entry.disambiguated
          ? 'renamed to avoid collision'
          : '',
  }));
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function planToCsv(plan: Plan): string {
  const lines = [['source', 'target', 'operation', 'reason'].join(',')];

  for (const row of planToRows(plan)) {
    lines.push([row.source, row.target, row.operation, row.reason].map(csvField).join(','));
  }

  return lines.join('\n') + '\n';
}
