export type TrackId = number | string;

export interface TrackTags {
  title: string | null;
  artist: string | null;
  album: string | null;
  albumArtist: string | null;
  genre: string | null;
  year: number | null;
  trackNumber: number | null;
  releaseId: string | null;
}

export interface TrackInput extends TrackTags {
  path: string;
  size: number;
  duration: number;
  format: string;
  bitrate: number | null;
  contentHash?: string | null;
}

export interface TrackRecord extends TrackInput {
  id: TrackId;
  deleted?: boolean;
}

export interface TrackFilter {
  includeDeleted?: boolean;
  pathPrefix?: string;
  requireYear?: boolean;
  ids?: TrackId[];
}

export type TemplateField =
  | 'genre'
  | 'year'
  | 'artist'
  | 'albumArtist'
  | 'album'
  | 'trackNumber'
  | 'title'
  | 'extension'
  | 'releaseId';

export interface PlaceholderField {
  field: TemplateField;
  before: string;
}

export type TemplateToken =
  | { kind: 'literal'; text: string }
  | { kind: 'placeholder'; lead: string; fields: PlaceholderField[]; trail: string };

export type TemplateSegment = TemplateToken[];

export interface TemplateRules {
  stripNames: boolean;
  stripPromoParens: boolean;
  sanitizeForbiddenChars: boolean;
  fallbackToAlbumArtist: boolean;
  compilationPattern: string | null;
  forbiddenCharReplacement: string;
}

export interface TemplatePlan {
  source: string;
  segments: TemplateSegment[];
  rules: TemplateRules;
  compilation: TemplatePlan | null;
}

export interface RenderContext {
  compilation?: boolean;
}

export type KeeperRule = 'lossless' | 'bitrate' | 'duration' | 'path';

export interface DuplicateGroup {
  id: string;
  members: TrackId[];
  keeper: TrackId;
  losers: TrackId[];
  matchReasons: string[];
  ruleApplied: KeeperRule;
}

export type Disposition = 'skip' | 'quarantine' | 'delete';

export type FileOperation = 'move' | 'copy' | 'link';

export type ExecutionMode = 'simulate' | FileOperation;

export type PlanOperation = 'noop' | FileOperation | 'quarantine' | 'trash' | 'conflict';

export type ConflictReason = 'MissingField' | 'TargetCollision' | 'SwapRequired';

export interface PlanEntry {
  trackId: TrackId;
  source: string;
  target: string;
  operation: PlanOperation;
  conflictReason?: ConflictReason;
  detail?: string;
  disambiguated?: boolean;
  identicalTo?: TrackId;
}

export interface PlanAdjustment {
  trackId: TrackId;
  renderedTarget: string;
  target: string;
}

export interface SkippedTrack {
  trackId: TrackId;
  path: string;
  reason: 'duplicate-loser' | 'missing-year' | 'missing-release';
}

export interface Plan {
  id: string;
  createdAt: string;
  destinationRoot: string;
  operation: FileOperation;
  template: string;
  entries: PlanEntry[];
  adjustments: PlanAdjustment[];
  skipped: SkippedTrack[];
}

export interface PlanRow {
  source: string;
  target: string;
  operation: PlanOperation;
  reason: string;
}

export type FailureReason =
  | 'TargetExists'
  | 'SourceMissing'
  | 'PermissionDenied'
  | 'ConflictOnUndo'
  | 'IOError';

export type EntryState = 'Pending' | 'Verifying' | 'Applying' | 'Committed' | 'Failed' | 'Undone';

export interface EntryResult {
  entry: PlanEntry;
  state: EntryState;
  failure?: FailureReason;
  message?: string;
}

export interface FailureDetail {
  source: string;
  target: string;
  reason: FailureReason;
  message: string;
}

export interface ExecutionReport {
  batchId: string | null;
  mode: ExecutionMode;
  attempted: number;
  succeeded: number;
  failed: number;
  skipped: number;
  conflicts: number;
  cancelled: boolean;
  results: EntryResult[];
  failures: FailureDetail[];
}

export type UndoOperation = FileOperation | 'quarantine' | 'trash';

export interface UndoEntry {
  trackId: TrackId;
  source: string;
  target: string;
  operation: UndoOperation;
  linkKind?: 'hard' | 'symbolic';
  trashPath?: string;
  createdDir?: string;
  appliedAt: string;
}

export interface UndoBatch {
  id: string;
  planId: string;
  mode: FileOperation;
  sealedAt: string;
  entries: UndoEntry[];
}

export interface UndoBatchSummary {
  id: string;
  mode: FileOperation;
  sealedAt: string;
  entryCount: number;
}

export interface UndoEntryResult {
  entry: UndoEntry;
  state: 'Undone' | 'Failed';
  failure?: FailureReason;
  message?: string;
}

export interface UndoReport {
  batchId: string | null;
  attempted: number;
  succeeded: number;
  failed: number;
  results: UndoEntryResult[];
  failures: FailureDetail[];
}

export interface PurgeReport {
  purged: number;
  failed: number;
  method: Record<'trash' | 'permanent', number>;
}

export interface DuplicateSettings {
  durationToleranceSeconds: number;
  useContentHash: boolean;
  hashSampleBytes: number;
  hashConcurrency: number;
  disposition: Disposition;
  quarantineDir: string | null;
}

export interface Config {
  dataDir: string;
  templates: Record<string, string>;
  rules: TemplateRules;
  duplicates: DuplicateSettings;
  execution: {
    transientRetries: number;
  };
  supportedExtensions: string[];
}
