import { extname } from 'node:path';
import levenshtein from 'fast-levenshtein';
import { RenderError, TemplateError } from './errors.js';
import type {
  PlaceholderField,
  RenderContext,
  TemplateField,
  TemplatePlan,
  TemplateRules,
  TemplateSegment,
  TemplateToken,
  TrackInput,
} from './types.js';

export const DEFAULT_TEMPLATE = '{Genero}/{Año}/{Artista}/{Álbum}/{TrackNo - Título}.{ext}';
export const RELEASE_FALLBACK_TEMPLATE = '{Artista}/{Álbum}/{TrackNo - Título}.{ext}';

export const DEFAULT_RULES: TemplateRules = {
  stripNames: true,
  stripPromoParens: false,
  sanitizeForbiddenChars: true,
  fallbackToAlbumArtist: true,
  compilationPattern: '{Genero}/{Año}/Various Artists/{Álbum}/{Artista - TrackNo - Título}.{ext}',
  forbiddenCharReplacement: '_',
};

const FIELD_ALIASES = new Map<string, TemplateField>([
  ['genero', 'genre'],
  ['genre', 'genre'],
  ['ano', 'year'],
  ['year', 'year'],
  ['artista', 'artist'],
  ['artist', 'artist'],
  ['artistaalbum', 'albumArtist'],
  ['albumartist', 'albumArtist'],
  ['album', 'album'],
  ['trackno', 'trackNumber'],
  ['track', 'trackNumber'],
  ['tracknumber', 'trackNumber'],
  ['pista', 'trackNumber'],
  ['titulo', 'title'],
  ['title', 'title'],
  ['ext', 'extension'],
  ['extension', 'extension'],
  ['releaseid', 'releaseId'],
]);

const SENTINELS: Record<TemplateField, string> = {
  genre: 'Unknown Genre',
  year: 'Unknown Year',
  artist: 'Unknown Artist',
  albumArtist: 'Unknown Artist',
  album: 'Unknown Album',
  trackNumber: '00',
  title: 'Untitled',
  extension: 'bin',
  releaseId: 'Unknown Release',
};

const REQUIRED_FIELDS: TemplateField[] = ['title', 'extension'];
const PROMO_FIELDS = new Set<TemplateField>(['title', 'album']);
const MAX_SEGMENT_LENGTH = 200;

const PROMO_PAREN_SUFFIX =
  /\s*[([][^()[\]]*\b(?:remaster(?:ed)?|deluxe|bonus(?: track)?|expanded|anniversary|edition|explicit|clean|radio edit|single version|album version|official(?: audio| video)?|hq|hd)\b[^()[\]]*[)\]]\s*$/i;
const PROMO_DASH_SUFFIX = /\s+-\s+(?:\d{4}\s+)?(?:digital(?:ly)?\s+)?remaster(?:ed)?(?:\s+\d{4})?(?:\s+version)?\s*$/i;
const PATH_SEPARATORS = /[/\\\0]/g;
const FORBIDDEN_CHARS = /[<>:"|?*\u0001-\u001f]/g;
const FEATURING_SUFFIX = /\s*[([]?\b(?:feat|ft|featuring)\b\.?.*$/i;

function foldWord(word: string): string {
  return word.normalize('NFD').replace(/\p{M}/gu, '').toLowerCase();
}

function findPlaceholderEnd(template: string, open: number): number {
  for (let i = open + 1; i < template.length; i++) {
    const char = template[i];

    if (char === '}') {
      return i;
    }

    if (char === '{') {
      throw new TemplateError('Nested "{"', template, i);
    }

    if (char === '/' || char === '\\') {
      throw new TemplateError('Path separator inside placeholder', template, i);
    }
  }

  throw new TemplateError('Unbalanced "{"', template, open);
}

function parsePlaceholder(template: string, start: number, end: number): TemplateToken {
  const body = template.slice(start, end);
  const words = Array.from(body.matchAll(/[\p{L}\p{N}_]+/gu));

  if (words.length === 0) {
    throw new TemplateError('Empty placeholder', template, start - 1);
  }

  const fields: PlaceholderField[] = [];
  let lead = '';
  let cursor = 0;

  for (const match of words) {
    const index = match.index ?? 0;
    const separator = body.slice(cursor, index);
    const field = FIELD_ALIASES.get(foldWord(match[0]));

    if (!field) {
      throw new TemplateError(`Unknown placeholder "${match[0]}"`, template, start + index);
    }

    if (fields.length === 0) {
      lead = separator;
    }

    fields.push({ field, before: fields.length === 0 ? '' : separator });
    cursor = index + match[0].length;
  }

  return { kind: 'placeholder', lead, fields, trail: body.slice(cursor) };
}

function parseSegments(template: string): TemplateSegment[] {
  if (template.trim() === '') {
    throw new TemplateError('Template is empty', template, 0);
  }

  const segments: TemplateSegment[] = [];
  let current: TemplateSegment = [];
  let literal = '';
  let i = 0;

  const flushLiteral = (): void => {
    if (literal) {
      current.push({ kind: 'literal', text: literal });
      literal = '';
    }
  };

  const closeSegment = (position: number): void => {
    flushLiteral();

    if (current.length === 0) {
      throw new TemplateError('Empty path segment', template, position);
    }

    segments.push(current);
    current = [];
  };

  while (i < template.length) {
    const char = template[i];

    if (char === '{') {
      const end = findPlaceholderEnd(template, i);
      flushLiteral();
      current.push(parsePlaceholder(template, i + 1, end));
      i = end + 1;
      continue;
    }

    if (char === '}') {
      throw new TemplateError('Unbalanced "}"', template, i);
    }

    if (char === '/' || char === '\\') {
      closeSegment(i);
      i++;
      continue;
    }

    literal += char;
    i++;
  }

  closeSegment(template.length);

  return segments;
}

/**
 * Parses a template such as `{Artista}/{Álbum}/{TrackNo - Título}.{ext}` into
 * path segments. Inside a placeholder, field names alternate with literal
 * separators; names match Spanish or English aliases, ignoring case and accents.
 */
export function compileTemplate(template: string, rules: TemplateRules = DEFAULT_RULES): TemplatePlan {
  const segments = parseSegments(template);
  const compilation = rules.compilationPattern
    ? compileTemplate(rules.compilationPattern, { ...rules, compilationPattern: null })
    : null;

  return { source: template, segments, rules, compilation };
}

export function stripPromoSuffixes(value: string): string {
  let stripped = value;

  while (PROMO_PAREN_SUFFIX.test(stripped) || PROMO_DASH_SUFFIX.test(stripped)) {
    stripped = stripped.replace(PROMO_PAREN_SUFFIX, '').replace(PROMO_DASH_SUFFIX, '');
  }

  return stripped.trim() === '' ? value : stripped;
}

function replaceForbidden(value: string, rules: TemplateRules): string {
  const replacement = rules.forbiddenCharReplacement;
  const withoutSeparators = value.replace(PATH_SEPARATORS, replacement);

  if (!rules.sanitizeForbiddenChars) {
    return withoutSeparators;
  }

  return withoutSeparators.replace(FORBIDDEN_CHARS, replacement);
}

export function trackExtension(track: TrackInput): string | null {
  const fromPath = extname(track.path).slice(1).toLowerCase();

  if (fromPath) {
    return fromPath;
  }

  const format = track.format.trim().toLowerCase();

  return format || null;
}

function rawValue(track: TrackInput, field: TemplateField, rules: TemplateRules): string | null {
  switch (field) {
    case 'artist':
      return track.artist ?? (rules.fallbackToAlbumArtist ? track.albumArtist : null);
    case 'albumArtist':
      return track.albumArtist ?? track.artist;
    case 'year':
      return track.year !== null && track.year > 0 ? String(track.year) : null;
    case 'trackNumber':
      return track.trackNumber !== null && track.trackNumber > 0
        ? String(track.trackNumber).padStart(2, '0')
        : null;
    case 'extension':
      return trackExtension(track);
    default:
      return track[field];
  }
}

function cleanValue(raw: string | null, field: TemplateField, rules: TemplateRules): string | null {
  if (raw === null) {
    return null;
  }

  let value = raw.normalize('NFC');

  if (rules.stripNames) {
    value = value.replace(/\s+/g, ' ').trim();
  }

  if (rules.stripPromoParens && PROMO_FIELDS.has(field)) {
    value = stripPromoSuffixes(value);
  }

  value = replaceForbidden(value, rules);

  return value.trim() === '' ? null : value;
}

export function resolveFieldValues(
  track: TrackInput,
  rules: TemplateRules
): Record<TemplateField, string | null> {
  const value = (field: TemplateField): string | null =>
    cleanValue(rawValue(track, field, rules), field, rules);

  return {
    genre: value('genre'),
    year: value('year'),
    artist: value('artist'),
    albumArtist: value('albumArtist'),
    album: value('album'),
    trackNumber: value('trackNumber'),
    title: value('title'),
    extension: value('extension'),
    releaseId: value('releaseId'),
  };
}

function renderToken(token: TemplateToken, values: Record<TemplateField, string | null>): string {
  if (token.kind === 'literal') {
    return token.text;
  }

  const present = token.fields.filter((part) => values[part.field] !== null);
  const parts = present.length > 0 ? present : token.fields;
  const body = parts
    .map((part, index) => (index === 0 ? '' : part.before) + (values[part.field] ?? SENTINELS[part.field]))
    .join('');

  return token.lead + body + token.trail;
}

function finishSegment(text: string, rules: TemplateRules, isLast: boolean): string {
  let segment = rules.stripNames ? text.replace(/\s+/g, ' ').trim() : text.trim();

  if (rules.sanitizeForbiddenChars) {
    segment = segment.replace(/[. ]+$/, '');
  }

  if (!isLast && segment.length > MAX_SEGMENT_LENGTH) {
    segment = segment.slice(0, MAX_SEGMENT_LENGTH).trimEnd();
  }

  if (segment === '' || /^\.+$/.test(segment)) {
    return rules.forbiddenCharReplacement || '_';
  }

  return segment;
}

export function renderPath(plan: TemplatePlan, track: TrackInput, context: RenderContext = {}): string {
  const values = resolveFieldValues(track, plan.rules);

  for (const field of REQUIRED_FIELDS) {
    if (values[field] === null) {
      throw new RenderError(field);
    }
  }

  const active = context.compilation && plan.compilation ? plan.compilation : plan;
  const lastIndex = active.segments.length - 1;

  return active.segments
    .map((segment, index) =>
      finishSegment(segment.map((token) => renderToken(token, values)).join(''), plan.rules, index === lastIndex)
    )
    .join('/');
}

/**
 * Groups tracks bound for one album directory. Without a release id the key
 * is the album title, year and album artist, so same-titled albums by
 * different artists stay apart when their years or album artists differ.
 */
export function albumKey(track: TrackInput): string | null {
  const releaseId = track.releaseId?.trim();

  if (releaseId) {
    return `release:${releaseId.toLowerCase()}`;
  }

  const album = track.album?.trim();

  if (!album) {
    return null;
  }

  const albumArtist = track.albumArtist ? normalizeArtistName(track.albumArtist) : '';

  return `album:${album.toLowerCase()}|${track.year ?? ''}|${albumArtist}`;
}

export function normalizeArtistName(name: string): string {
  return foldWord(name)
    .replace(FEATURING_SUFFIX, '')
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function isSameArtist(a: string, b: string): boolean {
  if (a === b) {
    return true;
  }

  const maxLen = Math.max(a.length, b.length);

  if (maxLen === 0) {
    return false;
  }

  return 1 - levenshtein.get(a, b) / maxLen >= 0.9;
}

interface AlbumArtists {
  artists: string[];
  numbered: Map<number, string>;
  separateAlbums: boolean;
}

/**
 * Returns the album keys whose tracks carry more than one distinct primary
 * artist. Without an album artist, two artists holding the same track number
 * mark separate albums that share a title, not a compilation. Empty when the
 * compilation rule is disabled.
 */
export function findCompilations(tracks: TrackInput[], rules: TemplateRules): Set<string> {
  const compilations = new Set<string>();

  if (!rules.compilationPattern) {
    return compilations;
  }

  const albums = new Map<string, AlbumArtists>();

  for (const track of tracks) {
    const key = albumKey(track);
    const artist = track.artist ?? track.albumArtist;

    if (!key || !artist) {
      continue;
    }

    const normalized = normalizeArtistName(artist);

    if (!normalized) {
      continue;
    }

    const album = albums.get(key) ?? { artists: [], numbered: new Map<number, string>(), separateAlbums: false };
    let canonical = album.artists.find((known) => isSameArtist(known, normalized));

    if (canonical === undefined) {
      canonical = normalized;
      album.artists.push(normalized);
    }

    if (!track.albumArtist && track.trackNumber !== null) {
      const holder = album.numbered.get(track.trackNumber);

      if (holder !== undefined && holder !== canonical) {
        album.separateAlbums = true;
      } else {
        album.numbered.set(track.trackNumber, canonical);
      }
    }

    albums.set(key, album);
  }

  for (const [key, album] of albums) {
    if (album.artists.length > 1 && !album.separateAlbums) {
      compilations.add(key);
    }
  }

  return compilations;
}
