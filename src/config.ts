import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { ConfigError, classifyFsError, errorMessage } from './errors.js';
import { DEFAULT_RULES, DEFAULT_TEMPLATE, RELEASE_FALLBACK_TEMPLATE } from './template.js';
import type { Config, Disposition, DuplicateSettings, TemplateRules } from './types.js';

const DISPOSITIONS: readonly Disposition[] = ['skip', 'quarantine', 'delete'];

export const DEFAULT_CONFIG: Config = {
  dataDir: join(homedir(), '.tidytracks'),
  templates: {
    default: DEFAULT_TEMPLATE,
    release: RELEASE_FALLBACK_TEMPLATE,
  },
  rules: DEFAULT_RULES,
  duplicates: {
    durationToleranceSeconds: 1,
    useContentHash: false,
    hashSampleBytes: 64 * 1024,
    hashConcurrency: 4,
    disposition: 'skip',
    quarantineDir: null,
  },
  execution: {
    transientRetries: 3,
  },
  supportedExtensions: ['mp3', 'flac', 'wav', 'aac', 'ogg', 'm4a', 'aiff', 'aif', 'wma', 'opus', 'ape', 'wv'],
};

export function expandPath(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return path.replace('~', homedir());
  }

  return path;
}

export function configFilePath(): string {
  return resolve(process.env.TIDYTRACKS_CONFIG ?? join(process.cwd(), 'config.json'));
}

export function dataPaths(config: Config): {
  tracks: string;
  undoLog: string;
  trash: string;
  planExport: string;
} {
  return {
    tracks: join(config.dataDir, 'tracks.ndjson'),
    undoLog: join(config.dataDir, 'undo-log.json'),
    trash: join(config.dataDir, 'trash'),
    planExport: join(config.dataDir, 'plan.csv'),
  };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];

  if (value === undefined) {
    return {};
  }

  if (!isObject(value)) {
    throw new ConfigError(`"${key}" must be an object`);
  }

  return value;
}

function readBoolean(raw: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = raw[key];

  if (value === undefined) {
    return fallback;
  }

  if (typeof value !== 'boolean') {
    throw new ConfigError(`"${key}" must be true or false`);
  }

  return value;
}

function readNumber(raw: Record<string, unknown>, key: string, fallback: number, min: number): number {
  const value = raw[key];

  if (value === undefined) {
    return fallback;
  }

  if (typeof value !== 'number' || !Number.isFinite(value) || value < min) {
    throw new ConfigError(`"${key}" must be a number of at least ${min}`);
  }

  return value;
}

function readString(raw: Record<string, unknown>, key: string, fallback: string): string {
  const value = raw[key];

  if (value === undefined) {
    return fallback;
  }

  if (typeof value !== 'string') {
    throw new ConfigError(`"${key}" must be a string`);
  }

  return value;
}

function readNullableString(raw: Record<string, unknown>, key: string, fallback: string | null): string | null {
  return raw[key] === null ? null : raw[key] === undefined ? fallback : readString(raw, key, '');
}

function parseRules(raw: Record<string, unknown>): TemplateRules {
  const defaults = DEFAULT_CONFIG.rules;
  const replacement = readString(raw, 'forbiddenCharReplacement', defaults.forbiddenCharReplacement);

  if (/[/\\\0]/.test(replacement)) {
    throw new ConfigError('"forbiddenCharReplacement" may not contain a path separator');
  }

  return {
    stripNames: readBoolean(raw, 'stripNames', defaults.stripNames),
    stripPromoParens: readBoolean(raw, 'stripPromoParens', defaults.stripPromoParens),
    sanitizeForbiddenChars: readBoolean(raw, 'sanitizeForbiddenChars', defaults.sanitizeForbiddenChars),
    fallbackToAlbumArtist: readBoolean(raw, 'fallbackToAlbumArtist', defaults.fallbackToAlbumArtist),
    compilationPattern: readNullableString(raw, 'compilationPattern', defaults.compilationPattern),
    forbiddenCharReplacement: replacement,
  };
}

function parseDuplicates(raw: Record<string, unknown>): DuplicateSettings {
  const defaults = DEFAULT_CONFIG.duplicates;
  const disposition = raw.disposition ?? defaults.disposition;
  const match = DISPOSITIONS.find((candidate) => candidate === disposition);

  if (!match) {
    throw new ConfigError(`Unknown duplicate disposition "${String(disposition)}"`);
  }

  const tolerance = readNumber(raw, 'durationToleranceSeconds', defaults.durationToleranceSeconds, 0);

  if (tolerance <= 0) {
    throw new ConfigError('"durationToleranceSeconds" must be greater than 0');
  }

  const quarantineDir = readNullableString(raw, 'quarantineDir', defaults.quarantineDir);

  return {
    durationToleranceSeconds: tolerance,
    useContentHash: readBoolean(raw, 'useContentHash', defaults.useContentHash),
    hashSampleBytes: readNumber(raw, 'hashSampleBytes', defaults.hashSampleBytes, 1),
    hashConcurrency: readNumber(raw, 'hashConcurrency', defaults.hashConcurrency, 1),
    disposition: match,
    quarantineDir: quarantineDir ? resolve(expandPath(quarantineDir)) : null,
  };
}

function parseTemplates(raw: Record<string, unknown>): Record<string, string> {
  const templates = { ...DEFAULT_CONFIG.templates };

  for (const [name, pattern] of Object.entries(raw)) {
    if (typeof pattern !== 'string') {
      throw new ConfigError(`Template "${name}" must be a string`);
    }

    templates[name] = pattern;
  }

  return templates;
}

function parseExtensions(value: unknown): string[] {
  if (value === undefined) {
    return DEFAULT_CONFIG.supportedExtensions;
  }

  if (!Array.isArray(value) || !value.every((ext): ext is string => typeof ext === 'string')) {
    throw new ConfigError('"supportedExtensions" must be a list of strings');
  }

  return value.map((ext) => ext.replace(/^\./, '').toLowerCase());
}

/** Validates a raw config object and merges it over the defaults. */
export function parseConfig(raw: unknown): Config {
  if (!isObject(raw)) {
    throw new ConfigError('Config must be a JSON object');
  }

  const execution = section(raw, 'execution');

  return {
    dataDir: resolve(expandPath(readString(raw, 'dataDir', DEFAULT_CONFIG.dataDir))),
    templates: parseTemplates(section(raw, 'templates')),
    rules: parseRules(section(raw, 'rules')),
    duplicates: parseDuplicates(section(raw, 'duplicates')),
    execution: {
      transientRetries: readNumber(execution, 'transientRetries', DEFAULT_CONFIG.execution.transientRetries, 0),
    },
    supportedExtensions: parseExtensions(raw.supportedExtensions),
  };
}

/** Reads config.json; a missing file yields the defaults. */
export async function loadConfig(file: string = configFilePath()): Promise<Config> {
  let data: string;

  try {
    data = await readFile(file, 'utf-8');
  } catch (error) {
    if (classifyFsError(error) === 'SourceMissing') {
      return parseConfig({});
    }

    throw new ConfigError(`Cannot read ${file}: ${errorMessage(error)}`);
  }

  let raw: unknown;

  try {
    raw = JSON.parse(data);
  } catch (error) {
    throw new ConfigError(`${file} is not valid JSON: ${errorMessage(error)}`);
  }

  return parseConfig(raw);
}

export function resolveTemplate(config: Config, nameOrPattern: string = 'default'): string {
  const named = config.templates[nameOrPattern];

  if (named !== undefined) {
    return named;
  }

  if (nameOrPattern.includes('{')) {
    return nameOrPattern;
  }

  throw new ConfigError(`Template "${nameOrPattern}" is not configured`);
}
