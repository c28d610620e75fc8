import { stat } from 'node:fs/promises';
import { extname } from 'node:path';
import { parseFile, type IAudioMetadata } from 'music-metadata';
import { errorMessage } from './errors.js';
import { logger as defaultLogger, type Logger } from './logger.js';
import type { TrackInput } from './types.js';

function positive(value: number | null | undefined): number | null {
  return value !== null && value !== undefined && value > 0 ? value : null;
}

function text(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/** Maps parsed tags onto a track; the format always comes from the extension. */
export function toTrackInput(filePath: string, size: number, metadata: IAudioMetadata): TrackInput {
  const { common, format } = metadata;

  return {
    path: filePath,
    size,
    duration: format.duration ?? 0,
    format: extname(filePath).slice(1).toLowerCase(),
    bitrate: format.bitrate ? Math.round(format.bitrate / 1000) : null,
    title: text(common.title),
    artist: text(common.artist ?? common.artists?.[0]),
    album: text(common.album),
    albumArtist: text(common.albumartist),
    genre: text(common.genre?.[0]),
    year: positive(common.year),
    trackNumber: positive(common.track.no),
    releaseId: text(common.musicbrainz_albumid),
  };
}

export async function extractMetadata(filePath: string, logger: Logger = defaultLogger): Promise<TrackInput | null> {
  try {
    const [fileStats, metadata] = await Promise.all([
      stat(filePath),
      parseFile(filePath, { duration: true }),
    ]);

    return toTrackInput(filePath, fileStats.size, metadata);
  } catch (error) {
    logger.debug(`Skipping ${filePath}: ${errorMessage(error)}`);
    return null;
  }
}

export function formatFileSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }

  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }

  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function formatDuration(seconds: number | null): string {
  if (seconds === null) {
    return 'unknown';
  }

  const mins = Math.floor(seconds / 60);
  const secs = Math.floor(seconds % 60);

  return `${mins}:${secs.toString().padStart(2, '0')}`;
}
