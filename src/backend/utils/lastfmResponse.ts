import { Scrobble } from '../../shared/types';

import { ApiError, MalformedResponseError } from './errors';
import { createLogger } from './logger';

const logger = createLogger('LastFmResponse');

export const UNKNOWN_ARTIST = 'Unknown Artist';
export const UNKNOWN_ALBUM = 'Unknown Album';
export const UNKNOWN_TRACK = 'Unknown Track';

/**
 * Last.fm sends artist and album either as a plain string or as an object
 * carrying the value in `#text` (or `name` with `extended=1`).
 */
export type TextField =
  | { kind: 'plain'; value: string }
  | { kind: 'object'; value: string }
  | { kind: 'missing' }
  | { kind: 'invalid' };

export interface RecentTracksPage {
  items: unknown[];
  totalPages: number;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = parseInt(value, 10);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

export function decodeTextField(value: unknown): TextField {
  if (value === undefined || value === null) {
    return { kind: 'missing' };
  }
  if (typeof value === 'string') {
    return { kind: 'plain', value };
  }
  if (isRecord(value)) {
    const text = value['#text'];
    if (typeof text === 'string') {
      return { kind: 'object', value: text };
    }
    if (typeof value.name === 'string') {
      return { kind: 'object', value: value.name };
    }
  }
  return { kind: 'invalid' };
}

function textOrDefault(
  field: TextField,
  fallback: string,
  label: string,
  trackName: string
): string {
  switch (field.kind) {
    case 'plain':
    case 'object':
      return field.value;
    case 'missing':
      return fallback;
    case 'invalid':
      logger.warn(`Unexpected ${label} format for track ${trackName}, using "${fallback}"`);
      return fallback;
  }
}

/**
 * Throws ApiError when the document carries Last.fm's top-level error field.
 */
export function assertNoApiError(data: unknown): void {
  if (isRecord(data) && data.error !== undefined) {
    const message =
      typeof data.message === 'string' && data.message
        ? data.message
        : 'Unknown Last.fm error';
    throw new ApiError(message, parseInteger(data.error) ?? undefined);
  }
}

/**
 * Extracts the raw track items and the declared page count from a
 * user.getRecentTracks response.
 */
export function parseRecentTracksPage(data: unknown): RecentTracksPage {
  if (!isRecord(data)) {
    throw new MalformedResponseError('Last.fm response is not a JSON object');
  }
  assertNoApiError(data);

  const recentTracks = data.recenttracks;
  if (!isRecord(recentTracks)) {
    throw new MalformedResponseError('Last.fm response is missing recenttracks');
  }

  const tracks = recentTracks.track;
  let items: unknown[];
  if (Array.isArray(tracks)) {
    items = tracks;
  } else if (isRecord(tracks)) {
    // A single result comes back as a bare object
    items = [tracks];
  } else if (tracks === undefined) {
    items = [];
  } else {
    throw new MalformedResponseError('Last.fm recenttracks.track has an unexpected type');
  }

  const attr = recentTracks['@attr'];
  const declaredPages = isRecord(attr) ? parseInteger(attr.totalPages) : null;

  return {
    items,
    totalPages: declaredPages !== null && declaredPages > 0 ? declaredPages : 1,
  };
}

export function isNowPlaying(item: Record<string, unknown>): boolean {
  const attr = item['@attr'];
  return isRecord(attr) && attr.nowplaying !== undefined;
}

/**
 * The `medium` image URL, when Last.fm sent a real image list.
 */
export function selectAlbumArt(images: unknown): string | undefined {
  if (!Array.isArray(images) || images.length <= 1) {
    return undefined;
  }
  for (const image of images) {
    if (isRecord(image) && image.size === 'medium') {
      const url = image['#text'];
      return typeof url === 'string' && url ? url : undefined;
    }
  }
  return undefined;
}

/**
 * Normalizes one recent-tracks item. Returns null for now-playing entries.
 */
export function normalizeRecentTrack(
  item: unknown,
  now: () => number
): Scrobble | null {
  if (!isRecord(item)) {
    throw new MalformedResponseError('Last.fm track entry is not an object');
  }
  if (isNowPlaying(item)) {
    return null;
  }

  const name =
    typeof item.name === 'string' && item.name ? item.name : UNKNOWN_TRACK;
  const artist = textOrDefault(
    decodeTextField(item.artist),
    UNKNOWN_ARTIST,
    'artist',
    name
  );
  const album = textOrDefault(
    decodeTextField(item.album),
    UNKNOWN_ALBUM,
    'album',
    name
  );

  const date = item.date;
  let timestamp = isRecord(date) ? parseInteger(date.uts) : null;
  if (timestamp === null) {
    timestamp = now();
    logger.warn(`Missing timestamp for track ${name}, using current time`);
  }

  const scrobble: Scrobble = { artist, name, album, timestamp };
  const image = selectAlbumArt(item.image);
  if (image) {
    scrobble.image = image;
  }
  return scrobble;
}

/**
 * Reads track.duration (milliseconds) from a track.getInfo response.
 * Returns null when the field is absent or not numeric.
 */
export function parseTrackDurationMs(data: unknown): number | null {
  if (!isRecord(data)) {
    throw new MalformedResponseError('Last.fm response is not a JSON object');
  }
  assertNoApiError(data);

  const track = data.track;
  if (!isRecord(track)) {
    return null;
  }
  return parseInteger(track.duration);
}
