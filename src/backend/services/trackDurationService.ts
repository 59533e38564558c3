import { getErrorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

import { LastFmService } from './lastfmService';
import { TrackDurationCache } from './trackDurationCache';

/** Used when Last.fm has no usable duration for a track (3 minutes) */
export const DEFAULT_TRACK_DURATION_SECONDS = 180;

/**
 * Resolves track durations: cache first, then track.getInfo. Never rejects;
 * lookups that fail or report no duration resolve to the default, and that
 * default is cached so the lookup is not repeated.
 */
export class TrackDurationService {
  private lastfmService: LastFmService;
  private cache: TrackDurationCache;
  private logger = createLogger('TrackDurationService');

  constructor(lastfmService: LastFmService, cache: TrackDurationCache) {
    this.lastfmService = lastfmService;
    this.cache = cache;
  }

  async getTrackDuration(artist: string, track: string): Promise<number> {
    const cached = this.cache.get(artist, track);
    if (cached !== undefined) {
      this.logger.debug(`Cache hit: ${artist} - ${track}`);
      return cached;
    }

    this.logger.debug(`Cache miss: ${artist} - ${track}, fetching from API`);

    let duration = DEFAULT_TRACK_DURATION_SECONDS;
    try {
      const { durationMs } = await this.lastfmService.getTrackInfo(
        artist,
        track
      );
      const seconds =
        durationMs === null ? 0 : Math.floor(durationMs / 1000);
      if (seconds > 0) {
        duration = seconds;
      } else {
        this.logger.debug(
          `No duration for ${artist} - ${track}, using default ${DEFAULT_TRACK_DURATION_SECONDS}s`
        );
      }
    } catch (error) {
      this.logger.error(
        `Error getting track duration for ${artist} - ${track}: ${getErrorMessage(error)}`
      );
    }

    await this.cache.put(artist, track, duration);
    return duration;
  }
}
