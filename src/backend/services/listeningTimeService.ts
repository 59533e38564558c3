import {
  DailyListeningResult,
  ResolvedScrobble,
  Scrobble,
} from '../../shared/types';
import { getErrorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import {
  getLocalDayWindow,
  secondsToListeningTime,
} from '../utils/timestamps';

import { DailyStatsCache } from './dailyStatsCache';
import { LastFmService } from './lastfmService';
import {
  DEFAULT_TRACK_DURATION_SECONDS,
  TrackDurationService,
} from './trackDurationService';

/**
 * Computes a user's listening time for one local calendar day.
 *
 * Every computed day is written to the daily stats cache, including days
 * without scrobbles, so the weekly view can skip them next time.
 */
export class ListeningTimeService {
  private lastfmService: LastFmService;
  private durationService: TrackDurationService;
  private dailyCache: DailyStatsCache;
  private logger = createLogger('ListeningTimeService');

  constructor(
    lastfmService: LastFmService,
    durationService: TrackDurationService,
    dailyCache: DailyStatsCache
  ) {
    this.lastfmService = lastfmService;
    this.durationService = durationService;
    this.dailyCache = dailyCache;
  }

  /**
   * Fetches the day's scrobbles and sums their durations. Errors fetching
   * the scrobble list propagate; a failing track counts as the default.
   *
   * @param date - local calendar date, YYYY-MM-DD
   */
  async getScrobblesAndTime(
    username: string,
    date: string
  ): Promise<DailyListeningResult> {
    const { from, to } = getLocalDayWindow(date);
    const scrobbles = await this.lastfmService.getRecentTracks(
      username,
      from,
      to
    );

    const resolved = await this.resolveDurations(scrobbles);
    const totalSeconds = resolved.reduce(
      (sum, scrobble) => sum + scrobble.duration,
      0
    );
    const totalTime = secondsToListeningTime(totalSeconds);

    await this.dailyCache.put(username, date, {
      totalTime,
      scrobbleCount: resolved.length,
    });

    this.logger.info(
      `${username} on ${date}: ${resolved.length} scrobbles, ${totalSeconds}s`
    );
    return { scrobbles: resolved, totalTime };
  }

  /**
   * Resolves durations one track at a time, in the order given.
   */
  private async resolveDurations(
    scrobbles: Scrobble[]
  ): Promise<ResolvedScrobble[]> {
    const resolved: ResolvedScrobble[] = [];

    for (const scrobble of scrobbles) {
      let duration: number;
      try {
        duration = await this.durationService.getTrackDuration(
          scrobble.artist,
          scrobble.name
        );
      } catch (error) {
        this.logger.error(
          `Error calculating duration for track ${scrobble.name}: ${getErrorMessage(error)}`
        );
        duration = DEFAULT_TRACK_DURATION_SECONDS;
      }
      resolved.push({ ...scrobble, duration });
    }

    return resolved;
  }
}
