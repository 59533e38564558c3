import axios, { AxiosInstance } from 'axios';

import { Scrobble } from '../../shared/types';
import { LastFmConfig } from '../utils/config';
import { MalformedResponseError, NetworkError } from '../utils/errors';
import { createLastFmAxios } from '../utils/lastfmAxios';
import {
  assertNoApiError,
  normalizeRecentTrack,
  parseRecentTracksPage,
  parseTrackDurationMs,
} from '../utils/lastfmResponse';
import { createLogger } from '../utils/logger';
import { nowUnixSeconds } from '../utils/timestamps';

export const SCROBBLES_PER_PAGE = 200; // Last.fm max per page

export interface TrackInfo {
  /** Duration as reported by Last.fm, in milliseconds */
  durationMs: number | null;
}

/**
 * Read-only client for the two Last.fm methods this service needs:
 * user.getRecentTracks and track.getInfo.
 */
export class LastFmService {
  private http: AxiosInstance;
  private apiKey: string;
  private now: () => number;
  private logger = createLogger('LastFmService');

  constructor(
    config: LastFmConfig,
    http?: AxiosInstance,
    now: () => number = nowUnixSeconds
  ) {
    this.apiKey = config.apiKey;
    this.http = http ?? createLastFmAxios(config);
    this.now = now;
  }

  /**
   * Issues a GET against the API root and returns the decoded JSON body.
   * Error payloads in non-2xx responses surface as ApiError, everything
   * else that fails in transport as NetworkError.
   */
  private async request(
    params: Record<string, string | number>
  ): Promise<unknown> {
    try {
      const response = await this.http.get<unknown>('', {
        params: {
          ...params,
          api_key: this.apiKey,
          format: 'json',
        },
      });
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const body: unknown = error.response?.data;
        assertNoApiError(body);
        throw new NetworkError(
          `Network error when connecting to Last.fm API: ${error.message}`,
          { cause: error }
        );
      }
      throw error;
    }
  }

  /**
   * Fetches every scrobble for `username` between `from` and `to`
   * (inclusive Unix seconds), newest first. Now-playing entries are dropped.
   */
  async getRecentTracks(
    username: string,
    from: number,
    to: number
  ): Promise<Scrobble[]> {
    const scrobbles: Scrobble[] = [];
    let page = 1;
    let totalPages = 1;

    try {
      do {
        const data = await this.request({
          method: 'user.getrecenttracks',
          user: username,
          from,
          to,
          page,
          limit: SCROBBLES_PER_PAGE,
        });

        const parsed = parseRecentTracksPage(data);
        if (page === 1) {
          totalPages = parsed.totalPages;
          this.logger.debug(
            `Fetching ${totalPages} page(s) of scrobbles for ${username}`
          );
        }

        for (const item of parsed.items) {
          const scrobble = normalizeRecentTrack(item, this.now);
          if (scrobble) {
            scrobbles.push(scrobble);
          }
        }

        page++;
      } while (page <= totalPages);
    } catch (error) {
      this.logger.error(
        `Error fetching recent tracks for ${username} (page ${page})`,
        error
      );
      throw error;
    }

    // Array.prototype.sort is stable, ties keep upstream order
    return scrobbles.sort((a, b) => b.timestamp - a.timestamp);
  }

  async getTrackInfo(artist: string, track: string): Promise<TrackInfo> {
    const data = await this.request({
      method: 'track.getInfo',
      artist,
      track,
    });

    if (data === null || data === undefined || data === '') {
      throw new MalformedResponseError('Empty response from Last.fm');
    }

    return { durationMs: parseTrackDurationMs(data) };
  }
}
