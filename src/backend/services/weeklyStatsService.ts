import {
  DailyListeningStats,
  WeeklyListeningDay,
  WeeklyTotals,
} from '../../shared/types';
import { getErrorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import {
  addDays,
  formatShortDate,
  getLocalDateString,
  getWeekdayName,
  parseLocalDate,
  secondsToListeningTime,
} from '../utils/timestamps';

import { DailyStatsCache } from './dailyStatsCache';
import { ListeningTimeService } from './listeningTimeService';

export const DAYS_PER_WEEK = 7;

/**
 * Sums the seven days into weekly totals.
 */
export function summarizeWeek(days: WeeklyListeningDay[]): WeeklyTotals {
  const totalSeconds = days.reduce((sum, day) => sum + day.totalSeconds, 0);
  const totalTracks = days.reduce((sum, day) => sum + day.scrobbleCount, 0);
  const { hours, minutes, seconds } = secondsToListeningTime(totalSeconds);

  return { hours, minutes, seconds, totalSeconds, totalTracks };
}

/**
 * Builds seven-day listening summaries.
 *
 * Past days come from the daily stats cache when present. Today, and any
 * day not cached yet, is recomputed through ListeningTimeService, which
 * refreshes the cache as it goes.
 */
export class WeeklyStatsService {
  private listeningTimeService: ListeningTimeService;
  private dailyCache: DailyStatsCache;
  private now: () => Date;
  private logger = createLogger('WeeklyStatsService');

  constructor(
    listeningTimeService: ListeningTimeService,
    dailyCache: DailyStatsCache,
    now: () => Date = () => new Date()
  ) {
    this.listeningTimeService = listeningTimeService;
    this.dailyCache = dailyCache;
    this.now = now;
  }

  /**
   * @param startDate - first day of the week, YYYY-MM-DD
   */
  async getWeeklyListeningData(
    username: string,
    startDate: string
  ): Promise<WeeklyListeningDay[]> {
    const start = parseLocalDate(startDate);
    if (!start) {
      throw new Error(`Invalid date: ${startDate}`);
    }
    const today = getLocalDateString(this.now());

    const week: WeeklyListeningDay[] = [];
    for (let offset = 0; offset < DAYS_PER_WEEK; offset++) {
      const day = addDays(start, offset);
      const dateStr = getLocalDateString(day);

      const cached =
        dateStr === today ? undefined : this.dailyCache.get(username, dateStr);

      let stats: DailyListeningStats;
      if (cached) {
        this.logger.debug(`Using cached daily stats for ${username} on ${dateStr}`);
        stats = cached;
      } else {
        stats = await this.computeDay(username, dateStr);
      }

      week.push({
        dayName: getWeekdayName(day),
        date: dateStr,
        shortDate: formatShortDate(day),
        totalTime: stats.totalTime,
        scrobbleCount: stats.scrobbleCount,
        totalSeconds: stats.totalTime.totalSeconds,
        hours: stats.totalTime.hours,
        minutes: stats.totalTime.minutes,
        fromCache: cached !== undefined,
      });
    }

    return week;
  }

  private async computeDay(
    username: string,
    date: string
  ): Promise<DailyListeningStats> {
    try {
      const { scrobbles, totalTime } =
        await this.listeningTimeService.getScrobblesAndTime(username, date);
      return { totalTime, scrobbleCount: scrobbles.length };
    } catch (error) {
      this.logger.error(
        `Error getting scrobbles for ${username} on ${date}: ${getErrorMessage(error)}`
      );
      return { totalTime: secondsToListeningTime(0), scrobbleCount: 0 };
    }
  }
}
