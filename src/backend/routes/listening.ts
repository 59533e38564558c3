import express, { Request, Response } from 'express';

import {
  CacheStatsResponse,
  DailyListeningResponse,
  WeeklyListeningResponse,
} from '../../shared/types';
import { DailyStatsCache } from '../services/dailyStatsCache';
import { ListeningTimeService } from '../services/listeningTimeService';
import { TrackDurationCache } from '../services/trackDurationCache';
import {
  summarizeWeek,
  WeeklyStatsService,
} from '../services/weeklyStatsService';
import {
  sendAggregationError,
  sendError,
  sendSuccess,
} from '../utils/apiResponse';
import { createLogger } from '../utils/logger';
import { paginate } from '../utils/pagination';
import { formatDisplayDate, formatTimeOfDay } from '../utils/timestamps';
import {
  getQueryString,
  parsePositiveInteger,
  validateIsoDate,
  validateUsername,
} from '../utils/validation';

const MAX_ITEMS_PER_PAGE = 200;

/**
 * Checks username and date query values; sends a 400 and returns false
 * when either is missing or invalid.
 */
function checkUserAndDate(
  res: Response,
  username: string,
  date: string,
  missingDateMessage: string
): boolean {
  if (!username) {
    sendError(res, 400, 'Please enter a Last.fm username');
    return false;
  }
  if (!validateUsername(username)) {
    sendError(res, 400, 'Invalid username');
    return false;
  }
  if (!date) {
    sendError(res, 400, missingDateMessage);
    return false;
  }
  if (!validateIsoDate(date)) {
    sendError(res, 400, 'Invalid date format, expected YYYY-MM-DD');
    return false;
  }
  return true;
}

/**
 * Create listening-time routes with dependency injection
 */
export default function createListeningRouter(
  listeningTimeService: ListeningTimeService,
  weeklyStatsService: WeeklyStatsService,
  durationCache: TrackDurationCache,
  dailyCache: DailyStatsCache,
  defaultItemsPerPage = 10
) {
  const router = express.Router();
  const logger = createLogger('ListeningRoutes');

  /**
   * GET /api/v1/listening/daily?username=&date=&page=&per_page=
   * One day's scrobbles (paginated) and total listening time.
   */
  router.get('/daily', async (req: Request, res: Response) => {
    const username = getQueryString(req.query.username);
    const date = getQueryString(req.query.date);
    if (!checkUserAndDate(res, username, date, 'Please select a date')) {
      return;
    }

    const page = parsePositiveInteger(req.query.page, 1);
    if (page === null) {
      return sendError(res, 400, 'page must be a positive integer');
    }
    const perPage = parsePositiveInteger(
      req.query.per_page,
      defaultItemsPerPage
    );
    if (perPage === null || perPage > MAX_ITEMS_PER_PAGE) {
      return sendError(
        res,
        400,
        `per_page must be between 1 and ${MAX_ITEMS_PER_PAGE}`
      );
    }

    try {
      const { scrobbles, totalTime } =
        await listeningTimeService.getScrobblesAndTime(username, date);
      const { items, pagination } = paginate(scrobbles, page, perPage);

      const data: DailyListeningResponse = {
        username,
        date,
        displayDate: formatDisplayDate(date),
        scrobbles: items.map(scrobble => ({
          ...scrobble,
          time: formatTimeOfDay(scrobble.timestamp),
        })),
        totalTime,
        pagination,
      };
      if (items.length === 0) {
        data.message = `No scrobbles found for ${username} on ${date}`;
      }

      sendSuccess(res, data);
    } catch (error) {
      logger.error(`Error getting daily listening time for ${username}`, error);
      sendAggregationError(res, error);
    }
  });

  /**
   * GET /api/v1/listening/weekly?username=&start_date=
   * Seven days of listening time starting at start_date, plus weekly totals.
   */
  router.get('/weekly', async (req: Request, res: Response) => {
    const username = getQueryString(req.query.username);
    const startDate = getQueryString(req.query.start_date);
    if (
      !checkUserAndDate(
        res,
        username,
        startDate,
        'Please select a start date for the week'
      )
    ) {
      return;
    }

    try {
      const days = await weeklyStatsService.getWeeklyListeningData(
        username,
        startDate
      );

      const data: WeeklyListeningResponse = {
        username,
        startDate,
        days,
        totals: null,
      };
      if (days.some(day => day.totalSeconds > 0)) {
        data.totals = summarizeWeek(days);
      } else {
        data.message = `No scrobbles found for ${username} in the week starting ${startDate}`;
      }

      sendSuccess(res, data);
    } catch (error) {
      logger.error(`Error getting weekly listening time for ${username}`, error);
      sendAggregationError(res, error);
    }
  });

  /**
   * GET /api/v1/listening/cache
   * Number of cached track durations and daily entries.
   */
  router.get('/cache', (_req: Request, res: Response) => {
    const data: CacheStatsResponse = {
      trackDurations: durationCache.size,
      dailyEntries: dailyCache.size,
    };
    sendSuccess(res, data);
  });

  return router;
}
