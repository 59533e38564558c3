import { Mutex } from 'async-mutex';

import { DailyListeningStats } from '../../shared/types';
import { CacheIOError, getErrorMessage } from '../utils/errors';
import { FileStorage } from '../utils/fileStorage';
import { isRecord } from '../utils/lastfmResponse';
import { createLogger } from '../utils/logger';

/** On-disk shape of one day's entry */
interface PersistedDailyStats {
  total_time: {
    hours: number;
    minutes: number;
    seconds: number;
    total_seconds: number;
  };
  scrobble_count: number;
}

interface DailyStatsDocument {
  daily_stats: Record<string, Record<string, PersistedDailyStats>>;
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function fromPersisted(entry: unknown): DailyListeningStats | null {
  if (!isRecord(entry) || !isRecord(entry.total_time)) {
    return null;
  }
  const { hours, minutes, seconds, total_seconds } = entry.total_time;
  const count = entry.scrobble_count;
  if (
    !isNonNegativeInteger(hours) ||
    !isNonNegativeInteger(minutes) ||
    !isNonNegativeInteger(seconds) ||
    !isNonNegativeInteger(total_seconds) ||
    !isNonNegativeInteger(count) ||
    hours * 3600 + minutes * 60 + seconds !== total_seconds
  ) {
    return null;
  }
  return {
    totalTime: { hours, minutes, seconds, totalSeconds: total_seconds },
    scrobbleCount: count,
  };
}

function toPersisted(stats: DailyListeningStats): PersistedDailyStats {
  return {
    total_time: {
      hours: stats.totalTime.hours,
      minutes: stats.totalTime.minutes,
      seconds: stats.totalTime.seconds,
      total_seconds: stats.totalTime.totalSeconds,
    },
    scrobble_count: stats.scrobbleCount,
  };
}

/**
 * Daily listening totals keyed by username, then YYYY-MM-DD.
 *
 * The whole JSON document is rewritten on every put. Callers must not read
 * today's entry: it keeps growing until midnight.
 */
export class DailyStatsCache {
  private fileStorage: FileStorage;
  private fileName: string;
  private stats: Map<string, Map<string, DailyListeningStats>> = new Map();
  private mutex = new Mutex();
  private logger = createLogger('DailyStatsCache');

  constructor(fileStorage: FileStorage, fileName: string) {
    this.fileStorage = fileStorage;
    this.fileName = fileName;
  }

  /**
   * Loads the persisted document into memory. Returns the number of entries.
   */
  async load(): Promise<number> {
    return this.mutex.runExclusive(async () => {
      let document: unknown;
      try {
        document = await this.fileStorage.readJSON<unknown>(this.fileName);
      } catch (error) {
        const ioError = new CacheIOError(
          `Error loading daily stats cache: ${getErrorMessage(error)}`,
          this.fileName,
          { cause: error }
        );
        this.logger.error(`Could not read ${ioError.filePath}`, ioError);
        return this.size;
      }

      if (document === null) {
        this.logger.info('No daily stats cache found, starting empty');
        return this.size;
      }

      if (!isRecord(document) || !isRecord(document.daily_stats)) {
        this.logger.warn(`Daily stats cache ${this.fileName} has no daily_stats map`);
        return this.size;
      }

      for (const [username, days] of Object.entries(document.daily_stats)) {
        if (!isRecord(days)) {
          this.logger.warn(`Skipping malformed daily stats for ${username}`);
          continue;
        }
        for (const [date, entry] of Object.entries(days)) {
          const stats = fromPersisted(entry);
          if (!stats) {
            this.logger.warn(
              `Skipping malformed daily stats entry for ${username} on ${date}`
            );
            continue;
          }
          this.setInMemory(username, date, stats);
        }
      }

      this.logger.info(`Loaded daily stats for ${this.size} entries`);
      return this.size;
    });
  }

  private setInMemory(
    username: string,
    date: string,
    stats: DailyListeningStats
  ): void {
    let days = this.stats.get(username);
    if (!days) {
      days = new Map();
      this.stats.set(username, days);
    }
    days.set(date, stats);
  }

  private toDocument(): DailyStatsDocument {
    const document: DailyStatsDocument = { daily_stats: {} };
    for (const [username, days] of this.stats) {
      const persistedDays: Record<string, PersistedDailyStats> = {};
      for (const [date, stats] of days) {
        persistedDays[date] = toPersisted(stats);
      }
      document.daily_stats[username] = persistedDays;
    }
    return document;
  }

  get(username: string, date: string): DailyListeningStats | undefined {
    return this.stats.get(username)?.get(date);
  }

  get size(): number {
    let total = 0;
    for (const days of this.stats.values()) {
      total += days.size;
    }
    return total;
  }

  /**
   * Stores a day's totals and rewrites the document. The in-memory entry is
   * kept even if the write fails. Resolves to whether the file was written.
   */
  async put(
    username: string,
    date: string,
    stats: DailyListeningStats
  ): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      this.setInMemory(username, date, stats);

      try {
        await this.fileStorage.writeJSON(this.fileName, this.toDocument());
        this.logger.debug(`Saved daily stats for ${username} on ${date}`);
        return true;
      } catch (error) {
        const ioError = new CacheIOError(
          `Error saving daily stats to cache: ${getErrorMessage(error)}`,
          this.fileName,
          { cause: error }
        );
        this.logger.error(`Could not write ${ioError.filePath}`, ioError);
        return false;
      }
    });
  }
}
