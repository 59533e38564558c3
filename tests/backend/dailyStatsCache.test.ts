import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import { DailyStatsCache } from '../../src/backend/services/dailyStatsCache';
import { FileStorage } from '../../src/backend/utils/fileStorage';
import { DailyListeningStats } from '../../src/shared/types';

const CACHE_FILE = 'daily-stats.json';

const nineMinutes: DailyListeningStats = {
  totalTime: { hours: 0, minutes: 9, seconds: 20, totalSeconds: 560 },
  scrobbleCount: 3,
};

const emptyDay: DailyListeningStats = {
  totalTime: { hours: 0, minutes: 0, seconds: 0, totalSeconds: 0 },
  scrobbleCount: 0,
};

describe('DailyStatsCache', () => {
  let dataDir: string;
  let fileStorage: FileStorage;
  let cache: DailyStatsCache;

  const cachePath = () => path.join(dataDir, CACHE_FILE);

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'daily-cache-'));
    fileStorage = new FileStorage(dataDir);
    cache = new DailyStatsCache(fileStorage, CACHE_FILE);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  describe('put', () => {
    it('should write the whole document keyed by username then date', async () => {
      await cache.put('alice', '2024-01-15', nineMinutes);
      await cache.put('alice', '2024-01-16', emptyDay);

      const document = JSON.parse(await fs.readFile(cachePath(), 'utf-8'));
      expect(document).toEqual({
        daily_stats: {
          alice: {
            '2024-01-15': {
              total_time: { hours: 0, minutes: 9, seconds: 20, total_seconds: 560 },
              scrobble_count: 3,
            },
            '2024-01-16': {
              total_time: { hours: 0, minutes: 0, seconds: 0, total_seconds: 0 },
              scrobble_count: 0,
            },
          },
        },
      });
    });

    it('should overwrite an existing day', async () => {
      await cache.put('alice', '2024-01-15', emptyDay);
      await cache.put('alice', '2024-01-15', nineMinutes);

      expect(cache.get('alice', '2024-01-15')).toEqual(nineMinutes);
      expect(cache.size).toBe(1);
    });

    it('should keep the value in memory when the write fails', async () => {
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      jest
        .spyOn(fileStorage, 'writeJSON')
        .mockRejectedValue(new Error('EROFS: read-only file system'));

      await expect(cache.put('alice', '2024-01-15', nineMinutes)).resolves.toBe(false);
      expect(cache.get('alice', '2024-01-15')).toEqual(nineMinutes);
      expect(errorSpy.mock.calls[0][0]).toContain(
        'Could not write daily-stats.json\nCacheIOError: Error saving daily stats to cache: EROFS: read-only file system'
      );
    });

    it('should keep every entry under concurrent writes', async () => {
      await Promise.all(
        Array.from({ length: 10 }, (_, i) =>
          cache.put(`user${i}`, '2024-01-15', nineMinutes)
        )
      );

      const reloaded = new DailyStatsCache(fileStorage, CACHE_FILE);
      await expect(reloaded.load()).resolves.toBe(10);
    });
  });

  describe('get', () => {
    it('should miss unknown users and dates', async () => {
      await cache.put('alice', '2024-01-15', nineMinutes);

      expect(cache.get('bob', '2024-01-15')).toBeUndefined();
      expect(cache.get('alice', '2024-01-14')).toBeUndefined();
    });
  });

  describe('load', () => {
    it('should start empty when no file exists', async () => {
      await expect(cache.load()).resolves.toBe(0);
    });

    it('should round-trip persisted entries', async () => {
      await cache.put('alice', '2024-01-15', nineMinutes);

      const reloaded = new DailyStatsCache(fileStorage, CACHE_FILE);
      await reloaded.load();

      expect(reloaded.get('alice', '2024-01-15')).toEqual(nineMinutes);
    });

    it('should skip malformed entries', async () => {
      await fs.writeFile(
        cachePath(),
        JSON.stringify({
          daily_stats: {
            alice: {
              '2024-01-15': {
                total_time: { hours: 0, minutes: 9, seconds: 20, total_seconds: 560 },
                scrobble_count: 3,
              },
              '2024-01-16': { total_time: 'lots', scrobble_count: 3 },
              '2024-01-17': {
                total_time: { hours: 0, minutes: 1, seconds: 0, total_seconds: 999 },
                scrobble_count: 1,
              },
            },
            bob: 'not a map',
          },
        })
      );

      await expect(cache.load()).resolves.toBe(1);
      expect(cache.get('alice', '2024-01-15')).toEqual(nineMinutes);
    });

    it('should start empty when the document is not valid JSON', async () => {
      await fs.writeFile(cachePath(), '{ "daily_stats": ');

      await expect(cache.load()).resolves.toBe(0);
    });
  });
});
