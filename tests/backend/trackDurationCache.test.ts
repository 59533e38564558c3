import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import { TrackDurationCache } from '../../src/backend/services/trackDurationCache';
import { FileStorage } from '../../src/backend/utils/fileStorage';
import { logger, LogLevel } from '../../src/backend/utils/logger';

const CACHE_FILE = 'song-durations.csv';

describe('TrackDurationCache', () => {
  let dataDir: string;
  let fileStorage: FileStorage;
  let cache: TrackDurationCache;

  const cachePath = () => path.join(dataDir, CACHE_FILE);

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'duration-cache-'));
    fileStorage = new FileStorage(dataDir);
    cache = new TrackDurationCache(fileStorage, CACHE_FILE);
  });

  afterEach(async () => {
    logger.setLevel(LogLevel.ERROR);
    jest.restoreAllMocks();
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should start empty when no file exists', async () => {
      await expect(cache.load()).resolves.toBe(0);
      expect(cache.size).toBe(0);
    });

    it('should load rows and skip the header', async () => {
      await fs.writeFile(
        cachePath(),
        'artist,track_name,duration\nRadiohead,Idioteque,309\nPortishead,Roads,305\n'
      );

      await expect(cache.load()).resolves.toBe(2);
      expect(cache.get('Radiohead', 'Idioteque')).toBe(309);
      expect(cache.get('Portishead', 'Roads')).toBe(305);
    });

    it('should skip malformed rows and keep the last duplicate', async () => {
      await fs.writeFile(
        cachePath(),
        [
          'artist,track_name,duration',
          'A,B,200',
          'broken row',
          'C,D,abc',
          'E,F,0',
          'G,H,100,extra',
          'A,B,250',
          '',
        ].join('\n')
      );

      await cache.load();

      expect(cache.size).toBe(1);
      expect(cache.get('A', 'B')).toBe(250);
      expect(cache.has('C', 'D')).toBe(false);
      expect(cache.has('E', 'F')).toBe(false);
    });

    it('should warn about rows with broken quoting and keep the rest', async () => {
      logger.setLevel(LogLevel.WARN);
      const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      await fs.writeFile(
        cachePath(),
        'A,B,200\nX,Y"z,100\nC,D,300\n"E,F,400\nG,H,500\n'
      );

      await expect(cache.load()).resolves.toBe(2);

      expect(cache.get('A', 'B')).toBe(200);
      expect(cache.get('C', 'D')).toBe(300);
      expect(cache.has('X', 'Y"z')).toBe(false);
      const skipWarnings = warnSpy.mock.calls.filter(call =>
        String(call[0]).includes('Skipping malformed song cache row: ')
      );
      expect(skipWarnings).toHaveLength(2);
    });

    it('should warn about rows with the wrong shape', async () => {
      logger.setLevel(LogLevel.WARN);
      const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      await fs.writeFile(cachePath(), 'A,B,200\nC,D,abc\n');

      await cache.load();

      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(warnSpy.mock.calls[0][0]).toContain('Skipping malformed song cache row 2');
    });

    it('should not fail when the file cannot be read', async () => {
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      jest
        .spyOn(fileStorage, 'readRaw')
        .mockRejectedValue(new Error('EACCES: permission denied'));

      await expect(cache.load()).resolves.toBe(0);
      expect(errorSpy.mock.calls[0][0]).toContain(
        'Could not read song-durations.csv\nCacheIOError: Error loading song cache: EACCES: permission denied'
      );
    });
  });

  describe('get', () => {
    it('should match artist and track case-sensitively', async () => {
      await cache.put('Radiohead', 'Idioteque', 309);

      expect(cache.get('Radiohead', 'Idioteque')).toBe(309);
      expect(cache.get('radiohead', 'idioteque')).toBeUndefined();
    });
  });

  describe('put', () => {
    it('should write the header before the first row', async () => {
      await expect(cache.put('Radiohead', 'Idioteque', 309)).resolves.toBe(true);

      const content = await fs.readFile(cachePath(), 'utf-8');
      expect(content).toBe('artist,track_name,duration\nRadiohead,Idioteque,309\n');
    });

    it('should append later rows without rewriting', async () => {
      await cache.put('Radiohead', 'Idioteque', 309);
      await cache.put('Portishead', 'Roads', 305);

      const content = await fs.readFile(cachePath(), 'utf-8');
      expect(content).toBe(
        'artist,track_name,duration\nRadiohead,Idioteque,309\nPortishead,Roads,305\n'
      );
    });

    it('should quote values containing commas and quotes', async () => {
      await cache.put('Crosby, Stills & Nash', 'Say "Hi"', 200);

      const content = await fs.readFile(cachePath(), 'utf-8');
      expect(content).toBe(
        'artist,track_name,duration\n"Crosby, Stills & Nash","Say ""Hi""",200\n'
      );

      const reloaded = new TrackDurationCache(fileStorage, CACHE_FILE);
      await reloaded.load();
      expect(reloaded.get('Crosby, Stills & Nash', 'Say "Hi"')).toBe(200);
    });

    it('should keep the value in memory when the append fails', async () => {
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      jest
        .spyOn(fileStorage, 'appendRaw')
        .mockRejectedValue(new Error('ENOSPC: no space left on device'));

      await expect(cache.put('Radiohead', 'Idioteque', 309)).resolves.toBe(false);
      expect(cache.get('Radiohead', 'Idioteque')).toBe(309);
      expect(errorSpy.mock.calls[0][0]).toContain(
        'Could not append to song-durations.csv\nCacheIOError: Error saving song to cache: ENOSPC: no space left on device'
      );
    });

    it('should serialize concurrent writes', async () => {
      await Promise.all(
        Array.from({ length: 20 }, (_, i) => cache.put('Artist', `Track ${i}`, 100 + i))
      );

      const lines = (await fs.readFile(cachePath(), 'utf-8'))
        .split('\n')
        .filter(line => line.length > 0);
      expect(lines).toHaveLength(21);
      expect(lines.filter(line => line === 'artist,track_name,duration')).toHaveLength(1);
      expect(cache.size).toBe(20);
    });
  });
});
