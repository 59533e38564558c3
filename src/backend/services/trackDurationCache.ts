import { Mutex } from 'async-mutex';
import { parse } from 'csv-parse';
import { stringify } from 'csv-stringify/sync';

import { CacheIOError, getErrorMessage } from '../utils/errors';
import { FileStorage } from '../utils/fileStorage';
import { createLogger } from '../utils/logger';

export const DURATION_CACHE_HEADER = ['artist', 'track_name', 'duration'];

const DURATION_PATTERN = /^\d+$/;

/**
 * Track durations in seconds, keyed by the exact (artist, track) pair.
 *
 * Backed by an append-only CSV file with an in-memory mirror. Entries are
 * never invalidated; when a key appears more than once in the file the last
 * row wins on load.
 */
export class TrackDurationCache {
  private fileStorage: FileStorage;
  private fileName: string;
  private durations: Map<string, number> = new Map();
  private mutex = new Mutex();
  private logger = createLogger('TrackDurationCache');

  constructor(fileStorage: FileStorage, fileName: string) {
    this.fileStorage = fileStorage;
    this.fileName = fileName;
  }

  private key(artist: string, track: string): string {
    return JSON.stringify([artist, track]);
  }

  /**
   * Loads the persisted CSV into memory. Returns the number of entries.
   */
  async load(): Promise<number> {
    return this.mutex.runExclusive(async () => {
      let raw: string | null;
      try {
        raw = await this.fileStorage.readRaw(this.fileName);
      } catch (error) {
        const ioError = new CacheIOError(
          `Error loading song cache: ${getErrorMessage(error)}`,
          this.fileName,
          { cause: error }
        );
        this.logger.error(`Could not read ${ioError.filePath}`, ioError);
        return this.durations.size;
      }

      if (raw === null) {
        this.logger.info('No song duration cache found, starting empty');
        return this.durations.size;
      }

      let records: unknown[];
      try {
        records = await this.parseRows(raw);
      } catch (error) {
        this.logger.warn(
          `Song cache ${this.fileName} is unreadable: ${getErrorMessage(error)}`
        );
        return this.durations.size;
      }

      records.forEach((record: unknown, index: number) => {
        if (index === 0 && this.isHeader(record)) {
          return;
        }
        if (!this.loadRow(record)) {
          this.logger.warn(
            `Skipping malformed song cache row ${index + 1}`,
            record
          );
        }
      });

      this.logger.info(
        `Loaded ${this.durations.size} song durations from cache`
      );
      return this.durations.size;
    });
  }

  /**
   * Parses the CSV text into raw records. Records csv-parse cannot read
   * (bad quoting) are skipped with a warning instead of failing the load.
   */
  private parseRows(raw: string): Promise<unknown[]> {
    return new Promise((resolve, reject) => {
      const records: unknown[] = [];
      const parser = parse({
        relax_column_count: true,
        skip_empty_lines: true,
        skip_records_with_error: true,
      });

      parser.on('readable', () => {
        let record: unknown;
        while ((record = parser.read()) !== null) {
          records.push(record);
        }
      });
      parser.on('skip', (error: Error) => {
        this.logger.warn(`Skipping malformed song cache row: ${error.message}`);
      });
      parser.on('error', reject);
      parser.on('end', () => resolve(records));

      parser.write(raw);
      parser.end();
    });
  }

  private isHeader(record: unknown): boolean {
    return (
      Array.isArray(record) &&
      record[0] === DURATION_CACHE_HEADER[0] &&
      record[1] === DURATION_CACHE_HEADER[1]
    );
  }

  private loadRow(record: unknown): boolean {
    if (!Array.isArray(record) || record.length !== 3) {
      return false;
    }
    const [artist, track, duration]: unknown[] = record;
    if (
      typeof artist !== 'string' ||
      typeof track !== 'string' ||
      typeof duration !== 'string' ||
      !DURATION_PATTERN.test(duration)
    ) {
      return false;
    }

    const seconds = parseInt(duration, 10);
    if (seconds <= 0) {
      return false;
    }
    this.durations.set(this.key(artist, track), seconds);
    return true;
  }

  get(artist: string, track: string): number | undefined {
    return this.durations.get(this.key(artist, track));
  }

  has(artist: string, track: string): boolean {
    return this.durations.has(this.key(artist, track));
  }

  get size(): number {
    return this.durations.size;
  }

  /**
   * Records a duration and appends it to the CSV file. The in-memory entry
   * is kept even if the append fails. Resolves to whether the row was written.
   */
  async put(artist: string, track: string, duration: number): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      this.durations.set(this.key(artist, track), duration);

      try {
        const fileExists = await this.fileStorage.exists(this.fileName);
        const rows = fileExists
          ? [[artist, track, String(duration)]]
          : [DURATION_CACHE_HEADER, [artist, track, String(duration)]];
        await this.fileStorage.appendRaw(this.fileName, stringify(rows));

        this.logger.debug(`Added to cache: ${artist} - ${track}: ${duration}s`);
        return true;
      } catch (error) {
        const ioError = new CacheIOError(
          `Error saving song to cache: ${getErrorMessage(error)}`,
          this.fileName,
          { cause: error }
        );
        this.logger.error(`Could not append to ${ioError.filePath}`, ioError);
        return false;
      }
    });
  }
}
