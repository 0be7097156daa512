import {
  countSchedule,
  GTFSDownloader,
  type ProgressCallback,
  type Schedule,
} from '@gtfs-navigator/gtfs-schedule';
import { createHash } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { logger as rootLogger } from './logger';
import type { NavigatorConfig } from './types';

const logger = rootLogger.child('feed');

/**
 * FeedLoader reads a GTFS archive from disk or downloads it, keeping
 * downloaded archives in a cache directory, and loads the schedule once.
 */
export class FeedLoader {
  private schedule: Schedule | null = null;
  private loading: Promise<Schedule> | null = null;

  constructor(
    private readonly config: NavigatorConfig,
    private readonly callbacks: ProgressCallback = {}
  ) {}

  /**
   * Check if the schedule is loaded
   */
  isLoaded(): boolean {
    return this.schedule !== null;
  }

  /**
   * Get the loaded schedule
   */
  getSchedule(): Schedule {
    if (!this.schedule) {
      throw new Error('GTFS feed not loaded. Call load() first.');
    }
    return this.schedule;
  }

  /**
   * Load the schedule (from a local file, the cache, or a download).
   * Concurrent callers share one load.
   */
  async load(): Promise<Schedule> {
    if (this.schedule) {
      return this.schedule;
    }

    if (!this.loading) {
      this.loading = this.loadInternal().finally(() => {
        this.loading = null;
      });
    }
    return this.loading;
  }

  private async loadInternal(): Promise<Schedule> {
    try {
      const archive = await this.readArchive();
      const schedule = GTFSDownloader.extract(archive);
      const counts = countSchedule(schedule);
      logger.info(
        `Loaded GTFS feed: ${counts.stops} stops, ${counts.routes} routes, ` +
          `${counts.trips} trips, ${counts.stopTimes} stop times`
      );
      this.schedule = schedule;
      return schedule;
    } catch (error) {
      logger.error('Failed to load GTFS feed:', error instanceof Error ? error.message : error);
      throw error;
    }
  }

  private async readArchive(): Promise<Uint8Array> {
    const source = this.config.feedSource;

    if (source.kind === 'file') {
      logger.info('Reading GTFS feed from', source.path);
      return fs.readFileSync(source.path);
    }

    const cached = this.loadFromCache(source.url);
    if (cached) {
      logger.info('Loaded GTFS feed from cache');
      return cached;
    }

    logger.info('Downloading GTFS feed from', source.url);
    const archive = await GTFSDownloader.download(source.url, this.callbacks);
    this.saveToCache(source.url, archive);
    return archive;
  }

  private cacheFile(url: string): string {
    const key = createHash('sha256').update(url).digest('hex').slice(0, 16);
    return path.join(this.config.cacheDir, `gtfs-${key}.zip`);
  }

  private loadFromCache(url: string): Uint8Array | null {
    const file = this.cacheFile(url);
    try {
      if (!fs.existsSync(file)) {
        return null;
      }

      const age = Date.now() - fs.statSync(file).mtimeMs;
      if (age > this.config.cacheMaxAgeMs) {
        logger.info('Cache expired, will download fresh data');
        return null;
      }

      return fs.readFileSync(file);
    } catch (error) {
      logger.warn('Failed to load from cache:', error);
      return null;
    }
  }

  private saveToCache(url: string, archive: Uint8Array): void {
    try {
      fs.mkdirSync(this.config.cacheDir, { recursive: true });
      fs.writeFileSync(this.cacheFile(url), archive);
      logger.debug('Cached GTFS feed in', this.config.cacheDir);
    } catch (error) {
      logger.warn('Failed to save to cache:', error);
    }
  }

  /**
   * Remove the cached archive for the configured feed URL
   */
  clearCache(): void {
    if (this.config.feedSource.kind !== 'url') {
      return;
    }

    const file = this.cacheFile(this.config.feedSource.url);
    try {
      if (fs.existsSync(file)) {
        fs.unlinkSync(file);
        logger.info('Cache cleared');
      }
    } catch (error) {
      logger.error('Failed to clear cache:', error);
    }
  }
}
