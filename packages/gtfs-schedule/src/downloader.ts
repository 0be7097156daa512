import { strFromU8, unzipSync } from 'fflate';
import {
  FeedLoadError,
  StopHierarchyCycleError,
  TableLoadError,
  TableNotFoundError,
} from './errors';
import { GTFSParser } from './parser';
import { createSchedule, findStopHierarchyCycle } from './schedule';
import type { GTFSTable, Schedule } from './types';

/**
 * Progress callback for download
 */
export interface ProgressCallback {
  onDownloadProgress?: (loaded: number, total: number) => void;
}

const REQUIRED_TABLES: readonly GTFSTable[] = [
  'stops.txt',
  'routes.txt',
  'trips.txt',
  'stop_times.txt',
];

/**
 * GTFS archive downloader and loader
 */
export class GTFSDownloader {
  /**
   * Download a GTFS archive, reporting progress as chunks arrive.
   * `total` is 0 when the server does not send a content length.
   */
  static async download(url: string, callbacks?: ProgressCallback): Promise<Uint8Array> {
    const response = await fetch(url);

    if (!response.ok) {
      throw new FeedLoadError(
        `Failed to download GTFS data: ${response.status} ${response.statusText}`
      );
    }

    if (!response.body) {
      throw new FeedLoadError('Failed to download GTFS data: response body is null');
    }

    const contentLength = response.headers.get('content-length');
    const total = Number.parseInt(contentLength ?? '', 10) || 0;

    const reader = response.body.getReader();
    const chunks: Uint8Array[] = [];
    let loaded = 0;

    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      chunks.push(value);
      loaded += value.byteLength;
      callbacks?.onDownloadProgress?.(loaded, total);
    }

    return concatChunks(chunks, loaded);
  }

  /**
   * Extract the four schedule tables from a zipped feed and load them.
   * Tables may sit in a sub-directory of the archive.
   */
  static extract(zipData: Uint8Array): Schedule {
    let files: Record<string, Uint8Array>;
    try {
      files = unzipSync(zipData, {
        filter: (file) => tableNameOf(file.name) !== undefined,
      });
    } catch (error) {
      throw new FeedLoadError('Failed to read GTFS archive', { cause: error });
    }

    const tables = new Map<GTFSTable, string>();
    for (const [filename, data] of Object.entries(files)) {
      const table = tableNameOf(filename);
      if (table !== undefined && !tables.has(table)) {
        tables.set(table, strFromU8(data));
      }
    }

    const readTable = <T>(table: GTFSTable, parse: (csv: string) => T[]): T[] => {
      const csv = tables.get(table);
      if (csv === undefined) {
        throw new TableNotFoundError(table);
      }
      try {
        return parse(csv);
      } catch (error) {
        throw error instanceof Error ? new TableLoadError(table, error) : error;
      }
    };

    const schedule = createSchedule({
      stops: readTable('stops.txt', (csv) => GTFSParser.parseStops(csv)),
      routes: readTable('routes.txt', (csv) => GTFSParser.parseRoutes(csv)),
      trips: readTable('trips.txt', (csv) => GTFSParser.parseTrips(csv)),
      stopTimes: readTable('stop_times.txt', (csv) => GTFSParser.parseStopTimes(csv)),
    });

    const cycleStopId = findStopHierarchyCycle(schedule);
    if (cycleStopId !== undefined) {
      const cause = new StopHierarchyCycleError(cycleStopId);
      throw new FeedLoadError(`Invalid stop hierarchy: ${cause.message}`, { cause });
    }

    return schedule;
  }

  /**
   * Download and load a feed in one step
   */
  static async fetchAndExtract(url: string, callbacks?: ProgressCallback): Promise<Schedule> {
    const zipData = await this.download(url, callbacks);
    return this.extract(zipData);
  }
}

function tableNameOf(filename: string): GTFSTable | undefined {
  const basename = filename.split('/').pop();
  return REQUIRED_TABLES.find((table) => table === basename);
}

function concatChunks(chunks: Uint8Array[], totalLength: number): Uint8Array {
  const combined = new Uint8Array(totalLength);
  let offset = 0;
  for (const chunk of chunks) {
    combined.set(chunk, offset);
    offset += chunk.length;
  }
  return combined;
}
