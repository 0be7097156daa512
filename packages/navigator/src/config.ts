import * as path from 'path';
import { ConfigError } from './errors';
import type { FeedSource, NavigatorConfig } from './types';

export const DEFAULT_FEED_URL = 'https://cdn.mbta.com/MBTA_GTFS.zip';
const DEFAULT_CACHE_DIR = '.cache';
const DEFAULT_CACHE_MAX_AGE_HOURS = 24;

/**
 * A feed given as an http(s) URL is downloaded; anything else is a local archive path
 */
export function parseFeedSource(value: string): FeedSource {
  return /^https?:\/\//i.test(value) ? { kind: 'url', url: value } : { kind: 'file', path: value };
}

/**
 * Read the navigator configuration from the environment.
 * A positional command line argument names the feed and overrides
 * GTFS_FEED_PATH and GTFS_FEED_URL.
 *
 * @param env - usually `process.env`
 * @param args - command line arguments after the script name
 */
export function loadConfig(
  env: Record<string, string | undefined>,
  args: readonly string[] = []
): NavigatorConfig {
  const feedArgument = args.find((arg) => !arg.startsWith('-'));

  let feedSource: FeedSource;
  if (feedArgument !== undefined) {
    feedSource = parseFeedSource(feedArgument);
  } else if (env.GTFS_FEED_PATH) {
    feedSource = { kind: 'file', path: env.GTFS_FEED_PATH };
  } else {
    feedSource = { kind: 'url', url: env.GTFS_FEED_URL || DEFAULT_FEED_URL };
  }

  return {
    feedSource,
    cacheDir: path.resolve(env.GTFS_CACHE_DIR || DEFAULT_CACHE_DIR),
    cacheMaxAgeMs: parseMaxAgeHours(env.GTFS_CACHE_MAX_AGE_HOURS) * 60 * 60 * 1000,
  };
}

function parseMaxAgeHours(value: string | undefined): number {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_CACHE_MAX_AGE_HOURS;
  }

  const hours = Number(value);
  if (!Number.isFinite(hours) || hours < 0) {
    throw new ConfigError(
      `GTFS_CACHE_MAX_AGE_HOURS must be a non-negative number, got '${value}'`
    );
  }
  return hours;
}
