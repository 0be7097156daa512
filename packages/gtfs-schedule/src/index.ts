/**
 * GTFS schedule model and projections
 *
 * This package provides:
 * - Typed stops, routes, trips and stop times, with per-location-type variants
 * - Parsing of the stops/routes/trips/stop_times tables
 * - Loading a schedule from a zipped feed
 * - Projection of a schedule onto the entities reachable from one route,
 *   stop or trip
 */

export * from './types';
export * from './errors';
export * from './model';
export * from './schedule';
export * from './parser';
export * from './projection';
export * from './downloader';
export * from './utils';
