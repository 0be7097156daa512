import type { GTFSTable } from './types';

/**
 * Errors raised while turning an archive into a schedule
 */
export class FeedLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FeedLoadError';
  }
}

/**
 * A single table record could not be converted into a typed value.
 * `record` is the 1-based position of the record after the header row.
 */
export class RecordParseError extends FeedLoadError {
  constructor(
    readonly table: GTFSTable,
    readonly record: number | undefined,
    readonly reason: string
  ) {
    super(record === undefined ? `${table}: ${reason}` : `${table} record ${record}: ${reason}`);
    this.name = 'RecordParseError';
  }
}

export class TableNotFoundError extends FeedLoadError {
  constructor(readonly table: GTFSTable) {
    super(`Failed to open ${table}: not found in archive`);
    this.name = 'TableNotFoundError';
  }
}

export class TableLoadError extends FeedLoadError {
  constructor(
    readonly table: GTFSTable,
    cause: Error
  ) {
    super(`Failed to load ${table}: ${cause.message}`, { cause });
    this.name = 'TableLoadError';
  }
}

/**
 * Errors raised by the projection functions
 */
export class ProjectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProjectionError';
  }
}

export class NoSuchRouteError extends ProjectionError {
  constructor(readonly routeId: string) {
    super(`No such route: ${routeId}`);
    this.name = 'NoSuchRouteError';
  }
}

export class NoSuchStopError extends ProjectionError {
  constructor(readonly stopId: string) {
    super(`No such stop: ${stopId}`);
    this.name = 'NoSuchStopError';
  }
}

export class NoSuchTripError extends ProjectionError {
  constructor(readonly tripId: string) {
    super(`No such trip: ${tripId}`);
    this.name = 'NoSuchTripError';
  }
}

export class StopDescendantsError extends ProjectionError {
  constructor(
    readonly stopId: string,
    cause: ProjectionError
  ) {
    super(`Error getting descendants for stop ${stopId}: ${cause.message}`, { cause });
    this.name = 'StopDescendantsError';
  }
}

/** Raised at load time and by projection when parent_station links loop */
export class StopHierarchyCycleError extends ProjectionError {
  constructor(readonly stopId: string) {
    super(`Stop hierarchy contains a cycle through stop ${stopId}`);
    this.name = 'StopHierarchyCycleError';
  }
}
