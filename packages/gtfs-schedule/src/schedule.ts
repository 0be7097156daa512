import { getParentStation } from './model';
import type {
  GTFSRoute,
  GTFSStop,
  GTFSStopTime,
  GTFSTrip,
  Schedule,
  ScheduleCounts,
} from './types';

export interface ScheduleRecords {
  stops: Iterable<GTFSStop>;
  routes: Iterable<GTFSRoute>;
  trips: Iterable<GTFSTrip>;
  stopTimes: Iterable<GTFSStopTime>;
}

/**
 * Index record lists into a schedule.
 * A later record with an already-seen id replaces the earlier one.
 */
export function createSchedule(records: ScheduleRecords): Schedule {
  const stops = new Map<string, GTFSStop>();
  for (const stop of records.stops) {
    stops.set(stop.stop_id, stop);
  }

  const routes = new Map<string, GTFSRoute>();
  for (const route of records.routes) {
    routes.set(route.route_id, route);
  }

  const trips = new Map<string, GTFSTrip>();
  for (const trip of records.trips) {
    trips.set(trip.trip_id, trip);
  }

  return {
    stops,
    routes,
    trips,
    stopTimes: groupStopTimesByTrip(records.stopTimes),
  };
}

export function emptySchedule(): Schedule {
  return createSchedule({ stops: [], routes: [], trips: [], stopTimes: [] });
}

/**
 * Group stop times by trip_id, keeping source order within each trip
 */
export function groupStopTimesByTrip(
  stopTimes: Iterable<GTFSStopTime>
): Map<string, GTFSStopTime[]> {
  const grouped = new Map<string, GTFSStopTime[]>();
  for (const stopTime of stopTimes) {
    const group = grouped.get(stopTime.trip_id);
    if (group) {
      group.push(stopTime);
    } else {
      grouped.set(stopTime.trip_id, [stopTime]);
    }
  }
  return grouped;
}

export function* iterStopTimes(schedule: Schedule): Generator<GTFSStopTime> {
  for (const group of schedule.stopTimes.values()) {
    yield* group;
  }
}

export function countSchedule(schedule: Schedule): ScheduleCounts {
  let stopTimes = 0;
  for (const group of schedule.stopTimes.values()) {
    stopTimes += group.length;
  }

  return {
    stops: schedule.stops.size,
    routes: schedule.routes.size,
    trips: schedule.trips.size,
    stopTimes,
  };
}

/**
 * Find a stop whose chain of parent_station links leads back to itself.
 * Parent ids missing from the stop table end a chain; they are not cycles.
 */
export function findStopHierarchyCycle(schedule: Schedule): string | undefined {
  // stops whose chain is known to terminate
  const settled = new Set<string>();

  for (const start of schedule.stops.keys()) {
    const chain = new Set<string>();
    let current: string | undefined = start;

    while (current !== undefined && !settled.has(current)) {
      if (chain.has(current)) {
        return current;
      }
      chain.add(current);

      const stop = schedule.stops.get(current);
      current = stop ? getParentStation(stop) : undefined;
    }

    for (const stopId of chain) {
      settled.add(stopId);
    }
  }

  return undefined;
}
