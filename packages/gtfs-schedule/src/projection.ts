import {
  NoSuchRouteError,
  NoSuchStopError,
  NoSuchTripError,
  StopDescendantsError,
  StopHierarchyCycleError,
} from './errors';
import { getParentStation } from './model';
import { groupStopTimesByTrip, iterStopTimes } from './schedule';
import type { GTFSRoute, GTFSStop, GTFSStopTime, GTFSTrip, Schedule } from './types';

/**
 * Parent -> children index over every stop of a schedule.
 * `children` may name parents that are not themselves in `stops`.
 */
export interface StopHierarchy {
  stops: ReadonlyMap<string, GTFSStop>;
  children: ReadonlyMap<string, readonly string[]>;
}

export function buildStopHierarchy(stops: ReadonlyMap<string, GTFSStop>): StopHierarchy {
  const children = new Map<string, string[]>();

  for (const stop of stops.values()) {
    const parentId = getParentStation(stop);
    if (parentId === undefined) continue;

    const siblings = children.get(parentId);
    if (siblings) {
      siblings.push(stop.stop_id);
    } else {
      children.set(parentId, [stop.stop_id]);
    }
  }

  return { stops, children };
}

/**
 * A stop together with all of its descendants (children, grandchildren, ...).
 * Ancestors are never included.
 * @throws NoSuchStopError when `stopId` is not a stop
 * @throws StopDescendantsError when a child id is missing or the links loop
 */
export function collectDescendants(
  hierarchy: StopHierarchy,
  stopId: string
): Map<string, GTFSStop> {
  const root = hierarchy.stops.get(stopId);
  if (!root) {
    throw new NoSuchStopError(stopId);
  }

  const descendants = new Map<string, GTFSStop>();
  const pending: GTFSStop[] = [root];

  while (pending.length > 0) {
    const stop = pending.pop();
    if (stop === undefined) break;

    descendants.set(stop.stop_id, stop);

    for (const childId of hierarchy.children.get(stop.stop_id) ?? []) {
      if (descendants.has(childId)) {
        throw new StopDescendantsError(stopId, new StopHierarchyCycleError(childId));
      }

      const child = hierarchy.stops.get(childId);
      if (!child) {
        throw new StopDescendantsError(stopId, new NoSuchStopError(childId));
      }
      pending.push(child);
    }
  }

  return descendants;
}

/**
 * The sub-schedule reachable from one route: the route, its trips, their
 * stop times and the stops those stop times visit.
 * @throws NoSuchRouteError
 */
export function projectByRoute(schedule: Schedule, routeId: string): Schedule {
  const route = schedule.routes.get(routeId);
  if (!route) {
    throw new NoSuchRouteError(routeId);
  }

  const trips = new Map<string, GTFSTrip>();
  for (const trip of schedule.trips.values()) {
    if (trip.route_id === routeId) {
      trips.set(trip.trip_id, trip);
    }
  }

  const stopTimes: GTFSStopTime[] = [];
  const visitedStopIds = new Set<string>();
  for (const stopTime of iterStopTimes(schedule)) {
    if (!trips.has(stopTime.trip_id)) continue;

    stopTimes.push(stopTime);
    if (stopTime.stop_id !== undefined) {
      visitedStopIds.add(stopTime.stop_id);
    }
  }

  const stops = new Map<string, GTFSStop>();
  for (const stop of schedule.stops.values()) {
    if (visitedStopIds.has(stop.stop_id)) {
      stops.set(stop.stop_id, stop);
    }
  }

  return {
    stops,
    routes: new Map([[routeId, route]]),
    trips,
    stopTimes: groupStopTimesByTrip(stopTimes),
  };
}

/**
 * The sub-schedule reachable from one stop: the stop and its descendants,
 * the stop times at any of them, and the trips and routes serving them.
 * @throws NoSuchStopError
 * @throws StopDescendantsError
 */
export function projectByStop(schedule: Schedule, stopId: string): Schedule {
  const hierarchy = buildStopHierarchy(schedule.stops);
  const descendants = collectDescendants(hierarchy, stopId);

  // source order, not traversal order
  const stops = new Map<string, GTFSStop>();
  for (const stop of schedule.stops.values()) {
    if (descendants.has(stop.stop_id)) {
      stops.set(stop.stop_id, stop);
    }
  }

  const stopTimes: GTFSStopTime[] = [];
  for (const stopTime of iterStopTimes(schedule)) {
    if (stopTime.stop_id !== undefined && stops.has(stopTime.stop_id)) {
      stopTimes.push(stopTime);
    }
  }
  const stopTimesByTrip = groupStopTimesByTrip(stopTimes);

  const trips = new Map<string, GTFSTrip>();
  const servingRouteIds = new Set<string>();
  for (const trip of schedule.trips.values()) {
    if (stopTimesByTrip.has(trip.trip_id)) {
      trips.set(trip.trip_id, trip);
      servingRouteIds.add(trip.route_id);
    }
  }

  const routes = new Map<string, GTFSRoute>();
  for (const route of schedule.routes.values()) {
    if (servingRouteIds.has(route.route_id)) {
      routes.set(route.route_id, route);
    }
  }

  return {
    stops,
    routes,
    trips,
    stopTimes: stopTimesByTrip,
  };
}

/**
 * The sub-schedule reachable from one trip: the trip, its route when the
 * schedule has it, its stop times and the stops they visit.
 * @throws NoSuchTripError
 */
export function projectByTrip(schedule: Schedule, tripId: string): Schedule {
  const trip = schedule.trips.get(tripId);
  if (!trip) {
    throw new NoSuchTripError(tripId);
  }

  const stopTimes = schedule.stopTimes.get(tripId) ?? [];
  const visitedStopIds = new Set<string>();
  for (const stopTime of stopTimes) {
    if (stopTime.stop_id !== undefined) {
      visitedStopIds.add(stopTime.stop_id);
    }
  }

  const stops = new Map<string, GTFSStop>();
  for (const stop of schedule.stops.values()) {
    if (visitedStopIds.has(stop.stop_id)) {
      stops.set(stop.stop_id, stop);
    }
  }

  const routes = new Map<string, GTFSRoute>();
  const route = schedule.routes.get(trip.route_id);
  if (route) {
    routes.set(route.route_id, route);
  }

  return {
    stops,
    routes,
    trips: new Map([[tripId, trip]]),
    stopTimes: groupStopTimesByTrip(stopTimes),
  };
}
