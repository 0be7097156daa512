import { describe, test, expect } from 'vitest';
import { GTFSParser } from './parser';
import { createSchedule } from './schedule';
import {
  buildStopHierarchy,
  collectDescendants,
  projectByRoute,
  projectByStop,
  projectByTrip,
} from './projection';
import {
  NoSuchRouteError,
  NoSuchStopError,
  NoSuchTripError,
  StopDescendantsError,
} from './errors';
import type { GTFSStop, Schedule } from './types';

// Station A has two platforms and an entrance; boarding area AB hangs off
// platform A1. Route R2 has no trips and stop D is never served.
const mockSchedule: Schedule = createSchedule({
  stops: GTFSParser.parseStops(`stop_id,stop_name,stop_lat,stop_lon,location_type,parent_station
A,Downtown,42.35,-71.06,1,
A1,Platform 1,42.351,-71.061,0,A
A2,Platform 2,42.352,-71.062,0,A
AE,North Entrance,42.353,-71.063,2,A
AB,,,,4,A1
B,Harbor,42.36,-71.05,1,
B1,Harbor Platform,42.361,-71.051,0,B
C,Elm St,42.37,-71.04,0,
D,Unserved,42.38,-71.03,0,`),
  routes: GTFSParser.parseRoutes(`route_id,route_short_name,route_long_name,route_type
R1,,Red Line,1
R2,,Blue Line,1
R3,39,,3`),
  trips: GTFSParser.parseTrips(`route_id,service_id,trip_id,trip_headsign
R1,WKDY,T1,Harbor
R1,WKDY,T2,Downtown
R3,WKDY,T3,Elm St`),
  stopTimes: GTFSParser.parseStopTimes(`trip_id,arrival_time,departure_time,stop_id,stop_sequence
T1,08:00:00,08:00:00,A1,1
T1,08:05:00,08:05:00,B1,2
T2,09:00:00,09:00:00,B1,1
T2,09:05:00,09:05:00,A2,2
T3,10:00:00,10:00:00,C,1
T3,10:10:00,10:10:00,AB,2
T3,,,,3`),
});

const ids = (map: ReadonlyMap<string, unknown>): string[] => [...map.keys()].sort();

const stopSequences = (schedule: Schedule, tripId: string): Array<[string | undefined, number]> =>
  (schedule.stopTimes.get(tripId) ?? []).map((st) => [st.stop_id, st.stop_sequence]);

describe('projectByRoute', () => {
  test('should keep exactly the route, its trips and the stops they visit', () => {
    const projected = projectByRoute(mockSchedule, 'R1');

    expect(ids(projected.routes)).toEqual(['R1']);
    expect(ids(projected.trips)).toEqual(['T1', 'T2']);
    expect(ids(projected.stops)).toEqual(['A1', 'A2', 'B1']);
    expect(ids(projected.stopTimes)).toEqual(['T1', 'T2']);
  });

  test('should regroup stop times by trip in source order', () => {
    const projected = projectByRoute(mockSchedule, 'R1');

    expect(stopSequences(projected, 'T1')).toEqual([['A1', 1], ['B1', 2]]);
    expect(stopSequences(projected, 'T2')).toEqual([['B1', 1], ['A2', 2]]);
  });

  test('should keep stop times that have no stop without adding stops for them', () => {
    const projected = projectByRoute(mockSchedule, 'R3');

    expect(stopSequences(projected, 'T3')).toEqual([['C', 1], ['AB', 2], [undefined, 3]]);
    expect(ids(projected.stops)).toEqual(['AB', 'C']);
  });

  test('should not pull in parent stations of visited stops', () => {
    const projected = projectByRoute(mockSchedule, 'R1');

    expect(projected.stops.has('A')).toBe(false);
    expect(projected.stops.has('B')).toBe(false);
  });

  test('should project a route without trips to empty collections', () => {
    const projected = projectByRoute(mockSchedule, 'R2');

    expect(ids(projected.routes)).toEqual(['R2']);
    expect(projected.trips.size).toBe(0);
    expect(projected.stops.size).toBe(0);
    expect(projected.stopTimes.size).toBe(0);
  });

  test('should fail for an unknown route', () => {
    expect(() => projectByRoute(mockSchedule, 'R9')).toThrow(NoSuchRouteError);
    expect(() => projectByRoute(mockSchedule, 'R9')).toThrow('No such route: R9');
  });

  test('should leave the source schedule untouched', () => {
    projectByRoute(mockSchedule, 'R1');

    expect(mockSchedule.routes.size).toBe(3);
    expect(mockSchedule.trips.size).toBe(3);
    expect(mockSchedule.stops.size).toBe(9);
  });
});

describe('projectByStop', () => {
  test('should include a station and its whole subtree', () => {
    const projected = projectByStop(mockSchedule, 'A');

    expect(ids(projected.stops)).toEqual(['A', 'A1', 'A2', 'AB', 'AE']);
    expect(ids(projected.trips)).toEqual(['T1', 'T2', 'T3']);
    expect(ids(projected.routes)).toEqual(['R1', 'R3']);
  });

  test('should only keep stop times at the selected stops', () => {
    const projected = projectByStop(mockSchedule, 'A');

    expect(stopSequences(projected, 'T1')).toEqual([['A1', 1]]);
    expect(stopSequences(projected, 'T2')).toEqual([['A2', 2]]);
    expect(stopSequences(projected, 'T3')).toEqual([['AB', 2]]);
  });

  test('should include descendants but not ancestors', () => {
    const projected = projectByStop(mockSchedule, 'A1');

    expect(ids(projected.stops)).toEqual(['A1', 'AB']);
    expect(ids(projected.trips)).toEqual(['T1', 'T3']);
    expect(ids(projected.routes)).toEqual(['R1', 'R3']);
  });

  test('should select only the stop itself for a leaf', () => {
    const projected = projectByStop(mockSchedule, 'C');

    expect(ids(projected.stops)).toEqual(['C']);
    expect(ids(projected.trips)).toEqual(['T3']);
    expect(ids(projected.routes)).toEqual(['R3']);
  });

  test('should succeed with empty collections for an unserved stop', () => {
    const projected = projectByStop(mockSchedule, 'D');

    expect(ids(projected.stops)).toEqual(['D']);
    expect(projected.trips.size).toBe(0);
    expect(projected.routes.size).toBe(0);
    expect(projected.stopTimes.size).toBe(0);
  });

  test('should be stable when applied again to its own result', () => {
    const once = projectByStop(mockSchedule, 'A');
    const twice = projectByStop(once, 'A');

    expect(ids(twice.stops)).toEqual(ids(once.stops));
    expect(ids(twice.trips)).toEqual(ids(once.trips));
    expect(ids(twice.routes)).toEqual(ids(once.routes));
  });

  test('should fail for an unknown stop', () => {
    expect(() => projectByStop(mockSchedule, 'Z')).toThrow(NoSuchStopError);
    expect(() => projectByStop(mockSchedule, 'Z')).toThrow('No such stop: Z');
  });

  test('should resolve a station with one platform and one trip', () => {
    const schedule = createSchedule({
      stops: GTFSParser.parseStops(`stop_id,stop_name,stop_lat,stop_lon,location_type,parent_station
A,Downtown,42.35,-71.06,1,
A1,Platform 1,42.351,-71.061,0,A`),
      routes: GTFSParser.parseRoutes(`route_id,route_long_name,route_type
R1,Red Line,1`),
      trips: GTFSParser.parseTrips(`route_id,service_id,trip_id
R1,WKDY,T1`),
      stopTimes: GTFSParser.parseStopTimes(`trip_id,stop_id,stop_sequence
T1,A1,1`),
    });

    const projected = projectByStop(schedule, 'A');

    expect(ids(projected.stops)).toEqual(['A', 'A1']);
    expect(ids(projected.trips)).toEqual(['T1']);
    expect(ids(projected.routes)).toEqual(['R1']);
  });
});

describe('projectByTrip', () => {
  test('should keep the trip, its route, stop times and stops', () => {
    const projected = projectByTrip(mockSchedule, 'T3');

    expect(ids(projected.trips)).toEqual(['T3']);
    expect(ids(projected.routes)).toEqual(['R3']);
    expect(ids(projected.stops)).toEqual(['AB', 'C']);
    expect(stopSequences(projected, 'T3')).toEqual([['C', 1], ['AB', 2], [undefined, 3]]);
  });

  test('should fail for an unknown trip', () => {
    expect(() => projectByTrip(mockSchedule, 'T9')).toThrow(NoSuchTripError);
  });
});

describe('collectDescendants', () => {
  const stop = (stop_id: string, parent_station?: string): GTFSStop => ({
    stop_id,
    location: { location_type: 'stop', stop_name: stop_id, stop_lat: 0, stop_lon: 0, parent_station },
  });

  test('should fail when a child id is not in the stop table', () => {
    const stops = new Map([['P', stop('P')]]);
    const hierarchy = { stops, children: new Map([['P', ['GHOST']]]) };

    expect(() => collectDescendants(hierarchy, 'P')).toThrow(StopDescendantsError);
    expect(() => collectDescendants(hierarchy, 'P')).toThrow(
      'Error getting descendants for stop P: No such stop: GHOST'
    );
  });

  test('should fail instead of looping on a parent cycle', () => {
    const stops = new Map([
      ['X', stop('X', 'Y')],
      ['Y', stop('Y', 'X')],
    ]);

    expect(() => collectDescendants(buildStopHierarchy(stops), 'X')).toThrow(
      'Error getting descendants for stop X: Stop hierarchy contains a cycle through stop X'
    );
  });

  test('should index children under parents missing from the table', () => {
    const stops = new Map([['S', stop('S', 'MISSING')]]);
    const hierarchy = buildStopHierarchy(stops);

    expect(hierarchy.children.get('MISSING')).toEqual(['S']);
    expect(() => collectDescendants(hierarchy, 'MISSING')).toThrow('No such stop: MISSING');
  });
});
