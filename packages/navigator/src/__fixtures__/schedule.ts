import { createSchedule, GTFSParser, type Schedule } from '@gtfs-navigator/gtfs-schedule';

// Station A has two platforms and an entrance; boarding area AB hangs off
// platform A1. Route R2 has no trips, trips T4 and T5 have no stop times
// and stop D is never served.
export const STOPS_CSV = `stop_id,stop_name,stop_lat,stop_lon,location_type,parent_station
A,Downtown,42.35,-71.06,1,
A1,Platform 1,42.351,-71.061,0,A
A2,Platform 2,42.352,-71.062,0,A
AE,North Entrance,42.353,-71.063,2,A
AB,,,,4,A1
B,Harbor,42.36,-71.05,1,
B1,Harbor Platform,42.361,-71.051,0,B
C,Elm St,42.37,-71.04,0,
D,Unserved,42.38,-71.03,0,`;

export const ROUTES_CSV = `route_id,route_short_name,route_long_name,route_type
R1,,Red Line,1
R2,,Blue Line,1
R3,39,Elm Crosstown,3`;

export const TRIPS_CSV = `route_id,service_id,trip_id,trip_headsign,trip_short_name
R1,WKDY,T1,Harbor,
R1,WKDY,T2,Downtown,
R3,WKDY,T3,Elm St,
R3,WKDY,T4,,77
R3,WKDY,T5,,`;

export const STOP_TIMES_CSV = `trip_id,arrival_time,departure_time,stop_id,stop_sequence
T1,08:00:00,08:00:00,A1,1
T1,08:05:00,08:05:00,B1,2
T2,09:00:00,09:00:00,B1,1
T2,09:05:00,09:05:00,A2,2
T3,10:00:00,10:00:00,C,1
T3,10:10:00,10:10:00,AB,2
T3,,,,3`;

export function buildSchedule(): Schedule {
  return createSchedule({
    stops: GTFSParser.parseStops(STOPS_CSV),
    routes: GTFSParser.parseRoutes(ROUTES_CSV),
    trips: GTFSParser.parseTrips(TRIPS_CSV),
    stopTimes: GTFSParser.parseStopTimes(STOP_TIMES_CSV),
  });
}
