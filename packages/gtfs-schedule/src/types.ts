/**
 * GTFS schedule type definitions
 * Based on the GTFS specification: https://gtfs.org/reference/static
 *
 * Field names match the column names of the feed tables. Coded columns are
 * decoded into string literal unions; clock times are seconds since midnight.
 */

/** Seconds since midnight, hour taken modulo 24 */
export type ClockTime = number;

export type RouteType =
  | 'tram'
  | 'subway'
  | 'rail'
  | 'bus'
  | 'ferry'
  | 'cable_tram'
  | 'aerial_lift'
  | 'funicular'
  | 'trolleybus'
  | 'monorail';

/** continuous_pickup / continuous_drop_off, on routes and stop times */
export type ContinuityPolicy =
  | 'continuous'
  | 'not_continuous'
  | 'phone_agency'
  | 'coordinate_with_driver';

/** pickup_type / drop_off_type */
export type StopPolicy = 'regular' | 'unavailable' | 'phone_agency' | 'coordinate_with_driver';

export type Timepoint = 'approximate' | 'exact';

export type Direction = 'A' | 'B';

// Location types. Required fields differ per location_type, so each one is
// its own variant rather than a single shape with everything optional.

export interface StopLocation {
  location_type: 'stop';
  stop_name: string;
  stop_lat: number;
  stop_lon: number;
  parent_station?: string;
}

export interface StationLocation {
  location_type: 'station';
  stop_name: string;
  stop_lat: number;
  stop_lon: number;
}

export interface EntranceExitLocation {
  location_type: 'entrance_exit';
  stop_name: string;
  stop_lat: number;
  stop_lon: number;
  parent_station: string;
}

export interface GenericNodeLocation {
  location_type: 'generic_node';
  stop_name?: string;
  stop_lat?: number;
  stop_lon?: number;
  parent_station: string;
}

export interface BoardingAreaLocation {
  location_type: 'boarding_area';
  stop_name?: string;
  stop_lat?: number;
  stop_lon?: number;
  parent_station: string;
}

export type LocationDetails =
  | StopLocation
  | StationLocation
  | EntranceExitLocation
  | GenericNodeLocation
  | BoardingAreaLocation;

export type LocationType = LocationDetails['location_type'];

export interface GTFSStop {
  readonly stop_id: string;
  readonly stop_code?: string;
  readonly tts_stop_name?: string;
  readonly stop_desc?: string;
  readonly zone_id?: string;
  readonly stop_url?: string;
  readonly stop_timezone?: string;
  /** undefined when the feed gives no information */
  readonly wheelchair_boarding?: boolean;
  readonly level_id?: string;
  readonly platform_code?: string;
  readonly location: Readonly<LocationDetails>;
}

/** A route needs a short name, a long name, or both */
export type RouteName =
  | { kind: 'short'; short_name: string }
  | { kind: 'long'; long_name: string }
  | { kind: 'long_and_short'; long_name: string; short_name: string };

export interface GTFSRoute {
  readonly route_id: string;
  readonly agency_id?: string;
  readonly name: Readonly<RouteName>;
  readonly route_desc?: string;
  readonly route_type: RouteType;
  readonly route_url?: string;
  /** Six hex digits, no leading '#' */
  readonly route_color?: string;
  readonly route_text_color?: string;
  readonly route_sort_order?: number;
  readonly continuous_pickup?: ContinuityPolicy;
  readonly continuous_drop_off?: ContinuityPolicy;
  readonly network_id?: string;
}

export interface GTFSTrip {
  readonly trip_id: string;
  readonly route_id: string;
  readonly service_id: string;
  readonly trip_headsign?: string;
  readonly trip_short_name?: string;
  readonly direction_id?: Direction;
  readonly block_id?: string;
  readonly shape_id?: string;
  readonly wheelchair_accessible?: boolean;
  readonly bikes_allowed?: boolean;
}

export interface GTFSStopTime {
  readonly trip_id: string;
  /** Absent for stop times served through a location group or area */
  readonly stop_id?: string;
  readonly arrival_time?: ClockTime;
  readonly departure_time?: ClockTime;
  readonly location_group_id?: string;
  readonly location_id?: string;
  readonly stop_sequence: number;
  readonly stop_headsign?: string;
  readonly start_pickup_drop_off_window?: ClockTime;
  readonly end_pickup_drop_off_window?: ClockTime;
  readonly pickup_type?: StopPolicy;
  readonly drop_off_type?: StopPolicy;
  readonly continuous_pickup?: ContinuityPolicy;
  readonly continuous_drop_off?: ContinuityPolicy;
  readonly shape_dist_traveled?: number;
  readonly timepoint?: Timepoint;
  readonly pickup_booking_rule_id?: string;
  readonly drop_off_booking_rule_id?: string;
}

/**
 * The whole feed, or a projected subset of it.
 * stopTimes is keyed by trip_id; each group keeps source order.
 */
export interface Schedule {
  readonly stops: ReadonlyMap<string, GTFSStop>;
  readonly routes: ReadonlyMap<string, GTFSRoute>;
  readonly trips: ReadonlyMap<string, GTFSTrip>;
  readonly stopTimes: ReadonlyMap<string, readonly GTFSStopTime[]>;
}

export interface ScheduleCounts {
  stops: number;
  routes: number;
  trips: number;
  stopTimes: number;
}

/** The four tables a schedule is loaded from */
export type GTFSTable = 'stops.txt' | 'routes.txt' | 'trips.txt' | 'stop_times.txt';
