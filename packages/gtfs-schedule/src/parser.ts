import { parse } from 'csv-parse/sync';
import { RecordParseError } from './errors';
import { isValidTimezone, parseGTFSTime } from './utils';
import type {
  ClockTime,
  ContinuityPolicy,
  Direction,
  GTFSRoute,
  GTFSStop,
  GTFSStopTime,
  GTFSTable,
  GTFSTrip,
  LocationDetails,
  RouteName,
  RouteType,
  StopPolicy,
  Timepoint,
} from './types';

type RawRecord = Record<string, string>;

const LOCATION_TYPE_CODES = ['0', '1', '2', '3', '4'] as const;

const ROUTE_TYPES: Record<string, RouteType> = {
  '0': 'tram',
  '1': 'subway',
  '2': 'rail',
  '3': 'bus',
  '4': 'ferry',
  '5': 'cable_tram',
  '6': 'aerial_lift',
  '7': 'funicular',
  '8': 'trolleybus',
  '9': 'monorail',
};

const CONTINUITY_POLICIES: Record<string, ContinuityPolicy> = {
  '0': 'continuous',
  '1': 'not_continuous',
  '2': 'phone_agency',
  '3': 'coordinate_with_driver',
};

const STOP_POLICIES: Record<string, StopPolicy> = {
  '0': 'regular',
  '1': 'unavailable',
  '2': 'phone_agency',
  '3': 'coordinate_with_driver',
};

const TIMEPOINTS: Record<string, Timepoint> = {
  '0': 'approximate',
  '1': 'exact',
};

const DIRECTIONS: Record<string, Direction> = {
  '0': 'A',
  '1': 'B',
};

const HEX_COLOR = /^[0-9a-fA-F]{6}$/;
const UNSIGNED_INTEGER = /^\d+$/;

/**
 * Typed access to the fields of one table record.
 * Empty values are treated the same as missing columns.
 */
class RecordFields {
  constructor(
    private readonly table: GTFSTable,
    private readonly record: number,
    private readonly fields: RawRecord
  ) {}

  fail(reason: string): never {
    throw new RecordParseError(this.table, this.record, reason);
  }

  hasColumn(name: string): boolean {
    return name in this.fields;
  }

  optional(name: string): string | undefined {
    const value = this.fields[name];
    return value === undefined || value === '' ? undefined : value;
  }

  required(name: string): string {
    return this.optional(name) ?? this.fail(`${name} is required`);
  }

  float(name: string): number | undefined {
    const value = this.optional(name);
    if (value === undefined) return undefined;

    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      this.fail(`invalid ${name} '${value}'`);
    }
    return parsed;
  }

  requiredFloat(name: string): number {
    return this.float(name) ?? this.fail(`${name} is required`);
  }

  unsignedInteger(name: string): number | undefined {
    const value = this.optional(name);
    if (value === undefined) return undefined;

    if (!UNSIGNED_INTEGER.test(value)) {
      this.fail(`invalid ${name} '${value}'`);
    }
    return parseInt(value, 10);
  }

  time(name: string): ClockTime | undefined {
    const value = this.optional(name);
    if (value === undefined) return undefined;

    try {
      return parseGTFSTime(value);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return this.fail(`invalid ${name}: ${reason}`);
    }
  }

  coded<T>(name: string, codes: Record<string, T>): T | undefined {
    const value = this.optional(name);
    if (value === undefined) return undefined;

    if (!Object.prototype.hasOwnProperty.call(codes, value)) {
      return this.fail(`invalid ${name} '${value}'`);
    }
    return codes[value];
  }

  /** 0 or empty: no information, 1: yes, 2: no */
  triState(name: string): boolean | undefined {
    const value = this.optional(name);
    switch (value) {
      case undefined:
      case '0':
        return undefined;
      case '1':
        return true;
      case '2':
        return false;
      default:
        return this.fail(`invalid ${name} '${value}'`);
    }
  }

  color(name: string): string | undefined {
    const value = this.optional(name);
    if (value !== undefined && !HEX_COLOR.test(value)) {
      this.fail(`invalid ${name} '${value}'`);
    }
    return value;
  }

  timezone(name: string): string | undefined {
    const value = this.optional(name);
    if (value !== undefined && !isValidTimezone(value)) {
      this.fail(`invalid ${name} '${value}'`);
    }
    return value;
  }
}

/**
 * Parse GTFS table text into typed records
 */
export class GTFSParser {
  /**
   * Parse stops.txt
   */
  static parseStops(csv: string): GTFSStop[] {
    return this.parseTable<GTFSStop>(csv, 'stops.txt', (fields) => ({
      stop_id: fields.required('stop_id'),
      stop_code: fields.optional('stop_code'),
      tts_stop_name: fields.optional('tts_stop_name'),
      stop_desc: fields.optional('stop_desc'),
      zone_id: fields.optional('zone_id'),
      stop_url: fields.optional('stop_url'),
      stop_timezone: fields.timezone('stop_timezone'),
      wheelchair_boarding: fields.triState('wheelchair_boarding'),
      level_id: fields.optional('level_id'),
      platform_code: fields.optional('platform_code'),
      location: this.parseLocation(fields),
    }));
  }

  /**
   * Parse routes.txt
   */
  static parseRoutes(csv: string): GTFSRoute[] {
    return this.parseTable<GTFSRoute>(csv, 'routes.txt', (fields) => ({
      route_id: fields.required('route_id'),
      agency_id: fields.optional('agency_id'),
      name: this.parseRouteName(fields),
      route_desc: fields.optional('route_desc'),
      // A feed without the column at all is read as trams
      route_type: fields.hasColumn('route_type')
        ? (fields.coded('route_type', ROUTE_TYPES) ?? fields.fail('route_type is required'))
        : 'tram',
      route_url: fields.optional('route_url'),
      route_color: fields.color('route_color'),
      route_text_color: fields.color('route_text_color'),
      route_sort_order: fields.unsignedInteger('route_sort_order'),
      continuous_pickup: fields.coded('continuous_pickup', CONTINUITY_POLICIES),
      continuous_drop_off: fields.coded('continuous_drop_off', CONTINUITY_POLICIES),
      network_id: fields.optional('network_id'),
    }));
  }

  /**
   * Parse trips.txt
   */
  static parseTrips(csv: string): GTFSTrip[] {
    return this.parseTable<GTFSTrip>(csv, 'trips.txt', (fields) => ({
      trip_id: fields.required('trip_id'),
      route_id: fields.required('route_id'),
      service_id: fields.required('service_id'),
      trip_headsign: fields.optional('trip_headsign'),
      trip_short_name: fields.optional('trip_short_name'),
      direction_id: fields.coded('direction_id', DIRECTIONS),
      block_id: fields.optional('block_id'),
      shape_id: fields.optional('shape_id'),
      wheelchair_accessible: fields.triState('wheelchair_accessible'),
      bikes_allowed: fields.triState('bikes_allowed'),
    }));
  }

  /**
   * Parse stop_times.txt
   * This is typically the largest file in GTFS feeds
   */
  static parseStopTimes(csv: string): GTFSStopTime[] {
    return this.parseTable<GTFSStopTime>(csv, 'stop_times.txt', (fields) => ({
      trip_id: fields.required('trip_id'),
      stop_id: fields.optional('stop_id'),
      arrival_time: fields.time('arrival_time'),
      departure_time: fields.time('departure_time'),
      location_group_id: fields.optional('location_group_id'),
      location_id: fields.optional('location_id'),
      stop_sequence:
        fields.unsignedInteger('stop_sequence') ?? fields.fail('stop_sequence is required'),
      stop_headsign: fields.optional('stop_headsign'),
      start_pickup_drop_off_window: fields.time('start_pickup_drop_off_window'),
      end_pickup_drop_off_window: fields.time('end_pickup_drop_off_window'),
      pickup_type: fields.coded('pickup_type', STOP_POLICIES),
      drop_off_type: fields.coded('drop_off_type', STOP_POLICIES),
      continuous_pickup: fields.coded('continuous_pickup', CONTINUITY_POLICIES),
      continuous_drop_off: fields.coded('continuous_drop_off', CONTINUITY_POLICIES),
      shape_dist_traveled: fields.float('shape_dist_traveled'),
      timepoint: fields.coded('timepoint', TIMEPOINTS),
      pickup_booking_rule_id: fields.optional('pickup_booking_rule_id'),
      drop_off_booking_rule_id: fields.optional('drop_off_booking_rule_id'),
    }));
  }

  private static parseLocation(fields: RecordFields): LocationDetails {
    // An absent or empty location_type means a plain stop
    const code = fields.optional('location_type') ?? '0';

    switch (code) {
      case '0':
        return {
          location_type: 'stop',
          stop_name: fields.required('stop_name'),
          stop_lat: fields.requiredFloat('stop_lat'),
          stop_lon: fields.requiredFloat('stop_lon'),
          parent_station: fields.optional('parent_station'),
        };
      case '1':
        return {
          location_type: 'station',
          stop_name: fields.required('stop_name'),
          stop_lat: fields.requiredFloat('stop_lat'),
          stop_lon: fields.requiredFloat('stop_lon'),
        };
      case '2':
        return {
          location_type: 'entrance_exit',
          stop_name: fields.required('stop_name'),
          stop_lat: fields.requiredFloat('stop_lat'),
          stop_lon: fields.requiredFloat('stop_lon'),
          parent_station: fields.required('parent_station'),
        };
      case '3':
        return {
          location_type: 'generic_node',
          stop_name: fields.optional('stop_name'),
          stop_lat: fields.float('stop_lat'),
          stop_lon: fields.float('stop_lon'),
          parent_station: fields.required('parent_station'),
        };
      case '4':
        return {
          location_type: 'boarding_area',
          stop_name: fields.optional('stop_name'),
          stop_lat: fields.float('stop_lat'),
          stop_lon: fields.float('stop_lon'),
          parent_station: fields.required('parent_station'),
        };
      default:
        return fields.fail(
          `invalid location_type '${code}', expected one of ${LOCATION_TYPE_CODES.join(', ')}`
        );
    }
  }

  private static parseRouteName(fields: RecordFields): RouteName {
    const shortName = fields.optional('route_short_name');
    const longName = fields.optional('route_long_name');

    if (shortName !== undefined && longName !== undefined) {
      return { kind: 'long_and_short', long_name: longName, short_name: shortName };
    }
    if (shortName !== undefined) {
      return { kind: 'short', short_name: shortName };
    }
    if (longName !== undefined) {
      return { kind: 'long', long_name: longName };
    }
    return fields.fail('route_short_name or route_long_name is required');
  }

  private static parseTable<T>(
    csv: string,
    table: GTFSTable,
    toRecord: (fields: RecordFields) => T
  ): T[] {
    if (csv.trim() === '') {
      throw new RecordParseError(table, undefined, 'No header found');
    }

    let rows: unknown;
    try {
      rows = parse(csv, {
        columns: true,
        bom: true,
        skip_empty_lines: true,
        trim: true,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RecordParseError(table, undefined, `Error reading CSV: ${reason}`);
    }

    return toRawRecords(rows, table).map((raw, index) =>
      toRecord(new RecordFields(table, index + 1, raw))
    );
  }
}

function toRawRecords(rows: unknown, table: GTFSTable): RawRecord[] {
  if (!Array.isArray(rows)) {
    throw new RecordParseError(table, undefined, 'Error reading CSV: unexpected parser output');
  }

  return rows.map((row: unknown) => {
    const fields: RawRecord = {};
    if (typeof row === 'object' && row !== null) {
      for (const [column, value] of Object.entries(row)) {
        if (typeof value === 'string') {
          fields[column] = value;
        }
      }
    }
    return fields;
  });
}
