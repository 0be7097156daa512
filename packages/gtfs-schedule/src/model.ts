import type { GTFSRoute, GTFSStop } from './types';

// Unified views over the location and route-name variants

// Required on stops, stations and entrances; optional on nodes and boarding areas
export function getStopName(stop: GTFSStop): string | undefined {
  return stop.location.stop_name;
}

export function getStopLat(stop: GTFSStop): number | undefined {
  return stop.location.stop_lat;
}

export function getStopLon(stop: GTFSStop): number | undefined {
  return stop.location.stop_lon;
}

/**
 * Stations are roots of the stop hierarchy and never have a parent
 */
export function getParentStation(stop: GTFSStop): string | undefined {
  const location = stop.location;
  switch (location.location_type) {
    case 'station':
      return undefined;
    case 'stop':
    case 'entrance_exit':
    case 'generic_node':
    case 'boarding_area':
      return location.parent_station;
  }
}

export function getRouteLongName(route: GTFSRoute): string | undefined {
  const name = route.name;
  switch (name.kind) {
    case 'long':
    case 'long_and_short':
      return name.long_name;
    case 'short':
      return undefined;
  }
}

export function getRouteShortName(route: GTFSRoute): string | undefined {
  const name = route.name;
  switch (name.kind) {
    case 'short':
    case 'long_and_short':
      return name.short_name;
    case 'long':
      return undefined;
  }
}

/**
 * The long name when there is one, otherwise the short name
 */
export function getRouteName(route: GTFSRoute): string {
  const name = route.name;
  switch (name.kind) {
    case 'long':
    case 'long_and_short':
      return name.long_name;
    case 'short':
      return name.short_name;
  }
}

/**
 * "Long (Short)" when both names exist, otherwise whichever is present
 */
export function formatRouteName(route: GTFSRoute): string {
  const name = route.name;
  switch (name.kind) {
    case 'long_and_short':
      return `${name.long_name} (${name.short_name})`;
    case 'long':
      return name.long_name;
    case 'short':
      return name.short_name;
  }
}
