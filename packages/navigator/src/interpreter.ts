import {
  countSchedule,
  formatRouteName,
  getStopName,
  ProjectionError,
  type GTFSTrip,
  type Schedule,
} from '@gtfs-navigator/gtfs-schedule';
import { formatCommand, parseCommand, type CommandPath } from './command';
import {
  CollectionCommandError,
  EntityCommandError,
  EntityProjectionError,
  InterpreterError,
  InvalidCommandError,
  SubcommandRequiredError,
} from './errors';
import type { NavigationNode } from './navigation';
import type { ReportSink } from './report';
import type { CollectionName, EntityKind } from './types';

interface EntityCollection {
  kind: EntityKind;
  label: string;
  ids(schedule: Schedule): Iterable<string>;
  size(schedule: Schedule): number;
  has(schedule: Schedule, id: string): boolean;
  describe(schedule: Schedule, id: string): string;
}

const COLLECTIONS: Record<CollectionName, EntityCollection> = {
  stops: {
    kind: 'stop',
    label: 'Stops',
    ids: (schedule) => schedule.stops.keys(),
    size: (schedule) => schedule.stops.size,
    has: (schedule, id) => schedule.stops.has(id),
    describe: (schedule, id) => {
      const stop = schedule.stops.get(id);
      return (stop && getStopName(stop)) ?? 'Unnamed Location';
    },
  },
  routes: {
    kind: 'route',
    label: 'Routes',
    ids: (schedule) => schedule.routes.keys(),
    size: (schedule) => schedule.routes.size,
    has: (schedule, id) => schedule.routes.has(id),
    describe: (schedule, id) => {
      const route = schedule.routes.get(id);
      return route ? formatRouteName(route) : id;
    },
  },
  trips: {
    kind: 'trip',
    label: 'Trips',
    ids: (schedule) => schedule.trips.keys(),
    size: (schedule) => schedule.trips.size,
    has: (schedule, id) => schedule.trips.has(id),
    describe: (schedule, id) => describeTrip(schedule.trips.get(id)),
  },
};

const ENTITY_LABELS: Record<EntityKind, string> = {
  route: 'Route',
  stop: 'Stop',
  trip: 'Trip',
};

function describeTrip(trip: GTFSTrip | undefined): string {
  return trip?.trip_headsign ?? trip?.trip_short_name ?? 'Unnamed Trip';
}

function isCollectionName(segment: string): segment is CollectionName {
  return Object.prototype.hasOwnProperty.call(COLLECTIONS, segment);
}

/**
 * Run one command line against a node, writing its output to `sink`.
 * @throws InterpreterError
 */
export function interpret(node: NavigationNode, line: string, sink: ReportSink): void {
  interpretPath(node, parseCommand(line), sink);
}

/**
 * Run one command line, reporting a failed command as an `Error: ...` line
 * instead of throwing. Returns whether the command succeeded.
 */
export function execute(node: NavigationNode, line: string, sink: ReportSink): boolean {
  try {
    interpret(node, line, sink);
    return true;
  } catch (error) {
    if (error instanceof InterpreterError) {
      sink.line(`Error: ${error.message}`);
      return false;
    }
    throw error;
  }
}

/**
 * Node level: `info`, or one of the collections followed by its own path
 */
export function interpretPath(node: NavigationNode, path: CommandPath, sink: ReportSink): void {
  const [first, ...rest] = path;

  if (first === undefined) {
    throw new SubcommandRequiredError(node.breadcrumb());
  }

  if (first === 'info') {
    reportNodeInfo(node, sink);
    return;
  }

  if (isCollectionName(first)) {
    if (rest.length === 0) {
      throw new SubcommandRequiredError(first);
    }
    try {
      interpretCollection(node, first, rest, sink);
    } catch (error) {
      if (error instanceof InterpreterError) {
        throw new CollectionCommandError(first, error);
      }
      throw error;
    }
    return;
  }

  throw new InvalidCommandError(formatCommand(path));
}

/**
 * Collection level: `list`, `info`, or an entity id followed by a node path
 */
function interpretCollection(
  node: NavigationNode,
  name: CollectionName,
  path: CommandPath,
  sink: ReportSink
): void {
  const collection = COLLECTIONS[name];
  const [first, ...rest] = path;

  if (first === undefined) {
    throw new SubcommandRequiredError(name);
  }

  if (first === 'list') {
    for (const id of collection.ids(node.schedule)) {
      sink.line(`${id}: ${collection.describe(node.schedule, id)}`);
    }
    return;
  }

  if (first === 'info') {
    sink.line(`${collection.label}: ${collection.size(node.schedule)}`);
    return;
  }

  if (!collection.has(node.schedule, first)) {
    throw new InvalidCommandError(formatCommand(path));
  }

  let child: NavigationNode;
  try {
    child = node.select(collection.kind, first);
  } catch (error) {
    if (error instanceof ProjectionError) {
      throw new EntityProjectionError(collection.kind, first, error);
    }
    throw error;
  }

  if (rest.length === 0) {
    throw new SubcommandRequiredError(`${collection.kind} ${first}`);
  }

  try {
    interpretPath(child, rest, sink);
  } catch (error) {
    if (error instanceof InterpreterError) {
      throw new EntityCommandError(collection.kind, first, error);
    }
    throw error;
  }
}

function reportNodeInfo(node: NavigationNode, sink: ReportSink): void {
  if (node.kind !== 'feed') {
    const heading = `${ENTITY_LABELS[node.kind]} ${node.nodeId}`;
    sink.line(node.nodeName === undefined ? heading : `${heading}: ${node.nodeName}`);
  }

  const counts = countSchedule(node.schedule);
  sink.line(`Stops: ${counts.stops}`);
  sink.line(`Routes: ${counts.routes}`);
  sink.line(`Trips: ${counts.trips}`);
  sink.line(`Stop times: ${counts.stopTimes}`);
}
