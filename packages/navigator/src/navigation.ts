import {
  getRouteName,
  getStopName,
  projectByRoute,
  projectByStop,
  projectByTrip,
  type Schedule,
} from '@gtfs-navigator/gtfs-schedule';
import { logger as rootLogger } from './logger';
import type { EntityKind, NodeKind } from './types';

const logger = rootLogger.child('navigation');

/**
 * One position in a navigation session: a schedule together with the
 * entity it was projected from. Nodes never change; selecting an entity
 * builds a new child node that links back to this one.
 */
export class NavigationNode {
  private constructor(
    readonly schedule: Schedule,
    readonly kind: NodeKind,
    readonly nodeId: string,
    readonly nodeName?: string,
    readonly parent?: NavigationNode
  ) {}

  /**
   * The node for a whole feed
   */
  static root(schedule: Schedule): NavigationNode {
    return new NavigationNode(schedule, 'feed', '');
  }

  isRoot(): boolean {
    return this.parent === undefined;
  }

  /**
   * Project onto one entity of this node's schedule.
   * @throws ProjectionError when the entity is missing or the stop hierarchy is broken
   */
  select(kind: EntityKind, entityId: string): NavigationNode {
    logger.debug(`Projecting ${this.breadcrumb()} onto ${kind} ${entityId}`);

    switch (kind) {
      case 'route': {
        const schedule = projectByRoute(this.schedule, entityId);
        const route = schedule.routes.get(entityId);
        return this.child(schedule, kind, entityId, route && getRouteName(route));
      }
      case 'stop': {
        const schedule = projectByStop(this.schedule, entityId);
        const stop = schedule.stops.get(entityId);
        return this.child(schedule, kind, entityId, stop && getStopName(stop));
      }
      case 'trip': {
        const schedule = projectByTrip(this.schedule, entityId);
        const trip = schedule.trips.get(entityId);
        return this.child(schedule, kind, entityId, trip?.trip_headsign ?? trip?.trip_short_name);
      }
    }
  }

  /**
   * Nodes from the root down to this one
   */
  lineage(): NavigationNode[] {
    const nodes: NavigationNode[] = [];
    let node: NavigationNode | undefined = this;
    while (node) {
      nodes.unshift(node);
      node = node.parent;
    }
    return nodes;
  }

  /**
   * Path from the root, e.g. `stop A > route R1`; the root itself is `feed`
   */
  breadcrumb(): string {
    if (this.isRoot()) {
      return 'feed';
    }
    return this.lineage()
      .filter((node) => !node.isRoot())
      .map((node) => `${node.kind} ${node.nodeId}`)
      .join(' > ');
  }

  private child(
    schedule: Schedule,
    kind: EntityKind,
    entityId: string,
    name: string | undefined
  ): NavigationNode {
    return new NavigationNode(schedule, kind, entityId, name, this);
  }
}
