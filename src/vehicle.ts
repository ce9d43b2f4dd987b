// ============================================================================
// VEHICLE - Kinematics and path following
// ============================================================================

import {
  Direction,
  IntersectionGeometry,
  Origin,
  Point,
  Quad,
  StopReason,
  DEFAULT_GEOMETRY,
  FOLLOWING,
  PHYSICS,
} from './types.js';
import {
  angleTo,
  carsIntersect,
  distance,
  normalizeAngle,
  rectangleVertices,
  rectanglesOverlap,
  toRadians,
} from './geometry.js';
import {
  intersectionIndex,
  spawnHeading,
  spawnPosition,
  synthesizePath,
} from './topology.js';
import { RightOfWay, SimplifiedCar } from './signal-controller.js';

/**
 * Read-only copy of a vehicle, taken before a tick so that every vehicle
 * reads its peers as they were at the start of that tick.
 */
export interface VehicleView {
  readonly id: number;
  readonly origin: Origin;
  readonly direction: Direction;
  readonly x: number;
  readonly y: number;
  readonly heading: number;
}

export class Vehicle {
  readonly id: number;
  readonly origin: Origin;
  readonly direction: Direction;
  readonly path: readonly Point[];
  readonly intersectionIndex: number;

  // Position and orientation
  x: number;
  y: number;
  heading: number;          // degrees
  targetHeading: number;    // degrees

  // Kinematics
  speed = 0;
  stopReason: StopReason | null = null;

  // Navigation
  pathIndex = 1;
  pathIndexOnRedChange: number | null = null;
  throughIntersection = false;
  finished = false;

  // Ticks spent standing still (for stall detection)
  waitTicks = 0;

  constructor(
    id: number,
    origin: Origin,
    direction: Direction,
    geometry: IntersectionGeometry = DEFAULT_GEOMETRY
  ) {
    this.id = id;
    this.origin = origin;
    this.direction = direction;
    this.path = synthesizePath(origin, direction, geometry);
    this.intersectionIndex = intersectionIndex(direction, geometry);

    const start = spawnPosition(origin, direction, geometry);
    this.x = start.x;
    this.y = start.y;
    this.heading = spawnHeading(origin);
    this.targetHeading = this.heading;
  }

  get stopped(): boolean {
    return this.stopReason !== null;
  }

  get position(): Point {
    return { x: this.x, y: this.y };
  }

  view(): VehicleView {
    return {
      id: this.id,
      origin: this.origin,
      direction: this.direction,
      x: this.x,
      y: this.y,
      heading: this.heading,
    };
  }

  private simplified(): SimplifiedCar {
    return { id: this.id, origin: this.origin, direction: this.direction };
  }

  // --------------------------------------------------------------------------
  // UPDATE
  // --------------------------------------------------------------------------

  /**
   * Advance one tick. Steps run in a fixed order: the stop decisions read the
   * flags set by the intersection bookkeeping above them.
   */
  update(peers: readonly VehicleView[], rightOfWay: RightOfWay): void {
    if (this.finished) return;

    // Committed past the stop line: give up the reservation once
    if (!this.throughIntersection && this.pastIntersection()) {
      this.throughIntersection = true;
      rightOfWay.removeCar(this.simplified());
    }

    // Waiting right at the stop line when the group turns yellow: go
    if (
      rightOfWay.isYellow(this.origin, this.direction) &&
      this.pathIndex === this.intersectionIndex &&
      !this.throughIntersection
    ) {
      rightOfWay.removeCar(this.simplified());
      this.throughIntersection = true;
    }

    this.stopForSignal(rightOfWay);
    this.followLeader(peers);

    this.updateSpeed();
    this.x += Math.cos(toRadians(this.heading)) * this.speed;
    this.y += Math.sin(toRadians(this.heading)) * this.speed;

    this.advanceWaypoint();

    this.heading += normalizeAngle(this.targetHeading - this.heading) * PHYSICS.TURN_SMOOTHING;
  }

  private pastIntersection(): boolean {
    return this.pathIndex > this.intersectionIndex;
  }

  private stopForSignal(rightOfWay: RightOfWay): void {
    if (this.throughIntersection) {
      this.stopReason = null;
      this.pathIndexOnRedChange = null;
      return;
    }

    // Red only holds a car whose next waypoint is the stop line; the query
    // still runs first so every approaching car registers its reservation
    const canGo =
      rightOfWay.isGreen(this.origin, this.direction, this.id) ||
      this.pathIndex !== this.intersectionIndex;

    if (canGo) {
      this.pathIndexOnRedChange = null;
      if (this.stopReason === 'signal') this.stopReason = null;
      return;
    }

    if (this.stopReason !== 'signal') {
      this.pathIndexOnRedChange = this.pathIndex;
    }
    this.stopReason = 'signal';
  }

  private followLeader(peers: readonly VehicleView[]): void {
    if (this.throughIntersection) return;

    const gap = this.distanceToLeader(peers);
    if (!this.stopped && gap > FOLLOWING.EPSILON && gap < FOLLOWING.GAP) {
      this.stopReason = 'collision';
    } else if (this.stopReason === 'collision' && gap > FOLLOWING.GAP) {
      this.stopReason = null;
    }
  }

  /**
   * Distance to the nearest vehicle of the same movement group that is level
   * with or ahead of this one along the origin's travel axis.
   */
  distanceToLeader(peers: readonly VehicleView[]): number {
    let closest = Infinity;

    for (const peer of peers) {
      if (peer.id === this.id || peer.origin !== this.origin || peer.direction !== this.direction) {
        continue;
      }

      const ahead =
        (this.origin === 'north' && peer.y >= this.y) ||
        (this.origin === 'south' && peer.y <= this.y) ||
        (this.origin === 'east' && peer.x <= this.x) ||
        (this.origin === 'west' && peer.x >= this.x);
      if (!ahead) continue;

      closest = Math.min(closest, distance(this, peer));
    }

    return closest;
  }

  private updateSpeed(): void {
    if (this.stopped) {
      this.speed = Math.max(0, this.speed - PHYSICS.DECELERATION);
    } else {
      this.speed = Math.min(PHYSICS.MAX_SPEED, this.speed + PHYSICS.ACCELERATION);
    }

    if (this.speed === 0) {
      this.waitTicks++;
    }
  }

  private advanceWaypoint(): void {
    if (distance(this, this.path[this.pathIndex]) >= PHYSICS.WAYPOINT_THRESHOLD) {
      return;
    }

    this.pathIndex++;
    if (this.pathIndex >= this.path.length) {
      this.pathIndex = 0;
      this.finished = true;
    }

    if (this.pathIndex >= 1) {
      this.targetHeading = angleTo(this, this.path[this.pathIndex]);
    }
  }

  // --------------------------------------------------------------------------
  // FOOTPRINT
  // --------------------------------------------------------------------------

  vertices(): Quad {
    return rectangleVertices(this.position, this.heading);
  }

  intersectsRect(other: Quad): boolean {
    return rectanglesOverlap(this.vertices(), other);
  }

  /** True when this footprint crosses any peer's; drawn as a warning only */
  isOverlapping(peers: readonly VehicleView[]): boolean {
    return peers.some(peer =>
      peer.id !== this.id && carsIntersect(this.position, this.heading, peer, peer.heading)
    );
  }
}
