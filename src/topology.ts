// ============================================================================
// INTERSECTION TOPOLOGY - Lanes, spawn points and waypoint paths
// ============================================================================

import {
  Direction,
  IntersectionGeometry,
  Origin,
  Point,
  CAR_LENGTH,
  LANE_WIDTH,
} from './types.js';
import { SimulationConfigError } from './errors.js';

/**
 * Layout (screen coordinates, y grows downward):
 *
 *                 north
 *              ↓ ↓ ↓ │ ↑ ↑ ↑
 *        ←←←          │          ← east
 *   ─────────────────+─────────────────
 *   west →           │          →→→
 *              ↓ ↓ ↓ │ ↑ ↑ ↑
 *                 south
 *
 * Each origin has three inbound lanes counted outward from the centre line:
 * lane 0 turns left, lane 1 goes straight, lane 2 turns right.
 */

// ----------------------------------------------------------------------------
// CONFIGURATION CHECKS
// ----------------------------------------------------------------------------

export function validateGeometry(geometry: IntersectionGeometry): void {
  if (!(geometry.width > 0) || !(geometry.height > 0)) {
    throw new SimulationConfigError(
      'geometry',
      `area must have positive dimensions, got ${geometry.width}x${geometry.height}`
    );
  }
  const { pathPoints } = geometry;
  if (!Number.isInteger(pathPoints) || pathPoints < 3 || pathPoints % 3 !== 0) {
    throw new SimulationConfigError(
      'geometry.pathPoints',
      `path length must be a positive multiple of 3, got ${pathPoints}`
    );
  }
}

/**
 * Decode a maneuver index (0 = left, 1 = right, 2 = straight).
 */
export function directionFromIndex(index: number): Direction {
  switch (index) {
    case 0:
      return 'left';
    case 1:
      return 'right';
    case 2:
      return 'straight';
    default:
      throw new SimulationConfigError('direction', `invalid maneuver index ${index}`);
  }
}

// ----------------------------------------------------------------------------
// LANES AND SPAWNING
// ----------------------------------------------------------------------------

export function laneOffset(direction: Direction): number {
  switch (direction) {
    case 'left':
      return 0;
    case 'straight':
      return 1;
    case 'right':
      return 2;
  }
}

function middle(geometry: IntersectionGeometry): Point {
  return { x: geometry.width / 2, y: geometry.height / 2 };
}

/**
 * Where a vehicle of this movement group appears: half a car length outside
 * the area edge, centred on its lane.
 */
export function spawnPosition(
  origin: Origin,
  direction: Direction,
  geometry: IntersectionGeometry
): Point {
  const mid = middle(geometry);
  const lane = LANE_WIDTH / 2 + laneOffset(direction) * LANE_WIDTH;

  switch (origin) {
    case 'north':
      return { x: mid.x - lane, y: -CAR_LENGTH / 2 };
    case 'south':
      return { x: mid.x + lane, y: geometry.height + CAR_LENGTH / 2 };
    case 'east':
      return { x: geometry.width + CAR_LENGTH / 2, y: mid.y - lane };
    case 'west':
      return { x: -CAR_LENGTH / 2, y: mid.y + lane };
  }
}

/** Initial heading, pointing into the intersection */
export function spawnHeading(origin: Origin): number {
  switch (origin) {
    case 'north':
      return 90;
    case 'south':
      return 270;
    case 'east':
      return 180;
    case 'west':
      return 0;
  }
}

/**
 * Waypoint at which a vehicle without right-of-way holds. Straight paths
 * have no turn phase, so their stop line falls one point later.
 */
export function intersectionIndex(direction: Direction, geometry: IntersectionGeometry): number {
  return geometry.pathPoints / 3 + (direction === 'straight' ? 1 : 0);
}

/** Origin whose lanes a turning vehicle leaves along */
export function exitOrigin(origin: Origin, direction: 'left' | 'right'): Origin {
  if (direction === 'left') {
    switch (origin) {
      case 'north': return 'west';
      case 'south': return 'east';
      case 'east': return 'north';
      case 'west': return 'south';
    }
  }
  switch (origin) {
    case 'north': return 'east';
    case 'south': return 'west';
    case 'east': return 'south';
    case 'west': return 'north';
  }
}

// ----------------------------------------------------------------------------
// STRAIGHT RUNS
// ----------------------------------------------------------------------------

function straightRun(
  origin: Origin,
  direction: Direction,
  geometry: IntersectionGeometry,
  count: number,
  verticalGap: number,
  horizontalGap: number
): Point[] {
  const start = spawnPosition(origin, direction, geometry);
  const path: Point[] = [];

  for (let i = 0; i < count; i++) {
    switch (origin) {
      case 'north':
        path.push({ x: start.x, y: start.y + i * verticalGap });
        break;
      case 'south':
        path.push({ x: start.x, y: start.y - i * verticalGap });
        break;
      case 'east':
        path.push({ x: start.x - i * horizontalGap, y: start.y });
        break;
      case 'west':
        path.push({ x: start.x + i * horizontalGap, y: start.y });
        break;
    }
  }

  return path;
}

/** The run every vehicle makes from the edge up to its stop line */
function approachRun(origin: Origin, direction: Direction, geometry: IntersectionGeometry): Point[] {
  const third = geometry.pathPoints / 3;
  const verticalGap = (geometry.height / 2 - LANE_WIDTH * 3 + CAR_LENGTH / 2) / third;
  const horizontalGap = (geometry.width / 2 - LANE_WIDTH * 3 + CAR_LENGTH / 2) / third;
  return straightRun(origin, direction, geometry, third, verticalGap, horizontalGap);
}

/**
 * Approach run of the exit origin, shifted across the middle so it starts
 * where the turn arc ends.
 */
function departureRun(
  origin: Origin,
  direction: 'left' | 'right',
  geometry: IntersectionGeometry
): Point[] {
  const mid = middle(geometry);
  const run = approachRun(exitOrigin(origin, direction), direction, geometry);
  const shiftX = mid.x + LANE_WIDTH * 4;
  const shiftY = mid.y + LANE_WIDTH * 4;
  // Left and right turns leave on opposite sides of the entry road
  const sign = direction === 'left' ? 1 : -1;

  return run.map(point => {
    switch (origin) {
      case 'north':
        return { x: point.x + sign * shiftX, y: point.y };
      case 'south':
        return { x: point.x - sign * shiftX, y: point.y };
      case 'east':
        return { x: point.x, y: point.y + sign * shiftY };
      case 'west':
        return { x: point.x, y: point.y - sign * shiftY };
    }
  });
}

// ----------------------------------------------------------------------------
// TURN ARCS
// ----------------------------------------------------------------------------

function leftTurnArc(origin: Origin, geometry: IntersectionGeometry): Point[] {
  const mid = middle(geometry);
  const third = geometry.pathPoints / 3;
  const radius = LANE_WIDTH * 3.5;
  const offset = LANE_WIDTH * 3;

  const center: Point = {
    north: { x: mid.x + offset, y: mid.y - offset },
    south: { x: mid.x - offset, y: mid.y + offset },
    east: { x: mid.x + offset, y: mid.y + offset },
    west: { x: mid.x - offset, y: mid.y - offset },
  }[origin];

  const arc: Point[] = [];
  for (let i = 0; i < third; i++) {
    const sweep = (i / third) * (Math.PI / 2);
    const angle = origin === 'north' ? sweep - Math.PI / 2 : sweep + Math.PI / 2;
    const cos = Math.cos(angle) * radius;
    const sin = Math.sin(angle) * radius;

    switch (origin) {
      case 'north':
      case 'south':
        arc.push({ x: center.x - cos, y: center.y - sin });
        break;
      case 'east':
        arc.push({ x: center.x - sin, y: center.y + cos });
        break;
      case 'west':
        arc.push({ x: center.x + sin, y: center.y - cos });
        break;
    }
  }

  // Sampled from the exit side; driven from the entry side
  return arc.reverse();
}

function rightTurnArc(origin: Origin, geometry: IntersectionGeometry): Point[] {
  const mid = middle(geometry);
  const third = geometry.pathPoints / 3;
  const radius = LANE_WIDTH / 2;
  const offset = LANE_WIDTH * 3;

  const center: Point = {
    north: { x: mid.x - offset, y: mid.y - offset },
    south: { x: mid.x + offset, y: mid.y + offset },
    east: { x: mid.x + offset, y: mid.y - offset },
    west: { x: mid.x - offset, y: mid.y + offset },
  }[origin];

  const arc: Point[] = [];
  for (let i = 0; i < third; i++) {
    const angle = (i / third) * (Math.PI / 2);
    const cos = Math.cos(angle) * radius;
    const sin = Math.sin(angle) * radius;

    switch (origin) {
      case 'north':
        arc.push({ x: center.x + cos, y: center.y + sin });
        break;
      case 'south':
        arc.push({ x: center.x - cos, y: center.y - sin });
        break;
      case 'east':
        arc.push({ x: center.x - sin, y: center.y + cos });
        break;
      case 'west':
        arc.push({ x: center.x + sin, y: center.y - cos });
        break;
    }
  }

  return arc;
}

// ----------------------------------------------------------------------------
// PATH SYNTHESIS
// ----------------------------------------------------------------------------

/**
 * Generate the full waypoint path for a movement group: approach, turn (or
 * pass-through) and departure. Pure; the same inputs give the same path.
 */
export function synthesizePath(
  origin: Origin,
  direction: Direction,
  geometry: IntersectionGeometry
): readonly Point[] {
  validateGeometry(geometry);

  if (direction === 'straight') {
    const { pathPoints } = geometry;
    const verticalGap = (geometry.height + CAR_LENGTH / 2) / pathPoints;
    const horizontalGap = (geometry.width + CAR_LENGTH / 2) / pathPoints;
    return straightRun(origin, direction, geometry, pathPoints, verticalGap, horizontalGap);
  }

  const arc = direction === 'left'
    ? leftTurnArc(origin, geometry)
    : rightTurnArc(origin, geometry);

  return [
    ...approachRun(origin, direction, geometry),
    ...arc,
    ...departureRun(origin, direction, geometry),
  ];
}
