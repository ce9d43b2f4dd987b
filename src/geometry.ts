// ============================================================================
// GEOMETRY - Segment crossing, vehicle footprints, angle helpers
// ============================================================================

import { CAR_LENGTH, CAR_WIDTH, Point, Quad, Segment } from './types.js';

const DEG_TO_RAD = Math.PI / 180;

/**
 * Calculate distance between two points.
 */
export function distance(a: Point, b: Point): number {
  return Math.sqrt((b.x - a.x) ** 2 + (b.y - a.y) ** 2);
}

/**
 * Calculate angle from point a to point b, in degrees.
 */
export function angleTo(from: Point, to: Point): number {
  return Math.atan2(to.y - from.y, to.x - from.x) / DEG_TO_RAD;
}

/**
 * Normalize angle to [-180, 180] degrees.
 */
export function normalizeAngle(angle: number): number {
  while (angle > 180) angle -= 360;
  while (angle < -180) angle += 360;
  return angle;
}

export function toRadians(degrees: number): number {
  return degrees * DEG_TO_RAD;
}

// ----------------------------------------------------------------------------
// SEGMENT CROSSING
// ----------------------------------------------------------------------------

/** Positive when a → b → c turns counter-clockwise, zero when collinear */
function orientation(a: Point, b: Point, c: Point): number {
  return (b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x);
}

/**
 * Strict crossing test: each segment's endpoints lie on opposite sides of the
 * other. Touching endpoints and collinear overlap are not crossings.
 */
export function segmentsIntersect(l1: Segment, l2: Segment): boolean {
  const [a, b] = l1;
  const [c, d] = l2;
  return orientation(a, b, c) * orientation(a, b, d) < 0 &&
    orientation(c, d, a) * orientation(c, d, b) < 0;
}

// ----------------------------------------------------------------------------
// FOOTPRINTS
// ----------------------------------------------------------------------------

export function rectangleVertices(
  center: Point,
  rotation: number,
  length: number = CAR_LENGTH,
  width: number = CAR_WIDTH
): Quad {
  const cos = Math.cos(toRadians(rotation));
  const sin = Math.sin(toRadians(rotation));
  const hl = length / 2;
  const hw = width / 2;

  const corner = (lx: number, ly: number): Point => ({
    x: center.x + lx * cos - ly * sin,
    y: center.y + lx * sin + ly * cos,
  });

  return [corner(-hl, -hw), corner(hl, -hw), corner(hl, hw), corner(-hl, hw)];
}

function edges(quad: Quad): Segment[] {
  return quad.map((p, i): Segment => [p, quad[(i + 1) % quad.length]]);
}

/**
 * Two footprints overlap when any edge of one crosses any edge of the other.
 * One footprint sitting entirely inside the other (or exactly on top of it)
 * has no crossing edges and reports false; vehicles share one size, so this
 * only shows up for coincident spawns.
 */
export function rectanglesOverlap(a: Quad, b: Quad): boolean {
  const otherEdges = edges(b);
  return edges(a).some(edge => otherEdges.some(other => segmentsIntersect(edge, other)));
}

export function carsIntersect(
  position1: Point,
  rotation1: number,
  position2: Point,
  rotation2: number
): boolean {
  return rectanglesOverlap(
    rectangleVertices(position1, rotation1),
    rectangleVertices(position2, rotation2)
  );
}
