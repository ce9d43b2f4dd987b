// ============================================================================
// INTERSECTION SIMULATION - TYPE DEFINITIONS
// ============================================================================
// Units are screen pixels and ticks. Headings are degrees, 0 = east,
// 90 = south (y grows downward).
// ============================================================================

// ----------------------------------------------------------------------------
// VEHICLE FOOTPRINT (pixels)
// ----------------------------------------------------------------------------
export const CAR_LENGTH = 50;   // along the heading
export const CAR_WIDTH = 33;    // across the heading
export const LANE_WIDTH = CAR_WIDTH * 2;

// ----------------------------------------------------------------------------
// PHYSICS CONSTANTS (per tick)
// ----------------------------------------------------------------------------
export const PHYSICS = {
  MAX_SPEED: 5.0,
  ACCELERATION: 0.15,
  DECELERATION: 0.3,
  WAYPOINT_THRESHOLD: 5.0,    // distance at which a waypoint counts as reached
  TURN_SMOOTHING: 0.5,        // fraction of the heading error closed per tick
} as const;

// ----------------------------------------------------------------------------
// CAR FOLLOWING
// ----------------------------------------------------------------------------
export const FOLLOWING = {
  GAP: CAR_LENGTH * 2,        // stop when the leader is closer than this
  EPSILON: 3.0,               // ignore leaders this close (same spawn point)
} as const;

// ----------------------------------------------------------------------------
// BASIC GEOMETRY
// ----------------------------------------------------------------------------
export interface Point {
  x: number;
  y: number;
}

export type Segment = readonly [Point, Point];

/** Footprint corners in order around the rectangle, starting rear-left */
export type Quad = readonly [Point, Point, Point, Point];

// ============================================================================
// MOVEMENT GROUPS
// ============================================================================
export type Origin = 'north' | 'south' | 'east' | 'west';

export type Direction = 'left' | 'right' | 'straight';

export const ORIGINS: readonly Origin[] = ['north', 'south', 'east', 'west'];

export const DIRECTIONS: readonly Direction[] = ['left', 'right', 'straight'];

export interface MovementGroup {
  origin: Origin;
  direction: Direction;
}

export type MovementGroupKey = `${Origin}:${Direction}`;

export function groupKey(origin: Origin, direction: Direction): MovementGroupKey {
  return `${origin}:${direction}`;
}

// ============================================================================
// SIGNALS
// ============================================================================
export type SignalColor = 'red' | 'yellow' | 'green';

/** Phase durations, in ticks */
export interface SignalTiming {
  greenTicks: number;
  yellowTicks: number;
  clearanceTicks: number;     // minimum all-red interval between phases
}

export const DEFAULT_SIGNAL_TIMING: SignalTiming = {
  greenTicks: 240,
  yellowTicks: 60,
  clearanceTicks: 30,
};

// ----------------------------------------------------------------------------
// INTERSECTION GEOMETRY
// ----------------------------------------------------------------------------
export interface IntersectionGeometry {
  width: number;
  height: number;
  pathPoints: number;         // waypoints per path, multiple of 3
}

export const DEFAULT_GEOMETRY: IntersectionGeometry = {
  width: 1000,
  height: 1000,
  pathPoints: 24,
};

// ----------------------------------------------------------------------------
// SIMULATION CONFIGURATION
// ----------------------------------------------------------------------------
export interface SimConfig {
  geometry: IntersectionGeometry;
  signals: SignalTiming;
  spawnIntervalTicks: number; // ticks between queued spawns
  ticksPerSecond: number;     // used only to report throughput
  enableLogging: boolean;     // capture vehicle state history
  logInterval: number;        // ticks between log captures (0 = every tick)
}

export const DEFAULT_CONFIG: SimConfig = {
  geometry: DEFAULT_GEOMETRY,
  signals: DEFAULT_SIGNAL_TIMING,
  spawnIntervalTicks: 20,
  ticksPerSecond: 60,
  enableLogging: true,
  logInterval: 30,
};

// ----------------------------------------------------------------------------
// SIMULATION STATE
// ----------------------------------------------------------------------------
export type StopReason = 'signal' | 'collision';

// ----------------------------------------------------------------------------
// SIMULATION LOGGING
// ----------------------------------------------------------------------------

/** Snapshot of a single vehicle at a point in time */
export interface VehicleLogSnapshot {
  id: number;
  tick: number;
  origin: Origin;
  direction: Direction;

  x: number;
  y: number;
  heading: number;
  speed: number;

  stopReason: StopReason | null;
  throughIntersection: boolean;
  pathIndex: number;
  pathLength: number;
  waitTicks: number;
}

/** Discrete events that occur during simulation */
export interface SimulationEvent {
  tick: number;
  vehicleId: number | null;   // null for signal events
  type: 'SPAWN' | 'ENTERED_INTERSECTION' | 'FINISHED' | 'SIGNAL_CHANGE' | 'OVERLAP';
  details?: Record<string, unknown>;
}

/** Complete simulation log */
export interface SimulationLog {
  startTime: string;
  snapshots: VehicleLogSnapshot[];
  events: SimulationEvent[];
}
