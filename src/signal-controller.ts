// ============================================================================
// SIGNAL CONTROLLER - Right-of-way scheduling for the intersection
// ============================================================================
// Cycles through a plan of phases. Each phase is a set of movement groups
// whose swept footprints never cross one another; a phase runs green, then yellow, then an
// all-red clearance interval before the next phase turns green.
//
// Vehicles register a reservation by querying isGreen() with their id and
// release it with removeCar() once committed past the stop line. The last
// commit of a phase holds the following clearance interval open, so a
// conflicting green never starts while a committed car is still crossing.
// ============================================================================

import {
  Direction,
  IntersectionGeometry,
  MovementGroup,
  MovementGroupKey,
  Origin,
  Quad,
  SignalColor,
  SignalTiming,
  DEFAULT_GEOMETRY,
  DEFAULT_SIGNAL_TIMING,
  DIRECTIONS,
  ORIGINS,
  groupKey,
} from './types.js';
import { SimulationConfigError } from './errors.js';
import { angleTo, distance, rectangleVertices, rectanglesOverlap } from './geometry.js';
import { intersectionIndex, synthesizePath } from './topology.js';

/** Identity the controller needs to track a vehicle */
export interface SimplifiedCar {
  id: number;
  origin: Origin;
  direction: Direction;
}

/** The query surface vehicles use during update() */
export interface RightOfWay {
  isGreen(origin: Origin, direction: Direction, carId?: number): boolean;
  isYellow(origin: Origin, direction: Direction): boolean;
  removeCar(car: SimplifiedCar): void;
}

export type SignalState =
  | { kind: 'green'; phase: number; since: number }
  | { kind: 'yellow'; phase: number; since: number }
  | { kind: 'clearance'; previous: number; since: number };

export type PhasePlan = readonly (readonly MovementGroup[])[];

// ----------------------------------------------------------------------------
// CONFLICTS
// ----------------------------------------------------------------------------

/** For each group, the groups whose footprints it sweeps across */
export type ConflictMatrix = ReadonlyMap<MovementGroupKey, ReadonlySet<MovementGroupKey>>;

// Longest step between footprint samples along a maneuver
const SWEEP_STEP = 10;

/**
 * Footprints a vehicle of the group occupies from its stop line through the
 * turn (or pass-through) phase and onto the first departure waypoint.
 */
function maneuverFootprints(group: MovementGroup, geometry: IntersectionGeometry): Quad[] {
  const path = synthesizePath(group.origin, group.direction, geometry);
  const first = intersectionIndex(group.direction, geometry);
  const last = Math.min(first + geometry.pathPoints / 3, path.length - 1);
  const footprints: Quad[] = [];

  for (let i = first; i < last; i++) {
    const from = path[i];
    const to = path[i + 1];
    const heading = angleTo(from, to);
    const steps = Math.max(1, Math.ceil(distance(from, to) / SWEEP_STEP));
    for (let s = 0; s < steps; s++) {
      const t = s / steps;
      const point = { x: from.x + (to.x - from.x) * t, y: from.y + (to.y - from.y) * t };
      footprints.push(rectangleVertices(point, heading));
    }
    if (i === last - 1) {
      footprints.push(rectangleVertices(to, heading));
    }
  }

  return footprints;
}

/**
 * Sweep every pair of movement groups across the maneuver phase and record
 * the pairs whose footprints overlap anywhere. Groups from the same origin
 * never conflict; they queue in parallel lanes.
 */
export function deriveConflicts(geometry: IntersectionGeometry): ConflictMatrix {
  const groups = ORIGINS.flatMap(origin => DIRECTIONS.map((direction): MovementGroup => ({ origin, direction })));
  const footprints = groups.map(group => maneuverFootprints(group, geometry));
  const matrix = new Map<MovementGroupKey, Set<MovementGroupKey>>(
    groups.map((group): [MovementGroupKey, Set<MovementGroupKey>] => [groupKey(group.origin, group.direction), new Set()])
  );

  for (let i = 0; i < groups.length; i++) {
    for (let j = i + 1; j < groups.length; j++) {
      if (groups[i].origin === groups[j].origin) continue;

      const crosses = footprints[i].some(a => footprints[j].some(b => rectanglesOverlap(a, b)));
      if (!crosses) continue;

      const a = groupKey(groups[i].origin, groups[i].direction);
      const b = groupKey(groups[j].origin, groups[j].direction);
      matrix.get(a)?.add(b);
      matrix.get(b)?.add(a);
    }
  }

  return matrix;
}

const conflictCache = new Map<string, ConflictMatrix>();

/** Conflict matrix for a geometry, derived once and then reused */
export function conflictsFor(geometry: IntersectionGeometry = DEFAULT_GEOMETRY): ConflictMatrix {
  const cacheKey = `${geometry.width}x${geometry.height}/${geometry.pathPoints}`;
  let matrix = conflictCache.get(cacheKey);
  if (!matrix) {
    matrix = deriveConflicts(geometry);
    conflictCache.set(cacheKey, matrix);
  }
  return matrix;
}

/** Whether two movements sweep across each other inside the box */
export function movementsConflict(
  a: MovementGroup,
  b: MovementGroup,
  conflicts: ConflictMatrix = conflictsFor()
): boolean {
  return conflicts.get(groupKey(a.origin, a.direction))?.has(groupKey(b.origin, b.direction)) ?? false;
}

export const DEFAULT_PHASE_PLAN: PhasePlan = [
  [
    { origin: 'north', direction: 'straight' },
    { origin: 'north', direction: 'right' },
    { origin: 'south', direction: 'straight' },
    { origin: 'south', direction: 'right' },
  ],
  [
    { origin: 'north', direction: 'left' },
    { origin: 'south', direction: 'left' },
  ],
  [
    { origin: 'east', direction: 'straight' },
    { origin: 'east', direction: 'right' },
    { origin: 'west', direction: 'straight' },
    { origin: 'west', direction: 'right' },
  ],
  [
    { origin: 'east', direction: 'left' },
    { origin: 'west', direction: 'left' },
  ],
];

/** Every pair of groups in the list that may not share a green */
export function conflictingPairs(
  groups: readonly MovementGroup[],
  conflicts: ConflictMatrix = conflictsFor()
): [MovementGroup, MovementGroup][] {
  const pairs: [MovementGroup, MovementGroup][] = [];
  for (let i = 0; i < groups.length; i++) {
    for (let j = i + 1; j < groups.length; j++) {
      if (movementsConflict(groups[i], groups[j], conflicts)) {
        pairs.push([groups[i], groups[j]]);
      }
    }
  }
  return pairs;
}

function validatePlan(plan: PhasePlan, timing: SignalTiming, conflicts: ConflictMatrix): void {
  if (plan.length === 0) {
    throw new SimulationConfigError('signals.plan', 'phase plan is empty');
  }
  plan.forEach((phase, index) => {
    if (phase.length === 0) {
      throw new SimulationConfigError('signals.plan', `phase ${index} grants no movements`);
    }
    const [conflict] = conflictingPairs(phase, conflicts);
    if (conflict) {
      const [a, b] = conflict;
      throw new SimulationConfigError(
        'signals.plan',
        `phase ${index} grants conflicting movements ${groupKey(a.origin, a.direction)} and ${groupKey(b.origin, b.direction)}`
      );
    }
  });
  const durations: [keyof SignalTiming, number][] = [
    ['greenTicks', timing.greenTicks],
    ['yellowTicks', timing.yellowTicks],
    ['clearanceTicks', timing.clearanceTicks],
  ];
  for (const [name, ticks] of durations) {
    if (!Number.isInteger(ticks) || ticks < 1) {
      throw new SimulationConfigError(`signals.${name}`, `must be a positive whole number of ticks, got ${ticks}`);
    }
  }
}

// ----------------------------------------------------------------------------
// CONTROLLER
// ----------------------------------------------------------------------------

export class SignalController implements RightOfWay {
  readonly plan: PhasePlan;
  readonly timing: SignalTiming;
  readonly conflicts: ConflictMatrix;

  private currentState: SignalState = { kind: 'green', phase: 0, since: 0 };
  private tickCount = 0;

  // group key -> index of the phase granting it
  private readonly phaseOfGroup = new Map<MovementGroupKey, number>();
  // car id -> group it holds a reservation in
  private readonly reservations = new Map<number, MovementGroupKey>();
  // group key -> tick of the last car that committed through
  private readonly lastCommit = new Map<MovementGroupKey, number>();

  constructor(
    timing: SignalTiming = DEFAULT_SIGNAL_TIMING,
    plan: PhasePlan = DEFAULT_PHASE_PLAN,
    geometry: IntersectionGeometry = DEFAULT_GEOMETRY
  ) {
    this.conflicts = conflictsFor(geometry);
    validatePlan(plan, timing, this.conflicts);
    this.plan = plan;
    this.timing = timing;

    plan.forEach((phase, index) => {
      for (const group of phase) {
        this.phaseOfGroup.set(groupKey(group.origin, group.direction), index);
      }
    });
  }

  get state(): SignalState {
    return this.currentState;
  }

  get ticks(): number {
    return this.tickCount;
  }

  // --------------------------------------------------------------------------
  // QUERIES
  // --------------------------------------------------------------------------

  isGreen(origin: Origin, direction: Direction, carId?: number): boolean {
    const key = groupKey(origin, direction);
    if (carId !== undefined && this.phaseOfGroup.has(key)) {
      this.reservations.set(carId, key);
    }
    return this.colorOf(key) === 'green';
  }

  isYellow(origin: Origin, direction: Direction): boolean {
    return this.colorOf(groupKey(origin, direction)) === 'yellow';
  }

  /** Groups outside the plan are always red */
  colorOf(key: MovementGroupKey): SignalColor {
    const phase = this.phaseOfGroup.get(key);
    const state = this.currentState;
    if (phase === undefined || state.kind === 'clearance' || state.phase !== phase) {
      return 'red';
    }
    return state.kind;
  }

  /** Groups currently allowed to enter (green or yellow) */
  activeGroups(): readonly MovementGroup[] {
    const state = this.currentState;
    return state.kind === 'clearance' ? [] : this.plan[state.phase];
  }

  waitingCount(origin: Origin, direction: Direction): number {
    const key = groupKey(origin, direction);
    let count = 0;
    for (const group of this.reservations.values()) {
      if (group === key) count++;
    }
    return count;
  }

  groupOf(carId: number): MovementGroupKey | null {
    return this.reservations.get(carId) ?? null;
  }

  describe(): string {
    const state = this.currentState;
    if (state.kind === 'clearance') {
      return `all-red after phase ${state.previous}`;
    }
    const groups = this.plan[state.phase].map(g => groupKey(g.origin, g.direction)).join(', ');
    return `phase ${state.phase} ${state.kind} [${groups}]`;
  }

  // --------------------------------------------------------------------------
  // RESERVATIONS
  // --------------------------------------------------------------------------

  removeCar(car: SimplifiedCar): void {
    const key = this.reservations.get(car.id);
    if (key === undefined) return;

    this.reservations.delete(car.id);
    this.lastCommit.set(key, this.tickCount);
  }

  // --------------------------------------------------------------------------
  // PHASE ADVANCE
  // --------------------------------------------------------------------------

  /** Advance one tick. Returns true when the signal state changed. */
  tick(): boolean {
    this.tickCount++;
    const state = this.currentState;
    const elapsed = this.tickCount - state.since;

    switch (state.kind) {
      case 'green':
        if (elapsed >= this.timing.greenTicks) {
          this.currentState = { kind: 'yellow', phase: state.phase, since: this.tickCount };
          return true;
        }
        return false;

      case 'yellow':
        if (elapsed >= this.timing.yellowTicks) {
          this.currentState = { kind: 'clearance', previous: state.phase, since: this.tickCount };
          return true;
        }
        return false;

      case 'clearance':
        if (elapsed >= this.timing.clearanceTicks && this.phaseCleared(state.previous)) {
          this.currentState = { kind: 'green', phase: this.nextPhase(state.previous), since: this.tickCount };
          return true;
        }
        return false;
    }
  }

  private phaseCleared(phase: number): boolean {
    for (const group of this.plan[phase]) {
      const committedAt = this.lastCommit.get(groupKey(group.origin, group.direction));
      if (committedAt !== undefined && this.tickCount - committedAt < this.timing.clearanceTicks) {
        return false;
      }
    }
    return true;
  }

  /** Next phase in order with a waiting car, or simply the next one */
  private nextPhase(previous: number): number {
    const waiting = new Set(this.reservations.values());
    for (let step = 1; step <= this.plan.length; step++) {
      const candidate = (previous + step) % this.plan.length;
      const hasDemand = this.plan[candidate].some(group =>
        waiting.has(groupKey(group.origin, group.direction))
      );
      if (hasDemand) return candidate;
    }
    return (previous + 1) % this.plan.length;
  }
}
