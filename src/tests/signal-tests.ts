/**
 * SIGNAL CONTROLLER TESTS
 * ========================
 * Phase cycling, reservations, clearance holds and the conflict rules.
 * The controller is driven tick by tick without any vehicles.
 */

import {
  expectAll,
  expectEqual,
  expectNoConflictingGrants,
  expectThrows,
  AssertionResult,
  TestCase,
  TestSuiteResult,
  runTestSuite,
  printTestSuiteResults,
} from './test-harness.js';
import {
  ConflictMatrix,
  DEFAULT_PHASE_PLAN,
  PhasePlan,
  SignalController,
  conflictsFor,
  deriveConflicts,
  movementsConflict,
} from '../signal-controller.js';
import { SimulationConfigError } from '../errors.js';
import { DEFAULT_GEOMETRY, MovementGroupKey, SignalTiming } from '../types.js';

const SHORT_TIMING: SignalTiming = { greenTicks: 5, yellowTicks: 2, clearanceTicks: 1 };

function advance(signals: SignalController, ticks: number): void {
  for (let i = 0; i < ticks; i++) signals.tick();
}

function crossingsOf(matrix: ConflictMatrix, key: MovementGroupKey): string {
  return [...(matrix.get(key) ?? [])].sort().join(',');
}

function expectPhaseGreen(signals: SignalController, phase: number, label: string): AssertionResult {
  const state = signals.state;
  const passed = state.kind === 'green' && state.phase === phase;
  return {
    passed,
    message: passed
      ? `${label}: phase ${phase} green at tick ${signals.ticks}`
      : `${label}: expected phase ${phase} green at tick ${signals.ticks}, got ${signals.describe()}`,
  };
}

// ============================================================================
// SIGNAL TEST DEFINITIONS
// ============================================================================

const signalTests: TestCase[] = [
  // -------------------------------------------------------------------------
  // Conflict rules
  // -------------------------------------------------------------------------
  {
    name: 'movementsConflict: opposing straights share a green',
    category: 'Conflicts',
    run: () => expectEqual(
      movementsConflict({ origin: 'north', direction: 'straight' }, { origin: 'south', direction: 'straight' }),
      false,
      'N straight / S straight'
    ),
  },
  {
    name: 'movementsConflict: left turn crosses the opposing straight',
    category: 'Conflicts',
    run: () => expectEqual(
      movementsConflict({ origin: 'north', direction: 'left' }, { origin: 'south', direction: 'straight' }),
      true,
      'N left / S straight'
    ),
  },
  {
    name: 'movementsConflict: opposing lefts share a green',
    category: 'Conflicts',
    run: () => expectEqual(
      movementsConflict({ origin: 'north', direction: 'left' }, { origin: 'south', direction: 'left' }),
      false,
      'N left / S left'
    ),
  },
  {
    name: 'movementsConflict: perpendicular straights conflict',
    category: 'Conflicts',
    run: () => expectEqual(
      movementsConflict({ origin: 'north', direction: 'straight' }, { origin: 'east', direction: 'straight' }),
      true,
      'N straight / E straight'
    ),
  },
  {
    name: 'movementsConflict: right turns and same-origin groups never conflict',
    category: 'Conflicts',
    run: () => expectAll(
      expectEqual(
        movementsConflict({ origin: 'north', direction: 'right' }, { origin: 'east', direction: 'straight' }),
        false,
        'N right / E straight'
      ),
      expectEqual(
        movementsConflict({ origin: 'west', direction: 'left' }, { origin: 'west', direction: 'straight' }),
        false,
        'W left / W straight'
      )
    ),
  },

  {
    name: 'deriveConflicts: crossings come from the swept footprints',
    category: 'Conflicts',
    run: () => {
      const matrix = deriveConflicts(DEFAULT_GEOMETRY);
      return expectAll(
        expectEqual(crossingsOf(matrix, 'north:left'), 'east:left,east:straight,south:straight,west:left', 'north:left'),
        expectEqual(crossingsOf(matrix, 'north:straight'), 'east:straight,south:left,west:left,west:straight', 'north:straight'),
        expectEqual(crossingsOf(matrix, 'north:right'), '', 'north:right'),
        expectEqual(crossingsOf(matrix, 'west:straight'), 'east:left,north:straight,south:left,south:straight', 'west:straight')
      );
    },
  },
  {
    name: 'deriveConflicts: a left turn clears the cross street it turns into',
    category: 'Conflicts',
    run: () => expectEqual(
      movementsConflict({ origin: 'north', direction: 'left' }, { origin: 'west', direction: 'straight' }),
      false,
      'N left / W straight'
    ),
  },
  {
    name: 'deriveConflicts: the matrix is symmetric',
    category: 'Conflicts',
    run: () => {
      const matrix = deriveConflicts(DEFAULT_GEOMETRY);
      const oneWay: string[] = [];
      for (const [key, crossings] of matrix) {
        for (const other of crossings) {
          if (!matrix.get(other)?.has(key)) oneWay.push(`${key} -> ${other}`);
        }
      }
      return expectEqual(oneWay.join('; '), '', 'one-way conflicts');
    },
  },
  {
    name: 'constructor: conflicts are derived once per geometry',
    category: 'Conflicts',
    run: () => {
      const signals = new SignalController(SHORT_TIMING, DEFAULT_PHASE_PLAN, DEFAULT_GEOMETRY);
      const wider = conflictsFor({ ...DEFAULT_GEOMETRY, width: 1200 });
      return expectAll(
        expectEqual(signals.conflicts === conflictsFor(DEFAULT_GEOMETRY), true, 'shared matrix'),
        expectEqual(wider === signals.conflicts, false, 'separate matrix for another geometry')
      );
    },
  },

  // -------------------------------------------------------------------------
  // Plan validation
  // -------------------------------------------------------------------------
  {
    name: 'constructor: rejects a phase with crossing movements',
    category: 'Validation',
    run: () => {
      const plan: PhasePlan = [[
        { origin: 'north', direction: 'straight' },
        { origin: 'east', direction: 'straight' },
      ]];
      return expectThrows(() => new SignalController(SHORT_TIMING, plan), SimulationConfigError, 'crossing plan');
    },
  },
  {
    name: 'constructor: rejects an empty plan and an empty phase',
    category: 'Validation',
    run: () => expectAll(
      expectThrows(() => new SignalController(SHORT_TIMING, []), SimulationConfigError, 'empty plan'),
      expectThrows(() => new SignalController(SHORT_TIMING, [[]]), SimulationConfigError, 'empty phase')
    ),
  },
  {
    name: 'constructor: rejects zero or fractional durations',
    category: 'Validation',
    run: () => expectAll(
      expectThrows(
        () => new SignalController({ ...SHORT_TIMING, greenTicks: 0 }),
        SimulationConfigError,
        'greenTicks 0'
      ),
      expectThrows(
        () => new SignalController({ ...SHORT_TIMING, clearanceTicks: 1.5 }),
        SimulationConfigError,
        'clearanceTicks 1.5'
      )
    ),
  },
  {
    name: 'constructor: default plan is accepted',
    category: 'Validation',
    run: () => {
      const signals = new SignalController();
      return expectAll(
        expectEqual(signals.plan.length, DEFAULT_PHASE_PLAN.length, 'phases'),
        expectEqual(signals.describe(), 'phase 0 green [north:straight, north:right, south:straight, south:right]', 'initial state')
      );
    },
  },

  // -------------------------------------------------------------------------
  // Cycling
  // -------------------------------------------------------------------------
  {
    name: 'tick: green, yellow, all-red, next green',
    category: 'Cycling',
    run: () => {
      const signals = new SignalController(SHORT_TIMING);
      advance(signals, 4);
      const greenAt4 = expectEqual(signals.isGreen('north', 'straight'), true, 'green at tick 4');
      signals.tick();
      const yellowAt5 = expectAll(
        expectEqual(signals.isYellow('south', 'right'), true, 'yellow at tick 5'),
        expectEqual(signals.isGreen('south', 'right'), false, 'not green at tick 5'),
        expectEqual(signals.activeGroups().length, 4, 'groups still active while yellow')
      );
      advance(signals, 2);
      const clearAt7 = expectAll(
        expectEqual(signals.state.kind, 'clearance', 'all-red at tick 7'),
        expectEqual(signals.activeGroups().length, 0, 'no groups active'),
        expectEqual(signals.describe(), 'all-red after phase 0', 'description')
      );
      signals.tick();
      return expectAll(greenAt4, yellowAt5, clearAt7, expectPhaseGreen(signals, 1, 'tick 8'));
    },
  },
  {
    name: 'tick: reports only the ticks where the state changed',
    category: 'Cycling',
    run: () => {
      const signals = new SignalController(SHORT_TIMING);
      const changedAt: number[] = [];
      for (let i = 0; i < 8; i++) {
        if (signals.tick()) changedAt.push(signals.ticks);
      }
      return expectEqual(changedAt.join(','), '5,7,8', 'change ticks');
    },
  },
  {
    name: 'tick: a single-phase plan returns to itself',
    category: 'Cycling',
    run: () => {
      const signals = new SignalController(SHORT_TIMING, [[{ origin: 'west', direction: 'left' }]]);
      advance(signals, 8);
      return expectPhaseGreen(signals, 0, 'after one cycle');
    },
  },
  {
    name: 'colorOf: groups outside the plan stay red',
    category: 'Cycling',
    run: () => {
      const signals = new SignalController(SHORT_TIMING, [[{ origin: 'north', direction: 'straight' }]]);
      let everGreen = false;
      for (let i = 0; i < 50; i++) {
        if (signals.isGreen('east', 'straight', 3)) everGreen = true;
        signals.tick();
      }
      return expectAll(
        expectEqual(everGreen, false, 'east:straight ever green'),
        expectEqual(signals.groupOf(3), null, 'no reservation taken')
      );
    },
  },

  // -------------------------------------------------------------------------
  // Reservations and demand
  // -------------------------------------------------------------------------
  {
    name: 'isGreen: a waiting car pulls its phase forward',
    category: 'Demand',
    run: () => {
      const signals = new SignalController(SHORT_TIMING);
      signals.isGreen('east', 'straight', 7);
      advance(signals, 8);
      return expectPhaseGreen(signals, 2, 'tick 8');
    },
  },
  {
    name: 'isGreen: re-registering moves the car to its new group',
    category: 'Demand',
    run: () => {
      const signals = new SignalController(SHORT_TIMING);
      signals.isGreen('north', 'straight', 5);
      signals.isGreen('east', 'left', 5);
      return expectAll(
        expectEqual(signals.groupOf(5), 'east:left', 'group'),
        expectEqual(signals.waitingCount('north', 'straight'), 0, 'north:straight waiting'),
        expectEqual(signals.waitingCount('east', 'left'), 1, 'east:left waiting')
      );
    },
  },
  {
    name: 'removeCar: a commit holds the all-red open',
    category: 'Demand',
    run: () => {
      const signals = new SignalController({ greenTicks: 5, yellowTicks: 2, clearanceTicks: 3 });
      signals.isGreen('north', 'straight', 1);
      advance(signals, 9);
      signals.removeCar({ id: 1, origin: 'north', direction: 'straight' });
      advance(signals, 2);
      const heldAt11 = expectEqual(signals.state.kind, 'clearance', 'still all-red at tick 11');
      signals.tick();
      return expectAll(heldAt11, expectPhaseGreen(signals, 1, 'tick 12'));
    },
  },
  {
    name: 'removeCar: an untracked car changes nothing',
    category: 'Demand',
    run: () => {
      const signals = new SignalController({ greenTicks: 5, yellowTicks: 2, clearanceTicks: 3 });
      advance(signals, 9);
      signals.removeCar({ id: 99, origin: 'north', direction: 'straight' });
      signals.tick();
      return expectPhaseGreen(signals, 1, 'tick 10');
    },
  },
  {
    name: 'removeCar: releasing twice is harmless',
    category: 'Demand',
    run: () => {
      const signals = new SignalController(SHORT_TIMING);
      const car = { id: 4, origin: 'south' as const, direction: 'left' as const };
      signals.isGreen(car.origin, car.direction, car.id);
      signals.removeCar(car);
      signals.removeCar(car);
      return expectAll(
        expectEqual(signals.groupOf(4), null, 'reservation'),
        expectEqual(signals.waitingCount('south', 'left'), 0, 'waiting')
      );
    },
  },

  // -------------------------------------------------------------------------
  // Safety
  // -------------------------------------------------------------------------
  {
    name: 'activeGroups: never two crossing movements across 2000 ticks',
    category: 'Safety',
    run: () => {
      const signals = new SignalController();
      for (let i = 0; i < 2000; i++) {
        // Spread demand over every phase so skipping never hides one
        signals.isGreen('north', 'left', 1);
        signals.isGreen('west', 'straight', 2);
        const check = expectNoConflictingGrants(signals);
        if (!check.passed) return check;
        signals.tick();
      }
      return { passed: true, message: 'No conflicting grants in 2000 ticks' };
    },
  },
];

// ============================================================================
// MAIN RUNNER
// ============================================================================

let lastResults: TestSuiteResult | null = null;

export async function runSignalTests(): Promise<void> {
  const results = await runTestSuite('Signal Controller Tests', signalTests);
  lastResults = results;
  printTestSuiteResults(results);

  if (results.failed > 0) {
    console.log('\n⚠️  Some signal tests failed!');
  }
}

export function getSignalTestResults(): TestSuiteResult | null {
  return lastResults;
}
