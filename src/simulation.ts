// ============================================================================
// SIMULATION ENGINE - Tick loop, spawning and logging
// ============================================================================

import {
  Direction,
  Origin,
  SimConfig,
  SimulationEvent,
  SimulationLog,
  VehicleLogSnapshot,
  DEFAULT_CONFIG,
  FOLLOWING,
  ORIGINS,
  groupKey,
} from './types.js';
import { DEFAULT_PHASE_PLAN, SignalController } from './signal-controller.js';
import { Vehicle } from './vehicle.js';
import { directionFromIndex, spawnPosition, validateGeometry } from './topology.js';
import { distance } from './geometry.js';
import { logger } from './utils/logger.js';

export interface SimulationState {
  tick: number;
  vehicles: Vehicle[];

  // Counters
  totalSpawned: number;
  finishedCount: number;
  overlapCount: number;       // overlapping pairs seen, counted once per pair

  // Metrics
  throughput: number;         // vehicles per minute finishing
}

// ----------------------------------------------------------------------------
// SIMULATION CLASS
// ----------------------------------------------------------------------------

export class Simulation {
  state: SimulationState;
  signals: SignalController;
  config: SimConfig;

  private nextVehicleId = 0;
  private overlappingPairs = new Set<string>();
  private overlapping = new Set<number>();

  // Queue of vehicles waiting to spawn
  private spawnQueue = 0;
  private lastSpawnTick = 0;

  // Logging
  private log: SimulationLog;
  private lastLogTick = 0;

  constructor(config: SimConfig = DEFAULT_CONFIG) {
    validateGeometry(config.geometry);
    this.config = config;
    this.signals = new SignalController(config.signals, DEFAULT_PHASE_PLAN, config.geometry);
    this.log = this.emptyLog();
    this.state = this.emptyState();
  }

  // --------------------------------------------------------------------------
  // MAIN SIMULATION LOOP
  // --------------------------------------------------------------------------

  step(): void {
    this.state.tick++;

    if (this.signals.tick()) {
      const active = this.signals.activeGroups().map(g => groupKey(g.origin, g.direction));
      this.logEvent(null, 'SIGNAL_CHANGE', {
        state: this.signals.state.kind,
        groups: active,
      });
      logger.debug(`Signal: ${this.signals.describe()}`, { tick: this.state.tick });
    }

    this.processSpawnQueue();

    // Every vehicle reads its peers as they stood at the start of the tick
    const peers = this.state.vehicles.map(v => v.view());

    for (const vehicle of this.state.vehicles) {
      const wasThrough = vehicle.throughIntersection;
      vehicle.update(peers, this.signals);

      if (!wasThrough && vehicle.throughIntersection) {
        this.logEvent(vehicle.id, 'ENTERED_INTERSECTION', {
          origin: vehicle.origin,
          direction: vehicle.direction,
          pathIndex: vehicle.pathIndex,
        });
      }
    }

    this.detectOverlaps();

    for (const vehicle of this.state.vehicles) {
      if (vehicle.finished) {
        this.logEvent(vehicle.id, 'FINISHED', { waitTicks: vehicle.waitTicks });
      }
    }
    const finished = this.state.vehicles.filter(v => v.finished).length;
    this.state.finishedCount += finished;
    this.state.vehicles = this.state.vehicles.filter(v => !v.finished);

    this.updateCounters();

    if (this.config.enableLogging) {
      this.captureLogSnapshot();
    }
  }

  run(ticks: number): void {
    for (let i = 0; i < ticks; i++) {
      this.step();
    }
  }

  // --------------------------------------------------------------------------
  // OVERLAP FLAGS
  // --------------------------------------------------------------------------

  private detectOverlaps(): void {
    const current = this.state.vehicles.map(v => v.view());
    this.overlapping.clear();

    for (const vehicle of this.state.vehicles) {
      const others = current.filter(peer => peer.id > vehicle.id);
      for (const other of others) {
        if (!vehicle.isOverlapping([other])) continue;

        this.overlapping.add(vehicle.id);
        this.overlapping.add(other.id);

        const pair = `${vehicle.id}-${other.id}`;
        if (!this.overlappingPairs.has(pair)) {
          this.overlappingPairs.add(pair);
          this.state.overlapCount++;
          this.logEvent(vehicle.id, 'OVERLAP', { otherId: other.id });
        }
      }
    }
  }

  /** Whether the vehicle's footprint crossed another's on the last tick */
  isOverlapping(vehicleId: number): boolean {
    return this.overlapping.has(vehicleId);
  }

  // --------------------------------------------------------------------------
  // SPAWNING
  // --------------------------------------------------------------------------

  /**
   * Spawn a vehicle for the given movement group, or a random one. Returns
   * null when the group's spawn point is still occupied.
   */
  spawnVehicle(origin?: Origin, direction?: Direction): Vehicle | null {
    const spawnOrigin = origin ?? ORIGINS[Math.floor(Math.random() * ORIGINS.length)];
    const spawnDirection = direction ?? directionFromIndex(Math.floor(Math.random() * 3));

    const spawnPoint = spawnPosition(spawnOrigin, spawnDirection, this.config.geometry);
    const blocked = this.state.vehicles.some(v =>
      v.origin === spawnOrigin &&
      v.direction === spawnDirection &&
      distance(v, spawnPoint) < FOLLOWING.GAP
    );
    if (blocked) return null;

    const vehicle = new Vehicle(this.nextVehicleId++, spawnOrigin, spawnDirection, this.config.geometry);
    this.state.vehicles.push(vehicle);
    this.state.totalSpawned++;

    this.logEvent(vehicle.id, 'SPAWN', {
      origin: spawnOrigin,
      direction: spawnDirection,
      x: vehicle.x,
      y: vehicle.y,
    });

    return vehicle;
  }

  /** Queue vehicles to spawn one per spawn interval */
  fill(count: number): void {
    this.spawnQueue += count;
    this.lastSpawnTick = this.state.tick - this.config.spawnIntervalTicks;
  }

  get queuedSpawns(): number {
    return this.spawnQueue;
  }

  private processSpawnQueue(): void {
    if (this.spawnQueue <= 0) return;
    if (this.state.tick - this.lastSpawnTick < this.config.spawnIntervalTicks) return;

    // A blocked spawn point is retried on the next tick
    if (this.spawnVehicle()) {
      this.spawnQueue--;
      this.lastSpawnTick = this.state.tick;
    }
  }

  // --------------------------------------------------------------------------
  // COUNTERS AND METRICS
  // --------------------------------------------------------------------------

  private updateCounters(): void {
    const minutes = this.state.tick / this.config.ticksPerSecond / 60;
    if (minutes > 0) {
      this.state.throughput = Math.round(this.state.finishedCount / minutes);
    }
  }

  // --------------------------------------------------------------------------
  // RESET
  // --------------------------------------------------------------------------

  private emptyState(): SimulationState {
    return {
      tick: 0,
      vehicles: [],
      totalSpawned: 0,
      finishedCount: 0,
      overlapCount: 0,
      throughput: 0,
    };
  }

  private emptyLog(): SimulationLog {
    return {
      startTime: new Date().toISOString(),
      snapshots: [],
      events: [],
    };
  }

  reset(): void {
    this.state = this.emptyState();
    this.signals = new SignalController(this.config.signals, DEFAULT_PHASE_PLAN, this.config.geometry);
    this.nextVehicleId = 0;
    this.spawnQueue = 0;
    this.lastSpawnTick = 0;
    this.overlappingPairs.clear();
    this.overlapping.clear();
    this.log = this.emptyLog();
    this.lastLogTick = 0;
  }

  // --------------------------------------------------------------------------
  // LOGGING
  // --------------------------------------------------------------------------

  /** Capture snapshot of all vehicles at current tick */
  private captureLogSnapshot(): void {
    const interval = this.config.logInterval;

    if (interval > 0 && this.state.tick - this.lastLogTick < interval) {
      return;
    }
    this.lastLogTick = this.state.tick;

    for (const vehicle of this.state.vehicles) {
      const snapshot: VehicleLogSnapshot = {
        id: vehicle.id,
        tick: this.state.tick,
        origin: vehicle.origin,
        direction: vehicle.direction,

        x: Math.round(vehicle.x * 100) / 100,
        y: Math.round(vehicle.y * 100) / 100,
        heading: Math.round(vehicle.heading * 100) / 100,
        speed: Math.round(vehicle.speed * 100) / 100,

        stopReason: vehicle.stopReason,
        throughIntersection: vehicle.throughIntersection,
        pathIndex: vehicle.pathIndex,
        pathLength: vehicle.path.length,
        waitTicks: vehicle.waitTicks,
      };

      this.log.snapshots.push(snapshot);
    }
  }

  /** Log a discrete event */
  logEvent(vehicleId: number | null, type: SimulationEvent['type'], details?: Record<string, unknown>): void {
    if (!this.config.enableLogging) return;

    this.log.events.push({
      tick: this.state.tick,
      vehicleId,
      type,
      details,
    });
  }

  /** Get the complete simulation log */
  getLog(): SimulationLog {
    return this.log;
  }

  /** Export log as JSON string */
  exportLog(): string {
    return JSON.stringify(this.log, null, 2);
  }

  /** Get summary statistics from log */
  getLogSummary(): {
    totalSnapshots: number;
    totalEvents: number;
    vehicleCount: number;
    duration: number;
    signalChanges: number;
    stalledVehicles: { id: number; maxWaitTicks: number; group: string }[];
  } {
    const vehicleMaxWait = new Map<number, { wait: number; group: string }>();

    for (const snap of this.log.snapshots) {
      const current = vehicleMaxWait.get(snap.id);
      if (!current || snap.waitTicks > current.wait) {
        vehicleMaxWait.set(snap.id, { wait: snap.waitTicks, group: groupKey(snap.origin, snap.direction) });
      }
    }

    // Longer than a full signal cycle at a standstill
    const { greenTicks, yellowTicks, clearanceTicks } = this.config.signals;
    const cycle = (greenTicks + yellowTicks + clearanceTicks) * this.signals.plan.length;

    const stalledVehicles = Array.from(vehicleMaxWait.entries())
      .filter(([, data]) => data.wait > cycle)
      .map(([id, data]) => ({ id, maxWaitTicks: data.wait, group: data.group }))
      .sort((a, b) => b.maxWaitTicks - a.maxWaitTicks);

    return {
      totalSnapshots: this.log.snapshots.length,
      totalEvents: this.log.events.length,
      vehicleCount: new Set(this.log.snapshots.map(s => s.id)).size,
      duration: this.state.tick,
      signalChanges: this.log.events.filter(e => e.type === 'SIGNAL_CHANGE').length,
      stalledVehicles,
    };
  }
}
