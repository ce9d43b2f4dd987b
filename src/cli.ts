#!/usr/bin/env node
/**
 * HEADLESS SIMULATION RUNNER
 * ===========================
 * Runs the intersection for a fixed number of ticks and prints a summary.
 *
 * Usage:
 *   crossroads-sim [--ticks <n>] [--vehicles <n>] [--export <path>]
 *
 * Geometry and signal timing come from the environment (or a .env file):
 *   SIM_WIDTH, SIM_HEIGHT, SIM_PATH_POINTS, SIM_SPAWN_INTERVAL,
 *   SIM_GREEN_TICKS, SIM_YELLOW_TICKS, SIM_CLEARANCE_TICKS, LOG_LEVEL
 */

import * as fs from 'fs';
import { env, simConfigFromEnv } from './config/env.js';
import { Simulation } from './simulation.js';
import { SimulationConfigError } from './errors.js';
import { logger } from './utils/logger.js';

interface RunOptions {
  ticks: number;
  vehicles: number;
  exportPath: string | null;
}

function parseArgs(args: string[]): RunOptions {
  const options: RunOptions = {
    ticks: 3600,
    vehicles: 60,
    exportPath: null,
  };

  const valueAfter = (flag: string): string | undefined => {
    const index = args.indexOf(flag);
    return index !== -1 ? args[index + 1] : undefined;
  };

  const ticks = Number(valueAfter('--ticks'));
  if (Number.isInteger(ticks) && ticks > 0) options.ticks = ticks;

  const vehicles = Number(valueAfter('--vehicles'));
  if (Number.isInteger(vehicles) && vehicles >= 0) options.vehicles = vehicles;

  options.exportPath = valueAfter('--export') ?? null;

  return options;
}

function main(): void {
  const options = parseArgs(process.argv.slice(2));
  const config = simConfigFromEnv();

  logger.info('Starting intersection simulation', {
    env: env.nodeEnv,
    logLevel: env.logLevel,
    ticks: options.ticks,
    vehicles: options.vehicles,
    area: `${config.geometry.width}x${config.geometry.height}`,
  });

  const sim = new Simulation(config);
  sim.fill(options.vehicles);
  sim.run(options.ticks);

  const summary = sim.getLogSummary();
  logger.info('Simulation complete', {
    ticks: sim.state.tick,
    spawned: sim.state.totalSpawned,
    finished: sim.state.finishedCount,
    stillQueued: sim.queuedSpawns,
    onRoad: sim.state.vehicles.length,
    overlaps: sim.state.overlapCount,
    throughputPerMinute: sim.state.throughput,
    signalChanges: summary.signalChanges,
  });

  for (const stalled of summary.stalledVehicles.slice(0, 5)) {
    logger.warn(`Vehicle ${stalled.id} (${stalled.group}) stood still for ${stalled.maxWaitTicks} ticks`);
  }

  if (options.exportPath) {
    fs.writeFileSync(options.exportPath, sim.exportLog());
    logger.info(`Log written to ${options.exportPath}`, { events: summary.totalEvents });
  }
}

try {
  main();
} catch (error) {
  if (error instanceof SimulationConfigError) {
    logger.error('Invalid configuration', { setting: error.setting, message: error.message });
  } else {
    logger.error('Simulation failed', { error: String(error) });
  }
  process.exit(1);
}
