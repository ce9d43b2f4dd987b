export * from './types.js';
export { SimulationConfigError } from './errors.js';
export {
  angleTo,
  carsIntersect,
  distance,
  normalizeAngle,
  rectangleVertices,
  rectanglesOverlap,
  segmentsIntersect,
} from './geometry.js';
export {
  directionFromIndex,
  exitOrigin,
  intersectionIndex,
  laneOffset,
  spawnHeading,
  spawnPosition,
  synthesizePath,
  validateGeometry,
} from './topology.js';
export {
  DEFAULT_PHASE_PLAN,
  SignalController,
  conflictingPairs,
  conflictsFor,
  deriveConflicts,
  movementsConflict,
} from './signal-controller.js';
export type { ConflictMatrix, PhasePlan, RightOfWay, SignalState, SimplifiedCar } from './signal-controller.js';
export { Vehicle } from './vehicle.js';
export type { VehicleView } from './vehicle.js';
export { Simulation } from './simulation.js';
export type { SimulationState } from './simulation.js';
