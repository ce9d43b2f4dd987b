/**
 * Raised when the simulation is built from settings it cannot run with:
 * a malformed maneuver index, a path length that does not split into three
 * phases, or a signal plan that grants conflicting movements together.
 */
export class SimulationConfigError extends Error {
  readonly setting: string;

  constructor(setting: string, message: string) {
    super(`${setting}: ${message}`);
    this.name = 'SimulationConfigError';
    this.setting = setting;
  }
}
