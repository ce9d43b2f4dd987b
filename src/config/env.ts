import dotenv from "dotenv";
import type { SimConfig } from "../types.js";
import { DEFAULT_CONFIG } from "../types.js";

dotenv.config();

const optional = (value?: string | null) => {
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const numberOr = (value: string | undefined, fallback: number) => {
  const raw = optional(value);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const env = {
  nodeEnv: process.env.NODE_ENV ?? "development",
  logLevel: optional(process.env.LOG_LEVEL) ?? "info",
  width: numberOr(process.env.SIM_WIDTH, DEFAULT_CONFIG.geometry.width),
  height: numberOr(process.env.SIM_HEIGHT, DEFAULT_CONFIG.geometry.height),
  pathPoints: numberOr(process.env.SIM_PATH_POINTS, DEFAULT_CONFIG.geometry.pathPoints),
  spawnIntervalTicks: numberOr(process.env.SIM_SPAWN_INTERVAL, DEFAULT_CONFIG.spawnIntervalTicks),
  greenTicks: numberOr(process.env.SIM_GREEN_TICKS, DEFAULT_CONFIG.signals.greenTicks),
  yellowTicks: numberOr(process.env.SIM_YELLOW_TICKS, DEFAULT_CONFIG.signals.yellowTicks),
  clearanceTicks: numberOr(process.env.SIM_CLEARANCE_TICKS, DEFAULT_CONFIG.signals.clearanceTicks),
};

export const simConfigFromEnv = (): SimConfig => ({
  ...DEFAULT_CONFIG,
  geometry: {
    width: env.width,
    height: env.height,
    pathPoints: env.pathPoints,
  },
  signals: {
    greenTicks: env.greenTicks,
    yellowTicks: env.yellowTicks,
    clearanceTicks: env.clearanceTicks,
  },
  spawnIntervalTicks: env.spawnIntervalTicks,
});
