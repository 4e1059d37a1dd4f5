// ============================================
// Runtime Configuration
// Defaults from shared constants, overridden by environment variables
// ============================================

import { ENV_TUNABLE_CONFIGS, HISTORY_CONFIG, MOTION_CONFIG, SERVER_CONFIG } from '#shared';
import type { TunableConfigKey } from '#shared';
import { logger } from './logger';

export interface ServerRuntimeConfig {
  port: number;
  tickRate: number;
  telemetryRate: number;
  commandTimeout: number;
  historyMaxSize: number;
  historyCooldown: number;
}

type Env = Record<string, string | undefined>;

interface TunableSpec {
  field: keyof ServerRuntimeConfig;
  fallback: number;
  integer: boolean;
  min: number; // Inclusive
}

const TUNABLES: Record<TunableConfigKey, TunableSpec> = {
  PORT: { field: 'port', fallback: SERVER_CONFIG.PORT, integer: true, min: 0 },
  TICK_RATE: { field: 'tickRate', fallback: SERVER_CONFIG.TICK_RATE, integer: false, min: 1 },
  TELEMETRY_RATE: { field: 'telemetryRate', fallback: SERVER_CONFIG.TELEMETRY_RATE, integer: false, min: 0.1 },
  COMMAND_TIMEOUT: { field: 'commandTimeout', fallback: MOTION_CONFIG.COMMAND_TIMEOUT, integer: false, min: 0.01 },
  HISTORY_MAX_SIZE: { field: 'historyMaxSize', fallback: HISTORY_CONFIG.MAX_SIZE, integer: true, min: 1 },
  HISTORY_COOLDOWN: { field: 'historyCooldown', fallback: HISTORY_CONFIG.DUPLICATE_COOLDOWN, integer: false, min: 0 },
};

function readTunable(env: Env, key: TunableConfigKey, tunable: TunableSpec): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return tunable.fallback;

  const value = Number(raw);
  const valid = Number.isFinite(value) && value >= tunable.min && (!tunable.integer || Number.isInteger(value));
  if (!valid) {
    logger.warn(
      { key, value: raw, fallback: tunable.fallback, event: 'invalid_config' },
      `Ignoring invalid ${key}="${raw}", using ${tunable.fallback}`
    );
    return tunable.fallback;
  }
  return value;
}

/**
 * Build the runtime config. Invalid overrides fall back to the default with a warning.
 */
export function loadConfig(env: Env = process.env): ServerRuntimeConfig {
  const config: ServerRuntimeConfig = {
    port: SERVER_CONFIG.PORT,
    tickRate: SERVER_CONFIG.TICK_RATE,
    telemetryRate: SERVER_CONFIG.TELEMETRY_RATE,
    commandTimeout: MOTION_CONFIG.COMMAND_TIMEOUT,
    historyMaxSize: HISTORY_CONFIG.MAX_SIZE,
    historyCooldown: HISTORY_CONFIG.DUPLICATE_COOLDOWN,
  };

  for (const key of ENV_TUNABLE_CONFIGS) {
    const tunable = TUNABLES[key];
    config[tunable.field] = readTunable(env, key, tunable);
  }
  return config;
}
