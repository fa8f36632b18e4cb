/**
 * Environment configuration with validation and defaults
 */

import { config } from 'dotenv';
import { StartupError } from '../utils/errors.js';

// Load .env file
config();

/**
 * Parse environment variable as integer with default
 */
function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse environment variable as float with default
 */
function parseDecimal(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse environment variable as boolean with default
 */
function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Immutable runtime configuration, built once at startup and handed to each
 * component's constructor.
 */
export interface RelayConfig {
  // Relay input
  readonly UDP_HOST: string;
  readonly DATA_PORT: number;
  readonly CONTROL_PORT: number;

  // Viewer stream
  readonly WS_HOST: string;
  readonly WS_PORT: number;
  readonly API_KEY: string;

  // Point cloud
  readonly MAX_POINTS: number;
  readonly MAX_FRAME_POINTS: number;
  readonly PATH_POINT_INTERVAL: number;
  readonly CLEAR_PATH_ON_CLEAR: boolean;

  // Timers
  readonly SNAPSHOT_INTERVAL_MS: number;
  readonly STATS_INTERVAL_MS: number;

  // Logging
  readonly LOG_LEVEL: string;
  readonly NODE_ENV: string;

  // Computed
  readonly isDevelopment: boolean;
  readonly isProduction: boolean;
}

/**
 * Build configuration from an environment map
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): RelayConfig {
  const nodeEnv = source.NODE_ENV || 'development';

  return Object.freeze({
    UDP_HOST: source.UDP_HOST || '0.0.0.0',
    DATA_PORT: parseNumber(source.DATA_PORT, 5005),
    CONTROL_PORT: parseNumber(source.CONTROL_PORT, 5006),

    WS_HOST: source.WS_HOST || '0.0.0.0',
    WS_PORT: parseNumber(source.WS_PORT, 8080),
    API_KEY: source.API_KEY || '',

    MAX_POINTS: parseNumber(source.MAX_POINTS, 10000),
    MAX_FRAME_POINTS: parseNumber(source.MAX_FRAME_POINTS, 1000000),
    PATH_POINT_INTERVAL: parseDecimal(source.PATH_POINT_INTERVAL, 0.1),
    CLEAR_PATH_ON_CLEAR: parseBoolean(source.CLEAR_PATH_ON_CLEAR, true),

    SNAPSHOT_INTERVAL_MS: parseNumber(source.SNAPSHOT_INTERVAL_MS, 100),
    STATS_INTERVAL_MS: parseNumber(source.STATS_INTERVAL_MS, 60000),

    LOG_LEVEL: source.LOG_LEVEL || 'info',
    NODE_ENV: nodeEnv,

    isDevelopment: nodeEnv === 'development',
    isProduction: nodeEnv === 'production'
  });
}

/**
 * Process-wide configuration
 */
export const env = loadConfig();

function isPort(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= 65535;
}

/**
 * Collect configuration problems
 */
export function validateConfig(cfg: RelayConfig): string[] {
  const errors: string[] = [];

  if (cfg.API_KEY && cfg.API_KEY.length < 32) {
    errors.push('API_KEY must be at least 32 characters when set.');
  }

  // Validate ranges
  if (!isPort(cfg.DATA_PORT)) {
    errors.push('DATA_PORT must be between 1 and 65535.');
  }

  if (!isPort(cfg.CONTROL_PORT)) {
    errors.push('CONTROL_PORT must be between 1 and 65535.');
  }

  if (!isPort(cfg.WS_PORT)) {
    errors.push('WS_PORT must be between 1 and 65535.');
  }

  if (cfg.DATA_PORT === cfg.CONTROL_PORT) {
    errors.push('DATA_PORT and CONTROL_PORT must differ.');
  }

  if (cfg.MAX_POINTS < 1) {
    errors.push('MAX_POINTS must be at least 1.');
  }

  if (cfg.MAX_FRAME_POINTS < cfg.MAX_POINTS) {
    errors.push('MAX_FRAME_POINTS must be at least MAX_POINTS.');
  }

  if (!(cfg.PATH_POINT_INTERVAL > 0)) {
    errors.push('PATH_POINT_INTERVAL must be greater than 0.');
  }

  if (cfg.SNAPSHOT_INTERVAL_MS < 10) {
    errors.push('SNAPSHOT_INTERVAL_MS must be at least 10.');
  }

  return errors;
}

/**
 * Throw when the configuration cannot be used
 */
export function assertValidConfig(cfg: RelayConfig): void {
  const errors = validateConfig(cfg);

  if (errors.length > 0) {
    throw new StartupError(`Configuration errors:\n  - ${errors.join('\n  - ')}`);
  }
}

/**
 * Print configuration summary
 */
export function printConfig(cfg: RelayConfig): void {
  console.log('Configuration:');
  console.log(`  Environment: ${cfg.NODE_ENV}`);
  console.log(`  Relay data: udp://${cfg.UDP_HOST}:${cfg.DATA_PORT}`);
  console.log(`  Control: udp://${cfg.UDP_HOST}:${cfg.CONTROL_PORT}`);
  console.log(`  Viewers: ws://${cfg.WS_HOST}:${cfg.WS_PORT}${cfg.API_KEY ? ' (API key required)' : ''}`);
  console.log(`  Max Points: ${cfg.MAX_POINTS}`);
  console.log(`  Max Frame Points: ${cfg.MAX_FRAME_POINTS}`);
  console.log(`  Path Interval: ${cfg.PATH_POINT_INTERVAL}`);
  console.log(`  Snapshot Interval: ${cfg.SNAPSHOT_INTERVAL_MS}ms`);
  console.log(`  Log Level: ${cfg.LOG_LEVEL}`);
}
