/**
 * Engine configuration defaults and validation
 */

import { ContractError } from './errors';
import { Config } from './types';

/**
 * Create default configuration
 */
export function createDefaultConfig(): Config {
  return {
    probeIntervalMs: 1000,
    probeTimeoutMs: 1000,
    probeDeadlineGraceMs: 500,
    transitionWindowMs: 10000,
    gatewayPollIntervalMs: 30000,
    gatewayStabilizationDelayMs: 1000,
    topologyPollIntervalMs: 1000,
    failureThreshold: 5,
    failureRetryIntervalMs: 10000,
    signalChangeThreshold: 5,
    networkChangePollIntervalMs: 2000
  };
}

export function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ContractError(`${name} must be a positive integer (got ${value})`);
  }
}

/**
 * Throws ContractError on the first value that is not a positive integer
 */
export function validateConfig(config: Config): Config {
  for (const [name, value] of Object.entries(config)) {
    assertPositiveInteger(name, value);
  }
  return config;
}

function isConfigKey(config: Config, key: string): key is keyof Config {
  return Object.prototype.hasOwnProperty.call(config, key);
}

/**
 * Overlay the numeric keys of an untyped object onto a base config
 */
export function mergeConfig(base: Config, overrides: Record<string, unknown>): Config {
  const merged: Config = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (!isConfigKey(base, key)) {
      throw new ContractError(`Unknown config key: ${key}`);
    }
    if (typeof value !== 'number') {
      throw new ContractError(`${key} must be a number`);
    }
    merged[key] = value;
  }
  return validateConfig(merged);
}
