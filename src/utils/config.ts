import { MotorClientOptions, ResolvedMotorOptions } from '../types';
import {
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_CONNECTION_STABILISE_DELAY_SECONDS,
  DEFAULT_HEALTH_CHECK_INTERVAL_SECONDS,
  DEFAULT_HEALTH_CHECK_TIMEOUT_MS,
  DEFAULT_PORT,
  DEFAULT_RECONNECT_INTERVAL_SECONDS
} from '../motor/MotorConstants';
import { ValidationError } from './errors';

export const DEFAULT_OPTIONS: Omit<ResolvedMotorOptions, 'host'> = {
  port: DEFAULT_PORT,
  reconnectIntervalSeconds: DEFAULT_RECONNECT_INTERVAL_SECONDS,
  healthCheckIntervalSeconds: DEFAULT_HEALTH_CHECK_INTERVAL_SECONDS,
  connectionStabiliseDelaySeconds: DEFAULT_CONNECTION_STABILISE_DELAY_SECONDS,
  commandTimeoutMs: DEFAULT_COMMAND_TIMEOUT_MS,
  connectTimeoutMs: DEFAULT_CONNECT_TIMEOUT_MS,
  healthCheckTimeoutMs: DEFAULT_HEALTH_CHECK_TIMEOUT_MS
};

function requireNonNegative(field: string, value: number) {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ValidationError(field, value);
  }
}

function requirePositive(field: string, value: number) {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ValidationError(field, value);
  }
}

/**
 * Fill in defaults and validate
 * @throws ValidationError on the first invalid option
 */
export function resolveMotorOptions(options: MotorClientOptions): ResolvedMotorOptions {
  const resolved: ResolvedMotorOptions = { ...DEFAULT_OPTIONS, host: '' };
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) Object.assign(resolved, { [key]: value });
  }
  resolved.host = typeof options.host === 'string' ? options.host.trim() : '';

  if (resolved.host.length === 0) throw new ValidationError('host', options.host);
  if (!Number.isInteger(resolved.port) || resolved.port < 1 || resolved.port > 65535) {
    throw new ValidationError('port', resolved.port, 1, 65535);
  }
  requireNonNegative('reconnectIntervalSeconds', resolved.reconnectIntervalSeconds);
  requireNonNegative('healthCheckIntervalSeconds', resolved.healthCheckIntervalSeconds);
  requireNonNegative('connectionStabiliseDelaySeconds', resolved.connectionStabiliseDelaySeconds);
  requirePositive('commandTimeoutMs', resolved.commandTimeoutMs);
  requirePositive('connectTimeoutMs', resolved.connectTimeoutMs);
  requirePositive('healthCheckTimeoutMs', resolved.healthCheckTimeoutMs);
  return resolved;
}

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new ValidationError(key, raw);
  return n;
}

/**
 * Options from MOTOR_* environment variables. Unset variables are left to the defaults.
 */
export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): MotorClientOptions {
  return {
    host: env.MOTOR_HOST ?? '',
    port: envNumber(env, 'MOTOR_PORT'),
    reconnectIntervalSeconds: envNumber(env, 'MOTOR_RECONNECT_INTERVAL'),
    healthCheckIntervalSeconds: envNumber(env, 'MOTOR_HEALTH_CHECK_INTERVAL'),
    connectionStabiliseDelaySeconds: envNumber(env, 'MOTOR_STABILISE_DELAY'),
    commandTimeoutMs: envNumber(env, 'MOTOR_COMMAND_TIMEOUT_MS')
  };
}
