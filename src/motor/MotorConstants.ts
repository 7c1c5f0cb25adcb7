/**
 * Motor controller constants and conversions
 */

export const DEFAULT_PORT = 17002;
export const DEFAULT_RECONNECT_INTERVAL_SECONDS = 10;
export const DEFAULT_HEALTH_CHECK_INTERVAL_SECONDS = 60;
export const DEFAULT_CONNECTION_STABILISE_DELAY_SECONDS = 0.5;
export const DEFAULT_COMMAND_TIMEOUT_MS = 10000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;
export const DEFAULT_HEALTH_CHECK_TIMEOUT_MS = 5000;

/**
 * Commands understood by the motor controller
 */
export const COMMAND_NAMES = ['MOVE', 'A_MOVE', 'STOP', 'GET_STATUS', 'GET_INFO', 'JOG'] as const;

/** Response name the motor uses to report a failed command */
export const ERROR_RESPONSE = 'ERROR';

/**
 * Push event types
 */
export const EVENT_TYPES = {
  CURRENT_POS: 'CURRENT_POS',
  ERROR: 'ERROR'
} as const;

/**
 * Parameter ranges (inclusive)
 */
export const LIMITS = {
  POSITION_PERCENT: { min: 0, max: 100 },
  MOVE_DELAY_SECONDS: { min: 0, max: 30 },
  ENCODER_POSITION: { min: 0, max: 65536 },
  ABSOLUTE_MOVE_DELAY_MS: { min: 0, max: 10000 },
  JOG_COUNT: { min: 1, max: 10 }
} as const;

/**
 * Error codes reported by the motor controller.
 * 1xx: parameter/command class, 3xx: hardware class
 */
export const ERROR_CODES: Readonly<Record<string, string>> = {
  '100': 'Unknown command',
  '101': 'Invalid parameters',
  '102': 'Motor busy',
  '103': 'Motor unreachable',
  '104': 'Checksum error',
  '300': 'Limits not set',
  '301': 'UART Error',
  '302': 'Voltage error',
  '303': 'Over-current error',
  '304': 'Encoder error'
};

export function describeDeviceError(code: number | string): string {
  return ERROR_CODES[String(code)] ?? 'Unknown error';
}

export function isHardwareErrorCode(code: number | string): boolean {
  const n = Number(code);
  return n >= 300 && n <= 399;
}

/**
 * Convert an encoder position to percent open, using the limit position as 100%
 * @returns rounded percent, or null when the limit is not set
 */
export function encoderToPercent(current: number, limit: number): number | null {
  if (!(limit > 0)) return null;
  const pct = Math.round((current / limit) * 100);
  return Math.min(100, Math.max(0, pct));
}

export function percentToEncoder(percent: number, limit: number): number {
  const clamped = Math.min(100, Math.max(0, percent));
  return Math.round((clamped / 100) * limit);
}
