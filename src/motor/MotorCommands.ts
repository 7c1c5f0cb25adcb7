// Builders for the motor's JSON commands. Ranges are checked here, before
// anything reaches the socket.

import { Command, ParamValue } from '../types';
import { ValidationError } from '../utils/errors';
import { LIMITS } from './MotorConstants';

function command(name: string, params: Record<string, ParamValue> = {}, expectsResponse = true): Command {
  return Object.freeze({ name, params: Object.freeze({ ...params }), expectsResponse });
}

/**
 * @throws ValidationError unless `value` is an integer within [min, max]
 */
export function requireIntInRange(field: string, value: number, range: { min: number; max: number }): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < range.min || value > range.max) {
    throw new ValidationError(field, value, range.min, range.max);
  }
  return value;
}

export const MotorCommands = {
  // {"cmd":"MOVE","params":{"pos":0-100,"delay":0-30}}
  move(position: number, delaySeconds = 0): Command {
    return command('MOVE', {
      pos: requireIntInRange('position', position, LIMITS.POSITION_PERCENT),
      delay: requireIntInRange('delay', delaySeconds, LIMITS.MOVE_DELAY_SECONDS)
    });
  },
  // {"cmd":"A_MOVE","params":{"pos":0-65536,"delay":0-10000}}
  absoluteMove(position: number, delayMs = 0): Command {
    return command('A_MOVE', {
      pos: requireIntInRange('position', position, LIMITS.ENCODER_POSITION),
      delay: requireIntInRange('delay', delayMs, LIMITS.ABSOLUTE_MOVE_DELAY_MS)
    });
  },
  stop(): Command {
    return command('STOP');
  },
  // Physical wiggle, used to identify a motor
  jog(count = 1): Command {
    return command('JOG', { count: requireIntInRange('count', count, LIMITS.JOG_COUNT) });
  },
  getStatus(): Command {
    return command('GET_STATUS');
  },
  getInfo(): Command {
    return command('GET_INFO');
  },
  raw(name: string, params: Record<string, ParamValue> = {}, expectsResponse = true): Command {
    if (typeof name !== 'string' || name.trim().length === 0) {
      throw new ValidationError('command', name);
    }
    return command(name, params, expectsResponse);
  }
};
