import { ConnectionState, DisconnectReason } from '../types';

/**
 * Get human-readable message for a disconnect reason
 */
export function getDisconnectMessage(reason: DisconnectReason): string {
  switch (reason) {
    case DisconnectReason.USER_REQUEST:
      return 'Connection closed by user request';
    case DisconnectReason.REMOTE_CLOSED:
      return 'Connection closed by motor';
    case DisconnectReason.SOCKET_ERROR:
      return 'Connection closed due to socket error';
    case DisconnectReason.HEALTH_CHECK_FAILED:
      return 'Health check failed';
    case DisconnectReason.CONNECT_FAILED:
      return 'Connection attempt failed';
    default:
      return 'Connection closed';
  }
}

/**
 * Base class for every error raised by the motor client
 */
export class MotorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message };
  }
}

/**
 * A caller-supplied parameter was out of range; nothing was sent to the motor
 */
export class ValidationError extends MotorError {
  constructor(
    public readonly field: string,
    public readonly value: unknown,
    public readonly min?: number,
    public readonly max?: number
  ) {
    super(min !== undefined && max !== undefined
      ? `${field} must be an integer between ${min} and ${max}, got ${String(value)}`
      : `Invalid ${field}: ${String(value)}`);
  }

  toJSON() {
    return { ...super.toJSON(), field: this.field, value: this.value, min: this.min, max: this.max };
  }
}

/**
 * Command attempted while the connection is not CONNECTED
 */
export class NotConnectedError extends MotorError {
  constructor(public readonly state: ConnectionState, message?: string) {
    super(message ?? `Not connected to motor (state=${state})`);
  }

  toJSON() {
    return { ...super.toJSON(), state: this.state };
  }
}

/**
 * Socket is open but the stabilisation delay has not elapsed yet
 */
export class NotReadyError extends NotConnectedError {
  constructor() {
    super(ConnectionState.CONNECTING, 'Motor connection not yet ready (stabilising)');
  }
}

export class CommandTimeoutError extends MotorError {
  constructor(public readonly command: string, public readonly timeoutMs: number) {
    super(`Timeout waiting for response to ${command} after ${timeoutMs}ms`);
  }

  toJSON() {
    return { ...super.toJSON(), command: this.command, timeoutMs: this.timeoutMs };
  }
}

/**
 * A command of the same name is already awaiting its response.
 * The protocol correlates by name only, so a second one cannot be told apart.
 */
export class CommandBusyError extends MotorError {
  constructor(public readonly command: string) {
    super(`Command ${command} is already pending`);
  }

  toJSON() {
    return { ...super.toJSON(), command: this.command };
  }
}

/**
 * Failure reported by the motor itself. The code is kept exactly as received.
 */
export class DeviceError extends MotorError {
  constructor(
    public readonly code: number | string,
    public readonly description?: string,
    public readonly command?: string
  ) {
    super(`Motor error ${String(code)}: ${description ?? 'No description'}`);
  }

  toJSON() {
    return { ...super.toJSON(), code: this.code, description: this.description, command: this.command };
  }
}

/**
 * Delivered to every pending command when the connection goes away
 */
export class ConnectionLostError extends MotorError {
  constructor(public readonly reason: DisconnectReason) {
    super(getDisconnectMessage(reason));
  }

  toJSON() {
    return { ...super.toJSON(), reason: this.reason };
  }
}

export class ConnectionFailedError extends MotorError {
  constructor(
    public readonly host: string,
    public readonly port: number,
    detail: string
  ) {
    super(`Connection failed to ${host}:${port}: ${detail}`);
  }

  toJSON() {
    return { ...super.toJSON(), host: this.host, port: this.port };
  }
}

/**
 * Malformed inbound frame. Only ever logged; the frame is dropped.
 */
export class DecodeError extends MotorError {
  constructor(message: string, public readonly raw: string) {
    super(message);
  }

  toJSON() {
    return { ...super.toJSON(), raw: this.raw };
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
