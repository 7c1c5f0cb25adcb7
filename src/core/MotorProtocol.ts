import { StringDecoder } from 'string_decoder';
import { Command, MotorInfo, MotorStatus, ParamValue, ResponseData } from '../types';
import { COMMAND_NAMES, ERROR_RESPONSE } from '../motor/MotorConstants';
import { DecodeError } from '../utils/errors';
import { dbgV, warn } from '../utils/debug';

// Wire format: one JSON object per line.
//   request:  {"cmd": "<NAME>", "params": {...}}
//   response: {"response": "<NAME>", "data": {...}}
//   push:     {"event": "<TYPE>", "data": {...}}  (some firmware uses "response" for pushes)

export const FRAME_DELIMITER = '\n';
/** Cap on an unterminated line, in UTF-8 bytes */
export const MAX_FRAME_LENGTH = 64 * 1024;

export type InboundFrame =
  | { kind: 'response'; name: string; data: ResponseData }
  | { kind: 'event'; type: string; data: ResponseData }
  | { kind: 'invalid'; error: DecodeError; raw: string };

const STATUS_FIELDS = ['current_pos', 'limit_pos', 'target_pos', 'run_flags', 'err_flags'] as const;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isParamValue(v: unknown): v is ParamValue {
  return v === null || typeof v === 'string' || typeof v === 'boolean' || (typeof v === 'number' && Number.isFinite(v));
}

export function isCommandName(name: string): boolean {
  return (COMMAND_NAMES as readonly string[]).includes(name);
}

/**
 * True for names that answer a request; anything else arriving under "response" is a push
 */
export function isResponseName(name: string): boolean {
  return name === ERROR_RESPONSE || isCommandName(name);
}

export function encodeCommand(command: Command): string {
  return JSON.stringify({ cmd: command.name, params: command.params }) + FRAME_DELIMITER;
}

function parseJsonObject(line: string): Record<string, unknown> | DecodeError {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (e) {
    return new DecodeError(`Invalid JSON from motor: ${e instanceof Error ? e.message : String(e)}`, line);
  }
  if (!isRecord(parsed)) return new DecodeError('Frame is not a JSON object', line);
  return parsed;
}

/**
 * Decode one inbound line. Never throws: malformed input yields an `invalid` frame.
 */
export function decodeFrame(line: string): InboundFrame {
  const raw = line.trim();
  const obj = parseJsonObject(raw);
  if (obj instanceof DecodeError) return { kind: 'invalid', error: obj, raw };

  const data: ResponseData = isRecord(obj.data) ? Object.freeze({ ...obj.data }) : Object.freeze({});

  if (typeof obj.event === 'string') {
    return { kind: 'event', type: obj.event, data };
  }
  if (typeof obj.response === 'string') {
    const name = obj.response;
    if (!isResponseName(name)) return { kind: 'event', type: name, data };
    // Fields inside `data` are not checked here; the parsers below default what is missing
    return { kind: 'response', name, data };
  }
  return { kind: 'invalid', error: new DecodeError('Frame has neither "response" nor "event"', raw), raw };
}

/**
 * Parse a request line, as the motor would
 */
export function decodeCommand(line: string): Command | DecodeError {
  const raw = line.trim();
  const obj = parseJsonObject(raw);
  if (obj instanceof DecodeError) return obj;
  if (typeof obj.cmd !== 'string' || obj.cmd.length === 0) return new DecodeError('Request has no "cmd"', raw);

  const params: Record<string, ParamValue> = {};
  if (obj.params !== undefined) {
    if (!isRecord(obj.params)) return new DecodeError('Request "params" is not an object', raw);
    for (const [key, value] of Object.entries(obj.params)) {
      if (!isParamValue(value)) return new DecodeError(`Request param "${key}" is not a primitive`, raw);
      params[key] = value;
    }
  }
  return { name: obj.cmd, params: Object.freeze(params), expectsResponse: true };
}

/**
 * Full snapshot from a GET_STATUS response; absent or non-numeric fields read as 0
 */
export function parseMotorStatus(data: ResponseData): Readonly<MotorStatus> {
  const fields = parseStatusFields(data);
  return Object.freeze({
    current_pos: fields.current_pos ?? 0,
    limit_pos: fields.limit_pos ?? 0,
    target_pos: fields.target_pos ?? 0,
    run_flags: fields.run_flags ?? 0,
    err_flags: fields.err_flags ?? 0
  });
}

/**
 * Only the status fields present in a frame (push events are partial)
 */
export function parseStatusFields(data: ResponseData): Readonly<Partial<MotorStatus>> {
  const out: Partial<MotorStatus> = {};
  for (const f of STATUS_FIELDS) {
    const v = data[f];
    if (typeof v === 'number' && Number.isFinite(v)) out[f] = v;
  }
  return Object.freeze(out);
}

function stringField(data: ResponseData, key: string): string {
  const v = data[key];
  return typeof v === 'string' || typeof v === 'number' ? String(v) : '';
}

export function parseMotorInfo(data: ResponseData): Readonly<MotorInfo> {
  return Object.freeze({
    ip: stringField(data, 'ip'),
    mac: stringField(data, 'mac'),
    firmware: stringField(data, 'firmware')
  });
}

/**
 * Splits a TCP byte stream into lines. Keeps the partial tail between chunks;
 * multi-byte characters split across chunks are reassembled.
 */
export class LineFramer {
  private decoder = new StringDecoder('utf8');
  private buf = '';

  push(chunk: Buffer | string): string[] {
    this.buf += typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    const lines: string[] = [];
    let idx = this.buf.indexOf(FRAME_DELIMITER);
    while (idx >= 0) {
      const line = this.buf.slice(0, idx).trim();
      this.buf = this.buf.slice(idx + 1);
      if (line.length > 0) lines.push(line);
      idx = this.buf.indexOf(FRAME_DELIMITER);
    }
    const pendingBytes = Buffer.byteLength(this.buf, 'utf8');
    if (pendingBytes > MAX_FRAME_LENGTH) {
      warn(`Dropping ${pendingBytes} bytes without frame delimiter`);
      this.buf = '';
    }
    if (lines.length > 0) dbgV(`framer: ${lines.length} line(s), ${this.buf.length} char(s) pending`);
    return lines;
  }

  /** Characters held back waiting for a delimiter */
  get pending(): number { return this.buf.length; }

  reset() {
    this.decoder = new StringDecoder('utf8');
    this.buf = '';
  }
}
