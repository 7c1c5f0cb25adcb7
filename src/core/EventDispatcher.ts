import { ConnectionCallback, ConnectionState, MotorStatus, MotorStatusUpdate, ResponseData, StatusCallback } from '../types';
import { ERROR_RESPONSE, EVENT_TYPES } from '../motor/MotorConstants';
import { DeviceError, errorMessage } from '../utils/errors';
import { dbg, dbgV, warn } from '../utils/debug';
import { InboundFrame, parseStatusFields } from './MotorProtocol';
import { PendingCommands } from './PendingCommands';

function errorCodeOf(data: ResponseData): number | string {
  const code = data.code;
  return typeof code === 'number' || typeof code === 'string' ? code : 'unknown';
}

function descriptionOf(data: ResponseData): string | undefined {
  return typeof data.description === 'string' ? data.description : undefined;
}

/**
 * Routes decoded frames: responses to their pending command, pushes to the
 * status callback. Callbacks are never run inside the socket read handler;
 * each is handed off with setImmediate, in arrival order.
 */
export class EventDispatcher {
  private statusCallback?: StatusCallback;
  private connectionCallback?: ConnectionCallback;
  private dropped = 0;

  constructor(private readonly pending: PendingCommands) {}

  get droppedFrames(): number { return this.dropped; }

  setStatusCallback(cb: StatusCallback | undefined) { this.statusCallback = cb; }
  getStatusCallback(): StatusCallback | undefined { return this.statusCallback; }

  setConnectionCallback(cb: ConnectionCallback | undefined) { this.connectionCallback = cb; }
  getConnectionCallback(): ConnectionCallback | undefined { return this.connectionCallback; }

  onFrame(frame: InboundFrame) {
    switch (frame.kind) {
      case 'invalid':
        this.dropped++;
        warn(`Dropping malformed frame: ${frame.error.message} - ${frame.raw}`);
        return;
      case 'response':
        this.onResponse(frame.name, frame.data);
        return;
      case 'event':
        this.onEvent(frame.type, frame.data);
        return;
    }
  }

  notifyConnection(state: ConnectionState) {
    setImmediate(() => {
      const cb = this.connectionCallback;
      if (!cb) return;
      try {
        cb(state);
      } catch (err) {
        warn(`Error in connection callback: ${errorMessage(err)}`);
      }
    });
  }

  private onResponse(name: string, data: ResponseData) {
    if (name === ERROR_RESPONSE) {
      const code = errorCodeOf(data);
      const description = descriptionOf(data);
      const failed = this.pending.rejectOldest((oldest) => new DeviceError(code, description, oldest));
      if (failed === undefined) {
        warn(`Received ERROR response ${String(code)} but no pending commands`);
        this.deliverStatus(this.errorUpdate(data));
        return;
      }
      dbg(`Motor returned error ${String(code)} for ${failed}: ${description ?? 'No description'}`);
      return;
    }

    this.pending.resolve(name, data);
    if (name === 'GET_STATUS') {
      this.deliverStatus({ source: 'GET_STATUS', status: parseStatusFields(data), timestamp: Date.now() });
    }
  }

  private onEvent(type: string, data: ResponseData) {
    switch (type) {
      case EVENT_TYPES.CURRENT_POS: {
        const update: MotorStatusUpdate = { source: 'CURRENT_POS', status: parseStatusFields(data), timestamp: Date.now() };
        if (typeof data.percent === 'number') update.percent = data.percent;
        this.deliverStatus(update);
        return;
      }
      case EVENT_TYPES.ERROR:
        this.deliverStatus(this.errorUpdate(data));
        return;
      default:
        this.dropped++;
        warn(`Unrecognized event ${type} - dropped`);
    }
  }

  private errorUpdate(data: ResponseData): MotorStatusUpdate {
    const code = errorCodeOf(data);
    const status: Partial<MotorStatus> = { ...parseStatusFields(data) };
    const numeric = typeof code === 'number' ? code : Number(code);
    if (Number.isFinite(numeric)) status.err_flags = numeric;
    return {
      source: 'ERROR',
      status: Object.freeze(status),
      errorCode: code,
      description: descriptionOf(data),
      timestamp: Date.now()
    };
  }

  private deliverStatus(update: MotorStatusUpdate) {
    const snapshot = Object.freeze(update);
    dbgV(`Status update (${snapshot.source}): ${JSON.stringify(snapshot.status)}`);
    setImmediate(() => {
      const cb = this.statusCallback;
      if (!cb) return;
      try {
        cb(snapshot);
      } catch (err) {
        warn(`Error in status callback: ${errorMessage(err)}`);
      }
    });
  }
}
