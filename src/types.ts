import { EventEmitter } from 'events';

export type ParamValue = string | number | boolean | null;

export interface Command {
  name: string;
  params: Readonly<Record<string, ParamValue>>;
  expectsResponse: boolean;
}

/** `data` member of a response frame */
export type ResponseData = Readonly<Record<string, unknown>>;

/**
 * Motor status snapshot, as reported by GET_STATUS.
 * Positions are raw encoder values (0-65536).
 */
export interface MotorStatus {
  current_pos: number;
  limit_pos: number;
  target_pos: number;
  run_flags: number;
  err_flags: number;
}

export type StatusUpdateSource = 'CURRENT_POS' | 'ERROR' | 'GET_STATUS';

/**
 * Status delivered to the status callback.
 * Push events only carry the fields the motor sent.
 */
export interface MotorStatusUpdate {
  source: StatusUpdateSource;
  status: Readonly<Partial<MotorStatus>>;
  /** Position in percent, when the motor includes it in CURRENT_POS */
  percent?: number;
  errorCode?: number | string;
  description?: string;
  timestamp: number;
}

export interface MotorInfo {
  ip: string;
  mac: string;
  firmware: string;
}

export interface QueryOptions {
  /**
   * Timeout in milliseconds (default: commandTimeoutMs)
   */
  timeout?: number;
}

export interface MotorClientOptions {
  host: string;
  /** Default: 17002 */
  port?: number;
  /** Fixed wait between reconnect attempts. Default: 10 */
  reconnectIntervalSeconds?: number;
  /** GET_INFO probe period, 0 disables. Default: 60 */
  healthCheckIntervalSeconds?: number;
  /** Settling pause after the socket opens. Default: 0.5 */
  connectionStabiliseDelaySeconds?: number;
  /** Default: 10000 */
  commandTimeoutMs?: number;
  /** Default: 5000 */
  connectTimeoutMs?: number;
  /** Deadline of a single health probe. Default: 5000 */
  healthCheckTimeoutMs?: number;
}

export type ResolvedMotorOptions = Required<MotorClientOptions>;

export interface Disposable {
  dispose(): void;
}

export type StatusCallback = (update: MotorStatusUpdate) => void;
export type ConnectionCallback = (state: ConnectionState) => void;

// ============================================================================
// Connection Types
// ============================================================================

/**
 * Connection state machine
 */
export enum ConnectionState {
  /** Initial state, or stopped by disconnect() */
  DISCONNECTED = 'DISCONNECTED',
  /** Opening the socket and waiting for the motor to settle */
  CONNECTING = 'CONNECTING',
  /** Ready for commands */
  CONNECTED = 'CONNECTED',
  /** Waiting for the next connection attempt */
  RECONNECTING = 'RECONNECTING'
}

/**
 * Reason a connection ended
 */
export enum DisconnectReason {
  /** User explicitly called disconnect() */
  USER_REQUEST = 'user_request',
  /** Motor closed the socket (EOF) */
  REMOTE_CLOSED = 'remote_closed',
  /** Socket reported an error */
  SOCKET_ERROR = 'socket_error',
  /** Liveness probe timed out or failed */
  HEALTH_CHECK_FAILED = 'health_check_failed',
  /** Socket could not be opened */
  CONNECT_FAILED = 'connect_failed'
}

/**
 * Connection lifecycle tracking
 */
export interface ConnectionSession {
  state: ConnectionState;
  /** Incremented per connection attempt; stale socket events are ignored */
  sessionId: number;
  /** When the current state was entered */
  startTime: number;
  lastDisconnectTime?: number;
}

export interface ConnectionLostInfo {
  reason: DisconnectReason;
  detail?: string;
  /** Commands failed with ConnectionLostError */
  abandoned: number;
  timestamp: number;
}

export interface ConnectionRestoredInfo {
  /** How long the connection was down (ms) */
  downtime: number;
  attempts: number;
  timestamp: number;
}

export interface ReconnectAttemptInfo {
  /** 1-based */
  attemptNumber: number;
  /** Wait before this attempt (ms) */
  delay: number;
  timestamp: number;
}

export interface ReconnectFailedInfo {
  attemptNumber: number;
  error: string;
  /** Always retried at a fixed interval */
  nextRetryDelay: number;
  timestamp: number;
}

export interface ConnectionMetrics {
  state: ConnectionState;
  sessionId: number;
  /** Time since CONNECTED was entered, 0 otherwise */
  uptime: number;
  lastSeen?: number;
  /** Epoch ms of the last line written on the current session */
  lastSent?: number;
  lastDisconnectTime?: number;
  pendingCommands: string[];
  reconnectAttempts: number;
  isReconnecting: boolean;
}

export interface MotorEvents {
  connectionLost: (info: ConnectionLostInfo) => void;
  connectionRestored: (info: ConnectionRestoredInfo) => void;
  reconnectAttempting: (info: ReconnectAttemptInfo) => void;
  reconnectFailed: (info: ReconnectFailedInfo) => void;
}

export type MotorEventEmitter = EventEmitter & {
  on<U extends keyof MotorEvents>(event: U, listener: MotorEvents[U]): MotorEventEmitter;
  once<U extends keyof MotorEvents>(event: U, listener: MotorEvents[U]): MotorEventEmitter;
  off<U extends keyof MotorEvents>(event: U, listener: MotorEvents[U]): MotorEventEmitter;
  emit<U extends keyof MotorEvents>(event: U, ...args: Parameters<MotorEvents[U]>): boolean;
};
