import { EventEmitter } from 'events';
import {
  Command,
  ConnectionMetrics,
  ConnectionSession,
  ConnectionState,
  DisconnectReason,
  MotorClientOptions,
  MotorEventEmitter,
  QueryOptions,
  ResolvedMotorOptions,
  ResponseData
} from '../types';
import { TcpClient, TransportFactory } from '../transport/TcpClient';
import { MotorCommands } from '../motor/MotorCommands';
import { resolveMotorOptions } from '../utils/config';
import {
  ConnectionFailedError,
  ConnectionLostError,
  NotConnectedError,
  NotReadyError,
  errorMessage,
  getDisconnectMessage
} from '../utils/errors';
import { dbg, dbgV, warn } from '../utils/debug';
import { decodeFrame, encodeCommand } from './MotorProtocol';
import { PendingCommands } from './PendingCommands';
import { EventDispatcher } from './EventDispatcher';
import { HealthMonitor } from './HealthMonitor';
import { Session } from './Session';

const VALID_TRANSITIONS: Record<ConnectionState, ConnectionState[]> = {
  [ConnectionState.DISCONNECTED]: [ConnectionState.CONNECTING],
  [ConnectionState.CONNECTING]: [ConnectionState.CONNECTED, ConnectionState.RECONNECTING, ConnectionState.DISCONNECTED],
  [ConnectionState.CONNECTED]: [ConnectionState.RECONNECTING, ConnectionState.DISCONNECTED],
  [ConnectionState.RECONNECTING]: [ConnectionState.CONNECTING, ConnectionState.DISCONNECTED]
};

// Deadline for the GET_STATUS sent right after a reconnection
const RECONNECT_REFRESH_TIMEOUT_MS = 5000;

/**
 * Owns the socket, the connection state and the pending-command table.
 * Everything here runs on the Node event loop, which is the only
 * serialization point: no state is touched from anywhere else.
 */
export class MotorConnection {
  private ev: MotorEventEmitter = new EventEmitter() as MotorEventEmitter;
  private options: ResolvedMotorOptions;
  private createTransport: TransportFactory;

  readonly pending: PendingCommands;
  readonly dispatcher: EventDispatcher;
  private health: HealthMonitor;
  private session?: Session;

  private connectionSession: ConnectionSession = {
    state: ConnectionState.DISCONNECTED,
    sessionId: 0,
    startTime: Date.now()
  };
  private nextSessionId = 1;
  private connectPromise?: Promise<boolean>;
  private reconnectTimer?: NodeJS.Timeout;
  private stabiliseWait?: { timer: NodeJS.Timeout; resolve: (ok: boolean) => void };

  // Outage bookkeeping, from leaving CONNECTED until the next CONNECTED
  private outageStart?: number;
  private reconnectAttempts = 0;

  private _lastSeen?: number;
  private _justReconnected = false;
  // GET_STATUS sent after a reconnection; callers asking for status join it
  private statusRefresh?: Promise<ResponseData>;

  constructor(options: MotorClientOptions, createTransport: TransportFactory = () => new TcpClient()) {
    this.options = resolveMotorOptions(options);
    this.createTransport = createTransport;
    this.pending = new PendingCommands();
    this.dispatcher = new EventDispatcher(this.pending);
    this.health = new HealthMonitor(this.options.healthCheckIntervalSeconds * 1000, {
      probe: () => this.request(MotorCommands.getInfo(), { timeout: this.options.healthCheckTimeoutMs }),
      onFailure: (err) => this.handleConnectionLost(
        this.connectionSession.sessionId,
        DisconnectReason.HEALTH_CHECK_FAILED,
        err.message
      )
    });
    dbg(`MotorConnection initialised - host=${this.options.host}:${this.options.port}, ` +
      `health_check_interval=${this.options.healthCheckIntervalSeconds}s`);
  }

  get events(): MotorEventEmitter { return this.ev; }

  get state(): ConnectionState { return this.connectionSession.state; }

  get connected(): boolean { return this.connectionSession.state === ConnectionState.CONNECTED; }

  /** Epoch ms of the last inbound line */
  get lastSeen(): number | undefined { return this._lastSeen; }

  /**
   * True after a reconnection until acknowledgeReconnect() is called.
   * Cached positions from before the outage are stale while this is set.
   */
  get justReconnected(): boolean { return this._justReconnected; }

  acknowledgeReconnect() { this._justReconnected = false; }

  get config(): Readonly<ResolvedMotorOptions> { return this.options; }

  // ============================================================================
  // State Machine Management
  // ============================================================================

  private canTransitionTo(target: ConnectionState): boolean {
    return VALID_TRANSITIONS[this.connectionSession.state].includes(target);
  }

  /**
   * Move to `newState`. Leaving CONNECTED stops the health monitor and fails
   * every pending command before anyone is told about the new state.
   */
  private transitionTo(newState: ConnectionState, why: string, lostReason?: DisconnectReason): boolean {
    const oldState = this.connectionSession.state;
    if (oldState === newState) return true;
    if (!this.canTransitionTo(newState)) {
      dbg(`Refused state transition ${oldState} → ${newState} (${why})`);
      return false;
    }

    if (oldState === ConnectionState.CONNECTED) {
      this.health.stop();
      this.pending.abandonAll(new ConnectionLostError(lostReason ?? DisconnectReason.SOCKET_ERROR));
    }

    dbg(`State transition: ${oldState} → ${newState} (${why})`);
    this.connectionSession.state = newState;
    this.connectionSession.startTime = Date.now();
    if (newState === ConnectionState.DISCONNECTED) {
      this.connectionSession.lastDisconnectTime = Date.now();
    }
    this.dispatcher.notifyConnection(newState);

    if (newState === ConnectionState.CONNECTED) {
      this.health.start();
    }
    return true;
  }

  private isStale(sessionId: number): boolean {
    return sessionId !== this.connectionSession.sessionId || this.connectionSession.state !== ConnectionState.CONNECTING;
  }

  // ============================================================================
  // Connection Methods
  // ============================================================================

  /**
   * Connect to the motor.
   * @returns true once CONNECTED; false if this attempt failed, in which case
   * the client keeps retrying in the background every reconnect interval
   */
  connect(): Promise<boolean> {
    if (this.connected) {
      dbg('connect() called but already CONNECTED');
      return Promise.resolve(true);
    }
    if (this.connectPromise) {
      dbg('connect() called while an attempt is in flight - joining it');
      return this.connectPromise;
    }
    return this.startAttempt();
  }

  private startAttempt(): Promise<boolean> {
    this.clearReconnectTimer();
    if (this.state === ConnectionState.RECONNECTING) this.reconnectAttempts++;
    const attempt: Promise<boolean> = this.attemptConnect().finally(() => {
      if (this.connectPromise === attempt) this.connectPromise = undefined;
    });
    this.connectPromise = attempt;
    return attempt;
  }

  private async attemptConnect(): Promise<boolean> {
    const sessionId = this.nextSessionId++;
    this.connectionSession.sessionId = sessionId;
    if (!this.transitionTo(ConnectionState.CONNECTING, `connect attempt, sessionId=${sessionId}`)) {
      return false;
    }

    this.closeSession();
    const { host, port, connectTimeoutMs } = this.options;
    const session = new Session(this.createTransport(), { host, port, connectTimeoutMs }, {
      onLine: (line) => this.onLine(sessionId, line),
      onClosed: (reason, detail) => this.handleConnectionLost(sessionId, reason, detail)
    }, sessionId);
    this.session = session;

    dbg(`Connecting to ${host}:${port}`);
    try {
      await session.open();
    } catch (err) {
      if (this.isStale(sessionId)) {
        session.close();
        return false;
      }
      this.handleConnectFailure(new ConnectionFailedError(host, port, errorMessage(err)));
      return false;
    }
    if (this.isStale(sessionId)) {
      session.close();
      return false;
    }

    if (!(await this.stabilise(sessionId))) {
      return false;
    }

    const restored = this.outageStart !== undefined;
    this.transitionTo(ConnectionState.CONNECTED, `session ${sessionId} ready`);
    dbg(`Connected to ${host}:${port}`);

    if (restored) {
      const downtime = Date.now() - (this.outageStart ?? Date.now());
      const attempts = this.reconnectAttempts;
      this.outageStart = undefined;
      this.reconnectAttempts = 0;
      this._justReconnected = true;
      dbg(`Reconnection successful after ${attempts} attempt(s), downtime ${downtime}ms`);
      this.ev.emit('connectionRestored', { downtime, attempts, timestamp: Date.now() });
      this.refreshStatusAfterReconnect();
    }
    return true;
  }

  /**
   * Give the motor time to settle after accept. Commands are refused meanwhile.
   * @returns false if the attempt was superseded or the socket dropped
   */
  private stabilise(sessionId: number): Promise<boolean> {
    const delayMs = this.options.connectionStabiliseDelaySeconds * 1000;
    if (delayMs <= 0) return Promise.resolve(!this.isStale(sessionId));
    dbg(`Allowing ${delayMs}ms for motor to stabilise...`);
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        this.stabiliseWait = undefined;
        resolve(!this.isStale(sessionId));
      }, delayMs);
      this.stabiliseWait = { timer, resolve };
    });
  }

  private cancelStabilise() {
    if (!this.stabiliseWait) return;
    clearTimeout(this.stabiliseWait.timer);
    const { resolve } = this.stabiliseWait;
    this.stabiliseWait = undefined;
    resolve(false);
  }

  private handleConnectFailure(err: ConnectionFailedError) {
    warn(err.message);
    this.closeSession();
    this.transitionTo(ConnectionState.RECONNECTING, getDisconnectMessage(DisconnectReason.CONNECT_FAILED), DisconnectReason.CONNECT_FAILED);
    if (this.reconnectAttempts > 0) {
      this.ev.emit('reconnectFailed', {
        attemptNumber: this.reconnectAttempts,
        error: err.message,
        nextRetryDelay: this.reconnectDelayMs(),
        timestamp: Date.now()
      });
    }
    this.scheduleReconnect();
  }

  /**
   * EOF, socket error or failed health check on the current session
   */
  private handleConnectionLost(sessionId: number, reason: DisconnectReason, detail?: string) {
    if (sessionId !== this.connectionSession.sessionId) {
      dbgV(`Ignoring ${reason} from stale session ${sessionId}`);
      return;
    }
    const state = this.state;
    if (state !== ConnectionState.CONNECTED && state !== ConnectionState.CONNECTING) return;

    const now = Date.now();
    const abandoned = state === ConnectionState.CONNECTED ? this.pending.size : 0;
    if (state === ConnectionState.CONNECTED) this.outageStart = now;
    this.connectionSession.lastDisconnectTime = now;

    dbg(`Connection lost (${getDisconnectMessage(reason)}${detail ? `: ${detail}` : ''}), attempting to reconnect`);
    this.cancelStabilise();
    this.closeSession();
    this.transitionTo(ConnectionState.RECONNECTING, getDisconnectMessage(reason), reason);
    this.ev.emit('connectionLost', { reason, detail, abandoned, timestamp: now });
    this.scheduleReconnect();
  }

  private reconnectDelayMs(): number {
    return this.options.reconnectIntervalSeconds * 1000;
  }

  /**
   * Fixed interval, no attempt limit: only disconnect() stops the retries
   */
  private scheduleReconnect() {
    this.clearReconnectTimer();
    const delay = this.reconnectDelayMs();
    const attemptNumber = this.reconnectAttempts + 1;
    this.ev.emit('reconnectAttempting', { attemptNumber, delay, timestamp: Date.now() });
    dbg(`Attempting to reconnect in ${delay}ms (attempt #${attemptNumber})`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      if (this.state !== ConnectionState.RECONNECTING) return;
      this.startAttempt().catch((err) => warn(`Reconnection attempt failed: ${errorMessage(err)}`));
    }, delay);
  }

  private clearReconnectTimer() {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
  }

  private refreshStatusAfterReconnect() {
    const refresh = this.request(MotorCommands.getStatus(), { timeout: RECONNECT_REFRESH_TIMEOUT_MS });
    this.statusRefresh = refresh;
    refresh
      .then(
        () => dbg('Motor status refreshed after reconnection'),
        (err) => warn(`Failed to refresh status after reconnection: ${errorMessage(err)}`)
      )
      .finally(() => {
        if (this.statusRefresh === refresh) this.statusRefresh = undefined;
      });
  }

  private closeSession() {
    if (this.session) {
      this.session.close();
      this.session = undefined;
    }
  }

  /**
   * Disconnect and stop reconnecting. Pending commands fail with ConnectionLostError.
   */
  async disconnect(): Promise<void> {
    dbg(`disconnect() called, currentState=${this.state}`);
    this.clearReconnectTimer();
    this.health.stop();
    // Supersedes any attempt in flight
    this.connectionSession.sessionId = this.nextSessionId++;
    this.cancelStabilise();
    this.transitionTo(ConnectionState.DISCONNECTED, getDisconnectMessage(DisconnectReason.USER_REQUEST), DisconnectReason.USER_REQUEST);
    this.pending.abandonAll(new ConnectionLostError(DisconnectReason.USER_REQUEST));
    this.closeSession();
    this.connectPromise = undefined;
    this.outageStart = undefined;
    this.reconnectAttempts = 0;
    dbg('Disconnected cleanly');
  }

  // ============================================================================
  // Commands
  // ============================================================================

  /**
   * Send a command; resolves with the response data, or undefined when the
   * command expects no response.
   */
  async sendCommand(command: Command, options?: QueryOptions): Promise<ResponseData | undefined> {
    if (command.expectsResponse) return this.request(command, options);
    const session = this.readySession();
    if (!this.write(session, encodeCommand(command))) {
      throw new ConnectionLostError(DisconnectReason.SOCKET_ERROR);
    }
    return undefined;
  }

  /**
   * Send a command and wait for the response carrying its name.
   * Rejects with NotConnectedError, CommandBusyError, CommandTimeoutError,
   * DeviceError or ConnectionLostError.
   */
  async request(command: Command, options?: QueryOptions): Promise<ResponseData> {
    const session = this.readySession();
    if (this.statusRefresh && command.name === 'GET_STATUS') {
      dbgV('GET_STATUS joins the post-reconnect refresh in flight');
      return this.statusRefresh;
    }
    const line = encodeCommand(command);
    const timeout = options?.timeout ?? this.options.commandTimeoutMs;
    const waiter = this.pending.register(command.name, timeout);
    if (!this.write(session, line)) {
      this.pending.reject(command.name, new ConnectionLostError(DisconnectReason.SOCKET_ERROR));
    }
    return waiter;
  }

  private readySession(): Session {
    const session = this.session;
    if (this.state !== ConnectionState.CONNECTED || !session) {
      if (this.stabiliseWait) throw new NotReadyError();
      throw new NotConnectedError(this.state);
    }
    return session;
  }

  /**
   * A failed write is a dead link: pending commands are abandoned and the
   * client starts reconnecting.
   */
  private write(session: Session, line: string): boolean {
    try {
      session.send(line);
      return true;
    } catch (err) {
      this.handleConnectionLost(session.id, DisconnectReason.SOCKET_ERROR, errorMessage(err));
      return false;
    }
  }

  private onLine(sessionId: number, line: string) {
    if (sessionId !== this.connectionSession.sessionId) return;
    this._lastSeen = Date.now();
    this.dispatcher.onFrame(decodeFrame(line));
  }

  // ============================================================================
  // Observability
  // ============================================================================

  getConnectionMetrics(): ConnectionMetrics {
    const now = Date.now();
    return {
      state: this.state,
      sessionId: this.connectionSession.sessionId,
      uptime: this.connected ? now - this.connectionSession.startTime : 0,
      lastSeen: this._lastSeen,
      lastSent: this.session && this.session.lastSentTime > 0 ? this.session.lastSentTime : undefined,
      lastDisconnectTime: this.connectionSession.lastDisconnectTime,
      pendingCommands: this.pending.names(),
      reconnectAttempts: this.reconnectAttempts,
      isReconnecting: this.state === ConnectionState.RECONNECTING
    };
  }
}
