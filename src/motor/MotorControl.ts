import {
  Command,
  ConnectionCallback,
  ConnectionMetrics,
  ConnectionState,
  Disposable,
  MotorClientOptions,
  MotorEventEmitter,
  MotorInfo,
  MotorStatus,
  QueryOptions,
  ResolvedMotorOptions,
  ResponseData,
  StatusCallback
} from '../types';
import { MotorConnection } from '../core/MotorConnection';
import { parseMotorInfo, parseMotorStatus } from '../core/MotorProtocol';
import { TransportFactory } from '../transport/TcpClient';
import { MotorCommands } from './MotorCommands';

/**
 * Client for one networked motor controller.
 *
 * @example
 * const motor = new MotorControl({ host: '192.168.1.50' });
 * motor.registerStatusCallback((u) => console.log(u.status.current_pos));
 * await motor.connect();
 * await motor.move(50);
 * await motor.disconnect();
 */
export class MotorControl {
  private connection: MotorConnection;

  /**
   * @param createTransport - replaces the TCP socket, e.g. with an in-process stand-in
   */
  constructor(options: MotorClientOptions, createTransport?: TransportFactory) {
    this.connection = new MotorConnection(options, createTransport);
  }

  get events(): MotorEventEmitter { return this.connection.events; }

  get state(): ConnectionState { return this.connection.state; }

  get connected(): boolean { return this.connection.connected; }

  get lastSeen(): number | undefined { return this.connection.lastSeen; }

  get justReconnected(): boolean { return this.connection.justReconnected; }

  get options(): Readonly<ResolvedMotorOptions> { return this.connection.config; }

  acknowledgeReconnect() { this.connection.acknowledgeReconnect(); }

  /**
   * @returns false if the first attempt failed; retries continue in the background
   */
  connect(): Promise<boolean> {
    return this.connection.connect();
  }

  disconnect(): Promise<void> {
    return this.connection.disconnect();
  }

  /**
   * Move to a position in percent of the calibrated travel
   * @param position - 0-100
   * @param delaySeconds - 0-30, wait before moving
   */
  async move(position: number, delaySeconds = 0, options?: QueryOptions): Promise<ResponseData> {
    return this.connection.request(MotorCommands.move(position, delaySeconds), options);
  }

  /**
   * Move to a raw encoder position
   * @param position - 0-65536
   * @param delayMs - 0-10000
   */
  async absoluteMove(position: number, delayMs = 0, options?: QueryOptions): Promise<ResponseData> {
    return this.connection.request(MotorCommands.absoluteMove(position, delayMs), options);
  }

  async stop(options?: QueryOptions): Promise<ResponseData> {
    return this.connection.request(MotorCommands.stop(), options);
  }

  /**
   * Wiggle the motor `count` times (1-10) so it can be found on site
   */
  async jog(count = 1, options?: QueryOptions): Promise<ResponseData> {
    return this.connection.request(MotorCommands.jog(count), options);
  }

  async getStatus(options?: QueryOptions): Promise<MotorStatus> {
    return parseMotorStatus(await this.connection.request(MotorCommands.getStatus(), options));
  }

  async getInfo(options?: QueryOptions): Promise<MotorInfo> {
    return parseMotorInfo(await this.connection.request(MotorCommands.getInfo(), options));
  }

  /**
   * Send an arbitrary command. Resolves undefined for commands that expect no response.
   */
  sendCommand(command: Command, options?: QueryOptions): Promise<ResponseData | undefined> {
    return this.connection.sendCommand(command, options);
  }

  /**
   * Replaces any previously registered status callback
   */
  registerStatusCallback(cb: StatusCallback): Disposable {
    const dispatcher = this.connection.dispatcher;
    dispatcher.setStatusCallback(cb);
    return {
      dispose: () => {
        if (dispatcher.getStatusCallback() === cb) dispatcher.setStatusCallback(undefined);
      }
    };
  }

  /**
   * Replaces any previously registered connection callback
   */
  registerConnectionCallback(cb: ConnectionCallback): Disposable {
    const dispatcher = this.connection.dispatcher;
    dispatcher.setConnectionCallback(cb);
    return {
      dispose: () => {
        if (dispatcher.getConnectionCallback() === cb) dispatcher.setConnectionCallback(undefined);
      }
    };
  }

  getConnectionMetrics(): ConnectionMetrics {
    return this.connection.getConnectionMetrics();
  }
}
