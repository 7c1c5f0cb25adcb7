import { MotorTransport } from '../transport/TcpClient';
import { dbg, dbgV } from '../utils/debug';
import { DisconnectReason } from '../types';
import { LineFramer } from './MotorProtocol';

export interface SessionOptions {
  host: string;
  port: number;
  connectTimeoutMs: number;
}

export interface SessionHandlers {
  onLine: (line: string) => void; // every complete inbound line
  onClosed: (reason: DisconnectReason, detail?: string) => void;
}

/**
 * One TCP connection to the motor: the socket, its read loop and line framing.
 * A new Session is created for every connection attempt; once closed it stays closed.
 */
export class Session {
  public lastSentTime = 0;

  private framer = new LineFramer();
  private destroyed = false;
  private closedReported = false;

  constructor(
    private readonly transport: MotorTransport,
    private readonly address: SessionOptions,
    private readonly handlers: SessionHandlers,
    public readonly id: number
  ) {
    transport.on('data', (chunk) => {
      if (this.destroyed) return;
      for (const line of this.framer.push(chunk)) {
        dbgV(`RX session=${this.id}: ${line}`);
        handlers.onLine(line);
        if (this.destroyed) return;
      }
    });
    transport.on('end', () => this.reportClosed(DisconnectReason.REMOTE_CLOSED));
    transport.on('close', () => this.reportClosed(DisconnectReason.REMOTE_CLOSED));
    transport.on('error', (err) => this.reportClosed(DisconnectReason.SOCKET_ERROR, err.message));
  }

  get isOpen(): boolean { return !this.destroyed; }

  async open(): Promise<void> {
    const { host, port, connectTimeoutMs } = this.address;
    await this.transport.connect(host, port, connectTimeoutMs);
    dbg(`Session ${this.id} socket open to ${host}:${port}`);
  }

  send(line: string) {
    if (this.destroyed) {
      throw new Error(`Session ${this.id} is closed`);
    }
    this.transport.write(line);
    this.lastSentTime = Date.now();
    dbgV(`TX session=${this.id}: ${line.trim()}`);
  }

  close() {
    if (this.destroyed) return;
    this.destroyed = true;
    this.framer.reset();
    this.transport.removeAllListeners();
    this.transport.close();
  }

  private reportClosed(reason: DisconnectReason, detail?: string) {
    if (this.destroyed || this.closedReported) return;
    this.closedReported = true;
    dbg(`Session ${this.id} closed: ${reason}${detail ? ` (${detail})` : ''}`);
    this.handlers.onClosed(reason, detail);
  }
}
