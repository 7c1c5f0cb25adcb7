import net from 'net';
import { EventEmitter } from 'events';
import { dbg, dbgV } from '../utils/debug';

export interface TransportEvents {
  data: (chunk: Buffer) => void;
  /** Remote closed its side (EOF) */
  end: () => void;
  error: (err: Error) => void;
  close: () => void;
}

/**
 * Byte stream to the motor. One instance per connection attempt.
 */
export interface MotorTransport {
  connect(host: string, port: number, timeoutMs: number): Promise<void>;
  write(data: string): void;
  close(): void;
  on<U extends keyof TransportEvents>(event: U, listener: TransportEvents[U]): this;
  removeAllListeners(): this;
}

export type TransportFactory = () => MotorTransport;

export class TcpClient extends EventEmitter implements MotorTransport {
  private socket?: net.Socket;
  private abortConnect?: (err: Error) => void;

  connect(host: string, port: number, timeoutMs: number): Promise<void> {
    if (this.socket) {
      return Promise.reject(new Error('TCP socket already open'));
    }
    dbgV(`[TCP] Connecting to ${host}:${port} (timeout ${timeoutMs}ms)`);
    const sock = new net.Socket();
    this.socket = sock;

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        sock.destroy();
        fail(new Error(`Connect timeout after ${timeoutMs}ms`));
      }, timeoutMs);

      const fail = (err: Error) => {
        clearTimeout(timer);
        this.abortConnect = undefined;
        sock.removeAllListeners();
        sock.on('error', (e) => dbg(`[TCP] error on abandoned socket: ${e.message}`));
        if (this.socket === sock) this.socket = undefined;
        reject(err);
      };
      this.abortConnect = (err) => {
        sock.destroy();
        fail(err);
      };

      sock.once('error', fail);
      sock.connect(port, host, () => {
        clearTimeout(timer);
        this.abortConnect = undefined;
        sock.off('error', fail);
        // Motor commands are tiny; don't let Nagle hold them back
        sock.setNoDelay(true);
        sock.on('data', (chunk: Buffer) => this.emit('data', chunk));
        sock.on('end', () => this.emit('end'));
        sock.on('error', (err) => this.forwardError(err));
        sock.on('close', () => this.emit('close'));
        dbgV(`[TCP] Connected to ${host}:${port} from local port ${sock.localPort ?? 0}`);
        resolve();
      });
    });
  }

  write(data: string) {
    if (!this.socket || this.socket.destroyed) {
      throw new Error('TCP socket not open');
    }
    dbgV(`[TCP] send ${data.length} bytes`);
    this.socket.write(data, (err) => {
      if (err) this.forwardError(err);
    });
  }

  close() {
    if (this.abortConnect) {
      this.abortConnect(new Error('Connection closed before it was established'));
      return;
    }
    if (!this.socket) return;
    try { this.socket.destroy(); } finally { this.socket = undefined; }
  }

  // An unhandled 'error' event would throw; late errors after close are only logged
  private forwardError(err: Error) {
    if (this.listenerCount('error') > 0) this.emit('error', err);
    else dbg(`[TCP] error with no listener: ${err.message}`);
  }
}
