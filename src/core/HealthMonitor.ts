import { CommandBusyError, errorMessage } from '../utils/errors';
import { dbg, dbgV } from '../utils/debug';

export interface HealthMonitorHandlers {
  /** Liveness probe; rejects on timeout or error */
  probe: () => Promise<unknown>;
  /** Called once per failed probe; the monitor stops itself first */
  onFailure: (err: Error) => void;
}

/**
 * Periodic liveness probe on an established connection.
 * Started when the connection enters CONNECTED, stopped when it leaves.
 */
export class HealthMonitor {
  private timer?: NodeJS.Timeout;
  // Bumped on every start/stop so a probe settling after stop() is ignored
  private generation = 0;

  /** Zero disables the monitor */
  constructor(private readonly intervalMs: number, private readonly handlers: HealthMonitorHandlers) {}

  get running(): boolean { return this.timer !== undefined; }

  start() {
    this.stop();
    if (this.intervalMs <= 0) {
      dbg('Health check disabled (interval = 0)');
      return;
    }
    dbg(`Starting health check with ${this.intervalMs}ms interval`);
    this.schedule(this.generation);
  }

  stop() {
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private schedule(gen: number) {
    this.timer = setTimeout(() => { void this.runProbe(gen); }, this.intervalMs);
  }

  private async runProbe(gen: number) {
    if (gen !== this.generation) return;
    try {
      await this.handlers.probe();
      if (gen !== this.generation) return;
      dbgV('Health check passed');
      this.schedule(gen);
    } catch (err) {
      if (gen !== this.generation) return;
      if (err instanceof CommandBusyError) {
        // A caller's own GET_INFO is in flight; the link is evidently in use
        dbgV('Health check skipped: probe command already pending');
        this.schedule(gen);
        return;
      }
      dbg(`Health check failed: ${errorMessage(err)}`);
      this.stop();
      this.handlers.onFailure(err instanceof Error ? err : new Error(String(err)));
    }
  }
}
