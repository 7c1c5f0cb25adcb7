import { ResponseData } from '../types';
import { CommandBusyError, CommandTimeoutError } from '../utils/errors';
import { dbg, dbgV, warn } from '../utils/debug';

interface PendingCommand {
  name: string;
  sentAt: number;
  deadline: number;
  timeoutMs: number;
  resolve: (data: ResponseData) => void;
  reject: (err: Error) => void;
}

/**
 * In-flight commands awaiting a response, keyed by command name.
 * The motor echoes the command name and nothing else, so at most one
 * command of a given name can be outstanding.
 *
 * Each entry carries its own deadline; a single timer is kept armed for the
 * earliest one and expired entries are failed by sweep().
 */
export class PendingCommands {
  private entries = new Map<string, PendingCommand>();
  private sweepTimer?: NodeJS.Timeout;
  private now: () => number;

  constructor(now: () => number = () => Date.now()) {
    this.now = now;
  }

  get size(): number { return this.entries.size; }

  has(name: string): boolean { return this.entries.has(name); }

  /** Pending names, oldest first */
  names(): string[] { return [...this.entries.keys()]; }

  /**
   * Register a waiter for `name`.
   * @throws CommandBusyError synchronously if `name` is already pending
   */
  register(name: string, timeoutMs: number): Promise<ResponseData> {
    if (this.entries.has(name)) {
      throw new CommandBusyError(name);
    }
    const sentAt = this.now();
    return new Promise<ResponseData>((resolve, reject) => {
      this.entries.set(name, { name, sentAt, deadline: sentAt + timeoutMs, timeoutMs, resolve, reject });
      dbgV(`Registered waiter for ${name} (timeout=${timeoutMs}ms, pending=[${this.names().join(', ')}])`);
      this.armSweep();
    });
  }

  /**
   * Hand a response to its waiter.
   * @returns false when nothing was waiting for `name` (stray or late response)
   */
  resolve(name: string, data: ResponseData): boolean {
    const entry = this.entries.get(name);
    if (!entry) {
      warn(`No pending command for response ${name} - discarded`);
      return false;
    }
    this.entries.delete(name);
    this.armSweep();
    dbgV(`Response correlated for ${name} after ${this.now() - entry.sentAt}ms`);
    entry.resolve(data);
    return true;
  }

  /**
   * Fail one waiter by name (e.g. when the write itself failed)
   */
  reject(name: string, err: Error): boolean {
    const entry = this.entries.get(name);
    if (!entry) return false;
    this.entries.delete(name);
    this.armSweep();
    entry.reject(err);
    return true;
  }

  /**
   * Fail the oldest waiter. ERROR responses do not say which command failed.
   * @param makeError builds the rejection from the failed command's name
   * @returns the failed command name, if any
   */
  rejectOldest(makeError: (name: string) => Error): string | undefined {
    const first = this.entries.keys().next();
    if (first.done) return undefined;
    this.reject(first.value, makeError(first.value));
    return first.value;
  }

  /**
   * Fail every waiter whose deadline has passed. Commands are not retried.
   * @returns number of commands timed out
   */
  sweep(now: number = this.now()): number {
    const expired = [...this.entries.values()].filter((e) => e.deadline <= now);
    for (const entry of expired) {
      this.entries.delete(entry.name);
      dbg(`Timeout waiting for response to ${entry.name}. Pending: [${this.names().join(', ')}]`);
      entry.reject(new CommandTimeoutError(entry.name, entry.timeoutMs));
    }
    this.armSweep();
    return expired.length;
  }

  /**
   * Fail every waiter with `err`. The table is empty afterwards.
   * @returns number of commands abandoned
   */
  abandonAll(err: Error): number {
    const all = [...this.entries.values()];
    this.entries.clear();
    this.disarmSweep();
    for (const entry of all) entry.reject(err);
    if (all.length > 0) dbg(`Abandoned ${all.length} pending command(s): ${err.message}`);
    return all.length;
  }

  private armSweep() {
    this.disarmSweep();
    if (this.entries.size === 0) return;
    let earliest = Infinity;
    for (const e of this.entries.values()) earliest = Math.min(earliest, e.deadline);
    const delay = Math.max(0, earliest - this.now());
    this.sweepTimer = setTimeout(() => {
      this.sweepTimer = undefined;
      this.sweep();
    }, delay);
  }

  private disarmSweep() {
    if (this.sweepTimer) {
      clearTimeout(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }
}
