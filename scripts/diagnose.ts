#!/usr/bin/env tsx
/**
 * Motor diagnostic tool: connect, run one command, print the result as JSON.
 * Set DEBUG_MOTOR_LEVEL=2 to see every line on the wire.
 */

import { program } from 'commander';
import { MotorControl } from '../src/motor/MotorControl';
import { ConnectionState, MotorStatusUpdate } from '../src/types';
import { DEFAULT_PORT } from '../src/motor/MotorConstants';
import { MotorError, errorMessage } from '../src/utils/errors';

interface DiagnosticOptions {
  host?: string;
  port: string;
  timeout: string;
  verbose: boolean;
}

class Output {
  constructor(private readonly useColor: boolean, private readonly verbose: boolean) {}

  private color(text: string, code: number): string {
    return this.useColor ? `\x1b[${code}m${text}\x1b[0m` : text;
  }

  info(text: string) {
    if (this.verbose) console.error(this.color(text, 90));
  }

  result(value: unknown) {
    console.log(JSON.stringify(value, null, 2));
  }

  failure(err: unknown) {
    const payload = err instanceof MotorError ? err.toJSON() : { message: errorMessage(err) };
    console.error(this.color(`✗ ${errorMessage(err)}`, 31));
    if (this.verbose) console.error(JSON.stringify(payload, null, 2));
  }
}

function parseInteger(value: string, name: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return n;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

type Action = (motor: MotorControl, out: Output) => Promise<unknown>;

async function withMotor(action: Action): Promise<void> {
  const opts = program.opts<DiagnosticOptions>();
  const out = new Output(process.stderr.isTTY === true, opts.verbose);
  const host = opts.host ?? process.env.MOTOR_HOST;
  if (!host) {
    out.failure(new Error('A motor address is required (--host or MOTOR_HOST)'));
    process.exitCode = 1;
    return;
  }

  const timeout = parseInteger(opts.timeout, 'timeout');
  const motor = new MotorControl({
    host,
    port: parseInteger(opts.port, 'port'),
    connectTimeoutMs: timeout,
    commandTimeoutMs: timeout,
    // One-shot tool: no background probing
    healthCheckIntervalSeconds: 0
  });
  motor.registerConnectionCallback((state: ConnectionState) => out.info(`state: ${state}`));

  try {
    out.info(`Connecting to ${host}:${motor.options.port}...`);
    const started = Date.now();
    if (!(await motor.connect())) {
      throw new Error(`Could not connect to ${host}:${motor.options.port}`);
    }
    out.info(`Connected in ${Date.now() - started}ms`);
    const value = await action(motor, out);
    if (value !== undefined) out.result(value);
  } catch (err) {
    out.failure(err);
    process.exitCode = 1;
  } finally {
    await motor.disconnect();
  }
}

function main(): Promise<unknown> {
  program
    .name('motor-diagnose')
    .description('Query and drive a networked motor controller')
    .option('--host <host>', 'motor IP address or hostname (default: MOTOR_HOST)')
    .option('--port <port>', 'TCP port', String(DEFAULT_PORT))
    .option('--timeout <ms>', 'connect and command timeout in milliseconds', '5000')
    .option('--verbose', 'print connection progress to stderr', false);

  program.command('status').description('read the motor status')
    .action(() => withMotor((m) => m.getStatus()));

  program.command('info').description('read network and firmware info')
    .action(() => withMotor((m) => m.getInfo()));

  program.command('move <pos>').description('move to a position in percent (0-100)')
    .option('--delay <seconds>', 'wait before moving (0-30)', '0')
    .action((pos: string, cmd: { delay: string }) =>
      withMotor((m) => m.move(parseInteger(pos, 'position'), parseInteger(cmd.delay, 'delay'))));

  program.command('amove <pos>').description('move to a raw encoder position (0-65536)')
    .option('--delay <ms>', 'wait before moving (0-10000)', '0')
    .action((pos: string, cmd: { delay: string }) =>
      withMotor((m) => m.absoluteMove(parseInteger(pos, 'position'), parseInteger(cmd.delay, 'delay'))));

  program.command('stop').description('stop any motion')
    .action(() => withMotor((m) => m.stop()));

  program.command('jog [count]').description('wiggle the motor to identify it (1-10)')
    .action((count: string | undefined) =>
      withMotor((m) => m.jog(count === undefined ? 1 : parseInteger(count, 'count'))));

  program.command('watch <seconds>').description('print status pushes for a while')
    .action((seconds: string) => withMotor(async (m, out) => {
      const updates: MotorStatusUpdate[] = [];
      const sub = m.registerStatusCallback((u) => {
        updates.push(u);
        out.result(u);
      });
      await delay(parseInteger(seconds, 'seconds') * 1000);
      sub.dispose();
      out.info(`${updates.length} update(s) received`);
      return undefined;
    }));

  return program.parseAsync();
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
