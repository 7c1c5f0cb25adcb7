/**
 * Optional process-level error guards.
 *
 * A motor client that runs unattended should not die because one command
 * promise was left unhandled or the network dropped. Call once at startup:
 * ```typescript
 * import { setupGlobalErrorHandlers } from 'poe-motor-node';
 *
 * const remove = setupGlobalErrorHandlers({
 *   onUnhandledRejection: (reason) => log.error('unhandled rejection', reason)
 * });
 * ```
 * Skip this if the application already installs its own handlers.
 */

import { CommandTimeoutError, ConnectionFailedError, ConnectionLostError, NotConnectedError } from './errors';

export interface GlobalErrorHandlerOptions {
  onUnhandledRejection?: (reason: unknown, promise: Promise<unknown>) => void;

  /**
   * @param origin - 'uncaughtException' or 'unhandledRejection'
   */
  onUncaughtException?: (error: Error, origin: string) => void;

  /**
   * Keep the process alive after an uncaught exception (default true)
   */
  preventExit?: boolean;
}

const NETWORK_ERROR_CODES = [
  'EHOSTDOWN',
  'EHOSTUNREACH',
  'ENETDOWN',
  'ENETUNREACH',
  'ECONNREFUSED',
  'ECONNRESET',
  'EPIPE',
  'ETIMEDOUT',
  'ENOTFOUND'
];

/**
 * @returns cleanup function that removes the handlers again
 */
export function setupGlobalErrorHandlers(options: GlobalErrorHandlerOptions = {}): () => void {
  const {
    onUnhandledRejection = defaultUnhandledRejectionHandler,
    onUncaughtException = defaultUncaughtExceptionHandler,
    preventExit = true
  } = options;

  const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
    console.error('[motor] Unhandled promise rejection:', reason);
    if (reason instanceof Error) {
      console.error('Stack:', reason.stack);
    }
    onUnhandledRejection(reason, promise);
  };

  const uncaughtExceptionHandler = (error: Error, origin: string) => {
    console.error('[motor] Uncaught exception:', error);
    console.error('Origin:', origin);
    onUncaughtException(error, origin);

    if (!preventExit) {
      console.error('Exiting...');
      process.exit(1);
    }
  };

  process.on('unhandledRejection', unhandledRejectionHandler);
  process.on('uncaughtException', uncaughtExceptionHandler);

  return () => {
    process.off('unhandledRejection', unhandledRejectionHandler);
    process.off('uncaughtException', uncaughtExceptionHandler);
  };
}

function defaultUnhandledRejectionHandler(reason: unknown): void {
  if (isRecoverableError(reason)) {
    console.warn('[motor] Recoverable connection error ignored; the client keeps reconnecting');
    return;
  }
  console.warn('[motor] Unhandled rejection ignored, process keeps running');
}

function defaultUncaughtExceptionHandler(error: Error): void {
  if (isRecoverableError(error)) {
    console.warn('[motor] Recoverable error caught, process keeps running');
    return;
  }
  console.error('[motor] Serious error, check application logic');
}

/**
 * Socket-level failure, by errno code or by a code quoted in the message
 */
export function isNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code: unknown = Reflect.get(error, 'code');
  if (typeof code === 'string' && NETWORK_ERROR_CODES.includes(code)) {
    return true;
  }
  return NETWORK_ERROR_CODES.some((c) => error.message.includes(c));
}

/**
 * Errors the client recovers from by itself through reconnection or a retry
 */
export function isRecoverableError(error: unknown): boolean {
  if (isNetworkError(error)) return true;
  return error instanceof ConnectionLostError
    || error instanceof ConnectionFailedError
    || error instanceof CommandTimeoutError
    || error instanceof NotConnectedError;
}

/**
 * Only keep the process from crashing, with the default handlers
 */
export function setupBasicErrorProtection(): () => void {
  return setupGlobalErrorHandlers({
    preventExit: true
  });
}
