import { getErrorCode, getErrorMessage } from './error-utils.js';

/**
 * Process exit codes. Unison only distinguishes zero from non-zero; the
 * distinct values are for whoever reads the logs.
 */
export const EXIT_CODES = {
  OK: 0,
  INTERNAL: 1,
  HANDSHAKE: 2,
  PROTOCOL: 3,
  WATCH_BACKEND: 4,
  IO: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export abstract class BridgeError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type ProtocolErrorCode =
  | 'MALFORMED_COMMAND'
  | 'UNEXPECTED_COMMAND'
  | 'HANDSHAKE_FAILED'
  | 'UNSUPPORTED_VERSION'
  | 'UNKNOWN_ROOT'
  | 'DUPLICATE_WAIT';

/**
 * Violation of the command protocol. Fatal unless the session can pin it on a
 * single root.
 */
export class ProtocolError extends BridgeError {
  constructor(
    readonly code: ProtocolErrorCode,
    message: string,
    readonly rootKey?: string
  ) {
    super(message);
  }

  get exitCode(): ExitCode {
    return this.code === 'HANDSHAKE_FAILED' || this.code === 'UNSUPPORTED_VERSION'
      ? EXIT_CODES.HANDSHAKE
      : EXIT_CODES.PROTOCOL;
  }
}

export type WatchErrorCode =
  | 'NOT_FOUND'
  | 'NOT_A_DIRECTORY'
  | 'PERMISSION_DENIED'
  | 'SUBSCRIPTION_LIMIT'
  | 'SUBSCRIBE_FAILED'
  | 'LINKS_UNSUPPORTED';

/**
 * Failure scoped to one watched root. Other roots keep working.
 */
export class WatchError extends BridgeError {
  constructor(
    readonly code: WatchErrorCode,
    message: string,
    readonly path?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }

  static fromSystemError(error: unknown, path: string): WatchError {
    if (error instanceof WatchError || error instanceof TransientIOError) {
      return error;
    }
    const reason = getErrorMessage(error);
    switch (getErrorCode(error)) {
      case 'ENOENT':
        return new WatchError('NOT_FOUND', `no such directory: ${path}`, path, { cause: error });
      case 'ENOTDIR':
        return new WatchError('NOT_A_DIRECTORY', `not a directory: ${path}`, path, { cause: error });
      case 'EACCES':
      case 'EPERM':
        return new WatchError('PERMISSION_DENIED', `permission denied: ${path}`, path, { cause: error });
      case 'ENOSPC':
      case 'EMFILE':
        return new WatchError(
          'SUBSCRIPTION_LIMIT',
          `watch limit reached while subscribing ${path}: ${reason}`,
          path,
          { cause: error }
        );
      default:
        return new WatchError('SUBSCRIBE_FAILED', `cannot watch ${path}: ${reason}`, path, { cause: error });
    }
  }
}

/**
 * Delivery failure on the notification channel. The registry resubscribes
 * with backoff; only exhausted retries reach the host.
 */
export class TransientIOError extends BridgeError {
  readonly code = 'TRANSIENT_IO';
}

export type FatalErrorCode = 'INPUT_FAILED' | 'OUTPUT_FAILED';

/**
 * Broken command or response stream. Ends the process.
 */
export class FatalError extends BridgeError {
  constructor(
    readonly code: FatalErrorCode,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export class ConfigError extends BridgeError {
  readonly code = 'INVALID_CONFIG';
}

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ProtocolError) return error.exitCode;
  if (error instanceof FatalError) return EXIT_CODES.IO;
  if (error instanceof WatchError || error instanceof TransientIOError) return EXIT_CODES.WATCH_BACKEND;
  return EXIT_CODES.INTERNAL;
}
