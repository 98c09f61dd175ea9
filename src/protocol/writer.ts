import type { Writable } from 'stream';
import { FatalError } from '../utils/errors.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import { formatLine, type BridgeVerb } from './codec.js';

/**
 * Writes protocol responses. Every call resolves only once the stream has
 * accepted the bytes, so nothing sits in a buffer while the host blocks on it.
 */
export class ProtocolWriter {
  private failure: FatalError | null = null;

  constructor(private readonly output: Writable) {
    this.output.on('error', (error: Error) => {
      this.recordFailure(error);
    });
  }

  get failed(): FatalError | null {
    return this.failure;
  }

  private recordFailure(error: unknown): FatalError {
    if (!this.failure) {
      this.failure = new FatalError('OUTPUT_FAILED', `response stream failed: ${getErrorMessage(error)}`, {
        cause: error
      });
    }
    return this.failure;
  }

  private write(lines: string[]): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.output.destroyed || this.output.writableEnded) {
      return Promise.reject(this.recordFailure(new Error('stream is closed')));
    }

    for (const line of lines) {
      log.debug('send', { line });
    }

    return new Promise<void>((resolve, reject) => {
      this.output.write(`${lines.join('\n')}\n`, (error) => {
        if (error) {
          reject(this.recordFailure(error));
        } else {
          resolve();
        }
      });
    });
  }

  send(verb: BridgeVerb, args: readonly string[] = []): Promise<void> {
    return this.write([formatLine(verb, args)]);
  }

  version(version: number): Promise<void> {
    return this.send('VERSION', [String(version)]);
  }

  ok(): Promise<void> {
    return this.send('OK');
  }

  error(message: string): Promise<void> {
    return this.send('ERROR', [message]);
  }

  changes(rootKey: string): Promise<void> {
    return this.send('CHANGES', [rootKey]);
  }

  noChanges(rootKey: string): Promise<void> {
    return this.send('NOCHANGES', [rootKey]);
  }

  /**
   * One `RECURSIVE` line per path, terminated by `DONE`, in a single write
   */
  report(paths: readonly string[]): Promise<void> {
    return this.write([...paths.map((p) => formatLine('RECURSIVE', [p])), formatLine('DONE')]);
  }
}
