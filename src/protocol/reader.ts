import type { Readable } from 'stream';
import { StringDecoder } from 'string_decoder';
import { FatalError } from '../utils/errors.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';

type ChunkResult = IteratorResult<unknown, unknown>;

/**
 * Splits the command stream into lines. Only `\n`-terminated lines count as
 * commands; an unterminated fragment at end of input is dropped.
 */
export class ProtocolReader implements AsyncIterable<string> {
  private closed = false;
  private readonly closeSignal: Promise<ChunkResult>;
  private resolveClose: (result: ChunkResult) => void = () => {};

  constructor(private readonly input: Readable) {
    this.closeSignal = new Promise<ChunkResult>((resolve) => {
      this.resolveClose = resolve;
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Stop yielding lines. A pending `for await` over the reader ends as if the
   * input had reached its end.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.resolveClose({ done: true, value: undefined });
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return this.lines();
  }

  async *lines(): AsyncGenerator<string, void, undefined> {
    const decoder = new StringDecoder('utf8');
    const chunks: AsyncIterator<unknown> = this.input[Symbol.asyncIterator]();
    let buffered = '';

    while (!this.closed) {
      let next: ChunkResult;
      try {
        next = await Promise.race([chunks.next(), this.closeSignal]);
      } catch (error) {
        throw new FatalError('INPUT_FAILED', `command stream failed: ${getErrorMessage(error)}`, { cause: error });
      }

      if (next.done) {
        buffered += decoder.end();
        break;
      }

      const chunk = next.value;
      buffered += Buffer.isBuffer(chunk) ? decoder.write(chunk) : String(chunk);

      let newline = buffered.indexOf('\n');
      while (newline !== -1 && !this.closed) {
        const line = buffered.slice(0, newline);
        buffered = buffered.slice(newline + 1);
        log.debug('recv', { line });
        yield line;
        newline = buffered.indexOf('\n');
      }
    }

    if (!this.closed && buffered.length > 0) {
      log.warn('Discarding unterminated command at end of input', { fragment: buffered });
    }
  }
}
