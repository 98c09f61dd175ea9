import { PassThrough } from 'stream';
import { setTimeout as delay } from 'timers/promises';

/**
 * Collects everything written to a stream and hands it back line by line.
 */
export class LineCollector {
  readonly stream = new PassThrough();
  readonly lines: string[] = [];
  private buffered = '';
  private cursor = 0;

  constructor() {
    this.stream.setEncoding('utf8');
    this.stream.on('data', (chunk: string) => {
      this.buffered += chunk;
      let newline = this.buffered.indexOf('\n');
      while (newline !== -1) {
        this.lines.push(this.buffered.slice(0, newline));
        this.buffered = this.buffered.slice(newline + 1);
        newline = this.buffered.indexOf('\n');
      }
    });
  }

  /**
   * Next line not yet taken. Rejects after `timeoutMs`.
   */
  async next(timeoutMs = 2_000): Promise<string> {
    const deadline = Date.now() + timeoutMs;
    while (this.cursor >= this.lines.length) {
      if (Date.now() > deadline) {
        throw new Error(`no output line after ${timeoutMs}ms (got: ${JSON.stringify(this.lines)})`);
      }
      await delay(5);
    }
    return this.lines[this.cursor++];
  }

  async take(count: number, timeoutMs = 2_000): Promise<string[]> {
    const taken: string[] = [];
    for (let i = 0; i < count; i++) {
      taken.push(await this.next(timeoutMs));
    }
    return taken;
  }

  /** Lines received but not yet taken */
  get remaining(): string[] {
    return this.lines.slice(this.cursor);
  }
}

/**
 * Scripted command input: write lines as the host would.
 */
export class CommandInput {
  readonly stream = new PassThrough();

  send(...lines: string[]): void {
    for (const line of lines) {
      this.stream.write(`${line}\n`);
    }
  }

  end(): void {
    this.stream.end();
  }
}
