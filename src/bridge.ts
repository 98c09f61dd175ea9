import type { Readable, Writable } from 'stream';
import type { BridgeConfig } from './config/types.js';
import { ProtocolReader } from './protocol/reader.js';
import { ProtocolSession, type SessionOutcome } from './protocol/ProtocolSession.js';
import { ProtocolWriter } from './protocol/writer.js';
import { EXIT_CODES, type ExitCode } from './utils/errors.js';
import { log } from './utils/logger.js';
import { ChokidarEventSource } from './watch/ChokidarEventSource.js';
import { EventCoalescer } from './watch/EventCoalescer.js';
import { EventPump } from './watch/EventPump.js';
import type { EventSource } from './watch/event-source.js';
import { WatchRegistry, type ReleaseSummary } from './watch/WatchRegistry.js';

export interface BridgeOptions {
  input: Readable;
  output: Writable;
  config: BridgeConfig;
  /** Defaults to the chokidar backend */
  source?: EventSource;
}

export interface BridgeResult {
  exitCode: ExitCode;
  session: SessionOutcome;
  released: ReleaseSummary;
  /** True when every subscription and the event source closed without error */
  clean: boolean;
}

/**
 * One bridge session: owns the registry, coalescer and ingestion pump for
 * its lifetime and tears them down when the protocol session ends.
 */
export class Bridge {
  readonly source: EventSource;
  readonly coalescer: EventCoalescer;
  readonly registry: WatchRegistry;
  readonly pump: EventPump;
  readonly session: ProtocolSession;
  private readonly reader: ProtocolReader;

  constructor(options: BridgeOptions) {
    const { config } = options;

    this.source = options.source ?? new ChokidarEventSource();
    this.coalescer = new EventCoalescer({
      debounceMs: config.debounceMs,
      maxBatchDelayMs: config.maxBatchDelayMs,
      ignore: config.ignore
    });
    this.registry = new WatchRegistry({
      source: this.source,
      sink: this.coalescer,
      ignore: config.ignore,
      retry: config.retry
    });
    this.pump = new EventPump(this.source, this.registry, this.coalescer);
    this.reader = new ProtocolReader(options.input);
    this.session = new ProtocolSession({
      reader: this.reader,
      writer: new ProtocolWriter(options.output),
      registry: this.registry,
      coalescer: this.coalescer
    });
  }

  async run(): Promise<BridgeResult> {
    this.pump.start();
    const outcome = await this.session.run();
    const { released, clean } = await this.shutdown();

    let exitCode: ExitCode = outcome.exitCode;
    if (exitCode === EXIT_CODES.OK && !clean) {
      exitCode = EXIT_CODES.WATCH_BACKEND;
    }

    log.info('Bridge finished', {
      reason: outcome.reason,
      exitCode,
      released: released.released,
      releaseFailures: released.failed
    });
    return { exitCode, session: outcome, released, clean };
  }

  /**
   * Ask the session to wind down, as on end of input
   */
  stop(): void {
    this.session.stop();
  }

  /**
   * Release everything, best effort: a failed release is logged and counted,
   * never retried.
   */
  private async shutdown(): Promise<{ released: ReleaseSummary; clean: boolean }> {
    this.pump.stop();
    const released = await this.registry.closeAll();
    await this.pump.idle();
    this.coalescer.close();

    let clean = released.failed === 0;
    try {
      await this.source.close();
    } catch (error) {
      clean = false;
      log.error('Closing the event source failed', error);
    }

    return { released, clean };
  }
}

export { EXIT_CODES } from './utils/errors.js';
export type { BridgeConfig } from './config/types.js';
export type { EventSource, RawEvent, SubscriptionHandle } from './watch/event-source.js';
