import { PROTOCOL_CONSTANTS } from '../config/constants.js';
import { EXIT_CODES, FatalError, ProtocolError, WatchError, type ExitCode } from '../utils/errors.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { log, LogLevel } from '../utils/logger.js';
import type { EventCoalescer, WaitOutcome } from '../watch/EventCoalescer.js';
import type { WatchRegistry, WatchRoot } from '../watch/WatchRegistry.js';
import { parseCommand, type HostCommand } from './codec.js';
import type { ProtocolWriter } from './writer.js';

type CommandOf<V extends HostCommand['verb']> = Extract<HostCommand, { verb: V }>;

export type SessionEndReason =
  | 'end-of-input'
  | 'stopped'
  | 'handshake-failed'
  | 'protocol-violation'
  | 'io-failure'
  | 'internal-error';

export interface SessionOutcome {
  reason: SessionEndReason;
  exitCode: ExitCode;
  error?: Error;
}

export type RootSessionState = 'unknown' | 'registering' | 'idle' | 'waiting';

export interface CommandSource extends AsyncIterable<string> {
  close(): void;
}

export interface ProtocolSessionOptions {
  reader: CommandSource;
  writer: ProtocolWriter;
  registry: WatchRegistry;
  coalescer: EventCoalescer;
  minVersion?: number;
  maxVersion?: number;
}

interface Registration {
  key: string;
  /** False once the root was refused; the rest of the dialogue gets no replies */
  accepted: boolean;
}

/**
 * Drives one conversation with the host: handshake, root registration,
 * waits and change reports.
 *
 * Commands are handled strictly one at a time. Waits never block the command
 * loop; each one is a promise tagged with an AbortController, and any command
 * other than WAIT aborts them all. Aborting never drains, so changes that
 * race with a cancellation stay pending for the next report.
 */
export class ProtocolSession {
  private readonly reader: CommandSource;
  private readonly writer: ProtocolWriter;
  private readonly registry: WatchRegistry;
  private readonly coalescer: EventCoalescer;
  private readonly minVersion: number;
  private readonly maxVersion: number;

  private version: number | null = null;
  private registration: Registration | null = null;
  private readonly waits = new Map<string, AbortController>();
  private readonly background = new Set<Promise<void>>();
  private asyncFailure: Error | null = null;
  private stopped = false;

  constructor(options: ProtocolSessionOptions) {
    this.reader = options.reader;
    this.writer = options.writer;
    this.registry = options.registry;
    this.coalescer = options.coalescer;
    this.minVersion = options.minVersion ?? PROTOCOL_CONSTANTS.MIN_VERSION;
    this.maxVersion = options.maxVersion ?? PROTOCOL_CONSTANTS.MAX_VERSION;
  }

  get negotiatedVersion(): number | null {
    return this.version;
  }

  rootState(key: string): RootSessionState {
    if (this.registration?.key === key) return 'registering';
    if (this.waits.has(key)) return 'waiting';
    return this.registry.hasRoot(key) ? 'idle' : 'unknown';
  }

  /**
   * End the session as if the input had closed
   */
  stop(): void {
    this.stopped = true;
    this.reader.close();
  }

  async run(): Promise<SessionOutcome> {
    const detach = this.registry.onRootFailed((root, error) => this.reportRootFailure(root, error));

    try {
      await this.writer.version(this.maxVersion);

      for await (const line of this.reader) {
        const command = this.parse(line);
        if (command) {
          await this.dispatch(command);
        }
        if (this.asyncFailure) {
          break;
        }
      }

      if (this.asyncFailure) {
        throw this.asyncFailure;
      }

      log.debug('Command stream closed');
      return { reason: this.stopped ? 'stopped' : 'end-of-input', exitCode: EXIT_CODES.OK };
    } catch (error) {
      return this.fail(error);
    } finally {
      detach();
      this.cancelAllWaits();
      await Promise.all(Array.from(this.background));
    }
  }

  private parse(line: string): HostCommand | null {
    try {
      return parseCommand(line);
    } catch (error) {
      if (this.version === null && error instanceof ProtocolError) {
        throw new ProtocolError('HANDSHAKE_FAILED', error.message);
      }
      throw error;
    }
  }

  private async dispatch(command: HostCommand): Promise<void> {
    if (this.version === null) {
      this.handshake(command);
      return;
    }

    if (command.verb !== 'WAIT') {
      this.cancelAllWaits();
    }

    if (this.registration) {
      await this.continueRegistration(this.registration, command);
      return;
    }

    switch (command.verb) {
      case 'DEBUG':
        log.setLevel(LogLevel.DEBUG);
        return;
      case 'START':
        await this.start(command);
        return;
      case 'WAIT':
        await this.wait(command);
        return;
      case 'CHANGES':
        await this.changes(command);
        return;
      case 'RESET':
        await this.reset(command);
        return;
      case 'VERSION':
      case 'DIR':
      case 'LINK':
      case 'DONE':
        throw new ProtocolError('UNEXPECTED_COMMAND', `unexpected command: ${command.verb}`);
    }
  }

  private handshake(command: HostCommand): void {
    if (command.verb !== 'VERSION') {
      throw new ProtocolError('HANDSHAKE_FAILED', `expected VERSION, got ${command.verb}`);
    }

    const offered = /^\d+$/.test(command.version) ? Number(command.version) : NaN;
    if (!Number.isSafeInteger(offered)) {
      throw new ProtocolError('HANDSHAKE_FAILED', `unparseable version: ${command.version}`);
    }

    const negotiated = Math.min(offered, this.maxVersion);
    if (negotiated < this.minVersion) {
      throw new ProtocolError(
        'UNSUPPORTED_VERSION',
        `unsupported protocol version ${offered} (supported: ${this.minVersion}-${this.maxVersion})`
      );
    }
    if (offered !== negotiated) {
      log.warn('Host offered a newer protocol version', { offered, negotiated });
    }

    this.version = negotiated;
    log.debug('Handshake complete', { version: negotiated });
  }

  private async start(command: CommandOf<'START'>): Promise<void> {
    const existing = this.registry.getRoot(command.hash);
    if (existing?.state === 'failed') {
      // a failed root can be registered afresh
      await this.dropRoot(command.hash);
    }

    try {
      await this.registry.addRoot(command.hash, command.fspath, { subpath: command.path });
    } catch (error) {
      if (!(error instanceof WatchError)) {
        throw error;
      }
      log.warn('Cannot watch root', { root: command.hash, code: error.code, error: error.message });
      this.registration = { key: command.hash, accepted: false };
      await this.writer.error(error.message);
      return;
    }

    this.registration = { key: command.hash, accepted: true };
    await this.writer.ok();
  }

  private async continueRegistration(registration: Registration, command: HostCommand): Promise<void> {
    switch (command.verb) {
      case 'DIR':
        if (registration.accepted) {
          await this.writer.ok();
        }
        return;
      case 'LINK':
        if (registration.accepted) {
          const refusal = new WatchError(
            'LINKS_UNSUPPORTED',
            'link following is not supported, please disable the links preference',
            command.path
          );
          log.warn('Refusing to follow link', { root: registration.key, path: command.path });
          registration.accepted = false;
          await this.dropRoot(registration.key);
          await this.writer.error(refusal.message);
        }
        return;
      case 'DONE':
        this.registration = null;
        return;
      case 'DEBUG':
        log.setLevel(LogLevel.DEBUG);
        return;
      default:
        throw new ProtocolError(
          'UNEXPECTED_COMMAND',
          `unexpected command while registering ${registration.key}: ${command.verb}`,
          registration.key
        );
    }
  }

  private async wait(command: CommandOf<'WAIT'>): Promise<void> {
    const root = this.requireRoot(command.hash);

    if (root.state === 'failed') {
      await this.writer.error(`root ${root.key} is unavailable: ${root.failure ?? 'unknown failure'}`);
      return;
    }

    if (this.waits.has(root.key)) {
      const violation = new ProtocolError('DUPLICATE_WAIT', `WAIT for ${root.key} while already waiting on it`, root.key);
      log.warn('Failing root after protocol violation', { root: root.key, error: violation.message });
      this.cancelWait(root.key);
      await this.dropRoot(root.key);
      await this.writer.error(violation.message);
      return;
    }

    if (this.coalescer.hasSettledChanges(root.key)) {
      this.cancelAllWaits();
      await this.writer.changes(root.key);
      return;
    }

    const controller = new AbortController();
    this.waits.set(root.key, controller);

    const waiting = this.coalescer
      .waitForChanges(root.key, { timeoutMs: command.timeoutMs, signal: controller.signal })
      .then((outcome) => this.onWaitSettled(root.key, controller, outcome));
    this.runInBackground(waiting);
  }

  private async onWaitSettled(key: string, controller: AbortController, outcome: WaitOutcome): Promise<void> {
    if (this.waits.get(key) === controller) {
      this.waits.delete(key);
    }
    if (outcome === 'cancelled' || controller.signal.aborted) {
      return;
    }

    if (outcome === 'changes') {
      this.cancelAllWaits();
      await this.writer.changes(key);
    } else {
      await this.writer.noChanges(key);
    }
  }

  private async changes(command: CommandOf<'CHANGES'>): Promise<void> {
    const root = this.requireRoot(command.hash);
    const paths = this.coalescer.drain(root.key);
    log.debug('Reporting changes', { root: root.key, count: paths.length });
    await this.writer.report(paths);
  }

  private async reset(command: CommandOf<'RESET'>): Promise<void> {
    if (!this.registry.hasRoot(command.hash)) {
      log.warn('RESET for unknown root', { root: command.hash });
      return;
    }
    await this.dropRoot(command.hash);
  }

  private requireRoot(key: string): WatchRoot {
    const root = this.registry.getRoot(key);
    if (!root) {
      throw new ProtocolError('UNKNOWN_ROOT', `unknown replica: ${key}`, key);
    }
    return root;
  }

  private async dropRoot(key: string): Promise<void> {
    this.cancelWait(key);
    await this.registry.removeRoot(key);
    this.coalescer.discard(key);
  }

  private cancelWait(key: string): void {
    const controller = this.waits.get(key);
    if (controller) {
      this.waits.delete(key);
      controller.abort();
    }
  }

  private cancelAllWaits(): void {
    for (const key of Array.from(this.waits.keys())) {
      this.cancelWait(key);
    }
  }

  private reportRootFailure(root: WatchRoot, error: WatchError): void {
    this.runInBackground(this.writer.error(`root ${root.key} degraded: ${error.message}`));
  }

  /**
   * Writes that happen outside the command loop. A failure ends the session
   * through the loop, which is unblocked by closing the reader.
   */
  private runInBackground(task: Promise<void>): void {
    const tracked = task
      .catch((error: unknown) => {
        if (!this.asyncFailure) {
          this.asyncFailure = error instanceof Error ? error : new Error(getErrorMessage(error));
        }
        this.reader.close();
      })
      .finally(() => {
        this.background.delete(tracked);
      });
    this.background.add(tracked);
  }

  private async fail(error: unknown): Promise<SessionOutcome> {
    if (error instanceof ProtocolError) {
      log.error('Protocol error', error, { code: error.code });
      await this.tryWriteError(error.message);
      const handshake = error.exitCode === EXIT_CODES.HANDSHAKE;
      return {
        reason: handshake ? 'handshake-failed' : 'protocol-violation',
        exitCode: error.exitCode,
        error
      };
    }

    if (error instanceof FatalError) {
      log.error('I/O failure', error, { code: error.code });
      return { reason: 'io-failure', exitCode: EXIT_CODES.IO, error };
    }

    log.error('Unexpected failure', error);
    await this.tryWriteError(`internal error: ${getErrorMessage(error)}`);
    return {
      reason: 'internal-error',
      exitCode: EXIT_CODES.INTERNAL,
      error: error instanceof Error ? error : new Error(getErrorMessage(error))
    };
  }

  private async tryWriteError(message: string): Promise<void> {
    if (this.writer.failed) {
      return;
    }
    try {
      await this.writer.error(message);
    } catch (writeError) {
      log.error('Could not report error to host', writeError);
    }
  }
}
