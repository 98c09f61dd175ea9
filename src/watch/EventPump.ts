import { WatchError } from '../utils/errors.js';
import { log } from '../utils/logger.js';
import type { ChangeSink } from './EventCoalescer.js';
import type { EventSource, RawEvent, SubscriptionHandle } from './event-source.js';
import type { WatchRegistry, WatchRoot } from './WatchRegistry.js';

/**
 * Ingestion side of the bridge: takes raw events off the source, resolves
 * them against the registry and folds them into the coalescer. Directory
 * events also grow or shrink the root's subscriptions.
 */
export class EventPump {
  private readonly inflight = new Set<Promise<void>>();
  private detachers: Array<() => void> = [];

  constructor(
    private readonly source: EventSource,
    private readonly registry: WatchRegistry,
    private readonly sink: ChangeSink
  ) {}

  start(): void {
    if (this.detachers.length > 0) {
      return;
    }
    this.detachers = [
      this.source.onEvent((event) => this.ingest(event)),
      this.source.onError((handle, error) => this.handleError(handle, error))
    ];
  }

  stop(): void {
    for (const detach of this.detachers) {
      detach();
    }
    this.detachers = [];
  }

  ingest(event: RawEvent): void {
    const resolved = this.registry.resolve(event);
    if (!resolved) {
      log.debug('Dropping event from released subscription', { path: event.path, kind: event.kind });
      return;
    }

    const { root, relativePath } = resolved;
    this.sink.record(root.key, relativePath, event.kind, event.isDirectory);

    if (!event.isDirectory) {
      return;
    }
    if (event.kind === 'created' || event.kind === 'renamed-to') {
      this.track(root, this.registry.onDirectoryAppeared(root, relativePath));
    } else if (event.kind === 'removed' || event.kind === 'renamed-from') {
      this.track(root, this.registry.onDirectoryRemoved(root, relativePath));
    }
  }

  /**
   * Resolves once no directory operation started by an event is still running
   */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(Array.from(this.inflight));
    }
  }

  private handleError(handle: SubscriptionHandle, error: Error): void {
    const operation = this.registry.handleSourceError(handle, error).catch((failure: unknown) => {
      log.error('Recovering from watcher error failed', failure, { directory: handle.directory });
    });
    this.remember(operation);
  }

  /**
   * A directory operation that fails leaves the root under-subscribed, so the
   * root is degraded rather than left silently blind.
   */
  private track(root: WatchRoot, operation: Promise<void>): void {
    const guarded = operation
      .catch((error: unknown) => this.registry.failRoot(root, WatchError.fromSystemError(error, root.watchPath)))
      .catch((error: unknown) => {
        log.error('Degrading root failed', error, { root: root.key });
      });
    this.remember(guarded);
  }

  private remember(operation: Promise<void>): void {
    const tracked = operation.finally(() => {
      this.inflight.delete(tracked);
    });
    this.inflight.add(tracked);
  }
}
