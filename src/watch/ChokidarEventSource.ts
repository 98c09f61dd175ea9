import chokidar, { type FSWatcher } from 'chokidar';
import path from 'path';
import { TransientIOError } from '../utils/errors.js';
import { log } from '../utils/logger.js';
import type {
  EventSource,
  RawEvent,
  RawEventKind,
  RawEventListener,
  SourceErrorListener,
  SubscriptionHandle
} from './event-source.js';

type ChokidarEventName = 'add' | 'addDir' | 'change' | 'unlink' | 'unlinkDir';

const EVENT_KINDS: Record<ChokidarEventName, { kind: RawEventKind; isDirectory: boolean }> = {
  add: { kind: 'created', isDirectory: false },
  addDir: { kind: 'created', isDirectory: true },
  change: { kind: 'modified', isDirectory: false },
  unlink: { kind: 'removed', isDirectory: false },
  unlinkDir: { kind: 'removed', isDirectory: true }
};

interface ActiveWatcher {
  handle: SubscriptionHandle;
  watcher: FSWatcher;
}

/**
 * EventSource backed by one non-recursive chokidar watcher per directory.
 */
export class ChokidarEventSource implements EventSource {
  private nextId = 1;
  private readonly watchers = new Map<number, ActiveWatcher>();
  private readonly listeners = new Set<RawEventListener>();
  private readonly errorListeners = new Set<SourceErrorListener>();

  get size(): number {
    return this.watchers.size;
  }

  async subscribe(directory: string): Promise<SubscriptionHandle> {
    const handle: SubscriptionHandle = { id: this.nextId++, directory: path.resolve(directory) };
    const watcher = chokidar.watch(handle.directory, {
      depth: 0,
      ignoreInitial: true,
      persistent: true,
      disableGlobbing: true,
      followSymlinks: false
    });

    let ready = false;
    const readyPromise = new Promise<void>((resolve, reject) => {
      watcher.once('ready', () => {
        ready = true;
        resolve();
      });
      watcher.on('error', (error: Error) => {
        if (ready) {
          this.emitError(handle, error);
        } else {
          reject(error);
        }
      });
    });

    watcher.on('all', (eventName: ChokidarEventName, eventPath: string) => {
      this.emitEvent(handle, eventName, eventPath);
    });

    this.watchers.set(handle.id, { handle, watcher });
    try {
      await readyPromise;
    } catch (error) {
      this.watchers.delete(handle.id);
      await watcher.close();
      throw error;
    }

    log.debug('Subscribed', { id: handle.id, directory: handle.directory });
    return handle;
  }

  async unsubscribe(handle: SubscriptionHandle): Promise<void> {
    const active = this.watchers.get(handle.id);
    if (!active) {
      return;
    }
    this.watchers.delete(handle.id);
    await active.watcher.close();
    log.debug('Unsubscribed', { id: handle.id, directory: handle.directory });
  }

  onEvent(listener: RawEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  onError(listener: SourceErrorListener): () => void {
    this.errorListeners.add(listener);
    return () => {
      this.errorListeners.delete(listener);
    };
  }

  async close(): Promise<void> {
    const active = Array.from(this.watchers.values());
    this.watchers.clear();
    const results = await Promise.allSettled(active.map(({ watcher }) => watcher.close()));
    const failures = results.filter((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failures.length > 0) {
      throw new AggregateError(
        failures.map((failure) => failure.reason),
        `${failures.length} watcher(s) failed to close`
      );
    }
  }

  private emitEvent(handle: SubscriptionHandle, eventName: ChokidarEventName, eventPath: string): void {
    if (!this.watchers.has(handle.id)) {
      return;
    }
    const mapping = EVENT_KINDS[eventName];
    const event: RawEvent = {
      path: path.resolve(handle.directory, eventPath),
      kind: mapping.kind,
      isDirectory: mapping.isDirectory,
      timestamp: Date.now(),
      subscription: handle
    };
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  private emitError(handle: SubscriptionHandle, cause: Error): void {
    const error = new TransientIOError(`watcher for ${handle.directory} failed: ${cause.message}`, { cause });
    if (this.errorListeners.size === 0) {
      log.error('Watcher error with no listener attached', error, { directory: handle.directory });
      return;
    }
    for (const listener of this.errorListeners) {
      listener(handle, error);
    }
  }
}
