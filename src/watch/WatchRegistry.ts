import fg from 'fast-glob';
import fs from 'fs';
import path from 'path';
import { RETRY_CONSTANTS } from '../config/constants.js';
import type { RetryConfig } from '../config/types.js';
import { WatchError } from '../utils/errors.js';
import { getErrorCode } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import { KeyedMutex } from '../utils/mutex.js';
import { withRetry, type RetryResult } from '../utils/retry.js';
import type { ChangeSink } from './EventCoalescer.js';
import type { EventSource, RawEvent, SubscriptionHandle } from './event-source.js';
import { createIgnoreMatcher, relativeTo, type IgnoreMatcher } from './paths.js';

export type WatchRootState = 'active' | 'failed';

export interface WatchRoot {
  readonly key: string;
  /** Canonical root directory; reported paths are relative to it */
  readonly fspath: string;
  readonly subpath: string;
  /** Directory actually watched: fspath joined with subpath */
  readonly watchPath: string;
  readonly recursive: boolean;
  readonly generation: number;
  state: WatchRootState;
  failure?: string;
  /** Absolute directory → live subscription */
  readonly subscriptions: Map<string, SubscriptionHandle>;
}

export interface AddRootOptions {
  subpath?: string;
  recursive?: boolean;
}

export interface ResolvedEvent {
  root: WatchRoot;
  relativePath: string;
}

export type RootFailureListener = (root: WatchRoot, error: WatchError) => void;

export interface WatchRegistryOptions {
  source: EventSource;
  sink: ChangeSink;
  ignore?: readonly string[];
  retry?: Partial<RetryConfig>;
}

export interface ReleaseSummary {
  released: number;
  failed: number;
}

interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
}

const VANISHED_CODES = new Set(['ENOENT', 'ENOTDIR']);

/**
 * Keeps OS subscriptions in step with the directory trees the host asked for.
 *
 * One logical root fans out to one subscription per live directory. Every
 * mutation of a root runs under that root's lock; roots never block each other.
 */
export class WatchRegistry {
  private readonly roots = new Map<string, WatchRoot>();
  private readonly handles = new Map<number, WatchRoot>();
  private readonly locks = new KeyedMutex<string>();
  private readonly failureListeners = new Set<RootFailureListener>();
  private readonly retryAbort = new AbortController();
  private readonly isIgnored: IgnoreMatcher;
  private readonly source: EventSource;
  private readonly sink: ChangeSink;
  private readonly retry: Partial<RetryConfig>;
  private nextGeneration = 1;

  constructor(options: WatchRegistryOptions) {
    this.source = options.source;
    this.sink = options.sink;
    this.retry = options.retry ?? {};
    this.isIgnored = createIgnoreMatcher(options.ignore ?? []);
  }

  getRoot(key: string): WatchRoot | undefined {
    return this.roots.get(key);
  }

  hasRoot(key: string): boolean {
    return this.roots.has(key);
  }

  listRoots(): WatchRoot[] {
    return Array.from(this.roots.values());
  }

  subscriptionCount(key?: string): number {
    if (key === undefined) {
      return this.handles.size;
    }
    return this.roots.get(key)?.subscriptions.size ?? 0;
  }

  onRootFailed(listener: RootFailureListener): () => void {
    this.failureListeners.add(listener);
    return () => {
      this.failureListeners.delete(listener);
    };
  }

  /**
   * Start watching a root. Registering a key that is already registered
   * returns the existing root untouched.
   */
  async addRoot(key: string, fspath: string, options: AddRootOptions = {}): Promise<WatchRoot> {
    return this.locks.runExclusive(key, async () => {
      const existing = this.roots.get(key);
      if (existing) {
        log.debug('Root already registered', { root: key, fspath: existing.fspath });
        return existing;
      }

      const canonical = await this.canonicalize(path.resolve(fspath));
      const subpath = options.subpath ?? '';
      const watchPath = path.resolve(canonical, subpath);
      if (relativeTo(canonical, watchPath) === null) {
        throw new WatchError('NOT_FOUND', `watch path ${subpath} lies outside ${canonical}`, watchPath);
      }
      await this.assertReadableDirectory(watchPath);

      const root: WatchRoot = {
        key,
        fspath: canonical,
        subpath,
        watchPath,
        recursive: options.recursive ?? true,
        generation: this.nextGeneration++,
        state: 'active',
        subscriptions: new Map()
      };
      this.roots.set(key, root);

      try {
        await this.subscribeTree(root, watchPath, false);
      } catch (error) {
        this.roots.delete(key);
        await this.releaseAll(root);
        throw WatchError.fromSystemError(error, watchPath);
      }

      log.info('Watching root', {
        root: key,
        path: watchPath,
        generation: root.generation,
        subscriptions: root.subscriptions.size
      });
      return root;
    });
  }

  /**
   * Subscribe a directory that just appeared, then report everything already
   * inside it. Entries created before the subscription went live would
   * otherwise never produce an event.
   */
  async onDirectoryAppeared(root: WatchRoot, relativePath: string): Promise<void> {
    await this.locks.runExclusive(root.key, async () => {
      if (!this.isLive(root) || !root.recursive || this.isIgnored(relativePath)) {
        return;
      }
      const directory = path.join(root.fspath, relativePath);
      if (relativeTo(root.watchPath, directory) === null) {
        return;
      }
      await this.subscribeTree(root, directory, true);
    });
  }

  /**
   * Release the subscriptions of a removed directory and everything below it.
   * Losing the watch path itself degrades the root.
   */
  async onDirectoryRemoved(root: WatchRoot, relativePath: string): Promise<void> {
    await this.locks.runExclusive(root.key, async () => {
      if (!this.isLive(root)) {
        return;
      }
      const directory = path.join(root.fspath, relativePath);
      if (relativeTo(directory, root.watchPath) !== null) {
        await this.degrade(root, new WatchError('NOT_FOUND', `watched directory was removed: ${root.watchPath}`, root.watchPath));
        return;
      }
      const doomed = Array.from(root.subscriptions.values()).filter((handle) => {
        const rel = relativeTo(directory, handle.directory);
        return rel !== null;
      });
      for (const handle of doomed) {
        await this.releaseHandle(root, handle);
      }
    });
  }

  /**
   * Stop watching a root. Returns false when the key was not registered.
   */
  async removeRoot(key: string): Promise<boolean> {
    const summary = await this.locks.runExclusive(key, async () => {
      const root = this.roots.get(key);
      if (!root) {
        return null;
      }
      this.roots.delete(key);
      return this.releaseAll(root);
    });

    if (summary) {
      log.info('Stopped watching root', { root: key, released: summary.released, failed: summary.failed });
    }
    return summary !== null;
  }

  /**
   * Map a raw event to its root and root-relative path. Events from released
   * subscriptions or earlier registrations of the same key map to null.
   */
  resolve(event: RawEvent): ResolvedEvent | null {
    const root = this.handles.get(event.subscription.id);
    if (!root || this.roots.get(root.key)?.generation !== root.generation) {
      return null;
    }
    const relativePath = relativeTo(root.fspath, event.path);
    if (relativePath === null) {
      log.warn('Event outside its root', { root: root.key, path: event.path });
      return null;
    }
    return { root, relativePath };
  }

  /**
   * A subscription reported an error: resubscribe with backoff, degrade the
   * root when retries run out. The directory is reported as changed since
   * events may have been lost in between.
   */
  async handleSourceError(handle: SubscriptionHandle, error: Error): Promise<void> {
    const root = this.handles.get(handle.id);
    if (!root) {
      log.debug('Error from released subscription', { directory: handle.directory, error: error.message });
      return;
    }
    log.warn('Watcher error, resubscribing', { root: root.key, directory: handle.directory, error: error.message });

    await this.locks.runExclusive(root.key, async () => {
      if (!this.isLive(root) || root.subscriptions.get(handle.directory)?.id !== handle.id) {
        return;
      }
      await this.releaseHandle(root, handle);

      let result: RetryResult<boolean>;
      try {
        result = await withRetry(() => this.trySubscribe(root, handle.directory), {
          maxAttempts: this.retry.maxAttempts ?? RETRY_CONSTANTS.MAX_ATTEMPTS,
          baseDelayMs: this.retry.baseDelayMs,
          maxDelayMs: this.retry.maxDelayMs,
          label: `resubscribe ${handle.directory}`,
          signal: this.retryAbort.signal
        });
      } catch (retryError) {
        if (this.retryAbort.signal.aborted) {
          return;
        }
        throw retryError;
      }

      if (!result.ok) {
        await this.degrade(root, WatchError.fromSystemError(result.error, handle.directory));
        return;
      }

      const relativePath = relativeTo(root.fspath, handle.directory);
      if (relativePath !== null) {
        this.sink.record(root.key, relativePath, 'unknown', true);
      }
    });
  }

  /**
   * Mark a root failed: drop its subscriptions, ask the host to rescan it and
   * tell the failure listeners.
   */
  async failRoot(root: WatchRoot, error: WatchError): Promise<void> {
    await this.locks.runExclusive(root.key, async () => {
      if (this.isLive(root)) {
        await this.degrade(root, error);
      }
    });
  }

  /**
   * Release every subscription of every root. Failures are logged and
   * counted, never retried.
   */
  async closeAll(): Promise<ReleaseSummary> {
    this.retryAbort.abort();
    const total: ReleaseSummary = { released: 0, failed: 0 };

    for (const key of Array.from(this.roots.keys())) {
      const summary = await this.locks.runExclusive(key, async () => {
        const root = this.roots.get(key);
        if (!root) {
          return null;
        }
        this.roots.delete(key);
        return this.releaseAll(root);
      });
      if (summary) {
        total.released += summary.released;
        total.failed += summary.failed;
      }
    }

    return total;
  }

  private isLive(root: WatchRoot): boolean {
    return root.state === 'active' && this.roots.get(root.key) === root;
  }

  private async degrade(root: WatchRoot, error: WatchError): Promise<void> {
    root.state = 'failed';
    root.failure = error.message;
    await this.releaseAll(root);
    this.sink.record(root.key, '', 'unknown', true);
    log.error('Root degraded', error, { root: root.key });

    for (const listener of this.failureListeners) {
      listener(root, error);
    }
  }

  private async canonicalize(fspath: string): Promise<string> {
    try {
      return await fs.promises.realpath(fspath);
    } catch (error) {
      throw WatchError.fromSystemError(error, fspath);
    }
  }

  private async assertReadableDirectory(directory: string): Promise<void> {
    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(directory);
    } catch (error) {
      throw WatchError.fromSystemError(error, directory);
    }
    if (!stats.isDirectory()) {
      throw new WatchError('NOT_A_DIRECTORY', `not a directory: ${directory}`, directory);
    }
    try {
      await fs.promises.access(directory, fs.constants.R_OK | fs.constants.X_OK);
    } catch (error) {
      throw WatchError.fromSystemError(error, directory);
    }
  }

  /**
   * Subscribe `directory` and then, for recursive roots, each subdirectory.
   * A directory is always subscribed before it is listed, so nothing created
   * inside it can slip between listing and subscribing. Directories that are
   * already subscribed are left alone.
   */
  private async subscribeTree(root: WatchRoot, directory: string, report: boolean): Promise<void> {
    if (root.subscriptions.has(directory)) {
      // already walked when it was first subscribed
      return;
    }
    const subscribed = await this.trySubscribe(root, directory);
    if (!subscribed || !root.recursive) {
      return;
    }

    for (const entry of await this.listEntries(directory)) {
      const absolute = path.join(directory, entry.name);
      const relativePath = relativeTo(root.fspath, absolute);
      if (relativePath === null || this.isIgnored(relativePath)) {
        continue;
      }
      if (report) {
        this.sink.record(root.key, relativePath, 'created', entry.isDirectory);
      }
      if (entry.isDirectory) {
        await this.subscribeTree(root, absolute, report);
      }
    }
  }

  /**
   * Returns false when the directory no longer exists
   */
  private async trySubscribe(root: WatchRoot, directory: string): Promise<boolean> {
    if (root.subscriptions.has(directory)) {
      return true;
    }

    try {
      const stats = await fs.promises.stat(directory);
      if (!stats.isDirectory()) {
        return false;
      }
    } catch (error) {
      const code = getErrorCode(error);
      if (code !== undefined && VANISHED_CODES.has(code)) {
        return false;
      }
      throw WatchError.fromSystemError(error, directory);
    }

    let handle: SubscriptionHandle;
    try {
      handle = await this.source.subscribe(directory);
    } catch (error) {
      throw WatchError.fromSystemError(error, directory);
    }

    if (this.roots.get(root.key) !== root || root.state !== 'active') {
      await this.source.unsubscribe(handle);
      return false;
    }

    root.subscriptions.set(directory, handle);
    this.handles.set(handle.id, root);
    return true;
  }

  private async listEntries(directory: string): Promise<DirectoryEntry[]> {
    const entries = await fg('*', {
      cwd: directory,
      deep: 1,
      dot: true,
      onlyFiles: false,
      markDirectories: true,
      followSymbolicLinks: false,
      suppressErrors: true
    });

    return entries
      .map((entry) =>
        entry.endsWith('/') ? { name: entry.slice(0, -1), isDirectory: true } : { name: entry, isDirectory: false }
      )
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  private async releaseHandle(root: WatchRoot, handle: SubscriptionHandle): Promise<boolean> {
    root.subscriptions.delete(handle.directory);
    this.handles.delete(handle.id);
    try {
      await this.source.unsubscribe(handle);
      return true;
    } catch (error) {
      log.error('Failed to release subscription', error, { root: root.key, directory: handle.directory });
      return false;
    }
  }

  private async releaseAll(root: WatchRoot): Promise<ReleaseSummary> {
    const summary: ReleaseSummary = { released: 0, failed: 0 };
    for (const handle of Array.from(root.subscriptions.values())) {
      if (await this.releaseHandle(root, handle)) {
        summary.released++;
      } else {
        summary.failed++;
      }
    }
    return summary;
  }
}
