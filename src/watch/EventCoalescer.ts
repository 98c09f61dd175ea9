import { performance } from 'perf_hooks';
import { WATCHER_CONSTANTS } from '../config/constants.js';
import { log } from '../utils/logger.js';
import type { RawEventKind } from './event-source.js';
import { ancestorsOf, createIgnoreMatcher, isDescendantOf, type IgnoreMatcher } from './paths.js';

export type WaitOutcome = 'changes' | 'timeout' | 'cancelled';

/**
 * Where resolved changes go. The registry reports the entries it finds while
 * walking a freshly created directory through the same interface.
 */
export interface ChangeSink {
  record(rootKey: string, relativePath: string, kind: RawEventKind, isDirectory: boolean): void;
}

export interface EventCoalescerOptions {
  debounceMs?: number;
  /** Signal a batch at the latest this long after its first record, even if events keep coming */
  maxBatchDelayMs?: number;
  ignore?: readonly string[];
}

export interface WaitOptions {
  /** Resolve with 'timeout' once this much time has passed without a settled batch */
  timeoutMs?: number;
  signal?: AbortSignal;
}

interface Waiter {
  settle(outcome: WaitOutcome): void;
}

interface RootChanges {
  pending: Set<string>;
  /** Directories recorded only because they were created; dropped once a descendant is recorded */
  createdDirs: Set<string>;
  /** Directories recorded as removed in the current batch */
  removedDirs: Set<string>;
  quietTimer: NodeJS.Timeout | null;
  /** performance.now() by which the current batch must be signalled */
  batchDeadline: number | null;
  waiters: Set<Waiter>;
}

/**
 * Folds resolved change events into one pending path set per root.
 *
 * Every record restarts the root's quiescence timer; waiters hear about a
 * batch once the timer runs out, or once the batch is `maxBatchDelayMs` old
 * when events never pause. All operations are synchronous, so a
 * drain sees exactly the records made before it and none made after.
 */
export class EventCoalescer implements ChangeSink {
  private readonly roots = new Map<string, RootChanges>();
  private readonly debounceMs: number;
  private readonly maxBatchDelayMs: number;
  private readonly isIgnored: IgnoreMatcher;

  constructor(options: EventCoalescerOptions = {}) {
    this.debounceMs = Math.max(options.debounceMs ?? WATCHER_CONSTANTS.DEFAULT_DEBOUNCE_MS, WATCHER_CONSTANTS.MIN_DEBOUNCE_MS);
    this.maxBatchDelayMs = Math.max(options.maxBatchDelayMs ?? WATCHER_CONSTANTS.MAX_BATCH_DELAY_MS, 0);
    this.isIgnored = createIgnoreMatcher(options.ignore ?? []);
  }

  record(rootKey: string, relativePath: string, kind: RawEventKind, isDirectory: boolean): void {
    if (this.isIgnored(relativePath)) {
      return;
    }

    const state = this.ensure(rootKey);

    if (kind === 'removed' && isDirectory) {
      this.foldDirectoryRemoval(state, relativePath);
    } else if (kind === 'removed' && this.isUnderRemovedDirectory(state, relativePath)) {
      // already covered by the directory entry
      return;
    } else if (kind === 'created' && isDirectory) {
      this.foldDirectoryCreation(state, relativePath);
    } else {
      this.foldPath(state, relativePath);
    }

    log.debug('change recorded', { root: rootKey, path: relativePath, kind });
    this.scheduleSettle(state);
  }

  /**
   * Atomically take the root's pending paths, sorted, leaving an empty set
   */
  drain(rootKey: string): string[] {
    const state = this.roots.get(rootKey);
    if (!state) {
      return [];
    }

    const paths = Array.from(state.pending).sort();
    state.pending.clear();
    state.createdDirs.clear();
    state.removedDirs.clear();
    state.batchDeadline = null;
    return paths;
  }

  hasPending(rootKey: string): boolean {
    return (this.roots.get(rootKey)?.pending.size ?? 0) > 0;
  }

  /**
   * Pending changes whose debounce window has already closed
   */
  hasSettledChanges(rootKey: string): boolean {
    const state = this.roots.get(rootKey);
    return state !== undefined && state.pending.size > 0 && state.quietTimer === null;
  }

  pendingCount(rootKey: string): number {
    return this.roots.get(rootKey)?.pending.size ?? 0;
  }

  waitForChanges(rootKey: string, options: WaitOptions = {}): Promise<WaitOutcome> {
    const { timeoutMs, signal } = options;

    return new Promise<WaitOutcome>((resolve) => {
      if (signal?.aborted) {
        resolve('cancelled');
        return;
      }
      if (this.hasSettledChanges(rootKey)) {
        resolve('changes');
        return;
      }

      const state = this.ensure(rootKey);
      let done = false;
      let timer: NodeJS.Timeout | null = null;

      const onAbort = (): void => waiter.settle('cancelled');

      const waiter: Waiter = {
        settle: (outcome) => {
          if (done) return;
          done = true;
          state.waiters.delete(waiter);
          if (timer) clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
          resolve(outcome);
        }
      };

      state.waiters.add(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });

      if (timeoutMs !== undefined) {
        // setTimeout may fire a hair early; re-arm until the full interval has passed
        const deadline = performance.now() + timeoutMs;
        const arm = (ms: number): void => {
          timer = setTimeout(() => {
            const remaining = deadline - performance.now();
            if (remaining > 0) {
              arm(Math.ceil(remaining));
            } else {
              waiter.settle(state.pending.size > 0 ? 'changes' : 'timeout');
            }
          }, ms);
        };
        arm(timeoutMs);
      }
    });
  }

  /**
   * Forget a root entirely. Its waiters resolve with 'cancelled'.
   */
  discard(rootKey: string): void {
    const state = this.roots.get(rootKey);
    if (!state) {
      return;
    }
    this.roots.delete(rootKey);
    if (state.quietTimer) {
      clearTimeout(state.quietTimer);
      state.quietTimer = null;
    }
    for (const waiter of Array.from(state.waiters)) {
      waiter.settle('cancelled');
    }
  }

  close(): void {
    for (const rootKey of Array.from(this.roots.keys())) {
      this.discard(rootKey);
    }
  }

  private ensure(rootKey: string): RootChanges {
    let state = this.roots.get(rootKey);
    if (!state) {
      state = {
        pending: new Set(),
        createdDirs: new Set(),
        removedDirs: new Set(),
        quietTimer: null,
        batchDeadline: null,
        waiters: new Set()
      };
      this.roots.set(rootKey, state);
    }
    return state;
  }

  private foldPath(state: RootChanges, relativePath: string): void {
    this.dropProvisionalAncestors(state, relativePath);
    state.pending.add(relativePath);
  }

  private foldDirectoryCreation(state: RootChanges, relativePath: string): void {
    state.removedDirs.delete(relativePath);
    this.dropProvisionalAncestors(state, relativePath);

    if (state.pending.has(relativePath) || this.hasPendingDescendant(state, relativePath)) {
      return;
    }
    state.pending.add(relativePath);
    state.createdDirs.add(relativePath);
  }

  private foldDirectoryRemoval(state: RootChanges, relativePath: string): void {
    for (const entry of Array.from(state.pending)) {
      if (isDescendantOf(entry, relativePath)) {
        state.pending.delete(entry);
      }
    }
    for (const entry of Array.from(state.createdDirs)) {
      if (entry === relativePath || isDescendantOf(entry, relativePath)) {
        state.createdDirs.delete(entry);
      }
    }

    this.dropProvisionalAncestors(state, relativePath);
    state.pending.add(relativePath);
    state.removedDirs.add(relativePath);
  }

  private dropProvisionalAncestors(state: RootChanges, relativePath: string): void {
    const ancestors = relativePath === '' ? [] : ['', ...ancestorsOf(relativePath)];
    for (const ancestor of ancestors) {
      if (state.createdDirs.has(ancestor)) {
        state.pending.delete(ancestor);
      }
    }
  }

  private hasPendingDescendant(state: RootChanges, relativePath: string): boolean {
    for (const entry of state.pending) {
      if (isDescendantOf(entry, relativePath)) {
        return true;
      }
    }
    return false;
  }

  private isUnderRemovedDirectory(state: RootChanges, relativePath: string): boolean {
    if (state.removedDirs.size === 0 || relativePath === '') {
      return false;
    }
    return ['', ...ancestorsOf(relativePath)].some((ancestor) => state.removedDirs.has(ancestor));
  }

  private scheduleSettle(state: RootChanges): void {
    if (state.quietTimer) {
      clearTimeout(state.quietTimer);
    }

    const now = performance.now();
    if (state.batchDeadline === null) {
      state.batchDeadline = now + this.maxBatchDelayMs;
    }
    const delayMs = Math.min(this.debounceMs, Math.max(0, Math.ceil(state.batchDeadline - now)));

    state.quietTimer = setTimeout(() => {
      state.quietTimer = null;
      state.batchDeadline = null;
      if (state.pending.size === 0) {
        return;
      }
      for (const waiter of Array.from(state.waiters)) {
        waiter.settle('changes');
      }
    }, delayMs);
  }
}
