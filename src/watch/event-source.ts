/**
 * Boundary between the bridge and the platform's change notification facility.
 *
 * A subscription covers exactly one directory and reports changes to its
 * direct entries; recursion is the registry's job. Any backend that honours
 * this contract can replace the chokidar one.
 */

export type RawEventKind = 'created' | 'modified' | 'removed' | 'renamed-from' | 'renamed-to' | 'unknown';

export interface SubscriptionHandle {
  readonly id: number;
  /** Absolute path of the subscribed directory */
  readonly directory: string;
}

export interface RawEvent {
  /** Absolute path of the entry that changed */
  path: string;
  kind: RawEventKind;
  isDirectory: boolean;
  timestamp: number;
  subscription: SubscriptionHandle;
}

export type RawEventListener = (event: RawEvent) => void;
export type SourceErrorListener = (handle: SubscriptionHandle, error: Error) => void;

export interface EventSource {
  /**
   * Resolves once the subscription is live: any change made afterwards is
   * delivered.
   */
  subscribe(directory: string): Promise<SubscriptionHandle>;
  unsubscribe(handle: SubscriptionHandle): Promise<void>;
  onEvent(listener: RawEventListener): () => void;
  onError(listener: SourceErrorListener): () => void;
  /** Release every remaining subscription */
  close(): Promise<void>;
}
