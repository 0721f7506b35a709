/** Kind of filesystem change delivered to the watch loop. */
export type ChangeKind = 'created' | 'modified' | 'removed' | 'renamed';

export interface ChangeEvent {
    /** Absolute path of the affected file or directory. */
    path: string;
    kind: ChangeKind;
    /** Epoch milliseconds at which the event was observed. */
    observedAt: number;
}

/** One item read from a change event source: an event, or a transport failure. */
export type ChangeEventResult =
    | { type: 'event'; event: ChangeEvent }
    | { type: 'error'; error: Error };

/**
 * Ordered stream of change events. `next()` resolves with the oldest pending
 * item, waiting until one arrives.
 */
export interface ChangeEventSource {
    next(): Promise<ChangeEventResult>;
    close(): Promise<void>;
}

/** Opens an event source over the given absolute roots. */
export type ChangeEventSourceFactory = (
    roots: readonly string[],
    ignore: (candidate: string) => boolean,
) => Promise<ChangeEventSource>;

export interface WatchConfig {
    /** Explicit absolute roots to observe. Empty means the whole project root. */
    readonly watchRoots: readonly string[];
    /** Absolute paths, matched by segment prefix against the raw changed path. */
    readonly excludePaths: readonly string[];
    /** Paths relative to the project root, matched after stripping the root prefix. */
    readonly workspaceExcludePaths: readonly string[];
    /** Minimum time between two respawns. */
    readonly debounceMs: number;
}

export type WatchState = 'idle' | 'watching' | 'debounced' | 'triggering' | 'stopped';
