/** Immutable description of the command the watcher keeps running. */
export interface CommandSpec {
    readonly command: string;
    readonly args: readonly string[];
    readonly cwd?: string;
    readonly env?: NodeJS.ProcessEnv;
}

export type ProcessState = 'not_started' | 'running' | 'terminating' | 'stopped';

export interface ProcessExit {
    code: number | null;
    signal: NodeJS.Signals | null;
}

/**
 * The part of a `ChildProcess` the supervisor relies on. Real children from
 * `node:child_process` satisfy it, as do test doubles.
 */
export interface ChildHandle {
    readonly pid?: number | undefined;
    readonly exitCode: number | null;
    readonly signalCode: NodeJS.Signals | null;
    kill(signal?: NodeJS.Signals | number): boolean;
    on(event: 'error', listener: (err: Error) => void): unknown;
    once(event: 'spawn', listener: () => void): unknown;
    once(event: 'error', listener: (err: Error) => void): unknown;
    once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
    removeListener(event: 'spawn', listener: () => void): unknown;
    removeListener(event: 'error', listener: (err: Error) => void): unknown;
}

export type SpawnFn = (spec: CommandSpec) => ChildHandle;

/** How a platform asks a child to stop, and how it insists. */
export interface TerminationStrategy {
    readonly name: string;
    requestExit(child: ChildHandle): void;
    forceKill(child: ChildHandle): void;
}
