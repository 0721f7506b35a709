import { spawn } from 'node:child_process';
import { SpawnError, SupervisorBusyError } from '../types/errors.js';
import type {
    ChildHandle,
    CommandSpec,
    ProcessExit,
    ProcessState,
    SpawnFn,
    TerminationStrategy,
} from '../types/process.js';
import { logSystemCommand, logThought } from '../utils/logger.js';

const DEFAULT_TERMINATE_TIMEOUT_MS = 2000;
const DEFAULT_POLL_INTERVAL_MS = 200;

/**
 * Signal the child's whole process group. Children are spawned as group
 * leaders on POSIX, so this reaches everything the command started.
 */
function signalGroup(child: ChildHandle, signal: NodeJS.Signals): void {
    if (child.pid === undefined) {
        child.kill(signal);
        return;
    }
    try {
        process.kill(-child.pid, signal);
    } catch {
        // Group already gone or not ours; fall back to the direct child.
        child.kill(signal);
    }
}

function killTree(child: ChildHandle): void {
    if (child.pid === undefined) {
        child.kill();
        return;
    }
    const taskkill = spawn('taskkill', ['/PID', String(child.pid), '/T', '/F'], {
        stdio: 'ignore',
        windowsHide: true,
    });
    taskkill.on('error', (err) => {
        console.error(`[Supervisor] taskkill failed for pid ${child.pid ?? '?'}: ${err.message}`);
        child.kill();
    });
}

/** SIGTERM to the process group first, SIGKILL when it ignores it. */
export const posixTermination: TerminationStrategy = {
    name: 'posix',
    requestExit: (child) => {
        signalGroup(child, 'SIGTERM');
    },
    forceKill: (child) => {
        signalGroup(child, 'SIGKILL');
    },
};

/** Windows has no cooperative signal: the whole tree is ended outright. */
export const windowsTermination: TerminationStrategy = {
    name: 'windows',
    requestExit: (child) => {
        killTree(child);
    },
    forceKill: (child) => {
        child.kill('SIGKILL');
    },
};

export function terminationStrategyFor(platform: NodeJS.Platform): TerminationStrategy {
    return platform === 'win32' ? windowsTermination : posixTermination;
}

export function formatCommand(spec: CommandSpec): string {
    return [spec.command, ...spec.args].join(' ').trim();
}

const spawnChild: SpawnFn = (spec) =>
    spawn(spec.command, [...spec.args], {
        cwd: spec.cwd,
        env: spec.env ?? process.env,
        stdio: 'inherit',
        detached: process.platform !== 'win32',
        windowsHide: true,
    });

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/** One OS child and where it is in its lifecycle. */
export class SupervisedProcess {
    readonly command: string;
    readonly child: ChildHandle;
    readonly exited: Promise<ProcessExit>;
    #state: ProcessState = 'not_started';
    #exit: ProcessExit | null = null;

    constructor(child: ChildHandle, command: string) {
        this.child = child;
        this.command = command;
        this.exited = new Promise((resolve) => {
            child.once('exit', (code, signal) => {
                this.#exit = { code, signal };
                this.#state = 'stopped';
                resolve({ code, signal });
            });
        });
    }

    get state(): ProcessState {
        return this.#state;
    }

    get pid(): number | undefined {
        return this.child.pid;
    }

    /** Exit status once the process has stopped, otherwise `null`. */
    get exit(): ProcessExit | null {
        return this.#exit;
    }

    markRunning(): void {
        if (this.#state === 'not_started') {
            this.#state = 'running';
        }
    }

    markTerminating(): void {
        if (this.#state === 'running') {
            this.#state = 'terminating';
        }
    }
}

export interface ProcessSupervisorOptions {
    /** Grace period between the polite request and the forced kill. @default 2000 */
    terminateTimeoutMs?: number;
    /** How often to check whether the child has exited. @default 200 */
    pollIntervalMs?: number;
    strategy?: TerminationStrategy;
    spawnProcess?: SpawnFn;
}

/**
 * Owns a single child-process slot.
 *
 * `spawn` fills the slot, `terminate` empties it (politely, then by force) and
 * `respawn` does both in order. The slot has one owner: overlapping spawns are
 * rejected with `SupervisorBusyError` rather than raced.
 */
export class ProcessSupervisor {
    readonly #terminateTimeoutMs: number;
    readonly #pollIntervalMs: number;
    readonly #strategy: TerminationStrategy;
    readonly #spawnProcess: SpawnFn;
    #current: SupervisedProcess | null = null;
    #spawning = false;

    constructor(options: ProcessSupervisorOptions = {}) {
        this.#terminateTimeoutMs = Math.max(0, options.terminateTimeoutMs ?? DEFAULT_TERMINATE_TIMEOUT_MS);
        this.#pollIntervalMs = Math.max(1, options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS);
        this.#strategy = options.strategy ?? terminationStrategyFor(process.platform);
        this.#spawnProcess = options.spawnProcess ?? spawnChild;
    }

    /** The process currently occupying the slot, if any. */
    get current(): SupervisedProcess | null {
        return this.#current;
    }

    async spawn(spec: CommandSpec): Promise<SupervisedProcess> {
        if (this.#spawning) {
            throw new SupervisorBusyError();
        }
        if (this.#current && this.#current.state !== 'stopped') {
            throw new SupervisorBusyError(
                `Process ${this.#current.pid ?? '?'} is still ${this.#current.state}; terminate it before spawning.`,
            );
        }

        this.#spawning = true;
        try {
            return await this.#start(spec);
        } finally {
            this.#spawning = false;
        }
    }

    /**
     * Stop `handle` (the current process by default). Sends the platform's
     * polite request, polls until `timeoutMs` elapses, then force-kills and
     * waits for the exit. No-op for a process that never started or already
     * stopped; a second call while terminating waits on the first.
     */
    async terminate(
        handle: SupervisedProcess | null = this.#current,
        timeoutMs: number = this.#terminateTimeoutMs,
    ): Promise<void> {
        if (!handle) return;

        if (handle.state === 'terminating') {
            await handle.exited;
            return;
        }

        if (handle.state !== 'running') {
            this.#release(handle);
            return;
        }

        handle.markTerminating();
        void logThought(`[Supervisor] Terminating ${handle.command} (pid ${handle.pid ?? '?'}).`);
        this.#strategy.requestExit(handle.child);

        const deadline = Date.now() + timeoutMs;
        while (handle.state !== 'stopped' && Date.now() < deadline) {
            await sleep(this.#pollIntervalMs);
        }

        if (handle.state !== 'stopped') {
            console.warn(
                `[Supervisor] ${handle.command} ignored the ${this.#strategy.name} exit request for ${timeoutMs}ms; killing it.`,
            );
            this.#strategy.forceKill(handle.child);
        }

        await handle.exited;
        this.#release(handle);
    }

    /** Terminate the current process (if any) and start `spec` in its place. */
    async respawn(spec: CommandSpec): Promise<SupervisedProcess> {
        if (this.#spawning) {
            throw new SupervisorBusyError();
        }

        this.#spawning = true;
        try {
            await this.terminate();
            return await this.#start(spec);
        } finally {
            this.#spawning = false;
        }
    }

    async #start(spec: CommandSpec): Promise<SupervisedProcess> {
        const preview = formatCommand(spec);

        let child: ChildHandle;
        try {
            child = this.#spawnProcess(spec);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            throw new SpawnError(preview, `Cannot spawn '${preview}': ${message}`, { cause: err });
        }

        const handle = new SupervisedProcess(child, preview);

        await new Promise<void>((resolve, reject) => {
            const onSpawn = (): void => {
                child.removeListener('error', onError);
                resolve();
            };
            const onError = (err: Error): void => {
                child.removeListener('spawn', onSpawn);
                reject(new SpawnError(preview, `Cannot spawn '${preview}': ${err.message}`, { cause: err }));
            };
            child.once('spawn', onSpawn);
            child.once('error', onError);
        });

        child.on('error', (err) => {
            console.error(`[Supervisor] ${preview} (pid ${child.pid ?? '?'}) reported an error: ${err.message}`);
        });

        handle.markRunning();
        this.#current = handle;

        void logThought(`[Supervisor] Started ${preview} (pid ${child.pid ?? '?'}).`);
        void handle.exited.then((exit) => {
            const detail = exit.signal ? `stopped by ${exit.signal}` : `exited with code ${exit.code ?? 'unknown'}`;
            return logSystemCommand(preview, detail, exit.code);
        });

        return handle;
    }

    #release(handle: SupervisedProcess): void {
        if (this.#current === handle) {
            this.#current = null;
        }
    }
}
