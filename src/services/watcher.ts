import { stat } from 'node:fs/promises';
import type { ProjectContext } from '../config/project-context.js';
import { withExcludedPath } from '../config/watch-config.js';
import { SetupError } from '../types/errors.js';
import type { CommandSpec } from '../types/process.js';
import type {
    ChangeEventSource,
    ChangeEventSourceFactory,
    WatchConfig,
    WatchState,
} from '../types/watch.js';
import { logThought } from '../utils/logger.js';
import { openFileChangeSource } from './file-watcher.js';
import { PathFilter } from './path-filter.js';
import { formatCommand, ProcessSupervisor } from './process-supervisor.js';

export interface WatcherOptions {
    /** Supervisor for the command. The watcher must be its only user. */
    supervisor?: ProcessSupervisor;
    openSource?: ChangeEventSourceFactory;
    now?: () => number;
}

async function exists(target: string): Promise<boolean> {
    try {
        await stat(target);
        return true;
    } catch {
        return false;
    }
}

/**
 * Re-runs a command whenever relevant files change.
 *
 * Events are handled strictly one after another: an accepted change that
 * arrives at least `debounceMs` after the last (re)start respawns the command,
 * and nothing else is looked at until the respawn has finished. Changes inside
 * the window are only logged.
 *
 * ```ts
 * const watcher = new Watcher(createWatchConfig({ workspaceExcludePaths: ['public'] }), project);
 * await watcher.run({ command: 'npm', args: ['run', 'build'] });
 * ```
 */
export class Watcher {
    readonly #config: WatchConfig;
    readonly #project: ProjectContext;
    readonly #filter: PathFilter;
    readonly #supervisor: ProcessSupervisor;
    readonly #openSource: ChangeEventSourceFactory;
    readonly #now: () => number;
    #state: WatchState = 'idle';
    #respawnCount = 0;
    #source: ChangeEventSource | null = null;
    #disposed = false;

    constructor(config: WatchConfig, project: ProjectContext, options: WatcherOptions = {}) {
        this.#config = withExcludedPath(config, project.outputDir);
        this.#project = project;
        this.#filter = new PathFilter(this.#config, project.rootDir);
        this.#supervisor = options.supervisor ?? new ProcessSupervisor();
        this.#openSource = options.openSource ?? openFileChangeSource;
        this.#now = options.now ?? (() => Date.now());
    }

    get state(): WatchState {
        return this.#state;
    }

    /** Effective configuration, including the implicit output-directory exclusion. */
    get config(): WatchConfig {
        return this.#config;
    }

    /** Respawns performed since `run` started (the initial spawn is not counted). */
    get respawnCount(): number {
        return this.#respawnCount;
    }

    /**
     * Spawn `command` and keep re-running it on change. Never resolves; rejects
     * with `SetupError` when nothing can be watched and with `SpawnError` when
     * the command cannot be (re)started.
     */
    async run(command: CommandSpec): Promise<never> {
        if (this.#state !== 'idle') {
            throw new Error(`[Watcher] run() called while ${this.#state}.`);
        }

        const roots = await this.#resolveRoots();
        const source = await this.#openSource(roots, (candidate) => !this.#filter.accepts(candidate));
        this.#source = source;
        const preview = formatCommand(command);

        try {
            await this.#supervisor.spawn(command);
            let lastSpawnAt = this.#now();
            this.#state = 'watching';
            console.log(`[Watcher] Watching ${roots.join(', ')}; running '${preview}'.`);

            for (;;) {
                const item = await source.next();

                if (item.type === 'error') {
                    console.error(`[Watcher] Watch error: ${item.error.message}`);
                    void logThought(`[Watcher] Watch error: ${item.error.message}`);
                    continue;
                }

                const changedPath = item.event.path;
                if (!this.#filter.accepts(changedPath)) {
                    continue;
                }

                const elapsed = this.#now() - lastSpawnAt;
                if (elapsed >= this.#config.debounceMs) {
                    this.#state = 'triggering';
                    console.log(`[Watcher] Change detected at ${changedPath}; re-running '${preview}'.`);
                    await this.#supervisor.respawn(command);
                    this.#respawnCount += 1;
                    lastSpawnAt = this.#now();
                    if (this.#disposed) {
                        await this.#supervisor.terminate();
                    }
                } else {
                    this.#state = 'debounced';
                    void logThought(`[Watcher] Ignoring changes at ${changedPath} (${elapsed}ms after last run).`);
                }
                this.#state = 'watching';
            }
        } catch (err) {
            this.#state = 'stopped';
            this.#source = null;
            await source.close();
            throw err;
        }
    }

    /**
     * Stop reacting to changes and terminate the supervised process. Meant for
     * the hosting process on its way out; the loop itself never resumes.
     */
    async dispose(): Promise<void> {
        this.#disposed = true;
        const source = this.#source;
        this.#source = null;
        await source?.close();
        await this.#supervisor.terminate();
    }

    async #resolveRoots(): Promise<string[]> {
        if (this.#config.watchRoots.length === 0) {
            if (!(await exists(this.#project.rootDir))) {
                throw new SetupError(
                    'watch_registration_failed',
                    `Cannot watch project root ${this.#project.rootDir}: it does not exist.`,
                );
            }
            return [this.#project.rootDir];
        }

        const roots: string[] = [];
        for (const root of this.#config.watchRoots) {
            if (await exists(root)) {
                roots.push(root);
            } else {
                console.error(`[Watcher] Cannot watch ${root}: it does not exist.`);
            }
        }

        if (roots.length === 0) {
            throw new SetupError(
                'watch_registration_failed',
                `None of the watch paths exist: ${this.#config.watchRoots.join(', ')}`,
            );
        }
        return roots;
    }
}
