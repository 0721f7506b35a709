import path from 'node:path';
import { watch, type FSWatcher } from 'chokidar';
import { SetupError } from '../types/errors.js';
import type {
    ChangeEventResult,
    ChangeEventSource,
    ChangeEventSourceFactory,
    ChangeKind,
} from '../types/watch.js';
import { logThought } from '../utils/logger.js';
import { AsyncQueue } from './event-queue.js';

/** chokidar reports renames as an unlink followed by an add. */
const EVENT_KINDS: ReadonlyArray<readonly [string, ChangeKind]> = [
    ['add', 'created'],
    ['addDir', 'created'],
    ['change', 'modified'],
    ['unlink', 'removed'],
    ['unlinkDir', 'removed'],
];

export interface FileChangeSourceOptions {
    /** Wait for a file to stop growing for this long before reporting it. @default 300 */
    stabilityThresholdMs?: number;
    now?: () => number;
}

/**
 * Recursive filesystem change source backed by `chokidar`.
 *
 * Every notification is pushed, in arrival order, onto a queue the watch loop
 * drains one item at a time. Watcher errors after startup are queued as
 * `error` items instead of being thrown.
 */
export class FileChangeSource implements ChangeEventSource {
    readonly #queue = new AsyncQueue<ChangeEventResult>();
    readonly #watcher: FSWatcher;
    readonly #now: () => number;

    private constructor(watcher: FSWatcher, now: () => number) {
        this.#watcher = watcher;
        this.#now = now;
    }

    /** Start watching `roots` and resolve once the initial scan is complete. */
    static async open(
        roots: readonly string[],
        ignore: (candidate: string) => boolean,
        options: FileChangeSourceOptions = {},
    ): Promise<FileChangeSource> {
        const stabilityThreshold = options.stabilityThresholdMs ?? 300;
        const watcher = watch([...roots], {
            ignored: (candidate: string) => ignore(path.resolve(candidate)),
            persistent: true,
            ignoreInitial: true,
            awaitWriteFinish: stabilityThreshold > 0
                ? { stabilityThreshold, pollInterval: 100 }
                : false,
        });
        const source = new FileChangeSource(watcher, options.now ?? (() => Date.now()));

        for (const [eventType, kind] of EVENT_KINDS) {
            watcher.on(eventType, (filePath: string) => {
                source.#queue.push({
                    type: 'event',
                    event: { path: path.resolve(filePath), kind, observedAt: source.#now() },
                });
            });
        }

        try {
            await new Promise<void>((resolve, reject) => {
                watcher.once('ready', () => resolve());
                watcher.once('error', (err: Error) => reject(err));
            });
        } catch (err) {
            await watcher.close();
            const message = err instanceof Error ? err.message : String(err);
            throw new SetupError(
                'watch_registration_failed',
                `Cannot watch ${roots.join(', ')}: ${message}`,
                { cause: err },
            );
        }

        watcher.on('error', (err: Error) => {
            source.#queue.push({ type: 'error', error: err });
        });

        await logThought(`[FileWatcher] Watching ${roots.join(', ')}`);
        return source;
    }

    next(): Promise<ChangeEventResult> {
        return this.#queue.next();
    }

    async close(): Promise<void> {
        await this.#watcher.close();
    }
}

export const openFileChangeSource: ChangeEventSourceFactory = (roots, ignore) =>
    FileChangeSource.open(roots, ignore);
