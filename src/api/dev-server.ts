import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import express, { type Express, type Request, type Response } from 'express';
import type { ProjectContext } from '../config/project-context.js';
import { createWatchConfig, withExcludedPath } from '../config/watch-config.js';
import { Watcher, type WatcherOptions } from '../services/watcher.js';
import { SetupError } from '../types/errors.js';
import type { CommandSpec } from '../types/process.js';
import type { DevRequest, RequestHandler } from '../types/server.js';
import type { WatchConfig } from '../types/watch.js';
import { logThought } from '../utils/logger.js';
import { StaticFileHandler } from './handlers/static-files.js';
import { formatRawHeader, mapError, RAW_BAD_REQUEST, requestLogger, sendStatus } from './shared.js';

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8000;
/** Largest request head accepted before answering 400. */
export const MAX_HEADER_BYTES = 64 * 1024;

export interface DevServerOptions {
    project: ProjectContext;
    host?: string;
    port?: number;
    /** Replaces the static-file handler for every request. */
    handler?: RequestHandler;
    /** Build command to supervise; enables the background watcher. */
    command?: CommandSpec | null;
    watch?: WatchConfig;
    /** File, relative to the served root, answered for unknown paths. */
    notFound?: string | null;
    watcherOptions?: WatcherOptions;
}

/**
 * Development HTTP server for a directory of build artifacts.
 *
 * Each request is handled on its own, concurrently with every other request
 * and with the background watcher. Nothing ties a rebuild to the requests
 * around it: a client that races a rebuild may see the old files.
 */
export class DevServer {
    readonly #project: ProjectContext;
    readonly #host: string;
    readonly #port: number;
    readonly #handler: RequestHandler;
    readonly #command: CommandSpec | null;
    readonly #watchConfig: WatchConfig;
    readonly #notFound: string | null;
    readonly #watcherOptions: WatcherOptions;
    #server: Server | null = null;
    #watcher: Watcher | null = null;
    #watchFailure: Promise<Error> | null = null;

    constructor(options: DevServerOptions) {
        this.#project = options.project;
        this.#host = options.host ?? DEFAULT_HOST;
        this.#port = options.port ?? DEFAULT_PORT;
        this.#handler = options.handler ?? new StaticFileHandler();
        this.#command = options.command ?? null;
        this.#watchConfig = options.watch ?? createWatchConfig({}, options.project.rootDir);
        this.#notFound = options.notFound ?? null;
        this.#watcherOptions = options.watcherOptions ?? {};
    }

    /** Bound address once listening. */
    get address(): AddressInfo | null {
        const address = this.#server?.address();
        return address && typeof address === 'object' ? address : null;
    }

    get watcher(): Watcher | null {
        return this.#watcher;
    }

    /**
     * Settles with the error that stopped the background watcher. Stays pending
     * while the watcher runs, and is `null` when no command was given.
     */
    get watchFailure(): Promise<Error> | null {
        return this.#watchFailure;
    }

    /** Express app serving `servedRoot` through the configured handler. */
    createApp(servedRoot: string): Express {
        const root = path.resolve(servedRoot);
        const app = express();
        app.disable('x-powered-by');
        app.disable('etag');
        app.use(requestLogger);
        app.use((req, res) => {
            void this.#dispatch(root, req, res);
        });
        return app;
    }

    /**
     * Create `servedRoot` if needed, bind the listener, and start the watcher
     * when a command is configured.
     */
    async listen(servedRoot: string): Promise<AddressInfo> {
        if (this.#server) {
            throw new Error('[DevServer] Already listening.');
        }

        const root = path.resolve(servedRoot);
        try {
            await mkdir(root, { recursive: true });
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            throw new SetupError('served_root_unavailable', `Cannot create served directory ${root}: ${message}`, {
                cause: err,
            });
        }

        const server = createServer({ maxHeaderSize: MAX_HEADER_BYTES }, this.createApp(root));
        server.on('clientError', (err, socket) => {
            console.error(`[DevServer] Malformed request: ${err.message}`);
            if (socket.writable) {
                socket.end(RAW_BAD_REQUEST);
            } else {
                socket.destroy();
            }
        });

        try {
            await new Promise<void>((resolve, reject) => {
                server.once('error', reject);
                server.listen(this.#port, this.#host, () => {
                    server.removeListener('error', reject);
                    resolve();
                });
            });
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            throw new SetupError('bind_failed', `Cannot bind ${this.#host}:${this.#port}: ${message}`, { cause: err });
        }

        this.#server = server;
        const address = this.address;
        if (!address) {
            throw new SetupError('bind_failed', `Listener on ${this.#host}:${this.#port} has no address.`);
        }

        if (this.#command) {
            this.#startWatcher(root, this.#command);
        }

        console.log(`[DevServer] Development server running at http://${address.address}:${address.port}`);
        await logThought(`[DevServer] Serving ${root} on ${address.address}:${address.port}.`);
        return address;
    }

    /**
     * Serve `servedRoot` until something fatal happens. Never resolves; rejects
     * when the listener fails or the background watcher stops.
     */
    async start(servedRoot: string): Promise<never> {
        await this.listen(servedRoot);
        const server = this.#server;
        const watchFailure = this.#watchFailure;

        return new Promise<never>((_resolve, reject) => {
            server?.on('error', (err) => {
                reject(new SetupError('bind_failed', `Listener failed: ${err.message}`, { cause: err }));
            });
            void watchFailure?.then(reject);
        });
    }

    /** Stop the watcher (terminating its process) and the listener. */
    async close(): Promise<void> {
        await this.#watcher?.dispose();
        const server = this.#server;
        this.#server = null;
        if (!server) return;

        await new Promise<void>((resolve, reject) => {
            server.close((err) => (err ? reject(err) : resolve()));
            server.closeAllConnections();
        });
    }

    #startWatcher(root: string, command: CommandSpec): void {
        const watcher = new Watcher(withExcludedPath(this.#watchConfig, root), this.#project, this.#watcherOptions);
        this.#watcher = watcher;
        this.#watchFailure = watcher.run(command).then(
            () => new Error('Watcher stopped unexpectedly.'),
            (err: unknown) => {
                const error = err instanceof Error ? err : new Error(String(err));
                console.error(`[DevServer] Watcher stopped: ${error.message}`);
                void logThought(`[DevServer] Watcher stopped: ${error.message}`);
                return error;
            },
        );
    }

    async #dispatch(root: string, req: Request, res: Response): Promise<void> {
        res.sendDate = false;
        res.setHeader('Connection', 'close');

        let requestPath: string;
        try {
            requestPath = decodeURIComponent(req.path);
        } catch {
            sendStatus(res, 400);
            return;
        }

        const request: DevRequest = {
            method: req.method,
            path: requestPath,
            rawHeader: formatRawHeader(req),
            servedRoot: root,
            notFoundFallback: this.#notFound,
        };

        try {
            await this.#handler.handle(request, res);
        } catch (err) {
            const { status, message } = mapError(err);
            console.error(`[DevServer] ${req.method} ${req.originalUrl} failed: ${message}`);
            void logThought(`[DevServer] ${req.method} ${req.originalUrl} failed: ${message}`);
            if (!res.headersSent) {
                sendStatus(res, status);
            } else {
                res.destroy();
            }
        }
    }
}
