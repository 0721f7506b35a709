import { existsSync } from 'node:fs';
import path from 'node:path';
import { DevServer, type DevServerOptions } from '../api/dev-server.js';
import { createCommand } from '../config/command.js';
import { DEFAULT_CONFIG, getConfigPath, readConfig, writeConfig, type DevloopConfig } from '../config/json-config.js';
import { createProjectContext, resolveProjectContext, type ProjectContext } from '../config/project-context.js';
import {
    createWatchConfig,
    withDebounce,
    withExcludedPath,
    withWatchPath,
    withWorkspaceExcludedPath,
} from '../config/watch-config.js';
import { Watcher, type WatcherOptions } from '../services/watcher.js';
import type { CommandSpec } from '../types/process.js';
import type { WatchConfig } from '../types/watch.js';
import { setLogDir } from '../utils/logger.js';
import type { CliOptions } from './cli.js';

/** Everything a command needs, merged from flags, environment and `devloop.json`. */
export interface Runtime {
    project: ProjectContext;
    config: DevloopConfig;
    watch: WatchConfig;
    command: CommandSpec | null;
    servedDir: string;
    host: string;
    port: number;
    notFound: string | null;
}

/**
 * Flags beat the environment, which beats the file. Paths from flags are
 * relative to `cwd`; paths from the file are relative to the project root.
 */
export async function resolveRuntime(options: CliOptions, cwd: string = process.cwd()): Promise<Runtime> {
    const { rootDir } = resolveProjectContext(cwd);
    const config = await readConfig(rootDir);
    const project = createProjectContext(rootDir, config.build.outputDir);
    const fromRoot = (entry: string): string => path.resolve(rootDir, entry);
    const fromCwd = (entry: string): string => path.resolve(cwd, entry);

    setLogDir(fromRoot(config.logging.dir));

    const roots = options.watchPaths.length > 0 ? options.watchPaths.map(fromCwd) : config.watch.paths.map(fromRoot);
    const excludes = [...config.watch.ignore.map(fromRoot), ...options.ignorePaths.map(fromCwd)];

    let watch = createWatchConfig({ workspaceExcludePaths: [], debounceMs: config.watch.debounceMs }, cwd);
    watch = config.watch.workspaceIgnore.reduce(withWorkspaceExcludedPath, watch);
    watch = roots.reduce(withWatchPath, watch);
    watch = excludes.reduce(withExcludedPath, watch);
    if (options.debounceMs !== null) {
        watch = withDebounce(watch, options.debounceMs);
    }

    let command: CommandSpec | null = null;
    const [program, ...args] = options.buildCommand;
    if (program !== undefined) {
        command = createCommand(program, args, rootDir);
    } else if (config.command) {
        command = createCommand(config.command.program, config.command.args, rootDir);
    }

    return {
        project,
        config,
        watch,
        command,
        servedDir: options.servedDir !== null
            ? path.resolve(cwd, options.servedDir)
            : fromRoot(config.server.servedDir),
        host: options.host ?? config.server.host,
        port: options.port ?? config.server.port,
        notFound: options.notFound ?? config.server.notFound,
    };
}

export function createDevServer(runtime: Runtime, watcherOptions?: WatcherOptions): DevServer {
    const options: DevServerOptions = {
        project: runtime.project,
        host: runtime.host,
        port: runtime.port,
        command: runtime.command,
        watch: runtime.watch,
        notFound: runtime.notFound,
        watcherOptions,
    };
    return new DevServer(options);
}

/** Watcher for `watch`, together with the command it keeps running. */
export function createWatcher(
    runtime: Runtime,
    watcherOptions?: WatcherOptions,
): { watcher: Watcher; command: CommandSpec } {
    if (!runtime.command) {
        throw new Error(`Nothing to run: pass a command after '--' or set "command" in devloop.json.`);
    }
    return {
        watcher: new Watcher(runtime.watch, runtime.project, watcherOptions),
        command: runtime.command,
    };
}

/** Write the default `devloop.json` unless one already exists. Returns its path, or `null` when kept. */
export async function initConfig(cwd: string = process.cwd()): Promise<string | null> {
    const { rootDir } = resolveProjectContext(cwd);
    if (existsSync(getConfigPath(rootDir))) {
        return null;
    }
    return writeConfig(DEFAULT_CONFIG, rootDir);
}
