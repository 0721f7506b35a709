import path from 'node:path';
import type { WatchConfig } from '../types/watch.js';

export const DEFAULT_DEBOUNCE_MS = 2000;

/** Workspace-relative directories nobody wants to rebuild on. */
export const DEFAULT_WORKSPACE_EXCLUDES: readonly string[] = ['node_modules'];

export interface WatchConfigInput {
    watchRoots?: readonly string[];
    excludePaths?: readonly string[];
    workspaceExcludePaths?: readonly string[];
    debounceMs?: number;
}

function uniqueInOrder(values: readonly string[]): string[] {
    return [...new Set(values)];
}

function normalizeWorkspacePath(value: string): string {
    return path.normalize(value).replace(/[\\/]+$/, '');
}

function freeze(config: WatchConfig): WatchConfig {
    return Object.freeze({
        watchRoots: Object.freeze([...config.watchRoots]),
        excludePaths: Object.freeze([...config.excludePaths]),
        workspaceExcludePaths: Object.freeze([...config.workspaceExcludePaths]),
        debounceMs: config.debounceMs,
    });
}

/**
 * Build a frozen watch configuration. Roots and absolute excludes are resolved
 * against `cwd`; workspace excludes stay relative to the project root.
 */
export function createWatchConfig(input: WatchConfigInput = {}, cwd: string = process.cwd()): WatchConfig {
    const debounceMs = input.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    if (!Number.isFinite(debounceMs) || debounceMs < 0) {
        throw new Error(`Invalid debounce duration: ${String(input.debounceMs)}`);
    }

    return freeze({
        watchRoots: uniqueInOrder((input.watchRoots ?? []).map((entry) => path.resolve(cwd, entry))),
        excludePaths: uniqueInOrder((input.excludePaths ?? []).map((entry) => path.resolve(cwd, entry))),
        workspaceExcludePaths: uniqueInOrder(
            (input.workspaceExcludePaths ?? DEFAULT_WORKSPACE_EXCLUDES).map(normalizeWorkspacePath),
        ),
        debounceMs: Math.floor(debounceMs),
    });
}

export function withWatchPath(config: WatchConfig, watchPath: string): WatchConfig {
    return freeze({
        ...config,
        watchRoots: uniqueInOrder([...config.watchRoots, path.resolve(watchPath)]),
    });
}

export function withExcludedPath(config: WatchConfig, excludedPath: string): WatchConfig {
    return freeze({
        ...config,
        excludePaths: uniqueInOrder([...config.excludePaths, path.resolve(excludedPath)]),
    });
}

export function withWorkspaceExcludedPath(config: WatchConfig, relativePath: string): WatchConfig {
    return freeze({
        ...config,
        workspaceExcludePaths: uniqueInOrder([
            ...config.workspaceExcludePaths,
            normalizeWorkspacePath(relativePath),
        ]),
    });
}

export function withDebounce(config: WatchConfig, debounceMs: number): WatchConfig {
    return createWatchConfig({ ...config, debounceMs });
}
