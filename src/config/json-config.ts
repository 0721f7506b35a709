import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';

export const CONFIG_FILE_NAME = 'devloop.json';

export interface DevloopConfig {
    server: {
        host: string;
        port: number;
        /** Directory served over HTTP, relative to the project root. */
        servedDir: string;
        /** File served for unknown paths, relative to the served directory. */
        notFound: string | null;
    };
    watch: {
        paths: string[];
        ignore: string[];
        workspaceIgnore: string[];
        debounceMs: number;
    };
    command: {
        program: string;
        args: string[];
    } | null;
    build: {
        outputDir: string;
    };
    logging: {
        dir: string;
    };
}

export const DEFAULT_CONFIG: DevloopConfig = {
    server: {
        host: '127.0.0.1',
        port: 8000,
        servedDir: 'dist',
        notFound: null,
    },
    watch: {
        paths: [],
        ignore: [],
        workspaceIgnore: ['node_modules'],
        debounceMs: 2000,
    },
    command: null,
    build: {
        outputDir: 'dist',
    },
    logging: {
        dir: '.devloop/logs',
    },
};

export function getConfigPath(projectRoot: string, overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.DEVLOOP_CONFIG_PATH) {
        return path.resolve(process.env.DEVLOOP_CONFIG_PATH);
    }
    return path.join(projectRoot, CONFIG_FILE_NAME);
}

export async function readConfig(projectRoot: string, overridePath?: string): Promise<DevloopConfig> {
    const targetPath = getConfigPath(projectRoot, overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        const fsError = error as NodeJS.ErrnoException;
        if (fsError.code === 'ENOENT') return applyEnvOverrides(mergeWithDefaults({}));
        throw new Error(`Failed to read config file at ${targetPath}: ${fsError.message}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(rawData);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to parse config file at ${targetPath}: ${message}`);
    }
    return applyEnvOverrides(mergeWithDefaults(parsed));
}

export async function writeConfig(config: DevloopConfig, projectRoot: string, overridePath?: string): Promise<string> {
    const targetPath = getConfigPath(projectRoot, overridePath);
    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    const tempPath = `${targetPath}.${Date.now()}.tmp`;
    try {
        await fs.writeFile(tempPath, `${JSON.stringify(config, null, 2)}\n`, 'utf-8');
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        const fsError = error as NodeJS.ErrnoException;
        if (existsSync(tempPath)) {
            await fs.unlink(tempPath).catch(() => undefined);
        }
        throw new Error(`Failed to save config to ${targetPath}: ${fsError.message}`);
    }
    return targetPath;
}

// ── Merging ─────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(value: unknown, fallback: string): string {
    return typeof value === 'string' && value.trim() !== '' ? value : fallback;
}

function readPort(value: unknown, fallback: number): number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 65_535
        ? value
        : fallback;
}

function readNonNegative(value: unknown, fallback: number): number {
    return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : fallback;
}

function readStringArray(value: unknown, fallback: string[]): string[] {
    return Array.isArray(value)
        ? value.filter((item): item is string => typeof item === 'string')
        : [...fallback];
}

export function mergeWithDefaults(loaded: unknown): DevloopConfig {
    const record = isRecord(loaded) ? loaded : {};
    const server = isRecord(record.server) ? record.server : {};
    const watch = isRecord(record.watch) ? record.watch : {};
    const build = isRecord(record.build) ? record.build : {};
    const logging = isRecord(record.logging) ? record.logging : {};
    const command = isRecord(record.command) ? record.command : null;
    const defaults = DEFAULT_CONFIG;

    return {
        server: {
            host: readString(server.host, defaults.server.host),
            port: readPort(server.port, defaults.server.port),
            servedDir: readString(server.servedDir, defaults.server.servedDir),
            notFound: typeof server.notFound === 'string' && server.notFound.trim() !== ''
                ? server.notFound
                : defaults.server.notFound,
        },
        watch: {
            paths: readStringArray(watch.paths, defaults.watch.paths),
            ignore: readStringArray(watch.ignore, defaults.watch.ignore),
            workspaceIgnore: readStringArray(watch.workspaceIgnore, defaults.watch.workspaceIgnore),
            debounceMs: readNonNegative(watch.debounceMs, defaults.watch.debounceMs),
        },
        command: command && typeof command.program === 'string' && command.program.trim() !== ''
            ? { program: command.program, args: readStringArray(command.args, []) }
            : null,
        build: {
            outputDir: readString(build.outputDir, defaults.build.outputDir),
        },
        logging: {
            dir: readString(logging.dir, defaults.logging.dir),
        },
    };
}

/** `DEVLOOP_HOST`, `DEVLOOP_PORT` and `DEVLOOP_DEBOUNCE_MS` win over the file. */
export function applyEnvOverrides(config: DevloopConfig, env: NodeJS.ProcessEnv = process.env): DevloopConfig {
    const host = env.DEVLOOP_HOST?.trim();
    const port = env.DEVLOOP_PORT?.trim() ? Number(env.DEVLOOP_PORT) : Number.NaN;
    const debounceMs = env.DEVLOOP_DEBOUNCE_MS?.trim() ? Number(env.DEVLOOP_DEBOUNCE_MS) : Number.NaN;

    if (env.DEVLOOP_PORT?.trim() && readPort(port, -1) === -1) {
        console.warn(`[devloop Config] Ignoring invalid DEVLOOP_PORT '${env.DEVLOOP_PORT}'.`);
    }

    return {
        ...config,
        server: {
            ...config.server,
            host: host || config.server.host,
            port: readPort(port, config.server.port),
        },
        watch: {
            ...config.watch,
            debounceMs: readNonNegative(debounceMs, config.watch.debounceMs),
        },
    };
}
