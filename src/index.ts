#!/usr/bin/env node
import { CliUsageError, handleHelpCli, handleUnknownCommand, parseCliArgs } from './core/cli.js';
import { createDevServer, createWatcher, initConfig, resolveRuntime } from './core/runtime.js';
import { logThought } from './utils/logger.js';

const argv = process.argv.slice(2);

// ── Early one-shot CLI commands ──────────────────────────────────────────────

if (handleHelpCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

if (handleUnknownCommand(argv)) {
    process.exit(process.exitCode ?? 1);
}

// ── Shutdown ─────────────────────────────────────────────────────────────────

let shuttingDown = false;

function onShutdown(stop: () => Promise<void>): void {
    const handler = (signal: NodeJS.Signals): void => {
        if (shuttingDown) return;
        shuttingDown = true;
        console.log(`\n[devloop] ${signal} received; shutting down.`);
        stop()
            .then(() => process.exit(0))
            .catch((err: unknown) => fail(err));
    };
    process.once('SIGINT', handler);
    process.once('SIGTERM', handler);
}

function fail(err: unknown): never {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[devloop] ${message}`);
    if (err instanceof CliUsageError) {
        console.error(`Run 'devloop --help' for usage.`);
    }
    process.exit(1);
}

// ── Commands ─────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
    const options = parseCliArgs(argv);

    if (options.command === 'init') {
        const written = await initConfig();
        console.log(written ? `[devloop] Wrote ${written}` : '[devloop] devloop.json already exists; left unchanged.');
        return;
    }

    const runtime = await resolveRuntime(options);
    await logThought(`[devloop] Starting '${options.command}' in ${runtime.project.rootDir}.`);

    if (options.command === 'serve') {
        const server = createDevServer(runtime);
        onShutdown(() => server.close());
        await server.start(runtime.servedDir);
        return;
    }

    const { watcher, command } = createWatcher(runtime);
    onShutdown(() => watcher.dispose());
    await watcher.run(command);
}

main().catch(fail);
