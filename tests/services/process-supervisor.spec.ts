import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn(async () => undefined),
    logSystemCommand: vi.fn(async () => undefined),
}));

import {
    formatCommand,
    posixTermination,
    ProcessSupervisor,
    terminationStrategyFor,
    windowsTermination,
} from '../../src/services/process-supervisor.js';
import { SpawnError, SupervisorBusyError } from '../../src/types/errors.js';
import type { CommandSpec } from '../../src/types/process.js';
import { logSystemCommand } from '../../src/utils/logger.js';
import { childTermination, createFakeSpawner, FakeChild, type FakeSpawner } from '../harness/fake-process.js';

const build: CommandSpec = { command: 'npm', args: ['run', 'build'] };

describe('ProcessSupervisor', () => {
    let spawner: FakeSpawner;
    let supervisor: ProcessSupervisor;

    beforeEach(() => {
        spawner = createFakeSpawner();
        supervisor = new ProcessSupervisor({
            terminateTimeoutMs: 50,
            pollIntervalMs: 5,
            strategy: childTermination,
            spawnProcess: spawner.spawnProcess,
        });
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        vi.mocked(logSystemCommand).mockClear();
    });

    it('spawns a command into the empty slot', async () => {
        const handle = await supervisor.spawn(build);

        expect(handle.state).toBe('running');
        expect(handle.pid).toBe(4000);
        expect(handle.command).toBe('npm run build');
        expect(supervisor.current).toBe(handle);
        expect(spawner.commands).toEqual(['npm run build']);
    });

    it('refuses to spawn over a running process', async () => {
        await supervisor.spawn(build);
        await expect(supervisor.spawn(build)).rejects.toThrow(
            new SupervisorBusyError('Process 4000 is still running; terminate it before spawning.'),
        );
        expect(spawner.children).toHaveLength(1);
    });

    it('refuses overlapping spawns', async () => {
        const first = supervisor.spawn(build);
        await expect(supervisor.spawn(build)).rejects.toBeInstanceOf(SupervisorBusyError);
        const handle = await first;
        expect(supervisor.current).toBe(handle);
        expect(spawner.children).toHaveLength(1);
    });

    it('terminates with SIGTERM and empties the slot', async () => {
        const handle = await supervisor.spawn(build);
        await supervisor.terminate();

        expect(spawner.children[0]?.signals).toEqual(['SIGTERM']);
        expect(handle.state).toBe('stopped');
        expect(handle.exit).toEqual({ code: null, signal: 'SIGTERM' });
        expect(supervisor.current).toBeNull();
        expect(logSystemCommand).toHaveBeenCalledWith('npm run build', 'stopped by SIGTERM', null);
    });

    it('kills a process that ignores SIGTERM once the timeout elapses', async () => {
        await supervisor.spawn(build);
        const child = spawner.children[0];
        if (!child) throw new Error('no child spawned');
        child.ignoreTerm = true;

        await supervisor.terminate();

        expect(child.signals).toEqual(['SIGTERM', 'SIGKILL']);
        expect(child.signalCode).toBe('SIGKILL');
        expect(console.warn).toHaveBeenCalledWith(
            '[Supervisor] npm run build ignored the posix exit request for 50ms; killing it.',
        );
    });

    it('makes terminate idempotent', async () => {
        const handle = await supervisor.spawn(build);

        await Promise.all([supervisor.terminate(), supervisor.terminate()]);
        await supervisor.terminate();
        await supervisor.terminate(handle);

        expect(spawner.children[0]?.signals).toEqual(['SIGTERM']);
        expect(supervisor.current).toBeNull();
    });

    it('does nothing when the slot is empty', async () => {
        await expect(supervisor.terminate()).resolves.toBeUndefined();
    });

    it('releases a process that exited on its own without signalling it', async () => {
        const handle = await supervisor.spawn(build);
        spawner.children[0]?.finish(0, null);
        await handle.exited;

        await supervisor.terminate();

        expect(spawner.children[0]?.signals).toEqual([]);
        expect(supervisor.current).toBeNull();
        expect(logSystemCommand).toHaveBeenCalledWith('npm run build', 'exited with code 0', 0);
    });

    it('respawns by terminating the old process before starting the new one', async () => {
        const first = await supervisor.spawn(build);
        const second = await supervisor.respawn(build);

        expect(first.state).toBe('stopped');
        expect(spawner.children[0]?.signals).toEqual(['SIGTERM']);
        expect(second.pid).toBe(4001);
        expect(supervisor.current).toBe(second);
    });

    it('reports a command that cannot start as SpawnError', async () => {
        spawner.failAt.add(0);

        const attempt = supervisor.spawn({ command: 'missing-tool', args: ['--flag'] });

        await expect(attempt).rejects.toBeInstanceOf(SpawnError);
        await expect(attempt).rejects.toThrow("Cannot spawn 'missing-tool --flag': spawn missing-tool ENOENT");
        expect(supervisor.current).toBeNull();
        const retry = await supervisor.spawn(build);
        expect(supervisor.current).toBe(retry);
    });

    it('wraps a synchronous spawn failure', async () => {
        const broken = new ProcessSupervisor({
            spawnProcess: () => {
                throw new Error('EACCES');
            },
        });

        await expect(broken.spawn(build)).rejects.toThrow(new SpawnError('npm run build', "Cannot spawn 'npm run build': EACCES"));
    });

    it('logs child errors reported after startup instead of crashing', async () => {
        await supervisor.spawn(build);
        spawner.children[0]?.emit('error', new Error('EPIPE'));

        expect(console.error).toHaveBeenCalledWith('[Supervisor] npm run build (pid 4000) reported an error: EPIPE');
    });
});

describe('termination strategies', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('picks the strategy for the platform', () => {
        expect(terminationStrategyFor('win32')).toBe(windowsTermination);
        expect(terminationStrategyFor('linux')).toBe(posixTermination);
        expect(terminationStrategyFor('darwin')).toBe(posixTermination);
    });

    it('signals the whole process group on POSIX', () => {
        const kill = vi.spyOn(process, 'kill').mockImplementation(() => true);
        const child = new FakeChild(4321);

        posixTermination.requestExit(child);
        posixTermination.forceKill(child);

        expect(kill.mock.calls).toEqual([
            [-4321, 'SIGTERM'],
            [-4321, 'SIGKILL'],
        ]);
        expect(child.signals).toEqual([]);
    });

    it('falls back to the direct child when the group cannot be signalled', () => {
        vi.spyOn(process, 'kill').mockImplementation(() => {
            throw Object.assign(new Error('kill ESRCH'), { code: 'ESRCH' });
        });
        const child = new FakeChild(4321);

        posixTermination.requestExit(child);

        expect(child.signals).toEqual(['SIGTERM']);
    });

    it('formats commands for logs', () => {
        expect(formatCommand({ command: 'npx', args: ['tsc', '-p', '.'] })).toBe('npx tsc -p .');
        expect(formatCommand({ command: 'make', args: [] })).toBe('make');
    });
});

function isAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch {
        return false;
    }
}

// Starts a grandchild, records its pid, and only exits once the grandchild has.
const PARENT_SCRIPT = `
const { spawn } = require('node:child_process');
const { writeFileSync } = require('node:fs');
const child = spawn(process.execPath, ['-e', 'setInterval(() => {}, 1000)'], { stdio: 'ignore' });
process.on('SIGTERM', () => {});
child.on('exit', () => process.exit(0));
writeFileSync(process.argv[1], String(child.pid));
setInterval(() => {}, 1000);
`;

describe('ProcessSupervisor with real processes', () => {
    it('stops a long-running node process', async () => {
        const supervisor = new ProcessSupervisor({ pollIntervalMs: 20 });
        const handle = await supervisor.spawn({
            command: process.execPath,
            args: ['-e', 'setInterval(() => {}, 1000)'],
        });
        expect(handle.pid).toEqual(expect.any(Number));

        await supervisor.terminate();

        expect(handle.state).toBe('stopped');
        expect(supervisor.current).toBeNull();
        if (process.platform !== 'win32') {
            expect(handle.exit).toEqual({ code: null, signal: 'SIGTERM' });
        }
    });

    it('takes down processes the command started itself', async () => {
        const dir = await mkdtemp(path.join(os.tmpdir(), 'devloop-tree-'));
        const pidFile = path.join(dir, 'grandchild.pid');
        let grandchild = 0;
        try {
            const supervisor = new ProcessSupervisor({ pollIntervalMs: 20 });
            const handle = await supervisor.spawn({
                command: process.execPath,
                args: ['-e', PARENT_SCRIPT, pidFile],
            });

            await vi.waitFor(
                async () => {
                    grandchild = Number(await readFile(pidFile, 'utf-8'));
                    expect(grandchild).toBeGreaterThan(0);
                },
                { timeout: 10_000, interval: 50 },
            );
            expect(isAlive(grandchild)).toBe(true);

            await supervisor.terminate();

            await vi.waitFor(() => expect(isAlive(grandchild)).toBe(false), { timeout: 5_000, interval: 50 });
            expect(handle.state).toBe('stopped');
            if (process.platform !== 'win32') {
                expect(handle.exit).toEqual({ code: 0, signal: null });
            }
        } finally {
            if (grandchild > 0 && isAlive(grandchild)) {
                process.kill(grandchild, 'SIGKILL');
            }
            await rm(dir, { recursive: true, force: true });
        }
    }, 20_000);

    it('fails with SpawnError for an executable that does not exist', async () => {
        const supervisor = new ProcessSupervisor();
        await expect(
            supervisor.spawn({ command: 'devloop-test-no-such-binary', args: [] }),
        ).rejects.toBeInstanceOf(SpawnError);
    });
});
