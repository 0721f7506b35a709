import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn(async () => undefined),
    logSystemCommand: vi.fn(async () => undefined),
    setLogDir: vi.fn(),
}));

import { DevServer } from '../../src/api/dev-server.js';
import { parseCliArgs } from '../../src/core/cli.js';
import { createDevServer, createWatcher, initConfig, resolveRuntime } from '../../src/core/runtime.js';
import { DEFAULT_CONFIG } from '../../src/config/json-config.js';
import { setLogDir } from '../../src/utils/logger.js';

describe('resolveRuntime', () => {
    let root: string;

    beforeEach(async () => {
        vi.stubEnv('DEVLOOP_CONFIG_PATH', '');
        vi.stubEnv('DEVLOOP_HOST', '');
        vi.stubEnv('DEVLOOP_PORT', '');
        vi.stubEnv('DEVLOOP_DEBOUNCE_MS', '');
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'devloop-runtime-'));
        await fs.mkdir(path.join(root, 'src'));
        await fs.writeFile(path.join(root, 'package.json'), '{ "name": "site" }\n', 'utf8');
    });

    afterEach(async () => {
        vi.unstubAllEnvs();
        vi.mocked(setLogDir).mockClear();
        await fs.rm(root, { recursive: true, force: true });
    });

    async function writeProjectConfig(): Promise<void> {
        const config = {
            server: { servedDir: 'public', port: 9100, notFound: '404.html' },
            watch: { paths: ['src'], ignore: ['src/gen'], debounceMs: 750 },
            command: { program: 'npm', args: ['run', 'build'] },
            build: { outputDir: 'out' },
            logging: { dir: 'logs' },
        };
        await fs.writeFile(path.join(root, 'devloop.json'), JSON.stringify(config), 'utf8');
    }

    it('takes paths in devloop.json relative to the project root', async () => {
        await writeProjectConfig();

        const runtime = await resolveRuntime(parseCliArgs(['serve']), path.join(root, 'src'));

        expect(runtime.project).toEqual({ rootDir: root, outputDir: path.join(root, 'out') });
        expect(runtime.servedDir).toBe(path.join(root, 'public'));
        expect(runtime.host).toBe('127.0.0.1');
        expect(runtime.port).toBe(9100);
        expect(runtime.notFound).toBe('404.html');
        expect(runtime.watch.watchRoots).toEqual([path.join(root, 'src')]);
        expect(runtime.watch.excludePaths).toEqual([path.join(root, 'src', 'gen')]);
        expect(runtime.watch.debounceMs).toBe(750);
        expect(runtime.command).toEqual({ command: 'npm', args: ['run', 'build'], cwd: root });
        expect(setLogDir).toHaveBeenCalledWith(path.join(root, 'logs'));
    });

    it('lets flags win, resolving their paths against the working directory', async () => {
        await writeProjectConfig();
        const options = parseCliArgs([
            'serve', 'site', '--ip', '0.0.0.0', '--port', '0', '-w', 'lib', '-i', 'lib/tmp',
            '--debounce', '10', '--', 'make', 'all',
        ]);

        const runtime = await resolveRuntime(options, root);

        expect(runtime.servedDir).toBe(path.join(root, 'site'));
        expect(runtime.host).toBe('0.0.0.0');
        expect(runtime.port).toBe(0);
        expect(runtime.watch.watchRoots).toEqual([path.join(root, 'lib')]);
        expect(runtime.watch.excludePaths).toEqual([path.join(root, 'src', 'gen'), path.join(root, 'lib', 'tmp')]);
        expect(runtime.watch.debounceMs).toBe(10);
        expect(runtime.command).toEqual({ command: 'make', args: ['all'], cwd: root });
    });

    it('uses defaults without a config file', async () => {
        const runtime = await resolveRuntime(parseCliArgs(['watch']), root);

        expect(runtime.servedDir).toBe(path.join(root, 'dist'));
        expect(runtime.port).toBe(8000);
        expect(runtime.watch.watchRoots).toEqual([]);
        expect(runtime.watch.workspaceExcludePaths).toEqual(['node_modules']);
        expect(runtime.command).toBeNull();
        expect(() => createWatcher(runtime)).toThrow(
            `Nothing to run: pass a command after '--' or set "command" in devloop.json.`,
        );
    });

    it('normalizes workspace ignores and drops repeated paths', async () => {
        const config = { watch: { workspaceIgnore: ['node_modules/', 'vendor'], ignore: ['tmp'] } };
        await fs.writeFile(path.join(root, 'devloop.json'), JSON.stringify(config), 'utf8');

        const options = parseCliArgs(['watch', '-w', 'src', '-w', 'src/', '-i', 'tmp', '--', 'make']);
        const runtime = await resolveRuntime(options, root);

        expect(runtime.watch.workspaceExcludePaths).toEqual(['node_modules', 'vendor']);
        expect(runtime.watch.watchRoots).toEqual([path.join(root, 'src')]);
        expect(runtime.watch.excludePaths).toEqual([path.join(root, 'tmp')]);
        expect(runtime.watch.debounceMs).toBe(2000);
        expect(Object.isFrozen(runtime.watch)).toBe(true);
    });

    it('builds the server and watcher from the runtime', async () => {
        await writeProjectConfig();
        const runtime = await resolveRuntime(parseCliArgs(['watch']), root);

        expect(createDevServer(runtime)).toBeInstanceOf(DevServer);
        const { watcher, command } = createWatcher(runtime);
        expect(command).toBe(runtime.command);
        expect(watcher.state).toBe('idle');
        expect(watcher.config.excludePaths).toEqual([path.join(root, 'src', 'gen'), path.join(root, 'out')]);
    });
});

describe('initConfig', () => {
    let root: string;

    beforeEach(async () => {
        vi.stubEnv('DEVLOOP_CONFIG_PATH', '');
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'devloop-init-'));
        await fs.writeFile(path.join(root, 'package.json'), '{ "name": "site" }\n', 'utf8');
    });

    afterEach(async () => {
        vi.unstubAllEnvs();
        await fs.rm(root, { recursive: true, force: true });
    });

    it('writes the default config once', async () => {
        const target = path.join(root, 'devloop.json');

        await expect(initConfig(root)).resolves.toBe(target);
        await expect(initConfig(root)).resolves.toBeNull();

        const written: unknown = JSON.parse(await fs.readFile(target, 'utf8'));
        expect(written).toEqual(DEFAULT_CONFIG);
    });
});
