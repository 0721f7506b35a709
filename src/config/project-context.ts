import { existsSync } from 'node:fs';
import path from 'node:path';

/**
 * Paths describing the project being developed. Built once at startup and
 * passed to whoever needs it; never looked up lazily.
 */
export interface ProjectContext {
    /** Absolute project root (directory holding `package.json`). */
    readonly rootDir: string;
    /** Absolute build output directory, always excluded from watching. */
    readonly outputDir: string;
}

export const DEFAULT_OUTPUT_DIR = 'dist';

export function createProjectContext(rootDir: string, outputDir: string = DEFAULT_OUTPUT_DIR): ProjectContext {
    const root = path.resolve(rootDir);
    return Object.freeze({
        rootDir: root,
        outputDir: path.resolve(root, outputDir),
    });
}

/** Walk up from `startDir` to the nearest directory containing `package.json`. */
export function findProjectRoot(startDir: string): string | null {
    let current = path.resolve(startDir);
    for (;;) {
        if (existsSync(path.join(current, 'package.json'))) {
            return current;
        }
        const parent = path.dirname(current);
        if (parent === current) {
            return null;
        }
        current = parent;
    }
}

/** Project context for `cwd`, falling back to `cwd` itself when no `package.json` is found. */
export function resolveProjectContext(cwd: string = process.cwd(), outputDir?: string): ProjectContext {
    const root = findProjectRoot(cwd) ?? path.resolve(cwd);
    return createProjectContext(root, outputDir);
}
