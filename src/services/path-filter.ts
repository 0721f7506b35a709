import path from 'node:path';
import type { WatchConfig } from '../types/watch.js';

/**
 * True when `parent` is `candidate` or one of its ancestors, compared segment
 * by segment (`/a/b` contains `/a/b/c` but not `/a/bc`).
 */
export function containsPath(parent: string, candidate: string): boolean {
    const relative = path.relative(parent, candidate);
    if (relative === '') {
        return true;
    }
    return !path.isAbsolute(relative) && relative.split(path.sep)[0] !== '..';
}

function segments(relativePath: string): string[] {
    return relativePath.split(/[\\/]+/).filter(Boolean);
}

/**
 * Decides which changed paths may trigger a rebuild.
 *
 * Absolute excludes are matched against the raw path; workspace excludes are
 * matched against the path relative to the project root, and only when the
 * path lies under it. Hidden segments are judged relative to the deepest
 * watch root containing the path, or to the project root when no explicit
 * roots are configured.
 */
export class PathFilter {
    readonly #config: WatchConfig;
    readonly #projectRoot: string;

    constructor(config: WatchConfig, projectRoot: string) {
        this.#config = config;
        this.#projectRoot = path.resolve(projectRoot);
    }

    isExcluded(changedPath: string): boolean {
        const candidate = path.resolve(changedPath);

        if (this.#config.excludePaths.some((excluded) => containsPath(excluded, candidate))) {
            return true;
        }

        if (!containsPath(this.#projectRoot, candidate)) {
            return false;
        }

        return this.#config.workspaceExcludePaths.some((excluded) =>
            containsPath(path.resolve(this.#projectRoot, excluded), candidate),
        );
    }

    isHidden(changedPath: string): boolean {
        const candidate = path.resolve(changedPath);
        const root = this.#enclosingRoot(candidate);
        if (root === null) {
            return false;
        }
        return segments(path.relative(root, candidate)).some((segment) => segment.startsWith('.'));
    }

    /** A path is accepted when it is neither excluded nor hidden. */
    accepts(changedPath: string): boolean {
        return !this.isExcluded(changedPath) && !this.isHidden(changedPath);
    }

    #enclosingRoot(candidate: string): string | null {
        const roots = this.#config.watchRoots.length > 0 ? this.#config.watchRoots : [this.#projectRoot];
        let best: string | null = null;
        for (const root of roots) {
            if (containsPath(root, candidate) && (best === null || root.length > best.length)) {
                best = root;
            }
        }
        return best;
    }
}
