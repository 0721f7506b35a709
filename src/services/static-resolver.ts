import { stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import path from 'node:path';
import { ResolveError } from '../types/errors.js';
import type { ResolvedFile } from '../types/server.js';
import { containsPath } from './path-filter.js';

const INDEX_FILES = ['index.html', 'index.htm'] as const;

const CONTENT_TYPES: Readonly<Record<string, string>> = {
    html: 'text/html;charset=utf-8',
    css: 'text/css;charset=utf-8',
    js: 'application/javascript',
    wasm: 'application/wasm',
};

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

/** Content type from the file extension alone; the file is never sniffed. */
export function contentTypeFor(filePath: string): string {
    const extension = path.extname(filePath).slice(1);
    return CONTENT_TYPES[extension] ?? DEFAULT_CONTENT_TYPE;
}

async function statOrNull(target: string): Promise<Stats | null> {
    try {
        return await stat(target);
    } catch (err) {
        const code = (err as NodeJS.ErrnoException).code;
        if (code === 'ENOENT' || code === 'ENOTDIR') {
            return null;
        }
        throw err;
    }
}

function joinInside(servedRoot: string, relativePath: string): string {
    if (relativePath.includes('\0')) {
        throw new ResolveError('invalid_path', `Request path contains a NUL byte: ${JSON.stringify(relativePath)}`);
    }
    const trimmed = relativePath.replace(/^[\\/]+|[\\/]+$/g, '');
    const candidate = path.resolve(servedRoot, trimmed);
    if (!containsPath(servedRoot, candidate)) {
        throw new ResolveError('path_traversal', `Request path escapes the served root: ${relativePath}`);
    }
    return candidate;
}

/**
 * Map a request path onto a file under `servedRoot`.
 *
 * Directories resolve to `index.html`, then `index.htm`. When the target is
 * not an existing file and `notFoundFallback` is set, the fallback (relative
 * to `servedRoot`) is used instead.
 */
export async function resolveStaticFile(
    requestPath: string,
    servedRoot: string,
    notFoundFallback: string | null = null,
): Promise<ResolvedFile> {
    const root = path.resolve(servedRoot);
    let target = joinInside(root, requestPath);
    let info = await statOrNull(target);

    if (info?.isDirectory()) {
        let index: { filePath: string; info: Stats } | null = null;
        for (const name of INDEX_FILES) {
            const candidate = path.join(target, name);
            const candidateInfo = await statOrNull(candidate);
            if (candidateInfo?.isFile()) {
                index = { filePath: candidate, info: candidateInfo };
                break;
            }
        }
        if (!index) {
            throw new ResolveError('no_index', `No index.html or index.htm in ${target}`);
        }
        target = index.filePath;
        info = index.info;
    }

    if (!info?.isFile() && notFoundFallback !== null) {
        target = joinInside(root, notFoundFallback);
        info = await statOrNull(target);
    }

    if (!info?.isFile()) {
        throw new ResolveError('not_found', `Nothing to serve at ${requestPath}`);
    }

    return {
        filePath: target,
        contentType: contentTypeFor(target),
    };
}
