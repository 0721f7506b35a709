import { readFile } from 'node:fs/promises';
import type { Response } from 'express';
import { ResolveError } from '../../types/errors.js';
import type { DevRequest, RequestHandler } from '../../types/server.js';
import { resolveStaticFile } from '../../services/static-resolver.js';
import { mapError, sendBody, sendStatus } from '../shared.js';

/**
 * Default handler: serves files from the request's served root.
 *
 * `200` with the file bytes, `404` when nothing resolves, `400` for paths that
 * try to leave the served root. Anything else is rethrown for the server to
 * turn into a `500`.
 */
export class StaticFileHandler implements RequestHandler {
    async handle(request: DevRequest, response: Response): Promise<void> {
        let filePath: string;
        let contentType: string;
        try {
            ({ filePath, contentType } = await resolveStaticFile(
                request.path,
                request.servedRoot,
                request.notFoundFallback,
            ));
        } catch (err) {
            if (err instanceof ResolveError) {
                sendStatus(response, mapError(err).status);
                return;
            }
            throw err;
        }

        const body = await readFile(filePath);
        sendBody(response, body, contentType, request.method !== 'HEAD');
    }
}
