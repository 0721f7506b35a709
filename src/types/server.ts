import type { Response } from 'express';

/** Per-request view handed to a `RequestHandler`. */
export interface DevRequest {
    method: string;
    /** Decoded request path, without query string. */
    path: string;
    /** Request line and header lines as received, CRLF-separated. */
    rawHeader: string;
    /** Absolute directory being served. */
    servedRoot: string;
    /** File, relative to `servedRoot`, served when the requested one is missing. */
    notFoundFallback: string | null;
}

/**
 * Writes the response for one request. A single instance serves every
 * request concurrently for the life of the server, so implementations must not
 * keep per-request state on `this`.
 */
export interface RequestHandler {
    handle(request: DevRequest, response: Response): Promise<void>;
}

export interface ResolvedFile {
    filePath: string;
    contentType: string;
}
