import type { Request, Response, NextFunction } from 'express';
import type { IncomingMessage } from 'node:http';
import { ResolveError } from '../types/errors.js';

export type HttpStatus = 200 | 400 | 404 | 500;

/** Reason phrases written on the status line. */
export const STATUS_TEXT: Readonly<Record<HttpStatus, string>> = {
    200: 'OK',
    400: 'BAD REQUEST',
    404: 'NOT FOUND',
    500: 'INTERNAL SERVER ERROR',
};

/** Written straight to the socket when the request head cannot be parsed. */
export const RAW_BAD_REQUEST = `HTTP/1.1 400 ${STATUS_TEXT[400]}\r\n\r\n`;

// ── Response Helpers ────────────────────────────────────────────────────────

/** Answer with a bare status line and an empty body. */
export function sendStatus(res: Response, status: HttpStatus): void {
    res.writeHead(status, STATUS_TEXT[status], { 'Content-Length': 0 });
    res.end();
}

/** Answer `200 OK` with `body` and its exact length. */
export function sendBody(res: Response, body: Buffer, contentType: string, includeBody = true): void {
    res.writeHead(200, STATUS_TEXT[200], {
        'Content-Length': body.length,
        'Content-Type': contentType,
    });
    res.end(includeBody ? body : undefined);
}

// ── Error Mapping ───────────────────────────────────────────────────────────

/** Map a caught error to the status code sent back to the client. */
export function mapError(err: unknown): { status: HttpStatus; message: string } {
    if (err instanceof ResolveError) {
        switch (err.code) {
            case 'invalid_path':
            case 'path_traversal':
                return { status: 400, message: err.message };
            case 'no_index':
            case 'not_found':
                return { status: 404, message: err.message };
        }
    }
    if (err instanceof Error) {
        return { status: 500, message: err.message };
    }
    return { status: 500, message: String(err) };
}

// ── Request Helpers ─────────────────────────────────────────────────────────

/** Rebuild the request line and headers as the client sent them. */
export function formatRawHeader(
    req: Pick<IncomingMessage, 'method' | 'url' | 'httpVersion' | 'rawHeaders'>,
): string {
    const lines = [`${req.method ?? 'GET'} ${req.url ?? '/'} HTTP/${req.httpVersion}`];
    for (let i = 0; i + 1 < req.rawHeaders.length; i += 2) {
        lines.push(`${req.rawHeaders[i]}: ${req.rawHeaders[i + 1]}`);
    }
    return `${lines.join('\r\n')}\r\n\r\n`;
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log each request once its response has been written. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const startedAt = Date.now();
    res.on('finish', () => {
        console.log(`[DevServer] ${req.method} ${req.originalUrl} ${res.statusCode} (${Date.now() - startedAt}ms)`);
    });
    next();
}
