export type SetupErrorCode =
    | 'served_root_unavailable'
    | 'bind_failed'
    | 'watch_registration_failed';

/** Startup failure: nothing can be served or watched. */
export class SetupError extends Error {
    readonly code: SetupErrorCode;

    constructor(code: SetupErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SetupError';
        this.code = code;
    }
}

/** The supervised command could not be started. */
export class SpawnError extends Error {
    readonly command: string;

    constructor(command: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SpawnError';
        this.command = command;
    }
}

/** A spawn was attempted while the single process slot was occupied or being replaced. */
export class SupervisorBusyError extends Error {
    constructor(message = 'A spawn is already in progress for this supervisor.') {
        super(message);
        this.name = 'SupervisorBusyError';
    }
}

export type ResolveErrorCode = 'invalid_path' | 'path_traversal' | 'no_index' | 'not_found';

export class ResolveError extends Error {
    readonly code: ResolveErrorCode;

    constructor(code: ResolveErrorCode, message: string) {
        super(message);
        this.name = 'ResolveError';
        this.code = code;
    }
}
