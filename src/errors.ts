// src/errors.ts

/** The SQLite file could not be created, opened or written. */
export class StorageUnavailable extends Error {
    readonly path: string;

    constructor(path: string, reason: string, cause?: unknown) {
        super(`Storage unavailable at "${path}": ${reason}`, { cause });
        this.name = 'StorageUnavailable';
        this.path = path;
    }
}

/** The runtime could not open its state store. */
export class StartupError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'StartupError';
    }
}

/** Processing a single inbound event failed. */
export class UnhandledEventError extends Error {
    readonly eventType: string;
    readonly userId: number;

    constructor(eventType: string, userId: number, cause: unknown) {
        super(`Failed to handle ${eventType} event from user ${userId}: ${describeError(cause)}`, { cause });
        this.name = 'UnhandledEventError';
        this.eventType = eventType;
        this.userId = userId;
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
