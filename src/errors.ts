interface StudioErrorOptions {
    cause?: unknown;
    details?: Record<string, unknown>;
}

export class StudioError extends Error {
    readonly code: string;
    readonly status: number;
    readonly details?: Record<string, unknown>;

    constructor(message: string, code: string, status: number, options: StudioErrorOptions = {}) {
        super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
        this.name = new.target.name;
        this.code = code;
        this.status = status;
        if (options.details !== undefined) {
            this.details = options.details;
        }
    }
}

export class ValidationError extends StudioError {
    constructor(message: string, options: StudioErrorOptions = {}) {
        super(message, 'VALIDATION', 400, options);
    }
}

export class NotFoundError extends StudioError {
    constructor(message: string, options: StudioErrorOptions = {}) {
        super(message, 'NOT_FOUND', 404, options);
    }
}

export class ConflictError extends StudioError {
    constructor(message: string, options: StudioErrorOptions = {}) {
        super(message, 'CONFLICT', 409, options);
    }
}

export class ExecutionError extends StudioError {
    constructor(message: string, options: StudioErrorOptions = {}) {
        super(message, 'EXECUTION', 500, options);
    }
}

export function normalizeError(error: unknown): StudioError {
    if (error instanceof StudioError) return error;
    if (error instanceof Error) {
        return new ExecutionError(error.message, { cause: error });
    }
    return new ExecutionError(String(error));
}

export function toErrorPayload(error: StudioError): Record<string, unknown> {
    return {
        error: {
            code: error.code,
            type: error.name,
            message: error.message,
            ...(error.details ? { details: error.details } : {}),
        },
    };
}
