export class AppError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

// Raised at start-up or construction time when settings cannot work.
export class ConfigurationError extends AppError {}

export class DatabaseError extends AppError {}

export class ServiceCallError extends AppError {
    readonly status?: number;

    constructor(message: string, options?: { cause?: unknown; status?: number }) {
        super(message, options);
        this.status = options?.status;
    }
}

export type ServiceErrorCode = 'NOT_FOUND' | 'CONFLICT' | 'INACTIVE';

export interface ServiceError {
    code: ServiceErrorCode;
    message: string;
}

/**
 * Outcome of a service call, shaped like the `{ data, error }` pairs the
 * Supabase client returns. Expected failures travel here; infrastructure
 * failures are thrown.
 */
export type ServiceResult<T> =
    | { data: T; error: null }
    | { data: null; error: ServiceError };

export const ok = <T>(data: T): ServiceResult<T> => ({ data, error: null });

export const fail = <T = never>(code: ServiceErrorCode, message: string): ServiceResult<T> => ({
    data: null,
    error: { code, message },
});

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
