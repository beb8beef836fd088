// src/utils/result.ts
import AppError from './AppError';

export type DomainErrorKind =
    | 'InvalidArgument'
    | 'NotFound'
    | 'InvalidSelection'
    | 'CutoffExpired'
    | 'InvalidTransition';

export interface DomainError {
    kind: DomainErrorKind;
    message: string;
}

/**
 * Outcome of a domain operation. Validation and cutoff failures come back
 * as `{ ok: false }`; storage failures are thrown and never land here.
 */
export type Result<T> =
    | { ok: true; value: T }
    | { ok: false; error: DomainError };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const fail = <T = never>(kind: DomainErrorKind, message: string): Result<T> => ({
    ok: false,
    error: { kind, message },
});

const STATUS_BY_KIND: Record<DomainErrorKind, number> = {
    InvalidArgument: 400,
    NotFound: 404,
    InvalidSelection: 422,
    CutoffExpired: 409,
    InvalidTransition: 409,
};

/**
 * Map a domain error onto the operational error the HTTP layer sends back.
 */
export const toAppError = (error: DomainError): AppError =>
    new AppError(error.message, STATUS_BY_KIND[error.kind]);

/**
 * Unwrap a result inside an asyncHandler: the value, or an AppError thrown
 * for the global error handler.
 */
export const unwrap = <T>(result: Result<T>): T => {
    if (!result.ok) {
        throw toAppError(result.error);
    }
    return result.value;
};

/** MongoDB reports unique index violations with code 11000. */
export const isDuplicateKeyError = (err: unknown): boolean =>
    typeof err === 'object' && err !== null && 'code' in err && err.code === 11000;
