import { SigningError } from './SigningError.js';

export interface SigningSuccess<T> {
    readonly success: true;
    readonly payload: T;
}

export interface SigningFailure {
    readonly success: false;
    readonly error: Exclude<SigningError, SigningError.OK>;
    readonly message: string;
}

export type SigningResult<T> = SigningSuccess<T> | SigningFailure;

export function success<T>(payload: T): SigningSuccess<T> {
    return { success: true, payload };
}

export function failure(
    error: Exclude<SigningError, SigningError.OK>,
    message: string = SigningError[error],
): SigningFailure {
    return { success: false, error, message };
}
