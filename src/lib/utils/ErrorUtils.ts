/**
 * Error handling utilities
 */

import { FieldIdentityError } from '../../domain/errors/index.js';

/**
 * Safely extracts error message from any error type
 * @param error - The error to extract message from
 * @returns String representation of the error message
 */
export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

/**
 * Returns the library error code of a thrown value, or undefined for foreign errors
 */
export function getErrorCode(error: unknown): string | undefined {
    if (error instanceof FieldIdentityError) {
        return error.code;
    }
    return undefined;
}

/**
 * Type guard for errors raised by this library
 */
export function isFieldIdentityError(error: unknown): error is FieldIdentityError {
    return error instanceof FieldIdentityError;
}
