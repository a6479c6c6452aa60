/**
 * Argument validation helpers shared by the value objects and expression code.
 * Each helper throws an ArgumentError subclass naming the offending parameter.
 */

import { ArgumentError, ArgumentNullError } from '../../domain/errors/index.js';

/**
 * Validates that a value is not null or undefined
 * @param value - The value to validate
 * @param paramName - The name of the parameter for error messages
 * @throws ArgumentNullError if value is null or undefined
 */
export function validateRequired<T>(value: T | null | undefined, paramName: string): asserts value is T {
    if (value === null || value === undefined) {
        throw new ArgumentNullError(paramName);
    }
}

/**
 * Validates that a value is a string. The empty string is accepted.
 * @throws ArgumentNullError if value is null or undefined
 * @throws ArgumentError if value is not a string
 */
export function validateString(value: unknown, paramName: string): asserts value is string {
    validateRequired(value, paramName);
    if (typeof value !== 'string') {
        throw new ArgumentError(paramName, `Expected a string but received ${typeof value}.`);
    }
}

/**
 * True for values with their own reference identity: objects, arrays and functions.
 * Primitives are copied by value, so two equal primitives cannot be told apart.
 */
export function isReferenceType(value: unknown): value is object {
    return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

/**
 * Validates that a value is a reference-typed object
 * @throws ArgumentNullError if value is null or undefined
 * @throws ArgumentError if value is a primitive
 */
export function validateReferenceType(value: unknown, paramName: string, message: string): asserts value is object {
    validateRequired(value, paramName);
    if (!isReferenceType(value)) {
        throw new ArgumentError(paramName, message);
    }
}

/**
 * Validates that a value is a function
 * @throws ArgumentNullError if value is null or undefined
 * @throws ArgumentError if value is not callable
 */
export function validateFunction(value: unknown, paramName: string): asserts value is (...args: never[]) => unknown {
    validateRequired(value, paramName);
    if (typeof value !== 'function') {
        throw new ArgumentError(paramName, `Expected a function but received ${typeof value}.`);
    }
}
