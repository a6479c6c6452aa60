import { FieldIdentityError } from './FieldIdentityError.js';

/**
 * Thrown when an argument is present but unusable, e.g. a value-typed model.
 */
export class ArgumentError extends FieldIdentityError {
    readonly paramName: string;

    constructor(paramName: string, message: string, code: string = 'INVALID_ARGUMENT') {
        super(code, `${message} (Parameter '${paramName}')`);
        this.paramName = paramName;
    }
}

export class ArgumentNullError extends ArgumentError {
    constructor(paramName: string) {
        super(paramName, 'Value cannot be null or undefined.', 'ARGUMENT_NULL');
    }
}
