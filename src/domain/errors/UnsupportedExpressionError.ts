import { FieldIdentityError } from './FieldIdentityError.js';

export class UnsupportedExpressionError extends FieldIdentityError {
    /** Source-like rendering of the rejected expression, when one was available. */
    readonly expression: string | undefined;

    constructor(message: string, expression?: string) {
        super(
            'UNSUPPORTED_EXPRESSION',
            expression === undefined ? message : `${message}: ${expression}`
        );
        this.expression = expression;
    }
}
