import { FieldIdentityError } from './FieldIdentityError.js';

/**
 * Thrown when the target of an accessor cannot be evaluated, e.g. a member
 * read on an undefined intermediate object.
 */
export class ExpressionEvaluationError extends FieldIdentityError {
    readonly expression: string;

    constructor(message: string, expression: string, cause?: unknown) {
        super('EXPRESSION_EVALUATION', `${message}: ${expression}`);
        this.expression = expression;
        if (cause !== undefined) {
            this.cause = cause;
        }
    }
}
