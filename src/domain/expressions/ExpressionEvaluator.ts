import type { Expression } from './Expression.js';
import { formatExpression } from './ExpressionFormatter.js';
import { ExpressionEvaluationError, UnsupportedExpressionError } from '../errors/index.js';
import { getErrorMessage } from '../../lib/utils/ErrorUtils.js';

/**
 * Evaluates an expression tree and returns its value.
 *
 * Only the node kinds that can appear in the target of an accessor are
 * supported. Parameters have no binding here, so a tree that reads one is
 * rejected rather than evaluated.
 */
export function evaluate(expr: Expression): unknown {
    switch (expr.kind) {
        case 'constant':
            return expr.value;
        case 'convert':
            // Conversions to object (boxing) keep the value; nothing to do.
            return evaluate(expr.operand);
        case 'member': {
            if (expr.target === undefined) {
                throw new UnsupportedExpressionError('Static members cannot be evaluated', formatExpression(expr));
            }
            const owner = evaluate(expr.target);
            return readMember(owner, expr.name, expr);
        }
        case 'index': {
            const owner = evaluate(expr.target);
            return readMember(owner, toPropertyKey(evaluate(expr.index)), expr);
        }
        case 'call': {
            if (expr.target === undefined) {
                throw new UnsupportedExpressionError('Static calls cannot be evaluated', formatExpression(expr));
            }
            const owner = evaluate(expr.target);
            const method = readMember(owner, expr.method, expr);
            if (typeof method !== 'function') {
                throw new ExpressionEvaluationError(`'${expr.method}' is not a function`, formatExpression(expr));
            }
            const args = expr.args.map(evaluate);
            try {
                return Reflect.apply(method, owner, args);
            } catch (error) {
                throw new ExpressionEvaluationError(`Call failed (${getErrorMessage(error)})`, formatExpression(expr), error);
            }
        }
        case 'parameter':
            throw new UnsupportedExpressionError('Parameters cannot be evaluated without a binding', formatExpression(expr));
        case 'lambda':
            throw new UnsupportedExpressionError('Lambda expressions cannot be evaluated as values', formatExpression(expr));
    }
}

function readMember(owner: unknown, key: PropertyKey, expr: Expression): unknown {
    if (owner === null || owner === undefined) {
        throw new ExpressionEvaluationError(`Cannot read '${String(key)}' of ${owner}`, formatExpression(expr));
    }
    // Primitives are boxed for the read so that e.g. `'abc'.length` works.
    const receiver: object = typeof owner === 'object' || typeof owner === 'function' ? owner : Object(owner);
    try {
        return Reflect.get(receiver, key, owner);
    } catch (error) {
        throw new ExpressionEvaluationError(`Reading '${String(key)}' failed (${getErrorMessage(error)})`, formatExpression(expr), error);
    }
}

function toPropertyKey(value: unknown): PropertyKey {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'symbol') {
        return value;
    }
    return String(value);
}
