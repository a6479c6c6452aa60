/**
 * Records what a selector reads, as an expression tree.
 *
 * The selector is handed a proxy standing in for the scope. Every property
 * read returns another recording proxy and every call is recorded instead of
 * run, so user getters and methods are never invoked while recording.
 * Whatever the selector returns must be one of those proxies; its recorded
 * tree becomes the body of a parameterless lambda rooted at constant(scope).
 */

import type { Expression, LambdaExpression } from './Expression.js';
import { call, constant, index, lambda, member } from './Expression.js';
import { formatExpression } from './ExpressionFormatter.js';
import { FieldIdentityError, UnsupportedExpressionError } from '../errors/index.js';
import { getErrorMessage } from '../../lib/utils/ErrorUtils.js';
import { isReferenceType, validateFunction, validateReferenceType } from '../../lib/utils/ValidationUtils.js';

export type Selector<TScope> = (scope: TScope) => unknown;

const ARRAY_INDEX = /^(0|[1-9][0-9]*)$/;

// Proxy -> the expression it stands for. Weak so finished recordings can be collected.
const recordings = new WeakMap<object, Expression>();

export function recordAccessor<TScope extends object>(
    scope: TScope,
    selector: Selector<TScope>,
    scopeName: string = 'scope'
): LambdaExpression {
    validateReferenceType(scope, 'scope', 'The accessor scope must be a reference-typed object.');
    validateFunction(selector, 'selector');

    const root = constant(scope, scopeName);
    let result: unknown;
    try {
        result = selector(createRootProxy(scope, root));
    } catch (error) {
        if (error instanceof FieldIdentityError) {
            throw error;
        }
        throw new UnsupportedExpressionError(`Selector could not be recorded (${getErrorMessage(error)})`);
    }

    const body = getRecordedExpression(result);
    if (body === undefined) {
        throw new UnsupportedExpressionError('Selector must return a member of its argument, not a computed value');
    }
    return lambda(body);
}

/**
 * Returns the expression a recording proxy stands for, or undefined for any other value.
 */
export function getRecordedExpression(value: unknown): Expression | undefined {
    return isReferenceType(value) ? recordings.get(value) : undefined;
}

// The root proxy wraps the real scope so the selector sees it typed as TScope.
// Reads never reach the scope itself.
function createRootProxy<TScope extends object>(scope: TScope, root: Expression): TScope {
    const proxy = new Proxy(scope, {
        get(target, prop) {
            if (typeof prop === 'symbol') {
                return undefined;
            }
            const own = Reflect.getOwnPropertyDescriptor(target, prop);
            if (own !== undefined && own.configurable === false && own.writable === false) {
                // A proxy must report the real value for such members, so they cannot be recorded.
                throw new UnsupportedExpressionError(
                    'Non-writable, non-configurable members of the scope cannot be recorded',
                    formatExpression(member(root, prop))
                );
            }
            return createMemberProxy(step(root, prop));
        },
        apply() {
            throw new UnsupportedExpressionError('The scope itself cannot be called', formatExpression(root));
        },
        set() {
            return false;
        },
        deleteProperty() {
            return false;
        }
    });
    recordings.set(proxy, root);
    return proxy;
}

function createMemberProxy(expr: Expression): unknown {
    const proxy = new Proxy(() => undefined, {
        get(_target, prop) {
            if (typeof prop === 'symbol') {
                return undefined;
            }
            return createMemberProxy(step(expr, prop));
        },
        apply(_target, _thisArg, args: unknown[]) {
            if (expr.kind !== 'member') {
                throw new UnsupportedExpressionError('Only named methods can be called', formatExpression(expr));
            }
            return createMemberProxy(call(expr.target, expr.name, args.map(toArgumentExpression)));
        },
        set() {
            return false;
        },
        deleteProperty() {
            return false;
        }
    });
    recordings.set(proxy, expr);
    return proxy;
}

function step(owner: Expression, prop: string): Expression {
    return ARRAY_INDEX.test(prop) ? index(owner, constant(Number(prop))) : member(owner, prop);
}

function toArgumentExpression(arg: unknown): Expression {
    return getRecordedExpression(arg) ?? constant(arg);
}
