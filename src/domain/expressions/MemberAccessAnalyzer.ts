import type { Expression, LambdaExpression, MemberKind } from './Expression.js';
import { isLambdaExpression } from './Expression.js';
import { formatExpression } from './ExpressionFormatter.js';
import { UnsupportedExpressionError } from '../errors/index.js';
import { logExpressionRejected } from '../../lib/utils/LoggingUtils.js';

export interface MemberAccess {
    /** The sub-expression producing the object the member is read from. */
    readonly target: Expression;
    readonly memberName: string;
    readonly memberKind: MemberKind;
}

/**
 * Matches `() => <target>.<member>` and `() => (object)<target>.<member>`.
 *
 * Exactly one conversion node is unwrapped: a number-typed member read
 * through an object-typed accessor shows up as convert(member). Anything
 * else (calls, indexers, nested conversions, a bare constant) is rejected.
 * The target is returned unevaluated.
 */
export function analyzeMemberAccess(accessor: LambdaExpression): MemberAccess {
    if (!isLambdaExpression(accessor)) {
        throw reject('Accessor must be a lambda expression', undefined);
    }
    if (accessor.parameters.length > 0) {
        throw reject('Accessor must not take parameters', accessor);
    }

    let body = accessor.body;
    if (body.kind === 'convert') {
        body = body.operand;
    }

    if (body.kind !== 'member') {
        throw reject(describeUnsupported(body), accessor);
    }
    if (body.target === undefined) {
        throw reject('Static members have no model instance', accessor);
    }

    return { target: body.target, memberName: body.name, memberKind: body.memberKind };
}

function describeUnsupported(body: Expression): string {
    switch (body.kind) {
        case 'call':
            return 'Method calls are not field accessors';
        case 'index':
            return 'Indexers are not field accessors';
        case 'convert':
            return 'Only a single conversion may wrap the member access';
        default:
            return 'The accessor body must be a property or field access';
    }
}

function reject(reason: string, accessor: LambdaExpression | undefined): UnsupportedExpressionError {
    const text = accessor === undefined ? undefined : formatExpression(accessor);
    logExpressionRejected(reason, text ?? '<not an expression>');
    return new UnsupportedExpressionError(reason, text);
}
