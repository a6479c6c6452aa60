/**
 * Expression tree nodes.
 *
 * A small closed set of node kinds, enough to describe an accessor such as
 * `() => scope.model.name`. Trees are plain frozen data; nothing here runs
 * user code. Evaluation lives in ExpressionEvaluator and shape analysis in
 * MemberAccessAnalyzer.
 */

export type MemberKind = 'property' | 'field';

export interface ConstantExpression {
    readonly kind: 'constant';
    readonly value: unknown;
    /** Display name used when formatting, e.g. `this` or `model`. */
    readonly name?: string;
}

export interface ParameterExpression {
    readonly kind: 'parameter';
    readonly name: string;
}

export interface MemberExpression {
    readonly kind: 'member';
    /** Undefined for a static member, which has no instance to identify. */
    readonly target: Expression | undefined;
    readonly name: string;
    readonly memberKind: MemberKind;
}

/**
 * A conversion of the operand to another type, such as the boxing of a
 * number-typed member when the accessor is typed to return `object`.
 */
export interface ConvertExpression {
    readonly kind: 'convert';
    readonly operand: Expression;
    readonly type: string;
}

export interface CallExpression {
    readonly kind: 'call';
    readonly target: Expression | undefined;
    readonly method: string;
    readonly args: readonly Expression[];
}

export interface IndexExpression {
    readonly kind: 'index';
    readonly target: Expression;
    readonly index: Expression;
}

export interface LambdaExpression {
    readonly kind: 'lambda';
    readonly parameters: readonly ParameterExpression[];
    readonly body: Expression;
}

export type Expression =
    | ConstantExpression
    | ParameterExpression
    | MemberExpression
    | ConvertExpression
    | CallExpression
    | IndexExpression
    | LambdaExpression;

export type ExpressionKind = Expression['kind'];

const EXPRESSION_KINDS: ReadonlySet<string> = new Set<ExpressionKind>([
    'constant',
    'parameter',
    'member',
    'convert',
    'call',
    'index',
    'lambda'
]);

export function constant(value: unknown, name?: string): ConstantExpression {
    const node: ConstantExpression = name === undefined ? { kind: 'constant', value } : { kind: 'constant', value, name };
    return Object.freeze(node);
}

export function parameter(name: string): ParameterExpression {
    const node: ParameterExpression = { kind: 'parameter', name };
    return Object.freeze(node);
}

export function member(target: Expression | undefined, name: string, memberKind: MemberKind = 'property'): MemberExpression {
    const node: MemberExpression = { kind: 'member', target, name, memberKind };
    return Object.freeze(node);
}

export function field(target: Expression | undefined, name: string): MemberExpression {
    return member(target, name, 'field');
}

export function convert(operand: Expression, type: string = 'object'): ConvertExpression {
    const node: ConvertExpression = { kind: 'convert', operand, type };
    return Object.freeze(node);
}

export function call(target: Expression | undefined, method: string, args: readonly Expression[] = []): CallExpression {
    const node: CallExpression = { kind: 'call', target, method, args: Object.freeze([...args]) };
    return Object.freeze(node);
}

export function index(target: Expression, indexExpression: Expression): IndexExpression {
    const node: IndexExpression = { kind: 'index', target, index: indexExpression };
    return Object.freeze(node);
}

export function lambda(body: Expression, parameters: readonly ParameterExpression[] = []): LambdaExpression {
    const node: LambdaExpression = { kind: 'lambda', parameters: Object.freeze([...parameters]), body };
    return Object.freeze(node);
}

export function isExpression(value: unknown): value is Expression {
    if (typeof value !== 'object' || value === null || !('kind' in value)) {
        return false;
    }
    return typeof value.kind === 'string' && EXPRESSION_KINDS.has(value.kind);
}

export function isLambdaExpression(value: unknown): value is LambdaExpression {
    return isExpression(value) && value.kind === 'lambda';
}
