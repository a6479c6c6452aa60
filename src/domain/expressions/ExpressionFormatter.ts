import type { Expression } from './Expression.js';

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Renders an expression as source-like text for error messages and logs.
 * The output is not meant to be parsed back.
 */
export function formatExpression(expr: Expression): string {
    switch (expr.kind) {
        case 'constant':
            return expr.name ?? formatConstant(expr.value);
        case 'parameter':
            return expr.name;
        case 'member':
            return formatAccess(expr.target, expr.name);
        case 'convert':
            return `(${expr.type})${formatExpression(expr.operand)}`;
        case 'call':
            return `${formatAccess(expr.target, expr.method)}(${expr.args.map(formatExpression).join(', ')})`;
        case 'index':
            return `${formatExpression(expr.target)}[${formatExpression(expr.index)}]`;
        case 'lambda':
            return `(${expr.parameters.map((p) => p.name).join(', ')}) => ${formatExpression(expr.body)}`;
    }
}

function formatAccess(target: Expression | undefined, name: string): string {
    if (target === undefined) {
        return name;
    }
    const owner = formatExpression(target);
    return IDENTIFIER.test(name) ? `${owner}.${name}` : `${owner}[${JSON.stringify(name)}]`;
}

function formatConstant(value: unknown): string {
    if (typeof value === 'string') {
        return JSON.stringify(value);
    }
    if (typeof value === 'bigint') {
        return `${value}n`;
    }
    if (typeof value === 'function') {
        return value.name ? `[Function ${value.name}]` : '[Function]';
    }
    if (typeof value === 'object' && value !== null) {
        const ctorName = value.constructor?.name;
        return ctorName ? `[${ctorName}]` : '[object]';
    }
    return String(value);
}
