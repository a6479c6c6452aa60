export { FieldIdentityError } from './FieldIdentityError.js';
export { ArgumentError, ArgumentNullError } from './ArgumentError.js';
export { UnsupportedExpressionError } from './UnsupportedExpressionError.js';
export { ExpressionEvaluationError } from './ExpressionEvaluationError.js';
