// Main entry point for the form field identity library

export { FieldIdentifier, REFERENCE_TYPE_REQUIRED_MESSAGE } from './domain/valueObjects/index.js';
export { FieldIdentifierMap } from './domain/FieldIdentifierMap.js';

export {
    FieldIdentityError,
    ArgumentError,
    ArgumentNullError,
    UnsupportedExpressionError,
    ExpressionEvaluationError
} from './domain/errors/index.js';

// Expression trees for building accessors without a selector function
export * as Expressions from './domain/expressions/Expression.js';
export type {
    Expression,
    ExpressionKind,
    MemberKind,
    ConstantExpression,
    ParameterExpression,
    MemberExpression,
    ConvertExpression,
    CallExpression,
    IndexExpression,
    LambdaExpression
} from './domain/expressions/Expression.js';
export { evaluate } from './domain/expressions/ExpressionEvaluator.js';
export { formatExpression } from './domain/expressions/ExpressionFormatter.js';
export { analyzeMemberAccess } from './domain/expressions/MemberAccessAnalyzer.js';
export type { MemberAccess } from './domain/expressions/MemberAccessAnalyzer.js';
export { recordAccessor, getRecordedExpression } from './domain/expressions/AccessorRecorder.js';
export type { Selector } from './domain/expressions/AccessorRecorder.js';

export { getErrorMessage, getErrorCode, isFieldIdentityError } from './lib/utils/ErrorUtils.js';
export { logger, LogLevel } from './lib/utils/LoggingUtils.js';
export type { LogContext, LogLevelName } from './lib/utils/LoggingUtils.js';

import { applyLoggingConfig, getConfigManager } from './infrastructure/ConfigManager.js';
import type { AppConfig } from './infrastructure/ConfigManager.js';
export type { AppConfig } from './infrastructure/ConfigManager.js';

export interface ConfigureOptions {
    /** Path to a JSON config file; defaults to field-identity.config.json in the working directory. */
    configPath?: string;
    logLevel?: AppConfig['logLevel'];
    logPrefix?: string;
}

/**
 * Loads configuration and applies it to the library logger.
 * Explicit options win over the config file and the environment.
 */
export function configureFieldIdentity(options: ConfigureOptions = {}): Readonly<AppConfig> {
    const config = getConfigManager();
    if (options.configPath !== undefined) {
        config.reload(options.configPath);
    }
    if (options.logLevel !== undefined) {
        config.set('logLevel', options.logLevel);
    }
    if (options.logPrefix !== undefined) {
        config.set('logPrefix', options.logPrefix);
    }
    applyLoggingConfig(config);
    return config.getAll();
}
