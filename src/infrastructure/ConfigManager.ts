import fs from 'fs';
import path from 'path';
import { LOG_LEVEL_NAMES, logger, parseLogLevel, type LogLevelName } from '../lib/utils/LoggingUtils.js';

// Type definitions
export interface AppConfig {
    logLevel: LogLevelName;
    logPrefix: string;
}

interface ValidationRule {
    type: 'string' | 'number' | 'boolean';
    required?: boolean;
    maxLength?: number;
    allowedValues?: readonly unknown[];
}

type ValidationRules = { [K in keyof AppConfig]: ValidationRule };

export const CONFIG_FILE_NAME = 'field-identity.config.json';
export const LOG_LEVEL_ENV_VAR = 'FIELD_IDENTITY_LOG_LEVEL';

const defaultConfig: AppConfig = {
    logLevel: 'warn',
    logPrefix: 'field-identity'
};

class ConfigManager {
    private config: AppConfig;
    private readonly schema: ValidationRules = {
        logLevel: { type: 'string', required: true, allowedValues: LOG_LEVEL_NAMES },
        logPrefix: { type: 'string', maxLength: 64 }
    };
    private configLoaded: boolean = false;

    constructor() {
        this.config = { ...defaultConfig };
    }

    /**
     * Merges defaults, the JSON config file (if any) and the environment, in that order.
     * Loading twice is a no-op.
     */
    loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): void {
        if (this.configLoaded) {
            return;
        }

        const resolvedPath = this.resolveConfigPath(configPath);
        if (resolvedPath) {
            this.config = this.mergeConfigs(this.config, this.readConfigFile(resolvedPath));
        }

        const envLevel = env[LOG_LEVEL_ENV_VAR];
        if (envLevel !== undefined && envLevel !== '') {
            this.config = this.mergeConfigs(this.config, { logLevel: envLevel.toLowerCase() });
        }

        this.configLoaded = true;
    }

    /**
     * Discards the current values and loads again from defaults.
     */
    reload(configPath?: string, env: NodeJS.ProcessEnv = process.env): void {
        this.config = { ...defaultConfig };
        this.configLoaded = false;
        this.loadConfig(configPath, env);
    }

    isLoaded(): boolean {
        return this.configLoaded;
    }

    get<K extends keyof AppConfig>(key: K): AppConfig[K] {
        return this.config[key];
    }

    set<K extends keyof AppConfig>(key: K, value: AppConfig[K]): void {
        this.config = this.validateConfig({ ...this.config, [key]: value });
    }

    getAll(): Readonly<AppConfig> {
        return { ...this.config };
    }

    private resolveConfigPath(configPath?: string): string | null {
        if (configPath) {
            const explicitPath = path.resolve(configPath);
            if (!fs.existsSync(explicitPath)) {
                throw new Error(`Config file not found: ${explicitPath}`);
            }
            return explicitPath;
        }
        const defaultPath = path.resolve(process.cwd(), CONFIG_FILE_NAME);
        if (fs.existsSync(defaultPath)) {
            return defaultPath;
        }
        return null;
    }

    private readConfigFile(filePath: string): Record<string, unknown> {
        const fileContent = fs.readFileSync(filePath, 'utf-8');
        let parsed: unknown;
        try {
            parsed = JSON.parse(fileContent);
        } catch (error) {
            throw new Error(`Config file ${filePath} is not valid JSON`, { cause: error });
        }
        if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
            throw new Error(`Config file ${filePath} must contain a JSON object`);
        }
        return { ...parsed };
    }

    private mergeConfigs(baseConfig: AppConfig, userConfig: Record<string, unknown>): AppConfig {
        const result: Record<string, unknown> = { ...baseConfig };
        for (const key of Object.keys(this.schema)) {
            if (Object.prototype.hasOwnProperty.call(userConfig, key)) {
                result[key] = userConfig[key];
            }
        }
        return this.validateConfig(result);
    }

    private validateConfig(config: Record<string, unknown>): AppConfig {
        for (const key of Object.keys(this.schema)) {
            if (isConfigKey(key)) {
                this.validateValue(key, config[key], this.schema[key]);
            }
        }
        return toAppConfig(config);
    }

    private validateValue(key: string, value: unknown, rule: ValidationRule): void {
        if (rule.required && (value === undefined || value === null)) {
            throw new Error(`Config validation error: '${key}' is required.`);
        }
        if (value === undefined || value === null) {
            return;
        }
        if (typeof value !== rule.type) {
            throw new Error(`Config validation error: '${key}' should be of type ${rule.type}.`);
        }
        if (rule.maxLength !== undefined && typeof value === 'string' && value.length > rule.maxLength) {
            throw new Error(`Config validation error: '${key}' should have a maximum length of ${rule.maxLength}.`);
        }
        if (rule.allowedValues && !rule.allowedValues.includes(value)) {
            throw new Error(`Config validation error: '${key}' has an invalid value. Allowed values are: ${rule.allowedValues.join(', ')}.`);
        }
    }
}

function isConfigKey(key: string): key is keyof AppConfig {
    return key in defaultConfig;
}

function isLogLevelName(value: unknown): value is LogLevelName {
    return LOG_LEVEL_NAMES.some((name) => name === value);
}

// Only called on validated input; falls back to defaults for absent optional keys.
function toAppConfig(config: Record<string, unknown>): AppConfig {
    const { logLevel, logPrefix } = config;
    return {
        logLevel: isLogLevelName(logLevel) ? logLevel : defaultConfig.logLevel,
        logPrefix: typeof logPrefix === 'string' ? logPrefix : defaultConfig.logPrefix
    };
}

/**
 * Pushes logging settings into the shared logger.
 */
export function applyLoggingConfig(config: ConfigManager = getConfigManager()): void {
    logger.setLevel(parseLogLevel(config.get('logLevel')));
    logger.setPrefix(config.get('logPrefix'));
}

let configManagerInstance: ConfigManager | undefined;

export const getConfigManager = (): ConfigManager => {
    if (!configManagerInstance) {
        configManagerInstance = new ConfigManager();
        configManagerInstance.loadConfig();
    }
    return configManagerInstance;
};

export type { ConfigManager };

export const __TEST_ONLY__ = {
    reset: () => {
        configManagerInstance = undefined;
    },
    create: () => new ConfigManager()
};
