import { cosmiconfigSync, CosmiconfigResult } from 'cosmiconfig';
import * as os from 'os';
import { z } from 'zod';
import { Logger } from '../../shared/logging/Logger';
import { ConfigurationError } from '../../shared/errors/AppError';
import {
    DEFAULT_SYNDICATION_HOST,
    DEFAULT_USER_AGENT
} from '../../infrastructure/resolvers/TwitterResolver';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevelName = typeof LOG_LEVELS[number];

export interface AppConfig {
    /** Per-request timeout in milliseconds */
    timeout: number;
    userAgent: string;
    syndicationHost: string;
    logLevel: LogLevelName;
    logJson: boolean;
}

export interface ConfigLoaderOptions {
    cwd?: string;
    homeDir?: string;
    env?: NodeJS.ProcessEnv;
}

const MODULE_NAME = 'postmedia';

// Types only; ranges are checked in finalize()
const fileConfigSchema = z
    .object({
        timeout: z.number(),
        userAgent: z.string(),
        syndicationHost: z.string(),
        logLevel: z.string(),
        logJson: z.boolean()
    })
    .partial();

type PartialConfig = Partial<Omit<AppConfig, 'logLevel'>> & { logLevel?: string };

export function getDefaults(): AppConfig {
    return {
        timeout: 30000,
        userAgent: DEFAULT_USER_AGENT,
        syndicationHost: DEFAULT_SYNDICATION_HOST,
        logLevel: 'info',
        logJson: false
    };
}

export class ConfigLoader {
    private config: AppConfig = getDefaults();
    private readonly explorer: ReturnType<typeof cosmiconfigSync>;
    private readonly cwd: string;
    private readonly homeDir: string;
    private readonly env: NodeJS.ProcessEnv;

    constructor(private logger: Logger, options: ConfigLoaderOptions = {}) {
        this.cwd = options.cwd ?? process.cwd();
        this.homeDir = options.homeDir ?? os.homedir();
        this.env = options.env ?? process.env;
        this.explorer = cosmiconfigSync(MODULE_NAME, {
            searchPlaces: [
                'package.json',
                `${MODULE_NAME}.config.json`,
                `.${MODULE_NAME}rc`,
                `.${MODULE_NAME}rc.json`
            ],
            packageProp: MODULE_NAME
        });
    }

    /**
     * Load configuration: defaults < home < local < environment
     */
    load(): AppConfig {
        const localConfig = this.loadFrom(this.cwd);
        const homeConfig = this.loadFrom(this.homeDir);
        const envConfig = this.loadFromEnvironment();

        this.config = this.finalize(
            this.mergeConfigs(getDefaults(), homeConfig, localConfig, envConfig)
        );

        this.logger.debug('Configuration loaded', { config: { ...this.config } });
        return this.config;
    }

    /**
     * Override configuration with command-line arguments
     */
    applyCliOverrides(overrides: PartialConfig): AppConfig {
        this.config = this.finalize(this.mergeConfigs(this.config, overrides));
        return this.config;
    }

    private search(dir: string): CosmiconfigResult {
        try {
            return this.explorer.search(dir);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ConfigurationError(`Failed to read configuration: ${message}`, { dir });
        }
    }

    private loadFrom(dir: string): PartialConfig {
        const result = this.search(dir);

        if (!result || result.isEmpty) {
            return {};
        }

        const parsed = fileConfigSchema.safeParse(result.config);
        if (!parsed.success) {
            throw new ConfigurationError(`Invalid configuration in ${result.filepath}`, {
                issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
            });
        }

        this.logger.debug(`Loaded config from ${result.filepath}`);
        return parsed.data;
    }

    private loadFromEnvironment(): PartialConfig {
        const config: PartialConfig = {};
        const env = this.env;

        if (env.POSTMEDIA_TIMEOUT) {
            config.timeout = Number(env.POSTMEDIA_TIMEOUT);
        }
        if (env.POSTMEDIA_USER_AGENT) {
            config.userAgent = env.POSTMEDIA_USER_AGENT;
        }
        if (env.POSTMEDIA_SYNDICATION_HOST) {
            config.syndicationHost = env.POSTMEDIA_SYNDICATION_HOST;
        }
        if (env.POSTMEDIA_LOG_LEVEL) {
            config.logLevel = env.POSTMEDIA_LOG_LEVEL.toLowerCase();
        }
        if (env.POSTMEDIA_LOG_JSON) {
            config.logJson = env.POSTMEDIA_LOG_JSON === 'true';
        }

        return config;
    }

    private mergeConfigs(base: PartialConfig, ...overrides: PartialConfig[]): PartialConfig {
        const merged: PartialConfig = { ...base };

        for (const override of overrides) {
            if (override.timeout !== undefined) merged.timeout = override.timeout;
            if (override.userAgent !== undefined) merged.userAgent = override.userAgent;
            if (override.syndicationHost !== undefined) merged.syndicationHost = override.syndicationHost;
            if (override.logLevel !== undefined) merged.logLevel = override.logLevel;
            if (override.logJson !== undefined) merged.logJson = override.logJson;
        }

        return merged;
    }

    /**
     * Validate the merged values and fill the gaps with defaults
     */
    private finalize(config: PartialConfig): AppConfig {
        const defaults = getDefaults();
        const timeout = config.timeout ?? defaults.timeout;
        const userAgent = config.userAgent ?? defaults.userAgent;
        const syndicationHost = config.syndicationHost ?? defaults.syndicationHost;
        const logLevel = config.logLevel ?? defaults.logLevel;

        if (!Number.isInteger(timeout) || timeout <= 0) {
            throw new ConfigurationError('Timeout must be a positive integer (milliseconds)', { timeout });
        }

        if (!userAgent.trim()) {
            throw new ConfigurationError('User agent must not be empty');
        }

        if (!/^[a-z0-9.-]+(:\d+)?$/i.test(syndicationHost)) {
            throw new ConfigurationError(
                `Invalid syndication host: ${syndicationHost}. Use a bare host name such as ${DEFAULT_SYNDICATION_HOST}`
            );
        }

        if (!isLogLevelName(logLevel)) {
            throw new ConfigurationError(
                `Invalid log level: ${logLevel}. Must be one of: ${LOG_LEVELS.join(', ')}`
            );
        }

        return {
            timeout,
            userAgent,
            syndicationHost,
            logLevel,
            logJson: config.logJson ?? defaults.logJson
        };
    }
}

function isLogLevelName(value: string): value is LogLevelName {
    return LOG_LEVELS.some(level => level === value);
}
