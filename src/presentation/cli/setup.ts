import { ICommand } from './commands/ICommand';
import { ResolveCommand } from './commands/ResolveCommand';
import { ResolveMediaUseCase } from '../../application/use-cases/ResolveMediaUseCase';
import { TwitterResolver } from '../../infrastructure/resolvers/TwitterResolver';
import { HttpClient } from '../../infrastructure/http/HttpClient';
import {
    Logger,
    LoggerFactory,
    LogLevel,
    createChildLogger,
    parseLogLevel
} from '../../shared/logging/Logger';
import { ErrorHandler } from '../../shared/errors/ErrorHandler';
import { Platform } from '../../domain/entities/Media';
import { IMediaResolver } from '../../domain/interfaces/IMediaResolver';
import { AppConfig, ConfigLoader } from '../config/ConfigLoader';

export interface Dependencies {
    commands: ICommand[];
}

/**
 * Push the logging part of the configuration into every logger.
 * Logs go to stderr so stdout carries only command output.
 */
export function applyLoggingConfig(config: AppConfig): void {
    LoggerFactory.setDefaultConfig({
        level: parseLogLevel(config.logLevel) ?? LogLevel.INFO,
        json: config.logJson,
        colorize: !config.logJson && Boolean(process.stderr.isTTY),
        destination: 'stderr'
    });
}

/**
 * Wire the resolvers and the use case for one configuration
 */
export function createResolveUseCase(config: AppConfig, logger: Logger): ResolveMediaUseCase {
    applyLoggingConfig(config);

    const httpClient = new HttpClient(createChildLogger(logger, 'http'), {
        timeout: config.timeout
    });

    const resolvers = new Map<Platform, IMediaResolver>();
    resolvers.set(
        Platform.TWITTER,
        new TwitterResolver(httpClient, createChildLogger(logger, 'twitter'), {
            userAgent: config.userAgent,
            syndicationHost: config.syndicationHost
        })
    );

    const errorHandler = ErrorHandler.getInstance();
    errorHandler.setLogger(createChildLogger(logger, 'errors'));

    return new ResolveMediaUseCase(resolvers, logger, errorHandler);
}

/**
 * Set up all dependencies using manual dependency injection
 */
export function setupDependencies(configLoader: ConfigLoader, logger: Logger): Dependencies {
    const commands: ICommand[] = [
        new ResolveCommand(logger, configLoader, config => createResolveUseCase(config, logger))
    ];

    return { commands };
}
