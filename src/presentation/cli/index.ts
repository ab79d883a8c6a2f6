#!/usr/bin/env node

import * as dotenv from 'dotenv';
import { CliApplication } from './CliApplication';
import { ConfigLoader } from '../config/ConfigLoader';
import { LoggerFactory } from '../../shared/logging/Logger';
import { applyLoggingConfig, setupDependencies } from './setup';

async function main(argv: string[] = process.argv): Promise<number> {
    // Load environment variables
    dotenv.config();

    const logger = LoggerFactory.getLogger('CLI', { destination: 'stderr' });

    try {
        // Load configuration
        const configLoader = new ConfigLoader(logger);
        applyLoggingConfig(configLoader.load());

        // Set up dependencies
        const { commands } = setupDependencies(configLoader, logger);

        // Create and configure CLI application
        const app = new CliApplication(
            logger,
            'postmedia',
            process.env.npm_package_version || '1.0.0'
        );

        commands.forEach(command => app.registerCommand(command));

        return await app.run(argv);

    } catch (error) {
        logger.fatal('Fatal error', error);
        return 1;
    }
}

// Run if this is the main module
if (require.main === module) {
    main().then(
        code => {
            process.exitCode = code;
        },
        () => {
            process.exitCode = 1;
        }
    );
}

export { main };
