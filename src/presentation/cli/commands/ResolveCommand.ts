import { BaseCommand, CommandArgs, CommandOption } from './ICommand';
import {
    ResolveMediaRequest,
    ResolveMediaUseCase
} from '../../../application/use-cases/ResolveMediaUseCase';
import { ResolvedMedia } from '../../../domain/entities/Media';
import { Logger } from '../../../shared/logging/Logger';
import { AppError } from '../../../shared/errors/AppError';
import { normalizeError } from '../../../shared/errors/ErrorHandler';
import { AppConfig, ConfigLoader } from '../../config/ConfigLoader';

/**
 * Builds the use case once the effective configuration is known
 */
export type UseCaseFactory = (config: AppConfig) => ResolveMediaUseCase;

export class ResolveCommand extends BaseCommand {
    name = 'resolve';
    positionals = '[url]';
    description = 'Resolve the video or images of a post';
    aliases = ['r'];

    constructor(
        logger: Logger,
        private readonly configLoader: ConfigLoader,
        private readonly createUseCase: UseCaseFactory
    ) {
        super(logger);
    }

    async execute(args: CommandArgs): Promise<number> {
        const json = this.getBoolean(args, 'json');

        try {
            this.validateArgs(args);
            const request = this.buildRequest(args);

            const config = this.configLoader.applyCliOverrides({
                timeout: this.getNumber(args, 'timeout'),
                logLevel: this.getBoolean(args, 'verbose') ? 'debug' : undefined
            });

            const abort = new AbortController();
            const onInterrupt = () => abort.abort();
            process.once('SIGINT', onInterrupt);

            try {
                const result = await this.createUseCase(config).execute({
                    ...request,
                    signal: abort.signal
                });

                if (result.success && result.media) {
                    this.printMedia(result.media, json);
                    return 0;
                }

                this.printError(result.error ?? normalizeError('Resolution failed'), json);
                return 1;

            } finally {
                process.removeListener('SIGINT', onInterrupt);
            }

        } catch (error) {
            this.logger.debug('Resolve command failed', { error: String(error) });
            this.printError(normalizeError(error), json);
            return 1;
        }
    }

    getOptions(): CommandOption[] {
        return [
            {
                name: 'id',
                alias: 'i',
                description: 'Resolve by post id instead of URL',
                type: 'string'
            },
            {
                name: 'json',
                alias: 'j',
                description: 'Print the result as JSON',
                type: 'boolean',
                default: false
            },
            {
                name: 'timeout',
                alias: 't',
                description: 'Request timeout in milliseconds',
                type: 'number'
            },
            {
                name: 'verbose',
                description: 'Enable verbose logging',
                type: 'boolean',
                default: false
            }
        ];
    }

    private buildRequest(args: CommandArgs): ResolveMediaRequest {
        return {
            url: this.getString(args, 'url') ?? this.positionalUrl(args),
            id: this.getString(args, 'id')
        };
    }

    private positionalUrl(args: CommandArgs): string | undefined {
        const first = args._.find(value => value !== this.name && !this.aliases.includes(String(value)));
        return first === undefined ? undefined : String(first);
    }

    private printMedia(media: ResolvedMedia, json: boolean): void {
        if (json) {
            console.log(JSON.stringify(media.toJSON(), null, 2));
            return;
        }

        const lines: string[] = [];
        if (media.isVideo()) {
            lines.push(`🎬 Video: ${media.videoUrl}`);
        } else {
            lines.push(`🖼️  Images (${media.images.length}):`);
            media.images.forEach((image, index) => {
                lines.push(`   ${index + 1}. ${image.url}`);
            });
        }
        if (media.coverUrl) {
            lines.push(`   Cover: ${media.coverUrl}`);
        }
        lines.push(`   Author: ${media.author.displayName} (${media.author.id})`);
        if (media.title) {
            lines.push(`   Title: ${media.title}`);
        }

        console.log(lines.join('\n'));
    }

    private printError(error: AppError, json: boolean): void {
        if (json) {
            console.error(JSON.stringify({ error: error.toJSON() }, null, 2));
            return;
        }
        console.error(`❌ [${error.code}] ${error.message}`);
    }
}
