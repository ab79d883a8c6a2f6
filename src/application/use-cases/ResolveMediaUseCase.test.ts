import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { ResolveMediaUseCase } from './ResolveMediaUseCase';
import { IMediaResolver } from '../../domain/interfaces/IMediaResolver';
import { Platform, ResolvedMedia } from '../../domain/entities/Media';
import { ConsoleLogger, LogLevel } from '../../shared/logging/Logger';
import { ErrorHandler } from '../../shared/errors/ErrorHandler';
import { AppError, NoMediaFoundError } from '../../shared/errors/AppError';

const media = new ResolvedMedia(
    '42',
    Platform.TWITTER,
    'https://video.example/a.mp4',
    'https://pbs.example/c.jpg',
    [],
    'title',
    { id: '12', displayName: 'Alice', avatarUrl: '' }
);

function createMockResolver(): jest.Mocked<IMediaResolver> {
    return {
        resolveFromUrl: jest.fn<IMediaResolver['resolveFromUrl']>().mockResolvedValue(media),
        resolveFromId: jest.fn<IMediaResolver['resolveFromId']>().mockResolvedValue(media),
        canHandle: jest.fn<IMediaResolver['canHandle']>().mockImplementation(url => url.includes('x.com')),
        getSupportedPlatforms: jest.fn<IMediaResolver['getSupportedPlatforms']>().mockReturnValue([Platform.TWITTER])
    };
}

describe('ResolveMediaUseCase', () => {
    let resolver: jest.Mocked<IMediaResolver>;
    let errorHandler: ErrorHandler;
    let useCase: ResolveMediaUseCase;

    beforeEach(() => {
        const logger = new ConsoleLogger({ level: LogLevel.SILENT });
        ErrorHandler.reset();
        errorHandler = ErrorHandler.getInstance();
        errorHandler.setLogger(logger);

        resolver = createMockResolver();
        useCase = new ResolveMediaUseCase(new Map([[Platform.TWITTER, resolver]]), logger, errorHandler);
    });

    it('should resolve a trimmed URL through the matching resolver', async () => {
        const result = await useCase.execute({ url: '  https://x.com/a/status/42 ' });

        expect(result).toEqual({ success: true, media });
        expect(resolver.resolveFromUrl).toHaveBeenCalledWith('https://x.com/a/status/42', { signal: undefined });
    });

    it('should resolve an id on the default platform', async () => {
        const controller = new AbortController();

        const result = await useCase.execute({ id: '42', signal: controller.signal });

        expect(result.success).toBe(true);
        expect(resolver.resolveFromId).toHaveBeenCalledWith('42', { signal: controller.signal });
        expect(resolver.resolveFromUrl).not.toHaveBeenCalled();
    });

    it('should reject requests with both a URL and an id', async () => {
        const result = await useCase.execute({ url: 'https://x.com/a/status/42', id: '42' });

        expect(result.success).toBe(false);
        expect(result.error?.code).toBe('VALIDATION_ERROR');
        expect(result.error?.message).toBe('Provide either a URL or a post id');
    });

    it('should reject requests with neither', async () => {
        const result = await useCase.execute({});

        expect(result.error?.code).toBe('VALIDATION_ERROR');
    });

    it('should reject blank values', async () => {
        expect((await useCase.execute({ url: '   ' })).error?.message).toBe('URL must not be empty');
        expect((await useCase.execute({ id: '' })).error?.message).toBe('Post id must not be empty');
    });

    it('should report unsupported URLs as an invalid format', async () => {
        const result = await useCase.execute({ url: 'https://example.com/a/status/42' });

        expect(result.success).toBe(false);
        expect(result.error?.code).toBe('INVALID_URL_FORMAT');
        expect(resolver.resolveFromUrl).not.toHaveBeenCalled();
    });

    it('should return resolver errors and notify listeners', async () => {
        const seen: AppError[] = [];
        errorHandler.addListener(error => seen.push(error));
        resolver.resolveFromId.mockRejectedValue(new NoMediaFoundError('42'));

        const result = await useCase.execute({ id: '42' });

        expect(result.success).toBe(false);
        expect(result.error).toBeInstanceOf(NoMediaFoundError);
        expect(seen).toHaveLength(1);
        expect(seen[0].code).toBe('NO_MEDIA_FOUND');
    });

    it('should normalize unexpected errors', async () => {
        resolver.resolveFromUrl.mockRejectedValue(new Error('boom'));

        const result = await useCase.execute({ url: 'https://x.com/a/status/42' });

        expect(result.error?.code).toBe('INTERNAL_ERROR');
        expect(result.error?.message).toBe('boom');
    });

    it('should fail when no resolver serves the platform', async () => {
        const empty = new ResolveMediaUseCase(
            new Map(),
            new ConsoleLogger({ level: LogLevel.SILENT }),
            errorHandler
        );

        const result = await empty.execute({ id: '42' });

        expect(result.error?.code).toBe('VALIDATION_ERROR');
        expect(result.error?.message).toBe('No resolver available for platform: TWITTER');
    });
});
