import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { TwitterResolver, DEFAULT_USER_AGENT } from './TwitterResolver';
import { HttpResponse, IHttpClient } from '../http/HttpClient';
import { deriveToken } from '../syndication/token';
import { Platform, MediaType } from '../../domain/entities/Media';
import { ConsoleLogger, LogLevel } from '../../shared/logging/Logger';
import {
    InvalidUrlFormatError,
    NoMediaFoundError,
    RequestAbortedError,
    UpstreamHttpError,
    ValidationError
} from '../../shared/errors/AppError';

const POST_ID = '1790000000000000001';

function response(status: number, body: unknown, headers: Record<string, string> = {}): HttpResponse {
    return {
        ok: status >= 200 && status < 300,
        status,
        statusText: status === 404 ? 'Not Found' : '',
        headers,
        body: typeof body === 'string' ? body : JSON.stringify(body)
    };
}

const videoDocument = {
    text: 'look at this',
    user: {
        id_str: '12',
        name: 'Alice',
        screen_name: 'alice',
        profile_image_url_https: 'https://pbs.example/avatar.jpg'
    },
    mediaDetails: [{
        type: 'video',
        media_url_https: 'https://pbs.example/thumb.jpg',
        video_info: {
            variants: [
                { content_type: 'video/mp4', bitrate: 832000, url: 'https://video.example/640.mp4' },
                { content_type: 'video/mp4', bitrate: 2176000, url: 'https://video.example/1280.mp4' }
            ]
        }
    }]
};

describe('TwitterResolver', () => {
    let get: jest.Mock<IHttpClient['get']>;
    let resolver: TwitterResolver;

    beforeEach(() => {
        get = jest.fn<IHttpClient['get']>();
        resolver = new TwitterResolver({ get }, new ConsoleLogger({ level: LogLevel.SILENT }));
    });

    describe('resolveFromId', () => {
        it('should query the syndication endpoint with the derived token', async () => {
            get.mockResolvedValue(response(200, videoDocument));

            await resolver.resolveFromId(POST_ID);

            expect(get).toHaveBeenCalledTimes(1);
            expect(get).toHaveBeenCalledWith('https://cdn.syndication.twimg.com/tweet-result', {
                params: { id: POST_ID, token: deriveToken(POST_ID) },
                headers: {
                    'User-Agent': DEFAULT_USER_AGENT,
                    'Accept': 'application/json',
                    'Referer': 'https://platform.twitter.com/'
                },
                signal: undefined
            });
        });

        it('should build a video result', async () => {
            get.mockResolvedValue(response(200, videoDocument));

            const media = await resolver.resolveFromId(POST_ID);

            expect(media.postId).toBe(POST_ID);
            expect(media.platform).toBe(Platform.TWITTER);
            expect(media.type).toBe(MediaType.VIDEO);
            expect(media.videoUrl).toBe('https://video.example/1280.mp4');
            expect(media.coverUrl).toBe('https://pbs.example/thumb.jpg');
            expect(media.images).toEqual([]);
            expect(media.title).toBe('look at this');
            expect(media.author).toEqual({
                id: '12',
                displayName: 'Alice',
                avatarUrl: 'https://pbs.example/avatar.jpg'
            });
        });

        it('should build a gallery result', async () => {
            get.mockResolvedValue(response(200, {
                text: 'two photos',
                user: { id_str: '12', name: 'Alice', screen_name: 'alice' },
                mediaDetails: [
                    { type: 'photo', media_url_https: 'https://pbs.example/1.jpg' },
                    { type: 'photo', media_url_https: 'https://pbs.example/2.jpg' }
                ]
            }));

            const media = await resolver.resolveFromId(POST_ID);

            expect(media.type).toBe(MediaType.GALLERY);
            expect(media.videoUrl).toBe('');
            expect(media.coverUrl).toBe('https://pbs.example/1.jpg');
            expect(media.images).toEqual([
                { url: 'https://pbs.example/1.jpg' },
                { url: 'https://pbs.example/2.jpg' }
            ]);
        });

        it('should fall back to the screen name for an empty display name', async () => {
            get.mockResolvedValue(response(200, {
                ...videoDocument,
                user: { id_str: '12', name: '', screen_name: 'alice', profile_image_url_https: '' }
            }));

            const media = await resolver.resolveFromId(POST_ID);

            expect(media.author.displayName).toBe('alice');
        });

        it('should raise UpstreamHttpError on a non-success status', async () => {
            get.mockResolvedValue(response(404, ''));

            const error = await resolver.resolveFromId(POST_ID).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(UpstreamHttpError);
            expect((error as UpstreamHttpError).status).toBe(404);
            expect((error as UpstreamHttpError).message).toBe('Syndication API responded with HTTP 404 Not Found');
        });

        it('should raise UpstreamHttpError on a body that is not JSON', async () => {
            get.mockResolvedValue(response(200, '<html>rate limited</html>'));

            await expect(resolver.resolveFromId(POST_ID)).rejects.toBeInstanceOf(UpstreamHttpError);
        });

        it('should raise NoMediaFoundError for a text-only post', async () => {
            get.mockResolvedValue(response(200, { text: 'words only', user: { screen_name: 'alice' } }));

            await expect(resolver.resolveFromId(POST_ID)).rejects.toBeInstanceOf(NoMediaFoundError);
        });

        it('should reject non-numeric ids without a request', async () => {
            await expect(resolver.resolveFromId('abc')).rejects.toBeInstanceOf(ValidationError);
            expect(get).not.toHaveBeenCalled();
        });

        it('should honour a configured host and user agent', async () => {
            resolver = new TwitterResolver(
                { get },
                new ConsoleLogger({ level: LogLevel.SILENT }),
                { syndicationHost: 'syndication.test', userAgent: 'test-agent' }
            );
            get.mockResolvedValue(response(200, videoDocument));

            await resolver.resolveFromId(POST_ID);

            const [url, options] = get.mock.calls[0];
            expect(url).toBe('https://syndication.test/tweet-result');
            expect(options?.headers?.['User-Agent']).toBe('test-agent');
        });

        it('should pass the caller signal through', async () => {
            const controller = new AbortController();
            get.mockResolvedValue(response(200, videoDocument));

            await resolver.resolveFromId(POST_ID, { signal: controller.signal });

            expect(get.mock.calls[0][1]?.signal).toBe(controller.signal);
        });
    });

    describe('resolveFromUrl', () => {
        it('should resolve a status URL', async () => {
            get.mockResolvedValue(response(200, videoDocument));

            const media = await resolver.resolveFromUrl(`https://x.com/alice/status/${POST_ID}?s=20`);

            expect(media.postId).toBe(POST_ID);
            expect(get.mock.calls[0][1]?.params).toEqual({ id: POST_ID, token: deriveToken(POST_ID) });
        });

        it('should expand a short link before extracting the id', async () => {
            get
                .mockResolvedValueOnce(response(301, '', { location: 'https://x.com/u/status/99' }))
                .mockResolvedValueOnce(response(200, videoDocument));

            const media = await resolver.resolveFromUrl('https://t.co/AbCdEf123');

            expect(media.postId).toBe('99');
            expect(get).toHaveBeenCalledTimes(2);
            expect(get.mock.calls[0][0]).toBe('https://t.co/AbCdEf123');
            expect(get.mock.calls[0][1]?.followRedirects).toBe(false);
            expect(get.mock.calls[1][1]?.params?.id).toBe('99');
        });

        it('should fail with InvalidUrlFormatError when the short link does not expand', async () => {
            get.mockResolvedValueOnce(response(200, ''));

            await expect(resolver.resolveFromUrl('https://t.co/AbCdEf123')).rejects.toBeInstanceOf(InvalidUrlFormatError);
            expect(get).toHaveBeenCalledTimes(1);
        });

        it('should fail with InvalidUrlFormatError without any request', async () => {
            await expect(resolver.resolveFromUrl('https://x.com/alice')).rejects.toBeInstanceOf(InvalidUrlFormatError);
            expect(get).not.toHaveBeenCalled();
        });

        it('should propagate cancellation during short link expansion', async () => {
            get.mockRejectedValue(new RequestAbortedError('https://t.co/AbCdEf123'));

            await expect(resolver.resolveFromUrl('https://t.co/AbCdEf123')).rejects.toBeInstanceOf(RequestAbortedError);
        });
    });

    describe('canHandle', () => {
        it('should accept status URLs and short links only', () => {
            expect(resolver.canHandle('https://x.com/alice/status/1')).toBe(true);
            expect(resolver.canHandle('https://twitter.com/alice/statuses/1')).toBe(true);
            expect(resolver.canHandle('https://t.co/AbCdEf123')).toBe(true);
            expect(resolver.canHandle('https://example.com/p/abc/')).toBe(false);
        });

        it('should report the supported platform', () => {
            expect(resolver.getSupportedPlatforms()).toEqual([Platform.TWITTER]);
        });
    });
});
