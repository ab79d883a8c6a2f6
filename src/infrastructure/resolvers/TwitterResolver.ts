import {
    IMediaResolver,
    ResolveOptions,
    Platform,
    ResolvedMedia,
    displayNameOf,
    extractPostId,
    isPostId,
    isShortLink
} from '../../domain';
import { ILogger, UpstreamHttpError, ValidationError } from '../../shared';
import { IHttpClient } from '../http/HttpClient';
import { ShortLinkResolver } from '../syndication/ShortLinkResolver';
import { parseSyndicationDocument } from '../syndication/SyndicationDocument';
import { selectMedia } from '../syndication/MediaSelector';
import { deriveToken } from '../syndication/token';

export const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
    '(KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const DEFAULT_SYNDICATION_HOST = 'cdn.syndication.twimg.com';

// The endpoint only honours the token for requests coming from the embed widget
const EMBED_REFERER = 'https://platform.twitter.com/';

export interface TwitterResolverConfig {
    userAgent?: string;
    syndicationHost?: string;
}

/**
 * Resolves X/Twitter posts through the public syndication endpoint
 */
export class TwitterResolver implements IMediaResolver {
    private readonly config: Required<TwitterResolverConfig>;
    private readonly shortLinks: ShortLinkResolver;

    constructor(
        private readonly http: IHttpClient,
        private readonly logger: ILogger,
        config: TwitterResolverConfig = {}
    ) {
        this.config = {
            userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
            syndicationHost: config.syndicationHost ?? DEFAULT_SYNDICATION_HOST
        };
        this.shortLinks = new ShortLinkResolver(http, logger, this.config.userAgent);
    }

    canHandle(url: string): boolean {
        if (isShortLink(url)) {
            return true;
        }
        try {
            extractPostId(url);
            return true;
        } catch {
            return false;
        }
    }

    getSupportedPlatforms(): Platform[] {
        return [Platform.TWITTER];
    }

    async resolveFromUrl(url: string, options: ResolveOptions = {}): Promise<ResolvedMedia> {
        const canonicalUrl = isShortLink(url)
            ? await this.shortLinks.resolve(url, options.signal)
            : url;

        const postId = extractPostId(canonicalUrl);
        this.logger.debug('Extracted post id', { url: canonicalUrl, postId });

        return this.resolveFromId(postId, options);
    }

    async resolveFromId(id: string, options: ResolveOptions = {}): Promise<ResolvedMedia> {
        if (!isPostId(id)) {
            throw new ValidationError(`Post id must be numeric: ${id}`, { id });
        }

        const response = await this.http.get(`https://${this.config.syndicationHost}/tweet-result`, {
            params: { id, token: deriveToken(id) },
            headers: {
                'User-Agent': this.config.userAgent,
                'Accept': 'application/json',
                'Referer': EMBED_REFERER
            },
            signal: options.signal
        });

        if (!response.ok) {
            throw new UpstreamHttpError(
                response.status,
                `Syndication API responded with HTTP ${response.status} ${response.statusText}`.trim(),
                { postId: id }
            );
        }

        const post = parseSyndicationDocument(this.decodeBody(response.body, response.status, id));
        const selection = selectMedia(post, undefined, id);

        this.logger.info('Resolved post media', {
            postId: id,
            video: Boolean(selection.videoUrl),
            images: selection.images.length
        });

        return new ResolvedMedia(
            id,
            Platform.TWITTER,
            selection.videoUrl,
            selection.coverUrl,
            selection.images,
            post.text,
            {
                id: post.user.id,
                displayName: displayNameOf(post.user.name, post.user.screenName),
                avatarUrl: post.user.avatarUrl
            }
        );
    }

    private decodeBody(body: string, status: number, postId: string): unknown {
        try {
            return JSON.parse(body);
        } catch {
            throw new UpstreamHttpError(status, 'Syndication API returned a body that is not JSON', {
                postId
            });
        }
    }
}
