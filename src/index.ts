import { ResolvedMedia, ResolveOptions } from './domain';
import { HttpClient } from './infrastructure/http/HttpClient';
import { TwitterResolver, TwitterResolverConfig } from './infrastructure/resolvers/TwitterResolver';
import { ILogger, LoggerFactory } from './shared';

export * from './domain';
export * from './shared';
export * from './application/use-cases/ResolveMediaUseCase';
export { HttpClient } from './infrastructure/http/HttpClient';
export type { HttpClientConfig, HttpResponse, IHttpClient, RequestOptions } from './infrastructure/http/HttpClient';
export {
    TwitterResolver,
    DEFAULT_SYNDICATION_HOST,
    DEFAULT_USER_AGENT
} from './infrastructure/resolvers/TwitterResolver';
export type { TwitterResolverConfig } from './infrastructure/resolvers/TwitterResolver';
export { deriveToken, formatDouble } from './infrastructure/syndication/token';
export { selectMedia } from './infrastructure/syndication/MediaSelector';
export type { MediaSelection, SelectionStrategy } from './infrastructure/syndication/MediaSelector';
export { parseSyndicationDocument } from './infrastructure/syndication/SyndicationDocument';
export type { SyndicationPost } from './infrastructure/syndication/SyndicationDocument';

export interface CreateResolverOptions extends TwitterResolverConfig {
    timeout?: number;
    logger?: ILogger;
}

/**
 * Build a resolver over a fresh HTTP client
 */
export function createResolver(options: CreateResolverOptions = {}): TwitterResolver {
    const { timeout, logger = LoggerFactory.getLogger('postmedia'), ...config } = options;
    return new TwitterResolver(new HttpClient(logger, { timeout }), logger, config);
}

/**
 * Resolve the media of the post a share URL (or short link) points at
 */
export function resolveFromUrl(
    url: string,
    options: CreateResolverOptions & ResolveOptions = {}
): Promise<ResolvedMedia> {
    const { signal, ...resolverOptions } = options;
    return createResolver(resolverOptions).resolveFromUrl(url, { signal });
}

/**
 * Resolve the media of a post by its numeric id
 */
export function resolveFromId(
    id: string,
    options: CreateResolverOptions & ResolveOptions = {}
): Promise<ResolvedMedia> {
    const { signal, ...resolverOptions } = options;
    return createResolver(resolverOptions).resolveFromId(id, { signal });
}
