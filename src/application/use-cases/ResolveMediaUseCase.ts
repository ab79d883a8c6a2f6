import {
  IMediaResolver,
  Platform,
  ResolvedMedia
} from '../../domain';
import {
  ILogger,
  AppError,
  ErrorHandler,
  InvalidUrlFormatError,
  ValidationError
} from '../../shared';

/**
 * Resolve media use case request. Exactly one of `url` and `id` is set.
 */
export interface ResolveMediaRequest {
  url?: string;
  id?: string;
  /**
   * Platform the id belongs to; URLs are matched against every resolver
   */
  platform?: Platform;
  signal?: AbortSignal;
}

/**
 * Resolve media use case response
 */
export interface ResolveMediaResponse {
  success: boolean;
  media?: ResolvedMedia;
  error?: AppError;
}

/**
 * Use case for resolving the media of a post
 */
export class ResolveMediaUseCase {
  constructor(
    private readonly resolvers: Map<Platform, IMediaResolver>,
    private readonly logger: ILogger,
    private readonly errorHandler: ErrorHandler = ErrorHandler.getInstance()
  ) {}

  /**
   * Execute the use case
   */
  async execute(request: ResolveMediaRequest): Promise<ResolveMediaResponse> {
    try {
      const media = await this.resolve(request);
      return { success: true, media };
    } catch (error) {
      return { success: false, error: this.errorHandler.handle(error) };
    }
  }

  private async resolve(request: ResolveMediaRequest): Promise<ResolvedMedia> {
    this.validateRequest(request);
    const options = { signal: request.signal };

    if (request.url !== undefined) {
      const url = request.url.trim();
      this.logger.info('Resolving media from URL', { url });
      return this.getResolverForUrl(url).resolveFromUrl(url, options);
    }

    const id = (request.id ?? '').trim();
    const platform = request.platform ?? Platform.TWITTER;
    this.logger.info('Resolving media from id', { id, platform });

    const resolver = this.resolvers.get(platform);
    if (!resolver) {
      throw new ValidationError(`No resolver available for platform: ${platform}`, { platform });
    }
    return resolver.resolveFromId(id, options);
  }

  /**
   * Validate the request
   */
  private validateRequest(request: ResolveMediaRequest): void {
    const hasUrl = request.url !== undefined;
    const hasId = request.id !== undefined;

    if (hasUrl === hasId) {
      throw new ValidationError('Provide either a URL or a post id');
    }

    if (hasUrl && !request.url?.trim()) {
      throw new ValidationError('URL must not be empty');
    }

    if (hasId && !request.id?.trim()) {
      throw new ValidationError('Post id must not be empty');
    }
  }

  /**
   * Get the resolver that accepts the URL
   */
  private getResolverForUrl(url: string): IMediaResolver {
    for (const resolver of this.resolvers.values()) {
      if (resolver.canHandle(url)) {
        return resolver;
      }
    }

    throw new InvalidUrlFormatError(url);
  }
}
