import { Platform, ResolvedMedia } from '../entities/Media';

/**
 * Core interface for media resolvers
 */
export interface IMediaResolver {
  /**
   * Resolve the media of the post a share URL points at
   */
  resolveFromUrl(url: string, options?: ResolveOptions): Promise<ResolvedMedia>;

  /**
   * Resolve the media of a post by its id
   */
  resolveFromId(id: string, options?: ResolveOptions): Promise<ResolvedMedia>;

  /**
   * Check if resolver can handle the given URL
   */
  canHandle(url: string): boolean;

  /**
   * Get supported platforms
   */
  getSupportedPlatforms(): Platform[];
}

/**
 * Options for a single resolution call
 */
export interface ResolveOptions {
  /**
   * Aborts the in-flight request; nothing is retried
   */
  signal?: AbortSignal;
}
