/**
 * Supported platforms
 */
export enum Platform {
  TWITTER = 'TWITTER'
}

/**
 * Media types a post resolves to
 */
export enum MediaType {
  VIDEO = 'VIDEO',
  GALLERY = 'GALLERY'
}

/**
 * One image of a photo post
 */
export interface MediaImage {
  url: string;
}

/**
 * Author of a post
 */
export interface MediaAuthor {
  id: string;
  displayName: string;
  avatarUrl: string;
}

/**
 * Plain shape of a resolved post, as printed by the CLI
 */
export interface ResolvedMediaData {
  postId: string;
  platform: Platform;
  type: MediaType;
  videoUrl: string;
  coverUrl: string;
  images: MediaImage[];
  title: string;
  author: MediaAuthor;
}

/**
 * Normalized media descriptor of a single post.
 * Exactly one of `videoUrl` and `images` is non-empty.
 */
export class ResolvedMedia {
  constructor(
    public readonly postId: string,
    public readonly platform: Platform,
    public readonly videoUrl: string,
    public readonly coverUrl: string,
    public readonly images: readonly MediaImage[],
    public readonly title: string,
    public readonly author: MediaAuthor
  ) {
    if (!videoUrl && images.length === 0) {
      throw new RangeError('ResolvedMedia needs a video URL or at least one image');
    }
    if (videoUrl && images.length > 0) {
      throw new RangeError('ResolvedMedia cannot be both a video and a gallery');
    }
  }

  get type(): MediaType {
    return this.videoUrl ? MediaType.VIDEO : MediaType.GALLERY;
  }

  isVideo(): boolean {
    return this.type === MediaType.VIDEO;
  }

  toJSON(): ResolvedMediaData {
    return {
      postId: this.postId,
      platform: this.platform,
      type: this.type,
      videoUrl: this.videoUrl,
      coverUrl: this.coverUrl,
      images: this.images.map(image => ({ url: image.url })),
      title: this.title,
      author: { ...this.author }
    };
  }
}

/**
 * Pick the display name of an author: the human-readable name,
 * else the handle.
 */
export function displayNameOf(name: string, screenName: string): string {
  return name ? name : screenName;
}
