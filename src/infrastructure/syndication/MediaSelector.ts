import { MediaImage } from '../../domain/entities/Media';
import { NoMediaFoundError } from '../../shared/errors/AppError';
import { SyndicationPost, VideoVariant } from './SyndicationDocument';

const MP4_CONTENT_TYPE = 'video/mp4';

/**
 * What a post resolves to: a video, or an ordered photo gallery
 */
export interface MediaSelection {
    videoUrl: string;
    coverUrl: string;
    images: MediaImage[];
}

/**
 * One selection tier. Returns undefined to let the next tier try.
 */
export type SelectionStrategy = (post: SyndicationPost) => MediaSelection | undefined;

/**
 * Highest-bitrate MP4 variant. The first MP4 seen is taken provisionally
 * whatever its bitrate; later ones replace it only with a strictly greater bitrate.
 */
export function pickBestMp4(variants: readonly VideoVariant[]): string {
    let maxBitrate = 0;
    let videoUrl = '';

    for (const variant of variants) {
        if (variant.contentType !== MP4_CONTENT_TYPE) {
            continue;
        }
        if (variant.bitrate > maxBitrate || !videoUrl) {
            maxBitrate = variant.bitrate;
            videoUrl = variant.url;
        }
    }

    return videoUrl;
}

/**
 * First video or animated GIF attachment. Later video attachments are ignored.
 */
export const selectAttachedVideo: SelectionStrategy = post => {
    for (const attachment of post.mediaDetails) {
        if (attachment.kind !== 'video' && attachment.kind !== 'animated_gif') {
            continue;
        }

        const videoUrl = pickBestMp4(attachment.variants);
        return videoUrl
            ? { videoUrl, coverUrl: attachment.coverUrl, images: [] }
            : undefined;
    }
    return undefined;
};

/**
 * The top-level `video` field, with its poster as the cover
 */
export const selectTopLevelVideo: SelectionStrategy = post => {
    if (!post.video) {
        return undefined;
    }

    const videoUrl = pickBestMp4(post.video.variants);
    return videoUrl
        ? { videoUrl, coverUrl: post.video.poster, images: [] }
        : undefined;
};

/**
 * Every photo attachment in document order; the first one doubles as cover
 */
export const selectPhotoGallery: SelectionStrategy = post => {
    const images: MediaImage[] = [];

    for (const attachment of post.mediaDetails) {
        if (attachment.kind === 'photo' && attachment.imageUrl) {
            images.push({ url: attachment.imageUrl });
        }
    }

    return images.length > 0
        ? { videoUrl: '', coverUrl: images[0].url, images }
        : undefined;
};

/**
 * Tiers in priority order. A post is never both a video and a gallery,
 * so photos are only looked at once both video locations came up empty.
 */
export const DEFAULT_STRATEGIES: readonly SelectionStrategy[] = [
    selectAttachedVideo,
    selectTopLevelVideo,
    selectPhotoGallery
];

/**
 * Run the strategies in order and return the first match
 */
export function selectMedia(
    post: SyndicationPost,
    strategies: readonly SelectionStrategy[] = DEFAULT_STRATEGIES,
    postId?: string
): MediaSelection {
    for (const strategy of strategies) {
        const selection = strategy(post);
        if (selection) {
            return selection;
        }
    }
    throw new NoMediaFoundError(postId);
}
