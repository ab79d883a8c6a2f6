import { z } from 'zod';

/**
 * One encoding of a video attachment
 */
export interface VideoVariant {
    contentType: string;
    bitrate: number;
    url: string;
}

/**
 * An entry of the document's `mediaDetails` list, tagged by media type
 */
export type MediaAttachment =
    | { kind: 'video' | 'animated_gif'; coverUrl: string; variants: VideoVariant[] }
    | { kind: 'photo'; imageUrl: string }
    | { kind: 'unknown'; type: string };

/**
 * The top-level `video` field some response shapes carry instead of `mediaDetails`
 */
export interface TopLevelVideo {
    poster: string;
    variants: VideoVariant[];
}

export interface SyndicationUser {
    id: string;
    name: string;
    screenName: string;
    avatarUrl: string;
}

/**
 * A post as returned by the `tweet-result` endpoint.
 * Absent fields read as empty strings and lists; `video` is undefined when missing.
 */
export interface SyndicationPost {
    text: string;
    user: SyndicationUser;
    mediaDetails: MediaAttachment[];
    video: TopLevelVideo | undefined;
}

const text = z.string().catch('');

const variantSchema = z
    .object({
        content_type: text,
        bitrate: z.number().catch(0),
        url: text
    })
    .catch({ content_type: '', bitrate: 0, url: '' });

const variantsSchema = z.array(variantSchema).catch([]);

const mediaDetailSchema = z
    .object({
        type: text,
        media_url_https: text,
        video_info: z.object({ variants: variantsSchema }).optional().catch(undefined)
    })
    .catch({ type: '', media_url_https: '', video_info: undefined });

const userSchema = z
    .object({
        id_str: text,
        name: text,
        screen_name: text,
        profile_image_url_https: text
    })
    .catch({ id_str: '', name: '', screen_name: '', profile_image_url_https: '' });

const documentSchema = z.object({
    text,
    user: userSchema,
    mediaDetails: z.array(mediaDetailSchema).catch([]),
    video: z
        .object({
            poster: text,
            variants: variantsSchema
        })
        .optional()
        .catch(undefined)
});

type RawVariant = z.infer<typeof variantSchema>;
type RawMediaDetail = z.infer<typeof mediaDetailSchema>;

const EMPTY_POST: SyndicationPost = {
    text: '',
    user: { id: '', name: '', screenName: '', avatarUrl: '' },
    mediaDetails: [],
    video: undefined
};

function toVariant(raw: RawVariant): VideoVariant {
    return {
        contentType: raw.content_type,
        bitrate: raw.bitrate,
        url: raw.url
    };
}

function toAttachment(raw: RawMediaDetail): MediaAttachment {
    switch (raw.type) {
        case 'video':
        case 'animated_gif':
            return {
                kind: raw.type === 'video' ? 'video' : 'animated_gif',
                coverUrl: raw.media_url_https,
                variants: (raw.video_info?.variants ?? []).map(toVariant)
            };
        case 'photo':
            return { kind: 'photo', imageUrl: raw.media_url_https };
        default:
            return { kind: 'unknown', type: raw.type };
    }
}

/**
 * Read a decoded response body into a typed post. Never throws: anything
 * missing or malformed comes back as an absent field.
 */
export function parseSyndicationDocument(raw: unknown): SyndicationPost {
    const result = documentSchema.safeParse(raw);
    if (!result.success) {
        return EMPTY_POST;
    }

    const { data } = result;
    return {
        text: data.text,
        user: {
            id: data.user.id_str,
            name: data.user.name,
            screenName: data.user.screen_name,
            avatarUrl: data.user.profile_image_url_https
        },
        mediaDetails: data.mediaDetails.map(toAttachment),
        video: data.video
            ? { poster: data.video.poster, variants: data.video.variants.map(toVariant) }
            : undefined
    };
}
