import { InvalidUrlFormatError } from '../../shared/errors/AppError';

// <domain>/<user>/status/<id>, also the legacy mobile /statuses/ form
const STATUS_URL_PATTERN = /(?:twitter\.com|x\.com)\/[^/]+\/status(?:es)?\/(\d+)/i;
const SHORT_LINK_MARKER = 't.co/';
const POST_ID_PATTERN = /^\d+$/;

/**
 * Extract the numeric post id from a share URL
 */
export function extractPostId(url: string): string {
  const match = STATUS_URL_PATTERN.exec(url);
  if (!match) {
    throw new InvalidUrlFormatError(url);
  }
  return match[1];
}

/**
 * Whether the URL points at the link shortener
 */
export function isShortLink(url: string): boolean {
  return url.includes(SHORT_LINK_MARKER);
}

/**
 * Whether the value looks like a post id
 */
export function isPostId(value: string): boolean {
  return POST_ID_PATTERN.test(value);
}
