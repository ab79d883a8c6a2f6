import { IHttpClient } from '../http/HttpClient';
import { ILogger } from '../../shared/logging/Logger';
import { AppError, RequestAbortedError } from '../../shared/errors/AppError';

const REDIRECT_STATUSES = new Set([301, 302]);

/**
 * Expands a short link by reading the `Location` of its redirect.
 * Best effort: anything but a usable redirect yields the input URL.
 */
export class ShortLinkResolver {
    constructor(
        private readonly http: IHttpClient,
        private readonly logger: ILogger,
        private readonly userAgent: string
    ) {}

    async resolve(url: string, signal?: AbortSignal): Promise<string> {
        try {
            const response = await this.http.get(url, {
                headers: { 'User-Agent': this.userAgent },
                followRedirects: false,
                signal
            });

            const location = response.headers['location'];
            if (REDIRECT_STATUSES.has(response.status) && location) {
                this.logger.debug('Short link resolved', { url, location });
                return location;
            }

            this.logger.debug('Short link did not redirect', { url, status: response.status });
            return url;

        } catch (error) {
            if (error instanceof RequestAbortedError) {
                throw error;
            }
            this.logger.warn('Short link resolution failed, using it unchanged', {
                url,
                reason: error instanceof AppError ? error.code : String(error)
            });
            return url;
        }
    }
}
