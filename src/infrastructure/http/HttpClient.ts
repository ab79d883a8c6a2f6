import nodeFetch, { RequestInit, Response } from 'node-fetch';
import { Logger } from '../../shared/logging/Logger';
import {
    NetworkError,
    RequestAbortedError,
    TimeoutError
} from '../../shared/errors/AppError';

export interface HttpClientConfig {
    timeout?: number;
    headers?: Record<string, string>;
}

export interface RequestOptions {
    headers?: Record<string, string>;
    params?: Record<string, string>;
    timeout?: number;
    /**
     * When false, 3xx responses are returned as-is instead of being followed
     */
    followRedirects?: boolean;
    signal?: AbortSignal;
}

export interface HttpResponse {
    ok: boolean;
    status: number;
    statusText: string;
    headers: Record<string, string>;
    body: string;
}

/**
 * The fetch capability the resolvers depend on
 */
export interface IHttpClient {
    get(url: string, options?: RequestOptions): Promise<HttpResponse>;
}

export class HttpClient implements IHttpClient {
    private config: Required<HttpClientConfig>;

    constructor(
        private logger: Logger,
        config: HttpClientConfig = {}
    ) {
        this.config = {
            timeout: config.timeout ?? 30000,
            headers: config.headers ?? {}
        };
    }

    async get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
        return this.request('GET', url, options);
    }

    private async request(
        method: string,
        url: string,
        options: RequestOptions
    ): Promise<HttpResponse> {
        const fullUrl = this.buildUrl(url, options.params);
        const controller = new AbortController();
        const timeout = options.timeout || this.config.timeout;
        const callerSignal = options.signal;

        if (callerSignal?.aborted) {
            throw new RequestAbortedError(fullUrl);
        }

        const onCallerAbort = () => controller.abort();
        callerSignal?.addEventListener('abort', onCallerAbort);

        const requestOptions: RequestInit = {
            method,
            headers: {
                ...this.config.headers,
                ...options.headers
            },
            redirect: options.followRedirects === false ? 'manual' : 'follow',
            signal: controller.signal
        };

        // Set timeout
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
            this.logger.debug(`HTTP ${method} ${fullUrl}`);

            const response = await nodeFetch(fullUrl, requestOptions);
            const httpResponse = await this.processResponse(response);

            this.logger.debug(`HTTP ${method} ${fullUrl} -> ${httpResponse.status}`);
            return httpResponse;

        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                if (callerSignal?.aborted) {
                    throw new RequestAbortedError(fullUrl);
                }
                throw new TimeoutError(`${method} ${fullUrl}`, timeout);
            }

            const message = error instanceof Error ? error.message : String(error);
            throw new NetworkError(`Request to ${fullUrl} failed: ${message}`, { url: fullUrl });

        } finally {
            clearTimeout(timeoutId);
            callerSignal?.removeEventListener('abort', onCallerAbort);
        }
    }

    private async processResponse(response: Response): Promise<HttpResponse> {
        // Convert headers to object
        const headers: Record<string, string> = {};
        response.headers.forEach((value, key) => {
            headers[key] = value;
        });

        return {
            ok: response.ok,
            status: response.status,
            statusText: response.statusText,
            headers,
            body: await response.text()
        };
    }

    private buildUrl(url: string, params?: Record<string, string>): string {
        if (!params || Object.keys(params).length === 0) {
            return url;
        }

        const urlObj = new URL(url);
        Object.entries(params).forEach(([key, value]) => {
            urlObj.searchParams.append(key, value);
        });

        return urlObj.toString();
    }
}
