import { NetworkError, ParseError } from './errors.js';
import { getLogger } from './logger.js';

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T = unknown> {
    url: string;
    status: number;
    headers: Record<string, string>;
    data: T;
}

/**
 * Options for building a client.
 */
export interface HttpClientOptions {
    timeout?: number;
    version?: string;
}

/**
 * GET-only HTTP client with one attempt per request.
 *
 * Created at the start of a run and closed at its end. Closing aborts
 * whatever is still in flight and rejects later requests.
 */
export class HttpClient {
    private readonly inFlight = new Set<AbortController>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private requestCount = 0;
    private closed = false;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        const version = options?.version ?? '1.0.0';
        this.userAgent = `rfc-role-report/${version}`;
    }

    /**
     * GET a URL and return its body as text.
     */
    async getText(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<string>> {
        return this.request(url, 'text/plain, */*', options);
    }

    /**
     * GET a URL and parse its body as JSON. The parsed value is untyped;
     * callers validate its shape.
     */
    async getJson(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<unknown>> {
        const response = await this.request(url, 'application/json', options);

        let data: unknown;
        try {
            data = JSON.parse(response.data);
        } catch (error) {
            throw new ParseError(
                `Response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
                url,
                { cause: error }
            );
        }

        return { ...response, data };
    }

    /**
     * Number of requests issued by this client.
     */
    getRequestCount(): number {
        return this.requestCount;
    }

    isClosed(): boolean {
        return this.closed;
    }

    /**
     * Abort outstanding requests and refuse new ones.
     */
    close(): void {
        this.closed = true;
        for (const controller of this.inFlight) {
            controller.abort();
        }
        this.inFlight.clear();
    }

    private async request(
        url: string,
        accept: string,
        options: HttpRequestOptions
    ): Promise<HttpResponse<string>> {
        if (this.closed) {
            throw new NetworkError(`HTTP client is closed: ${url}`, url, 0);
        }

        const { headers = {}, timeout = this.defaultTimeout } = options;
        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            'Accept': accept,
            ...headers,
        };

        this.requestCount += 1;
        getLogger().debug({ url }, 'GET');

        const controller = new AbortController();
        let timedOut = false;
        const timeoutId = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, timeout);
        this.inFlight.add(controller);

        try {
            const response = await fetch(url, {
                method: 'GET',
                headers: requestHeaders,
                signal: controller.signal,
            });

            const data = await response.text();

            const responseHeaders: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });

            if (!response.ok) {
                throw new NetworkError(
                    `HTTP ${response.status}: ${response.statusText || 'request failed'} (${url})`,
                    url,
                    response.status
                );
            }

            return { url, status: response.status, headers: responseHeaders, data };
        } catch (error) {
            if (error instanceof NetworkError) throw error;

            if (error instanceof Error && error.name === 'AbortError') {
                const reason = timedOut ? `Request timeout after ${timeout}ms` : 'Request aborted';
                throw new NetworkError(`${reason}: ${url}`, url, 0, { cause: error });
            }

            throw new NetworkError(
                `Network error: ${describeError(error)} (${url})`,
                url,
                0,
                { cause: error }
            );
        } finally {
            clearTimeout(timeoutId);
            this.inFlight.delete(controller);
        }
    }
}

/**
 * Undici reports connection failures as `TypeError: fetch failed` with the
 * socket error as `cause`.
 */
function describeError(error: unknown): string {
    if (!(error instanceof Error)) return String(error);
    const cause: unknown = error.cause;
    if (cause instanceof Error && cause.message) {
        return `${error.message}: ${cause.message}`;
    }
    return error.message;
}

/**
 * Create a new HTTP client scoped to one run.
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
