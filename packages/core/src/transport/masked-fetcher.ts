import { request } from 'undici';
import {
    IdentityCorpus,
    TransportError,
    contextStorage,
    createSession,
    getEnv,
    isRetryableError,
    logger,
    type EmulatedSession,
    type HtmlParser
} from '@masquerade/shared';
import { buildMaskedRequest, type MaskedRequest, type MaskedRequestOptions } from './masked-request.js';
import { decodeBody, parseHtmlBody, parseJsonBody, type ResponseHeaders } from './response-decoder.js';

export interface MaskedFetcherOptions {
    /** Defaults to REQUEST_ATTEMPTS. */
    attempts?: number;
}

export interface MaskedResponse {
    request: MaskedRequest;
    statusCode: number;
    headers: ResponseHeaders;
    text: string;
}

/**
 * Sends requests under one persona. Given a corpus, the persona is drawn on
 * first use and kept for every later request.
 */
export class MaskedFetcher {
    private drawn: Promise<EmulatedSession> | null = null;
    private readonly attempts: number;

    constructor(private readonly identity: EmulatedSession | IdentityCorpus, options: MaskedFetcherOptions = {}) {
        this.attempts = Math.max(1, options.attempts ?? getEnv().REQUEST_ATTEMPTS);
    }

    async getSession(): Promise<EmulatedSession> {
        if (!(this.identity instanceof IdentityCorpus)) {
            return this.identity;
        }
        if (!this.drawn) {
            this.drawn = createSession(this.identity).catch((error: unknown) => {
                this.drawn = null;
                throw error;
            });
        }
        return this.drawn;
    }

    async fetch(url: string, options: MaskedRequestOptions = {}): Promise<MaskedResponse> {
        const session = await this.getSession();
        const masked = buildMaskedRequest(url, session, options);
        const context = new Map([['sessionId', session.id], ['url', url]]);

        return contextStorage.run(context, () => this.send(masked));
    }

    async fetchJson(url: string, options: Omit<MaskedRequestOptions, 'kind'> = {}): Promise<MaskedResponse & { data: unknown }> {
        const response = await this.fetch(url, { ...options, kind: 'json' });
        return { ...response, data: parseJsonBody(response.text) };
    }

    async fetchHtml(url: string, options: Omit<MaskedRequestOptions, 'kind'> = {}): Promise<MaskedResponse & { document: HtmlParser }> {
        const response = await this.fetch(url, { ...options, kind: 'html' });
        return { ...response, document: parseHtmlBody(response.text) };
    }

    private async send(masked: MaskedRequest): Promise<MaskedResponse> {
        let lastError: Error | undefined;

        for (let attempt = 1; attempt <= this.attempts; attempt++) {
            try {
                const response = await request(masked.url, {
                    method: masked.method,
                    headers: masked.headers,
                    body: masked.body ?? undefined
                });
                const bytes = new Uint8Array(await response.body.arrayBuffer());
                logger.debug({ statusCode: response.statusCode, attempt }, 'Masked request completed');

                return {
                    request: masked,
                    statusCode: response.statusCode,
                    headers: response.headers,
                    text: decodeBody(bytes, response.headers)
                };
            } catch (error) {
                // Decode failures, bad arguments and other non-network errors repeat on every attempt
                if (!isRetryableError(error)) {
                    throw error;
                }
                lastError = error instanceof Error ? error : new Error(String(error));
                logger.warn({ attempt, attempts: this.attempts, error: lastError.message }, 'Masked request failed');
            }
        }

        throw new TransportError(
            `Request failed after ${this.attempts} attempts`,
            masked.url,
            this.attempts,
            lastError
        );
    }
}
