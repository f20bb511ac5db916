import { writeFile } from 'fs/promises';
import { request } from 'undici';
import {
    CorpusRefreshError,
    HtmlParser,
    decodeIdentitySource,
    getEnv,
    logger
} from '@masquerade/shared';

export interface CorpusCollectorOptions {
    /** Statistics page; defaults to CORPUS_SOURCE_URL. */
    sourceUrl?: string;
    /** Where the payload is written; defaults to CORPUS_PATH. */
    filePath?: string;
    /** Defaults to REFRESH_USER_AGENT. */
    userAgent?: string;
    /** Defaults to REFRESH_TIMEOUT_MS. */
    timeoutMs?: number;
}

const PAYLOAD_SECTION = 'div#most-common-desktop-useragents-json-csv';

/**
 * Pull the JSON corpus out of the statistics page through its DOM:
 * the section's sub-div headed "JSON" holds the payload in a textarea.
 */
export function extractPayloadFromDom(html: string): string | null {
    const payload = new HtmlParser(html).getTextUnderHeading(PAYLOAD_SECTION, 'div', 'h3', 'JSON', 'textarea');
    return payload ? payload : null;
}

/**
 * Plain-text route for responses that do not parse as a document,
 * e.g. chunked bodies that still contain the payload.
 */
export function extractPayloadFromText(html: string): string | null {
    const afterHeading = html.split('<h3>JSON</h3>')[1];
    if (afterHeading === undefined) return null;

    const textareaStart = afterHeading.indexOf('<textarea');
    if (textareaStart < 0) return null;

    const tagEnd = afterHeading.indexOf('>', textareaStart);
    if (tagEnd < 0) return null;

    const content = afterHeading.slice(tagEnd + 1);
    const close = content.indexOf('</textarea>');
    const payload = close < 0 ? content : content.slice(0, close);
    return payload ? payload : null;
}

/**
 * Downloads the most-common desktop identity list and persists it as the
 * single-line corpus file. No masking is needed for this request.
 */
export class CorpusCollector {
    readonly sourceUrl: string;
    readonly filePath: string;
    private readonly userAgent: string;
    private readonly timeoutMs: number;

    constructor(options: CorpusCollectorOptions = {}) {
        const env = getEnv();
        this.sourceUrl = options.sourceUrl ?? env.CORPUS_SOURCE_URL;
        this.filePath = options.filePath ?? env.CORPUS_PATH;
        this.userAgent = options.userAgent ?? env.REFRESH_USER_AGENT;
        this.timeoutMs = options.timeoutMs ?? env.REFRESH_TIMEOUT_MS;
    }

    /**
     * Fetch the statistics page and return the embedded JSON payload.
     */
    async fetchPayload(): Promise<string> {
        let statusCode: number;
        let chunked: boolean;
        let html: string;
        try {
            const response = await request(this.sourceUrl, {
                method: 'GET',
                headers: {
                    'connection': 'close',
                    'user-agent': this.userAgent
                },
                headersTimeout: this.timeoutMs,
                bodyTimeout: this.timeoutMs
            });
            statusCode = response.statusCode;
            chunked = response.headers['transfer-encoding'] !== undefined;
            html = await response.body.text();
        } catch (error) {
            throw new CorpusRefreshError('Identity statistics page could not be fetched', {
                url: this.sourceUrl,
                cause: error instanceof Error ? error.message : String(error)
            });
        }

        if (statusCode >= 400) {
            throw new CorpusRefreshError(`Identity statistics page answered HTTP ${statusCode}`, {
                url: this.sourceUrl,
                statusCode
            });
        }

        // Chunked bodies have been observed to still hold the payload as text
        const payload = chunked
            ? extractPayloadFromText(html)
            : extractPayloadFromDom(html) ?? extractPayloadFromText(html);

        if (payload === null) {
            logger.error({ url: this.sourceUrl, chunked, length: html.length }, 'Unfamiliar statistics page layout');
            throw new CorpusRefreshError('The identity corpus payload could not be found', { url: this.sourceUrl });
        }

        return payload.trim();
    }

    /**
     * Fetch, validate and persist the payload. Returns the single-line JSON written.
     */
    async collect(): Promise<string> {
        const payload = await this.fetchPayload();
        const records = decodeIdentitySource(payload);
        const line = JSON.stringify(records);

        await writeFile(this.filePath, line, 'utf8');
        logger.info({ entries: records.length, filePath: this.filePath }, 'Identity corpus file written');
        return line;
    }
}
