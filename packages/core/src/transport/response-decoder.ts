import { brotliDecompressSync, gunzipSync, inflateRawSync, inflateSync } from 'zlib';
import { DecodeError, HtmlParser } from '@masquerade/shared';

export type ResponseHeaders = Record<string, string | string[] | undefined>;

const GZIP_MAGIC = [0x1f, 0x8b] as const;

export function headerValue(headers: ResponseHeaders, name: string): string | undefined {
    const needle = name.toLowerCase();
    for (const [key, value] of Object.entries(headers)) {
        if (key.toLowerCase() === needle && value !== undefined) {
            return Array.isArray(value) ? value.join(', ') : value;
        }
    }
    return undefined;
}

export function charsetOf(headers: ResponseHeaders): string | undefined {
    const match = headerValue(headers, 'content-type')?.match(/charset=\s*"?([^";]+)"?/i);
    return match ? match[1].trim() : undefined;
}

export type ContentCoding = 'gzip' | 'deflate' | 'br';

const CODING_ALIASES: Readonly<Record<string, ContentCoding>> = {
    'gzip': 'gzip',
    'x-gzip': 'gzip',
    'deflate': 'deflate',
    'br': 'br'
};

function hasGzipMagic(body: Uint8Array): boolean {
    return body.length >= 2 && body[0] === GZIP_MAGIC[0] && body[1] === GZIP_MAGIC[1];
}

/** zlib-wrapped deflate as RFC 9110 asks for; some servers send it raw. */
function hasZlibHeader(body: Uint8Array): boolean {
    return body.length >= 2 && (body[0] & 0x0f) === 8 && ((body[0] << 8) | body[1]) % 31 === 0;
}

/**
 * Codings from `content-encoding` in the order they were applied.
 */
export function contentCodings(headers: ResponseHeaders): ContentCoding[] {
    const codings: ContentCoding[] = [];
    for (const token of (headerValue(headers, 'content-encoding') ?? '').split(',')) {
        const name = token.trim().toLowerCase();
        if (name === '' || name === 'identity') continue;

        const coding = CODING_ALIASES[name];
        if (!coding) {
            throw new DecodeError(`Unsupported content encoding: ${name}`, { encoding: name });
        }
        codings.push(coding);
    }
    return codings;
}

const DECOMPRESSORS: Readonly<Record<ContentCoding, (body: Uint8Array) => Uint8Array>> = {
    gzip: body => gunzipSync(body),
    deflate: body => (hasZlibHeader(body) ? inflateSync(body) : inflateRawSync(body)),
    br: body => brotliDecompressSync(body)
};

function decompress(body: Uint8Array, coding: ContentCoding): Uint8Array {
    try {
        return DECOMPRESSORS[coding](body);
    } catch (error) {
        throw new DecodeError(`Response body is not valid ${coding}`, {
            encoding: coding,
            cause: error instanceof Error ? error.message : String(error)
        });
    }
}

/**
 * Response bytes to text. undici hands bodies over still encoded, so every
 * announced coding is undone, last applied first. Servers have been seen to
 * send gzip without announcing it, so the gzip magic bytes are checked too.
 */
export function decodeBody(body: Uint8Array, headers: ResponseHeaders = {}): string {
    const codings = contentCodings(headers);
    if (codings.length === 0 && hasGzipMagic(body)) {
        codings.push('gzip');
    }

    let bytes = body;
    for (const coding of codings.reverse()) {
        bytes = decompress(bytes, coding);
    }

    const charset = charsetOf(headers) ?? 'utf-8';
    try {
        return new TextDecoder(charset, { fatal: true }).decode(bytes);
    } catch (error) {
        throw new DecodeError(`Response body cannot be decoded as ${charset}`, {
            charset,
            cause: error instanceof Error ? error.message : String(error)
        });
    }
}

export function parseJsonBody(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch (error) {
        throw new DecodeError('Response body is not valid JSON', {
            cause: error instanceof Error ? error.message : String(error)
        });
    }
}

export function parseHtmlBody(text: string): HtmlParser {
    return new HtmlParser(text);
}
