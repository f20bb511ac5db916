import logger from '../utils/logger.js';
import { ParseError } from '../types/errors.js';
import { BrowserFamily, FAMILY_TOKENS } from './browser-family.js';
import { UNKNOWN_VERSION, type BrowserFacts, type IdentityFacts, type PlatformFacts } from './types.js';

export type ParseResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: ParseError };

const MOBILE_MARKERS = /\b(Mobile|Android|iPhone|iPad)\b/;

/**
 * Decompose an identity string into browser and platform facts.
 * Never throws; fields that cannot be extracted fall back to their unknown value.
 */
export function parseIdentity(identityString: string): IdentityFacts {
    return {
        browser: parseBrowser(identityString),
        platform: parsePlatform(identityString)
    };
}

/**
 * Major version following `token` and its one-character separator,
 * e.g. `119` for `Chrome/119.0.0.0`.
 */
export function parseTokenVersion(identityString: string, token: string): ParseResult<number> | null {
    const index = identityString.indexOf(token);
    if (index < 0) {
        return null;
    }

    const major = identityString.slice(index + token.length + 1).split('.', 1)[0];
    if (!/^\d+$/.test(major)) {
        return {
            ok: false,
            error: new ParseError(`Version after "${token}" is not an integer`, 'version', { token, raw: major })
        };
    }
    return { ok: true, value: Number.parseInt(major, 10) };
}

function versionOrUnknown(result: ParseResult<number>, identityString: string): number {
    if (result.ok) {
        return result.value;
    }
    logger.debug({ error: result.error.toJSON(), identityString }, 'Identity version unreadable, using unknown');
    return UNKNOWN_VERSION;
}

export function parseBrowser(identityString: string): BrowserFacts {
    const facts: BrowserFacts = {
        family: BrowserFamily.NONE,
        version: UNKNOWN_VERSION,
        chromiumVersion: UNKNOWN_VERSION
    };

    // Firefox strings never carry Chrome or Safari tokens
    const firefox = parseTokenVersion(identityString, FAMILY_TOKENS[BrowserFamily.FIREFOX]);
    if (firefox) {
        facts.family = BrowserFamily.FIREFOX;
        facts.version = versionOrUnknown(firefox, identityString);
        return facts;
    }

    // Edge and Opera also carry a Chrome token, so their own token wins
    for (const family of [BrowserFamily.EDGE, BrowserFamily.OPERA] as const) {
        const branded = parseTokenVersion(identityString, FAMILY_TOKENS[family]);
        if (branded) {
            facts.family = family;
            facts.version = versionOrUnknown(branded, identityString);
            break;
        }
    }

    const chromium = parseTokenVersion(identityString, FAMILY_TOKENS[BrowserFamily.CHROME]);
    if (chromium) {
        facts.chromiumVersion = versionOrUnknown(chromium, identityString);
        if (facts.family === BrowserFamily.NONE) {
            facts.family = BrowserFamily.CHROME;
            facts.version = facts.chromiumVersion;
        }
        return facts;
    }

    const safari = parseTokenVersion(identityString, FAMILY_TOKENS[BrowserFamily.SAFARI]);
    if (safari && facts.family === BrowserFamily.NONE) {
        facts.family = BrowserFamily.SAFARI;
        facts.version = versionOrUnknown(safari, identityString);
    }

    return facts;
}

/**
 * Text between the first "(" and the ")" after it.
 */
export function extractSystemInfo(identityString: string): string {
    const open = identityString.indexOf('(');
    if (open < 0) {
        return '';
    }
    const rest = identityString.slice(open + 1);
    const close = rest.indexOf(')');
    return close < 0 ? rest : rest.slice(0, close);
}

/** Split at the first occurrence of `separator`; the tail is '' when absent. */
function splitOnce(text: string, separator: string): [string, string] {
    const index = text.indexOf(separator);
    return index < 0 ? [text, ''] : [text.slice(0, index), text.slice(index + separator.length)];
}

/** Split at the last occurrence of `separator`; the tail is '' when absent. */
function splitLast(text: string, separator: string): [string, string] {
    const index = text.lastIndexOf(separator);
    return index < 0 ? [text, ''] : [text.slice(0, index), text.slice(index + separator.length)];
}

export function parsePlatform(identityString: string): PlatformFacts {
    const facts: PlatformFacts = {
        platformType: '',
        os: '',
        osVersion: '',
        isMobile: false
    };

    if (identityString.length === 0) {
        logger.warn('The identity string is empty');
        return facts;
    }

    const systemInfo = extractSystemInfo(identityString);
    facts.isMobile = MOBILE_MARKERS.test(identityString);

    if (systemInfo.includes('Windows')) {
        facts.platformType = splitOnce(systemInfo, ';')[0];
        [facts.os, facts.osVersion] = splitOnce(systemInfo, ' ');
    } else if (systemInfo.includes('Macintosh')) {
        facts.platformType = 'Macintosh';
        [facts.os, facts.osVersion] = splitLast(splitOnce(systemInfo, '; ')[1], ' ');
    } else if (systemInfo.includes('X11')) {
        facts.platformType = 'Linux';
        facts.os = (systemInfo.split(' ')[1] ?? '').replace(/^;+|;+$/g, '');
    } else {
        logger.warn({ systemInfo, identityString }, 'System info section of identity string cannot be parsed');
        facts.platformType = splitOnce(identityString, ' ')[0];
    }

    return facts;
}
