import { getEnv } from '../utils/env-validator.js';
import { usesChromium, type EmulatedSession } from './emulated-session.js';
import type { HeaderMap } from './types.js';

export interface HeaderPolicyOptions {
    /** Defaults to ACCEPT_LANGUAGE. */
    acceptLanguage?: string;
    /** Defaults to DO_NOT_TRACK. */
    doNotTrack?: string;
}

export function findHeaderKey(headers: Readonly<HeaderMap>, name: string): string | undefined {
    const needle = name.toLowerCase();
    return Object.keys(headers).find(key => key.toLowerCase() === needle);
}

/**
 * Set `name` unless the map already has it under any casing.
 */
export function setHeaderIfAbsent(headers: HeaderMap, name: string, value: string): void {
    if (findHeaderKey(headers, name) === undefined) {
        headers[name] = value;
    }
}

/**
 * Final outbound headers for one request under `session`.
 *
 * Caller-set keys are kept; the identity headers are only added when absent.
 * Identities that are not Chromium-based lose every `sec-*` header, caller-set
 * or not. The input map is left untouched.
 */
export function applyHeaderPolicy(
    session: EmulatedSession,
    baseHeaders: Readonly<HeaderMap> = {},
    options: HeaderPolicyOptions = {}
): HeaderMap {
    const headers: HeaderMap = { ...baseHeaders };

    setHeaderIfAbsent(headers, 'accept-language', options.acceptLanguage ?? getEnv().ACCEPT_LANGUAGE);
    setHeaderIfAbsent(headers, 'dnt', options.doNotTrack ?? getEnv().DO_NOT_TRACK);
    setHeaderIfAbsent(headers, 'user-agent', session.identityString);

    if (usesChromium(session)) {
        setHeaderIfAbsent(headers, 'sec-ch-ua', session.branding);
        setHeaderIfAbsent(headers, 'sec-ch-ua-mobile', `?${session.platform.isMobile ? 1 : 0}`);
        setHeaderIfAbsent(headers, 'sec-ch-ua-platform', `"${session.platform.platformType}"`);
    } else {
        for (const key of Object.keys(headers)) {
            if (key.toLowerCase().startsWith('sec-')) {
                delete headers[key];
            }
        }
    }

    return headers;
}
