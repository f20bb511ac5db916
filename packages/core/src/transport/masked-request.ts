import {
    applyHeaderPolicy,
    setHeaderIfAbsent,
    type EmulatedSession,
    type HeaderMap,
    type HeaderPolicyOptions
} from '@masquerade/shared';

export type RequestKind = 'plain' | 'json' | 'html';

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS';

export type FormPayload = Record<string, unknown>;

export interface MaskedRequestOptions extends HeaderPolicyOptions {
    method?: HttpMethod;
    headers?: HeaderMap;
    /** Form-encoded with every value JSON-serialized. */
    payload?: FormPayload;
    kind?: RequestKind;
}

export interface MaskedRequest {
    url: string;
    method: HttpMethod;
    headers: HeaderMap;
    body: string | null;
}

const KIND_ACCEPT: Record<Exclude<RequestKind, 'plain'>, string> = {
    json: 'application/json',
    html: 'text/html'
};

const ACCEPT_ENCODING = 'gzip, deflate, br';

export function encodeFormPayload(payload: FormPayload): string {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(payload)) {
        params.append(key, JSON.stringify(value) ?? 'null');
    }
    return params.toString();
}

/**
 * Assemble one outbound request under `session`: kind presets first, then
 * the header policy. Caller headers always win over presets.
 */
export function buildMaskedRequest(
    url: string,
    session: EmulatedSession,
    options: MaskedRequestOptions = {}
): MaskedRequest {
    const { kind = 'plain', payload } = options;
    const headers: HeaderMap = { ...options.headers };

    if (kind !== 'plain') {
        setHeaderIfAbsent(headers, 'accept', KIND_ACCEPT[kind]);
        setHeaderIfAbsent(headers, 'accept-encoding', ACCEPT_ENCODING);
    }

    let body: string | null = null;
    if (payload) {
        body = encodeFormPayload(payload);
        setHeaderIfAbsent(headers, 'content-type', 'application/x-www-form-urlencoded');
    }

    return {
        url,
        method: options.method ?? (payload ? 'POST' : 'GET'),
        headers: applyHeaderPolicy(session, headers, {
            acceptLanguage: options.acceptLanguage,
            doNotTrack: options.doNotTrack
        }),
        body
    };
}
