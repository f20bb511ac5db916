import type { BrowserFamily } from './browser-family.js';

export interface IdentityEntry {
    readonly identityString: string;
    /** Relative popularity; weights need not sum to 1. */
    readonly weight: number;
}

export interface BrowserFacts {
    family: BrowserFamily;
    /** -1 when unknown */
    version: number;
    /** -1 when the browser is not Chromium-based */
    chromiumVersion: number;
}

export interface PlatformFacts {
    platformType: string;
    os: string;
    osVersion: string;
    isMobile: boolean;
}

export interface IdentityFacts {
    browser: BrowserFacts;
    platform: PlatformFacts;
}

export interface ClientHintBrand {
    brand: string;
    version: number;
}

export type HeaderMap = Record<string, string>;

export const UNKNOWN_VERSION = -1;
