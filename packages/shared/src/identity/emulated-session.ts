import { randomUUID } from 'crypto';
import logger from '../utils/logger.js';
import { formatClientHints, synthesizeClientHints } from './client-hints.js';
import { parseIdentity } from './identity-parser.js';
import { defaultRandom, type RandomSource } from './random.js';
import type { IdentityCorpus } from './identity-corpus.js';
import type { BrowserFacts, ClientHintBrand, PlatformFacts } from './types.js';

/**
 * One internally consistent persona: identity string, parsed facts and
 * client hints. Frozen; create a new session to rotate identity.
 */
export interface EmulatedSession {
    readonly id: string;
    readonly identityString: string;
    readonly browser: Readonly<BrowserFacts>;
    readonly platform: Readonly<PlatformFacts>;
    readonly brands: readonly Readonly<ClientHintBrand>[] | null;
    /** Header-ready `sec-ch-ua` value; '' when not Chromium-based. */
    readonly branding: string;
}

export interface SessionOptions {
    random?: RandomSource;
}

export function usesChromium(session: EmulatedSession): boolean {
    return session.browser.chromiumVersion >= 0;
}

/**
 * Build a persona around a known identity string.
 */
export function sessionFromIdentity(identityString: string, options: SessionOptions = {}): EmulatedSession {
    const { browser, platform } = parseIdentity(identityString);
    const brands = synthesizeClientHints(browser, options.random ?? defaultRandom);

    const session: EmulatedSession = Object.freeze({
        id: randomUUID(),
        identityString,
        browser: Object.freeze(browser),
        platform: Object.freeze(platform),
        brands: brands ? Object.freeze(brands.map(brand => Object.freeze(brand))) : null,
        branding: brands ? formatClientHints(brands) : ''
    });

    logger.debug(
        { sessionId: session.id, family: browser.family, version: browser.version, platform: platform.platformType },
        'Emulated session created'
    );
    return session;
}

/**
 * Draw a persona from the corpus, loading the corpus file on first use.
 */
export async function createSession(corpus: IdentityCorpus, options: SessionOptions = {}): Promise<EmulatedSession> {
    await corpus.ensureLoaded();
    const entry = corpus.draw();
    return sessionFromIdentity(entry.identityString, options);
}
