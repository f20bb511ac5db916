import logger from '../utils/logger.js';
import { officialBrand } from './browser-family.js';
import { defaultRandom, pickOne, randomInt, shuffle, type RandomSource } from './random.js';
import type { BrowserFacts, ClientHintBrand } from './types.js';

/** Characters Chromium scatters through its fake brand name. */
export const BRAND_FILLERS: readonly string[] = ['', ' ', '_', ';', '(', ')'];

export const FAKE_BRAND_VERSION_RANGE = { min: 1, max: 100 } as const;

/**
 * "Not?A?Brand" with independently drawn filler characters.
 */
export function synthesizeFakeBrand(random: RandomSource = defaultRandom): string {
    const filler = () => pickOne(random, BRAND_FILLERS);
    return `${filler()}Not${filler()}A${filler()}Brand`;
}

/**
 * Build the shuffled three-entry brand list a Chromium-based browser sends in
 * `sec-ch-ua`. Returns null for browsers that are not Chromium-based.
 */
export function synthesizeClientHints(
    facts: BrowserFacts,
    random: RandomSource = defaultRandom
): ClientHintBrand[] | null {
    if (facts.chromiumVersion < 0) {
        return null;
    }

    const brand = officialBrand(facts.family);
    if (!brand) {
        logger.debug({ family: facts.family }, 'Chromium version present without a Chromium brand');
        return null;
    }

    const brands: ClientHintBrand[] = [
        {
            brand: synthesizeFakeBrand(random),
            version: randomInt(random, FAKE_BRAND_VERSION_RANGE.min, FAKE_BRAND_VERSION_RANGE.max)
        },
        { brand, version: facts.version },
        { brand: 'Chromium', version: facts.chromiumVersion }
    ];

    // Real browsers randomize brand order per session
    return shuffle(random, brands);
}

/**
 * `"<brand>"; v="<version>"` entries joined with ", ".
 */
export function formatClientHints(brands: readonly ClientHintBrand[]): string {
    return brands.map(({ brand, version }) => `"${brand}"; v="${version}"`).join(', ');
}
