export enum BrowserFamily {
    NONE = 'none',
    CHROME = 'chrome',
    EDGE = 'edge',
    FIREFOX = 'firefox',
    OPERA = 'opera',
    SAFARI = 'safari'
}

/** Substring each family announces itself with in an identity string. */
export const FAMILY_TOKENS: Readonly<Record<Exclude<BrowserFamily, BrowserFamily.NONE>, string>> = {
    [BrowserFamily.CHROME]: 'Chrome',
    [BrowserFamily.EDGE]: 'Edg',
    [BrowserFamily.FIREFOX]: 'Firefox',
    [BrowserFamily.OPERA]: 'OPR',
    [BrowserFamily.SAFARI]: 'Safari'
};

const CHROMIUM_BRANDS: Readonly<Partial<Record<BrowserFamily, string>>> = {
    [BrowserFamily.CHROME]: 'Google Chrome',
    [BrowserFamily.EDGE]: 'Microsoft Edge',
    [BrowserFamily.OPERA]: 'Opera'
};

/**
 * Display name a Chromium derivative puts in its client-hint brand list.
 * Firefox and Safari carry no Chromium branding.
 */
export function officialBrand(family: BrowserFamily): string | null {
    return CHROMIUM_BRANDS[family] ?? null;
}
