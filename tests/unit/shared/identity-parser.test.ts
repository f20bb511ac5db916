import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
    extractSystemInfo,
    parseBrowser,
    parseIdentity,
    parsePlatform,
    parseTokenVersion
} from '../../../packages/shared/src/identity/identity-parser.js';
import { BrowserFamily } from '../../../packages/shared/src/identity/browser-family.js';
import { ParseError } from '../../../packages/shared/src/types/errors.js';
import logger from '../../../packages/shared/src/utils/logger.js';
import { IDENTITIES } from '../../utils/test-helpers.js';

vi.mock('../../../packages/shared/src/utils/logger.js', () => ({
    default: {
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn()
    }
}));

describe('IdentityParser', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    describe('parseBrowser', () => {
        it('should detect Edge ahead of its Chrome token', () => {
            expect(parseBrowser(IDENTITIES.edgeWindows)).toEqual({
                family: BrowserFamily.EDGE,
                version: 119,
                chromiumVersion: 119
            });
        });

        it('should detect Opera with its own version and the Chromium version', () => {
            expect(parseBrowser(IDENTITIES.operaWindows)).toEqual({
                family: BrowserFamily.OPERA,
                version: 104,
                chromiumVersion: 118
            });
        });

        it('should detect Firefox without a Chromium version', () => {
            expect(parseBrowser(IDENTITIES.firefoxWindows)).toEqual({
                family: BrowserFamily.FIREFOX,
                version: 120,
                chromiumVersion: -1
            });
        });

        it('should detect plain Chrome', () => {
            expect(parseBrowser(IDENTITIES.chromeMac)).toEqual({
                family: BrowserFamily.CHROME,
                version: 120,
                chromiumVersion: 120
            });
        });

        it('should detect Safari from its trailing token when no Chrome token is present', () => {
            expect(parseBrowser(IDENTITIES.safariMac)).toEqual({
                family: BrowserFamily.SAFARI,
                version: 605,
                chromiumVersion: -1
            });
        });

        it('should report none for unknown clients without throwing', () => {
            expect(parseBrowser('curl/8.4.0')).toEqual({
                family: BrowserFamily.NONE,
                version: -1,
                chromiumVersion: -1
            });
            expect(parseBrowser('')).toEqual({
                family: BrowserFamily.NONE,
                version: -1,
                chromiumVersion: -1
            });
        });

        it('should never report Chrome for Edge or Opera identities', () => {
            const branded = [
                IDENTITIES.edgeWindows,
                IDENTITIES.operaWindows,
                'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36 Edg/121.0.2277.83',
                'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36 OPR/106.0.0.0'
            ];

            for (const identity of branded) {
                expect(parseBrowser(identity).family).not.toBe(BrowserFamily.CHROME);
            }
        });

        it('should degrade an unreadable version to unknown and keep going', () => {
            const facts = parseBrowser('Mozilla/5.0 (Windows NT 10.0) Chrome/abc.1 Safari/537.36');

            expect(facts).toEqual({
                family: BrowserFamily.CHROME,
                version: -1,
                chromiumVersion: -1
            });
            expect(logger.debug).toHaveBeenCalledWith(
                expect.objectContaining({ error: expect.objectContaining({ code: 'PARSE_ERROR' }) }),
                'Identity version unreadable, using unknown'
            );
        });

        it('should keep the family when only the branded version is unreadable', () => {
            expect(parseBrowser('Mozilla/5.0 (Windows NT 10.0) Chrome/119.0.0.0 Edg/')).toEqual({
                family: BrowserFamily.EDGE,
                version: -1,
                chromiumVersion: 119
            });
        });
    });

    describe('parseTokenVersion', () => {
        it('should return null when the token is absent', () => {
            expect(parseTokenVersion(IDENTITIES.firefoxWindows, 'Chrome')).toBeNull();
        });

        it('should read the major version after the separator', () => {
            expect(parseTokenVersion(IDENTITIES.edgeWindows, 'Edg')).toEqual({ ok: true, value: 119 });
        });

        it('should return a ParseError result for a non-numeric version', () => {
            const result = parseTokenVersion('Firefox/beta', 'Firefox');

            expect(result?.ok).toBe(false);
            if (result && !result.ok) {
                expect(result.error).toBeInstanceOf(ParseError);
                expect(result.error.field).toBe('version');
                expect(result.error.context).toEqual({ field: 'version', token: 'Firefox', raw: 'beta' });
            }
        });
    });

    describe('parsePlatform', () => {
        it('should split Windows system info around the first space', () => {
            expect(parsePlatform(IDENTITIES.edgeWindows)).toEqual({
                platformType: 'Windows NT 10.0',
                os: 'Windows',
                osVersion: 'NT 10.0; Win64; x64',
                isMobile: false
            });
        });

        it('should read the macOS version from the last token', () => {
            expect(parsePlatform(IDENTITIES.safariMac)).toEqual({
                platformType: 'Macintosh',
                os: 'Intel Mac OS X',
                osVersion: '10_15_7',
                isMobile: false
            });
        });

        it('should map X11 to Linux', () => {
            expect(parsePlatform(IDENTITIES.chromeLinux)).toEqual({
                platformType: 'Linux',
                os: 'Linux',
                osVersion: '',
                isMobile: false
            });
        });

        it('should fall back to the first token and warn for unknown system info', () => {
            expect(parsePlatform(IDENTITIES.chromeAndroid)).toEqual({
                platformType: 'Mozilla/5.0',
                os: '',
                osVersion: '',
                isMobile: true
            });
            expect(logger.warn).toHaveBeenCalledWith(
                { systemInfo: 'Linux; Android 10; K', identityString: IDENTITIES.chromeAndroid },
                'System info section of identity string cannot be parsed'
            );
        });

        it('should treat a string without parentheses as unknown system info', () => {
            expect(parsePlatform('curl/8.4.0').platformType).toBe('curl/8.4.0');
        });

        it('should return empty facts and warn for an empty identity string', () => {
            expect(parsePlatform('')).toEqual({
                platformType: '',
                os: '',
                osVersion: '',
                isMobile: false
            });
            expect(logger.warn).toHaveBeenCalledWith('The identity string is empty');
        });
    });

    describe('extractSystemInfo', () => {
        it('should take the first parenthesized section only', () => {
            expect(extractSystemInfo(IDENTITIES.chromeMac)).toBe('Macintosh; Intel Mac OS X 10_15_7');
        });

        it('should run to the end when the section is never closed', () => {
            expect(extractSystemInfo('Agent (X11; Linux')).toBe('X11; Linux');
        });
    });

    describe('parseIdentity', () => {
        it('should combine browser and platform facts', () => {
            const facts = parseIdentity(IDENTITIES.edgeWindows);

            expect(facts.browser.family).toBe(BrowserFamily.EDGE);
            expect(facts.browser.version).toBe(119);
            expect(facts.browser.chromiumVersion).toBe(119);
            expect(facts.platform.platformType).toBe('Windows NT 10.0');
            expect(facts.platform.isMobile).toBe(false);
        });
    });
});
