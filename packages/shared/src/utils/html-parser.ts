import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';

export class HtmlParser {
    private readonly $: CheerioAPI;

    constructor(html: string) {
        this.$ = cheerio.load(html);
    }

    /**
     * Get text content from a selector
     */
    getText(selector: string): string | null {
        return this.$(selector).first().text().trim() || null;
    }

    /**
     * Get attribute value from a selector
     */
    getAttribute(selector: string, attr: string): string | null {
        return this.$(selector).first().attr(attr) || null;
    }

    /**
     * Get all text content from multiple elements
     */
    getAllText(selector: string): string[] {
        const results: string[] = [];
        this.$(selector).each((_, el) => {
            const text = this.$(el).text().trim();
            if (text) results.push(text);
        });
        return results;
    }

    /**
     * Text of the first `target` inside the first `region` under `scope`
     * whose `heading` reads exactly `title`.
     */
    getTextUnderHeading(scope: string, region: string, heading: string, title: string, target: string): string | null {
        let found: string | null = null;
        this.$(scope).first().find(region).each((_, el) => {
            const section = this.$(el);
            if (section.find(heading).first().text().trim() !== title) {
                return;
            }
            const match = section.find(target).first();
            if (match.length > 0) {
                found = match.text();
                return false;
            }
        });
        return found;
    }

    /**
     * Check if element exists
     */
    exists(selector: string): boolean {
        return this.$(selector).length > 0;
    }

    /**
     * Get raw HTML
     */
    getHtml(selector?: string): string {
        return selector ? this.$(selector).html() || '' : this.$.html();
    }
}
