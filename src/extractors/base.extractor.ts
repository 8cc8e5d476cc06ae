/**
 * Baseline extraction shared by every source
 * Page title plus a bounded list of heading snippets as articles.
 */
import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { Extractor, ExtractedPage } from './types.js';

export const DEFAULT_ARTICLE_LIMIT = 10;
export const DEFAULT_HEADING_SELECTOR = 'h3';
export const NO_TITLE = 'No title';

/**
 * Title text, or "No title" when the page has no <title>
 */
export function pageTitle($: CheerioAPI): string {
    const title = $('title').first();
    return title.length > 0 ? title.text().trim() : NO_TITLE;
}

/**
 * Trimmed text of the first `limit` matches, empty ones dropped
 */
export function collectText($: CheerioAPI, selector: string, limit: number): string[] {
    return $(selector)
        .toArray()
        .slice(0, limit)
        .map(element => $(element).text().trim())
        .filter(text => text.length > 0);
}

export interface BaselineOptions {
    id: string;
    site: string;
    headingSelector?: string;
    limit?: number;
}

function extractBaseline($: CheerioAPI, options: BaselineOptions): ExtractedPage {
    return {
        site: options.site,
        title: pageTitle($),
        collections: {
            articles: collectText(
                $,
                options.headingSelector ?? DEFAULT_HEADING_SELECTOR,
                options.limit ?? DEFAULT_ARTICLE_LIMIT
            ),
        },
        fields: {},
    };
}

export function createBaselineExtractor(options: BaselineOptions): Extractor {
    return {
        id: options.id,
        site: options.site,
        extract(html: string): ExtractedPage {
            return extractBaseline(cheerio.load(html), options);
        },
    };
}
