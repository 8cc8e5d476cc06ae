/**
 * Sky Sports football page
 */
import * as cheerio from 'cheerio';
import { collectText, pageTitle, DEFAULT_ARTICLE_LIMIT } from '../base.extractor.js';
import type { Extractor, ExtractedPage } from '../types.js';

export const skySportsExtractor: Extractor = {
    id: 'sky_sports',
    site: 'Sky Sports',

    extract(html: string): ExtractedPage {
        const $ = cheerio.load(html);
        return {
            site: this.site,
            title: pageTitle($),
            // Sky lists news items, not promo articles
            collections: {
                articles: [],
                news: collectText($, 'h3', DEFAULT_ARTICLE_LIMIT),
            },
            fields: {},
        };
    },
};
