/**
 * ESPN soccer page
 */
import * as cheerio from 'cheerio';
import { collectText, pageTitle } from '../base.extractor.js';
import type { Extractor, ExtractedPage } from '../types.js';

const HEADLINE_LIMIT = 5;

export const espnExtractor: Extractor = {
    id: 'espn',
    site: 'ESPN',

    extract(html: string): ExtractedPage {
        const $ = cheerio.load(html);
        return {
            site: this.site,
            title: pageTitle($),
            collections: {
                articles: [],
                headlines: collectText($, 'h1', HEADLINE_LIMIT),
            },
            fields: {},
        };
    },
};
