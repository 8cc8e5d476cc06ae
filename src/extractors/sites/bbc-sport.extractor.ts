/**
 * BBC Sport football front page
 */
import * as cheerio from 'cheerio';
import { collectText, pageTitle, DEFAULT_ARTICLE_LIMIT } from '../base.extractor.js';
import type { Extractor, ExtractedPage } from '../types.js';

const PROMO_HEADING = 'h3.gs-c-promo-heading__title, [data-testid="card-headline"]';
const HEADLINE_LIMIT = 5;

export const bbcSportExtractor: Extractor = {
    id: 'bbc_sport',
    site: 'BBC Sport',

    extract(html: string): ExtractedPage {
        const $ = cheerio.load(html);
        return {
            site: this.site,
            title: pageTitle($),
            collections: {
                articles: collectText($, PROMO_HEADING, DEFAULT_ARTICLE_LIMIT),
                headlines: collectText($, 'h2', HEADLINE_LIMIT),
            },
            fields: {},
        };
    },
};
