/**
 * Extractor Tests
 * Baseline extraction, site-specific parsers and registry resolution
 */
import { describe, it, expect, vi } from 'vitest';
import {
    ExtractorRegistry,
    createBaselineExtractor,
    createDefaultRegistry,
    GENERIC_EXTRACTOR_ID,
    NO_TITLE,
} from '../../src/extractors/index.js';
import { bbcSportExtractor } from '../../src/extractors/sites/bbc-sport.extractor.js';
import { skySportsExtractor } from '../../src/extractors/sites/sky-sports.extractor.js';
import { espnExtractor } from '../../src/extractors/sites/espn.extractor.js';
import { transfermarktExtractor } from '../../src/extractors/sites/transfermarkt.extractor.js';
import { ConfigurationError, ExtractionError } from '../../src/harvest/errors.js';
import type { Provenance } from '../../src/harvest/types.js';

vi.mock('../../src/observability/logger.js', () => {
    const mockLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn() };
    mockLogger.child.mockReturnValue(mockLogger);
    return { logger: mockLogger, createLogger: () => mockLogger };
});

const provenance: Provenance = {
    statusCode: 200,
    responseTimeMs: 42,
    capturedAt: '2026-01-01T00:00:00.000Z',
};

function headings(tag: string, count: number, prefix = 'Story'): string {
    return Array.from({ length: count }, (_, i) => `<${tag}>  ${prefix} ${i + 1}  </${tag}>`).join('');
}

describe('Baseline extractor', () => {
    const generic = createBaselineExtractor({ id: 'generic', site: 'Ad hoc' });

    it('should return "No title" and no articles for a page without title or headings', () => {
        const page = generic.extract('<html><body><p>Nothing to see</p></body></html>');

        expect(page.title).toBe(NO_TITLE);
        expect(page.collections.articles).toEqual([]);
        expect(page.site).toBe('Ad hoc');
    });

    it('should trim the title and cap articles at ten', () => {
        const page = generic.extract(`<html><head><title>  Match Day </title></head><body>${headings('h3', 12)}</body></html>`);

        expect(page.title).toBe('Match Day');
        expect(page.collections.articles).toHaveLength(10);
        expect(page.collections.articles[0]).toBe('Story 1');
        expect(page.collections.articles[9]).toBe('Story 10');
    });

    it('should drop headings that are empty after trimming', () => {
        const page = generic.extract('<h3>   </h3><h3>Goal!</h3>');

        expect(page.collections.articles).toEqual(['Goal!']);
    });

    it('should keep an empty title as an empty string', () => {
        const page = generic.extract('<html><head><title></title></head><body></body></html>');

        expect(page.title).toBe('');
    });
});

describe('Site extractors', () => {
    it('should read BBC Sport promo headings and up to five h2 headlines', () => {
        const html = `
            <title>BBC Sport - Football</title>
            <h3 class="gs-c-promo-heading__title">Late winner at the Lane</h3>
            <div data-testid="card-headline">Cup draw made</div>
            <h3>Unrelated heading</h3>
            ${headings('h2', 7, 'Headline')}
        `;
        const page = bbcSportExtractor.extract(html);

        expect(page.site).toBe('BBC Sport');
        expect(page.collections.articles).toEqual(['Late winner at the Lane', 'Cup draw made']);
        expect(page.collections.headlines).toEqual(['Headline 1', 'Headline 2', 'Headline 3', 'Headline 4', 'Headline 5']);
    });

    it('should put Sky Sports h3 text under news', () => {
        const page = skySportsExtractor.extract(`<title>Sky</title>${headings('h3', 3, 'News')}`);

        expect(page.collections.articles).toEqual([]);
        expect(page.collections.news).toEqual(['News 1', 'News 2', 'News 3']);
    });

    it('should collect ESPN h1 headlines', () => {
        const page = espnExtractor.extract(headings('h1', 6, 'Top'));

        expect(page.title).toBe(NO_TITLE);
        expect(page.collections.headlines).toHaveLength(5);
        expect(page.collections.headlines?.[4]).toBe('Top 5');
    });

    it('should collect Transfermarkt player links and player rows', () => {
        const html = `
            <title>Transfermarkt</title>
            <a href="/news">News</a>
            <a href="/erling-example/profil/spieler/1">Erling Example</a>
            <a href="/player/2"> Kai Sample </a>
            <table class="items">
                <tbody>
                    <tr>
                        <td class="hauptlink"><a href="/spieler/1">Erling Example</a></td>
                        <td class="zentriert">FW</td>
                        <td class="zentriert">23</td>
                        <td class="zentriert"><a title="Example FC" href="/verein/1"></a></td>
                    </tr>
                    <tr>
                        <td class="hauptlink"><a href="/spieler/3">Nameless Age</a></td>
                        <td class="zentriert">-</td>
                    </tr>
                    <tr>
                        <td class="hauptlink"></td>
                        <td class="zentriert">30</td>
                    </tr>
                </tbody>
            </table>
        `;
        const page = transfermarktExtractor.extract(html);

        // Table links count towards the first ten anchors too
        expect(page.collections.transfers).toEqual(['Erling Example', 'Kai Sample', 'Erling Example', 'Nameless Age']);
        expect(page.fields.players).toEqual([
            { name: 'Erling Example', age: 23, club: 'Example FC' },
            { name: 'Nameless Age', age: null, club: '' },
        ]);
    });

    it('should read the Transfermarkt age from the birth date cell, not the shirt number', () => {
        const html = `
            <table class="items">
                <tbody>
                    <tr>
                        <td class="zentriert rueckennummer">9</td>
                        <td class="hauptlink"><a href="/spieler/4">Nine Example</a></td>
                        <td class="zentriert">Mar 4, 2001 (25)</td>
                        <td class="zentriert"><a title="Example FC" href="/verein/1"></a></td>
                    </tr>
                    <tr>
                        <td class="zentriert rueckennummer">7</td>
                        <td class="hauptlink"><a href="/spieler/5">Seven Sample</a></td>
                        <td class="zentriert">-</td>
                    </tr>
                </tbody>
            </table>
        `;

        expect(transfermarktExtractor.extract(html).fields.players).toEqual([
            { name: 'Nine Example', age: 25, club: 'Example FC' },
            { name: 'Seven Sample', age: null, club: '' },
        ]);
    });
});

describe('ExtractorRegistry', () => {
    it('should register every built-in extractor', () => {
        const registry = createDefaultRegistry();

        expect(registry.ids()).toEqual(['bbc_sport', 'sky_sports', 'espn', 'goal', 'transfermarkt', GENERIC_EXTRACTOR_ID]);
    });

    it('should reject duplicate registration', () => {
        const registry = new ExtractorRegistry().register(espnExtractor);

        expect(() => registry.register(espnExtractor)).toThrow(ConfigurationError);
    });

    it('should resolve extractor ids case-sensitively', () => {
        const registry = createDefaultRegistry();
        const sources = [{ id: 'bbc', url: 'https://example.test/bbc', extractorId: 'BBC_SPORT' }];

        expect(registry.has('bbc_sport')).toBe(true);
        expect(() => registry.assertResolvable(sources)).toThrow('No extractor registered for: bbc -> BBC_SPORT');
    });

    it('should wrap a successful extraction with provenance', () => {
        const registry = createDefaultRegistry();
        const source = { id: 'a', url: 'https://example.test/a', extractorId: GENERIC_EXTRACTOR_ID };

        const result = registry.extract(source, '<h3>Goal!</h3>', provenance);

        expect(result).toEqual({
            ok: true,
            record: {
                site: 'Ad hoc',
                title: NO_TITLE,
                collections: { articles: ['Goal!'] },
                fields: {},
                provenance,
            },
        });
    });

    it('should turn a throwing extractor into an ExtractionError value', () => {
        const registry = new ExtractorRegistry().register({
            id: 'broken',
            site: 'Broken',
            extract: () => { throw new TypeError('unexpected markup'); },
        });
        const source = { id: 'broken_site', url: 'https://example.test/broken', extractorId: 'broken' };

        const result = registry.extract(source, '<html></html>', provenance);

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error).toBeInstanceOf(ExtractionError);
            expect(result.error.sourceId).toBe('broken_site');
            expect(result.error.message).toBe('TypeError: unexpected markup');
        }
    });
});
