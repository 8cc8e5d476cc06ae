/**
 * Transfermarkt
 * Player links become transfer snippets; rows of the `table.items` listing
 * become player candidates for the records store.
 */
import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { pageTitle } from '../base.extractor.js';
import type { Extractor, ExtractedPage } from '../types.js';
import type { PlayerCandidate } from '../../harvest/types.js';

const LINK_LIMIT = 10;
const PLAYER_LIMIT = 25;
const PLAYER_PATH = /player|spieler/i;

function collectTransfers($: CheerioAPI): string[] {
    return $('a')
        .toArray()
        .slice(0, LINK_LIMIT)
        .map(element => $(element))
        .filter(link => PLAYER_PATH.test(link.attr('href') ?? ''))
        .map(link => link.text().trim())
        .filter(text => text.length > 0);
}

// A bare age, or the age in parentheses after a date of birth: "Mar 4, 2001 (25)"
const AGE_CELL = /^(\d{1,2})$|\((\d{1,2})\)$/;

function parseAge(cells: string[]): number | null {
    for (const text of cells) {
        const match = AGE_CELL.exec(text);
        const age = match?.[1] ?? match?.[2];
        if (age !== undefined) {
            return Number.parseInt(age, 10);
        }
    }
    return null;
}

export function collectPlayers($: CheerioAPI): PlayerCandidate[] {
    const players: PlayerCandidate[] = [];

    for (const row of $('table.items > tbody > tr').toArray().slice(0, PLAYER_LIMIT)) {
        const $row = $(row);
        const name = $row.find('td.hauptlink a').first().text().trim();
        if (!name) {
            continue;
        }

        // The shirt number is centered too
        const centered = $row.find('td.zentriert').not('.rueckennummer').toArray().map(cell => $(cell).text().trim());
        const club = $row.find('td.zentriert a[title]').first().attr('title')?.trim() ?? '';

        players.push({ name, age: parseAge(centered), club });
    }

    return players;
}

export const transfermarktExtractor: Extractor = {
    id: 'transfermarkt',
    site: 'Transfermarkt',

    extract(html: string): ExtractedPage {
        const $ = cheerio.load(html);
        return {
            site: this.site,
            title: pageTitle($),
            collections: {
                articles: [],
                transfers: collectTransfers($),
            },
            fields: {
                players: collectPlayers($),
            },
        };
    },
};
