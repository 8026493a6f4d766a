/**
 * SheetSource - Reads token references from a Google Sheets spreadsheet
 * through its CSV export
 */

import nodeFetch from 'node-fetch';
import { logger } from '../utils/logger';
import { parseCsv } from '../utils/csv';
import { HttpFetch } from '../artifacts/writer/ArtifactWriter';
import { errorMessage, InvalidInputError, UpstreamError } from '../artifacts/core/errors';
import { NftUrlParser, TokenReference } from './NftUrlParser';

export interface SheetRowReference extends TokenReference {
    /** 1-based row number in the sheet */
    row: number;
}

export interface SheetSkip {
    row: number;
    reason: string;
}

export interface SheetSelection {
    totalRows: number;
    references: SheetRowReference[];
    skipped: SheetSkip[];
}

export interface SheetWindow {
    /** 1-based row to start from */
    start?: number;
    /** Number of valid references to take, all when absent */
    count?: number;
}

/**
 * Convert a Google Sheets URL to its CSV export URL.
 * The sheet id (gid) comes from the fragment, else the query, else 0.
 */
export function toCsvExportUrl(sheetsUrl: string): string {
    const idMatch = /\/spreadsheets\/d\/([a-zA-Z0-9-_]+)/.exec(sheetsUrl);
    if (!idMatch) {
        throw new InvalidInputError(`Could not extract spreadsheet ID from URL: ${sheetsUrl}`);
    }

    let gid = '0';
    try {
        const parsed = new URL(sheetsUrl);
        gid = parsed.searchParams.get('gid') || gid;
        const fragmentGid = /gid=(\d+)/.exec(parsed.hash);
        if (fragmentGid) {
            gid = fragmentGid[1];
        }
    } catch {
        logger.debug('Sheet URL is not absolute, using first sheet', { sheetsUrl });
    }

    return `https://docs.google.com/spreadsheets/d/${idMatch[1]}/export?format=csv&gid=${gid}`;
}

/**
 * Pick the rows to process: empty and unparseable rows are skipped, and
 * only `count` valid references are taken
 */
export function selectReferences(rows: string[][], window: SheetWindow = {}): SheetSelection {
    const startIndex = Math.max((window.start ?? 1) - 1, 0);
    const references: SheetRowReference[] = [];
    const skipped: SheetSkip[] = [];

    for (let index = startIndex; index < rows.length; index++) {
        if (window.count !== undefined && references.length >= window.count) {
            break;
        }

        const row = rows[index];
        const rowNumber = index + 1;

        if (row.every((cell) => cell.trim() === '')) {
            skipped.push({ row: rowNumber, reason: 'empty row' });
            continue;
        }

        const reference = NftUrlParser.fromRow(row);
        if (!reference) {
            logger.warn(`Row ${rowNumber}: No valid NFT URL found`, { row });
            skipped.push({ row: rowNumber, reason: 'no valid NFT reference' });
            continue;
        }

        references.push({ row: rowNumber, ...reference });
    }

    return { totalRows: rows.length, references, skipped };
}

export class SheetSource {
    private readonly http: HttpFetch;

    constructor(options: { fetch?: HttpFetch } = {}) {
        this.http = options.fetch || nodeFetch;
    }

    async fetchRows(sheetsUrl: string): Promise<string[][]> {
        const csvUrl = toCsvExportUrl(sheetsUrl);
        logger.info('📄 Fetching spreadsheet', { csvUrl });

        let text: string;
        try {
            const response = await this.http(csvUrl);
            if (!response.ok) {
                throw new UpstreamError(`Failed to fetch CSV. Status code: ${response.status}`, response.status);
            }
            text = await response.text();
        } catch (error) {
            if (error instanceof UpstreamError) {
                throw error;
            }
            throw new UpstreamError(`Exception fetching CSV: ${errorMessage(error)}`);
        }

        const rows = parseCsv(text);
        logger.info(`Found ${rows.length} total rows in spreadsheet`);
        return rows;
    }

    async load(sheetsUrl: string, window: SheetWindow = {}): Promise<SheetSelection> {
        const rows = await this.fetchRows(sheetsUrl);
        return selectReferences(rows, window);
    }
}
