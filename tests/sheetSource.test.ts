/**
 * Tests for SheetSource and the sheet command line
 */

import { RequestInit, Response } from 'node-fetch';
import { selectReferences, SheetSource, toCsvExportUrl } from '../src/batch';
import { InvalidInputError, UpstreamError } from '../src/artifacts';
import { parseSheetArguments } from '../src/sheet';
import { textResponse } from './helpers/http';

const CONTRACT = '0x' + 'ab'.repeat(20);
const SHEET_ID = 'abc-123_X';
const EXPORT_URL = `https://docs.google.com/spreadsheets/d/${SHEET_ID}/export?format=csv&gid=0`;

describe('toCsvExportUrl', () => {
  it('should default to the first sheet', () => {
    expect(toCsvExportUrl(`https://docs.google.com/spreadsheets/d/${SHEET_ID}/edit`)).toBe(EXPORT_URL);
  });

  it('should take the sheet id from the query or the fragment', () => {
    const base = `https://docs.google.com/spreadsheets/d/${SHEET_ID}/edit`;
    expect(toCsvExportUrl(`${base}?gid=7`)).toBe(EXPORT_URL.replace('gid=0', 'gid=7'));
    expect(toCsvExportUrl(`${base}#gid=456`)).toBe(EXPORT_URL.replace('gid=0', 'gid=456'));
    expect(toCsvExportUrl(`${base}?gid=7#gid=9`)).toBe(EXPORT_URL.replace('gid=0', 'gid=9'));
  });

  it('should reject URLs without a spreadsheet id', () => {
    expect(() => toCsvExportUrl('https://example.com/sheet')).toThrow(InvalidInputError);
  });
});

describe('selectReferences', () => {
  const rows = [['Link'], [`${CONTRACT}/1`], ['', ' '], ['nonsense'], [`${CONTRACT}/2`], [`${CONTRACT}/3`]];

  it('should skip empty and unparseable rows', () => {
    expect(selectReferences(rows)).toEqual({
      totalRows: 6,
      references: [
        { row: 2, contractAddress: CONTRACT, tokenId: '1' },
        { row: 5, contractAddress: CONTRACT, tokenId: '2' },
        { row: 6, contractAddress: CONTRACT, tokenId: '3' },
      ],
      skipped: [
        { row: 1, reason: 'no valid NFT reference' },
        { row: 3, reason: 'empty row' },
        { row: 4, reason: 'no valid NFT reference' },
      ],
    });
  });

  it('should start at a row and take count valid references', () => {
    expect(selectReferences(rows, { start: 3, count: 1 })).toEqual({
      totalRows: 6,
      references: [{ row: 5, contractAddress: CONTRACT, tokenId: '2' }],
      skipped: [
        { row: 3, reason: 'empty row' },
        { row: 4, reason: 'no valid NFT reference' },
      ],
    });
  });

  it('should select nothing past the last row', () => {
    expect(selectReferences(rows, { start: 10 }).references).toEqual([]);
  });
});

describe('SheetSource', () => {
  it('should download the CSV export and select references', async () => {
    const fetch = jest.fn(async (_url: string, _init?: RequestInit): Promise<Response> =>
      textResponse(`url\n"${CONTRACT}/8"\n`),
    );
    const source = new SheetSource({ fetch });

    const selection = await source.load(`https://docs.google.com/spreadsheets/d/${SHEET_ID}/edit`);

    expect(fetch.mock.calls[0][0]).toBe(EXPORT_URL);
    expect(selection.references).toEqual([{ row: 2, contractAddress: CONTRACT, tokenId: '8' }]);
  });

  it('should fail with UpstreamError when the export is not available', async () => {
    const fetch = jest.fn(async (_url: string, _init?: RequestInit): Promise<Response> => textResponse('no', 403));
    const source = new SheetSource({ fetch });

    const load = source.load(`https://docs.google.com/spreadsheets/d/${SHEET_ID}/edit`);

    await expect(load).rejects.toThrow(UpstreamError);
    await expect(load).rejects.toThrow('Failed to fetch CSV. Status code: 403');
  });
});

describe('parseSheetArguments', () => {
  const url = `https://docs.google.com/spreadsheets/d/${SHEET_ID}/edit`;

  it('should default to the first row and every reference', () => {
    expect(parseSheetArguments([url])).toEqual({ url, start: 1, count: undefined });
  });

  it('should read --start and --count', () => {
    expect(parseSheetArguments([url, '--start', '3', '--count', '2'])).toEqual({ url, start: 3, count: 2 });
  });

  it('should reject bad arguments', () => {
    expect(() => parseSheetArguments([])).toThrow(InvalidInputError);
    expect(() => parseSheetArguments([url, '--count', '0'])).toThrow(InvalidInputError);
    expect(() => parseSheetArguments([url, '--bogus'])).toThrow(InvalidInputError);
  });
});
