import { google } from 'googleapis';
import { IProductSource } from '../../domain/ports/IProductSource';
import { ProductFieldValue, ProductRecord } from '../../domain/entities/Product';
import { UpstreamRequestError } from '../../domain/errors';
import { toUpstreamError } from '../http/upstreamError';
import { ServiceAccountCredentials } from './credentials';

export interface SheetInfo {
    title: string;
    columnCount: number;
}

/**
 * The Sheets API calls the product source needs.
 */
export interface SpreadsheetApi {
    getFirstSheet(spreadsheetId: string): Promise<SheetInfo>;
    getValues(spreadsheetId: string, range: string): Promise<unknown[][]>;
    updateValue(spreadsheetId: string, range: string, value: string): Promise<void>;
}

/**
 * Products from the first worksheet of a Google Sheet.
 *
 * The first row holds the headers. Blank rows are skipped; each product remembers the sheet
 * row it came from so markProcessed writes to the right place.
 */
export class GoogleSheetsProductSource implements IProductSource {
    private sheet: SheetInfo | null = null;
    private sheetRows: number[] = [];

    constructor(
        private readonly api: SpreadsheetApi,
        private readonly spreadsheetId: string
    ) {
        if (!spreadsheetId) {
            throw new Error('Spreadsheet id is required');
        }
    }

    async listProducts(): Promise<ProductRecord[]> {
        const sheet = await this.getSheet();

        let rows: unknown[][];
        try {
            rows = await this.api.getValues(this.spreadsheetId, quoteSheetTitle(sheet.title));
        } catch (error) {
            throw toUpstreamError('GoogleSheets', error, 'Reading products');
        }

        const [headerRow = [], ...dataRows] = rows;
        const headers = headerRow.map(cell => (cell === null || cell === undefined ? '' : String(cell).trim()));

        const products: ProductRecord[] = [];
        const sheetRows: number[] = [];

        dataRows.forEach((row, index) => {
            if (row.every(cell => toFieldValue(cell) === null)) {
                return;
            }
            const record: Record<string, ProductFieldValue> = {};
            headers.forEach((header, column) => {
                if (header) {
                    record[header] = toFieldValue(row[column]);
                }
            });
            products.push(record);
            // +1 for the header row, +1 for 1-based sheet rows
            sheetRows.push(index + 2);
        });

        this.sheetRows = sheetRows;
        console.log(`[GoogleSheets] Retrieved ${products.length} products from "${sheet.title}"`);
        return products;
    }

    async markProcessed(rowIndex: number, timestamp: string): Promise<void> {
        const sheet = await this.getSheet();
        const row = this.sheetRows[rowIndex] ?? rowIndex + 2;
        const range = `${quoteSheetTitle(sheet.title)}!${columnLetter(sheet.columnCount)}${row}`;

        try {
            await this.api.updateValue(this.spreadsheetId, range, timestamp);
        } catch (error) {
            throw toUpstreamError('GoogleSheets', error, `Marking row ${row}`);
        }
    }

    private async getSheet(): Promise<SheetInfo> {
        if (!this.sheet) {
            try {
                this.sheet = await this.api.getFirstSheet(this.spreadsheetId);
            } catch (error) {
                throw toUpstreamError('GoogleSheets', error, 'Opening spreadsheet');
            }
            console.log(`[GoogleSheets] Connected to sheet "${this.sheet.title}"`);
        }
        return this.sheet;
    }
}

function toFieldValue(cell: unknown): ProductFieldValue {
    if (typeof cell === 'number' || typeof cell === 'boolean') {
        return cell;
    }
    if (typeof cell === 'string') {
        return cell.trim() === '' ? null : cell;
    }
    return null;
}

function quoteSheetTitle(title: string): string {
    return `'${title.replace(/'/g, "''")}'`;
}

/**
 * 1 -> A, 26 -> Z, 27 -> AA
 */
export function columnLetter(column: number): string {
    let letters = '';
    let remaining = Math.max(1, Math.floor(column));
    while (remaining > 0) {
        const offset = (remaining - 1) % 26;
        letters = String.fromCharCode(65 + offset) + letters;
        remaining = Math.floor((remaining - 1) / 26);
    }
    return letters;
}

/**
 * Builds a SpreadsheetApi on googleapis with service account credentials.
 */
export function createSpreadsheetApi(credentials: ServiceAccountCredentials): SpreadsheetApi {
    const auth = new google.auth.GoogleAuth({
        credentials,
        scopes: ['https://www.googleapis.com/auth/spreadsheets'],
    });
    const sheets = google.sheets({ version: 'v4', auth });

    return {
        async getFirstSheet(spreadsheetId) {
            const response = await sheets.spreadsheets.get({
                spreadsheetId,
                fields: 'sheets.properties',
            });
            const properties = response.data.sheets?.[0]?.properties;
            if (!properties?.title) {
                throw new UpstreamRequestError('GoogleSheets', `Spreadsheet ${spreadsheetId} has no worksheets`);
            }
            return {
                title: properties.title,
                columnCount: properties.gridProperties?.columnCount ?? 26,
            };
        },
        async getValues(spreadsheetId, range) {
            const response = await sheets.spreadsheets.values.get({
                spreadsheetId,
                range,
                valueRenderOption: 'UNFORMATTED_VALUE',
            });
            return response.data.values ?? [];
        },
        async updateValue(spreadsheetId, range, value) {
            await sheets.spreadsheets.values.update({
                spreadsheetId,
                range,
                valueInputOption: 'RAW',
                requestBody: { values: [[value]] },
            });
        },
    };
}
