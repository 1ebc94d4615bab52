/**
 * Google Sheets API v4 Client (Service Account)
 *
 * Read, write, create and delete worksheets in the control panel, master
 * and archive spreadsheets. Calls go through GoogleApiCaller.
 */

import type { sheets_v4 } from 'googleapis';
import { sheetsLogger } from '../utils/logger.js';
import { GoogleApiCaller, type ApiCallPolicy } from '../utils/googleApi.js';
import { TransportError } from '../utils/errors.js';
import type { SheetValue } from '../utils/sheetValues.js';
import { quoteSheetTitle, type WorksheetInfo } from './fileStore.js';

// ============================================
// HELPERS
// ============================================

function toWorksheetInfo(properties: sheets_v4.Schema$SheetProperties | undefined): WorksheetInfo | null {
    if (!properties || properties.sheetId === undefined || properties.sheetId === null || !properties.title) {
        return null;
    }
    return {
        sheetId: properties.sheetId,
        title: properties.title,
        rowCount: properties.gridProperties?.rowCount ?? 0,
        columnCount: properties.gridProperties?.columnCount ?? 0,
    };
}

// ============================================
// CLIENT
// ============================================

export class SheetsClient {
    private readonly caller: GoogleApiCaller;

    constructor(private readonly sheets: sheets_v4.Sheets, policy: ApiCallPolicy) {
        this.caller = new GoogleApiCaller('sheets', policy, sheetsLogger);
    }

    /**
     * Read a range from a spreadsheet.
     * @returns 2D array of strings (empty cells are empty strings)
     */
    async readRange(spreadsheetId: string, range: string): Promise<string[][]> {
        const response = await this.caller.call(
            `readRange(${range})`,
            () => this.sheets.spreadsheets.values.get({
                spreadsheetId,
                range,
                valueRenderOption: 'FORMATTED_VALUE',
            })
        );

        // Google Sheets API returns mixed types — coerce everything to strings
        const raw: unknown[][] = response.data.values ?? [];
        return raw.map(row => row.map(cell => String(cell ?? '')));
    }

    /**
     * Titles, IDs and grid sizes of every worksheet.
     */
    async listWorksheets(spreadsheetId: string): Promise<WorksheetInfo[]> {
        const response = await this.caller.call(
            `listWorksheets(${spreadsheetId})`,
            () => this.sheets.spreadsheets.get({
                spreadsheetId,
                includeGridData: false,
                fields: 'sheets.properties',
            })
        );

        const result: WorksheetInfo[] = [];
        for (const sheet of response.data.sheets ?? []) {
            const info = toWorksheetInfo(sheet.properties);
            if (info) result.push(info);
        }
        return result;
    }

    /**
     * Create a worksheet with the given grid size.
     */
    async addWorksheet(
        spreadsheetId: string,
        title: string,
        rowCount: number,
        columnCount: number
    ): Promise<WorksheetInfo> {
        const label = `addWorksheet(${title})`;
        const response = await this.caller.call(
            label,
            () => this.sheets.spreadsheets.batchUpdate({
                spreadsheetId,
                requestBody: {
                    requests: [{
                        addSheet: {
                            properties: {
                                title,
                                gridProperties: { rowCount, columnCount },
                            },
                        },
                    }],
                },
            })
        );

        const info = toWorksheetInfo(response.data.replies?.[0]?.addSheet?.properties);
        if (!info) {
            throw new TransportError(`Sheets ${label} returned no sheet properties`, 'sheets', label);
        }

        sheetsLogger.info({ spreadsheetId, title, rowCount, columnCount }, 'Created worksheet');
        return info;
    }

    /**
     * Delete a worksheet by numeric ID.
     */
    async deleteWorksheet(spreadsheetId: string, sheetId: number): Promise<void> {
        await this.caller.call(
            `deleteWorksheet(${sheetId})`,
            () => this.sheets.spreadsheets.batchUpdate({
                spreadsheetId,
                requestBody: {
                    requests: [{ deleteSheet: { sheetId } }],
                },
            })
        );

        sheetsLogger.info({ spreadsheetId, sheetId }, 'Deleted worksheet');
    }

    /**
     * Set the grid size of a worksheet.
     */
    async resizeWorksheet(
        spreadsheetId: string,
        sheetId: number,
        rowCount: number,
        columnCount: number
    ): Promise<void> {
        await this.caller.call(
            `resizeWorksheet(${sheetId})`,
            () => this.sheets.spreadsheets.batchUpdate({
                spreadsheetId,
                requestBody: {
                    requests: [{
                        updateSheetProperties: {
                            properties: {
                                sheetId,
                                gridProperties: { rowCount, columnCount },
                            },
                            fields: 'gridProperties(rowCount,columnCount)',
                        },
                    }],
                },
            })
        );
    }

    /**
     * Remove every value from a worksheet (formatting is kept).
     */
    async clearWorksheet(spreadsheetId: string, title: string): Promise<void> {
        await this.caller.call(
            `clearWorksheet(${title})`,
            () => this.sheets.spreadsheets.values.clear({
                spreadsheetId,
                range: quoteSheetTitle(title),
            })
        );
    }

    /**
     * Overwrite cells starting at A1. Values are stored as given (RAW).
     */
    async writeValues(spreadsheetId: string, title: string, values: SheetValue[][]): Promise<void> {
        await this.caller.call(
            `writeValues(${title})`,
            () => this.sheets.spreadsheets.values.update({
                spreadsheetId,
                range: `${quoteSheetTitle(title)}!A1`,
                valueInputOption: 'RAW',
                requestBody: { values },
            })
        );

        sheetsLogger.debug({ spreadsheetId, title, rows: values.length }, 'Wrote worksheet values');
    }
}
