/**
 * File Store Gateway
 *
 * The only surface the pipeline uses to reach Google Drive and Google Sheets.
 * GoogleFileStore delegates to the Drive and Sheets clients; tests swap in
 * an in-memory implementation of the same interface.
 */

import type { DriveClient } from './googleDriveClient.js';
import type { SheetsClient } from './googleSheetsClient.js';
import type { SheetValue } from '../utils/sheetValues.js';

// ============================================
// TYPES
// ============================================

export interface DriveFile {
    id: string;
    name: string;
    mimeType: string;
    modifiedTime?: string;
}

export interface WorksheetInfo {
    sheetId: number;
    title: string;
    rowCount: number;
    columnCount: number;
}

export interface FileStoreGateway {
    /** Files directly inside a folder, most recently modified first */
    listFolder(folderId: string): Promise<DriveFile[]>;
    /** First non-trashed file with this exact name (optionally of a mime type) */
    findFileByName(name: string, mimeType?: string): Promise<DriveFile | null>;
    /** File contents; native Google Sheets are exported as XLSX */
    downloadFile(file: DriveFile): Promise<Buffer>;

    /** Formatted values of an A1 range; empty cells are empty strings */
    readRange(spreadsheetId: string, range: string): Promise<string[][]>;
    listWorksheets(spreadsheetId: string): Promise<WorksheetInfo[]>;
    addWorksheet(spreadsheetId: string, title: string, rowCount: number, columnCount: number): Promise<WorksheetInfo>;
    deleteWorksheet(spreadsheetId: string, sheetId: number): Promise<void>;
    resizeWorksheet(spreadsheetId: string, sheetId: number, rowCount: number, columnCount: number): Promise<void>;
    clearWorksheet(spreadsheetId: string, title: string): Promise<void>;
    /** Write a block of values starting at A1 */
    writeValues(spreadsheetId: string, title: string, values: SheetValue[][]): Promise<void>;
}

// ============================================
// GOOGLE IMPLEMENTATION
// ============================================

export class GoogleFileStore implements FileStoreGateway {
    constructor(
        private readonly drive: DriveClient,
        private readonly sheets: SheetsClient,
    ) {}

    listFolder(folderId: string): Promise<DriveFile[]> {
        return this.drive.listFolder(folderId);
    }

    findFileByName(name: string, mimeType?: string): Promise<DriveFile | null> {
        return this.drive.findFileByName(name, mimeType);
    }

    downloadFile(file: DriveFile): Promise<Buffer> {
        return this.drive.downloadFile(file);
    }

    readRange(spreadsheetId: string, range: string): Promise<string[][]> {
        return this.sheets.readRange(spreadsheetId, range);
    }

    listWorksheets(spreadsheetId: string): Promise<WorksheetInfo[]> {
        return this.sheets.listWorksheets(spreadsheetId);
    }

    addWorksheet(spreadsheetId: string, title: string, rowCount: number, columnCount: number): Promise<WorksheetInfo> {
        return this.sheets.addWorksheet(spreadsheetId, title, rowCount, columnCount);
    }

    deleteWorksheet(spreadsheetId: string, sheetId: number): Promise<void> {
        return this.sheets.deleteWorksheet(spreadsheetId, sheetId);
    }

    resizeWorksheet(spreadsheetId: string, sheetId: number, rowCount: number, columnCount: number): Promise<void> {
        return this.sheets.resizeWorksheet(spreadsheetId, sheetId, rowCount, columnCount);
    }

    clearWorksheet(spreadsheetId: string, title: string): Promise<void> {
        return this.sheets.clearWorksheet(spreadsheetId, title);
    }

    writeValues(spreadsheetId: string, title: string, values: SheetValue[][]): Promise<void> {
        return this.sheets.writeValues(spreadsheetId, title, values);
    }
}

// ============================================
// HELPERS
// ============================================

/**
 * Quote a worksheet title for use in an A1 range
 */
export function quoteSheetTitle(title: string): string {
    return `'${title.replace(/'/g, "''")}'`;
}

/**
 * Find a worksheet by exact title
 */
export async function findWorksheet(
    gateway: FileStoreGateway,
    spreadsheetId: string,
    title: string
): Promise<WorksheetInfo | null> {
    const worksheets = await gateway.listWorksheets(spreadsheetId);
    return worksheets.find(ws => ws.title === title) ?? null;
}
