/**
 * Loader
 *
 * Writes the merged tables to the destination spreadsheet (one worksheet per
 * data type, overwritten on every run) and to the archive spreadsheet (one
 * worksheet per run date and data type).
 *
 * Re-running on the same date replaces that date's archive worksheets; other
 * dates are never touched.
 */

import { DATA_TYPES, type DataType } from '../../config/mappings/columns.js';
import { DESTINATION_SHEETS } from '../../config/etl.js';
import { formatCompactDate, type CalendarDate } from '../../utils/dateHelpers.js';
import { sheetsLogger } from '../../utils/logger.js';
import { sanitizeCell, type SheetValue } from '../../utils/sheetValues.js';
import { findWorksheet, type FileStoreGateway } from '../fileStore.js';
import type { MergedTable, MergedTables } from './types.js';

export type RowCounts = Record<DataType, number>;

// ============================================
// VALUES
// ============================================

/**
 * Header row followed by the sanitised rows, in column order
 */
export function tableToValues<R>(table: MergedTable<R>): SheetValue[][] {
    const header: SheetValue[] = [...table.columns];
    const body = table.rows.map(row => table.columns.map(column => sanitizeCell(row[column])));
    return [header, ...body];
}

/**
 * Values of one data type's table
 */
export function valuesFor(tables: MergedTables, dataType: DataType): SheetValue[][] {
    switch (dataType) {
        case 'keywords':
            return tableToValues(tables.keywords);
        case 'installs':
            return tableToValues(tables.installs);
        case 'users':
            return tableToValues(tables.users);
    }
}

/** Longest row of a block */
function widthOf(values: SheetValue[][]): number {
    return values.reduce((max, row) => Math.max(max, row.length), 0);
}

// ============================================
// WORKSHEET WRITES
// ============================================

/**
 * Replace the contents of a worksheet, creating or growing it as needed.
 * Stale cells outside the new block are cleared.
 */
export async function overwriteWorksheet(
    gateway: FileStoreGateway,
    spreadsheetId: string,
    title: string,
    values: SheetValue[][]
): Promise<void> {
    const rowCount = Math.max(values.length, 1);
    const columnCount = Math.max(widthOf(values), 1);

    const existing = await findWorksheet(gateway, spreadsheetId, title);
    if (!existing) {
        await gateway.addWorksheet(spreadsheetId, title, rowCount, columnCount);
    } else {
        if (existing.rowCount < rowCount || existing.columnCount < columnCount) {
            await gateway.resizeWorksheet(
                spreadsheetId,
                existing.sheetId,
                Math.max(existing.rowCount, rowCount),
                Math.max(existing.columnCount, columnCount)
            );
        }
        await gateway.clearWorksheet(spreadsheetId, title);
    }

    await gateway.writeValues(spreadsheetId, title, values);
}

/**
 * Overwrite the KEYWORDS / INSTALLS / USERS worksheets
 * @returns data rows written per data type
 */
export async function writeDestination(
    gateway: FileStoreGateway,
    spreadsheetId: string,
    tables: MergedTables
): Promise<RowCounts> {
    const counts: RowCounts = { keywords: 0, installs: 0, users: 0 };

    for (const dataType of DATA_TYPES) {
        const table = tables[dataType];
        const title = DESTINATION_SHEETS[dataType];
        await overwriteWorksheet(gateway, spreadsheetId, title, valuesFor(tables, dataType));
        counts[dataType] = table.rows.length;
        sheetsLogger.info({ worksheet: title, rows: table.rows.length }, 'Destination worksheet written');
    }

    return counts;
}

// ============================================
// ARCHIVE
// ============================================

/** `20260115_keywords` */
export function archiveSheetName(executionDate: CalendarDate, dataType: DataType): string {
    return `${formatCompactDate(executionDate)}_${dataType}`;
}

/**
 * Write one worksheet per data type named after the execution date.
 * A worksheet of the same name is deleted first, so the latest run of the
 * day wins.
 * @returns data rows archived per data type
 */
export async function writeArchive(
    gateway: FileStoreGateway,
    spreadsheetId: string,
    tables: MergedTables,
    executionDate: CalendarDate
): Promise<RowCounts> {
    const counts: RowCounts = { keywords: 0, installs: 0, users: 0 };

    for (const dataType of DATA_TYPES) {
        const table = tables[dataType];
        const title = archiveSheetName(executionDate, dataType);
        const values = valuesFor(tables, dataType);

        const existing = await findWorksheet(gateway, spreadsheetId, title);
        if (existing) {
            sheetsLogger.info({ worksheet: title }, 'Replacing archive worksheet from an earlier run');
            await gateway.deleteWorksheet(spreadsheetId, existing.sheetId);
        }

        await gateway.addWorksheet(spreadsheetId, title, table.rows.length + 1, table.columns.length);
        await gateway.writeValues(spreadsheetId, title, values);

        counts[dataType] = table.rows.length;
        sheetsLogger.info({ worksheet: title, rows: table.rows.length }, 'Archive worksheet written');
    }

    return counts;
}
