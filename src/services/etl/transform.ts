/**
 * Transformation
 *
 * One procedure per data type: rename columns to the canonical schema,
 * normalise dates and metrics, derive the stage, then concatenate the
 * Apple and Google rows. Any bad value aborts the run; there is no
 * row-level recovery.
 */

import {
    PLATFORMS,
    getColumnMapping,
    getColumnsToKeep,
    normaliseHeader,
    type DataType,
    type Platform,
} from '../../config/mappings/columns.js';
import { AGENCY_START_DATE, APPLE_USERS_METADATA_ROWS, STAGE_LABELS } from '../../config/etl.js';
import { parseSourceDate, type CalendarDate } from '../../utils/dateHelpers.js';
import { DataError } from '../../utils/errors.js';
import { etlLogger } from '../../utils/logger.js';
import { isBlankCell, type CellValue } from '../../utils/sheetValues.js';
import type {
    ExtractedData,
    InstallRow,
    KeywordRow,
    MergedTable,
    MergedTables,
    PlatformTables,
    RawTable,
    Stage,
    UserRow,
} from './types.js';

// ============================================
// BUSINESS RULES
// ============================================

/**
 * Stage of a data point relative to the agency start date.
 * The start date itself already counts as "Con-Agencia".
 */
export function computeStage(date: CalendarDate): Stage {
    return date < AGENCY_START_DATE ? STAGE_LABELS.BEFORE : STAGE_LABELS.AFTER;
}

const DOTTED_THOUSANDS = /^[-+]?\d{1,3}(\.\d{3})+,\d+$/;
const COMMA_THEN_THREE_DIGITS = /^[-+]?\d+,\d{3}$/;

/**
 * Parse a metric cell. Text is read the French way: spaces (or dots before
 * a decimal comma) group thousands and the comma is the decimal separator.
 * Blank cells become NaN (written back as empty cells).
 *
 * "1,204" is rejected: it is 1.204 in French and 1204 in English.
 *
 * @throws DataError for text that is not a number
 */
export function parseMetric(value: CellValue): number {
    if (typeof value === 'number') return value;
    if (value === null || isBlankCell(value)) return NaN;
    if (typeof value === 'boolean') {
        throw new DataError(`Unparsable number: ${value}`, { value });
    }

    let cleaned = value.replace(/\s/g, '');
    if (DOTTED_THOUSANDS.test(cleaned)) {
        cleaned = cleaned.replace(/\./g, '');
    } else if (COMMA_THEN_THREE_DIGITS.test(cleaned)) {
        throw new DataError(`Ambiguous number: "${value}"`, { value });
    }
    cleaned = cleaned.replace(',', '.');
    if (!/^[-+]?\d+(\.\d+)?$/.test(cleaned)) {
        throw new DataError(`Unparsable number: "${value}"`, { value });
    }
    return Number(cleaned);
}

function cellToText(value: CellValue): string {
    return value === null ? '' : String(value).trim();
}

// ============================================
// COLUMN MAPPING
// ============================================

export interface MappedRecord {
    /** Canonical column → raw cell */
    values: Record<string, CellValue>;
    /** 1-based row number in the source file, for error messages */
    sourceRow: number;
}

/**
 * Index of the header row in an export's grid
 */
export function getHeaderRowIndex(dataType: DataType, platform: Platform): number {
    return dataType === 'users' && platform === 'Apple' ? APPLE_USERS_METADATA_ROWS : 0;
}

/**
 * Locate the mapped columns in the header row and re-key every data row by
 * canonical column name. Fully blank rows are dropped.
 *
 * @throws DataError when a required column is missing
 */
export function applyColumnMapping(table: RawTable): MappedRecord[] {
    const headerIndex = getHeaderRowIndex(table.dataType, table.platform);
    const headerRow = table.grid[headerIndex];
    if (!headerRow) {
        throw new DataError(`No header row in "${table.fileName}"`, {
            fileName: table.fileName,
            headerRow: headerIndex + 1,
        });
    }

    const header = headerRow.map(cell => normaliseHeader(cellToText(cell)));
    const positions = getColumnMapping(table.dataType, table.platform).map(entry => ({
        entry,
        index: header.indexOf(normaliseHeader(entry.source)),
    }));

    const missing = positions.filter(p => p.index < 0 && !p.entry.optional);
    if (missing.length > 0) {
        const names = missing.map(p => `"${p.entry.source}"`).join(', ');
        throw new DataError(`Missing expected column ${names} in "${table.fileName}"`, {
            fileName: table.fileName,
            missing: missing.map(p => p.entry.source),
            found: header,
        });
    }

    const records: MappedRecord[] = [];
    for (let i = headerIndex + 1; i < table.grid.length; i++) {
        const row = table.grid[i];
        if (row.every(isBlankCell)) continue;

        const values: Record<string, CellValue> = {};
        for (const { entry, index } of positions) {
            values[entry.target] = index >= 0 ? (row[index] ?? null) : null;
        }
        records.push({ values, sourceRow: i + 1 });
    }
    return records;
}

/**
 * Run a row conversion, prefixing data errors with file and row
 */
function convertRow<T>(table: RawTable, record: MappedRecord, convert: () => T): T {
    try {
        return convert();
    } catch (error: unknown) {
        if (error instanceof DataError) {
            throw new DataError(`${table.fileName} row ${record.sourceRow}: ${error.message}`, {
                ...error.details,
                fileName: table.fileName,
                row: record.sourceRow,
            });
        }
        throw error;
    }
}

/**
 * Apply a row builder to both platforms, Apple first
 */
function mergePlatforms<R>(
    tables: PlatformTables,
    build: (values: Record<string, CellValue>, table: RawTable) => R
): R[] {
    const rows: R[] = [];
    for (const platform of PLATFORMS) {
        const table = tables[platform];
        for (const record of applyColumnMapping(table)) {
            rows.push(convertRow(table, record, () => build(record.values, table)));
        }
    }
    return rows;
}

// ============================================
// PER DATA TYPE
// ============================================

export function transformKeywords(tables: PlatformTables): MergedTable<KeywordRow> {
    const rows = mergePlatforms<KeywordRow>(tables, (values, table) => {
        const date = parseSourceDate(values.Date, { date1904: table.date1904 });
        return {
            Date: date,
            Rank_1: parseMetric(values.Rank_1),
            Rank_2_3: parseMetric(values.Rank_2_3),
            Rank_4_10: parseMetric(values.Rank_4_10),
            Rank_11_30: parseMetric(values.Rank_11_30),
            Rank_31_100: parseMetric(values.Rank_31_100),
            Rank_100_Plus: parseMetric(values.Rank_100_Plus),
            Platform: table.platform,
            Stage: computeStage(date),
        };
    });
    return { dataType: 'keywords', columns: getColumnsToKeep('keywords'), rows };
}

export function transformInstalls(tables: PlatformTables): MergedTable<InstallRow> {
    const rows = mergePlatforms<InstallRow>(tables, (values, table) => {
        const date = parseSourceDate(values.Date, { date1904: table.date1904 });
        return {
            Date: date,
            Installs: parseMetric(values.Installs),
            Platform: table.platform,
            Stage: computeStage(date),
        };
    });
    return { dataType: 'installs', columns: getColumnsToKeep('installs'), rows };
}

/**
 * Active users. The Apple export carries a title block above its header
 * (see getHeaderRowIndex) and has no Notes column.
 */
export function transformUsers(tables: PlatformTables): MergedTable<UserRow> {
    const rows = mergePlatforms<UserRow>(tables, (values, table) => {
        const date = parseSourceDate(values.Date, { date1904: table.date1904 });
        return {
            Date: date,
            Active_Users: parseMetric(values.Active_Users),
            Platform: table.platform,
            Notes: cellToText(values.Notes ?? null),
            Stage: computeStage(date),
        };
    });
    return { dataType: 'users', columns: getColumnsToKeep('users'), rows };
}

/**
 * Transform every data type
 */
export function transformAll(extracted: ExtractedData): MergedTables {
    const tables: MergedTables = {
        keywords: transformKeywords(extracted.keywords),
        installs: transformInstalls(extracted.installs),
        users: transformUsers(extracted.users),
    };

    etlLogger.info({
        keywords: tables.keywords.rows.length,
        installs: tables.installs.rows.length,
        users: tables.users.rows.length,
    }, 'Transformation complete');

    return tables;
}
