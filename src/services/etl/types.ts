/**
 * Data shapes flowing through extract → transform → load
 */

import type { DataType, Platform } from '../../config/mappings/columns.js';
import type { CalendarDate } from '../../utils/dateHelpers.js';
import type { CellValue } from '../../utils/sheetValues.js';
import type { STAGE_LABELS } from '../../config/etl.js';

// ============================================
// RAW
// ============================================

/**
 * First worksheet of one export, as a cell grid.
 * Row 0 is whatever the file starts with; the transformer decides where
 * the header is.
 */
export interface RawTable {
    fileName: string;
    dataType: DataType;
    platform: Platform;
    grid: CellValue[][];
    /** Workbook uses the 1904 date system for serial dates */
    date1904: boolean;
}

export type PlatformTables = Record<Platform, RawTable>;

export type ExtractedData = Record<DataType, PlatformTables>;

// ============================================
// CANONICAL
// ============================================

export type Stage = typeof STAGE_LABELS[keyof typeof STAGE_LABELS];

export interface KeywordRow {
    Date: CalendarDate;
    Rank_1: number;
    Rank_2_3: number;
    Rank_4_10: number;
    Rank_11_30: number;
    Rank_31_100: number;
    Rank_100_Plus: number;
    Platform: Platform;
    Stage: Stage;
}

export interface InstallRow {
    Date: CalendarDate;
    Installs: number;
    Platform: Platform;
    Stage: Stage;
}

export interface UserRow {
    Date: CalendarDate;
    Active_Users: number;
    Platform: Platform;
    Notes: string;
    Stage: Stage;
}

export interface ForecastRow {
    Date: CalendarDate;
    Installs: number;
    Platform: Platform;
}

/**
 * All canonical rows of one data type, both platforms concatenated
 * (Apple first), with the column order used for writing.
 */
export interface MergedTable<R> {
    dataType: DataType;
    columns: ReadonlyArray<keyof R & string>;
    rows: R[];
}

export interface MergedTables {
    keywords: MergedTable<KeywordRow>;
    installs: MergedTable<InstallRow>;
    users: MergedTable<UserRow>;
}
