/**
 * ETL Pipeline Configuration
 *
 * Document names, worksheet names, control cells and business constants
 * for the daily app-store analytics run.
 *
 * TO CHANGE PIPELINE SETTINGS:
 * Simply update the values below. Changes take effect on the next run.
 */

import type { DataType } from './mappings/columns.js';

// ============================================
// GOOGLE API
// ============================================

/**
 * Scopes requested for the service account.
 * Drive needs full access to read the export folder and locate documents by name.
 */
export const GOOGLE_API_SCOPES = [
    'https://www.googleapis.com/auth/spreadsheets',
    'https://www.googleapis.com/auth/drive',
] as const;

/** Mime type Drive uses for native Google Sheets documents */
export const GOOGLE_SHEETS_MIME_TYPE = 'application/vnd.google-apps.spreadsheet';

/** Format requested when exporting a native Google Sheet from the export folder */
export const XLSX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

// ============================================
// DOCUMENTS
// ============================================

/**
 * Drive names used to locate documents when no ID is configured
 */
export const DOCUMENT_NAMES = {
    CONTROL_PANEL: '00_Control_Panel',
    MASTER: 'MASTER_DATA_CLEAN',
    ARCHIVE: '02_Data_Lake_Historic',
} as const;

// ============================================
// CONTROL PANEL
// ============================================

/** Worksheet holding the switches */
export const CONTROL_SHEET_NAME = 'Config';

/**
 * Switch cells, one per row in column B.
 * B3 gates the whole run; the others toggle optional stages.
 */
export const CONTROL_CELLS = {
    PIPELINE: 'B3',
    BACKUP: 'B4',
    ALERTS: 'B5',
    FORECAST: 'B6',
} as const;

/** Single read covering every switch cell */
export const CONTROL_RANGE = `${CONTROL_SHEET_NAME}!${CONTROL_CELLS.PIPELINE}:${CONTROL_CELLS.FORECAST}`;

/** Values that switch a cell on (compared upper-cased) */
export const ENABLED_FLAG_VALUES: readonly string[] = ['ON', 'TRUE'];

// ============================================
// DESTINATION WORKSHEETS
// ============================================

/** Always-current worksheet per data type in the master spreadsheet */
export const DESTINATION_SHEETS: Record<DataType, string> = {
    keywords: 'KEYWORDS',
    installs: 'INSTALLS',
    users: 'USERS',
};

/** Installs forecast worksheet in the master spreadsheet */
export const FORECAST_SHEET_NAME = 'FORECAST';

// ============================================
// BUSINESS RULES
// ============================================

/**
 * First day the agency worked on the listing.
 * Rows strictly before this date are "Pre-Agencia", the rest "Con-Agencia".
 */
export const AGENCY_START_DATE = '2025-07-15';

export const STAGE_LABELS = {
    BEFORE: 'Pre-Agencia',
    AFTER: 'Con-Agencia',
} as const;

/**
 * The App Store Connect active-users export starts with a title block.
 * The header row comes right after these rows.
 */
export const APPLE_USERS_METADATA_ROWS = 4;

// ============================================
// FORECAST
// ============================================

/** How far back (in days) installs are used to fit the trend */
export const FORECAST_TRAINING_DAYS = 120;

// ============================================
// SCHEDULING
// ============================================

/** Zone used to decide which calendar day a run belongs to */
export const DEFAULT_PIPELINE_TIMEZONE = 'Europe/Paris';
