/**
 * Cell value types and the sanitiser applied before writing to Sheets
 */

/** A cell as read from an export */
export type CellValue = string | number | boolean | null;

/** A cell the Sheets API accepts in a RAW write */
export type SheetValue = string | number | boolean;

/**
 * Make a value safe for the Sheets API.
 * - NaN → empty cell
 * - ±Infinity → empty cell
 * - Date → ISO calendar date
 * - null / undefined → empty cell
 */
export function sanitizeCell(value: unknown): SheetValue {
    if (value === null || value === undefined) return '';
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : '';
    }
    if (typeof value === 'string' || typeof value === 'boolean') return value;
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? '' : value.toISOString().slice(0, 10);
    }
    return String(value);
}

/**
 * Normalise whatever the xlsx/csv readers produce into a CellValue.
 * Workbooks are read without `cellDates`, so date cells arrive as serial numbers.
 */
export function toCellValue(value: unknown): CellValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    return String(value);
}

/** True when a cell holds nothing visible */
export function isBlankCell(value: CellValue): boolean {
    return value === null || (typeof value === 'string' && value.trim() === '');
}
