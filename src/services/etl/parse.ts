/**
 * Source file parser
 *
 * Turns downloaded bytes into a cell grid. Two containers are accepted:
 *   - Excel workbooks (XLSX zip or legacy XLS), first worksheet only
 *   - Delimited text (comma or semicolon), optional UTF-8 BOM
 *
 * The format is detected from the file signature, not the extension, since
 * the store exports sometimes arrive renamed.
 */

import * as XLSX from 'xlsx';
import { parse } from 'csv-parse/sync';
import { ConfigurationError } from '../../utils/errors.js';
import { toCellValue, type CellValue } from '../../utils/sheetValues.js';

export type SourceFormat = 'workbook' | 'delimited';

export interface ParsedSheet {
    grid: CellValue[][];
    /** Serial dates count from 1904-01-01 (older Mac Excel workbooks) */
    date1904: boolean;
}

// ============================================
// FORMAT DETECTION
// ============================================

const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];
const OLE_SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0];

function startsWith(bytes: Buffer, signature: number[]): boolean {
    return bytes.length >= signature.length && signature.every((b, i) => bytes[i] === b);
}

export function detectFormat(bytes: Buffer): SourceFormat {
    if (startsWith(bytes, ZIP_SIGNATURE) || startsWith(bytes, OLE_SIGNATURE)) {
        return 'workbook';
    }
    return 'delimited';
}

// ============================================
// WORKBOOK
// ============================================

function parseWorkbook(fileName: string, bytes: Buffer): ParsedSheet {
    let workbook: XLSX.WorkBook;
    try {
        workbook = XLSX.read(bytes, { type: 'buffer', cellDates: false });
    } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Cannot read workbook "${fileName}": ${message}`, fileName);
    }

    const firstSheetName = workbook.SheetNames[0];
    const sheet = firstSheetName ? workbook.Sheets[firstSheetName] : undefined;
    if (!sheet) throw new ConfigurationError(`No worksheets found in "${fileName}"`, fileName);

    // Array of arrays (raw cell values); blank rows kept so row offsets stay stable
    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
        header: 1,
        raw: true,
        defval: null,
        blankrows: true,
    });

    return {
        grid: rows.map(row => row.map(toCellValue)),
        date1904: workbook.Workbook?.WBProps?.date1904 === true,
    };
}

// ============================================
// DELIMITED TEXT
// ============================================

const DELIMITER_SAMPLE_LINES = 10;

/**
 * Pick the delimiter that splits the opening lines into more fields.
 * Several lines are sampled because some exports open with a title line.
 * Separators inside quoted cells are not counted.
 */
export function detectDelimiter(text: string): ',' | ';' {
    let semicolons = 0;
    let commas = 0;
    let lines = 0;
    let quoted = false;

    for (const char of text) {
        if (char === '"') {
            quoted = !quoted;
        } else if (quoted) {
            continue;
        } else if (char === ';') {
            semicolons++;
        } else if (char === ',') {
            commas++;
        } else if (char === '\n' && ++lines >= DELIMITER_SAMPLE_LINES) {
            break;
        }
    }
    return semicolons > commas ? ';' : ',';
}

function parseDelimited(fileName: string, bytes: Buffer): ParsedSheet {
    const text = bytes.toString('utf-8').replace(/^\uFEFF/, '');

    try {
        const records: string[][] = parse(text, {
            delimiter: detectDelimiter(text),
            relax_column_count: true,
            relax_quotes: true,
            skip_empty_lines: false,
            trim: false,
        });
        return {
            grid: records.map(row => row.map(cell => (cell === '' ? null : cell))),
            date1904: false,
        };
    } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Cannot read delimited file "${fileName}": ${message}`, fileName);
    }
}

// ============================================
// ENTRY
// ============================================

/**
 * Parse one downloaded export into its cell grid and date system.
 * @throws ConfigurationError when the container cannot be read
 */
export function parseSourceFile(fileName: string, bytes: Buffer): ParsedSheet {
    if (bytes.length === 0) {
        throw new ConfigurationError(`File "${fileName}" is empty`, fileName);
    }
    return detectFormat(bytes) === 'workbook'
        ? parseWorkbook(fileName, bytes)
        : parseDelimited(fileName, bytes);
}
