/**
 * Date helpers
 *
 * The exports carry dates in several shapes: spreadsheet serial numbers,
 * ISO strings, day-first French dates and French month names
 * ("1 janv. 2024"). Everything is normalised to an ISO calendar date
 * (`YYYY-MM-DD`), which also sorts and compares correctly as a string.
 */

import * as XLSX from 'xlsx';
import { DataError } from './errors.js';
import type { CellValue } from './sheetValues.js';

/** ISO calendar date, `YYYY-MM-DD` */
export type CalendarDate = string;

const MS_PER_DAY = 86_400_000;

// ============================================
// FRENCH MONTH NAMES
// ============================================

/**
 * Month tokens as they appear in French-locale exports, keyed without
 * accents or trailing dot.
 */
const FRENCH_MONTHS: Record<string, number> = {
    janvier: 1, janv: 1, jan: 1,
    fevrier: 2, fevr: 2, fev: 2,
    mars: 3, mar: 3,
    avril: 4, avr: 4,
    mai: 5,
    juin: 6,
    juillet: 7, juil: 7,
    aout: 8,
    septembre: 9, sept: 9, sep: 9,
    octobre: 10, oct: 10,
    novembre: 11, nov: 11,
    decembre: 12, dec: 12,
};

function monthTokenKey(token: string): string {
    return token
        .normalize('NFD')
        .replace(/[\u0300-\u036f]/g, '')
        .toLowerCase()
        .replace(/\.$/, '');
}

/**
 * Month number for a French month token, or null.
 * @example frenchMonthNumber('janv.') // 1
 * @example frenchMonthNumber('Août') // 8
 */
export function frenchMonthNumber(token: string): number | null {
    return FRENCH_MONTHS[monthTokenKey(token)] ?? null;
}

// ============================================
// CALENDAR DATES
// ============================================

function pad(n: number, width = 2): string {
    return String(n).padStart(width, '0');
}

/**
 * Build an ISO date, or null if the day does not exist (e.g. 31/02)
 */
export function toCalendarDate(year: number, month: number, day: number): CalendarDate | null {
    if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return null;
    if (month < 1 || month > 12 || day < 1 || day > 31) return null;

    const check = new Date(Date.UTC(year, month - 1, day));
    if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
        return null;
    }
    return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

const ISO_PATTERN = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ].*)?$/;
const DAY_FIRST_PATTERN = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})(?:[T ].*)?$/;
const MONTH_NAME_PATTERN = /^(\d{1,2})(?:er)?\s+([^\s\d]+)\s+(\d{4})$/i;

function parseDateString(text: string): CalendarDate | null {
    const iso = ISO_PATTERN.exec(text);
    if (iso) return toCalendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

    // French locale: 02/03/2024 is the 2nd of March
    const dayFirst = DAY_FIRST_PATTERN.exec(text);
    if (dayFirst) return toCalendarDate(Number(dayFirst[3]), Number(dayFirst[2]), Number(dayFirst[1]));

    const named = MONTH_NAME_PATTERN.exec(text);
    if (named) {
        const month = frenchMonthNumber(named[2]);
        if (month === null) return null;
        return toCalendarDate(Number(named[3]), month, Number(named[1]));
    }

    return null;
}

export interface SerialDateOptions {
    /** Serial 0 is 1904-01-01 instead of 1899-12-30 */
    date1904?: boolean;
}

/**
 * Normalise a date cell from an export.
 * @throws DataError when the value is blank or not a recognisable date
 */
export function parseSourceDate(value: CellValue, options: SerialDateOptions = {}): CalendarDate {
    if (typeof value === 'number') {
        if (Number.isFinite(value) && value >= 1) {
            // Spreadsheet serial date, in the workbook's date system
            const parts = XLSX.SSF.parse_date_code(value, { date1904: options.date1904 === true });
            const date = parts ? toCalendarDate(parts.y, parts.m, parts.d) : null;
            if (date) return date;
        }
        throw new DataError(`Unparsable date: ${value}`, { value });
    }

    if (typeof value !== 'string' || value.trim() === '') {
        throw new DataError('Missing date value', { value });
    }

    const text = value.replace(/\s+/g, ' ').trim();
    const date = parseDateString(text);
    if (!date) {
        throw new DataError(`Unparsable date: "${value}"`, { value });
    }
    return date;
}

// ============================================
// ARITHMETIC & FORMATTING
// ============================================

/** Days since 1970-01-01 for an ISO date */
export function toDayNumber(date: CalendarDate): number {
    const [year, month, day] = date.split('-').map(Number);
    return Math.round(Date.UTC(year, month - 1, day) / MS_PER_DAY);
}

/** ISO date for a day number */
export function fromDayNumber(dayNumber: number): CalendarDate {
    return new Date(dayNumber * MS_PER_DAY).toISOString().slice(0, 10);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
    return fromDayNumber(toDayNumber(date) + days);
}

/** `2026-01-15` → `20260115` */
export function formatCompactDate(date: CalendarDate): string {
    return date.replace(/-/g, '');
}

/**
 * Every day of the calendar month after the given date
 */
export function nextMonthDates(date: CalendarDate): CalendarDate[] {
    const [year, month] = date.split('-').map(Number);
    const nextYear = month === 12 ? year + 1 : year;
    const nextMonth = month === 12 ? 1 : month + 1;
    const daysInMonth = new Date(Date.UTC(nextYear, nextMonth, 0)).getUTCDate();

    const dates: CalendarDate[] = [];
    for (let day = 1; day <= daysInMonth; day++) {
        dates.push(`${pad(nextYear, 4)}-${pad(nextMonth)}-${pad(day)}`);
    }
    return dates;
}

/** True when Intl knows the IANA zone name */
export function isValidTimeZone(timeZone: string): boolean {
    try {
        new Intl.DateTimeFormat('en-CA', { timeZone });
        return true;
    } catch {
        return false;
    }
}

/** Current date in a time zone (YYYY-MM-DD) */
export function todayInTimeZone(timeZone: string, now: Date = new Date()): CalendarDate {
    return now.toLocaleDateString('en-CA', { timeZone }); // YYYY-MM-DD
}
