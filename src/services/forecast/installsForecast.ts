/**
 * Installs Forecast
 *
 * Fits a straight line through each platform's recent daily installs and
 * projects it over the next calendar month. The result goes to the FORECAST
 * worksheet of the destination spreadsheet.
 *
 * TO CHANGE THE TRAINING WINDOW:
 * Edit FORECAST_TRAINING_DAYS in config/etl.ts.
 */

import { PLATFORMS, type Platform } from '../../config/mappings/columns.js';
import { FORECAST_SHEET_NAME, FORECAST_TRAINING_DAYS } from '../../config/etl.js';
import { addDays, nextMonthDates, toDayNumber, type CalendarDate } from '../../utils/dateHelpers.js';
import { forecastLogger } from '../../utils/logger.js';
import type { FileStoreGateway } from '../fileStore.js';
import { overwriteWorksheet, tableToValues } from '../etl/load.js';
import type { ForecastRow, InstallRow, MergedTable } from '../etl/types.js';

// ============================================
// REGRESSION
// ============================================

export interface Point {
    x: number;
    y: number;
}

export interface LinearFit {
    slope: number;
    intercept: number;
}

/**
 * Ordinary least squares line through the points.
 * @returns null when fewer than two distinct x values are present
 */
export function fitLinear(points: readonly Point[]): LinearFit | null {
    if (points.length < 2) return null;

    const meanX = points.reduce((sum, p) => sum + p.x, 0) / points.length;
    const meanY = points.reduce((sum, p) => sum + p.y, 0) / points.length;

    let sxy = 0;
    let sxx = 0;
    for (const p of points) {
        sxy += (p.x - meanX) * (p.y - meanY);
        sxx += (p.x - meanX) ** 2;
    }
    if (sxx === 0) return null;

    const slope = sxy / sxx;
    return { slope, intercept: meanY - slope * meanX };
}

// ============================================
// FORECAST
// ============================================

/**
 * Installs rows inside the training window that carry a value
 */
export function selectTrainingRows(rows: readonly InstallRow[], executionDate: CalendarDate): InstallRow[] {
    const start = addDays(executionDate, -FORECAST_TRAINING_DAYS);
    return rows.filter(row =>
        row.Date >= start && row.Date <= executionDate && Number.isFinite(row.Installs)
    );
}

/**
 * Daily installs forecast for the month after the execution date,
 * Apple rows first, each platform in date order.
 */
export function forecastInstalls(
    installs: MergedTable<InstallRow>,
    executionDate: CalendarDate
): ForecastRow[] {
    const training = selectTrainingRows(installs.rows, executionDate);
    const horizon = nextMonthDates(executionDate);
    const forecast: ForecastRow[] = [];

    for (const platform of PLATFORMS) {
        const points = training
            .filter(row => row.Platform === platform)
            .map(row => ({ x: toDayNumber(row.Date), y: row.Installs }));

        const fit = fitLinear(points);
        if (!fit) {
            forecastLogger.warn({ platform, trainingRows: points.length }, 'Not enough history to forecast');
            continue;
        }

        forecastLogger.debug({ platform, trainingRows: points.length, ...fit }, 'Fitted installs trend');
        for (const date of horizon) {
            forecast.push({ Date: date, Installs: predict(fit, date), Platform: platform });
        }
    }

    return forecast;
}

function predict(fit: LinearFit, date: CalendarDate): number {
    // Math.max also turns -0 into 0
    return Math.max(0, Math.round(fit.intercept + fit.slope * toDayNumber(date)));
}

// ============================================
// WRITE
// ============================================

const FORECAST_COLUMNS: ReadonlyArray<keyof ForecastRow> = ['Date', 'Installs', 'Platform'];

/**
 * Overwrite the FORECAST worksheet
 * @returns forecast rows written
 */
export async function writeForecast(
    gateway: FileStoreGateway,
    spreadsheetId: string,
    rows: ForecastRow[]
): Promise<number> {
    const table: MergedTable<ForecastRow> = { dataType: 'installs', columns: FORECAST_COLUMNS, rows };
    await overwriteWorksheet(gateway, spreadsheetId, FORECAST_SHEET_NAME, tableToValues(table));

    const platforms = new Set<Platform>(rows.map(r => r.Platform));
    forecastLogger.info({ worksheet: FORECAST_SHEET_NAME, rows: rows.length, platforms: [...platforms] }, 'Forecast written');
    return rows.length;
}
