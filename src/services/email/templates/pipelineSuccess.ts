/**
 * Success report, sent after a complete run
 */

import { DATA_TYPES, type DataType } from '../../../config/mappings/columns.js';
import type { PipelineStep } from '../../etl/state.js';
import { wrapInLayout, heading, paragraph, detailTable, detailRow, divider, formatCount } from './layout.js';

export interface PipelineSuccessData {
    executionDate: string;           // YYYY-MM-DD
    destinationName: string;
    loaded: Record<DataType, number>;
    /** null when the archive was switched off */
    archived: Record<DataType, number> | null;
    archiveName: string | null;
    /** null when the forecast was switched off */
    forecastRows: number | null;
    durationMs: number;
    steps: PipelineStep[];
}

const LABELS: Record<DataType, string> = {
    keywords: 'Keywords',
    installs: 'Installs',
    users: 'Users',
};

export function renderPipelineSuccess(data: PipelineSuccessData): { html: string; text: string; subject: string } {
    const subject = `✓ ETL Pipeline Success - ${data.executionDate}`;
    const durationSec = (data.durationMs / 1000).toFixed(1);

    const archiveStatus = data.archived
        ? `Saved to ${data.archiveName ?? 'archive'}`
        : 'Skipped (backup disabled)';
    const forecastStatus = data.forecastRows === null
        ? 'Skipped (forecast disabled)'
        : `${formatCount(data.forecastRows)} rows written to FORECAST`;

    const countRows = DATA_TYPES
        .map(dataType => detailRow(`${LABELS[dataType]} processed`, `${formatCount(data.loaded[dataType])} rows`))
        .join('');

    const stepRows = data.steps
        .map(step => detailRow(step.name, step.detail ? `${step.status}: ${step.detail}` : step.status))
        .join('');

    const content = `
    ${heading('ETL pipeline completed successfully')}
    ${paragraph(`Run date ${data.executionDate}, finished in ${durationSec}s.`)}
    ${detailTable(countRows)}
    ${detailTable(
        detailRow('Destination', data.destinationName) +
        detailRow('Archive', archiveStatus) +
        detailRow('Forecast', forecastStatus)
    )}
    ${divider()}
    ${detailTable(stepRows)}
  `;

    const text = [
        'ETL Pipeline Execution Completed Successfully',
        '',
        `Date: ${data.executionDate}`,
        `Duration: ${durationSec}s`,
        '',
        'Execution Summary:',
        ...DATA_TYPES.map(dataType => `${LABELS[dataType]} processed: ${data.loaded[dataType]} rows`),
        '',
        `Data updated in Google Sheets: ${data.destinationName}`,
        `Archive: ${archiveStatus}`,
        `Forecast: ${forecastStatus}`,
    ].join('\n');

    return {
        html: wrapInLayout(content, { preheader: subject, tone: 'success' }),
        text,
        subject,
    };
}
