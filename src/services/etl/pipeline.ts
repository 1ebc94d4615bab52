/**
 * Pipeline Orchestrator
 *
 * Extraction → Transformation → Load → Archive → Forecast, in order.
 * The first failing step stops the run: it is marked failed, the steps after
 * it are skipped and the error is re-thrown to the job. There are no retries
 * between steps and no rollback of worksheets already written.
 */

import { DATA_TYPES, PLATFORMS } from '../../config/mappings/columns.js';
import type { RunSettings } from '../../config/runSettings.js';
import type { CalendarDate } from '../../utils/dateHelpers.js';
import { ConfigurationError, toError } from '../../utils/errors.js';
import { etlLogger, logWithContext } from '../../utils/logger.js';
import type { FileStoreGateway } from '../fileStore.js';
import { forecastInstalls, writeForecast } from '../forecast/installsForecast.js';
import { extract, rawRowCount } from './extract.js';
import { writeArchive, writeDestination, type RowCounts } from './load.js';
import {
    ProgressTracker,
    emptyStats,
    type PipelineProgress,
    type PipelineStats,
    type PipelineStepName,
} from './state.js';
import { transformAll } from './transform.js';

// ============================================
// TYPES
// ============================================

export interface PipelineContext {
    gateway: FileStoreGateway;
    rawDataFolderId: string;
    destinationSpreadsheetId: string;
    /** Required when backup is enabled */
    archiveSpreadsheetId: string | null;
    executionDate: CalendarDate;
    settings: Pick<RunSettings, 'backupEnabled' | 'forecastEnabled'>;
}

export interface PipelineResult {
    executionDate: CalendarDate;
    destinationSpreadsheetId: string;
    stats: PipelineStats;
    progress: PipelineProgress;
}

function describeCounts(counts: RowCounts): string {
    return DATA_TYPES.map(dataType => `${counts[dataType]} ${dataType}`).join(', ');
}

// ============================================
// RUN
// ============================================

/**
 * Run every step for one execution date.
 * Pass a tracker to observe progress even when the run throws.
 */
export async function runPipeline(
    context: PipelineContext,
    tracker: ProgressTracker = new ProgressTracker()
): Promise<PipelineResult> {
    const { gateway, executionDate, settings } = context;
    const stats = emptyStats();
    const log = logWithContext(etlLogger, { executionDate });

    const step = async <T>(
        name: PipelineStepName,
        work: () => Promise<T> | T,
        describe: (result: T) => string
    ): Promise<T> => {
        const s = tracker.stepStart(name);
        log.info({ step: name }, 'Step started');
        try {
            const result = await work();
            const detail = describe(result);
            tracker.stepDone(name, s, detail);
            log.info({ step: name, detail }, 'Step done');
            return result;
        } catch (error: unknown) {
            const err = toError(error);
            tracker.stepFailed(name, s, err.message);
            tracker.skipRemainingSteps();
            tracker.finish();
            log.error({ step: name, error: err.message }, 'Step failed');
            throw error;
        }
    };

    const extracted = await step('Extraction', () => extract(gateway, context.rawDataFolderId), data => {
        for (const dataType of DATA_TYPES) {
            for (const platform of PLATFORMS) {
                stats.extracted[dataType][platform] = rawRowCount(data[dataType][platform]);
            }
        }
        return `${DATA_TYPES.length * PLATFORMS.length} files`;
    });

    const tables = await step('Transformation', () => transformAll(extracted), result => {
        stats.transformed = {
            keywords: result.keywords.rows.length,
            installs: result.installs.rows.length,
            users: result.users.rows.length,
        };
        return describeCounts(stats.transformed);
    });

    stats.loaded = await step(
        'Load',
        () => writeDestination(gateway, context.destinationSpreadsheetId, tables),
        describeCounts
    );

    if (settings.backupEnabled) {
        const archiveId = context.archiveSpreadsheetId;
        stats.archived = await step('Archive', () => {
            if (!archiveId) {
                throw new ConfigurationError('Backup is enabled but no archive spreadsheet is set', 'archive');
            }
            return writeArchive(gateway, archiveId, tables, executionDate);
        }, describeCounts);
    } else {
        tracker.stepSkipped('Archive', 'Backup disabled');
    }

    if (settings.forecastEnabled) {
        stats.forecastRows = await step('Forecast', () => {
            const rows = forecastInstalls(tables.installs, executionDate);
            return writeForecast(gateway, context.destinationSpreadsheetId, rows);
        }, rows => `${rows} rows`);
    } else {
        tracker.stepSkipped('Forecast', 'Forecast disabled');
    }

    tracker.finish();
    const progress = tracker.snapshot();
    log.info({ durationMs: progress.totalDurationMs, loaded: stats.loaded }, 'Pipeline complete');

    return {
        executionDate,
        destinationSpreadsheetId: context.destinationSpreadsheetId,
        stats,
        progress,
    };
}
