/**
 * Daily ETL Job
 *
 * One run: read the control panel, resolve the run settings, locate the
 * spreadsheets, run the pipeline and send the report. Every error is caught
 * here, logged with where the run stopped, reported by email and turned into
 * a `failed` outcome.
 */

import { DOCUMENT_NAMES } from '../config/etl.js';
import type { Env } from '../config/env.js';
import {
    alertsEnabledWithoutPanel,
    resolveRunSettings,
    type RunSettings,
} from '../config/runSettings.js';
import { readControlPanel, resolveSpreadsheetId } from '../services/controlPanel.js';
import {
    resolveEmailConfig,
    sendFailureNotification,
    sendSuccessNotification,
    type EmailSender,
    type SendResult,
} from '../services/email/index.js';
import type { PipelineFailureData } from '../services/email/templates/index.js';
import { runPipeline, type PipelineResult } from '../services/etl/pipeline.js';
import { ProgressTracker, type PipelineStep } from '../services/etl/state.js';
import type { FileStoreGateway } from '../services/fileStore.js';
import type { CalendarDate } from '../utils/dateHelpers.js';
import { isPipelineError, toError } from '../utils/errors.js';
import { jobLogger as log } from '../utils/logger.js';

// ============================================
// TYPES
// ============================================

export interface EtlJobDeps {
    env: Env;
    gateway: FileStoreGateway;
    executionDate: CalendarDate;
    /** Defaults to Resend */
    emailSender?: EmailSender;
}

export type JobOutcome =
    | {
        status: 'success';
        executionDate: CalendarDate;
        settings: RunSettings;
        result: PipelineResult;
        notification: SendResult;
    }
    | {
        status: 'disabled';
        executionDate: CalendarDate;
        settings: RunSettings;
    }
    | {
        status: 'failed';
        executionDate: CalendarDate;
        /** Where the run stopped */
        context: string;
        error: Error;
        notification: SendResult;
    };

/** Where a failure happened, for the log and the alert */
export const JOB_CONTEXTS = {
    STARTUP: 'Startup',
    CONTROL_PANEL: 'Control panel',
    DOCUMENTS: 'Document lookup',
    PIPELINE: 'ETL pipeline',
} as const;

// ============================================
// HELPERS
// ============================================

function documentLabel(configuredId: string | undefined, name: string): string {
    return configuredId ? `${name} (${configuredId})` : name;
}

export function describeFailure(
    error: Error,
    context: string,
    executionDate: CalendarDate,
    steps: PipelineStep[] = []
): PipelineFailureData {
    return {
        executionDate,
        context,
        errorType: error.name,
        category: isPipelineError(error) ? error.category : null,
        message: error.message,
        stack: error.stack ?? null,
        steps,
    };
}

/**
 * Alert for a run that failed before the job could start (environment,
 * authentication). The control panel is unknown here, so only an explicit
 * ENABLE_ALERTS=false silences it.
 */
export async function reportStartupFailure(
    env: Env,
    error: Error,
    executionDate: CalendarDate,
    emailSender?: EmailSender
): Promise<SendResult> {
    log.error({ context: JOB_CONTEXTS.STARTUP, errorType: error.name, error: error.message, stack: error.stack }, 'ETL job could not start');
    return sendFailureNotification(describeFailure(error, JOB_CONTEXTS.STARTUP, executionDate), {
        config: resolveEmailConfig(env),
        alertsEnabled: alertsEnabledWithoutPanel(env),
        sender: emailSender,
    });
}

// ============================================
// JOB
// ============================================

export async function runEtlJob(deps: EtlJobDeps): Promise<JobOutcome> {
    const { env, gateway, executionDate } = deps;
    const emailConfig = resolveEmailConfig(env);
    const tracker = new ProgressTracker();

    let context: string = JOB_CONTEXTS.CONTROL_PANEL;
    let alertsEnabled = alertsEnabledWithoutPanel(env);

    log.info({ executionDate }, 'ETL job started');

    try {
        const controlPanelId = await resolveSpreadsheetId(
            gateway,
            env.CONTROL_PANEL_SPREADSHEET_ID,
            DOCUMENT_NAMES.CONTROL_PANEL
        );
        const snapshot = await readControlPanel(gateway, controlPanelId);
        const settings = resolveRunSettings(env, snapshot);
        alertsEnabled = settings.alertsEnabled;

        if (!settings.pipelineEnabled) {
            log.info({ executionDate, pipeline: snapshot.pipeline }, 'Pipeline switched off in the control panel, nothing to do');
            return { status: 'disabled', executionDate, settings };
        }

        log.info({ ...settings }, 'Run settings resolved');

        context = JOB_CONTEXTS.DOCUMENTS;
        const destinationSpreadsheetId = await resolveSpreadsheetId(
            gateway,
            env.MASTER_SPREADSHEET_ID,
            DOCUMENT_NAMES.MASTER
        );
        const archiveSpreadsheetId = settings.backupEnabled
            ? await resolveSpreadsheetId(gateway, env.ARCHIVE_SPREADSHEET_ID, DOCUMENT_NAMES.ARCHIVE)
            : null;

        context = JOB_CONTEXTS.PIPELINE;
        const result = await runPipeline({
            gateway,
            rawDataFolderId: env.RAW_DATA_FOLDER_ID,
            destinationSpreadsheetId,
            archiveSpreadsheetId,
            executionDate,
            settings,
        }, tracker);

        const notification = await sendSuccessNotification({
            executionDate,
            destinationName: documentLabel(env.MASTER_SPREADSHEET_ID, DOCUMENT_NAMES.MASTER),
            loaded: result.stats.loaded,
            archived: result.stats.archived,
            archiveName: archiveSpreadsheetId
                ? documentLabel(env.ARCHIVE_SPREADSHEET_ID, DOCUMENT_NAMES.ARCHIVE)
                : null,
            forecastRows: result.stats.forecastRows,
            durationMs: result.progress.totalDurationMs ?? 0,
            steps: result.progress.steps,
        }, { config: emailConfig, alertsEnabled, sender: deps.emailSender });

        log.info({ executionDate, loaded: result.stats.loaded }, 'ETL job succeeded');
        return { status: 'success', executionDate, settings, result, notification };
    } catch (err: unknown) {
        const error = toError(err);
        log.error({ context, errorType: error.name, error: error.message, stack: error.stack }, 'ETL job failed');

        const steps = context === JOB_CONTEXTS.PIPELINE ? tracker.snapshot().steps : [];
        const notification = await sendFailureNotification(
            describeFailure(error, context, executionDate, steps),
            { config: emailConfig, alertsEnabled, sender: deps.emailSender }
        );

        return { status: 'failed', executionDate, context, error, notification };
    }
}

/** Process exit code for an outcome */
export function exitCodeFor(outcome: JobOutcome): number {
    return outcome.status === 'failed' ? 1 : 0;
}
