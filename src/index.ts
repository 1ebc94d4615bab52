/**
 * Entry point for the daily run (cron, CI schedule or by hand).
 *
 * Exit code 0 when the run succeeded or was switched off in the control
 * panel, 1 when it failed.
 */

import { getEnv, type Env } from './config/env.js';
import { exitCodeFor, reportStartupFailure, runEtlJob } from './jobs/etlJob.js';
import type { FileStoreGateway } from './services/fileStore.js';
import { authenticate, createFileStore } from './services/googleAuth.js';
import { todayInTimeZone, type CalendarDate } from './utils/dateHelpers.js';
import { toError } from './utils/errors.js';
import logger from './utils/logger.js';

function resolveExecutionDate(env: Env): CalendarDate {
    return env.EXECUTION_DATE ?? todayInTimeZone(env.PIPELINE_TIMEZONE);
}

async function main(): Promise<number> {
    // Without a valid environment there is nobody to email
    let env: Env;
    try {
        env = getEnv();
    } catch (err: unknown) {
        logger.fatal({ error: toError(err).message }, 'Invalid environment');
        return 1;
    }

    // UTC day until the configured one is known
    let executionDate: CalendarDate = new Date().toISOString().slice(0, 10);
    let gateway: FileStoreGateway;
    try {
        executionDate = resolveExecutionDate(env);
        const handles = authenticate(env.GOOGLE_SERVICE_ACCOUNT_JSON);
        gateway = createFileStore(handles, {
            minIntervalMs: env.GOOGLE_API_CALL_DELAY_MS,
            maxRetries: env.GOOGLE_API_MAX_RETRIES,
        });
    } catch (err: unknown) {
        await reportStartupFailure(env, toError(err), executionDate);
        return 1;
    }

    const outcome = await runEtlJob({ env, gateway, executionDate });
    logger.info({ status: outcome.status, executionDate }, 'Run finished');
    return exitCodeFor(outcome);
}

main()
    .then(code => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        logger.fatal({ error: toError(err).message }, 'Unhandled error');
        process.exitCode = 1;
    });
