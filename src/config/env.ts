/**
 * Centralized Environment Variable Validation
 *
 * Validates every environment variable the job reads using Zod.
 * If validation fails the run stops before touching any Google document,
 * with one line per offending variable.
 *
 * USAGE:
 * - `getEnv()` parses process.env once and caches the result
 * - `parseEnv(source)` validates an arbitrary record (used by tests)
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with appropriate validation
 * 2. Add JSDoc comment explaining the variable
 * 3. Document it in .env.example
 */

// Load dotenv FIRST - must happen before we access process.env
// This is necessary because ES module imports are hoisted
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';
import { isValidTimeZone, toCalendarDate } from '../utils/dateHelpers.js';
import { ConfigurationError } from '../utils/errors.js';
import { DEFAULT_PIPELINE_TIMEZONE } from './etl.js';

// ============================================
// HELPERS
// ============================================

/** dotenv turns `KEY=` into an empty string; treat it as unset */
function optional<T extends z.ZodTypeAny>(schema: T) {
    return z.preprocess(
        value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
        schema.optional()
    );
}

const booleanFlag = z.enum(['true', 'false']).transform(value => value === 'true');

function isExistingDay(value: string): boolean {
    const [year, month, day] = value.split('-').map(Number);
    return toCalendarDate(year, month, day) !== null;
}

// ============================================
// SCHEMA DEFINITION
// ============================================

const envSchema = z.object({
    // ----------------------------------------
    // REQUIRED - The job will not start without these
    // ----------------------------------------

    /** Service-account key, the whole JSON document */
    GOOGLE_SERVICE_ACCOUNT_JSON: z.string().min(1, 'GOOGLE_SERVICE_ACCOUNT_JSON is required'),

    /** Drive folder holding the six platform exports */
    RAW_DATA_FOLDER_ID: z.string().min(1, 'RAW_DATA_FOLDER_ID is required'),

    // ----------------------------------------
    // DOCUMENTS - looked up by name when unset
    // ----------------------------------------

    /** Destination spreadsheet (KEYWORDS, INSTALLS, USERS, FORECAST) */
    MASTER_SPREADSHEET_ID: optional(z.string()),

    /** Archive spreadsheet with one worksheet per day and data type */
    ARCHIVE_SPREADSHEET_ID: optional(z.string()),

    /** Control panel spreadsheet */
    CONTROL_PANEL_SPREADSHEET_ID: optional(z.string()),

    // ----------------------------------------
    // RESEND
    // ----------------------------------------

    /** Resend API key for alert emails */
    RESEND_API_KEY: optional(z.string()),

    /** Sender address, must belong to a domain verified in Resend */
    ALERT_EMAIL_FROM: optional(z.string()),

    /** Comma-separated recipients */
    ALERT_EMAIL_TO: optional(z.string().transform(value =>
        value.split(',').map(part => part.trim()).filter(Boolean)
    )),

    // ----------------------------------------
    // RUN OVERRIDES
    // ----------------------------------------

    /** Run as if it were this day (YYYY-MM-DD) */
    EXECUTION_DATE: optional(z.string()
        .regex(/^\d{4}-\d{2}-\d{2}$/, 'EXECUTION_DATE must be YYYY-MM-DD')
        .refine(isExistingDay, 'EXECUTION_DATE is not a calendar day')),

    /** IANA zone that decides which day "today" is */
    PIPELINE_TIMEZONE: optional(z.string().refine(isValidTimeZone, 'PIPELINE_TIMEZONE is not a known IANA time zone'))
        .transform(value => value ?? DEFAULT_PIPELINE_TIMEZONE),

    /** Force the archive snapshot on or off, ignoring the control panel */
    ENABLE_BACKUP: optional(booleanFlag),

    /** Force alert emails on or off, ignoring the control panel */
    ENABLE_ALERTS: optional(booleanFlag),

    /** Force the installs forecast on or off, ignoring the control panel */
    ENABLE_FORECAST: optional(booleanFlag),

    // ----------------------------------------
    // GOOGLE API TUNING
    // ----------------------------------------

    /** Minimum delay between two Google API calls */
    GOOGLE_API_CALL_DELAY_MS: z.coerce.number().int().min(0).default(200),

    /** Retries on 429/500/503; 0 means a failed call aborts the run */
    GOOGLE_API_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(0),

    // ----------------------------------------
    // RUNTIME
    // ----------------------------------------

    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

/**
 * Validate a set of environment variables.
 * Throws a ConfigurationError naming every variable that failed.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
    const result = envSchema.safeParse(source);
    if (result.success) return result.data;

    const issues = result.error.issues.map(issue => {
        const path = issue.path.join('.');
        return `  - ${path}: ${issue.message}`;
    }).join('\n');

    throw new ConfigurationError('Environment validation failed:\n' + issues, 'environment');
}

let cachedEnv: Env | null = null;

/** Parsed process environment, validated on first use */
export function getEnv(): Env {
    if (!cachedEnv) {
        cachedEnv = parseEnv(process.env);
    }
    return cachedEnv;
}
