/**
 * Run Settings
 *
 * Combines the control panel switches with the ENABLE_* environment
 * overrides into the settings of one run.
 *
 * Precedence for the optional stages (backup, alerts, forecast):
 *   explicit env override > non-blank control cell > default
 * The pipeline switch itself only comes from the control panel.
 */

import { ENABLED_FLAG_VALUES } from './etl.js';
import type { Env } from './env.js';

// ============================================
// TYPES
// ============================================

/**
 * Raw text of the switch cells, read once per run
 */
export interface ControlPanelSnapshot {
    readonly pipeline: string;
    readonly backup: string;
    readonly alerts: string;
    readonly forecast: string;
}

export interface RunSettings {
    readonly pipelineEnabled: boolean;
    readonly backupEnabled: boolean;
    readonly alertsEnabled: boolean;
    readonly forecastEnabled: boolean;
}

export type RunSettingOverrides = Pick<Env, 'ENABLE_BACKUP' | 'ENABLE_ALERTS' | 'ENABLE_FORECAST'>;

const DEFAULTS = {
    backup: true,
    alerts: true,
    forecast: false,
} as const;

// ============================================
// RESOLUTION
// ============================================

/**
 * `ON` / `TRUE` in any case, surrounding spaces ignored
 */
export function isFlagEnabled(value: string | null | undefined): boolean {
    if (value === null || value === undefined) return false;
    return ENABLED_FLAG_VALUES.includes(value.trim().toUpperCase());
}

function resolveFlag(override: boolean | undefined, cell: string, fallback: boolean): boolean {
    if (override !== undefined) return override;
    if (cell.trim() !== '') return isFlagEnabled(cell);
    return fallback;
}

export function resolveRunSettings(overrides: RunSettingOverrides, snapshot: ControlPanelSnapshot): RunSettings {
    return Object.freeze({
        pipelineEnabled: isFlagEnabled(snapshot.pipeline),
        backupEnabled: resolveFlag(overrides.ENABLE_BACKUP, snapshot.backup, DEFAULTS.backup),
        alertsEnabled: resolveFlag(overrides.ENABLE_ALERTS, snapshot.alerts, DEFAULTS.alerts),
        forecastEnabled: resolveFlag(overrides.ENABLE_FORECAST, snapshot.forecast, DEFAULTS.forecast),
    });
}

/**
 * Whether to alert when the run fails before the control panel was read
 */
export function alertsEnabledWithoutPanel(overrides: Pick<RunSettingOverrides, 'ENABLE_ALERTS'>): boolean {
    return overrides.ENABLE_ALERTS ?? DEFAULTS.alerts;
}
