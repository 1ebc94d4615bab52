/**
 * Per-run progress and statistics for the pipeline.
 * A fresh tracker is created for every run; nothing is shared between runs.
 */

import type { DataType, Platform } from '../../config/mappings/columns.js';
import type { RowCounts } from './load.js';

// ============================================
// TYPES
// ============================================

export const PIPELINE_STEPS = ['Extraction', 'Transformation', 'Load', 'Archive', 'Forecast'] as const;
export type PipelineStepName = typeof PIPELINE_STEPS[number];

export interface PipelineStep {
    name: PipelineStepName;
    status: 'pending' | 'running' | 'done' | 'failed' | 'skipped';
    detail?: string;
    durationMs?: number;
    error?: string;
}

export interface PipelineProgress {
    startedAt: string;
    completedAt: string | null;
    steps: PipelineStep[];
    totalDurationMs?: number;
}

export interface PipelineStats {
    /** Raw data rows per export, before mapping */
    extracted: Record<DataType, Record<Platform, number>>;
    transformed: RowCounts;
    loaded: RowCounts;
    /** null when the archive step did not run */
    archived: RowCounts | null;
    /** null when the forecast step did not run */
    forecastRows: number | null;
}

export function emptyStats(): PipelineStats {
    return {
        extracted: {
            keywords: { Apple: 0, Google: 0 },
            installs: { Apple: 0, Google: 0 },
            users: { Apple: 0, Google: 0 },
        },
        transformed: { keywords: 0, installs: 0, users: 0 },
        loaded: { keywords: 0, installs: 0, users: 0 },
        archived: null,
        forecastRows: null,
    };
}

// ============================================
// TRACKER
// ============================================

export class ProgressTracker {
    private readonly progress: PipelineProgress;
    private readonly startMs: number;

    constructor(private readonly now: () => number = Date.now) {
        this.startMs = now();
        this.progress = {
            startedAt: new Date(this.startMs).toISOString(),
            completedAt: null,
            steps: PIPELINE_STEPS.map(name => ({ name, status: 'pending' })),
        };
    }

    private getStep(name: PipelineStepName): PipelineStep | undefined {
        return this.progress.steps.find(s => s.name === name);
    }

    stepStart(name: PipelineStepName): number {
        const step = this.getStep(name);
        if (step) {
            step.status = 'running';
            step.detail = undefined;
            step.error = undefined;
            step.durationMs = undefined;
        }
        return this.now();
    }

    stepDone(name: PipelineStepName, startMs: number, detail?: string): void {
        const step = this.getStep(name);
        if (step) {
            step.status = 'done';
            step.durationMs = this.now() - startMs;
            if (detail) step.detail = detail;
        }
    }

    stepFailed(name: PipelineStepName, startMs: number, error: string): void {
        const step = this.getStep(name);
        if (step) {
            step.status = 'failed';
            step.durationMs = this.now() - startMs;
            step.error = error;
        }
    }

    stepSkipped(name: PipelineStepName, detail?: string): void {
        const step = this.getStep(name);
        if (step) {
            step.status = 'skipped';
            if (detail) step.detail = detail;
        }
    }

    skipRemainingSteps(): void {
        for (const step of this.progress.steps) {
            if (step.status === 'pending') {
                step.status = 'skipped';
            }
        }
    }

    finish(): void {
        const end = this.now();
        this.progress.completedAt = new Date(end).toISOString();
        this.progress.totalDurationMs = end - this.startMs;
    }

    snapshot(): PipelineProgress {
        return { ...this.progress, steps: this.progress.steps.map(s => ({ ...s })) };
    }
}
