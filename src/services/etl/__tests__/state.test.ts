import { ProgressTracker } from '../state.js';

function clock(...times: number[]): () => number {
    let i = 0;
    return () => times[Math.min(i++, times.length - 1)];
}

describe('ProgressTracker', () => {
    it('starts with every step pending', () => {
        const tracker = new ProgressTracker(clock(0));

        expect(tracker.snapshot().steps.map(s => s.status)).toEqual(['pending', 'pending', 'pending', 'pending', 'pending']);
    });

    it('records durations and details', () => {
        // constructor, stepStart, stepDone, finish
        const tracker = new ProgressTracker(clock(1_000, 1_100, 1_350, 2_000));

        const start = tracker.stepStart('Extraction');
        tracker.stepDone('Extraction', start, '6 files');
        tracker.finish();

        const progress = tracker.snapshot();
        expect(progress.steps[0]).toEqual({ name: 'Extraction', status: 'done', detail: '6 files', durationMs: 250, error: undefined });
        expect(progress.totalDurationMs).toBe(1_000);
        expect(progress.completedAt).toBe('1970-01-01T00:00:02.000Z');
    });

    it('skips what has not run after a failure', () => {
        const tracker = new ProgressTracker(clock(0));

        tracker.stepDone('Extraction', tracker.stepStart('Extraction'));
        tracker.stepFailed('Transformation', tracker.stepStart('Transformation'), 'Unparsable number: "abc"');
        tracker.skipRemainingSteps();

        expect(tracker.snapshot().steps.map(s => `${s.name}: ${s.status}`)).toEqual([
            'Extraction: done',
            'Transformation: failed',
            'Load: skipped',
            'Archive: skipped',
            'Forecast: skipped',
        ]);
    });

    it('hands out copies', () => {
        const tracker = new ProgressTracker(clock(0));
        const before = tracker.snapshot();

        tracker.stepSkipped('Archive', 'Backup disabled');

        expect(before.steps[3].status).toBe('pending');
        expect(tracker.snapshot().steps[3]).toEqual({ name: 'Archive', status: 'skipped', detail: 'Backup disabled' });
    });
});
