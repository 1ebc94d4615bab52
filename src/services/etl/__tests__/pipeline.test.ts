/**
 * Orchestrator tests against the in-memory file store
 */

import { runPipeline, type PipelineContext } from '../pipeline.js';
import { ProgressTracker } from '../state.js';
import { ConfigurationError, TransportError } from '../../../utils/errors.js';
import { InMemoryFileStore } from '../../../testing/inMemoryFileStore.js';
import {
    ARCHIVE_ID,
    MASTER_ID,
    RAW_FOLDER_ID,
    defaultExports,
    seedDocuments,
    seedExports,
} from '../../../testing/fixtures.js';

function setup(settings: PipelineContext['settings'], archiveSpreadsheetId: string | null = ARCHIVE_ID) {
    const store = new InMemoryFileStore();
    seedExports(store);
    seedDocuments(store);
    const context: PipelineContext = {
        gateway: store,
        rawDataFolderId: RAW_FOLDER_ID,
        destinationSpreadsheetId: MASTER_ID,
        archiveSpreadsheetId,
        executionDate: '2025-07-15',
        settings,
    };
    return { store, context };
}

describe('runPipeline', () => {
    it('loads the destination and skips disabled steps', async () => {
        const { store, context } = setup({ backupEnabled: false, forecastEnabled: false });

        const result = await runPipeline(context);

        expect(result.progress.steps.map(s => [s.name, s.status])).toEqual([
            ['Extraction', 'done'],
            ['Transformation', 'done'],
            ['Load', 'done'],
            ['Archive', 'skipped'],
            ['Forecast', 'skipped'],
        ]);
        expect(result.stats.extracted.keywords).toEqual({ Apple: 2, Google: 2 });
        expect(result.stats.transformed).toEqual({ keywords: 4, installs: 4, users: 4 });
        expect(result.stats.loaded).toEqual({ keywords: 4, installs: 4, users: 4 });
        expect(result.stats.archived).toBeNull();
        expect(result.stats.forecastRows).toBeNull();
        expect(store.worksheetTitles(MASTER_ID)).toEqual(['KEYWORDS', 'INSTALLS', 'USERS']);
        expect(store.worksheetTitles(ARCHIVE_ID)).toEqual([]);
        expect(result.progress.completedAt).not.toBeNull();
    });

    it('writes the destination values with empty cells for missing metrics', async () => {
        const { store, context } = setup({ backupEnabled: false, forecastEnabled: false });

        await runPipeline(context);

        expect(store.getValues(MASTER_ID, 'INSTALLS')).toEqual([
            ['Date', 'Installs', 'Platform', 'Stage'],
            ['2025-07-14', 1204, 'Apple', 'Pre-Agencia'],
            ['2025-07-15', 1310, 'Apple', 'Con-Agencia'],
            ['2025-07-14', 800, 'Google', 'Pre-Agencia'],
            ['2025-07-15', '', 'Google', 'Con-Agencia'],
        ]);
    });

    it('archives when backup is enabled', async () => {
        const { store, context } = setup({ backupEnabled: true, forecastEnabled: false });

        const result = await runPipeline(context);

        expect(result.stats.archived).toEqual({ keywords: 4, installs: 4, users: 4 });
        expect(store.worksheetTitles(ARCHIVE_ID)).toEqual(['20250715_keywords', '20250715_installs', '20250715_users']);
        expect(result.progress.steps[3]).toMatchObject({ name: 'Archive', status: 'done', detail: '4 keywords, 4 installs, 4 users' });
    });

    it('writes the forecast when enabled', async () => {
        const { store, context } = setup({ backupEnabled: false, forecastEnabled: true });

        const result = await runPipeline(context);

        // Google has a single valid day, so only Apple is forecast (31 days of August)
        expect(result.stats.forecastRows).toBe(31);
        const values = store.getValues(MASTER_ID, 'FORECAST');
        expect(values?.[0]).toEqual(['Date', 'Installs', 'Platform']);
        expect(values?.[1]).toEqual(['2025-08-01', 3112, 'Apple']);
        expect(values).toHaveLength(32);
    });

    it('marks the failing step and skips the rest', async () => {
        const { store, context } = setup({ backupEnabled: true, forecastEnabled: true });
        store.failOn('writeValues', new TransportError('Sheets values.update failed: quota', 'Sheets', 'values.update', 429));
        const tracker = new ProgressTracker();

        await expect(runPipeline(context, tracker)).rejects.toBeInstanceOf(TransportError);

        const progress = tracker.snapshot();
        expect(progress.steps.map(s => [s.name, s.status])).toEqual([
            ['Extraction', 'done'],
            ['Transformation', 'done'],
            ['Load', 'failed'],
            ['Archive', 'skipped'],
            ['Forecast', 'skipped'],
        ]);
        expect(progress.steps[2].error).toBe('Sheets values.update failed: quota');
        expect(progress.completedAt).not.toBeNull();
    });

    it('stops on a data error before writing anything', async () => {
        const store = new InMemoryFileStore();
        seedExports(store, {
            ...defaultExports(),
            installsGoogle: 'Date,Installs\n2025-07-14,800\n',
        });
        seedDocuments(store);
        const tracker = new ProgressTracker();

        await expect(runPipeline({
            gateway: store,
            rawDataFolderId: RAW_FOLDER_ID,
            destinationSpreadsheetId: MASTER_ID,
            archiveSpreadsheetId: ARCHIVE_ID,
            executionDate: '2025-07-15',
            settings: { backupEnabled: true, forecastEnabled: false },
        }, tracker)).rejects.toThrow('Missing expected column "Installs Google Play"');

        expect(tracker.snapshot().steps[1].status).toBe('failed');
        expect(store.writes).toEqual([]);
    });

    it('fails the archive step when no archive spreadsheet is set', async () => {
        const { context } = setup({ backupEnabled: true, forecastEnabled: false }, null);

        await expect(runPipeline(context)).rejects.toBeInstanceOf(ConfigurationError);
    });
});
