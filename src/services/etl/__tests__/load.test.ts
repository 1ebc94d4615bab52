/**
 * Unit tests for the loader
 */

import { archiveSheetName, tableToValues, writeArchive, writeDestination } from '../load.js';
import type { InstallRow, KeywordRow, MergedTable, MergedTables, UserRow } from '../types.js';
import { InMemoryFileStore } from '../../../testing/inMemoryFileStore.js';
import { ARCHIVE_ID, MASTER_ID } from '../../../testing/fixtures.js';

function installs(rows: InstallRow[]): MergedTable<InstallRow> {
    return { dataType: 'installs', columns: ['Date', 'Installs', 'Platform', 'Stage'], rows };
}

function tables(installRows: InstallRow[]): MergedTables {
    const keywords: MergedTable<KeywordRow> = {
        dataType: 'keywords',
        columns: ['Date', 'Rank_1', 'Rank_2_3', 'Rank_4_10', 'Rank_11_30', 'Rank_31_100', 'Rank_100_Plus', 'Platform', 'Stage'],
        rows: [{
            Date: '2025-07-15', Rank_1: 1, Rank_2_3: 2, Rank_4_10: 3, Rank_11_30: 4,
            Rank_31_100: 5, Rank_100_Plus: 6, Platform: 'Apple', Stage: 'Con-Agencia',
        }],
    };
    const users: MergedTable<UserRow> = {
        dataType: 'users',
        columns: ['Date', 'Active_Users', 'Platform', 'Notes', 'Stage'],
        rows: [],
    };
    return { keywords, installs: installs(installRows), users };
}

const DAY_ONE: InstallRow[] = [
    { Date: '2025-07-14', Installs: 10, Platform: 'Apple', Stage: 'Pre-Agencia' },
    { Date: '2025-07-14', Installs: NaN, Platform: 'Google', Stage: 'Pre-Agencia' },
];

describe('tableToValues', () => {
    it('writes the header then sanitised rows in column order', () => {
        expect(tableToValues(installs(DAY_ONE))).toEqual([
            ['Date', 'Installs', 'Platform', 'Stage'],
            ['2025-07-14', 10, 'Apple', 'Pre-Agencia'],
            ['2025-07-14', '', 'Google', 'Pre-Agencia'],
        ]);
    });
});

describe('writeDestination', () => {
    it('creates the three worksheets and reports row counts', async () => {
        const store = new InMemoryFileStore();
        store.addSpreadsheet(MASTER_ID);

        const counts = await writeDestination(store, MASTER_ID, tables(DAY_ONE));

        expect(counts).toEqual({ keywords: 1, installs: 2, users: 0 });
        expect(store.worksheetTitles(MASTER_ID)).toEqual(['KEYWORDS', 'INSTALLS', 'USERS']);
        expect(store.getValues(MASTER_ID, 'USERS')).toEqual([['Date', 'Active_Users', 'Platform', 'Notes', 'Stage']]);
    });

    it('overwrites previous content, leaving no stale rows', async () => {
        const store = new InMemoryFileStore();
        store.addSpreadsheet(MASTER_ID, null, {
            INSTALLS: [
                ['old', 'old', 'old', 'old'],
                ['old', 'old', 'old', 'old'],
                ['old', 'old', 'old', 'old'],
                ['old', 'old', 'old', 'old'],
            ],
        });

        await writeDestination(store, MASTER_ID, tables(DAY_ONE));

        expect(store.getValues(MASTER_ID, 'INSTALLS')).toEqual(tableToValues(installs(DAY_ONE)));
    });

    it('grows a worksheet that is smaller than the data', async () => {
        const store = new InMemoryFileStore();
        store.addSpreadsheet(MASTER_ID);
        await store.addWorksheet(MASTER_ID, 'INSTALLS', 2, 2);

        await writeDestination(store, MASTER_ID, tables(DAY_ONE));

        expect(store.getWorksheet(MASTER_ID, 'INSTALLS')).toMatchObject({ rowCount: 3, columnCount: 4 });
        expect(store.getValues(MASTER_ID, 'INSTALLS')).toHaveLength(3);
    });
});

describe('writeArchive', () => {
    it('names worksheets after the execution date and data type', () => {
        expect(archiveSheetName('2026-01-15', 'keywords')).toBe('20260115_keywords');
    });

    it('keeps one worksheet per date and type, the second run winning', async () => {
        const store = new InMemoryFileStore();
        store.addSpreadsheet(ARCHIVE_ID);

        const dayTwo: InstallRow[] = [{ Date: '2025-07-15', Installs: 99, Platform: 'Apple', Stage: 'Con-Agencia' }];

        await writeArchive(store, ARCHIVE_ID, tables(DAY_ONE), '2025-07-15');
        const counts = await writeArchive(store, ARCHIVE_ID, tables(dayTwo), '2025-07-15');

        expect(counts).toEqual({ keywords: 1, installs: 1, users: 0 });
        expect(store.worksheetTitles(ARCHIVE_ID).sort()).toEqual([
            '20250715_installs',
            '20250715_keywords',
            '20250715_users',
        ]);
        expect(store.getValues(ARCHIVE_ID, '20250715_installs')).toEqual([
            ['Date', 'Installs', 'Platform', 'Stage'],
            ['2025-07-15', 99, 'Apple', 'Con-Agencia'],
        ]);
    });

    it('leaves other days untouched', async () => {
        const store = new InMemoryFileStore();
        store.addSpreadsheet(ARCHIVE_ID, null, { '20250714_installs': [['kept']] });

        await writeArchive(store, ARCHIVE_ID, tables(DAY_ONE), '2025-07-15');

        expect(store.getValues(ARCHIVE_ID, '20250714_installs')).toEqual([['kept']]);
        expect(store.writes.filter(w => w.title === '20250714_installs')).toEqual([]);
    });

    it('sizes a new worksheet to the data', async () => {
        const store = new InMemoryFileStore();
        store.addSpreadsheet(ARCHIVE_ID);

        await writeArchive(store, ARCHIVE_ID, tables(DAY_ONE), '2025-07-15');

        expect(store.getWorksheet(ARCHIVE_ID, '20250715_installs')).toMatchObject({ rowCount: 3, columnCount: 4 });
        expect(store.getWorksheet(ARCHIVE_ID, '20250715_users')).toMatchObject({ rowCount: 1, columnCount: 5 });
    });
});
