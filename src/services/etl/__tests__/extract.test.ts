import { extract, rawRowCount, selectSourceFiles } from '../extract.js';
import type { DriveFile } from '../../fileStore.js';
import { ConfigurationError } from '../../../utils/errors.js';
import { InMemoryFileStore } from '../../../testing/inMemoryFileStore.js';
import { RAW_FOLDER_ID, seedExports } from '../../../testing/fixtures.js';

function file(id: string, name: string): DriveFile {
    return { id, name, mimeType: 'text/csv' };
}

const ALL_SIX = [
    file('1', 'APPLE motcles.csv'),
    file('2', 'GOOGLE motcles.csv'),
    file('3', 'Installs Apple.csv'),
    file('4', 'Installs Google.csv'),
    file('5', 'Utilisateurs connectés Apple.csv'),
    file('6', 'Utilisateurs connectés Google.csv'),
];

describe('selectSourceFiles', () => {
    it('assigns one file to each export', () => {
        const selected = selectSourceFiles(ALL_SIX);
        expect(selected.keywords.Apple.id).toBe('1');
        expect(selected.keywords.Google.id).toBe('2');
        expect(selected.installs.Apple.id).toBe('3');
        expect(selected.installs.Google.id).toBe('4');
        expect(selected.users.Apple.id).toBe('5');
        expect(selected.users.Google.id).toBe('6');
    });

    it('keeps the first (newest) of duplicate uploads', () => {
        const selected = selectSourceFiles([file('new', 'Installs Apple (1).csv'), ...ALL_SIX]);
        expect(selected.installs.Apple.id).toBe('new');
    });

    it('ignores unrelated files', () => {
        const selected = selectSourceFiles([file('x', 'README.txt'), ...ALL_SIX]);
        expect(selected.keywords.Apple.id).toBe('1');
    });

    it('fails when an export is missing', () => {
        const withoutGoogleInstalls = ALL_SIX.filter(f => f.id !== '4');
        expect(() => selectSourceFiles(withoutGoogleInstalls)).toThrow(ConfigurationError);
        expect(() => selectSourceFiles(withoutGoogleInstalls)).toThrow(/^File not found for installs\/Google/);
    });
});

describe('extract', () => {
    it('downloads and parses every export', async () => {
        const store = new InMemoryFileStore();
        seedExports(store);

        const data = await extract(store, RAW_FOLDER_ID);

        expect(data.installs.Apple.fileName).toBe('Installs Apple.csv');
        expect(data.installs.Apple.grid[0]).toEqual(['Date', 'Installs Apple']);
        expect(data.users.Apple.grid[4]).toEqual(['Nom', 'Courses U : Magasin en ligne']);
        expect(rawRowCount(data.keywords.Google)).toBe(2);
    });

    it('fails on an empty folder', async () => {
        const store = new InMemoryFileStore();
        await expect(extract(store, RAW_FOLDER_ID)).rejects.toThrow('File not found for keywords/Apple');
    });
});
