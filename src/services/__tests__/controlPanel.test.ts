import { readControlPanel, resolveSpreadsheetId } from '../controlPanel.js';
import { CONTROL_RANGE } from '../../config/etl.js';
import { ConfigurationError } from '../../utils/errors.js';
import { InMemoryFileStore } from '../../testing/inMemoryFileStore.js';
import { CONTROL_PANEL_ID, seedControlPanel } from '../../testing/fixtures.js';

describe('resolveSpreadsheetId', () => {
    it('prefers the configured ID', async () => {
        const store = new InMemoryFileStore();
        await expect(resolveSpreadsheetId(store, 'configured-id', 'MASTER_DATA_CLEAN')).resolves.toBe('configured-id');
    });

    it('looks the spreadsheet up by name', async () => {
        const store = new InMemoryFileStore();
        store.addSpreadsheet('sheet-123', 'MASTER_DATA_CLEAN');
        await expect(resolveSpreadsheetId(store, undefined, 'MASTER_DATA_CLEAN')).resolves.toBe('sheet-123');
    });

    it('ignores files of another type with the same name', async () => {
        const store = new InMemoryFileStore();
        store.addFile('folder', 'MASTER_DATA_CLEAN', 'a,b');
        await expect(resolveSpreadsheetId(store, undefined, 'MASTER_DATA_CLEAN')).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('fails when nothing has that name', async () => {
        const store = new InMemoryFileStore();
        await expect(resolveSpreadsheetId(store, undefined, '00_Control_Panel'))
            .rejects.toThrow('Spreadsheet "00_Control_Panel" not found in Drive');
    });
});

describe('readControlPanel', () => {
    it('reads the switch cells in one range', () => {
        expect(CONTROL_RANGE).toBe('Config!B3:B6');
    });

    it('reads B3 to B6 of the Config worksheet', async () => {
        const store = new InMemoryFileStore();
        seedControlPanel(store, { pipeline: 'ON', backup: 'OFF', alerts: 'on', forecast: 'TRUE' });

        const snapshot = await readControlPanel(store, CONTROL_PANEL_ID);

        expect(snapshot).toEqual({ pipeline: 'ON', backup: 'OFF', alerts: 'on', forecast: 'TRUE' });
        expect(Object.isFrozen(snapshot)).toBe(true);
    });

    it('returns blank strings for empty trailing cells', async () => {
        const store = new InMemoryFileStore();
        seedControlPanel(store, { pipeline: 'OFF' });

        await expect(readControlPanel(store, CONTROL_PANEL_ID)).resolves.toEqual({
            pipeline: 'OFF',
            backup: '',
            alerts: '',
            forecast: '',
        });
    });

    it('fails when the Config worksheet is missing', async () => {
        const store = new InMemoryFileStore();
        store.addSpreadsheet(CONTROL_PANEL_ID, null, { Settings: [['x']] });

        await expect(readControlPanel(store, CONTROL_PANEL_ID))
            .rejects.toThrow('Worksheet "Config" not found in the control panel');
    });

    it('does not write to the control panel', async () => {
        const store = new InMemoryFileStore();
        seedControlPanel(store);

        await readControlPanel(store, CONTROL_PANEL_ID);

        expect(store.writes).toEqual([]);
    });
});
