/**
 * Control Panel
 *
 * Locates the job's spreadsheets and reads the switch cells of the control
 * panel. The cells are read in a single call so one run sees one consistent
 * snapshot.
 */

import { CONTROL_RANGE, CONTROL_SHEET_NAME, GOOGLE_SHEETS_MIME_TYPE } from '../config/etl.js';
import type { ControlPanelSnapshot } from '../config/runSettings.js';
import { ConfigurationError } from '../utils/errors.js';
import { controlLogger } from '../utils/logger.js';
import { findWorksheet, type FileStoreGateway } from './fileStore.js';

/**
 * Spreadsheet ID from configuration, or looked up in Drive by name
 * @throws ConfigurationError when no spreadsheet has that name
 */
export async function resolveSpreadsheetId(
    gateway: FileStoreGateway,
    configuredId: string | undefined,
    name: string
): Promise<string> {
    if (configuredId) return configuredId;

    const file = await gateway.findFileByName(name, GOOGLE_SHEETS_MIME_TYPE);
    if (!file) {
        throw new ConfigurationError(`Spreadsheet "${name}" not found in Drive`, name);
    }
    controlLogger.debug({ name, spreadsheetId: file.id }, 'Resolved spreadsheet by name');
    return file.id;
}

/**
 * Read the switch cells (B3:B6 of the Config worksheet)
 * @throws ConfigurationError when the Config worksheet is missing
 */
export async function readControlPanel(
    gateway: FileStoreGateway,
    spreadsheetId: string
): Promise<ControlPanelSnapshot> {
    const worksheet = await findWorksheet(gateway, spreadsheetId, CONTROL_SHEET_NAME);
    if (!worksheet) {
        throw new ConfigurationError(
            `Worksheet "${CONTROL_SHEET_NAME}" not found in the control panel`,
            CONTROL_SHEET_NAME
        );
    }

    const rows = await gateway.readRange(spreadsheetId, CONTROL_RANGE);
    // Trailing empty rows are omitted by the API
    const cell = (index: number): string => rows[index]?.[0] ?? '';

    const snapshot: ControlPanelSnapshot = Object.freeze({
        pipeline: cell(0),
        backup: cell(1),
        alerts: cell(2),
        forecast: cell(3),
    });

    controlLogger.info({ ...snapshot }, 'Control panel read');
    return snapshot;
}
