/**
 * Export files for tests, shaped like the real store downloads
 */

import { DOCUMENT_NAMES } from '../config/etl.js';
import type { InMemoryFileStore } from './inMemoryFileStore.js';

export const RAW_FOLDER_ID = 'folder-raw';
export const CONTROL_PANEL_ID = 'sheet-control';
export const MASTER_ID = 'sheet-master';
export const ARCHIVE_ID = 'sheet-archive';

type Row = Array<string | number>;

/** Delimited text; cells holding the delimiter or a quote are quoted */
export function toCsv(rows: Row[], delimiter: ',' | ';' = ','): string {
    const quote = (cell: string | number): string => {
        const text = String(cell);
        return text.includes(delimiter) || text.includes('"') ? `"${text.replace(/"/g, '""')}"` : text;
    };
    return rows.map(row => row.map(quote).join(delimiter)).join('\n') + '\n';
}

export const KEYWORDS_HEADER = ['DateTime', 'Rank 1', 'Rank 2 - 3', 'Rank 4 - 10', 'Rank 11-30', 'Rank 31-100', 'Rank 100+'];
export const GOOGLE_USERS_METRIC =
    'Utilisateurs actifs par mois (UAM) (Utilisateurs uniques, Par intervalle, Quotidiennes) : Tous les pays/régions';
export const APPLE_USERS_METRIC = 'Courses U : Magasin en ligne';

/** Title block above the App Store Connect users header */
export const APPLE_USERS_PREAMBLE: Row[] = [
    ['Utilisateurs connectés'],
    ['App : Courses U'],
    ['Période : 01/07/2025 - 16/07/2025'],
    ['Source : App Store Connect'],
];

export interface ExportContents {
    keywordsApple: string;
    keywordsGoogle: string;
    installsApple: string;
    installsGoogle: string;
    usersApple: string;
    usersGoogle: string;
}

/**
 * Two days either side of the agency start, one file per export.
 * Apple installs use semicolons and decimal commas like a French Excel export.
 */
export function defaultExports(): ExportContents {
    return {
        keywordsApple: toCsv([
            KEYWORDS_HEADER,
            ['14/07/2025', 1, 2, 3, 4, 5, 6],
            ['15/07/2025', 2, 3, 4, 5, 6, 7],
        ]),
        keywordsGoogle: toCsv([
            KEYWORDS_HEADER,
            ['2025-07-14', 10, 20, 30, 40, 50, 60],
            ['2025-07-15', 11, 21, 31, 41, 51, 61],
        ]),
        installsApple: toCsv([
            ['Date', 'Installs Apple'],
            ['14/07/2025', '1 204'],
            ['15/07/2025', '1 310,0'],
        ], ';'),
        installsGoogle: toCsv([
            ['Date', 'Installs Google Play'],
            ['14 juil. 2025', 800],
            ['15 juil. 2025', ''],
        ]),
        usersApple: toCsv([
            ...APPLE_USERS_PREAMBLE,
            ['Nom', APPLE_USERS_METRIC],
            ['14/07/2025', 5000],
            ['15/07/2025', 5100],
        ]),
        usersGoogle: toCsv([
            ['Date', GOOGLE_USERS_METRIC, 'Notes'],
            ['2025-07-14', 7000, ''],
            ['2025-07-15', 7200, 'Campagne TV'],
        ]),
    };
}

/** Put the six exports in the raw folder, with the names the stores use */
export function seedExports(store: InMemoryFileStore, contents: ExportContents = defaultExports()): void {
    store.addFile(RAW_FOLDER_ID, 'APPLE motcles - export.csv', contents.keywordsApple);
    store.addFile(RAW_FOLDER_ID, 'GOOGLE motcles - export.csv', contents.keywordsGoogle);
    store.addFile(RAW_FOLDER_ID, 'Installs Apple.csv', contents.installsApple);
    store.addFile(RAW_FOLDER_ID, 'Installs Google.csv', contents.installsGoogle);
    store.addFile(RAW_FOLDER_ID, 'Utilisateurs connectés Apple.csv', contents.usersApple);
    store.addFile(RAW_FOLDER_ID, 'Utilisateurs connectés Google.csv', contents.usersGoogle);
}

/** Control panel with the given switch values in B3:B6 */
export function seedControlPanel(
    store: InMemoryFileStore,
    switches: { pipeline?: string; backup?: string; alerts?: string; forecast?: string } = {}
): void {
    store.addSpreadsheet(CONTROL_PANEL_ID, DOCUMENT_NAMES.CONTROL_PANEL, {
        Config: [
            ['Setting', 'Value'],
            ['', ''],
            ['Pipeline', switches.pipeline ?? 'ON'],
            ['Backup', switches.backup ?? ''],
            ['Alerts', switches.alerts ?? ''],
            ['Forecast', switches.forecast ?? ''],
        ],
    });
}

/** Destination and archive spreadsheets, findable by name */
export function seedDocuments(store: InMemoryFileStore): void {
    store.addSpreadsheet(MASTER_ID, DOCUMENT_NAMES.MASTER);
    store.addSpreadsheet(ARCHIVE_ID, DOCUMENT_NAMES.ARCHIVE);
}
