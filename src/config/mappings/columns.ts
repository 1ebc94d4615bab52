/**
 * Column Mapping Configuration
 *
 * Translates the column names of each platform export into the canonical
 * schema, and recognises which export a Drive file is from its name.
 *
 * Apple and Google export the same metrics under different headers (and in
 * the case of active users, a completely different layout), so every
 * (data type, platform) pair has its own mapping.
 *
 * TO SUPPORT A RENAMED EXPORT COLUMN:
 * Update the `source` of the matching entry below. Header comparison ignores
 * repeated/no-break spaces, so only the visible text matters.
 */

import { ConfigurationError } from '../../utils/errors.js';

// ============================================
// TYPES
// ============================================

export const DATA_TYPES = ['keywords', 'installs', 'users'] as const;
export type DataType = typeof DATA_TYPES[number];

export const PLATFORMS = ['Apple', 'Google'] as const;
export type Platform = typeof PLATFORMS[number];

export interface ColumnMappingEntry {
    /** Header as it appears in the export */
    source: string;
    /** Canonical column it feeds */
    target: string;
    /** Absent columns are tolerated and produce empty values */
    optional?: boolean;
}

export interface SourceKey {
    dataType: DataType;
    platform: Platform;
}

// ============================================
// FILE RECOGNITION
// ============================================

/**
 * Fragment of the Drive file name that identifies each export
 */
export const FILE_PATTERNS: Record<DataType, Record<Platform, string>> = {
    keywords: {
        Apple: 'APPLE motcles',
        Google: 'GOOGLE motcles',
    },
    installs: {
        Apple: 'Installs Apple',
        Google: 'Installs Google',
    },
    users: {
        Apple: 'Utilisateurs connectés Apple',
        Google: 'Utilisateurs connectés Google',
    },
};

// Drive keeps the name as uploaded; files from macOS arrive in NFD
function normaliseFileName(name: string): string {
    return name.normalize('NFC').toLowerCase();
}

/**
 * Identify which export a file is from its name.
 * @throws ConfigurationError when no pattern matches
 */
export function identifySourceFile(fileName: string): SourceKey {
    const normalised = normaliseFileName(fileName);

    for (const dataType of DATA_TYPES) {
        for (const platform of PLATFORMS) {
            if (normalised.includes(normaliseFileName(FILE_PATTERNS[dataType][platform]))) {
                return { dataType, platform };
            }
        }
    }

    throw new ConfigurationError(`File not recognized: "${fileName}"`, fileName);
}

/**
 * Same as identifySourceFile, but returns null for unrelated files
 */
export function tryIdentifySourceFile(fileName: string): SourceKey | null {
    try {
        return identifySourceFile(fileName);
    } catch (error: unknown) {
        if (error instanceof ConfigurationError) return null;
        throw error;
    }
}

// ============================================
// CANONICAL SCHEMA
// ============================================

/**
 * Output column order per data type.
 * Platform and Stage are added by the transformer, never read from a file.
 */
export const STANDARD_COLUMNS = {
    keywords: ['Date', 'Rank_1', 'Rank_2_3', 'Rank_4_10', 'Rank_11_30', 'Rank_31_100', 'Rank_100_Plus', 'Platform', 'Stage'],
    installs: ['Date', 'Installs', 'Platform', 'Stage'],
    users: ['Date', 'Active_Users', 'Platform', 'Notes', 'Stage'],
} as const satisfies Record<DataType, readonly string[]>;

// ============================================
// COLUMN MAPPINGS
// ============================================

// Both stores are tracked by the same ranking tool, so the headers match
const KEYWORDS_MAPPING: readonly ColumnMappingEntry[] = [
    { source: 'DateTime', target: 'Date' },
    { source: 'Rank 1', target: 'Rank_1' },
    { source: 'Rank 2 - 3', target: 'Rank_2_3' },
    { source: 'Rank 4 - 10', target: 'Rank_4_10' },
    { source: 'Rank 11-30', target: 'Rank_11_30' },
    { source: 'Rank 31-100', target: 'Rank_31_100' },
    { source: 'Rank 100+', target: 'Rank_100_Plus' },
];

const COLUMN_MAPPINGS: Record<DataType, Record<Platform, readonly ColumnMappingEntry[]>> = {
    keywords: {
        Apple: KEYWORDS_MAPPING,
        Google: KEYWORDS_MAPPING,
    },
    installs: {
        Apple: [
            { source: 'Date', target: 'Date' },
            { source: 'Installs Apple', target: 'Installs' },
        ],
        Google: [
            { source: 'Date', target: 'Date' },
            { source: 'Installs Google Play', target: 'Installs' },
        ],
    },
    users: {
        // App Store Connect names the date column after the report ("Nom")
        // and the metric column after the app
        Apple: [
            { source: 'Nom', target: 'Date' },
            { source: 'Courses U : Magasin en ligne', target: 'Active_Users' },
        ],
        Google: [
            { source: 'Date', target: 'Date' },
            {
                source: 'Utilisateurs actifs par mois (UAM) (Utilisateurs uniques, Par intervalle, Quotidiennes) : Tous les pays/régions',
                target: 'Active_Users',
            },
            { source: 'Notes', target: 'Notes', optional: true },
        ],
    },
};

/**
 * Mapping from export headers to canonical columns for one export
 */
export function getColumnMapping(dataType: DataType, platform: Platform): readonly ColumnMappingEntry[] {
    return COLUMN_MAPPINGS[dataType][platform];
}

/**
 * Canonical column order for a data type
 */
export function getColumnsToKeep<D extends DataType>(dataType: D): (typeof STANDARD_COLUMNS)[D] {
    return STANDARD_COLUMNS[dataType];
}

/**
 * Header comparison key: collapses whitespace (including no-break spaces)
 * and Unicode composition differences.
 */
export function normaliseHeader(header: string): string {
    return header.normalize('NFC').replace(/\s+/g, ' ').trim();
}
