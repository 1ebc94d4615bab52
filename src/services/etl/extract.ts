/**
 * Extraction
 *
 * Lists the export folder, recognises the six platform exports by name,
 * downloads each one and parses it into a cell grid. Row content is not
 * validated here; bad rows surface in the transformer.
 */

import {
    FILE_PATTERNS,
    tryIdentifySourceFile,
    type DataType,
    type Platform,
} from '../../config/mappings/columns.js';
import { ConfigurationError } from '../../utils/errors.js';
import { etlLogger } from '../../utils/logger.js';
import type { DriveFile, FileStoreGateway } from '../fileStore.js';
import { parseSourceFile } from './parse.js';
import type { ExtractedData, PlatformTables, RawTable } from './types.js';

// ============================================
// FILE SELECTION
// ============================================

type SourceFiles = Record<DataType, Record<Platform, DriveFile>>;

/**
 * Pick one file per (data type, platform).
 * The folder listing is newest first, so the first match wins when an
 * export was uploaded twice.
 *
 * @throws ConfigurationError naming the first export that has no file
 */
export function selectSourceFiles(files: DriveFile[]): SourceFiles {
    const found = new Map<string, DriveFile>();

    for (const file of files) {
        const key = tryIdentifySourceFile(file.name);
        if (!key) {
            etlLogger.debug({ fileName: file.name }, 'Ignoring unrecognized file');
            continue;
        }
        const mapKey = `${key.dataType}/${key.platform}`;
        const existing = found.get(mapKey);
        if (existing) {
            etlLogger.warn(
                { kept: existing.name, ignored: file.name, source: mapKey },
                'Several files match the same export; keeping the newest'
            );
            continue;
        }
        found.set(mapKey, file);
    }

    const pick = (dataType: DataType, platform: Platform): DriveFile => {
        const file = found.get(`${dataType}/${platform}`);
        if (!file) {
            throw new ConfigurationError(
                `File not found for ${dataType}/${platform} (expected a name containing "${FILE_PATTERNS[dataType][platform]}")`,
                FILE_PATTERNS[dataType][platform]
            );
        }
        return file;
    };

    return {
        keywords: { Apple: pick('keywords', 'Apple'), Google: pick('keywords', 'Google') },
        installs: { Apple: pick('installs', 'Apple'), Google: pick('installs', 'Google') },
        users: { Apple: pick('users', 'Apple'), Google: pick('users', 'Google') },
    };
}

// ============================================
// EXTRACT
// ============================================

async function extractFile(
    gateway: FileStoreGateway,
    file: DriveFile,
    dataType: DataType,
    platform: Platform
): Promise<RawTable> {
    etlLogger.info({ fileName: file.name, dataType, platform }, 'Downloading export');
    const bytes = await gateway.downloadFile(file);
    const { grid, date1904 } = parseSourceFile(file.name, bytes);
    return { fileName: file.name, dataType, platform, grid, date1904 };
}

/**
 * Download and parse all six exports from the folder.
 * @returns grids grouped by data type, then platform
 */
export async function extract(gateway: FileStoreGateway, folderId: string): Promise<ExtractedData> {
    const files = await gateway.listFolder(folderId);
    etlLogger.info({ folderId, fileCount: files.length }, 'Listed export folder');

    const selected = selectSourceFiles(files);

    // One Drive download at a time
    const extractPair = async (dataType: DataType): Promise<PlatformTables> => ({
        Apple: await extractFile(gateway, selected[dataType].Apple, dataType, 'Apple'),
        Google: await extractFile(gateway, selected[dataType].Google, dataType, 'Google'),
    });

    return {
        keywords: await extractPair('keywords'),
        installs: await extractPair('installs'),
        users: await extractPair('users'),
    };
}

/**
 * Raw row count of a grid (everything below the first row)
 */
export function rawRowCount(table: RawTable): number {
    return Math.max(0, table.grid.length - 1);
}
