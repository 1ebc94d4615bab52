/**
 * Google Drive API v3 Client (Service Account)
 *
 * Lists the export folder, locates documents by name and downloads file
 * contents. Calls go through GoogleApiCaller (rate limit + optional retry).
 */

import type { drive_v3 } from 'googleapis';
import { driveLogger } from '../utils/logger.js';
import { GoogleApiCaller, type ApiCallPolicy } from '../utils/googleApi.js';
import { TransportError } from '../utils/errors.js';
import { GOOGLE_SHEETS_MIME_TYPE, XLSX_MIME_TYPE } from '../config/etl.js';
import type { DriveFile } from './fileStore.js';

// ============================================
// HELPERS
// ============================================

function escapeQueryValue(value: string): string {
    return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

/**
 * googleapis resolves `responseType: 'arraybuffer'` downloads to an ArrayBuffer,
 * but types the payload as the file resource.
 */
function toBuffer(data: unknown, label: string): Buffer {
    if (Buffer.isBuffer(data)) return data;
    if (data instanceof ArrayBuffer) return Buffer.from(data);
    if (data instanceof Uint8Array) return Buffer.from(data);
    if (typeof data === 'string') return Buffer.from(data, 'utf-8');
    throw new TransportError(`Drive ${label} returned no file content`, 'drive', label);
}

function toDriveFile(file: drive_v3.Schema$File): DriveFile | null {
    if (!file.id || !file.name || !file.mimeType) return null;
    return {
        id: file.id,
        name: file.name,
        mimeType: file.mimeType,
        modifiedTime: file.modifiedTime ?? undefined,
    };
}

// ============================================
// CLIENT
// ============================================

export class DriveClient {
    private readonly caller: GoogleApiCaller;

    constructor(private readonly drive: drive_v3.Drive, policy: ApiCallPolicy) {
        this.caller = new GoogleApiCaller('drive', policy, driveLogger);
    }

    /**
     * List all files (not folders) inside a folder, newest first.
     */
    async listFolder(folderId: string): Promise<DriveFile[]> {
        const items: DriveFile[] = [];
        let pageToken: string | undefined;

        do {
            const result = await this.caller.call(
                `listFolder(${folderId})`,
                () => this.drive.files.list({
                    q: `'${escapeQueryValue(folderId)}' in parents and trashed=false and mimeType!='application/vnd.google-apps.folder'`,
                    fields: 'nextPageToken,files(id,name,mimeType,modifiedTime)',
                    orderBy: 'modifiedTime desc',
                    pageSize: 100,
                    pageToken,
                    supportsAllDrives: true,
                    includeItemsFromAllDrives: true,
                })
            );

            for (const f of result.data.files ?? []) {
                const file = toDriveFile(f);
                if (file) items.push(file);
            }
            pageToken = result.data.nextPageToken ?? undefined;
        } while (pageToken);

        driveLogger.debug({ folderId, count: items.length }, 'Listed Drive folder');
        return items;
    }

    /**
     * Find a file by exact name anywhere the service account can see.
     * @returns null when nothing matches
     */
    async findFileByName(name: string, mimeType?: string): Promise<DriveFile | null> {
        let query = `name='${escapeQueryValue(name)}' and trashed=false`;
        if (mimeType) query += ` and mimeType='${escapeQueryValue(mimeType)}'`;

        const result = await this.caller.call(
            `findFileByName(${name})`,
            () => this.drive.files.list({
                q: query,
                fields: 'files(id,name,mimeType,modifiedTime)',
                orderBy: 'modifiedTime desc',
                pageSize: 1,
                supportsAllDrives: true,
                includeItemsFromAllDrives: true,
            })
        );

        const first = result.data.files?.[0];
        return first ? toDriveFile(first) : null;
    }

    /**
     * Download file bytes. Native Google Sheets are exported as XLSX.
     */
    async downloadFile(file: DriveFile): Promise<Buffer> {
        const label = `downloadFile(${file.name})`;

        if (file.mimeType === GOOGLE_SHEETS_MIME_TYPE) {
            const response = await this.caller.call(
                label,
                () => this.drive.files.export(
                    { fileId: file.id, mimeType: XLSX_MIME_TYPE },
                    { responseType: 'arraybuffer' }
                )
            );
            return toBuffer(response.data, label);
        }

        const response = await this.caller.call(
            label,
            () => this.drive.files.get(
                { fileId: file.id, alt: 'media', supportsAllDrives: true },
                { responseType: 'arraybuffer' }
            )
        );
        const bytes = toBuffer(response.data, label);
        driveLogger.debug({ fileId: file.id, fileName: file.name, bytes: bytes.length }, 'Downloaded file');
        return bytes;
    }
}
