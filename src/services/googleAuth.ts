/**
 * Google Authentication
 *
 * Exchanges the service-account key for the two API handles the job needs
 * (Sheets v4 and Drive v3) and wraps them in a FileStoreGateway.
 */

import { google, type drive_v3, type sheets_v4 } from 'googleapis';
import { z } from 'zod';
import { GOOGLE_API_SCOPES } from '../config/etl.js';
import { ConfigurationError } from '../utils/errors.js';
import type { ApiCallPolicy } from '../utils/googleApi.js';
import { jobLogger } from '../utils/logger.js';
import { DriveClient } from './googleDriveClient.js';
import { SheetsClient } from './googleSheetsClient.js';
import { GoogleFileStore, type FileStoreGateway } from './fileStore.js';

// ============================================
// TYPES
// ============================================

const serviceAccountKeySchema = z.object({
    client_email: z.string().min(1),
    private_key: z.string().min(1),
});

export type ServiceAccountKey = z.infer<typeof serviceAccountKeySchema>;

export interface GoogleApiHandles {
    sheets: sheets_v4.Sheets;
    drive: drive_v3.Drive;
}

// ============================================
// AUTH
// ============================================

/**
 * Parse and validate the service-account JSON.
 * @throws ConfigurationError when the blob is not JSON or lacks the key fields
 */
export function parseServiceAccountKey(json: string): ServiceAccountKey {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Invalid JSON in GOOGLE_SERVICE_ACCOUNT_JSON: ${message}`, 'GOOGLE_SERVICE_ACCOUNT_JSON');
    }

    const result = serviceAccountKeySchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigurationError(
            'GOOGLE_SERVICE_ACCOUNT_JSON must contain client_email and private_key',
            'GOOGLE_SERVICE_ACCOUNT_JSON'
        );
    }
    return result.data;
}

/**
 * Build authenticated Sheets and Drive handles from a service-account key.
 */
export function authenticate(serviceAccountJson: string): GoogleApiHandles {
    const keyFile = parseServiceAccountKey(serviceAccountJson);

    const auth = new google.auth.JWT({
        email: keyFile.client_email,
        key: keyFile.private_key,
        scopes: [...GOOGLE_API_SCOPES],
    });

    const handles: GoogleApiHandles = {
        sheets: google.sheets({ version: 'v4', auth }),
        drive: google.drive({ version: 'v3', auth }),
    };

    jobLogger.info({ serviceAccount: keyFile.client_email }, 'Google API clients initialized');
    return handles;
}

/**
 * Gateway over authenticated handles
 */
export function createFileStore(handles: GoogleApiHandles, policy: ApiCallPolicy): FileStoreGateway {
    return new GoogleFileStore(
        new DriveClient(handles.drive, policy),
        new SheetsClient(handles.sheets, policy),
    );
}
