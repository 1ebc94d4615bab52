/**
 * Call policy shared by the Drive and Sheets clients
 *
 * - Rate limiter: keeps a minimum delay between consecutive calls
 * - Retry: exponential backoff on 429/500/503, up to maxRetries
 * - Every failure that escapes is a TransportError naming the call
 */

import type { Logger } from 'pino';
import { TransportError } from './errors.js';

// ============================================
// TYPES
// ============================================

export interface ApiCallPolicy {
    /** Minimum delay between two calls (ms) */
    minIntervalMs: number;
    /** Retries on transient errors; 0 disables retrying */
    maxRetries: number;
}

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

const TRANSIENT_STATUS_CODES = new Set([429, 500, 503]);

// ============================================
// HELPERS
// ============================================

/**
 * Extract the HTTP status from a googleapis error.
 * GaxiosError exposes it as `code` (string) and on `response.status`.
 */
export function getStatusCode(error: unknown): number | null {
    if (typeof error !== 'object' || error === null) return null;

    if ('response' in error) {
        const response = error.response;
        if (typeof response === 'object' && response !== null && 'status' in response) {
            const status = Number(response.status);
            if (Number.isFinite(status)) return status;
        }
    }

    if ('code' in error) {
        const code = Number(error.code);
        if (Number.isFinite(code)) return code;
    }

    return null;
}

// ============================================
// CALLER
// ============================================

export class GoogleApiCaller {
    private lastCallAt = 0;

    constructor(
        private readonly serviceName: string,
        private readonly policy: ApiCallPolicy,
        private readonly logger: Logger,
        private readonly sleep: Sleep = defaultSleep,
    ) {}

    /**
     * Wait if needed to respect the minimum delay between calls
     */
    private async rateLimit(): Promise<void> {
        const now = Date.now();
        const elapsed = now - this.lastCallAt;
        if (elapsed < this.policy.minIntervalMs) {
            await this.sleep(this.policy.minIntervalMs - elapsed);
        }
        this.lastCallAt = Date.now();
    }

    /**
     * Run one API call under the policy
     */
    async call<T>(label: string, operation: () => Promise<T>): Promise<T> {
        for (let attempt = 0; ; attempt++) {
            try {
                await this.rateLimit();
                return await operation();
            } catch (error: unknown) {
                const statusCode = getStatusCode(error);
                const isTransient = statusCode !== null && TRANSIENT_STATUS_CODES.has(statusCode);

                if (!isTransient || attempt >= this.policy.maxRetries) {
                    const original = error instanceof Error ? error : new Error(String(error));
                    throw new TransportError(
                        `${this.serviceName} ${label} failed: ${original.message}`,
                        this.serviceName,
                        label,
                        statusCode,
                        original,
                    );
                }

                const delay = Math.pow(2, attempt) * 1000; // 1s, 2s, 4s
                this.logger.warn(
                    { attempt: attempt + 1, delay, statusCode, label },
                    'Retrying after transient error'
                );
                await this.sleep(delay);
            }
        }
    }
}
