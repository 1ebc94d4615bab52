/**
 * Custom error classes for the pipeline
 * Every error aborts the run; the category tells the failure report what went wrong.
 */

export type ErrorCategory = 'configuration' | 'data' | 'transport' | 'notification';

/**
 * Base interface for pipeline errors
 */
export interface PipelineError extends Error {
    readonly category: ErrorCategory;
}

/**
 * Configuration error - a folder, file, spreadsheet, worksheet or setting is missing
 *
 * @example
 * throw new ConfigurationError('File not found for installs/Apple', 'Installs Apple');
 */
export class ConfigurationError extends Error implements PipelineError {
    readonly name = 'ConfigurationError' as const;
    readonly category = 'configuration' as const;
    readonly subject: string | null;

    constructor(message: string, subject: string | null = null) {
        super(message);
        this.subject = subject;
        Object.setPrototypeOf(this, ConfigurationError.prototype);
    }
}

/**
 * Data error - a source file does not have the expected shape
 * Use for missing columns and values that cannot be parsed
 *
 * @example
 * throw new DataError('Unparsable date', { value: '31/02/2024', source: 'Installs Apple.xlsx' });
 */
export class DataError extends Error implements PipelineError {
    readonly name = 'DataError' as const;
    readonly category = 'data' as const;
    readonly details: Record<string, unknown>;

    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message);
        this.details = details;
        Object.setPrototypeOf(this, DataError.prototype);
    }
}

/**
 * Transport error - a Google API call failed
 */
export class TransportError extends Error implements PipelineError {
    readonly name = 'TransportError' as const;
    readonly category = 'transport' as const;
    readonly serviceName: string;
    readonly operation: string;
    readonly statusCode: number | null;
    readonly originalError: Error | null;

    constructor(
        message: string,
        serviceName: string,
        operation: string,
        statusCode: number | null = null,
        originalError: Error | null = null
    ) {
        super(message);
        this.serviceName = serviceName;
        this.operation = operation;
        this.statusCode = statusCode;
        this.originalError = originalError;
        Object.setPrototypeOf(this, TransportError.prototype);
    }
}

/**
 * Notification error - the alert email could not be sent
 * Logged only; never replaces the pipeline outcome.
 */
export class NotificationError extends Error implements PipelineError {
    readonly name = 'NotificationError' as const;
    readonly category = 'notification' as const;
    readonly originalError: Error | null;

    constructor(message: string, originalError: Error | null = null) {
        super(message);
        this.originalError = originalError;
        Object.setPrototypeOf(this, NotificationError.prototype);
    }
}

/**
 * Type guard for the pipeline's own errors
 */
export function isPipelineError(error: unknown): error is PipelineError {
    return error instanceof ConfigurationError
        || error instanceof DataError
        || error instanceof TransportError
        || error instanceof NotificationError;
}

/**
 * Normalise anything thrown into an Error
 */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
