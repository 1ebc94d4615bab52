/**
 * Email Service: pipeline alerts sent through Resend.
 *
 * One email per run: a success report or a failure alert. Sending is skipped
 * (with a log line) when alerts are switched off or the Resend settings are
 * incomplete. A failed send is logged and reported back, never thrown, so it
 * cannot replace the pipeline's own outcome.
 */

import { Resend } from 'resend';
import type { Env } from '../../config/env.js';
import { NotificationError, toError } from '../../utils/errors.js';
import { emailLogger as log } from '../../utils/logger.js';
import {
    renderPipelineFailure,
    renderPipelineSuccess,
    type PipelineFailureData,
    type PipelineSuccessData,
} from './templates/index.js';

// ============================================
// TYPES
// ============================================

export interface EmailMessage {
    from: string;
    to: string[];
    subject: string;
    html: string;
    text: string;
}

/** Anything that can deliver a message; Resend in production */
export interface EmailSender {
    send(message: EmailMessage): Promise<{ messageId: string }>;
}

export interface EmailConfig {
    apiKey: string;
    from: string;
    to: string[];
}

export interface NotificationOptions {
    /** null when the Resend settings are incomplete */
    config: EmailConfig | null;
    alertsEnabled: boolean;
    /** Defaults to a Resend client built from the config */
    sender?: EmailSender;
}

export type SendResult =
    | { status: 'sent'; messageId: string }
    | { status: 'skipped'; reason: string }
    | { status: 'failed'; error: NotificationError };

// ============================================
// CONFIG
// ============================================

/**
 * Email settings from the environment, or null when any is missing
 */
export function resolveEmailConfig(
    env: Pick<Env, 'RESEND_API_KEY' | 'ALERT_EMAIL_FROM' | 'ALERT_EMAIL_TO'>
): EmailConfig | null {
    const to = env.ALERT_EMAIL_TO ?? [];
    if (!env.RESEND_API_KEY || !env.ALERT_EMAIL_FROM || to.length === 0) {
        return null;
    }
    return { apiKey: env.RESEND_API_KEY, from: env.ALERT_EMAIL_FROM, to };
}

// ============================================
// RESEND CLIENT
// ============================================

export class ResendSender implements EmailSender {
    private readonly client: Resend;

    constructor(apiKey: string) {
        this.client = new Resend(apiKey);
    }

    async send(message: EmailMessage): Promise<{ messageId: string }> {
        const { data, error } = await this.client.emails.send({
            from: message.from,
            to: message.to,
            subject: message.subject,
            html: message.html,
            text: message.text,
        });

        if (error) throw new Error(error.message);
        return { messageId: data?.id ?? '' };
    }
}

// ============================================
// MAIN SEND FUNCTION
// ============================================

async function deliver(
    templateKey: string,
    rendered: { html: string; text: string; subject: string },
    options: NotificationOptions
): Promise<SendResult> {
    if (!options.alertsEnabled) {
        log.info({ templateKey }, 'Email alerts disabled, not sending');
        return { status: 'skipped', reason: 'alerts disabled' };
    }

    const config = options.config;
    if (!config) {
        log.warn({ templateKey }, 'Email configuration incomplete, skipping notification');
        return { status: 'skipped', reason: 'email not configured' };
    }

    const sender = options.sender ?? new ResendSender(config.apiKey);
    try {
        const { messageId } = await sender.send({
            from: config.from,
            to: config.to,
            subject: rendered.subject,
            html: rendered.html,
            text: rendered.text,
        });
        log.info({ templateKey, to: config.to, messageId }, 'Email sent');
        return { status: 'sent', messageId };
    } catch (err: unknown) {
        const cause = toError(err);
        const error = new NotificationError(`Failed to send ${templateKey} email: ${cause.message}`, cause);
        log.error({ templateKey, error: error.message }, 'Email send failed');
        return { status: 'failed', error };
    }
}

export function sendSuccessNotification(
    data: PipelineSuccessData,
    options: NotificationOptions
): Promise<SendResult> {
    return deliver('pipeline_success', renderPipelineSuccess(data), options);
}

export function sendFailureNotification(
    data: PipelineFailureData,
    options: NotificationOptions
): Promise<SendResult> {
    return deliver('pipeline_failure', renderPipelineFailure(data), options);
}
