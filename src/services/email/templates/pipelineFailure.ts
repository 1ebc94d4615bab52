/**
 * Failure alert, sent when a run stops on an error
 */

import type { PipelineStep } from '../../etl/state.js';
import { wrapInLayout, heading, paragraph, detailTable, detailRow, codeBlock, divider } from './layout.js';

export interface PipelineFailureData {
    executionDate: string;           // YYYY-MM-DD
    /** Where the run stopped, e.g. "ETL pipeline" or "Control panel" */
    context: string;
    errorType: string;
    /** Error category when the error is one of the pipeline's own */
    category: string | null;
    message: string;
    stack: string | null;
    /** Empty when the run failed before the pipeline started */
    steps: PipelineStep[];
}

export function renderPipelineFailure(data: PipelineFailureData): { html: string; text: string; subject: string } {
    const subject = `✗ ETL Pipeline Error - ${data.executionDate}`;

    const details =
        detailRow('Context', data.context) +
        detailRow('Error type', data.errorType) +
        (data.category ? detailRow('Category', data.category) : '') +
        detailRow('Message', data.message);

    const stepSection = data.steps.length > 0
        ? divider() + detailTable(data.steps
            .map(step => detailRow(step.name, step.error ? `${step.status}: ${step.error}` : step.status))
            .join(''))
        : '';

    const content = `
    ${heading('ETL pipeline failed')}
    ${paragraph(`The run for ${data.executionDate} stopped. Nothing after the failing step was written.`)}
    ${detailTable(details)}
    ${data.stack ? codeBlock(data.stack) : ''}
    ${stepSection}
  `;

    const text = [
        'ETL Pipeline Execution Failed',
        '',
        `Date: ${data.executionDate}`,
        `Context: ${data.context}`,
        `Error type: ${data.errorType}`,
        ...(data.category ? [`Category: ${data.category}`] : []),
        `Message: ${data.message}`,
        ...(data.stack ? ['', 'Stack trace:', data.stack] : []),
        ...data.steps.map(step => `- ${step.name}: ${step.status}`),
    ].join('\n');

    return {
        html: wrapInLayout(content, { preheader: subject, tone: 'error' }),
        text,
        subject,
    };
}
