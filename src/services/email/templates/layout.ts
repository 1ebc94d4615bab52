/**
 * Shared email layout for the pipeline reports.
 * Inline styles only (email clients don't support external CSS).
 */

const TEXT_COLOR = '#1a1a1a';
const BG_COLOR = '#f4f6f8';
const SUCCESS_COLOR = '#1e8449';
const ERROR_COLOR = '#c0392b';
const FONT_STACK = "'Helvetica Neue', Helvetica, Arial, sans-serif";
const MONO_STACK = "Menlo, Consolas, 'Courier New', monospace";

export type Tone = 'success' | 'error';

/** Escape text interpolated into HTML */
export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

export function wrapInLayout(content: string, options?: { preheader?: string; tone?: Tone }): string {
    const preheader = options?.preheader ?? '';
    const accent = options?.tone === 'error' ? ERROR_COLOR : SUCCESS_COLOR;

    return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>ASO Data Pipeline</title>
</head>
<body style="margin:0;padding:0;background-color:${BG_COLOR};font-family:${FONT_STACK};color:${TEXT_COLOR};line-height:1.6;">
  ${preheader ? `<div style="display:none;max-height:0;overflow:hidden;">${escapeHtml(preheader)}</div>` : ''}

  <!-- Container -->
  <table role="presentation" width="100%" cellpadding="0" cellspacing="0" style="background-color:${BG_COLOR};">
    <tr>
      <td align="center" style="padding:32px 16px;">
        <table role="presentation" width="600" cellpadding="0" cellspacing="0" style="background-color:#ffffff;border-radius:8px;overflow:hidden;max-width:600px;width:100%;border-top:4px solid ${accent};">

          <!-- Header -->
          <tr>
            <td style="padding:24px 40px 16px;border-bottom:1px solid #eee;">
              <h1 style="margin:0;font-size:16px;font-weight:600;letter-spacing:1px;color:${TEXT_COLOR};text-transform:uppercase;">
                ASO Data Pipeline
              </h1>
            </td>
          </tr>

          <!-- Body -->
          <tr>
            <td style="padding:32px 40px;">
              ${content}
            </td>
          </tr>

          <!-- Footer -->
          <tr>
            <td style="padding:16px 40px 24px;border-top:1px solid #eee;">
              <p style="margin:0;font-size:12px;color:#888;">Automated message from the daily store-analytics job.</p>
            </td>
          </tr>

        </table>
      </td>
    </tr>
  </table>
</body>
</html>`;
}

/** Render a simple heading */
export function heading(text: string): string {
    return `<h2 style="margin:0 0 16px;font-size:20px;font-weight:600;color:${TEXT_COLOR};">${escapeHtml(text)}</h2>`;
}

/** Render a paragraph */
export function paragraph(text: string): string {
    return `<p style="margin:0 0 16px;font-size:15px;color:#333;">${escapeHtml(text)}</p>`;
}

/** Render a key-value detail row */
export function detailRow(label: string, value: string): string {
    return `<tr>
    <td style="padding:6px 0;font-size:14px;color:#666;width:160px;vertical-align:top;">${escapeHtml(label)}</td>
    <td style="padding:6px 0;font-size:14px;color:${TEXT_COLOR};font-weight:500;">${escapeHtml(value)}</td>
  </tr>`;
}

/** Wrap detail rows in a table */
export function detailTable(rows: string): string {
    return `<table role="presentation" width="100%" cellpadding="0" cellspacing="0" style="margin:0 0 24px;">
    ${rows}
  </table>`;
}

/** Preformatted block, used for stack traces */
export function codeBlock(text: string): string {
    return `<pre style="margin:0 0 16px;padding:12px;background-color:#f7f7f7;border-radius:4px;font-family:${MONO_STACK};font-size:12px;white-space:pre-wrap;word-break:break-word;">${escapeHtml(text)}</pre>`;
}

/** Render a divider */
export function divider(): string {
    return `<hr style="border:none;border-top:1px solid #eee;margin:24px 0;">`;
}

/** 1234567 → "1,234,567" */
export function formatCount(value: number): string {
    return new Intl.NumberFormat('en-US').format(value);
}
