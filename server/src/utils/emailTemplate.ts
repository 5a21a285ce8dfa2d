import { SanitizedField } from './sanitize';

/**
 * Render sanitized fields as a minimal HTML document with one table row per
 * field. Callers pass fields already sorted (see sanitizePayload), so the
 * output is deterministic.
 */
export function renderSubmissionEmail(fields: SanitizedField[]): string {
  const rows = fields
    .map((f) => `        <tr><td><code>${f.name}</code></td><td><pre>${f.value}</pre></td></tr>\n`)
    .join('');

  return (
    '<html>\n' +
    '  <body>\n' +
    '    <h1>New Submission</h1>\n' +
    '    <table width="600" style="border:1px solid #333">\n' +
    '      <thead>\n' +
    '        <tr><th align="left">Field</th><th align="left">Value</th></tr>\n' +
    '      </thead>\n' +
    '      <tbody>\n' +
    rows +
    '      </tbody>\n' +
    '    </table>\n' +
    '  </body>\n' +
    '</html>\n'
  );
}
