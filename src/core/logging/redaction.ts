/**
 * Redaction configuration for pino.
 *
 * Submitted input may hold passwords or personal data: raw field values never
 * reach the logs, only their names and counts.
 */
export const REDACTION_CONFIG = {
  paths: [
    // Raw submissions
    'input.*',
    'values.*',

    // Credentials logged by callers
    'password',
    '*.password',
    'token',
    '*.token',
  ],
  censor: '[REDACTED]',
};
