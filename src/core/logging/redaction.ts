/**
 * Redaction paths for pino. Only the variables resolution sets are logged,
 * but errors and bindings can still carry credentials from a caller.
 */
export const REDACTION_CONFIG = {
  paths: [
    'token',
    'secret',
    'password',
    'apiKey',
    'authorization',

    '*.token',
    '*.secret',
    '*.password',
    '*.apiKey',
  ] as string[],
  censor: '[REDACTED]',
};
