/**
 * Default configuration constants
 *
 * Fallbacks used when options objects leave a value out.
 */

// Status polling
export const MIN_POLL_DELAY_SECONDS = 1;

// Nonce pool
export const NONCE_MAX_AGE_MS = 120_000; // 2 minutes
export const NONCE_MAX_POOL_SIZE = 32;

// Challenge publication and certificate lookup
export const HTTP01_CHALLENGE_DIRECTORY = '.well-known/acme-challenge';
export const CERTIFICATE_FILE_EXTENSION = '.pem';
