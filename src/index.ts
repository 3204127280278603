/**
 * acme-authorizer - Proof of domain control for ACME certificate authorities
 *
 * Main entry point
 */

export * from './lib/index.js';
