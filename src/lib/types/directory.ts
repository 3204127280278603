/**
 * ACME Directory Types
 *
 * The resource-tagged protocol publishes a flat directory whose keys are
 * resource tags (`new-reg`, `new-authz`, ...) and whose values are URLs.
 */

export interface AcmeDirectory {
  /** URL for new registrations */
  'new-reg'?: string;

  /** URL for new authorizations */
  'new-authz'?: string;

  /** URL for new certificates */
  'new-cert'?: string;

  /** URL for certificate revocation */
  'revoke-cert'?: string;

  /** URL answering HEAD with a fresh Replay-Nonce (newer CAs only) */
  'new-nonce'?: string;

  /** Optional metadata about the CA */
  meta?: AcmeDirectoryMeta;
}

export interface AcmeDirectoryMeta {
  /** URL of the current subscriber agreement */
  'terms-of-service'?: string;

  /** Website URL for the CA */
  website?: string;
}
