/**
 * ACME Status, Challenge Type and Resource Constants
 *
 * Runtime constants paired with literal types, for the resource-tagged
 * (pre-RFC 8555) ACME protocol where every request body names its resource.
 */

/**
 * ACME Challenge Status
 *
 * Challenge status transitions:
 * pending -> (valid|invalid)
 *
 * Both outcomes are terminal.
 */
export const CHALLENGE_STATUS = {
  PENDING: 'pending',
  VALID: 'valid',
  INVALID: 'invalid',
} as const;

export type AcmeChallengeStatus = (typeof CHALLENGE_STATUS)[keyof typeof CHALLENGE_STATUS];

/**
 * ACME Challenge Types
 *
 * Only HTTP_01 can be answered by this client; the others are listed so
 * authorizations offering them can be logged by name.
 */
export const CHALLENGE_TYPE = {
  HTTP_01: 'http-01',
  DNS_01: 'dns-01',
  TLS_SNI_01: 'tls-sni-01',
} as const;

export type AcmeChallengeType = (typeof CHALLENGE_TYPE)[keyof typeof CHALLENGE_TYPE];

/**
 * ACME resource tags
 *
 * Sent as the `resource` member of every signed request body. The new-* tags
 * also key the CA directory.
 */
export const ACME_RESOURCE = {
  NEW_REGISTRATION: 'new-reg',
  REGISTRATION: 'reg',
  NEW_AUTHORIZATION: 'new-authz',
  AUTHORIZATION: 'authz',
} as const;

export type AcmeResource = (typeof ACME_RESOURCE)[keyof typeof ACME_RESOURCE];
