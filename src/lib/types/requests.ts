/**
 * Signed request bodies, one variant per resource tag.
 */

import type { AcmeIdentifier } from './authorization.js';
import type { ACME_RESOURCE } from './status.js';

/** Creates an account for the signing key */
export interface NewRegistrationRequest {
  resource: typeof ACME_RESOURCE.NEW_REGISTRATION;
  contact: string[];
  agreement?: string;
}

/** Fetches (and optionally updates) an existing account */
export interface RegistrationRequest {
  resource: typeof ACME_RESOURCE.REGISTRATION;
  contact: string[];
  agreement?: string;
}

/** Asks the CA for an authorization covering one identifier */
export interface NewAuthorizationRequest {
  resource: typeof ACME_RESOURCE.NEW_AUTHORIZATION;
  identifier: AcmeIdentifier;
}

/** Answers a challenge of an authorization */
export interface ChallengeResponseRequest {
  resource: typeof ACME_RESOURCE.AUTHORIZATION;
  type: string;
  token: string;
  keyAuthorization: string;
}

export type AcmeRequest =
  | NewRegistrationRequest
  | RegistrationRequest
  | NewAuthorizationRequest
  | ChallengeResponseRequest;
