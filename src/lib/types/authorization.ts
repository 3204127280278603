/**
 * ACME Authorization and Challenge Types
 */

/**
 * ACME Identifier
 */
export interface AcmeIdentifier {
  /** Type of identifier (always 'dns' for this client) */
  type: string;
  /** The identifier value (domain name) */
  value: string;
}

/**
 * Problem document returned by the CA (RFC 7807 shape)
 */
export interface AcmeProblem {
  /** Problem type URN, e.g. `urn:acme:error:unauthorized` */
  type?: string;
  /** Human-readable description */
  detail?: string;
  /** HTTP status the CA associated with the problem */
  status?: number;
}

/**
 * One way of proving control over the authorized identifier
 */
export interface AcmeChallenge {
  /** Challenge type tag, e.g. `http-01` */
  type: string;
  /** Opaque token; absent for challenge types that need none */
  token?: string;
  /** Challenge status as reported by the CA */
  status?: string;
  /** Challenge resource URL */
  uri?: string;
  /** Validation error, present once validation failed */
  error?: AcmeProblem;
}

/**
 * Server-issued authorization for one domain
 */
export interface AcmeAuthorization {
  identifier?: AcmeIdentifier;
  status?: string;
  expires?: string;
  challenges: AcmeChallenge[];
  /**
   * Index sets into `challenges`; completing every challenge of any one set
   * satisfies the authorization.
   */
  combinations?: number[][];
}

/**
 * A freshly requested authorization together with its resource location
 */
export interface PendingAuthorization {
  location: string;
  authorization: AcmeAuthorization;
}
