/**
 * ACME Registration Types
 */

/**
 * Registration resource as returned by the CA
 */
export interface AcmeRegistration {
  id?: number | string;
  contact?: string[];
  agreement?: string;
  createdAt?: string;
  status?: string;
}

/**
 * Authoritative outcome of `register()`.
 *
 * `location` is the account URL when the CA announced one (the Location
 * header of a 201, or the location a 409 Conflict pointed at).
 */
export interface RegistrationRecord {
  location?: string;
  registration: AcmeRegistration;
}
