/**
 * Boundary contracts the orchestrator consumes.
 */

import type { KeyLike } from 'jose';
import type { ChallengeProof } from './proof.js';
import type { AcmeRequest } from './requests.js';

/**
 * Account key material. Owned by the caller, borrowed by the orchestrator
 * and never mutated.
 */
export interface AccountKeyPair {
  privateKey: KeyLike;
  publicKey: KeyLike;
}

/** Header names are matched case-insensitively; values may repeat. */
export type ResponseHeaders = Record<string, string | string[] | undefined>;

export interface TransportResponse {
  status: number;
  headers: ResponseHeaders;
  /** UTF-8 body text, JSON for every resource this client reads */
  body: string;
}

/**
 * Authenticated channel to the CA. `post` accepts either a resource tag,
 * resolved through the CA directory, or an absolute resource URL.
 */
export interface SignedTransport {
  post(resourceOrUrl: string, payload: AcmeRequest): Promise<TransportResponse>;
  get(url: string): Promise<TransportResponse>;
}

/**
 * Makes a proof retrievable by the CA at
 * `http://<domain>/.well-known/acme-challenge/<token>`.
 * Must have completed before the challenge is submitted.
 */
export interface ChallengePublisher {
  provide(domain: string, token: string, proof: ChallengeProof): Promise<void>;
}

/**
 * Read-only view of locally stored certificates.
 */
export interface CertificateStore {
  pathFor(domain: string): Promise<string>;
  exists(path: string): Promise<boolean>;
  read(path: string): Promise<string>;
}
