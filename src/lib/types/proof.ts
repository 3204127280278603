/**
 * Public RSA parameters embedded in a challenge proof
 */
export interface RsaPublicJwk {
  kty: 'RSA';
  /** Modulus, base64url without padding */
  n: string;
  /** Public exponent, base64url without padding */
  e: string;
}

/**
 * Signed artifact binding a challenge token to the account key.
 *
 * `jws` is the compact serialization: its protected header carries `alg`
 * and `jwk`, its payload is `claim`.
 */
export interface ChallengeProof {
  readonly algorithm: 'RS256';
  readonly jwk: RsaPublicJwk;
  readonly claim: { readonly keyAuthorization: string };
  readonly jws: string;
}
