/**
 * Challenge-Response Signing
 *
 * Binds a challenge token to the account key: the proof is a compact JWS
 * over `{ keyAuthorization: token }` whose protected header embeds the RSA
 * public parameters, so the CA can check it against the key it already
 * associated with the authorization.
 */

import { CompactSign, exportJWK } from 'jose';
import { ProtocolViolationError, UnsupportedKeyTypeError } from '../errors/acme-operation-errors.js';
import type { AccountKeyPair } from '../types/collaborators.js';
import type { ChallengeProof, RsaPublicJwk } from '../types/proof.js';
import { debugChallenge } from '../utils/debug.js';

/** Shape every challenge token must have before it may reach a file path or a JWS. */
export const CHALLENGE_TOKEN_PATTERN = /^[A-Za-z0-9_-]+$/;

export function isValidChallengeToken(token: string): boolean {
  return CHALLENGE_TOKEN_PATTERN.test(token);
}

/**
 * @throws {ProtocolViolationError} When the token has characters outside `[A-Za-z0-9_-]`
 */
export function assertValidChallengeToken(token: string): void {
  if (!isValidChallengeToken(token)) {
    throw ProtocolViolationError.invalidToken(token);
  }
}

export class AcmeChallengeSigner {
  constructor(private readonly keys: AccountKeyPair) {}

  /**
   * Sign a challenge token with the account key.
   *
   * The token is checked before the key is touched.
   *
   * @throws {ProtocolViolationError} When the token is malformed
   * @throws {UnsupportedKeyTypeError} When the account key is not RSA
   */
  async signChallenge(token: string): Promise<ChallengeProof> {
    assertValidChallengeToken(token);

    const jwk = await this.exportRsaJwk();
    const claim = { keyAuthorization: token };

    const jws = await new CompactSign(new TextEncoder().encode(JSON.stringify(claim)))
      .setProtectedHeader({ alg: 'RS256', jwk })
      .sign(this.keys.privateKey);

    debugChallenge('signed proof for token=%s', token);

    return { algorithm: 'RS256', jwk, claim, jws };
  }

  private async exportRsaJwk(): Promise<RsaPublicJwk> {
    const jwk = await exportJWK(this.keys.publicKey);

    if (jwk.kty !== 'RSA' || !jwk.n || !jwk.e) {
      throw UnsupportedKeyTypeError.forKeyType(jwk.kty ?? 'unknown');
    }

    return { kty: 'RSA', n: jwk.n, e: jwk.e };
  }
}
