/**
 * Account Key Material
 *
 * Helpers that hold or load the account key pair. Keys are jose `KeyLike`
 * values: Node `KeyObject`s when loaded from PEM or generated here,
 * WebCrypto `CryptoKey`s when the caller brings its own.
 */

import * as jose from 'jose';
import { createPrivateKey, createPublicKey } from 'crypto';
import type { AccountKeyPair } from '../types/collaborators.js';

/**
 * RSA account key configuration (the only kind that can sign challenge proofs)
 */
export type AccountRsaAlgorithm = {
  kind: 'rsa';
  /** RSA key length - 2048 minimum */
  modulusLength: 2048 | 3072 | 4096;
};

/**
 * ECDSA account key configuration (usable by the transport only)
 */
export type AccountEcAlgorithm = {
  kind: 'ec';
  namedCurve: 'P-256' | 'P-384' | 'P-521';
};

export type AccountKeyAlgorithm = AccountRsaAlgorithm | AccountEcAlgorithm;

export type AccountJwsAlgorithm = 'RS256' | 'ES256' | 'ES384' | 'ES512';

const EC_JWS_ALGORITHMS: Record<AccountEcAlgorithm['namedCurve'], AccountJwsAlgorithm> = {
  'P-256': 'ES256',
  'P-384': 'ES384',
  'P-521': 'ES512',
};

export async function generateAccountKeyPair(
  algo: AccountKeyAlgorithm = { kind: 'rsa', modulusLength: 2048 },
): Promise<AccountKeyPair> {
  if (algo.kind === 'ec') {
    return jose.generateKeyPair(EC_JWS_ALGORITHMS[algo.namedCurve], { extractable: true });
  }

  return jose.generateKeyPair('RS256', { modulusLength: algo.modulusLength, extractable: true });
}

/**
 * Load an account key pair from a PEM private key (PKCS#1, PKCS#8 or SEC1).
 * The public half is derived from the private key.
 */
export function importAccountKeyPair(privateKeyPem: string): AccountKeyPair {
  const privateKey = createPrivateKey(privateKeyPem);
  return { privateKey, publicKey: createPublicKey(privateKey) };
}

/**
 * Detect the JWS algorithm for an account public key
 *
 * @throws {Error} For key types or curves the CA cannot verify
 */
export async function detectJwsAlgorithm(publicKey: jose.KeyLike): Promise<AccountJwsAlgorithm> {
  const jwk = await jose.exportJWK(publicKey);

  if (jwk.kty === 'EC') {
    switch (jwk.crv) {
      case 'P-256':
        return 'ES256';
      case 'P-384':
        return 'ES384';
      case 'P-521':
        return 'ES512';
      default:
        throw new Error(`Unsupported EC curve: ${jwk.crv}`);
    }
  }

  if (jwk.kty === 'RSA') {
    return 'RS256';
  }

  throw new Error(`Unsupported key type: ${jwk.kty}`);
}
