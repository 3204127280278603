/**
 * Signed Transport for the resource-tagged ACME protocol
 *
 * Encapsulates: AcmeHttpClient, NonceManager, directory lookup and JWS
 * creation. Every POST body is a flattened JWS whose protected header
 * carries the account `jwk`, a fresh nonce and the target URL.
 */

import { FlattenedSign, exportJWK, type JWK, type JWSHeaderParameters } from 'jose';
import { ProtocolViolationError, UnexpectedStatusError } from '../errors/acme-operation-errors.js';
import { NonceManager, type NonceManagerOptions } from '../managers/nonce-manager.js';
import { detectJwsAlgorithm, type AccountJwsAlgorithm } from '../crypto/account-keys.js';
import type {
  AccountKeyPair,
  SignedTransport,
  TransportResponse,
} from '../types/collaborators.js';
import type { AcmeDirectory } from '../types/directory.js';
import type { AcmeRequest } from '../types/requests.js';
import { DirectorySchema, decodeBody, readProblem } from '../validation/schemas.js';
import { debugHttp } from '../utils/debug.js';
import { AcmeHttpClient, type HttpResponse } from './http-client.js';
import { getHeader } from './headers.js';

const ABSOLUTE_URL = /^https?:\/\//i;
const BAD_NONCE = 400;

const DIRECTORY_RESOURCES = ['new-reg', 'new-authz', 'new-cert', 'revoke-cert', 'new-nonce'] as const;
type DirectoryResource = (typeof DIRECTORY_RESOURCES)[number];

function isDirectoryResource(value: string): value is DirectoryResource {
  return DIRECTORY_RESOURCES.some((resource) => resource === value);
}

export interface JwsSignedTransportOptions {
  /** HTTP layer; one is created when omitted */
  http?: AcmeHttpClient;
  /** Nonce pool tuning */
  nonce?: Omit<NonceManagerOptions, 'fetchNonce'>;
}

export class JwsSignedTransport implements SignedTransport {
  private readonly http: AcmeHttpClient;
  private readonly nonces: NonceManager;
  private directory?: Promise<AcmeDirectory>;
  private signing?: Promise<{ alg: AccountJwsAlgorithm; jwk: JWK }>;

  constructor(
    public readonly directoryUrl: string,
    private readonly keys: AccountKeyPair,
    opts: JwsSignedTransportOptions = {},
  ) {
    this.http = opts.http ?? new AcmeHttpClient();
    this.nonces = new NonceManager({
      ...opts.nonce,
      fetchNonce: () => this.fetchNonce(),
    });
  }

  /**
   * Fetch and cache the CA directory
   *
   * @throws {UnexpectedStatusError} When the directory does not answer 200
   */
  async getDirectory(): Promise<AcmeDirectory> {
    if (!this.directory) {
      // A failed load is not cached
      this.directory = this.loadDirectory().catch((error: unknown) => {
        this.directory = undefined;
        throw error;
      });
    }
    return this.directory;
  }

  /**
   * Map a resource tag to its directory URL; absolute URLs pass through
   *
   * @throws {ProtocolViolationError} When the directory has no such entry
   */
  async resolveUrl(resourceOrUrl: string): Promise<string> {
    if (ABSOLUTE_URL.test(resourceOrUrl)) {
      return resourceOrUrl;
    }

    const directory = await this.getDirectory();
    const entry = isDirectoryResource(resourceOrUrl) ? directory[resourceOrUrl] : undefined;
    if (entry === undefined) {
      throw ProtocolViolationError.unknownResource(resourceOrUrl);
    }
    return entry;
  }

  /** Signed POST; re-signed once with a new nonce when the CA rejects the nonce */
  async post(resourceOrUrl: string, payload: AcmeRequest): Promise<TransportResponse> {
    const url = await this.resolveUrl(resourceOrUrl);

    let response = await this.signedPost(url, payload);
    if (response.status === BAD_NONCE && isBadNonce(response.body)) {
      debugHttp('POST %s rejected nonce, retrying once', url);
      response = await this.signedPost(url, payload);
    }
    return response;
  }

  async get(url: string): Promise<TransportResponse> {
    return this.toTransportResponse(await this.http.get(url));
  }

  private async signedPost(url: string, payload: AcmeRequest): Promise<TransportResponse> {
    const { alg, jwk } = await this.getSigningMaterial();
    const nonce = await this.nonces.get();

    const header: JWSHeaderParameters = { alg, jwk, nonce, url };
    const jws = await new FlattenedSign(new TextEncoder().encode(JSON.stringify(payload)))
      .setProtectedHeader(header)
      .sign(this.keys.privateKey);

    const res = await this.http.post(url, JSON.stringify(jws), {
      'Content-Type': 'application/jose+json',
      Accept: 'application/json',
    });
    return this.toTransportResponse(res);
  }

  private getSigningMaterial(): Promise<{ alg: AccountJwsAlgorithm; jwk: JWK }> {
    if (!this.signing) {
      this.signing = Promise.all([
        detectJwsAlgorithm(this.keys.publicKey),
        exportJWK(this.keys.publicKey),
      ]).then(([alg, jwk]) => ({ alg, jwk }));
    }
    return this.signing;
  }

  private async loadDirectory(): Promise<AcmeDirectory> {
    const res = await this.get(this.directoryUrl);
    if (res.status !== 200) {
      throw UnexpectedStatusError.forOperation('directory', res.status, [200], readProblem(res.body));
    }

    return decodeBody(DirectorySchema, res.body, 'directory');
  }

  private async fetchNonce(): Promise<string> {
    const directory = await this.getDirectory();
    const url = directory['new-nonce'] ?? this.directoryUrl;

    const res = await this.http.head(url);
    const nonce = getHeader(res.headers, 'replay-nonce');
    if (nonce === undefined) {
      throw ProtocolViolationError.missingHeader('Replay-Nonce', `HEAD ${url}`, res.statusCode);
    }
    return nonce;
  }

  private toTransportResponse(res: HttpResponse): TransportResponse {
    const nonce = getHeader(res.headers, 'replay-nonce');
    if (nonce !== undefined) {
      this.nonces.add(nonce);
    }
    return { status: res.statusCode, headers: res.headers, body: res.body };
  }
}

function isBadNonce(body: string): boolean {
  return readProblem(body)?.type?.endsWith(':badNonce') ?? false;
}
