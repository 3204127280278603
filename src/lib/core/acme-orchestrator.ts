/**
 * ACME Protocol Orchestrator
 *
 * Drives one domain from registration to a decided authorization:
 *
 * 1. register the account key (or fetch the existing registration)
 * 2. request an authorization for the domain
 * 3. select the http-01 challenge the CA accepts on its own
 * 4. sign the challenge token with the account key
 * 5. hand the proof to the ChallengePublisher
 * 6. submit the challenge
 * 7. poll the authorization until the CA decides
 *
 * Each step needs the previous step's result, so a flow is strictly
 * sequential. The orchestrator keeps no mutable state: independent domains
 * may run concurrently on one instance, provided the transport copes with
 * concurrent nonce use.
 *
 * @example
 * ```typescript
 * const orchestrator = new AcmeOrchestrator({
 *   keys,
 *   transport: new JwsSignedTransport('https://ca.example/directory', keys),
 *   publisher: new WebrootChallengePublisher('/var/www/html'),
 *   certificates: new FileCertificateStore({ directory: '/etc/certs' }),
 * });
 *
 * if (!(await orchestrator.hasValidCertificate('example.com'))) {
 *   await orchestrator.issueCertificate('example.com', ['admin@example.com'], {
 *     signal: AbortSignal.timeout(300_000),
 *   });
 * }
 * ```
 */

import { NoSuitableChallengeError, ProtocolViolationError } from '../errors/acme-operation-errors.js';
import type { AcmeAuthorization, AcmeChallenge, PendingAuthorization } from '../types/authorization.js';
import type {
  AccountKeyPair,
  CertificateStore,
  ChallengePublisher,
  SignedTransport,
} from '../types/collaborators.js';
import type { ChallengeProof } from '../types/proof.js';
import type { RegistrationRecord } from '../types/registration.js';
import { debugOrchestrator } from '../utils/debug.js';
import type { Sleeper } from '../utils/sleep.js';
import { AcmeAuthorizer, selectChallenge } from './acme-authorizer.js';
import { AcmeChallengeSigner } from './acme-challenge-signer.js';
import { AcmeRegistrar } from './acme-registrar.js';
import { AcmeStatusPoller, type PollOptions } from './acme-status-poller.js';
import { CertificateInspector } from './certificate-inspector.js';

/**
 * Immutable collaborators shared by every flow
 */
export interface AcmeOrchestratorCollaborators {
  keys: AccountKeyPair;
  transport: SignedTransport;
  publisher: ChallengePublisher;
  certificates: CertificateStore;
}

export interface AcmeOrchestratorOptions {
  /** Replaces the timer used between polls */
  sleep?: Sleeper;
  /** Clock used for Retry-After dates and certificate expiry */
  now?: () => Date;
  /** Minimum wait between polls, in seconds (default 1) */
  minPollDelaySeconds?: number;
}

export interface IssueCertificateOptions {
  /** Subscriber agreement URL the caller accepts */
  agreement?: string;
  /** Aborts the flow between steps and during polling */
  signal?: AbortSignal;
}

/**
 * Outcome of a completed issuance flow
 */
export interface IssuanceResult {
  domain: string;
  registration: RegistrationRecord;
  authorizationLocation: string;
  challenge: AcmeChallenge;
  proof: ChallengeProof;
}

export class AcmeOrchestrator {
  private readonly publisher: ChallengePublisher;
  private readonly registrar: AcmeRegistrar;
  private readonly authorizer: AcmeAuthorizer;
  private readonly signer: AcmeChallengeSigner;
  private readonly poller: AcmeStatusPoller;
  private readonly inspector: CertificateInspector;

  constructor(collaborators: AcmeOrchestratorCollaborators, opts: AcmeOrchestratorOptions = {}) {
    const now = opts.now ?? (() => new Date());

    this.publisher = collaborators.publisher;
    this.registrar = new AcmeRegistrar(collaborators.transport);
    this.authorizer = new AcmeAuthorizer(collaborators.transport);
    this.signer = new AcmeChallengeSigner(collaborators.keys);
    this.poller = new AcmeStatusPoller(collaborators.transport, {
      now,
      ...(opts.sleep ? { sleep: opts.sleep } : {}),
      ...(opts.minPollDelaySeconds !== undefined
        ? { minDelaySeconds: opts.minPollDelaySeconds }
        : {}),
    });
    this.inspector = new CertificateInspector(collaborators.certificates, now);
  }

  register(contact: string | string[], agreement?: string): Promise<RegistrationRecord> {
    return this.registrar.register(contact, agreement);
  }

  requestAuthorization(domain: string): Promise<PendingAuthorization> {
    return this.authorizer.requestAuthorization(domain);
  }

  selectChallenge(authorization: AcmeAuthorization): AcmeChallenge | undefined {
    return selectChallenge(authorization);
  }

  signChallenge(token: string): Promise<ChallengeProof> {
    return this.signer.signChallenge(token);
  }

  submitChallenge(
    location: string,
    challenge: AcmeChallenge,
    proof: ChallengeProof,
  ): Promise<AcmeChallenge> {
    return this.authorizer.submitChallenge(location, challenge, proof);
  }

  pollUntilDecided(location: string, opts: PollOptions = {}): Promise<void> {
    return this.poller.pollUntilDecided(location, opts);
  }

  hasValidCertificate(domain: string): Promise<boolean> {
    return this.inspector.hasValidCertificate(domain);
  }

  /**
   * Prove control of `domain` end to end.
   *
   * Resolves once the CA has validated the authorization. Aborting the
   * signal stops the flow at the next step boundary or during polling; the
   * CA-side authorization is left to expire.
   *
   * @throws {NoSuitableChallengeError} When no http-01 challenge is usable alone
   * @throws {ChallengeInvalidatedError} When the CA rejects the proof
   */
  async issueCertificate(
    domain: string,
    contact: string | string[],
    opts: IssueCertificateOptions = {},
  ): Promise<IssuanceResult> {
    const { agreement, signal } = opts;

    signal?.throwIfAborted();
    const registration = await this.register(contact, agreement);
    debugOrchestrator('%s: registered as %s', domain, registration.location ?? '<no location>');

    signal?.throwIfAborted();
    const { location, authorization } = await this.requestAuthorization(domain);

    const challenge = this.selectChallenge(authorization);
    if (!challenge) {
      throw NoSuitableChallengeError.forDomain(
        domain,
        authorization.challenges.map((offered) => offered.type),
      );
    }
    if (challenge.token === undefined) {
      throw ProtocolViolationError.missingToken(challenge.type);
    }
    const token = challenge.token;

    const proof = await this.signChallenge(token);

    signal?.throwIfAborted();
    debugOrchestrator('%s: publishing proof for token=%s', domain, token);
    await this.publisher.provide(domain, token, proof);

    signal?.throwIfAborted();
    await this.submitChallenge(location, challenge, proof);

    await this.pollUntilDecided(location, signal ? { signal } : {});
    debugOrchestrator('%s: authorization %s is valid', domain, location);

    return { domain, registration, authorizationLocation: location, challenge, proof };
  }
}
