/**
 * acme-authorizer - Core Exports
 *
 * Domain authorization over the resource-tagged ACME protocol
 */

// Orchestrator
export {
  AcmeOrchestrator,
  type AcmeOrchestratorCollaborators,
  type AcmeOrchestratorOptions,
  type IssueCertificateOptions,
  type IssuanceResult,
} from './core/acme-orchestrator.js';
export { AcmeRegistrar, normalizeContact } from './core/acme-registrar.js';
export { AcmeAuthorizer, selectChallenge } from './core/acme-authorizer.js';
export {
  AcmeChallengeSigner,
  CHALLENGE_TOKEN_PATTERN,
  assertValidChallengeToken,
  isValidChallengeToken,
} from './core/acme-challenge-signer.js';
export {
  AcmeStatusPoller,
  parseRetryAfter,
  type AcmeStatusPollerOptions,
  type PollOptions,
} from './core/acme-status-poller.js';
export {
  CertificateInspector,
  parseCertificateRecord,
  type CertificateRecord,
} from './core/certificate-inspector.js';

// Error handling
export {
  AcmeOperationError,
  ChallengeInvalidatedError,
  NoSuitableChallengeError,
  ProtocolViolationError,
  UnexpectedStatusError,
  UnsupportedKeyTypeError,
  isAcmeOperationError,
  isChallengeInvalidatedError,
  isNoSuitableChallengeError,
  isProtocolViolationError,
  isUnexpectedStatusError,
  isUnsupportedKeyTypeError,
  type AcmeOperationErrorType,
} from './errors/acme-operation-errors.js';

// Types
export type { AcmeDirectory, AcmeDirectoryMeta } from './types/directory.js';
export type {
  AcmeAuthorization,
  AcmeChallenge,
  AcmeIdentifier,
  AcmeProblem,
  PendingAuthorization,
} from './types/authorization.js';
export type { AcmeRegistration, RegistrationRecord } from './types/registration.js';
export type {
  AcmeRequest,
  ChallengeResponseRequest,
  NewAuthorizationRequest,
  NewRegistrationRequest,
  RegistrationRequest,
} from './types/requests.js';
export type { ChallengeProof, RsaPublicJwk } from './types/proof.js';
export type {
  AccountKeyPair,
  CertificateStore,
  ChallengePublisher,
  ResponseHeaders,
  SignedTransport,
  TransportResponse,
} from './types/collaborators.js';
export {
  ACME_RESOURCE,
  CHALLENGE_STATUS,
  CHALLENGE_TYPE,
  type AcmeChallengeStatus,
  type AcmeChallengeType,
  type AcmeResource,
} from './types/status.js';

// Key material
export {
  detectJwsAlgorithm,
  generateAccountKeyPair,
  importAccountKeyPair,
  type AccountEcAlgorithm,
  type AccountJwsAlgorithm,
  type AccountKeyAlgorithm,
  type AccountRsaAlgorithm,
} from './crypto/account-keys.js';

// Transport
export { JwsSignedTransport, type JwsSignedTransportOptions } from './transport/jws-transport.js';
export { AcmeHttpClient, type HttpResponse } from './transport/http-client.js';
export { getHeader, getHeaderValues, hasHeader } from './transport/headers.js';
export {
  NonceManager,
  type NonceEntry,
  type NonceFetcher,
  type NonceManagerOptions,
} from './managers/nonce-manager.js';

// Publishers and stores
export {
  WebrootChallengePublisher,
  type WebrootResolver,
} from './publishers/webroot-challenge-publisher.js';
export {
  FileCertificateStore,
  type FileCertificateStoreOptions,
} from './stores/file-certificate-store.js';

// Utilities
export { setLogger, type WarnSink } from './utils/logger.js';
export { MAX_TIMER_DELAY_MS, sleep, type Sleeper } from './utils/sleep.js';
