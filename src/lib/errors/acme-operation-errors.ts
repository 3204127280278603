/**
 * ACME client-side errors for orchestration operations
 *
 * Every failure the orchestrator surfaces is one of the classes below, each
 * carrying a stable `code` and a `context` record for diagnostics. None of
 * them is retried automatically.
 */

import type { AcmeProblem } from '../types/authorization.js';

/**
 * Base class for all orchestration errors
 */
export abstract class AcmeOperationError extends Error {
  abstract readonly code: string;
  abstract readonly type: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;

    // Support proper stack traces
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * A CA response (or a value derived from one) broke the protocol contract
 */
export class ProtocolViolationError extends AcmeOperationError {
  readonly code = 'PROTOCOL_VIOLATION';
  readonly type = 'protocol';

  static missingHeader(header: string, operation: string, status: number): ProtocolViolationError {
    return new ProtocolViolationError(
      `Protocol violation: ${operation} response (HTTP ${status}) did not carry a ${header} header`,
      { header, operation, status },
    );
  }

  static invalidToken(token: string): ProtocolViolationError {
    return new ProtocolViolationError(`Protocol violation: invalid challenge token '${token}'`, {
      token,
    });
  }

  static missingToken(challengeType: string): ProtocolViolationError {
    return new ProtocolViolationError(
      `Protocol violation: ${challengeType} challenge does not carry a token`,
      { challengeType },
    );
  }

  static invalidRetryAfter(value: string): ProtocolViolationError {
    return new ProtocolViolationError(`Protocol violation: invalid Retry-After value '${value}'`, {
      header: 'Retry-After',
      value,
    });
  }

  static unrecognizedStatus(status: unknown, location: string): ProtocolViolationError {
    return new ProtocolViolationError(
      `Protocol violation: unrecognized status '${String(status)}' at ${location}`,
      { status, location },
    );
  }

  static malformedBody(resource: string, reason: string): ProtocolViolationError {
    return new ProtocolViolationError(
      `Protocol violation: malformed ${resource} body: ${reason}`,
      { resource, reason },
    );
  }

  static unknownResource(resource: string): ProtocolViolationError {
    return new ProtocolViolationError(
      `Protocol violation: CA directory has no entry for '${resource}'`,
      { resource },
    );
  }
}

/**
 * The CA answered with an HTTP status outside the operation's success set
 */
export class UnexpectedStatusError extends AcmeOperationError {
  readonly code = 'UNEXPECTED_STATUS';
  readonly type = 'status';

  constructor(
    message: string,
    public readonly status: number,
    public readonly problem?: AcmeProblem,
    context?: Record<string, unknown>,
  ) {
    super(message, context);
  }

  static forOperation(
    operation: string,
    status: number,
    expected: readonly number[],
    problem?: AcmeProblem,
  ): UnexpectedStatusError {
    const detail = problem?.detail ? `: ${problem.detail}` : '';
    return new UnexpectedStatusError(
      `Unexpected HTTP ${status} for ${operation} (expected ${expected.join(' or ')})${detail}`,
      status,
      problem,
      { operation, expected },
    );
  }
}

/**
 * None of the offered challenges can be completed alone over http-01
 */
export class NoSuitableChallengeError extends AcmeOperationError {
  readonly code = 'NO_SUITABLE_CHALLENGE';
  readonly type = 'challenge';

  static forDomain(domain: string, offered: string[]): NoSuitableChallengeError {
    return new NoSuitableChallengeError(
      `No combination of challenges for ${domain} can be solved by this client (offered: ${
        offered.length > 0 ? offered.join(', ') : 'none'
      })`,
      { domain, offered },
    );
  }
}

/**
 * The account key cannot sign challenge proofs
 */
export class UnsupportedKeyTypeError extends AcmeOperationError {
  readonly code = 'UNSUPPORTED_KEY_TYPE';
  readonly type = 'key';

  constructor(
    message: string,
    public readonly keyType: string,
  ) {
    super(message, { keyType });
  }

  static forKeyType(keyType: string): UnsupportedKeyTypeError {
    return new UnsupportedKeyTypeError(
      `Only RSA account keys can sign challenge proofs (got ${keyType})`,
      keyType,
    );
  }
}

/**
 * The CA rejected the proof; a fresh authorization is required to retry
 */
export class ChallengeInvalidatedError extends AcmeOperationError {
  readonly code = 'CHALLENGE_INVALIDATED';
  readonly type = 'challenge';

  constructor(
    message: string,
    public readonly problem?: AcmeProblem,
    context?: Record<string, unknown>,
  ) {
    super(message, context);
  }

  static atLocation(location: string, problem?: AcmeProblem): ChallengeInvalidatedError {
    const detail = problem?.detail ? `: ${problem.detail}` : '';
    return new ChallengeInvalidatedError(
      `Challenge at ${location} was marked invalid${detail}`,
      problem,
      { location },
    );
  }
}

/**
 * Union type for all orchestration errors
 */
export type AcmeOperationErrorType =
  | ProtocolViolationError
  | UnexpectedStatusError
  | NoSuitableChallengeError
  | UnsupportedKeyTypeError
  | ChallengeInvalidatedError;

/**
 * Type guards for error type checking
 */
export function isProtocolViolationError(error: unknown): error is ProtocolViolationError {
  return error instanceof ProtocolViolationError;
}

export function isUnexpectedStatusError(error: unknown): error is UnexpectedStatusError {
  return error instanceof UnexpectedStatusError;
}

export function isNoSuitableChallengeError(error: unknown): error is NoSuitableChallengeError {
  return error instanceof NoSuitableChallengeError;
}

export function isUnsupportedKeyTypeError(error: unknown): error is UnsupportedKeyTypeError {
  return error instanceof UnsupportedKeyTypeError;
}

export function isChallengeInvalidatedError(error: unknown): error is ChallengeInvalidatedError {
  return error instanceof ChallengeInvalidatedError;
}

export function isAcmeOperationError(error: unknown): error is AcmeOperationErrorType {
  return error instanceof AcmeOperationError;
}
