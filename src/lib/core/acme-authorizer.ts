/**
 * Authorization Request, Challenge Selection and Challenge Submission
 */

import { ProtocolViolationError, UnexpectedStatusError } from '../errors/acme-operation-errors.js';
import { getHeader } from '../transport/headers.js';
import type { AcmeAuthorization, AcmeChallenge, PendingAuthorization } from '../types/authorization.js';
import type { SignedTransport } from '../types/collaborators.js';
import type { ChallengeProof } from '../types/proof.js';
import type { ChallengeResponseRequest, NewAuthorizationRequest } from '../types/requests.js';
import { ACME_RESOURCE, CHALLENGE_TYPE } from '../types/status.js';
import {
  AuthorizationSchema,
  ChallengeSchema,
  decodeBody,
  readProblem,
} from '../validation/schemas.js';
import { debugChallenge } from '../utils/debug.js';

const AUTHORIZATION_OK = 200;
const CHALLENGE_ACCEPTED = 200;

/**
 * Pick the challenge this client will answer.
 *
 * Only http-01 is supported, and only when the CA lists it as a
 * combination on its own (`[i]`). Among several, the first in the CA's
 * order wins. An authorization without `combinations` yields nothing.
 */
export function selectChallenge(authorization: AcmeAuthorization): AcmeChallenge | undefined {
  const combinations = authorization.combinations ?? [];

  return authorization.challenges.find(
    (challenge, index) =>
      challenge.type === CHALLENGE_TYPE.HTTP_01 &&
      combinations.some((combination) => combination.length === 1 && combination[0] === index),
  );
}

export class AcmeAuthorizer {
  constructor(private readonly transport: SignedTransport) {}

  /**
   * Request a new authorization for a DNS identifier
   *
   * @throws {UnexpectedStatusError} For any status other than 200
   * @throws {ProtocolViolationError} When the Location header is missing or the body is malformed
   */
  async requestAuthorization(domain: string): Promise<PendingAuthorization> {
    const request: NewAuthorizationRequest = {
      resource: ACME_RESOURCE.NEW_AUTHORIZATION,
      identifier: { type: 'dns', value: domain },
    };

    const response = await this.transport.post(ACME_RESOURCE.NEW_AUTHORIZATION, request);

    if (response.status !== AUTHORIZATION_OK) {
      throw UnexpectedStatusError.forOperation(
        ACME_RESOURCE.NEW_AUTHORIZATION,
        response.status,
        [AUTHORIZATION_OK],
        readProblem(response.body),
      );
    }

    const location = getHeader(response.headers, 'location');
    if (location === undefined) {
      throw ProtocolViolationError.missingHeader(
        'Location',
        ACME_RESOURCE.NEW_AUTHORIZATION,
        response.status,
      );
    }

    const authorization = decodeBody(AuthorizationSchema, response.body, 'authorization');
    debugChallenge(
      'authorization for %s at %s offers %j',
      domain,
      location,
      authorization.challenges.map((challenge) => challenge.type),
    );

    return { location, authorization };
  }

  /**
   * Answer a challenge: post its type, token and proof to the authorization
   *
   * @returns The updated challenge resource, normally still pending
   * @throws {UnexpectedStatusError} For any status other than 200
   */
  async submitChallenge(
    location: string,
    challenge: AcmeChallenge,
    proof: ChallengeProof,
  ): Promise<AcmeChallenge> {
    const token = challenge.token;
    if (token === undefined) {
      throw ProtocolViolationError.missingToken(challenge.type);
    }

    const request: ChallengeResponseRequest = {
      resource: ACME_RESOURCE.AUTHORIZATION,
      type: challenge.type,
      token,
      keyAuthorization: proof.jws,
    };

    const response = await this.transport.post(location, request);

    if (response.status !== CHALLENGE_ACCEPTED) {
      throw UnexpectedStatusError.forOperation(
        ACME_RESOURCE.AUTHORIZATION,
        response.status,
        [CHALLENGE_ACCEPTED],
        readProblem(response.body),
      );
    }

    const updated = decodeBody(ChallengeSchema, response.body, 'challenge');
    debugChallenge('submitted %s token=%s status=%s', updated.type, token, updated.status);
    return updated;
  }
}
