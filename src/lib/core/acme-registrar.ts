/**
 * Account Registration
 *
 * Registration runs as a two-state machine:
 *
 *   Creating --409 + Location--> Fetching
 *
 * `Creating` posts `new-reg`; a 201 ends there. A 409 Conflict means the key
 * is already registered, and the record fetched from the conflict location
 * is authoritative. Calling register() repeatedly with one key therefore
 * always resolves to the same logical account.
 */

import { ProtocolViolationError, UnexpectedStatusError } from '../errors/acme-operation-errors.js';
import { getHeader } from '../transport/headers.js';
import type { RegistrationRecord } from '../types/registration.js';
import type { NewRegistrationRequest, RegistrationRequest } from '../types/requests.js';
import type { SignedTransport, TransportResponse } from '../types/collaborators.js';
import { ACME_RESOURCE } from '../types/status.js';
import { RegistrationSchema, decodeBody, readProblem } from '../validation/schemas.js';
import { debugRegistration } from '../utils/debug.js';

type RegistrationState =
  | { phase: 'creating'; target: string; request: NewRegistrationRequest }
  | { phase: 'fetching'; target: string; request: RegistrationRequest };

type RegistrationStep =
  | { done: true; record: RegistrationRecord }
  | { done: false; next: RegistrationState };

const CREATED = 201;
const CONFLICT = 409;
const FETCHED = [200, 202] as const;

/**
 * Add the mailto: scheme to bare e-mail addresses; URIs pass through.
 */
export function normalizeContact(contact: string | string[]): string[] {
  const contacts = Array.isArray(contact) ? contact : [contact];
  return contacts.map((entry) => (/^[a-z][a-z0-9+.-]*:/i.test(entry) ? entry : `mailto:${entry}`));
}

export class AcmeRegistrar {
  constructor(private readonly transport: SignedTransport) {}

  /**
   * Register the account key, or fetch the existing registration
   *
   * @param contact - Contact URIs or bare e-mail addresses
   * @param agreement - Subscriber agreement URL the caller accepts
   * @throws {ProtocolViolationError} When a 409 carries no Location header
   * @throws {UnexpectedStatusError} For any status outside the two success paths
   */
  async register(contact: string | string[], agreement?: string): Promise<RegistrationRecord> {
    const contacts = normalizeContact(contact);
    const request: NewRegistrationRequest = {
      resource: ACME_RESOURCE.NEW_REGISTRATION,
      contact: contacts,
      ...(agreement ? { agreement } : {}),
    };

    let state: RegistrationState = {
      phase: 'creating',
      target: ACME_RESOURCE.NEW_REGISTRATION,
      request,
    };

    for (;;) {
      debugRegistration('%s: POST %s', state.phase, state.target);
      const response = await this.transport.post(state.target, state.request);
      const step = this.advance(state, response);
      if (step.done) {
        return step.record;
      }
      state = step.next;
    }
  }

  private advance(state: RegistrationState, response: TransportResponse): RegistrationStep {
    switch (state.phase) {
      case 'creating': {
        if (response.status === CREATED) {
          debugRegistration('registration created');
          const location = getHeader(response.headers, 'location');
          return { done: true, record: this.toRecord(response, location) };
        }

        if (response.status === CONFLICT) {
          const location = getHeader(response.headers, 'location');
          if (location === undefined) {
            throw ProtocolViolationError.missingHeader('Location', state.target, CONFLICT);
          }
          debugRegistration('key already registered, fetching %s', location);
          return {
            done: false,
            next: {
              phase: 'fetching',
              target: location,
              request: { ...state.request, resource: ACME_RESOURCE.REGISTRATION },
            },
          };
        }

        throw UnexpectedStatusError.forOperation(
          state.target,
          response.status,
          [CREATED, CONFLICT],
          readProblem(response.body),
        );
      }

      case 'fetching': {
        if (FETCHED.some((status) => status === response.status)) {
          return { done: true, record: this.toRecord(response, state.target) };
        }

        throw UnexpectedStatusError.forOperation(
          ACME_RESOURCE.REGISTRATION,
          response.status,
          FETCHED,
          readProblem(response.body),
        );
      }
    }
  }

  private toRecord(response: TransportResponse, location: string | undefined): RegistrationRecord {
    const registration = decodeBody(RegistrationSchema, response.body, 'registration');
    return location === undefined ? { registration } : { location, registration };
  }
}
