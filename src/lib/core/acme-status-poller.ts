/**
 * Status Polling
 *
 * State machine over the polled resource:
 *
 *   pending -> (pending|valid|invalid)
 *
 * `valid` and `invalid` are terminal. Each `pending` answer must say when to
 * ask again through Retry-After; the poller sleeps at least the configured
 * floor between polls so a CA answering "0" cannot make it spin. Polls for
 * one location never overlap: the next request is only sent after the
 * previous answer has been handled and the sleep has elapsed.
 */

import {
  ChallengeInvalidatedError,
  ProtocolViolationError,
  UnexpectedStatusError,
} from '../errors/acme-operation-errors.js';
import { MIN_POLL_DELAY_SECONDS } from '../constants/defaults.js';
import { getHeader } from '../transport/headers.js';
import type { AcmeProblem } from '../types/authorization.js';
import type { SignedTransport, TransportResponse } from '../types/collaborators.js';
import { CHALLENGE_STATUS } from '../types/status.js';
import { PolledResourceSchema, decodeBody, readProblem } from '../validation/schemas.js';
import { debugPoll } from '../utils/debug.js';
import { sleep, type Sleeper } from '../utils/sleep.js';

const POLL_OK = [200, 202] as const;

export interface PollOptions {
  /** Aborts the wait (and the loop) with the signal's reason */
  signal?: AbortSignal;
}

export interface AcmeStatusPollerOptions {
  sleep?: Sleeper;
  now?: () => Date;
  /** Lower bound for every wait, in seconds */
  minDelaySeconds?: number;
}

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const MONTH = MONTHS.join('|');
const DAY = 'Mon|Tue|Wed|Thu|Fri|Sat|Sun';
const LONG_DAY = 'Monday|Tuesday|Wednesday|Thursday|Friday|Saturday|Sunday';
const TIME = '(\\d{2}):(\\d{2}):(\\d{2})';

// Sun, 06 Nov 1994 08:49:37 GMT
const IMF_FIXDATE = new RegExp(`^(?:${DAY}), (\\d{2}) (${MONTH}) (\\d{4}) ${TIME} GMT$`);
// Sunday, 06-Nov-94 08:49:37 GMT
const RFC850_DATE = new RegExp(`^(?:${LONG_DAY}), (\\d{2})-(${MONTH})-(\\d{2}) ${TIME} GMT$`);
// Sun Nov  6 08:49:37 1994
const ASCTIME_DATE = new RegExp(`^(?:${DAY}) (${MONTH}) ([ \\d]\\d) ${TIME} (\\d{4})$`);

interface DateParts {
  year: number;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
}

function toUtcMillis(parts: DateParts): number | undefined {
  const month = MONTHS.indexOf(parts.month);
  const day = Number.parseInt(parts.day.trim(), 10);
  const hour = Number.parseInt(parts.hour, 10);
  const minute = Number.parseInt(parts.minute, 10);
  const second = Number.parseInt(parts.second, 10);
  if (hour > 23 || minute > 59 || second > 60) {
    return undefined;
  }

  const at = new Date(Date.UTC(parts.year, month, day, hour, minute, second));
  // Rejects day overflow such as 31 Feb
  if (at.getUTCMonth() !== month || at.getUTCDate() !== day) {
    return undefined;
  }
  return at.getTime();
}

/**
 * Parse the three HTTP-date forms. Two-digit years of the obsolete form
 * fall in 1970-2069.
 */
function parseHttpDate(value: string): number | undefined {
  let match = IMF_FIXDATE.exec(value);
  if (match) {
    const [, day, month, year, hour, minute, second] = match;
    return toUtcMillis({ year: Number.parseInt(year, 10), month, day, hour, minute, second });
  }

  match = RFC850_DATE.exec(value);
  if (match) {
    const [, day, month, yy, hour, minute, second] = match;
    const shortYear = Number.parseInt(yy, 10);
    const year = shortYear < 70 ? 2000 + shortYear : 1900 + shortYear;
    return toUtcMillis({ year, month, day, hour, minute, second });
  }

  match = ASCTIME_DATE.exec(value);
  if (match) {
    const [, month, day, hour, minute, second, year] = match;
    return toUtcMillis({ year: Number.parseInt(year, 10), month, day, hour, minute, second });
  }

  return undefined;
}

/**
 * Interpret a Retry-After value as a number of seconds to wait.
 *
 * All-digit values are delta-seconds. Anything else must be an HTTP-date;
 * its distance from `now` is rounded up to whole seconds and never
 * negative.
 *
 * @throws {ProtocolViolationError} When the value is neither
 */
export function parseRetryAfter(value: string, now: Date = new Date()): number {
  const trimmed = value.trim();

  if (/^[0-9]+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10);
  }

  const at = parseHttpDate(trimmed);
  if (at === undefined) {
    throw ProtocolViolationError.invalidRetryAfter(value);
  }

  return Math.max(Math.ceil((at - now.getTime()) / 1000), 0);
}

function findProblem(body: {
  error?: AcmeProblem;
  challenges?: { error?: AcmeProblem }[];
}): AcmeProblem | undefined {
  return body.error ?? body.challenges?.find((challenge) => challenge.error)?.error;
}

export class AcmeStatusPoller {
  private readonly sleep: Sleeper;
  private readonly now: () => Date;
  private readonly minDelaySeconds: number;

  constructor(
    private readonly transport: SignedTransport,
    opts: AcmeStatusPollerOptions = {},
  ) {
    this.sleep = opts.sleep ?? sleep;
    this.now = opts.now ?? (() => new Date());
    this.minDelaySeconds = opts.minDelaySeconds ?? MIN_POLL_DELAY_SECONDS;
  }

  /**
   * Poll `location` until the CA decides.
   *
   * There is no attempt cap; bound the call with `signal` when a deadline
   * is needed.
   *
   * @throws {ChallengeInvalidatedError} When the CA reports `invalid`
   * @throws {ProtocolViolationError} On a pending answer without Retry-After,
   *   an unparseable Retry-After or an unrecognized status
   * @throws {UnexpectedStatusError} When the poll itself fails
   */
  async pollUntilDecided(location: string, opts: PollOptions = {}): Promise<void> {
    const { signal } = opts;

    for (let attempt = 1; ; attempt++) {
      signal?.throwIfAborted();

      const response = await this.transport.get(location);
      if (!POLL_OK.some((status) => status === response.status)) {
        throw UnexpectedStatusError.forOperation(
          `poll ${location}`,
          response.status,
          POLL_OK,
          readProblem(response.body),
        );
      }

      const resource = decodeBody(PolledResourceSchema, response.body, 'polled resource');
      debugPoll('attempt=%d location=%s status=%s', attempt, location, resource.status);

      switch (resource.status) {
        case CHALLENGE_STATUS.VALID:
          return;

        case CHALLENGE_STATUS.INVALID:
          throw ChallengeInvalidatedError.atLocation(location, findProblem(resource));

        case CHALLENGE_STATUS.PENDING: {
          const delaySeconds = this.nextDelaySeconds(response, location);
          debugPoll('pending, next poll of %s in %ds', location, delaySeconds);
          await this.sleep(delaySeconds * 1000, signal);
          break;
        }

        default:
          throw ProtocolViolationError.unrecognizedStatus(resource.status, location);
      }
    }
  }

  private nextDelaySeconds(response: TransportResponse, location: string): number {
    const retryAfter = getHeader(response.headers, 'retry-after');
    if (retryAfter === undefined) {
      throw ProtocolViolationError.missingHeader('Retry-After', `poll ${location}`, response.status);
    }

    return Math.max(parseRetryAfter(retryAfter, this.now()), this.minDelaySeconds);
  }
}
