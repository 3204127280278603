import { describe, it, expect, jest } from '@jest/globals';
import { AcmeStatusPoller, parseRetryAfter } from '../../src/lib/core/acme-status-poller.js';
import {
  ChallengeInvalidatedError,
  ProtocolViolationError,
  UnexpectedStatusError,
} from '../../src/lib/errors/acme-operation-errors.js';
import type { Sleeper } from '../../src/lib/utils/sleep.js';
import { FakeTransport, jsonResponse } from '../helpers/fake-transport.js';

const AUTHZ_URL = 'https://ca.test/acme/authz/1';
const NOW = new Date('2026-01-01T00:00:00.500Z');

function pending(retryAfter?: string) {
  const headers = retryAfter === undefined ? {} : { 'Retry-After': retryAfter };
  return jsonResponse(202, { status: 'pending' }, headers);
}

function makePoller(transport: FakeTransport, sleeper: Sleeper = async () => {}) {
  return new AcmeStatusPoller(transport, { sleep: sleeper, now: () => NOW });
}

describe('parseRetryAfter', () => {
  it('reads delta-seconds', () => {
    expect(parseRetryAfter('120', NOW)).toBe(120);
    expect(parseRetryAfter(' 7 ', NOW)).toBe(7);
  });

  it('rounds the distance to a future date up to whole seconds', () => {
    expect(parseRetryAfter('Thu, 01 Jan 2026 00:00:10 GMT', NOW)).toBe(10);
  });

  it('never returns a negative wait for past dates', () => {
    expect(parseRetryAfter('Wed, 31 Dec 2025 23:00:00 GMT', NOW)).toBe(0);
  });

  it('reads the obsolete HTTP-date forms as UTC', () => {
    expect(parseRetryAfter('Thursday, 01-Jan-26 00:00:30 GMT', NOW)).toBe(30);
    expect(parseRetryAfter('Thu Jan  1 00:01:00 2026', NOW)).toBe(60);
  });

  it.each(['soon', 'soon 5', 'retry 2026', 'Foo 12', '1.5', '-1', '+3', '2026-01-01T00:00:10Z'])(
    'rejects the malformed value %j',
    (value) => {
      expect(() => parseRetryAfter(value, NOW)).toThrow(
        `Protocol violation: invalid Retry-After value '${value}'`,
      );
    },
  );

  it('rejects dates that do not exist', () => {
    expect(() => parseRetryAfter('Sat, 31 Feb 2026 00:00:00 GMT', NOW)).toThrow(
      ProtocolViolationError,
    );
    expect(() => parseRetryAfter('Thu, 01 Jan 2026 24:00:00 GMT', NOW)).toThrow(
      ProtocolViolationError,
    );
  });
});

describe('AcmeStatusPoller', () => {
  it('sleeps between pending answers and returns on valid', async () => {
    const transport = new FakeTransport([
      pending('0'),
      pending('3'),
      jsonResponse(200, { status: 'valid' }),
    ]);
    const sleeper = jest.fn<Sleeper>(async () => {});

    await makePoller(transport, sleeper).pollUntilDecided(AUTHZ_URL);

    expect(sleeper.mock.calls.map(([ms]) => ms)).toEqual([1000, 3000]);
    expect(transport.trace()).toEqual([`GET ${AUTHZ_URL}`, `GET ${AUTHZ_URL}`, `GET ${AUTHZ_URL}`]);
  });

  it('honours a configured minimum delay', async () => {
    const transport = new FakeTransport([pending('1'), jsonResponse(200, { status: 'valid' })]);
    const sleeper = jest.fn<Sleeper>(async () => {});

    await new AcmeStatusPoller(transport, { sleep: sleeper, minDelaySeconds: 5 }).pollUntilDecided(
      AUTHZ_URL,
    );

    expect(sleeper.mock.calls.map(([ms]) => ms)).toEqual([5000]);
  });

  it('waits until a Retry-After date', async () => {
    const transport = new FakeTransport([
      pending('Thu, 01 Jan 2026 00:00:04 GMT'),
      jsonResponse(200, { status: 'valid' }),
    ]);
    const sleeper = jest.fn<Sleeper>(async () => {});

    await makePoller(transport, sleeper).pollUntilDecided(AUTHZ_URL);

    expect(sleeper.mock.calls.map(([ms]) => ms)).toEqual([4000]);
  });

  it('waits the minimum delay when Retry-After is a past date', async () => {
    const transport = new FakeTransport([
      pending('Wed, 31 Dec 2025 23:00:00 GMT'),
      jsonResponse(200, { status: 'valid' }),
    ]);
    const sleeper = jest.fn<Sleeper>(async () => {});

    await makePoller(transport, sleeper).pollUntilDecided(AUTHZ_URL);

    expect(sleeper.mock.calls.map(([ms]) => ms)).toEqual([1000]);
  });

  it('fails on a malformed Retry-After before sleeping', async () => {
    const transport = new FakeTransport([pending('soon 5')]);
    const sleeper = jest.fn<Sleeper>(async () => {});

    await expect(makePoller(transport, sleeper).pollUntilDecided(AUTHZ_URL)).rejects.toThrow(
      "Protocol violation: invalid Retry-After value 'soon 5'",
    );
    expect(sleeper).not.toHaveBeenCalled();
  });

  it('requires Retry-After on pending answers', async () => {
    const transport = new FakeTransport([pending()]);

    await expect(makePoller(transport).pollUntilDecided(AUTHZ_URL)).rejects.toThrow(
      `Protocol violation: poll ${AUTHZ_URL} response (HTTP 202) did not carry a Retry-After header`,
    );
  });

  it('fails with the CA error when the challenge is invalid', async () => {
    const transport = new FakeTransport([
      jsonResponse(200, {
        status: 'invalid',
        challenges: [
          {
            type: 'http-01',
            status: 'invalid',
            error: { type: 'urn:acme:error:unauthorized', detail: 'Invalid response from domain' },
          },
        ],
      }),
    ]);

    const error = await makePoller(transport)
      .pollUntilDecided(AUTHZ_URL)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ChallengeInvalidatedError);
    expect(error).toHaveProperty(
      'message',
      `Challenge at ${AUTHZ_URL} was marked invalid: Invalid response from domain`,
    );
    expect(error).toHaveProperty('problem', {
      type: 'urn:acme:error:unauthorized',
      detail: 'Invalid response from domain',
    });
  });

  it('rejects unknown statuses', async () => {
    const transport = new FakeTransport([jsonResponse(200, { status: 'processing' })]);

    await expect(makePoller(transport).pollUntilDecided(AUTHZ_URL)).rejects.toThrow(
      `Protocol violation: unrecognized status 'processing' at ${AUTHZ_URL}`,
    );
  });

  it('rejects a body without a status', async () => {
    const transport = new FakeTransport([jsonResponse(200, {})]);

    await expect(makePoller(transport).pollUntilDecided(AUTHZ_URL)).rejects.toBeInstanceOf(
      ProtocolViolationError,
    );
  });

  it('rejects a failed poll request', async () => {
    const transport = new FakeTransport([jsonResponse(500, { detail: 'internal error' })]);

    const error = await makePoller(transport)
      .pollUntilDecided(AUTHZ_URL)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnexpectedStatusError);
    expect(error).toHaveProperty('status', 500);
  });

  it('stops when the signal aborts during the wait', async () => {
    const controller = new AbortController();
    const transport = new FakeTransport([pending('30'), pending('30')]);
    const sleeper = jest.fn<Sleeper>(async () => {
      controller.abort(new Error('deadline reached'));
    });

    await expect(
      makePoller(transport, sleeper).pollUntilDecided(AUTHZ_URL, { signal: controller.signal }),
    ).rejects.toThrow('deadline reached');

    expect(sleeper).toHaveBeenCalledWith(30_000, controller.signal);
    expect(transport.calls).toHaveLength(1);
  });
});
