import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { AcmeHttpClient } from '../../src/lib/transport/http-client.js';

interface MockRequestOptions {
  method: string;
  headers: Record<string, string>;
  body?: string;
}

const mockRequest = jest.fn(async (_url: string, opts: MockRequestOptions) => ({
  statusCode: 200,
  headers: { 'replay-nonce': 'test-nonce' },
  body: { text: async () => (opts.method === 'HEAD' ? '' : JSON.stringify({ method: opts.method })) },
}));

jest.mock('undici', () => ({
  request: (url: string, opts: MockRequestOptions) => mockRequest(url, opts),
}));

describe('AcmeHttpClient', () => {
  beforeEach(() => {
    mockRequest.mockClear();
  });

  it('GET injects User-Agent and reads the body as text', async () => {
    const client = new AcmeHttpClient();
    const res = await client.get('https://ca.test/directory');

    expect(res).toEqual({
      statusCode: 200,
      headers: { 'replay-nonce': 'test-nonce' },
      body: '{"method":"GET"}',
    });
    const [url, opts] = mockRequest.mock.calls[0];
    expect(url).toBe('https://ca.test/directory');
    expect(opts.method).toBe('GET');
    expect(opts.headers['User-Agent']).toMatch(/^acme-authorizer\/\S+ \(Node\/\d+\.\d+\.\d+\)$/);
    expect(opts).not.toHaveProperty('body');
  });

  it('keeps a caller-provided User-Agent', async () => {
    const client = new AcmeHttpClient();
    await client.head('https://ca.test/new-nonce', { 'user-agent': 'custom/1.0' });

    const [, opts] = mockRequest.mock.calls[0];
    expect(opts.headers).toEqual({ 'user-agent': 'custom/1.0' });
  });

  it('POST sends the body unchanged', async () => {
    const client = new AcmeHttpClient();
    const res = await client.post('https://ca.test/acme/new-reg', '{"payload":"x"}', {
      'Content-Type': 'application/jose+json',
    });

    expect(res.body).toBe('{"method":"POST"}');
    const [, opts] = mockRequest.mock.calls[0];
    expect(opts.method).toBe('POST');
    expect(opts.body).toBe('{"payload":"x"}');
    expect(opts.headers['Content-Type']).toBe('application/jose+json');
  });

  it('propagates network errors', async () => {
    mockRequest.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
    const client = new AcmeHttpClient();

    await expect(client.get('https://ca.test/directory')).rejects.toThrow('connect ECONNREFUSED');
  });
});
