import { request } from 'undici';
import { debugHttp } from '../utils/debug.js';
import { buildUserAgent } from '../utils/user-agent.js';
import type { ResponseHeaders } from '../types/collaborators.js';

/**
 * Raw HTTP response with the body read as UTF-8 text
 */
export interface HttpResponse {
  statusCode: number;
  headers: ResponseHeaders;
  body: string;
}

type HttpMethod = 'GET' | 'HEAD' | 'POST';

/**
 * Plain HTTP layer under the signed transport
 *
 * Features:
 * - Automatic User-Agent injection
 * - Bodies always read to completion as text
 * - Debug logging of every exchange
 */
export class AcmeHttpClient {
  private static userAgent = buildUserAgent();

  private ensureUserAgent(headers: Record<string, string>): Record<string, string> {
    const hasUA = Object.keys(headers).some((k) => k.toLowerCase() === 'user-agent');
    if (!hasUA) {
      headers['User-Agent'] = AcmeHttpClient.userAgent;
    }
    return headers;
  }

  async get(url: string, headers: Record<string, string> = {}): Promise<HttpResponse> {
    return this.send('GET', url, headers);
  }

  async head(url: string, headers: Record<string, string> = {}): Promise<HttpResponse> {
    return this.send('HEAD', url, headers);
  }

  async post(url: string, body: string, headers: Record<string, string> = {}): Promise<HttpResponse> {
    return this.send('POST', url, headers, body);
  }

  private async send(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    body?: string,
  ): Promise<HttpResponse> {
    const finalHeaders = this.ensureUserAgent({ ...headers });
    debugHttp('%s %s init headers=%j bodyLength=%d', method, url, finalHeaders, body?.length ?? 0);
    const start = Date.now();

    try {
      const res = await request(url, {
        method,
        headers: finalHeaders,
        ...(body !== undefined ? { body } : {}),
      });
      const text = await res.body.text();

      debugHttp(
        '%s %s response status=%d durationMs=%d headers=%j',
        method,
        url,
        res.statusCode,
        Date.now() - start,
        res.headers,
      );

      return { statusCode: res.statusCode, headers: res.headers, body: text };
    } catch (err) {
      debugHttp('%s %s network error: %s', method, url, err instanceof Error ? err.message : String(err));
      throw err;
    }
  }
}
