/**
 * Caching HTTP Client
 *
 * Wraps an HttpClient with the response cache. The TTL comes from the URL
 * shape; URLs without a TTL always go to the network. Only 200 responses
 * are stored, and a hit is reported as a 200 with the stored body.
 */

import { HttpClient, HttpResponse } from '../config/http-client';
import { ResponseCache } from './response-cache';
import { buildCacheKey, QueryParams, resolveCacheTtl } from '../utils/cache-policy';
import { logUpstreamRequest } from '../utils/logger';

export class CachingHttpClient implements HttpClient {
  constructor(
    private readonly inner: HttpClient,
    private readonly cache: ResponseCache,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async get(url: string, params?: QueryParams): Promise<HttpResponse> {
    const ttl = resolveCacheTtl(url, this.clock());
    if (ttl === null) {
      return this.inner.get(url, params);
    }

    const key = buildCacheKey(url, params);
    const cached = await this.cache.get(key);
    if (cached !== undefined) {
      logUpstreamRequest({ url: key, statusCode: 200, latencyMs: 0, cached: true });
      return { status: 200, body: cached, cached: true };
    }

    const response = await this.inner.get(url, params);
    if (response.status === 200) {
      await this.cache.set(key, response.body, ttl);
    }
    return response;
  }
}
