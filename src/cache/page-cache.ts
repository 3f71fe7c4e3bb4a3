import crypto from 'node:crypto';
import type { FastifyBaseLogger, FastifyReply, FastifyRequest } from 'fastify';
import type { CachedResponse } from '../types.js';

type CacheEntry = CachedResponse & { size: number };

export type PageCacheStats = {
  entries: number;
  usedBytes: number;
  ttlSeconds: number;
  maxBytes: number;
};

/** Whole rendered responses kept in memory for a short TTL. */
export class PageCache {
  private entries = new Map<string, CacheEntry>();

  constructor(
    readonly ttlSeconds: number,
    private maxBytes: number,
    private clock: () => number = Date.now
  ) {}

  key(method: string, url: string) {
    const normalized = method === 'HEAD' ? 'GET' : method;
    return crypto.createHash('sha256').update(`${normalized}:${url}`).digest('hex');
  }

  get(cacheKey: string): CachedResponse | null {
    const entry = this.entries.get(cacheKey);
    if (!entry) return null;
    if (this.isExpired(entry)) {
      this.entries.delete(cacheKey);
      return null;
    }
    const { size: _size, ...response } = entry;
    return response;
  }

  set(cacheKey: string, response: Omit<CachedResponse, 'cachedAt'>) {
    const size = Buffer.byteLength(response.body);
    if (size > this.maxBytes / 2) return false; // refuse oversized entries
    this.entries.set(cacheKey, { ...response, cachedAt: this.clock(), size });
    this.prune();
    return true;
  }

  purgeAll() {
    const removed = this.entries.size;
    this.entries.clear();
    return removed;
  }

  stats(): PageCacheStats {
    let entries = 0;
    let usedBytes = 0;
    for (const entry of this.entries.values()) {
      if (this.isExpired(entry)) continue;
      entries += 1;
      usedBytes += entry.size;
    }
    return { entries, usedBytes, ttlSeconds: this.ttlSeconds, maxBytes: this.maxBytes };
  }

  private isExpired(entry: CacheEntry) {
    return (this.clock() - entry.cachedAt) / 1000 > this.ttlSeconds;
  }

  private prune() {
    const live: Array<[string, CacheEntry]> = [];
    for (const [cacheKey, entry] of this.entries) {
      if (this.isExpired(entry)) this.entries.delete(cacheKey);
      else live.push([cacheKey, entry]);
    }
    let total = live.reduce((sum, [, entry]) => sum + entry.size, 0);
    if (total <= this.maxBytes) return;
    live.sort((a, b) => a[1].cachedAt - b[1].cachedAt);
    for (const [cacheKey, entry] of live) {
      if (total <= this.maxBytes) break;
      total -= entry.size;
      this.entries.delete(cacheKey);
    }
  }
}

const CACHE_STATUS_HEADER = 'x-page-cache';

/**
 * Route hooks serving a stored copy before the handler runs, and storing
 * fresh `200` responses on the way out. Conditional GET belongs in front of
 * `preHandler` so a fresh client copy still gets `304`. `200` and `304` responses advertise
 * the TTL to clients.
 */
export function pageCacheHooks(cache: PageCache, logger: FastifyBaseLogger) {
  const preHandler = async (request: FastifyRequest, reply: FastifyReply) => {
    const cached = cache.get(cache.key(request.method, request.url));
    if (!cached) {
      reply.header(CACHE_STATUS_HEADER, 'miss');
      return;
    }
    logger.debug({ url: request.url }, 'Page cache hit');
    reply.headers(cached.headers);
    reply.header(CACHE_STATUS_HEADER, 'hit');
    return reply.code(cached.status).type(cached.contentType).send(cached.body);
  };

  const onSend = async (request: FastifyRequest, reply: FastifyReply, payload: unknown) => {
    if (reply.statusCode === 200 || reply.statusCode === 304) {
      reply.header('cache-control', `max-age=${cache.ttlSeconds}`);
      reply.header('expires', new Date(Date.now() + cache.ttlSeconds * 1000).toUTCString());
    }
    if (
      reply.statusCode === 200 &&
      typeof payload === 'string' &&
      reply.getHeader(CACHE_STATUS_HEADER) === 'miss'
    ) {
      const lastModified = reply.getHeader('last-modified');
      cache.set(cache.key(request.method, request.url), {
        status: 200,
        headers: typeof lastModified === 'string' ? { 'last-modified': lastModified } : {},
        body: payload,
        contentType: String(reply.getHeader('content-type') ?? 'application/json')
      });
    }
    return payload;
  };

  return { preHandler, onSend };
}
