import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { isAuthorized } from '../http/auth.js';
import { encodeDateTime } from '../mirrors/encode.js';
import type { AppServices } from '../server-context.js';

async function requireInternalAuth(request: FastifyRequest, reply: FastifyReply, services: AppServices) {
  if (isAuthorized(request, services.config.MIRRORS_ADMIN_TOKEN)) return;
  return reply.code(401).send({ ok: false, error: 'unauthorized' });
}

const checkSchema = z.object({
  urlId: z.number().int().positive(),
  locationId: z.number().int().positive().nullable().default(null),
  checkTime: z.coerce.date(),
  lastSync: z.coerce.date().nullable().default(null),
  duration: z.number().nonnegative().nullable().default(null),
  isSuccess: z.boolean(),
  error: z.string().max(2000).default('')
});

const checksBodySchema = z.object({
  checks: z.array(checkSchema).min(1).max(5000)
});

const writeLimit = { rateLimit: { max: 60, timeWindow: '1 minute' } };

export async function registerInternalRoutes(app: FastifyInstance, services: AppServices) {
  app.addHook('preHandler', async (request, reply) => {
    if (!request.url.startsWith('/internal/')) return;
    return requireInternalAuth(request, reply, services);
  });

  app.get('/internal/health', async () => ({
    ok: true,
    uptimeSec: Math.floor((Date.now() - services.state.startedAtMs) / 1000),
    version: services.config.appVersion
  }));

  app.get('/internal/summary', async () => {
    const latest = services.db.latestCheckTime();
    return {
      ok: true,
      uptimeSec: Math.floor((Date.now() - services.state.startedAtMs) / 1000),
      version: services.config.appVersion,
      mirrors: services.db.countMirrors(),
      urls: services.db.countUrls(),
      locations: services.db.countLocations(),
      logs: services.db.countLogs(),
      lastCheck: latest ? encodeDateTime(latest) : null,
      cache: services.cache.stats()
    };
  });

  app.post('/internal/checks', { config: writeLimit }, async (request, reply) => {
    const parsed = checksBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ ok: false, error: 'invalid_body' });
    }
    const { checks } = parsed.data;
    const missingUrl = checks.find((check) => !services.db.findUrl(check.urlId));
    if (missingUrl) {
      return reply.code(404).send({ ok: false, error: 'url_not_found', urlId: missingUrl.urlId });
    }
    const missingLocation = checks.find(
      (check) => check.locationId !== null && !services.db.findLocation(check.locationId)
    );
    if (missingLocation) {
      return reply.code(404).send({ ok: false, error: 'location_not_found', locationId: missingLocation.locationId });
    }
    const logs = services.db.logChecks(checks);
    services.logger.info({ recorded: logs.length }, 'Check results recorded');
    return { ok: true, recorded: logs.length };
  });

  app.post('/internal/actions/cache/purge', { config: writeLimit }, async () => {
    const removed = services.cache.purgeAll();
    services.logger.info({ removed }, 'Page cache purged');
    return { ok: true, removed };
  });
}
