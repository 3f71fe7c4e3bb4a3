import Fastify, { type FastifyError, type FastifyReply, type FastifyRequest, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { PageCache } from './cache/page-cache.js';
import type { AppConfig } from './config.js';
import type { MirrorDb } from './db/sqlite.js';
import { registerInternalRoutes } from './routes/internal.js';
import { registerPublicRoutes } from './routes/public.js';
import type { AppServices } from './server-context.js';
import { renderNotFoundPage } from './ui/html.js';

function isJsonPath(url: string) {
  const pathname = url.split('?')[0] ?? url;
  return /\/json\/?$/.test(pathname) || pathname.startsWith('/internal/');
}

/** One answer for every missing or hidden resource. */
function sendNotFound(request: FastifyRequest, reply: FastifyReply) {
  reply.code(404);
  if (isJsonPath(request.url)) {
    return reply.send({ ok: false, error: 'not_found' });
  }
  return reply.type('text/html; charset=utf-8').send(renderNotFoundPage());
}

export async function buildApp(params: {
  config: AppConfig;
  db: MirrorDb;
  logger?: FastifyServerOptions['logger'];
}) {
  const { config, db } = params;
  const app = Fastify({
    logger: params.logger ?? { level: config.LOG_LEVEL },
    trustProxy: true,
    ignoreTrailingSlash: true
  });

  await app.register(cors, {
    origin: config.corsOrigins.length ? config.corsOrigins : false,
    methods: ['GET', 'HEAD']
  });
  await app.register(rateLimit, {
    global: false,
    keyGenerator: (request) => {
      const fwd = request.headers['cf-connecting-ip'];
      if (typeof fwd === 'string' && fwd) return fwd;
      return request.ip;
    }
  });

  const services: AppServices = {
    config,
    db,
    cache: new PageCache(config.MIRRORS_STATUS_CACHE_SECONDS, config.MIRRORS_STATUS_CACHE_MAX_BYTES),
    state: {
      startedAtMs: Date.now()
    },
    logger: app.log
  };

  await registerPublicRoutes(app, services);
  await registerInternalRoutes(app, services);

  app.setNotFoundHandler(async (request, reply) => sendNotFound(request, reply));

  app.setErrorHandler((error: FastifyError, request, reply) => {
    const code = error.statusCode && Number.isInteger(error.statusCode) ? error.statusCode : 500;
    if (code === 404) {
      return sendNotFound(request, reply);
    }
    request.log.error({ err: error }, 'Unhandled mirror status error');
    if (reply.sent) return;
    return reply.code(code).send({
      ok: false,
      error: code >= 500 ? 'internal_error' : error.message
    });
  });

  return { app, services };
}
