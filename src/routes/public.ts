import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { pageCacheHooks } from '../cache/page-cache.js';
import { isAuthorized } from '../http/auth.js';
import { lastModifiedCondition } from '../http/conditional.js';
import { encodeLocations, encodeStatusReport, type JsonValue } from '../mirrors/encode.js';
import { DEFAULT_CUTOFF } from '../mirrors/status.js';
import {
  loadMirrorDetails,
  loadMirrorList,
  loadMirrorStatusReport,
  loadStatusPage,
  loadStatusReport,
  loadUrlDetails,
  type Viewer
} from '../mirrors/views.js';
import type { AppServices } from '../server-context.js';
import { renderMirrorDetailsPage, renderMirrorListPage, renderUrlDetailsPage } from '../ui/mirror-pages.js';
import { renderStatusPage } from '../ui/status-page.js';

type TierParams = { Params: { tier?: string } };

function sendHtml(reply: FastifyReply, html: string) {
  return reply.type('text/html; charset=utf-8').send(html);
}

function sendJson(reply: FastifyReply, document: JsonValue) {
  return reply.type('application/json; charset=utf-8').send(JSON.stringify(document));
}

export async function registerPublicRoutes(app: FastifyInstance, services: AppServices) {
  const { db, config } = services;
  const viewerOf = (request: FastifyRequest): Viewer => ({
    authorized: isAuthorized(request, config.MIRRORS_ADMIN_TOKEN)
  });
  // Freshness is global: a tier page changes whenever any mirror is checked.
  const freshness = lastModifiedCondition(() => db.latestCheckTime());
  const statusCache = pageCacheHooks(services.cache, services.logger);

  app.get('/health', async () => ({
    ok: true,
    uptimeSec: Math.floor((Date.now() - services.state.startedAtMs) / 1000)
  }));

  app.get('/', async (_request, reply) => reply.redirect('/mirrors/'));

  app.get('/mirrors/', async (request, reply) => {
    const viewer = viewerOf(request);
    return sendHtml(reply, renderMirrorListPage({ mirrors: loadMirrorList(db, viewer), authorized: viewer.authorized }));
  });

  const statusPage = async (request: FastifyRequest<TierParams>, reply: FastifyReply) =>
    sendHtml(reply, renderStatusPage(loadStatusPage(db, request.params.tier)));

  app.get<TierParams>('/mirrors/status/', { preHandler: freshness }, statusPage);
  app.get<TierParams>('/mirrors/status/tier/:tier/', { preHandler: freshness }, statusPage);

  const statusJson = async (request: FastifyRequest<TierParams>, reply: FastifyReply) =>
    sendJson(reply, encodeStatusReport(loadStatusReport(db, request.params.tier)));
  const statusJsonOptions = {
    preHandler: [freshness, statusCache.preHandler],
    onSend: statusCache.onSend
  };

  app.get<TierParams>('/mirrors/status/json/', statusJsonOptions, statusJson);
  app.get<TierParams>('/mirrors/status/tier/:tier/json/', statusJsonOptions, statusJson);

  app.get('/mirrors/locations/json/', async (_request, reply) => sendJson(reply, encodeLocations(db.listLocations())));

  app.get<{ Params: { name: string } }>('/mirrors/:name/', async (request, reply) => {
    const viewer = viewerOf(request);
    const details = loadMirrorDetails(db, request.params.name, viewer);
    return sendHtml(reply, renderMirrorDetailsPage({ ...details, authorized: viewer.authorized }));
  });

  app.get<{ Params: { name: string } }>('/mirrors/:name/json/', async (request, reply) => {
    const now = new Date();
    const report = loadMirrorStatusReport(db, request.params.name, { ...viewerOf(request), now });
    const since = DEFAULT_CUTOFF.before(now);
    return sendJson(
      reply,
      encodeStatusReport(report, { history: (item) => db.listLogsForUrl(item.url.id, since, 'asc') })
    );
  });

  app.get<{ Params: { name: string; urlId: string } }>('/mirrors/:name/:urlId/', async (request, reply) => {
    const details = loadUrlDetails(db, request.params.name, request.params.urlId, viewerOf(request));
    return sendHtml(reply, renderUrlDetailsPage(details));
  });
}
