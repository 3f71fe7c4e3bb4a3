import type { FastifyBaseLogger } from 'fastify';
import type { AppConfig } from './config.js';
import type { PageCache } from './cache/page-cache.js';
import type { MirrorDb } from './db/sqlite.js';

export type AppState = {
  startedAtMs: number;
};

export type AppServices = {
  config: AppConfig;
  db: MirrorDb;
  cache: PageCache;
  state: AppState;
  logger: FastifyBaseLogger;
};
