import type { MirrorDb } from '../db/sqlite.js';
import { NotFoundError } from '../http/errors.js';
import type {
  DisplayUrl,
  Mirror,
  MirrorErrorSummary,
  MirrorListItem,
  MirrorLogWithLocation,
  MirrorStatusReport,
  MirrorUrl,
  Tier
} from '../types.js';
import { Duration } from './duration.js';
import {
  buildMirrorList,
  filterErrorsByTier,
  filterUrlsByTier,
  mergeDisplayUrls,
  parseTier,
  partitionByDelay
} from './reports.js';
import { getMirrorErrors, getMirrorStatuses } from './status.js';

export const ERROR_CUTOFF = Duration.ofDays(7);

export type Viewer = {
  authorized: boolean;
  now?: Date;
};

export type MirrorDetails = {
  mirror: Mirror;
  upstream: Mirror | null;
  urls: DisplayUrl[];
  cutoff: Duration;
  errorLogs: MirrorErrorSummary[];
};

export type UrlDetails = {
  url: MirrorUrl;
  logs: MirrorLogWithLocation[];
};

export type StatusPage = MirrorStatusReport & {
  tier: Tier | null;
  goodUrls: DisplayUrl[];
  badUrls: DisplayUrl[];
  errorLogs: MirrorErrorSummary[];
};

function isHidden(mirror: Mirror) {
  return !mirror.public || !mirror.active;
}

/** The mirror, unless it is missing or hidden from this viewer. */
export function requireVisibleMirror(db: MirrorDb, name: string, viewer: Viewer): Mirror {
  const mirror = db.findMirrorByName(name);
  if (!mirror) throw new NotFoundError();
  if (!viewer.authorized && isHidden(mirror)) throw new NotFoundError();
  return mirror;
}

export function requireTier(raw: string | undefined): Tier | null {
  if (raw === undefined) return null;
  const tier = parseTier(raw);
  if (tier === null) throw new NotFoundError();
  return tier;
}

export function loadMirrorList(db: MirrorDb, viewer: Viewer): MirrorListItem[] {
  const visibility = { visibleOnly: !viewer.authorized };
  return buildMirrorList(
    db.listMirrors(visibility),
    db.listMirrorProtocolPairs(visibility),
    db.listMirrorCountryPairs(visibility)
  );
}

export function loadMirrorDetails(db: MirrorDb, name: string, viewer: Viewer): MirrorDetails {
  const mirror = requireVisibleMirror(db, name, viewer);
  const now = viewer.now ?? new Date();

  const statusInfo = getMirrorStatuses(db, { mirrorId: mirror.id, showAll: viewer.authorized, now });
  const checked = statusInfo.urls.filter((item) => item.url.mirror.id === mirror.id);
  const all = db.listUrlsForMirror(mirror.id, { visibleOnly: !viewer.authorized });

  return {
    mirror,
    upstream: mirror.upstreamId === null ? null : db.findMirrorById(mirror.upstreamId),
    urls: mergeDisplayUrls(checked, all),
    cutoff: ERROR_CUTOFF,
    errorLogs: getMirrorErrors(db, { mirrorId: mirror.id, cutoff: ERROR_CUTOFF, showAll: true, now })
  };
}

export function loadMirrorStatusReport(db: MirrorDb, name: string, viewer: Viewer): MirrorStatusReport {
  const mirror = requireVisibleMirror(db, name, viewer);
  return getMirrorStatuses(db, { mirrorId: mirror.id, showAll: viewer.authorized, now: viewer.now });
}

export function loadUrlDetails(db: MirrorDb, name: string, rawUrlId: string, viewer: Viewer): UrlDetails {
  if (!/^\d+$/.test(rawUrlId)) throw new NotFoundError();
  const url = db.findUrlForMirror(name, Number(rawUrlId));
  if (!url) throw new NotFoundError();
  if (!viewer.authorized && (isHidden(url.mirror) || !url.active)) throw new NotFoundError();

  const since = ERROR_CUTOFF.before(viewer.now ?? new Date());
  return { url, logs: db.listLogsWithLocationForUrl(url.id, since) };
}

export function loadStatusPage(db: MirrorDb, rawTier: string | undefined, now?: Date): StatusPage {
  const tier = requireTier(rawTier);
  const statusInfo = getMirrorStatuses(db, { now });
  const { good, bad } = partitionByDelay(filterUrlsByTier(statusInfo.urls, tier));
  return {
    ...statusInfo,
    tier,
    goodUrls: good,
    badUrls: bad,
    errorLogs: filterErrorsByTier(getMirrorErrors(db, { now }), tier)
  };
}

export function loadStatusReport(db: MirrorDb, rawTier: string | undefined, now?: Date): MirrorStatusReport {
  const tier = requireTier(rawTier);
  const statusInfo = getMirrorStatuses(db, { now });
  return { ...statusInfo, urls: filterUrlsByTier(statusInfo.urls, tier) };
}
