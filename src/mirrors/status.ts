import type { CheckRow, MirrorDb } from '../db/sqlite.js';
import type { DisplayUrl, MirrorErrorSummary, MirrorStatusReport, UrlStatus } from '../types.js';
import { Duration } from './duration.js';

export const DEFAULT_CUTOFF = Duration.ofHours(24);

/** Stands in for a zero completion rate so a delay still yields a (large) score. */
const ZERO_COMPLETION_DIVISOR = 0.005;

export type StatusQuery = {
  cutoff?: Duration;
  mirrorId?: number;
  /** Include private or inactive mirrors and inactive URLs. */
  showAll?: boolean;
  now?: Date;
};

function mean(values: number[]) {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function populationStddev(values: number[], avg: number) {
  return Math.sqrt(mean(values.map((value) => (value - avg) ** 2)));
}

function maxDate(dates: Array<Date | null>) {
  let latest: Date | null = null;
  for (const date of dates) {
    if (date && (!latest || date.getTime() > latest.getTime())) latest = date;
  }
  return latest;
}

export function scoreFor(status: Pick<UrlStatus, 'delay' | 'completionPct' | 'durationAvg' | 'durationStddev'>) {
  if (!status.delay) return null;
  const divisor = status.completionPct ? status.completionPct : ZERO_COMPLETION_DIVISOR;
  return (status.delay.hours() + (status.durationAvg ?? 0) + (status.durationStddev ?? 0)) / divisor;
}

export function summarizeChecks(rows: CheckRow[]): UrlStatus {
  const checkCount = rows.length;
  const successCount = rows.filter((row) => row.is_success).length;
  const checkTimes = rows.map((row) => new Date(row.check_time));
  const syncs = rows.filter((row) => row.last_sync !== null);

  const durations = rows.flatMap((row) => (row.duration === null ? [] : [row.duration]));
  const durationAvg = durations.length ? mean(durations) : null;
  const durationStddev = durationAvg === null ? null : populationStddev(durations, durationAvg);

  const delays = syncs.map((row) => new Date(row.check_time).getTime() - new Date(row.last_sync ?? row.check_time).getTime());
  const delay = delays.length ? Duration.fromMilliseconds(mean(delays)) : null;

  const status: UrlStatus = {
    checkCount,
    successCount,
    lastCheck: maxDate(checkTimes),
    lastSync: maxDate(syncs.map((row) => (row.last_sync ? new Date(row.last_sync) : null))),
    completionPct: checkCount > 0 ? successCount / checkCount : null,
    delay,
    durationAvg,
    durationStddev,
    score: null
  };
  status.score = scoreFor(status);
  return status;
}

/**
 * Aggregates the check history of every URL checked inside the cutoff
 * window. URLs without a check in the window are not part of the report.
 */
export function getMirrorStatuses(db: MirrorDb, query: StatusQuery = {}): MirrorStatusReport {
  const cutoff = query.cutoff ?? DEFAULT_CUTOFF;
  const since = cutoff.before(query.now ?? new Date());
  const rows = db.listCheckRows({ since, mirrorId: query.mirrorId, visibleOnly: !query.showAll });

  const byUrl = new Map<number, CheckRow[]>();
  for (const row of rows) {
    const bucket = byUrl.get(row.url_id);
    if (bucket) bucket.push(row);
    else byUrl.set(row.url_id, [row]);
  }

  const urls: DisplayUrl[] = db.listUrlsByIds([...byUrl.keys()]).map((url) => ({
    kind: 'url',
    url,
    status: summarizeChecks(byUrl.get(url.id) ?? [])
  }));

  if (urls.length === 0) {
    return { cutoff, lastCheck: null, numChecks: 0, checkFrequency: null, urls };
  }

  const lastCheck = maxDate(urls.map((item) => item.status?.lastCheck ?? null));
  const numChecks = Math.max(...urls.map((item) => item.status?.checkCount ?? 0));
  const range = db.checkTimeRange(since, query.mirrorId);
  const checkFrequency =
    numChecks > 1 && range ? Duration.between(range.first, range.last).dividedBy(numChecks - 1) : null;

  return { cutoff, lastCheck, numChecks, checkFrequency, urls };
}

export function getMirrorErrors(db: MirrorDb, query: StatusQuery = {}): MirrorErrorSummary[] {
  const cutoff = query.cutoff ?? DEFAULT_CUTOFF;
  const since = cutoff.before(query.now ?? new Date());
  const groups = db.listErrorGroups({ since, mirrorId: query.mirrorId, visibleOnly: !query.showAll });
  const urls = new Map(db.listUrlsByIds([...new Set(groups.map((group) => group.url_id))]).map((url) => [url.id, url]));

  return groups.flatMap((group) => {
    const url = urls.get(group.url_id);
    if (!url) return [];
    return [
      {
        url,
        error: group.error,
        lastOccurred: new Date(group.last_occurred),
        errorCount: group.error_count
      }
    ];
  });
}
