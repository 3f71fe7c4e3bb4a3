import type {
  CheckLocation,
  DisplayUrl,
  MirrorLog,
  MirrorProtocol,
  MirrorStatusReport
} from '../types.js';
import type { Duration } from './duration.js';

export type JsonValue = null | string | number | boolean | JsonValue[] | { [key: string]: JsonValue };

export type Encodable =
  | null
  | string
  | number
  | boolean
  | Date
  | Duration
  | DisplayUrl
  | MirrorLog
  | CheckLocation
  | MirrorProtocol;

export type EncodeOptions = {
  /** Check history to embed under each URL; omitted URLs carry no `logs` key. */
  history?: (url: DisplayUrl) => MirrorLog[];
};

/** ISO 8601 in UTC, milliseconds only when there are any. */
export function encodeDateTime(date: Date) {
  const iso = date.toISOString();
  return date.getUTCMilliseconds() === 0 ? iso.replace('.000Z', 'Z') : iso;
}

function encodeUrl(item: DisplayUrl, options: EncodeOptions): JsonValue {
  const status = item.status;
  const data: { [key: string]: JsonValue } = {
    url: item.url.url,
    protocol: encode(item.url.protocol, options),
    last_sync: encode(status?.lastSync ?? null, options),
    completion_pct: status?.completionPct ?? null,
    delay: encode(status?.delay ?? null, options),
    duration_avg: status?.durationAvg ?? null,
    duration_stddev: status?.durationStddev ?? null,
    score: status?.score ?? null,
    country: item.url.country.name,
    country_code: item.url.country.code
  };
  if (options.history) {
    data.logs = options.history(item).map((log) => encode(log, options));
  }
  return data;
}

function encodeLog(log: MirrorLog, options: EncodeOptions): JsonValue {
  return {
    check_time: encode(log.checkTime, options),
    last_sync: encode(log.lastSync, options),
    duration: log.duration,
    is_success: log.isSuccess,
    location_id: log.locationId
  };
}

function encodeLocation(location: CheckLocation): JsonValue {
  return {
    id: location.id,
    hostname: location.hostname,
    source_ip: location.sourceIp,
    country: location.country.name,
    country_code: location.country.code,
    ip_version: location.ipVersion
  };
}

export function encode(value: Encodable, options: EncodeOptions = {}): JsonValue {
  if (value === null || typeof value !== 'object') {
    return typeof value === 'number' && !Number.isFinite(value) ? null : value;
  }
  if (value instanceof Date) return encodeDateTime(value);
  switch (value.kind) {
    case 'duration':
      return value.totalSeconds();
    case 'protocol':
      return value.protocol;
    case 'url':
      return encodeUrl(value, options);
    case 'log':
      return encodeLog(value, options);
    case 'location':
      return encodeLocation(value);
    default: {
      const unknown: never = value;
      throw new TypeError(`cannot encode ${JSON.stringify(unknown)}`);
    }
  }
}

export function encodeStatusReport(report: MirrorStatusReport, options: EncodeOptions = {}): JsonValue {
  return {
    cutoff: encode(report.cutoff, options),
    last_check: encode(report.lastCheck, options),
    num_checks: report.numChecks,
    check_frequency: encode(report.checkFrequency, options),
    urls: report.urls.map((item) => encode(item, options)),
    version: 3
  };
}

export function encodeLocations(locations: CheckLocation[]): JsonValue {
  return {
    version: 1,
    locations: locations.map((location) => encode(location))
  };
}
