import type { Duration } from './mirrors/duration.js';

export const TIER_CHOICES = [
  { tier: 0, label: 'Tier 0' },
  { tier: 1, label: 'Tier 1' },
  { tier: 2, label: 'Tier 2' },
  { tier: -1, label: 'Untiered' }
] as const;

export type Tier = (typeof TIER_CHOICES)[number]['tier'];

export type Country = {
  code: string;
  name: string;
};

export type Mirror = {
  id: number;
  name: string;
  tier: number;
  upstreamId: number | null;
  adminEmail: string;
  public: boolean;
  active: boolean;
  isos: boolean;
  notes: string;
  created: Date;
};

export type MirrorProtocol = {
  kind: 'protocol';
  id: number;
  protocol: string;
  isDownload: boolean;
};

export type MirrorUrl = {
  id: number;
  url: string;
  country: Country;
  hasIpv4: boolean;
  hasIpv6: boolean;
  active: boolean;
  created: Date;
  protocol: MirrorProtocol;
  mirror: Mirror;
};

export type CheckLocation = {
  kind: 'location';
  id: number;
  hostname: string;
  sourceIp: string;
  country: Country;
  ipVersion: 4 | 6;
  created: Date;
};

export type MirrorLog = {
  kind: 'log';
  id: number;
  urlId: number;
  locationId: number | null;
  checkTime: Date;
  lastSync: Date | null;
  /** Seconds. */
  duration: number | null;
  isSuccess: boolean;
  error: string;
};

export type MirrorLogWithLocation = MirrorLog & {
  location: CheckLocation | null;
};

/** Derived check figures for one URL over a cutoff window. */
export type UrlStatus = {
  checkCount: number;
  successCount: number;
  lastCheck: Date | null;
  lastSync: Date | null;
  completionPct: number | null;
  delay: Duration | null;
  durationAvg: number | null;
  durationStddev: number | null;
  score: number | null;
};

/** A stored URL with its status, when it was checked inside the window. */
export type DisplayUrl = {
  kind: 'url';
  url: MirrorUrl;
  status: UrlStatus | null;
};

export type MirrorStatusReport = {
  cutoff: Duration;
  lastCheck: Date | null;
  numChecks: number;
  checkFrequency: Duration | null;
  urls: DisplayUrl[];
};

export type MirrorErrorSummary = {
  url: MirrorUrl;
  error: string;
  lastOccurred: Date;
  errorCount: number;
};

export type MirrorListItem = Mirror & {
  protocols: string[];
  country: Country | null;
};

export type CachedResponse = {
  status: number;
  headers: Record<string, string>;
  body: string;
  contentType: string;
  cachedAt: number;
};
