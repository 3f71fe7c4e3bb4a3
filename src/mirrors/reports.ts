import type { MirrorPair } from '../db/sqlite.js';
import { TIER_CHOICES } from '../types.js';
import type {
  DisplayUrl,
  Mirror,
  MirrorErrorSummary,
  MirrorListItem,
  MirrorUrl,
  Tier
} from '../types.js';
import { countryFromCode } from './countries.js';
import { Duration } from './duration.js';

/** Delay past which a checked URL counts as out of sync. */
export const BAD_DELAY = Duration.ofDays(3);

function groupByMirror(pairs: MirrorPair[]) {
  const grouped = new Map<number, string[]>();
  for (const pair of pairs) {
    const values = grouped.get(pair.mirror_id);
    if (values) values.push(pair.value);
    else grouped.set(pair.mirror_id, [pair.value]);
  }
  return grouped;
}

/**
 * Attaches each mirror's distinct protocols and, when all of its URLs share
 * a single country, that country.
 */
export function buildMirrorList(
  mirrors: Mirror[],
  protocolPairs: MirrorPair[],
  countryPairs: MirrorPair[]
): MirrorListItem[] {
  const protocols = groupByMirror(protocolPairs);
  const countries = groupByMirror(countryPairs);
  return mirrors.map((mirror) => {
    const mirrorCountries = countries.get(mirror.id) ?? [];
    return {
      ...mirror,
      protocols: protocols.get(mirror.id) ?? [],
      country: mirrorCountries.length === 1 ? countryFromCode(mirrorCountries[0]) : null
    };
  });
}

/**
 * Every URL the requester may see, exactly once, sorted by URL string.
 * URLs missing from the checked set carry no status.
 */
export function mergeDisplayUrls(checked: DisplayUrl[], all: MirrorUrl[]): DisplayUrl[] {
  const merged = new Map<number, DisplayUrl>();
  for (const item of checked) merged.set(item.url.id, item);
  for (const url of all) {
    if (!merged.has(url.id)) merged.set(url.id, { kind: 'url', url, status: null });
  }
  return [...merged.values()].sort((a, b) => (a.url.url < b.url.url ? -1 : a.url.url > b.url.url ? 1 : 0));
}

function nullsLast<T>(compare: (a: T, b: T) => number) {
  return (a: T | null, b: T | null) => {
    if (a === null) return b === null ? 0 : 1;
    if (b === null) return -1;
    return compare(a, b);
  };
}

const byScore = nullsLast<number>((a, b) => a - b);
const byDelay = nullsLast<Duration>((a, b) => a.compareTo(b));

export function partitionByDelay(urls: DisplayUrl[]) {
  const good: DisplayUrl[] = [];
  const bad: DisplayUrl[] = [];
  for (const item of urls) {
    const status = item.status;
    // never checked
    if (!status || status.completionPct === null) continue;
    if (!status.delay || status.delay.isLongerThan(BAD_DELAY)) {
      bad.push(item);
    } else {
      good.push(item);
    }
  }
  good.sort((a, b) => byScore(a.status?.score ?? null, b.status?.score ?? null));
  bad.sort((a, b) => byDelay(a.status?.delay ?? null, b.status?.delay ?? null));
  return { good, bad };
}

/** Tiers addressable from a URL path; anything else is unknown. */
export function parseTier(raw: string): Tier | null {
  if (!/^\d+$/.test(raw)) return null;
  const value = Number(raw);
  const choice = TIER_CHOICES.find((item) => item.tier === value);
  return choice ? choice.tier : null;
}

export function tierLabel(tier: number) {
  return TIER_CHOICES.find((item) => item.tier === tier)?.label ?? `Tier ${tier}`;
}

export function filterUrlsByTier(urls: DisplayUrl[], tier: Tier | null) {
  return tier === null ? urls : urls.filter((item) => item.url.mirror.tier === tier);
}

export function filterErrorsByTier(errors: MirrorErrorSummary[], tier: Tier | null) {
  return tier === null ? errors : errors.filter((item) => item.url.mirror.tier === tier);
}
