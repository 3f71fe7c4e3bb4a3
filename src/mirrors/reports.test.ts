import { describe, it, expect } from 'vitest';
import type { DisplayUrl, Mirror, MirrorUrl, UrlStatus } from '../types.js';
import { countryFromCode } from './countries.js';
import { Duration } from './duration.js';
import {
  buildMirrorList,
  filterUrlsByTier,
  mergeDisplayUrls,
  parseTier,
  partitionByDelay,
  tierLabel
} from './reports.js';

const created = new Date('2026-01-01T00:00:00Z');

function makeMirror(id: number, name: string, tier = 1): Mirror {
  return {
    id,
    name,
    tier,
    upstreamId: null,
    adminEmail: '',
    public: true,
    active: true,
    isos: true,
    notes: '',
    created
  };
}

function makeUrl(id: number, url: string, mirror = makeMirror(1, 'alpha')): MirrorUrl {
  return {
    id,
    url,
    country: countryFromCode('DE'),
    hasIpv4: true,
    hasIpv6: false,
    active: true,
    created,
    protocol: { kind: 'protocol', id: 1, protocol: 'https', isDownload: true },
    mirror
  };
}

function checked(id: number, status: Partial<UrlStatus>, mirror?: Mirror): DisplayUrl {
  return {
    kind: 'url',
    url: makeUrl(id, `https://u${id}.example.org/`, mirror),
    status: {
      checkCount: 1,
      successCount: 1,
      lastCheck: created,
      lastSync: created,
      completionPct: 1,
      delay: Duration.ofHours(1),
      durationAvg: 0.1,
      durationStddev: 0,
      score: 1,
      ...status
    }
  };
}

const ids = (urls: DisplayUrl[]) => urls.map((item) => item.url.id);

describe('buildMirrorList', () => {
  const mirrors = [makeMirror(1, 'alpha'), makeMirror(2, 'beta'), makeMirror(3, 'gamma')];

  it('resolves a country only when a mirror has exactly one', () => {
    const list = buildMirrorList(
      mirrors,
      [],
      [
        { mirror_id: 1, value: 'DE' },
        { mirror_id: 2, value: 'FR' },
        { mirror_id: 2, value: 'US' }
      ]
    );
    expect(list.map((item) => item.country)).toEqual([{ code: 'DE', name: 'Germany' }, null, null]);
  });

  it('attaches each mirror its protocols', () => {
    const list = buildMirrorList(
      mirrors,
      [
        { mirror_id: 1, value: 'http' },
        { mirror_id: 1, value: 'rsync' },
        { mirror_id: 3, value: 'https' }
      ],
      []
    );
    expect(list.map((item) => item.protocols)).toEqual([['http', 'rsync'], [], ['https']]);
    expect(list[0]).toMatchObject({ id: 1, name: 'alpha', tier: 1 });
  });
});

describe('mergeDisplayUrls', () => {
  it('unions checked and unchecked URLs once each, sorted by URL', () => {
    const checkedUrl: DisplayUrl = {
      ...checked(2, {}),
      url: makeUrl(2, 'rsync://alpha.example.org/')
    };
    const all = [
      makeUrl(1, 'https://alpha.example.org/'),
      makeUrl(2, 'rsync://alpha.example.org/'),
      makeUrl(3, 'http://alpha.example.org/')
    ];
    const merged = mergeDisplayUrls([checkedUrl], all);
    expect(merged.map((item) => item.url.url)).toEqual([
      'http://alpha.example.org/',
      'https://alpha.example.org/',
      'rsync://alpha.example.org/'
    ]);
    expect(merged.map((item) => item.status === null)).toEqual([true, true, false]);
  });
});

describe('partitionByDelay', () => {
  it('skips URLs that were never checked', () => {
    const never: DisplayUrl = { kind: 'url', url: makeUrl(9, 'https://never.example.org/'), status: null };
    const noCompletion = checked(8, { completionPct: null });
    const { good, bad } = partitionByDelay([never, noCompletion]);
    expect(good).toEqual([]);
    expect(bad).toEqual([]);
  });

  it('treats a missing delay or one over three days as bad', () => {
    const { good, bad } = partitionByDelay([
      checked(1, { delay: null, score: null }),
      checked(2, { delay: Duration.fromSeconds(3 * 86400 + 1) }),
      checked(3, { delay: Duration.ofDays(3) })
    ]);
    expect(ids(good)).toEqual([3]);
    expect(ids(bad)).toEqual([2, 1]);
  });

  it('sorts good URLs by score and bad URLs by delay, unknown delay last', () => {
    const { good, bad } = partitionByDelay([
      checked(1, { score: 9.5 }),
      checked(2, { score: 0.4 }),
      checked(3, { score: 2 }),
      checked(4, { delay: null, score: null }),
      checked(5, { delay: Duration.ofDays(10) }),
      checked(6, { delay: Duration.ofDays(4) })
    ]);
    expect(ids(good)).toEqual([2, 3, 1]);
    expect(ids(bad)).toEqual([6, 5, 4]);
  });
});

describe('tiers', () => {
  it('accepts only known, non-negative tiers', () => {
    expect(parseTier('0')).toBe(0);
    expect(parseTier('2')).toBe(2);
    expect(parseTier('3')).toBeNull();
    expect(parseTier('-1')).toBeNull();
    expect(parseTier('one')).toBeNull();
  });

  it('labels tiers', () => {
    expect(tierLabel(1)).toBe('Tier 1');
    expect(tierLabel(-1)).toBe('Untiered');
  });

  it('filters URLs by their mirror tier', () => {
    const urls = [checked(1, {}, makeMirror(1, 'alpha', 1)), checked(2, {}, makeMirror(2, 'beta', 2))];
    expect(ids(filterUrlsByTier(urls, 2))).toEqual([2]);
    expect(ids(filterUrlsByTier(urls, null))).toEqual([1, 2]);
  });
});
