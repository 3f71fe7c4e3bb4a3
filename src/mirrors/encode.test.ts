import { describe, it, expect } from 'vitest';
import type { CheckLocation, DisplayUrl, MirrorLog, MirrorUrl, UrlStatus } from '../types.js';
import { countryFromCode } from './countries.js';
import { Duration } from './duration.js';
import { encode, encodeDateTime, encodeLocations, encodeStatusReport } from './encode.js';

const created = new Date('2026-01-01T00:00:00Z');

function makeUrl(overrides: Partial<MirrorUrl> = {}): MirrorUrl {
  return {
    id: 7,
    url: 'https://mirror.example.net/dist/',
    country: countryFromCode('DE'),
    hasIpv4: true,
    hasIpv6: false,
    active: true,
    created,
    protocol: { kind: 'protocol', id: 2, protocol: 'https', isDownload: true },
    mirror: {
      id: 3,
      name: 'mirror.example.net',
      tier: 1,
      upstreamId: null,
      adminEmail: '',
      public: true,
      active: true,
      isos: true,
      notes: '',
      created
    },
    ...overrides
  };
}

const status: UrlStatus = {
  checkCount: 4,
  successCount: 3,
  lastCheck: new Date('2026-10-19T11:00:00Z'),
  lastSync: new Date('2026-10-19T10:15:00Z'),
  completionPct: 0.75,
  delay: Duration.fromSeconds(5400.4),
  durationAvg: 0.5,
  durationStddev: 0.25,
  score: 3
};

const log: MirrorLog = {
  kind: 'log',
  id: 11,
  urlId: 7,
  locationId: 2,
  checkTime: new Date('2026-10-19T11:00:00.120Z'),
  lastSync: null,
  duration: 0.42,
  isSuccess: false,
  error: 'Connection refused'
};

describe('encodeDateTime', () => {
  it('omits zero milliseconds', () => {
    expect(encodeDateTime(new Date('2026-10-19T12:00:00.000Z'))).toBe('2026-10-19T12:00:00Z');
  });

  it('keeps non-zero milliseconds', () => {
    expect(encodeDateTime(new Date('2026-10-19T12:00:00.250Z'))).toBe('2026-10-19T12:00:00.250Z');
  });
});

describe('encode', () => {
  it('encodes durations as whole seconds', () => {
    expect(encode(Duration.fromSeconds(86405))).toBe(86405);
    expect(encode(Duration.fromMilliseconds(0))).toBe(0);
  });

  it('encodes a protocol as its label', () => {
    expect(encode(makeUrl().protocol)).toBe('https');
  });

  it('encodes an unchecked URL with null figures', () => {
    const item: DisplayUrl = { kind: 'url', url: makeUrl(), status: null };
    expect(encode(item)).toEqual({
      url: 'https://mirror.example.net/dist/',
      protocol: 'https',
      last_sync: null,
      completion_pct: null,
      delay: null,
      duration_avg: null,
      duration_stddev: null,
      score: null,
      country: 'Germany',
      country_code: 'DE'
    });
  });

  it('encodes exactly the URL fields, in order', () => {
    const item: DisplayUrl = { kind: 'url', url: makeUrl(), status };
    const encoded = encode(item);
    expect(encoded).toEqual({
      url: 'https://mirror.example.net/dist/',
      protocol: 'https',
      last_sync: '2026-10-19T10:15:00Z',
      completion_pct: 0.75,
      delay: 5400,
      duration_avg: 0.5,
      duration_stddev: 0.25,
      score: 3,
      country: 'Germany',
      country_code: 'DE'
    });
    expect(Object.keys(encoded ?? {})).toEqual([
      'url',
      'protocol',
      'last_sync',
      'completion_pct',
      'delay',
      'duration_avg',
      'duration_stddev',
      'score',
      'country',
      'country_code'
    ]);
  });

  it('encodes a URL without a country as empty strings', () => {
    const item: DisplayUrl = { kind: 'url', url: makeUrl({ country: countryFromCode('') }), status: null };
    expect(encode(item)).toMatchObject({ country: '', country_code: '' });
  });

  it('embeds check history when asked to', () => {
    const item: DisplayUrl = { kind: 'url', url: makeUrl(), status };
    const encoded = encode(item, { history: () => [log] });
    expect(encoded).toMatchObject({
      url: 'https://mirror.example.net/dist/',
      logs: [
        {
          check_time: '2026-10-19T11:00:00.120Z',
          last_sync: null,
          duration: 0.42,
          is_success: false,
          location_id: 2
        }
      ]
    });
  });

  it('encodes a check location', () => {
    const location: CheckLocation = {
      kind: 'location',
      id: 2,
      hostname: 'probe.example.org',
      sourceIp: '2001:db8::10',
      country: countryFromCode('us'),
      ipVersion: 6,
      created
    };
    expect(encode(location)).toEqual({
      id: 2,
      hostname: 'probe.example.org',
      source_ip: '2001:db8::10',
      country: 'United States',
      country_code: 'US',
      ip_version: 6
    });
  });
});

describe('encodeStatusReport', () => {
  it('tags the document with version 3', () => {
    const document = encodeStatusReport({
      cutoff: Duration.ofHours(24),
      lastCheck: new Date('2026-10-19T11:00:00Z'),
      numChecks: 4,
      checkFrequency: Duration.fromSeconds(1800),
      urls: [{ kind: 'url', url: makeUrl(), status: null }]
    });
    expect(document).toMatchObject({
      cutoff: 86400,
      last_check: '2026-10-19T11:00:00Z',
      num_checks: 4,
      check_frequency: 1800,
      version: 3
    });
    expect(Object.keys(document ?? {})).toEqual([
      'cutoff',
      'last_check',
      'num_checks',
      'check_frequency',
      'urls',
      'version'
    ]);
  });

  it('leaves out history under the base encoder', () => {
    const document = encodeStatusReport({
      cutoff: Duration.ofHours(24),
      lastCheck: null,
      numChecks: 0,
      checkFrequency: null,
      urls: [{ kind: 'url', url: makeUrl(), status }]
    });
    expect(document).toMatchObject({ last_check: null, check_frequency: null });
    expect(JSON.stringify(document)).not.toContain('"logs"');
  });
});

describe('encodeLocations', () => {
  it('wraps locations with version 1', () => {
    expect(encodeLocations([])).toEqual({ version: 1, locations: [] });
  });
});
