import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { seedDatabase } from './seed.js';
import { MirrorDb } from './sqlite.js';

const samplePath = fileURLToPath(new URL('../../fixtures/sample-mirrors.json', import.meta.url));
const sample: unknown = JSON.parse(fs.readFileSync(samplePath, 'utf8'));

describe('seedDatabase', () => {
  let db: MirrorDb;

  beforeEach(() => {
    db = new MirrorDb(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('loads the sample file', () => {
    expect(seedDatabase(db, sample)).toEqual({ protocols: 3, locations: 2, mirrors: 3, urls: 5 });

    const origin = db.findMirrorByName('origin.example.org');
    const dl = db.findMirrorByName('dl.example.com');
    expect(origin).toMatchObject({ tier: 0, public: false, adminEmail: 'admin@example.org' });
    expect(dl?.upstreamId).toBe(db.findMirrorByName('mirror.example.net')?.id);

    const url = db.findUrlByString('https://mirror.example.net/dist/');
    expect(url).toMatchObject({ hasIpv4: true, hasIpv6: true, active: true });
    expect(url?.protocol.protocol).toBe('https');
    expect(url?.country).toEqual({ code: 'DE', name: 'Germany' });
    expect(db.findProtocol('rsync')?.isDownload).toBe(false);
  });

  it('skips records that already exist', () => {
    seedDatabase(db, sample);
    expect(seedDatabase(db, sample)).toEqual({ protocols: 0, locations: 0, mirrors: 0, urls: 0 });
    expect(db.countMirrors()).toBe(3);
    expect(db.countUrls()).toBe(5);
  });

  it('refuses an unknown upstream', () => {
    expect(() => seedDatabase(db, { mirrors: [{ name: 'orphan.example.org', upstream: 'nowhere.example.org' }] })).toThrow(
      'unknown upstream mirror: nowhere.example.org'
    );
  });

  it('refuses a URL whose scheme has no protocol', () => {
    expect(() =>
      seedDatabase(db, { mirrors: [{ name: 'ftp.example.org', urls: [{ url: 'ftp://ftp.example.org/' }] }] })
    ).toThrow('unknown protocol for ftp://ftp.example.org/: ftp');
  });
});
