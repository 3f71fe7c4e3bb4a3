import { MirrorDb } from './db/sqlite.js';
import type { CheckLocation, Mirror, MirrorProtocol, MirrorUrl } from './types.js';

export const HOUR = 3600 * 1000;

export type Fixture = {
  db: MirrorDb;
  protocols: Record<'http' | 'https' | 'rsync', MirrorProtocol>;
  location: CheckLocation;
  mirrors: Record<'alpha' | 'beta' | 'hidden' | 'retired', Mirror>;
  urls: Record<'alphaHttps' | 'alphaRsync' | 'alphaHttpOff' | 'betaHttp' | 'betaHttps' | 'hiddenHttp' | 'retiredHttp', MirrorUrl>;
};

/**
 * An in-memory database with four mirrors:
 * - alpha: tier 1, three German URLs, the plain http one inactive
 * - beta: tier 2, one URL in the US and one in France
 * - hidden: tier 1, not public
 * - retired: tier 2, public but inactive
 */
export function createFixture(): Fixture {
  const db = new MirrorDb(':memory:');
  const protocols = {
    http: db.createProtocol('http'),
    https: db.createProtocol('https'),
    rsync: db.createProtocol('rsync', false)
  };
  const location = db.createLocation({
    hostname: 'probe.example.org',
    sourceIp: '192.0.2.10',
    country: 'DE',
    ipVersion: 4
  });
  const mirrors = {
    alpha: db.createMirror({ name: 'alpha', tier: 1, adminEmail: 'ops@alpha.example.org' }),
    beta: db.createMirror({ name: 'beta', tier: 2 }),
    hidden: db.createMirror({ name: 'hidden', tier: 1, public: false }),
    retired: db.createMirror({ name: 'retired', tier: 2, active: false })
  };
  const url = (mirror: Mirror, protocol: MirrorProtocol, address: string, country: string, active = true) =>
    db.createUrl({ mirrorId: mirror.id, protocolId: protocol.id, url: address, country, active });
  const urls = {
    alphaHttps: url(mirrors.alpha, protocols.https, 'https://alpha.example.org/', 'DE'),
    alphaRsync: url(mirrors.alpha, protocols.rsync, 'rsync://alpha.example.org/dist/', 'DE'),
    alphaHttpOff: url(mirrors.alpha, protocols.http, 'http://alpha.example.org/', 'DE', false),
    betaHttp: url(mirrors.beta, protocols.http, 'http://beta.example.net/', 'US'),
    betaHttps: url(mirrors.beta, protocols.https, 'https://beta.example.net/', 'FR'),
    hiddenHttp: url(mirrors.hidden, protocols.http, 'http://hidden.example.com/', 'SE'),
    retiredHttp: url(mirrors.retired, protocols.http, 'http://retired.example.com/', 'SE')
  };
  return { db, protocols, location, mirrors, urls };
}

export function hoursBefore(now: Date, hours: number) {
  return new Date(now.getTime() - hours * HOUR);
}
