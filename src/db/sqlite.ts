import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { countryFromCode } from '../mirrors/countries.js';
import type {
  CheckLocation,
  Mirror,
  MirrorLog,
  MirrorLogWithLocation,
  MirrorProtocol,
  MirrorUrl
} from '../types.js';

type MirrorRow = {
  id: number;
  name: string;
  tier: number;
  upstream_id: number | null;
  admin_email: string;
  public: number;
  active: number;
  isos: number;
  notes: string;
  created: string;
};

type UrlRow = {
  id: number;
  url: string;
  country: string;
  has_ipv4: number;
  has_ipv6: number;
  active: number;
  created: string;
  protocol_id: number;
  protocol: string;
  protocol_is_download: number;
  mirror_id: number;
  mirror_name: string;
  mirror_tier: number;
  mirror_upstream_id: number | null;
  mirror_admin_email: string;
  mirror_public: number;
  mirror_active: number;
  mirror_isos: number;
  mirror_notes: string;
  mirror_created: string;
};

type LocationRow = {
  id: number;
  hostname: string;
  source_ip: string;
  country: string;
  ip_version: number;
  created: string;
};

type LogRow = {
  id: number;
  url_id: number;
  location_id: number | null;
  check_time: string;
  last_sync: string | null;
  duration: number | null;
  is_success: number;
  error: string;
};

type LogWithLocationRow = LogRow & {
  location_hostname: string | null;
  location_source_ip: string | null;
  location_country: string | null;
  location_ip_version: number | null;
  location_created: string | null;
};

export type CheckRow = {
  url_id: number;
  check_time: string;
  last_sync: string | null;
  duration: number | null;
  is_success: number;
};

export type ErrorGroupRow = {
  url_id: number;
  error: string;
  error_count: number;
  last_occurred: string;
};

export type MirrorPair = {
  mirror_id: number;
  value: string;
};

export type Visibility = {
  /** Restrict to public, active mirrors and their active URLs. */
  visibleOnly: boolean;
};

export type NewMirror = {
  name: string;
  tier: number;
  upstreamId?: number | null;
  adminEmail?: string;
  public?: boolean;
  active?: boolean;
  isos?: boolean;
  notes?: string;
};

export type NewMirrorUrl = {
  mirrorId: number;
  protocolId: number;
  url: string;
  country?: string;
  hasIpv4?: boolean;
  hasIpv6?: boolean;
  active?: boolean;
};

export type NewLocation = {
  hostname: string;
  sourceIp: string;
  country: string;
  ipVersion: 4 | 6;
};

export type NewCheck = {
  urlId: number;
  locationId?: number | null;
  checkTime: Date;
  lastSync?: Date | null;
  duration?: number | null;
  isSuccess: boolean;
  error?: string;
};

const URL_SELECT = `
  SELECT u.id, u.url, u.country, u.has_ipv4, u.has_ipv6, u.active, u.created,
         p.id AS protocol_id, p.protocol AS protocol, p.is_download AS protocol_is_download,
         m.id AS mirror_id, m.name AS mirror_name, m.tier AS mirror_tier,
         m.upstream_id AS mirror_upstream_id, m.admin_email AS mirror_admin_email,
         m.public AS mirror_public, m.active AS mirror_active, m.isos AS mirror_isos,
         m.notes AS mirror_notes, m.created AS mirror_created
    FROM mirror_urls u
    JOIN mirror_protocols p ON p.id = u.protocol_id
    JOIN mirrors m ON m.id = u.mirror_id`;

const VISIBLE = 'm.public = 1 AND m.active = 1 AND u.active = 1';

function toIso(date: Date) {
  return date.toISOString();
}

function fromIso(value: string) {
  return new Date(value);
}

export class MirrorDb {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.migrate();
  }

  private migrate() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS mirrors (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        tier INTEGER NOT NULL DEFAULT 2,
        upstream_id INTEGER REFERENCES mirrors(id),
        admin_email TEXT NOT NULL DEFAULT '',
        public INTEGER NOT NULL DEFAULT 1,
        active INTEGER NOT NULL DEFAULT 1,
        isos INTEGER NOT NULL DEFAULT 1,
        notes TEXT NOT NULL DEFAULT '',
        created TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS mirror_protocols (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        protocol TEXT NOT NULL UNIQUE,
        is_download INTEGER NOT NULL DEFAULT 1,
        created TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS mirror_urls (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        url TEXT NOT NULL UNIQUE,
        protocol_id INTEGER NOT NULL REFERENCES mirror_protocols(id),
        mirror_id INTEGER NOT NULL REFERENCES mirrors(id),
        country TEXT NOT NULL DEFAULT '',
        has_ipv4 INTEGER NOT NULL DEFAULT 1,
        has_ipv6 INTEGER NOT NULL DEFAULT 0,
        active INTEGER NOT NULL DEFAULT 1,
        created TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS check_locations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        hostname TEXT NOT NULL,
        source_ip TEXT NOT NULL UNIQUE,
        country TEXT NOT NULL,
        ip_version INTEGER NOT NULL,
        created TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS mirror_logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        url_id INTEGER NOT NULL REFERENCES mirror_urls(id),
        location_id INTEGER REFERENCES check_locations(id),
        check_time TEXT NOT NULL,
        last_sync TEXT,
        duration REAL,
        is_success INTEGER NOT NULL DEFAULT 1,
        error TEXT NOT NULL DEFAULT ''
      );

      CREATE INDEX IF NOT EXISTS idx_mirror_urls_mirror ON mirror_urls(mirror_id);
      CREATE INDEX IF NOT EXISTS idx_mirror_logs_check_time ON mirror_logs(check_time);
      CREATE INDEX IF NOT EXISTS idx_mirror_logs_url_time ON mirror_logs(url_id, check_time);
    `);
  }

  private rowToMirror(row: MirrorRow): Mirror {
    return {
      id: row.id,
      name: row.name,
      tier: row.tier,
      upstreamId: row.upstream_id,
      adminEmail: row.admin_email,
      public: Boolean(row.public),
      active: Boolean(row.active),
      isos: Boolean(row.isos),
      notes: row.notes,
      created: fromIso(row.created)
    };
  }

  private rowToUrl(row: UrlRow): MirrorUrl {
    return {
      id: row.id,
      url: row.url,
      country: countryFromCode(row.country),
      hasIpv4: Boolean(row.has_ipv4),
      hasIpv6: Boolean(row.has_ipv6),
      active: Boolean(row.active),
      created: fromIso(row.created),
      protocol: {
        kind: 'protocol',
        id: row.protocol_id,
        protocol: row.protocol,
        isDownload: Boolean(row.protocol_is_download)
      },
      mirror: {
        id: row.mirror_id,
        name: row.mirror_name,
        tier: row.mirror_tier,
        upstreamId: row.mirror_upstream_id,
        adminEmail: row.mirror_admin_email,
        public: Boolean(row.mirror_public),
        active: Boolean(row.mirror_active),
        isos: Boolean(row.mirror_isos),
        notes: row.mirror_notes,
        created: fromIso(row.mirror_created)
      }
    };
  }

  private rowToLocation(row: LocationRow): CheckLocation {
    return {
      kind: 'location',
      id: row.id,
      hostname: row.hostname,
      sourceIp: row.source_ip,
      country: countryFromCode(row.country),
      ipVersion: row.ip_version === 6 ? 6 : 4,
      created: fromIso(row.created)
    };
  }

  private rowToLog(row: LogRow): MirrorLog {
    return {
      kind: 'log',
      id: row.id,
      urlId: row.url_id,
      locationId: row.location_id,
      checkTime: fromIso(row.check_time),
      lastSync: row.last_sync ? fromIso(row.last_sync) : null,
      duration: row.duration,
      isSuccess: Boolean(row.is_success),
      error: row.error
    };
  }

  private rowToLogWithLocation(row: LogWithLocationRow): MirrorLogWithLocation {
    const location =
      row.location_id !== null && row.location_hostname !== null
        ? this.rowToLocation({
            id: row.location_id,
            hostname: row.location_hostname,
            source_ip: row.location_source_ip ?? '',
            country: row.location_country ?? '',
            ip_version: row.location_ip_version ?? 4,
            created: row.location_created ?? row.check_time
          })
        : null;
    return { ...this.rowToLog(row), location };
  }

  // Mirrors

  listMirrors({ visibleOnly }: Visibility): Mirror[] {
    const where = visibleOnly ? 'WHERE public = 1 AND active = 1' : '';
    const rows = this.db
      .prepare<[], MirrorRow>(`SELECT * FROM mirrors ${where} ORDER BY tier, name`)
      .all();
    return rows.map((row) => this.rowToMirror(row));
  }

  findMirrorByName(name: string): Mirror | null {
    const row = this.db.prepare<[string], MirrorRow>('SELECT * FROM mirrors WHERE name = ?').get(name);
    return row ? this.rowToMirror(row) : null;
  }

  findMirrorById(id: number): Mirror | null {
    const row = this.db.prepare<[number], MirrorRow>('SELECT * FROM mirrors WHERE id = ?').get(id);
    return row ? this.rowToMirror(row) : null;
  }

  /** Distinct (mirror, protocol label) pairs, ordered by mirror then protocol. */
  listMirrorProtocolPairs({ visibleOnly }: Visibility): MirrorPair[] {
    return this.db
      .prepare<[], MirrorPair>(
        `SELECT DISTINCT u.mirror_id AS mirror_id, p.protocol AS value
           FROM mirror_urls u
           JOIN mirror_protocols p ON p.id = u.protocol_id
           JOIN mirrors m ON m.id = u.mirror_id
          ${visibleOnly ? `WHERE ${VISIBLE}` : ''}
          ORDER BY u.mirror_id, p.protocol`
      )
      .all();
  }

  /** Distinct (mirror, country code) pairs, ordered by mirror then country. */
  listMirrorCountryPairs({ visibleOnly }: Visibility): MirrorPair[] {
    return this.db
      .prepare<[], MirrorPair>(
        `SELECT DISTINCT u.mirror_id AS mirror_id, u.country AS value
           FROM mirror_urls u
           JOIN mirrors m ON m.id = u.mirror_id
          ${visibleOnly ? `WHERE ${VISIBLE}` : ''}
          ORDER BY u.mirror_id, u.country`
      )
      .all();
  }

  createMirror(input: NewMirror): Mirror {
    const info = this.db
      .prepare(
        `INSERT INTO mirrors (name, tier, upstream_id, admin_email, public, active, isos, notes, created)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        input.name,
        input.tier,
        input.upstreamId ?? null,
        input.adminEmail ?? '',
        input.public === false ? 0 : 1,
        input.active === false ? 0 : 1,
        input.isos === false ? 0 : 1,
        input.notes ?? '',
        toIso(new Date())
      );
    return this.requireMirror(Number(info.lastInsertRowid));
  }

  private requireMirror(id: number): Mirror {
    const mirror = this.findMirrorById(id);
    if (!mirror) throw new Error(`mirror ${id} vanished after insert`);
    return mirror;
  }

  countMirrors(): number {
    const row = this.db.prepare<[], { c: number }>('SELECT COUNT(*) as c FROM mirrors').get();
    return row?.c ?? 0;
  }

  // Protocols

  findProtocol(protocol: string): MirrorProtocol | null {
    const row = this.db
      .prepare<[string], { id: number; protocol: string; is_download: number }>(
        'SELECT id, protocol, is_download FROM mirror_protocols WHERE protocol = ?'
      )
      .get(protocol);
    return row
      ? { kind: 'protocol', id: row.id, protocol: row.protocol, isDownload: Boolean(row.is_download) }
      : null;
  }

  createProtocol(protocol: string, isDownload = true): MirrorProtocol {
    this.db
      .prepare('INSERT INTO mirror_protocols (protocol, is_download, created) VALUES (?, ?, ?)')
      .run(protocol, isDownload ? 1 : 0, toIso(new Date()));
    const created = this.findProtocol(protocol);
    if (!created) throw new Error(`protocol ${protocol} vanished after insert`);
    return created;
  }

  // URLs

  listUrlsForMirror(mirrorId: number, { visibleOnly }: Visibility): MirrorUrl[] {
    const rows = this.db
      .prepare<[number], UrlRow>(
        `${URL_SELECT} WHERE u.mirror_id = ? ${visibleOnly ? 'AND u.active = 1' : ''} ORDER BY u.url`
      )
      .all(mirrorId);
    return rows.map((row) => this.rowToUrl(row));
  }

  listUrlsByIds(ids: number[]): MirrorUrl[] {
    if (ids.length === 0) return [];
    const placeholders = ids.map(() => '?').join(', ');
    const rows = this.db
      .prepare<number[], UrlRow>(
        `${URL_SELECT} WHERE u.id IN (${placeholders}) ORDER BY u.mirror_id, u.url`
      )
      .all(...ids);
    return rows.map((row) => this.rowToUrl(row));
  }

  findUrl(id: number): MirrorUrl | null {
    const row = this.db.prepare<[number], UrlRow>(`${URL_SELECT} WHERE u.id = ?`).get(id);
    return row ? this.rowToUrl(row) : null;
  }

  findUrlForMirror(mirrorName: string, urlId: number): MirrorUrl | null {
    const row = this.db
      .prepare<[number, string], UrlRow>(`${URL_SELECT} WHERE u.id = ? AND m.name = ?`)
      .get(urlId, mirrorName);
    return row ? this.rowToUrl(row) : null;
  }

  findUrlByString(url: string): MirrorUrl | null {
    const row = this.db.prepare<[string], UrlRow>(`${URL_SELECT} WHERE u.url = ?`).get(url);
    return row ? this.rowToUrl(row) : null;
  }

  createUrl(input: NewMirrorUrl): MirrorUrl {
    const info = this.db
      .prepare(
        `INSERT INTO mirror_urls (url, protocol_id, mirror_id, country, has_ipv4, has_ipv6, active, created)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        input.url,
        input.protocolId,
        input.mirrorId,
        (input.country ?? '').toUpperCase(),
        input.hasIpv4 === false ? 0 : 1,
        input.hasIpv6 ? 1 : 0,
        input.active === false ? 0 : 1,
        toIso(new Date())
      );
    const created = this.findUrl(Number(info.lastInsertRowid));
    if (!created) throw new Error(`url ${input.url} vanished after insert`);
    return created;
  }

  countUrls(): number {
    const row = this.db.prepare<[], { c: number }>('SELECT COUNT(*) as c FROM mirror_urls').get();
    return row?.c ?? 0;
  }

  // Check locations

  listLocations(): CheckLocation[] {
    const rows = this.db.prepare<[], LocationRow>('SELECT * FROM check_locations ORDER BY id').all();
    return rows.map((row) => this.rowToLocation(row));
  }

  findLocation(id: number): CheckLocation | null {
    const row = this.db.prepare<[number], LocationRow>('SELECT * FROM check_locations WHERE id = ?').get(id);
    return row ? this.rowToLocation(row) : null;
  }

  findLocationBySourceIp(sourceIp: string): CheckLocation | null {
    const row = this.db
      .prepare<[string], LocationRow>('SELECT * FROM check_locations WHERE source_ip = ?')
      .get(sourceIp);
    return row ? this.rowToLocation(row) : null;
  }

  createLocation(input: NewLocation): CheckLocation {
    const info = this.db
      .prepare(
        'INSERT INTO check_locations (hostname, source_ip, country, ip_version, created) VALUES (?, ?, ?, ?, ?)'
      )
      .run(input.hostname, input.sourceIp, input.country.toUpperCase(), input.ipVersion, toIso(new Date()));
    const created = this.findLocation(Number(info.lastInsertRowid));
    if (!created) throw new Error(`location ${input.hostname} vanished after insert`);
    return created;
  }

  countLocations(): number {
    const row = this.db.prepare<[], { c: number }>('SELECT COUNT(*) as c FROM check_locations').get();
    return row?.c ?? 0;
  }

  // Check logs

  logCheck(input: NewCheck): MirrorLog {
    const info = this.db
      .prepare(
        `INSERT INTO mirror_logs (url_id, location_id, check_time, last_sync, duration, is_success, error)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        input.urlId,
        input.locationId ?? null,
        toIso(input.checkTime),
        input.lastSync ? toIso(input.lastSync) : null,
        input.duration ?? null,
        input.isSuccess ? 1 : 0,
        input.error ?? ''
      );
    const row = this.db
      .prepare<[number], LogRow>('SELECT * FROM mirror_logs WHERE id = ?')
      .get(Number(info.lastInsertRowid));
    if (!row) throw new Error('check log vanished after insert');
    return this.rowToLog(row);
  }

  /** Inserts every check or none of them. */
  logChecks(inputs: NewCheck[]): MirrorLog[] {
    const insertAll = this.db.transaction((items: NewCheck[]) => items.map((item) => this.logCheck(item)));
    return insertAll(inputs);
  }

  listLogsForUrl(urlId: number, since: Date, order: 'asc' | 'desc'): MirrorLog[] {
    const direction = order === 'asc' ? 'ASC' : 'DESC';
    const rows = this.db
      .prepare<[number, string], LogRow>(
        `SELECT * FROM mirror_logs WHERE url_id = ? AND check_time >= ? ORDER BY check_time ${direction}, id ${direction}`
      )
      .all(urlId, toIso(since));
    return rows.map((row) => this.rowToLog(row));
  }

  listLogsWithLocationForUrl(urlId: number, since: Date): MirrorLogWithLocation[] {
    const rows = this.db
      .prepare<[number, string], LogWithLocationRow>(
        `SELECT l.*, c.hostname AS location_hostname, c.source_ip AS location_source_ip,
                c.country AS location_country, c.ip_version AS location_ip_version,
                c.created AS location_created
           FROM mirror_logs l
           LEFT JOIN check_locations c ON c.id = l.location_id
          WHERE l.url_id = ? AND l.check_time >= ?
          ORDER BY l.check_time DESC, l.id DESC`
      )
      .all(urlId, toIso(since));
    return rows.map((row) => this.rowToLogWithLocation(row));
  }

  /** Newest check time across every log, the freshness signal of the status pages. */
  latestCheckTime(): Date | null {
    const row = this.db
      .prepare<[], { latest: string | null }>('SELECT MAX(check_time) AS latest FROM mirror_logs')
      .get();
    return row?.latest ? fromIso(row.latest) : null;
  }

  countLogs(): number {
    const row = this.db.prepare<[], { c: number }>('SELECT COUNT(*) as c FROM mirror_logs').get();
    return row?.c ?? 0;
  }

  /** Check rows inside a window, for the status aggregation. */
  listCheckRows(params: { since: Date; mirrorId?: number } & Visibility): CheckRow[] {
    const clauses = ['l.check_time >= ?'];
    const args: Array<string | number> = [toIso(params.since)];
    if (params.mirrorId !== undefined) {
      clauses.push('u.mirror_id = ?');
      args.push(params.mirrorId);
    }
    if (params.visibleOnly) clauses.push(VISIBLE);
    return this.db
      .prepare<Array<string | number>, CheckRow>(
        `SELECT l.url_id, l.check_time, l.last_sync, l.duration, l.is_success
           FROM mirror_logs l
           JOIN mirror_urls u ON u.id = l.url_id
           JOIN mirrors m ON m.id = u.mirror_id
          WHERE ${clauses.join(' AND ')}
          ORDER BY l.check_time`
      )
      .all(...args);
  }

  /** Oldest and newest check time inside a window, over all URLs of all visibilities. */
  checkTimeRange(since: Date, mirrorId?: number): { first: Date; last: Date } | null {
    const args: Array<string | number> = [toIso(since)];
    let mirrorClause = '';
    if (mirrorId !== undefined) {
      mirrorClause = 'AND u.mirror_id = ?';
      args.push(mirrorId);
    }
    const row = this.db
      .prepare<Array<string | number>, { first: string | null; last: string | null }>(
        `SELECT MIN(l.check_time) AS first, MAX(l.check_time) AS last
           FROM mirror_logs l
           JOIN mirror_urls u ON u.id = l.url_id
          WHERE l.check_time >= ? ${mirrorClause}`
      )
      .get(...args);
    if (!row || !row.first || !row.last) return null;
    return { first: fromIso(row.first), last: fromIso(row.last) };
  }

  /** Failed checks inside a window grouped by URL and error text. */
  listErrorGroups(params: { since: Date; mirrorId?: number } & Visibility): ErrorGroupRow[] {
    const clauses = ['l.is_success = 0', 'l.check_time >= ?'];
    const args: Array<string | number> = [toIso(params.since)];
    if (params.mirrorId !== undefined) {
      clauses.push('u.mirror_id = ?');
      args.push(params.mirrorId);
    }
    if (params.visibleOnly) clauses.push(VISIBLE);
    return this.db
      .prepare<Array<string | number>, ErrorGroupRow>(
        `SELECT l.url_id AS url_id, l.error AS error, COUNT(*) AS error_count,
                MAX(l.check_time) AS last_occurred
           FROM mirror_logs l
           JOIN mirror_urls u ON u.id = l.url_id
           JOIN mirrors m ON m.id = u.mirror_id
          WHERE ${clauses.join(' AND ')}
          GROUP BY l.url_id, l.error
          ORDER BY last_occurred DESC, error_count DESC`
      )
      .all(...args);
  }

  close() {
    this.db.close();
  }
}
