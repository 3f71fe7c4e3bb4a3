import { z } from 'zod';
import type { MirrorDb } from './sqlite.js';

const countryCode = z.string().regex(/^[A-Za-z]{2}$/).or(z.literal(''));

const seedSchema = z.object({
  protocols: z
    .array(z.object({ protocol: z.string().min(1).max(10), isDownload: z.boolean().default(true) }))
    .default([]),
  locations: z
    .array(
      z.object({
        hostname: z.string().min(1),
        sourceIp: z.string().ip(),
        country: countryCode,
        ipVersion: z.union([z.literal(4), z.literal(6)])
      })
    )
    .default([]),
  mirrors: z
    .array(
      z.object({
        name: z.string().min(1).max(255),
        tier: z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(-1)]).default(2),
        upstream: z.string().optional(),
        adminEmail: z.string().default(''),
        public: z.boolean().default(true),
        active: z.boolean().default(true),
        isos: z.boolean().default(true),
        notes: z.string().default(''),
        urls: z
          .array(
            z.object({
              url: z.string().url(),
              country: countryCode.default(''),
              hasIpv4: z.boolean().default(true),
              hasIpv6: z.boolean().default(false),
              active: z.boolean().default(true)
            })
          )
          .default([])
      })
    )
    .default([])
});

export type SeedResult = {
  protocols: number;
  locations: number;
  mirrors: number;
  urls: number;
};

/**
 * Loads protocols, check locations, mirrors and their URLs. Records that
 * already exist (by protocol label, source IP, mirror name or URL) are left
 * untouched and not counted. A URL's protocol is its scheme.
 */
export function seedDatabase(db: MirrorDb, input: unknown): SeedResult {
  const data = seedSchema.parse(input);
  const result: SeedResult = { protocols: 0, locations: 0, mirrors: 0, urls: 0 };

  for (const item of data.protocols) {
    if (db.findProtocol(item.protocol)) continue;
    db.createProtocol(item.protocol, item.isDownload);
    result.protocols += 1;
  }

  for (const item of data.locations) {
    if (db.findLocationBySourceIp(item.sourceIp)) continue;
    db.createLocation(item);
    result.locations += 1;
  }

  for (const item of data.mirrors) {
    let mirror = db.findMirrorByName(item.name);
    if (!mirror) {
      const upstream = item.upstream ? db.findMirrorByName(item.upstream) : null;
      if (item.upstream && !upstream) throw new Error(`unknown upstream mirror: ${item.upstream}`);
      mirror = db.createMirror({ ...item, upstreamId: upstream?.id ?? null });
      result.mirrors += 1;
    }
    for (const entry of item.urls) {
      if (db.findUrlByString(entry.url)) continue;
      const scheme = new URL(entry.url).protocol.replace(':', '');
      const protocol = db.findProtocol(scheme);
      if (!protocol) throw new Error(`unknown protocol for ${entry.url}: ${scheme}`);
      db.createUrl({ ...entry, mirrorId: mirror.id, protocolId: protocol.id });
      result.urls += 1;
    }
  }

  return result;
}
