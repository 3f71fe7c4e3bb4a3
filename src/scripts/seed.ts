import fs from 'node:fs';
import { loadConfig } from '../config.js';
import { seedDatabase } from '../db/seed.js';
import { MirrorDb } from '../db/sqlite.js';

const file = process.argv[2];
if (!file) {
  console.error('usage: npm run seed -- <file.json>');
  process.exit(1);
}

const config = loadConfig();
const db = new MirrorDb(config.MIRRORS_DB_PATH);
try {
  const result = seedDatabase(db, JSON.parse(fs.readFileSync(file, 'utf8')));
  console.log(`Seeded ${result.protocols} protocols, ${result.locations} locations, ${result.mirrors} mirrors, ${result.urls} urls`);
} finally {
  db.close();
}
