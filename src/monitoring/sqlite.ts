import fs from 'node:fs';
import { createRequire } from 'node:module';
import path from 'node:path';

import type { Database as SqliteDatabase } from 'better-sqlite3';

type SqliteFactory = new (filename: string) => SqliteDatabase;

let cachedFactory: SqliteFactory | undefined;

const loadSqliteFactory = (): SqliteFactory => {
  if (cachedFactory !== undefined) return cachedFactory;
  const require = createRequire(import.meta.url);
  const factory = require('better-sqlite3') as SqliteFactory;
  cachedFactory = factory;
  return factory;
};

/** One connection per store instance; WAL lets readers proceed while a writer commits. */
export function openIndexDatabase(filePath: string, schema: string): SqliteDatabase {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  const sqlite = loadSqliteFactory();
  const db = new sqlite(filePath);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('busy_timeout = 5000');
  db.exec(schema);
  return db;
}
