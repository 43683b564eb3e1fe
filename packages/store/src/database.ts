import Database from 'better-sqlite3';
import * as path from 'node:path';
import * as fs from 'node:fs';

const DEFAULT_DB_PATH = '.cairn/cairn.db';

const instances = new Map<string, Database.Database>();

export interface DatabaseOptions {
  /** Path to the SQLite database file. Defaults to .cairn/cairn.db */
  dbPath?: string;
  /** Open in read-only mode */
  readonly?: boolean;
}

/**
 * Returns (or creates) the shared connection for a database file.
 * Configures WAL mode, foreign keys, and production pragmas on first open.
 */
export function getDatabase(options?: DatabaseOptions): Database.Database {
  const dbPath = path.resolve(options?.dbPath ?? path.join(process.cwd(), DEFAULT_DB_PATH));
  const existing = instances.get(dbPath);
  if (existing?.open) return existing;

  // Ensure parent directory exists
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath, {
    readonly: options?.readonly ?? false,
  });

  applyPragmas(db);

  instances.set(dbPath, db);
  return db;
}

/**
 * Close every shared connection.
 */
export function closeDatabase(): void {
  for (const db of instances.values()) {
    if (db.open) db.close();
  }
  instances.clear();
}

/**
 * In-memory database for tests. Each call returns a separate, empty one.
 */
export function createTestDatabase(): Database.Database {
  const db = new Database(':memory:');
  applyPragmas(db);
  return db;
}

function applyPragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('cache_size = -16000');       // 16 MB
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');       // 5 s
  db.pragma('temp_store = MEMORY');
}
