import Database from 'better-sqlite3';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import pino from 'pino';

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURE = join(__dirname, '../fixtures/chinook-mini.sql');

export const silentLogger = pino({ level: 'silent' });

/**
 * Write the fixture into a fresh SQLite file. Returns its path and a cleanup
 * callback that removes the temp directory.
 */
export function createTestDatabase(): { filename: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'text2sql-test-'));
  const filename = join(dir, 'chinook-mini.db');

  const db = new Database(filename);
  db.exec(readFileSync(FIXTURE, 'utf-8'));
  db.close();

  return {
    filename,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}
