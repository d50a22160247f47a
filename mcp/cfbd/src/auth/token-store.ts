/**
 * SQLite-backed store of issued bearer tokens.
 *
 * Every token is written to disk before issue() resolves so it survives
 * container restarts. Membership checks are served from an in-memory map
 * loaded at startup. If the database cannot be opened (missing directory
 * that cannot be created, corrupt file) the store logs the failure and
 * keeps working in memory only.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { logger, errorMessage, redact } from '../lib/logger.js';

interface TokenRow {
  token: string;
  session_id: string;
}

export class TokenStore {
  /** token -> session id */
  private readonly tokens = new Map<string, string>();
  private db: Database.Database | null;

  constructor(private readonly dbPath: string) {
    this.db = this.open();
    this.load();
  }

  private open(): Database.Database | null {
    let db: Database.Database | null = null;
    try {
      if (this.dbPath !== ':memory:') {
        mkdirSync(dirname(this.dbPath), { recursive: true });
      }
      db = new Database(this.dbPath);
      db.pragma('journal_mode = WAL');
      db.exec(`
        CREATE TABLE IF NOT EXISTS issued_tokens (
          token TEXT PRIMARY KEY,
          session_id TEXT NOT NULL,
          created_at INTEGER NOT NULL
        );
      `);
      return db;
    } catch (error) {
      logger.error('Token database unavailable, issued tokens will not survive a restart', {
        dbPath: this.dbPath,
        error: errorMessage(error),
      });
      db?.close();
      return null;
    }
  }

  private load(): void {
    if (!this.db) {
      return;
    }
    try {
      const rows = this.db
        .prepare<[], TokenRow>('SELECT token, session_id FROM issued_tokens')
        .all();
      for (const row of rows) {
        this.tokens.set(row.token, row.session_id);
      }
      logger.info('TokenStore initialized', { dbPath: this.dbPath, tokens: rows.length });
    } catch (error) {
      logger.error('Failed to load issued tokens, starting empty', {
        dbPath: this.dbPath,
        error: errorMessage(error),
      });
    }
  }

  /**
   * Records a newly minted token with its session id. Resolves once the row
   * is on disk; a failed write is logged and the token stays valid in memory.
   */
  async issue(token: string, sessionId: string): Promise<void> {
    this.tokens.set(token, sessionId);

    if (!this.db) {
      return;
    }
    try {
      this.db
        .prepare(
          `INSERT INTO issued_tokens (token, session_id, created_at)
           VALUES (?, ?, ?)
           ON CONFLICT(token) DO UPDATE SET session_id = excluded.session_id`
        )
        .run(token, sessionId, Date.now());
    } catch (error) {
      logger.error('Failed to persist issued token', {
        token: redact(token),
        error: errorMessage(error),
      });
    }
  }

  contains(token: string): boolean {
    return this.tokens.has(token);
  }

  sessionFor(token: string): string | undefined {
    return this.tokens.get(token);
  }

  /** Whether tokens are being written to durable storage */
  get persistent(): boolean {
    return this.db !== null;
  }

  get size(): number {
    return this.tokens.size;
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }
}
