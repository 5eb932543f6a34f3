import Database from 'better-sqlite3';
import { dirname } from 'node:path';
import { existsSync, mkdirSync } from 'node:fs';
import { z } from 'zod';

import {
  type ConversationStage,
  type Session,
  type StoredDocument,
  SessionSchema,
  StoredDocumentSchema,
} from '../types/index.js';
import type { SessionStore } from '../engines/conversation.js';
import { logger } from '../utils/logger.js';

const SessionRowSchema = z.object({
  session_id: z.string(),
  stage: z.string(),
  necessity: z.string().nullable(),
  requirements_json: z.string(),
  answers_json: z.string(),
  pending_decision_json: z.string().nullable(),
  requirements_locked: z.number(),
  created_at: z.string(),
  updated_at: z.string(),
});

const DocumentRowSchema = z.object({
  id: z.string(),
  session_id: z.string(),
  sections_json: z.string(),
  created_at: z.string(),
});

export interface ListSessionsOptions {
  stage?: ConversationStage | undefined;
  limit?: number | undefined;
}

function parseJson(text: string | null): unknown {
  if (text === null) return null;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * SQLite persistence for sessions and finalized documents.
 * Structured columns hold JSON text and are validated on every read.
 */
export class Storage implements SessionStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      this.ensureDirectory(dbPath);
    }
    this.db = new Database(dbPath);
    this.initialize();
  }

  private ensureDirectory(dbPath: string): void {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  private initialize(): void {
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS etp_sessions (
        session_id TEXT PRIMARY KEY,
        stage TEXT NOT NULL,
        necessity TEXT,
        requirements_json TEXT NOT NULL,
        answers_json TEXT NOT NULL,
        pending_decision_json TEXT,
        requirements_locked INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS etp_documents (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        sections_json TEXT NOT NULL,
        created_at TEXT NOT NULL,
        FOREIGN KEY (session_id) REFERENCES etp_sessions(session_id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_etp_sessions_stage ON etp_sessions(stage);
      CREATE INDEX IF NOT EXISTS idx_etp_sessions_updated ON etp_sessions(updated_at DESC);
      CREATE INDEX IF NOT EXISTS idx_etp_documents_session ON etp_documents(session_id);
    `);
  }

  private toSession(row: unknown): Session | null {
    const parsedRow = SessionRowSchema.safeParse(row);
    if (!parsedRow.success) {
      logger.error('Failed to read session row from database', parsedRow.error);
      return null;
    }
    const r = parsedRow.data;

    const parsed = SessionSchema.safeParse({
      sessionId: r.session_id,
      stage: r.stage,
      necessity: r.necessity,
      requirements: parseJson(r.requirements_json),
      requirementsLocked: r.requirements_locked === 1,
      answers: parseJson(r.answers_json),
      pendingDecision: parseJson(r.pending_decision_json),
      createdAt: r.created_at,
      updatedAt: r.updated_at,
    });
    if (!parsed.success) {
      logger.error('Failed to validate session from database', parsed.error, { sessionId: r.session_id });
      return null;
    }
    return parsed.data;
  }

  private toDocument(row: unknown): StoredDocument | null {
    const parsedRow = DocumentRowSchema.safeParse(row);
    if (!parsedRow.success) {
      logger.error('Failed to read document row from database', parsedRow.error);
      return null;
    }
    const parsed = StoredDocumentSchema.safeParse({
      id: parsedRow.data.id,
      sessionId: parsedRow.data.session_id,
      sections: parseJson(parsedRow.data.sections_json),
      createdAt: parsedRow.data.created_at,
    });
    if (!parsed.success) {
      logger.error('Failed to validate document from database', parsed.error, { id: parsedRow.data.id });
      return null;
    }
    return parsed.data;
  }

  // Session operations

  /**
   * Upsert; an existing row keeps its created_at and its documents
   */
  saveSession(session: Session): void {
    const stmt = this.db.prepare(`
      INSERT INTO etp_sessions (
        session_id, stage, necessity, requirements_json, answers_json,
        pending_decision_json, requirements_locked, created_at, updated_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(session_id) DO UPDATE SET
        stage = excluded.stage,
        necessity = excluded.necessity,
        requirements_json = excluded.requirements_json,
        answers_json = excluded.answers_json,
        pending_decision_json = excluded.pending_decision_json,
        requirements_locked = excluded.requirements_locked,
        updated_at = excluded.updated_at
    `);
    stmt.run(
      session.sessionId,
      session.stage,
      session.necessity,
      JSON.stringify(session.requirements),
      JSON.stringify(session.answers),
      session.pendingDecision ? JSON.stringify(session.pendingDecision) : null,
      session.requirementsLocked ? 1 : 0,
      session.createdAt,
      session.updatedAt
    );
  }

  getSession(sessionId: string): Session | null {
    const row = this.db.prepare('SELECT * FROM etp_sessions WHERE session_id = ?').get(sessionId);
    return row === undefined ? null : this.toSession(row);
  }

  listSessions(options: ListSessionsOptions = {}): Session[] {
    const limit = options.limit ?? 50;
    const rows = options.stage
      ? this.db
          .prepare('SELECT * FROM etp_sessions WHERE stage = ? ORDER BY updated_at DESC LIMIT ?')
          .all(options.stage, limit)
      : this.db.prepare('SELECT * FROM etp_sessions ORDER BY updated_at DESC LIMIT ?').all(limit);

    return rows
      .map((row) => this.toSession(row))
      .filter((session): session is Session => session !== null);
  }

  /**
   * Delete a session and its documents
   */
  deleteSession(sessionId: string): boolean {
    return this.transaction(() => {
      this.db.prepare('DELETE FROM etp_documents WHERE session_id = ?').run(sessionId);
      const result = this.db.prepare('DELETE FROM etp_sessions WHERE session_id = ?').run(sessionId);
      return result.changes > 0;
    });
  }

  // Document operations

  saveDocument(document: StoredDocument): void {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO etp_documents (id, session_id, sections_json, created_at)
      VALUES (?, ?, ?, ?)
    `);
    stmt.run(document.id, document.sessionId, JSON.stringify(document.sections), document.createdAt);
  }

  getDocument(id: string): StoredDocument | null {
    const row = this.db.prepare('SELECT * FROM etp_documents WHERE id = ?').get(id);
    return row === undefined ? null : this.toDocument(row);
  }

  listDocuments(limit = 50): StoredDocument[] {
    return this.db
      .prepare('SELECT * FROM etp_documents ORDER BY created_at DESC, rowid DESC LIMIT ?')
      .all(limit)
      .map((row) => this.toDocument(row))
      .filter((document): document is StoredDocument => document !== null);
  }

  getLatestDocumentForSession(sessionId: string): StoredDocument | null {
    const row = this.db
      .prepare('SELECT * FROM etp_documents WHERE session_id = ? ORDER BY created_at DESC, rowid DESC LIMIT 1')
      .get(sessionId);
    return row === undefined ? null : this.toDocument(row);
  }

  /**
   * Row counts, used by the health check
   */
  getStats(): { sessions: number; documents: number } {
    const CountSchema = z.object({ count: z.number() });
    const sessions = CountSchema.parse(this.db.prepare('SELECT COUNT(*) AS count FROM etp_sessions').get());
    const documents = CountSchema.parse(this.db.prepare('SELECT COUNT(*) AS count FROM etp_documents').get());
    return { sessions: sessions.count, documents: documents.count };
  }

  // Utility

  /**
   * Execute operations within a transaction.
   * If any operation fails, the entire transaction is rolled back.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }
}

/**
 * In-process store with the same contract, for tests and ephemeral runs
 */
export class MemoryStore implements SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly documents = new Map<string, StoredDocument>();

  getSession(sessionId: string): Session | null {
    const session = this.sessions.get(sessionId);
    return session ? structuredClone(session) : null;
  }

  saveSession(session: Session): void {
    this.sessions.set(session.sessionId, structuredClone(session));
  }

  saveDocument(document: StoredDocument): void {
    this.documents.set(document.id, structuredClone(document));
  }

  getDocument(id: string): StoredDocument | null {
    const document = this.documents.get(id);
    return document ? structuredClone(document) : null;
  }

  listDocuments(): StoredDocument[] {
    return [...this.documents.values()].map((document) => structuredClone(document));
  }
}
