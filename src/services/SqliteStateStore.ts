import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import type { Subject, SubjectState, SubjectStatus } from '../types';
import { StateStoreError } from '../types/errors';
import {
  decodeJson,
  initialState,
  isMonitorCursor,
  isSubjectAggregate,
  isSubjectStatus,
} from './StateStore';
import type { CommitPayload, ProfileUpdate, StateStore } from './StateStore';

interface SubjectStateRow {
  tag: string;
  name: string;
  status: string;
  arena: string | null;
  created_at: string;
  cursor_json: string;
  aggregate_json: string;
}

/**
 * SQLite-backed state store.
 *
 * One `subject_state` row per subject holds the cursor and aggregate
 * snapshot. A commit replaces that row and refreshes the profile columns
 * inside a single transaction; any throw rolls the whole cycle back.
 */
export class SqliteStateStore implements StateStore {
  private db: Database.Database;

  constructor(dbPath: string = './data/monitor.db') {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.initTables();
  }

  private initTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS subjects (
        tag TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        status TEXT NOT NULL CHECK (status IN ('active', 'paused')),
        arena TEXT,
        created_at TEXT NOT NULL
      );
    `);

    // Cursor + aggregate snapshot, replaced whole on every commit
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS subject_state (
        tag TEXT PRIMARY KEY REFERENCES subjects(tag) ON DELETE CASCADE,
        cursor_json TEXT NOT NULL,
        aggregate_json TEXT NOT NULL,
        revision INTEGER NOT NULL DEFAULT 0,
        updated_at INTEGER NOT NULL
      );
    `);
  }

  loadAll(): Map<string, SubjectState> {
    const rows = this.db
      .prepare<[], SubjectStateRow>(`
        SELECT s.tag, s.name, s.status, s.arena, s.created_at, st.cursor_json, st.aggregate_json
        FROM subjects s
        JOIN subject_state st ON st.tag = s.tag
        ORDER BY s.created_at, s.tag
      `)
      .all();

    const states = new Map<string, SubjectState>();
    for (const row of rows) {
      states.set(row.tag, this.toState(row));
    }
    return states;
  }

  get(tag: string): SubjectState | null {
    const row = this.db
      .prepare<[string], SubjectStateRow>(`
        SELECT s.tag, s.name, s.status, s.arena, s.created_at, st.cursor_json, st.aggregate_json
        FROM subjects s
        JOIN subject_state st ON st.tag = s.tag
        WHERE s.tag = ?
      `)
      .get(tag);
    return row ? this.toState(row) : null;
  }

  createSubject(subject: Subject): SubjectState {
    const state = initialState(subject);
    const insert = this.db.transaction(() => {
      const existing = this.db
        .prepare<[string], { tag: string }>(`SELECT tag FROM subjects WHERE tag = ?`)
        .get(subject.tag);
      if (existing) {
        throw new StateStoreError(subject.tag, `Subject #${subject.tag} already exists`);
      }

      this.db
        .prepare(`
          INSERT INTO subjects (tag, name, status, arena, created_at)
          VALUES (?, ?, ?, ?, ?)
        `)
        .run(subject.tag, subject.name, subject.status, subject.arena, subject.createdAt);

      this.db
        .prepare(`
          INSERT INTO subject_state (tag, cursor_json, aggregate_json, revision, updated_at)
          VALUES (?, ?, ?, 0, ?)
        `)
        .run(subject.tag, JSON.stringify(state.cursor), JSON.stringify(state.aggregate), Date.now());
    });

    this.run(subject.tag, 'create subject', insert);
    return state;
  }

  commit(tag: string, payload: CommitPayload): void {
    const apply = this.db.transaction(() => {
      this.writeSnapshot(tag, payload);
      if (payload.profile) {
        this.writeProfile(tag, payload.profile);
      }
    });
    this.run(tag, 'commit', apply);
  }

  setStatus(tag: string, status: SubjectStatus): void {
    const result = this.run(tag, 'set status', () =>
      this.db.prepare(`UPDATE subjects SET status = ? WHERE tag = ?`).run(status, tag),
    );
    if (result.changes === 0) {
      throw new StateStoreError(tag, `Subject #${tag} does not exist`);
    }
  }

  deleteSubject(tag: string): boolean {
    const remove = this.db.transaction(() => {
      this.db.prepare(`DELETE FROM subject_state WHERE tag = ?`).run(tag);
      return this.db.prepare(`DELETE FROM subjects WHERE tag = ?`).run(tag).changes > 0;
    });
    return this.run(tag, 'delete subject', remove);
  }

  close(): void {
    this.db.close();
  }

  protected writeSnapshot(tag: string, payload: CommitPayload): void {
    const result = this.db
      .prepare(`
        UPDATE subject_state
        SET cursor_json = ?, aggregate_json = ?, revision = revision + 1, updated_at = ?
        WHERE tag = ?
      `)
      .run(JSON.stringify(payload.cursor), JSON.stringify(payload.aggregate), Date.now(), tag);

    // Never resurrect a subject deleted while its cycle was in flight
    if (result.changes === 0) {
      throw new StateStoreError(tag, `Subject #${tag} does not exist`);
    }
  }

  protected writeProfile(tag: string, profile: ProfileUpdate): void {
    this.db
      .prepare(`UPDATE subjects SET name = ?, arena = ? WHERE tag = ?`)
      .run(profile.name, profile.arena, tag);
  }

  private run<T>(tag: string, action: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StateStoreError) throw err;
      throw new StateStoreError(tag, `SQLite ${action} failed for #${tag}`, err);
    }
  }

  private toState(row: SubjectStateRow): SubjectState {
    if (!isSubjectStatus(row.status)) {
      throw new StateStoreError(row.tag, `Invalid status "${row.status}" for #${row.tag}`);
    }
    return {
      subject: {
        tag: row.tag,
        name: row.name,
        status: row.status,
        arena: row.arena,
        createdAt: row.created_at,
      },
      cursor: decodeJson(row.tag, 'cursor', row.cursor_json, isMonitorCursor),
      aggregate: decodeJson(row.tag, 'aggregate', row.aggregate_json, isSubjectAggregate),
    };
  }
}
