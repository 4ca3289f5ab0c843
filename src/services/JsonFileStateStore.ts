import fs from 'fs';
import path from 'path';
import type { MonitorCursor, Subject, SubjectAggregate, SubjectState, SubjectStatus } from '../types';
import { StateStoreError, errorMessage } from '../types/errors';
import { Logger } from './Logger';
import {
  initialState,
  isMonitorCursor,
  isSubject,
  isSubjectAggregate,
} from './StateStore';
import type { CommitPayload, StateStore } from './StateStore';

const SNAPSHOT_VERSION = 1;
const TEMP_SUFFIX = '.tmp';

interface SnapshotFile {
  version: number;
  revision: number;
  updatedAt: number;
  subject: Subject;
  cursor: MonitorCursor;
  aggregate: SubjectAggregate;
}

function isSnapshotFile(value: unknown): value is SnapshotFile {
  if (typeof value !== 'object' || value === null) return false;
  const v: Record<string, unknown> = { ...value };
  return (
    v.version === SNAPSHOT_VERSION &&
    typeof v.revision === 'number' &&
    typeof v.updatedAt === 'number' &&
    isSubject(v.subject) &&
    isMonitorCursor(v.cursor) &&
    isSubjectAggregate(v.aggregate)
  );
}

/**
 * Flat-file state store: one `<TAG>.json` snapshot per subject.
 *
 * Snapshots are never edited in place. Each write goes to a temp file, is
 * fsynced, then renamed over the previous snapshot, so a crash leaves either
 * the old or the new file, never a torn one.
 */
export class JsonFileStateStore implements StateStore {
  private dir: string;
  private logger = new Logger('JsonFileStateStore');

  constructor(dir: string = './data/subjects') {
    this.dir = dir;
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  loadAll(): Map<string, SubjectState> {
    const states = new Map<string, SubjectState>();
    const entries = fs.readdirSync(this.dir).sort();

    for (const entry of entries) {
      if (entry.endsWith(TEMP_SUFFIX)) {
        // Left behind by a write that never reached its rename
        this.logger.warn(`Removing incomplete snapshot ${entry}`);
        fs.rmSync(path.join(this.dir, entry), { force: true });
        continue;
      }
      if (!entry.endsWith('.json')) continue;

      const snapshot = this.readFile(path.join(this.dir, entry), entry.slice(0, -'.json'.length));
      states.set(snapshot.subject.tag, {
        subject: snapshot.subject,
        cursor: snapshot.cursor,
        aggregate: snapshot.aggregate,
      });
    }
    return states;
  }

  get(tag: string): SubjectState | null {
    const snapshot = this.read(tag);
    if (!snapshot) return null;
    return { subject: snapshot.subject, cursor: snapshot.cursor, aggregate: snapshot.aggregate };
  }

  createSubject(subject: Subject): SubjectState {
    if (fs.existsSync(this.fileFor(subject.tag))) {
      throw new StateStoreError(subject.tag, `Subject #${subject.tag} already exists`);
    }
    const state = initialState(subject);
    this.write(subject.tag, {
      version: SNAPSHOT_VERSION,
      revision: 0,
      updatedAt: Date.now(),
      ...state,
    });
    return state;
  }

  commit(tag: string, payload: CommitPayload): void {
    const current = this.read(tag);
    if (!current) {
      throw new StateStoreError(tag, `Subject #${tag} does not exist`);
    }

    this.write(tag, {
      version: SNAPSHOT_VERSION,
      revision: current.revision + 1,
      updatedAt: Date.now(),
      // status and createdAt always come from disk, never from the cycle
      subject: payload.profile
        ? { ...current.subject, name: payload.profile.name, arena: payload.profile.arena }
        : current.subject,
      cursor: payload.cursor,
      aggregate: payload.aggregate,
    });
  }

  setStatus(tag: string, status: SubjectStatus): void {
    const current = this.read(tag);
    if (!current) {
      throw new StateStoreError(tag, `Subject #${tag} does not exist`);
    }
    this.write(tag, {
      ...current,
      revision: current.revision + 1,
      updatedAt: Date.now(),
      subject: { ...current.subject, status },
    });
  }

  deleteSubject(tag: string): boolean {
    const file = this.fileFor(tag);
    if (!fs.existsSync(file)) return false;
    try {
      fs.rmSync(file);
      return true;
    } catch (err) {
      throw new StateStoreError(tag, `Failed to delete #${tag}: ${errorMessage(err)}`, err);
    }
  }

  close(): void {
    // Nothing held open between writes
  }

  /** Final step of a write; the snapshot becomes visible only here. */
  protected replaceFile(tempFile: string, file: string): void {
    fs.renameSync(tempFile, file);
  }

  private fileFor(tag: string): string {
    return path.join(this.dir, `${tag}.json`);
  }

  private read(tag: string): SnapshotFile | null {
    const file = this.fileFor(tag);
    if (!fs.existsSync(file)) return null;
    return this.readFile(file, tag);
  }

  private readFile(file: string, tag: string): SnapshotFile {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (err) {
      throw new StateStoreError(tag, `Corrupt snapshot for #${tag}: ${errorMessage(err)}`, err);
    }
    if (!isSnapshotFile(parsed)) {
      throw new StateStoreError(tag, `Invalid snapshot for #${tag}`);
    }
    return parsed;
  }

  private write(tag: string, snapshot: SnapshotFile): void {
    const file = this.fileFor(tag);
    const tempFile = `${file}.${process.pid}${TEMP_SUFFIX}`;
    try {
      const fd = fs.openSync(tempFile, 'w');
      try {
        fs.writeFileSync(fd, JSON.stringify(snapshot, null, 2));
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
      this.replaceFile(tempFile, file);
    } catch (err) {
      fs.rmSync(tempFile, { force: true });
      throw new StateStoreError(tag, `Failed to write snapshot for #${tag}: ${errorMessage(err)}`, err);
    }
  }
}
