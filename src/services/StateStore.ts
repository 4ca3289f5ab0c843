/**
 * Durable per-subject state: subject, cursor and aggregate.
 *
 * Backends must commit (cursor, aggregate) as one unit: after a crash either
 * the whole cycle's update is visible or none of it is. A cursor advanced past
 * battles missing from the aggregate (or the reverse) would break at-most-once
 * counting.
 */

import type {
  MonitorCursor,
  OpponentStats,
  OutcomeTally,
  Subject,
  SubjectAggregate,
  SubjectState,
  SubjectStatus,
} from '../types';
import { StateStoreError } from '../types/errors';
import { emptyCursor } from './BattleDiff';
import { emptyAggregate } from './StatsAggregator';

export interface ProfileUpdate {
  name: string;
  arena: string | null;
}

export interface CommitPayload {
  cursor: MonitorCursor;
  aggregate: SubjectAggregate;
  profile?: ProfileUpdate;
}

export interface StateStore {
  /** All persisted subjects keyed by normalized tag. */
  loadAll(): Map<string, SubjectState>;
  get(tag: string): SubjectState | null;
  /** Creates the subject together with an empty cursor and aggregate. */
  createSubject(subject: Subject): SubjectState;
  /** Atomically replaces cursor + aggregate (and profile fields). Never touches status. */
  commit(tag: string, payload: CommitPayload): void;
  setStatus(tag: string, status: SubjectStatus): void;
  /** Removes subject, cursor and aggregate together. Returns false if absent. */
  deleteSubject(tag: string): boolean;
  close(): void;
}

export function initialState(subject: Subject): SubjectState {
  return { subject, cursor: emptyCursor(), aggregate: emptyAggregate() };
}

// ============ Snapshot decoding ============

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isTally(value: unknown): value is OutcomeTally {
  return (
    isRecord(value) &&
    isNumber(value.battles) &&
    isNumber(value.wins) &&
    isNumber(value.losses) &&
    isNumber(value.draws)
  );
}

function isTallyMap(value: unknown): value is Record<string, OutcomeTally> {
  return isRecord(value) && Object.values(value).every(isTally);
}

function isOpponentStats(value: unknown): value is OpponentStats {
  return (
    isTally(value) &&
    isRecord(value) &&
    typeof value.tag === 'string' &&
    typeof value.name === 'string' &&
    typeof value.lastSeenAt === 'string' &&
    isTallyMap(value.byMode) &&
    Array.isArray(value.recent)
  );
}

export function isSubjectStatus(value: unknown): value is SubjectStatus {
  return value === 'active' || value === 'paused';
}

export function isSubjectAggregate(value: unknown): value is SubjectAggregate {
  return (
    isRecord(value) &&
    isNumber(value.totalBattles) &&
    isNumber(value.totalWins) &&
    isNumber(value.totalLosses) &&
    isNumber(value.totalDraws) &&
    (value.lastBattleAt === null || typeof value.lastBattleAt === 'string') &&
    isTallyMap(value.byMode) &&
    isRecord(value.opponents) &&
    Object.values(value.opponents).every(isOpponentStats)
  );
}

export function isMonitorCursor(value: unknown): value is MonitorCursor {
  return (
    isRecord(value) &&
    (value.lastProcessedId === null || typeof value.lastProcessedId === 'string') &&
    (value.lastProcessedAt === null || typeof value.lastProcessedAt === 'string') &&
    isNumber(value.fetchSequence) &&
    Array.isArray(value.recentIds) &&
    value.recentIds.every((id) => typeof id === 'string')
  );
}

export function isSubject(value: unknown): value is Subject {
  return (
    isRecord(value) &&
    typeof value.tag === 'string' &&
    typeof value.name === 'string' &&
    isSubjectStatus(value.status) &&
    typeof value.createdAt === 'string' &&
    (value.arena === null || typeof value.arena === 'string')
  );
}

export function decodeJson<T>(
  tag: string,
  what: string,
  json: string,
  guard: (value: unknown) => value is T,
): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new StateStoreError(tag, `Corrupt ${what} snapshot for #${tag}`, err);
  }
  if (!guard(parsed)) {
    throw new StateStoreError(tag, `Invalid ${what} snapshot for #${tag}`);
  }
  return parsed;
}
