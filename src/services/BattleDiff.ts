/**
 * Battle-log diff engine.
 *
 * Turns a fresh newest-first battle log into the chronological list of
 * battles not yet processed, plus the cursor to persist once they have been
 * folded in. Pure: the same (cursor, log) pair always yields the same result,
 * and neither input is mutated.
 */

import { LIMITS } from '../types';
import type { BattleRecord, MonitorCursor } from '../types';

export interface DiffResult {
  unseen: BattleRecord[];     // oldest first
  cursor: MonitorCursor;
  discontinuity: boolean;     // cursor id no longer present in the log
  baseline: boolean;          // first-ever poll: cursor positioned, nothing counted
}

export function emptyCursor(): MonitorCursor {
  return {
    lastProcessedId: null,
    lastProcessedAt: null,
    fetchSequence: 0,
    recentIds: [],
  };
}

function dedupeById(log: BattleRecord[]): BattleRecord[] {
  const seen = new Set<string>();
  const out: BattleRecord[] = [];
  for (const record of log) {
    if (seen.has(record.id)) continue;
    seen.add(record.id);
    out.push(record);
  }
  return out;
}

function mergeRecentIds(newestFirst: string[], previous: string[]): string[] {
  const merged: string[] = [];
  const seen = new Set<string>();
  for (const id of [...newestFirst, ...previous]) {
    if (seen.has(id)) continue;
    seen.add(id);
    merged.push(id);
    if (merged.length >= LIMITS.CURSOR_RECENT_IDS) break;
  }
  return merged;
}

/**
 * Compare a fresh log (newest first) with the subject's cursor.
 *
 * - First-ever poll: the log becomes the baseline, nothing is unseen.
 * - Cursor id found: everything newer than it is unseen.
 * - Cursor id missing: the whole log is unseen and `discontinuity` is set.
 * Ids already listed in `cursor.recentIds` are never reported again.
 */
export function diffBattleLog(cursor: MonitorCursor, freshLog: BattleRecord[]): DiffResult {
  const log = dedupeById(freshLog);
  const fetchSequence = cursor.fetchSequence + 1;

  if (log.length === 0) {
    return {
      unseen: [],
      cursor: { ...cursor, recentIds: [...cursor.recentIds], fetchSequence },
      discontinuity: false,
      baseline: false,
    };
  }

  const newest = log[0];
  const advanced = (processedNewestFirst: string[]): MonitorCursor => ({
    lastProcessedId: newest.id,
    lastProcessedAt: newest.timestamp,
    fetchSequence,
    recentIds: mergeRecentIds([newest.id, ...processedNewestFirst], cursor.recentIds),
  });

  if (cursor.lastProcessedId === null && cursor.fetchSequence === 0) {
    return {
      unseen: [],
      cursor: advanced(log.map((r) => r.id)),
      discontinuity: false,
      baseline: true,
    };
  }

  const collected: BattleRecord[] = [];
  let found = false;
  for (const record of log) {
    if (record.id === cursor.lastProcessedId) {
      found = true;
      break;
    }
    collected.push(record);
  }

  const alreadyProcessed = new Set(cursor.recentIds);
  const fresh = collected.filter((r) => !alreadyProcessed.has(r.id));

  return {
    unseen: fresh.slice().reverse(),
    cursor: advanced(fresh.map((r) => r.id)),
    discontinuity: cursor.lastProcessedId !== null && !found,
    baseline: false,
  };
}
