/**
 * Rival views over a subject's opponent map.
 *
 * There is no separate rival table: an opponent is a rival whenever its
 * stored encounter count reaches the threshold.
 */

import { LIMITS, UNKNOWN_OPPONENT } from '../types';
import type { OpponentStats, RivalEntry, SubjectAggregate } from '../types';
import { normalizeTag } from './BattleNormalizer';
import { winRate } from './StatsAggregator';

export function isRival(
  stats: OpponentStats,
  minEncounters: number = LIMITS.RIVAL_MIN_ENCOUNTERS,
): boolean {
  return stats.tag !== UNKNOWN_OPPONENT && stats.battles >= minEncounters;
}

export function toRivalEntry(stats: OpponentStats): RivalEntry {
  return {
    opponentTag: stats.tag,
    opponentName: stats.name,
    battles: stats.battles,
    wins: stats.wins,
    losses: stats.losses,
    draws: stats.draws,
    lastSeenAt: stats.lastSeenAt,
    winRate: winRate(stats),
    byMode: stats.byMode,
    recent: stats.recent,
  };
}

function compareRivals(a: RivalEntry, b: RivalEntry): number {
  if (a.battles !== b.battles) return b.battles - a.battles;
  if (a.lastSeenAt !== b.lastSeenAt) return a.lastSeenAt < b.lastSeenAt ? 1 : -1;
  return a.opponentTag < b.opponentTag ? -1 : a.opponentTag > b.opponentTag ? 1 : 0;
}

/**
 * Opponents met at least `minEncounters` times, most frequent first; ties go
 * to the most recent encounter.
 */
export function listRivals(
  aggregate: SubjectAggregate,
  minEncounters: number = LIMITS.RIVAL_MIN_ENCOUNTERS,
): RivalEntry[] {
  return Object.values(aggregate.opponents)
    .filter((stats) => isRival(stats, minEncounters))
    .map(toRivalEntry)
    .sort(compareRivals);
}

/** Head-to-head record against one opponent, rival or not. */
export function headToHead(aggregate: SubjectAggregate, opponentTag: string): RivalEntry | null {
  const stats = aggregate.opponents[normalizeTag(opponentTag)];
  return stats ? toRivalEntry(stats) : null;
}

/**
 * Opponents that are rivals in `after` but were not in `before`.
 */
export function rivalPromotions(
  before: SubjectAggregate,
  after: SubjectAggregate,
  minEncounters: number = LIMITS.RIVAL_MIN_ENCOUNTERS,
): RivalEntry[] {
  const promoted: RivalEntry[] = [];
  for (const stats of Object.values(after.opponents)) {
    if (!isRival(stats, minEncounters)) continue;
    const previous = before.opponents[stats.tag];
    if (previous && isRival(previous, minEncounters)) continue;
    promoted.push(toRivalEntry(stats));
  }
  return promoted.sort(compareRivals);
}
