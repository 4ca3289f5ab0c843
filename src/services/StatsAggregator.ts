/**
 * Incremental statistics for a monitored subject.
 *
 * Aggregates are only ever extended one battle at a time; nothing stores a
 * win rate. Rates are computed at read time from the integer counters.
 * Updates return new objects and leave the input untouched, so a cycle that
 * fails to commit can simply drop its result.
 */

import { LIMITS } from '../types';
import type {
  BattleOutcome,
  BattleRecord,
  OpponentStats,
  OutcomeTally,
  SubjectAggregate,
} from '../types';

export function emptyTally(): OutcomeTally {
  return { battles: 0, wins: 0, losses: 0, draws: 0 };
}

export function emptyAggregate(): SubjectAggregate {
  return {
    totalBattles: 0,
    totalWins: 0,
    totalLosses: 0,
    totalDraws: 0,
    lastBattleAt: null,
    byMode: {},
    opponents: {},
  };
}

/** wins / battles, or 0 with no battles. */
export function winRate(tally: Pick<OutcomeTally, 'battles' | 'wins'>): number {
  return tally.battles === 0 ? 0 : tally.wins / tally.battles;
}

export function totalsOf(aggregate: SubjectAggregate): OutcomeTally {
  return {
    battles: aggregate.totalBattles,
    wins: aggregate.totalWins,
    losses: aggregate.totalLosses,
    draws: aggregate.totalDraws,
  };
}

function bump(tally: OutcomeTally | undefined, outcome: BattleOutcome): OutcomeTally {
  const base = tally || emptyTally();
  return {
    battles: base.battles + 1,
    wins: base.wins + (outcome === 'win' ? 1 : 0),
    losses: base.losses + (outcome === 'loss' ? 1 : 0),
    draws: base.draws + (outcome === 'draw' ? 1 : 0),
  };
}

function laterOf(a: string | null, b: string): string {
  return a !== null && a > b ? a : b;
}

function foldOpponent(current: OpponentStats | undefined, battle: BattleRecord): OpponentStats {
  const tally = bump(current, battle.outcome);
  const recent = [
    ...(current?.recent || []),
    {
      battleId: battle.id,
      timestamp: battle.timestamp,
      outcome: battle.outcome,
      mode: battle.mode,
      ...(battle.subjectCrowns !== undefined ? { subjectCrowns: battle.subjectCrowns } : {}),
      ...(battle.opponentCrowns !== undefined ? { opponentCrowns: battle.opponentCrowns } : {}),
    },
  ].slice(-LIMITS.OPPONENT_RECENT_MATCHES);

  return {
    ...tally,
    tag: battle.opponent.tag,
    // Opponents rename; keep the latest name seen
    name: battle.opponent.name,
    lastSeenAt: laterOf(current?.lastSeenAt ?? null, battle.timestamp),
    byMode: {
      ...(current?.byMode || {}),
      [battle.mode]: bump(current?.byMode[battle.mode], battle.outcome),
    },
    recent,
  };
}

/**
 * Fold one battle into the aggregate: totals, the mode bucket and the
 * opponent bucket (with its per-mode tally and recent matches).
 */
export function applyBattle(aggregate: SubjectAggregate, battle: BattleRecord): SubjectAggregate {
  const totals = bump(totalsOf(aggregate), battle.outcome);
  const opponentTag = battle.opponent.tag;

  return {
    totalBattles: totals.battles,
    totalWins: totals.wins,
    totalLosses: totals.losses,
    totalDraws: totals.draws,
    lastBattleAt: laterOf(aggregate.lastBattleAt, battle.timestamp),
    byMode: {
      ...aggregate.byMode,
      [battle.mode]: bump(aggregate.byMode[battle.mode], battle.outcome),
    },
    opponents: {
      ...aggregate.opponents,
      [opponentTag]: foldOpponent(aggregate.opponents[opponentTag], battle),
    },
  };
}

export function applyBattles(aggregate: SubjectAggregate, battles: BattleRecord[]): SubjectAggregate {
  return battles.reduce(applyBattle, aggregate);
}

/** Explicit full rebuild from a chronological list of battles. */
export function rebuildAggregate(battles: BattleRecord[]): SubjectAggregate {
  return applyBattles(emptyAggregate(), battles);
}

function sumBattles(tallies: OutcomeTally[]): number {
  return tallies.reduce((sum, t) => sum + t.battles, 0);
}

/**
 * Returns a description of every violated counter invariant; empty when the
 * aggregate is consistent.
 */
export function checkAggregateInvariants(aggregate: SubjectAggregate): string[] {
  const problems: string[] = [];
  const total = aggregate.totalBattles;

  const outcomes = aggregate.totalWins + aggregate.totalLosses + aggregate.totalDraws;
  if (outcomes !== total) {
    problems.push(`wins+losses+draws=${outcomes} != totalBattles=${total}`);
  }

  const modeSum = sumBattles(Object.values(aggregate.byMode));
  if (modeSum !== total) {
    problems.push(`sum(byMode)=${modeSum} != totalBattles=${total}`);
  }

  const opponents = Object.values(aggregate.opponents);
  const opponentSum = sumBattles(opponents);
  if (opponentSum !== total) {
    problems.push(`sum(opponents)=${opponentSum} != totalBattles=${total}`);
  }

  for (const opp of opponents) {
    if (opp.wins + opp.losses + opp.draws !== opp.battles) {
      problems.push(`opponent ${opp.tag}: outcome counts do not add up to ${opp.battles}`);
    }
    const oppModeSum = sumBattles(Object.values(opp.byMode));
    if (oppModeSum !== opp.battles) {
      problems.push(`opponent ${opp.tag}: sum(byMode)=${oppModeSum} != ${opp.battles}`);
    }
  }

  return problems;
}
