/**
 * Plain-text rendering of monitor events and query results.
 *
 * Pure functions: the notifier, the status CLI and any other transport share
 * the same wording.
 */

import type {
  ArenaChangedEvent,
  LogDiscontinuityEvent,
  NewBattleEvent,
  OutcomeTally,
  RivalEntry,
  RivalPromotedEvent,
  StoreFailingEvent,
  Subject,
  SubjectAggregate,
  SubjectFailingEvent,
} from '../types';
import { totalsOf, winRate } from './StatsAggregator';

const RULE = '='.repeat(40);
const THIN_RULE = '-'.repeat(20);
const MAX_RIVALS_LISTED = 15;
const MAX_MODES_IN_STATS = 5;
const MAX_MODES_PER_RIVAL = 3;

/** "2024-03-01 12:00:00 UTC" */
export function formatTime(iso: string | null): string {
  if (!iso) return 'Unknown';
  return `${iso.replace('T', ' ').slice(0, 19)} UTC`;
}

/** 0.6667 → "66.7" */
export function formatPercent(rate: number): string {
  return (rate * 100).toFixed(1);
}

function formatTrophyChange(change: number | undefined): string {
  if (!change) return '';
  return change > 0 ? ` (+${change})` : ` (${change})`;
}

function formatRecord(tally: OutcomeTally): string {
  return `${tally.wins}W/${tally.losses}L/${tally.draws}D`;
}

function modesByVolume(byMode: Record<string, OutcomeTally>): Array<[string, OutcomeTally]> {
  return Object.entries(byMode).sort((a, b) => b[1].battles - a[1].battles || (a[0] < b[0] ? -1 : 1));
}

function rivalryStatus(tally: OutcomeTally): string {
  if (tally.wins > tally.losses) return 'Dominating';
  if (tally.losses > tally.wins) return 'Struggling';
  return 'Even';
}

// ============================================================================
// EVENTS
// ============================================================================

export function formatNewBattle(event: NewBattleEvent): string {
  const { battle, totals } = event;
  const result = battle.outcome === 'win' ? 'VICTORY' : battle.outcome === 'loss' ? 'DEFEAT' : 'DRAW';
  const score =
    battle.subjectCrowns !== undefined && battle.opponentCrowns !== undefined
      ? `${battle.subjectCrowns} - ${battle.opponentCrowns}`
      : 'n/a';

  const lines = [
    `${event.subjectName} (#${event.subjectTag})`,
    `Time: ${formatTime(battle.timestamp)}`,
    '',
    `${result}${formatTrophyChange(battle.trophyChange)}`,
    `Mode: ${battle.mode} (${battle.rawMode})`,
    `Score: ${score}`,
    '',
    `Opponent: ${battle.opponent.name}`,
    `Tag: #${battle.opponent.tag}`,
    '',
    'Your Deck:',
    battle.deck.join(', '),
  ];
  if (battle.opponent.deck) {
    lines.push('', 'Enemy Deck:', battle.opponent.deck.join(', '));
  }
  lines.push(
    '',
    `Session: ${totals.wins}W / ${totals.losses}L / ${totals.draws}D (${formatPercent(winRate(totals))}% WR)`,
  );
  if (event.rivalry) {
    lines.push('', formatRivalMatch(event.rivalry));
  }
  return lines.join('\n');
}

/** Appended to a battle against a repeat opponent. */
export function formatRivalMatch(rivalry: RivalEntry): string {
  return [
    `RIVAL MATCH! ${rivalry.battles} total matches vs ${rivalry.opponentName}`,
    `Record: ${rivalry.wins}W/${rivalry.losses}L (${formatPercent(rivalry.winRate)}% WR)`,
  ].join('\n');
}

export function formatRivalPromoted(event: RivalPromotedEvent): string {
  return `NEW RIVAL for #${event.subjectTag}: ${event.opponentName} (#${event.opponentTag}) after ${event.encounterCount} matches`;
}

export function formatDiscontinuity(event: LogDiscontinuityEvent): string {
  return (
    `Battle log gap for #${event.subjectTag}: the last seen battle is no longer in the log. ` +
    `${event.unseenCount} battle(s) counted; earlier ones may have been missed.`
  );
}

export function formatArenaChanged(event: ArenaChangedEvent): string {
  return `${event.subjectName} (#${event.subjectTag}) moved from ${event.from} to ${event.to}`;
}

export function formatSubjectFailing(event: SubjectFailingEvent): string {
  return (
    `Polling #${event.subjectTag} has failed ${event.consecutiveFailures} times in a row ` +
    `[${event.kind}]: ${event.message}`
  );
}

export function formatStoreFailing(event: StoreFailingEvent): string {
  return (
    `STATE STORE FAILING: ${event.consecutiveFailures} consecutive commits lost for ` +
    `#${event.subjectTag}: ${event.message}`
  );
}

// ============================================================================
// QUERIES
// ============================================================================

export function formatStats(subject: Subject, aggregate: SubjectAggregate): string {
  const header = [RULE, `${subject.name} (#${subject.tag}) [${subject.status}]`, RULE];
  if (aggregate.totalBattles === 0) {
    return [...header, 'No battles recorded yet.'].join('\n');
  }

  const totals = totalsOf(aggregate);
  const lines = [
    ...header,
    `Total: ${totals.wins}W / ${totals.losses}L / ${totals.draws}D (${totals.battles} games)`,
    `Session Win Rate: ${formatPercent(winRate(totals))}%`,
    `Last Battle: ${formatTime(aggregate.lastBattleAt)}`,
  ];
  if (subject.arena) {
    lines.push(`Arena: ${subject.arena}`);
  }

  const modes = modesByVolume(aggregate.byMode).slice(0, MAX_MODES_IN_STATS);
  if (modes.length > 0) {
    lines.push('', 'By Game Mode:');
    for (const [mode, tally] of modes) {
      lines.push(`  ${mode}: ${tally.wins}W/${tally.losses}L (${formatPercent(winRate(tally))}%)`);
    }
  }
  return lines.join('\n');
}

export function formatRivalsList(rivals: RivalEntry[], playerName: string): string {
  if (rivals.length === 0) {
    return `No repeat opponents found for ${playerName}.\nPlay more games to track rivalries!`;
  }

  const lines = [RULE, `RIVALS - Repeat Opponents for ${playerName}`, RULE, ''];
  rivals.slice(0, MAX_RIVALS_LISTED).forEach((rival, i) => {
    lines.push(`${i + 1}. ${rival.opponentName} (#${rival.opponentTag})`);
    lines.push(`   Matches: ${rival.battles} | Record: ${formatRecord(rival)}`);
    lines.push(`   Win Rate: ${formatPercent(rival.winRate)}% | Status: ${rivalryStatus(rival)}`);

    const modes = modesByVolume(rival.byMode);
    if (modes.length > 1) {
      const summary = modes
        .slice(0, MAX_MODES_PER_RIVAL)
        .map(([mode, tally]) => `${mode}: ${tally.battles}`)
        .join(', ');
      lines.push(`   Modes: ${summary}`);
    }
    lines.push('');
  });

  if (rivals.length > MAX_RIVALS_LISTED) {
    lines.push(`... and ${rivals.length - MAX_RIVALS_LISTED} more rivals`);
  }
  return lines.join('\n');
}

export function formatHeadToHead(entry: RivalEntry): string {
  const lines = [
    RULE,
    `HEAD-TO-HEAD: vs ${entry.opponentName}`,
    RULE,
    '',
    `Opponent Tag: #${entry.opponentTag}`,
    `Total Matches: ${entry.battles}`,
    '',
    `Record: ${entry.wins}W / ${entry.losses}L / ${entry.draws}D`,
    `Win Rate: ${formatPercent(entry.winRate)}%`,
  ];

  const modes = modesByVolume(entry.byMode);
  if (modes.length > 0) {
    lines.push('', 'BY GAME MODE:', THIN_RULE);
    for (const [mode, tally] of modes) {
      lines.push(`${mode}:`);
      lines.push(`  Record: ${tally.wins}W / ${tally.losses}L / ${tally.draws}D`);
      lines.push(`  Games: ${tally.battles} | Win Rate: ${formatPercent(winRate(tally))}%`);
    }
  }

  if (entry.recent.length > 0) {
    lines.push('', RULE, 'RECENT MATCH HISTORY:', THIN_RULE);
    // Most recent first
    for (const match of [...entry.recent].reverse()) {
      const icon = match.outcome === 'win' ? 'W' : match.outcome === 'loss' ? 'L' : 'D';
      const score = `${match.subjectCrowns ?? 0}-${match.opponentCrowns ?? 0}`;
      lines.push(`[${icon}] ${score} | ${match.mode} | ${formatTime(match.timestamp)}`);
    }
  }
  return lines.join('\n');
}
