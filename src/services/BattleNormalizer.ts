/**
 * Battle Record Normalizer
 *
 * Converts raw battle-log entries into canonical, hashable BattleRecords.
 *
 * The API exposes no battle id, so one is derived from
 * (subject tag, opponent tag, timestamp, mode). The same match fetched twice
 * always hashes to the same id; that is what the diff engine relies on.
 */

import { createHash } from 'crypto';
import { LIMITS, UNKNOWN_OPPONENT } from '../types';
import type { BattleOutcome, BattleRecord, RawBattle, RawParticipant } from '../types';
import { MalformedRecordError } from '../types/errors';

export type NormalizeResult =
  | { ok: true; record: BattleRecord }
  | { ok: false; error: MalformedRecordError };

const COMPACT_TIME = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(?:\.(\d{1,3}))?Z$/;
const TAG_PATTERN = /^[0-9A-Z]{3,15}$/;

/**
 * Strip '#', trim and upper-case a player tag. Comparison between tags is
 * always done on the normalized form.
 */
export function normalizeTag(tag: string): string {
  return tag.replace(/#/g, '').trim().toUpperCase();
}

export function isValidTag(tag: string): boolean {
  return TAG_PATTERN.test(normalizeTag(tag));
}

/**
 * Parse the API's compact battle time ("20260118T201503.000Z") or an ISO
 * string. Returns an ISO-8601 string, or null when unparsable.
 */
export function parseBattleTime(value: string | undefined): string | null {
  if (!value) return null;

  const compact = COMPACT_TIME.exec(value.trim());
  if (compact) {
    const [, y, mo, d, h, mi, s, ms] = compact;
    const millis = ms ? parseInt(ms.padEnd(3, '0'), 10) : 0;
    const time = Date.UTC(
      parseInt(y, 10),
      parseInt(mo, 10) - 1,
      parseInt(d, 10),
      parseInt(h, 10),
      parseInt(mi, 10),
      parseInt(s, 10),
      millis,
    );
    return isNaN(time) ? null : new Date(time).toISOString();
  }

  if (!value.includes('-')) return null;
  const time = Date.parse(value);
  return isNaN(time) ? null : new Date(time).toISOString();
}

/**
 * Bucket a battle into a game mode category. Rules are checked in order;
 * an unmatched battle keeps the API's own mode name, then falls back to 1v1.
 */
export function categorizeGameMode(type: string, gameModeName: string): string {
  const battleType = type.toLowerCase();
  const mode = gameModeName.toLowerCase();

  if (mode.includes('2v2') || battleType.includes('2v2')) return '2v2';
  if (battleType.includes('friendly') || mode.includes('friendly')) return 'Friendly';
  if (battleType.includes('challenge') || mode.includes('challenge')) return 'Challenge';
  if (battleType.includes('tournament') || mode.includes('tournament')) return 'Tournament';
  if (battleType.includes('clanwar') || mode.includes('war') || mode.includes('clanwar')) {
    return 'Clan War';
  }
  if (mode.includes('party')) return 'Party Mode';
  if (battleType.includes('pathoflegend') || battleType.includes('ladder')) return 'Ladder';

  if (gameModeName) return gameModeName;
  return '1v1';
}

export function deriveBattleId(
  subjectTag: string,
  opponentTag: string,
  timestamp: string,
  mode: string,
): string {
  return createHash('sha256')
    .update([subjectTag, opponentTag, timestamp, mode].join('|'))
    .digest('hex')
    .slice(0, 24);
}

function deckOf(participant: RawParticipant): string[] {
  return (participant.cards || [])
    .slice(0, LIMITS.DECK_SIZE)
    .map((c) => c.name || '?');
}

function crownsOf(participant: RawParticipant): number | undefined {
  return typeof participant.crowns === 'number' ? participant.crowns : undefined;
}

function locateParticipants(
  raw: RawBattle,
  subjectTag: string,
): { subject: RawParticipant; enemy: RawParticipant } | null {
  const team = raw.team || [];
  const opponents = raw.opponent || [];
  const matches = (p: RawParticipant) => normalizeTag(p.tag || '') === subjectTag;

  const inTeam = team.find(matches);
  if (inTeam) {
    return opponents[0] ? { subject: inTeam, enemy: opponents[0] } : null;
  }

  const inOpponents = opponents.find(matches);
  if (inOpponents) {
    return team[0] ? { subject: inOpponents, enemy: team[0] } : null;
  }

  return null;
}

function resolveOutcome(
  subjectCrowns: number | undefined,
  enemyCrowns: number | undefined,
  trophyChange: number | undefined,
): BattleOutcome | null {
  if (subjectCrowns !== undefined && enemyCrowns !== undefined) {
    if (subjectCrowns > enemyCrowns) return 'win';
    if (subjectCrowns < enemyCrowns) return 'loss';
    return 'draw';
  }
  if (trophyChange !== undefined && trophyChange !== 0) {
    return trophyChange > 0 ? 'win' : 'loss';
  }
  return null;
}

/**
 * Normalize one raw battle-log entry for the given subject. Pure.
 *
 * Optional fields (decks, crowns, trophy change, arena) are left absent when
 * missing. Only an unparsable timestamp, mode or outcome rejects the entry.
 */
export function normalizeBattle(raw: RawBattle, subjectTag: string): NormalizeResult {
  const tag = normalizeTag(subjectTag);
  const fail = (field: string, message: string): NormalizeResult => ({
    ok: false,
    error: new MalformedRecordError(tag, field, message),
  });

  const timestamp = parseBattleTime(raw.battleTime);
  if (!timestamp) {
    return fail('battleTime', `Unparsable battle time: ${JSON.stringify(raw.battleTime ?? null)}`);
  }

  const type = raw.type || '';
  const rawMode = raw.gameMode?.name || '';
  if (!type && !rawMode) {
    return fail('gameMode', 'Battle has neither a type nor a game mode');
  }
  const mode = categorizeGameMode(type, rawMode);

  const participants = locateParticipants(raw, tag);
  if (!participants) {
    return fail('team', `Subject #${tag} or its opponent is missing from the battle`);
  }
  const { subject, enemy } = participants;

  const subjectCrowns = crownsOf(subject);
  const opponentCrowns = crownsOf(enemy);
  const trophyChange = typeof subject.trophyChange === 'number' ? subject.trophyChange : undefined;
  const outcome = resolveOutcome(subjectCrowns, opponentCrowns, trophyChange);
  if (!outcome) {
    return fail('outcome', 'Outcome cannot be determined: no crown counts or trophy change');
  }

  const opponentTag = enemy.tag ? normalizeTag(enemy.tag) : UNKNOWN_OPPONENT;
  const enemyDeck = deckOf(enemy);

  const record: BattleRecord = {
    id: deriveBattleId(tag, opponentTag, timestamp, mode),
    subjectTag: tag,
    timestamp,
    mode,
    rawMode: rawMode || type,
    deck: deckOf(subject),
    opponent: {
      tag: opponentTag,
      name: enemy.name || 'Unknown',
      ...(enemyDeck.length > 0 ? { deck: enemyDeck } : {}),
    },
    outcome,
  };

  if (subjectCrowns !== undefined) record.subjectCrowns = subjectCrowns;
  if (opponentCrowns !== undefined) record.opponentCrowns = opponentCrowns;
  if (subjectCrowns !== undefined && opponentCrowns !== undefined) {
    record.crownDiff = subjectCrowns - opponentCrowns;
  }
  if (trophyChange !== undefined) record.trophyChange = trophyChange;
  if (raw.arena?.name) record.arena = raw.arena.name;

  return { ok: true, record };
}

/**
 * Normalize a whole newest-first log, keeping order. Malformed entries are
 * returned separately so the caller can log and skip them.
 */
export function normalizeBattleLog(
  rawLog: RawBattle[],
  subjectTag: string,
): { records: BattleRecord[]; malformed: MalformedRecordError[] } {
  const records: BattleRecord[] = [];
  const malformed: MalformedRecordError[] = [];
  for (const raw of rawLog) {
    const result = normalizeBattle(raw, subjectTag);
    if (result.ok) {
      records.push(result.record);
    } else {
      malformed.push(result.error);
    }
  }
  return { records, malformed };
}
