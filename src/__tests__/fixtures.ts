/**
 * Shared builders and in-process stand-ins for the monitor tests.
 */

import type { BattleRecord, PlayerProfile, RawBattle } from "../types";
import { ApiError } from "../types/errors";
import type { BattleApi } from "../services/BattleApiClient";
import { normalizeBattle } from "../services/BattleNormalizer";
import { RateLimiter } from "../services/RateLimiter";

export const SUBJECT = "2PP";

/** Compact API time for 2026-03-01, `minute` minutes after noon. */
export function battleTime(minute: number): string {
  const h = 12 + Math.floor(minute / 60);
  const m = minute % 60;
  return `20260301T${String(h).padStart(2, "0")}${String(m).padStart(2, "0")}00.000Z`;
}

export interface RawBattleOptions {
  minute: number;
  opponentTag?: string;
  opponentName?: string;
  subjectTag?: string;
  subjectCrowns?: number;
  opponentCrowns?: number;
  type?: string;
  mode?: string;
  trophyChange?: number;
}

export function rawBattle(opts: RawBattleOptions): RawBattle {
  return {
    type: opts.type ?? "PvP",
    battleTime: battleTime(opts.minute),
    gameMode: { name: opts.mode ?? "Ladder" },
    arena: { name: "Arena 7" },
    team: [
      {
        tag: `#${opts.subjectTag ?? SUBJECT}`,
        name: "Subject",
        crowns: opts.subjectCrowns ?? 3,
        ...(opts.trophyChange !== undefined ? { trophyChange: opts.trophyChange } : {}),
        cards: [{ name: "Knight" }, { name: "Archers" }],
      },
    ],
    opponent: [
      {
        tag: `#${opts.opponentTag ?? "OPP1"}`,
        name: opts.opponentName ?? "Opponent",
        crowns: opts.opponentCrowns ?? 1,
        cards: [{ name: "Giant" }],
      },
    ],
  };
}

export function win(minute: number, opponentTag = "OPP1", mode = "Ladder"): RawBattle {
  return rawBattle({ minute, opponentTag, mode, subjectCrowns: 3, opponentCrowns: 1 });
}

export function loss(minute: number, opponentTag = "OPP1", mode = "Ladder"): RawBattle {
  return rawBattle({ minute, opponentTag, mode, subjectCrowns: 0, opponentCrowns: 2 });
}

export function toRecord(raw: RawBattle, subjectTag: string = SUBJECT): BattleRecord {
  const result = normalizeBattle(raw, subjectTag);
  if (!result.ok) throw result.error;
  return result.record;
}

/** Newest-first, like the API. */
export function newestFirst(...battles: RawBattle[]): RawBattle[] {
  return [...battles].sort((a, b) => (a.battleTime ?? "") < (b.battleTime ?? "") ? 1 : -1);
}

export function fastLimiter(): RateLimiter {
  return new RateLimiter({ minIntervalMs: 0, maxRequestsPerWindow: 1000, windowMs: 1000 });
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// FAKE API
// ============================================================================

const ANY_TAG = "*";

export class FakeBattleApi implements BattleApi {
  logs = new Map<string, RawBattle[]>();
  profiles = new Map<string, PlayerProfile>();
  logCalls: string[] = [];
  profileCalls: string[] = [];
  logCallTimes: number[] = [];
  /** Thrown (in order) by the next fetchBattleLog calls. */
  logFailures: Error[] = [];
  profileFailures: Error[] = [];
  /** Thrown by every fetchBattleLog call for that tag. */
  failingTags = new Map<string, Error>();
  private gates = new Map<string, { wait: Promise<void>; open: () => void }>();

  addPlayer(tag: string, name: string, arena: string | null = "Arena 7"): void {
    this.profiles.set(tag, { tag, name, arena, trophies: 4000 });
    if (!this.logs.has(tag)) this.logs.set(tag, []);
  }

  setLog(tag: string, log: RawBattle[]): void {
    this.logs.set(tag, log);
  }

  /** Hold fetchBattleLog calls (for one tag, or all) until release(). */
  hold(tag: string = ANY_TAG): void {
    let open: () => void = () => undefined;
    const wait = new Promise<void>((resolve) => {
      open = resolve;
    });
    this.gates.set(tag, { wait, open });
  }

  release(tag: string = ANY_TAG): void {
    this.gates.get(tag)?.open();
    this.gates.delete(tag);
  }

  async fetchProfile(tag: string): Promise<PlayerProfile> {
    this.profileCalls.push(tag);
    const failure = this.profileFailures.shift();
    if (failure) throw failure;
    const profile = this.profiles.get(tag);
    if (!profile) throw new ApiError("NotFound", tag, `Player #${tag} not found`, { status: 404 });
    return { ...profile };
  }

  async fetchBattleLog(tag: string): Promise<RawBattle[]> {
    this.logCalls.push(tag);
    this.logCallTimes.push(Date.now());
    const gate = this.gates.get(tag) ?? this.gates.get(ANY_TAG);
    if (gate) await gate.wait;
    const failure = this.logFailures.shift() ?? this.failingTags.get(tag);
    if (failure) throw failure;
    const log = this.logs.get(tag);
    if (!log) throw new ApiError("NotFound", tag, `Player #${tag} not found`, { status: 404 });
    return log.map((b) => ({ ...b }));
  }
}
