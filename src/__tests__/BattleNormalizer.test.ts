import { describe, it } from "node:test";
import * as assert from "node:assert/strict";

import {
  categorizeGameMode,
  deriveBattleId,
  isValidTag,
  normalizeBattle,
  normalizeBattleLog,
  normalizeTag,
  parseBattleTime,
} from "../services/BattleNormalizer";
import type { RawBattle } from "../types";
import { SUBJECT, rawBattle, toRecord } from "./fixtures";

describe("tags", () => {
  it("strips '#', whitespace and case", () => {
    assert.equal(normalizeTag(" #2pp "), "2PP");
    assert.equal(normalizeTag("2PP"), "2PP");
  });

  it("validates normalized tags", () => {
    assert.equal(isValidTag("#2pp"), true);
    assert.equal(isValidTag("#AB"), false);
    assert.equal(isValidTag("P-1Q"), false);
  });
});

describe("parseBattleTime", () => {
  it("parses the compact API format", () => {
    assert.equal(parseBattleTime("20260301T120503.000Z"), "2026-03-01T12:05:03.000Z");
    assert.equal(parseBattleTime("20260301T120503Z"), "2026-03-01T12:05:03.000Z");
  });

  it("accepts ISO strings", () => {
    assert.equal(parseBattleTime("2026-03-01T12:05:03Z"), "2026-03-01T12:05:03.000Z");
  });

  it("rejects garbage", () => {
    assert.equal(parseBattleTime(undefined), null);
    assert.equal(parseBattleTime("yesterday"), null);
    assert.equal(parseBattleTime("12345"), null);
  });
});

describe("categorizeGameMode", () => {
  it("applies the ordered rules", () => {
    assert.equal(categorizeGameMode("PvP", "TeamVsTeam_2v2"), "2v2");
    assert.equal(categorizeGameMode("friendly", "Friendly"), "Friendly");
    assert.equal(categorizeGameMode("challenge", "Classic Challenge"), "Challenge");
    assert.equal(categorizeGameMode("tournament", "Tournament_Draft"), "Tournament");
    assert.equal(categorizeGameMode("boatBattle", "ClanWar_BoatBattle"), "Clan War");
    assert.equal(categorizeGameMode("PvP", "Party_Mode"), "Party Mode");
    assert.equal(categorizeGameMode("pathOfLegend", "Ranked1v1"), "Ladder");
  });

  it("falls back to the API mode name, then 1v1", () => {
    assert.equal(categorizeGameMode("PvP", "Ladder"), "Ladder");
    assert.equal(categorizeGameMode("PvP", "Touchdown"), "Touchdown");
    assert.equal(categorizeGameMode("", ""), "1v1");
  });
});

describe("normalizeBattle", () => {
  it("builds a full record for a subject on the team side", () => {
    const raw = rawBattle({ minute: 0, opponentTag: "abc123", opponentName: "Foe", trophyChange: 30 });
    const result = normalizeBattle(raw, "#2pp");

    assert.equal(result.ok, true);
    if (!result.ok) return;
    assert.deepEqual(result.record, {
      id: deriveBattleId("2PP", "ABC123", "2026-03-01T12:00:00.000Z", "Ladder"),
      subjectTag: "2PP",
      timestamp: "2026-03-01T12:00:00.000Z",
      mode: "Ladder",
      rawMode: "Ladder",
      deck: ["Knight", "Archers"],
      opponent: { tag: "ABC123", name: "Foe", deck: ["Giant"] },
      outcome: "win",
      subjectCrowns: 3,
      opponentCrowns: 1,
      crownDiff: 2,
      trophyChange: 30,
      arena: "Arena 7",
    });
  });

  it("finds the subject on the opponent side", () => {
    const raw: RawBattle = {
      type: "PvP",
      battleTime: "20260301T120000.000Z",
      gameMode: { name: "Ladder" },
      team: [{ tag: "#OTHER", name: "Other", crowns: 2 }],
      opponent: [{ tag: "#2PP", name: "Subject", crowns: 1 }],
    };
    const record = toRecord(raw);
    assert.equal(record.outcome, "loss");
    assert.equal(record.opponent.tag, "OTHER");
    assert.equal(record.subjectCrowns, 1);
    assert.equal(record.opponentCrowns, 2);
    assert.equal(record.opponent.deck, undefined);
  });

  it("derives the same id for the same match fetched twice", () => {
    const first = toRecord(rawBattle({ minute: 5 }));
    const second = toRecord(rawBattle({ minute: 5 }), "#2pp");
    const other = toRecord(rawBattle({ minute: 6 }));
    assert.equal(first.id, second.id);
    assert.notEqual(first.id, other.id);
    assert.match(first.id, /^[0-9a-f]{24}$/);
  });

  it("scores equal crowns as a draw", () => {
    const record = toRecord(rawBattle({ minute: 0, subjectCrowns: 1, opponentCrowns: 1 }));
    assert.equal(record.outcome, "draw");
    assert.equal(record.crownDiff, 0);
  });

  it("falls back to trophy change when crowns are missing", () => {
    const raw: RawBattle = {
      type: "PvP",
      battleTime: "20260301T120000.000Z",
      gameMode: { name: "Ladder" },
      team: [{ tag: "#2PP", trophyChange: -28 }],
      opponent: [{ tag: "#OPP1" }],
    };
    const record = toRecord(raw);
    assert.equal(record.outcome, "loss");
    assert.equal(record.crownDiff, undefined);
    assert.equal(record.opponent.name, "Unknown");
  });

  it("files untagged opponents under UNKNOWN", () => {
    const raw = rawBattle({ minute: 0 });
    raw.opponent = [{ name: "Ghost", crowns: 0 }];
    assert.equal(toRecord(raw).opponent.tag, "UNKNOWN");
  });

  it("rejects entries it cannot interpret", () => {
    const noTime = rawBattle({ minute: 0 });
    noTime.battleTime = "not a time";
    const noMode: RawBattle = { ...rawBattle({ minute: 0 }), type: "", gameMode: {} };
    const noSubject = rawBattle({ minute: 0, subjectTag: "SOMEONE" });
    const noOutcome: RawBattle = {
      ...rawBattle({ minute: 0 }),
      team: [{ tag: "#2PP" }],
      opponent: [{ tag: "#OPP1" }],
    };

    const fields = [noTime, noMode, noSubject, noOutcome].map((raw) => {
      const result = normalizeBattle(raw, SUBJECT);
      return result.ok ? "ok" : result.error.field;
    });
    assert.deepEqual(fields, ["battleTime", "gameMode", "team", "outcome"]);
  });
});

describe("normalizeBattleLog", () => {
  it("keeps order and separates malformed entries", () => {
    const broken = rawBattle({ minute: 1 });
    broken.battleTime = undefined;
    const { records, malformed } = normalizeBattleLog(
      [rawBattle({ minute: 2 }), broken, rawBattle({ minute: 0 })],
      SUBJECT,
    );

    assert.deepEqual(
      records.map((r) => r.timestamp),
      ["2026-03-01T12:02:00.000Z", "2026-03-01T12:00:00.000Z"],
    );
    assert.equal(malformed.length, 1);
    assert.equal(malformed[0].tag, "2PP");
    assert.equal(malformed[0].field, "battleTime");
  });
});
