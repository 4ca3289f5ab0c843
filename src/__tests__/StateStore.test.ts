/**
 * Both state store backends run the same contract tests, plus a crash
 * simulation each for commit atomicity.
 */

import { describe, it, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";

import { diffBattleLog, emptyCursor } from "../services/BattleDiff";
import { JsonFileStateStore } from "../services/JsonFileStateStore";
import { SqliteStateStore } from "../services/SqliteStateStore";
import type { CommitPayload, ProfileUpdate, StateStore } from "../services/StateStore";
import { emptyAggregate, rebuildAggregate } from "../services/StatsAggregator";
import type { Subject } from "../types";
import { StateStoreError } from "../types/errors";
import { toRecord, win } from "./fixtures";

function subject(tag: string = "2PP"): Subject {
  return { tag, name: "Subject", status: "active", createdAt: "2026-03-01T00:00:00.000Z", arena: "Arena 7" };
}

function cyclePayload(): CommitPayload {
  const records = [toRecord(win(1)), toRecord(win(0))];
  const { cursor } = diffBattleLog(emptyCursor(), records);
  return { cursor, aggregate: rebuildAggregate(records.slice().reverse()) };
}

// ============================================================================
// CONTRACT
// ============================================================================

const backends: Array<{ name: string; open: (dir: string) => StateStore }> = [
  { name: "SqliteStateStore", open: (dir) => new SqliteStateStore(path.join(dir, "monitor.db")) },
  { name: "JsonFileStateStore", open: (dir) => new JsonFileStateStore(path.join(dir, "subjects")) },
];

for (const backend of backends) {
  describe(`${backend.name} contract`, () => {
    let dir: string;
    let store: StateStore;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "battle-store-"));
      store = backend.open(dir);
    });

    afterEach(() => {
      store.close();
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("creates a subject with an empty cursor and aggregate", () => {
      const state = store.createSubject(subject());
      assert.deepEqual(state.cursor, emptyCursor());
      assert.deepEqual(state.aggregate, emptyAggregate());
      assert.deepEqual(store.get("2PP"), state);
    });

    it("refuses to create a subject twice", () => {
      store.createSubject(subject());
      assert.throws(() => store.createSubject(subject()), StateStoreError);
    });

    it("survives a reopen", () => {
      store.createSubject(subject());
      const payload = cyclePayload();
      store.commit("2PP", { ...payload, profile: { name: "Renamed", arena: "Arena 8" } });
      store.close();

      store = backend.open(dir);
      const loaded = store.loadAll();
      assert.deepEqual([...loaded.keys()], ["2PP"]);
      const state = loaded.get("2PP");
      assert.ok(state);
      assert.deepEqual(state.cursor, payload.cursor);
      assert.deepEqual(state.aggregate, payload.aggregate);
      assert.equal(state.subject.name, "Renamed");
      assert.equal(state.subject.arena, "Arena 8");
      assert.equal(state.subject.createdAt, "2026-03-01T00:00:00.000Z");
    });

    it("stores a large aggregate intact", () => {
      store.createSubject(subject());
      const records = Array.from({ length: 300 }, (_, i) => toRecord(win(i, `OPP${i}`)));
      const { cursor } = diffBattleLog(emptyCursor(), records.slice().reverse());
      const aggregate = rebuildAggregate(records);
      store.commit("2PP", { cursor, aggregate });
      store.close();

      store = backend.open(dir);
      const state = store.get("2PP");
      assert.ok(state);
      assert.equal(Object.keys(state.aggregate.opponents).length, 300);
      assert.deepEqual(state.aggregate, aggregate);
      assert.deepEqual(state.cursor, cursor);
    });

    it("never changes status on commit", () => {
      store.createSubject(subject());
      store.setStatus("2PP", "paused");
      store.commit("2PP", cyclePayload());
      assert.equal(store.get("2PP")?.subject.status, "paused");
    });

    it("does not resurrect a deleted subject", () => {
      store.createSubject(subject());
      assert.equal(store.deleteSubject("2PP"), true);
      assert.throws(() => store.commit("2PP", cyclePayload()), StateStoreError);
      assert.equal(store.get("2PP"), null);
      assert.equal(store.deleteSubject("2PP"), false);
    });

    it("rejects status changes for unknown subjects", () => {
      assert.throws(() => store.setStatus("NOPE", "paused"), StateStoreError);
    });
  });
}

// ============================================================================
// ATOMICITY
// ============================================================================

class CrashingSqliteStore extends SqliteStateStore {
  protected writeProfile(_tag: string, _profile: ProfileUpdate): void {
    throw new Error("simulated crash after snapshot write");
  }
}

class CrashingJsonStore extends JsonFileStateStore {
  crash = false;
  protected replaceFile(tempFile: string, file: string): void {
    if (this.crash) throw new Error("simulated crash before rename");
    super.replaceFile(tempFile, file);
  }
}

describe("commit atomicity", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "battle-crash-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("SQLite rolls back the snapshot when a later write of the cycle fails", () => {
    const dbPath = path.join(dir, "monitor.db");
    const store = new CrashingSqliteStore(dbPath);
    store.createSubject(subject());

    assert.throws(
      () => store.commit("2PP", { ...cyclePayload(), profile: { name: "X", arena: null } }),
      StateStoreError,
    );
    store.close();

    const reopened = new SqliteStateStore(dbPath);
    const state = reopened.get("2PP");
    reopened.close();
    assert.ok(state);
    assert.deepEqual(state.cursor, emptyCursor());
    assert.deepEqual(state.aggregate, emptyAggregate());
    assert.equal(state.subject.name, "Subject");
  });

  it("JSON keeps the previous snapshot when the rename never happens", () => {
    const subjectsDir = path.join(dir, "subjects");
    const store = new CrashingJsonStore(subjectsDir);
    store.createSubject(subject());
    store.crash = true;

    assert.throws(() => store.commit("2PP", cyclePayload()), StateStoreError);
    assert.deepEqual(fs.readdirSync(subjectsDir), ["2PP.json"]);

    const state = new JsonFileStateStore(subjectsDir).get("2PP");
    assert.ok(state);
    assert.deepEqual(state.cursor, emptyCursor());
    assert.deepEqual(state.aggregate, emptyAggregate());
  });

  it("JSON ignores and removes a temp file left by a crash", () => {
    const subjectsDir = path.join(dir, "subjects");
    const store = new JsonFileStateStore(subjectsDir);
    store.createSubject(subject());
    fs.writeFileSync(path.join(subjectsDir, "2PP.json.4242.tmp"), "{\"half\": ");

    const loaded = store.loadAll();
    assert.deepEqual([...loaded.keys()], ["2PP"]);
    assert.deepEqual(fs.readdirSync(subjectsDir), ["2PP.json"]);
  });

  it("JSON reports a corrupt snapshot instead of loading it", () => {
    const subjectsDir = path.join(dir, "subjects");
    const store = new JsonFileStateStore(subjectsDir);
    fs.writeFileSync(path.join(subjectsDir, "2PP.json"), "{\"version\": 1}");
    assert.throws(() => store.loadAll(), StateStoreError);
  });
});
