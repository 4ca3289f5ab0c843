import { afterEach, beforeEach, describe, it } from "node:test";
import * as assert from "node:assert/strict";
import axios from "axios";
import type { AxiosInstance } from "axios";

import { ApiServer, errorBody, httpStatusFor } from "../services/ApiServer";
import { BattleMonitor } from "../services/BattleMonitor";
import { SqliteStateStore } from "../services/SqliteStateStore";
import { MonitorError, StateStoreError } from "../types/errors";
import { FakeBattleApi, SUBJECT, fastLimiter, loss, newestFirst, win } from "./fixtures";

describe("ApiServer error mapping", () => {
  it("maps each monitor error kind to an HTTP status", () => {
    assert.equal(httpStatusFor("InvalidTag"), 400);
    assert.equal(httpStatusFor("NotMonitored"), 404);
    assert.equal(httpStatusFor("ProfileNotFound"), 404);
    assert.equal(httpStatusFor("OpponentNotFound"), 404);
    assert.equal(httpStatusFor("AlreadyMonitored"), 409);
    assert.equal(httpStatusFor("ApiUnavailable"), 502);
    assert.equal(httpStatusFor("StateStoreFailure"), 503);
  });

  it("exposes monitor errors with their kind and tag", () => {
    const error = new MonitorError("AlreadyMonitored", "2PP", "Player #2PP is already monitored");
    assert.deepEqual(errorBody(error), {
      status: 409,
      body: { error: "Player #2PP is already monitored", kind: "AlreadyMonitored", tag: "2PP" },
    });
  });

  it("hides anything else behind a 500", () => {
    assert.deepEqual(errorBody(new StateStoreError("2PP", "database is locked")), {
      status: 500,
      body: { error: "Internal server error" },
    });
    assert.deepEqual(errorBody("boom"), { status: 500, body: { error: "Internal server error" } });
  });
});

describe("ApiServer routes", () => {
  let api: FakeBattleApi;
  let store: SqliteStateStore;
  let monitor: BattleMonitor;
  let server: ApiServer;
  let http: AxiosInstance;

  beforeEach(async () => {
    api = new FakeBattleApi();
    api.addPlayer(SUBJECT, "Subject");
    store = new SqliteStateStore(":memory:");
    monitor = new BattleMonitor(api, store, fastLimiter(), { profileRefreshEvery: 0 });
    server = new ApiServer(monitor, 0, "test-secret");
    const port = await server.start();
    http = axios.create({
      baseURL: `http://127.0.0.1:${port}/api`,
      headers: { "x-api-key": "test-secret" },
      validateStatus: () => true,
      proxy: false,
    });
  });

  afterEach(async () => {
    await server.stop();
    await monitor.stop();
    store.close();
  });

  it("requires the API key", async () => {
    const res = await http.get("/monitors", { headers: { "x-api-key": "wrong" } });
    assert.equal(res.status, 401);
    assert.deepEqual(res.data, { error: "Unauthorized" });
  });

  it("adds a subject and refuses to add it twice", async () => {
    const created = await http.post("/monitors", { tag: "#2pp" });
    assert.equal(created.status, 201);
    assert.equal(created.data.subject.tag, "2PP");
    assert.equal(created.data.subject.status, "active");

    const duplicate = await http.post("/monitors", { tag: "2PP" });
    assert.equal(duplicate.status, 409);
    assert.equal(duplicate.data.kind, "AlreadyMonitored");

    const missing = await http.post("/monitors", {});
    assert.equal(missing.status, 400);
  });

  it("polls and answers rival queries", async () => {
    await http.post("/monitors", { tag: SUBJECT });
    await http.post(`/monitors/${SUBJECT}/poll`);
    api.setLog(SUBJECT, newestFirst(win(0, "RIV"), loss(1, "RIV")));

    const polled = await http.post(`/monitors/${SUBJECT}/poll`);
    assert.equal(polled.status, 200);
    assert.equal(polled.data.outcome.unseen, 2);

    const rivals = await http.get(`/monitors/${SUBJECT}/rivals`);
    assert.deepEqual(
      rivals.data.rivals.map((r: { opponentTag: string; battles: number }) => [r.opponentTag, r.battles]),
      [["RIV", 2]],
    );

    const versus = await http.get(`/monitors/${SUBJECT}/rivals`, { params: { opponent: "#riv" } });
    assert.equal(versus.status, 200);
    assert.equal(versus.data.rival.wins, 1);
    assert.equal(versus.data.rival.losses, 1);

    const stranger = await http.get(`/monitors/${SUBJECT}/rivals`, { params: { opponent: "NOBODY" } });
    assert.equal(stranger.status, 404);
    assert.equal(stranger.data.kind, "OpponentNotFound");
  });

  it("pauses on delete and removes everything with purge", async () => {
    await http.post("/monitors", { tag: SUBJECT });

    const paused = await http.delete(`/monitors/${SUBJECT}`);
    assert.equal(paused.status, 200);
    assert.equal(paused.data.subject.status, "paused");
    assert.equal(store.get(SUBJECT)?.subject.status, "paused");

    const purged = await http.delete(`/monitors/${SUBJECT}`, { params: { purge: "true" } });
    assert.deepEqual(purged.data, { success: true, deleted: "2PP" });
    assert.equal(store.get(SUBJECT), null);

    const stats = await http.get(`/monitors/${SUBJECT}/stats`);
    assert.equal(stats.status, 404);
    assert.equal(stats.data.kind, "NotMonitored");
  });
});
