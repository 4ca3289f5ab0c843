/**
 * Monitor Scheduler
 *
 * Owns one polling loop per monitored subject and drives the pipeline
 * fetch → normalize → diff → aggregate → persist → notify.
 *
 * Per-subject state machine:
 *   idle ──tick/pollNow──▶ polling ──ok──▶ idle
 *                            │
 *                            └─fetch/store error─▶ backoff ──delay──▶ idle
 *   paused: excluded from scheduling; cursor and aggregate stay frozen.
 *
 * Guarantees:
 * - Never two cycles for the same subject at once (pollNow joins a running cycle)
 * - Every outbound request goes through the shared RateLimiter
 * - Events for a cycle are emitted only after its commit succeeded
 * - Pausing during a cycle lets it commit, then stops further scheduling
 *
 * Usage:
 *   const scheduler = new MonitorScheduler(api, store, limiter);
 *   scheduler.on('newBattle', (event) => { ... });
 *   scheduler.on('rivalPromoted', (event) => { ... });
 *   scheduler.track(state);
 *   scheduler.start();
 */

import { EventEmitter } from 'events';
import { LIMITS } from '../types';
import type { MonitorEventMap, MonitorEventName, RawBattle, SubjectState } from '../types';
import { ApiError, errorMessage } from '../types/errors';
import type { ApiErrorKind } from '../types/errors';
import type { BattleApi } from './BattleApiClient';
import { normalizeBattleLog } from './BattleNormalizer';
import { diffBattleLog } from './BattleDiff';
import { Logger } from './Logger';
import { RateLimiter, RateLimiterStoppedError } from './RateLimiter';
import { isRival, rivalPromotions, toRivalEntry } from './RivalTracker';
import type { ProfileUpdate, StateStore } from './StateStore';
import { applyBattle, totalsOf } from './StatsAggregator';

export interface SchedulerConfig {
  pollIntervalMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  maxConsecutiveFailures: number;    // fetch failures before subjectFailing
  storeFailureAlertThreshold: number; // failed commits before storeFailing
  profileRefreshEvery: number;       // cycles between profile fetches, 0 = never
  rivalMinEncounters: number;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  pollIntervalMs: 60000,
  backoffBaseMs: 5000,
  backoffMaxMs: 300000,
  maxConsecutiveFailures: 5,
  storeFailureAlertThreshold: 3,
  profileRefreshEvery: 5,
  rivalMinEncounters: LIMITS.RIVAL_MIN_ENCOUNTERS,
};

export type LoopState = 'idle' | 'polling' | 'backoff' | 'paused';

export type CycleOutcome =
  | { status: 'ok'; unseen: number; skipped: number; discontinuity: boolean; baseline: boolean }
  | { status: 'fetch-error'; kind: ApiErrorKind; delayMs: number }
  | { status: 'store-error'; delayMs: number }
  | { status: 'skipped'; reason: string };

export interface LoopStatus {
  tag: string;
  state: LoopState;
  consecutiveFailures: number;
  storeFailures: number;
  nextPollAt: number | null;
}

interface SubjectLoop {
  tag: string;
  state: LoopState;
  paused: boolean;
  data: SubjectState;               // last committed state
  timer: NodeJS.Timeout | null;
  nextPollAt: number | null;
  inFlight: Promise<CycleOutcome> | null;
  consecutiveFailures: number;
  failureAlerted: boolean;
  storeFailures: number;
  cyclesSinceProfile: number;
}

export class MonitorScheduler {
  private api: BattleApi;
  private store: StateStore;
  private limiter: RateLimiter;
  private config: SchedulerConfig;
  private emitter = new EventEmitter();
  private loops = new Map<string, SubjectLoop>();
  private running = false;
  private logger = new Logger('MonitorScheduler');

  constructor(
    api: BattleApi,
    store: StateStore,
    limiter: RateLimiter,
    config: Partial<SchedulerConfig> = {},
  ) {
    this.api = api;
    this.store = store;
    this.limiter = limiter;
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };
  }

  // ============================================================================
  // EVENTS
  // ============================================================================

  on<K extends MonitorEventName>(event: K, listener: (payload: MonitorEventMap[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends MonitorEventName>(event: K, listener: (payload: MonitorEventMap[K]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  private emitEvent<K extends MonitorEventName>(event: K, payload: MonitorEventMap[K]): void {
    try {
      this.emitter.emit(event, payload);
    } catch (err) {
      // A failing listener must not undo an already committed cycle
      this.logger.error(`Listener for "${event}" threw`, err);
    }
  }

  // ============================================================================
  // LIFECYCLE
  // ============================================================================

  start(): void {
    if (this.running) return;
    this.running = true;
    const active = [...this.loops.values()].filter((l) => !l.paused);
    this.logger.info(
      `Started: ${active.length} active subject(s), poll every ${this.config.pollIntervalMs / 1000}s`,
    );
    for (const loop of active) {
      this.schedule(loop, 0);
    }
  }

  /** Stop scheduling, drop queued requests and wait for in-flight cycles. */
  async stop(): Promise<void> {
    this.running = false;
    for (const loop of this.loops.values()) {
      this.clearTimer(loop);
    }
    this.limiter.clear();
    await Promise.all([...this.loops.values()].map((l) => l.inFlight));
    this.logger.info('Stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  // ============================================================================
  // SUBJECT REGISTRATION
  // ============================================================================

  /** Register a subject loaded from or just written to the store. */
  track(state: SubjectState): void {
    const tag = state.subject.tag;
    if (this.loops.has(tag)) {
      throw new Error(`Subject #${tag} is already tracked`);
    }

    const paused = state.subject.status === 'paused';
    const loop: SubjectLoop = {
      tag,
      state: paused ? 'paused' : 'idle',
      paused,
      data: state,
      timer: null,
      nextPollAt: null,
      inFlight: null,
      consecutiveFailures: 0,
      failureAlerted: false,
      storeFailures: 0,
      cyclesSinceProfile: 0,
    };
    this.loops.set(tag, loop);

    if (this.running && !paused) {
      this.schedule(loop, 0);
    }
  }

  /**
   * Exclude a subject from scheduling. An in-flight cycle still commits.
   */
  pause(tag: string): void {
    const loop = this.requireLoop(tag);
    loop.paused = true;
    loop.data = { ...loop.data, subject: { ...loop.data.subject, status: 'paused' } };
    this.clearTimer(loop);
    if (!loop.inFlight) {
      loop.state = 'paused';
    }
  }

  resume(tag: string): void {
    const loop = this.requireLoop(tag);
    loop.paused = false;
    loop.data = { ...loop.data, subject: { ...loop.data.subject, status: 'active' } };
    loop.consecutiveFailures = 0;
    loop.failureAlerted = false;
    if (loop.inFlight) return;
    loop.state = 'idle';
    if (this.running) {
      this.schedule(loop, 0);
    }
  }

  /**
   * Forget the subject at once, then wait for any in-flight cycle. The cycle
   * still commits but is never rescheduled.
   */
  async untrack(tag: string): Promise<void> {
    const loop = this.loops.get(tag);
    if (!loop) return;
    loop.paused = true;
    loop.state = 'paused';
    this.clearTimer(loop);
    this.loops.delete(tag);
    await loop.inFlight;
  }

  /** Resolves once the subject has no cycle in flight. */
  async drain(tag: string): Promise<void> {
    await this.loops.get(tag)?.inFlight;
  }

  // ============================================================================
  // QUERIES
  // ============================================================================

  has(tag: string): boolean {
    return this.loops.has(tag);
  }

  getState(tag: string): SubjectState | null {
    return this.loops.get(tag)?.data ?? null;
  }

  getAllStates(): SubjectState[] {
    return [...this.loops.values()].map((l) => l.data);
  }

  getStatus(tag: string): LoopStatus | null {
    const loop = this.loops.get(tag);
    if (!loop) return null;
    return {
      tag,
      state: loop.state,
      consecutiveFailures: loop.consecutiveFailures,
      storeFailures: loop.storeFailures,
      nextPollAt: loop.nextPollAt,
    };
  }

  // ============================================================================
  // CYCLES
  // ============================================================================

  /**
   * Run a cycle now. Joins the running cycle if one is in flight; paused
   * subjects are not polled.
   */
  pollNow(tag: string): Promise<CycleOutcome> {
    const loop = this.requireLoop(tag);
    if (loop.inFlight) return loop.inFlight;
    if (loop.paused) {
      return Promise.resolve({ status: 'skipped', reason: 'paused' });
    }
    return this.runCycle(loop);
  }

  private runCycle(loop: SubjectLoop): Promise<CycleOutcome> {
    this.clearTimer(loop);
    loop.state = 'polling';

    const cycle = this.executeCycle(loop)
      .catch((err): CycleOutcome => {
        this.logger.error(`Unexpected cycle failure for #${loop.tag}`, err);
        return { status: 'fetch-error', kind: 'Transient', delayMs: this.backoffDelay(1) };
      })
      .then((outcome) => {
        loop.inFlight = null;
        this.afterCycle(loop, outcome);
        return outcome;
      });

    loop.inFlight = cycle;
    return cycle;
  }

  private async executeCycle(loop: SubjectLoop): Promise<CycleOutcome> {
    const tag = loop.tag;
    const before = loop.data;

    let rawLog: RawBattle[];
    try {
      rawLog = await this.limiter.execute(() => this.api.fetchBattleLog(tag), `battlelog #${tag}`);
    } catch (err) {
      return this.fetchFailure(loop, err);
    }

    const profile = await this.maybeRefreshProfile(loop);

    const { records, malformed } = normalizeBattleLog(rawLog, tag);
    for (const error of malformed) {
      this.logger.warn(`Skipping malformed battle for #${tag} (${error.field}): ${error.message}`);
    }

    const diff = diffBattleLog(before.cursor, records);
    const min = this.config.rivalMinEncounters;
    const subjectName = profile?.name ?? before.subject.name;

    // Events are queued and only emitted after the commit lands
    const pending: Array<() => void> = [];
    let aggregate = before.aggregate;
    for (const battle of diff.unseen) {
      const next = applyBattle(aggregate, battle);
      const opponent = next.opponents[battle.opponent.tag];
      const rivalry = opponent && isRival(opponent, min) ? toRivalEntry(opponent) : undefined;
      const payload = {
        subjectTag: tag,
        subjectName,
        battle,
        totals: totalsOf(next),
        ...(rivalry ? { rivalry } : {}),
      };
      pending.push(() => this.emitEvent('newBattle', payload));

      for (const promoted of rivalPromotions(aggregate, next, min)) {
        pending.push(() =>
          this.emitEvent('rivalPromoted', {
            subjectTag: tag,
            opponentTag: promoted.opponentTag,
            opponentName: promoted.opponentName,
            encounterCount: promoted.battles,
          }),
        );
      }
      aggregate = next;
    }

    try {
      this.store.commit(tag, { cursor: diff.cursor, aggregate, profile });
    } catch (err) {
      return this.storeFailure(loop, err);
    }

    // Status may have changed while the cycle was running; keep the latest
    const current = loop.data.subject;
    loop.data = {
      subject: profile ? { ...current, name: profile.name, arena: profile.arena } : current,
      cursor: diff.cursor,
      aggregate,
    };
    loop.consecutiveFailures = 0;
    loop.failureAlerted = false;
    loop.storeFailures = 0;

    if (diff.discontinuity) {
      this.logger.warn(
        `Battle log for #${tag} no longer contains the cursor; treating ${diff.unseen.length} battle(s) as unseen`,
      );
      this.emitEvent('logDiscontinuity', { subjectTag: tag, unseenCount: diff.unseen.length });
    }
    for (const emit of pending) {
      emit();
    }
    if (profile && before.subject.arena && profile.arena && profile.arena !== before.subject.arena) {
      this.emitEvent('arenaChanged', {
        subjectTag: tag,
        subjectName,
        from: before.subject.arena,
        to: profile.arena,
      });
    }

    if (diff.baseline) {
      this.logger.info(`Baseline for #${tag}: cursor set past ${records.length} existing battle(s)`);
    } else if (diff.unseen.length > 0) {
      this.logger.info(`#${tag}: ${diff.unseen.length} new battle(s)`);
    }

    this.emitEvent('cycleCompleted', {
      subjectTag: tag,
      fetched: rawLog.length,
      unseen: diff.unseen.length,
      skipped: malformed.length,
      baseline: diff.baseline,
      fetchSequence: diff.cursor.fetchSequence,
    });

    return {
      status: 'ok',
      unseen: diff.unseen.length,
      skipped: malformed.length,
      discontinuity: diff.discontinuity,
      baseline: diff.baseline,
    };
  }

  /**
   * Refresh name and arena every `profileRefreshEvery` cycles. Failures are
   * logged and never fail the cycle.
   */
  private async maybeRefreshProfile(loop: SubjectLoop): Promise<ProfileUpdate | undefined> {
    const every = this.config.profileRefreshEvery;
    if (every <= 0) return undefined;

    loop.cyclesSinceProfile++;
    if (loop.cyclesSinceProfile < every) return undefined;

    try {
      const profile = await this.limiter.execute(
        () => this.api.fetchProfile(loop.tag),
        `profile #${loop.tag}`,
      );
      loop.cyclesSinceProfile = 0;
      return { name: profile.name, arena: profile.arena ?? loop.data.subject.arena };
    } catch (err) {
      if (err instanceof ApiError && err.kind === 'RateLimited' && err.retryAfterMs) {
        this.limiter.pauseFor(err.retryAfterMs);
      }
      this.logger.warn(`Profile refresh failed for #${loop.tag}: ${errorMessage(err)}`);
      return undefined;
    }
  }

  private fetchFailure(loop: SubjectLoop, err: unknown): CycleOutcome {
    if (err instanceof RateLimiterStoppedError) {
      return { status: 'skipped', reason: 'scheduler stopped' };
    }

    const apiError =
      err instanceof ApiError ? err : new ApiError('Transient', loop.tag, errorMessage(err));
    loop.consecutiveFailures++;

    let delayMs = this.backoffDelay(loop.consecutiveFailures);
    if (apiError.kind === 'RateLimited' && apiError.retryAfterMs !== undefined) {
      delayMs = Math.min(apiError.retryAfterMs, this.config.backoffMaxMs);
      this.limiter.pauseFor(delayMs);
    }

    this.logger.warn(
      `Fetch failed for #${loop.tag} [${apiError.kind}] (${loop.consecutiveFailures} in a row), ` +
        `retrying in ${delayMs}ms: ${apiError.message}`,
    );

    if (loop.consecutiveFailures >= this.config.maxConsecutiveFailures && !loop.failureAlerted) {
      loop.failureAlerted = true;
      this.emitEvent('subjectFailing', {
        subjectTag: loop.tag,
        kind: apiError.kind,
        consecutiveFailures: loop.consecutiveFailures,
        message: apiError.message,
      });
    }

    return { status: 'fetch-error', kind: apiError.kind, delayMs };
  }

  private storeFailure(loop: SubjectLoop, err: unknown): CycleOutcome {
    loop.storeFailures++;
    this.logger.error(
      `Commit failed for #${loop.tag} (${loop.storeFailures} in a row); cycle discarded`,
      err,
    );

    if (loop.storeFailures === this.config.storeFailureAlertThreshold) {
      this.emitEvent('storeFailing', {
        subjectTag: loop.tag,
        consecutiveFailures: loop.storeFailures,
        message: errorMessage(err),
      });
    }

    return { status: 'store-error', delayMs: this.backoffDelay(loop.storeFailures) };
  }

  private afterCycle(loop: SubjectLoop, outcome: CycleOutcome): void {
    if (this.loops.get(loop.tag) !== loop) return;

    if (loop.paused) {
      loop.state = 'paused';
      return;
    }

    if (outcome.status === 'fetch-error' || outcome.status === 'store-error') {
      loop.state = 'backoff';
      if (this.running) this.schedule(loop, outcome.delayMs);
      return;
    }

    loop.state = 'idle';
    if (this.running) this.schedule(loop, this.config.pollIntervalMs);
  }

  // ============================================================================
  // TIMERS
  // ============================================================================

  backoffDelay(attempt: number): number {
    const exp = this.config.backoffBaseMs * Math.pow(2, Math.max(0, attempt - 1));
    return Math.min(exp, this.config.backoffMaxMs);
  }

  private schedule(loop: SubjectLoop, delayMs: number): void {
    this.clearTimer(loop);
    loop.nextPollAt = Date.now() + delayMs;
    loop.timer = setTimeout(() => {
      loop.timer = null;
      loop.nextPollAt = null;
      if (!this.running || loop.paused || loop.inFlight) return;
      if (loop.state === 'backoff') loop.state = 'idle';
      this.runCycle(loop).catch((err) => {
        this.logger.error(`Cycle for #${loop.tag} rejected`, err);
      });
    }, delayMs);
  }

  private clearTimer(loop: SubjectLoop): void {
    if (loop.timer) {
      clearTimeout(loop.timer);
      loop.timer = null;
    }
    loop.nextPollAt = null;
  }

  private requireLoop(tag: string): SubjectLoop {
    const loop = this.loops.get(tag);
    if (!loop) {
      throw new Error(`Subject #${tag} is not tracked`);
    }
    return loop;
  }
}
