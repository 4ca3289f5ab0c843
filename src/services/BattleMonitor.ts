/**
 * Battle Monitor
 *
 * Command-facing facade over the scheduler and the state store. Every
 * command takes a raw tag (with or without '#', any case) and fails with a
 * MonitorError carrying a stable kind.
 *
 * Usage:
 *   const monitor = new BattleMonitor(api, store, limiter, { pollIntervalMs: 60000 });
 *   monitor.on('newBattle', (event) => notifier.send(event));
 *   monitor.start();   // subjects already in the store resume here
 *   await monitor.startMonitoring('#2PP');
 */

import { LIMITS } from '../types';
import type {
  MonitorEventMap,
  MonitorEventName,
  PlayerProfile,
  RivalEntry,
  Subject,
  SubjectAggregate,
  SubjectState,
} from '../types';
import { ApiError, MonitorError, StateStoreError, errorMessage } from '../types/errors';
import type { BattleApi } from './BattleApiClient';
import { isValidTag, normalizeTag } from './BattleNormalizer';
import { Logger } from './Logger';
import { MonitorScheduler } from './MonitorScheduler';
import type { CycleOutcome, LoopStatus, SchedulerConfig } from './MonitorScheduler';
import type { RateLimiter } from './RateLimiter';
import { headToHead, listRivals } from './RivalTracker';
import type { StateStore } from './StateStore';

export interface MonitoredSubject extends Subject {
  totalBattles: number;
  lastBattleAt: string | null;
  loop: LoopStatus | null;
}

export class BattleMonitor {
  private api: BattleApi;
  private store: StateStore;
  private limiter: RateLimiter;
  private scheduler: MonitorScheduler;
  private rivalMinEncounters: number;
  private starting = new Set<string>();
  private deleting = new Map<string, Promise<void>>();
  private loaded = false;
  private logger = new Logger('BattleMonitor');

  constructor(
    api: BattleApi,
    store: StateStore,
    limiter: RateLimiter,
    config: Partial<SchedulerConfig> = {},
  ) {
    this.api = api;
    this.store = store;
    this.limiter = limiter;
    this.scheduler = new MonitorScheduler(api, store, limiter, config);
    this.rivalMinEncounters = config.rivalMinEncounters ?? LIMITS.RIVAL_MIN_ENCOUNTERS;
    this.load();
  }

  on<K extends MonitorEventName>(event: K, listener: (payload: MonitorEventMap[K]) => void): this {
    this.scheduler.on(event, listener);
    return this;
  }

  off<K extends MonitorEventName>(event: K, listener: (payload: MonitorEventMap[K]) => void): this {
    this.scheduler.off(event, listener);
    return this;
  }

  /** Register every persisted subject with the scheduler. Runs once. */
  private load(): number {
    if (this.loaded) return 0;
    const states = this.store.loadAll();
    for (const state of states.values()) {
      this.scheduler.track(state);
    }
    this.loaded = true;

    const active = [...states.values()].filter((s) => s.subject.status === 'active').length;
    this.logger.info(`Loaded ${states.size} subject(s) (${active} active, ${states.size - active} paused)`);
    return states.size;
  }

  start(): void {
    this.scheduler.start();
  }

  async stop(): Promise<void> {
    await this.scheduler.stop();
  }

  // ============================================================================
  // COMMANDS
  // ============================================================================

  /**
   * Begin monitoring a subject, or resume a paused one. A new subject is
   * baselined on its first poll: battles already in its log only position
   * the cursor and are never counted.
   */
  async startMonitoring(rawTag: string): Promise<Subject> {
    const tag = this.parseTag(rawTag);

    // A subject being deleted is re-created from scratch once the delete lands
    const deletion = this.deleting.get(tag);
    if (deletion) {
      await deletion;
    }

    const existing = this.scheduler.getState(tag);
    if (existing) {
      if (existing.subject.status === 'active') {
        throw new MonitorError('AlreadyMonitored', tag, `#${tag} is already being monitored`);
      }
      this.persist(tag, () => this.store.setStatus(tag, 'active'));
      this.scheduler.resume(tag);
      this.logger.info(`Resumed monitoring #${tag}`);
      return this.requireState(tag).subject;
    }

    if (this.starting.has(tag)) {
      throw new MonitorError('AlreadyMonitored', tag, `#${tag} is already being added`);
    }
    this.starting.add(tag);

    try {
      const profile = await this.fetchProfile(tag);
      const subject: Subject = {
        tag,
        name: profile.name,
        status: 'active',
        createdAt: new Date().toISOString(),
        arena: profile.arena,
      };
      const state = this.persist(tag, () => this.store.createSubject(subject));
      this.scheduler.track(state);
      this.logger.info(`Started monitoring ${subject.name} (#${tag})`);
      return state.subject;
    } finally {
      this.starting.delete(tag);
    }
  }

  /** Pause polling. Cursor and statistics are kept for a later resume. */
  stopMonitoring(rawTag: string): Subject {
    const tag = this.parseTag(rawTag);
    const state = this.requireState(tag);
    if (state.subject.status === 'paused') {
      return state.subject;
    }

    this.persist(tag, () => this.store.setStatus(tag, 'paused'));
    this.scheduler.pause(tag);
    this.logger.info(`Paused monitoring #${tag}`);
    return this.requireState(tag).subject;
  }

  /** Remove a subject and all of its state. */
  async deleteSubject(rawTag: string): Promise<Subject> {
    const tag = this.parseTag(rawTag);
    const state = this.requireState(tag);

    // Let an in-flight cycle commit before the rows disappear
    const untracked = this.scheduler.untrack(tag);
    this.deleting.set(tag, untracked);
    try {
      await untracked;
      this.persist(tag, () => this.store.deleteSubject(tag));
    } finally {
      this.deleting.delete(tag);
    }
    this.logger.info(`Deleted #${tag} (${state.aggregate.totalBattles} battle(s) of history)`);
    return state.subject;
  }

  /** Poll now, or join the cycle already running for this subject. */
  async pollNow(rawTag: string): Promise<CycleOutcome> {
    const tag = this.parseTag(rawTag);
    this.requireState(tag);
    return this.scheduler.pollNow(tag);
  }

  // ============================================================================
  // QUERIES
  // ============================================================================

  listMonitored(): MonitoredSubject[] {
    return this.scheduler
      .getAllStates()
      .map((state) => ({
        ...state.subject,
        totalBattles: state.aggregate.totalBattles,
        lastBattleAt: state.aggregate.lastBattleAt,
        loop: this.scheduler.getStatus(state.subject.tag),
      }))
      .sort((a, b) => (a.createdAt < b.createdAt ? -1 : a.createdAt > b.createdAt ? 1 : 0));
  }

  getSubject(rawTag: string): Subject {
    return { ...this.requireState(this.parseTag(rawTag)).subject };
  }

  /** A copy; the live aggregate is what the next cycle builds on. */
  getStats(rawTag: string): SubjectAggregate {
    return structuredClone(this.requireState(this.parseTag(rawTag)).aggregate);
  }

  getRivals(rawTag: string): RivalEntry[];
  getRivals(rawTag: string, opponentTag: string): RivalEntry;
  getRivals(rawTag: string, opponentTag?: string): RivalEntry[] | RivalEntry {
    const tag = this.parseTag(rawTag);
    const { aggregate } = this.requireState(tag);

    if (opponentTag === undefined) {
      return structuredClone(listRivals(aggregate, this.rivalMinEncounters));
    }

    const entry = headToHead(aggregate, opponentTag);
    if (!entry) {
      throw new MonitorError(
        'OpponentNotFound',
        tag,
        `#${tag} has never played #${normalizeTag(opponentTag)}`,
      );
    }
    return structuredClone(entry);
  }

  getStatus(rawTag: string): LoopStatus | null {
    return this.scheduler.getStatus(this.parseTag(rawTag));
  }

  getLimiterStats(): ReturnType<RateLimiter['getStats']> {
    return this.limiter.getStats();
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  private parseTag(rawTag: string): string {
    const tag = normalizeTag(rawTag);
    if (!isValidTag(tag)) {
      throw new MonitorError('InvalidTag', tag, `"${rawTag}" is not a valid player tag`);
    }
    return tag;
  }

  private requireState(tag: string): SubjectState {
    const state = this.scheduler.getState(tag);
    if (!state) {
      throw new MonitorError('NotMonitored', tag, `#${tag} is not monitored`);
    }
    return state;
  }

  private async fetchProfile(tag: string): Promise<PlayerProfile> {
    try {
      return await this.limiter.execute(() => this.api.fetchProfile(tag), `profile #${tag}`);
    } catch (err) {
      if (err instanceof ApiError && err.kind === 'NotFound') {
        throw new MonitorError('ProfileNotFound', tag, `No player found for #${tag}`);
      }
      throw new MonitorError(
        'ApiUnavailable',
        tag,
        `Could not fetch profile for #${tag}: ${errorMessage(err)}`,
      );
    }
  }

  private persist<T>(tag: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StateStoreError) {
        this.logger.error(`State store failure for #${tag}`, err);
        throw new MonitorError('StateStoreFailure', tag, err.message);
      }
      throw err;
    }
  }
}
