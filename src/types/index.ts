export type BattleOutcome = 'win' | 'loss' | 'draw';

export type SubjectStatus = 'active' | 'paused';

export interface Subject {
  tag: string;            // normalized: no '#', upper-case
  name: string;
  status: SubjectStatus;
  createdAt: string;      // ISO-8601
  arena: string | null;
}

export interface OpponentRef {
  tag: string;
  name: string;
  deck?: string[];
}

export interface BattleRecord {
  id: string;
  subjectTag: string;
  timestamp: string;      // ISO-8601 UTC
  mode: string;           // categorized mode, e.g. "Ladder", "2v2"
  rawMode: string;        // game mode name as reported by the API
  deck: string[];
  opponent: OpponentRef;
  outcome: BattleOutcome;
  crownDiff?: number;
  subjectCrowns?: number;
  opponentCrowns?: number;
  trophyChange?: number;
  arena?: string;
}

export interface OutcomeTally {
  battles: number;
  wins: number;
  losses: number;
  draws: number;
}

export interface OpponentMatch {
  battleId: string;
  timestamp: string;
  outcome: BattleOutcome;
  mode: string;
  subjectCrowns?: number;
  opponentCrowns?: number;
}

export interface OpponentStats extends OutcomeTally {
  tag: string;
  name: string;
  lastSeenAt: string;
  byMode: Record<string, OutcomeTally>;
  recent: OpponentMatch[]; // oldest first, bounded
}

export interface SubjectAggregate {
  totalBattles: number;
  totalWins: number;
  totalLosses: number;
  totalDraws: number;
  lastBattleAt: string | null;
  byMode: Record<string, OutcomeTally>;
  opponents: Record<string, OpponentStats>;
}

export interface MonitorCursor {
  lastProcessedId: string | null;
  lastProcessedAt: string | null;
  fetchSequence: number;
  recentIds: string[]; // newest first, bounded
}

export interface RivalEntry extends OutcomeTally {
  opponentTag: string;
  opponentName: string;
  lastSeenAt: string;
  winRate: number;
  byMode: Record<string, OutcomeTally>;
  recent: OpponentMatch[];
}

export interface SubjectState {
  subject: Subject;
  cursor: MonitorCursor;
  aggregate: SubjectAggregate;
}

// ============ External API shapes ============

export interface RawCard {
  name?: string;
}

export interface RawParticipant {
  tag?: string;
  name?: string;
  crowns?: number;
  startingTrophies?: number;
  trophyChange?: number;
  cards?: RawCard[];
}

export interface RawBattle {
  type?: string;
  battleTime?: string;
  gameMode?: { id?: number; name?: string };
  arena?: { name?: string };
  team?: RawParticipant[];
  opponent?: RawParticipant[];
}

export interface PlayerProfile {
  tag: string;
  name: string;
  arena: string | null;
  trophies: number;
}

// ============ Events ============

export interface NewBattleEvent {
  subjectTag: string;
  subjectName: string;
  battle: BattleRecord;
  totals: OutcomeTally;
  rivalry?: RivalEntry;
}

export interface RivalPromotedEvent {
  subjectTag: string;
  opponentTag: string;
  opponentName: string;
  encounterCount: number;
}

export interface LogDiscontinuityEvent {
  subjectTag: string;
  unseenCount: number;
}

export interface ArenaChangedEvent {
  subjectTag: string;
  subjectName: string;
  from: string;
  to: string;
}

export interface SubjectFailingEvent {
  subjectTag: string;
  kind: string;
  consecutiveFailures: number;
  message: string;
}

export interface StoreFailingEvent {
  subjectTag: string;
  consecutiveFailures: number;
  message: string;
}

export interface CycleCompletedEvent {
  subjectTag: string;
  fetched: number;
  unseen: number;
  skipped: number;
  baseline: boolean;
  fetchSequence: number;
}

export interface MonitorEventMap {
  newBattle: NewBattleEvent;
  rivalPromoted: RivalPromotedEvent;
  logDiscontinuity: LogDiscontinuityEvent;
  arenaChanged: ArenaChangedEvent;
  subjectFailing: SubjectFailingEvent;
  storeFailing: StoreFailingEvent;
  cycleCompleted: CycleCompletedEvent;
}

export type MonitorEventName = keyof MonitorEventMap;

// Rival threshold and bounded history sizes
export const LIMITS = {
  RIVAL_MIN_ENCOUNTERS: 2,
  OPPONENT_RECENT_MATCHES: 10,
  CURSOR_RECENT_IDS: 100,
  DECK_SIZE: 8,
};

export const UNKNOWN_OPPONENT = 'UNKNOWN';
