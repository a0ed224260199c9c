import type { z } from 'zod';
import { PERSONAS } from '../content/personas.js';
import type {
  Character,
  CheckinRecord,
  DailyProgress,
  IsoDate,
  Mission,
  PersonaId,
  Reward,
  SynergySummary,
} from '../models.js';
import { isIsoDate } from '../utils/dates.js';
import { logger } from '../utils/logger.js';
import { MalformedRecordError, MissingRecordError, isRecordError } from '../utils/errorhandler.js';
import type { RecordStore } from './store.js';
import { joinKey } from './store.js';
import {
  CharacterSchema,
  CheckinRecordSchema,
  DailyProgressSchema,
  MissionSchema,
  RewardSchema,
  SynergySummarySchema,
} from './schemas.js';

export type MissionFolder = 'not-completed' | 'completed';
export type RewardFolder = 'locked' | 'unlocked';

export const KEYS = {
  character: (persona: PersonaId) => joinKey('alter-egos', persona),
  history: 'history',
  synergy: 'synergy',
  missions: (folder: MissionFolder) => joinKey('missions', folder),
  rewards: (folder: RewardFolder) => joinKey('rewards', folder),
  checkins: 'checkins',
  checkin: (date: IsoDate) => joinKey('checkins', date),
};

export function parseRecord<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, document: unknown): T {
  const parsed = schema.safeParse(document);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new MalformedRecordError(key, reason);
  }
  return parsed.data;
}

export function readRecord<T>(store: RecordStore, key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const document = store.get(key);
  if (document === undefined) throw new MissingRecordError(key);
  return parseRecord(key, schema, document);
}

/** Missing or unreadable documents become `undefined`; unreadable ones are logged. */
export function readRecordOrDefault<T>(
  store: RecordStore,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T | undefined {
  try {
    const document = store.get(key);
    if (document === undefined) return undefined;
    return parseRecord(key, schema, document);
  } catch (err) {
    if (err instanceof MalformedRecordError) {
      logger.warn('Ignoring malformed record', { key, reason: err.context?.reason });
      return undefined;
    }
    throw err;
  }
}

/**
 * Runs a loader, turning a missing or malformed record into `undefined` with a
 * logged warning. Other errors propagate.
 */
export function tryLoad<T>(load: () => T, context?: Record<string, unknown>): T | undefined {
  try {
    return load();
  } catch (err) {
    if (!isRecordError(err)) throw err;
    logger.warn('Record skipped', { ...context, key: err.key, code: err.code, reason: err.context?.reason });
    return undefined;
  }
}

// ---- characters ----

export function loadCharacter(store: RecordStore, persona: PersonaId): Character {
  return readRecord(store, KEYS.character(persona), CharacterSchema);
}

export function saveCharacter(store: RecordStore, persona: PersonaId, character: Character) {
  store.put(KEYS.character(persona), character);
}

export function describePersona(persona: PersonaId) {
  return `${PERSONAS[persona].name} (${PERSONAS[persona].role})`;
}

// ---- synergy ----

export function loadSynergy(store: RecordStore): SynergySummary | undefined {
  return readRecordOrDefault(store, KEYS.synergy, SynergySummarySchema);
}

export function saveSynergy(store: RecordStore, summary: SynergySummary) {
  store.put(KEYS.synergy, summary);
}

export function emptyDailyProgress(): DailyProgress {
  return {
    checkin_streak: 0,
    total_checkins: 0,
    last_checkin_date: null,
    last_penalty_date: null,
    habits: {},
  };
}

/**
 * Reads only the `daily_progress` block, so habit streaks survive even when
 * the rest of the synergy record no longer parses.
 */
export function loadDailyProgress(store: RecordStore): DailyProgress {
  let document: unknown;
  try {
    document = store.get(KEYS.synergy);
  } catch (err) {
    if (!(err instanceof MalformedRecordError)) throw err;
    logger.warn('Synergy record unreadable, daily progress starts fresh', { key: KEYS.synergy });
    return emptyDailyProgress();
  }
  if (typeof document !== 'object' || document === null || !('daily_progress' in document)) {
    return emptyDailyProgress();
  }
  const parsed = DailyProgressSchema.safeParse(document.daily_progress);
  if (!parsed.success) {
    logger.warn('Daily progress block malformed, starting fresh', { key: KEYS.synergy });
    return emptyDailyProgress();
  }
  return parsed.data;
}

// ---- missions / rewards ----

export interface StoredMission {
  key: string;
  folder: MissionFolder;
  mission: Mission;
}

export interface StoredReward {
  key: string;
  folder: RewardFolder;
  reward: Reward;
}

export function loadMission(store: RecordStore, key: string): StoredMission {
  const folder: MissionFolder = key.startsWith(`${KEYS.missions('completed')}/`) ? 'completed' : 'not-completed';
  return { key, folder, mission: readRecord(store, key, MissionSchema) };
}

export function listMissions(store: RecordStore, folder: MissionFolder): StoredMission[] {
  const missions: StoredMission[] = [];
  for (const key of store.list(KEYS.missions(folder))) {
    const mission = readRecordOrDefault(store, key, MissionSchema);
    if (mission) missions.push({ key, folder, mission });
  }
  return missions;
}

export function listRewards(store: RecordStore, folder: RewardFolder): StoredReward[] {
  const rewards: StoredReward[] = [];
  for (const key of store.list(KEYS.rewards(folder))) {
    const reward = readRecordOrDefault(store, key, RewardSchema);
    if (reward) rewards.push({ key, folder, reward });
  }
  return rewards;
}

// ---- check-ins ----

export function saveCheckin(store: RecordStore, record: CheckinRecord) {
  store.put(KEYS.checkin(record.date), record);
}

export function loadCheckin(store: RecordStore, date: IsoDate): CheckinRecord | undefined {
  return readRecordOrDefault(store, KEYS.checkin(date), CheckinRecordSchema);
}

/** Stored check-in dates, oldest first. Files not named by a calendar date are ignored. */
export function listCheckinDates(store: RecordStore): IsoDate[] {
  const prefix = `${KEYS.checkins}/`;
  return store
    .list(KEYS.checkins)
    .map((key) => key.slice(prefix.length))
    .filter(isIsoDate);
}
