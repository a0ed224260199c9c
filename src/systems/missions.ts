import { PERSONAS } from '../content/personas.js';
import { applyMissionOutcome, type MissionOutcomeResult } from '../engine/orchestrator.js';
import { refreshSynergy } from '../engine/synergy.js';
import type {
  DeltaRequest,
  IsoDate,
  Mission,
  MissionDifficulty,
  MissionRewardLink,
  MissionStatus,
  PersonaId,
} from '../models.js';
import { KEYS, type MissionFolder, type StoredMission, listRewards, loadMission } from '../persistence/records.js';
import type { RecordStore } from '../persistence/store.js';
import { baseName, joinKey } from '../persistence/store.js';
import { isIsoDate } from '../utils/dates.js';
import { ValidationError, isRecordError, trackError } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';

export interface NewMissionInput {
  archetype: PersonaId;
  title: string;
  description?: string;
  difficulty?: MissionDifficulty;
  total: number;
  start_date: IsoDate;
  due_date?: IsoDate | null;
  on_complete?: DeltaRequest;
  on_failure?: DeltaRequest;
  reward?: MissionRewardLink[];
  mission_icon?: string;
}

// Keys are slash-separated, so the slug keeps to [a-z0-9-].
export function titleToSlug(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9]+/gu, '-')
    .replace(/^-+|-+$/gu, '');
}

function codeNumber(key: string, prefix: string): number | null {
  const code = baseName(key).split('-')[0];
  if (!code.startsWith(prefix)) return null;
  const n = Number.parseInt(code.slice(prefix.length), 10);
  return Number.isNaN(n) ? null : n;
}

/** Next code for a persona (`K01`, `K02`, ...), counted across both mission folders. */
export function nextMissionCode(store: RecordStore, persona: PersonaId): string {
  const { prefix } = PERSONAS[persona];
  const keys = [...store.list(KEYS.missions('not-completed')), ...store.list(KEYS.missions('completed'))];
  const highest = keys.reduce((max, key) => Math.max(max, codeNumber(key, prefix) ?? 0), 0);
  return `${prefix}${String(highest + 1).padStart(2, '0')}`;
}

export function createMission(store: RecordStore, input: NewMissionInput): StoredMission {
  const title = input.title.trim();
  if (!title) throw new ValidationError('mission title is required', 'title', input.title);
  const slug = titleToSlug(title);
  if (!slug) throw new ValidationError('mission title needs at least one letter or digit', 'title', input.title);
  if (!Number.isInteger(input.total) || input.total < 1) {
    throw new ValidationError('total progress must be a positive integer', 'total', input.total);
  }
  for (const [field, value] of [['start_date', input.start_date], ['due_date', input.due_date]] as const) {
    if (value && !isIsoDate(value)) throw new ValidationError(`${field} must be YYYY-MM-DD`, field, value);
  }

  const mission_code = nextMissionCode(store, input.archetype);
  const mission: Mission = {
    archetype: input.archetype,
    mission_code,
    title,
    description: input.description ?? '',
    difficulty: input.difficulty ?? 'medium',
    status: 'not-started',
    progress: { current: 0, total: input.total },
    archetype_stat_change: {
      on_complete: input.on_complete ?? {},
      on_failure: input.on_failure ?? {},
    },
    reward: input.reward ?? [],
    mission_icon: input.mission_icon,
    start_date: input.start_date,
    due_date: input.due_date ?? null,
    completion_date: null,
  };

  const key = joinKey(KEYS.missions('not-completed'), `${mission_code}-${slug}`);
  store.put(key, mission);
  logger.info('Mission created', { mission_code, archetype: input.archetype, key });
  refreshSynergy(store);
  return { key, folder: 'not-completed', mission };
}

/**
 * Sets progress on an open mission. Reaching the total keeps the mission
 * in progress; only `completeMission` closes it.
 */
export function updateMissionProgress(store: RecordStore, key: string, current: number): StoredMission {
  const stored = loadMission(store, key);
  if (stored.folder === 'completed') {
    throw new ValidationError('mission is already closed', 'key', key);
  }
  const { total } = stored.mission.progress;
  if (!Number.isInteger(current) || current < 0 || current > total) {
    throw new ValidationError(`progress must be between 0 and ${total}`, 'current', current);
  }

  stored.mission.progress.current = current;
  stored.mission.status = current === 0 ? 'not-started' : 'in-progress';
  store.put(key, stored.mission);
  refreshSynergy(store);
  return stored;
}

function unlockRewards(store: RecordStore, links: MissionRewardLink[]): string[] {
  const wanted = new Set(links.map((link) => link.reward_id).filter(Boolean));
  const unlocked: string[] = [];
  for (const { key, reward } of listRewards(store, 'locked')) {
    if (!wanted.has(reward.reward_id)) continue;
    reward.is_locked = false;
    store.put(joinKey(KEYS.rewards('unlocked'), baseName(key)), reward);
    store.remove(key);
    unlocked.push(reward.reward_id);
    logger.info('Reward unlocked', { reward_id: reward.reward_id, title: reward.title });
  }
  return unlocked;
}

export interface MissionCloseResult {
  mission: StoredMission;
  rewards_unlocked: string[];
  outcome: MissionOutcomeResult | null;
}

function closeMission(
  store: RecordStore,
  key: string,
  result: 'completed' | 'failed',
  today: IsoDate
): MissionCloseResult {
  if (!isIsoDate(today)) throw new ValidationError(`"${today}" is not a calendar date`, 'today', today);
  const stored = loadMission(store, key);
  if (stored.folder === 'completed') {
    throw new ValidationError('mission is already closed', 'key', key);
  }

  const { mission } = stored;
  mission.status = result;
  mission.completion_date = today;
  if (result === 'completed') mission.progress.current = mission.progress.total;

  // failed missions keep their rewards locked
  const rewards_unlocked = result === 'completed' ? unlockRewards(store, mission.reward) : [];

  const closedKey = joinKey(KEYS.missions('completed'), baseName(key));
  store.put(closedKey, mission);
  store.remove(key);
  const closed: StoredMission = { key: closedKey, folder: 'completed', mission };

  const request =
    result === 'completed' ? mission.archetype_stat_change.on_complete : mission.archetype_stat_change.on_failure;
  try {
    const outcome = applyMissionOutcome(store, mission.archetype, {
      result,
      request,
      date: today,
      mission: baseName(key),
      rewards_unlocked,
    });
    return { mission: closed, rewards_unlocked, outcome };
  } catch (err) {
    if (!isRecordError(err)) throw err;
    trackError(err, { mission: mission.mission_code, operation: `mission-${result}` });
    refreshSynergy(store);
    return { mission: closed, rewards_unlocked, outcome: null };
  }
}

/**
 * Sets a mission's status directly and files it in the matching folder.
 * Closing stamps `completion_date` (unless one is set), reopening clears it.
 * No stat change or reward unlock happens here; use `completeMission` or
 * `failMission` for that.
 */
export function setMissionStatus(
  store: RecordStore,
  key: string,
  status: MissionStatus,
  today: IsoDate
): StoredMission {
  if (!isIsoDate(today)) throw new ValidationError(`"${today}" is not a calendar date`, 'today', today);
  const stored = loadMission(store, key);
  const { mission } = stored;

  const closed = status === 'completed' || status === 'failed';
  mission.status = status;
  mission.completion_date = closed ? mission.completion_date ?? today : null;

  const folder: MissionFolder = closed ? 'completed' : 'not-completed';
  const target = joinKey(KEYS.missions(folder), `${mission.mission_code}-${titleToSlug(mission.title)}`);
  store.put(target, mission);
  if (target !== key) store.remove(key);

  logger.info('Mission status changed', { mission_code: mission.mission_code, status, folder });
  refreshSynergy(store);
  return { key: target, folder, mission };
}

export function deleteMission(store: RecordStore, key: string): Mission {
  const { mission } = loadMission(store, key);
  store.remove(key);
  logger.info('Mission deleted', { mission_code: mission.mission_code, key });
  refreshSynergy(store);
  return mission;
}

export function completeMission(store: RecordStore, key: string, today: IsoDate): MissionCloseResult {
  return closeMission(store, key, 'completed', today);
}

export function failMission(store: RecordStore, key: string, today: IsoDate): MissionCloseResult {
  return closeMission(store, key, 'failed', today);
}
