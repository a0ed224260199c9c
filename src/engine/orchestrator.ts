import { loadXpRules } from '../content/rulesLoader.js';
import type {
  Character,
  CheckinRecord,
  DeltaBundle,
  DeltaRequest,
  HistoryEntry,
  IsoDate,
  MilestoneHit,
  PersonaId,
  SynergySummary,
} from '../models.js';
import {
  KEYS,
  describePersona,
  listCheckinDates,
  loadCharacter,
  loadDailyProgress,
  saveCharacter,
  saveCheckin,
} from '../persistence/records.js';
import { CheckinRecordSchema } from '../persistence/schemas.js';
import type { RecordStore } from '../persistence/store.js';
import { appendHistory } from '../systems/history.js';
import { daysBetween, isIsoDate, latestDate } from '../utils/dates.js';
import { ValidationError } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';
import { processCheckin } from './habits.js';
import { maybeApplyPenalty } from './penalty.js';
import { nextMilestone } from './rewards.js';
import { applyDelta, clampRequest, snapshotOf } from './stats.js';
import { refreshSynergy } from './synergy.js';

export interface MissionOutcome {
  result: 'completed' | 'failed';
  request: DeltaRequest;
  date: IsoDate;
  mission?: string;
  rewards_unlocked?: string[];
}

export interface MissionOutcomeResult {
  character: Character;
  delta: DeltaBundle;
  entry: HistoryEntry;
}

/**
 * Applies a mission's completion or failure bundle to one character.
 * Negative components are clamped so no stat drops below zero. Throws
 * `MissingRecordError` / `MalformedRecordError` when the character cannot be
 * loaded; nothing is written in that case.
 */
export function applyMissionOutcome(
  store: RecordStore,
  persona: PersonaId,
  outcome: MissionOutcome
): MissionOutcomeResult {
  if (!isIsoDate(outcome.date)) {
    throw new ValidationError(`"${outcome.date}" is not a calendar date`, 'date', outcome.date);
  }
  const rules = loadXpRules(store);
  const character = loadCharacter(store, persona);

  const delta = applyDelta(character, clampRequest(character, outcome.request), rules);
  saveCharacter(store, persona, character);

  const entry = appendHistory(store, {
    persona,
    event: outcome.result === 'completed' ? 'mission-completed' : 'mission-failed',
    delta,
    snapshot: snapshotOf(character),
    date: outcome.date,
    ...(outcome.mission ? { mission: outcome.mission } : {}),
    ...(outcome.rewards_unlocked?.length ? { rewards_unlocked: outcome.rewards_unlocked } : {}),
  });

  refreshSynergy(store);
  logger.info('Mission outcome applied', {
    persona: describePersona(persona),
    result: outcome.result,
    history_index: entry.history_index,
  });
  return { character, delta, entry };
}

export interface CheckinSummary {
  date: IsoDate;
  xp_earned: number;
  milestones: MilestoneHit[];
  penalty_applied: boolean;
  checkin_streak: number;
  next_milestones: Record<string, number | null>;
  skipped: PersonaId[];
}

function validateCheckin(store: RecordStore, input: unknown): CheckinRecord {
  const parsed = CheckinRecordSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`${issue.path.join('.') || 'check-in'}: ${issue.message}`, 'checkin', input);
  }
  const record = parsed.data;
  if (!isIsoDate(record.date)) {
    throw new ValidationError(`"${record.date}" is not a calendar date`, 'date', record.date);
  }
  if (store.get(KEYS.checkin(record.date)) !== undefined) {
    throw new ValidationError(`check-in for ${record.date} was already processed`, 'date', record.date);
  }
  return record;
}

/**
 * Processes one day's check-in: penalty check first, then the check-in is
 * stored, the check-in streak advanced, and habit results run through the
 * stat engine.
 */
export function processDailyCheckin(store: RecordStore, input: unknown): CheckinSummary {
  const record = validateCheckin(store, input);
  const rules = loadXpRules(store);

  const before = loadDailyProgress(store);
  const lastCheckin = latestDate(before.last_checkin_date, ...listCheckinDates(store));
  if (lastCheckin !== null && record.date <= lastCheckin) {
    throw new ValidationError(
      `check-in for ${record.date} is not after the last check-in (${lastCheckin})`,
      'date',
      record.date
    );
  }

  const penalty = maybeApplyPenalty(store, before, lastCheckin, record.date, rules);

  const progress = loadDailyProgress(store);
  progress.checkin_streak =
    lastCheckin !== null && daysBetween(lastCheckin, record.date) === 1 ? progress.checkin_streak + 1 : 1;
  progress.total_checkins += 1;
  progress.last_checkin_date = record.date;
  saveCheckin(store, record);

  const outcome = processCheckin(store, progress, record.habits, rules, record.date);

  const next_milestones: Record<string, number | null> = {};
  for (const habit of Object.keys(record.habits)) {
    next_milestones[habit] = nextMilestone(progress.habits[habit]?.streak ?? 0, rules);
  }

  logger.info('Daily check-in processed', {
    date: record.date,
    xp_earned: outcome.xp_earned,
    milestones: outcome.milestones.length,
    penalty_applied: penalty.applied,
  });

  return {
    date: record.date,
    xp_earned: outcome.xp_earned,
    milestones: outcome.milestones,
    penalty_applied: penalty.applied,
    checkin_streak: progress.checkin_streak,
    next_milestones,
    skipped: [...new Set([...penalty.skipped, ...outcome.skipped])],
  };
}

export function recomputeSynergy(store: RecordStore): SynergySummary {
  return refreshSynergy(store).summary;
}

export function applyMissedCheckinPenaltyIfDue(store: RecordStore, today: IsoDate): boolean {
  if (!isIsoDate(today)) {
    throw new ValidationError(`"${today}" is not a calendar date`, 'today', today);
  }
  const progress = loadDailyProgress(store);
  const lastCheckin = latestDate(progress.last_checkin_date, ...listCheckinDates(store));
  if (lastCheckin !== null && today < lastCheckin) {
    throw new ValidationError(`today (${today}) is before the last check-in (${lastCheckin})`, 'today', today);
  }
  return maybeApplyPenalty(store, progress, lastCheckin, today, loadXpRules(store)).applied;
}
