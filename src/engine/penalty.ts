import { PERSONA_IDS } from '../content/personas.js';
import type { DailyProgress, HistoryEntry, IsoDate, PersonaId, XpRules } from '../models.js';
import { loadCharacter, saveCharacter, tryLoad } from '../persistence/records.js';
import type { RecordStore } from '../persistence/store.js';
import { appendHistory } from '../systems/history.js';
import { daysBetween } from '../utils/dates.js';
import { logger } from '../utils/logger.js';
import { applyPenalty, snapshotOf } from './stats.js';
import { refreshSynergy } from './synergy.js';

export interface PenaltyOutcome {
  applied: boolean;
  days_missed: number | null;
  entries: HistoryEntry[];
  skipped: PersonaId[];
}

/** `null` stands for "never checked in". */
export function daysSinceCheckin(lastCheckinDate: IsoDate | null, today: IsoDate): number | null {
  return lastCheckinDate === null ? null : daysBetween(lastCheckinDate, today);
}

export function isPenaltyDue(daysMissed: number | null, rules: XpRules): boolean {
  return daysMissed === null || daysMissed >= rules.missed_checkin_penalty.threshold_days;
}

/**
 * Applies the missed check-in penalty to every character when the gap since
 * the last check-in reaches the threshold. At most once per calendar day:
 * `progress.last_penalty_date` is stamped and stored with the synergy record.
 */
export function maybeApplyPenalty(
  store: RecordStore,
  progress: DailyProgress,
  lastCheckinDate: IsoDate | null,
  today: IsoDate,
  rules: XpRules
): PenaltyOutcome {
  const daysMissed = daysSinceCheckin(lastCheckinDate, today);
  const outcome: PenaltyOutcome = { applied: false, days_missed: daysMissed, entries: [], skipped: [] };

  if (!isPenaltyDue(daysMissed, rules)) return outcome;
  if (progress.last_penalty_date === today) {
    logger.debug('Missed check-in penalty already applied today', { today });
    return outcome;
  }

  for (const persona of PERSONA_IDS) {
    const character = tryLoad(() => loadCharacter(store, persona), { persona, operation: 'missed-checkin-penalty' });
    if (!character) {
      outcome.skipped.push(persona);
      continue;
    }
    const delta = applyPenalty(character, rules.missed_checkin_penalty);
    saveCharacter(store, persona, character);
    outcome.entries.push(
      appendHistory(store, {
        persona,
        event: 'missed-checkin-penalty',
        delta,
        snapshot: snapshotOf(character),
        date: today,
        days_missed: daysMissed,
      })
    );
  }

  progress.last_penalty_date = today;
  refreshSynergy(store, progress);
  outcome.applied = true;
  logger.warn('Missed check-in penalty applied', {
    days_missed: daysMissed ?? 'never checked in',
    characters: outcome.entries.length,
  });
  return outcome;
}
