import { PERSONA_IDS } from '../content/personas.js';
import type {
  CharacterSnapshot,
  DailyProgress,
  HabitOutcome,
  HabitStreakState,
  HistoryEntry,
  IsoDate,
  MilestoneHit,
  PersonaId,
  XpRules,
} from '../models.js';
import { loadCharacter, saveCharacter, tryLoad } from '../persistence/records.js';
import type { RecordStore } from '../persistence/store.js';
import { appendHistory } from '../systems/history.js';
import { logger } from '../utils/logger.js';
import { milestoneAt, xpPerSuccess } from './rewards.js';
import { applyDelta, snapshotOf } from './stats.js';
import { refreshSynergy } from './synergy.js';

export interface HabitTally {
  xp_earned: number;
  milestones: MilestoneHit[];
}

export interface CheckinOutcome extends HabitTally {
  entries: HistoryEntry[];
  skipped: PersonaId[];
}

function emptyStreak(): HabitStreakState {
  return { streak: 0, best_streak: 0, total_success: 0, total_failure: 0 };
}

/**
 * Updates per-habit streak state in `progress` and totals the XP earned by
 * one check-in. Streak state changes even when nothing is earned.
 */
export function tallyHabits(
  progress: DailyProgress,
  results: Record<string, HabitOutcome>,
  rules: XpRules
): HabitTally {
  const tally: HabitTally = { xp_earned: 0, milestones: [] };

  for (const [habit, outcome] of Object.entries(results)) {
    const state = progress.habits[habit] ?? emptyStreak();
    progress.habits[habit] = state;

    if (outcome === 'failed') {
      state.streak = 0;
      state.total_failure += 1;
      continue;
    }

    state.streak += 1;
    state.total_success += 1;
    state.best_streak = Math.max(state.best_streak, state.streak);
    tally.xp_earned += xpPerSuccess(habit, rules);

    const milestone = milestoneAt(habit, state.streak, rules);
    if (milestone) {
      tally.xp_earned += milestone.xp_bonus;
      tally.milestones.push(milestone);
      logger.info('Streak milestone reached', { habit, streak: state.streak, xp_bonus: milestone.xp_bonus });
    }
  }

  return tally;
}

/**
 * Runs one check-in through the stat engine: the whole XP total goes to
 * every character (not split), each character gets a habit-reward ledger
 * entry, and each milestone gets one entry per character. Synergy is
 * refreshed with the updated streak state.
 */
export function processCheckin(
  store: RecordStore,
  progress: DailyProgress,
  results: Record<string, HabitOutcome>,
  rules: XpRules,
  date: IsoDate
): CheckinOutcome {
  const tally = tallyHabits(progress, results, rules);
  const entries: HistoryEntry[] = [];
  const skipped: PersonaId[] = [];

  if (tally.xp_earned > 0) {
    const rewarded: { persona: PersonaId; snapshot: CharacterSnapshot }[] = [];

    for (const persona of PERSONA_IDS) {
      const character = tryLoad(() => loadCharacter(store, persona), { persona, operation: 'habit-reward' });
      if (!character) {
        skipped.push(persona);
        continue;
      }
      const delta = applyDelta(character, { xp: tally.xp_earned }, rules);
      saveCharacter(store, persona, character);
      const snapshot = snapshotOf(character);
      rewarded.push({ persona, snapshot });
      entries.push(appendHistory(store, { persona, event: 'habit-reward', delta, snapshot, date }));
    }

    for (const milestone of tally.milestones) {
      for (const { persona, snapshot } of rewarded) {
        entries.push(
          appendHistory(store, {
            persona,
            event: 'streak-milestone',
            delta: { xp: milestone.xp_bonus, health: 0, energy: 0, abilities: {} },
            snapshot,
            date,
            habit: milestone.habit,
            streak: milestone.streak,
          })
        );
      }
    }
  }

  refreshSynergy(store, progress);
  return { ...tally, entries, skipped };
}
