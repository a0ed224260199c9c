import equal from 'fast-deep-equal';
import { PERSONA_IDS, PERSONAS } from '../content/personas.js';
import { loadSynergyRules } from '../content/rulesLoader.js';
import type {
  Character,
  DailyProgress,
  MissionCounts,
  MissionStatus,
  PersonaId,
  RewardCounts,
  SynergyCategory,
  SynergyRules,
  SynergySummary,
} from '../models.js';
import {
  type StoredMission,
  KEYS,
  listMissions,
  loadCharacter,
  loadDailyProgress,
  loadSynergy,
  saveSynergy,
  tryLoad,
} from '../persistence/records.js';
import type { RecordStore } from '../persistence/store.js';
import { logger } from '../utils/logger.js';
import { cascadeLevels, thresholdFor } from './levels.js';

export interface SynergyInput {
  characters: Partial<Record<PersonaId, Character>>;
  missions: StoredMission[];
  rewards: { locked: number; unlocked: number };
  rules: SynergyRules;
  dailyProgress: DailyProgress;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function abilityMean(character: Character | undefined): number {
  if (!character) return 0;
  const values = Object.values(character.abilities);
  if (values.length === 0) return 0;
  return round2(values.reduce((sum, v) => sum + v, 0) / values.length);
}

function missionStatus({ folder, mission }: StoredMission): MissionStatus {
  if (folder === 'completed') {
    return mission.status === 'failed' ? 'failed' : 'completed';
  }
  return mission.status ?? 'not-started';
}

export function countMissions(missions: StoredMission[]): MissionCounts {
  const counts: MissionCounts = { total: 0, not_started: 0, in_progress: 0, completed: 0, failed: 0 };
  for (const stored of missions) {
    counts.total += 1;
    switch (missionStatus(stored)) {
      case 'not-started':
        counts.not_started += 1;
        break;
      case 'in-progress':
        counts.in_progress += 1;
        break;
      case 'completed':
        counts.completed += 1;
        break;
      case 'failed':
        counts.failed += 1;
        break;
    }
  }
  return counts;
}

/** Pure aggregation over already-loaded records. */
export function computeSynergy(input: SynergyInput): SynergySummary {
  const totalXp = PERSONA_IDS.reduce(
    (sum, persona) => sum + (input.characters[persona]?.xp_details.current_xp ?? 0),
    0
  );

  const progress = cascadeLevels(
    { level: 1, xp: totalXp, xpToNext: thresholdFor(input.rules.levels, 1) },
    input.rules.levels
  );
  const levelEntry = input.rules.levels[String(progress.level)];

  const categories: Record<SynergyCategory, number> = { physical: 0, mental: 0, spiritual: 0 };
  for (const persona of PERSONA_IDS) {
    categories[PERSONAS[persona].category] = abilityMean(input.characters[persona]);
  }
  const totalSynergy = round2(categories.physical + categories.mental + categories.spiritual);

  const rewards: RewardCounts = {
    total: input.rewards.locked + input.rewards.unlocked,
    locked: input.rewards.locked,
    unlocked: input.rewards.unlocked,
  };

  return {
    total_xp: totalXp,
    level: progress.level,
    chapter: levelEntry?.chapter ?? '',
    description: levelEntry?.description ?? '',
    xp_into_level: progress.xp,
    xp_to_next_level: progress.xpToNext,
    categories,
    total_synergy: totalSynergy,
    missions: countMissions(input.missions),
    rewards,
    daily_progress: input.dailyProgress,
  };
}

export interface SynergyRefresh {
  summary: SynergySummary;
  changed: boolean;
}

/**
 * Rebuilds the synergy record from the stored characters, missions and
 * rewards. `dailyProgress` replaces the stored habit block when given;
 * otherwise the stored block is carried through untouched. The record is
 * only written when it differs from what is stored.
 */
export function refreshSynergy(store: RecordStore, dailyProgress?: DailyProgress): SynergyRefresh {
  const characters: Partial<Record<PersonaId, Character>> = {};
  for (const persona of PERSONA_IDS) {
    const character = tryLoad(() => loadCharacter(store, persona), { persona });
    if (character) characters[persona] = character;
  }

  const summary = computeSynergy({
    characters,
    missions: [...listMissions(store, 'not-completed'), ...listMissions(store, 'completed')],
    rewards: {
      locked: store.list(KEYS.rewards('locked')).length,
      unlocked: store.list(KEYS.rewards('unlocked')).length,
    },
    rules: loadSynergyRules(store),
    dailyProgress: dailyProgress ?? loadDailyProgress(store),
  });

  const previous = loadSynergy(store);
  if (previous && equal(previous, summary)) {
    return { summary, changed: false };
  }

  saveSynergy(store, summary);
  logger.debug('Synergy updated', { level: summary.level, chapter: summary.chapter, total_xp: summary.total_xp });
  return { summary, changed: true };
}
