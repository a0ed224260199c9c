import type { Character, Mission, PersonaId, SynergyRules, XpRules } from '../src/models.js';
import { PERSONA_IDS, PERSONAS } from '../src/content/personas.js';
import { MemoryRecordStore } from '../src/persistence/memoryStore.js';
import { KEYS } from '../src/persistence/records.js';

export function makeCharacter(overrides: Partial<Character> = {}): Character {
  return {
    name: 'Tester',
    role: 'The Test Subject',
    level: 1,
    title: 'Novice',
    xp_details: { current_xp: 0, xp_to_next_level: 100 },
    health_details: { current_health: 50, max_health: 100 },
    energy_details: { current_energy: 50, max_energy: 100 },
    abilities: { focus: 3, strength: 5 },
    ...overrides,
  };
}

export function personaCharacter(persona: PersonaId, abilityValue = 4): Character {
  const def = PERSONAS[persona];
  return makeCharacter({
    name: def.name,
    role: def.role,
    abilities: Object.fromEntries(def.abilities.map((ability) => [ability, abilityValue])),
  });
}

export function makeRules(overrides: Partial<XpRules> = {}): XpRules {
  return {
    levels: {
      '1': { xp_to_next_level: 100, title: 'Novice' },
      '2': { xp_to_next_level: 250, title: 'Adept' },
      '3': { xp_to_next_level: null, title: 'Master' },
    },
    health_energy_overflow: { overflow_reset_percentage: 20, overflow_bonus_to_other_stat: 10 },
    habit_rewards: { workout: { xp_per_success: 10 }, reading: { xp_per_success: 5 } },
    streak_milestones: { '3': { xp_bonus: 15, label: 'Spark' }, '5': { xp_bonus: 20 } },
    missed_checkin_penalty: { threshold_days: 3, xp: -20, health: -10, energy: -10, ability_percentage: -2 },
    ...overrides,
  };
}

export function makeSynergyRules(): SynergyRules {
  return {
    levels: {
      '1': { xp_to_next_level: 100, chapter: 'Chapter I', description: 'Fragments' },
      '2': { xp_to_next_level: 200, chapter: 'Chapter II', description: 'Alignment' },
      '3': { xp_to_next_level: null, chapter: 'Chapter III', description: 'Unity' },
    },
  };
}

/** Store with rules and all three characters (every ability at `abilityValue`). */
export function seededStore(rules: XpRules = makeRules(), abilityValue = 4): MemoryRecordStore {
  const store = new MemoryRecordStore({
    'configs/xp-rules': rules,
    'configs/synergy-rules': makeSynergyRules(),
  });
  for (const persona of PERSONA_IDS) {
    store.put(KEYS.character(persona), personaCharacter(persona, abilityValue));
  }
  return store;
}

export function makeMission(overrides: Partial<Mission> = {}): Mission {
  return {
    archetype: 'kei',
    mission_code: 'K01',
    title: 'Morning Sit',
    description: '',
    difficulty: 'medium',
    progress: { current: 0, total: 5 },
    archetype_stat_change: { on_complete: {}, on_failure: {} },
    reward: [],
    start_date: '2026-03-01',
    due_date: null,
    completion_date: null,
    ...overrides,
  };
}
