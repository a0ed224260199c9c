import { z } from 'zod';
import type {
  Character,
  CheckinRecord,
  DailyProgress,
  HistoryEntry,
  Mission,
  Reward,
  SynergyRules,
  SynergySummary,
  XpRules,
} from '../models.js';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/u, 'expected YYYY-MM-DD');
const personaId = z.enum(['tyler', 'mr-robot', 'kei']);
const abilityMap = z.record(z.number());

export const CharacterSchema: z.ZodType<Character, z.ZodTypeDef, unknown> = z
  .object({
    name: z.string(),
    role: z.string().default(''),
    level: z.number().int().min(1),
    title: z.string().default(''),
    xp_details: z.object({
      current_xp: z.number(),
      xp_to_next_level: z.number().nullable().default(null),
    }).passthrough(),
    health_details: z.object({
      current_health: z.number(),
      max_health: z.number(),
    }).passthrough(),
    energy_details: z.object({
      current_energy: z.number(),
      max_energy: z.number(),
    }).passthrough(),
    abilities: abilityMap.default({}),
  })
  .passthrough();

const deltaRequest = z.object({
  xp: z.number().optional(),
  health: z.number().optional(),
  energy: z.number().optional(),
  abilities: abilityMap.optional(),
});

const deltaBundle = z.object({
  xp: z.number().default(0),
  health: z.number().default(0),
  energy: z.number().default(0),
  abilities: abilityMap.default({}),
});

export const HistoryEntrySchema: z.ZodType<HistoryEntry, z.ZodTypeDef, unknown> = z
  .object({
    history_index: z.number().int(),
    persona: personaId,
    event: z.enum(['mission-completed', 'mission-failed', 'habit-reward', 'streak-milestone', 'missed-checkin-penalty']),
    delta: deltaBundle,
    snapshot: z.object({
      level: z.number(),
      title: z.string(),
      xp: z.number(),
      health: z.number(),
      energy: z.number(),
      abilities: abilityMap,
    }),
    date: z.string(),
    mission: z.string().optional(),
    rewards_unlocked: z.array(z.string()).optional(),
    habit: z.string().optional(),
    streak: z.number().optional(),
    days_missed: z.number().nullable().optional(),
  })
  .passthrough();

const levelDef = z.object({
  xp_to_next_level: z.number().nullable().default(null),
  title: z.string().default(''),
});

export const XpRulesSchema: z.ZodType<XpRules, z.ZodTypeDef, unknown> = z.object({
  levels: z.record(levelDef).default({}),
  health_energy_overflow: z
    .object({
      overflow_reset_percentage: z.number().default(20),
      overflow_bonus_to_other_stat: z.number().default(10),
    })
    .default({}),
  habit_rewards: z.record(z.object({ xp_per_success: z.number() })).default({}),
  streak_milestones: z.record(z.object({ xp_bonus: z.number(), label: z.string().optional() })).default({}),
  missed_checkin_penalty: z
    .object({
      threshold_days: z.number().default(3),
      xp: z.number().default(-20),
      health: z.number().default(-10),
      energy: z.number().default(-10),
      ability_percentage: z.number().default(-2),
    })
    .default({}),
});

export const SynergyRulesSchema: z.ZodType<SynergyRules, z.ZodTypeDef, unknown> = z.object({
  levels: z
    .record(
      z.object({
        xp_to_next_level: z.number().nullable().default(null),
        chapter: z.string().default(''),
        description: z.string().default(''),
      })
    )
    .default({}),
});

const habitStreak = z.object({
  streak: z.number().int().nonnegative().default(0),
  best_streak: z.number().int().nonnegative().default(0),
  total_success: z.number().int().nonnegative().default(0),
  total_failure: z.number().int().nonnegative().default(0),
});

export const DailyProgressSchema: z.ZodType<DailyProgress, z.ZodTypeDef, unknown> = z.object({
  checkin_streak: z.number().int().nonnegative().default(0),
  total_checkins: z.number().int().nonnegative().default(0),
  last_checkin_date: isoDate.nullable().default(null),
  last_penalty_date: isoDate.nullable().default(null),
  habits: z.record(habitStreak).default({}),
});

const count = z.number().int().nonnegative().default(0);

export const SynergySummarySchema: z.ZodType<SynergySummary, z.ZodTypeDef, unknown> = z.object({
  total_xp: z.number(),
  level: z.number(),
  chapter: z.string(),
  description: z.string(),
  xp_into_level: z.number(),
  xp_to_next_level: z.number().nullable(),
  categories: z.object({ physical: z.number(), mental: z.number(), spiritual: z.number() }),
  total_synergy: z.number(),
  missions: z.object({ total: count, not_started: count, in_progress: count, completed: count, failed: count }),
  rewards: z.object({ total: count, locked: count, unlocked: count }),
  daily_progress: DailyProgressSchema,
});

export const CheckinRecordSchema: z.ZodType<CheckinRecord, z.ZodTypeDef, unknown> = z
  .object({
    date: isoDate,
    mood: z.string().optional(),
    sleep_hours: z.number().nonnegative().optional(),
    notes: z.string().optional(),
    habits: z.record(z.enum(['success', 'failed'])),
  })
  .passthrough();

export const MissionSchema: z.ZodType<Mission, z.ZodTypeDef, unknown> = z
  .object({
    archetype: personaId,
    mission_code: z.string(),
    title: z.string(),
    description: z.string().default(''),
    difficulty: z.enum(['easy', 'medium', 'hard']).default('medium'),
    status: z.enum(['not-started', 'in-progress', 'completed', 'failed']).optional(),
    progress: z.object({ current: z.number(), total: z.number() }).default({ current: 0, total: 1 }),
    archetype_stat_change: z
      .object({
        on_complete: deltaRequest.default({}),
        on_failure: deltaRequest.default({}),
      })
      .default({}),
    reward: z
      .array(z.object({ reward_id: z.string(), title: z.string().default(''), reward_type: z.string().default('street') }))
      .default([]),
    mission_icon: z.string().optional(),
    start_date: z.string().default(''),
    due_date: z.string().nullable().default(null),
    completion_date: z.string().nullable().default(null),
  })
  .passthrough();

export const RewardSchema: z.ZodType<Reward, z.ZodTypeDef, unknown> = z
  .object({
    reward_id: z.string(),
    title: z.string(),
    description: z.string().default(''),
    associated_mission_ids: z.array(z.string()).default([]),
    reward_type: z.string().default('street'),
    is_locked: z.boolean().default(true),
    badge_icon: z.string().optional(),
  })
  .passthrough();
