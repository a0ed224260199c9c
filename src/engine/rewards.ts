import type { MilestoneHit, XpRules } from '../models.js';
import { logger } from '../utils/logger.js';

export function xpPerSuccess(habit: string, rules: XpRules): number {
  const reward = rules.habit_rewards[habit];
  if (!reward) {
    logger.warn('No XP reward configured for habit', { habit });
    return 0;
  }
  return Math.max(0, reward.xp_per_success);
}

/** The milestone reached exactly at `streak`, if any. Skipped lengths never pay out. */
export function milestoneAt(habit: string, streak: number, rules: XpRules): MilestoneHit | null {
  const milestone = rules.streak_milestones[String(streak)];
  if (!milestone) return null;
  return { habit, streak, xp_bonus: milestone.xp_bonus, label: milestone.label };
}

export function nextMilestone(streak: number, rules: XpRules): number | null {
  const upcoming = Object.keys(rules.streak_milestones)
    .map(Number)
    .filter((length) => Number.isInteger(length) && length > streak)
    .sort((a, b) => a - b)[0];
  return upcoming ?? null;
}
