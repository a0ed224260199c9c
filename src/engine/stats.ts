import type {
  Character,
  CharacterSnapshot,
  DeltaBundle,
  DeltaRequest,
  MissedCheckinPolicy,
  XpRules,
} from '../models.js';
import { logger } from '../utils/logger.js';
import { cascadeLevels, thresholdFor } from './levels.js';

export function emptyDelta(): DeltaBundle {
  return { xp: 0, health: 0, energy: 0, abilities: {} };
}

export function snapshotOf(character: Character): CharacterSnapshot {
  return {
    level: character.level,
    title: character.title,
    xp: character.xp_details.current_xp,
    health: character.health_details.current_health,
    energy: character.energy_details.current_energy,
    abilities: { ...character.abilities },
  };
}

function nonZero(value: number | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value !== 0;
}

/**
 * Applies a requested delta to `character` in place and returns what was
 * actually applied. Overflow only fires on the stat whose change was
 * requested; a stat that receives the cross bonus is not re-checked.
 */
export function applyDelta(character: Character, request: DeltaRequest, rules: XpRules): DeltaBundle {
  const applied = emptyDelta();
  const overflow = rules.health_energy_overflow;

  if (nonZero(request.xp)) {
    character.xp_details.current_xp += request.xp;
    applied.xp = request.xp;

    const result = cascadeLevels(
      {
        level: character.level,
        xp: character.xp_details.current_xp,
        xpToNext: thresholdFor(rules.levels, character.level),
      },
      rules.levels,
      ({ level, entry }) => {
        character.title = entry?.title || character.title;
        logger.info('Level up', { name: character.name, level, title: character.title });
      }
    );
    if (result.level !== character.level) {
      character.level = result.level;
      character.xp_details.xp_to_next_level = result.xpToNext;
    }
    character.xp_details.current_xp = result.xp;
  }

  if (nonZero(request.health)) {
    const health = character.health_details;
    health.current_health += request.health;
    applied.health += request.health;

    if (health.current_health >= health.max_health) {
      health.current_health = overflow.overflow_reset_percentage;
      character.energy_details.current_energy += overflow.overflow_bonus_to_other_stat;
      applied.energy += overflow.overflow_bonus_to_other_stat;
      logger.info('Health overflow', {
        name: character.name,
        reset_to: overflow.overflow_reset_percentage,
        energy_bonus: overflow.overflow_bonus_to_other_stat,
      });
    }
  }

  if (nonZero(request.energy)) {
    const energy = character.energy_details;
    energy.current_energy += request.energy;
    applied.energy += request.energy;

    if (energy.current_energy >= energy.max_energy) {
      energy.current_energy = overflow.overflow_reset_percentage;
      character.health_details.current_health += overflow.overflow_bonus_to_other_stat;
      applied.health += overflow.overflow_bonus_to_other_stat;
      logger.info('Energy overflow', {
        name: character.name,
        reset_to: overflow.overflow_reset_percentage,
        health_bonus: overflow.overflow_bonus_to_other_stat,
      });
    }
  }

  for (const [ability, value] of Object.entries(request.abilities ?? {})) {
    if (!nonZero(value)) continue;
    if (!(ability in character.abilities)) {
      logger.warn('Unknown ability skipped', { name: character.name, ability });
      continue;
    }
    character.abilities[ability] += value;
    applied.abilities[ability] = value;
  }

  return applied;
}

/**
 * Limits every negative component of `request` so the target never drops
 * below zero. Positive components and abilities the character lacks pass
 * through untouched.
 */
export function clampRequest(character: Character, request: DeltaRequest): DeltaRequest {
  const floor = (value: number | undefined, current: number) =>
    value !== undefined && value < 0 ? (current <= 0 ? 0 : Math.max(value, -current)) : value;

  const abilities: Record<string, number> = {};
  for (const [ability, value] of Object.entries(request.abilities ?? {})) {
    abilities[ability] = ability in character.abilities ? floor(value, character.abilities[ability]) ?? 0 : value;
  }

  return {
    xp: floor(request.xp, character.xp_details.current_xp),
    health: floor(request.health, character.health_details.current_health),
    energy: floor(request.energy, character.energy_details.current_energy),
    abilities,
  };
}

export function abilityPenalty(value: number, percentage: number): number {
  return -Math.max(1, Math.floor((value * Math.abs(percentage)) / 100));
}

/**
 * Missed check-in penalty: fixed losses on xp, health and energy, a
 * proportional loss (at least one point) on every ability, each floored at
 * zero. Overflow rules do not apply.
 */
export function applyPenalty(character: Character, policy: MissedCheckinPolicy): DeltaBundle {
  const applied = emptyDelta();
  const decrease = (current: number, amount: number) => {
    const next = Math.max(0, current - Math.abs(amount));
    return { next, change: next - current };
  };

  const xp = decrease(character.xp_details.current_xp, policy.xp);
  character.xp_details.current_xp = xp.next;
  applied.xp = xp.change;

  const health = decrease(character.health_details.current_health, policy.health);
  character.health_details.current_health = health.next;
  applied.health = health.change;

  const energy = decrease(character.energy_details.current_energy, policy.energy);
  character.energy_details.current_energy = energy.next;
  applied.energy = energy.change;

  for (const [ability, value] of Object.entries(character.abilities)) {
    const result = decrease(value, abilityPenalty(value, policy.ability_percentage));
    character.abilities[ability] = result.next;
    applied.abilities[ability] = result.change;
  }

  return applied;
}
