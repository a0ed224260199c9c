import { describe, expect, it } from 'vitest';
import { abilityPenalty, applyDelta, applyPenalty, clampRequest } from '../src/engine/stats.js';
import { makeCharacter, makeRules } from './helpers.js';

describe('applyDelta', () => {
  const rules = makeRules();

  it('levels up and carries the remainder', () => {
    const character = makeCharacter();
    const delta = applyDelta(character, { xp: 120 }, rules);

    expect(character.level).toBe(2);
    expect(character.title).toBe('Adept');
    expect(character.xp_details).toEqual({ current_xp: 20, xp_to_next_level: 250 });
    expect(delta).toEqual({ xp: 120, health: 0, energy: 0, abilities: {} });
  });

  it('cascades through several levels and stops at the top', () => {
    const character = makeCharacter();
    applyDelta(character, { xp: 400 }, rules);

    expect(character.level).toBe(3);
    expect(character.title).toBe('Master');
    expect(character.xp_details).toEqual({ current_xp: 50, xp_to_next_level: null });

    applyDelta(character, { xp: 1000 }, rules);
    expect(character.level).toBe(3);
    expect(character.xp_details.current_xp).toBe(1050);
  });

  it('keeps the previous title when the next level has none', () => {
    const character = makeCharacter({ title: 'Wanderer' });
    const untitled = makeRules({
      levels: {
        '1': { xp_to_next_level: 100, title: 'Novice' },
        '2': { xp_to_next_level: null, title: '' },
      },
    });
    applyDelta(character, { xp: 100 }, untitled);

    expect(character.level).toBe(2);
    expect(character.title).toBe('Wanderer');
  });

  it('leaves xp_to_next_level alone when no level is gained', () => {
    const character = makeCharacter({ xp_details: { current_xp: 10, xp_to_next_level: 100 } });
    applyDelta(character, { xp: 30 }, rules);

    expect(character.level).toBe(1);
    expect(character.xp_details).toEqual({ current_xp: 40, xp_to_next_level: 100 });
  });

  it('resets overflowing health and pays the bonus into energy', () => {
    const character = makeCharacter({ health_details: { current_health: 95, max_health: 100 } });
    const delta = applyDelta(character, { health: 10 }, rules);

    expect(character.health_details.current_health).toBe(20);
    expect(character.energy_details.current_energy).toBe(60);
    expect(delta).toEqual({ xp: 0, health: 10, energy: 10, abilities: {} });
  });

  it('resets overflowing energy and pays the bonus into health', () => {
    const character = makeCharacter({ energy_details: { current_energy: 90, max_energy: 100 } });
    const delta = applyDelta(character, { energy: 10 }, rules);

    expect(character.energy_details.current_energy).toBe(20);
    expect(character.health_details.current_health).toBe(60);
    expect(delta).toEqual({ xp: 0, health: 10, energy: 10, abilities: {} });
  });

  it('does not re-check the stat that received the overflow bonus', () => {
    const character = makeCharacter({
      health_details: { current_health: 99, max_health: 100 },
      energy_details: { current_energy: 95, max_energy: 100 },
    });
    applyDelta(character, { health: 5 }, rules);

    expect(character.health_details.current_health).toBe(20);
    expect(character.energy_details.current_energy).toBe(105);
  });

  it('skips abilities the character does not have', () => {
    const character = makeCharacter();
    const delta = applyDelta(character, { abilities: { focus: 2, luck: 5 } }, rules);

    expect(character.abilities).toEqual({ focus: 5, strength: 5 });
    expect(delta.abilities).toEqual({ focus: 2 });
  });

  it('never lowers the level for non-negative requests', () => {
    const character = makeCharacter();
    let previous = character.level;
    for (const xp of [30, 0, 90, 250, 5, 400]) {
      applyDelta(character, { xp }, rules);
      expect(character.level).toBeGreaterThanOrEqual(previous);
      expect(character.xp_details.current_xp).toBeGreaterThanOrEqual(0);
      previous = character.level;
    }
  });
});

describe('clampRequest', () => {
  it('limits negative components to the current value', () => {
    const character = makeCharacter({
      xp_details: { current_xp: 30, xp_to_next_level: 100 },
      health_details: { current_health: 0, max_health: 100 },
    });
    const clamped = clampRequest(character, {
      xp: -50,
      health: -5,
      energy: 15,
      abilities: { focus: -10, luck: -2 },
    });

    expect(clamped).toEqual({ xp: -30, health: 0, energy: 15, abilities: { focus: -3, luck: -2 } });
  });

  it('leaves unknown abilities for applyDelta to skip', () => {
    const character = makeCharacter();
    const delta = applyDelta(character, clampRequest(character, { abilities: { luck: -4, focus: -1 } }), makeRules());

    expect(delta.abilities).toEqual({ focus: -1 });
    expect(character.abilities).toEqual({ focus: 2, strength: 5 });
  });
});

describe('applyPenalty', () => {
  const policy = makeRules().missed_checkin_penalty;

  it('takes at least one point from every ability', () => {
    expect(abilityPenalty(3, -2)).toBe(-1);
    expect(abilityPenalty(150, -2)).toBe(-3);
  });

  it('applies fixed and proportional losses', () => {
    const character = makeCharacter({ xp_details: { current_xp: 45, xp_to_next_level: 100 } });
    const delta = applyPenalty(character, policy);

    expect(character.xp_details.current_xp).toBe(25);
    expect(character.health_details.current_health).toBe(40);
    expect(character.energy_details.current_energy).toBe(40);
    expect(character.abilities).toEqual({ focus: 2, strength: 4 });
    expect(delta).toEqual({ xp: -20, health: -10, energy: -10, abilities: { focus: -1, strength: -1 } });
  });

  it('floors every stat at zero and reports the real change', () => {
    const character = makeCharacter({
      xp_details: { current_xp: 5, xp_to_next_level: 100 },
      health_details: { current_health: 3, max_health: 100 },
      energy_details: { current_energy: 0, max_energy: 100 },
      abilities: { focus: 0 },
    });
    const delta = applyPenalty(character, policy);

    expect(character.xp_details.current_xp).toBe(0);
    expect(character.health_details.current_health).toBe(0);
    expect(character.energy_details.current_energy).toBe(0);
    expect(character.abilities.focus).toBe(0);
    expect(delta).toEqual({ xp: -5, health: -3, energy: 0, abilities: { focus: 0 } });
  });
});
