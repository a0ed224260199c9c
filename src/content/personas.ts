import type { PersonaId, SynergyCategory } from '../models.js';

export interface PersonaDefinition {
  id: PersonaId;
  name: string;
  role: string;
  archetype: 'body' | 'mind' | 'soul';
  prefix: string;
  category: SynergyCategory;
  abilities: readonly string[];
}

export const PERSONAS: Record<PersonaId, PersonaDefinition> = {
  tyler: {
    id: 'tyler',
    name: 'Tyler',
    role: 'The Untamed Wolf',
    archetype: 'body',
    prefix: 'T',
    category: 'physical',
    abilities: [
      'strength',
      'discipline',
      'agression',
      'confidence',
      'dominance',
      'pain tolerance',
      'honor',
      'determination'
    ]
  },
  'mr-robot': {
    id: 'mr-robot',
    name: 'Mr-Robot',
    role: 'The Architect of Systems',
    archetype: 'mind',
    prefix: 'M',
    category: 'mental',
    abilities: [
      'intelligence',
      'logic',
      'adaptability',
      'innovation',
      'focus',
      'systemization',
      'precision',
      'speed'
    ]
  },
  kei: {
    id: 'kei',
    name: 'Kei',
    role: 'The Monk of Still Waters',
    archetype: 'soul',
    prefix: 'K',
    category: 'spiritual',
    abilities: [
      'self-control',
      'peace',
      'wisdom',
      'focus',
      'resilience',
      'harmony',
      'mindfulness',
      'intuition'
    ]
  }
};

export const PERSONA_IDS = ['tyler', 'mr-robot', 'kei'] as const satisfies readonly PersonaId[];

export function isPersonaId(value: string): value is PersonaId {
  return Object.hasOwn(PERSONAS, value);
}
