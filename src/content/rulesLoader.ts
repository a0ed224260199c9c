import { CFG } from '../config.js';
import type { SynergyRules, XpRules } from '../models.js';
import type { RecordStore } from '../persistence/store.js';
import { readRecordOrDefault } from '../persistence/records.js';
import { SynergyRulesSchema, XpRulesSchema } from '../persistence/schemas.js';
import { RulesValidator } from '../testing/rulesValidator.js';
import { logger } from '../utils/logger.js';

const validator = new RulesValidator();

export function defaultXpRules(): XpRules {
  return XpRulesSchema.parse({});
}

export function defaultSynergyRules(): SynergyRules {
  return SynergyRulesSchema.parse({});
}

// Rules are re-read on every call so edits to the config files apply to the next operation.
export const loadXpRules = (store: RecordStore): XpRules => {
  const rules = readRecordOrDefault(store, CFG.xpRulesKey, XpRulesSchema);
  if (!rules) {
    logger.warn('XP rules unavailable, using defaults', { key: CFG.xpRulesKey });
    return defaultXpRules();
  }
  const result = validator.validateXpRules(rules);
  for (const issue of result.issues) {
    logger.debug('XP rules issue', { path: issue.path, message: issue.message });
  }
  return rules;
};

export const loadSynergyRules = (store: RecordStore): SynergyRules => {
  const rules = readRecordOrDefault(store, CFG.synergyRulesKey, SynergyRulesSchema);
  if (!rules) {
    logger.warn('Synergy rules unavailable, using defaults', { key: CFG.synergyRulesKey });
    return defaultSynergyRules();
  }
  const result = validator.validateSynergyRules(rules);
  for (const issue of result.issues) {
    logger.debug('Synergy rules issue', { path: issue.path, message: issue.message });
  }
  return rules;
};
