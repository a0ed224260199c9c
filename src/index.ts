import { CFG } from './config.js';
import { FileRecordStore } from './persistence/store.js';

export { CFG };
export * from './models.js';
export { PERSONAS, PERSONA_IDS, isPersonaId } from './content/personas.js';
export { loadXpRules, loadSynergyRules } from './content/rulesLoader.js';
export { FileRecordStore, type RecordStore } from './persistence/store.js';
export { MemoryRecordStore } from './persistence/memoryStore.js';
export {
  applyMissionOutcome,
  processDailyCheckin,
  recomputeSynergy,
  applyMissedCheckinPenaltyIfDue,
  type CheckinSummary,
  type MissionOutcome,
  type MissionOutcomeResult,
} from './engine/orchestrator.js';
export { applyDelta } from './engine/stats.js';
export { readHistory, historyFor } from './systems/history.js';
export { loadCharacter, loadCheckin, loadSynergy } from './persistence/records.js';
export {
  createMission,
  updateMissionProgress,
  completeMission,
  failMission,
  setMissionStatus,
  deleteMission,
  type NewMissionInput,
} from './systems/missions.js';
export {
  TrackerError,
  ValidationError,
  MissingRecordError,
  MalformedRecordError,
  formatErrorForUser,
} from './utils/errorhandler.js';

export function openDataStore(root: string = CFG.dataRoot): FileRecordStore {
  return new FileRecordStore(root);
}
