import 'dotenv/config';

export const CFG = {
  dataRoot: process.env.TRACKER_DATA_ROOT || './gamification',
  logLevel: process.env.LOG_LEVEL || 'INFO',
  xpRulesKey: 'configs/xp-rules',
  synergyRulesKey: 'configs/synergy-rules',
};

if (!CFG.dataRoot.trim()) throw new Error('TRACKER_DATA_ROOT must not be empty');
