export type PersonaId = 'tyler' | 'mr-robot' | 'kei';
export type SynergyCategory = 'physical' | 'mental' | 'spiritual';
export type IsoDate = string; // YYYY-MM-DD

export interface XpDetails {
  current_xp: number;
  xp_to_next_level: number | null;
}

export interface HealthDetails {
  current_health: number;
  max_health: number;
}

export interface EnergyDetails {
  current_energy: number;
  max_energy: number;
}

export interface Character {
  name: string;
  role: string;
  level: number;
  title: string;
  xp_details: XpDetails;
  health_details: HealthDetails;
  energy_details: EnergyDetails;
  abilities: Record<string, number>;
}

export interface DeltaRequest {
  xp?: number;
  health?: number;
  energy?: number;
  abilities?: Record<string, number>;
}

export interface DeltaBundle {
  xp: number;
  health: number;
  energy: number;
  abilities: Record<string, number>;
}

export interface CharacterSnapshot {
  level: number;
  title: string;
  xp: number;
  health: number;
  energy: number;
  abilities: Record<string, number>;
}

// ---- rules ----

export interface LevelDef {
  xp_to_next_level: number | null;
  title: string;
}

export interface OverflowPolicy {
  overflow_reset_percentage: number;
  overflow_bonus_to_other_stat: number;
}

export interface HabitReward {
  xp_per_success: number;
}

export interface StreakMilestone {
  xp_bonus: number;
  label?: string;
}

export interface MissedCheckinPolicy {
  threshold_days: number;
  xp: number;
  health: number;
  energy: number;
  ability_percentage: number;
}

export interface XpRules {
  levels: Record<string, LevelDef>;
  health_energy_overflow: OverflowPolicy;
  habit_rewards: Record<string, HabitReward>;
  streak_milestones: Record<string, StreakMilestone>;
  missed_checkin_penalty: MissedCheckinPolicy;
}

export interface SynergyLevelDef {
  xp_to_next_level: number | null;
  chapter: string;
  description: string;
}

export interface SynergyRules {
  levels: Record<string, SynergyLevelDef>;
}

// ---- history ----

export type HistoryEvent =
  | 'mission-completed'
  | 'mission-failed'
  | 'habit-reward'
  | 'streak-milestone'
  | 'missed-checkin-penalty';

export interface HistoryEntry {
  history_index: number;
  persona: PersonaId;
  event: HistoryEvent;
  delta: DeltaBundle;
  snapshot: CharacterSnapshot;
  date: IsoDate;
  mission?: string;
  rewards_unlocked?: string[];
  habit?: string;
  streak?: number;
  days_missed?: number | null;
}

export type NewHistoryEntry = Omit<HistoryEntry, 'history_index'>;

// ---- habits / check-ins ----

export type HabitOutcome = 'success' | 'failed';

export interface HabitStreakState {
  streak: number;
  best_streak: number;
  total_success: number;
  total_failure: number;
}

export interface CheckinRecord {
  date: IsoDate;
  mood?: string;
  sleep_hours?: number;
  notes?: string;
  habits: Record<string, HabitOutcome>;
}

export interface MilestoneHit {
  habit: string;
  streak: number;
  xp_bonus: number;
  label?: string;
}

export interface DailyProgress {
  checkin_streak: number;
  total_checkins: number;
  last_checkin_date: IsoDate | null;
  last_penalty_date: IsoDate | null;
  habits: Record<string, HabitStreakState>;
}

// ---- missions / rewards ----

export type MissionStatus = 'not-started' | 'in-progress' | 'completed' | 'failed';
export type MissionDifficulty = 'easy' | 'medium' | 'hard';

export interface MissionRewardLink {
  reward_id: string;
  title: string;
  reward_type: string;
}

export interface Mission {
  archetype: PersonaId;
  mission_code: string;
  title: string;
  description: string;
  difficulty: MissionDifficulty;
  status?: MissionStatus;
  progress: { current: number; total: number };
  archetype_stat_change: {
    on_complete: DeltaRequest;
    on_failure: DeltaRequest;
  };
  reward: MissionRewardLink[];
  mission_icon?: string;
  start_date: IsoDate;
  due_date: IsoDate | null;
  completion_date: IsoDate | null;
}

export interface Reward {
  reward_id: string;
  title: string;
  description: string;
  associated_mission_ids: string[];
  reward_type: string;
  is_locked: boolean;
  badge_icon?: string;
}

// ---- synergy ----

export interface MissionCounts {
  total: number;
  not_started: number;
  in_progress: number;
  completed: number;
  failed: number;
}

export interface RewardCounts {
  total: number;
  locked: number;
  unlocked: number;
}

export interface SynergySummary {
  total_xp: number;
  level: number;
  chapter: string;
  description: string;
  xp_into_level: number;
  xp_to_next_level: number | null;
  categories: Record<SynergyCategory, number>;
  total_synergy: number;
  missions: MissionCounts;
  rewards: RewardCounts;
  daily_progress: DailyProgress;
}
