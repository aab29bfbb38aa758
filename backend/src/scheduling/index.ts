/**
 * Scheduling Module
 *
 * Re-exports from scheduling submodules for convenient access.
 */

// Session controller (main API)
export {
  SessionController,
  accuracyRate,
  mainErrors,
  type SessionControllerOptions,
} from "./session-controller.js";

// Profile transforms
export {
  recordOutcome,
  recordExerciseResult,
  applyAttempt,
  finishSession,
  summarizeMastery,
  summarizeDifficulty,
  recommendExercise,
  type OutcomeUpdate,
  type RecordOutcomeResult,
  type SessionStats,
} from "./profile-manager.js";

// Planner and gate
export {
  selectSessionItems,
  partitionDueGrammar,
  dueVocabulary,
  classifyUrgency,
  compareByDueDate,
  type UrgencyTier,
  type DueGrammarPartition,
} from "./session-planner.js";
export {
  evaluateReadiness,
  corpusPolicy,
  isNewContentAllowed,
  inConsolidationWindow,
  meetsSingleItemBar,
  type ReadinessDecision,
  type ReadinessReason,
  type ReadinessCounts,
} from "./readiness-gate.js";

// SRS engine
export {
  applyOutcome,
  repairItem,
  findRepairReasons,
  isValidItemState,
  requiredStreak,
  tableInterval,
  growInterval,
  intervalForLevel,
  calculateRecentAccuracy,
  type RepairReason,
  type RepairResult,
} from "./srs-algorithm.js";

// Mastery
export {
  classifyMastery,
  isStruggling,
  exposuresOf,
  masteryRank,
  createDefaultMasteryThresholds,
  MasteryThresholdsSchema,
  MASTERY_ORDER,
  type MasteryThresholds,
} from "./mastery.js";

// Difficulty progression
export {
  DIFFICULTY_TIERS,
  difficultyForExerciseType,
  exerciseTypesForTier,
  exerciseTypeFor,
  createDifficultyProgress,
  recordTierAttempt,
  refreshUnlocks,
  canUnlockNextTier,
  selectDifficulty,
  unlockedTiers,
  type DifficultyProgress,
} from "./difficulty-progression.js";

// Items and dates
export {
  LearningItemSchema,
  StoredItemSchema,
  createLearningItem,
  fromStoredItem,
  formatDate,
  parseDate,
  getToday,
  addDays,
  daysBetween,
  isDue,
  type LearningItem,
  type StoredItem,
} from "./item-schema.js";

// Ids
export {
  normalizeItemId,
  renormalizeKeys,
  type MergeEvent,
  type RenormalizeResult,
} from "./id-normalizer.js";

// Profile storage
export {
  createDefaultProfile,
  createDefaultPreferences,
  LearningPreferencesSchema,
  type Profile,
  type LearningPreferences,
  type SessionTracking,
} from "./profile-schema.js";
export {
  loadProfile,
  saveProfile,
  parseProfile,
  serializeProfile,
  getProfilePath,
  type ParsedProfile,
  type RepairEvent,
} from "./profile-storage.js";

// Config
export {
  SchedulerConfigSchema,
  DEFAULT_SCHEDULER_CONFIG,
  createSchedulerConfig,
  loadSchedulerConfig,
  saveSchedulerConfig,
  getConfigFilePath,
  type SchedulerConfig,
  type SchedulerConfigInput,
} from "./scheduler-config.js";
