/**
 * Lesson Pacer Shared Types and Records
 *
 * This package contains:
 * - Zod schemas for outcome records, session selections and summaries
 * - Collaborator contracts for curriculum and vocabulary sources
 */

export const VERSION = "0.1.0";

// Collaborator contracts
export type { CurriculumSource, VocabularySource, ContentSources } from "./types.js";

// Record schemas
export {
  DATE_PATTERN,
  ItemKindSchema,
  MasteryLevelSchema,
  LearnerLevelSchema,
  ExerciseTypeSchema,
  DifficultyTierSchema,
  OutcomeRecordSchema,
  ExerciseResultSchema,
  GrammarPointSchema,
  SessionSelectionSchema,
  MasterySummarySchema,
  SessionSummarySchema,
  TierSummarySchema,
  DifficultySummarySchema,
  // Validation utilities
  safeParseOutcomeRecord,
  safeParseExerciseResult,
  formatValidationError,
} from "./protocol.js";

export type {
  ItemKind,
  MasteryLevel,
  LearnerLevel,
  ExerciseType,
  DifficultyTier,
  OutcomeRecord,
  ExerciseResult,
  GrammarPoint,
  SessionSelection,
  MasterySummary,
  SessionSummary,
  TierSummary,
  DifficultySummary,
} from "./protocol.js";
