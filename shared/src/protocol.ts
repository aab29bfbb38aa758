/**
 * Lesson Pacer Exchange Records
 *
 * Zod schemas for the records exchanged with the collaborators around the
 * scheduler: outcome records from the evaluator, the session selection handed
 * to the exercise generator, and mastery summaries for the dashboard.
 */

import { z } from "zod";

// =============================================================================
// Shared Patterns
// =============================================================================

/**
 * ISO 8601 calendar date (YYYY-MM-DD).
 */
export const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const DateStringSchema = z.string().regex(DATE_PATTERN, "Date must be YYYY-MM-DD format");

// =============================================================================
// Enumerations
// =============================================================================

/**
 * Kind of learning item. Grammar and vocabulary live in separate key spaces.
 */
export const ItemKindSchema = z.enum(["grammar", "vocabulary"]);

/**
 * Categorical mastery level, ordered from least to most mastered.
 */
export const MasteryLevelSchema = z.enum(["new", "learning", "reviewing", "mastered"]);

/**
 * Learner proficiency level used to filter curriculum and vocabulary.
 */
export const LearnerLevelSchema = z.enum(["beginner", "intermediate", "advanced"]);

/**
 * Exercise types produced by the exercise generator.
 */
export const ExerciseTypeSchema = z.enum([
  "multiple_choice",
  "error_correction",
  "fill_in_blank",
  "fill_multiple_blanks",
  "sentence_building",
  "translation",
]);

/**
 * Difficulty tiers, in ascending order of production demand.
 */
export const DifficultyTierSchema = z.enum([
  "recognition",
  "guided_production",
  "structured_production",
  "free_production",
]);

// =============================================================================
// Evaluator -> Scheduler
// =============================================================================

/**
 * One evaluated attempt touching one or more items of the same kind.
 * Ids may be raw or canonical; the scheduler normalizes them.
 */
export const OutcomeRecordSchema = z.object({
  item_ids: z.array(z.string()).min(1, "At least one item id is required"),
  kind: ItemKindSchema.default("grammar"),
  is_correct: z.boolean(),
  exercise_type: ExerciseTypeSchema.optional(),
});

/**
 * A whole evaluated exercise: grammar focus and vocabulary used share one verdict.
 */
export const ExerciseResultSchema = z.object({
  grammar_focus: z.array(z.string()).default([]),
  vocab_used: z.array(z.string()).default([]),
  is_correct: z.boolean(),
  exercise_type: ExerciseTypeSchema.optional(),
  /** Error categories the evaluator found in the answer */
  error_analysis: z.array(z.string()).default([]),
});

// =============================================================================
// Scheduler -> Exercise Generator
// =============================================================================

/**
 * A curriculum grammar point offered as new material.
 */
export const GrammarPointSchema = z.object({
  id: z.string().min(1, "Grammar point id is required"),
  description: z.string(),
  level: LearnerLevelSchema,
  learning_order: z.number().int().min(0),
});

/**
 * Items selected for one session.
 */
export const SessionSelectionSchema = z.object({
  review_grammar: z.array(z.string()),
  review_vocab: z.array(z.string()),
  new_grammar: z.array(GrammarPointSchema),
  new_vocab: z.array(z.string()),
});

// =============================================================================
// Scheduler -> Dashboard
// =============================================================================

/**
 * Per-item mastery summary.
 */
export const MasterySummarySchema = z.object({
  id: z.string(),
  kind: ItemKindSchema,
  mastery: MasteryLevelSchema,
  repetitions: z.number().int().min(0),
  lapses: z.number().int().min(0),
  consecutive_correct: z.number().int().min(0),
  total_attempts: z.number().int().min(0),
  recent_accuracy: z.number().min(0).max(1),
  next_review_date: DateStringSchema,
  mastery_date: DateStringSchema.nullable(),
  due: z.boolean(),
});

/**
 * End-of-session report.
 */
export const SessionSummarySchema = z.object({
  date: DateStringSchema,
  total_exercises: z.number().int().min(0),
  correct_exercises: z.number().int().min(0),
  /** Percentage with one decimal, 0 when no exercises were recorded */
  accuracy_rate: z.number().min(0).max(100),
  /** Ids that reached Mastered during the session */
  promotions: z.array(z.string()),
  /** Ids first seen during the session */
  introduced: z.array(z.string()),
  /** Most frequent error categories, most frequent first */
  main_errors: z.array(z.string()).max(3),
});

/**
 * Progress of one tier of a grammar point.
 */
export const TierSummarySchema = z.object({
  tier: DifficultyTierSchema,
  mastered: z.boolean(),
  repetitions: z.number().int().min(0),
  recent_accuracy: z.number().min(0).max(1),
  consecutive_correct: z.number().int().min(0),
});

/**
 * Difficulty progression of one grammar point.
 */
export const DifficultySummarySchema = z.object({
  grammar_id: z.string(),
  current_max_tier: DifficultyTierSchema,
  unlocked_tiers: z.array(DifficultyTierSchema),
  tiers: z.array(TierSummarySchema),
  can_unlock_next: z.boolean(),
});

// =============================================================================
// Type Exports
// =============================================================================

export type ItemKind = z.infer<typeof ItemKindSchema>;
export type MasteryLevel = z.infer<typeof MasteryLevelSchema>;
export type LearnerLevel = z.infer<typeof LearnerLevelSchema>;
export type ExerciseType = z.infer<typeof ExerciseTypeSchema>;
export type DifficultyTier = z.infer<typeof DifficultyTierSchema>;
export type OutcomeRecord = z.infer<typeof OutcomeRecordSchema>;
export type ExerciseResult = z.infer<typeof ExerciseResultSchema>;
export type GrammarPoint = z.infer<typeof GrammarPointSchema>;
export type SessionSelection = z.infer<typeof SessionSelectionSchema>;
export type MasterySummary = z.infer<typeof MasterySummarySchema>;
export type SessionSummary = z.infer<typeof SessionSummarySchema>;
export type TierSummary = z.infer<typeof TierSummarySchema>;
export type DifficultySummary = z.infer<typeof DifficultySummarySchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Safely parse an outcome record from an external evaluator.
 */
export function safeParseOutcomeRecord(data: unknown) {
  return OutcomeRecordSchema.safeParse(data);
}

/**
 * Safely parse an exercise result from an external evaluator.
 */
export function safeParseExerciseResult(data: unknown) {
  return ExerciseResultSchema.safeParse(data);
}

/**
 * Format a Zod validation error into a human-readable message.
 */
export function formatValidationError(error: z.ZodError, subject = "record"): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `  - ${path}: ${issue.message}`;
  });
  return `Invalid ${subject}:\n` + issues.join("\n");
}
