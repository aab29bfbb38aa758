/**
 * Profile Schema
 *
 * One learner's persisted document: item state for grammar and vocabulary,
 * learning preferences and session-tracking counters.
 *
 * The stored schema is lenient. Every field falls back to its default, so a
 * profile written by an earlier version, or edited by hand, always loads.
 */

import { z } from "zod";
import {
  ExerciseTypeSchema,
  LearnerLevelSchema,
  type ExerciseType,
  type LearnerLevel,
} from "@lesson-pacer/shared";
import { MasteryThresholdsSchema } from "./mastery.js";
import type { LearningItem } from "./item-schema.js";
import type { DifficultyProgress } from "./difficulty-progression.js";

// =============================================================================
// Learning Preferences
// =============================================================================

const budget = (fallback: number) => z.number().int().min(0).catch(fallback);

/**
 * Per-learner session budgets and thresholds.
 */
export const LearningPreferencesSchema = z.object({
  /** Grammar reviews per session */
  reviews_per_session: budget(10),
  /** Vocabulary reviews per session */
  vocab_reviews_per_session: budget(10),
  /** Mastered grammar items mixed in for upkeep */
  maintenance_reviews_per_session: budget(2),
  new_grammar_per_session: budget(2),
  new_vocab_per_session: budget(5),
  /** Combined cap on new grammar and new vocabulary */
  max_new_items_per_session: budget(5),
  /** Review-only sessions required after new content is introduced */
  consolidation_sessions: budget(1),
  preferred_exercise_types: z
    .array(ExerciseTypeSchema)
    .catch((): ExerciseType[] => ["fill_in_blank", "translation"]),
  mastery_thresholds: MasteryThresholdsSchema.catch(() => MasteryThresholdsSchema.parse({})),
});

export type LearningPreferences = z.infer<typeof LearningPreferencesSchema>;

// =============================================================================
// Session Tracking
// =============================================================================

export const SessionTrackingSchema = z.object({
  sessions_completed: z.number().int().min(0).catch(0),
  /** Null until new content has been introduced once */
  sessions_since_new_content: z.number().int().min(0).nullable().catch(null),
  last_session_date: z.string().nullable().catch(null),
  exercises_completed: z.number().int().min(0).catch(0),
});

export type SessionTracking = z.infer<typeof SessionTrackingSchema>;

// =============================================================================
// Stored Profile
// =============================================================================

const ItemMapSchema = z.record(z.string(), z.unknown()).catch({});

/**
 * Lenient schema for a profile document as found on disk. Item maps are kept
 * raw here; profile-storage turns them into LearningItems.
 */
export const StoredProfileSchema = z.object({
  user_id: z.string().min(1).catch("user_001"),
  level: LearnerLevelSchema.catch("beginner"),
  learning_preferences: LearningPreferencesSchema.catch(() => LearningPreferencesSchema.parse({})),
  session_tracking: SessionTrackingSchema.catch(() => SessionTrackingSchema.parse({})),
  grammar_summary: ItemMapSchema,
  vocab_summary: ItemMapSchema,
  grammar_difficulty_progress: ItemMapSchema,
});

export type StoredProfile = z.infer<typeof StoredProfileSchema>;

// =============================================================================
// Profile
// =============================================================================

/**
 * In-memory profile. Item maps are keyed by canonical id.
 */
export interface Profile {
  user_id: string;
  level: LearnerLevel;
  learning_preferences: LearningPreferences;
  session_tracking: SessionTracking;
  grammar_summary: Record<string, LearningItem>;
  vocab_summary: Record<string, LearningItem>;
  grammar_difficulty_progress: Record<string, DifficultyProgress>;
}

/**
 * Create the default learning preferences.
 */
export function createDefaultPreferences(): LearningPreferences {
  return LearningPreferencesSchema.parse({});
}

/**
 * Create an empty profile.
 */
export function createDefaultProfile(userId = "user_001", level: LearnerLevel = "beginner"): Profile {
  return {
    user_id: userId,
    level,
    learning_preferences: createDefaultPreferences(),
    session_tracking: SessionTrackingSchema.parse({}),
    grammar_summary: {},
    vocab_summary: {},
    grammar_difficulty_progress: {},
  };
}
