/**
 * Mastery Classifier
 *
 * Derives a categorical mastery level from an item's metrics:
 *
 * - new: never exposed
 * - learning: too few repetitions, streak or attempts
 * - reviewing: enough practice, but accuracy or streak below the mastery bar
 * - mastered: every threshold met
 *
 * Each level is a conjunction of lower bounds, so improving any input can
 * never lower the result.
 */

import { z } from "zod";
import type { MasteryLevel } from "@lesson-pacer/shared";
import type { LearningItem } from "./item-schema.js";
import type { StrugglingConfig } from "./scheduler-config.js";

// =============================================================================
// Thresholds
// =============================================================================

/**
 * Mastery thresholds, stored in the profile's learning preferences.
 * Missing or invalid values fall back to the defaults.
 */
export const MasteryThresholdsSchema = z.object({
  /** Minimum repetitions to leave Learning */
  min_repetitions: z.number().int().min(0).catch(3),
  /** Minimum current streak to leave Learning */
  min_consecutive_correct: z.number().int().min(0).catch(2),
  /** Minimum attempts to leave Learning */
  min_total_attempts: z.number().int().min(0).catch(5),
  /** Minimum recent accuracy for Mastered */
  mastered_min_accuracy: z.number().min(0).max(1).catch(0.8),
  /** Minimum current streak for Mastered */
  mastered_min_consecutive_correct: z.number().int().min(0).catch(3),
});

export type MasteryThresholds = z.infer<typeof MasteryThresholdsSchema>;

/**
 * Create the default mastery thresholds.
 */
export function createDefaultMasteryThresholds(): MasteryThresholds {
  return MasteryThresholdsSchema.parse({});
}

/**
 * Mastery levels from lowest to highest.
 */
export const MASTERY_ORDER: readonly MasteryLevel[] = ["new", "learning", "reviewing", "mastered"];

/**
 * Rank of a mastery level (0 = new).
 */
export function masteryRank(level: MasteryLevel): number {
  return MASTERY_ORDER.indexOf(level);
}

// =============================================================================
// Classification
// =============================================================================

/**
 * Exposures used for classification. Vocabulary items do not count
 * exposures separately, so every attempt counts as one.
 */
export function exposuresOf(item: LearningItem): number {
  return item.kind === "grammar" ? item.exposure_count : item.total_attempts;
}

/**
 * Classify an item's mastery level.
 */
export function classifyMastery(
  item: LearningItem,
  thresholds: MasteryThresholds = createDefaultMasteryThresholds()
): MasteryLevel {
  if (exposuresOf(item) === 0) {
    return "new";
  }

  if (
    item.repetitions < thresholds.min_repetitions ||
    item.consecutive_correct < thresholds.min_consecutive_correct ||
    item.total_attempts < thresholds.min_total_attempts
  ) {
    return "learning";
  }

  if (
    item.recent_accuracy < thresholds.mastered_min_accuracy ||
    item.consecutive_correct < thresholds.mastered_min_consecutive_correct
  ) {
    return "reviewing";
  }

  return "mastered";
}

/**
 * Whether an item is currently struggling: low recent accuracy, or no
 * current streak after several attempts. Unattempted items never struggle.
 */
export function isStruggling(item: LearningItem, struggling: StrugglingConfig): boolean {
  if (item.total_attempts === 0) {
    return false;
  }
  return (
    item.recent_accuracy < struggling.accuracyBelow ||
    (item.consecutive_correct === 0 && item.total_attempts >= struggling.zeroStreakAfterAttempts)
  );
}
