/**
 * Difficulty Progression
 *
 * Exercise types map onto four difficulty tiers. Each grammar point keeps a
 * separate scheduling record per tier, and the next tier unlocks once the
 * current top tier is mastered and has stayed mastered for a short delay.
 */

import { z } from "zod";
import {
  DifficultyTierSchema,
  ExerciseTypeSchema,
  type DifficultyTier,
  type ExerciseType,
} from "@lesson-pacer/shared";
import {
  StoredItemSchema,
  createLearningItem,
  daysBetween,
  fromStoredItem,
  isDue,
  type LearningItem,
} from "./item-schema.js";
import { applyOutcome, repairItem } from "./srs-algorithm.js";
import { classifyMastery, type MasteryThresholds } from "./mastery.js";
import type { SchedulerConfig } from "./scheduler-config.js";

// =============================================================================
// Tier Mapping
// =============================================================================

/**
 * Tiers in ascending order.
 */
export const DIFFICULTY_TIERS: readonly DifficultyTier[] = DifficultyTierSchema.options;

/**
 * Tier of every exercise type. Exhaustive over the closed enum.
 */
const EXERCISE_TIER: Readonly<Record<ExerciseType, DifficultyTier>> = {
  multiple_choice: "recognition",
  error_correction: "recognition",
  fill_in_blank: "guided_production",
  fill_multiple_blanks: "structured_production",
  sentence_building: "structured_production",
  translation: "free_production",
};

/**
 * Difficulty tier of an exercise type.
 */
export function difficultyForExerciseType(exerciseType: ExerciseType): DifficultyTier {
  return EXERCISE_TIER[exerciseType];
}

/**
 * Exercise types belonging to a tier, in declaration order.
 */
export function exerciseTypesForTier(tier: DifficultyTier): ExerciseType[] {
  return ExerciseTypeSchema.options.filter(
    (type) => EXERCISE_TIER[type] === tier
  );
}

/**
 * Pick an exercise type for a tier, preferring the learner's preferred types.
 */
export function exerciseTypeFor(
  tier: DifficultyTier,
  preferred: readonly ExerciseType[] = []
): ExerciseType {
  const available = exerciseTypesForTier(tier);
  const match = available.find((type) => preferred.includes(type));
  return match ?? available[0];
}

function tierRank(tier: DifficultyTier): number {
  return DIFFICULTY_TIERS.indexOf(tier);
}

// =============================================================================
// Progress Records
// =============================================================================

/**
 * Difficulty progression for one grammar point.
 */
export interface DifficultyProgress {
  /** Highest unlocked tier; every lower tier is unlocked too */
  current_max_tier: DifficultyTier;
  /** Scheduling record per practiced tier */
  tiers: Partial<Record<DifficultyTier, LearningItem>>;
}

/**
 * Lenient schema for progress as found on disk.
 */
export const StoredDifficultyProgressSchema = z.object({
  current_max_tier: DifficultyTierSchema.catch("recognition"),
  tiers: z.record(z.string(), z.unknown()).catch({}),
});

/**
 * Progress for a grammar point that has not been practiced by tier yet.
 */
export function createDifficultyProgress(): DifficultyProgress {
  return { current_max_tier: "recognition", tiers: {} };
}

/**
 * Rebuild progress from stored data, repairing each tier record.
 * Unknown tier names are dropped.
 */
export function fromStoredDifficultyProgress(
  raw: unknown,
  grammarId: string,
  today: string,
  config: SchedulerConfig
): DifficultyProgress {
  const stored = StoredDifficultyProgressSchema.parse(raw ?? {});
  const tiers: Partial<Record<DifficultyTier, LearningItem>> = {};

  for (const [name, record] of Object.entries(stored.tiers)) {
    const tier = DifficultyTierSchema.safeParse(name);
    if (!tier.success) {
      continue;
    }
    const item = fromStoredItem(
      StoredItemSchema.parse(record),
      grammarId,
      "grammar",
      today,
      config.srs
    );
    tiers[tier.data] = repairItem(item, today, config.srs).item;
  }

  return { current_max_tier: stored.current_max_tier, tiers };
}

/**
 * Unlocked tiers, lowest first.
 */
export function unlockedTiers(progress: DifficultyProgress): DifficultyTier[] {
  return DIFFICULTY_TIERS.slice(0, tierRank(progress.current_max_tier) + 1);
}

// =============================================================================
// Progression
// =============================================================================

/**
 * Whether the tier above the current maximum may unlock today.
 */
export function canUnlockNextTier(
  progress: DifficultyProgress,
  today: string,
  thresholds: MasteryThresholds,
  config: SchedulerConfig
): boolean {
  if (tierRank(progress.current_max_tier) >= DIFFICULTY_TIERS.length - 1) {
    return false;
  }

  const record = progress.tiers[progress.current_max_tier];
  if (!record || classifyMastery(record, thresholds) !== "mastered") {
    return false;
  }

  if (record.mastery_date !== null) {
    return daysBetween(record.mastery_date, today) >= config.difficulty.unlockDelayDays;
  }
  return true;
}

/**
 * Unlock tiers while the unlock condition holds. Returns the input when
 * nothing changes.
 */
export function refreshUnlocks(
  progress: DifficultyProgress,
  today: string,
  thresholds: MasteryThresholds,
  config: SchedulerConfig
): DifficultyProgress {
  let current = progress;
  while (canUnlockNextTier(current, today, thresholds, config)) {
    current = {
      ...current,
      current_max_tier: DIFFICULTY_TIERS[tierRank(current.current_max_tier) + 1],
    };
  }
  return current;
}

/**
 * Record one attempt at a tier and unlock further tiers when earned.
 */
export function recordTierAttempt(
  progress: DifficultyProgress,
  grammarId: string,
  exerciseType: ExerciseType,
  correct: boolean,
  today: string,
  thresholds: MasteryThresholds,
  config: SchedulerConfig
): DifficultyProgress {
  const tier = difficultyForExerciseType(exerciseType);
  const existing = progress.tiers[tier] ?? createLearningItem(grammarId, "grammar", today, config.srs);
  const exposed = { ...existing, exposure_count: existing.exposure_count + 1 };
  let updated = applyOutcome(exposed, correct, today, config.srs);

  if (updated.mastery_date === null && classifyMastery(updated, thresholds) === "mastered") {
    updated = { ...updated, mastery_date: today };
  }

  return refreshUnlocks(
    { ...progress, tiers: { ...progress.tiers, [tier]: updated } },
    today,
    thresholds,
    config
  );
}

/**
 * Tier to practice next: the highest unlocked tier that is not yet mastered
 * or is due for review, else the current maximum for maintenance.
 */
export function selectDifficulty(
  progress: DifficultyProgress,
  today: string,
  thresholds: MasteryThresholds
): DifficultyTier {
  const unlocked = unlockedTiers(progress);
  for (let i = unlocked.length - 1; i >= 0; i--) {
    const tier = unlocked[i];
    const record = progress.tiers[tier];
    if (!record || classifyMastery(record, thresholds) !== "mastered") {
      return tier;
    }
    if (isDue(record.next_review_date, today)) {
      return tier;
    }
  }
  return progress.current_max_tier;
}
