/**
 * Shared fixtures for scheduling tests.
 */

import { addDays, type LearningItem } from "../item-schema.js";
import { createDefaultProfile, type Profile } from "../profile-schema.js";

// Fixed date for deterministic tests
export const TODAY = "2026-01-23";

/**
 * A healthy grammar item seen once, not yet due. Overrides win; the next
 * review date is recomputed from the last review unless given explicitly.
 */
export function makeItem(id: string, overrides: Partial<LearningItem> = {}): LearningItem {
  const lastReviewed = overrides.last_reviewed_date ?? "2026-01-20";
  const interval = overrides.interval_days ?? 5;
  const repetitions = overrides.repetitions ?? 0;
  return {
    id,
    kind: "grammar",
    ease_factor: 2.5,
    interval_days: interval,
    repetitions,
    srs_level: repetitions,
    lapses: 0,
    consecutive_correct: 0,
    success_streak: 0,
    total_attempts: 1,
    recent_accuracy: 1,
    exposure_count: 1,
    first_seen_date: "2026-01-01",
    last_reviewed_date: lastReviewed,
    next_review_date: addDays(lastReviewed, interval),
    mastery_date: null,
    ...overrides,
  };
}

/**
 * An item that classifies as mastered under the default thresholds.
 */
export function makeMastered(id: string, overrides: Partial<LearningItem> = {}): LearningItem {
  return makeItem(id, {
    repetitions: 3,
    consecutive_correct: 3,
    total_attempts: 5,
    exposure_count: 5,
    recent_accuracy: 1,
    mastery_date: "2026-01-10",
    ...overrides,
  });
}

/**
 * An item below the learning thresholds that is not struggling.
 */
export function makeLearning(id: string, overrides: Partial<LearningItem> = {}): LearningItem {
  return makeItem(id, {
    repetitions: 1,
    consecutive_correct: 2,
    total_attempts: 2,
    exposure_count: 2,
    recent_accuracy: 1,
    ...overrides,
  });
}

/**
 * A struggling item (recent accuracy 0.5).
 */
export function makeStruggling(id: string, overrides: Partial<LearningItem> = {}): LearningItem {
  return makeItem(id, {
    repetitions: 1,
    consecutive_correct: 2,
    total_attempts: 4,
    exposure_count: 4,
    recent_accuracy: 0.5,
    ...overrides,
  });
}

/**
 * A default profile holding the given items.
 */
export function makeProfile(
  grammar: LearningItem[] = [],
  vocab: LearningItem[] = [],
  overrides: Partial<Profile> = {}
): Profile {
  const profile = createDefaultProfile();
  return {
    ...profile,
    grammar_summary: Object.fromEntries(grammar.map((item) => [item.id, item])),
    vocab_summary: Object.fromEntries(
      vocab.map((item) => [item.id, { ...item, kind: "vocabulary" as const, exposure_count: 0 }])
    ),
    ...overrides,
  };
}
