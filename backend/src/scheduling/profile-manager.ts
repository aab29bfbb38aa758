/**
 * Profile Manager
 *
 * Pure transforms over a Profile. Each returns a new profile and never
 * mutates its input; persistence is the caller's concern.
 */

import {
  formatValidationError,
  safeParseExerciseResult,
  safeParseOutcomeRecord,
  type DifficultySummary,
  type DifficultyTier,
  type ExerciseType,
  type MasterySummary,
} from "@lesson-pacer/shared";
import { profileLog as log } from "../logger.js";
import { normalizeItemId } from "./id-normalizer.js";
import { createLearningItem, isDue, type LearningItem } from "./item-schema.js";
import { applyOutcome } from "./srs-algorithm.js";
import { classifyMastery, type MasteryThresholds } from "./mastery.js";
import {
  DIFFICULTY_TIERS,
  canUnlockNextTier,
  createDifficultyProgress,
  exerciseTypeFor,
  recordTierAttempt,
  refreshUnlocks,
  selectDifficulty,
  unlockedTiers,
} from "./difficulty-progression.js";
import type { Profile } from "./profile-schema.js";
import { DEFAULT_SCHEDULER_CONFIG, type SchedulerConfig } from "./scheduler-config.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Changes produced by recording outcomes.
 */
export interface OutcomeUpdate {
  profile: Profile;
  /** Verdict that was applied */
  correct: boolean;
  /** Canonical ids whose state changed */
  updated: string[];
  /** Canonical ids seen for the first time */
  created: string[];
  /** Canonical ids that reached Mastered for the first time */
  promoted: string[];
  /** Raw ids with no usable canonical form */
  skipped: string[];
  /** Error categories reported by the evaluator */
  errors: string[];
}

export type RecordOutcomeResult =
  | { success: true; update: OutcomeUpdate }
  | { success: false; error: string };

/**
 * Counters reported when a session ends.
 */
export interface SessionStats {
  /** Whether any new grammar or vocabulary was introduced */
  introducedNewContent: boolean;
  /** Exercises completed in the session */
  exercises: number;
}

// =============================================================================
// Outcome Recording
// =============================================================================

/**
 * Apply one attempt to an item, counting a grammar exposure and stamping
 * the mastery date the first time the item classifies as Mastered.
 */
export function applyAttempt(
  item: LearningItem,
  correct: boolean,
  today: string,
  thresholds: MasteryThresholds,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG
): { item: LearningItem; promoted: boolean } {
  const exposed =
    item.kind === "grammar" ? { ...item, exposure_count: item.exposure_count + 1 } : item;
  const next = applyOutcome(exposed, correct, today, config.srs);

  if (next.mastery_date === null && classifyMastery(next, thresholds) === "mastered") {
    return { item: { ...next, mastery_date: today }, promoted: true };
  }
  return { item: next, promoted: false };
}

/**
 * Record one evaluated attempt from the evaluator.
 *
 * Ids are normalized, duplicates after normalization count once, and missing
 * items are created. Grammar outcomes with an exercise type also advance the
 * difficulty progression of each grammar point.
 */
export function recordOutcome(
  profile: Profile,
  outcome: unknown,
  today: string,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG
): RecordOutcomeResult {
  const parsed = safeParseOutcomeRecord(outcome);
  if (!parsed.success) {
    return { success: false, error: formatValidationError(parsed.error, "outcome record") };
  }

  const { item_ids, kind, is_correct, exercise_type } = parsed.data;
  const thresholds = profile.learning_preferences.mastery_thresholds;
  const items = { ...(kind === "grammar" ? profile.grammar_summary : profile.vocab_summary) };
  let progress = profile.grammar_difficulty_progress;
  const update: Omit<OutcomeUpdate, "profile"> = {
    correct: is_correct,
    updated: [],
    created: [],
    promoted: [],
    skipped: [],
    errors: [],
  };

  for (const rawId of item_ids) {
    const id = normalizeItemId(rawId);
    if (id.length === 0) {
      log.warn(`Skipping ${kind} id "${rawId}": nothing left after normalization`);
      update.skipped.push(rawId);
      continue;
    }
    if (update.updated.includes(id)) {
      continue;
    }

    let current = items[id];
    if (current === undefined) {
      current = createLearningItem(id, kind, today, config.srs);
      update.created.push(id);
    }

    const result = applyAttempt(current, is_correct, today, thresholds, config);
    items[id] = result.item;
    update.updated.push(id);
    if (result.promoted) {
      log.info(`${kind} item "${id}" reached mastered`);
      update.promoted.push(id);
    }

    if (kind === "grammar" && exercise_type !== undefined) {
      progress = {
        ...progress,
        [id]: recordTierAttempt(
          progress[id] ?? createDifficultyProgress(),
          id,
          exercise_type,
          is_correct,
          today,
          thresholds,
          config
        ),
      };
    }
  }

  return {
    success: true,
    update: {
      ...update,
      profile:
        kind === "grammar"
          ? { ...profile, grammar_summary: items, grammar_difficulty_progress: progress }
          : { ...profile, vocab_summary: items },
    },
  };
}

/**
 * Record a whole evaluated exercise. The grammar focus and the vocabulary
 * used share one verdict.
 */
export function recordExerciseResult(
  profile: Profile,
  result: unknown,
  today: string,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG
): RecordOutcomeResult {
  const parsed = safeParseExerciseResult(result);
  if (!parsed.success) {
    return { success: false, error: formatValidationError(parsed.error, "exercise result") };
  }

  const { grammar_focus, vocab_used, is_correct, exercise_type, error_analysis } = parsed.data;
  if (grammar_focus.length === 0 && vocab_used.length === 0) {
    return { success: false, error: "Exercise result names no grammar or vocabulary" };
  }

  let update: OutcomeUpdate = {
    profile,
    correct: is_correct,
    updated: [],
    created: [],
    promoted: [],
    skipped: [],
    errors: error_analysis,
  };
  const outcomes = [
    { item_ids: grammar_focus, kind: "grammar" as const, is_correct, exercise_type },
    { item_ids: vocab_used, kind: "vocabulary" as const, is_correct },
  ];

  for (const outcome of outcomes) {
    if (outcome.item_ids.length === 0) continue;
    const recorded = recordOutcome(update.profile, outcome, today, config);
    if (!recorded.success) {
      return recorded;
    }
    update = {
      profile: recorded.update.profile,
      correct: is_correct,
      updated: [...update.updated, ...recorded.update.updated],
      created: [...update.created, ...recorded.update.created],
      promoted: [...update.promoted, ...recorded.update.promoted],
      skipped: [...update.skipped, ...recorded.update.skipped],
      errors: update.errors,
    };
  }

  return { success: true, update };
}

// =============================================================================
// Session Tracking
// =============================================================================

/**
 * Advance the session counters at the end of a session.
 *
 * Introducing new content restarts the consolidation count; a review-only
 * session extends it. The count stays null until content is first introduced.
 */
export function finishSession(profile: Profile, stats: SessionStats, today: string): Profile {
  const tracking = profile.session_tracking;
  let sinceNew = tracking.sessions_since_new_content;
  if (stats.introducedNewContent) {
    sinceNew = 0;
  } else if (sinceNew !== null) {
    sinceNew += 1;
  }

  return {
    ...profile,
    session_tracking: {
      sessions_completed: tracking.sessions_completed + 1,
      sessions_since_new_content: sinceNew,
      last_session_date: today,
      exercises_completed: tracking.exercises_completed + Math.max(0, stats.exercises),
    },
  };
}

// =============================================================================
// Reporting
// =============================================================================

function summarize(
  item: LearningItem,
  today: string,
  thresholds: MasteryThresholds
): MasterySummary {
  return {
    id: item.id,
    kind: item.kind,
    mastery: classifyMastery(item, thresholds),
    repetitions: item.repetitions,
    lapses: item.lapses,
    consecutive_correct: item.consecutive_correct,
    total_attempts: item.total_attempts,
    recent_accuracy: item.recent_accuracy,
    next_review_date: item.next_review_date,
    mastery_date: item.mastery_date,
    due: isDue(item.next_review_date, today),
  };
}

/**
 * Per-item mastery summaries: grammar first, then vocabulary, each by id.
 */
export function summarizeMastery(profile: Profile, today: string): MasterySummary[] {
  const thresholds = profile.learning_preferences.mastery_thresholds;
  const byId = (a: LearningItem, b: LearningItem) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
  return [
    ...Object.values(profile.grammar_summary).sort(byId),
    ...Object.values(profile.vocab_summary).sort(byId),
  ].map((item) => summarize(item, today, thresholds));
}

/**
 * Difficulty tier and exercise type to use next for a grammar point. Tiers
 * whose unlock delay has passed since the last attempt are unlocked first.
 */
export function recommendExercise(
  profile: Profile,
  grammarId: string,
  today: string,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG
): { tier: DifficultyTier; exercise_type: ExerciseType } {
  const thresholds = profile.learning_preferences.mastery_thresholds;
  const id = normalizeItemId(grammarId);
  const progress = refreshUnlocks(
    profile.grammar_difficulty_progress[id] ?? createDifficultyProgress(),
    today,
    thresholds,
    config
  );
  const tier = selectDifficulty(progress, today, thresholds);
  return {
    tier,
    exercise_type: exerciseTypeFor(tier, profile.learning_preferences.preferred_exercise_types),
  };
}

/**
 * Per-tier progress of one grammar point for the dashboard.
 */
export function summarizeDifficulty(
  profile: Profile,
  grammarId: string,
  today: string,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG
): DifficultySummary {
  const thresholds = profile.learning_preferences.mastery_thresholds;
  const id = normalizeItemId(grammarId);
  const progress = profile.grammar_difficulty_progress[id] ?? createDifficultyProgress();

  return {
    grammar_id: id,
    current_max_tier: progress.current_max_tier,
    unlocked_tiers: unlockedTiers(progress),
    tiers: DIFFICULTY_TIERS.map((tier) => {
      const record = progress.tiers[tier];
      return {
        tier,
        mastered: record !== undefined && classifyMastery(record, thresholds) === "mastered",
        repetitions: record?.repetitions ?? 0,
        recent_accuracy: record?.recent_accuracy ?? 0,
        consecutive_correct: record?.consecutive_correct ?? 0,
      };
    }),
    can_unlock_next: canUnlockNextTier(progress, today, thresholds, config),
  };
}
