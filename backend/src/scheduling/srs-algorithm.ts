/**
 * Paced SRS Algorithm
 *
 * Pure functions that update one item's scheduling state after an evaluated
 * attempt. The update is an SM-2 variant tuned for beginners:
 *
 * - a success only advances the level once the item has a streak of
 *   successes at its current level (longer streaks at low levels)
 * - inside the fixed-interval table the interval is read from the table
 * - beyond it, growth uses a capped ease and never exceeds 1.5x per step
 * - a failure drops a few levels instead of resetting to zero
 *
 * repairItem restores invariants on state written by earlier versions.
 */

import { addDays, daysBetween, type LearningItem } from "./item-schema.js";
import { DEFAULT_SCHEDULER_CONFIG, type SrsConfig } from "./scheduler-config.js";

// =============================================================================
// Level Tables
// =============================================================================

/**
 * Successes in a row required before an item at `repetitions` may advance.
 */
export function requiredStreak(repetitions: number, srs: SrsConfig): number {
  for (const requirement of srs.streakRequirements) {
    if (repetitions < requirement.belowLevel) {
      return requirement.streak;
    }
  }
  return srs.baselineStreak;
}

/**
 * Fixed-table interval for a level. Levels past the table use its last entry.
 */
export function tableInterval(repetitions: number, srs: SrsConfig): number {
  const table = srs.fixedIntervals;
  const index = Math.min(Math.max(0, repetitions), table.length - 1);
  return clampInterval(table[index], srs);
}

/**
 * Grow an interval by one advancement beyond the fixed table. Rounds down so
 * the 1.5x cap holds on whole days.
 */
export function growInterval(previous: number, easeFactor: number, srs: SrsConfig): number {
  const effectiveEase = Math.min(easeFactor, srs.growthEaseCap);
  const grown = Math.min(
    previous * effectiveEase,
    previous * srs.maxGrowthMultiplier,
    srs.maxIntervalDays
  );
  return clampInterval(Math.floor(grown), srs);
}

/**
 * Deterministic interval for a level, used when stored state must be rebuilt.
 * Walks the growth rule from the end of the table at the default ease.
 */
export function intervalForLevel(repetitions: number, srs: SrsConfig): number {
  const table = srs.fixedIntervals;
  if (repetitions < table.length) {
    return tableInterval(repetitions, srs);
  }

  let interval = tableInterval(table.length - 1, srs);
  for (let level = table.length; level <= repetitions; level++) {
    if (interval >= srs.maxIntervalDays) {
      break;
    }
    const grown = growInterval(interval, srs.defaultEase, srs);
    // Growth that rounds back to the same interval never moves again
    if (grown === interval) {
      break;
    }
    interval = grown;
  }
  return interval;
}

// =============================================================================
// Ease Adjustments
// =============================================================================

/**
 * Ease penalty for a failure, given the lapse count after the failure.
 */
export function lapsePenalty(lapses: number, srs: SrsConfig): number {
  const escalation = Math.max(0, lapses - srs.lapsePenaltyEscalateAfter) * srs.lapsePenaltyStep;
  return Math.min(srs.maxLapsePenalty, srs.lapsePenalty + escalation);
}

/**
 * SM-2 response quality (3-5) for a success, from recent accuracy.
 */
export function successQuality(recentAccuracy: number): number {
  if (recentAccuracy >= 0.9) return 5;
  if (recentAccuracy >= 0.7) return 4;
  return 3;
}

/**
 * SM-2 ease delta: EF' = EF + (0.1 - (5 - q) * (0.08 + (5 - q) * 0.02)).
 * Gives +0.10 for q=5, 0 for q=4 and -0.14 for q=3.
 */
export function easeDelta(quality: number): number {
  const miss = 5 - quality;
  return 0.1 - miss * (0.08 + miss * 0.02);
}

/**
 * Clamp ease factor to [minEase, maxEase], rounded to two decimals.
 */
export function clampEase(easeFactor: number, srs: SrsConfig): number {
  const clamped = Math.max(srs.minEase, Math.min(srs.maxEase, easeFactor));
  return Math.round(clamped * 100) / 100;
}

/**
 * Clamp an interval to [1, maxIntervalDays].
 */
export function clampInterval(days: number, srs: SrsConfig): number {
  return Math.max(1, Math.min(srs.maxIntervalDays, Math.round(days)));
}

/**
 * Recent accuracy: current correct streak over the recent attempt window.
 */
export function calculateRecentAccuracy(
  consecutiveCorrect: number,
  totalAttempts: number,
  window: number
): number {
  const attempts = Math.min(totalAttempts, window);
  if (attempts <= 0) {
    return 0;
  }
  return Math.min(1, consecutiveCorrect / attempts);
}

// =============================================================================
// Core Algorithm
// =============================================================================

type ScheduleFields = Pick<
  LearningItem,
  "repetitions" | "interval_days" | "ease_factor" | "lapses" | "success_streak"
>;

/**
 * Apply one evaluated attempt to an item.
 *
 * Does not mutate the input; returns the updated item with
 * `next_review_date = today + interval_days`.
 *
 * @param item - Current item state
 * @param correct - Whether the attempt was judged correct
 * @param today - Today's date in YYYY-MM-DD format
 */
export function applyOutcome(
  item: LearningItem,
  correct: boolean,
  today: string,
  srs: SrsConfig = DEFAULT_SCHEDULER_CONFIG.srs
): LearningItem {
  const totalAttempts = item.total_attempts + 1;
  const consecutiveCorrect = correct ? item.consecutive_correct + 1 : 0;
  const successStreak = correct ? item.success_streak + 1 : 0;
  const recentAccuracy = calculateRecentAccuracy(
    consecutiveCorrect,
    totalAttempts,
    srs.accuracyWindow
  );

  const schedule = correct
    ? scheduleSuccess(item, successStreak, recentAccuracy, srs)
    : scheduleFailure(item, srs);

  return {
    ...item,
    ...schedule,
    total_attempts: totalAttempts,
    consecutive_correct: consecutiveCorrect,
    recent_accuracy: recentAccuracy,
    srs_level: schedule.repetitions,
    last_reviewed_date: today,
    next_review_date: addDays(today, schedule.interval_days),
  };
}

/**
 * Failure: drop back a few levels, take that level's table interval, record
 * the lapse and lower ease by an escalating penalty.
 */
function scheduleFailure(item: LearningItem, srs: SrsConfig): ScheduleFields {
  const repetitions = Math.max(0, item.repetitions - srs.failureResetSteps);
  const lapses = item.lapses + 1;
  const currentEase = clampEase(item.ease_factor, srs);

  return {
    repetitions,
    interval_days: tableInterval(repetitions, srs),
    ease_factor: clampEase(currentEase - lapsePenalty(lapses, srs), srs),
    lapses,
    success_streak: 0,
  };
}

/**
 * Success: advance one level only when the streak requirement is met.
 * Otherwise the same interval is repeated for more practice at that spacing.
 */
function scheduleSuccess(
  item: LearningItem,
  successStreak: number,
  recentAccuracy: number,
  srs: SrsConfig
): ScheduleFields {
  const currentEase = clampEase(item.ease_factor, srs);

  if (successStreak < requiredStreak(item.repetitions, srs)) {
    return {
      repetitions: item.repetitions,
      interval_days: clampInterval(item.interval_days, srs),
      ease_factor: currentEase,
      lapses: item.lapses,
      success_streak: successStreak,
    };
  }

  const repetitions = item.repetitions + 1;
  const interval =
    repetitions < srs.fixedIntervals.length
      ? tableInterval(repetitions, srs)
      : growInterval(clampInterval(item.interval_days, srs), currentEase, srs);

  return {
    repetitions,
    interval_days: interval,
    ease_factor: clampEase(currentEase + easeDelta(successQuality(recentAccuracy)), srs),
    lapses: item.lapses,
    success_streak: 0,
  };
}

// =============================================================================
// Repair
// =============================================================================

export type RepairReason =
  | "interval_above_max"
  | "interval_below_min"
  | "ease_above_max"
  | "ease_below_min"
  | "review_beyond_horizon"
  | "last_review_in_future"
  | "review_date_inconsistent";

/**
 * Reasons that force the interval to be rebuilt from the repetition level.
 */
const REBUILD_REASONS: ReadonlySet<RepairReason> = new Set<RepairReason>([
  "interval_above_max",
  "interval_below_min",
  "ease_above_max",
  "review_beyond_horizon",
]);

/**
 * List the invariant violations of an item. Empty when the item is healthy.
 */
export function findRepairReasons(
  item: LearningItem,
  today: string,
  srs: SrsConfig
): RepairReason[] {
  const reasons: RepairReason[] = [];

  if (item.interval_days > srs.maxIntervalDays) reasons.push("interval_above_max");
  if (item.interval_days < 1 || !Number.isInteger(item.interval_days)) {
    reasons.push("interval_below_min");
  }
  if (item.ease_factor > srs.maxEase) reasons.push("ease_above_max");
  if (item.ease_factor < srs.minEase) reasons.push("ease_below_min");
  if (daysBetween(today, item.next_review_date) > srs.repairHorizonDays) {
    reasons.push("review_beyond_horizon");
  }
  if (item.last_reviewed_date > today) reasons.push("last_review_in_future");
  if (addDays(item.last_reviewed_date, item.interval_days) !== item.next_review_date) {
    reasons.push("review_date_inconsistent");
  }

  return reasons;
}

/**
 * Result of a repair pass over one item.
 */
export interface RepairResult {
  item: LearningItem;
  reasons: RepairReason[];
}

/**
 * Restore invariants on an item.
 *
 * Oversized intervals, excessive ease and far-future reviews are rebuilt from
 * the repetition level; ease is clamped; a future last-review date becomes
 * today; next review is recomputed as last review + interval.
 */
export function repairItem(
  item: LearningItem,
  today: string,
  srs: SrsConfig = DEFAULT_SCHEDULER_CONFIG.srs
): RepairResult {
  const reasons = findRepairReasons(item, today, srs);
  if (reasons.length === 0 && item.srs_level === item.repetitions) {
    return { item, reasons };
  }

  const rebuild = reasons.some((reason) => REBUILD_REASONS.has(reason));
  const interval = rebuild
    ? intervalForLevel(item.repetitions, srs)
    : clampInterval(item.interval_days, srs);
  const lastReviewed = item.last_reviewed_date > today ? today : item.last_reviewed_date;

  return {
    item: {
      ...item,
      interval_days: interval,
      ease_factor: clampEase(item.ease_factor, srs),
      srs_level: item.repetitions,
      last_reviewed_date: lastReviewed,
      next_review_date: addDays(lastReviewed, interval),
    },
    reasons,
  };
}

/**
 * Check that an item satisfies the scheduling invariants.
 */
export function isValidItemState(item: LearningItem, srs: SrsConfig): boolean {
  return (
    Number.isInteger(item.interval_days) &&
    item.interval_days >= 1 &&
    item.interval_days <= srs.maxIntervalDays &&
    item.ease_factor >= srs.minEase &&
    item.ease_factor <= srs.maxEase &&
    Number.isInteger(item.repetitions) &&
    item.repetitions >= 0 &&
    addDays(item.last_reviewed_date, item.interval_days) === item.next_review_date
  );
}
