/**
 * Readiness Gate
 *
 * Decides whether new material may be introduced, from the state of the
 * learner's known grammar. The policy scales with corpus size:
 *
 * - no known items: allowed (bootstrap)
 * - one item: it must clear a strict single-item bar
 * - small corpus: nothing struggling and most items mastered
 * - larger corpus: struggling and unmastered counts within proportional limits
 *
 * Two overrides apply first and block regardless of mastery: the
 * consolidation window after an introduction, and any struggling item, due or
 * not. Every check must pass for new content to be allowed.
 */

import type { LearningItem } from "./item-schema.js";
import { classifyMastery, exposuresOf, isStruggling } from "./mastery.js";
import { plannerLog as log } from "../logger.js";
import type { Profile } from "./profile-schema.js";
import {
  DEFAULT_SCHEDULER_CONFIG,
  type ReadinessConfig,
  type SchedulerConfig,
} from "./scheduler-config.js";

// =============================================================================
// Types
// =============================================================================

export type ReadinessReason =
  | "consolidation_window"
  | "urgent_items"
  | "bootstrap"
  | "single_item_ready"
  | "single_item_not_ready"
  | "small_corpus_ready"
  | "small_corpus_struggling"
  | "small_corpus_unmastered"
  | "proportional_ready"
  | "too_many_struggling"
  | "too_many_unmastered";

/**
 * Aggregate counts over known grammar items.
 */
export interface ReadinessCounts {
  total: number;
  mastered: number;
  unmastered: number;
  struggling: number;
}

export interface ReadinessDecision {
  allowed: boolean;
  reason: ReadinessReason;
  counts: ReadinessCounts;
  /** Struggling grammar items, sorted by id */
  urgentItems: string[];
}

// =============================================================================
// Checks
// =============================================================================

/**
 * Whether the consolidation window is still open. A profile that never
 * introduced new content has no window.
 */
export function inConsolidationWindow(profile: Profile): boolean {
  const since = profile.session_tracking.sessions_since_new_content;
  if (since === null) {
    return false;
  }
  return since < profile.learning_preferences.consolidation_sessions;
}

/**
 * Whether a lone known item clears the single-item bar.
 */
export function meetsSingleItemBar(item: LearningItem, readiness: ReadinessConfig): boolean {
  const bar = readiness.singleItem;
  return (
    exposuresOf(item) >= bar.minExposures &&
    item.consecutive_correct >= bar.minConsecutiveCorrect &&
    item.recent_accuracy >= bar.minAccuracy &&
    item.total_attempts >= bar.minTotalAttempts &&
    item.repetitions >= bar.minRepetitions
  );
}

function countItems(
  items: LearningItem[],
  profile: Profile,
  config: SchedulerConfig
): ReadinessCounts {
  const thresholds = profile.learning_preferences.mastery_thresholds;
  let mastered = 0;
  let struggling = 0;
  for (const item of items) {
    if (classifyMastery(item, thresholds) === "mastered") mastered++;
    if (isStruggling(item, config.struggling)) struggling++;
  }
  return { total: items.length, mastered, unmastered: items.length - mastered, struggling };
}

/**
 * Corpus-size policy alone, without the overrides.
 */
export function corpusPolicy(
  profile: Profile,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG
): { allowed: boolean; reason: ReadinessReason; counts: ReadinessCounts } {
  const items = Object.values(profile.grammar_summary);
  const counts = countItems(items, profile, config);
  return { ...corpusDecision(items, counts, config.readiness), counts };
}

function corpusDecision(
  items: LearningItem[],
  counts: ReadinessCounts,
  readiness: ReadinessConfig
): { allowed: boolean; reason: ReadinessReason } {
  if (counts.total === 0) {
    return { allowed: true, reason: "bootstrap" };
  }

  if (counts.total === 1) {
    return meetsSingleItemBar(items[0], readiness)
      ? { allowed: true, reason: "single_item_ready" }
      : { allowed: false, reason: "single_item_not_ready" };
  }

  if (counts.total <= readiness.smallCorpusMax) {
    if (counts.struggling > 0) {
      return { allowed: false, reason: "small_corpus_struggling" };
    }
    if (counts.mastered < readiness.smallCorpusMasteredRatio * counts.total) {
      return { allowed: false, reason: "small_corpus_unmastered" };
    }
    return { allowed: true, reason: "small_corpus_ready" };
  }

  if (counts.struggling * readiness.strugglingDivisor > counts.total) {
    return { allowed: false, reason: "too_many_struggling" };
  }
  if (counts.unmastered * readiness.unmasteredDivisor > counts.total) {
    return { allowed: false, reason: "too_many_unmastered" };
  }
  return { allowed: true, reason: "proportional_ready" };
}

// =============================================================================
// Gate
// =============================================================================

/**
 * Evaluate the gate over the profile's grammar items.
 */
export function evaluateReadiness(
  profile: Profile,
  today: string,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG
): ReadinessDecision {
  const policy = corpusPolicy(profile, config);
  const urgentItems = Object.values(profile.grammar_summary)
    .filter((item) => isStruggling(item, config.struggling))
    .map((item) => item.id)
    .sort();

  if (inConsolidationWindow(profile)) {
    return { allowed: false, reason: "consolidation_window", counts: policy.counts, urgentItems };
  }
  if (urgentItems.length > 0) {
    log.debug(`Readiness on ${today}: struggling ${urgentItems.join(", ")}`);
    return { allowed: false, reason: "urgent_items", counts: policy.counts, urgentItems };
  }

  return { ...policy, urgentItems };
}

/**
 * Whether new content may be introduced today.
 */
export function isNewContentAllowed(
  profile: Profile,
  today: string,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG
): boolean {
  return evaluateReadiness(profile, today, config).allowed;
}
