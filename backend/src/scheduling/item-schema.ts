/**
 * Learning Item Schema
 *
 * Zod schemas and TypeScript types for per-item scheduling state, plus the
 * calendar-date helpers every scheduling module shares.
 *
 * Two schemas describe an item:
 * - LearningItemSchema: the shape the scheduler works with, invariants included
 * - StoredItemSchema: a lenient reading of whatever a profile file contains,
 *   including field names written by earlier versions. Every field falls back
 *   to a default instead of failing, and the repair pass restores invariants.
 */

import { z } from "zod";
import { DATE_PATTERN, ItemKindSchema, type ItemKind } from "@lesson-pacer/shared";
import type { SrsConfig } from "./scheduler-config.js";

// =============================================================================
// Learning Item Schema
// =============================================================================

const DateSchema = z
  .string()
  .regex(DATE_PATTERN, "Date must be YYYY-MM-DD format")
  .refine((value) => parseDate(value) !== null, "Date must be a real calendar date");

/**
 * Schema for one grammar pattern or vocabulary entry.
 *
 * SRS fields:
 * - ease_factor: growth multiplier, kept within [minEase, maxEase]
 * - interval_days: spacing to the next review, within [1, maxIntervalDays]
 * - repetitions: current SRS level (srs_level mirrors it)
 * - success_streak: successes since the last advancement or failure
 *
 * Lifecycle fields:
 * - first_seen_date: when the item was created
 * - last_reviewed_date / next_review_date: next = last + interval_days
 * - mastery_date: set once, the first time the item classifies as Mastered
 */
export const LearningItemSchema = z.object({
  id: z.string().min(1, "Item id is required"),
  kind: ItemKindSchema,
  ease_factor: z.number(),
  interval_days: z.number().int().min(1),
  repetitions: z.number().int().min(0),
  srs_level: z.number().int().min(0),
  lapses: z.number().int().min(0),
  consecutive_correct: z.number().int().min(0),
  success_streak: z.number().int().min(0),
  total_attempts: z.number().int().min(0),
  recent_accuracy: z.number().min(0).max(1),
  /** Grammar only: every appearance, regardless of correctness */
  exposure_count: z.number().int().min(0),
  first_seen_date: DateSchema,
  last_reviewed_date: DateSchema,
  next_review_date: DateSchema,
  mastery_date: DateSchema.nullable(),
});

export type LearningItem = z.infer<typeof LearningItemSchema>;

// =============================================================================
// Stored Item Schema
// =============================================================================

/**
 * Field names written by earlier profile versions, mapped to current names.
 */
const LEGACY_FIELD_ALIASES: Readonly<Record<string, string>> = {
  reps: "repetitions",
  interval: "interval_days",
  exposure: "exposure_count",
  first_seen: "first_seen_date",
  last_reviewed: "last_reviewed_date",
  recent_correct_streak: "consecutive_correct",
};

const count = () => z.number().int().min(0).catch(0);
const optionalDate = () => DateSchema.nullable().catch(null);

/**
 * Lenient schema for an item as found on disk. Never fails on an object.
 */
export const StoredItemSchema = z.preprocess(
  migrateLegacyFields,
  z.object({
    ease_factor: z.number().finite().nullable().catch(null),
    interval_days: z.number().finite().nullable().catch(null),
    repetitions: count(),
    lapses: count(),
    consecutive_correct: count(),
    success_streak: count(),
    total_attempts: count(),
    recent_accuracy: z.number().min(0).max(1).catch(0),
    exposure_count: count(),
    first_seen_date: optionalDate(),
    last_reviewed_date: optionalDate(),
    next_review_date: optionalDate(),
    mastery_date: optionalDate(),
  })
);

export type StoredItem = z.infer<typeof StoredItemSchema>;

/**
 * Copy legacy field values onto current names. Non-objects become `{}`.
 */
function migrateLegacyFields(raw: unknown): Record<string, unknown> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return {};
  }

  const migrated: Record<string, unknown> = { ...raw };
  for (const [legacy, current] of Object.entries(LEGACY_FIELD_ALIASES)) {
    if (migrated[current] === undefined && migrated[legacy] !== undefined) {
      migrated[current] = migrated[legacy];
    }
    delete migrated[legacy];
  }
  return migrated;
}

/**
 * Turn a stored record into a LearningItem.
 *
 * Fills missing values only; out-of-range values are left for repairItem.
 * When the last review date is missing it is derived from the next review
 * date, and an item with neither date becomes due today.
 */
export function fromStoredItem(
  stored: StoredItem,
  id: string,
  kind: ItemKind,
  today: string,
  srs: SrsConfig
): LearningItem {
  const interval = Math.round(stored.interval_days ?? srs.fixedIntervals[0]);
  const span = Math.min(Math.max(1, interval), srs.maxIntervalDays);

  let lastReviewed = stored.last_reviewed_date;
  let nextReview = stored.next_review_date;
  if (lastReviewed === null && nextReview !== null) {
    lastReviewed = addDays(nextReview, -span);
  } else if (lastReviewed !== null && nextReview === null) {
    nextReview = addDays(lastReviewed, span);
  } else if (lastReviewed === null || nextReview === null) {
    nextReview = today;
    lastReviewed = addDays(today, -span);
  }

  return {
    id,
    kind,
    ease_factor: stored.ease_factor ?? srs.defaultEase,
    interval_days: interval,
    repetitions: stored.repetitions,
    srs_level: stored.repetitions,
    lapses: stored.lapses,
    consecutive_correct: stored.consecutive_correct,
    success_streak: stored.success_streak,
    total_attempts: stored.total_attempts,
    recent_accuracy: stored.recent_accuracy,
    exposure_count: kind === "grammar" ? stored.exposure_count : 0,
    first_seen_date: stored.first_seen_date ?? lastReviewed,
    last_reviewed_date: lastReviewed,
    next_review_date: nextReview,
    mastery_date: stored.mastery_date,
  };
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create scheduling state for an item seen for the first time today.
 * The item starts at level 0 with the first table interval.
 */
export function createLearningItem(
  id: string,
  kind: ItemKind,
  today: string,
  srs: SrsConfig
): LearningItem {
  const interval = srs.fixedIntervals[0];
  return {
    id,
    kind,
    ease_factor: srs.defaultEase,
    interval_days: interval,
    repetitions: 0,
    srs_level: 0,
    lapses: 0,
    consecutive_correct: 0,
    success_streak: 0,
    total_attempts: 0,
    recent_accuracy: 0,
    exposure_count: 0,
    first_seen_date: today,
    last_reviewed_date: today,
    next_review_date: addDays(today, interval),
    mastery_date: null,
  };
}

// =============================================================================
// Date Utilities
// =============================================================================

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Format a Date object to YYYY-MM-DD string.
 */
export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Parse a YYYY-MM-DD string to a Date object.
 * Returns null if the string is invalid.
 */
export function parseDate(dateStr: string): Date | null {
  if (!DATE_PATTERN.test(dateStr)) {
    return null;
  }

  const [year, month, day] = dateStr.split("-").map(Number);
  const date = new Date(year, month - 1, day);

  // Validate the date is real (e.g., not Feb 30)
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day
  ) {
    return null;
  }

  return date;
}

/**
 * Get today's date in YYYY-MM-DD format.
 */
export function getToday(): string {
  return formatDate(new Date());
}

/**
 * Add days to a date string and return the result in YYYY-MM-DD format.
 */
export function addDays(dateStr: string, days: number): string {
  const date = parseDate(dateStr);
  if (!date) {
    throw new Error(`Invalid date: ${dateStr}`);
  }

  date.setDate(date.getDate() + days);
  return formatDate(date);
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: string, to: string): number {
  const start = parseDate(from);
  const end = parseDate(to);
  if (!start || !end) {
    throw new Error(`Invalid date range: ${from} .. ${to}`);
  }

  const startUtc = Date.UTC(start.getFullYear(), start.getMonth(), start.getDate());
  const endUtc = Date.UTC(end.getFullYear(), end.getMonth(), end.getDate());
  return Math.round((endUtc - startUtc) / MS_PER_DAY);
}

/**
 * Check if a date string is on or before today.
 */
export function isDue(nextReview: string, today: string = getToday()): boolean {
  return nextReview <= today;
}
