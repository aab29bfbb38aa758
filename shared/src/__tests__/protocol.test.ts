/**
 * Protocol Schema Tests
 *
 * Tests for validation of the records exchanged with the evaluator,
 * the exercise generator and the dashboard.
 */

import { describe, test, expect } from "vitest";
import {
  DATE_PATTERN,
  DifficultyTierSchema,
  ExerciseResultSchema,
  GrammarPointSchema,
  MasterySummarySchema,
  OutcomeRecordSchema,
  SessionSelectionSchema,
  SessionSummarySchema,
  DifficultySummarySchema,
  formatValidationError,
  safeParseExerciseResult,
  safeParseOutcomeRecord,
} from "../protocol.js";

// =============================================================================
// OutcomeRecord Schema Tests
// =============================================================================

describe("OutcomeRecordSchema", () => {
  test("defaults the kind to grammar", () => {
    const record = OutcomeRecordSchema.parse({ item_ids: ["은/는"], is_correct: true });
    expect(record).toEqual({ item_ids: ["은/는"], kind: "grammar", is_correct: true });
  });

  test("accepts vocabulary records with an exercise type", () => {
    const result = safeParseOutcomeRecord({
      item_ids: ["학교"],
      kind: "vocabulary",
      is_correct: false,
      exercise_type: "translation",
    });
    expect(result.success).toBe(true);
  });

  test("rejects an empty id list", () => {
    expect(safeParseOutcomeRecord({ item_ids: [], is_correct: true }).success).toBe(false);
  });

  test("rejects an unknown kind or exercise type", () => {
    expect(
      safeParseOutcomeRecord({ item_ids: ["a"], kind: "idiom", is_correct: true }).success
    ).toBe(false);
    expect(
      safeParseOutcomeRecord({ item_ids: ["a"], is_correct: true, exercise_type: "essay" }).success
    ).toBe(false);
  });

  test("rejects a verdict that is not a boolean", () => {
    expect(safeParseOutcomeRecord({ item_ids: ["a"], is_correct: "yes" }).success).toBe(false);
  });
});

// =============================================================================
// ExerciseResult Schema Tests
// =============================================================================

describe("ExerciseResultSchema", () => {
  test("defaults the id and error lists to empty", () => {
    expect(ExerciseResultSchema.parse({ is_correct: true })).toEqual({
      grammar_focus: [],
      vocab_used: [],
      is_correct: true,
      error_analysis: [],
    });
  });

  test("keeps the evaluator's error categories", () => {
    const result = ExerciseResultSchema.parse({
      grammar_focus: ["은/는"],
      is_correct: false,
      error_analysis: ["particle_choice"],
    });
    expect(result.error_analysis).toEqual(["particle_choice"]);
  });

  test("rejects a result without a verdict", () => {
    expect(safeParseExerciseResult({ grammar_focus: ["은/는"] }).success).toBe(false);
  });
});

// =============================================================================
// Outbound Records
// =============================================================================

describe("SessionSelectionSchema", () => {
  test("accepts a selection with new grammar points", () => {
    const selection = {
      review_grammar: ["이_가"],
      review_vocab: [],
      new_grammar: [
        { id: "은_는", description: "Topic marker", level: "beginner", learning_order: 2 },
      ],
      new_vocab: ["학교"],
    };
    expect(SessionSelectionSchema.parse(selection)).toEqual(selection);
  });

  test("rejects a grammar point without an id", () => {
    const result = GrammarPointSchema.safeParse({
      id: "",
      description: "",
      level: "beginner",
      learning_order: 1,
    });
    expect(result.success).toBe(false);
  });
});

describe("MasterySummarySchema", () => {
  const summary = {
    id: "은_는",
    kind: "grammar",
    mastery: "reviewing",
    repetitions: 3,
    lapses: 1,
    consecutive_correct: 2,
    total_attempts: 7,
    recent_accuracy: 0.5,
    next_review_date: "2026-01-25",
    mastery_date: null,
    due: false,
  };

  test("accepts a valid summary", () => {
    expect(MasterySummarySchema.safeParse(summary).success).toBe(true);
  });

  test("rejects malformed dates and out-of-range accuracy", () => {
    expect(
      MasterySummarySchema.safeParse({ ...summary, next_review_date: "25/01/2026" }).success
    ).toBe(false);
    expect(MasterySummarySchema.safeParse({ ...summary, recent_accuracy: 1.5 }).success).toBe(
      false
    );
  });
});

describe("SessionSummarySchema", () => {
  test("bounds the accuracy rate to a percentage", () => {
    const summary = {
      date: "2026-01-23",
      total_exercises: 3,
      correct_exercises: 2,
      accuracy_rate: 66.7,
      promotions: [],
      introduced: ["은_는"],
      main_errors: ["particle_choice"],
    };
    expect(SessionSummarySchema.safeParse(summary).success).toBe(true);
    expect(SessionSummarySchema.safeParse({ ...summary, accuracy_rate: 101 }).success).toBe(false);
  });

  test("reports at most three main errors", () => {
    const summary = {
      date: "2026-01-23",
      total_exercises: 4,
      correct_exercises: 0,
      accuracy_rate: 0,
      promotions: [],
      introduced: [],
      main_errors: ["a", "b", "c", "d"],
    };
    expect(SessionSummarySchema.safeParse(summary).success).toBe(false);
  });
});

describe("DifficultySummarySchema", () => {
  test("accepts a summary of a fresh grammar point", () => {
    const summary = {
      grammar_id: "은_는",
      current_max_tier: "recognition",
      unlocked_tiers: ["recognition"],
      tiers: [
        {
          tier: "recognition",
          mastered: false,
          repetitions: 0,
          recent_accuracy: 0,
          consecutive_correct: 0,
        },
      ],
      can_unlock_next: false,
    };
    expect(DifficultySummarySchema.parse(summary)).toEqual(summary);
  });

  test("rejects an unknown tier", () => {
    const result = DifficultySummarySchema.safeParse({
      grammar_id: "은_는",
      current_max_tier: "expert",
      unlocked_tiers: [],
      tiers: [],
      can_unlock_next: false,
    });
    expect(result.success).toBe(false);
  });
});

// =============================================================================
// Utilities
// =============================================================================

describe("DifficultyTierSchema", () => {
  test("lists tiers in ascending order", () => {
    expect(DifficultyTierSchema.options).toEqual([
      "recognition",
      "guided_production",
      "structured_production",
      "free_production",
    ]);
  });
});

describe("DATE_PATTERN", () => {
  test("matches calendar dates only", () => {
    expect(DATE_PATTERN.test("2026-01-23")).toBe(true);
    expect(DATE_PATTERN.test("2026-1-23")).toBe(false);
  });
});

describe("formatValidationError", () => {
  test("lists each issue with its path", () => {
    const result = safeParseOutcomeRecord({ item_ids: [], is_correct: "yes" });
    if (result.success) {
      throw new Error("Expected validation to fail");
    }
    expect(formatValidationError(result.error, "outcome record")).toBe(
      "Invalid outcome record:\n" +
        "  - item_ids: At least one item id is required\n" +
        "  - is_correct: Expected boolean, received string"
    );
  });

  test("labels root-level issues", () => {
    const result = safeParseOutcomeRecord("not a record");
    if (result.success) {
      throw new Error("Expected validation to fail");
    }
    expect(formatValidationError(result.error)).toBe(
      "Invalid record:\n  - (root): Expected object, received string"
    );
  });
});
