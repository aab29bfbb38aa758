/**
 * Mastery Classifier Tests
 */

import { describe, expect, test } from "vitest";
import {
  MasteryThresholdsSchema,
  classifyMastery,
  createDefaultMasteryThresholds,
  isStruggling,
  masteryRank,
} from "../mastery.js";
import { DEFAULT_SCHEDULER_CONFIG } from "../scheduler-config.js";
import { makeItem } from "./test-helpers.js";

const thresholds = createDefaultMasteryThresholds();
const struggling = DEFAULT_SCHEDULER_CONFIG.struggling;

describe("MasteryThresholdsSchema", () => {
  test("fills defaults", () => {
    expect(createDefaultMasteryThresholds()).toEqual({
      min_repetitions: 3,
      min_consecutive_correct: 2,
      min_total_attempts: 5,
      mastered_min_accuracy: 0.8,
      mastered_min_consecutive_correct: 3,
    });
  });

  test("replaces invalid values with defaults", () => {
    const parsed = MasteryThresholdsSchema.parse({ min_repetitions: -1, mastered_min_accuracy: 0.9 });
    expect(parsed.min_repetitions).toBe(3);
    expect(parsed.mastered_min_accuracy).toBe(0.9);
  });
});

describe("classifyMastery", () => {
  test("an item never exposed is new", () => {
    expect(classifyMastery(makeItem("x", { exposure_count: 0 }), thresholds)).toBe("new");
  });

  test("vocabulary counts attempts as exposures", () => {
    const vocab = makeItem("학교", { kind: "vocabulary", exposure_count: 0, total_attempts: 0 });
    expect(classifyMastery(vocab, thresholds)).toBe("new");
    expect(classifyMastery({ ...vocab, total_attempts: 1 }, thresholds)).toBe("learning");
  });

  test("too few repetitions, streak or attempts is learning", () => {
    const base = {
      exposure_count: 6,
      repetitions: 3,
      consecutive_correct: 3,
      total_attempts: 6,
      recent_accuracy: 1,
    };
    expect(classifyMastery(makeItem("x", { ...base, repetitions: 2 }), thresholds)).toBe("learning");
    expect(classifyMastery(makeItem("x", { ...base, consecutive_correct: 1 }), thresholds)).toBe(
      "learning"
    );
    expect(classifyMastery(makeItem("x", { ...base, total_attempts: 4 }), thresholds)).toBe(
      "learning"
    );
    expect(classifyMastery(makeItem("x", base), thresholds)).toBe("mastered");
  });

  test("low accuracy or a short streak is reviewing", () => {
    const base = {
      exposure_count: 6,
      repetitions: 3,
      consecutive_correct: 3,
      total_attempts: 6,
      recent_accuracy: 1,
    };
    expect(classifyMastery(makeItem("x", { ...base, recent_accuracy: 0.5 }), thresholds)).toBe(
      "reviewing"
    );
    expect(classifyMastery(makeItem("x", { ...base, consecutive_correct: 2 }), thresholds)).toBe(
      "reviewing"
    );
  });

  test("is monotonic in every input", () => {
    const values = {
      exposure_count: [0, 1, 5],
      repetitions: [0, 2, 3, 6],
      consecutive_correct: [0, 2, 3, 8],
      total_attempts: [0, 4, 5, 10],
      recent_accuracy: [0, 0.5, 0.8, 1],
    };

    for (const exposure of values.exposure_count) {
      for (const reps of values.repetitions) {
        for (const streak of values.consecutive_correct) {
          for (const attempts of values.total_attempts) {
            for (const accuracy of values.recent_accuracy) {
              const item = makeItem("x", {
                exposure_count: exposure,
                repetitions: reps,
                consecutive_correct: streak,
                total_attempts: attempts,
                recent_accuracy: accuracy,
              });
              const rank = masteryRank(classifyMastery(item, thresholds));
              const improved = makeItem("x", {
                exposure_count: exposure + 1,
                repetitions: reps + 1,
                consecutive_correct: streak + 1,
                total_attempts: attempts + 1,
                recent_accuracy: Math.min(1, accuracy + 0.1),
              });
              expect(masteryRank(classifyMastery(improved, thresholds))).toBeGreaterThanOrEqual(rank);
            }
          }
        }
      }
    }
  });
});

describe("isStruggling", () => {
  test("unattempted items never struggle", () => {
    expect(isStruggling(makeItem("x", { total_attempts: 0, recent_accuracy: 0 }), struggling)).toBe(
      false
    );
  });

  test("low accuracy struggles", () => {
    expect(isStruggling(makeItem("x", { total_attempts: 4, recent_accuracy: 0.5 }), struggling)).toBe(
      true
    );
    expect(
      isStruggling(
        makeItem("x", { total_attempts: 4, consecutive_correct: 1, recent_accuracy: 0.6 }),
        struggling
      )
    ).toBe(false);
  });

  test("a zero streak struggles after three attempts", () => {
    const item = makeItem("x", { consecutive_correct: 0, recent_accuracy: 0.7 });
    expect(isStruggling({ ...item, total_attempts: 2 }, struggling)).toBe(false);
    expect(isStruggling({ ...item, total_attempts: 3 }, struggling)).toBe(true);
  });
});
