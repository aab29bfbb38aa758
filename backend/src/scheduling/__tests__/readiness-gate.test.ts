/**
 * Readiness Gate Tests
 */

import { describe, expect, test } from "vitest";
import {
  corpusPolicy,
  evaluateReadiness,
  inConsolidationWindow,
  isNewContentAllowed,
} from "../readiness-gate.js";
import { recordOutcome } from "../profile-manager.js";
import type { Profile } from "../profile-schema.js";
import {
  TODAY,
  makeItem,
  makeLearning,
  makeMastered,
  makeProfile,
  makeStruggling,
} from "./test-helpers.js";

function withTracking(profile: Profile, sinceNew: number | null, consolidation = 1): Profile {
  return {
    ...profile,
    learning_preferences: { ...profile.learning_preferences, consolidation_sessions: consolidation },
    session_tracking: { ...profile.session_tracking, sessions_since_new_content: sinceNew },
  };
}

describe("evaluateReadiness", () => {
  test("allows new content for an empty profile", () => {
    const decision = evaluateReadiness(makeProfile(), TODAY);
    expect(decision.allowed).toBe(true);
    expect(decision.reason).toBe("bootstrap");
    expect(decision.counts).toEqual({ total: 0, mastered: 0, unmastered: 0, struggling: 0 });
  });

  describe("single known item", () => {
    const strong = {
      exposure_count: 10,
      repetitions: 5,
      consecutive_correct: 5,
      recent_accuracy: 1,
      total_attempts: 10,
    };

    test("allows when the item clears the bar", () => {
      const profile = makeProfile([makeItem("은_는", strong)]);
      expect(isNewContentAllowed(profile, TODAY)).toBe(true);
      expect(evaluateReadiness(profile, TODAY).reason).toBe("single_item_ready");
    });

    test("blocks with too few exposures", () => {
      const profile = makeProfile([makeItem("은_는", { ...strong, exposure_count: 2 })]);
      expect(isNewContentAllowed(profile, TODAY)).toBe(false);
      expect(evaluateReadiness(profile, TODAY).reason).toBe("single_item_not_ready");
    });

    test("blocks below the repetitions floor", () => {
      const profile = makeProfile([makeItem("은_는", { ...strong, repetitions: 1 })]);
      expect(isNewContentAllowed(profile, TODAY)).toBe(false);
    });
  });

  describe("small corpus", () => {
    test("allows when every item is mastered", () => {
      const profile = makeProfile([makeMastered("a"), makeMastered("b"), makeMastered("c")]);
      expect(evaluateReadiness(profile, TODAY).reason).toBe("small_corpus_ready");
    });

    test("blocks below three quarters mastered", () => {
      const profile = makeProfile([makeMastered("a"), makeMastered("b"), makeLearning("c")]);
      const decision = evaluateReadiness(profile, TODAY);
      expect(decision.allowed).toBe(false);
      expect(decision.reason).toBe("small_corpus_unmastered");
    });

    test("allows at exactly three quarters mastered", () => {
      const profile = makeProfile([
        makeMastered("a"),
        makeMastered("b"),
        makeMastered("c"),
        makeLearning("d"),
      ]);
      expect(isNewContentAllowed(profile, TODAY)).toBe(true);
    });

    test("the corpus policy rejects any struggling item", () => {
      const profile = makeProfile([
        makeMastered("a"),
        makeMastered("b"),
        makeMastered("c"),
        makeStruggling("d"),
      ]);
      const policy = corpusPolicy(profile);
      expect(policy.reason).toBe("small_corpus_struggling");
      expect(policy.counts.struggling).toBe(1);
    });
  });

  describe("larger corpus", () => {
    const mastered = ["a", "b", "c", "d", "e", "f"].map((id) => makeMastered(id));

    test("allows within proportional limits", () => {
      const profile = makeProfile([...mastered, makeLearning("g"), makeLearning("h")]);
      const decision = evaluateReadiness(profile, TODAY);
      expect(decision.reason).toBe("proportional_ready");
      expect(decision.counts).toEqual({ total: 8, mastered: 6, unmastered: 2, struggling: 0 });
    });

    test("the corpus policy tolerates struggling items up to a quarter", () => {
      const profile = makeProfile([...mastered, makeStruggling("g"), makeStruggling("h")]);
      expect(corpusPolicy(profile).allowed).toBe(true);
    });

    test("the corpus policy rejects more than a quarter struggling", () => {
      const profile = makeProfile([
        ...mastered.slice(0, 5),
        makeStruggling("g"),
        makeStruggling("h"),
        makeStruggling("i"),
      ]);
      expect(corpusPolicy(profile).reason).toBe("too_many_struggling");
    });

    test("blocks when more than a third are unmastered", () => {
      const profile = makeProfile([
        ...mastered.slice(0, 5),
        makeLearning("g"),
        makeLearning("h"),
        makeLearning("i"),
      ]);
      expect(evaluateReadiness(profile, TODAY).reason).toBe("too_many_unmastered");
    });
  });

  describe("overrides", () => {
    test("a struggling item due today blocks", () => {
      const mastered = ["a", "b", "c", "d", "e", "f", "g"].map((id) => makeMastered(id));
      const profile = makeProfile([...mastered, makeStruggling("h", { next_review_date: TODAY })]);
      const decision = evaluateReadiness(profile, TODAY);

      expect(decision.allowed).toBe(false);
      expect(decision.reason).toBe("urgent_items");
      expect(decision.urgentItems).toEqual(["h"]);
    });

    test("a struggling item blocks before it is due", () => {
      const mastered = ["a", "b", "c", "d", "e", "f", "g", "h"].map((id) => makeMastered(id));
      const recorded = recordOutcome(
        makeProfile(mastered),
        { item_ids: ["a"], is_correct: false },
        TODAY
      );
      if (!recorded.success) {
        throw new Error(recorded.error);
      }
      const profile = recorded.update.profile;
      expect(profile.grammar_summary["a"]?.next_review_date).toBe("2026-01-25");

      const decision = evaluateReadiness(profile, TODAY);
      expect(decision.allowed).toBe(false);
      expect(decision.reason).toBe("urgent_items");
      expect(decision.urgentItems).toEqual(["a"]);
      expect(decision.counts).toEqual({ total: 8, mastered: 7, unmastered: 1, struggling: 1 });
    });

    test("blocks even when the corpus policy would allow", () => {
      const mastered = ["a", "b", "c", "d", "e", "f"].map((id) => makeMastered(id));
      const profile = makeProfile([...mastered, makeStruggling("g"), makeLearning("h")]);
      expect(corpusPolicy(profile).allowed).toBe(true);
      expect(isNewContentAllowed(profile, TODAY)).toBe(false);
    });

    test("the consolidation window blocks regardless of mastery", () => {
      const profile = withTracking(makeProfile(), 0);
      expect(inConsolidationWindow(profile)).toBe(true);
      expect(evaluateReadiness(profile, TODAY).reason).toBe("consolidation_window");
    });

    test("the window closes after enough review-only sessions", () => {
      expect(isNewContentAllowed(withTracking(makeProfile(), 1), TODAY)).toBe(true);
      expect(isNewContentAllowed(withTracking(makeProfile(), 1, 2), TODAY)).toBe(false);
    });

    test("a profile that never introduced content has no window", () => {
      expect(inConsolidationWindow(withTracking(makeProfile(), null, 3))).toBe(false);
    });

    test("the window and the mastery gate both have to pass", () => {
      const profile = withTracking(makeProfile([makeLearning("a")]), 5);
      expect(evaluateReadiness(profile, TODAY).reason).toBe("single_item_not_ready");
    });
  });
});
