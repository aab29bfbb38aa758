/**
 * Profile Storage Tests
 *
 * Tests for loading (migration, merging, repair) and atomic saving.
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdir, rm, readFile, readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  getProfilePath,
  loadProfile,
  parseProfile,
  saveProfile,
} from "../profile-storage.js";
import { createDefaultProfile } from "../profile-schema.js";
import { TODAY, makeItem, makeProfile } from "./test-helpers.js";

describe("profile-storage", () => {
  let testDir: string;
  let profilePath: string;

  beforeEach(async () => {
    testDir = join(
      tmpdir(),
      `profile-storage-test-${Date.now()}-${Math.random().toString(36).slice(2)}`
    );
    await mkdir(testDir, { recursive: true });
    profilePath = join(testDir, "profile.json");
  });

  afterEach(async () => {
    try {
      await rm(testDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  // =============================================================================
  // Path Resolution
  // =============================================================================

  describe("getProfilePath", () => {
    let originalHome: string;

    beforeEach(() => {
      originalHome = process.env.HOME ?? "";
      process.env.HOME = testDir;
    });

    afterEach(() => {
      process.env.HOME = originalHome;
    });

    test("resolves under the config directory in HOME", () => {
      expect(getProfilePath()).toBe(join(testDir, ".config", "lesson-pacer", "profile.json"));
    });
  });

  // =============================================================================
  // Loading
  // =============================================================================

  describe("loadProfile", () => {
    test("returns a default profile when the file is missing", async () => {
      const { profile, merges, repairs } = await loadProfile(TODAY, undefined, profilePath);
      expect(profile).toEqual(createDefaultProfile());
      expect(merges).toEqual([]);
      expect(repairs).toEqual([]);
    });

    test("returns a default profile for invalid JSON", async () => {
      await writeFile(profilePath, "{ not json", "utf-8");
      const { profile } = await loadProfile(TODAY, undefined, profilePath);
      expect(profile).toEqual(createDefaultProfile());
    });

    test("returns a default profile for a non-object document", async () => {
      await writeFile(profilePath, "[1, 2, 3]", "utf-8");
      const { profile } = await loadProfile(TODAY, undefined, profilePath);
      expect(profile).toEqual(createDefaultProfile());
    });

    test("propagates read errors other than a missing file", async () => {
      await expect(loadProfile(TODAY, undefined, testDir)).rejects.toThrow();
    });
  });

  describe("parseProfile", () => {
    test("migrates legacy fields and merges duplicate spellings", () => {
      const { profile, merges } = parseProfile(
        {
          user_id: "learner",
          grammar_summary: {
            "은/는": { reps: 2, interval: 3, exposure: 4, last_reviewed: "2026-01-10" },
            은는: {
              repetitions: 1,
              interval_days: 1,
              last_reviewed_date: "2026-01-20",
              next_review_date: "2026-01-21",
            },
          },
        },
        TODAY
      );

      expect(profile.user_id).toBe("learner");
      expect(Object.keys(profile.grammar_summary)).toEqual(["은_는"]);
      expect(merges).toEqual([{ canonicalId: "은_는", keptKey: "은/는", droppedKey: "은는" }]);

      const item = profile.grammar_summary["은_는"];
      expect(item).toEqual({
        id: "은_는",
        kind: "grammar",
        ease_factor: 2.5,
        interval_days: 3,
        repetitions: 2,
        srs_level: 2,
        lapses: 0,
        consecutive_correct: 0,
        success_streak: 0,
        total_attempts: 0,
        recent_accuracy: 0,
        exposure_count: 4,
        first_seen_date: "2026-01-10",
        last_reviewed_date: "2026-01-10",
        next_review_date: "2026-01-13",
        mastery_date: null,
      });
    });

    test("repairs corrupt items", () => {
      const { profile, repairs } = parseProfile(
        {
          grammar_summary: {
            "-아요/어요": {
              repetitions: 2,
              interval_days: 365,
              ease_factor: 4.2,
              last_reviewed_date: "2026-01-20",
              next_review_date: "2027-01-20",
            },
          },
        },
        TODAY
      );

      expect(repairs).toEqual([
        {
          id: "-아요_어요",
          kind: "grammar",
          reasons: ["interval_above_max", "ease_above_max", "review_beyond_horizon"],
        },
      ]);
      const item = profile.grammar_summary["-아요_어요"];
      expect(item?.interval_days).toBe(3);
      expect(item?.ease_factor).toBe(3);
      expect(item?.next_review_date).toBe("2026-01-23");
    });

    test("makes an item without dates due today", () => {
      const { profile } = parseProfile({ vocab_summary: { 학교: { repetitions: 1 } } }, TODAY);
      const item = profile.vocab_summary["학교"];
      expect(item?.kind).toBe("vocabulary");
      expect(item?.next_review_date).toBe(TODAY);
      expect(item?.last_reviewed_date).toBe("2026-01-22");
    });

    test("falls back to defaults for invalid preferences", () => {
      const { profile } = parseProfile(
        {
          level: "expert",
          learning_preferences: { reviews_per_session: -3, new_grammar_per_session: 4 },
          session_tracking: { sessions_since_new_content: "soon", sessions_completed: 7 },
        },
        TODAY
      );

      expect(profile.level).toBe("beginner");
      expect(profile.learning_preferences.reviews_per_session).toBe(10);
      expect(profile.learning_preferences.new_grammar_per_session).toBe(4);
      expect(profile.learning_preferences.mastery_thresholds.min_repetitions).toBe(3);
      expect(profile.session_tracking.sessions_since_new_content).toBeNull();
      expect(profile.session_tracking.sessions_completed).toBe(7);
    });

    test("drops entries whose id normalizes to nothing", () => {
      const { profile } = parseProfile({ grammar_summary: { "???": { repetitions: 4 } } }, TODAY);
      expect(profile.grammar_summary).toEqual({});
    });
  });

  // =============================================================================
  // Saving
  // =============================================================================

  describe("saveProfile", () => {
    test("round-trips through disk", async () => {
      const profile = makeProfile([makeItem("은_는", { repetitions: 2, interval_days: 3 })]);
      await saveProfile(profile, profilePath);

      const { profile: loaded, repairs } = await loadProfile(TODAY, undefined, profilePath);
      expect(repairs).toEqual([]);
      expect(loaded).toEqual(profile);
    });

    test("writes pretty JSON and leaves no temp files", async () => {
      await saveProfile(createDefaultProfile(), profilePath);

      const content = await readFile(profilePath, "utf-8");
      expect(content.startsWith('{\n  "user_id": "user_001"')).toBe(true);
      expect(await readdir(testDir)).toEqual(["profile.json"]);
    });

    test("creates missing directories", async () => {
      const nested = join(testDir, "a", "b", "profile.json");
      await saveProfile(createDefaultProfile(), nested);
      const { profile } = await loadProfile(TODAY, undefined, nested);
      expect(profile.user_id).toBe("user_001");
    });
  });
});
