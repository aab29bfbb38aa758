/**
 * Session Controller
 *
 * Runs one learning session against a profile file: load (with repair and
 * key renormalization), plan, record evaluated exercises, close. Every
 * recorded exercise is persisted before the call resolves, so an interrupted
 * session loses nothing already evaluated.
 */

import type {
  ContentSources,
  SessionSelection,
  SessionSummary,
} from "@lesson-pacer/shared";
import { sessionLog as log } from "../logger.js";
import { getToday } from "./item-schema.js";
import type { Profile } from "./profile-schema.js";
import { getProfilePath, loadProfile, saveProfile } from "./profile-storage.js";
import {
  finishSession,
  recordExerciseResult,
  type RecordOutcomeResult,
} from "./profile-manager.js";
import { selectSessionItems } from "./session-planner.js";
import { DEFAULT_SCHEDULER_CONFIG, type SchedulerConfig } from "./scheduler-config.js";

export interface SessionControllerOptions {
  /** Profile document location (defaults to ~/.config/lesson-pacer/profile.json) */
  profilePath?: string;
  config?: SchedulerConfig;
  sources?: Partial<ContentSources>;
  /** Session date in YYYY-MM-DD format (defaults to today) */
  today?: string;
}

interface SessionCounters {
  exercises: number;
  correct: number;
  promotions: string[];
  introduced: string[];
  /** New grammar and vocabulary ids the planner offered */
  offered: Set<string>;
  /** Error category -> occurrences, in first-seen order */
  errors: Map<string, number>;
}

function emptyCounters(): SessionCounters {
  return {
    exercises: 0,
    correct: 0,
    promotions: [],
    introduced: [],
    offered: new Set(),
    errors: new Map(),
  };
}

/**
 * The most frequent error categories, most frequent first. Ties keep the
 * order in which the categories were first seen.
 */
export function mainErrors(errors: ReadonlyMap<string, number>, limit = 3): string[] {
  return [...errors.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([category]) => category);
}

/**
 * Accuracy as a percentage with one decimal. Zero when nothing was recorded.
 */
export function accuracyRate(correct: number, total: number): number {
  if (total <= 0) {
    return 0;
  }
  return Math.round((correct / total) * 1000) / 10;
}

export class SessionController {
  private readonly profilePath: string;
  private readonly config: SchedulerConfig;
  private readonly sources: Partial<ContentSources>;
  private readonly today: string;
  private profile: Profile | null = null;
  private counters: SessionCounters = emptyCounters();

  constructor(options: SessionControllerOptions = {}) {
    this.profilePath = options.profilePath ?? getProfilePath();
    this.config = options.config ?? DEFAULT_SCHEDULER_CONFIG;
    this.sources = options.sources ?? {};
    this.today = options.today ?? getToday();
  }

  /**
   * Whether a session is in progress.
   */
  get isOpen(): boolean {
    return this.profile !== null;
  }

  /**
   * The in-memory profile of the open session.
   * @throws Error if no session is open
   */
  get currentProfile(): Profile {
    return this.requireProfile();
  }

  private requireProfile(): Profile {
    if (this.profile === null) {
      throw new Error("No session is open");
    }
    return this.profile;
  }

  /**
   * Load the profile and start counting.
   */
  async open(): Promise<Profile> {
    const { profile, merges, repairs } = await loadProfile(
      this.today,
      this.config,
      this.profilePath
    );
    this.profile = profile;
    this.counters = emptyCounters();
    log.info(
      `Opened session for ${profile.user_id} on ${this.today}` +
        ` (${merges.length} merged, ${repairs.length} repaired)`
    );
    return profile;
  }

  /**
   * Select items for the session.
   */
  plan(): SessionSelection {
    const selection = selectSessionItems(
      this.requireProfile(),
      this.sources,
      this.today,
      this.config
    );
    for (const point of selection.new_grammar) {
      this.counters.offered.add(point.id);
    }
    for (const word of selection.new_vocab) {
      this.counters.offered.add(word);
    }
    return selection;
  }

  /**
   * Record one evaluated exercise and persist the profile.
   * Invalid results leave the profile untouched.
   */
  async record(result: unknown): Promise<RecordOutcomeResult> {
    const recorded = recordExerciseResult(this.requireProfile(), result, this.today, this.config);
    if (!recorded.success) {
      log.warn(`Rejected exercise result: ${recorded.error}`);
      return recorded;
    }

    const { profile, correct, promoted, created, errors } = recorded.update;
    await saveProfile(profile, this.profilePath);
    this.profile = profile;

    this.counters.exercises += 1;
    if (correct) {
      this.counters.correct += 1;
    }
    this.counters.promotions.push(...promoted);
    this.counters.introduced.push(...created);
    for (const error of errors) {
      const category = error.trim();
      if (category.length === 0) continue;
      this.counters.errors.set(category, (this.counters.errors.get(category) ?? 0) + 1);
    }
    return recorded;
  }

  /**
   * Advance the session counters, persist and report.
   *
   * Only material the planner offered as new counts as introduced content;
   * words first seen incidentally in an exercise do not restart consolidation.
   */
  async close(): Promise<SessionSummary> {
    const { offered } = this.counters;
    const profile = finishSession(
      this.requireProfile(),
      {
        introducedNewContent: this.counters.introduced.some((id) => offered.has(id)),
        exercises: this.counters.exercises,
      },
      this.today
    );
    await saveProfile(profile, this.profilePath);

    const summary: SessionSummary = {
      date: this.today,
      total_exercises: this.counters.exercises,
      correct_exercises: this.counters.correct,
      accuracy_rate: accuracyRate(this.counters.correct, this.counters.exercises),
      promotions: [...this.counters.promotions],
      introduced: [...this.counters.introduced],
      main_errors: mainErrors(this.counters.errors),
    };

    this.profile = null;
    this.counters = emptyCounters();
    log.info(
      `Closed session: ${summary.correct_exercises}/${summary.total_exercises} correct` +
        ` (${summary.accuracy_rate}%)`
    );
    return summary;
  }
}
