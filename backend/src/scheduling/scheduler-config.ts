/**
 * Scheduler Config
 *
 * Tunable constants for the SRS engine, readiness gate and planner.
 *
 * Files:
 * - ~/.config/lesson-pacer/scheduler-config.json - Config settings
 *
 * Every field is optional in the file; missing fields take the defaults
 * below. Per-learner budgets and mastery thresholds live in the profile's
 * learning preferences instead (see profile-schema.ts).
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import { createLogger } from "../logger.js";

const log = createLogger("scheduler-config");

// =============================================================================
// Constants
// =============================================================================

/**
 * Config directory name within user home.
 */
const CONFIG_DIR = ".config/lesson-pacer";

/**
 * Config file name for scheduler settings.
 */
const CONFIG_FILE = "scheduler-config.json";

// =============================================================================
// Schema
// =============================================================================

/**
 * Streak required before a success may advance an item below `belowLevel`.
 */
const StreakRequirementSchema = z.object({
  belowLevel: z.number().int().min(1),
  streak: z.number().int().min(1),
});

const SrsConfigSchema = z
  .object({
    /** Lower bound for ease factor */
    minEase: z.number().min(1).default(1.3),
    /** Upper bound for ease factor */
    maxEase: z.number().min(1).default(3.0),
    /** Ease factor for newly created items */
    defaultEase: z.number().min(1).default(2.5),
    /** Longest interval ever scheduled */
    maxIntervalDays: z.number().int().min(1).default(60),
    /** Interval per repetition level while the level is inside the table */
    fixedIntervals: z.array(z.number().int().min(1)).min(1).default([1, 2, 3, 5, 8, 13]),
    /** Levels removed by one failure */
    failureResetSteps: z.number().int().min(0).default(2),
    /** Attempts considered when computing recent accuracy */
    accuracyWindow: z.number().int().min(1).default(8),
    /** Ease used for growth never exceeds this, whatever the raw ease */
    growthEaseCap: z.number().min(1).default(2.0),
    /** Growth per advancement beyond the table never exceeds this multiple */
    maxGrowthMultiplier: z.number().min(1).default(1.5),
    /** Checked in order; the first matching `belowLevel` wins */
    streakRequirements: z.array(StreakRequirementSchema).default([
      { belowLevel: 3, streak: 4 },
      { belowLevel: 5, streak: 3 },
    ]),
    /** Streak required at or above every listed level */
    baselineStreak: z.number().int().min(1).default(2),
    /** Ease penalty for a lapse */
    lapsePenalty: z.number().min(0).default(0.15),
    /** Extra penalty per lapse beyond `lapsePenaltyEscalateAfter` */
    lapsePenaltyStep: z.number().min(0).default(0.05),
    lapsePenaltyEscalateAfter: z.number().int().min(0).default(2),
    maxLapsePenalty: z.number().min(0).default(0.3),
    /** Next review dates further out than this are treated as corrupt */
    repairHorizonDays: z.number().int().min(1).default(180),
  })
  .refine((c) => c.minEase <= c.defaultEase && c.defaultEase <= c.maxEase, {
    message: "defaultEase must lie within [minEase, maxEase]",
  });

const StrugglingConfigSchema = z.object({
  /** Accuracy strictly below this marks an item as struggling */
  accuracyBelow: z.number().min(0).max(1).default(0.6),
  /** A zero streak after at least this many attempts marks an item as struggling */
  zeroStreakAfterAttempts: z.number().int().min(1).default(3),
});

const SingleItemBarSchema = z.object({
  minExposures: z.number().int().min(0).default(3),
  minConsecutiveCorrect: z.number().int().min(0).default(3),
  minAccuracy: z.number().min(0).max(1).default(0.8),
  minTotalAttempts: z.number().int().min(0).default(5),
  minRepetitions: z.number().int().min(0).default(2),
});

const ReadinessConfigSchema = z.object({
  /** Bar a lone known item must clear before anything new is introduced */
  singleItem: SingleItemBarSchema.default({}),
  /** Largest corpus still judged by the small-corpus rule */
  smallCorpusMax: z.number().int().min(2).default(4),
  /** Share of known items that must be Mastered in a small corpus */
  smallCorpusMasteredRatio: z.number().min(0).max(1).default(0.75),
  /** Large corpus: struggling count may not exceed total / this */
  strugglingDivisor: z.number().min(1).default(4),
  /** Large corpus: unmastered count may not exceed total / this */
  unmasteredDivisor: z.number().min(1).default(3),
});

const PlannerConfigSchema = z.object({
  /** Overdue items below this repetition level are urgent */
  overdueLowRepetitions: z.number().int().min(0).default(2),
});

const DifficultyConfigSchema = z.object({
  /** Days a tier must stay mastered before the next tier unlocks */
  unlockDelayDays: z.number().int().min(0).default(1),
});

/**
 * Schema for scheduler config.
 */
export const SchedulerConfigSchema = z.object({
  srs: SrsConfigSchema.default({}),
  struggling: StrugglingConfigSchema.default({}),
  readiness: ReadinessConfigSchema.default({}),
  planner: PlannerConfigSchema.default({}),
  difficulty: DifficultyConfigSchema.default({}),
});

// =============================================================================
// Types
// =============================================================================

export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
export type SchedulerConfigInput = z.input<typeof SchedulerConfigSchema>;
export type SrsConfig = SchedulerConfig["srs"];
export type StrugglingConfig = SchedulerConfig["struggling"];
export type ReadinessConfig = SchedulerConfig["readiness"];

/**
 * Defaults used when no config file exists.
 */
export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = SchedulerConfigSchema.parse({});

/**
 * Build a config from partial overrides, filling defaults.
 * @throws ZodError if an override is out of range
 */
export function createSchedulerConfig(overrides: SchedulerConfigInput = {}): SchedulerConfig {
  return SchedulerConfigSchema.parse(overrides);
}

// =============================================================================
// Path Resolution
// =============================================================================

/**
 * Get the config directory path.
 *
 * Checks HOME environment variable first (for testing), then uses os.homedir().
 */
function getConfigDir(): string {
  const home = process.env.HOME ?? homedir();
  return join(home, CONFIG_DIR);
}

/**
 * Get the absolute path to the config file.
 */
export function getConfigFilePath(): string {
  return join(getConfigDir(), CONFIG_FILE);
}

// =============================================================================
// Config File Operations
// =============================================================================

/**
 * Load the scheduler config from disk.
 * Returns default config if the file doesn't exist or is invalid.
 */
export async function loadSchedulerConfig(
  configPath: string = getConfigFilePath()
): Promise<SchedulerConfig> {
  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code === "ENOENT") {
      log.debug("Config file not found, returning defaults");
      return DEFAULT_SCHEDULER_CONFIG;
    }
    log.error(`Failed to read config file: ${(e as Error).message}`);
    throw e;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    log.warn(`Invalid JSON in config file at ${configPath}, returning defaults`);
    return DEFAULT_SCHEDULER_CONFIG;
  }

  const result = SchedulerConfigSchema.safeParse(parsed);
  if (!result.success) {
    log.warn(`Invalid config schema at ${configPath}, returning defaults`, result.error.issues);
    return DEFAULT_SCHEDULER_CONFIG;
  }

  return result.data;
}

/**
 * Save the scheduler config to disk.
 */
export async function saveSchedulerConfig(
  config: SchedulerConfig,
  configPath: string = getConfigFilePath()
): Promise<void> {
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(config, null, 2), "utf-8");
  log.debug(`Wrote scheduler config to ${configPath}`);
}
