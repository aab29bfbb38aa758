/**
 * Profile Storage
 *
 * Reads and writes the learner profile document.
 *
 * Files:
 * - ~/.config/lesson-pacer/profile.json - Profile document
 *
 * Loading never rejects a document. Keys are renormalized (merging
 * duplicates), each item is rebuilt through the lenient stored schema and then
 * repaired. Saving is atomic via temp file + rename.
 */

import { readFile, writeFile, rename, unlink, mkdir } from "node:fs/promises";
import { dirname, join, basename } from "node:path";
import { homedir } from "node:os";
import type { ItemKind } from "@lesson-pacer/shared";
import { createLogger } from "../logger.js";
import { normalizeItemId, renormalizeKeys, type MergeEvent } from "./id-normalizer.js";
import {
  StoredItemSchema,
  fromStoredItem,
  type LearningItem,
  type StoredItem,
} from "./item-schema.js";
import { repairItem, type RepairReason } from "./srs-algorithm.js";
import {
  fromStoredDifficultyProgress,
  type DifficultyProgress,
} from "./difficulty-progression.js";
import {
  StoredProfileSchema,
  createDefaultProfile,
  type Profile,
} from "./profile-schema.js";
import { DEFAULT_SCHEDULER_CONFIG, type SchedulerConfig } from "./scheduler-config.js";

const log = createLogger("profile-storage");

// =============================================================================
// Constants
// =============================================================================

/**
 * Config directory name within user home.
 */
const CONFIG_DIR = ".config/lesson-pacer";

/**
 * Profile file name.
 */
const PROFILE_FILE = "profile.json";

// =============================================================================
// Path Resolution
// =============================================================================

/**
 * Get the absolute path to the default profile file.
 *
 * Checks HOME environment variable first (for testing), then uses os.homedir().
 */
export function getProfilePath(): string {
  const home = process.env.HOME ?? homedir();
  return join(home, CONFIG_DIR, PROFILE_FILE);
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * An item that needed repair on load.
 */
export interface RepairEvent {
  id: string;
  kind: ItemKind;
  reasons: RepairReason[];
}

/**
 * Result of parsing a stored document.
 */
export interface ParsedProfile {
  profile: Profile;
  merges: MergeEvent[];
  repairs: RepairEvent[];
}

interface ItemMapResult {
  items: Record<string, LearningItem>;
  merges: MergeEvent[];
  repairs: RepairEvent[];
}

/**
 * Rekey, rebuild and repair one item map.
 */
function parseItemMap(
  raw: Record<string, unknown>,
  kind: ItemKind,
  today: string,
  config: SchedulerConfig
): ItemMapResult {
  const stored: Record<string, StoredItem> = {};
  for (const [key, value] of Object.entries(raw)) {
    stored[key] = StoredItemSchema.parse(value);
  }

  const renormalized = renormalizeKeys(stored);
  for (const key of renormalized.discarded) {
    log.warn(`Dropped ${kind} entry with unusable id "${key}"`);
  }

  const items: Record<string, LearningItem> = {};
  const repairs: RepairEvent[] = [];
  for (const [id, record] of Object.entries(renormalized.items)) {
    const item = fromStoredItem(record, id, kind, today, config.srs);
    const repaired = repairItem(item, today, config.srs);
    if (repaired.reasons.length > 0) {
      repairs.push({ id, kind, reasons: repaired.reasons });
    }
    items[id] = repaired.item;
  }

  return { items, merges: renormalized.merges, repairs };
}

/**
 * Turn a parsed JSON document into a Profile.
 *
 * Non-object documents yield a default profile. Merges are logged at info
 * level and repairs at warn level.
 */
export function parseProfile(
  raw: unknown,
  today: string,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG
): ParsedProfile {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    log.warn("Profile document is not an object, starting from defaults");
    return { profile: createDefaultProfile(), merges: [], repairs: [] };
  }

  const stored = StoredProfileSchema.parse(raw);
  const grammar = parseItemMap(stored.grammar_summary, "grammar", today, config);
  const vocab = parseItemMap(stored.vocab_summary, "vocabulary", today, config);

  const progress: Record<string, DifficultyProgress> = {};
  for (const [key, value] of Object.entries(stored.grammar_difficulty_progress)) {
    const id = normalizeItemId(key);
    if (id.length === 0 || progress[id] !== undefined) {
      continue;
    }
    progress[id] = fromStoredDifficultyProgress(value, id, today, config);
  }

  const merges = [...grammar.merges, ...vocab.merges];
  const repairs = [...grammar.repairs, ...vocab.repairs];

  for (const merge of merges) {
    log.info(
      `Merged "${merge.droppedKey}" into "${merge.canonicalId}" (kept "${merge.keptKey}")`
    );
  }
  for (const repair of repairs) {
    log.warn(`Repaired ${repair.kind} item "${repair.id}": ${repair.reasons.join(", ")}`);
  }

  return {
    profile: {
      user_id: stored.user_id,
      level: stored.level,
      learning_preferences: stored.learning_preferences,
      session_tracking: stored.session_tracking,
      grammar_summary: grammar.items,
      vocab_summary: vocab.items,
      grammar_difficulty_progress: progress,
    },
    merges,
    repairs,
  };
}

/**
 * Serialize a profile to its on-disk JSON form.
 */
export function serializeProfile(profile: Profile): string {
  return JSON.stringify(profile, null, 2);
}

// =============================================================================
// File Operations
// =============================================================================

/**
 * Load a profile from disk.
 *
 * Returns a default profile if the file doesn't exist or holds invalid JSON.
 * Other read errors propagate.
 */
export async function loadProfile(
  today: string,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
  profilePath: string = getProfilePath()
): Promise<ParsedProfile> {
  let content: string;
  try {
    content = await readFile(profilePath, "utf-8");
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code === "ENOENT") {
      log.debug("Profile file not found, returning default profile");
      return { profile: createDefaultProfile(), merges: [], repairs: [] };
    }
    log.error(`Failed to read profile: ${(e as Error).message}`);
    throw e;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    log.warn(`Invalid JSON in profile at ${profilePath}, returning default profile`);
    return { profile: createDefaultProfile(), merges: [], repairs: [] };
  }

  return parseProfile(parsed, today, config);
}

/**
 * Save a profile to disk atomically.
 */
export async function saveProfile(
  profile: Profile,
  profilePath: string = getProfilePath()
): Promise<void> {
  const dir = dirname(profilePath);
  const tempPath = join(dir, `.${basename(profilePath)}.${Date.now()}.tmp`);

  try {
    await mkdir(dir, { recursive: true });
    await writeFile(tempPath, serializeProfile(profile), "utf-8");
    await rename(tempPath, profilePath);
    log.debug(`Wrote profile to ${profilePath}`);
  } catch (e) {
    try {
      await unlink(tempPath);
    } catch {
      // Ignore cleanup errors
    }
    throw e;
  }
}
