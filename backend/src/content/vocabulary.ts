/**
 * Vocabulary Corpus
 *
 * File-backed VocabularySource. The corpus is a JSON object keyed by word:
 *
 * ```json
 * { "학교": { "translation": "school", "frequency_rank": 12, "topik_level": "1급" } }
 * ```
 *
 * The older array form, `[{ "vocab": "학교", ... }]`, is accepted too.
 */

import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { LearnerLevel, VocabularySource } from "@lesson-pacer/shared";
import { createLogger } from "../logger.js";
import { normalizeItemId } from "../scheduling/id-normalizer.js";

const log = createLogger("vocabulary");

// =============================================================================
// Schema
// =============================================================================

const VocabInfoSchema = z.object({
  translation: z.string().catch(""),
  frequency_rank: z.number().int().min(0).nullable().catch(null),
  topik_level: z.string().catch(""),
  tags: z.string().catch(""),
});

const LegacyVocabEntrySchema = VocabInfoSchema.extend({
  vocab: z.string().min(1),
});

export interface VocabEntry {
  word: string;
  translation: string;
  frequency_rank: number | null;
  topik_level: string;
  tags: string;
}

/**
 * TOPIK level prefixes and tags accepted for each learner level.
 */
const LEVEL_FILTERS: Readonly<Record<LearnerLevel, { topik: string[]; tags: string[] }>> = {
  beginner: { topik: ["1"], tags: ["Beginner"] },
  intermediate: { topik: ["1", "2"], tags: ["Beginner", "Intermediate"] },
  advanced: { topik: ["1", "2", "3"], tags: ["Beginner", "Intermediate", "Advanced"] },
};

/**
 * Location of the bundled corpus.
 */
export function getDefaultVocabularyPath(): string {
  const currentFile = fileURLToPath(import.meta.url);
  const backendDir = dirname(dirname(dirname(currentFile)));
  return join(backendDir, "data", "vocabulary.json");
}

// =============================================================================
// Corpus
// =============================================================================

function byFrequency(a: VocabEntry, b: VocabEntry): number {
  const rankA = a.frequency_rank ?? Number.MAX_SAFE_INTEGER;
  const rankB = b.frequency_rank ?? Number.MAX_SAFE_INTEGER;
  return rankA - rankB;
}

export class VocabularyCorpus implements VocabularySource {
  private readonly entries: VocabEntry[];

  constructor(entries: VocabEntry[]) {
    this.entries = [...entries].sort(byFrequency);
  }

  static empty(): VocabularyCorpus {
    return new VocabularyCorpus([]);
  }

  get size(): number {
    return this.entries.length;
  }

  getEntry(word: string): VocabEntry | undefined {
    return this.entries.find((entry) => entry.word === word);
  }

  /**
   * Words matching a learner level, most frequent first.
   */
  getWordsForLevel(level: LearnerLevel): VocabEntry[] {
    const filter = LEVEL_FILTERS[level];
    return this.entries.filter(
      (entry) =>
        filter.topik.some((prefix) => entry.topik_level.trim().startsWith(prefix)) ||
        filter.tags.includes(entry.tags.trim())
    );
  }

  getCandidateWords(
    level: LearnerLevel,
    knownWords: ReadonlySet<string>,
    limit: number
  ): string[] {
    if (limit <= 0) {
      return [];
    }
    const words: string[] = [];
    for (const entry of this.getWordsForLevel(level)) {
      if (words.length >= limit) break;
      if (knownWords.has(entry.word) || knownWords.has(normalizeItemId(entry.word))) continue;
      words.push(entry.word);
    }
    return words;
  }
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Turn a parsed corpus document into entries. Accepts the keyed object form
 * and the older array form; malformed entries are skipped.
 */
export function parseVocabulary(raw: unknown): VocabEntry[] {
  const entries: VocabEntry[] = [];

  if (Array.isArray(raw)) {
    for (const item of raw) {
      const result = LegacyVocabEntrySchema.safeParse(item);
      if (!result.success) {
        log.warn("Skipping vocabulary entry without a word");
        continue;
      }
      const { vocab, ...info } = result.data;
      entries.push({ word: vocab, ...info });
    }
    return entries;
  }

  if (typeof raw === "object" && raw !== null) {
    for (const [word, info] of Object.entries(raw)) {
      const result = VocabInfoSchema.safeParse(info);
      if (word.trim().length === 0 || !result.success) {
        log.warn(`Skipping malformed vocabulary entry "${word}"`);
        continue;
      }
      entries.push({ word, ...result.data });
    }
    return entries;
  }

  log.warn("Vocabulary document is neither an object nor an array");
  return entries;
}

/**
 * Load a corpus file. A missing or unparseable file yields an empty corpus.
 * Other read errors propagate.
 */
export async function loadVocabulary(
  path: string = getDefaultVocabularyPath()
): Promise<VocabularyCorpus> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code === "ENOENT") {
      log.warn(`Vocabulary file not found at ${path}, using empty corpus`);
      return VocabularyCorpus.empty();
    }
    throw e;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    log.warn(`Invalid JSON in vocabulary at ${path}, using empty corpus`);
    return VocabularyCorpus.empty();
  }

  const corpus = new VocabularyCorpus(parseVocabulary(raw));
  log.debug(`Loaded ${corpus.size} vocabulary entries from ${path}`);
  return corpus;
}
