/**
 * Session Planner
 *
 * Selects the items for one session: grammar reviews by urgency tier,
 * vocabulary reviews by due date, and new material when the readiness gate
 * allows it. The result depends only on the profile, the date, the config and
 * the collaborators passed in.
 */

import type {
  ContentSources,
  GrammarPoint,
  SessionSelection,
} from "@lesson-pacer/shared";
import { plannerLog as log } from "../logger.js";
import { normalizeItemId } from "./id-normalizer.js";
import { isDue, type LearningItem } from "./item-schema.js";
import { classifyMastery, isStruggling } from "./mastery.js";
import type { Profile } from "./profile-schema.js";
import { evaluateReadiness } from "./readiness-gate.js";
import { DEFAULT_SCHEDULER_CONFIG, type SchedulerConfig } from "./scheduler-config.js";

// =============================================================================
// Urgency
// =============================================================================

export type UrgencyTier = "urgent" | "regular" | "maintenance";

/**
 * Classify a grammar item by review urgency.
 *
 * Urgent: struggling, or overdue while still at a low level.
 * Maintenance: mastered and not urgent.
 * Regular: everything else.
 */
export function classifyUrgency(
  item: LearningItem,
  today: string,
  profile: Profile,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG
): UrgencyTier {
  const overdue = item.next_review_date < today;
  if (
    isStruggling(item, config.struggling) ||
    (overdue && item.repetitions < config.planner.overdueLowRepetitions)
  ) {
    return "urgent";
  }
  if (classifyMastery(item, profile.learning_preferences.mastery_thresholds) === "mastered") {
    return "maintenance";
  }
  return "regular";
}

/**
 * Earliest next review first, then id.
 */
export function compareByDueDate(a: LearningItem, b: LearningItem): number {
  if (a.next_review_date !== b.next_review_date) {
    return a.next_review_date < b.next_review_date ? -1 : 1;
  }
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

export interface DueGrammarPartition {
  urgent: LearningItem[];
  regular: LearningItem[];
  maintenance: LearningItem[];
}

/**
 * Split due grammar items into urgency tiers, each ordered by due date.
 */
export function partitionDueGrammar(
  profile: Profile,
  today: string,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG
): DueGrammarPartition {
  const partition: DueGrammarPartition = { urgent: [], regular: [], maintenance: [] };
  const due = Object.values(profile.grammar_summary)
    .filter((item) => isDue(item.next_review_date, today))
    .sort(compareByDueDate);

  for (const item of due) {
    partition[classifyUrgency(item, today, profile, config)].push(item);
  }
  return partition;
}

/**
 * Due vocabulary items ordered by due date.
 */
export function dueVocabulary(profile: Profile, today: string): LearningItem[] {
  return Object.values(profile.vocab_summary)
    .filter((item) => isDue(item.next_review_date, today))
    .sort(compareByDueDate);
}

// =============================================================================
// New Material
// =============================================================================

/**
 * Canonicalize curriculum points and drop anything already known.
 */
function unseenGrammar(
  points: GrammarPoint[],
  known: ReadonlySet<string>,
  limit: number
): GrammarPoint[] {
  const selected: GrammarPoint[] = [];
  const taken = new Set<string>();
  for (const point of points) {
    if (selected.length >= limit) break;
    const id = normalizeItemId(point.id);
    if (id.length === 0 || known.has(id) || taken.has(id)) continue;
    taken.add(id);
    selected.push({ ...point, id });
  }
  return selected;
}

function unseenWords(words: string[], known: ReadonlySet<string>, limit: number): string[] {
  const selected: string[] = [];
  for (const word of words) {
    if (selected.length >= limit) break;
    const id = normalizeItemId(word);
    if (id.length === 0 || known.has(id) || selected.includes(id)) continue;
    selected.push(id);
  }
  return selected;
}

// =============================================================================
// Selection
// =============================================================================

/**
 * Build the selection for one session.
 *
 * Missing collaborators yield no new material.
 */
export function selectSessionItems(
  profile: Profile,
  sources: Partial<ContentSources>,
  today: string,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG
): SessionSelection {
  const prefs = profile.learning_preferences;

  const partition = partitionDueGrammar(profile, today, config);
  const reviewGrammar = [
    ...partition.urgent,
    ...partition.regular,
    ...partition.maintenance.slice(0, prefs.maintenance_reviews_per_session),
  ]
    .slice(0, prefs.reviews_per_session)
    .map((item) => item.id);

  const reviewVocab = dueVocabulary(profile, today)
    .slice(0, prefs.vocab_reviews_per_session)
    .map((item) => item.id);

  const selection: SessionSelection = {
    review_grammar: reviewGrammar,
    review_vocab: reviewVocab,
    new_grammar: [],
    new_vocab: [],
  };

  const readiness = evaluateReadiness(profile, today, config);
  if (!readiness.allowed) {
    log.debug(`New content blocked: ${readiness.reason}`, readiness.counts);
    return selection;
  }

  const grammarCap = Math.min(prefs.new_grammar_per_session, prefs.max_new_items_per_session);
  if (grammarCap > 0 && sources.curriculum) {
    const known = new Set(Object.keys(profile.grammar_summary));
    selection.new_grammar = unseenGrammar(
      sources.curriculum.getUnseenGrammar(profile.level, known),
      known,
      grammarCap
    );
  }

  const vocabCap = Math.min(
    prefs.new_vocab_per_session,
    prefs.max_new_items_per_session - selection.new_grammar.length
  );
  if (vocabCap > 0 && sources.vocabulary) {
    const known = new Set(Object.keys(profile.vocab_summary));
    selection.new_vocab = unseenWords(
      sources.vocabulary.getCandidateWords(profile.level, known, vocabCap),
      known,
      vocabCap
    );
  }

  log.debug(
    `Selected ${reviewGrammar.length} grammar reviews, ${reviewVocab.length} vocab reviews, ` +
      `${selection.new_grammar.length} new grammar, ${selection.new_vocab.length} new vocab`
  );
  return selection;
}
