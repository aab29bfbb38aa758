/**
 * Item Id Normalizer
 *
 * Collapses the inconsistent labels the exercise generator and older profile
 * versions produce for one grammar pattern ("-아요/-어요", "-아요-어요",
 * "-아요어요", "-아요 / -어요") into a single canonical key.
 *
 * The result is lowercase for Latin text, keeps Hangul and other scripts
 * intact, and uses "_" as the only separator. A leading "-" marks a bound
 * ending and is kept on the first segment only.
 */

// =============================================================================
// Constants
// =============================================================================

/**
 * Particle and ending pairs that labels sometimes write without a separator.
 * Only whole segments are split, so words that merely contain these syllables
 * are left alone.
 */
const MASHED_PAIRS: Readonly<Record<string, string>> = {
  이에요예요: "이에요_예요",
  아요어요: "아요_어요",
  은는: "은_는",
  이가: "이_가",
  을를: "을_를",
};

/** Characters treated as alternative separators */
const SEPARATOR_PATTERN = /[/\\|,;+]/g;

/** An opening bracket after whitespace starts an annotation segment */
const ANNOTATION_OPEN_PATTERN = /\s+[([{]/g;

/** Anything that is not a letter, mark, digit, "_" or "-" */
const PUNCTUATION_PATTERN = /[^\p{L}\p{M}\p{N}_-]/gu;

/** A hyphen joining two Hangul syllables is a separator, not a prefix */
const HANGUL_HYPHEN_PATTERN = /(?<=\p{Script=Hangul})-(?=\p{Script=Hangul})/gu;

// =============================================================================
// Normalization
// =============================================================================

/**
 * Normalize a raw item id into its canonical form.
 *
 * Deterministic and idempotent. Returns "" when the input holds no letters or
 * digits; callers skip empty ids.
 *
 * @example
 * normalizeItemId("-아요/-어요") // "-아요_어요"
 * normalizeItemId("-이에요예요") // "-이에요_예요"
 * normalizeItemId("Topic marker (은/는)") // "topic_marker_은_는"
 */
export function normalizeItemId(rawId: string): string {
  let s = rawId.normalize("NFKC").trim().toLowerCase();
  if (s.length === 0) {
    return "";
  }

  s = s.replace(ANNOTATION_OPEN_PATTERN, " ");
  s = s.replace(SEPARATOR_PATTERN, "_");
  s = s.replace(/\s+/g, "_");
  s = s.replace(PUNCTUATION_PATTERN, "");
  s = s.replace(/-{2,}/g, "-");
  s = s.replace(HANGUL_HYPHEN_PATTERN, "_");

  const segments = s
    .split("_")
    .filter((segment) => segment.length > 0)
    .map((segment, index) => {
      const trimmed = segment.replace(/-+$/, "");
      return index === 0 ? trimmed : trimmed.replace(/^-+/, "");
    })
    .filter((segment) => segment.length > 0 && segment !== "-");

  return segments.map(splitMashedPair).join("_");
}

/**
 * Split a segment that is exactly a known mashed pair, keeping its prefix.
 */
function splitMashedPair(segment: string): string {
  const prefix = segment.startsWith("-") ? "-" : "";
  const body = segment.slice(prefix.length);
  const split = MASHED_PAIRS[body];
  return split === undefined ? segment : prefix + split;
}

// =============================================================================
// Key Space Merging
// =============================================================================

/**
 * A collision between two stored keys that normalize to the same id.
 */
export interface MergeEvent {
  canonicalId: string;
  keptKey: string;
  droppedKey: string;
}

/**
 * Result of renormalizing a keyed collection.
 */
export interface RenormalizeResult<T> {
  items: Record<string, T>;
  merges: MergeEvent[];
  /** Keys that normalized to the empty string and were dropped */
  discarded: string[];
}

/**
 * Re-key a collection by canonical id.
 *
 * When two keys collide, the entry with the higher `repetitions` survives;
 * on a tie the first one encountered is kept. Does not mutate the input.
 */
export function renormalizeKeys<T extends { repetitions: number }>(
  items: Record<string, T>
): RenormalizeResult<T> {
  const result: Record<string, T> = {};
  const sourceKeys = new Map<string, string>();
  const merges: MergeEvent[] = [];
  const discarded: string[] = [];

  for (const [rawKey, item] of Object.entries(items)) {
    const canonicalId = normalizeItemId(rawKey);
    if (canonicalId.length === 0) {
      discarded.push(rawKey);
      continue;
    }

    const existing = result[canonicalId];
    const existingKey = sourceKeys.get(canonicalId);
    if (existing === undefined || existingKey === undefined) {
      result[canonicalId] = item;
      sourceKeys.set(canonicalId, rawKey);
      continue;
    }

    if (item.repetitions > existing.repetitions) {
      result[canonicalId] = item;
      sourceKeys.set(canonicalId, rawKey);
      merges.push({ canonicalId, keptKey: rawKey, droppedKey: existingKey });
    } else {
      merges.push({ canonicalId, keptKey: existingKey, droppedKey: rawKey });
    }
  }

  return { items: result, merges, discarded };
}
