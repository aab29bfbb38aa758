/**
 * Lesson Pacer Shared Types
 *
 * Collaborator contracts consumed by the session planner. Implementations
 * are constructed by the caller and passed in explicitly.
 */

import type { GrammarPoint, LearnerLevel } from "./protocol.js";

/**
 * Source of curriculum grammar points.
 */
export interface CurriculumSource {
  /**
   * Grammar points at the given level whose canonical id is not in `seenIds`,
   * ordered by `learning_order`.
   */
  getUnseenGrammar(level: LearnerLevel, seenIds: ReadonlySet<string>): GrammarPoint[];
}

/**
 * Source of candidate vocabulary.
 */
export interface VocabularySource {
  /**
   * Up to `limit` level-appropriate words not in `knownWords`, most frequent first.
   */
  getCandidateWords(
    level: LearnerLevel,
    knownWords: ReadonlySet<string>,
    limit: number
  ): string[];
}

/**
 * Collaborators the planner consults for new material.
 */
export interface ContentSources {
  curriculum: CurriculumSource;
  vocabulary: VocabularySource;
}
