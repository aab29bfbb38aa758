/**
 * Lesson Pacer Backend
 *
 * Scheduling engine for one learner profile:
 * - SRS updates and load-time repair
 * - Mastery classification and new-content readiness
 * - Session planning and recording
 * - File-backed curriculum and vocabulary sources
 */

export * from "./scheduling/index.js";
export {
  Curriculum,
  loadCurriculum,
  getDefaultCurriculumPath,
} from "./content/curriculum.js";
export {
  VocabularyCorpus,
  loadVocabulary,
  parseVocabulary,
  getDefaultVocabularyPath,
  type VocabEntry,
} from "./content/vocabulary.js";
export { createLogger, type Logger } from "./logger.js";
