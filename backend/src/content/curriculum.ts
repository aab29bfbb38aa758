/**
 * Curriculum
 *
 * File-backed CurriculumSource. The curriculum is a YAML document listing
 * grammar points per learner level:
 *
 * ```yaml
 * levels:
 *   beginner:
 *     grammar_points:
 *       - id: "-이에요/예요"
 *         description: "Polite copula"
 *         learning_order: 1
 * ```
 *
 * `learning_order` defaults to the point's position within its level. Ids
 * are canonicalized on load.
 */

import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import {
  formatValidationError,
  LearnerLevelSchema,
  type CurriculumSource,
  type GrammarPoint,
  type LearnerLevel,
} from "@lesson-pacer/shared";
import { createLogger } from "../logger.js";
import { normalizeItemId } from "../scheduling/id-normalizer.js";

const log = createLogger("curriculum");

// =============================================================================
// Schema
// =============================================================================

const CurriculumPointSchema = z.object({
  id: z.string().min(1, "Grammar point id is required"),
  description: z.string().default(""),
  learning_order: z.number().int().min(0).optional(),
});

const CurriculumLevelSchema = z.object({
  grammar_points: z.array(CurriculumPointSchema).default([]),
});

export const CurriculumFileSchema = z.object({
  levels: z
    .object({
      beginner: CurriculumLevelSchema.optional(),
      intermediate: CurriculumLevelSchema.optional(),
      advanced: CurriculumLevelSchema.optional(),
    })
    .default({}),
});

export type CurriculumFile = z.infer<typeof CurriculumFileSchema>;

/**
 * Location of the bundled curriculum.
 */
export function getDefaultCurriculumPath(): string {
  const currentFile = fileURLToPath(import.meta.url);
  const backendDir = dirname(dirname(dirname(currentFile)));
  return join(backendDir, "data", "curriculum", "korean.yaml");
}

// =============================================================================
// Curriculum
// =============================================================================

export class Curriculum implements CurriculumSource {
  private readonly byLevel: ReadonlyMap<LearnerLevel, GrammarPoint[]>;

  constructor(points: GrammarPoint[]) {
    const byLevel = new Map<LearnerLevel, GrammarPoint[]>();
    const seen = new Set<string>();

    for (const point of points) {
      const id = normalizeItemId(point.id);
      if (id.length === 0) {
        log.warn(`Skipping grammar point with unusable id "${point.id}"`);
        continue;
      }
      if (seen.has(id)) {
        log.warn(`Duplicate grammar point "${id}" ignored`);
        continue;
      }
      seen.add(id);
      const list = byLevel.get(point.level) ?? [];
      list.push({ ...point, id });
      byLevel.set(point.level, list);
    }

    for (const list of byLevel.values()) {
      // Array.prototype.sort is stable, so ties keep file order
      list.sort((a, b) => a.learning_order - b.learning_order);
    }
    this.byLevel = byLevel;
  }

  /**
   * Build from a parsed curriculum document.
   */
  static fromFile(file: CurriculumFile): Curriculum {
    const points: GrammarPoint[] = [];
    for (const level of LearnerLevelSchema.options) {
      const entries = file.levels[level]?.grammar_points ?? [];
      entries.forEach((entry, index) => {
        points.push({
          id: entry.id,
          description: entry.description,
          level,
          learning_order: entry.learning_order ?? index + 1,
        });
      });
    }
    return new Curriculum(points);
  }

  static empty(): Curriculum {
    return new Curriculum([]);
  }

  get size(): number {
    let total = 0;
    for (const list of this.byLevel.values()) total += list.length;
    return total;
  }

  /**
   * Grammar points of a level in learning order.
   */
  getGrammarPoints(level: LearnerLevel): GrammarPoint[] {
    return [...(this.byLevel.get(level) ?? [])];
  }

  getUnseenGrammar(level: LearnerLevel, seenIds: ReadonlySet<string>): GrammarPoint[] {
    return this.getGrammarPoints(level).filter((point) => !seenIds.has(point.id));
  }
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Load a curriculum file.
 *
 * A missing, unparseable or invalid file yields an empty curriculum, so new
 * grammar introduction simply produces nothing. Other read errors propagate.
 */
export async function loadCurriculum(
  path: string = getDefaultCurriculumPath()
): Promise<Curriculum> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code === "ENOENT") {
      log.warn(`Curriculum file not found at ${path}, using empty curriculum`);
      return Curriculum.empty();
    }
    throw e;
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    log.warn(`Invalid YAML in curriculum at ${path}: ${message}`);
    return Curriculum.empty();
  }

  const result = CurriculumFileSchema.safeParse(raw);
  if (!result.success) {
    log.warn(formatValidationError(result.error, "curriculum"));
    return Curriculum.empty();
  }

  const curriculum = Curriculum.fromFile(result.data);
  log.debug(`Loaded ${curriculum.size} grammar points from ${path}`);
  return curriculum;
}
