/**
 * Tunable constants for the content-scoring fallback.
 *
 * The defaults are a starting point; callers can override any subset per
 * extraction through `ExtractOptions.scoring`.
 */
import { z } from 'zod';

import { logger } from '../logger.js';

export const ScoringConfigSchema = z.object({
  /** Unlikely-looking nodes are only stripped above this link density */
  unlikelyLinkDensity: z.number().min(0).max(1),
  /** Minimum text length for a node to seed a score */
  minParagraphLength: z.number().int().nonnegative(),
  /** Characters per length bonus point */
  charsPerLengthPoint: z.number().positive(),
  maxLengthBonus: z.number().nonnegative(),
  parentWeight: z.number().nonnegative(),
  grandparentWeight: z.number().nonnegative(),
  /** Siblings scoring at least this share of the top score are merged */
  siblingScoreRatio: z.number().min(0).max(1),
  substantialParagraphLength: z.number().int().nonnegative(),
  substantialParagraphLinkDensity: z.number().min(0).max(1),
  sweepLinkDensity: z.number().min(0).max(1),
  /** Link-heavy captions shorter than this survive the sweep */
  captionMaxLength: z.number().int().nonnegative(),
  /** Wall-clock budget shared by every scoring pass */
  deadlineMs: z.number().nonnegative(),
  /** A pass whose content text is shorter than this triggers a relaxed retry */
  minContentLength: z.number().int().nonnegative(),
});

export type ScoringConfig = z.infer<typeof ScoringConfigSchema>;

export const DEFAULT_SCORING_CONFIG: Readonly<ScoringConfig> = {
  unlikelyLinkDensity: 0.5,
  minParagraphLength: 25,
  charsPerLengthPoint: 100,
  maxLengthBonus: 3,
  parentWeight: 1,
  grandparentWeight: 0.5,
  siblingScoreRatio: 0.2,
  substantialParagraphLength: 80,
  substantialParagraphLinkDensity: 0.25,
  sweepLinkDensity: 0.25,
  captionMaxLength: 140,
  deadlineMs: 2000,
  minContentLength: 100,
};

/**
 * Merge overrides onto the defaults. Invalid overrides are logged and
 * the defaults are used instead.
 */
export function resolveScoringConfig(overrides?: Partial<ScoringConfig>): ScoringConfig {
  if (!overrides) return { ...DEFAULT_SCORING_CONFIG };

  const result = ScoringConfigSchema.safeParse({ ...DEFAULT_SCORING_CONFIG, ...overrides });
  if (!result.success) {
    logger.warn({ error: result.error.message }, 'Invalid scoring config, using defaults');
    return { ...DEFAULT_SCORING_CONFIG };
  }
  return result.data;
}
