/**
 * Fusion configuration
 *
 * Weights are validated once, when the config is built. A config that exists
 * is always usable by `orchestrate()`.
 */

import { z } from 'zod';
import { ConfigurationError } from '@/lib/errors';
import type { Action, FusedEvaluatorId } from './types';

export const WEIGHT_SUM_TOLERANCE = 1e-3;

/**
 * Canonical 3-band policy: allow < 0.4 <= flag < 0.7 <= quarantine
 */
export const DECISION_THRESHOLDS = {
  flag: 0.4,
  quarantine: 0.7,
} as const;

/** Score at or above which an evaluator counts as high-risk for overrides and confidence */
export const HIGH_RISK_SCORE = 0.8;

export const ACTION_ORDER: readonly Action[] = ['allow', 'flag', 'quarantine'];

export type FusionWeights = Record<FusedEvaluatorId, number>;

export const DEFAULT_WEIGHTS: Readonly<FusionWeights> = {
  content: 0.35,
  link: 0.25,
  behavior: 0.25,
  qr: 0.15,
};

const weight = z.number().finite().min(0).max(1);

export const fusionWeightsSchema = z
  .object({
    content: weight,
    link: weight,
    behavior: weight,
    qr: weight,
  })
  .strict()
  .refine(
    (w) => Math.abs(w.content + w.link + w.behavior + w.qr - 1) <= WEIGHT_SUM_TOLERANCE,
    (w) => ({
      message: `Weights must sum to 1.0 (got ${(w.content + w.link + w.behavior + w.qr).toFixed(4)})`,
    })
  );

export class OrchestrationConfig {
  readonly weights: Readonly<FusionWeights>;

  /**
   * @throws ConfigurationError when a weight is outside [0,1] or the sum is off by more than 1e-3
   */
  constructor(weights: Partial<FusionWeights> = {}) {
    const parsed = fusionWeightsSchema.safeParse({ ...DEFAULT_WEIGHTS, ...weights });
    if (!parsed.success) {
      throw new ConfigurationError(
        'Invalid orchestration weights',
        parsed.error.issues.map((issue) => ({
          field: issue.path.join('.') || 'weights',
          message: issue.message,
        }))
      );
    }
    this.weights = Object.freeze(parsed.data);
  }

  weightOf(evaluator: FusedEvaluatorId): number {
    return this.weights[evaluator];
  }
}

export function decide(score: number): Action {
  if (score >= DECISION_THRESHOLDS.quarantine) return 'quarantine';
  if (score >= DECISION_THRESHOLDS.flag) return 'flag';
  return 'allow';
}
