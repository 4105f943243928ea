/**
 * Header evaluator
 * Thin wrapper around the Routing Path Analyzer
 */

import { analyzeRouting, DEFAULT_MAX_NORMAL_HOPS, topReasonTexts } from '../routing-analyzer';
import { formatScore } from '../score';
import type { EmailRecord, EvaluationContext, Evaluator, HeaderFinding, RoutingVerdict } from '../types';

const VERDICT_LABELS: Record<RoutingVerdict, string> = {
  identity_mismatch: 'Sender identity does not match the delivery path',
  suspicious_routing: 'Suspicious delivery path',
  normal: 'Headers look normal',
};

export class HeaderEvaluator implements Evaluator<'header'> {
  readonly id = 'header';

  constructor(private readonly maxNormalHops: number = DEFAULT_MAX_NORMAL_HOPS) {}

  async evaluate(email: EmailRecord, context: EvaluationContext): Promise<HeaderFinding> {
    const assessment = analyzeRouting(email.headers, { maxNormalHops: this.maxNormalHops });

    context.logger.debug('Routing analyzed', {
      hops: assessment.routing.hopCount,
      verdict: assessment.verdict,
    });

    return {
      evaluator: 'header',
      score: assessment.score,
      confidence: assessment.confidence,
      reasons: topReasonTexts(assessment.reasons),
      summary: `${VERDICT_LABELS[assessment.verdict]} (${assessment.routing.hopCount} hops, score ${formatScore(assessment.score)})`,
      details: {
        verdict: assessment.verdict,
        routing: assessment.routing,
        reasons: assessment.reasons,
      },
      degraded: false,
    };
  }
}
