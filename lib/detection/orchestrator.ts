/**
 * Risk fusion
 *
 * Turns the four fused findings into one decision:
 * 1. Weighted sum of scores
 * 2. Baseline action from the 3-band thresholds
 * 3. Escalation overrides (raise only, applied in order)
 * 4. Confidence from score, agreement and high-risk count
 * 5. Ranked reasons and a one-paragraph summary
 *
 * The header finding is reported alongside but is not part of the weighted sum.
 */

import { ACTION_ORDER, DECISION_THRESHOLDS, HIGH_RISK_SCORE, decide, type OrchestrationConfig } from './config';
import { SUSPICIOUS_QR_SCORE } from './evaluators/qr';
import { clampScore, formatScore, stddev } from './score';
import type {
  Action,
  DomainAssessment,
  FusedEvaluatorId,
  FusionInput,
  OrchestrationResult,
  RankedReason,
  RiskBand,
} from './types';

const FUSED_EVALUATORS: readonly FusedEvaluatorId[] = ['content', 'link', 'behavior', 'qr'];

/**
 * Weights used to order reasons; independent of the fusion weights
 */
export const REASON_WEIGHTS: Readonly<Record<FusedEvaluatorId, number>> = {
  content: 0.5,
  link: 0.3,
  behavior: 0.25,
  qr: 0.15,
};

const SUMMARY_REASON_COUNT = 3;
const HIGHLIGHT_SCORE = 0.5;
const SUSPICIOUS_LINK_SCORE = 0.5;

function escalate(action: Action): Action {
  const index = ACTION_ORDER.indexOf(action);
  return ACTION_ORDER[Math.min(index + 1, ACTION_ORDER.length - 1)];
}

function maxAction(a: Action, b: Action): Action {
  return ACTION_ORDER.indexOf(a) >= ACTION_ORDER.indexOf(b) ? a : b;
}

export function fuseScores(findings: FusionInput, config: OrchestrationConfig): number {
  return clampScore(FUSED_EVALUATORS.reduce((sum, id) => sum + config.weightOf(id) * findings[id].score, 0));
}

interface OverrideOutcome {
  action: Action;
  applied: string[];
}

export function applyOverrides(baseline: Action, findings: FusionInput): OverrideOutcome {
  let action = baseline;
  const applied: string[] = [];

  const link = findings.link;
  const links = link.details?.links ?? [];
  if (link.score >= HIGH_RISK_SCORE && links.some((entry) => entry.score >= HIGH_RISK_SCORE)) {
    const next = maxAction(action, 'quarantine');
    if (next !== action) applied.push('high-risk link');
    action = next;
  }

  if (findings.behavior.score >= HIGH_RISK_SCORE) {
    const next = escalate(action);
    if (next !== action) applied.push('high-risk sender behavior');
    action = next;
  }

  const qr = findings.qr;
  if (qr.score >= HIGH_RISK_SCORE && (qr.details?.suspiciousCount ?? 0) > 0) {
    const next = escalate(action);
    if (next !== action) applied.push('suspicious QR code');
    action = next;
  }

  return { action, applied };
}

export function computeConfidence(finalScore: number, findings: FusionInput): number {
  const scores = FUSED_EVALUATORS.map((id) => findings[id].score);
  const agreementBonus = Math.max(0, 0.1 - stddev(scores));
  const highRiskBonus = 0.05 * scores.filter((score) => score >= HIGH_RISK_SCORE).length;
  return Math.min(0.99, 0.6 + 0.3 * finalScore + agreementBonus + highRiskBonus);
}

function linkLabel(link: DomainAssessment): string {
  return link.domain ?? link.url;
}

/**
 * Every explanation tagged with its evaluator, sorted by score * weight (descending).
 * Per-link and per-code reasons carry that item's own score.
 */
export function rankReasons(findings: FusionInput): RankedReason[] {
  const ranked: RankedReason[] = [];

  const push = (evaluator: FusedEvaluatorId, text: string, rawScore = findings[evaluator].score) => {
    const weight = REASON_WEIGHTS[evaluator];
    ranked.push({ evaluator, text, rawScore, weight, priority: rawScore * weight });
  };

  const content = findings.content;
  if (content.score > 0) {
    push('content', `Content: ${content.summary}`);
  }

  const link = findings.link;
  if (link.score > 0) {
    push('link', `Links: ${link.summary}`);
    for (const entry of link.details?.links ?? []) {
      if (entry.score >= SUSPICIOUS_LINK_SCORE) {
        for (const reason of entry.reasons.slice(0, 2)) {
          push('link', `Link ${linkLabel(entry)}: ${reason}`, entry.score);
        }
      }
    }
  }

  const behavior = findings.behavior;
  if (behavior.score > 0) {
    for (const reason of behavior.reasons) {
      push('behavior', `Behavior: ${reason}`);
    }
  }

  const qr = findings.qr;
  if (qr.score > 0) {
    push('qr', `QR Codes: ${qr.summary}`);
    for (const code of qr.details?.codes ?? []) {
      if (code.score < SUSPICIOUS_QR_SCORE) continue;
      for (const reason of code.reasons.slice(0, 2)) {
        push('qr', `QR Code (${code.contentType}): ${reason}`, code.score);
      }
    }
  }

  // Array.prototype.sort is stable: equal priorities keep insertion order
  return ranked.sort((a, b) => b.priority - a.priority);
}

export function riskBand(score: number): RiskBand {
  if (score >= DECISION_THRESHOLDS.quarantine) return 'HIGH';
  if (score >= DECISION_THRESHOLDS.flag) return 'MEDIUM';
  return 'LOW';
}

function evaluatorHighlights(findings: FusionInput): string[] {
  const highlights: string[] = [];

  const content = findings.content;
  if (content.score >= HIGHLIGHT_SCORE) {
    const elements = content.details?.highlights.length ?? 0;
    highlights.push(elements > 0 ? `Content: ${elements} suspicious elements` : 'Content: High ML suspicion');
  }

  const link = findings.link;
  if (link.score >= HIGHLIGHT_SCORE && link.details) {
    highlights.push(`Links: ${link.details.suspiciousCount}/${link.details.totalLinks} suspicious`);
  }

  const behavior = findings.behavior;
  if (behavior.score >= HIGHLIGHT_SCORE) {
    highlights.push(behavior.details?.isNewSender ? 'Behavior: New sender' : 'Behavior: Pattern anomalies');
  }

  const qr = findings.qr;
  if (qr.score >= HIGHLIGHT_SCORE && qr.details) {
    highlights.push(
      qr.details.suspiciousCount > 0
        ? `QR Codes: ${qr.details.suspiciousCount}/${qr.details.totalCodes} suspicious`
        : `QR Codes: ${qr.details.totalCodes} detected`
    );
  }

  return highlights;
}

export function generateSummary(finalScore: number, ranked: readonly RankedReason[], findings: FusionInput): string {
  const parts = [`${riskBand(finalScore)} RISK (Score: ${formatScore(finalScore)}).`];

  const top = ranked.slice(0, SUMMARY_REASON_COUNT).map((reason) => reason.text);
  parts.push(top.length > 0 ? `Key concerns: ${top.join('; ')}.` : 'No significant threats detected.');

  const highlights = evaluatorHighlights(findings);
  if (highlights.length > 0) {
    parts.push(`Analysis: ${highlights.join(', ')}.`);
  }

  return parts.join(' ');
}

/**
 * Fuse the four weighted findings into a decision. Never throws for a
 * constructed config and findings with scores in [0,1].
 */
export function orchestrate(findings: FusionInput, config: OrchestrationConfig): OrchestrationResult {
  const finalScore = fuseScores(findings, config);
  const baselineAction = decide(finalScore);
  const { action, applied } = applyOverrides(baselineAction, findings);
  const rankedReasons = rankReasons(findings);

  return {
    finalScore,
    action,
    baselineAction,
    overrides: applied,
    confidence: computeConfidence(finalScore, findings),
    summary: generateSummary(finalScore, rankedReasons, findings),
    rankedReasons,
  };
}
