/**
 * Link evaluator
 * Scores every supplied or extracted URL with the Domain Risk Scorer and averages them
 */

import type { DomainRiskScorer } from '../domain-risk';
import { extractUrls } from '../parser';
import { clampScore, formatScore, mean } from '../score';
import type { DomainAssessment, EmailRecord, EvaluationContext, Evaluator, LinkDetails, LinkFinding } from '../types';

export const SUSPICIOUS_LINK_SCORE = 0.5;
export const HIGH_RISK_LINK_SCORE = 0.7;

/**
 * Supplied URLs first, then URLs found in the bodies, first occurrence wins
 */
export function collectUrls(email: EmailRecord): string[] {
  const seen = new Set<string>();
  const urls: string[] = [];
  for (const url of [...email.urls, ...extractUrls(email.bodyHtml, email.bodyText)]) {
    const trimmed = url.trim();
    if (trimmed && !seen.has(trimmed)) {
      seen.add(trimmed);
      urls.push(trimmed);
    }
  }
  return urls;
}

function describeLinks(details: LinkDetails, score: number): string {
  if (details.totalLinks === 0) {
    return 'No links found';
  }

  const parts = [`Analyzed ${details.totalLinks} links.`];
  if (details.suspiciousCount > 0) {
    parts.push(`${details.suspiciousCount} suspicious (${details.highRiskCount} high risk).`);
  } else {
    parts.push('No suspicious links.');
  }
  if (details.ipLiteralCount > 0) {
    parts.push(`${details.ipLiteralCount} use raw IP addresses.`);
  }
  parts.push(`Average risk ${formatScore(score)}.`);
  return parts.join(' ');
}

function label(assessment: DomainAssessment): string {
  return assessment.domain ?? assessment.url;
}

export class LinkEvaluator implements Evaluator<'link'> {
  readonly id = 'link';

  constructor(private readonly scorer: DomainRiskScorer) {}

  async evaluate(email: EmailRecord, context: EvaluationContext): Promise<LinkFinding> {
    const urls = collectUrls(email);
    const links = await Promise.all(urls.map((url) => this.scorer.assess(url, context.signal)));

    const score = clampScore(mean(links.map((link) => link.score)));
    const details: LinkDetails = {
      links,
      totalLinks: links.length,
      suspiciousCount: links.filter((link) => link.score >= SUSPICIOUS_LINK_SCORE).length,
      highRiskCount: links.filter((link) => link.score >= HIGH_RISK_LINK_SCORE).length,
      ipLiteralCount: links.filter((link) => link.status === 'ok' && link.isIpLiteral).length,
    };

    const reasons = [...links]
      .filter((link) => link.score >= SUSPICIOUS_LINK_SCORE)
      .sort((a, b) => b.score - a.score)
      .flatMap((link) => link.reasons.slice(0, 2).map((reason) => `${label(link)}: ${reason}`))
      .slice(0, 5);

    context.logger.debug('Links assessed', { total: details.totalLinks, suspicious: details.suspiciousCount });

    return {
      evaluator: 'link',
      score,
      confidence: Math.min(0.95, 0.3 + 0.5 * score),
      reasons,
      summary: describeLinks(details, score),
      details,
      degraded: false,
    };
  }
}
