/**
 * Content evaluator
 * Keyword and pattern scoring of subject + body, optionally blended with a text classifier
 */

import { describeError } from '@/lib/errors';
import phishingKeywords from '../data/phishing-keywords.json';
import type { TextClassifier } from '../llm';
import { clampScore, formatScore } from '../score';
import type { ContentDetails, ContentFinding, ContentHighlight, EmailRecord, EvaluationContext, Evaluator } from '../types';

export const PHISHING_KEYWORDS: readonly string[] = phishingKeywords;

export const SUSPICIOUS_PATTERNS: readonly RegExp[] = [
  /!{2,}/g, // repeated exclamation marks
  /\${2,}/g, // repeated dollar signs
  /[A-Z]{5,}/g, // shouting
  /[0-9]{10,}/g, // long digit runs
  /www\.[^.\s]+\.[a-z]{2,}/g,
  /https?:\/\/[^\s]+/g,
];

const KEYWORD_WEIGHT = 0.1;
const PATTERN_WEIGHT = 0.05;
const ML_WEIGHT = 0.6;
const MAX_HIGHLIGHTS = 5;

export interface KeywordAnalysis {
  score: number;
  matchedKeywords: string[];
  matchedPatterns: string[];
}

/**
 * Keywords are matched as lower-case substrings; patterns run on the original text
 */
export function analyzeKeywords(text: string): KeywordAnalysis {
  const lower = text.toLowerCase();
  const matchedKeywords = PHISHING_KEYWORDS.filter((keyword) => lower.includes(keyword));
  const matchedPatterns = SUSPICIOUS_PATTERNS.filter((pattern) => new RegExp(pattern.source).test(text)).map(
    (pattern) => pattern.source
  );

  return {
    score: clampScore(matchedKeywords.length * KEYWORD_WEIGHT + matchedPatterns.length * PATTERN_WEIGHT),
    matchedKeywords,
    matchedPatterns,
  };
}

export function findHighlights(text: string, matchedKeywords: readonly string[]): ContentHighlight[] {
  const highlights: ContentHighlight[] = [];
  const lower = text.toLowerCase();

  for (const keyword of matchedKeywords) {
    let from = 0;
    let position = lower.indexOf(keyword, from);
    while (position !== -1) {
      highlights.push({
        start: position,
        end: position + keyword.length,
        kind: 'keyword',
        token: text.slice(position, position + keyword.length),
      });
      from = position + 1;
      position = lower.indexOf(keyword, from);
    }
  }

  for (const pattern of SUSPICIOUS_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const start = match.index ?? 0;
      highlights.push({ start, end: start + match[0].length, kind: 'pattern', token: match[0] });
    }
  }

  // stable: keywords stay ahead of patterns at the same offset
  return highlights.sort((a, b) => a.start - b.start).slice(0, MAX_HIGHLIGHTS);
}

export function explainContent(details: ContentDetails): string {
  const parts: string[] = [];

  if (details.keywordScore > 0.3) {
    parts.push(`High keyword suspicion (score: ${formatScore(details.keywordScore)})`);
    if (details.matchedKeywords.length > 0) {
      parts.push(`Found suspicious keywords: ${details.matchedKeywords.slice(0, 3).join(', ')}`);
    }
  }

  if (details.mlScore !== null && details.mlScore > 0.5) {
    parts.push(`Classifier predicts high phishing probability (${formatScore(details.mlScore)})`);
  } else if (details.mlScore !== null && details.mlScore > 0) {
    parts.push(`Classifier shows moderate suspicion (${formatScore(details.mlScore)})`);
  }

  if (details.highlights.length > 0) {
    parts.push(`Identified ${details.highlights.length} suspicious text spans`);
  }

  return parts.length > 0 ? parts.join('. ') : 'No significant phishing indicators detected';
}

function stripHtml(html: string): string {
  return html
    .replace(/<[^>]*>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export class ContentEvaluator implements Evaluator<'content'> {
  readonly id = 'content';

  constructor(private readonly classifier: TextClassifier | null = null) {}

  async evaluate(email: EmailRecord, context: EvaluationContext): Promise<ContentFinding> {
    const body = email.bodyText || stripHtml(email.bodyHtml);
    const text = `${email.subject} ${body}`;

    const keywords = analyzeKeywords(text);
    const reasons: string[] = [];
    if (keywords.matchedKeywords.length > 0) {
      reasons.push(`Suspicious keywords: ${keywords.matchedKeywords.slice(0, 5).join(', ')}`);
    }
    if (keywords.matchedPatterns.length > 0) {
      reasons.push(`${keywords.matchedPatterns.length} suspicious text pattern(s)`);
    }

    let mlScore: number | null = null;
    if (this.classifier) {
      try {
        mlScore = clampScore(await this.classifier.classify(text.toLowerCase(), context.signal));
      } catch (error) {
        if (context.signal.aborted) throw error;
        context.logger.warn('Text classifier unavailable, using keyword score', { cause: describeError(error) });
        reasons.push(`Text classifier unavailable: ${describeError(error)}`);
      }
    }

    const score =
      mlScore !== null && mlScore > 0
        ? clampScore(ML_WEIGHT * mlScore + (1 - ML_WEIGHT) * keywords.score)
        : keywords.score;

    if (mlScore !== null && mlScore > 0.5) {
      reasons.unshift(`Classifier phishing probability ${formatScore(mlScore)}`);
    }

    const details: ContentDetails = {
      keywordScore: keywords.score,
      mlScore,
      matchedKeywords: keywords.matchedKeywords,
      matchedPatterns: keywords.matchedPatterns,
      highlights: findHighlights(text, keywords.matchedKeywords),
    };

    return {
      evaluator: 'content',
      score,
      confidence: Math.min(0.9, score + 0.1),
      reasons: reasons.slice(0, 5),
      summary: explainContent(details),
      details,
      degraded: false,
    };
  }
}
