/**
 * Behavior evaluator
 * Sender history, reply-to and display-name heuristics
 */

import { describeError } from '@/lib/errors';
import type { SenderHistoryStore } from '@/lib/reputation/sender-history';
import { detectDisplayNameBrandSpoof } from '../brand-protection';
import { extractDomain, getHeader } from '../parser';
import { clampScore } from '../score';
import type { BehaviorDetails, BehaviorFinding, EmailRecord, EvaluationContext, Evaluator, SenderHistory } from '../types';

const GENERIC_DISPLAY_NAMES = [
  'customer service',
  'support team',
  'security alert',
  'account team',
  'billing department',
  'verification team',
  'no-reply',
  'automated',
];

const URGENT_SUBJECT_WORDS = ['urgent', 'immediate', 'asap', 'expires', 'suspended'];
const BULK_MAILER = /bulk|mass|blast/i;
const DAY_MS = 24 * 60 * 60 * 1000;

interface Signal {
  score: number;
  reason: string;
}

export function checkHistoryChanges(history: SenderHistory, displayName: string, replyTo: string): Signal[] {
  const signals: Signal[] = [];

  if (displayName && !history.displayNames.includes(displayName) && history.displayNames.length > 0) {
    signals.push({
      score: 0.2,
      reason: `New display name '${displayName}' (previous: ${history.displayNames.slice(0, 2).join(', ')})`,
    });
  }

  if (replyTo && !history.replyToAddresses.includes(replyTo) && history.replyToAddresses.length > 0) {
    signals.push({ score: 0.15, reason: `New reply-to address '${replyTo}'` });
  }

  if (history.messageCount > 1) {
    const spanMs = history.lastSeen.getTime() - history.firstSeen.getTime();
    if (spanMs > 0) {
      const perDay = history.messageCount / (spanMs / DAY_MS);
      if (perDay > 10) {
        signals.push({ score: 0.1, reason: `High message frequency (${perDay.toFixed(1)} per day)` });
      }
    }
  }

  return signals;
}

export function checkReplyTo(sender: string, replyTo: string): Signal[] {
  if (!sender || !replyTo) return [];
  const senderLocal = sender.split('@')[0];
  const replyLocal = replyTo.split('@')[0];
  if (senderLocal === replyLocal) return [];
  return [{ score: 0.3, reason: `Reply-To local part '${replyLocal}' differs from sender '${senderLocal}'` }];
}

export function checkDisplayName(displayName: string, sender: string): Signal[] {
  if (!displayName || !sender) return [];

  const signals: Signal[] = [];
  const senderDomain = extractDomain(sender);
  const nameLower = displayName.toLowerCase();

  const spoof = detectDisplayNameBrandSpoof(displayName, senderDomain);
  if (spoof) {
    signals.push({
      score: 0.2,
      reason: `Display name suggests '${spoof.brand.brand}' but sender domain is '${spoof.senderDomain}'`,
    });
  }

  if (displayName.includes('@')) {
    signals.push({ score: 0.15, reason: 'Display name contains an email address' });
  }

  const generic = GENERIC_DISPLAY_NAMES.find((name) => nameLower.includes(name) && !senderDomain.includes(name));
  if (generic) {
    signals.push({ score: 0.1, reason: `Generic display name '${generic}' with unrelated domain` });
  }

  return signals;
}

function checkMessageTraits(email: EmailRecord, sentAt: Date | null): Signal[] {
  const signals: Signal[] = [];

  if (!getHeader(email.headers, 'Message-ID')) {
    signals.push({ score: 0.1, reason: 'Missing Message-ID header' });
  }

  const mailer = getHeader(email.headers, 'X-Mailer');
  if (mailer && BULK_MAILER.test(mailer)) {
    signals.push({ score: 0.15, reason: `Suspicious mailer: ${mailer}` });
  }

  if (sentAt) {
    const hour = sentAt.getUTCHours();
    if (hour >= 2 && hour <= 6) {
      signals.push({ score: 0.05, reason: `Sent at unusual hour (${hour}:00 UTC)` });
    }
  }

  const subject = email.subject.toLowerCase();
  if (URGENT_SUBJECT_WORDS.some((word) => subject.includes(word))) {
    signals.push({ score: 0.1, reason: 'Subject contains urgency indicators' });
  }

  return signals;
}

function parseDateHeader(value: string | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return isNaN(date.getTime()) ? null : date;
}

export function describeBehavior(score: number, reasons: readonly string[], history: SenderHistory | null): string {
  const parts: string[] = [];

  if (score >= 0.7) parts.push('High behavioral suspicion detected');
  else if (score >= 0.4) parts.push('Moderate behavioral anomalies found');
  else if (score > 0) parts.push('Minor behavioral inconsistencies detected');
  else parts.push('No significant behavioral anomalies');

  parts.push(history ? `Sender has ${history.messageCount} previous messages` : 'First message from this sender');

  if (reasons.length > 0) {
    parts.push(`Key issues: ${reasons.slice(0, 2).join(', ')}`);
  }

  return parts.join('. ');
}

export interface BehaviorEvaluatorOptions {
  now?: () => Date;
}

export class BehaviorEvaluator implements Evaluator<'behavior'> {
  readonly id = 'behavior';
  private readonly now: () => Date;

  constructor(
    private readonly store: SenderHistoryStore,
    options: BehaviorEvaluatorOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async evaluate(email: EmailRecord, context: EvaluationContext): Promise<BehaviorFinding> {
    const sender = email.sender;
    const sentAt = parseDateHeader(getHeader(email.headers, 'Date'));
    const history = sender ? await this.store.getHistory(sender) : null;

    const signals: Signal[] = [];
    if (!history) {
      signals.push({ score: 0.4, reason: 'Sender has no prior message history (new sender)' });
    } else {
      signals.push(...checkHistoryChanges(history, email.displayName, email.replyTo));
    }
    signals.push(...checkReplyTo(sender, email.replyTo));
    signals.push(...checkDisplayName(email.displayName, sender));
    signals.push(...checkMessageTraits(email, sentAt));

    const score = clampScore(signals.reduce((sum, signal) => sum + signal.score, 0));
    // sort is stable: equal scores keep trigger order
    const reasons = [...signals]
      .sort((a, b) => b.score - a.score)
      .map((signal) => signal.reason)
      .slice(0, 5);

    let recorded = false;
    if (sender && !context.signal.aborted) {
      try {
        await this.store.record(sender, email.displayName, email.replyTo, sentAt ?? this.now());
        recorded = true;
      } catch (error) {
        context.logger.warn('Could not record sender history', { sender, cause: describeError(error) });
      }
    }

    const details: BehaviorDetails = { isNewSender: history === null, history, recorded };

    return {
      evaluator: 'behavior',
      score,
      confidence: Math.min(0.95, 0.4 + 0.5 * score),
      reasons,
      summary: describeBehavior(score, reasons, history),
      details,
      degraded: false,
    };
  }
}
