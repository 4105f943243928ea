/**
 * Detection Pipeline Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { loadSettings } from '@/lib/config/settings';
import { createAnalyzer } from '@/lib/detection/factory';
import { PhishingAnalyzer, neutralFinding } from '@/lib/detection/pipeline';
import type { EvaluatorSet } from '@/lib/detection/types';
import { AnalysisCancelledError, ConfigurationError } from '@/lib/errors';
import { InMemorySenderHistoryStore } from '@/lib/reputation/sender-history';
import { ipLinkPhishingEmail, legitimateEmail } from '../fixtures/emails';
import { fixedEvaluator, hangingEvaluator, makeFinding, silentLogger, stubEvaluator } from '../helpers/setup';

function stubEvaluators(overrides: Partial<EvaluatorSet> = {}): EvaluatorSet {
  return {
    content: fixedEvaluator('content'),
    link: fixedEvaluator('link'),
    behavior: fixedEvaluator('behavior'),
    header: fixedEvaluator('header'),
    qr: fixedEvaluator('qr'),
    ...overrides,
  };
}

function analyzerWith(overrides: Partial<EvaluatorSet>, evaluatorTimeoutMs = 1000): PhishingAnalyzer {
  return new PhishingAnalyzer({ evaluators: stubEvaluators(overrides), evaluatorTimeoutMs, logger: silentLogger() });
}

describe('Detection Pipeline', () => {
  describe('end to end', () => {
    it('should quarantine a phishing email linking to a raw IP', async () => {
      const analyzer = createAnalyzer(loadSettings({}), {
        historyStore: new InMemorySenderHistoryStore(),
        logger: silentLogger(),
      });

      const report = await analyzer.analyze(ipLinkPhishingEmail, { correlationId: 'cid_test' });

      expect(report.correlationId).toBe('cid_test');
      expect(report.findings.link.score).toBe(0.8);
      expect(report.findings.content.score).toBe(0.45);
      expect(report.findings.behavior.score).toBe(0.5);
      expect(report.findings.qr.score).toBe(0);
      expect(report.result.finalScore).toBeCloseTo(0.4825, 6);
      expect(report.result.baselineAction).toBe('flag');
      expect(report.result.action).toBe('quarantine');
      expect(report.result.overrides).toEqual(['high-risk link']);
      expect(report.result.confidence).toBeCloseTo(0.79475, 6);
      expect(report.result.summary.startsWith('MEDIUM RISK (Score: ')).toBe(true);
      expect(report.result.rankedReasons.slice(0, 2).map((reason) => reason.text)).toEqual([
        'Links: Analyzed 1 links. 1 suspicious (1 high risk). 1 use raw IP addresses. Average risk 0.80.',
        'Link 192.168.1.100: Uses IP address instead of domain name',
      ]);

      await analyzer.close();
    });

    it('should allow a legitimate email', async () => {
      const analyzer = createAnalyzer(loadSettings({}), {
        historyStore: new InMemorySenderHistoryStore(),
        logger: silentLogger(),
      });

      const report = await analyzer.analyze(legitimateEmail);

      expect(report.correlationId).toMatch(/^cid_/);
      expect(report.result.action).toBe('allow');
      expect(report.findings.content.score).toBe(0);
      expect(report.findings.link.summary).toBe('No links found');
      expect(report.findings.header.details?.verdict).toBe('normal');
      expect(Object.values(report.findings).some((finding) => finding.degraded)).toBe(false);
    });

    it('should remember senders between analyses', async () => {
      const historyStore = new InMemorySenderHistoryStore();
      const analyzer = createAnalyzer(loadSettings({}), { historyStore, logger: silentLogger() });

      const first = await analyzer.analyze(legitimateEmail);
      const second = await analyzer.analyze(legitimateEmail);

      expect(first.findings.behavior.details?.isNewSender).toBe(true);
      expect(second.findings.behavior.details?.isNewSender).toBe(false);
      expect(second.findings.behavior.details?.history?.messageCount).toBe(1);
    });

    it('should refuse invalid fusion weights at construction', () => {
      const settings = loadSettings({ FUSION_WEIGHTS: '0.5,0.5,0.5,0.5' });

      expect(() => createAnalyzer(settings, { historyStore: new InMemorySenderHistoryStore() })).toThrow(
        ConfigurationError
      );
    });
  });

  describe('evaluator failures', () => {
    it('should replace a throwing evaluator with a neutral finding', async () => {
      const analyzer = analyzerWith({
        content: stubEvaluator('content', async () => {
          throw new Error('model offline');
        }),
        link: fixedEvaluator('link', 0.5),
      });

      const report = await analyzer.analyze(legitimateEmail);

      expect(report.findings.content).toEqual({
        evaluator: 'content',
        score: 0,
        confidence: 0,
        reasons: ['content failed: model offline'],
        summary: 'content failed: model offline',
        details: null,
        degraded: true,
      });
      expect(report.findings.link.score).toBe(0.5);
      expect(report.result.finalScore).toBe(0.125);
    });

    it('should treat a synchronous throw like a rejection', async () => {
      const analyzer = analyzerWith({
        qr: stubEvaluator('qr', () => {
          throw new Error('bad image');
        }),
      });

      const report = await analyzer.analyze(legitimateEmail);

      expect(report.findings.qr.degraded).toBe(true);
      expect(report.findings.qr.reasons).toEqual(['qr failed: bad image']);
    });

    it('should time out a slow evaluator and abort its signal', async () => {
      const signals: AbortSignal[] = [];
      const analyzer = analyzerWith({ link: hangingEvaluator('link', signals) }, 20);

      const report = await analyzer.analyze(legitimateEmail);

      expect(report.findings.link.degraded).toBe(true);
      expect(report.findings.link.reasons).toEqual(['link failed: Operation timed out after 20ms']);
      expect(signals).toHaveLength(1);
      expect(signals[0].aborted).toBe(true);
    });

    it('should clamp scores returned by an evaluator', async () => {
      const analyzer = analyzerWith({
        behavior: stubEvaluator('behavior', async () => makeFinding('behavior', 1.7, { confidence: -1 })),
      });

      const report = await analyzer.analyze(legitimateEmail);

      expect(report.findings.behavior.score).toBe(1);
      expect(report.findings.behavior.confidence).toBe(0);
    });
  });

  describe('cancellation', () => {
    it('should reject when the caller aborts mid-analysis', async () => {
      const controller = new AbortController();
      const signals: AbortSignal[] = [];
      const analyzer = analyzerWith({ behavior: hangingEvaluator('behavior', signals) });

      const pending = analyzer.analyze(legitimateEmail, { signal: controller.signal });
      await vi.waitFor(() => expect(signals).toHaveLength(1));
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(AnalysisCancelledError);
      expect(signals[0].aborted).toBe(true);
    });

    it('should reject immediately for an already aborted signal', async () => {
      const evaluate = vi.fn(async () => makeFinding('content', 0));
      const analyzer = analyzerWith({ content: stubEvaluator('content', evaluate) });

      await expect(
        analyzer.analyze(legitimateEmail, { signal: AbortSignal.abort('shutting down') })
      ).rejects.toThrow('Analysis cancelled: shutting down');
      expect(evaluate).not.toHaveBeenCalled();
    });
  });

  describe('lifecycle', () => {
    it('should close the history store', async () => {
      const historyStore = new InMemorySenderHistoryStore();
      const close = vi.spyOn(historyStore, 'close');
      const analyzer = new PhishingAnalyzer({ evaluators: stubEvaluators(), historyStore, logger: silentLogger() });

      await analyzer.close();

      expect(close).toHaveBeenCalledTimes(1);
    });
  });

  it('should build neutral findings from any failure', () => {
    expect(neutralFinding('header', 'plain string')).toMatchObject({
      evaluator: 'header',
      score: 0,
      reasons: ['header failed: plain string'],
      degraded: true,
    });
  });
});
