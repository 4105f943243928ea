/**
 * Main Detection Pipeline
 * Runs all evaluators concurrently against one email and fuses their findings
 */

import { AnalysisCancelledError, EvaluatorFailure, OperationTimeoutError } from '@/lib/errors';
import { generateCorrelationId, loggers, type Logger } from '@/lib/logging/logger';
import type { SenderHistoryStore } from '@/lib/reputation/sender-history';
import { OrchestrationConfig } from './config';
import { orchestrate } from './orchestrator';
import { clampScore } from './score';
import type { AnalysisReport, EmailRecord, Evaluator, EvaluatorId, EvaluatorSet, FindingSet, RiskFinding } from './types';

export const DEFAULT_EVALUATOR_TIMEOUT_MS = 10_000;

export interface PhishingAnalyzerOptions {
  evaluators: EvaluatorSet;
  config?: OrchestrationConfig;
  evaluatorTimeoutMs?: number;
  logger?: Logger;
  /** Released by close() */
  historyStore?: SenderHistoryStore;
}

export interface AnalyzeOptions {
  signal?: AbortSignal;
  correlationId?: string;
}

/**
 * Finding used in place of one whose evaluator threw or timed out
 */
export function neutralFinding<E extends EvaluatorId>(evaluator: E, cause: unknown): RiskFinding<E> {
  const failure = new EvaluatorFailure(evaluator, cause);
  return {
    evaluator,
    score: 0,
    confidence: 0,
    reasons: [failure.message],
    summary: failure.message,
    details: null,
    degraded: true,
  };
}

function cancellationOf(signal: AbortSignal): AnalysisCancelledError {
  return signal.reason instanceof AnalysisCancelledError ? signal.reason : new AnalysisCancelledError(signal.reason);
}

export class PhishingAnalyzer {
  private readonly evaluators: EvaluatorSet;
  private readonly config: OrchestrationConfig;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly historyStore?: SenderHistoryStore;

  constructor(options: PhishingAnalyzerOptions) {
    this.evaluators = options.evaluators;
    this.config = options.config ?? new OrchestrationConfig();
    this.timeoutMs = options.evaluatorTimeoutMs ?? DEFAULT_EVALUATOR_TIMEOUT_MS;
    this.logger = options.logger ?? loggers.analyzer;
    this.historyStore = options.historyStore;
  }

  /**
   * @throws AnalysisCancelledError when `signal` aborts before the result is ready
   */
  async analyze(email: EmailRecord, options: AnalyzeOptions = {}): Promise<AnalysisReport> {
    const startTime = performance.now();
    const correlationId = options.correlationId ?? generateCorrelationId();
    const logger = this.logger.withCorrelationId(correlationId);
    const signal = options.signal ?? new AbortController().signal;

    if (signal.aborted) {
      throw cancellationOf(signal);
    }

    logger.debug('Analysis started', { sender: email.sender });

    const { content, link, behavior, header, qr } = this.evaluators;
    const [contentFinding, linkFinding, behaviorFinding, headerFinding, qrFinding] = await Promise.all([
      this.runEvaluator(content, email, signal, logger),
      this.runEvaluator(link, email, signal, logger),
      this.runEvaluator(behavior, email, signal, logger),
      this.runEvaluator(header, email, signal, logger),
      this.runEvaluator(qr, email, signal, logger),
    ]);

    if (signal.aborted) {
      throw cancellationOf(signal);
    }

    const findings: FindingSet = {
      content: contentFinding,
      link: linkFinding,
      behavior: behaviorFinding,
      header: headerFinding,
      qr: qrFinding,
    };

    const result = orchestrate(findings, this.config);
    const processingTimeMs = performance.now() - startTime;

    logger.info('Analysis completed', {
      action: result.action,
      finalScore: result.finalScore,
      overrides: result.overrides,
      degraded: Object.values(findings)
        .filter((finding) => finding.degraded)
        .map((finding) => finding.evaluator),
      processingTimeMs: Math.round(processingTimeMs),
    });

    return { correlationId, result, findings, processingTimeMs };
  }

  /**
   * One evaluator under its own timeout and child signal. Failures become a
   * neutral finding; only caller cancellation propagates.
   */
  private runEvaluator<E extends EvaluatorId>(
    evaluator: Evaluator<E>,
    email: EmailRecord,
    parent: AbortSignal,
    parentLogger: Logger
  ): Promise<RiskFinding<E>> {
    const logger = parentLogger.withEvaluator(evaluator.id);
    const controller = new AbortController();

    return new Promise<RiskFinding<E>>((resolve, reject) => {
      let completed = false;

      const finish = (): boolean => {
        if (completed) return false;
        completed = true;
        clearTimeout(timeoutId);
        parent.removeEventListener('abort', onAbort);
        return true;
      };

      const onAbort = (): void => {
        if (finish()) {
          const cancelled = cancellationOf(parent);
          controller.abort(cancelled);
          reject(cancelled);
        }
      };

      const timeoutId = setTimeout(() => {
        if (finish()) {
          const timeoutError = new OperationTimeoutError(evaluator.id, this.timeoutMs);
          controller.abort(timeoutError);
          resolve(this.degrade(evaluator.id, timeoutError, logger));
        }
      }, this.timeoutMs);

      parent.addEventListener('abort', onAbort, { once: true });

      // deferred so a synchronous throw is handled like a rejection
      void Promise.resolve()
        .then(() => evaluator.evaluate(email, { signal: controller.signal, logger }))
        .then(
          (finding) => {
            if (finish()) {
              resolve({ ...finding, score: clampScore(finding.score), confidence: clampScore(finding.confidence) });
            }
          },
          (error: unknown) => {
            if (finish()) resolve(this.degrade(evaluator.id, error, logger));
          }
        );
    });
  }

  private degrade<E extends EvaluatorId>(id: E, cause: unknown, logger: Logger): RiskFinding<E> {
    logger.error('Evaluator failed, using neutral finding', cause);
    return neutralFinding(id, cause);
  }

  async close(): Promise<void> {
    await this.historyStore?.close();
  }
}
