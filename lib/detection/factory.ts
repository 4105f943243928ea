/**
 * Production wiring for the analyzer
 */

import type { Settings } from '@/lib/config/settings';
import { createSqlClient } from '@/lib/db';
import { loggers, parseLogLevel, type Logger } from '@/lib/logging/logger';
import {
  InMemorySenderHistoryStore,
  PostgresSenderHistoryStore,
  type SenderHistoryStore,
} from '@/lib/reputation/sender-history';
import { CircuitBreakerRegistry } from '@/lib/resilience/circuit-breaker';
import { WhoisClient } from '@/lib/threat-intel/domain/whois';
import { OrchestrationConfig } from './config';
import { DomainRiskScorer } from './domain-risk';
import { BehaviorEvaluator, ContentEvaluator, HeaderEvaluator, LinkEvaluator, QrEvaluator } from './evaluators';
import { AnthropicTextClassifier, type MessagesClient } from './llm';
import { PhishingAnalyzer } from './pipeline';
import type { QRCodec } from './qr-codec';

export interface AnalyzerDependencies {
  historyStore?: SenderHistoryStore;
  qrCodec?: QRCodec;
  anthropic?: MessagesClient;
  fetch?: typeof fetch;
  breakers?: CircuitBreakerRegistry;
  logger?: Logger;
}

function createHistoryStore(settings: Settings, logger: Logger): SenderHistoryStore {
  if (!settings.databaseUrl) {
    logger.warn('DATABASE_URL not set, sender history is kept in memory');
    return new InMemorySenderHistoryStore();
  }
  return new PostgresSenderHistoryStore(createSqlClient(settings.databaseUrl), loggers.history);
}

/**
 * Build the full evaluator graph from settings. Fails with ConfigurationError
 * when the fusion weights are invalid.
 */
export function createAnalyzer(settings: Settings, deps: AnalyzerDependencies = {}): PhishingAnalyzer {
  const logger = deps.logger ?? loggers.analyzer;
  if (settings.logLevel) {
    logger.setLevel(parseLogLevel(settings.logLevel));
  }

  const config = new OrchestrationConfig(settings.weights);

  const breakers =
    deps.breakers ??
    new CircuitBreakerRegistry({
      failureThreshold: settings.circuitFailureThreshold,
      resetTimeout: settings.circuitResetTimeoutMs,
      timeout: settings.externalCallTimeoutMs,
    });

  const registration = settings.whois
    ? new WhoisClient({ apiUrl: settings.whois.apiUrl, apiKey: settings.whois.apiKey, fetch: deps.fetch })
    : null;

  const classifier =
    settings.classifier || deps.anthropic
      ? new AnthropicTextClassifier({
          client: deps.anthropic,
          apiKey: settings.classifier?.apiKey,
          model: settings.classifier?.model,
          breaker: breakers.getOrCreate('classifier'),
        })
      : null;

  const historyStore = deps.historyStore ?? createHistoryStore(settings, logger);

  const scorer = new DomainRiskScorer({
    registration,
    breaker: breakers.getOrCreate('whois'),
  });

  logger.info('Analyzer configured', {
    registrationLookup: registration !== null,
    textClassifier: classifier !== null,
    qrCodec: deps.qrCodec !== undefined,
    weights: config.weights,
  });

  return new PhishingAnalyzer({
    evaluators: {
      content: new ContentEvaluator(classifier),
      link: new LinkEvaluator(scorer),
      behavior: new BehaviorEvaluator(historyStore),
      header: new HeaderEvaluator(settings.maxNormalHops),
      qr: new QrEvaluator({ codec: deps.qrCodec, breaker: breakers.getOrCreate('qr-codec') }),
    },
    config,
    evaluatorTimeoutMs: settings.evaluatorTimeoutMs,
    logger,
    historyStore,
  });
}
