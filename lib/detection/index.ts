/**
 * Detection Engine - Main exports
 */

// Types
export type {
  Action,
  AnalysisReport,
  AnyRiskFinding,
  BehaviorFinding,
  ContentFinding,
  DomainAssessment,
  EmailRecord,
  EvaluationContext,
  Evaluator,
  EvaluatorId,
  EvaluatorSet,
  FindingSet,
  FusionInput,
  HeaderFinding,
  LinkFinding,
  OrchestrationResult,
  QrFinding,
  RankedReason,
  RiskFinding,
  RoutingAnalysis,
  RoutingVerdict,
  SenderHistory,
} from './types';

// Email records
export { createEmailRecord, extractUrls, parseAuthenticationResults, parseEmailAddress } from './parser';
export type { EmailInput } from './parser';

// Configuration and fusion
export { OrchestrationConfig, DEFAULT_WEIGHTS, DECISION_THRESHOLDS, decide } from './config';
export type { FusionWeights } from './config';
export { orchestrate, rankReasons, generateSummary, computeConfidence } from './orchestrator';

// Sub-algorithms
export { DomainRiskScorer, TRUSTED_DOMAINS } from './domain-risk';
export { analyzeRouting, reconstructRoute, parseReceivedLine } from './routing-analyzer';

// Evaluators and collaborators
export * from './evaluators';
export { AnthropicTextClassifier, parseClassification } from './llm';
export type { MessagesClient, TextClassifier } from './llm';
export type { QRCodec, DecodedQr } from './qr-codec';

// Main pipeline
export { PhishingAnalyzer, neutralFinding } from './pipeline';
export { createAnalyzer } from './factory';
export type { AnalyzerDependencies } from './factory';
