/**
 * Core types for the risk-fusion engine
 */

import type { Logger } from '@/lib/logging/logger';

// ============================================================================
// Input
// ============================================================================

export interface EmailAttachment {
  filename: string;
  contentType: string;
  /** base64 */
  content: string;
}

/**
 * Header names are stored lower-cased; a header may occur several times
 * (Received does), values keep their physical order in the message.
 */
export type HeaderMap = ReadonlyMap<string, readonly string[]>;

export interface EmailRecord {
  readonly subject: string;
  /** Raw From header value */
  readonly from: string;
  /** Lower-cased sender address */
  readonly sender: string;
  readonly displayName: string;
  /** Lower-cased Reply-To address, empty when absent */
  readonly replyTo: string;
  readonly headers: HeaderMap;
  readonly bodyText: string;
  readonly bodyHtml: string;
  readonly urls: readonly string[];
  readonly attachments: readonly EmailAttachment[];
}

// ============================================================================
// Findings
// ============================================================================

export type EvaluatorId = 'content' | 'link' | 'behavior' | 'header' | 'qr';

/** Evaluators whose scores take part in fusion */
export type FusedEvaluatorId = Exclude<EvaluatorId, 'header'>;

export interface ContentHighlight {
  start: number;
  end: number;
  kind: 'keyword' | 'pattern';
  token: string;
}

export interface ContentDetails {
  keywordScore: number;
  /** null when no classifier is configured or it failed */
  mlScore: number | null;
  matchedKeywords: string[];
  matchedPatterns: string[];
  highlights: ContentHighlight[];
}

export interface ScoredDomain {
  status: 'ok';
  url: string;
  /** Registrable domain, or the IP literal */
  domain: string;
  subdomain: string;
  tld: string;
  isIpLiteral: boolean;
  registrationAgeDays: number | null;
  score: number;
  reasons: string[];
}

export interface MalformedDomain {
  status: 'malformed';
  url: string;
  domain: null;
  score: 1;
  reasons: string[];
}

export type DomainAssessment = ScoredDomain | MalformedDomain;

export interface LinkDetails {
  links: DomainAssessment[];
  totalLinks: number;
  suspiciousCount: number;
  highRiskCount: number;
  ipLiteralCount: number;
}

export interface SenderHistory {
  /** Lower-cased address */
  sender: string;
  messageCount: number;
  firstSeen: Date;
  lastSeen: Date;
  displayNames: string[];
  replyToAddresses: string[];
}

export interface BehaviorDetails {
  isNewSender: boolean;
  history: SenderHistory | null;
  recorded: boolean;
}

export interface RouteHop {
  server: string;
  ip: string | null;
  timestamp: Date | null;
  raw: string;
  /** No from/by clause could be read */
  malformed: boolean;
}

export interface RoutingAnalysis {
  /** Chronological: origin first, final delivering hop last */
  hops: RouteHop[];
  hopCount: number;
  origin: RouteHop | null;
  final: RouteHop | null;
  suspiciousHops: RouteHop[];
}

export type RoutingVerdict = 'identity_mismatch' | 'suspicious_routing' | 'normal';

export type HeaderReasonCategory = 'identity' | 'routing' | 'auth' | 'anomaly';

export interface HeaderReason {
  category: HeaderReasonCategory;
  text: string;
  penalty: number;
}

export interface HeaderDetails {
  verdict: RoutingVerdict;
  routing: RoutingAnalysis;
  reasons: HeaderReason[];
}

export type QrContentType =
  | 'url'
  | 'email'
  | 'phone'
  | 'sms'
  | 'vcard'
  | 'wifi'
  | 'app_store'
  | 'text'
  | 'external_image'
  | 'undecoded';

export interface QrCodeAssessment {
  content: string;
  contentType: QrContentType;
  location: string;
  score: number;
  reasons: string[];
}

export interface QrDetails {
  codes: QrCodeAssessment[];
  totalCodes: number;
  suspiciousCount: number;
}

export interface FindingDetailsMap {
  content: ContentDetails;
  link: LinkDetails;
  behavior: BehaviorDetails;
  header: HeaderDetails;
  qr: QrDetails;
}

/**
 * Output of one evaluator. `details` is null when the evaluator failed and
 * the finding was replaced by a neutral one.
 */
export interface RiskFinding<E extends EvaluatorId = EvaluatorId> {
  evaluator: E;
  score: number;
  confidence: number;
  /** Ordered, at most five */
  reasons: string[];
  /** One-line human-readable account of the finding */
  summary: string;
  details: FindingDetailsMap[E] | null;
  degraded: boolean;
}

export type ContentFinding = RiskFinding<'content'>;
export type LinkFinding = RiskFinding<'link'>;
export type BehaviorFinding = RiskFinding<'behavior'>;
export type HeaderFinding = RiskFinding<'header'>;
export type QrFinding = RiskFinding<'qr'>;

export type AnyRiskFinding = { [E in EvaluatorId]: RiskFinding<E> }[EvaluatorId];

export type FindingSet = { [E in EvaluatorId]: RiskFinding<E> };

export type FusionInput = Pick<FindingSet, FusedEvaluatorId>;

// ============================================================================
// Evaluators
// ============================================================================

export interface EvaluationContext {
  signal: AbortSignal;
  logger: Logger;
}

export interface Evaluator<E extends EvaluatorId = EvaluatorId> {
  readonly id: E;
  evaluate(email: EmailRecord, context: EvaluationContext): Promise<RiskFinding<E>>;
}

export type EvaluatorSet = { [E in EvaluatorId]: Evaluator<E> };

// ============================================================================
// Result
// ============================================================================

export type Action = 'allow' | 'flag' | 'quarantine';

export type RiskBand = 'LOW' | 'MEDIUM' | 'HIGH';

export interface RankedReason {
  evaluator: FusedEvaluatorId;
  text: string;
  rawScore: number;
  weight: number;
  priority: number;
}

export interface OrchestrationResult {
  finalScore: number;
  action: Action;
  /** Decision before escalation overrides */
  baselineAction: Action;
  /** Overrides that raised the action, in application order */
  overrides: string[];
  confidence: number;
  summary: string;
  rankedReasons: RankedReason[];
}

export interface AnalysisReport {
  correlationId: string;
  result: OrchestrationResult;
  findings: FindingSet;
  processingTimeMs: number;
}
