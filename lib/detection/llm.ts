/**
 * Text classification for the content evaluator
 * Uses Claude Haiku to estimate the probability that an email is phishing
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { ExternalServiceError } from '@/lib/errors';
import type { CircuitBreaker } from '@/lib/resilience/circuit-breaker';

/**
 * Opaque scorer: probability in [0,1] that the text is phishing
 */
export interface TextClassifier {
  classify(text: string, signal?: AbortSignal): Promise<number>;
}

export const DEFAULT_CLASSIFIER_MODEL = 'claude-3-5-haiku-20241022';

const MAX_INPUT_CHARS = 3000;

const SYSTEM_PROMPT = `You are an email security analyst. Estimate how likely the email below is a phishing attempt.

Consider urgency and pressure language, requests for credentials or payment, brand impersonation, and mismatches between the claimed sender and the content.

Respond with JSON only: {"probability": <number between 0 and 1>, "rationale": "<one sentence>"}`;

const classificationSchema = z.object({
  probability: z.number().min(0).max(1),
  rationale: z.string().optional(),
});

/**
 * Pull the probability out of a model reply that should hold one JSON object
 */
export function parseClassification(text: string): number {
  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new ExternalServiceError('classifier', 'No JSON found in classifier response');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(jsonMatch[0]);
  } catch (error) {
    throw new ExternalServiceError('classifier', 'Failed to parse classifier JSON response', { cause: error });
  }

  const parsed = classificationSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ExternalServiceError('classifier', 'Classifier response has no valid probability', {
      cause: parsed.error,
    });
  }
  return parsed.data.probability;
}

interface ClassificationRequest {
  model: string;
  max_tokens: number;
  system: string;
  messages: Array<{ role: 'user'; content: string }>;
}

interface ClassificationReply {
  content: ReadonlyArray<{ type: string; text?: string }>;
}

/**
 * The slice of the Anthropic client the classifier calls; an `Anthropic` instance satisfies it
 */
export interface MessagesClient {
  messages: {
    create(body: ClassificationRequest, options?: { signal?: AbortSignal }): PromiseLike<ClassificationReply>;
  };
}

export interface AnthropicTextClassifierOptions {
  client?: MessagesClient;
  apiKey?: string;
  model?: string;
  breaker?: CircuitBreaker;
}

export class AnthropicTextClassifier implements TextClassifier {
  private readonly client: MessagesClient;
  private readonly model: string;
  private readonly breaker?: CircuitBreaker;

  constructor(options: AnthropicTextClassifierOptions = {}) {
    this.client = options.client ?? new Anthropic({ apiKey: options.apiKey });
    this.model = options.model ?? DEFAULT_CLASSIFIER_MODEL;
    this.breaker = options.breaker;
  }

  async classify(text: string, signal?: AbortSignal): Promise<number> {
    if (this.breaker) {
      return this.breaker.execute((breakerSignal) => this.request(text, breakerSignal), signal);
    }
    return this.request(text, signal);
  }

  private async request(text: string, signal?: AbortSignal): Promise<number> {
    const body = text.length > MAX_INPUT_CHARS ? `${text.substring(0, MAX_INPUT_CHARS)}\n[... truncated ...]` : text;

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: 256,
        system: SYSTEM_PROMPT,
        messages: [{ role: 'user', content: `=== EMAIL ===\n${body}\n=== END EMAIL ===` }],
      },
      { signal }
    );

    const textContent = response.content.find((c) => c.type === 'text');
    if (!textContent?.text) {
      throw new ExternalServiceError('classifier', 'No text response from classifier');
    }

    return parseClassification(textContent.text);
  }
}
