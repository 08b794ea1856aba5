/**
 * Generative Service - Type Definitions
 */

import type { ContextPayload } from '../context-assembler/types';

export interface GenerateRequest {
  prompt: string;
  system?: string;
  maxTokens?: number;
  temperature?: number;
  /** Cancels the call; cancellation is never retried */
  signal?: AbortSignal;
  /** Per-call override of the service timeout */
  timeoutMs?: number;
  /** Assembled context the prompt was built from */
  context?: ContextPayload;
  /** Current section text for revise and polish */
  baseContent?: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface GenerateResult {
  text: string;
  model: string;
  usage?: TokenUsage;
  stopReason?: string;
}

/**
 * Anything that turns a prompt into text. Failures are RateLimitedError,
 * GenerationTimeoutError or ServiceError; cancellation is
 * GenerationCancelledError.
 */
export interface GenerativeService {
  readonly name: string;
  generate(request: GenerateRequest): Promise<GenerateResult>;
}

export interface RetryPolicy {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitter: boolean;
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;
