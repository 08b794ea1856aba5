/**
 * Anthropic Service
 * Claude Messages API over fetch (non-streaming)
 */

import { z } from 'zod';
import {
  ConfigurationError,
  GenerationCancelledError,
  GenerationTimeoutError,
  RateLimitedError,
  ServiceError,
} from '../errors';
import { createLogger } from '../logger';
import type { FetchFn, GenerateRequest, GenerateResult, GenerativeService } from './types';

const log = createLogger('Anthropic');

export interface AnthropicServiceConfig {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
  maxTokens?: number;
  temperature?: number;
  /** Injected for tests */
  fetch?: FetchFn;
}

// ============================================================================
// Anthropic API Types
// ============================================================================

const messageResponseSchema = z.object({
  model: z.string(),
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  stop_reason: z.string().nullable().optional(),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

const errorResponseSchema = z.object({
  error: z.object({ type: z.string().optional(), message: z.string() }),
});

// ============================================================================
// Anthropic Service
// ============================================================================

export class AnthropicService implements GenerativeService {
  readonly name = 'anthropic';

  private apiKey: string;
  private baseUrl: string;
  private model: string;
  private timeoutMs: number;
  private maxTokens: number;
  private temperature: number;
  private fetchFn: FetchFn;

  constructor(config: AnthropicServiceConfig) {
    if (!config.apiKey) {
      throw new ConfigurationError('Anthropic API key not configured (set ANTHROPIC_API_KEY or use --no-ai)', [
        { field: 'apiKey', message: 'required' },
      ]);
    }

    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl || 'https://api.anthropic.com/v1').replace(/\/+$/, '');
    this.model = config.model || 'claude-sonnet-4-5';
    this.timeoutMs = config.timeoutMs ?? 120_000;
    this.maxTokens = config.maxTokens ?? 4096;
    this.temperature = config.temperature ?? 0.7;
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    if (request.signal?.aborted) {
      throw new GenerationCancelledError(this.name);
    }

    const timeoutMs = request.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    request.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this.fetchFn(`${this.baseUrl}/messages`, {
        method: 'POST',
        headers: this.getHeaders(),
        body: JSON.stringify(this.buildRequestBody(request)),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw await this.toError(response);
      }

      return this.parseResponse(await response.json());
    } catch (error) {
      if (timedOut) {
        throw new GenerationTimeoutError(this.name, timeoutMs);
      }
      if (request.signal?.aborted) {
        throw new GenerationCancelledError(this.name);
      }
      if (error instanceof ServiceError || error instanceof RateLimitedError) {
        throw error;
      }
      throw new ServiceError(this.name, error instanceof Error ? error.message : String(error));
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', onAbort);
    }
  }

  // ============================================================================
  // Request Building
  // ============================================================================

  private getHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      'x-api-key': this.apiKey,
      'anthropic-version': '2023-06-01',
    };
  }

  private buildRequestBody(request: GenerateRequest): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: this.model,
      max_tokens: request.maxTokens ?? this.maxTokens,
      temperature: request.temperature ?? this.temperature,
      messages: [{ role: 'user', content: request.prompt }],
    };

    if (request.system) {
      body.system = request.system;
    }

    return body;
  }

  // ============================================================================
  // Response Handling
  // ============================================================================

  private parseResponse(data: unknown): GenerateResult {
    const parsed = messageResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ServiceError(this.name, `Unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const text = parsed.data.content
      .filter(block => block.type === 'text')
      .map(block => block.text ?? '')
      .join('');

    if (!text.trim()) {
      throw new ServiceError(this.name, 'Response contained no text');
    }

    const result: GenerateResult = { text, model: parsed.data.model };
    if (parsed.data.usage) {
      result.usage = {
        inputTokens: parsed.data.usage.input_tokens,
        outputTokens: parsed.data.usage.output_tokens,
      };
    }
    if (parsed.data.stop_reason) {
      result.stopReason = parsed.data.stop_reason;
    }

    log.debug(`Generated ${text.length} chars with ${result.model}`);
    return result;
  }

  private async toError(response: Response): Promise<RateLimitedError | ServiceError> {
    if (response.status === 429) {
      return new RateLimitedError(this.name, parseRetryAfter(response.headers.get('retry-after')));
    }

    let message = response.statusText || 'Request failed';
    try {
      const parsed = errorResponseSchema.safeParse(await response.json());
      if (parsed.success) message = parsed.data.error.message;
    } catch (error) {
      log.debug(`Error body was not JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    return new ServiceError(this.name, message, response.status);
  }
}

/**
 * `Retry-After` as delta-seconds or an HTTP date, in milliseconds
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }

  return undefined;
}
