/**
 * Generative Service Module
 */

export type { FetchFn, GenerateRequest, GenerateResult, GenerativeService, RetryPolicy, TokenUsage } from './types';
export { AnthropicService, parseRetryAfter, type AnthropicServiceConfig } from './AnthropicService';
export { DEFAULT_RETRY_POLICY, RetryingService, withRetry } from './retry';
export { TemplateService, scaffold } from './TemplateService';
