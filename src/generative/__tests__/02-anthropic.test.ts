/**
 * Anthropic adapter tests against a stubbed fetch
 */

import { AnthropicService, parseRetryAfter } from '../AnthropicService';
import {
  ConfigurationError,
  GenerationCancelledError,
  GenerationTimeoutError,
  RateLimitedError,
  ServiceError,
} from '../../errors';

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

/** Never settles until the request's signal aborts */
function hangingFetch(_url: string, init: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
  });
}

describe('AnthropicService', () => {
  let fetchMock: jest.Mock<Promise<Response>, [string, RequestInit]>;
  let service: AnthropicService;

  beforeAll(() => {
    process.env.MANUSCRIPT_LOG_LEVEL = 'silent';
  });

  beforeEach(() => {
    fetchMock = jest.fn<Promise<Response>, [string, RequestInit]>();
    service = new AnthropicService({ apiKey: 'test-secret', baseUrl: 'https://api.example.test/v1/', fetch: fetchMock });
  });

  it('should require an API key', () => {
    expect(() => new AnthropicService({ apiKey: '' })).toThrow(ConfigurationError);
  });

  it('should post a Messages request and join text blocks', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        model: 'claude-test',
        content: [
          { type: 'text', text: 'Hello' },
          { type: 'tool_use' },
          { type: 'text', text: ' world' },
        ],
        stop_reason: 'end_turn',
        usage: { input_tokens: 10, output_tokens: 2 },
      })
    );

    const result = await service.generate({ prompt: 'Hi', system: 'Be terse' });

    expect(result).toEqual({
      text: 'Hello world',
      model: 'claude-test',
      usage: { inputTokens: 10, outputTokens: 2 },
      stopReason: 'end_turn',
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.example.test/v1/messages');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({
      'Content-Type': 'application/json',
      'x-api-key': 'test-secret',
      'anthropic-version': '2023-06-01',
    });
    expect(JSON.parse(String(init.body))).toEqual({
      model: 'claude-sonnet-4-5',
      max_tokens: 4096,
      temperature: 0.7,
      messages: [{ role: 'user', content: 'Hi' }],
      system: 'Be terse',
    });
  });

  it('should let the request override output tokens', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ model: 'm', content: [{ type: 'text', text: 'ok' }] }));

    await service.generate({ prompt: 'Hi', maxTokens: 512, temperature: 0 });

    const body = JSON.parse(String(fetchMock.mock.calls[0][1].body));
    expect(body.max_tokens).toBe(512);
    expect(body.temperature).toBe(0);
    expect(body.system).toBeUndefined();
  });

  it('should map 429 to RateLimitedError with Retry-After', async () => {
    fetchMock.mockResolvedValue(new Response('slow down', { status: 429, headers: { 'retry-after': '3' } }));

    const error = await service.generate({ prompt: 'Hi' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitedError);
    if (error instanceof RateLimitedError) {
      expect(error.retryAfterMs).toBe(3000);
      expect(error.retryable).toBe(true);
    }
  });

  it('should map server errors to retryable ServiceError', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: { type: 'api_error', message: 'Overloaded' } }, 500));

    const error = await service.generate({ prompt: 'Hi' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceError);
    if (error instanceof ServiceError) {
      expect(error.message).toBe('anthropic error (status 500): Overloaded');
      expect(error.statusCode).toBe(500);
      expect(error.retryable).toBe(true);
    }
  });

  it('should not mark client errors retryable', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: { message: 'bad model' } }, 400));

    const error = await service.generate({ prompt: 'Hi' }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ServiceError);
    if (error instanceof ServiceError) {
      expect(error.retryable).toBe(false);
    }
  });

  it('should reject a response without text', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ model: 'm', content: [] }));

    await expect(service.generate({ prompt: 'Hi' })).rejects.toThrow('anthropic error: Response contained no text');
  });

  it('should wrap network failures', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    await expect(service.generate({ prompt: 'Hi' })).rejects.toThrow('anthropic error: fetch failed');
  });

  it('should time out a hanging request', async () => {
    fetchMock.mockImplementation(hangingFetch);

    await expect(service.generate({ prompt: 'Hi', timeoutMs: 20 })).rejects.toBeInstanceOf(GenerationTimeoutError);
  });

  it('should cancel when the caller aborts', async () => {
    fetchMock.mockImplementation(hangingFetch);
    const controller = new AbortController();

    const pending = service.generate({ prompt: 'Hi', signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(GenerationCancelledError);
  });

  it('should not call out when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(service.generate({ prompt: 'Hi', signal: controller.signal })).rejects.toBeInstanceOf(
      GenerationCancelledError
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('parseRetryAfter', () => {
  it('should read seconds and HTTP dates', () => {
    const date = 'Wed, 21 Oct 2015 07:28:00 GMT';
    expect(parseRetryAfter('2')).toBe(2000);
    expect(parseRetryAfter(date, Date.parse(date) - 5000)).toBe(5000);
  });

  it('should ignore missing or unreadable values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});
