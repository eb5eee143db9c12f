import { Logger } from '@nestjs/common';
import { testSettings } from '../testing/radar-test.fixtures';
import { LlmClientService } from './llm-client.service';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('LlmClientService', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest
      .spyOn(Logger.prototype, 'warn')
      .mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('deduplicates unavailable logs by reason key', async () => {
    const service = new LlmClientService(testSettings({ GEMINI_API_KEY: '' }));
    const request = { systemPrompt: 'system', userPrompt: 'user', json: true };

    const first = await service.complete(request);
    const second = await service.complete(request);

    expect(first).toEqual({ kind: 'fatal', reason: 'GEMINI_API_KEY not set' });
    expect(second.kind).toBe('fatal');
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('reads gemini completion text', async () => {
    const fetchSpy = jest.spyOn(global, 'fetch').mockImplementation(async () =>
      jsonResponse({
        candidates: [{ content: { parts: [{ text: '{"criticality":' }, { text: '"LOW"}' }] } }],
      }),
    );
    const service = new LlmClientService(testSettings());

    const result = await service.complete({
      systemPrompt: 'system',
      userPrompt: 'user',
      json: true,
    });

    expect(result).toEqual({ kind: 'success', value: '{"criticality":"LOW"}' });
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    const [url] = fetchSpy.mock.calls[0];
    expect(url).toBe(
      'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.0-flash:generateContent',
    );
  });

  it('treats rate limits and server errors as retryable', async () => {
    jest
      .spyOn(global, 'fetch')
      .mockImplementation(async () => new Response('slow down', { status: 429 }));
    const service = new LlmClientService(testSettings());

    const result = await service.embed('node security release');

    expect(result.kind).toBe('retryable');
  });

  it('treats client errors as fatal', async () => {
    jest
      .spyOn(global, 'fetch')
      .mockImplementation(async () => new Response('bad request', { status: 400 }));
    const service = new LlmClientService(testSettings());

    const result = await service.embed('node security release');

    expect(result).toEqual({
      kind: 'fatal',
      reason: 'gemini_embedding_failed: 400 bad request',
    });
  });

  it('treats network errors as retryable', async () => {
    jest.spyOn(global, 'fetch').mockRejectedValue(new Error('connect ECONNREFUSED'));
    const service = new LlmClientService(testSettings());

    const result = await service.embed('node security release');

    expect(result).toEqual({
      kind: 'retryable',
      reason: 'gemini_embedding_failed: 0 connect ECONNREFUSED',
    });
  });

  it('reads openai embeddings and keys the model id by provider', async () => {
    jest
      .spyOn(global, 'fetch')
      .mockImplementation(async () => jsonResponse({ data: [{ embedding: [0.25, -0.5] }] }));
    const service = new LlmClientService(
      testSettings({ AI_PROVIDER: 'openai', OPENAI_API_KEY: 'test-secret' }),
    );

    expect(service.modelId).toBe('openai:text-embedding-3-small');
    await expect(service.embed('text')).resolves.toEqual({
      kind: 'success',
      value: [0.25, -0.5],
    });
  });

  it('rejects malformed vectors as retryable', async () => {
    jest
      .spyOn(global, 'fetch')
      .mockImplementation(async () => jsonResponse({ embeddings: [['x', 1]] }));
    const service = new LlmClientService(testSettings({ AI_PROVIDER: 'ollama' }));

    await expect(service.embed('text')).resolves.toEqual({
      kind: 'retryable',
      reason: 'ollama_embedding_malformed',
    });
  });
});
