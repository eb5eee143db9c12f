import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  RADAR_SETTINGS,
  RadarSettings,
  RETRYABLE_STATUS,
} from '../config/radar.constants';
import {
  CompletionRequest,
  EmbeddingBackend,
  LanguageModel,
  ModelCallResult,
} from '../types/model.types';
import { asRecord, asString } from '../utils/json.util';
import { isUsableVector } from '../utils/similarity.util';
import { cleanText } from '../utils/text.util';

interface FetchJsonResponse {
  ok: boolean;
  status: number;
  raw: string;
  json: Record<string, unknown> | null;
}

/**
 * HTTP client for the configured completion and embedding providers.
 * Each call is a single attempt; callers own the retry loop.
 */
@Injectable()
export class LlmClientService implements LanguageModel, EmbeddingBackend {
  private readonly logger = new Logger(LlmClientService.name);
  private readonly unavailableLogged = new Set<string>();

  constructor(
    @Inject(RADAR_SETTINGS) private readonly settings: RadarSettings,
  ) {}

  get modelId(): string {
    const { provider, model } = this.settings.embedding;
    return `${provider}:${model}`;
  }

  async complete(request: CompletionRequest): Promise<ModelCallResult<string>> {
    switch (this.settings.completion.provider) {
      case 'openai':
        return this.openaiComplete(request);
      case 'ollama':
        return this.ollamaComplete(request);
      default:
        return this.geminiComplete(request);
    }
  }

  async embed(text: string): Promise<ModelCallResult<number[]>> {
    switch (this.settings.embedding.provider) {
      case 'openai':
        return this.openaiEmbedding(text);
      case 'ollama':
        return this.ollamaEmbedding(text);
      default:
        return this.geminiEmbedding(text);
    }
  }

  private async geminiComplete(
    request: CompletionRequest,
  ): Promise<ModelCallResult<string>> {
    const apiKey = this.settings.credentials.geminiApiKey;
    if (!apiKey) {
      return this.fatal('GEMINI_API_KEY not set');
    }

    const url = `${this.settings.endpoints.gemini}/models/${this.settings.completion.model}:generateContent`;
    const payload = {
      contents: [{ role: 'user', parts: [{ text: request.userPrompt }] }],
      systemInstruction: { parts: [{ text: request.systemPrompt }] },
      generationConfig: {
        temperature: this.temperature(request),
        maxOutputTokens: 1024,
        ...(request.json ? { responseMimeType: 'application/json' } : {}),
      },
    };

    const response = await this.safeFetchJson(url, {
      method: 'POST',
      headers: {
        'x-goog-api-key': apiKey,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(payload),
    });
    if (!response.ok) {
      return this.failed('gemini_generate_failed', response);
    }

    const text = this.extractGeminiText(response.json);
    return text
      ? { kind: 'success', value: text }
      : this.malformed('gemini_generate_empty');
  }

  private async geminiEmbedding(
    text: string,
  ): Promise<ModelCallResult<number[]>> {
    const apiKey = this.settings.credentials.geminiApiKey;
    if (!apiKey) {
      return this.fatal('GEMINI_API_KEY not set');
    }

    const model = this.settings.embedding.model;
    const url = `${this.settings.endpoints.gemini}/models/${model}:embedContent`;
    const response = await this.safeFetchJson(url, {
      method: 'POST',
      headers: {
        'x-goog-api-key': apiKey,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: `models/${model}`,
        content: { parts: [{ text }] },
      }),
    });
    if (!response.ok) {
      return this.failed('gemini_embedding_failed', response);
    }

    const embeddingObj = asRecord(response.json?.embedding);
    return this.toVector(
      embeddingObj?.values ?? embeddingObj?.value,
      'gemini_embedding_malformed',
    );
  }

  private async openaiComplete(
    request: CompletionRequest,
  ): Promise<ModelCallResult<string>> {
    const apiKey = this.settings.credentials.openaiApiKey;
    if (!apiKey) {
      return this.fatal('OPENAI_API_KEY not set');
    }

    const payload = {
      model: this.settings.completion.model,
      ...(request.json ? { response_format: { type: 'json_object' } } : {}),
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.userPrompt },
      ],
      temperature: this.temperature(request),
    };

    const response = await this.safeFetchJson(
      `${this.settings.endpoints.openai}/chat/completions`,
      {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
      },
    );
    if (!response.ok) {
      return this.failed('openai_generate_failed', response);
    }

    const first = asRecord(this.firstOf(response.json?.choices));
    const message = asRecord(first?.message);
    const content = asString(message?.content);
    return content
      ? { kind: 'success', value: content }
      : this.malformed('openai_generate_empty');
  }

  private async openaiEmbedding(
    text: string,
  ): Promise<ModelCallResult<number[]>> {
    const apiKey = this.settings.credentials.openaiApiKey;
    if (!apiKey) {
      return this.fatal('OPENAI_API_KEY not set');
    }

    const response = await this.safeFetchJson(
      `${this.settings.endpoints.openai}/embeddings`,
      {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ model: this.settings.embedding.model, input: text }),
      },
    );
    if (!response.ok) {
      return this.failed('openai_embedding_failed', response);
    }

    const first = asRecord(this.firstOf(response.json?.data));
    return this.toVector(first?.embedding, 'openai_embedding_malformed');
  }

  private async ollamaComplete(
    request: CompletionRequest,
  ): Promise<ModelCallResult<string>> {
    const payload = {
      model: this.settings.completion.model,
      stream: false,
      ...(request.json ? { format: 'json' } : {}),
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.userPrompt },
      ],
      options: { temperature: this.temperature(request) },
    };

    const response = await this.safeFetchJson(
      `${this.settings.endpoints.ollama}/api/chat`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
      },
    );
    if (!response.ok) {
      return this.failed('ollama_generate_failed', response);
    }

    const message = asRecord(response.json?.message);
    const content = asString(message?.content);
    return content
      ? { kind: 'success', value: content }
      : this.malformed('ollama_generate_empty');
  }

  private async ollamaEmbedding(
    text: string,
  ): Promise<ModelCallResult<number[]>> {
    const response = await this.safeFetchJson(
      `${this.settings.endpoints.ollama}/api/embed`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.settings.embedding.model, input: text }),
      },
    );
    if (!response.ok) {
      return this.failed('ollama_embedding_failed', response);
    }

    return this.toVector(
      this.firstOf(response.json?.embeddings),
      'ollama_embedding_malformed',
    );
  }

  private firstOf(value: unknown): unknown {
    return Array.isArray(value) ? value[0] : undefined;
  }

  private temperature(request: CompletionRequest): number {
    return request.temperature ?? this.settings.completion.temperature;
  }

  private toVector(
    raw: unknown,
    reason: string,
  ): ModelCallResult<number[]> {
    if (!Array.isArray(raw)) {
      return this.malformed(reason);
    }
    const values = raw.filter((v): v is number => typeof v === 'number');
    if (values.length !== raw.length || !isUsableVector(values)) {
      return this.malformed(reason);
    }
    return { kind: 'success', value: values };
  }

  private extractGeminiText(json: Record<string, unknown> | null): string {
    const firstCandidate = asRecord(this.firstOf(json?.candidates));
    const content = asRecord(firstCandidate?.content);
    const rawParts = content?.parts;
    const parts: unknown[] = Array.isArray(rawParts) ? rawParts : [];
    return parts
      .map((part) => asString(asRecord(part)?.text))
      .join('')
      .trim();
  }

  private failed<T>(reason: string, response: FetchJsonResponse): ModelCallResult<T> {
    const detail = `${response.status} ${response.raw.slice(0, 180)}`;
    this.logUnavailable(reason, detail);
    // status 0 means the request never completed (network error or timeout)
    if (response.status === 0 || RETRYABLE_STATUS.has(response.status)) {
      return { kind: 'retryable', reason: `${reason}: ${cleanText(detail)}` };
    }
    return { kind: 'fatal', reason: `${reason}: ${cleanText(detail)}` };
  }

  private malformed<T>(reason: string): ModelCallResult<T> {
    this.logUnavailable(reason);
    return { kind: 'retryable', reason };
  }

  private fatal<T>(reason: string): ModelCallResult<T> {
    this.logUnavailable(reason);
    return { kind: 'fatal', reason };
  }

  private async safeFetchJson(
    url: string,
    params: {
      method: 'POST' | 'GET';
      headers: Record<string, string>;
      body?: string;
    },
  ): Promise<FetchJsonResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(
      () => controller.abort(),
      this.settings.requestTimeoutMs,
    );

    try {
      const res = await fetch(url, {
        method: params.method,
        headers: params.headers,
        body: params.body,
        signal: controller.signal,
      });
      const raw = await res.text();
      let json: Record<string, unknown> | null = null;
      try {
        json = asRecord(JSON.parse(raw));
      } catch {
        json = null;
      }
      return {
        ok: res.ok,
        status: res.status,
        raw,
        json,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        ok: false,
        status: 0,
        raw: message,
        json: null,
      };
    } finally {
      clearTimeout(timeout);
    }
  }

  private logUnavailable(reason: string, detail?: string): void {
    if (this.unavailableLogged.has(reason)) {
      return;
    }
    this.unavailableLogged.add(reason);
    const detailText = cleanText(detail || '');
    if (detailText) {
      this.logger.warn(`AI unavailable: ${reason} (${detailText})`);
      return;
    }
    this.logger.warn(`AI unavailable: ${reason}`);
  }
}
