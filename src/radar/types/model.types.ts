export const LANGUAGE_MODEL = Symbol('LANGUAGE_MODEL');
export const EMBEDDING_BACKEND = Symbol('EMBEDDING_BACKEND');

export type ModelCallResult<T> =
  | { kind: 'success'; value: T }
  | { kind: 'retryable'; reason: string }
  | { kind: 'fatal'; reason: string };

export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  /** Ask the backend for a JSON object response. */
  json: boolean;
  temperature?: number;
}

export interface LanguageModel {
  complete(request: CompletionRequest): Promise<ModelCallResult<string>>;
}

export interface EmbeddingBackend {
  /** Provider and model, e.g. `gemini:gemini-embedding-001`. Keys the knowledge store. */
  readonly modelId: string;
  embed(text: string): Promise<ModelCallResult<number[]>>;
}
