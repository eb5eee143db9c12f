import { Inject, Injectable, Logger } from '@nestjs/common';
import { RADAR_SETTINGS, RadarSettings } from '../config/radar.constants';
import { EmptyInputError, ModelUnavailableError } from '../errors/radar.errors';
import { EMBEDDING_BACKEND, EmbeddingBackend } from '../types/model.types';
import { callWithRetry } from '../utils/retry.util';
import { cleanText, truncateLeading } from '../utils/text.util';

@Injectable()
export class EmbeddingService {
  private readonly logger = new Logger(EmbeddingService.name);
  // keyed by the prepared input; the backend is deterministic per model.
  // Map order doubles as recency: hits move to the end, the front is evicted.
  private readonly cache = new Map<string, number[]>();

  constructor(
    @Inject(EMBEDDING_BACKEND) private readonly backend: EmbeddingBackend,
    @Inject(RADAR_SETTINGS) private readonly settings: RadarSettings,
  ) {}

  get modelId(): string {
    return this.backend.modelId;
  }

  prepareInput(text: string): string {
    return truncateLeading(cleanText(text), this.settings.embedding.maxChars);
  }

  async embed(text: string): Promise<number[]> {
    const input = this.prepareInput(text);
    if (!input) {
      throw new EmptyInputError('nothing left to embed after cleaning');
    }

    const cached = this.cache.get(input);
    if (cached) {
      this.cache.delete(input);
      this.cache.set(input, cached);
      return cached;
    }

    const { result, attempts } = await callWithRetry(
      () => this.backend.embed(input),
      this.settings.embedding.retry,
    );
    if (result.kind !== 'success') {
      this.logger.warn(
        `embedding failed after ${attempts} attempt(s): ${result.reason}`,
      );
      throw new ModelUnavailableError(
        `embedding backend ${this.modelId} unavailable: ${result.reason}`,
        attempts,
      );
    }

    this.remember(input, result.value);
    return result.value;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private remember(input: string, vector: number[]): void {
    const limit = this.settings.embedding.cacheSize;
    if (limit === 0) {
      return;
    }
    this.cache.set(input, vector);
    while (this.cache.size > limit) {
      const oldest = this.cache.keys().next();
      if (oldest.done) {
        break;
      }
      this.cache.delete(oldest.value);
    }
  }
}
