import { Inject, Injectable, Logger } from '@nestjs/common';
import { RADAR_SETTINGS, RadarSettings } from '../config/radar.constants';
import {
  buildInquiryPrompt,
  INQUISITOR_SYSTEM_PROMPT,
  NO_CONTEXT_ANSWER,
} from '../prompts/inquisitor.prompt';
import { LANGUAGE_MODEL, LanguageModel } from '../types/model.types';
import { InquiryTurn, StoredArticle } from '../types/radar.types';
import { callWithRetry } from '../utils/retry.util';
import { cleanText, truncateLeading } from '../utils/text.util';
import { EmbeddingService } from './embedding.service';
import { KnowledgeStoreService, NearestMatch } from './knowledge-store.service';

/**
 * Retrieval-augmented Q&A over the knowledge store:
 * RECEIVE -> EMBED -> RETRIEVE -> COMPOSE -> ASK -> RESPOND.
 * Each question stands alone; failures come back as a failed turn.
 */
@Injectable()
export class InquisitorService {
  private readonly logger = new Logger(InquisitorService.name);

  constructor(
    private readonly embeddingService: EmbeddingService,
    private readonly store: KnowledgeStoreService,
    @Inject(LANGUAGE_MODEL) private readonly llm: LanguageModel,
    @Inject(RADAR_SETTINGS) private readonly settings: RadarSettings,
  ) {}

  async ask(rawQuestion: string): Promise<InquiryTurn> {
    const question = cleanText(rawQuestion);
    if (!question) {
      return { status: 'failed', question, stage: 'RECEIVE', reason: 'empty question' };
    }

    let embedding: number[];
    try {
      embedding = await this.embeddingService.embed(question);
    } catch (error) {
      return this.fail(question, 'EMBED', error);
    }

    let matches: NearestMatch[];
    try {
      await this.store.open(this.embeddingService.modelId);
      matches = this.store.nearest(embedding, this.settings.inquisitor.topK);
    } catch (error) {
      return this.fail(question, 'RETRIEVE', error);
    }

    if (matches.length === 0) {
      return { status: 'answered', question, answer: NO_CONTEXT_ANSWER, sources: [] };
    }

    const userPrompt = buildInquiryPrompt(
      question,
      matches.map(({ article }) => ({
        title: article.title,
        identity: article.identity,
        sourceName: article.sourceName,
        publishedAt: article.publishedAt,
        criticality: article.criticality,
        summary: this.contextNotes(article),
      })),
    );

    const { result, attempts } = await callWithRetry(
      () =>
        this.llm.complete({
          systemPrompt: INQUISITOR_SYSTEM_PROMPT,
          userPrompt,
          json: false,
          temperature: this.settings.inquisitor.temperature,
        }),
      this.settings.completion.retry,
    );
    if (result.kind !== 'success') {
      this.logger.warn(`inquiry failed at ASK after ${attempts} attempt(s): ${result.reason}`);
      return { status: 'failed', question, stage: 'ASK', reason: result.reason };
    }

    return {
      status: 'answered',
      question,
      answer: result.value.trim(),
      sources: matches.map(({ article, similarity }) => ({
        identity: article.identity,
        title: article.title,
        criticality: article.criticality,
        similarity,
      })),
    };
  }

  private contextNotes(article: StoredArticle): string {
    const notes = article.analysisSummary || article.bodyExcerpt;
    return truncateLeading(cleanText(notes), this.settings.inquisitor.excerptChars);
  }

  private fail(
    question: string,
    stage: 'EMBED' | 'RETRIEVE',
    error: unknown,
  ): InquiryTurn {
    const reason = error instanceof Error ? error.message : String(error);
    this.logger.warn(`inquiry failed at ${stage}: ${reason}`);
    return { status: 'failed', question, stage, reason };
  }
}
