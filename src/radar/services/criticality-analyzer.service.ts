import { Inject, Injectable, Logger } from '@nestjs/common';
import { RADAR_SETTINGS, RadarSettings } from '../config/radar.constants';
import {
  buildCriticalitySystemPrompt,
  buildCriticalityUserPrompt,
} from '../prompts/criticality.prompt';
import { LANGUAGE_MODEL, LanguageModel } from '../types/model.types';
import {
  AnalysisOutcome,
  AssessedCriticality,
  StackDeclaration,
} from '../types/radar.types';
import { asString, parseJsonObject } from '../utils/json.util';
import { callWithRetry } from '../utils/retry.util';
import { cleanText, truncateLeading } from '../utils/text.util';
import { ArticleContentService } from './article-content.service';

const ASSESSED_LEVELS: readonly AssessedCriticality[] = [
  'LOW',
  'MEDIUM',
  'HIGH',
  'CRITICAL',
];

export interface AnalyzableArticle {
  identity: string;
  title: string;
  bodyExcerpt: string;
  sourceName: string;
  publishedAt: string;
}

@Injectable()
export class CriticalityAnalyzerService {
  private readonly logger = new Logger(CriticalityAnalyzerService.name);

  constructor(
    @Inject(LANGUAGE_MODEL) private readonly llm: LanguageModel,
    @Inject(RADAR_SETTINGS) private readonly settings: RadarSettings,
    private readonly articleContent: ArticleContentService,
  ) {}

  /**
   * One model call per article (retries of a transient failure included).
   * The model reads the article page when it can be fetched, else the feed excerpt.
   * Never throws for a per-article problem: unparseable answers degrade to LOW
   * and exhausted retries come back as `deferred`.
   */
  async analyze(
    article: AnalyzableArticle,
    stack: StackDeclaration,
  ): Promise<AnalysisOutcome> {
    const title = cleanText(article.title);
    const fullText = await this.articleContent.fetchText(article.identity);
    const text = truncateLeading(
      fullText || cleanText(article.bodyExcerpt) || title,
      this.settings.completion.inputMaxChars,
    );

    const { result, attempts } = await callWithRetry(
      () =>
        this.llm.complete({
          systemPrompt: buildCriticalitySystemPrompt(describeProject(stack)),
          userPrompt: buildCriticalityUserPrompt({
            title,
            sourceName: article.sourceName,
            publishedAt: article.publishedAt,
            text,
          }),
          json: true,
        }),
      this.settings.completion.retry,
    );

    if (result.kind !== 'success') {
      this.logger.warn(
        `analysis deferred: ${article.identity} attempts=${attempts} reason=${result.reason}`,
      );
      return { status: 'deferred', reason: result.reason, attempts };
    }

    return this.interpret(result.value, title, attempts, article.identity);
  }

  private interpret(
    raw: string,
    title: string,
    attempts: number,
    identity: string,
  ): AnalysisOutcome {
    const payload = parseJsonObject(raw);
    const level = parseLevel(
      payload ? asString(payload.criticality) : raw,
    );

    if (!level) {
      this.logger.warn(`analysis unparseable, degraded to LOW: ${identity}`);
      return {
        status: 'degraded',
        reason: 'parse_failure',
        criticality: 'LOW',
        summary: raw.trim(),
        justification: '',
        attempts,
      };
    }

    return {
      status: 'analyzed',
      criticality: level,
      summary: cleanText(asString(payload?.summary)) || title,
      justification: cleanText(asString(payload?.justification)),
      attempts,
    };
  }
}

export function parseLevel(value: string): AssessedCriticality | null {
  const normalized = value.trim().replace(/^["'`]+|["'`.]+$/g, '').toUpperCase();
  return ASSESSED_LEVELS.find((level) => level === normalized) ?? null;
}

export function describeProject(stack: StackDeclaration): string {
  const names = stack.technologies.map((entry) => entry.name).join(', ');
  const context = cleanText(stack.context);
  return [
    context ? `Focus: ${context}` : '',
    `Technologies: ${names || 'unspecified'}`,
  ]
    .filter(Boolean)
    .join('\n');
}
