import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  Post,
  Query,
  ServiceUnavailableException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { SERVICE_NAME } from './config/radar.constants';
import {
  ConfigurationEmptyError,
  ConfigurationError,
  KnowledgeStoreUnavailableError,
  ModelUnavailableError,
} from './errors/radar.errors';
import { EmbeddingService } from './services/embedding.service';
import { InquisitorService } from './services/inquisitor.service';
import { KnowledgeStoreService } from './services/knowledge-store.service';
import { ScanPipelineService } from './services/scan-pipeline.service';
import {
  ArticleView,
  Criticality,
  InquiryTurn,
  isCriticality,
  RunSummary,
  toArticleView,
} from './types/radar.types';

@Controller()
export class RadarController {
  constructor(
    private readonly scanPipelineService: ScanPipelineService,
    private readonly inquisitorService: InquisitorService,
    private readonly store: KnowledgeStoreService,
    private readonly embeddingService: EmbeddingService,
  ) {}

  @Get('health')
  getHealth(): { status: string; service: string } {
    return {
      status: 'ok',
      service: SERVICE_NAME,
    };
  }

  @Post('scan')
  @HttpCode(200)
  async scan(): Promise<RunSummary> {
    try {
      return await this.scanPipelineService.run();
    } catch (error) {
      throw this.toHttpError(error);
    }
  }

  @Get('articles')
  async getArticles(
    @Query('since') sinceRaw?: string,
    @Query('minCriticality') minCriticalityRaw?: string,
  ): Promise<ArticleView[]> {
    const since = this.parseSince(sinceRaw);
    const minCriticality = this.parseCriticality(minCriticalityRaw);
    try {
      await this.store.open(this.embeddingService.modelId);
      return this.store.allSince(since, minCriticality).map(toArticleView);
    } catch (error) {
      throw this.toHttpError(error);
    }
  }

  @Post('inquiries')
  @HttpCode(200)
  async inquire(@Body('question') question?: unknown): Promise<InquiryTurn> {
    if (typeof question !== 'string' || !question.trim()) {
      throw new BadRequestException('question must be a non-empty string');
    }
    return this.inquisitorService.ask(question);
  }

  private parseSince(value: string | undefined): Date {
    if (value == null || value === '') {
      return new Date(0);
    }
    const parsed = new Date(value);
    if (Number.isNaN(parsed.getTime())) {
      throw new BadRequestException('since must be an ISO-8601 timestamp');
    }
    return parsed;
  }

  private parseCriticality(value: string | undefined): Criticality {
    if (value == null || value === '') {
      return 'NONE';
    }
    const normalized = value.trim().toUpperCase();
    if (!isCriticality(normalized)) {
      throw new BadRequestException(
        'minCriticality must be one of NONE, LOW, MEDIUM, HIGH, CRITICAL',
      );
    }
    return normalized;
  }

  private toHttpError(error: unknown): unknown {
    if (
      error instanceof ConfigurationError ||
      error instanceof ConfigurationEmptyError
    ) {
      return new UnprocessableEntityException(error.message);
    }
    if (
      error instanceof KnowledgeStoreUnavailableError ||
      error instanceof ModelUnavailableError
    ) {
      return new ServiceUnavailableException(error.message);
    }
    return error;
  }
}
