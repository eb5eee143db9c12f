import { Module } from '@nestjs/common';
import {
  CLOCK,
  Clock,
  RADAR_SETTINGS,
  resolveRadarSettings,
} from './config/radar.constants';
import { RadarController } from './radar.controller';
import { ArticleContentService } from './services/article-content.service';
import { CriticalityAnalyzerService } from './services/criticality-analyzer.service';
import { DedupeGateService } from './services/dedupe-gate.service';
import { EmbeddingService } from './services/embedding.service';
import { GithubReleasesService } from './services/github-releases.service';
import { InquisitorService } from './services/inquisitor.service';
import { KnowledgeStoreService } from './services/knowledge-store.service';
import { LlmClientService } from './services/llm-client.service';
import { ReportWriterService } from './services/report-writer.service';
import { RssFeedService } from './services/rss-feed.service';
import { ScanPipelineService } from './services/scan-pipeline.service';
import { StackProfileService } from './services/stack-profile.service';
import { VigilFilterService } from './services/vigil-filter.service';
import { EMBEDDING_BACKEND, LANGUAGE_MODEL } from './types/model.types';

const systemClock: Clock = () => new Date();

@Module({
  controllers: [RadarController],
  providers: [
    { provide: RADAR_SETTINGS, useFactory: () => resolveRadarSettings(process.env) },
    { provide: CLOCK, useValue: systemClock },
    LlmClientService,
    { provide: LANGUAGE_MODEL, useExisting: LlmClientService },
    { provide: EMBEDDING_BACKEND, useExisting: LlmClientService },
    EmbeddingService,
    StackProfileService,
    DedupeGateService,
    VigilFilterService,
    ArticleContentService,
    CriticalityAnalyzerService,
    KnowledgeStoreService,
    InquisitorService,
    RssFeedService,
    GithubReleasesService,
    ReportWriterService,
    ScanPipelineService,
  ],
  exports: [ScanPipelineService, InquisitorService, KnowledgeStoreService],
})
export class RadarModule {}
