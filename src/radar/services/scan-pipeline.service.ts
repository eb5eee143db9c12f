import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CLOCK,
  Clock,
  RADAR_SETTINGS,
  RadarSettings,
} from '../config/radar.constants';
import { loadRadarConfig, RadarRunConfig } from '../config/radar-config';
import {
  EmbeddingDimensionError,
  EmptyInputError,
  isRunFatal,
  ModelUnavailableError,
} from '../errors/radar.errors';
import {
  AnalysisOutcome,
  RawCandidate,
  RunSummary,
  StackDeclaration,
  StackProfile,
} from '../types/radar.types';
import { runWithConcurrency } from '../utils/concurrency.util';
import { articleText, truncateLeading } from '../utils/text.util';
import {
  AnalyzableArticle,
  CriticalityAnalyzerService,
} from './criticality-analyzer.service';
import { DedupeGateService } from './dedupe-gate.service';
import { EmbeddingService } from './embedding.service';
import { GithubReleasesService } from './github-releases.service';
import { KnowledgeStoreService } from './knowledge-store.service';
import { ReportWriterService } from './report-writer.service';
import { RssFeedService } from './rss-feed.service';
import { StackProfileService } from './stack-profile.service';
import { VigilFilterService } from './vigil-filter.service';

const BODY_EXCERPT_CHARS = 1200;

type RunCounters = Omit<
  RunSummary,
  'startedAt' | 'finishedAt' | 'cancelled' | 'reportPath'
>;

interface RunContext {
  config: RadarRunConfig;
  profile: StackProfile;
  counters: RunCounters;
}

/**
 * One scan: configuration -> stack profile -> store -> pending re-analysis ->
 * sources -> dedup gate -> per article (embed -> Vigil -> insert -> analyze) -> report.
 * The report covers rows ingested or analyzed during the run.
 */
@Injectable()
export class ScanPipelineService {
  private readonly logger = new Logger(ScanPipelineService.name);
  private inFlightRun: Promise<RunSummary> | null = null;

  constructor(
    private readonly rssFeedService: RssFeedService,
    private readonly githubReleasesService: GithubReleasesService,
    private readonly stackProfileService: StackProfileService,
    private readonly embeddingService: EmbeddingService,
    private readonly vigilFilterService: VigilFilterService,
    private readonly dedupeGateService: DedupeGateService,
    private readonly analyzerService: CriticalityAnalyzerService,
    private readonly store: KnowledgeStoreService,
    private readonly reportWriterService: ReportWriterService,
    @Inject(RADAR_SETTINGS) private readonly settings: RadarSettings,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  get isRunning(): boolean {
    return this.inFlightRun !== null;
  }

  /** Concurrent callers share the run already in flight. */
  async run(options: { signal?: AbortSignal } = {}): Promise<RunSummary> {
    const inFlight = this.inFlightRun;
    if (inFlight) {
      return inFlight;
    }

    const task = this.runCore(options.signal);
    this.inFlightRun = task;
    try {
      return await task;
    } finally {
      if (this.inFlightRun === task) {
        this.inFlightRun = null;
      }
    }
  }

  private async runCore(signal?: AbortSignal): Promise<RunSummary> {
    const startedAt = this.clock();
    const startedMs = Date.now();
    this.logger.log(`scan start: config=${this.settings.configPath}`);

    try {
      const config = await loadRadarConfig(
        this.settings.configPath,
        this.settings.similarityThreshold,
      );
      const profile = await this.stackProfileService.build(config.stack);
      await this.store.open(this.embeddingService.modelId);

      const context: RunContext = {
        config,
        profile,
        counters: {
          fetched: 0,
          ingested: 0,
          deduplicated: 0,
          filteredOut: 0,
          analyzed: 0,
          degraded: 0,
          failedAnalysis: 0,
          failedEmbedding: 0,
          reanalyzed: 0,
          skipped: 0,
        },
      };

      await this.reanalyzePending(context, signal);

      const candidates = await this.collectCandidates(config, startedAt);
      context.counters.fetched = candidates.length;
      const { fresh, duplicates } = this.dedupeGateService.partition(candidates);
      context.counters.deduplicated = duplicates;
      this.logger.log(
        `dedup gate: fetched=${candidates.length} fresh=${fresh.length} duplicates=${duplicates}`,
      );

      const pool = await runWithConcurrency(
        fresh,
        this.settings.pipelineConcurrency,
        (candidate) => this.processCandidate(candidate, context),
        signal,
      );
      context.counters.skipped += pool.skipped;

      // rows re-analyzed this run count as new findings
      const reportRows = this.store
        .changedSince(startedAt, this.settings.reportMinCriticality)
        .filter((row) => row.relevance === 'accepted');
      const reportPath = await this.reportWriterService.write(
        reportRows,
        startedAt,
      );

      const summary: RunSummary = {
        startedAt: startedAt.toISOString(),
        finishedAt: this.clock().toISOString(),
        ...context.counters,
        cancelled: signal?.aborted ?? false,
        reportPath,
      };
      this.logger.log(
        `scan done: ingested=${summary.ingested} deduplicated=${summary.deduplicated} filteredOut=${summary.filteredOut} analyzed=${summary.analyzed} degraded=${summary.degraded} failedAnalysis=${summary.failedAnalysis} failedEmbedding=${summary.failedEmbedding} reanalyzed=${summary.reanalyzed} skipped=${summary.skipped} elapsedMs=${Date.now() - startedMs}`,
      );
      return summary;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (isRunFatal(error) || error instanceof ModelUnavailableError) {
        this.logger.error(`scan aborted: ${message}`);
      } else {
        this.logger.error(`scan failed: ${message}`, error instanceof Error ? error.stack : undefined);
      }
      throw error;
    }
  }

  /** Rows left at NONE by an earlier run whose analyzer call never got an answer. */
  private async reanalyzePending(
    context: RunContext,
    signal?: AbortSignal,
  ): Promise<void> {
    const pending = this.store.pendingAnalysis();
    if (pending.length === 0) {
      return;
    }

    this.logger.log(`re-analysis: pending=${pending.length}`);
    const pool = await runWithConcurrency(
      pending,
      this.settings.pipelineConcurrency,
      async (row) => {
        const status = await this.analyzeAndRecord(row, context.config.stack);
        if (status === 'deferred') {
          context.counters.failedAnalysis += 1;
        } else {
          context.counters.reanalyzed += 1;
        }
      },
      signal,
    );
    context.counters.skipped += pool.skipped;
  }

  private async collectCandidates(
    config: RadarRunConfig,
    now: Date,
  ): Promise<RawCandidate[]> {
    const window = { lookbackHours: config.lookbackHours, now };
    const batches = await Promise.all([
      ...config.sources.rssFeeds.map((url) =>
        this.rssFeedService.fetch(url, window),
      ),
      ...config.sources.githubReleases.map((repo) =>
        this.githubReleasesService.fetch(repo, window),
      ),
    ]);
    return batches.flat();
  }

  /** Per-article stages run strictly in order; a failure here only costs this article. */
  private async processCandidate(
    candidate: RawCandidate,
    context: RunContext,
  ): Promise<void> {
    const { counters } = context;

    let embedding: number[];
    try {
      embedding = await this.embeddingService.embed(
        articleText(candidate.title, candidate.body),
      );
    } catch (error) {
      if (
        error instanceof ModelUnavailableError ||
        error instanceof EmptyInputError
      ) {
        counters.failedEmbedding += 1;
        this.logger.warn(`embedding skipped: ${candidate.identity} ${error.message}`);
        return;
      }
      throw error;
    }

    const verdict = this.vigilFilterService.evaluate(
      embedding,
      context.profile,
      context.config.similarityThreshold,
    );

    const article = {
      identity: candidate.identity,
      title: candidate.title,
      bodyExcerpt: truncateLeading(candidate.body, BODY_EXCERPT_CHARS),
      sourceName: candidate.sourceName,
      publishedAt: candidate.publishedAt,
    };

    let inserted: 'inserted' | 'duplicate';
    try {
      inserted = await this.store.insertIfNew({
        ...article,
        embedding,
        similarityScore: verdict.similarityScore,
        matchedFacet: verdict.matchedFacet,
        relevance: verdict.accepted ? 'accepted' : 'rejected',
      });
    } catch (error) {
      if (error instanceof EmbeddingDimensionError) {
        counters.failedEmbedding += 1;
        this.logger.warn(`insert skipped: ${candidate.identity} ${error.message}`);
        return;
      }
      throw error;
    }

    if (inserted === 'duplicate') {
      counters.deduplicated += 1;
      return;
    }
    counters.ingested += 1;

    if (!verdict.accepted) {
      counters.filteredOut += 1;
      return;
    }

    const status = await this.analyzeAndRecord(article, context.config.stack);
    if (status === 'analyzed') {
      counters.analyzed += 1;
    } else if (status === 'degraded') {
      counters.degraded += 1;
    } else {
      counters.failedAnalysis += 1;
    }
  }

  private async analyzeAndRecord(
    article: AnalyzableArticle,
    stack: StackDeclaration,
  ): Promise<AnalysisOutcome['status']> {
    const outcome = await this.analyzerService.analyze(article, stack);
    if (outcome.status === 'deferred') {
      await this.store.recordDeferred(article.identity);
      return outcome.status;
    }

    await this.store.markAnalyzed(article.identity, {
      criticality: outcome.criticality,
      summary: outcome.summary,
      justification: outcome.justification,
    });
    return outcome.status;
  }
}
