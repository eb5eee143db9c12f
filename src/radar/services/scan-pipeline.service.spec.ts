import { Logger } from '@nestjs/common';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { RadarSettings } from '../config/radar.constants';
import {
  ConfigurationEmptyError,
  ConfigurationError,
} from '../errors/radar.errors';
import {
  FakeEmbeddingBackend,
  FakeLanguageModel,
  testSettings,
  unitAt,
} from '../testing/radar-test.fixtures';
import { RawCandidate } from '../types/radar.types';
import { ArticleContentService } from './article-content.service';
import { CriticalityAnalyzerService } from './criticality-analyzer.service';
import { DedupeGateService } from './dedupe-gate.service';
import { EmbeddingService } from './embedding.service';
import { GithubReleasesService } from './github-releases.service';
import { KnowledgeStoreService } from './knowledge-store.service';
import { ReportWriterService } from './report-writer.service';
import { RssFeedService } from './rss-feed.service';
import { ScanPipelineService } from './scan-pipeline.service';
import { StackProfileService } from './stack-profile.service';
import { VigilFilterService } from './vigil-filter.service';

function candidate(slug: string, title: string, body = 'Details inside.'): RawCandidate {
  return {
    identity: `https://news.example/${slug}`,
    title,
    body,
    sourceName: 'News Example',
    publishedAt: '2026-03-01T11:00:00.000Z',
  };
}

const RELEVANT = candidate('relevant', 'Relevant runtime advisory', 'Patch now.');
const UNRELATED = candidate('unrelated', 'Unrelated gadget review', 'A new phone.');

const HIGH_VERDICT = JSON.stringify({
  criticality: 'HIGH',
  summary: 'Runtime patch released.',
  justification: 'The service runs on this runtime.',
});

describe('ScanPipelineService', () => {
  let workDir: string;
  let settings: RadarSettings;
  let backend: FakeEmbeddingBackend;
  let llm: FakeLanguageModel;
  let llmHealthy: boolean;
  let candidates: RawCandidate[];
  let ticks: number;
  const clock = (): Date => {
    ticks += 1;
    return new Date(Date.UTC(2026, 2, 1, 12, 0, ticks - 1));
  };

  async function writeConfig(config: unknown): Promise<void> {
    await fs.writeFile(settings.configPath, JSON.stringify(config));
  }

  function createPipeline(): {
    pipeline: ScanPipelineService;
    store: KnowledgeStoreService;
    rss: RssFeedService;
  } {
    const embedding = new EmbeddingService(backend, settings);
    const store = new KnowledgeStoreService(settings, clock);
    const rss = new RssFeedService(settings);
    jest.spyOn(rss, 'fetch').mockImplementation(async () => candidates);
    const github = new GithubReleasesService(settings);
    jest.spyOn(github, 'fetch').mockResolvedValue([]);

    const pipeline = new ScanPipelineService(
      rss,
      github,
      new StackProfileService(embedding),
      embedding,
      new VigilFilterService(),
      new DedupeGateService(store),
      new CriticalityAnalyzerService(llm, settings, new ArticleContentService(settings)),
      store,
      new ReportWriterService(settings),
      settings,
      clock,
    );
    return { pipeline, store, rss };
  }

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);

    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'stack-radar-scan-'));
    settings = testSettings({
      DATA_DIR: path.join(workDir, 'data'),
      REPORT_DIR: path.join(workDir, 'reports'),
      RADAR_CONFIG_PATH: path.join(workDir, 'radar.config.json'),
      PIPELINE_CONCURRENCY: '2',
    });
    ticks = 0;
    llmHealthy = true;
    candidates = [RELEVANT, UNRELATED];
    backend = new FakeEmbeddingBackend([
      ['node.js: releases', [1, 0]],
      ['outage', { kind: 'fatal', reason: 'embedding quota exhausted' }],
      ['unrelated', unitAt(0.4)],
      ['relevant', unitAt(0.92)],
    ]);
    llm = new FakeLanguageModel((request) =>
      !llmHealthy || request.userPrompt.includes('analysis fails')
        ? { kind: 'retryable', reason: 'gemini_generate_failed: 503' }
        : { kind: 'success', value: HIGH_VERDICT },
    );

    await writeConfig({
      project: { context: '', technologies: ['Node.js'] },
      sources: { rssFeeds: ['https://news.example/feed.xml'] },
      analysis: { similarityThreshold: 0.75 },
    });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('analyzes relevant articles and stores rejected ones without a model call', async () => {
    const { pipeline, store } = createPipeline();

    const summary = await pipeline.run();

    expect(summary).toEqual({
      startedAt: '2026-03-01T12:00:00.000Z',
      finishedAt: expect.any(String),
      fetched: 2,
      ingested: 2,
      deduplicated: 0,
      filteredOut: 1,
      analyzed: 1,
      degraded: 0,
      failedAnalysis: 0,
      failedEmbedding: 0,
      reanalyzed: 0,
      skipped: 0,
      cancelled: false,
      reportPath: path.join(workDir, 'reports', 'radar_report_20260301_120000.json'),
    });
    expect(llm.requests).toHaveLength(1);
    expect(store.get(RELEVANT.identity)).toMatchObject({
      relevance: 'accepted',
      criticality: 'HIGH',
      matchedFacet: 'Node.js',
      analysisSummary: 'Runtime patch released.',
    });
    expect(store.get(UNRELATED.identity)).toMatchObject({
      relevance: 'rejected',
      criticality: 'NONE',
      analyzedAt: null,
    });
    expect(store.get(UNRELATED.identity)?.similarityScore).toBeCloseTo(0.4, 6);

    const report = JSON.parse(
      await fs.readFile(summary.reportPath ?? '', 'utf-8'),
    ) as { count: number; articles: Array<{ identity: string }> };
    expect(report.count).toBe(1);
    expect(report.articles[0].identity).toBe(RELEVANT.identity);
  });

  it('keeps going when one analysis or embedding fails', async () => {
    candidates = [
      candidate('one', 'Relevant fix one'),
      candidate('two', 'Relevant fix two', 'The analysis fails here.'),
      candidate('three', 'Relevant fix three'),
      candidate('outage', 'Provider outage story'),
    ];
    const { pipeline, store } = createPipeline();

    const summary = await pipeline.run();

    expect(summary).toMatchObject({
      fetched: 4,
      ingested: 3,
      analyzed: 2,
      failedAnalysis: 1,
      failedEmbedding: 1,
    });
    expect(store.get('https://news.example/one')?.criticality).toBe('HIGH');
    expect(store.get('https://news.example/three')?.criticality).toBe('HIGH');
    expect(store.get('https://news.example/two')).toMatchObject({
      criticality: 'NONE',
      analysisAttempts: 1,
    });
    expect(store.has('https://news.example/outage')).toBe(false);
    expect(llm.requests).toHaveLength(5);
  });

  it('does nothing new when the same articles come back after a restart', async () => {
    await createPipeline().pipeline.run();
    const { pipeline, store } = createPipeline();

    const summary = await pipeline.run();

    expect(summary).toMatchObject({
      fetched: 2,
      ingested: 0,
      deduplicated: 2,
      analyzed: 0,
      reportPath: null,
    });
    expect(store.count()).toBe(2);
    expect(llm.requests).toHaveLength(1);
  });

  it('re-analyzes rows whose analysis was deferred', async () => {
    candidates = [RELEVANT];
    llmHealthy = false;
    const { pipeline, store } = createPipeline();
    const first = await pipeline.run();
    expect(first.failedAnalysis).toBe(1);
    expect(store.get(RELEVANT.identity)?.criticality).toBe('NONE');

    llmHealthy = true;
    const second = await pipeline.run();

    expect(second).toMatchObject({ reanalyzed: 1, deduplicated: 1, ingested: 0 });
    expect(store.get(RELEVANT.identity)?.criticality).toBe('HIGH');
    expect(first.reportPath).toBeNull();
    expect(second.reportPath).not.toBeNull();

    const report = JSON.parse(
      await fs.readFile(second.reportPath ?? '', 'utf-8'),
    ) as { count: number; articles: Array<{ identity: string; criticality: string }> };
    expect(report.count).toBe(1);
    expect(report.articles[0]).toMatchObject({
      identity: RELEVANT.identity,
      criticality: 'HIGH',
    });
  });

  it('fails fast on an empty technology list', async () => {
    await writeConfig({
      project: { technologies: [] },
      sources: { rssFeeds: ['https://news.example/feed.xml'] },
      analysis: { similarityThreshold: 0.75 },
    });
    const { pipeline, rss } = createPipeline();

    await expect(pipeline.run()).rejects.toBeInstanceOf(ConfigurationEmptyError);
    expect(backend.calls).toHaveLength(0);
    expect(llm.requests).toHaveLength(0);
    expect(rss.fetch).not.toHaveBeenCalled();
    await expect(fs.access(path.join(workDir, 'data', 'knowledge'))).rejects.toThrow();
  });

  it('fails when no similarity threshold is configured', async () => {
    await writeConfig({ project: { technologies: ['Node.js'] } });
    const { pipeline } = createPipeline();

    await expect(pipeline.run()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('shares one run between concurrent callers', async () => {
    const { pipeline, rss } = createPipeline();

    const [first, second] = await Promise.all([pipeline.run(), pipeline.run()]);

    expect(second).toBe(first);
    expect(rss.fetch).toHaveBeenCalledTimes(1);
    expect(pipeline.isRunning).toBe(false);
  });

  it('stops scheduling articles once aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const { pipeline, store } = createPipeline();

    const summary = await pipeline.run({ signal: controller.signal });

    expect(summary).toMatchObject({
      fetched: 2,
      ingested: 0,
      skipped: 2,
      cancelled: true,
      reportPath: null,
    });
    expect(store.count()).toBe(0);
  });
});
