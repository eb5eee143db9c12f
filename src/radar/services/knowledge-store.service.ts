import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import {
  CLOCK,
  Clock,
  KNOWLEDGE_SCHEMA_VERSION,
  RADAR_SETTINGS,
  RadarSettings,
} from '../config/radar.constants';
import {
  EmbeddingDimensionError,
  InvalidTransitionError,
  KnowledgeStoreUnavailableError,
} from '../errors/radar.errors';
import {
  CRITICALITY_LEVELS,
  Criticality,
  criticalityRank,
  InsertResult,
  NewArticle,
  StoredArticle,
} from '../types/radar.types';
import {
  isMissingFileError,
  withFileLock,
  writeJsonAtomic,
} from '../utils/file.util';
import { cosineSimilarity } from '../utils/similarity.util';

const storedArticleSchema = z.object({
  identity: z.string().min(1),
  title: z.string(),
  bodyExcerpt: z.string(),
  sourceName: z.string(),
  publishedAt: z.string(),
  embedding: z.array(z.number()),
  similarityScore: z.number(),
  matchedFacet: z.string().nullable(),
  relevance: z.enum(['accepted', 'rejected']),
  criticality: z.enum(CRITICALITY_LEVELS),
  analysisSummary: z.string(),
  justification: z.string(),
  ingestedAt: z.string(),
  analyzedAt: z.string().nullable(),
  analysisAttempts: z.number().int().min(0),
});

const knowledgeDocumentSchema = z.object({
  schemaVersion: z.literal(KNOWLEDGE_SCHEMA_VERSION),
  embeddingModel: z.string().min(1),
  dimensions: z.number().int().positive().nullable(),
  articles: z.array(storedArticleSchema),
});

type KnowledgeDocument = z.infer<typeof knowledgeDocumentSchema>;

export interface AnalysisFields {
  criticality: Criticality;
  summary: string;
  justification: string;
}

export interface NearestMatch {
  article: StoredArticle;
  similarity: number;
}

/**
 * Durable article table shared by the scan pipeline and the Inquisitor.
 * Rows are append-only; the analysis fields of a row are written exactly once.
 * One document per embedding model so vector spaces never mix. Every write
 * merges the document on disk first, under a lock file, so the HTTP server and
 * the CLIs can share it.
 */
@Injectable()
export class KnowledgeStoreService {
  private readonly logger = new Logger(KnowledgeStoreService.name);
  private readonly articles = new Map<string, StoredArticle>();
  private embeddingModel: string | null = null;
  private dimensions: number | null = null;
  private filePath = '';
  private documentModel = '';
  private opening: Promise<void> | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    @Inject(RADAR_SETTINGS) private readonly settings: RadarSettings,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  static documentPath(dataDir: string, embeddingModel: string): string {
    const slug = embeddingModel.toLowerCase().replace(/[^a-z0-9._-]+/g, '_');
    return path.join(dataDir, 'knowledge', `${slug}.json`);
  }

  async open(embeddingModel: string): Promise<void> {
    if (this.embeddingModel !== null && this.embeddingModel !== embeddingModel) {
      throw new KnowledgeStoreUnavailableError(
        `store already opened for ${this.embeddingModel}, not ${embeddingModel}`,
      );
    }
    this.embeddingModel = embeddingModel;
    if (this.opening) {
      await this.opening;
      await this.refresh();
      return;
    }
    // a failed open is retried by the next caller
    this.opening = this.load(embeddingModel).catch((error: unknown) => {
      this.opening = null;
      this.embeddingModel = null;
      throw error;
    });
    await this.opening;
  }

  /** Folds in rows that other processes have written since the last read. */
  async refresh(): Promise<void> {
    this.assertOpen();
    const filePath = this.filePath;
    await this.enqueue(async () => {
      const document = await this.readDocument(filePath);
      if (document) {
        this.absorb(document, filePath);
      }
    });
  }

  get isOpen(): boolean {
    return this.filePath !== '';
  }

  count(): number {
    return this.articles.size;
  }

  has(identity: string): boolean {
    this.assertOpen();
    return this.articles.has(identity);
  }

  get(identity: string): StoredArticle | null {
    this.assertOpen();
    return this.articles.get(identity) ?? null;
  }

  /** Returns `duplicate` without touching the existing row when the identity is already stored. */
  async insertIfNew(article: NewArticle): Promise<InsertResult> {
    this.assertOpen();
    if (this.articles.has(article.identity)) {
      return 'duplicate';
    }
    if (this.dimensions !== null && article.embedding.length !== this.dimensions) {
      throw new EmbeddingDimensionError(this.dimensions, article.embedding.length);
    }

    const row: StoredArticle = {
      ...article,
      embedding: [...article.embedding],
      criticality: 'NONE',
      analysisSummary: '',
      justification: '',
      ingestedAt: this.clock().toISOString(),
      analyzedAt: null,
      analysisAttempts: 0,
    };
    // claimed before the write so a concurrent insert of the same identity sees it
    this.articles.set(row.identity, row);
    this.dimensions ??= row.embedding.length;
    await this.persist();
    return 'inserted';
  }

  /**
   * Fills the analysis fields of a row that has none yet. Returns false when
   * the row is unknown or already analyzed; existing analysis is never overwritten.
   */
  async markAnalyzed(
    identity: string,
    verdict: AnalysisFields,
  ): Promise<boolean> {
    this.assertOpen();
    if (verdict.criticality === 'NONE') {
      throw new InvalidTransitionError('criticality cannot be set to NONE');
    }

    const current = this.articles.get(identity);
    if (!current) {
      this.logger.warn(`mark analyzed skipped: unknown identity ${identity}`);
      return false;
    }
    if (current.criticality !== 'NONE') {
      return false;
    }

    this.articles.set(identity, {
      ...current,
      criticality: verdict.criticality,
      analysisSummary: verdict.summary,
      justification: verdict.justification,
      analyzedAt: this.clock().toISOString(),
    });
    await this.persist();
    return true;
  }

  /** Counts an analyzer pass that ended without a verdict; the row stays pending. */
  async recordDeferred(identity: string): Promise<void> {
    this.assertOpen();
    const current = this.articles.get(identity);
    if (!current || current.criticality !== 'NONE') {
      return;
    }
    this.articles.set(identity, {
      ...current,
      analysisAttempts: current.analysisAttempts + 1,
    });
    await this.persist();
  }

  /** Accepted rows still waiting for a verdict, oldest first. */
  pendingAnalysis(): StoredArticle[] {
    this.assertOpen();
    return this.sortedByIngestion(
      [...this.articles.values()].filter(
        (row) => row.relevance === 'accepted' && row.criticality === 'NONE',
      ),
    );
  }

  allSince(
    timestamp: string | Date,
    minCriticality: Criticality = 'NONE',
  ): StoredArticle[] {
    this.assertOpen();
    const since = toEpochMs(timestamp);
    const minRank = criticalityRank(minCriticality);
    return this.sortedByIngestion(
      [...this.articles.values()].filter(
        (row) =>
          new Date(row.ingestedAt).getTime() >= since &&
          criticalityRank(row.criticality) >= minRank,
      ),
    );
  }

  /** Like `allSince`, but also takes older rows whose verdict landed at or after `timestamp`. */
  changedSince(
    timestamp: string | Date,
    minCriticality: Criticality = 'NONE',
  ): StoredArticle[] {
    this.assertOpen();
    const since = toEpochMs(timestamp);
    const minRank = criticalityRank(minCriticality);
    return this.sortedByIngestion(
      [...this.articles.values()].filter(
        (row) =>
          (new Date(row.ingestedAt).getTime() >= since ||
            (row.analyzedAt !== null &&
              new Date(row.analyzedAt).getTime() >= since)) &&
          criticalityRank(row.criticality) >= minRank,
      ),
    );
  }

  /** Linear cosine scan: the k most similar rows, ties broken by most recent ingestion. */
  nearest(embedding: number[], k: number): NearestMatch[] {
    this.assertOpen();
    const limit = Math.max(0, Math.floor(k));
    if (limit === 0) {
      return [];
    }
    return [...this.articles.values()]
      .map((article) => ({
        article,
        similarity: cosineSimilarity(embedding, article.embedding),
      }))
      .sort(
        (a, b) =>
          b.similarity - a.similarity ||
          b.article.ingestedAt.localeCompare(a.article.ingestedAt),
      )
      .slice(0, limit);
  }

  private sortedByIngestion(rows: StoredArticle[]): StoredArticle[] {
    return rows.sort(
      (a, b) =>
        a.ingestedAt.localeCompare(b.ingestedAt) ||
        a.identity.localeCompare(b.identity),
    );
  }

  private async load(embeddingModel: string): Promise<void> {
    const filePath = KnowledgeStoreService.documentPath(
      this.settings.dataDir,
      embeddingModel,
    );
    this.documentModel = embeddingModel;
    const document = await this.readDocument(filePath);

    this.articles.clear();
    this.dimensions = null;
    if (document) {
      this.absorb(document, filePath);
    }

    this.filePath = filePath;
    this.logger.log(
      `knowledge store open: model=${embeddingModel} articles=${this.articles.size} path=${filePath}`,
    );
  }

  private async readDocument(
    filePath: string,
  ): Promise<KnowledgeDocument | null> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw new KnowledgeStoreUnavailableError(
        `knowledge store unreadable at ${filePath}`,
        { cause: error },
      );
    }

    const document = this.parseDocument(raw, filePath);
    if (document.embeddingModel !== this.documentModel) {
      throw new KnowledgeStoreUnavailableError(
        `knowledge store at ${filePath} was built with ${document.embeddingModel}, not ${this.documentModel}`,
      );
    }
    for (const article of document.articles) {
      if (
        document.dimensions !== null &&
        article.embedding.length !== document.dimensions
      ) {
        throw new KnowledgeStoreUnavailableError(
          `knowledge store at ${filePath} mixes embedding sizes (${article.identity})`,
        );
      }
    }
    return document;
  }

  /** Merges a document read from disk into memory; rows are never dropped. */
  private absorb(document: KnowledgeDocument, filePath: string): void {
    if (
      this.dimensions !== null &&
      document.dimensions !== null &&
      document.dimensions !== this.dimensions
    ) {
      throw new KnowledgeStoreUnavailableError(
        `knowledge store at ${filePath} holds ${document.dimensions}-dimension embeddings, not ${this.dimensions}`,
      );
    }
    this.dimensions ??= document.dimensions;
    for (const stored of document.articles) {
      const current = this.articles.get(stored.identity);
      this.articles.set(
        stored.identity,
        current ? mergeRow(current, stored) : stored,
      );
    }
  }

  private parseDocument(raw: string, filePath: string): KnowledgeDocument {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new KnowledgeStoreUnavailableError(
        `knowledge store at ${filePath} is not valid JSON`,
        { cause: error },
      );
    }
    const parsed = knowledgeDocumentSchema.safeParse(json);
    if (!parsed.success) {
      throw new KnowledgeStoreUnavailableError(
        `knowledge store at ${filePath} has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
      );
    }
    return parsed.data;
  }

  private toDocument(): KnowledgeDocument {
    return {
      schemaVersion: KNOWLEDGE_SCHEMA_VERSION,
      embeddingModel: this.documentModel,
      dimensions: this.dimensions,
      articles: this.sortedByIngestion([...this.articles.values()]),
    };
  }

  /** Reads and writes of this process run one at a time, in call order. */
  private enqueue(work: () => Promise<void>): Promise<void> {
    const task = this.writeQueue.then(work);
    // keep the queue alive after a failure; the caller still sees it through `task`
    this.writeQueue = task.catch(() => undefined);
    return task;
  }

  private persist(): Promise<void> {
    const filePath = this.filePath;
    return this.enqueue(() => this.write(filePath));
  }

  private async write(filePath: string): Promise<void> {
    try {
      await withFileLock(filePath, async () => {
        const onDisk = await this.readDocument(filePath);
        if (onDisk) {
          this.absorb(onDisk, filePath);
        }
        await writeJsonAtomic(filePath, this.toDocument());
      });
    } catch (error) {
      if (error instanceof KnowledgeStoreUnavailableError) {
        throw error;
      }
      throw new KnowledgeStoreUnavailableError(
        `knowledge store not writable at ${filePath}`,
        { cause: error },
      );
    }
  }

  private assertOpen(): void {
    if (!this.isOpen) {
      throw new KnowledgeStoreUnavailableError('knowledge store is not open');
    }
  }
}

function toEpochMs(timestamp: string | Date): number {
  const ms = new Date(timestamp).getTime();
  if (Number.isNaN(ms)) {
    throw new RangeError(`invalid timestamp: ${String(timestamp)}`);
  }
  return ms;
}

/**
 * Picks the row that has progressed furthest. A verdict already on disk wins
 * over one held in memory, so analysis fields stay write-once across processes.
 */
function mergeRow(local: StoredArticle, stored: StoredArticle): StoredArticle {
  if (stored.criticality !== 'NONE') {
    return stored;
  }
  if (local.criticality !== 'NONE') {
    return local;
  }
  return local.analysisAttempts > stored.analysisAttempts ? local : stored;
}
