export const CRITICALITY_LEVELS = [
  'NONE',
  'LOW',
  'MEDIUM',
  'HIGH',
  'CRITICAL',
] as const;

export type Criticality = (typeof CRITICALITY_LEVELS)[number];

/** Levels the analyzer may assign. NONE only ever means "not analyzed yet". */
export type AssessedCriticality = Exclude<Criticality, 'NONE'>;

export type Relevance = 'accepted' | 'rejected';

export interface RawCandidate {
  identity: string;
  title: string;
  body: string;
  sourceName: string;
  publishedAt: string;
}

export interface NewArticle {
  identity: string;
  title: string;
  bodyExcerpt: string;
  sourceName: string;
  publishedAt: string;
  embedding: number[];
  similarityScore: number;
  matchedFacet: string | null;
  relevance: Relevance;
}

export interface StoredArticle extends NewArticle {
  criticality: Criticality;
  analysisSummary: string;
  justification: string;
  ingestedAt: string;
  analyzedAt: string | null;
  analysisAttempts: number;
}

/** A stored article without its vector, for reports and API responses. */
export type ArticleView = Omit<StoredArticle, 'embedding'>;

export type InsertResult = 'inserted' | 'duplicate';

export interface AnalysisVerdict {
  criticality: AssessedCriticality;
  summary: string;
  justification: string;
}

export interface TechnologyEntry {
  name: string;
  description?: string;
  group?: string;
}

export interface StackDeclaration {
  context: string;
  technologies: TechnologyEntry[];
}

export interface ProfileFacet {
  label: string;
  technologies: string[];
  vector: number[];
}

export interface StackProfile {
  facets: ProfileFacet[];
}

export interface VigilVerdict {
  accepted: boolean;
  similarityScore: number;
  matchedFacet: string | null;
}

export type AnalysisOutcome =
  | ({ status: 'analyzed'; attempts: number } & AnalysisVerdict)
  | {
      status: 'degraded';
      reason: 'parse_failure';
      criticality: 'LOW';
      summary: string;
      justification: string;
      attempts: number;
    }
  | { status: 'deferred'; reason: string; attempts: number };

export interface SourceSettings {
  rssFeeds: string[];
  githubReleases: string[];
}

export interface RunSummary {
  startedAt: string;
  finishedAt: string;
  fetched: number;
  ingested: number;
  deduplicated: number;
  filteredOut: number;
  analyzed: number;
  degraded: number;
  failedAnalysis: number;
  failedEmbedding: number;
  reanalyzed: number;
  skipped: number;
  cancelled: boolean;
  reportPath: string | null;
}

export type InquiryStage = 'RECEIVE' | 'EMBED' | 'RETRIEVE' | 'ASK';

export interface InquirySource {
  identity: string;
  title: string;
  criticality: Criticality;
  similarity: number;
}

export type InquiryTurn =
  | {
      status: 'answered';
      question: string;
      answer: string;
      sources: InquirySource[];
    }
  | {
      status: 'failed';
      question: string;
      stage: InquiryStage;
      reason: string;
    };

export function criticalityRank(level: Criticality): number {
  return CRITICALITY_LEVELS.indexOf(level);
}

export function isCriticality(value: string): value is Criticality {
  return CRITICALITY_LEVELS.some((level) => level === value);
}

export function toArticleView(article: StoredArticle): ArticleView {
  const { embedding: _embedding, ...view } = article;
  return view;
}
