import { Inject, Injectable, Logger } from '@nestjs/common';
import path from 'node:path';
import {
  RADAR_SETTINGS,
  RadarSettings,
  ReportFormat,
} from '../config/radar.constants';
import {
  ArticleView,
  criticalityRank,
  StoredArticle,
  toArticleView,
} from '../types/radar.types';
import { formatReportTimestamp } from '../utils/date.util';
import { writeFileAtomic, writeJsonAtomic } from '../utils/file.util';

const CSV_COLUMNS = [
  'criticality',
  'title',
  'identity',
  'sourceName',
  'publishedAt',
  'similarityScore',
  'matchedFacet',
  'analysisSummary',
  'justification',
] as const;

@Injectable()
export class ReportWriterService {
  private readonly logger = new Logger(ReportWriterService.name);

  constructor(
    @Inject(RADAR_SETTINGS) private readonly settings: RadarSettings,
  ) {}

  /** Returns the written path, or null when there was nothing to report. */
  async write(rows: StoredArticle[], runStartedAt: Date): Promise<string | null> {
    if (rows.length === 0) {
      this.logger.log('report skipped: no articles at or above the cutoff');
      return null;
    }

    const format = this.settings.reportFormat;
    const filePath = path.join(
      this.settings.reportDir,
      reportFileName(runStartedAt, format),
    );
    const views = sortForReport(rows).map(toArticleView);

    if (format === 'csv') {
      await writeFileAtomic(filePath, renderCsv(views));
    } else {
      await writeJsonAtomic(filePath, {
        runStartedAt: runStartedAt.toISOString(),
        minCriticality: this.settings.reportMinCriticality,
        count: views.length,
        articles: views,
      });
    }

    this.logger.log(`report written: rows=${views.length} path=${filePath}`);
    return filePath;
  }
}

export function reportFileName(runStartedAt: Date, format: ReportFormat): string {
  return `radar_report_${formatReportTimestamp(runStartedAt)}.${format}`;
}

/** Most critical first; equal levels keep their ingestion order. */
export function sortForReport(rows: StoredArticle[]): StoredArticle[] {
  return [...rows].sort(
    (a, b) => criticalityRank(b.criticality) - criticalityRank(a.criticality),
  );
}

export function renderCsv(rows: ArticleView[]): string {
  const lines = [CSV_COLUMNS.join(',')];
  for (const row of rows) {
    lines.push(CSV_COLUMNS.map((column) => csvCell(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

function csvCell(value: string | number | null): string {
  const text = value === null ? '' : String(value);
  if (/[",\n\r]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}
