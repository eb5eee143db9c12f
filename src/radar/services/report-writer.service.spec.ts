import { Logger } from '@nestjs/common';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { storedArticle, testSettings } from '../testing/radar-test.fixtures';
import { toArticleView } from '../types/radar.types';
import { renderCsv, ReportWriterService } from './report-writer.service';

describe('ReportWriterService', () => {
  const runStartedAt = new Date('2026-03-01T07:05:09.000Z');
  let reportDir: string;

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    reportDir = await fs.mkdtemp(path.join(os.tmpdir(), 'stack-radar-report-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(reportDir, { recursive: true, force: true });
  });

  it('writes a JSON report sorted by criticality', async () => {
    const service = new ReportWriterService(testSettings({ REPORT_DIR: reportDir }));

    const reportPath = await service.write(
      [
        storedArticle({ identity: 'low', criticality: 'LOW' }),
        storedArticle({ identity: 'critical', criticality: 'CRITICAL' }),
        storedArticle({ identity: 'high-1', criticality: 'HIGH' }),
        storedArticle({ identity: 'high-2', criticality: 'HIGH' }),
      ],
      runStartedAt,
    );

    expect(reportPath).toBe(path.join(reportDir, 'radar_report_20260301_070509.json'));
    const report = JSON.parse(
      await fs.readFile(reportPath ?? '', 'utf-8'),
    ) as {
      runStartedAt: string;
      minCriticality: string;
      count: number;
      articles: Array<Record<string, unknown>>;
    };
    expect(report.runStartedAt).toBe('2026-03-01T07:05:09.000Z');
    expect(report.minCriticality).toBe('LOW');
    expect(report.count).toBe(4);
    expect(report.articles.map((row) => row.identity)).toEqual([
      'critical',
      'high-1',
      'high-2',
      'low',
    ]);
    expect('embedding' in report.articles[0]).toBe(false);
  });

  it('writes CSV when configured', async () => {
    const service = new ReportWriterService(
      testSettings({ REPORT_DIR: reportDir, REPORT_FORMAT: 'csv' }),
    );

    const reportPath = await service.write(
      [storedArticle({ identity: 'https://example.test/a', criticality: 'MEDIUM' })],
      runStartedAt,
    );

    expect(reportPath).toBe(path.join(reportDir, 'radar_report_20260301_070509.csv'));
    const lines = (await fs.readFile(reportPath ?? '', 'utf-8')).split('\n');
    expect(lines[0]).toBe(
      'criticality,title,identity,sourceName,publishedAt,similarityScore,matchedFacet,analysisSummary,justification',
    );
    expect(lines[1]).toBe(
      'MEDIUM,Title of https://example.test/a,https://example.test/a,Test Feed,2026-03-01T00:00:00.000Z,1,runtime,,',
    );
  });

  it('skips the report when there are no rows', async () => {
    const service = new ReportWriterService(testSettings({ REPORT_DIR: reportDir }));

    await expect(service.write([], runStartedAt)).resolves.toBeNull();
    await expect(fs.readdir(reportDir)).resolves.toEqual([]);
  });

  it('escapes CSV cells', () => {
    const csv = renderCsv([
      toArticleView(
        storedArticle({
          identity: 'x',
          title: 'Node, "quoted"',
          matchedFacet: null,
          analysisSummary: 'line one\nline two',
        }),
      ),
    ]);

    expect(csv.split('\n').slice(1).join('\n')).toBe(
      'NONE,"Node, ""quoted""",x,Test Feed,2026-03-01T00:00:00.000Z,1,,"line one\nline two",\n',
    );
  });
});
