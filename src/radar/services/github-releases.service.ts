import { Inject, Injectable, Logger } from '@nestjs/common';
import { RADAR_SETTINGS, RadarSettings } from '../config/radar.constants';
import { RawCandidate } from '../types/radar.types';
import { isWithinLookback, parseDateToIso } from '../utils/date.util';
import { asRecord, asString } from '../utils/json.util';
import { cleanText } from '../utils/text.util';

const BODY_MAX_CHARS = 800;
const PER_PAGE = 20;

/** Release notes of watched repositories, via the GitHub REST API. */
@Injectable()
export class GithubReleasesService {
  private readonly logger = new Logger(GithubReleasesService.name);

  constructor(
    @Inject(RADAR_SETTINGS) private readonly settings: RadarSettings,
  ) {}

  async fetch(
    repo: string,
    options: { lookbackHours: number; now: Date },
  ): Promise<RawCandidate[]> {
    const payload = await this.fetchReleases(repo);
    const releases = Array.isArray(payload) ? payload : [];

    const candidates = releases
      .map((entry) => this.toCandidate(repo, entry))
      .filter((entry): entry is RawCandidate => entry !== null)
      .filter((entry) =>
        isWithinLookback(entry.publishedAt, options.lookbackHours, options.now),
      );
    this.logger.log(
      `github releases done: repo=${repo} items=${candidates.length}/${releases.length}`,
    );
    return candidates;
  }

  toCandidate(repo: string, value: unknown): RawCandidate | null {
    const release = asRecord(value);
    if (!release || release.draft === true) {
      return null;
    }
    const identity = asString(release.html_url).trim();
    const label = cleanText(asString(release.name)) || cleanText(asString(release.tag_name));
    if (!identity || !label) {
      return null;
    }
    return {
      identity,
      title: `${repo} release ${label}`,
      body: cleanText(asString(release.body)).slice(0, BODY_MAX_CHARS),
      sourceName: `GitHub ${repo}`,
      publishedAt: parseDateToIso(
        asString(release.published_at) || asString(release.created_at),
      ),
    };
  }

  private async fetchReleases(repo: string): Promise<unknown> {
    const url = `${this.settings.endpoints.github.replace(/\/+$/, '')}/repos/${repo}/releases?per_page=${PER_PAGE}`;
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'User-Agent': this.settings.userAgent,
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (this.settings.credentials.githubToken) {
      headers.Authorization = `Bearer ${this.settings.credentials.githubToken}`;
    }

    const controller = new AbortController();
    const timeout = setTimeout(
      () => controller.abort(),
      this.settings.requestTimeoutMs,
    );
    try {
      const res = await fetch(url, { headers, signal: controller.signal });
      if (!res.ok) {
        this.logger.warn(`github releases failed: ${res.status} ${repo}`);
        return [];
      }
      return await res.json();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`github releases error: ${repo} ${message}`);
      return [];
    } finally {
      clearTimeout(timeout);
    }
  }
}
