import { Inject, Injectable, Logger } from '@nestjs/common';
import { RADAR_SETTINGS, RadarSettings } from '../config/radar.constants';
import { RawCandidate } from '../types/radar.types';
import { isWithinLookback, parseDateToIso } from '../utils/date.util';
import { cleanText } from '../utils/text.util';

const BODY_MAX_CHARS = 1200;

/** RSS 2.0 and Atom reader. Fetch or parse problems yield an empty list. */
@Injectable()
export class RssFeedService {
  private readonly logger = new Logger(RssFeedService.name);

  constructor(
    @Inject(RADAR_SETTINGS) private readonly settings: RadarSettings,
  ) {}

  async fetch(
    url: string,
    options: { lookbackHours: number; now: Date },
  ): Promise<RawCandidate[]> {
    const startedAt = Date.now();
    const xml = await this.fetchXml(url);
    if (!xml) {
      return [];
    }

    const entries = this.parseFeed(xml, url);
    const recent = entries.filter((entry) =>
      isWithinLookback(entry.publishedAt, options.lookbackHours, options.now),
    );
    this.logger.log(
      `rss fetch done: items=${recent.length}/${entries.length} elapsedMs=${Date.now() - startedAt} ${this.describeUrl(url)}`,
    );
    return recent;
  }

  private async fetchXml(url: string): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(
      () => controller.abort(),
      this.settings.requestTimeoutMs,
    );
    try {
      const res = await fetch(url, {
        headers: {
          'User-Agent': this.settings.userAgent,
          Accept:
            'application/rss+xml, application/atom+xml, application/xml, text/xml;q=0.9, */*;q=0.8',
        },
        signal: controller.signal,
      });

      if (!res.ok) {
        this.logger.warn(`rss fetch failed: ${res.status} ${url}`);
        return '';
      }
      return await res.text();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`rss fetch error: ${url} ${message}`);
      return '';
    } finally {
      clearTimeout(timeout);
    }
  }

  parseFeed(xml: string, feedUrl: string): RawCandidate[] {
    const feedTitle = cleanText(this.extractTag(this.channelHead(xml), 'title'));
    const sourceName = feedTitle || this.hostOf(feedUrl);
    const blocks: string[] = xml.match(/<(item|entry)\b[\s\S]*?<\/\1>/gi) ?? [];

    return blocks
      .map((block): RawCandidate => {
        const link = this.resolveLink(this.extractLink(block), feedUrl);
        const guid =
          cleanText(this.extractTag(block, 'guid')) ||
          cleanText(this.extractTag(block, 'id'));
        return {
          identity: link || guid,
          title: cleanText(this.extractTag(block, 'title')),
          body: cleanText(
            this.extractTag(block, 'content:encoded') ||
              this.extractTag(block, 'content') ||
              this.extractTag(block, 'description') ||
              this.extractTag(block, 'summary'),
          ).slice(0, BODY_MAX_CHARS),
          sourceName,
          publishedAt: this.extractPublishedAt(block),
        };
      })
      .filter((entry) => entry.title && entry.identity);
  }

  private channelHead(xml: string): string {
    const firstItem = xml.search(/<(item|entry)\b/i);
    return firstItem === -1 ? xml : xml.slice(0, firstItem);
  }

  private extractLink(block: string): string {
    const text = cleanText(this.extractTag(block, 'link'));
    if (text) {
      return text;
    }
    // Atom: <link rel="alternate" href="..."/>
    const links = block.match(/<link\b[^>]*>/gi) ?? [];
    for (const tag of links) {
      const rel = /\brel=["']([^"']+)["']/i.exec(tag)?.[1] ?? 'alternate';
      const href = /\bhref=["']([^"']+)["']/i.exec(tag)?.[1];
      if (href && rel === 'alternate') {
        return cleanText(href);
      }
    }
    return '';
  }

  private resolveLink(link: string, feedUrl: string): string {
    if (!link) {
      return '';
    }
    try {
      return new URL(link, feedUrl).toString();
    } catch {
      return link;
    }
  }

  private extractPublishedAt(block: string): string {
    const tags = ['pubDate', 'published', 'updated', 'dc:date'];
    for (const tag of tags) {
      const raw = cleanText(this.extractTag(block, tag));
      const iso = parseDateToIso(raw);
      if (iso) {
        return iso;
      }
    }
    return '';
  }

  private extractTag(xml: string, tagName: string): string {
    const escapedTag = tagName.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const regex = new RegExp(
      `<${escapedTag}(?:\\s[^>]*)?>([\\s\\S]*?)<\\/${escapedTag}>`,
      'i',
    );
    const match = xml.match(regex);
    if (!match?.[1]) {
      return '';
    }
    return match[1];
  }

  private hostOf(url: string): string {
    try {
      return new URL(url).hostname;
    } catch {
      return url.slice(0, 80);
    }
  }

  private describeUrl(url: string): string {
    try {
      const parsed = new URL(url);
      return `host=${parsed.hostname} path=${parsed.pathname.slice(0, 48)}`;
    } catch {
      return `url=${url.slice(0, 80)}`;
    }
  }
}
