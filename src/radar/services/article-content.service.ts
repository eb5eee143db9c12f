import { Inject, Injectable, Logger } from '@nestjs/common';
import { RADAR_SETTINGS, RadarSettings } from '../config/radar.constants';
import { cleanText, truncateLeading } from '../utils/text.util';

/** Full text of an article page, for the analyzer. Any failure yields ''. */
@Injectable()
export class ArticleContentService {
  private readonly logger = new Logger(ArticleContentService.name);

  constructor(
    @Inject(RADAR_SETTINGS) private readonly settings: RadarSettings,
  ) {}

  async fetchText(url: string): Promise<string> {
    if (!this.settings.articleContent.enabled || !/^https?:\/\//i.test(url)) {
      return '';
    }

    const controller = new AbortController();
    const timeout = setTimeout(
      () => controller.abort(),
      this.settings.requestTimeoutMs,
    );
    try {
      const res = await fetch(url, {
        headers: {
          'User-Agent': this.settings.userAgent,
          Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
        },
        signal: controller.signal,
      });
      if (!res.ok) {
        this.logger.warn(`article fetch failed: ${res.status} ${url}`);
        return '';
      }
      const contentType = res.headers.get('content-type') ?? '';
      if (contentType && !/html/i.test(contentType)) {
        this.logger.warn(`article fetch skipped: ${contentType} ${url}`);
        return '';
      }

      return truncateLeading(
        extractTextFromHtml(await res.text()),
        this.settings.articleContent.maxChars,
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`article fetch error: ${url} ${message}`);
      return '';
    } finally {
      clearTimeout(timeout);
    }
  }
}

export function extractTextFromHtml(html: string): string {
  if (!html) {
    return '';
  }

  // <article>, then <main>, then <body>, then the whole page
  const region =
    html.match(/<article\b[^>]*>([\s\S]*?)<\/article>/i)?.[1] ??
    html.match(/<main\b[^>]*>([\s\S]*?)<\/main>/i)?.[1] ??
    html.match(/<body[^>]*>([\s\S]*?)<\/body>/i)?.[1] ??
    html;

  const stripped = region
    .replace(/<script\b[^>]*>[\s\S]*?<\/script>/gi, ' ')
    .replace(/<style\b[^>]*>[\s\S]*?<\/style>/gi, ' ')
    .replace(/<noscript\b[^>]*>[\s\S]*?<\/noscript>/gi, ' ')
    .replace(/<(nav|header|footer|aside|form)\b[^>]*>[\s\S]*?<\/\1>/gi, ' ');

  return cleanText(stripped);
}
