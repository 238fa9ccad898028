import type { Capture, ContentType } from '../types/archive';
import type { NormalizedDocument } from '../types/diff';
import { DiffComputeError } from '../errors';
import { BeautifyFormatter } from './formatter';
import type { Formatter } from './formatter';

interface ArtifactPattern {
  name: string;
  pattern: RegExp;
  replacement: string;
  appliesTo: readonly ContentType[];
}

const ALL_TYPES: readonly ContentType[] = ['html', 'css', 'js'];

export class ContentNormalizer {
  /** Markup and URLs the archive injects into the captures it serves. */
  private static readonly ARTIFACT_PATTERNS: ArtifactPattern[] = [
    {
      name: 'toolbar',
      pattern: /<!--\s*BEGIN WAYBACK TOOLBAR INSERT\s*-->[\s\S]*?<!--\s*END WAYBACK TOOLBAR INSERT\s*-->/gi,
      replacement: '',
      appliesTo: ['html']
    },
    {
      name: 'archive_scripts',
      pattern: /<script\b[^>]*\bsrc=["'][^"']*(?:web-static\.archive\.org|archive\.org\/_static)[^"']*["'][^>]*>\s*<\/script>/gi,
      replacement: '',
      appliesTo: ['html']
    },
    {
      name: 'archive_links',
      pattern: /<link\b[^>]*\bhref=["'][^"']*(?:web-static\.archive\.org|archive\.org\/_static)[^"']*["'][^>]*>/gi,
      replacement: '',
      appliesTo: ['html']
    },
    {
      name: 'wayback_comments',
      pattern: /<!--(?:(?!-->)[\s\S])*Wayback(?:(?!-->)[\s\S])*-->/g,
      replacement: '',
      appliesTo: ['html']
    },
    {
      name: 'replay_scripts',
      pattern: /<script\b[^>]*>(?:(?!<\/script>)[\s\S])*?(?:__wm\.|window\.RufflePlayer)(?:(?!<\/script>)[\s\S])*<\/script>/gi,
      replacement: '',
      appliesTo: ['html']
    },
    {
      name: 'archive_url_prefixes',
      pattern: /(?:https?:\\?\/\\?\/web\.archive\.org\\?\/web\\?\/\w+\\?\/|\\?\/web\\?\/\w+\\?\/https?:\\?\/\\?\/web\.archive\.org\\?\/screenshot\\?\/|(?<=["'])\\?\/web\\?\/\d+\w*\\?\/)/g,
      replacement: '',
      appliesTo: ALL_TYPES
    }
  ];

  private static readonly ARCHIVE_FOOTER = /(?:\/\*|<!--)\s+FILE ARCHIVED ON/;

  private readonly formatter: Formatter;

  constructor(formatter: Formatter = new BeautifyFormatter()) {
    this.formatter = formatter;
  }

  async normalize(capture: Capture, contentType?: ContentType): Promise<NormalizedDocument> {
    const type = contentType ?? capture.contentType;
    if (type === 'unknown') {
      throw new DiffComputeError(
        `cannot diff this content type (${capture.declaredType ?? 'no Content-Type'} at ${capture.url})`
      );
    }

    const cleaned = ContentNormalizer.stripArchiveArtifacts(capture.content, type);

    let formatted = cleaned;
    let passthrough = false;
    try {
      formatted = await this.formatter.format(cleaned, type);
    } catch (error) {
      console.warn(`Formatting ${capture.url} at ${capture.timestamp} as ${type} failed, using it unformatted:`, error);
      passthrough = true;
    }

    return {
      lines: ContentNormalizer.splitLines(formatted),
      contentType: type,
      source: { url: capture.url, timestamp: capture.timestamp },
      passthrough
    };
  }

  static stripArchiveArtifacts(content: string, contentType: ContentType): string {
    let cleaned = content.split(this.ARCHIVE_FOOTER)[0];

    for (const patternObj of this.ARTIFACT_PATTERNS) {
      if (patternObj.appliesTo.includes(contentType)) {
        cleaned = cleaned.replace(patternObj.pattern, patternObj.replacement);
      }
    }

    return cleaned.trim();
  }

  static splitLines(text: string): string[] {
    const unified = text.replace(/\r\n?/g, '\n');
    if (unified === '') {
      return [];
    }

    const lines = unified.split('\n');
    if (lines[lines.length - 1] === '') {
      lines.pop();
    }
    return lines;
  }
}
