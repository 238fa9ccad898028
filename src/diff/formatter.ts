import { minify } from 'html-minifier-terser';
import beautify from 'js-beautify';
import type { ContentType } from '../types/archive';
import { NormalizationFailure } from '../errors';

export interface Formatter {
  format(content: string, contentType: ContentType): Promise<string>;
}

const INDENT_SIZE = 2;

/** html-minifier-terser to canonicalise markup, js-beautify to lay it out. */
export class BeautifyFormatter implements Formatter {
  async format(content: string, contentType: ContentType): Promise<string> {
    try {
      if (contentType === 'html') {
        return beautify.html(await this.collapseHTML(content), {
          indent_size: INDENT_SIZE,
          wrap_line_length: 0,
          preserve_newlines: false,
          end_with_newline: false
        });
      }
      if (contentType === 'css') {
        return beautify.css(content, {
          indent_size: INDENT_SIZE,
          preserve_newlines: false,
          end_with_newline: false
        });
      }
      return beautify.js(content, {
        indent_size: INDENT_SIZE,
        brace_style: 'collapse',
        preserve_newlines: false,
        end_with_newline: false
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new NormalizationFailure(`${contentType} formatting failed: ${reason}`, { cause: error });
    }
  }

  private async collapseHTML(html: string): Promise<string> {
    return minify(html, {
      collapseWhitespace: true,
      conservativeCollapse: false,
      removeComments: false,
      removeRedundantAttributes: false,
      removeEmptyAttributes: false,
      removeAttributeQuotes: false,
      removeOptionalTags: false,
      removeEmptyElements: false,
      sortAttributes: false,
      sortClassName: false,
      useShortDoctype: true,
      preserveLineBreaks: false,
      continueOnParseError: true
    });
  }
}
