import { load } from 'cheerio';
import type { Element as CheerioElement } from 'domhandler';

import { createParseError } from '../../errors.js';
import type { FetchResult, LinkExtractor } from '../../types.js';

const LINK_SELECTOR = 'a[href], area[href]';

export function parseLinks(html: string): string[] {
  try {
    const $ = load(html);
    const hrefs = new Set<string>();

    $(LINK_SELECTOR).each((_idx: number, element: CheerioElement) => {
      const href = $(element).attr('href');
      if (!href) {
        return;
      }

      const trimmed = href.trim();
      if (trimmed.length === 0 || trimmed.startsWith('#')) {
        return;
      }

      hrefs.add(trimmed);
    });

    return [...hrefs];
  } catch (error) {
    throw createParseError('Failed to parse links from HTML', { htmlLength: html.length }, { cause: error });
  }
}

/** Default link extractor: raw hrefs from HTML pages, nothing from other text. */
export const htmlLinkExtractor: LinkExtractor = {
  extractLinks(result: FetchResult): string[] {
    if (result.content?.kind !== 'text' || !isHtml(result.contentType)) {
      return [];
    }
    return parseLinks(result.content.text);
  },
};

function isHtml(contentType: string | undefined): boolean {
  return contentType?.toLowerCase().includes('text/html') ?? false;
}
