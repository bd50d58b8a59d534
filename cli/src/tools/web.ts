/**
 * Web tools: search through the Google Programmable Search JSON API and
 * plain-text page scraping.
 */

import { z } from 'zod';
import { defineTool } from './registry.js';

const SEARCH_ENDPOINT = 'https://www.googleapis.com/customsearch/v1';
const SCRAPE_LIMIT = 5000;
const FETCH_TIMEOUT_MS = 10_000;
const USER_AGENT = 'Mozilla/5.0 (compatible; steward)';

const searchResponseSchema = z.object({
  items: z.array(z.object({
    title: z.string().default(''),
    link: z.string().default(''),
    snippet: z.string().default(''),
  })).default([]),
});

export const webSearch = defineTool({
  name: 'web_search',
  scope: 'network_read',
  signature: 'web_search(query: string)',
  description: 'Searches the web and returns the top 5 results with title, link and snippet.',
  args: z.object({ query: z.string().min(1) }),
  async handler({ query }, ctx) {
    if (!ctx.search.apiKey || !ctx.search.engineId) {
      return { success: false, error: 'Google API key or Search Engine ID is not configured.' };
    }

    const url = new URL(SEARCH_ENDPOINT);
    url.searchParams.set('key', ctx.search.apiKey);
    url.searchParams.set('cx', ctx.search.engineId);
    url.searchParams.set('q', query);
    url.searchParams.set('num', '5');

    let response: Response;
    try {
      response = await ctx.fetch(url, { signal: AbortSignal.timeout(FETCH_TIMEOUT_MS) });
    } catch (err) {
      return { success: false, error: `An error occurred during web search: ${(err as Error).message}` };
    }
    if (!response.ok) {
      return { success: false, error: `Search request failed with status ${response.status}` };
    }

    const parsed = searchResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      return { success: false, error: 'Unexpected search response format' };
    }
    return { success: true, results: parsed.data.items.slice(0, 5) };
  },
});

export const webScrape = defineTool({
  name: 'web_scrape',
  scope: 'network_read',
  signature: 'web_scrape(url: string)',
  description: 'Reads the text content of a web page (first 5000 characters).',
  args: z.object({ url: z.string().url() }),
  async handler({ url }, ctx) {
    let response: Response;
    try {
      response = await ctx.fetch(url, {
        headers: { 'User-Agent': USER_AGENT },
        signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
      });
    } catch (err) {
      return { success: false, error: `Failed to retrieve URL ${url}: ${(err as Error).message}` };
    }
    if (!response.ok) {
      return { success: false, error: `Failed to retrieve URL ${url}: HTTP ${response.status}` };
    }

    const text = htmlToText(await response.text());
    return { success: true, content: text.slice(0, SCRAPE_LIMIT) };
  },
});

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

/** Strip scripts, styles and tags; one non-empty line per text block. */
export function htmlToText(html: string): string {
  const stripped = html
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<(script|style|noscript)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|li|h[1-6]|tr|section|article|header|footer)\s*>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&(#\d+|#x[0-9a-f]+|[a-z]+);/gi, (match, name: string) => decodeEntity(match, name));

  return stripped
    .split('\n')
    .flatMap((line) => line.split('  '))
    .map((chunk) => chunk.replace(/[ \t\r\f\v]+/g, ' ').trim())
    .filter(Boolean)
    .join('\n');
}

function decodeEntity(match: string, name: string): string {
  if (name.startsWith('#')) {
    const code = /^#x/i.test(name)
      ? Number.parseInt(name.slice(2), 16)
      : Number.parseInt(name.slice(1), 10);
    return code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : match;
  }
  return ENTITIES[name.toLowerCase()] ?? match;
}
