// Scraper module - fetches the listing page and plain page text
import * as cheerio from 'cheerio';
import type { PaperLink } from './paper';
import type { ListingSource } from './sources';

const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const FETCH_TIMEOUT = 30000; // 30 seconds

export interface FetchOptions {
  timeoutMs?: number;
  accept?: string;
}

/**
 * The timeout covers the whole exchange: headers and the body read
 */
async function request<T>(
  url: string,
  options: FetchOptions,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs ?? FETCH_TIMEOUT);

  try {
    const response = await fetch(url, {
      headers: {
        'User-Agent': USER_AGENT,
        Accept: options.accept ?? 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.5',
      },
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(`${response.status} ${response.statusText}`);
    }

    // A stalled body must hit the same deadline, even if the stream ignores the signal
    const deadline = new Promise<never>((_, reject) => {
      if (controller.signal.aborted) {
        reject(new Error('Request timed out'));
      }
      controller.signal.addEventListener('abort', () => reject(new Error('Request timed out')));
    });
    return await Promise.race([read(response), deadline]);
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new Error('Request timed out');
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Fetch a page with browser-like headers
 * Throws an error with details if fetch fails
 */
export async function fetchPage(url: string, options: FetchOptions = {}): Promise<string> {
  return request(url, options, (response) => response.text());
}

/**
 * Fetch a binary resource (PDF) into memory
 */
export async function fetchBinary(url: string, options: FetchOptions = {}): Promise<Uint8Array> {
  return request(
    url,
    { accept: 'application/pdf,*/*;q=0.8', ...options },
    async (response) => new Uint8Array(await response.arrayBuffer())
  );
}

/**
 * Extract paper titles and PDF links from a listing page, in document order
 */
export function extractPaperLinks(html: string, source: ListingSource): PaperLink[] {
  const $ = cheerio.load(html);
  const papers: PaperLink[] = [];

  $(source.entrySelector).each((_, element) => {
    const title = $(element).text().trim();
    const href = $(element).attr('href');

    if (!title || !href || !href.startsWith(`${source.pathSegment}/`)) {
      console.log(`  Skipping listing entry: ${title || '(untitled)'} ${href ?? '(no link)'}`);
      return;
    }

    papers.push({
      title,
      url: `${source.pdfBaseUrl}${href.slice(source.pathSegment.length)}`,
    });
  });

  return papers;
}

/**
 * Fetch the listing page and return its papers
 * Network and HTTP errors propagate: without a listing there is nothing to run
 */
export async function fetchPaperList(source: ListingSource, options: FetchOptions = {}): Promise<PaperLink[]> {
  console.log(`Fetching ${source.name}: ${source.indexUrl}`);
  const html = await fetchPage(source.indexUrl, options);
  return extractPaperLinks(html, source);
}

/**
 * Flatten an HTML page to plain text
 * Drops script/style, then keeps one trimmed phrase per line
 */
export function extractHtmlText(html: string): string {
  const $ = cheerio.load(html);
  $('script, style').remove();

  return $.root()
    .text()
    .split(/\r?\n/)
    .flatMap(line => line.trim().split('  '))
    .map(phrase => phrase.trim())
    .filter(Boolean)
    .join('\n');
}

export async function fetchHtmlText(url: string, options: FetchOptions = {}): Promise<string> {
  const html = await fetchPage(url, options);
  return extractHtmlText(html);
}
