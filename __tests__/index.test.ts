import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_SUMMARY_PROMPT, type Config } from '../src/config';
import { createDefaultDeps, runDigest, type DigestDeps } from '../src/index';
import type { PaperLink } from '../src/paper';
import { fetchPdfText } from '../src/pdf';
import { fetchPaperList } from '../src/scraper';
import { listingSourceFromConfig } from '../src/sources';
import { Summarizer, type ChatCompletionClient } from '../src/summarizer';

vi.mock('unpdf', () => ({
  extractText: vi.fn(async () => ({ totalPages: 2, text: ['Hello', 'World'] })),
}));

type CreateCompletion = ChatCompletionClient['chat']['completions']['create'];

const LISTING_URL = 'https://listing.test/papers';
const DATE = new Date(2026, 9, 19);

function completion(content: string) {
  return { choices: [{ message: { content } }] };
}

function summarizerWith(create: CreateCompletion): Summarizer {
  return new Summarizer(
    { model: 'test-model', promptTemplate: DEFAULT_SUMMARY_PROMPT, apiKey: 'test-key' },
    { chat: { completions: { create } } }
  );
}

function links(...titles: string[]): PaperLink[] {
  return titles.map((title, i) => ({ title, url: `https://arxiv.org/pdf/000${i}` }));
}

describe('runDigest', () => {
  let dir: string;
  let outputPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'digest-test-'));
    outputPath = join(dir, 'papers.html');
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(dir, { recursive: true, force: true });
  });

  it('runs listing, pdf extraction, summary and rendering end to end', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async (url: string) => {
        if (url === LISTING_URL) {
          return new Response('<html><body><h3><a href="/papers/1234">Foo</a></h3></body></html>');
        }
        if (url === 'https://arxiv.org/pdf/1234') {
          return new Response(new Uint8Array([0x25, 0x50, 0x44, 0x46]));
        }
        return new Response(null, { status: 404, statusText: 'Not Found' });
      })
    );
    const create = vi.fn<CreateCompletion>().mockResolvedValue(completion('A good paper.'));
    const source = listingSourceFromConfig({ listingUrl: LISTING_URL, pdfBaseUrl: 'https://arxiv.org/pdf' });
    const deps: DigestDeps = {
      listPapers: () => fetchPaperList(source),
      extractText: (url) => fetchPdfText(url),
      summarizer: summarizerWith(create),
      now: () => DATE,
    };

    const result = await runDigest({ outputPath }, deps);

    expect(result.papers).toEqual([
      { title: 'Foo', url: 'https://arxiv.org/pdf/1234', summary: { ok: true, text: 'A good paper.' } },
    ]);
    expect(create).toHaveBeenCalledWith({
      model: 'test-model',
      messages: [{ role: 'user', content: `${DEFAULT_SUMMARY_PROMPT}\n\nHello\nWorld\n` }],
    });

    const html = await readFile(outputPath, 'utf8');
    expect(html).toContain('<h2><a href="https://arxiv.org/pdf/1234">Foo</a></h2>\n<p>A good paper.</p>\n');
    expect(html).toContain('<p>Summaries generated by test-model</p>');
    expect(result.markdown).toBe('**[Foo](https://arxiv.org/pdf/1234)**\n\nA good paper.');
    expect(result.outputPath).toBe(outputPath);
  });

  it('keeps going after a summary fails', async () => {
    const create = vi
      .fn<CreateCompletion>()
      .mockResolvedValueOnce(completion('First summary.'))
      .mockRejectedValueOnce(new Error('429 quota exceeded'))
      .mockResolvedValueOnce(completion('Third summary.'));
    const deps: DigestDeps = {
      listPapers: async () => links('One', 'Two', 'Three'),
      extractText: async (url) => `text of ${url}`,
      summarizer: summarizerWith(create),
      now: () => DATE,
    };

    const result = await runDigest({ outputPath }, deps);

    expect(create).toHaveBeenCalledTimes(3);
    expect(result.papers.map(paper => paper.summary)).toEqual([
      { ok: true, text: 'First summary.' },
      { ok: false, reason: '429 quota exceeded' },
      { ok: true, text: 'Third summary.' },
    ]);
    expect(result.summarized).toBe(2);
    expect(result.failed).toBe(1);
    expect(result.markdown).toBe(
      '**[One](https://arxiv.org/pdf/0000)**\n\nFirst summary.\n\n' +
        '**[Two](https://arxiv.org/pdf/0001)**\n\nPaper not available\n\n' +
        '**[Three](https://arxiv.org/pdf/0002)**\n\nThird summary.'
    );
  });

  it('marks a paper whose pdf cannot be extracted and skips its summary', async () => {
    const create = vi.fn<CreateCompletion>().mockResolvedValue(completion('Fine.'));
    const extractText = vi.fn(async (url: string) => {
      if (url.endsWith('0000')) {
        throw new Error('Invalid PDF structure');
      }
      return 'body';
    });
    const deps: DigestDeps = {
      listPapers: async () => links('Broken', 'Working'),
      extractText,
      summarizer: summarizerWith(create),
      now: () => DATE,
    };

    const result = await runDigest({ outputPath }, deps);

    expect(extractText).toHaveBeenCalledTimes(2);
    expect(create).toHaveBeenCalledTimes(1);
    expect(result.papers[0].summary).toEqual({ ok: false, reason: 'Invalid PDF structure' });
    expect(result.papers[1].summary).toEqual({ ok: true, text: 'Fine.' });

    const html = await readFile(outputPath, 'utf8');
    expect(html.indexOf('Paper not available')).toBeLessThan(html.indexOf('Fine.'));
  });

  it('aborts before writing anything when the listing fails', async () => {
    const deps: DigestDeps = {
      listPapers: async () => {
        throw new Error('503 Service Unavailable');
      },
      extractText: vi.fn(async () => ''),
      summarizer: summarizerWith(vi.fn<CreateCompletion>()),
      now: () => DATE,
    };

    await expect(runDigest({ outputPath }, deps)).rejects.toThrow('503 Service Unavailable');
    expect(existsSync(outputPath)).toBe(false);
  });
});

describe('createDefaultDeps', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('builds the summarizer from the configured model', () => {
    vi.stubEnv('BRAINTRUST_API_KEY', '');
    const config: Config = {
      openaiApiKey: 'test-key',
      summaryModel: 'test-model',
      summaryPrompt: DEFAULT_SUMMARY_PROMPT,
      listingUrl: LISTING_URL,
      pdfBaseUrl: 'https://arxiv.org/pdf',
      outputPath: './papers.html',
      fetchTimeoutMs: 1000,
    };

    const deps = createDefaultDeps(config);

    expect(deps.summarizer.model).toBe('test-model');
  });
});
