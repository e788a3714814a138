// Paper Digest - Main orchestration
// Discovers trending papers, extracts their PDFs, summarizes, renders HTML + markdown

import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { getConfig, type Config } from './config';
import { summaryFailed, type Paper, type PaperLink, type SummaryResult } from './paper';
import { fetchPdfText } from './pdf';
import { renderMarkdown, writeHtmlReport } from './renderer';
import { fetchPaperList } from './scraper';
import { listingSourceFromConfig } from './sources';
import { Summarizer } from './summarizer';

export interface PaperSummarizer {
  readonly model: string;
  summarizePaper(text: string): Promise<SummaryResult>;
}

export interface DigestDeps {
  listPapers: () => Promise<PaperLink[]>;
  extractText: (url: string) => Promise<string>;
  summarizer: PaperSummarizer;
  now: () => Date;
}

export interface DigestResult {
  papers: Paper[];
  summarized: number;
  failed: number;
  markdown: string;
  outputPath: string;
}

export function createDefaultDeps(config: Config): DigestDeps {
  const source = listingSourceFromConfig(config);
  const fetchOptions = { timeoutMs: config.fetchTimeoutMs };

  return {
    listPapers: () => fetchPaperList(source, fetchOptions),
    extractText: (url) => fetchPdfText(url, fetchOptions),
    summarizer: new Summarizer({
      model: config.summaryModel,
      promptTemplate: config.summaryPrompt,
      apiKey: config.openaiApiKey,
      baseUrl: config.openaiBaseUrl,
      timeoutMs: config.fetchTimeoutMs,
    }),
    now: () => new Date(),
  };
}

async function processPaper(link: PaperLink, deps: DigestDeps): Promise<Paper> {
  let text: string;
  try {
    text = await deps.extractText(link.url);
  } catch (error) {
    console.error(`    Extraction failed for ${link.url}:`, error instanceof Error ? error.message : error);
    return { ...link, summary: summaryFailed(error) };
  }

  console.log(`    Extracted ${text.length} chars, summarizing...`);
  return { ...link, summary: await deps.summarizer.summarizePaper(text) };
}

/**
 * Run the digest once: discovery, then extraction + summarization per paper in order, then rendering
 * A listing failure aborts the run; a paper's extraction or summary failure only marks that paper
 */
export async function runDigest(
  config: Pick<Config, 'outputPath'>,
  deps: DigestDeps
): Promise<DigestResult> {
  console.log('=== Paper Digest Starting ===');
  console.log(`Time: ${deps.now().toISOString()}`);

  const links = await deps.listPapers();
  console.log(`Found ${links.length} papers`);

  const papers: Paper[] = [];
  for (let i = 0; i < links.length; i++) {
    const link = links[i];
    console.log(`\n[${i + 1}/${links.length}] ${link.title}`);
    papers.push(await processPaper(link, deps));
  }

  const outputPath = await writeHtmlReport(papers, {
    path: config.outputPath,
    model: deps.summarizer.model,
    date: deps.now(),
  });
  const markdown = renderMarkdown(papers);

  const summarized = papers.filter(paper => paper.summary.ok).length;
  const failed = papers.length - summarized;

  console.log('\n=== Paper Digest Complete ===');
  console.log(`Summarized: ${summarized}, failed: ${failed}`);
  console.log(`Report written to ${outputPath}`);

  return { papers, summarized, failed, markdown, outputPath };
}

async function main(): Promise<void> {
  const config = getConfig();
  const result = await runDigest(config, createDefaultDeps(config));
  console.log(`\n${result.markdown}`);
}

// CLI mode - run directly if not imported
const entry = process.argv[1];
const isMainModule = entry !== undefined && import.meta.url === pathToFileURL(resolve(entry)).href;
if (isMainModule) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
