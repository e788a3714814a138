// PDF module - downloads a paper and pulls the text out of every page
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { extractText } from 'unpdf';
import { fetchBinary, type FetchOptions } from './scraper';

/**
 * Extract the text of every page, each page followed by a newline
 */
export async function extractPdfText(data: Uint8Array): Promise<string> {
  const { text } = await extractText(data, { mergePages: false });
  return text.map(page => `${page}\n`).join('');
}

/**
 * Download a PDF to a temporary file and extract its text
 * The temporary directory is removed whether or not extraction succeeds
 */
export async function fetchPdfText(url: string, options: FetchOptions = {}): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'paper-digest-'));
  const file = join(dir, 'paper.pdf');

  try {
    await writeFile(file, await fetchBinary(url, options));
    const data = await readFile(file);
    return await extractPdfText(new Uint8Array(data));
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
