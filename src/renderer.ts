// Renderer module - HTML report file and inline markdown
import { appendFile, writeFile } from 'node:fs/promises';
import { formatSummary, type Paper } from './paper';

export const REPORT_TITLE = 'Trending Papers';

export interface HtmlReportOptions {
  path: string;
  model: string;
  date: Date;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * YYYY-MM-DD in local time
 */
export function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

export function renderHtmlHeader(model: string, date: Date): string {
  return `<!DOCTYPE html>
<html>
<head>
<meta charset="UTF-8">
<title>${REPORT_TITLE}</title>
</head>
<body>
<h1>${REPORT_TITLE}</h1>
<p>${formatDate(date)}</p>
<p>Summaries generated by ${escapeHtml(model)}</p>
`;
}

export function renderPaperBlock(paper: Paper): string {
  return `<h2><a href="${escapeHtml(paper.url)}">${escapeHtml(paper.title)}</a></h2>\n<p>${escapeHtml(formatSummary(paper.summary))}</p>\n`;
}

export const HTML_FOOTER = '</body>\n</html>\n';

/**
 * Write the report: header first, then one append per paper, then the closing tags
 */
export async function writeHtmlReport(papers: Paper[], options: HtmlReportOptions): Promise<string> {
  await writeFile(options.path, renderHtmlHeader(options.model, options.date), 'utf8');

  for (const paper of papers) {
    await appendFile(options.path, renderPaperBlock(paper), 'utf8');
  }

  await appendFile(options.path, HTML_FOOTER, 'utf8');
  return options.path;
}

function escapeMarkdownText(text: string): string {
  return text.replace(/[[\]]/g, '\\$&');
}

function escapeMarkdownUrl(url: string): string {
  return url.replace(/\(/g, '%28').replace(/\)/g, '%29');
}

/**
 * Bold title link, then the summary; papers separated by a blank line
 */
export function renderMarkdown(papers: Paper[]): string {
  return papers
    .map(paper => `**[${escapeMarkdownText(paper.title)}](${escapeMarkdownUrl(paper.url)})**\n\n${formatSummary(paper.summary)}`)
    .join('\n\n');
}
