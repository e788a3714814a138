// Paper records carried through the pipeline

export const PAPER_NOT_AVAILABLE = 'Paper not available';

export interface PaperLink {
  title: string;
  url: string; // absolute PDF location
}

export type SummaryResult =
  | { ok: true; text: string }
  | { ok: false; reason: string };

export interface Paper extends PaperLink {
  summary: SummaryResult;
}

export function summarySucceeded(text: string): SummaryResult {
  return { ok: true, text };
}

export function summaryFailed(error: unknown): SummaryResult {
  const reason = error instanceof Error ? error.message : String(error);
  return { ok: false, reason };
}

/**
 * Display text for a summary; every failure reads the same
 */
export function formatSummary(result: SummaryResult): string {
  return result.ok ? result.text : PAPER_NOT_AVAILABLE;
}
