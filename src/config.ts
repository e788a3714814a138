// Config module - loads environment variables
// A .env file in the working directory is loaded first

import 'dotenv/config';

export const DEFAULT_SUMMARY_PROMPT =
  'Summarize this research article into one paragraph without formatting, highlighting strengths and weaknesses.';

export interface Config {
  // LLM service
  openaiApiKey: string;
  openaiBaseUrl?: string;
  summaryModel: string;
  summaryPrompt: string;

  // Listing page and the prefix its paper links are rewritten onto
  listingUrl: string;
  pdfBaseUrl: string;

  // HTML artifact
  outputPath: string;

  fetchTimeoutMs: number;
}

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function optionalEnv(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

function positiveIntEnv(name: string, defaultValue: number): number {
  const raw = optionalEnv(name, String(defaultValue));
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${name}: ${raw}. Must be a positive integer`);
  }
  return value;
}

export function loadConfig(): Config {
  return {
    openaiApiKey: requireEnv('OPENAI_API_KEY'),
    openaiBaseUrl: process.env.OPENAI_BASE_URL || undefined,
    summaryModel: optionalEnv('SUMMARY_MODEL', 'gpt-4o-mini'),
    summaryPrompt: optionalEnv('SUMMARY_PROMPT', DEFAULT_SUMMARY_PROMPT),
    listingUrl: optionalEnv('LISTING_URL', 'https://huggingface.co/papers'),
    pdfBaseUrl: optionalEnv('PDF_BASE_URL', 'https://arxiv.org/pdf'),
    outputPath: optionalEnv('OUTPUT_PATH', './papers.html'),
    fetchTimeoutMs: positiveIntEnv('FETCH_TIMEOUT_MS', 30000),
  };
}

// Singleton config instance
let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}
