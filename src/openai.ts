// Shared OpenAI client factory with Braintrust tracing
// When BRAINTRUST_API_KEY is set, all LLM calls are auto-traced

import OpenAI from 'openai';
import { wrapOpenAI, initLogger } from 'braintrust';

let _loggerReady = false;

export interface OpenAIClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export const LLM_TIMEOUT = 60000; // 60 seconds

export function createOpenAIClient(options: OpenAIClientOptions): OpenAI {
  const client = new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseUrl,
    timeout: options.timeoutMs ?? LLM_TIMEOUT,
    // One attempt per paper: a failed call becomes that paper's failure
    maxRetries: 0,
  });

  if (!process.env.BRAINTRUST_API_KEY) {
    return client;
  }

  // asyncFlush: false sends each trace before the call returns; the run exits right after
  if (!_loggerReady) {
    initLogger({
      projectName: process.env.BRAINTRUST_PROJECT || 'paper-digest',
      apiKey: process.env.BRAINTRUST_API_KEY,
      asyncFlush: false,
    });
    _loggerReady = true;
  }

  return wrapOpenAI(client);
}
