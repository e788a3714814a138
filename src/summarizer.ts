// Summarizer module - strengths/weaknesses paragraph per paper
// Uses the shared OpenAI client (Braintrust-traced when configured)

import { createOpenAIClient } from './openai';
import { summaryFailed, summarySucceeded, type SummaryResult } from './paper';

const TEXT_PLACEHOLDER = '{{text}}';

export interface SummarizerConfig {
  model: string;
  promptTemplate: string;
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export interface ChatMessage {
  role: 'user';
  content: string;
}

// The slice of the OpenAI SDK the summarizer calls
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(params: { model: string; messages: ChatMessage[] }): Promise<{
        choices: Array<{ message: { content: string | null } }>;
      }>;
    };
  };
}

export function buildPrompt(template: string, text: string): string {
  if (template.includes(TEXT_PLACEHOLDER)) {
    return template.split(TEXT_PLACEHOLDER).join(text);
  }
  return `${template}\n\n${text}`;
}

export class Summarizer {
  private readonly client: ChatCompletionClient;

  constructor(
    readonly config: SummarizerConfig,
    client?: ChatCompletionClient
  ) {
    this.client = client ?? createOpenAIClient({
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
    });
  }

  get model(): string {
    return this.config.model;
  }

  /**
   * One prompt in, the model's text out. Throws on any failure.
   */
  async summarize(text: string): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.config.model,
      messages: [{ role: 'user', content: buildPrompt(this.config.promptTemplate, text) }],
    });

    const summary = completion.choices[0]?.message?.content?.trim() || '';
    if (!summary) {
      throw new Error('Empty response from model');
    }
    return summary;
  }

  /**
   * Like summarize, but a failure becomes a result so one paper never aborts the batch
   */
  async summarizePaper(text: string): Promise<SummaryResult> {
    try {
      return summarySucceeded(await this.summarize(text));
    } catch (error) {
      console.error(`    Summary failed:`, error instanceof Error ? error.message : error);
      return summaryFailed(error);
    }
  }
}
