// OpenAI-based LLMEnricher using the Responses API with structured output.
// Note: Requires OPENAI_API_KEY at runtime; the client is created by the composition root.

import OpenAI, { APIConnectionError, APIError } from 'openai';
import type { Response } from 'openai/resources/responses/responses';
import { z } from 'zod';
import { EnrichedItem } from '../../core/entities/EnrichedItem';
import { SourceSentence } from '../../core/entities/SourceSentence';
import { ClozeError, EnrichmentError, errorMessage } from '../../core/errors';
import { LLMEnricher } from '../../core/services/LLMEnricher';
import { Logger } from '../../core/services/Logger';
import { RetryOptions, RetryPolicy, withRetry } from '../../core/services/RetryPolicy';
import { buildClozeSystemPrompt, buildClozeUserPrompt, buildSystemPrompt, buildUserPrompt } from './prompts';

export interface OpenAIEnricherOptions {
  temperature?: number;
  maxOutputTokens?: number;
  retry: RetryPolicy;
  retryOptions?: Pick<RetryOptions, 'sleep' | 'random'>;
}

const enrichmentSchema = z.object({
  Definition: z.string().trim().min(1),
  ExampleSentence: z.string().trim().min(1),
});

const JSON_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  properties: {
    Definition: { type: 'string' },
    ExampleSentence: { type: 'string' },
  },
  required: ['Definition', 'ExampleSentence'],
} as const;

// Connection problems, timeouts, rate limits and server errors are worth another try.
export function isTransientLLMError(error: unknown): boolean {
  if (error instanceof APIConnectionError) return true;
  if (error instanceof APIError) {
    const status = error.status;
    return status === undefined || status === 408 || status === 409 || status === 429 || status >= 500;
  }
  return false;
}

export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // fall through to lenient extraction
  }

  // Strip Markdown code fences ```json ... ``` or ``` ... ```
  const fenceMatch = text.match(/```(?:json)?\n([\s\S]*?)\n```/i);
  if (fenceMatch && fenceMatch[1]) {
    try {
      return JSON.parse(fenceMatch[1].trim());
    } catch {
      // fall through
    }
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    try {
      return JSON.parse(text.slice(start, end + 1));
    } catch {
      // unparseable
    }
  }
  return null;
}

function refusalOf(res: Response): string | null {
  for (const item of res.output ?? []) {
    if (item.type !== 'message') continue;
    for (const part of item.content) {
      if (part.type === 'refusal') return part.refusal;
    }
  }
  return null;
}

export class OpenAIEnricher implements LLMEnricher {
  constructor(
    private client: OpenAI,
    private model: string,
    private logger: Logger,
    private options: OpenAIEnricherOptions
  ) {}

  private withTransientRetry<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return withRetry(operation, this.options.retry, {
      ...this.options.retryOptions,
      shouldRetry: (error) => isTransientLLMError(error),
      onRetry: (error, attempt, delayMs) =>
        this.logger.warn(
          `[LLM] ${label} failed (attempt ${attempt}/${this.options.retry.maxAttempts}), retrying in ${delayMs}ms: ${errorMessage(error)}`
        ),
    });
  }

  private temperatureParam(): { temperature?: number } {
    return this.options.temperature !== undefined ? { temperature: this.options.temperature } : {};
  }

  async enrich(sentence: SourceSentence, word: string): Promise<EnrichedItem> {
    const label = `enrich "${word}"`;
    this.logger.debug(`[LLM] Requesting definition and example for "${word}" (item ${sentence.id})`);

    let res: Response;
    try {
      res = await this.withTransientRetry(label, () =>
        this.client.responses.create({
          model: this.model,
          input: [
            { role: 'system', content: buildSystemPrompt() },
            { role: 'user', content: buildUserPrompt(word, sentence.entryText, sentence.sentence) },
          ],
          text: {
            format: {
              type: 'json_schema',
              name: 'sentence_card',
              schema: JSON_SCHEMA,
              strict: true,
            },
          },
          max_output_tokens: this.options.maxOutputTokens ?? 1024,
          ...this.temperatureParam(),
        })
      );
    } catch (error) {
      throw new EnrichmentError(`LLM request failed for "${word}": ${errorMessage(error)}`, { cause: error });
    }

    this.logger.debug(`[LLM] Response status: ${res.status ?? 'unknown'}`);

    const refusal = refusalOf(res);
    if (refusal) {
      throw new EnrichmentError(`Model refused to respond for "${word}": ${refusal}`);
    }

    const parsed = enrichmentSchema.safeParse(tryParseJson(res.output_text ?? ''));
    if (!parsed.success) {
      const missing = parsed.error.issues.map((i) => i.path.join('.') || '(root)').join(', ');
      throw new EnrichmentError(`Malformed enrichment response for "${word}" (invalid: ${missing})`);
    }

    return EnrichedItem.create({
      source: sentence,
      word,
      definition: parsed.data.Definition,
      generatedSentence: parsed.data.ExampleSentence,
    });
  }

  async createCloze(word: string, sentence: string): Promise<string> {
    try {
      const res = await this.withTransientRetry(`cloze "${word}"`, () =>
        this.client.responses.create({
          model: this.model,
          instructions: buildClozeSystemPrompt(),
          input: buildClozeUserPrompt(word, sentence),
          max_output_tokens: 512,
          ...this.temperatureParam(),
        })
      );
      return (res.output_text ?? '').trim();
    } catch (error) {
      throw new ClozeError(`LLM cloze request failed for "${word}": ${errorMessage(error)}`, { cause: error });
    }
  }
}
