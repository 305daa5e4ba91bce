/**
 * Query Generator.
 *
 * One `generate` call makes exactly one LLM request: it never validates and
 * never retries. The deadline covers both the wait for a concurrency slot
 * and the request itself.
 */

import { z } from 'zod';

import type { FailureDescription, PageRequest, SqlCandidate } from '../../shared/types';
import {
  GenerationTimeoutError,
  GenerationUnavailableError,
  RequestCancelledError,
  throwIfAborted,
} from '../errors';
import type { LLMProvider } from '../llm/types';
import { logger } from '../lib/logger';
import type { Semaphore } from '../lib/semaphore';
import { PROMPT_VERSION, buildSystemPrompt, buildUserMessage, contextDigest, type PromptLimits } from './prompt';

const responseSchema = z.object({ sql: z.string() });

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * SQL text from a model answer: `{"sql": ...}` JSON, optionally inside a
 * code fence, falling back to the raw (unfenced) text.
 */
export function extractSql(answer: string): string {
  let body = answer.trim();
  const fenced = body.match(/^```[A-Za-z]*\s*([\s\S]*?)\s*```$/);
  if (fenced) body = fenced[1].trim();

  if (body.startsWith('{')) {
    const parsed = responseSchema.safeParse(parseJson(body));
    if (parsed.success) return parsed.data.sql.trim();
  }
  return body;
}

function abortRace(signal: AbortSignal): { promise: Promise<never>; dispose: () => void } {
  let onAbort: () => void = () => {};
  const promise = new Promise<never>((_, reject) => {
    onAbort = () => reject(new Error('aborted'));
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener('abort', onAbort) };
}

export interface QueryGeneratorOptions {
  provider: LLMProvider;
  semaphore: Semaphore;
  timeoutMs: number;
  maxTokens: number;
  limits: PromptLimits;
}

export interface GenerateOptions {
  attempt: number;
  signal?: AbortSignal;
  page?: PageRequest;
}

export class QueryGenerator {
  constructor(private readonly options: QueryGeneratorOptions) {}

  async generate(
    question: string,
    schemaContext: string,
    priorFailures: readonly FailureDescription[],
    { attempt, signal, page }: GenerateOptions,
  ): Promise<SqlCandidate> {
    throwIfAborted(signal);
    const { provider, semaphore, timeoutMs, maxTokens, limits } = this.options;

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });
    const race = abortRace(controller.signal);

    const system = buildSystemPrompt(schemaContext, limits);
    const userMessage = buildUserMessage(question, priorFailures, page);

    try {
      const completion = await Promise.race([
        semaphore.run(
          () =>
            provider.complete({
              system,
              userMessage,
              maxTokens,
              temperature: 0,
              signal: controller.signal,
            }),
          controller.signal,
        ),
        race.promise,
      ]);

      const sql = extractSql(completion.text);
      if (sql.length === 0) {
        throw new GenerationUnavailableError(`${provider.name} returned an empty answer`);
      }

      return Object.freeze({
        sql,
        promptVersion: PROMPT_VERSION,
        contextDigest: contextDigest(schemaContext),
        attempt,
        model: completion.model,
      });
    } catch (err) {
      if (signal?.aborted) throw new RequestCancelledError();
      if (timedOut) throw new GenerationTimeoutError(timeoutMs);
      if (err instanceof GenerationUnavailableError) throw err;
      logger.warn('LLM request failed', {
        provider: provider.name,
        attempt,
        error: err instanceof Error ? err.message : String(err),
      });
      throw new GenerationUnavailableError(`${provider.name} request failed`, { cause: err });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
      race.dispose();
    }
  }
}
