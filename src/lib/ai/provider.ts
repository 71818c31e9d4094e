import type OpenAI from "openai";

import {
  getMaxRetries,
  getModel,
  getOpenAI,
  getTemp,
  getTimeoutMs,
} from "@/lib/ai/openaiClient";
import {
  type OpenAICircuitBreaker,
  traceHeaders,
  withOpenAIResilience,
  withTimeout,
} from "@/lib/ai/openaiResilience";
import { FillEngineError, ModelUnavailableError } from "@/lib/fill/errors";

export type ModelRequest = {
  /** Short operation tag for logs, e.g. "interpret_turn". */
  tag: string;
  system: string;
  user: string;
  maxTokens?: number;
};

/**
 * The language model as the engine sees it: a fallible, possibly slow
 * function that returns text. Callers always re-validate what comes back.
 *
 * Implementations throw ModelTimeoutError / ModelUnavailableError and
 * nothing else.
 */
export interface LanguageModel {
  completeJson(req: ModelRequest): Promise<string>;
}

export type OpenAILanguageModelOptions = {
  model: string;
  temperature: number;
  timeoutMs: number;
  maxRetries: number;
  breaker?: OpenAICircuitBreaker;
};

export class OpenAILanguageModel implements LanguageModel {
  constructor(
    private readonly client: OpenAI,
    private readonly opts: OpenAILanguageModelOptions,
  ) {}

  async completeJson(req: ModelRequest): Promise<string> {
    try {
      // One deadline for the whole operation, retries included.
      return await withTimeout(req.tag, this.opts.timeoutMs, (signal) =>
        withOpenAIResilience(
          req.tag,
          async (ids) => {
            const completion = await this.client.chat.completions.create(
              {
                model: this.opts.model,
                temperature: this.opts.temperature,
                max_tokens: req.maxTokens ?? 800,
                response_format: { type: "json_object" },
                messages: [
                  { role: "system", content: req.system },
                  { role: "user", content: req.user },
                ],
              },
              { signal, headers: traceHeaders(ids) },
            );
            return completion.choices[0]?.message?.content ?? "";
          },
          { maxRetries: this.opts.maxRetries, breaker: this.opts.breaker },
        ),
      );
    } catch (err) {
      if (err instanceof FillEngineError) throw err;
      throw new ModelUnavailableError(
        `${req.tag}: ${err instanceof Error ? err.message : "model call failed"}`,
        err,
      );
    }
  }
}

/**
 * Real OpenAI model when OPENAI_API_KEY is present; otherwise null and the
 * engine runs its deterministic fallbacks.
 */
export function getLanguageModel(): LanguageModel | null {
  const client = getOpenAI();
  if (!client) return null;

  return new OpenAILanguageModel(client, {
    model: getModel(),
    temperature: getTemp(),
    timeoutMs: getTimeoutMs(),
    maxRetries: getMaxRetries(),
  });
}
