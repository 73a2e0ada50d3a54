/**
 * OpenAI-compatible oracle. Works against api.openai.com or any endpoint
 * that speaks the chat-completions protocol (set baseURL).
 */

import OpenAI from 'openai';
import { DEFAULT_MODEL } from '../db/defaults.js';
import { OracleTimeoutError, OracleUnavailableError } from '../errors.js';
import type { ChatMessage, Oracle, OracleRequest, OracleResponse } from './types.js';

export interface OpenAIOracleOptions {
  apiKey: string;
  model?: string;
  baseURL?: string;
  timeoutMs: number;
}

function toChatParam(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export class OpenAIOracle implements Oracle {
  readonly model: string;
  private readonly client: OpenAI;
  private readonly timeoutMs: number;

  constructor(opts: OpenAIOracleOptions) {
    this.model = opts.model ?? DEFAULT_MODEL;
    this.timeoutMs = opts.timeoutMs;
    // Retries are owned by the generator; the SDK must not add its own
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      baseURL: opts.baseURL,
      timeout: opts.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(req: OracleRequest, signal?: AbortSignal): Promise<OracleResponse> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: req.messages.map(toChatParam),
          temperature: req.temperature,
          max_tokens: req.maxTokens,
        },
        { signal },
      );
      return { text: response.choices[0]?.message?.content?.trim() ?? '' };
    } catch (err: unknown) {
      if (err instanceof OpenAI.APIConnectionTimeoutError) {
        throw new OracleTimeoutError(this.timeoutMs, { cause: err });
      }
      if (err instanceof OpenAI.APIUserAbortError) {
        throw err;
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new OracleUnavailableError(`LLM API error: ${message}`, { cause: err });
    }
  }
}
