/**
 * Oracle Client - one text completion against the Claude API
 *
 * Both oracles (content extraction and strategy selection) only need
 * "system + prompt in, text out", so they depend on the TextCompletion
 * function type and tests hand them a stub.
 */

import Anthropic from '@anthropic-ai/sdk';
import { TIMEOUTS } from '../utils/timeouts.js';

export interface CompletionRequest {
  system: string;
  prompt: string;
  maxTokens: number;
  temperature?: number;
}

export type TextCompletion = (request: CompletionRequest) => Promise<string>;

export interface AnthropicCompletionOptions {
  apiKey: string;
  model: string;
  timeoutMs?: number;
}

/**
 * TextCompletion backed by the Anthropic Messages API
 */
export function createAnthropicCompletion(options: AnthropicCompletionOptions): TextCompletion {
  const client = new Anthropic({
    apiKey: options.apiKey,
    timeout: options.timeoutMs ?? TIMEOUTS.ORACLE_CALL,
    maxRetries: 1,
  });

  return async (request) => {
    const response = await client.messages.create({
      model: options.model,
      max_tokens: request.maxTokens,
      temperature: request.temperature ?? 0,
      system: request.system,
      messages: [{ role: 'user', content: request.prompt }],
    });

    const textContent = response.content.find((block) => block.type === 'text');
    if (!textContent || textContent.type !== 'text') {
      throw new Error('No text block in oracle response');
    }
    return textContent.text;
  };
}

/**
 * Parse the JSON object out of a model reply, with or without a
 * markdown code fence around it.
 */
export function parseJsonReply(text: string): unknown {
  const fenced = text.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  const body = (fenced ? fenced[1] : text).trim();
  return JSON.parse(body);
}
