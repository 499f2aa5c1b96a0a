/**
 * Text completion client — Anthropic Claude primary, OpenAI fallback.
 *
 * Transition writing goes through here; never import Anthropic/OpenAI directly
 * in pipeline modules. Clients are created on first use so stages that never
 * call the LLM run without credentials.
 */
import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { env } from '../config.js';
import { ConfigError } from '../utils/errors.js';
import { NonRetryableError } from '../utils/retry.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('LLM');

let anthropic: Anthropic | null = null;
let openai: OpenAI | null = null;

function getAnthropic(): Anthropic {
  if (!env.ANTHROPIC_API_KEY) {
    throw new ConfigError('ANTHROPIC_API_KEY is not set; transition writing needs it');
  }
  if (!anthropic) anthropic = new Anthropic({ apiKey: env.ANTHROPIC_API_KEY });
  return anthropic;
}

function getOpenAI(apiKey: string): OpenAI {
  if (!openai) openai = new OpenAI({ apiKey });
  return openai;
}

export function isLlmConfigured(): boolean {
  return Boolean(env.ANTHROPIC_API_KEY);
}

// ── Public interfaces ─────────────────────────────────────────────────────────

export interface CompletionResponse {
  text: string;
  provider: 'anthropic' | 'openai';
  inputTokens: number;
  outputTokens: number;
}

// ── Text completion ───────────────────────────────────────────────────────────

/**
 * General-purpose text completion.
 *
 * A 5xx from Anthropic falls back to OpenAI when OPENAI_API_KEY is set.
 * 4xx responses other than 429 are wrapped in NonRetryableError.
 */
export async function generateCompletion(
  prompt: string,
  systemPrompt?: string,
  maxTokens = 1_000,
): Promise<CompletionResponse> {
  const client = getAnthropic();
  log.debug('generateCompletion', { maxTokens });

  try {
    const res = await client.messages.create({
      model: env.ANTHROPIC_MODEL,
      max_tokens: maxTokens,
      ...(systemPrompt ? { system: systemPrompt } : {}),
      messages: [{ role: 'user', content: prompt }],
    });

    let text = '';
    for (const block of res.content) {
      if (block.type === 'text') text += block.text;
    }
    log.debug('generateCompletion complete', {
      inputTokens: res.usage.input_tokens,
      outputTokens: res.usage.output_tokens,
    });

    return {
      text: text.trim(),
      provider:     'anthropic',
      inputTokens:  res.usage.input_tokens,
      outputTokens: res.usage.output_tokens,
    };
  } catch (err) {
    if (err instanceof Anthropic.APIError) {
      const status = err.status ?? 0;
      if (status >= 500 && env.OPENAI_API_KEY) {
        log.warn('Anthropic unavailable, falling back to OpenAI', { status });
        return openaiCompletion(env.OPENAI_API_KEY, prompt, systemPrompt, maxTokens);
      }
      if (status >= 400 && status < 500 && status !== 429) {
        throw new NonRetryableError(`Anthropic rejected the request (${status}): ${err.message}`, err);
      }
    }
    throw err;
  }
}

async function openaiCompletion(
  apiKey: string,
  prompt: string,
  systemPrompt: string | undefined,
  maxTokens: number,
): Promise<CompletionResponse> {
  const res = await getOpenAI(apiKey).chat.completions.create({
    model: env.OPENAI_MODEL,
    max_tokens: maxTokens,
    messages: [
      ...(systemPrompt ? [{ role: 'system' as const, content: systemPrompt }] : []),
      { role: 'user' as const, content: prompt },
    ],
  });
  return {
    text:         (res.choices[0]?.message?.content ?? '').trim(),
    provider:     'openai',
    inputTokens:  res.usage?.prompt_tokens ?? 0,
    outputTokens: res.usage?.completion_tokens ?? 0,
  };
}
