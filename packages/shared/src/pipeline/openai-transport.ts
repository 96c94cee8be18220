/**
 * Model transport over any OpenAI-compatible chat completions endpoint
 * (Groq by default).
 */

import OpenAI from 'openai';
import { config } from '../config';
import { AuthError } from '../errors';

export interface CompletionRequest {
  prompt: string;
  maxTokens: number;
  signal?: AbortSignal;
}

/**
 * One request, one response body. Retries belong to the caller.
 */
export interface ModelTransport {
  readonly model: string;
  complete(request: CompletionRequest): Promise<string>;
}

export interface OpenAiTransportOptions {
  apiKey?: string;
  baseURL?: string;
  model?: string;
  timeoutMs?: number;
  temperature?: number;
}

export class OpenAiTransport implements ModelTransport {
  readonly model: string;
  private readonly client: OpenAI;
  private readonly temperature: number;

  constructor(options: OpenAiTransportOptions = {}) {
    const apiKey = options.apiKey ?? config.llmApiKey;
    if (!apiKey) {
      throw new AuthError('No model API key configured (set LLM_API_KEY or GROQ_API_KEY)');
    }

    this.model = options.model ?? config.llmModel;
    this.temperature = options.temperature ?? config.llmTemperature;
    this.client = new OpenAI({
      apiKey,
      baseURL: options.baseURL ?? config.llmBaseUrl,
      timeout: options.timeoutMs ?? config.llmRequestTimeoutMs,
      maxRetries: 0, // Retries are owned by ExtractionClient
    });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [{ role: 'user', content: request.prompt }],
        temperature: this.temperature,
        max_tokens: request.maxTokens,
      },
      { signal: request.signal }
    );

    return response.choices[0]?.message?.content ?? '';
  }
}
