import OpenAI from 'openai';
import { toCompletionError } from './errors';
import type { GenerateOptions, TextProvider } from './types';

export interface OpenAIProviderOptions {
  apiKey: string;
  /** Any OpenAI-compatible endpoint, e.g. Ollama's `/v1` */
  baseURL?: string;
  /** Name reported in errors and logs */
  name?: string;
}

export class OpenAIProvider implements TextProvider {
  readonly name: string;
  private client: OpenAI;

  constructor(options: OpenAIProviderOptions) {
    this.name = options.name ?? 'openai';
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
  }

  async complete(prompt: string, options: GenerateOptions): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create({
        model: options.model,
        temperature: options.temperature,
        max_tokens: options.maxOutputTokens,
        messages: [{ role: 'user', content: prompt }],
      });
      return completion.choices[0]?.message?.content ?? '';
    } catch (error) {
      throw toCompletionError(this.name, error);
    }
  }
}
