import Anthropic from '@anthropic-ai/sdk';
import { toCompletionError } from './errors';
import type { GenerateOptions, TextProvider } from './types';

const DEFAULT_MAX_TOKENS = 4096;

export class AnthropicProvider implements TextProvider {
  readonly name = 'anthropic';
  private client: Anthropic;

  constructor(apiKey: string) {
    this.client = new Anthropic({ apiKey });
  }

  async complete(prompt: string, options: GenerateOptions): Promise<string> {
    try {
      const message = await this.client.messages.create({
        model: options.model,
        max_tokens: options.maxOutputTokens ?? DEFAULT_MAX_TOKENS,
        temperature: options.temperature,
        messages: [{ role: 'user', content: prompt }],
      });

      return message.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('');
    } catch (error) {
      throw toCompletionError(this.name, error);
    }
  }
}
