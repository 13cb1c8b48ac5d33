import { GoogleGenerativeAI } from '@google/generative-ai';
import { toCompletionError } from './errors';
import type { GenerateOptions, TextProvider } from './types';

export interface UsageMetrics {
  promptTokens: number;
  candidatesTokens: number;
  totalTokens: number;
}

export interface GeminiResponse {
  content: string;
  modelId: string;
  usage?: UsageMetrics;
}

export class GeminiClient implements TextProvider {
  readonly name = 'gemini';
  private client: GoogleGenerativeAI;

  constructor(apiKey?: string) {
    const key = apiKey || process.env.GEMINI_API_KEY || '';
    if (!key) {
      throw new Error('GEMINI_API_KEY is required for authentication');
    }
    this.client = new GoogleGenerativeAI(key);
  }

  async generate(prompt: string, options: GenerateOptions): Promise<GeminiResponse> {
    const model = this.client.getGenerativeModel({
      model: options.model,
      generationConfig: {
        temperature: options.temperature,
        maxOutputTokens: options.maxOutputTokens,
      },
    });

    try {
      const result = await model.generateContent(prompt);
      const metadata = result.response.usageMetadata;

      return {
        content: result.response.text(),
        modelId: options.model,
        usage: metadata
          ? {
              promptTokens: metadata.promptTokenCount,
              candidatesTokens: metadata.candidatesTokenCount,
              totalTokens: metadata.totalTokenCount,
            }
          : undefined,
      };
    } catch (error) {
      throw toCompletionError(this.name, error);
    }
  }

  async complete(prompt: string, options: GenerateOptions): Promise<string> {
    const response = await this.generate(prompt, options);
    return response.content;
  }
}
