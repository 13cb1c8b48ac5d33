export interface GenerateOptions {
  model: string;
  temperature: number;
  maxOutputTokens?: number;
}

/** A text-in, text-out LLM backend */
export interface TextProvider {
  readonly name: string;
  complete(prompt: string, options: GenerateOptions): Promise<string>;
}
