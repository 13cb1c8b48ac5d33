import { GeminiClient } from './gemini-client';
import { OpenAIProvider } from './openai-provider';
import { AnthropicProvider } from './anthropic-provider';
import type { TextProvider } from './types';
import { RoleCompletionPort } from '../agents/completion-port';
import type { CompletionRole } from '../agents/completion-port';
import type { Config, ProviderName } from '../config/validator';

/**
 * Build one provider instance per provider name, on first use.
 * Ollama is reached through its OpenAI-compatible endpoint.
 */
export class ProviderFactory {
  private cache = new Map<ProviderName, TextProvider>();

  constructor(private config: Config) {}

  get(name: ProviderName): TextProvider {
    const cached = this.cache.get(name);
    if (cached) return cached;

    const provider = this.create(name);
    this.cache.set(name, provider);
    return provider;
  }

  private create(name: ProviderName): TextProvider {
    const { providers } = this.config;
    switch (name) {
      case 'gemini':
        return new GeminiClient(providers.gemini.api_key);
      case 'anthropic':
        return new AnthropicProvider(providers.anthropic.api_key ?? '');
      case 'ollama':
        return new OpenAIProvider({
          name: 'ollama',
          apiKey: 'ollama',
          baseURL: `${providers.ollama.base_url.replace(/\/+$/, '')}/v1`,
        });
      case 'openai':
        return new OpenAIProvider({ apiKey: providers.openai.api_key ?? '', baseURL: providers.openai.base_url });
    }
  }
}

/** Bind every configured role to its provider */
export function createCompletionPort(config: Config, factory = new ProviderFactory(config)): RoleCompletionPort {
  const port = new RoleCompletionPort();
  const roles: CompletionRole[] = ['coder', 'reviewer', 'planner'];

  for (const role of roles) {
    const binding = config.roles[role];
    if (binding) {
      port.bind(role, { provider: factory.get(binding.provider), model: binding.model, temperature: binding.temperature });
    }
  }

  return port;
}
