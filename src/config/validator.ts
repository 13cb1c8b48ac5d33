import { z } from 'zod';

export const ProviderNameSchema = z.enum(['gemini', 'openai', 'anthropic', 'ollama']);
export type ProviderName = z.infer<typeof ProviderNameSchema>;

const RoleBindingSchema = z.object({
  provider: ProviderNameSchema,
  model: z.string().min(1, 'model is required'),
  temperature: z.number().min(0).max(2),
});

export const ConfigSchema = z.object({
  session: z.object({
    iteration_limit: z.number().int().positive(),
    failure_limit: z.number().int().positive(),
    agent_timeout_ms: z.number().int().positive(),
  }),
  providers: z.object({
    gemini: z.object({ api_key: z.string().optional() }),
    openai: z.object({ api_key: z.string().optional(), base_url: z.string().url().optional() }),
    anthropic: z.object({ api_key: z.string().optional() }),
    ollama: z.object({ base_url: z.string().url() }),
  }),
  roles: z.object({
    coder: RoleBindingSchema,
    reviewer: RoleBindingSchema,
    planner: RoleBindingSchema.optional(),
  }),
  prompts: z.object({
    coder_initial: z.string().optional(),
    coder_fix: z.string().optional(),
    reviewer: z.string().optional(),
  }),
  sandbox: z.object({
    provider: z.enum(['docker', 'e2b']),
    language: z.enum(['python', 'node']),
    image: z.string().min(1),
    host_dir: z.string().min(1),
    container_dir: z.string().startsWith('/', 'container_dir must be an absolute path'),
    network: z.string().min(1),
    timeout_ms: z.number().int().positive(),
  }),
  e2b: z.object({
    api_key: z.string().optional(),
    template: z.string().min(1),
    work_dir: z.string().startsWith('/'),
  }),
  output: z.object({
    enabled: z.boolean(),
    dir: z.string().min(1),
    filename: z.string().min(1),
    save_metadata: z.boolean(),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type RoleBinding = z.infer<typeof RoleBindingSchema>;

/**
 * Report credentials the selected providers need but the config lacks.
 * The schema accepts missing keys so that unused providers need no setup.
 */
export function findMissingCredentials(config: Config): string[] {
  const missing: string[] = [];
  const bindings = Object.entries(config.roles).filter((entry): entry is [string, RoleBinding] => entry[1] !== undefined);

  for (const [role, binding] of bindings) {
    if (binding.provider === 'gemini' && !config.providers.gemini.api_key) {
      missing.push(`roles.${role} uses gemini but GEMINI_API_KEY is not set`);
    }
    if (binding.provider === 'openai' && !config.providers.openai.api_key) {
      missing.push(`roles.${role} uses openai but OPENAI_API_KEY is not set`);
    }
    if (binding.provider === 'anthropic' && !config.providers.anthropic.api_key) {
      missing.push(`roles.${role} uses anthropic but ANTHROPIC_API_KEY is not set`);
    }
  }

  if (config.sandbox.provider === 'e2b' && !config.e2b.api_key) {
    missing.push('sandbox.provider is e2b but E2B_API_KEY is not set');
  }

  return missing;
}
