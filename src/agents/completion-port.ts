import { CompletionError } from '../llm/errors';
import type { TextProvider } from '../llm/types';

export type CompletionRole = 'planner' | 'coder' | 'reviewer';

/** Text generation as the agents see it: a role and a prompt in, text out */
export interface CompletionPort {
  invoke(role: CompletionRole, prompt: string): Promise<string>;
}

export interface RoleBinding {
  provider: TextProvider;
  model: string;
  temperature: number;
}

/**
 * Dispatches each role to the provider and model bound to it.
 * Which provider backs a role is decided by whoever builds the bindings.
 */
export class RoleCompletionPort implements CompletionPort {
  private bindings = new Map<CompletionRole, RoleBinding>();

  constructor(bindings: Partial<Record<CompletionRole, RoleBinding>> = {}) {
    for (const [role, binding] of Object.entries(bindings)) {
      if (binding && isCompletionRole(role)) {
        this.bindings.set(role, binding);
      }
    }
  }

  bind(role: CompletionRole, binding: RoleBinding): void {
    this.bindings.set(role, binding);
  }

  isBound(role: CompletionRole): boolean {
    return this.bindings.has(role);
  }

  async invoke(role: CompletionRole, prompt: string): Promise<string> {
    const binding = this.bindings.get(role);
    if (!binding) {
      throw new CompletionError(`No provider bound for role: ${role}`);
    }
    return binding.provider.complete(prompt, { model: binding.model, temperature: binding.temperature });
  }
}

const ROLES: readonly CompletionRole[] = ['planner', 'coder', 'reviewer'];

function isCompletionRole(value: string): value is CompletionRole {
  return ROLES.some((role) => role === value);
}
