import type { AgentName, DevelopmentState } from './states';

/**
 * A handler executed when the orchestrator selects an agent. It receives
 * the current (read-only) state and returns the state after its step.
 */
export type AgentHandler = (state: Readonly<DevelopmentState>) => Promise<DevelopmentState>;

/**
 * AgentCoordinator maps each pending agent to the handler that runs it.
 *
 * Handlers are registered externally: the real agents in production,
 * stubs in tests.
 */
export class AgentCoordinator {
  private handlers = new Map<AgentName, AgentHandler>();

  /** Register a handler for an agent */
  registerHandler(agent: AgentName, handler: AgentHandler): void {
    this.handlers.set(agent, handler);
  }

  /**
   * Execute the handler registered for the given agent.
   * @throws Error if no handler is registered for the agent.
   */
  async execute(agent: AgentName, state: Readonly<DevelopmentState>): Promise<DevelopmentState> {
    const handler = this.handlers.get(agent);
    if (!handler) {
      throw new Error(`No handler registered for agent: ${agent}`);
    }
    return handler(state);
  }

  /** Return a list of all agents that currently have a registered handler */
  getRegisteredAgents(): AgentName[] {
    return [...this.handlers.keys()];
  }
}
