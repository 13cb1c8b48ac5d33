import { createDevelopmentCoordinator } from '../../../src/orchestrator/register-handlers';
import { AgentCoordinator } from '../../../src/orchestrator/agent-coordinator';
import { silentLogger } from '../../../src/utils/logger';
import { scriptedCoder, scriptedExecutor, scriptedReviewer } from '../../helpers/agents';
import { makeResult, makeState } from '../../helpers/state';

describe('createDevelopmentCoordinator', () => {
  const setup = (...results: ReturnType<typeof makeResult>[]) => {
    const executor = scriptedExecutor(...results);
    const coordinator = createDevelopmentCoordinator({
      coder: scriptedCoder('print(1)'),
      executor,
      reviewer: scriptedReviewer('approved'),
      logger: silentLogger,
    });
    return { coordinator, executor };
  };

  it('should register a handler for every agent', () => {
    const { coordinator } = setup(makeResult(0));
    expect(coordinator.getRegisteredAgents()).toEqual(['code', 'execute', 'review']);
  });

  describe('execute handler', () => {
    it('should refuse to run empty code', async () => {
      const { coordinator, executor } = setup(makeResult(0));
      const state = makeState({ iterationCount: 1 });

      const next = await coordinator.execute('execute', state);

      expect(executor.run).not.toHaveBeenCalled();
      expect(next.errors).toEqual(['Runner error: No code provided to runner']);
      expect(next.executionResult).toBeUndefined();
      expect(next.consecutiveFailures).toBe(1);
    });

    it('should store a program failure without counting it against the streak', async () => {
      const failure = makeResult(1, 'NameError: name x is not defined');
      const { coordinator } = setup(failure);

      const next = await coordinator.execute('execute', makeState({ code: 'print(x)', consecutiveFailures: 2 }));

      expect(next.executionResult).toEqual(failure);
      expect(next.errors).toEqual([]);
      expect(next.consecutiveFailures).toBe(0);
    });

    it('should record an infrastructure failure in the error log', async () => {
      const broken = makeResult(-1, 'Runner error: docker is not installed or not on PATH', { infrastructureError: 'docker is not installed or not on PATH' });
      const { coordinator } = setup(broken);

      const next = await coordinator.execute('execute', makeState({ code: 'print(1)' }));

      expect(next.executionResult?.exitStatus).toBe(-1);
      expect(next.errors).toEqual(['Runner error: docker is not installed or not on PATH']);
      expect(next.consecutiveFailures).toBe(1);
    });
  });

  it('should reject an agent with no handler', async () => {
    await expect(new AgentCoordinator().execute('review', makeState())).rejects.toThrow('No handler registered for agent: review');
  });
});
