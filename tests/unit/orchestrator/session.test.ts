import fs from 'fs';
import os from 'os';
import path from 'path';
import { DevelopmentSession } from '../../../src/orchestrator/session';
import { createDevelopmentCoordinator } from '../../../src/orchestrator/register-handlers';
import { AgentCoordinator } from '../../../src/orchestrator/agent-coordinator';
import { OutputStore } from '../../../src/orchestrator/output-store';
import { withNewCode } from '../../../src/orchestrator/states';
import type { DecisionEvent, StepEvent } from '../../../src/orchestrator/events';
import { silentLogger } from '../../../src/utils/logger';
import { failingCoder, failingReviewer, scriptedCoder, scriptedExecutor, scriptedReviewer } from '../../helpers/agents';
import { makeResult } from '../../helpers/state';

describe('DevelopmentSession', () => {
  const build = (agents: Parameters<typeof createDevelopmentCoordinator>[0], options: { iterationLimit?: number; failureLimit?: number; outputStore?: OutputStore } = {}) =>
    new DevelopmentSession({
      coordinator: createDevelopmentCoordinator({ ...agents, logger: silentLogger }),
      runId: 'test-run-123',
      logger: silentLogger,
      ...options,
    });

  describe('happy path', () => {
    it('should complete a request that runs and is approved on the first draft', async () => {
      const coder = scriptedCoder('print("hello")');
      const executor = scriptedExecutor(makeResult(0, 'hello\n'));
      const reviewer = scriptedReviewer('approved');

      const state = await build({ coder, executor, reviewer }).develop('print hello', 5);

      expect(state.status).toBe('completed');
      expect(state.code).toBe('print("hello")');
      expect(state.iterationCount).toBe(2);
      expect(state.executionResult?.exitStatus).toBe(0);
      expect(state.reviewOutcome).toEqual({ kind: 'approved' });
      expect(state.errors).toEqual([]);
      expect(coder.generate).toHaveBeenCalledTimes(1);
      expect(executor.run).toHaveBeenCalledWith('print("hello")');
      expect(reviewer.review).toHaveBeenCalledTimes(1);
    });

    it('should fix a failing run and then complete', async () => {
      const coder = scriptedCoder('print(', 'print("hello")');
      const executor = scriptedExecutor(makeResult(1, 'SyntaxError: unexpected EOF'), makeResult(0, 'hello\n'));
      const reviewer = scriptedReviewer('approved');

      const state = await build({ coder, executor, reviewer }).develop('print hello', 5);

      expect(state.status).toBe('completed');
      expect(state.code).toBe('print("hello")');
      expect(state.iterationCount).toBe(3);
      expect(coder.generate).toHaveBeenCalledTimes(2);
      expect(executor.run).toHaveBeenCalledTimes(2);
    });

    it('should rewrite the code when the review finds issues', async () => {
      const coder = scriptedCoder('print("hi")', 'print("hello")');
      const executor = scriptedExecutor(makeResult(0, 'hi\n'), makeResult(0, 'hello\n'));
      const reviewer = scriptedReviewer('issues', 'approved');

      const state = await build({ coder, executor, reviewer }).develop('print hello', 5);

      expect(state.status).toBe('completed');
      expect(state.code).toBe('print("hello")');
      expect(reviewer.review).toHaveBeenCalledTimes(2);
    });
  });

  describe('budget', () => {
    it('should stop after the first generation when the limit is 1', async () => {
      const coder = scriptedCoder('print("hello")');
      const executor = scriptedExecutor(makeResult(0, 'hello\n'));
      const reviewer = scriptedReviewer('approved');

      const state = await build({ coder, executor, reviewer }).develop('print hello', 1);

      expect(state.status).toBe('completed');
      expect(state.code).toBe('print("hello")');
      expect(state.executionResult).toBeUndefined();
      expect(executor.run).not.toHaveBeenCalled();
    });

    it('should never call the coder more times than the iteration limit', async () => {
      const coder = scriptedCoder('raise SystemExit(1)');
      const executor = scriptedExecutor(makeResult(1, 'exit 1'));
      const reviewer = scriptedReviewer('approved');

      const state = await build({ coder, executor, reviewer }).develop('print hello', 4);

      expect(state.status).toBe('completed');
      expect(state.iterationCount).toBe(4);
      expect(coder.generate).toHaveBeenCalledTimes(3);
      expect(reviewer.review).not.toHaveBeenCalled();
    });

    it('should use the session default when no limit is passed', async () => {
      const coder = scriptedCoder('print("hello")');
      const state = await build({ coder, executor: scriptedExecutor(makeResult(0)), reviewer: scriptedReviewer('approved') }, { iterationLimit: 7 }).develop('print hello');

      expect(state.iterationLimit).toBe(7);
    });

    it('should reject a non-positive iteration limit', async () => {
      const session = build({ coder: scriptedCoder('x'), executor: scriptedExecutor(makeResult(0)), reviewer: scriptedReviewer('approved') });
      await expect(session.develop('print hello', 0)).rejects.toThrow(RangeError);
    });
  });

  describe('failures', () => {
    it('should give up once the coder has failed failureLimit times in a row', async () => {
      const coder = failingCoder('provider unavailable');
      const executor = scriptedExecutor(makeResult(0));

      const state = await build({ coder, executor, reviewer: scriptedReviewer('approved') }, { failureLimit: 3 }).develop('print hello', 5);

      expect(state.status).toBe('failed');
      expect(state.code).toBe('');
      expect(coder.generate).toHaveBeenCalledTimes(3);
      expect(executor.run).not.toHaveBeenCalled();
      expect(state.errors).toEqual(['Coder error: provider unavailable', 'Coder error: provider unavailable', 'Coder error: provider unavailable']);
    });

    it('should not treat a reviewer that keeps failing as approval', async () => {
      const reviewer = failingReviewer('reviewer offline');

      const state = await build({ coder: scriptedCoder('print("hello")'), executor: scriptedExecutor(makeResult(0, 'hello\n')), reviewer }, { failureLimit: 2 }).develop(
        'print hello',
        5,
      );

      expect(state.status).toBe('failed');
      expect(reviewer.review).toHaveBeenCalledTimes(2);
      expect(state.reviewOutcome).toEqual({ kind: 'unknown', reason: 'reviewer offline' });
    });

    it('should return a failed state carrying the message when the loop itself breaks', async () => {
      const coordinator = new AgentCoordinator();
      coordinator.registerHandler('code', async (state) => withNewCode(state, 'print("hello")'));

      const session = new DevelopmentSession({ coordinator, logger: silentLogger });
      const state = await session.develop('print hello', 5);

      expect(state.status).toBe('failed');
      expect(state.pendingAgent).toBe('done');
      expect(state.fatalError).toBe('No handler registered for agent: execute');
      expect(state.errors).toEqual(['Session error: No handler registered for agent: execute']);
      expect(state.code).toBe('print("hello")');
    });
  });

  describe('events', () => {
    it('should emit each decision and each step in order', async () => {
      const session = build({ coder: scriptedCoder('print("hello")'), executor: scriptedExecutor(makeResult(0, 'hello\n')), reviewer: scriptedReviewer('approved') });
      const decisions: DecisionEvent[] = [];
      const steps: StepEvent[] = [];
      session.events.onDecision((event) => decisions.push(event));
      session.events.onStep((event) => steps.push(event));

      await session.develop('print hello', 5);

      expect(decisions.map((d) => d.rule)).toEqual(['bootstrap', 'execute-new-code', 'review-passing-code', 'accept']);
      expect(decisions[0]?.runId).toBe('test-run-123');
      expect(steps.map((s) => s.agent)).toEqual(['code', 'execute', 'review']);
      expect(steps.every((s) => !s.failed)).toBe(true);
    });
  });

  describe('output', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'codeloop-session-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should save the final code of a completed session', async () => {
      const outputStore = new OutputStore({ dir, filename: 'output.py', saveMetadata: false, logger: silentLogger });
      await build({ coder: scriptedCoder('print("hello")'), executor: scriptedExecutor(makeResult(0, 'hello\n')), reviewer: scriptedReviewer('approved') }, { outputStore }).develop(
        'print hello',
        5,
      );

      expect(fs.readFileSync(path.join(dir, 'output.py'), 'utf-8')).toBe('print("hello")');
    });

    it('should save nothing when the session failed', async () => {
      const outputStore = new OutputStore({ dir, filename: 'output.py', saveMetadata: false, logger: silentLogger });
      await build({ coder: failingCoder(), executor: scriptedExecutor(makeResult(0)), reviewer: scriptedReviewer('approved') }, { outputStore }).develop('print hello', 5);

      expect(fs.existsSync(path.join(dir, 'output.py'))).toBe(false);
    });
  });
});
