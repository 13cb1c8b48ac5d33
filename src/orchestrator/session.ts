import crypto from 'crypto';
import { AgentCoordinator } from './agent-coordinator';
import { decide } from './state-machine';
import type { Decision } from './state-machine';
import { SessionEvents } from './events';
import { createInitialState } from './states';
import type { AgentName, DevelopmentState, PendingAgent } from './states';
import type { OutputStore } from './output-store';
import { ConsoleLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

/** Logger interface for session observability */
export type SessionLogger = Logger;

// ── Options ─────────────────────────────────────────────────────────────

/** Configuration for creating a DevelopmentSession */
export interface SessionOptions {
  /** Pre-configured coordinator with the code, execute and review handlers */
  coordinator: AgentCoordinator;
  /** Unique identifier for this session (auto-generated if omitted) */
  runId?: string;
  /** Logger implementation (defaults to a console logger with run-id prefix) */
  logger?: SessionLogger;
  /** Iteration budget used when `develop` is called without one (default: 5) */
  iterationLimit?: number;
  /** Consecutive failed steps tolerated before the session gives up (default: 3) */
  failureLimit?: number;
  /** Where to persist the final code; nothing is written when omitted */
  outputStore?: OutputStore;
}

// ── Session ─────────────────────────────────────────────────────────────

/**
 * DevelopmentSession drives one request from an empty draft to a terminal status.
 *
 * Each cycle asks the state machine for the next agent, runs it to
 * completion and feeds the resulting state back. Agents never overlap
 * and nothing outside the session sees the state while it runs.
 */
export class DevelopmentSession {
  readonly events = new SessionEvents();
  readonly runId: string;
  private coordinator: AgentCoordinator;
  private logger: SessionLogger;
  private iterationLimit: number;
  private failureLimit: number;
  private outputStore?: OutputStore;

  constructor(options: SessionOptions) {
    this.runId = options.runId ?? crypto.randomUUID();
    this.coordinator = options.coordinator;
    this.logger = options.logger ?? new ConsoleLogger(`[codeloop:${this.runId.slice(0, 8)}]`);
    this.iterationLimit = options.iterationLimit ?? 5;
    this.failureLimit = options.failureLimit ?? 3;
    this.outputStore = options.outputStore;
  }

  // ── Public API ──────────────────────────────────────────────────────

  /**
   * Develop code for `request`. Always resolves: a failure of the loop
   * itself comes back as a `failed` state carrying the message.
   * @throws RangeError if `iterationLimit` is not a positive integer
   */
  async develop(request: string, iterationLimit: number = this.iterationLimit): Promise<DevelopmentState> {
    let state = createInitialState(request, iterationLimit, this.failureLimit);
    const startTime = Date.now();

    this.logger.info('Starting development', { runId: this.runId, iterationLimit });

    try {
      for (;;) {
        const decision = this.decideNext(state);
        state = decision.state;
        if (decision.pendingAgent === 'done') break;
        state = await this.executeStep(DevelopmentSession.toAgent(decision.pendingAgent), state);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Session failed', { error: message });
      state = {
        ...state,
        status: 'failed',
        pendingAgent: 'done',
        fatalError: message,
        errors: [...state.errors, `Session error: ${message}`],
      };
    }

    if (this.outputStore && state.status === 'completed' && state.code) {
      await this.outputStore.save(state);
    }

    this.logger.info('Development result', {
      status: state.status,
      iterations: state.iterationCount,
      errors: state.errors.length,
      durationMs: Date.now() - startTime,
    });

    return state;
  }

  // ── Execution Loop ──────────────────────────────────────────────────

  private decideNext(state: DevelopmentState): Decision {
    const decision = decide(state);

    this.logger.debug(`Orchestrator - iteration ${decision.state.iterationCount}`, { rule: decision.rule, next: decision.pendingAgent });
    this.events.emitDecision({
      runId: this.runId,
      rule: decision.rule,
      pendingAgent: decision.pendingAgent,
      status: decision.state.status,
      iterationCount: decision.state.iterationCount,
      timestamp: new Date().toISOString(),
    });

    return decision;
  }

  private async executeStep(agent: AgentName, state: DevelopmentState): Promise<DevelopmentState> {
    this.logger.info(`Executing: ${agent}`);
    const stepStart = Date.now();

    const next = await this.coordinator.execute(agent, state);
    const durationMs = Date.now() - stepStart;
    const failed = next.errors.length > state.errors.length;

    if (failed) {
      this.logger.warn(`Failed: ${agent} (${durationMs}ms)`, { error: next.errors[next.errors.length - 1] });
    } else {
      this.logger.info(`Completed: ${agent} (${durationMs}ms)`);
    }
    this.events.emitStep({ runId: this.runId, agent, durationMs, failed });

    return next;
  }

  private static toAgent(pending: PendingAgent): AgentName {
    if (pending === 'none' || pending === 'done') {
      throw new Error(`Orchestrator selected no runnable agent (${pending})`);
    }
    return pending;
  }
}
