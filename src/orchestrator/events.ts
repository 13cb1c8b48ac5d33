import { EventEmitter } from 'events';
import type { RuleName } from './state-machine';
import type { AgentName, PendingAgent, SessionStatus } from './states';

export interface DecisionEvent {
  runId: string;
  rule: RuleName;
  pendingAgent: PendingAgent;
  status: SessionStatus;
  iterationCount: number;
  timestamp: string;
}

export interface StepEvent {
  runId: string;
  agent: AgentName;
  durationMs: number;
  /** Whether the step grew the error log */
  failed: boolean;
}

export class SessionEvents extends EventEmitter {
  emitDecision(event: DecisionEvent): void {
    this.emit('decision', event);
  }

  emitStep(event: StepEvent): void {
    this.emit('step', event);
  }

  onDecision(listener: (event: DecisionEvent) => void): this {
    return this.on('decision', listener);
  }

  onStep(listener: (event: StepEvent) => void): this {
    return this.on('step', listener);
  }
}
