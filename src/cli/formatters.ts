import chalk from 'chalk';
import type { DecisionEvent } from '../orchestrator/events';
import type { DevelopmentState, PendingAgent } from '../orchestrator/states';

// ── Primitives ──────────────────────────────────────────────────────────

export function formatStep(message: string): string {
  return chalk.cyan(`> ${message}`);
}

export function formatInfo(message: string): string {
  return chalk.gray(`  ${message}`);
}

export function formatSuccess(message: string): string {
  return chalk.green(`  ${message}`);
}

export function formatError(message: string): string {
  return chalk.red(`  ${message}`);
}

export function formatWarning(message: string): string {
  return chalk.yellow(`  ${message}`);
}

// ── Decisions ───────────────────────────────────────────────────────────

const AGENT_LABELS: Record<PendingAgent, string> = {
  none: 'Waiting',
  code: 'Generating code...',
  execute: 'Running code in sandbox...',
  review: 'Reviewing code...',
  done: 'Done',
};

export function formatDecision(event: Pick<DecisionEvent, 'rule' | 'pendingAgent' | 'iterationCount'>): string {
  return chalk.cyan(`  [iteration ${event.iterationCount}] ${event.rule} -> ${AGENT_LABELS[event.pendingAgent]}`);
}

// ── Verbose interim output ──────────────────────────────────────────────

export function formatVerboseSection(title: string, body: string): string {
  const separator = chalk.gray('─'.repeat(60));
  return `${separator}\n${chalk.bold(title)}\n${body}\n${separator}`;
}

// ── Final result ────────────────────────────────────────────────────────

export function formatDevelopmentResult(state: DevelopmentState, opts?: { verbose?: boolean; savedTo?: string }): string {
  const lines: string[] = [''];

  if (state.status === 'completed') {
    lines.push(chalk.green.bold('Development completed.'));
  } else {
    lines.push(chalk.red.bold('Development failed.'));
  }

  lines.push(formatInfo(`Status:      ${state.status}`));
  lines.push(formatInfo(`Iterations:  ${state.iterationCount}/${state.iterationLimit}`));

  const result = state.executionResult;
  if (result) {
    const line = `Last run:    exit ${result.exitStatus} in ${result.durationMs}ms`;
    lines.push(result.exitStatus === 0 ? formatSuccess(line) : formatWarning(line));
  } else {
    lines.push(formatWarning('Last run:    never executed'));
  }

  if (state.reviewOutcome) {
    lines.push(formatInfo(`Review:      ${state.reviewOutcome.kind}`));
  }

  if (state.fatalError) {
    lines.push(formatError(`Error: ${state.fatalError}`));
  }

  if (state.errors.length) {
    lines.push(formatWarning(`Errors encountered: ${state.errors.length}`));
    if (opts?.verbose) {
      state.errors.forEach((e) => lines.push(formatError(`- ${e}`)));
    }
  }

  if (opts?.savedTo) {
    lines.push(chalk.green.bold(`  Saved: ${opts.savedTo}`));
  }

  if (opts?.verbose) {
    if (state.code) lines.push(formatVerboseSection('Final Code', state.code));
    if (result?.output) lines.push(formatVerboseSection('Execution Output', result.output));
    if (state.reviewFeedback) lines.push(formatVerboseSection('Review Feedback', state.reviewFeedback));
  }

  return lines.join('\n');
}
