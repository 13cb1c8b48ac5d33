import type { DevelopmentState } from '../orchestrator/states';
import type { ErrorAnalysis } from './error-analyzer';

export class ContextBuilder {
  /**
   * Consolidates the request and whatever the previous cycle produced into
   * the context block the coder prompt embeds. Sections are present only
   * when their source is.
   */
  static build(state: Readonly<DevelopmentState>, analysis?: ErrorAnalysis): string {
    const sections = [`Original Request: ${state.request}`];

    if (state.code) {
      sections.push(`Current Code:\n${state.code}`);
    }

    const result = state.executionResult;
    if (result) {
      const lines = [`Exit Status: ${result.exitStatus}`, `Output:\n${result.output || '(no output)'}`];
      if (analysis && result.exitStatus !== 0) {
        lines.push(`Failure Summary: ${analysis.summary}`);
        if (analysis.failurePoints.length > 0) {
          lines.push(`Specific Errors:\n${analysis.failurePoints.join('\n')}`);
        }
        lines.push(`Suggested Focus: ${analysis.suggestedFocus}`);
      }
      sections.push(`Execution Results:\n${lines.join('\n')}`);
    }

    if (state.reviewFeedback) {
      sections.push(`Review Feedback:\n${state.reviewFeedback}`);
    }

    return sections.join('\n\n');
  }
}
