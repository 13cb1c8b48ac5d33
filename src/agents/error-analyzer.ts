import type { ExecutionResult } from '../sandbox/types';

export interface ErrorAnalysis {
  summary: string;
  failurePoints: string[];
  suggestedFocus: string;
}

export class ErrorAnalyzer {
  analyze(result: ExecutionResult): ErrorAnalysis {
    if (result.exitStatus === 0) {
      return { summary: 'Success', failurePoints: [], suggestedFocus: 'None' };
    }

    if (result.infrastructureError) {
      return {
        summary: 'The sandbox could not run the program.',
        failurePoints: [result.infrastructureError],
        suggestedFocus: 'The failure happened outside the program; keep the code self-contained and runnable as a single file.',
      };
    }

    // Extract lines that look like errors (tracebacks, assertion errors, stack frames)
    const errorLines = result.output
      .split('\n')
      .filter((line) => /error|fail|exception|assert|traceback/i.test(line) || /^\s*at\s+\S+/.test(line))
      .map((line) => line.trim())
      .slice(0, 10); // Keep top 10 relevant lines

    return {
      summary: `Program exited with status ${result.exitStatus}.`,
      failurePoints: errorLines,
      suggestedFocus: this.deduceFocus(errorLines),
    };
  }

  private deduceFocus(errors: string[]): string {
    const joined = errors.join(' ');
    if (/ModuleNotFoundError|ImportError|Cannot find module/.test(joined)) return 'Use only the standard library or modules available in the sandbox image.';
    if (/NameError|ReferenceError/.test(joined)) return 'Fix missing variables or imports.';
    if (joined.includes('SyntaxError')) return 'Fix the syntax so the file parses.';
    if (joined.includes('TypeError')) return 'Verify object structures and null checks.';
    if (joined.includes('AssertionError')) return 'Logic matches requirements, but output values are incorrect.';
    if (/IndexError|KeyError|RangeError/.test(joined)) return 'Check bounds and missing keys.';
    if (/timeout|timed out/i.test(joined)) return 'Check for infinite loops or performance bottlenecks.';
    return 'General debugging and logic refinement.';
  }
}
