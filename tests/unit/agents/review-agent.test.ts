import { classifyReview, ReviewAgent, REVIEW_ERROR_FEEDBACK } from '../../../src/agents/review-agent';
import { CompletionError } from '../../../src/llm/errors';
import { silentLogger } from '../../../src/utils/logger';
import { mockPort } from '../../helpers/port';
import { makeResult, makeState } from '../../helpers/state';

describe('classifyReview', () => {
  it('should approve on an APPROVED verdict line even if the body mentions issues', () => {
    expect(classifyReview('APPROVED\nNo issues worth blocking on.')).toEqual({ kind: 'approved' });
  });

  it('should read an ISSUES FOUND verdict line with markdown decoration', () => {
    const feedback = '**ISSUES FOUND**\n- missing docstring';
    expect(classifyReview(feedback)).toEqual({ kind: 'issues', details: feedback });
  });

  it('should fall back to looking for issues anywhere in the text', () => {
    const feedback = 'There are a few Issues with naming.';
    expect(classifyReview(feedback)).toEqual({ kind: 'issues', details: feedback });
  });

  it('should approve text without any marker', () => {
    expect(classifyReview('Looks fine to me.')).toEqual({ kind: 'approved' });
  });
});

describe('ReviewAgent', () => {
  let port: ReturnType<typeof mockPort>;
  const passing = makeState({ code: 'print("hello")', iterationCount: 2, executionResult: makeResult(0, 'hello'), consecutiveFailures: 1 });

  beforeEach(() => {
    port = mockPort();
  });

  const agent = (reviewPrompt?: string) => new ReviewAgent(port, { language: 'python', timeoutMs: 1000, reviewPrompt, logger: silentLogger });

  it('should fill the request and the code into the prompt', async () => {
    port.invoke.mockResolvedValue('APPROVED');

    await agent('{request} | {code}').review(passing);

    expect(port.invoke).toHaveBeenCalledWith('reviewer', 'print hello | print("hello")');
  });

  it('should store the trimmed feedback with its verdict', async () => {
    port.invoke.mockResolvedValue('\nISSUES FOUND\n- greet the user by name\n');

    const next = await agent().review(passing);

    expect(next.reviewFeedback).toBe('ISSUES FOUND\n- greet the user by name');
    expect(next.reviewOutcome).toEqual({ kind: 'issues', details: 'ISSUES FOUND\n- greet the user by name' });
    expect(next.consecutiveFailures).toBe(0);
    expect(next.code).toBe('print("hello")');
  });

  it('should mark the verdict unknown when the reviewer fails', async () => {
    port.invoke.mockRejectedValue(new CompletionError('openai request failed (status 500): upstream'));

    const next = await agent().review(passing);

    expect(next.reviewFeedback).toBe(REVIEW_ERROR_FEEDBACK);
    expect(next.reviewOutcome).toEqual({ kind: 'unknown', reason: 'openai request failed (status 500): upstream' });
    expect(next.errors).toEqual(['Reviewer error: openai request failed (status 500): upstream']);
    expect(next.consecutiveFailures).toBe(2);
  });

  it('should refuse to review empty code', async () => {
    const next = await agent().review(makeState());

    expect(port.invoke).not.toHaveBeenCalled();
    expect(next.errors).toEqual(['Reviewer error: No code provided to reviewer']);
  });
});
