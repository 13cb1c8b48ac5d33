import type { RuntimeLanguage } from '../../sandbox/types';

export const APPROVED_MARKER = 'APPROVED';
export const ISSUES_MARKER = 'ISSUES FOUND';

export const getReviewPrompt = (language: RuntimeLanguage): string => `
ACT AS: Code Reviewer
TASK: Review the ${language === 'python' ? 'Python' : 'JavaScript'} program below. It already runs and exits successfully.

### REQUEST
{request}

### PROGRAM
\`\`\`
{code}
\`\`\`

### WHAT TO CHECK
- Does the program do what the request asked for?
- Readability: clear names, no dead code, reasonable structure
- Error handling for invalid input
- Style conventions of the language

### OUTPUT REQUIREMENTS
Start your reply with exactly one verdict line:
- "${APPROVED_MARKER}" when the program is ready as it is
- "${ISSUES_MARKER}" when it needs changes, followed by a list of the issues

Do not rewrite the program.
`;
