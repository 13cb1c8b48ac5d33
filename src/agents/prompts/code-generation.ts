import type { RuntimeLanguage } from '../../sandbox/types';

const LANGUAGE_LABELS: Record<RuntimeLanguage, string> = {
  python: 'Python',
  node: 'JavaScript (Node.js)',
};

export const getInitialCodePrompt = (language: RuntimeLanguage): string => {
  const label = LANGUAGE_LABELS[language];
  return `
ACT AS: Senior ${label} Engineer
TASK: Write a complete program for the request below.

{context}

### REQUIREMENTS
- Write complete, executable ${label} code in a single file
- The program runs unattended: no interactive input, no network access
- Use only the standard library
- Include proper error handling
- Exit with a non-zero status if the program cannot do its job

Return ONLY the ${label} code, no explanations.
`;
};

export const getFixCodePrompt = (language: RuntimeLanguage): string => {
  const label = LANGUAGE_LABELS[language];
  return `
ACT AS: Senior ${label} Engineer
TASK: Fix the existing program based on the feedback below.

{context}

### REQUIREMENTS
- Fix any execution errors
- Address the review feedback if provided
- Maintain existing functionality
- Keep the program a single, self-contained file

Return ONLY the corrected ${label} code, no explanations.
`;
};

/** Substitute `{name}` placeholders; unknown placeholders are left as they are */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder: string, name: string) => values[name] ?? placeholder);
}
