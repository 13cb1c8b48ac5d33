/**
 * An opening fence with its info string, then the body up to the closing
 * fence. A fence left open runs to the end of the text.
 */
const FENCED_BLOCK = /```([^\n`]*)(\n[\s\S]*?)?(?:```|$)/;

/**
 * Pull the program out of a completion. The first fenced block wins;
 * a completion without fences is taken whole. Either way the result is trimmed.
 */
export function extractCode(completion: string): string {
  const match = FENCED_BLOCK.exec(completion);
  if (!match) {
    return completion.trim();
  }

  const [, info = '', body] = match;
  // ```print(1)``` carries its code where the language tag would be
  return (body ?? info).trim();
}
