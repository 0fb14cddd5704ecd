const CODE_MARKERS = /\[CODE\][ \t]*\r?\n?([\s\S]*?)\r?\n?[ \t]*\[\/CODE\]/i;
const FENCED_BLOCK = /```[^\n`]*\r?\n([\s\S]*?)```/;

/**
 * Code carried by a result: the text between [CODE] and [/CODE] markers,
 * else the body of the first fenced block. The result itself is untouched.
 */
export function extractSolution(result: string): string | undefined {
  const marked = CODE_MARKERS.exec(result);
  const body = marked !== null ? marked[1] : FENCED_BLOCK.exec(result)?.[1];
  if (body === undefined) return undefined;
  const trimmed = body.replace(/^\s*\n/, '').trimEnd();
  return trimmed.length > 0 ? trimmed : undefined;
}
