import { describe, expect, it } from 'vitest';

import { extractSolution } from '../../solution.js';

describe('extractSolution', () => {
  it('returns the code between CODE markers', () => {
    expect(extractSolution('Here it is:\n[CODE]\nconst x = 1;\nconsole.log(x);\n[/CODE]\nDone.')).toBe('const x = 1;\nconsole.log(x);');
  });

  it('matches markers case-insensitively', () => {
    expect(extractSolution('[code]print(1)[/code]')).toBe('print(1)');
  });

  it('falls back to the first fenced block', () => {
    expect(extractSolution('Answer:\n```ts\nexport const a = 1;\n```\nand\n```\nsecond\n```')).toBe('export const a = 1;');
  });

  it('prefers markers over fences', () => {
    expect(extractSolution('```\nfenced\n```\n[CODE]\nmarked\n[/CODE]')).toBe('marked');
  });

  it('returns undefined without code or with an empty block', () => {
    expect(extractSolution('The answer is 42.')).toBeUndefined();
    expect(extractSolution('[CODE]\n   \n[/CODE]')).toBeUndefined();
  });
});
