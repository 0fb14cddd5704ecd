export interface Verdict {
  passed: boolean;
  // 0..10 when the reviewer gave one
  score?: number;
  feedback: string;
}

const VERDICT_LINE = /^[ \t*_]*VERDICT[ \t*_]*:[ \t*_]*(PASS|FAIL)\b/gim;
const SCORE_LINE = /^[ \t*_]*SCORE[ \t*_]*:[ \t*_]*(\d+(?:\.\d+)?)/gim;

const lastCapture = (pattern: RegExp, text: string): string | undefined => {
  const matches = Array.from(text.matchAll(pattern));
  const last = matches.length > 0 ? matches[matches.length - 1] : undefined;
  return last?.[1];
};

/**
 * Read the reviewer's verdict. The last VERDICT line wins; a reply without
 * one counts as a failure so the result gets another attempt.
 */
export function parseVerdict(text: string): Verdict {
  const verdict = lastCapture(VERDICT_LINE, text);
  const rawScore = lastCapture(SCORE_LINE, text);
  const feedback = text
    .split(/\r?\n/)
    .filter((line) => !/^[ \t*_]*(VERDICT|SCORE)[ \t*_]*:/i.test(line))
    .join('\n')
    .trim();
  const result: Verdict = { passed: verdict?.toUpperCase() === 'PASS', feedback };
  if (rawScore !== undefined) {
    const score = Number.parseFloat(rawScore);
    if (Number.isFinite(score)) result.score = Math.min(10, Math.max(0, score));
  }
  return result;
}
