export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value)
);

const sortObject = (value: Record<string, unknown>): Record<string, unknown> => (
  Object.keys(value)
    .sort((a, b) => a.localeCompare(b))
    .reduce<Record<string, unknown>>((acc, key) => {
      acc[key] = value[key];
      return acc;
    }, {})
);

/** JSON encoding with object keys sorted, so equal structures encode equally. */
export const stableStringify = (value: unknown): string => {
  try {
    const replacer = (_key: string, val: unknown): unknown => (isPlainObject(val) ? sortObject(val) : val);
    return JSON.stringify(value, replacer);
  } catch {
    try {
      return JSON.stringify(String(value));
    } catch {
      return '"[unserializable]"';
    }
  }
};

/** Single-line preview of a long text for log messages. */
export function previewText(text: string, maxChars = 120): string {
  const collapsed = text.replace(/[\r\n]+/g, ' ').trim();
  if (collapsed.length <= maxChars) return collapsed;
  return `${collapsed.slice(0, maxChars)}…`;
}

let warningSink: ((message: string) => void) | undefined;

export function setWarningSink(handler?: (message: string) => void): void {
  warningSink = handler;
}

// Warnings route through an injectable sink so the core never writes to stdio
export function warn(message: string): void {
  const sink = warningSink;
  if (sink === undefined) {
    return;
  }
  sink(message);
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<'completed' | 'aborted'>;

export const sleepWithAbort: SleepFn = async (ms, signal) => {
  if (ms <= 0) return 'completed';
  if (signal?.aborted === true) return 'aborted';
  return await new Promise((resolve) => {
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const onAbort = (): void => { finish('aborted'); };
    const finish = (result: 'completed' | 'aborted'): void => {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      resolve(result);
    };
    timer = setTimeout(() => { finish('completed'); }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};
