import type { LogCallback, LogEntry } from './types.js';

import { createStructuredLogger, type LogFormat } from './logging/structured-logger.js';

export interface LogSinkOptions {
  format?: LogFormat;
  color?: boolean;
  verbose?: boolean;
  traceLlm?: boolean;
  labels?: Record<string, string>;
}

/**
 * Build the CLI's log callback. Interactive terminals get the console
 * format unless one is requested; VRB needs --verbose and TRC needs
 * --trace-llm.
 */
export function makeLogCallback(opts: LogSinkOptions, write?: (s: string) => void): LogCallback {
  const isTTY = process.stderr.isTTY;
  const format: LogFormat = opts.format ?? (isTTY ? 'console' : 'logfmt');

  const logger = createStructuredLogger({
    format,
    color: opts.color ?? (write === undefined && isTTY),
    verbose: opts.verbose === true,
    writer: write,
    labels: opts.labels,
  });

  return (entry: LogEntry) => {
    if (entry.severity === 'VRB' && opts.verbose !== true) return;
    if (entry.severity === 'TRC' && opts.traceLlm !== true) return;
    logger.emit(entry);
  };
}
