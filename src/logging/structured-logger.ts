import type { LogEntry } from '../types.js';

import { formatConsole } from './console-format.js';
import { formatLogfmt } from './logfmt.js';
import { buildStructuredLogEvent, type StructuredLogEvent, type BuildStructuredEventOptions } from './structured-log-event.js';

export const LOG_FORMATS = ['logfmt', 'json', 'console'] as const;

export type LogFormat = typeof LOG_FORMATS[number];

export const isLogFormat = (value: string): value is LogFormat => LOG_FORMATS.some((format) => format === value);

export interface StructuredLoggerOptions {
  format?: LogFormat;
  labels?: Record<string, string>;
  color?: boolean;
  verbose?: boolean;
  writer?: (line: string) => void;
}

export class StructuredLogger {
  private readonly labels: Record<string, string>;
  private readonly sink: (event: StructuredLogEvent) => void;

  constructor(options: StructuredLoggerOptions = {}) {
    this.labels = options.labels ?? {};
    const color = options.color ?? false;
    const verbose = options.verbose ?? false;
    const writer = options.writer ?? defaultWriter;
    const format = options.format ?? 'logfmt';
    switch (format) {
      case 'json':
        this.sink = (event) => { writer(`${JSON.stringify(buildJsonPayload(event))}\n`); };
        break;
      case 'console':
        this.sink = (event) => { writer(`${formatConsole(event, { color, verbose })}\n`); };
        break;
      case 'logfmt':
        this.sink = (event) => { writer(`${formatLogfmt(event, { color })}\n`); };
        break;
    }
  }

  emit(entry: LogEntry): void {
    const options: BuildStructuredEventOptions = { labels: this.labels };
    this.sink(buildStructuredLogEvent(entry, options));
  }
}

export function createStructuredLogger(options: StructuredLoggerOptions): StructuredLogger {
  return new StructuredLogger(options);
}

function defaultWriter(line: string): void {
  process.stderr.write(line);
}

export function buildJsonPayload(event: StructuredLogEvent): Record<string, unknown> {
  const entries: [string, unknown][] = [];
  const push = (key: string, value: unknown): void => {
    if (value === undefined) return;
    entries.push([key, value]);
  };

  push('ts', event.isoTimestamp);
  push('timestamp', event.timestamp);
  push('severity', event.severity);
  push('level', event.severity.toLowerCase());
  push('priority', event.priority);
  push('type', event.type);
  push('direction', event.direction);
  push('remote', event.remoteIdentifier);
  push('run_id', event.runId);
  push('step', event.step);
  push('attempt', event.attempt);
  push('provider', event.provider);
  push('model', event.model);
  if (event.fatal) push('fatal', true);
  if (Object.keys(event.labels).length > 0) push('labels', event.labels);
  push('stack', event.stack);

  entries.push(['message', event.message]);

  return Object.fromEntries(entries);
}
