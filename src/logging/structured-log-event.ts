import type { LogEntry } from '../types.js';

export interface StructuredLogEvent {
  timestamp: number;
  isoTimestamp: string;
  severity: LogEntry['severity'];
  priority: number;
  message: string;
  type: LogEntry['type'];
  direction: LogEntry['direction'];
  remoteIdentifier: string;
  fatal: boolean;
  runId?: string;
  step?: string;
  attempt?: number;
  provider?: string;
  model?: string;
  labels: Record<string, string>;
  stack?: string;
}

// syslog priorities
const PRIORITY_BY_SEVERITY: Record<LogEntry['severity'], number> = {
  ERR: 3,
  WRN: 4,
  FIN: 5,
  VRB: 6,
  TRC: 7,
};

const RESERVED_LABEL_KEYS = new Set([
  'ts',
  'level',
  'priority',
  'type',
  'direction',
  'remote',
  'run_id',
  'step',
  'attempt',
  'provider',
  'model',
  'message',
]);

export interface BuildStructuredEventOptions {
  labels?: Record<string, string>;
}

const formatDetail = (value: string | number | boolean): string | undefined => {
  if (typeof value === 'string') return value.length > 0 ? value : undefined;
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : undefined;
  return value ? 'true' : 'false';
};

export function buildStructuredLogEvent(entry: LogEntry, options: BuildStructuredEventOptions = {}): StructuredLogEvent {
  const labels: Record<string, string> = {};
  Object.entries(options.labels ?? {}).forEach(([key, value]) => {
    if (value.length > 0 && !RESERVED_LABEL_KEYS.has(key)) labels[key] = value;
  });
  Object.entries(entry.details ?? {}).forEach(([key, value]) => {
    const formatted = formatDetail(value);
    if (formatted === undefined || RESERVED_LABEL_KEYS.has(key)) return;
    if (!Object.prototype.hasOwnProperty.call(labels, key)) labels[key] = formatted;
  });

  const event: StructuredLogEvent = {
    timestamp: entry.timestamp,
    isoTimestamp: new Date(entry.timestamp).toISOString(),
    severity: entry.severity,
    priority: PRIORITY_BY_SEVERITY[entry.severity],
    message: entry.message,
    type: entry.type,
    direction: entry.direction,
    remoteIdentifier: entry.remoteIdentifier,
    fatal: entry.fatal,
    labels,
  };
  if (entry.runId !== undefined) event.runId = entry.runId;
  if (entry.step !== undefined) event.step = entry.step;
  if (entry.attempt !== undefined) event.attempt = entry.attempt;
  if (entry.stack !== undefined) event.stack = entry.stack;
  if (entry.type === 'llm') {
    const idx = entry.remoteIdentifier.indexOf(':');
    event.provider = idx === -1 ? entry.remoteIdentifier : entry.remoteIdentifier.slice(0, idx);
    if (idx !== -1) event.model = entry.remoteIdentifier.slice(idx + 1);
  }
  return event;
}
