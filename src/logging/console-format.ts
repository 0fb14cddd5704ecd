import type { StructuredLogEvent } from './structured-log-event.js';

interface FormatOptions {
  color?: boolean;
  verbose?: boolean;
}

const ANSI_RESET = '\u001B[0m';
const ANSI_RED = '\u001B[31m';
const ANSI_YELLOW = '\u001B[33m';
const ANSI_GREEN = '\u001B[32m';
const ANSI_BLUE = '\u001B[34m';
const ANSI_GRAY = '\u001B[90m';

const KIND_CODE: Record<StructuredLogEvent['type'], string> = {
  llm: 'LLM',
  step: 'STP',
  agent: 'AGN',
};

const DIRECTION_ARROW: Record<StructuredLogEvent['direction'], string> = {
  request: '→',
  response: '←',
  event: '•',
};

const paint = (text: string, ansi: string, enabled: boolean): string => (enabled ? `${ansi}${text}${ANSI_RESET}` : text);

function contextLabel(event: StructuredLogEvent): string {
  if (event.type === 'llm') {
    return event.model !== undefined && event.model.length > 0 ? `${event.provider ?? ''}/${event.model}` : event.provider ?? event.remoteIdentifier;
  }
  return event.remoteIdentifier;
}

/** One human-oriented line per event, e.g. `WRN ← LLM google/gemini-2.0-flash-lite: attempt 1 failed`. */
export function formatConsole(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const color = options.color === true;
  const context = contextLabel(event);
  const coloredContext = event.type === 'llm' ? paint(context, ANSI_BLUE, color) : paint(context, ANSI_GREEN, color);
  const prefix = `${event.severity} ${DIRECTION_ARROW[event.direction]} ${KIND_CODE[event.type]}`;
  let message = event.message;
  if (event.severity === 'ERR') message = paint(message, ANSI_RED, color);
  else if (event.severity === 'WRN') message = paint(message, ANSI_YELLOW, color);
  else if (event.severity === 'VRB' || event.severity === 'TRC') message = paint(message, ANSI_GRAY, color);
  let output = `${prefix} ${coloredContext}: ${message}`;
  if (options.verbose === true && event.runId !== undefined) {
    output += paint(` [run ${event.runId.slice(0, 8)}]`, ANSI_GRAY, color);
  }
  if (event.severity === 'ERR' && typeof event.stack === 'string' && event.stack.length > 0) {
    output += `\n${event.stack.split('\n').map((line) => `    ${line}`).join('\n')}`;
  }
  return output;
}
