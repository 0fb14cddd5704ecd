import { ConfigError } from './errors.js';

export type DurationInput = number | string | null | undefined;

const UNIT_TO_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

/** Milliseconds from a number of ms or a string such as `1500`, `30s`, `2m`; undefined when unparseable. */
export const parseDurationMs = (value: DurationInput): number | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) return undefined;
    return Math.trunc(value);
  }
  const lowered = value.trim().toLowerCase();
  if (lowered.length === 0) return undefined;
  if (/^\d+(\.\d+)?$/.test(lowered)) {
    return Math.trunc(Number.parseFloat(lowered));
  }
  const match = /^(\d+(?:\.\d+)?)\s*(ms|s|m|h)$/.exec(lowered);
  if (match === null) return undefined;
  const ms = Number.parseFloat(match[1]) * UNIT_TO_MS[match[2]];
  if (!Number.isFinite(ms)) return undefined;
  return Math.trunc(ms);
};

export const parseDurationMsStrict = (value: DurationInput, field: string): number => {
  const parsed = parseDurationMs(value);
  if (parsed === undefined || parsed <= 0) {
    throw new ConfigError(`${field} must be a positive millisecond number or a duration like 30s/2m`, { field });
  }
  return parsed;
};
