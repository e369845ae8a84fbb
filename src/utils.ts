import crypto from 'node:crypto';

import { jsonrepair } from 'jsonrepair';

import type { CellValue } from './types.js';

export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value)
);

let warningSink: ((message: string) => void) | undefined = (message: string) => {
  try {
    process.stderr.write(`${message}\n`);
  } catch {
    // stderr closed
  }
};

export function setWarningSink(sink: ((message: string) => void) | undefined): void {
  warningSink = sink;
}

export function warn(message: string): void {
  const sink = warningSink;
  if (sink === undefined) {
    return;
  }
  try {
    sink(message);
  } catch {
    /* ignore sink failures to keep core resilient */
  }
}

export const errorMessage = (value: unknown): string => {
  if (value instanceof Error) return value.message;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null) return 'null';
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return '[unserializable-error]';
    }
  }
  return 'unknown_error';
};

const tryParseJson = (value: string): unknown => {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
};

/**
 * Parse tool input that may arrive as a JSON string, repairing truncated or
 * slightly malformed payloads. Non-string inputs are returned as-is.
 */
export const parseJsonLoose = (raw: unknown): unknown => {
  if (typeof raw !== 'string') return raw;
  const text = raw.trim();
  if (text.length === 0) return {};
  const direct = tryParseJson(text);
  if (direct !== undefined) return direct;
  try {
    return tryParseJson(jsonrepair(text)) ?? raw;
  } catch {
    return raw;
  }
};

export const toCellValue = (value: unknown): CellValue => {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') {
    return value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER)
      ? Number(value)
      : value.toString();
  }
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
};

export const formatCell = (value: CellValue): string => {
  if (value === null) return 'NULL';
  if (typeof value === 'number') return String(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return value.replace(/[\r\n]+/g, ' ');
};

export const newRunId = (): string => crypto.randomUUID();
