// This utility module keeps JSON parse operations on inbound frames safe and explicit.

import { AppError } from './errors.js';

// This helper parses one inbound protocol frame and reports malformed content as a protocol violation.
export function parseJsonFrame(value: string, label: string): unknown {
  try {
    return JSON.parse(value) as unknown;
  } catch (error) {
    throw new AppError(400, 'protocol_violation', `Failed to parse JSON from ${label}.`, {
      originalMessage: error instanceof Error ? error.message : 'unknown'
    });
  }
}

// This guard narrows parsed JSON values to plain objects.
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
