// This module centralizes structured logging configuration and safe payload shaping.

import { createHash } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import pino, { type LoggerOptions } from 'pino';
import { MCP_SERVER_NAME } from '../version.js';
import { AppError } from './errors.js';

const LOG_LIMITS = {
  depth: 4,
  stringLength: 512,
  arrayItems: 20,
  objectKeys: 30
} as const;

const REDACT_PATHS = ['req.headers.authorization', 'req.headers.cookie', '*.authorization', '*.cookie', '*.password'];

const SENSITIVE_FRAGMENTS = ['token', 'password', 'authorization', 'cookie', 'secret', 'apikey', 'api_key', 'signature'];

function isSensitiveKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return SENSITIVE_FRAGMENTS.some((fragment) => normalized.includes(fragment));
}

function redactedMarker(value: unknown): string {
  const serialized = typeof value === 'string' ? value : JSON.stringify(value ?? '');
  const digest = createHash('sha256').update(serialized).digest('hex').slice(0, 12);
  return `[redacted:${digest}]`;
}

// Agents pass arbitrary URLs; userinfo and secret-looking query values never reach the log.
function redactUrl(value: string): string {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return value;
  }

  if (parsed.username || parsed.password) {
    parsed.username = '';
    parsed.password = '';
  }
  for (const [key, paramValue] of [...parsed.searchParams]) {
    if (isSensitiveKey(key)) {
      parsed.searchParams.set(key, redactedMarker(paramValue));
    }
  }
  return parsed.toString();
}

function shapeString(value: string): string {
  const shaped = /^https?:\/\//i.test(value) ? redactUrl(value) : value;
  if (shaped.length <= LOG_LIMITS.stringLength) {
    return shaped;
  }
  return `${shaped.slice(0, LOG_LIMITS.stringLength)}...[truncated:${shaped.length - LOG_LIMITS.stringLength}]`;
}

function shapeObject(value: object, depth: number): Record<string, unknown> {
  const entries = Object.entries(value);
  const target: Record<string, unknown> = {};

  for (const [key, entryValue] of entries.slice(0, LOG_LIMITS.objectKeys)) {
    target[key] = isSensitiveKey(key) ? redactedMarker(entryValue) : sanitizeForLog(entryValue, depth + 1);
  }
  if (entries.length > LOG_LIMITS.objectKeys) {
    target.__truncatedKeys = entries.length - LOG_LIMITS.objectKeys;
  }
  return target;
}

// This helper bounds payload size and strips secrets before a value is attached to a log line.
export function sanitizeForLog(value: unknown, depth = 0): unknown {
  if (value === null || value === undefined || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (depth > LOG_LIMITS.depth) {
    return '[depth-limited]';
  }
  if (typeof value === 'string') {
    return shapeString(value);
  }
  if (Array.isArray(value)) {
    const items = value.slice(0, LOG_LIMITS.arrayItems).map((item) => sanitizeForLog(item, depth + 1));
    if (value.length > LOG_LIMITS.arrayItems) {
      items.push(`[truncated-items:${value.length - LOG_LIMITS.arrayItems}]`);
    }
    return items;
  }
  if (typeof value === 'object') {
    return shapeObject(value, depth);
  }
  return String(value);
}

// This helper normalizes unknown errors into a compact, structured shape for logs.
export function errorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof AppError) {
    return {
      name: error.name,
      code: error.code,
      message: shapeString(error.message),
      details: sanitizeForLog(error.details)
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: shapeString(error.message),
      stack: error.stack
    };
  }

  return {
    message: String(error)
  };
}

// This helper builds one Fastify-compatible logger configuration with strict redaction.
export function buildLoggerOptions(level: string): LoggerOptions {
  return {
    level,
    base: {
      service: MCP_SERVER_NAME
    },
    redact: {
      paths: REDACT_PATHS,
      remove: true
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}

// Stdout is the protocol channel in stdio mode, so diagnostics go to stderr.
export function createStderrLogger(level: string): FastifyBaseLogger {
  return pino(buildLoggerOptions(level), pino.destination(2));
}
