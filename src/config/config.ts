// This module resolves process configuration from command-line flags and environment variables.

import { parseArgs } from 'node:util';
import { z } from 'zod';
import { MAX_TIMEOUT_MS } from '../fetcher/client.js';
import { AppError } from '../utils/errors.js';
import { DEFAULT_USER_AGENT } from '../version.js';

export const USAGE = `Usage: mcp-website-fetcher [options]

Options:
  --transport <stdio|sse>  Transport to serve on (default: stdio, env MCP_TRANSPORT)
  --port <number>          Port to listen on for SSE (default: 8000, env PORT)
  --timeout-ms <number>    Deadline for each outbound fetch (default: none, env FETCH_TIMEOUT_MS)
  --log-level <level>      pino log level (default: info, env LOG_LEVEL)
  -h, --help               Show this message
`;

// The SSE listener only ever binds loopback; the server trusts its single peer.
export const LOOPBACK_HOST = '127.0.0.1';

export const serverConfigSchema = z.object({
  transport: z.enum(['stdio', 'sse']).default('stdio'),
  port: z.coerce.number().int().min(1).max(65535).default(8000),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  fetchTimeoutMs: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_TIMEOUT_MS, `timeout must not exceed ${MAX_TIMEOUT_MS} ms`)
    .nullable()
    .default(null),
  userAgent: z.string().trim().min(1).default(DEFAULT_USER_AGENT),
  sseMaxQueuedMessages: z.coerce.number().int().min(1).max(1024).default(32)
});

export type ServerConfig = z.infer<typeof serverConfigSchema> & { host: typeof LOOPBACK_HOST };

export interface LoadedConfig {
  config: ServerConfig;
  help: boolean;
}

// Blank environment values count as unset.
function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: false,
      strict: true,
      options: {
        transport: { type: 'string' },
        port: { type: 'string' },
        'timeout-ms': { type: 'string' },
        'log-level': { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false }
      }
    }).values;
  } catch (error) {
    throw new AppError(400, 'invalid_config', error instanceof Error ? error.message : 'Invalid command-line flags.');
  }
}

// This function merges flags over environment values and validates the result.
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const flags = parseFlags(argv);

  const parsed = serverConfigSchema.safeParse({
    transport: flags.transport ?? envValue(env, 'MCP_TRANSPORT'),
    port: flags.port ?? envValue(env, 'PORT'),
    logLevel: flags['log-level'] ?? envValue(env, 'LOG_LEVEL'),
    fetchTimeoutMs: flags['timeout-ms'] ?? envValue(env, 'FETCH_TIMEOUT_MS'),
    userAgent: envValue(env, 'FETCH_USER_AGENT'),
    sseMaxQueuedMessages: envValue(env, 'SSE_MAX_QUEUED_MESSAGES')
  });

  if (!parsed.success) {
    const fieldErrors = parsed.error.flatten().fieldErrors;
    const summary = Object.entries(fieldErrors)
      .map(([field, messages]) => `${field}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    throw new AppError(400, 'invalid_config', `Invalid configuration (${summary}).`, { fieldErrors });
  }

  return {
    config: { ...parsed.data, host: LOOPBACK_HOST },
    help: flags.help === true
  };
}
