// This module validates tool arguments and runs the website fetch behind each catalog entry.

import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import type { HttpClients } from '../fetcher/runtime.js';
import type { ContentBlock, ToolCallResult } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import { isPlainObject } from '../utils/json.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { findTool, toolSchemas, type FetchArguments, type ToolDescriptor } from './tool-schemas.js';

export interface ToolRuntimeContext {
  sessionId: string;
  clients: HttpClients;
  logger: FastifyBaseLogger;
  // Aborted when the session closes; in-flight fetches unwind with it.
  signal?: AbortSignal;
  timeoutMs?: number | null;
}

// This helper converts schema failures into the missing/invalid argument split peers can act on.
function parseToolArguments(tool: ToolDescriptor, args: unknown): FetchArguments {
  // Anything other than an object carries no url at all.
  const candidate = isPlainObject(args) ? args : {};

  const parsed = toolSchemas[tool.name].safeParse(candidate);
  if (parsed.success) {
    return parsed.data;
  }

  const missing = parsed.error.issues.find(
    (issue) => issue.code === z.ZodIssueCode.invalid_type && issue.received === z.ZodParsedType.undefined
  );
  if (missing) {
    const argument = missing.path.join('.');
    throw new AppError(400, 'missing_argument', `Missing required argument '${argument}'`, {
      tool: tool.name,
      argument
    });
  }

  throw new AppError(400, 'invalid_argument', 'Tool input validation failed.', {
    tool: tool.name,
    fieldErrors: parsed.error.flatten().fieldErrors
  });
}

// Both catalog entries share this path; only the client policy differs.
async function fetchWebsite(tool: ToolDescriptor, args: FetchArguments, context: ToolRuntimeContext): Promise<ContentBlock[]> {
  const client = context.clients[tool.clientPolicy];
  const response = await client.getText(args.url, {
    signal: context.signal,
    timeoutMs: context.timeoutMs
  });

  return [{ type: 'text', text: response.text }];
}

// This function dispatches one tool call and returns its content blocks or throws a typed AppError.
export async function executeTool(toolName: string, args: unknown, context: ToolRuntimeContext): Promise<ToolCallResult> {
  const startedAt = Date.now();
  context.logger.info(
    {
      event: 'mcp_tool_execution_started',
      sessionId: context.sessionId,
      toolName,
      args: sanitizeForLog(args)
    },
    'mcp_tool_execution_started'
  );

  const tool = findTool(toolName);
  if (!tool) {
    context.logger.warn(
      {
        event: 'mcp_tool_not_found',
        sessionId: context.sessionId,
        toolName
      },
      'mcp_tool_not_found'
    );
    throw new AppError(404, 'unknown_tool', `Unknown tool: ${toolName}`, { tool: toolName });
  }

  try {
    const validArgs = parseToolArguments(tool, args);
    const content = await fetchWebsite(tool, validArgs, context);

    context.logger.info(
      {
        event: 'mcp_tool_execution_completed',
        sessionId: context.sessionId,
        toolName,
        clientPolicy: tool.clientPolicy,
        durationMs: Date.now() - startedAt,
        contentBlocks: content.length
      },
      'mcp_tool_execution_completed'
    );

    return { content };
  } catch (error) {
    context.logger.error(
      {
        event: 'mcp_tool_execution_failed',
        sessionId: context.sessionId,
        toolName,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      },
      'mcp_tool_execution_failed'
    );

    throw error;
  }
}
