// This module defines the fixed tool catalog and the argument schemas checked before any fetch runs.

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { ClientPolicy } from '../fetcher/client.js';
import type { McpTool } from '../types/mcp.js';

const HTTP_URL_PATTERN = /^https?:\/\//;

function urlArgument(description: string) {
  return z
    .string()
    .url('url must be an absolute URL.')
    .regex(HTTP_URL_PATTERN, 'url must use http or https.')
    .describe(description);
}

// Extra keys are accepted and ignored, as the advertised schema says.
export const fetchSchema = z
  .object({
    url: urlArgument('URL to fetch')
  })
  .passthrough();

export const fetchViaSslSchema = z
  .object({
    url: urlArgument('URL to fetch over SSL')
  })
  .passthrough();

export type FetchArguments = z.infer<typeof fetchSchema>;

export const toolSchemas = {
  fetch: fetchSchema,
  fetch_web_content_via_ssl: fetchViaSslSchema
} as const;

export type ToolName = keyof typeof toolSchemas;

export interface ToolDescriptor extends McpTool {
  readonly name: ToolName;
  // Internal only: which client issues the request. Never sent to peers.
  readonly clientPolicy: ClientPolicy;
}

const catalogEntries: Array<{ name: ToolName; title: string; description: string; clientPolicy: ClientPolicy }> = [
  {
    name: 'fetch',
    title: 'Website Fetcher',
    description: 'Fetches a website and returns its content',
    clientPolicy: 'default'
  },
  {
    name: 'fetch_web_content_via_ssl',
    title: 'Website Fetcher via SSL',
    description: 'Fetches a website and returns its content using a secure SSL connection',
    clientPolicy: 'secure'
  }
];

const TOOL_CATALOG: readonly ToolDescriptor[] = Object.freeze(
  catalogEntries.map((entry) =>
    Object.freeze({
      ...entry,
      inputSchema: Object.freeze(
        zodToJsonSchema(toolSchemas[entry.name], { $refStrategy: 'none' }) as Record<string, unknown>
      )
    })
  )
);

// The catalog is built once at module load and shared read-only by every session.
export function listTools(): readonly ToolDescriptor[] {
  return TOOL_CATALOG;
}

export function findTool(name: string): ToolDescriptor | undefined {
  return TOOL_CATALOG.find((tool) => tool.name === name);
}

// This helper strips internal descriptor fields so discovery output matches the MCP tool shape.
export function buildToolList(): McpTool[] {
  return TOOL_CATALOG.map((tool) => ({
    name: tool.name,
    title: tool.title,
    description: tool.description,
    inputSchema: tool.inputSchema
  }));
}
