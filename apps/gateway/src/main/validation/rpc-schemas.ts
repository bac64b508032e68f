/**
 * Zod schemas for JSON-RPC messages and MCP method results read off the wire.
 */
import { z } from 'zod';

// ============================================================================
// JSON-RPC Envelope
// ============================================================================

export const JsonRpcIdSchema = z.union([z.string(), z.number()]);

export const JsonRpcErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const JsonRpcInboundSchema = z.object({
  jsonrpc: z.string().optional(),
  id: JsonRpcIdSchema.nullish(),
  method: z.string().optional(),
  params: z.unknown().optional(),
  result: z.unknown().optional(),
  error: JsonRpcErrorSchema.optional(),
});

// ============================================================================
// MCP Results
// ============================================================================

export const RemoteToolSchema = z.object({
  name: z.string(),
  description: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
  inputSchema: z
    .record(z.unknown())
    .nullish()
    .transform((value) => value ?? undefined),
});

export const ToolsListResultSchema = z.object({
  tools: z
    .array(RemoteToolSchema)
    .nullish()
    .transform((value) => value ?? []),
});

export const ToolContentPartSchema = z
  .object({
    type: z
      .string()
      .nullish()
      .transform((value) => value ?? ''),
    text: z.string().optional(),
  })
  .passthrough();

export const ToolCallResultSchema = z.object({
  content: z
    .array(ToolContentPartSchema)
    .nullish()
    .transform((value) => value ?? []),
  structuredContent: z.unknown().optional(),
  isError: z
    .boolean()
    .nullish()
    .transform((value) => value ?? false),
});
