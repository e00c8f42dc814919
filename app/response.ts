import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { normalizeError } from '@/lib/errors';

export function success(payload: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }] };
}

export function failure(error: unknown): CallToolResult {
  const normalized = normalizeError(error);
  return {
    isError: true,
    content: [{ type: 'text', text: JSON.stringify(normalized.toPayload(), null, 2) }],
  };
}
