import type { JsonValue, Metadata } from './messages.js';

/** Outcome of a tool execution. `error` is set exactly when `success` is false. */
export type ToolResult =
  | { success: true; data: JsonValue; error?: undefined; metadata: Metadata }
  | { success: false; data?: undefined; error: string; metadata: Metadata };

export interface ToolResultInit {
  success: boolean;
  data?: JsonValue;
  error?: string | null;
  metadata?: Metadata;
}

export function createToolResult(init: ToolResultInit): ToolResult {
  const metadata = { ...(init.metadata ?? {}) };
  if (init.success) {
    return { success: true, data: init.data ?? null, metadata };
  }
  if (!init.error) {
    throw new TypeError('Failed ToolResult must have an error message');
  }
  return { success: false, error: init.error, metadata };
}
