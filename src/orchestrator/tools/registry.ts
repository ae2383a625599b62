/**
 * Tool Registry
 *
 * Tool definitions exposed to the generation step. The deterministic PII
 * scanner is the only capability; the model may call it mid-reasoning and
 * receives the flag set back as a tool result.
 */

import type { ToolDefinition } from "../../adapters/llm/types.js";

export const PII_SCAN_TOOL = "pii_scan";

// ============================================================================
// Tool Definitions (LLM-visible)
// ============================================================================

const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  {
    name: PII_SCAN_TOOL,
    description:
      "Deterministically scan text for personal data. Returns the flags found: email, phone, card-ish. Use it on the question before deciding the review's flags.",
    input_schema: {
      type: "object",
      properties: {
        text: {
          type: "string",
          description: "The text to scan.",
        },
      },
      required: ["text"],
      additionalProperties: false,
    },
  },
];

// ============================================================================
// Registry API
// ============================================================================

/**
 * Get all LLM-visible tool definitions.
 */
export function getToolDefinitions(): readonly ToolDefinition[] {
  return TOOL_DEFINITIONS;
}

/**
 * Get a specific tool definition by name.
 */
export function getToolDefinition(name: string): ToolDefinition | undefined {
  return TOOL_DEFINITIONS.find((t) => t.name === name);
}
