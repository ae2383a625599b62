/**
 * Tool Dispatch
 *
 * Executes a tool call requested by the generation step. Dispatch is
 * synchronous: the scanner is pure and local, so the orchestrator resumes
 * the generation exchange with the result immediately.
 *
 * Bad arguments and unknown tool names are answered with an error payload so
 * the model can correct itself; only the scanner itself throwing is a
 * ToolError.
 */

import { z } from "zod";
import type { ToolCall } from "../../adapters/llm/types.js";
import type { PIIFlag } from "../../schemas/review.js";
import { scanForPII } from "../../utils/pii-scanner.js";
import { ToolError } from "../errors.js";
import { PII_SCAN_TOOL, getToolDefinition } from "./registry.js";

// ============================================================================
// Types
// ============================================================================

export type Scanner = (text: string) => PIIFlag[];

export type ToolOutput =
  | { ok: true; flags: PIIFlag[] }
  | { ok: false; error: string };

export interface ToolDispatchResult {
  call: ToolCall;
  output: ToolOutput;
}

const PiiScanInput = z.object({ text: z.string() }).strict();

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Dispatch a tool invocation to its handler.
 *
 * @throws ToolError when the scanner throws
 */
export function dispatchTool(call: ToolCall, scanner: Scanner = scanForPII): ToolDispatchResult {
  if (!getToolDefinition(call.name)) {
    return {
      call,
      output: { ok: false, error: `Unknown tool "${call.name}". Available tools: ${PII_SCAN_TOOL}.` },
    };
  }

  const parsed = PiiScanInput.safeParse(call.input);
  if (!parsed.success) {
    return {
      call,
      output: {
        ok: false,
        error: `Invalid arguments for ${PII_SCAN_TOOL}: expected {"text": string}.`,
      },
    };
  }

  try {
    return { call, output: { ok: true, flags: scanner(parsed.data.text) } };
  } catch (error) {
    throw new ToolError(`${PII_SCAN_TOOL} failed`, PII_SCAN_TOOL, error);
  }
}
