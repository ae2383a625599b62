/**
 * Provider-agnostic generation gateway interface.
 *
 * Generation is a two-phase message exchange: the orchestrator sends the
 * instructions plus the transcript so far, and the gateway answers with either
 * a final candidate record or a batch of tool calls. The orchestrator owns the
 * transcript and the tool loop; gateways are stateless between steps.
 */

/**
 * JSON Schema for a tool's input. A type alias (not an interface) so it stays
 * assignable to the SDKs' index-signature parameter types.
 */
export type ToolInputSchema = {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
  additionalProperties?: boolean;
};

export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: ToolInputSchema;
}

/**
 * A tool invocation requested by the model. `input` is untrusted: it is
 * whatever the provider decoded from the model's arguments.
 */
export interface ToolCall {
  id: string;
  name: string;
  input: unknown;
}

export type TranscriptEntry =
  | { role: "user"; content: string }
  | { role: "assistant"; content?: string; tool_calls: ToolCall[] }
  | { role: "tool"; tool_call_id: string; name: string; content: string };

/**
 * Determinism and size controls for one generation step.
 */
export interface GenerationSettings {
  temperature: number;
  /** Honoured by OpenAI; Anthropic has no seed parameter */
  seed?: number;
  maxTokens: number;
}

export interface GenerationStepRequest {
  /** Rubric plus any corrective notes from earlier attempts */
  instructions: string;
  transcript: readonly TranscriptEntry[];
  tools: readonly ToolDefinition[];
  settings: GenerationSettings;
}

export type GenerationTurn =
  | { kind: "final"; candidate: Record<string, unknown> }
  | { kind: "tool_calls"; calls: ToolCall[] };

export interface CallOpts {
  requestId: string;
  timeoutMs: number;
  abortSignal?: AbortSignal;
}

/**
 * All gateways (OpenAI, Anthropic, fixtures) implement this interface.
 *
 * `step` rejects with GenerationError only.
 */
export interface GenerationGateway {
  /**
   * Provider name for telemetry and health output.
   */
  readonly name: string;

  /**
   * Model identifier (provider-specific, e.g. "gpt-4o-mini").
   */
  readonly model: string;

  step(request: GenerationStepRequest, opts: CallOpts): Promise<GenerationTurn>;
}
