import Anthropic from "@anthropic-ai/sdk";
import { log, emit, TelemetryEvents } from "../../utils/telemetry.js";
import { callUpstream } from "./errors.js";
import { parseCandidateContent } from "./candidate.js";
import type {
  CallOpts,
  GenerationGateway,
  GenerationStepRequest,
  GenerationTurn,
  ToolCall,
  ToolDefinition,
  TranscriptEntry,
} from "./types.js";

export const ANTHROPIC_DEFAULT_MODEL = "claude-3-5-haiku-latest";

/** Anthropic accepts temperatures in [0, 1] only */
const ANTHROPIC_MAX_TEMPERATURE = 1;

/**
 * The slice of the Anthropic SDK this gateway calls. `new Anthropic().messages`
 * satisfies it; tests pass an in-process fake.
 */
export interface MessagesClient {
  create(
    body: Anthropic.MessageCreateParamsNonStreaming,
    options?: { signal?: AbortSignal }
  ): Promise<Anthropic.Message>;
}

/**
 * Build the SDK client with automatic retries disabled; the review
 * orchestrator owns the retry budget.
 */
export function createAnthropicClient(apiKey: string): MessagesClient {
  return new Anthropic({ apiKey, maxRetries: 0 }).messages;
}

function toAnthropicTools(tools: readonly ToolDefinition[]): Anthropic.Tool[] {
  return tools.map((def) => ({
    name: def.name,
    description: def.description,
    input_schema: def.input_schema,
  }));
}

/**
 * Convert the transcript to Anthropic messages.
 *
 * Consecutive tool results are grouped into a single user message of
 * tool_result blocks, answering the preceding assistant tool_use turn.
 */
function toAnthropicMessages(transcript: readonly TranscriptEntry[]): Anthropic.MessageParam[] {
  const messages: Anthropic.MessageParam[] = [];
  let pendingResults: Anthropic.ToolResultBlockParam[] = [];

  const flushResults = () => {
    if (pendingResults.length > 0) {
      messages.push({ role: "user", content: pendingResults });
      pendingResults = [];
    }
  };

  for (const entry of transcript) {
    switch (entry.role) {
      case "user":
        flushResults();
        messages.push({ role: "user", content: entry.content });
        break;
      case "assistant": {
        flushResults();
        const blocks: Array<Anthropic.TextBlockParam | Anthropic.ToolUseBlockParam> = [];
        if (entry.content) {
          blocks.push({ type: "text", text: entry.content });
        }
        for (const call of entry.tool_calls) {
          blocks.push({ type: "tool_use", id: call.id, name: call.name, input: call.input ?? {} });
        }
        messages.push({ role: "assistant", content: blocks });
        break;
      }
      case "tool":
        pendingResults.push({ type: "tool_result", tool_use_id: entry.tool_call_id, content: entry.content });
        break;
    }
  }
  flushResults();

  return messages;
}

export class AnthropicGateway implements GenerationGateway {
  readonly name = "anthropic";

  constructor(
    private readonly client: MessagesClient,
    readonly model: string = ANTHROPIC_DEFAULT_MODEL
  ) {}

  async step(request: GenerationStepRequest, opts: CallOpts): Promise<GenerationTurn> {
    const { instructions, transcript, tools, settings } = request;
    const startTime = Date.now();

    log.debug(
      { provider: this.name, model: this.model, request_id: opts.requestId, transcript_entries: transcript.length },
      "calling Anthropic for review step"
    );

    // No seed parameter on this API; settings.seed is ignored
    const response = await callUpstream(this.name, "review_step", opts, (signal) =>
      this.client.create(
        {
          model: this.model,
          system: instructions,
          messages: toAnthropicMessages(transcript),
          temperature: Math.min(settings.temperature, ANTHROPIC_MAX_TEMPERATURE),
          max_tokens: settings.maxTokens,
          ...(tools.length > 0 ? { tools: toAnthropicTools(tools) } : {}),
        },
        { signal }
      )
    );

    emit(TelemetryEvents.GenerationStepCompleted, {
      provider: this.name,
      model: this.model,
      elapsed_ms: Date.now() - startTime,
      input_tokens: response.usage.input_tokens,
      output_tokens: response.usage.output_tokens,
    });

    const textParts: string[] = [];
    const calls: ToolCall[] = [];
    for (const block of response.content) {
      if (block.type === "text") {
        textParts.push(block.text);
      } else if (block.type === "tool_use") {
        calls.push({ id: block.id, name: block.name, input: block.input });
      }
    }

    if (calls.length > 0) {
      return { kind: "tool_calls", calls };
    }

    const candidate = parseCandidateContent(textParts.join("\n"), {
      provider: this.name,
      model: this.model,
      requestId: opts.requestId,
    });
    return { kind: "final", candidate };
  }
}
