import OpenAI from "openai";
import { log, emit, TelemetryEvents } from "../../utils/telemetry.js";
import { callUpstream } from "./errors.js";
import { decodeToolArguments, parseCandidateContent } from "./candidate.js";
import type {
  CallOpts,
  GenerationGateway,
  GenerationStepRequest,
  GenerationTurn,
  ToolCall,
  ToolDefinition,
  TranscriptEntry,
} from "./types.js";

export const OPENAI_DEFAULT_MODEL = "gpt-4o-mini";

/**
 * The slice of the OpenAI SDK this gateway calls. `new OpenAI().chat.completions`
 * satisfies it; tests pass an in-process fake.
 */
export interface ChatCompletionsClient {
  create(
    body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
    options?: { signal?: AbortSignal }
  ): Promise<OpenAI.Chat.ChatCompletion>;
}

/**
 * Build the SDK client with automatic retries disabled; the review
 * orchestrator owns the retry budget.
 */
export function createOpenAIClient(apiKey: string): ChatCompletionsClient {
  return new OpenAI({ apiKey, maxRetries: 0 }).chat.completions;
}

function toOpenAITools(tools: readonly ToolDefinition[]): OpenAI.Chat.ChatCompletionTool[] {
  return tools.map((def) => ({
    type: "function",
    function: {
      name: def.name,
      description: def.description,
      parameters: def.input_schema,
    },
  }));
}

function encodeArguments(input: unknown): string {
  return typeof input === "string" ? input : JSON.stringify(input ?? {});
}

function toOpenAIMessages(
  instructions: string,
  transcript: readonly TranscriptEntry[]
): OpenAI.Chat.ChatCompletionMessageParam[] {
  const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [{ role: "system", content: instructions }];

  for (const entry of transcript) {
    switch (entry.role) {
      case "user":
        messages.push({ role: "user", content: entry.content });
        break;
      case "assistant":
        messages.push({
          role: "assistant",
          content: entry.content ?? null,
          tool_calls: entry.tool_calls.map((call) => ({
            id: call.id,
            type: "function",
            function: { name: call.name, arguments: encodeArguments(call.input) },
          })),
        });
        break;
      case "tool":
        messages.push({ role: "tool", tool_call_id: entry.tool_call_id, content: entry.content });
        break;
    }
  }

  return messages;
}

export class OpenAIGateway implements GenerationGateway {
  readonly name = "openai";

  constructor(
    private readonly client: ChatCompletionsClient,
    readonly model: string = OPENAI_DEFAULT_MODEL
  ) {}

  async step(request: GenerationStepRequest, opts: CallOpts): Promise<GenerationTurn> {
    const { instructions, transcript, tools, settings } = request;
    const startTime = Date.now();

    log.debug(
      { provider: this.name, model: this.model, request_id: opts.requestId, transcript_entries: transcript.length },
      "calling OpenAI for review step"
    );

    const response = await callUpstream(this.name, "review_step", opts, (signal) =>
      this.client.create(
        {
          model: this.model,
          messages: toOpenAIMessages(instructions, transcript),
          temperature: settings.temperature,
          response_format: { type: "json_object" },
          max_tokens: settings.maxTokens,
          ...(settings.seed !== undefined ? { seed: settings.seed } : {}),
          ...(tools.length > 0 ? { tools: toOpenAITools(tools) } : {}),
        },
        { signal }
      )
    );

    emit(TelemetryEvents.GenerationStepCompleted, {
      provider: this.name,
      model: this.model,
      elapsed_ms: Date.now() - startTime,
      input_tokens: response.usage?.prompt_tokens ?? 0,
      output_tokens: response.usage?.completion_tokens ?? 0,
    });

    const message = response.choices[0]?.message;
    const toolCalls = message?.tool_calls ?? [];
    if (toolCalls.length > 0) {
      const calls: ToolCall[] = toolCalls.map((call) => ({
        id: call.id,
        name: call.function.name,
        input: decodeToolArguments(call.function.arguments),
      }));
      return { kind: "tool_calls", calls };
    }

    const candidate = parseCandidateContent(message?.content, {
      provider: this.name,
      model: this.model,
      requestId: opts.requestId,
    });
    return { kind: "final", candidate };
  }
}
