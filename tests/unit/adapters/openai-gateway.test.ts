import { describe, it, expect } from "vitest";
import type OpenAI from "openai";
import { OpenAIGateway, type ChatCompletionsClient } from "../../../src/adapters/llm/openai.js";
import type { GenerationStepRequest } from "../../../src/adapters/llm/types.js";
import { getToolDefinitions } from "../../../src/orchestrator/tools/registry.js";
import { GenerationError } from "../../../src/orchestrator/errors.js";

type Body = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;

function completion(message: Partial<OpenAI.Chat.ChatCompletionMessage>): OpenAI.Chat.ChatCompletion {
  const fullMessage = { role: "assistant" as const, content: null, refusal: null, ...message };
  const choice = { index: 0, finish_reason: "stop" as const, logprobs: null, message: fullMessage };
  const usage = { prompt_tokens: 12, completion_tokens: 8, total_tokens: 20 };
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 0,
    model: "gpt-test",
    choices: [choice],
    usage,
  };
}

class FakeChatClient implements ChatCompletionsClient {
  readonly calls: Array<{ body: Body; signal?: AbortSignal }> = [];

  constructor(private readonly responses: OpenAI.Chat.ChatCompletion[]) {}

  async create(body: Body, options?: { signal?: AbortSignal }): Promise<OpenAI.Chat.ChatCompletion> {
    this.calls.push({ body, ...(options?.signal ? { signal: options.signal } : {}) });
    const next = this.responses.shift();
    if (!next) throw new Error("no scripted response left");
    return next;
  }
}

function request(overrides: Partial<GenerationStepRequest> = {}): GenerationStepRequest {
  return {
    instructions: "Review the question.",
    transcript: [{ role: "user", content: "Fix this SQL?" }],
    tools: getToolDefinitions(),
    settings: { temperature: 0, maxTokens: 500 },
    ...overrides,
  };
}

const opts = { requestId: "req-1", timeoutMs: 5_000 };

describe("OpenAIGateway", () => {
  it("sends instructions, transcript, JSON mode and tools", async () => {
    const client = new FakeChatClient([completion({ content: '{"a":1}' })]);
    const gateway = new OpenAIGateway(client, "gpt-test");

    await gateway.step(request({ settings: { temperature: 0.2, seed: 7, maxTokens: 500 } }), opts);

    const sent = client.calls[0];
    expect(sent?.body.model).toBe("gpt-test");
    expect(sent?.body.messages).toEqual([
      { role: "system", content: "Review the question." },
      { role: "user", content: "Fix this SQL?" },
    ]);
    expect(sent?.body.temperature).toBe(0.2);
    expect(sent?.body.seed).toBe(7);
    expect(sent?.body.max_tokens).toBe(500);
    expect(sent?.body.response_format).toEqual({ type: "json_object" });
    expect(sent?.body.tools?.map((t) => t.function.name)).toEqual(["pii_scan"]);
    expect(sent?.signal).toBeInstanceOf(AbortSignal);
  });

  it("omits seed and tools when not given", async () => {
    const client = new FakeChatClient([completion({ content: '{"a":1}' })]);
    const gateway = new OpenAIGateway(client, "gpt-test");

    await gateway.step(request({ tools: [] }), opts);

    const body = client.calls[0]?.body;
    expect(body).toBeDefined();
    expect(body && "seed" in body).toBe(false);
    expect(body && "tools" in body).toBe(false);
  });

  it("returns a final candidate", async () => {
    const gateway = new OpenAIGateway(new FakeChatClient([completion({ content: '{"a":1}' })]), "gpt-test");
    await expect(gateway.step(request(), opts)).resolves.toEqual({ kind: "final", candidate: { a: 1 } });
  });

  it("returns decoded tool calls", async () => {
    const toolCall = {
      id: "call_1",
      type: "function" as const,
      function: { name: "pii_scan", arguments: '{"text":"Fix this SQL?"}' },
    };
    const gateway = new OpenAIGateway(new FakeChatClient([completion({ tool_calls: [toolCall] })]), "gpt-test");

    await expect(gateway.step(request(), opts)).resolves.toEqual({
      kind: "tool_calls",
      calls: [{ id: "call_1", name: "pii_scan", input: { text: "Fix this SQL?" } }],
    });
  });

  it("maps tool exchanges back into messages", async () => {
    const client = new FakeChatClient([completion({ content: '{"a":1}' })]);
    const gateway = new OpenAIGateway(client, "gpt-test");

    await gateway.step(
      request({
        transcript: [
          { role: "user", content: "Fix this SQL?" },
          { role: "assistant", tool_calls: [{ id: "call_1", name: "pii_scan", input: { text: "Fix this SQL?" } }] },
          { role: "tool", tool_call_id: "call_1", name: "pii_scan", content: '{"ok":true,"flags":[]}' },
        ],
      }),
      opts
    );

    expect(client.calls[0]?.body.messages.slice(2)).toEqual([
      {
        role: "assistant",
        content: null,
        tool_calls: [
          { id: "call_1", type: "function", function: { name: "pii_scan", arguments: '{"text":"Fix this SQL?"}' } },
        ],
      },
      { role: "tool", tool_call_id: "call_1", content: '{"ok":true,"flags":[]}' },
    ]);
  });

  it("fails with empty_response when there is no content", async () => {
    const gateway = new OpenAIGateway(new FakeChatClient([completion({ content: "" })]), "gpt-test");
    const failure = gateway.step(request(), opts);
    await expect(failure).rejects.toBeInstanceOf(GenerationError);
    await expect(failure).rejects.toMatchObject({ reason: "empty_response", provider: "openai" });
  });

  it("classifies SDK failures", async () => {
    const client: ChatCompletionsClient = {
      create: async () => {
        throw Object.assign(new Error("Rate limit reached"), { status: 429 });
      },
    };
    const gateway = new OpenAIGateway(client, "gpt-test");
    await expect(gateway.step(request(), opts)).rejects.toMatchObject({ reason: "rate_limited" });
  });
});
