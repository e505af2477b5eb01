import { z } from "zod";
import type { CompletionArgs, CompletionOut, Message } from "../types/llm.js";
import { TransportError } from "../orchestrator/errors.js";
import type { ChatTransport } from "./provider.js";

const WireToolCall = z.object({
  id: z.string(),
  type: z.string().optional(),
  function: z.object({ name: z.string(), arguments: z.string().nullish() }),
});

const WireResponse = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          reasoning_content: z.string().nullish(),
          reasoning: z.string().nullish(),
          tool_calls: z.array(WireToolCall).nullish(),
        }),
        finish_reason: z.string().nullish(),
      }),
    )
    .min(1),
  usage: z
    .object({ prompt_tokens: z.number(), completion_tokens: z.number(), total_tokens: z.number() })
    .nullish(),
});

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/** Chat Completions client for OpenAI and any compatible endpoint. */
export class OpenAIChatCompletions implements ChatTransport {
  constructor(
    private apiKey: string,
    private baseUrl: string = "https://api.openai.com/v1",
    private fetchImpl: FetchLike = fetch,
  ) {}

  async complete(args: CompletionArgs): Promise<CompletionOut> {
    const url = `${this.baseUrl.replace(/\/+$/, "")}/chat/completions`;

    const tools = (args.tools ?? []).map((t) => ({
      type: "function",
      function: {
        name: t.name,
        description: t.description || undefined,
        parameters: t.parameters ?? { type: "object", properties: {} },
      },
    }));

    const body = {
      model: args.model,
      messages: args.messages.map(toWire),
      temperature: args.temperature,
      max_tokens: args.max_tokens,
      top_p: args.top_p,
      stop: args.stop,
      tools: tools.length ? tools : undefined,
      tool_choice: tools.length ? "auto" : undefined,
      response_format: args.response_format
        ? {
            type: "json_schema",
            json_schema: { name: args.response_format.name, schema: args.response_format.schema },
          }
        : undefined,
    };

    const res = await this.fetchImpl(url, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(body),
    });
    if (!res.ok) {
      const text = await res.text();
      throw new TransportError(`LLM HTTP ${res.status}: ${text}`, res.status);
    }

    const parsed = WireResponse.safeParse(await res.json());
    if (!parsed.success) {
      throw new TransportError(`Unexpected chat completion payload: ${parsed.error.message}`, res.status, parsed.error);
    }
    const [choice] = parsed.data.choices;
    const msg = choice.message;

    // Normalize back to our internal shape
    const toolCalls = (msg.tool_calls ?? []).map((tc) => ({
      id: tc.id,
      name: tc.function.name,
      arguments: tc.function.arguments || "{}",
    }));

    return {
      content: msg.content ?? null,
      tool_calls: toolCalls.length ? toolCalls : undefined,
      reasoning: msg.reasoning_content ?? msg.reasoning ?? undefined,
      finish_reason: choice.finish_reason ?? undefined,
      usage: parsed.data.usage ?? undefined,
    };
  }
}

function toWire(m: Message) {
  if (m.role === "tool") {
    return { role: "tool", content: m.content, tool_call_id: m.tool_call_id };
  }
  if (m.role === "assistant" && "tool_calls" in m) {
    return {
      role: "assistant",
      content: m.content,
      tool_calls: m.tool_calls.map((tc) => ({
        id: tc.id,
        type: "function",
        function: { name: tc.name, arguments: tc.arguments },
      })),
    };
  }
  // system / user / plain assistant
  return { role: m.role, content: m.content };
}
