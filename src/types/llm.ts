import type { JsonSchema } from "./tools.js";

export type Role = "system" | "user" | "assistant" | "tool";

export interface SystemMessage {
  role: "system";
  content: string;
}

export interface UserMessage {
  role: "user";
  content: string;
}

export interface AssistantMessage {
  role: "assistant";
  content: string;
}

/** Every tool call the model asked for in one turn, in emission order. */
export interface ToolCallsMessage {
  role: "assistant";
  content: string;
  tool_calls: ToolCallOut[];
}

export interface ToolMessage {
  role: "tool";
  tool_call_id: string;
  content: string;
}

export type Message =
  | SystemMessage
  | UserMessage
  | AssistantMessage
  | ToolCallsMessage
  | ToolMessage;

export interface ToolDefForLLM {
  name: string;
  description?: string;
  parameters?: JsonSchema;
}

export interface ChatOptions {
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
  stop?: string[];
}

export interface ResponseFormat {
  type: "json_schema";
  name: string;
  schema: JsonSchema;
}

export interface CompletionArgs extends ChatOptions {
  model: string;
  messages: readonly Message[];
  tools?: ToolDefForLLM[];
  response_format?: ResponseFormat;
}

export interface ToolCallOut {
  id: string;
  name: string;
  /** Raw JSON text as emitted by the backend. */
  arguments: string;
}

export interface CompletionOut {
  /** `null` when the backend produced no text part at all. */
  content: string | null;
  tool_calls?: ToolCallOut[];
  reasoning?: string;
  finish_reason?: string;
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
}

export function isToolCallsMessage(m: Message): m is ToolCallsMessage {
  return m.role === "assistant" && "tool_calls" in m;
}
