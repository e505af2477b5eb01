import type { ChatTransport } from "../llm/provider.js";
import type { CompletionArgs, CompletionOut } from "../types/llm.js";
import { toolNotFound, toolOk, type ToolDescriptor, type ToolProvider, type ToolResult } from "../types/tools.js";
import type { McpSession, RemoteCallResult, RemoteTool } from "../tools/mcp/session.js";

type Reply = CompletionOut | ((args: CompletionArgs) => CompletionOut);

/** Replays canned completions in order, then `fallback` (if any) forever. */
export class ScriptedTransport implements ChatTransport {
  readonly requests: CompletionArgs[] = [];

  constructor(
    private readonly replies: Reply[],
    private readonly fallback?: Reply,
  ) {}

  async complete(args: CompletionArgs): Promise<CompletionOut> {
    this.requests.push(args);
    const next = this.replies.shift() ?? this.fallback;
    if (!next) throw new Error("ScriptedTransport ran out of replies");
    return typeof next === "function" ? next(args) : next;
  }
}

export const say = (content: string): CompletionOut => ({ content, finish_reason: "stop" });

export const callTools = (...calls: Array<[id: string, name: string, args?: string]>): CompletionOut => ({
  content: null,
  tool_calls: calls.map(([id, name, args]) => ({ id, name, arguments: args ?? "{}" })),
  finish_reason: "tool_calls",
});

/** Provider that answers every call with `<label>:<name>` and records it. */
export class RecordingProvider implements ToolProvider {
  readonly calls: Array<{ name: string; args: unknown }> = [];

  constructor(
    private readonly label: string,
    private readonly names: string[],
  ) {}

  listTools(): readonly ToolDescriptor[] {
    return this.names.map((name) => ({ name, description: `${this.label} ${name}` }));
  }

  async callTool(name: string, args: unknown): Promise<ToolResult> {
    this.calls.push({ name, args });
    if (!this.names.includes(name)) return toolNotFound(name);
    return toolOk(`${this.label}:${name}`);
  }
}

/** In-process stand-in for an MCP client session. */
export class FakeSession implements McpSession {
  readonly calls: Array<{ name: string; args: Record<string, unknown> }> = [];
  closed = false;

  constructor(
    private readonly tools: RemoteTool[],
    private readonly respond: (name: string, args: Record<string, unknown>) => RemoteCallResult | Promise<RemoteCallResult>,
  ) {}

  async listTools(): Promise<RemoteTool[]> {
    return this.tools;
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<RemoteCallResult> {
    this.calls.push({ name, args });
    return this.respond(name, args);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export const timeTools: RemoteTool[] = [
  {
    name: "get_current_time",
    description: "Get current time in a specific timezone",
    inputSchema: { type: "object", properties: { timezone: { type: "string" } }, required: ["timezone"] },
  },
  {
    name: "convert_time",
    description: "Convert time between timezones",
    inputSchema: { type: "object", properties: { time: { type: "string" } } },
  },
];
