import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { z } from "zod";
import type { JsonSchema } from "../../types/tools.js";

export interface RemoteTool {
  name: string;
  description?: string;
  inputSchema: JsonSchema;
}

const ContentItem = z.object({ type: z.string() }).passthrough();

const CallResult = z
  .object({
    content: z.array(ContentItem).default([]),
    isError: z.boolean().optional(),
  })
  .passthrough();

export type RemoteContent = z.infer<typeof ContentItem>;
export type RemoteCallResult = z.infer<typeof CallResult>;

/** The slice of an MCP client session the providers depend on. */
export interface McpSession {
  listTools(): Promise<RemoteTool[]>;
  callTool(name: string, args: Record<string, unknown>): Promise<RemoteCallResult>;
  close(): Promise<void>;
}

export interface StdioServerParams {
  command: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
}

const CLIENT_INFO = { name: "toolchat", version: "0.1.0" };

export async function connectStdio(params: StdioServerParams): Promise<McpSession> {
  const client = new Client(CLIENT_INFO);
  await client.connect(new StdioClientTransport(params));
  return sessionFrom(client);
}

export async function connectHttp(url: string | URL): Promise<McpSession> {
  const client = new Client(CLIENT_INFO);
  await client.connect(new StreamableHTTPClientTransport(new URL(url)));
  return sessionFrom(client);
}

function sessionFrom(client: Client): McpSession {
  return {
    async listTools() {
      const tools: RemoteTool[] = [];
      let cursor: string | undefined;
      do {
        const page = await client.listTools(cursor ? { cursor } : undefined);
        for (const t of page.tools) {
          tools.push({ name: t.name, description: t.description, inputSchema: { ...t.inputSchema } });
        }
        cursor = page.nextCursor;
      } while (cursor);
      return tools;
    },
    async callTool(name, args) {
      return CallResult.parse(await client.callTool({ name, arguments: args }));
    },
    close: () => client.close(),
  };
}

/** Text parts of a result, newline-joined. */
export function textOf(content: readonly RemoteContent[]): string {
  return content
    .map((c) => (c.type === "text" && typeof c.text === "string" ? c.text : ""))
    .filter(Boolean)
    .join("\n");
}
