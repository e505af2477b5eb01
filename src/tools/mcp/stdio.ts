import {
  toolFailed,
  toolNotFound,
  toolOk,
  type ToolDescriptor,
  type ToolProvider,
  type ToolResult,
} from "../../types/tools.js";
import { isArgsObject, listRemoteTools, type RemoteProviderOptions } from "./descriptors.js";
import { connectStdio, textOf, type McpSession, type StdioServerParams } from "./session.js";

/**
 * Proxy for an MCP server spawned as a child process. Tools are listed once
 * at connect time.
 */
export class StdioMcpProvider implements ToolProvider {
  constructor(
    private readonly session: McpSession,
    private readonly tools: readonly ToolDescriptor[],
  ) {}

  static async connect(params: StdioServerParams, options: RemoteProviderOptions = {}): Promise<StdioMcpProvider> {
    const session = await connectStdio(params);
    return StdioMcpProvider.fromSession(session, options);
  }

  static async fromSession(session: McpSession, options: RemoteProviderOptions = {}): Promise<StdioMcpProvider> {
    return new StdioMcpProvider(session, await listRemoteTools(session, options));
  }

  listTools(): readonly ToolDescriptor[] {
    return this.tools;
  }

  async callTool(name: string, args: unknown): Promise<ToolResult> {
    if (!isArgsObject(args)) return toolFailed("Invalid arguments", undefined, "INVALID_ARGUMENTS");
    const result = await this.session.callTool(name, args);
    if (result.isError) {
      const message = textOf(result.content) || "Unknown error";
      if (message.includes("Unknown tool")) return toolNotFound(name);
      return toolFailed(`Tool error: ${message}`);
    }
    return toolOk(JSON.stringify(result.content));
  }

  close(): Promise<void> {
    return this.session.close();
  }
}
