import { toolFailed, toolOk, type ToolDescriptor, type ToolProvider, type ToolResult } from "../../types/tools.js";
import { isArgsObject, listRemoteTools, type RemoteProviderOptions } from "./descriptors.js";
import { connectHttp, textOf, type McpSession } from "./session.js";

/** Proxy for an MCP server reachable over Streamable HTTP. */
export class HttpMcpProvider implements ToolProvider {
  constructor(
    private readonly session: McpSession,
    private readonly tools: readonly ToolDescriptor[],
  ) {}

  static async connect(url: string | URL, options: RemoteProviderOptions = {}): Promise<HttpMcpProvider> {
    return HttpMcpProvider.fromSession(await connectHttp(url), options);
  }

  static async fromSession(session: McpSession, options: RemoteProviderOptions = {}): Promise<HttpMcpProvider> {
    return new HttpMcpProvider(session, await listRemoteTools(session, options));
  }

  listTools(): readonly ToolDescriptor[] {
    return this.tools;
  }

  async callTool(name: string, args: unknown): Promise<ToolResult> {
    if (!isArgsObject(args)) return toolFailed("Invalid arguments", undefined, "INVALID_ARGUMENTS");
    const result = await this.session.callTool(name, args);
    if (result.isError) return toolFailed(textOf(result.content) || "Tool execution failed");
    return toolOk(JSON.stringify(result.content));
  }

  close(): Promise<void> {
    return this.session.close();
  }
}
