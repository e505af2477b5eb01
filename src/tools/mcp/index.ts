export { StdioMcpProvider } from "./stdio.js";
export { HttpMcpProvider } from "./http.js";
export { connectStdio, connectHttp, textOf } from "./session.js";
export type { McpSession, RemoteTool, RemoteCallResult, StdioServerParams } from "./session.js";
export type { RemoteProviderOptions } from "./descriptors.js";
