export { Agent, DEFAULT_CHAT_OPTIONS, DEFAULT_MAX_ITERATIONS } from "./orchestrator/agent.js";
export type { AgentOptions, RunOptions, RunOutcome, TextRunOptions, UnknownToolPolicy } from "./orchestrator/agent.js";
export { decodeAnswer, responseFormatFor, schemaFor, stripSchemaMeta, structured, text } from "./orchestrator/answer.js";
export type { AnswerShape } from "./orchestrator/answer.js";
export {
  AgentError,
  ConfigError,
  DecodeError,
  IterationLimitError,
  ToolNotFoundError,
  TransportError,
  UnsupportedResponseError,
} from "./orchestrator/errors.js";
export type { AgentErrorCode } from "./orchestrator/errors.js";
export type { ChatTransport } from "./llm/provider.js";
export { OpenAIChatCompletions } from "./llm/openai.js";
export { ToolBox } from "./tools/toolbox.js";
export type { RawToolDef, ToolDef, ToolHandler } from "./tools/toolbox.js";
export { ToolRegistry, publicName } from "./tools/registry.js";
export type { ResolvedTool } from "./tools/registry.js";
export * from "./tools/mcp/index.js";
export { webSearchTools } from "./tools/web/search.js";
export { webFetchTools } from "./tools/web/fetch.js";
export { loadConfig } from "./config.js";
export type { Config } from "./config.js";
export { ConsoleLogger, silentLogger } from "./util/log.js";
export type { Logger, LogLevel } from "./util/log.js";
export * from "./types/llm.js";
export * from "./types/tools.js";
