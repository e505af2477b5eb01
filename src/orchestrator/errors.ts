export type AgentErrorCode =
  | "TOOL_NOT_FOUND"
  | "DECODE_FAILED"
  | "ITERATION_LIMIT"
  | "UNSUPPORTED_RESPONSE"
  | "TRANSPORT_FAILED"
  | "CONFIG_INVALID";

/** Fatal failures of a run. Tool execution failures never surface as these. */
export class AgentError extends Error {
  constructor(
    message: string,
    public readonly code: AgentErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "AgentError";
  }
}

export class ToolNotFoundError extends AgentError {
  constructor(
    public readonly toolName: string,
    public readonly callId: string,
    cause?: unknown,
  ) {
    super(`No tool found for '${toolName}' (call ${callId})`, "TOOL_NOT_FOUND", cause);
    this.name = "ToolNotFoundError";
  }
}

export class DecodeError extends AgentError {
  constructor(
    public readonly raw: string,
    cause?: unknown,
  ) {
    super(`Unable to decode answer: ${describe(cause)}`, "DECODE_FAILED", cause);
    this.name = "DecodeError";
  }
}

export class IterationLimitError extends AgentError {
  constructor(public readonly maxIterations: number) {
    super(`Unable to get response in ${maxIterations} tries`, "ITERATION_LIMIT");
    this.name = "IterationLimitError";
  }
}

export class UnsupportedResponseError extends AgentError {
  constructor(detail: string) {
    super(`Unsupported message content: ${detail}`, "UNSUPPORTED_RESPONSE");
    this.name = "UnsupportedResponseError";
  }
}

export class TransportError extends AgentError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, "TRANSPORT_FAILED", cause);
    this.name = "TransportError";
  }
}

export class ConfigError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_INVALID", cause);
    this.name = "ConfigError";
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
