export type JsonSchema = Record<string, unknown>;

export interface ToolDescriptor {
  name: string;
  description?: string;
  schema?: JsonSchema;
  /** Provider-private; never sent to the backend. */
  config?: unknown;
}

export type ToolErrorCode =
  | "TOOL_NOT_FOUND"
  | "TOOL_EXECUTION_FAILED"
  | "TOOL_DEFINITIONS_NOT_READY"
  | "INVALID_ARGUMENTS";

export class ToolError extends Error {
  constructor(
    message: string,
    public readonly code: ToolErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ToolError";
  }
}

export type ToolResult =
  | { readonly ok: true; readonly output: string }
  | { readonly ok: false; readonly error: ToolError };

/**
 * A source of tools. A rejected `callTool` means the provider itself broke
 * (lost session, transport failure); a tool that ran and failed resolves
 * with `ok: false`.
 */
export interface ToolProvider {
  listTools(): readonly ToolDescriptor[];
  callTool(name: string, args: unknown): Promise<ToolResult>;
}

export const TOOL_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export function toolOk(output: string): ToolResult {
  return { ok: true, output };
}

export function toolNotFound(name: string): ToolResult {
  return { ok: false, error: new ToolError(`Tool named '${name}' not found`, "TOOL_NOT_FOUND") };
}

export function toolFailed(message: string, cause?: unknown, code: ToolErrorCode = "TOOL_EXECUTION_FAILED"): ToolResult {
  return { ok: false, error: new ToolError(message, code, cause) };
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
