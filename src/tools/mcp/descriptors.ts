import { TOOL_NAME_PATTERN, type ToolDescriptor } from "../../types/tools.js";
import { silentLogger, type Logger } from "../../util/log.js";
import type { McpSession } from "./session.js";

export interface RemoteProviderOptions {
  /** Only expose these server tools; everything when absent. */
  allow?: readonly string[];
  logger?: Logger;
}

/**
 * Server tools as descriptors. Names chat backends would refuse are left out
 * with a warning rather than sinking every request that carries them.
 */
export async function listRemoteTools(session: McpSession, options: RemoteProviderOptions = {}): Promise<ToolDescriptor[]> {
  const allow = options.allow ? new Set(options.allow) : undefined;
  const logger = options.logger ?? silentLogger;
  return (await session.listTools())
    .filter((t) => !allow || allow.has(t.name))
    .filter((t) => {
      if (TOOL_NAME_PATTERN.test(t.name)) return true;
      logger.warn(`skipping remote tool '${t.name}': use letters, digits, '_' or '-'`);
      return false;
    })
    .map((t) => ({ name: t.name, description: t.description, schema: t.inputSchema }));
}

export function isArgsObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
