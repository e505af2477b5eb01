import type { ToolDescriptor, ToolProvider, ToolResult } from "../types/tools.js";
import { toolNotFound } from "../types/tools.js";
import { ToolBox, type RawToolDef, type ToolDef, type ToolHandler } from "./toolbox.js";

const SEPARATOR = "-";

export interface ResolvedTool {
  provider: ToolProvider;
  ordinal: number;
  localName: string;
}

/**
 * Aggregates providers under one namespace. Provider `i` publishes its tool
 * `name` as `"<i>-<name>"`, so equal local names from different providers
 * never collide. Ordinals follow insertion order and never change.
 */
export class ToolRegistry implements ToolProvider {
  private readonly providers: ToolProvider[] = [];

  constructor(providers: Iterable<ToolProvider> = []) {
    for (const p of providers) this.providers.push(p);
  }

  addProvider(provider: ToolProvider): this {
    this.providers.push(provider);
    return this;
  }

  /** Adds a single local tool as its own provider, under the next ordinal. */
  addTool<A>(name: string, def: ToolDef<A>, handler: ToolHandler<A>): this {
    return this.addProvider(new ToolBox().tool(name, def, handler));
  }

  addRawTool(name: string, def: RawToolDef, handler: ToolHandler<unknown>): this {
    return this.addProvider(new ToolBox().rawTool(name, def, handler));
  }

  get size(): number {
    return this.providers.length;
  }

  listTools(): readonly ToolDescriptor[] {
    return this.providers.flatMap((provider, ordinal) =>
      provider.listTools().map((tool) => ({ ...tool, name: publicName(ordinal, tool.name) })),
    );
  }

  resolve(name: string): ResolvedTool | undefined {
    const at = name.indexOf(SEPARATOR);
    if (at <= 0) return undefined;
    const prefix = name.slice(0, at);
    if (!/^\d+$/.test(prefix)) return undefined;
    const ordinal = Number(prefix);
    // One spelling per ordinal: "01-echo" is not "1-echo".
    if (String(ordinal) !== prefix) return undefined;
    const provider = this.providers[ordinal];
    if (!provider) return undefined;
    return { provider, ordinal, localName: name.slice(at + 1) };
  }

  async callTool(name: string, args: unknown): Promise<ToolResult> {
    const target = this.resolve(name);
    if (!target) return toolNotFound(name);
    const result = await target.provider.callTool(target.localName, args);
    // Report misses under the name the model used.
    if (!result.ok && result.error.code === "TOOL_NOT_FOUND") return toolNotFound(name);
    return result;
  }
}

export function publicName(ordinal: number, localName: string): string {
  return `${ordinal}${SEPARATOR}${localName}`;
}
