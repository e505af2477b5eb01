import type { z } from "zod";
import { schemaFor } from "../orchestrator/answer.js";
import {
  TOOL_NAME_PATTERN,
  ToolError,
  errorMessage,
  toolFailed,
  toolNotFound,
  toolOk,
  type JsonSchema,
  type ToolDescriptor,
  type ToolProvider,
  type ToolResult,
} from "../types/tools.js";

export interface ToolDef<A> {
  description?: string;
  /** Validated before the handler runs; also becomes the advertised JSON Schema. */
  schema: z.ZodType<A, z.ZodTypeDef, unknown>;
  config?: unknown;
}

export interface RawToolDef {
  description?: string;
  schema?: JsonSchema;
  config?: unknown;
}

export type ToolHandler<A> = (args: A) => string | Promise<string>;

interface Entry {
  descriptor: ToolDescriptor;
  invoke(args: unknown): Promise<ToolResult>;
}

/**
 * Local tool provider: plain functions registered under a name, each with
 * its own argument schema.
 *
 * ```ts
 * const tools = new ToolBox()
 *   .tool("add", { schema: z.object({ a: z.number(), b: z.number() }) }, ({ a, b }) => String(a + b));
 * ```
 */
export class ToolBox implements ToolProvider {
  private readonly entries = new Map<string, Entry>();

  tool<A>(name: string, def: ToolDef<A>, handler: ToolHandler<A>): this {
    const { schema } = def;
    return this.register(
      { name, description: def.description, schema: schemaFor(schema), config: def.config },
      async (args) => {
        const parsed = schema.safeParse(args);
        if (!parsed.success) {
          return toolFailed(`Invalid arguments for '${name}': ${parsed.error.message}`, parsed.error, "INVALID_ARGUMENTS");
        }
        return run(handler, parsed.data);
      },
    );
  }

  /** Registers a tool whose arguments are passed through unvalidated. */
  rawTool(name: string, def: RawToolDef, handler: ToolHandler<unknown>): this {
    return this.register(
      { name, description: def.description, schema: def.schema, config: def.config },
      async (args) => run(handler, args),
    );
  }

  get size(): number {
    return this.entries.size;
  }

  listTools(): readonly ToolDescriptor[] {
    return Array.from(this.entries.values(), (e) => e.descriptor);
  }

  async callTool(name: string, args: unknown): Promise<ToolResult> {
    const entry = this.entries.get(name);
    if (!entry) return toolNotFound(name);
    return entry.invoke(args);
  }

  private register(descriptor: ToolDescriptor, invoke: Entry["invoke"]): this {
    const { name } = descriptor;
    if (!TOOL_NAME_PATTERN.test(name)) {
      throw new ToolError(`Invalid tool name '${name}': use letters, digits, '_' or '-'`, "TOOL_DEFINITIONS_NOT_READY");
    }
    if (this.entries.has(name)) {
      throw new ToolError(`Tool '${name}' is already registered`, "TOOL_DEFINITIONS_NOT_READY");
    }
    this.entries.set(name, { descriptor, invoke });
    return this;
  }
}

async function run<A>(handler: ToolHandler<A>, args: A): Promise<ToolResult> {
  try {
    return toolOk(await handler(args));
  } catch (e) {
    return toolFailed(errorMessage(e), e);
  }
}
