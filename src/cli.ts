#!/usr/bin/env node
// src/cli.ts
// One-shot runner:
//   toolchat [--model M] [--system S] [--iterations N] [--json]
//            [--search] [--fetch] [--mcp "cmd arg…"]… [--mcp-url URL]… <prompt…>
import "dotenv/config";
import { existsSync, realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { loadConfig } from "./config.js";
import { OpenAIChatCompletions } from "./llm/openai.js";
import { Agent } from "./orchestrator/agent.js";
import { structured } from "./orchestrator/answer.js";
import { ToolRegistry } from "./tools/registry.js";
import { HttpMcpProvider } from "./tools/mcp/http.js";
import { StdioMcpProvider } from "./tools/mcp/stdio.js";
import { webFetchTools } from "./tools/web/fetch.js";
import { webSearchTools } from "./tools/web/search.js";
import { ConsoleLogger } from "./util/log.js";

export interface CliArgs {
  prompt: string;
  model?: string;
  system: string;
  iterations?: number;
  json: boolean;
  search: boolean;
  fetch: boolean;
  mcp: string[];
  mcpUrls: string[];
}

export const DEFAULT_SYSTEM = "You are helpful assistant";

export const USAGE =
  "Usage: toolchat [--model M] [--system S] [--iterations N] [--json] [--search] [--fetch] " +
  '[--mcp "command arg..."]... [--mcp-url URL]... <prompt...>';

export function parseArgs(argv: readonly string[]): CliArgs {
  const out: CliArgs = { prompt: "", system: DEFAULT_SYSTEM, json: false, search: false, fetch: false, mcp: [], mcpUrls: [] };
  const words: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    const eq = a.indexOf("=");
    const flag = a.startsWith("--") && eq > 0 ? a.slice(0, eq) : a;
    const value = (): string => {
      if (a.startsWith("--") && eq > 0) return a.slice(eq + 1);
      const next = argv[++i];
      if (next === undefined) throw new Error(`Missing value for ${flag}`);
      return next;
    };
    switch (flag) {
      case "--model": out.model = value(); break;
      case "--system": out.system = value(); break;
      case "--iterations": {
        const raw = value();
        const n = Number(raw);
        if (!Number.isInteger(n) || n < 1) throw new Error(`--iterations expects a positive integer, got '${raw}'`);
        out.iterations = n;
        break;
      }
      case "--json": out.json = true; break;
      case "--search": out.search = true; break;
      case "--fetch": out.fetch = true; break;
      case "--mcp": out.mcp.push(value()); break;
      case "--mcp-url": out.mcpUrls.push(value()); break;
      default:
        if (a.startsWith("--")) throw new Error(`Unknown option ${a}`);
        words.push(a);
    }
  }
  out.prompt = words.join(" ").trim();
  return out;
}

const JsonAnswer = z.object({
  _thinking: z.string().describe("In this field provide your thinking steps"),
  answer: z.string().describe("In this field provide answer"),
});

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args.prompt) {
    console.error(USAGE);
    process.exit(2);
  }

  const config = loadConfig();
  const logger = new ConsoleLogger(config.logLevel);
  if (!config.apiKey) logger.warn("OPENAI_API_KEY not set; requests will likely be rejected");

  const registry = new ToolRegistry();
  const sessions: Array<{ close(): Promise<void> }> = [];
  if (args.search) {
    if (!config.braveApiKey) throw new Error("--search requires BRAVE_API_KEY");
    registry.addProvider(webSearchTools(config.braveApiKey));
  }
  if (args.fetch) registry.addProvider(webFetchTools());

  try {
    for (const line of args.mcp) {
      const [command, ...rest] = line.split(/\s+/).filter(Boolean);
      if (!command) throw new Error("--mcp expects a command");
      const provider = await StdioMcpProvider.connect({ command, args: rest }, { logger: logger.child("mcp") });
      sessions.push(provider);
      registry.addProvider(provider);
      logger.info(`connected ${command}: ${provider.listTools().map((t) => t.name).join(", ")}`);
    }
    for (const url of args.mcpUrls) {
      const provider = await HttpMcpProvider.connect(url, { logger: logger.child("mcp") });
      sessions.push(provider);
      registry.addProvider(provider);
      logger.info(`connected ${url}: ${provider.listTools().map((t) => t.name).join(", ")}`);
    }

    const transport = new OpenAIChatCompletions(config.apiKey ?? "DUMMY", config.baseUrl);
    const agent = new Agent(transport, args.system, { logger: logger.child("agent") });
    const common = {
      model: args.model ?? config.model,
      prompt: args.prompt,
      tools: registry.size ? registry : undefined,
      maxIterations: args.iterations ?? config.maxIterations,
      chatOptions: { temperature: config.temperature },
    };

    logger.info(`question: ${args.prompt}`);
    if (args.json) {
      const { answer, iteration } = await agent.run({ ...common, answer: structured(JsonAnswer, "Answer") });
      console.log(JSON.stringify(answer, null, 2));
      logger.info(`done after ${iteration + 1} turn(s)`);
    } else {
      const { answer, iteration } = await agent.run(common);
      console.log(answer);
      logger.info(`done after ${iteration + 1} turn(s)`);
    }
  } finally {
    await Promise.all(sessions.map((s) => s.close()));
  }
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  return !!entry && existsSync(entry) && realpathSync(entry) === fileURLToPath(import.meta.url);
}

if (invokedDirectly()) {
  main().catch((err) => {
    console.error("[fatal]", err);
    process.exit(1);
  });
}
