import 'dotenv/config';
import { z } from 'zod';
import { loadConfig } from '../../config.js';
import { OpenAIChatCompletions } from '../../llm/openai.js';
import { Agent } from '../../orchestrator/agent.js';
import { ToolBox } from '../../tools/toolbox.js';
import { ConsoleLogger } from '../../util/log.js';

const SYSTEM = 'You are helpful assistant. You goal is to provide summary for provided site. Limit you answer to 3 sentences.';

const toolbox = new ToolBox()
  .tool(
    'word_count',
    {
      description: 'Counts words in the provided text',
      schema: z.object({ text: z.string().describe('Text to count words in') }),
    },
    ({ text }) => String(text.split(/\s+/).filter(Boolean).length),
  )
  .tool(
    'web_fetch',
    {
      description: 'This tool allow to fetch resource from provided URL',
      schema: z.object({ url: z.string().url().describe('Use this field to provide URL of file to download') }),
    },
    async ({ url }) => {
      const res = await fetch(url);
      if (!res.ok) throw new Error(`HTTP ${res.status}`);
      return res.text();
    },
  );

async function main() {
  const config = loadConfig();
  const logger = new ConsoleLogger(config.logLevel);
  logger.debug('tools', { tools: toolbox.listTools().map(t => t.name) });

  const agent = new Agent(new OpenAIChatCompletions(config.apiKey ?? 'DUMMY', config.baseUrl), SYSTEM, { logger });
  const { answer, iteration } = await agent.run({
    model: config.model,
    prompt: 'For what I can use this library? https://raw.githubusercontent.com/modelcontextprotocol/typescript-sdk/main/README.md',
    tools: toolbox,
  });
  logger.info(`Answer (turn ${iteration + 1}): ${answer}`);
}

main().catch(e => { console.error(e); process.exit(1); });
