import 'dotenv/config';
import { z } from 'zod';
import { loadConfig } from '../../config.js';
import { OpenAIChatCompletions } from '../../llm/openai.js';
import { Agent } from '../../orchestrator/agent.js';
import { structured } from '../../orchestrator/answer.js';
import { ToolRegistry } from '../../tools/registry.js';
import { StdioMcpProvider } from '../../tools/mcp/stdio.js';
import { ConsoleLogger } from '../../util/log.js';

// Two copies of the same time server: the registry keeps their tools apart
// as 0-get_current_time and 1-get_current_time.
const Answer = z.object({
  _thinking: z.string().describe('In this field provide your thinking steps'),
  answer: z.string().describe('In this field provide answer'),
});

async function main() {
  const config = loadConfig();
  const logger = new ConsoleLogger(config.logLevel);

  const utc = await StdioMcpProvider.connect({ command: 'uvx', args: ['mcp-server-time', '--local-timezone', 'UTC'] });
  const paris = await StdioMcpProvider.connect(
    { command: 'uvx', args: ['mcp-server-time', '--local-timezone', 'Europe/Paris'] },
    { allow: ['get_current_time'] },
  );
  const registry = new ToolRegistry([utc, paris]);
  logger.info(`tools: ${registry.listTools().map(t => t.name).join(', ')}`);

  try {
    const agent = new Agent(new OpenAIChatCompletions(config.apiKey ?? 'DUMMY', config.baseUrl), 'You are helpful assistant.', { logger });
    const { answer } = await agent.run({
      model: config.model,
      prompt: 'What is current time in Poland?',
      tools: registry,
      answer: structured(Answer, 'Answer'),
    });
    console.log(JSON.stringify(answer, null, 2));
  } finally {
    await Promise.all([utc.close(), paris.close()]);
  }
}

main().catch(e => { console.error(e); process.exit(1); });
