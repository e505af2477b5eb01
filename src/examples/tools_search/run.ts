import 'dotenv/config';
import { loadConfig } from '../../config.js';
import { OpenAIChatCompletions } from '../../llm/openai.js';
import { Agent } from '../../orchestrator/agent.js';
import { ToolRegistry } from '../../tools/registry.js';
import { webFetchTools } from '../../tools/web/fetch.js';
import { webSearchTools } from '../../tools/web/search.js';
import { ConsoleLogger } from '../../util/log.js';

const SYSTEM = 'You are helpful assistant. Use the search tool to find current information, then fetch a page when the snippets are not enough.';

async function main() {
  const config = loadConfig();
  if (!config.braveApiKey) throw new Error('BRAVE_API_KEY is required for this example');
  const logger = new ConsoleLogger(config.logLevel);

  const registry = new ToolRegistry([webSearchTools(config.braveApiKey), webFetchTools({ maxChars: 20_000 })]);
  const agent = new Agent(new OpenAIChatCompletions(config.apiKey ?? 'DUMMY', config.baseUrl), SYSTEM, { logger });

  const { answer } = await agent.run({
    model: config.model,
    prompt: 'What is the latest release of Node.js?',
    tools: registry,
    maxIterations: 8,
  });
  logger.info(`Answer: ${answer}`);
}

main().catch(e => { console.error(e); process.exit(1); });
