import 'dotenv/config';
import { loadConfig } from '../../config.js';
import { OpenAIChatCompletions } from '../../llm/openai.js';
import { Agent } from '../../orchestrator/agent.js';
import { ConsoleLogger } from '../../util/log.js';

const SYSTEM = 'You are helpful assistant';

async function main() {
  const config = loadConfig();
  const logger = new ConsoleLogger(config.logLevel);
  const agent = new Agent(new OpenAIChatCompletions(config.apiKey ?? 'DUMMY', config.baseUrl), SYSTEM, { logger });

  const question = 'Why sky is blue?';
  logger.info(`Question: ${question}`);

  const { answer } = await agent.run({ model: config.model, prompt: question });
  logger.info(`Answer: ${answer}`);

  // History is kept, so the follow-up can refer to the first answer.
  const followUp = await agent.run({ model: config.model, prompt: 'Summarise that in one sentence.' });
  logger.info(`Follow-up: ${followUp.answer}`);
}

main().catch(e => { console.error(e); process.exit(1); });
