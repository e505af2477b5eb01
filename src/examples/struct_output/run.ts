import 'dotenv/config';
import { z } from 'zod';
import { loadConfig } from '../../config.js';
import { OpenAIChatCompletions } from '../../llm/openai.js';
import { Agent } from '../../orchestrator/agent.js';
import { structured } from '../../orchestrator/answer.js';
import { ConsoleLogger } from '../../util/log.js';

const Answer = z.object({
  // A thinking field helps when debugging what the model did.
  _thinking: z.string().describe('In this field provide your thinking steps'),
  answer: z.string().describe('In this field provide answer'),
});

async function main() {
  const config = loadConfig();
  const logger = new ConsoleLogger(config.logLevel);
  const agent = new Agent(new OpenAIChatCompletions(config.apiKey ?? 'DUMMY', config.baseUrl), 'You are helpful assistant', { logger });

  const { answer } = await agent.run({
    model: config.model,
    prompt: 'Why sky is blue?',
    answer: structured(Answer, 'Answer'),
  });
  console.log(JSON.stringify(answer, null, 2));
}

main().catch(e => { console.error(e); process.exit(1); });
