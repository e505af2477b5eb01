import { z } from "zod";
import { ConfigError } from "./orchestrator/errors.js";
import { LOG_LEVELS, type LogLevel } from "./util/log.js";

const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const EnvSchema = z.object({
  OPENAI_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  OPENAI_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default("https://api.openai.com/v1")),
  MODEL: z.preprocess(blankToUndefined, z.string().default("gpt-4o-mini")),
  MAX_ITERATIONS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(5)),
  TEMPERATURE: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(2).default(0.2)),
  BRAVE_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(LOG_LEVELS).default("info")),
});

export interface Config {
  apiKey?: string;
  baseUrl: string;
  model: string;
  maxIterations: number;
  temperature: number;
  braveApiKey?: string;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((i) => i.path.join(".")).join(", ");
    throw new ConfigError(`Invalid environment: ${keys}`, parsed.error);
  }
  const e = parsed.data;
  return {
    apiKey: e.OPENAI_API_KEY,
    baseUrl: e.OPENAI_BASE_URL,
    model: e.MODEL,
    maxIterations: e.MAX_ITERATIONS,
    temperature: e.TEMPERATURE,
    braveApiKey: e.BRAVE_API_KEY,
    logLevel: e.LOG_LEVEL,
  };
}
