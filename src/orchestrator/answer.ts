import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { ResponseFormat } from "../types/llm.js";
import type { JsonSchema } from "../types/tools.js";
import { DecodeError } from "./errors.js";

/**
 * What the caller wants back from a run. `text` answers go out without a
 * response format; `structured` answers attach a JSON Schema derived from
 * the zod schema and are parsed strictly on the way back.
 */
export interface AnswerShape<T> {
  readonly kind: "text" | "structured";
  readonly name: string;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

const TEXT: AnswerShape<string> = { kind: "text", name: "Text", schema: z.string() };

export function text(): AnswerShape<string> {
  return TEXT;
}

export function structured<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  name = "ResponseFormat",
): AnswerShape<T> {
  return { kind: "structured", name, schema };
}

// Some backends (Gemini) reject a request carrying these keys.
const STRIPPED_KEYS = ["$schema", "title"] as const;

export function stripSchemaMeta(schema: JsonSchema): JsonSchema {
  const out: JsonSchema = { ...schema };
  for (const key of STRIPPED_KEYS) delete out[key];
  return out;
}

export function schemaFor(schema: z.ZodTypeAny): JsonSchema {
  const raw: JsonSchema = { ...zodToJsonSchema(schema, { $refStrategy: "none" }) };
  return stripSchemaMeta(raw);
}

export function responseFormatFor<T>(shape: AnswerShape<T>): ResponseFormat | undefined {
  if (shape.kind === "text") return undefined;
  return { type: "json_schema", name: shape.name, schema: schemaFor(shape.schema) };
}

export function decodeAnswer<T>(shape: AnswerShape<T>, raw: string): T {
  // Text is quoted first so both kinds go through the same JSON decode.
  const payload = shape.kind === "text" ? JSON.stringify(raw) : raw;
  let value: unknown;
  try {
    value = JSON.parse(payload);
  } catch (e) {
    throw new DecodeError(raw, e);
  }
  const parsed = shape.schema.safeParse(value);
  if (!parsed.success) throw new DecodeError(raw, parsed.error);
  return parsed.data;
}
