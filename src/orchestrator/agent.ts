// src/orchestrator/agent.ts
// The conversation loop: request → tool calls → results → request … until the
// model answers with text, which is decoded into the caller's answer shape.

import type { ChatTransport } from "../llm/provider.js";
import type { ChatOptions, CompletionArgs, Message, ToolCallOut, ToolDefForLLM } from "../types/llm.js";
import type { ToolDescriptor, ToolProvider } from "../types/tools.js";
import { errorMessage } from "../types/tools.js";
import { fmtMs, preview, silentLogger, type Logger } from "../util/log.js";
import { decodeAnswer, responseFormatFor, text, type AnswerShape } from "./answer.js";
import { IterationLimitError, ToolNotFoundError, UnsupportedResponseError } from "./errors.js";

export const DEFAULT_MAX_ITERATIONS = 5;
export const DEFAULT_CHAT_OPTIONS: Readonly<ChatOptions> = { temperature: 0.2 };

/**
 * What to do when the model calls a tool nobody provides.
 * - `fail`: abort the run with {@link ToolNotFoundError}.
 * - `skip`: log it and answer the call with a "not found" tool result.
 */
export type UnknownToolPolicy = "fail" | "skip";

export interface AgentOptions {
  logger?: Logger;
  unknownTool?: UnknownToolPolicy;
}

interface BaseRunOptions {
  model: string;
  prompt: string;
  tools?: ToolProvider;
  /** Upper bound on model turns. */
  maxIterations?: number;
  chatOptions?: ChatOptions;
}

export interface RunOptions<T> extends BaseRunOptions {
  answer: AnswerShape<T>;
}

export interface TextRunOptions extends BaseRunOptions {
  answer?: undefined;
}

export interface RunOutcome<T> {
  answer: T;
  /** 0-based index of the turn that produced the answer. */
  iteration: number;
  /** History length after the run. */
  messages: number;
}

/**
 * Drives a multi-turn exchange with a chat backend.
 *
 * History is kept across `run` calls, so consecutive runs continue the same
 * dialogue. It is never trimmed automatically; call {@link clearHistory}
 * to start over.
 */
export class Agent {
  private system: string;
  private messages: Message[];
  private readonly logger: Logger;
  private readonly unknownTool: UnknownToolPolicy;

  constructor(
    private readonly transport: ChatTransport,
    system: string,
    opts: AgentOptions = {},
  ) {
    this.system = system.trim();
    this.messages = [{ role: "system", content: this.system }];
    this.logger = opts.logger ?? silentLogger;
    this.unknownTool = opts.unknownTool ?? "fail";
  }

  get history(): readonly Message[] {
    return this.messages;
  }

  /** Drops everything but the system message. */
  clearHistory(): void {
    this.messages = [{ role: "system", content: this.system }];
  }

  /** Replaces the system message and clears the history. */
  reset(system: string): void {
    this.system = system.trim();
    this.clearHistory();
  }

  run(options: TextRunOptions): Promise<RunOutcome<string>>;
  run<T>(options: RunOptions<T>): Promise<RunOutcome<T>>;
  async run<T>(options: RunOptions<T> | TextRunOptions): Promise<RunOutcome<T> | RunOutcome<string>> {
    const { answer } = options;
    if (answer === undefined) return this.drive({ ...options, answer: text() });
    return this.drive({ ...options, answer });
  }

  private async drive<T>(options: RunOptions<T>): Promise<RunOutcome<T>> {
    const { model, prompt, tools, answer } = options;
    const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new RangeError(`maxIterations must be a positive integer, got ${maxIterations}`);
    }

    this.logger.debug(`question: ${preview(prompt)}`);
    this.messages.push({ role: "user", content: prompt });

    const toolDefs = tools ? toolDefsFrom(tools.listTools()) : undefined;
    const base: Omit<CompletionArgs, "messages"> = {
      ...(options.chatOptions ?? DEFAULT_CHAT_OPTIONS),
      model,
      tools: toolDefs?.length ? toolDefs : undefined,
      response_format: responseFormatFor(answer),
    };

    for (let iteration = 0; iteration < maxIterations; iteration++) {
      this.logger.debug(`iter ${iteration + 1}/${maxIterations} — thinking`);
      const t0 = Date.now();
      const out = await this.transport.complete({ ...base, messages: [...this.messages] });
      const thinkMs = Date.now() - t0;

      if (out.reasoning) this.logger.debug(`reasoning: ${out.reasoning}`);

      if (out.tool_calls?.length) {
        const calls = out.tool_calls;
        this.messages.push({ role: "assistant", content: out.content ?? "", tool_calls: calls });
        const toolsMs = await this.dispatch(calls, tools);
        this.logger.debug(
          `iter ${iteration + 1} — tool_call → ${calls.map((c) => c.name).join(", ")} (model ${fmtMs(thinkMs)}, tools ${fmtMs(toolsMs)})`,
        );
        continue;
      }

      if (out.content === null) {
        throw new UnsupportedResponseError(`no text and no tool calls (finish_reason: ${out.finish_reason ?? "none"})`);
      }

      this.logger.debug(`answer: ${preview(out.content)}`, { iteration, ms: thinkMs });
      this.messages.push({ role: "assistant", content: out.content });
      return { answer: decodeAnswer(answer, out.content), iteration, messages: this.messages.length };
    }

    throw new IterationLimitError(maxIterations);
  }

  /**
   * Runs the calls one at a time, in the order the model emitted them. Every
   * call gets a tool reply even when the turn aborts, so the history stays
   * valid for the next request.
   */
  private async dispatch(calls: readonly ToolCallOut[], tools: ToolProvider | undefined): Promise<number> {
    const advertised = new Set(tools?.listTools().map((t) => t.name));
    let total = 0;
    let next = 0;
    try {
      for (; next < calls.length; next++) {
        const call = calls[next];
        this.logger.trace(`tool request ${call.name}(${preview(call.arguments)})`, { id: call.id });

        if (!tools || !advertised.has(call.name)) {
          this.unresolved(call, undefined);
          continue;
        }

        let args: unknown;
        try {
          args = JSON.parse(call.arguments || "{}");
        } catch (e) {
          this.reply(call, `Invalid JSON arguments: ${errorMessage(e)}`);
          continue;
        }

        const t0 = Date.now();
        const result = await tools.callTool(call.name, args);
        total += Date.now() - t0;

        if (result.ok) {
          this.logger.trace(`tool result ${call.name}: ${preview(result.output)}`);
          this.reply(call, result.output);
        } else if (result.error.code === "TOOL_NOT_FOUND") {
          this.unresolved(call, result.error);
        } else {
          // The model gets to see the failure; some servers report useful
          // information this way.
          this.logger.trace(`tool error ${call.name}: ${result.error.message}`);
          this.reply(call, result.error.message);
        }
      }
    } catch (e) {
      this.abortTurn(calls.slice(next), e);
      throw e;
    }
    return total;
  }

  /** Answers the failing call and every call after it before the error surfaces. */
  private abortTurn(pending: readonly ToolCallOut[], cause: unknown): void {
    const [failed, ...rest] = pending;
    if (!failed) return;
    this.reply(
      failed,
      cause instanceof ToolNotFoundError ? notFoundReply(failed.name) : `Tool call failed: ${errorMessage(cause)}`,
    );
    for (const call of rest) this.reply(call, "Not run: an earlier call in this turn failed");
  }

  private unresolved(call: ToolCallOut, cause: unknown): void {
    if (this.unknownTool === "fail") throw new ToolNotFoundError(call.name, call.id, cause);
    this.logger.warn(`no tool found for ${call.name}, skipping`, { id: call.id });
    this.reply(call, notFoundReply(call.name));
  }

  private reply(call: ToolCallOut, content: string): void {
    this.messages.push({ role: "tool", tool_call_id: call.id, content });
  }
}

const notFoundReply = (name: string) => `Tool named '${name}' not found`;

function toolDefsFrom(descriptors: readonly ToolDescriptor[]): ToolDefForLLM[] {
  return descriptors.map((d) => ({ name: d.name, description: d.description, parameters: d.schema }));
}
