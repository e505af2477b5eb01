import type { CompletionArgs, CompletionOut } from "../types/llm.js";

export interface ChatTransport {
  complete(args: CompletionArgs): Promise<CompletionOut>;
}
