import { z } from "zod";
import { ToolBox } from "../toolbox.js";

const DEFAULT_MAX_CHARS = 50_000;

const FetchArgs = z.object({
  url: z.string().url().describe("Use this field to provide URL of file to download"),
});

export interface WebFetchOptions {
  maxChars?: number;
  fetchImpl?: typeof fetch;
}

export function webFetchTools(opts: WebFetchOptions = {}): ToolBox {
  const maxChars = opts.maxChars ?? DEFAULT_MAX_CHARS;
  const fetchImpl = opts.fetchImpl ?? fetch;

  return new ToolBox().tool(
    "web_fetch",
    { description: "This tool allow to fetch resource from provided URL", schema: FetchArgs },
    async ({ url }) => {
      const res = await fetchImpl(url, { method: "GET" });
      const body = await res.text();
      if (!res.ok) throw new Error(`HTTP ${res.status}`);
      return body.length > maxChars ? body.slice(0, maxChars) + "\n[truncated]" : body;
    },
  );
}
