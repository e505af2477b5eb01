import { z } from "zod";
import { ToolBox } from "../toolbox.js";

const BRAVE_API_URL = "https://api.search.brave.com/res/v1/web/search";

const SearchArgs = z.object({
  query: z
    .string()
    .min(1)
    .describe("The search terms or keywords to be used by the search engine for retrieving relevant results"),
  count: z.number().int().min(1).max(20).optional().describe("Maximum number of results, default 5"),
});

const BraveResponse = z.object({
  web: z
    .object({
      results: z.array(z.object({ title: z.string(), description: z.string().default(""), url: z.string() })),
    })
    .optional(),
});

export interface WebSearchOptions {
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

/**
 * Brave web search exposed as `web_search`.
 * Needs an API key from https://api.search.brave.com/app/keys (free plan works).
 */
export function webSearchTools(apiKey: string, opts: WebSearchOptions = {}): ToolBox {
  const baseUrl = opts.baseUrl ?? BRAVE_API_URL;
  const fetchImpl = opts.fetchImpl ?? fetch;

  return new ToolBox().tool(
    "web_search",
    {
      description:
        "A tool that performs web searches using a specified query parameter to retrieve relevant results " +
        "from a search engine. As the result you will receive list of websites with description",
      schema: SearchArgs,
    },
    async ({ query, count }) => {
      const url = new URL(baseUrl);
      url.searchParams.set("q", query);
      url.searchParams.set("count", String(count ?? 5));
      url.searchParams.set("result_filter", "web");

      const res = await fetchImpl(url, {
        headers: { accept: "application/json", "X-Subscription-Token": apiKey },
      });
      if (!res.ok) throw new Error(`Search HTTP ${res.status}: ${await res.text()}`);

      const data = BraveResponse.parse(await res.json());
      const results = data.web?.results ?? [];
      if (results.length === 0) return "No results";
      return results
        .map((r) => `Title: ${r.title}\nDescription: ${r.description}\nURL: ${r.url}`)
        .join("\n\n");
    },
  );
}
