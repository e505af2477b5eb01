import { describe, it, expect } from 'vitest';
import { webFetchTools } from '../tools/web/fetch.js';
import { webSearchTools } from '../tools/web/search.js';

interface Sent {
  url: string;
  init?: RequestInit;
}

function server(status: number, body: string) {
  const sent: Sent[] = [];
  const fetchImpl = async (input: string | URL | Request, init?: RequestInit) => {
    sent.push({ url: input instanceof Request ? input.url : String(input), init });
    return new Response(body, { status });
  };
  return { sent, fetchImpl };
}

const braveBody = JSON.stringify({
  web: {
    results: [
      { title: 'Node.js 20', description: 'Release notes', url: 'https://nodejs.org/en/blog/release/v20.0.0' },
      { title: 'Changelog', url: 'https://example.com/changelog' },
    ],
  },
});

describe('web_search', () => {
  it('queries the search API and formats the hits', async () => {
    const { sent, fetchImpl } = server(200, braveBody);
    const tools = webSearchTools('test-secret', { fetchImpl });

    const result = await tools.callTool('web_search', { query: 'node release' });

    expect(sent[0].url).toBe('https://api.search.brave.com/res/v1/web/search?q=node+release&count=5&result_filter=web');
    expect(sent[0].init?.headers).toEqual({ accept: 'application/json', 'X-Subscription-Token': 'test-secret' });
    expect(result).toEqual({
      ok: true,
      output:
        'Title: Node.js 20\nDescription: Release notes\nURL: https://nodejs.org/en/blog/release/v20.0.0\n\n' +
        'Title: Changelog\nDescription: \nURL: https://example.com/changelog',
    });
  });

  it('passes the requested count', async () => {
    const { sent, fetchImpl } = server(200, braveBody);
    const tools = webSearchTools('test-secret', { fetchImpl, baseUrl: 'http://localhost:9000/search' });

    await tools.callTool('web_search', { query: 'x', count: 2 });

    expect(sent[0].url).toBe('http://localhost:9000/search?q=x&count=2&result_filter=web');
  });

  it('says so when nothing matched', async () => {
    const { fetchImpl } = server(200, '{}');

    const result = await webSearchTools('test-secret', { fetchImpl }).callTool('web_search', { query: 'zzzz' });

    expect(result).toEqual({ ok: true, output: 'No results' });
  });

  it('reports API failures as tool failures', async () => {
    const { fetchImpl } = server(401, 'bad token');

    const result = await webSearchTools('test-secret', { fetchImpl }).callTool('web_search', { query: 'x' });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Search HTTP 401: bad token');
  });

  it('rejects an empty query before calling the API', async () => {
    const { sent, fetchImpl } = server(200, braveBody);

    const result = await webSearchTools('test-secret', { fetchImpl }).callTool('web_search', { query: '' });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('INVALID_ARGUMENTS');
    expect(sent).toEqual([]);
  });
});

describe('web_fetch', () => {
  it('returns the body of the resource', async () => {
    const { sent, fetchImpl } = server(200, 'hello');

    const result = await webFetchTools({ fetchImpl }).callTool('web_fetch', { url: 'https://example.com/a.txt' });

    expect(result).toEqual({ ok: true, output: 'hello' });
    expect(sent[0].url).toBe('https://example.com/a.txt');
    expect(sent[0].init?.method).toBe('GET');
  });

  it('truncates long bodies', async () => {
    const { fetchImpl } = server(200, 'x'.repeat(15));

    const result = await webFetchTools({ fetchImpl, maxChars: 10 }).callTool('web_fetch', { url: 'https://example.com/' });

    expect(result).toEqual({ ok: true, output: 'xxxxxxxxxx\n[truncated]' });
  });

  it('fails on HTTP errors', async () => {
    const { fetchImpl } = server(404, 'missing');

    const result = await webFetchTools({ fetchImpl }).callTool('web_fetch', { url: 'https://example.com/gone' });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('HTTP 404');
  });

  it('rejects something that is not a URL', async () => {
    const { sent, fetchImpl } = server(200, '');

    const result = await webFetchTools({ fetchImpl }).callTool('web_fetch', { url: 'example' });

    expect(result.ok).toBe(false);
    expect(sent).toEqual([]);
  });
});
