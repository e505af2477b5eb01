import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ToolBox } from '../tools/toolbox.js';
import { ToolError } from '../types/tools.js';

function box() {
  return new ToolBox().tool(
    'add',
    {
      description: 'Adds two numbers',
      schema: z.object({ a: z.number().describe('first'), b: z.number() }),
      config: { cost: 1 },
    },
    ({ a, b }) => String(a + b),
  );
}

describe('ToolBox', () => {
  it('describes tools with a JSON Schema derived from zod', () => {
    const [tool] = box().listTools();

    expect(tool.name).toBe('add');
    expect(tool.description).toBe('Adds two numbers');
    expect(tool.config).toEqual({ cost: 1 });
    expect(tool.schema).toEqual({
      type: 'object',
      properties: { a: { type: 'number', description: 'first' }, b: { type: 'number' } },
      required: ['a', 'b'],
      additionalProperties: false,
    });
  });

  it('runs the handler with validated arguments', async () => {
    expect(await box().callTool('add', { a: 2, b: 40 })).toEqual({ ok: true, output: '42' });
  });

  it('reports invalid arguments without calling the handler', async () => {
    let called = false;
    const tools = new ToolBox().tool('count', { schema: z.object({ n: z.number() }) }, () => {
      called = true;
      return '';
    });

    const result = await tools.callTool('count', { n: 'three' });

    expect(called).toBe(false);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INVALID_ARGUMENTS');
      expect(result.error.message).toMatch(/^Invalid arguments for 'count': /);
    }
  });

  it('turns a throwing handler into an execution failure', async () => {
    const tools = new ToolBox().tool('explode', { schema: z.object({}) }, async () => {
      throw new Error('parameter out of range');
    });

    const result = await tools.callTool('explode', {});

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ToolError);
      expect(result.error.code).toBe('TOOL_EXECUTION_FAILED');
      expect(result.error.message).toBe('parameter out of range');
    }
  });

  it('reports unknown tools as not found', async () => {
    const result = await box().callTool('sub', {});

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('TOOL_NOT_FOUND');
  });

  it('passes raw tools their arguments untouched', async () => {
    const seen: unknown[] = [];
    const schema = { type: 'object', properties: { q: { type: 'string' } } };
    const tools = new ToolBox().rawTool('raw', { schema }, (args) => {
      seen.push(args);
      return 'ok';
    });

    await tools.callTool('raw', [1, 2]);

    expect(seen).toEqual([[1, 2]]);
    expect(tools.listTools()[0].schema).toBe(schema);
  });

  it('rejects names the backend would not accept', () => {
    expect(() => new ToolBox().rawTool('web search', {}, () => '')).toThrow(ToolError);
    expect(() => new ToolBox().rawTool('web.search', {}, () => '')).toThrow("Invalid tool name 'web.search'");
  });

  it('rejects duplicate names', () => {
    const tools = new ToolBox().rawTool('dup', {}, () => '');

    expect(() => tools.rawTool('dup', {}, () => '')).toThrow("Tool 'dup' is already registered");
    expect(tools.size).toBe(1);
  });
});
