import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { decodeAnswer, responseFormatFor, stripSchemaMeta, structured, text } from '../orchestrator/answer.js';
import { DecodeError } from '../orchestrator/errors.js';

describe('answer shapes', () => {
  it('attaches no response format for text answers', () => {
    expect(responseFormatFor(text())).toBeUndefined();
  });

  it('returns text answers verbatim, quotes and newlines included', () => {
    expect(decodeAnswer(text(), 'He said "hi"\n')).toBe('He said "hi"\n');
    expect(decodeAnswer(text(), '')).toBe('');
  });

  it('derives a schema without $schema or title', () => {
    const format = responseFormatFor(structured(z.object({ answer: z.string() }), 'Answer'));

    expect(format).toEqual({
      type: 'json_schema',
      name: 'Answer',
      schema: {
        type: 'object',
        properties: { answer: { type: 'string' } },
        required: ['answer'],
        additionalProperties: false,
      },
    });
  });

  it('strips meta keys and leaves the rest alone', () => {
    const input = { $schema: 'http://json-schema.org/draft-07/schema#', title: 'Answer', type: 'string' };

    expect(stripSchemaMeta(input)).toEqual({ type: 'string' });
    expect(input.title).toBe('Answer');
  });

  it('parses structured answers strictly', () => {
    const shape = structured(z.object({ city: z.string(), population: z.number() }));

    expect(decodeAnswer(shape, '{"city":"Warsaw","population":1860000}')).toEqual({ city: 'Warsaw', population: 1860000 });
  });

  it('throws DecodeError for text that is not JSON', () => {
    const shape = structured(z.object({ city: z.string() }));

    expect(() => decodeAnswer(shape, 'Warsaw')).toThrow(DecodeError);
  });

  it('throws DecodeError when JSON does not match the shape', () => {
    const shape = structured(z.number().int());

    try {
      decodeAnswer(shape, '4.5');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(DecodeError);
      if (e instanceof DecodeError) {
        expect(e.raw).toBe('4.5');
        expect(e.code).toBe('DECODE_FAILED');
      }
    }
  });
});
