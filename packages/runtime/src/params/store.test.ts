import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { parseParameterTree, parseAndValidate, extractSection, parseEngineParams } from './store.js';

describe('parseParameterTree', () => {
  it('accepts an object or a JSON string', () => {
    expect(parseParameterTree({ a: 1 })).toEqual({ a: 1 });
    expect(parseParameterTree('{"a":1}')).toEqual({ a: 1 });
  });

  it('rejects invalid JSON and non-objects', () => {
    expect(() => parseParameterTree('{oops')).toThrow('Parameters are not valid JSON');
    expect(() => parseParameterTree('[1,2]')).toThrow('Parameters must be a JSON object');
    expect(() => parseParameterTree(null)).toThrow(ValidationError);
  });
});

describe('parseAndValidate', () => {
  const schema = z.object({ name: z.string(), size: z.number().int() }).passthrough();

  it('keeps keys the schema does not declare', () => {
    expect(parseAndValidate({ name: 'n', size: 2, other: true }, schema)).toEqual({
      name: 'n',
      size: 2,
      other: true,
    });
  });

  it('names the offending key path', () => {
    try {
      parseAndValidate({ name: 'n', size: 'big' }, schema);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: 'size', code: 'VALIDATION_ERROR' });
    }
  });
});

describe('extractSection', () => {
  const algorithm = z.object({ num: z.number().default(20), nested: z.object({ k: z.string() }).optional() });

  it('applies defaults to a missing section', () => {
    expect(extractSection({}, 'algorithm', algorithm)).toEqual({ num: 20 });
  });

  it('prefixes errors with the section key', () => {
    expect(() => extractSection({ algorithm: { nested: { k: 1 } } }, 'algorithm', algorithm)).toThrow(
      'Invalid parameter "algorithm.nested.k": Expected string, received number'
    );
  });
});

describe('parseEngineParams', () => {
  it('requires engineId and engineFactory', () => {
    expect(() => parseEngineParams({ engineFactory: 'x' })).toThrow('Invalid parameter "engineId": Required');
    expect(() => parseEngineParams({ engineId: 'e1' })).toThrow('Invalid parameter "engineFactory": Required');
  });

  it('rejects unknown mirror types', () => {
    expect(() => parseEngineParams({ engineId: 'e1', engineFactory: 'x', mirrorType: 's3' })).toThrow(
      ValidationError
    );
  });

  it('passes through algorithm and dataset sections untouched', () => {
    const parsed = parseEngineParams({
      engineId: 'e1',
      engineFactory: 'x',
      algorithm: { eventNames: ['buy'] },
      dataset: { ttl: '30 days' },
    });
    expect(parsed.algorithm).toEqual({ eventNames: ['buy'] });
    expect(parsed.dataset).toEqual({ ttl: '30 days' });
  });
});
