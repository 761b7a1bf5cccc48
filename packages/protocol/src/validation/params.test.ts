// Tests for engine parameter validation

import { describe, it, expect } from 'vitest';
import { engineParamsSchema, ENGINE_ID_PATTERN } from './params.js';
import { validateWithSchema } from './result.js';

describe('engineParamsSchema', () => {
  it('accepts the minimal parameter tree', () => {
    const result = validateWithSchema(engineParamsSchema, {
      engineId: 'reco-1',
      engineFactory: 'reference.counter',
    });

    expect(result.valid).toBe(true);
  });

  it('keeps keys it does not declare', () => {
    const result = validateWithSchema(engineParamsSchema, {
      engineId: 'reco-1',
      engineFactory: 'reference.counter',
      algorithm: { eventNames: ['buy'] },
      sparkConf: { master: 'local' },
    });

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.value.algorithm).toEqual({ eventNames: ['buy'] });
      expect(result.value.sparkConf).toEqual({ master: 'local' });
    }
  });

  it('reports a missing engineId as MISSING_FIELD', () => {
    const result = validateWithSchema(engineParamsSchema, {
      engineFactory: 'reference.counter',
    });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors).toEqual([
        { path: 'engineId', message: 'Required', code: 'MISSING_FIELD' },
      ]);
    }
  });

  it('rejects an engineFactory of the wrong type', () => {
    const result = validateWithSchema(engineParamsSchema, {
      engineId: 'reco-1',
      engineFactory: 42,
    });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors[0].path).toBe('engineFactory');
      expect(result.errors[0].code).toBe('INVALID_TYPE');
    }
  });

  it('rejects an unknown mirrorType', () => {
    const result = validateWithSchema(engineParamsSchema, {
      engineId: 'reco-1',
      engineFactory: 'reference.counter',
      mirrorType: 'hdfs',
    });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors[0].path).toBe('mirrorType');
      expect(result.errors[0].code).toBe('INVALID_VALUE');
    }
  });
});

describe('ENGINE_ID_PATTERN', () => {
  it.each(['reco-1', 'rank_1', 'A.b-c', '9lives'])('accepts %s', (id) => {
    expect(ENGINE_ID_PATTERN.test(id)).toBe(true);
  });

  it.each(['', '-lead', '.hidden', 'has space', 'slash/id'])('rejects "%s"', (id) => {
    expect(ENGINE_ID_PATTERN.test(id)).toBe(false);
  });
});
