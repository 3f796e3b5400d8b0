/**
 * @fileoverview Tests for the model catalog
 * @module features/model/__tests__/catalog.test
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_MODEL, MODEL_CATALOG, findModel, normalizeModelId } from '../catalog.js';
import { AdapterError } from '../adapters/types.js';

describe('MODEL_CATALOG', () => {
  it('contains the default model first', () => {
    expect(MODEL_CATALOG[0]?.id).toBe(DEFAULT_MODEL);
  });

  it('has unique ids', () => {
    const ids = MODEL_CATALOG.map((model) => model.id);
    expect(new Set(ids).size).toBe(ids.length);
  });
});

describe('normalizeModelId', () => {
  it('strips the resource prefix and whitespace', () => {
    expect(normalizeModelId(' models/gemini-1.5-pro ')).toBe('gemini-1.5-pro');
  });

  it('accepts ids outside the catalog', () => {
    expect(normalizeModelId('gemini-exp-1206')).toBe('gemini-exp-1206');
  });

  it.each(['', 'Gemini-Pro', 'gemini pro', '../gemini', 'models/'])('rejects %j', (id) => {
    expect(() => normalizeModelId(id)).toThrow(AdapterError);
  });

  it('reports INVALID_CONFIG', () => {
    try {
      normalizeModelId('gemini/pro');
    } catch (error) {
      expect(error).toBeInstanceOf(AdapterError);
      if (error instanceof AdapterError) {
        expect(error.code).toBe('INVALID_CONFIG');
        expect(error.message).toBe(
          '[gemini] Invalid model id "gemini/pro". Use lowercase letters, digits, dots and dashes, e.g. gemini-2.0-flash'
        );
      }
      return;
    }
    throw new Error('Expected normalizeModelId to throw');
  });
});

describe('findModel', () => {
  it('finds catalog entries by either form', () => {
    expect(findModel('models/gemini-1.5-pro')?.contextLimit).toBe(2097152);
    expect(findModel('gemini-2.0-flash')?.displayName).toBe('Gemini 2.0 Flash');
  });

  it('returns undefined for unknown models', () => {
    expect(findModel('gemini-exp-1206')).toBeUndefined();
  });
});
