/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  createDeterministicRng,
  describeSampling,
  isJsonObject,
  sampleLogDocument,
  type JsonObject,
  type JsonValue,
  type LogDocument,
} from '../../src/core/index.js';

const buildLog = (count: number): LogDocument => ({
  version: 2,
  status: 'success',
  eval: {
    task: 'arithmetic',
    dataset: {
      name: 'toy-math',
      samples: count,
      sample_ids: Array.from({ length: count }, (_, index) => index + 100),
    },
  },
  results: {
    total_samples: count,
    completed_samples: count,
    scores: [{ name: 'match', value: 0.5 }],
  },
  samples: Array.from({ length: count }, (_, index) => ({
    id: index + 100,
    input: `question ${index}`,
  })),
});

const asObject = (value: JsonValue | undefined): JsonObject => {
  if (!isJsonObject(value)) {
    throw new Error('expected an object');
  }
  return value;
};

const asArray = (value: JsonValue | undefined): JsonValue[] => {
  if (!Array.isArray(value)) {
    throw new Error('expected an array');
  }
  return value;
};

describe('sampleLogDocument', () => {
  it('passes through documents at or below the target count', () => {
    const doc = buildLog(3);
    const snapshot = structuredClone(doc);
    const result = sampleLogDocument(doc, 10, createDeterministicRng(42));
    expect(result).toBe(doc);
    expect(result).toEqual(snapshot);
  });

  it('passes through documents with exactly the target count', () => {
    const doc = buildLog(10);
    expect(sampleLogDocument(doc, 10, createDeterministicRng(42))).toBe(doc);
  });

  it('reduces samples and rewrites bookkeeping fields', () => {
    const result = asObject(sampleLogDocument(buildLog(25), 10, createDeterministicRng(42)));
    const dataset = asObject(asObject(result['eval'])['dataset']);
    const results = asObject(result['results']);

    expect(asArray(result['samples'])).toHaveLength(10);
    expect(dataset['samples']).toBe(10);
    expect(dataset['sample_ids']).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(results['total_samples']).toBe(10);
    expect(results['completed_samples']).toBe(10);
  });

  it('keeps unrelated fields and key order', () => {
    const doc = buildLog(25);
    const result = asObject(sampleLogDocument(doc, 5, createDeterministicRng(42)));
    const dataset = asObject(asObject(result['eval'])['dataset']);

    expect(Object.keys(result)).toEqual(['version', 'status', 'eval', 'results', 'samples']);
    expect(result['status']).toBe('success');
    expect(asObject(result['eval'])['task']).toBe('arithmetic');
    expect(dataset['name']).toBe('toy-math');
    expect(asObject(result['results'])['scores']).toEqual([{ name: 'match', value: 0.5 }]);
  });

  it('preserves the original relative order of kept samples', () => {
    const doc = buildLog(40);
    const result = asObject(sampleLogDocument(doc, 12, createDeterministicRng(7)));
    const ids = asArray(result['samples']).map((sample) => asObject(sample)['id']);
    const originalIds = asArray(doc['samples']).map((sample) => asObject(sample)['id']);

    expect(new Set(ids).size).toBe(12);
    let cursor = -1;
    for (const id of ids) {
      const position = originalIds.indexOf(id);
      expect(position).toBeGreaterThan(cursor);
      cursor = position;
    }
  });

  it('does not mutate the input document', () => {
    const doc = buildLog(25);
    const snapshot = structuredClone(doc);
    sampleLogDocument(doc, 10, createDeterministicRng(42));
    expect(doc).toEqual(snapshot);
  });

  it('is deterministic for the same seed', () => {
    const first = sampleLogDocument(buildLog(30), 8, createDeterministicRng(42));
    const second = sampleLogDocument(buildLog(30), 8, createDeterministicRng(42));
    expect(first).toEqual(second);
  });

  it('empties samples when the target is zero', () => {
    const result = asObject(sampleLogDocument(buildLog(4), 0, createDeterministicRng(42)));
    expect(result['samples']).toEqual([]);
    expect(asObject(asObject(result['eval'])['dataset'])['sample_ids']).toEqual([]);
  });

  it('does not require bookkeeping sections when sampling is skipped', () => {
    const rng = createDeterministicRng(42);
    const noSamples: LogDocument = { status: 'error' };
    const emptySamples: LogDocument = { samples: [] };
    const fewSamples: LogDocument = { samples: [{ id: 1 }, { id: 2 }] };

    expect(sampleLogDocument(noSamples, 1, rng)).toBe(noSamples);
    expect(sampleLogDocument(emptySamples, 0, rng)).toBe(emptySamples);
    expect(sampleLogDocument(fewSamples, 5, rng)).toBe(fewSamples);
  });

  it('passes through non-object documents', () => {
    const list: JsonValue = [1, 2, 3];
    expect(sampleLogDocument(list, 1, createDeterministicRng(42))).toBe(list);
  });

  it('throws when a reduction needs eval.dataset', () => {
    const doc: LogDocument = {
      eval: { task: 'x' },
      results: { total_samples: 3, completed_samples: 3 },
      samples: [1, 2, 3],
    };
    expect(() => sampleLogDocument(doc, 1, createDeterministicRng(42))).toThrow(
      'Log document is missing "eval.dataset"; cannot update sample bookkeeping.',
    );
  });

  it('throws when a reduction needs results', () => {
    const doc: LogDocument = {
      eval: { dataset: { samples: 3, sample_ids: [1, 2, 3] } },
      samples: [1, 2, 3],
    };
    expect(() => sampleLogDocument(doc, 2, createDeterministicRng(42))).toThrow(
      'Log document is missing "results"; cannot update sample bookkeeping.',
    );
  });

  it('rejects samples that are not an array', () => {
    const doc: JsonValue = { samples: { first: 1 } };
    expect(() => sampleLogDocument(doc, 1, createDeterministicRng(42))).toThrow(TypeError);
  });
});

describe('describeSampling', () => {
  it('reports a reduction', () => {
    expect(describeSampling('run_a.json', buildLog(25), 10)).toEqual({
      fileName: 'run_a.json',
      originalCount: 25,
      keptCount: 10,
      reduced: true,
    });
  });

  it('reports a pass-through', () => {
    expect(describeSampling('run_b.json', buildLog(3), 10)).toEqual({
      fileName: 'run_b.json',
      originalCount: 3,
      keptCount: 3,
      reduced: false,
    });
  });

  it('counts a document without samples as empty', () => {
    expect(describeSampling('empty.json', { status: 'error' }, 10)).toEqual({
      fileName: 'empty.json',
      originalCount: 0,
      keptCount: 0,
      reduced: false,
    });
  });
});
