/**
 * Unit Tests for the Subject Analyzer
 */
import { describe, it, expect } from '@jest/globals';
import { analyzeSubject, firstSuccessful } from '../stats/analyzer';
import { FakeRegistry, body } from './fake-registry';

const sumTypes = (counts: Record<string, number>) => Object.values(counts).reduce((s, n) => s + n, 0);

describe('analyzeSubject', () => {
  it('accumulates every version of a subject', async () => {
    const registry = new FakeRegistry().addSubject('orders', [
      { version: 1, id: 11, schema: body(100) },
      { version: 2, id: 12, schema: body(300), schemaType: 'AVRO' },
    ]);

    const result = await analyzeSubject(registry, 'orders');

    expect(result).toEqual({
      subject: 'orders',
      isInternal: false,
      versionCount: 2,
      totalSize: 400,
      minSize: 100,
      maxSize: 300,
      largestVersion: 'orders (v2)',
      schemaIds: [11, 12],
      typeCounts: { AVRO: 2 },
      totalReferences: 0,
      versionsWithReferences: 0,
      errors: [],
    });
  });

  it('normalizes type tags', async () => {
    const registry = new FakeRegistry().addSubject('mixed', [
      { version: 1, id: 1, schema: body(10), schemaType: 'protobuf' },
      { version: 2, id: 2, schema: body(10), schemaType: 'JSON' },
      { version: 3, id: 3, schema: body(10), schemaType: '' },
    ]);

    const result = await analyzeSubject(registry, 'mixed');

    expect(result.typeCounts).toEqual({ PROTOBUF: 1, JSON: 1, AVRO: 1 });
  });

  it('falls back to the deleted-inclusive fetch for soft-deleted versions', async () => {
    const registry = new FakeRegistry().addSubject('payments', [
      { version: 1, id: 21, schema: body(40), deleted: true },
      { version: 2, id: 22, schema: body(60) },
    ]);

    const result = await analyzeSubject(registry, 'payments');

    expect(result.errors).toEqual([]);
    expect(result.versionCount).toBe(2);
    expect(result.schemaIds).toEqual([21, 22]);
    expect(registry.countCalls('getSchemaIncludingDeleted')).toBe(1);
  });

  it('records an error and keeps counting the version when both fetches fail', async () => {
    const registry = new FakeRegistry().addSubject('broken', [
      { version: 1, id: 31, schema: body(50), failNormal: true, failDeleted: true },
    ]);

    const result = await analyzeSubject(registry, 'broken');

    expect(result.versionCount).toBe(1);
    expect(result.typeCounts).toEqual({});
    expect(result.totalSize).toBe(0);
    expect(result.minSize).toBeNull();
    expect(result.maxSize).toBeNull();
    expect(result.schemaIds).toEqual([]);
    expect(result.errors).toEqual([
      'getSchema v1: schema not found: broken v1; schema not found (deleted=true): broken v1',
    ]);
  });

  it('continues with later versions after a failed one', async () => {
    const registry = new FakeRegistry().addSubject('partial', [
      { version: 1, id: 41, schema: body(10), failNormal: true, failDeleted: true },
      { version: 2, id: 42, schema: body(20) },
      { version: 3, id: 43, schema: body(30) },
    ]);

    const result = await analyzeSubject(registry, 'partial');

    expect(result.versionCount).toBe(3);
    expect(sumTypes(result.typeCounts)).toBe(2);
    expect(result.versionCount).toBeGreaterThan(sumTypes(result.typeCounts));
    expect(result.errors).toHaveLength(1);
    expect(result.largestVersion).toBe('partial (v3)');
  });

  it('returns an empty result when the version list cannot be fetched', async () => {
    const registry = new FakeRegistry().addSubject('gone', [{ version: 1, id: 1, schema: body(5) }]);
    registry.failListVersions.add('gone');

    const result = await analyzeSubject(registry, 'gone');

    expect(result.versionCount).toBe(0);
    expect(result.errors).toEqual(["listVersions: Subject 'gone' not found"]);
    expect(registry.countCalls('getSchema')).toBe(0);
  });

  it('ignores zero-length bodies for the minimum size', async () => {
    const registry = new FakeRegistry().addSubject('empty-first', [
      { version: 1, id: 1, schema: '' },
      { version: 2, id: 2, schema: body(50) },
    ]);

    const result = await analyzeSubject(registry, 'empty-first');

    expect(result.minSize).toBe(50);
    expect(result.maxSize).toBe(50);
    expect(result.largestVersion).toBe('empty-first (v2)');
  });

  it('does not name a largest version when every body is empty', async () => {
    const registry = new FakeRegistry().addSubject('blank', [{ version: 1, id: 1, schema: '' }]);

    const result = await analyzeSubject(registry, 'blank');

    expect(result.versionCount).toBe(1);
    expect(result.typeCounts).toEqual({ AVRO: 1 });
    expect(result.minSize).toBeNull();
    expect(result.maxSize).toBeNull();
    expect(result.largestVersion).toBeNull();
  });

  it('keeps the first version on equal sizes', async () => {
    const registry = new FakeRegistry().addSubject('same', [
      { version: 1, id: 1, schema: body(70) },
      { version: 2, id: 2, schema: body(70) },
    ]);

    const result = await analyzeSubject(registry, 'same');

    expect(result.largestVersion).toBe('same (v1)');
  });

  it('counts references per version', async () => {
    const registry = new FakeRegistry().addSubject('refs', [
      { version: 1, id: 1, schema: body(10), references: 2 },
      { version: 2, id: 2, schema: body(10) },
      { version: 3, id: 3, schema: body(10), references: 1 },
    ]);

    const result = await analyzeSubject(registry, 'refs');

    expect(result.totalReferences).toBe(3);
    expect(result.versionsWithReferences).toBe(2);
  });

  it('measures size in UTF-8 bytes', async () => {
    const registry = new FakeRegistry().addSubject('unicode', [{ version: 1, id: 1, schema: 'é' }]);

    const result = await analyzeSubject(registry, 'unicode');

    expect(result.totalSize).toBe(2);
  });

  it('classifies internal subjects by prefix only', async () => {
    const registry = new FakeRegistry()
      .addSubject('_confluent-ksql-q1', [{ version: 1, id: 1, schema: body(5) }])
      .addSubject('orders-_confluent-ksql-', [{ version: 1, id: 2, schema: body(5) }]);

    expect((await analyzeSubject(registry, '_confluent-ksql-q1')).isInternal).toBe(true);
    expect((await analyzeSubject(registry, 'orders-_confluent-ksql-')).isInternal).toBe(false);
  });

  it('stops at the next version once the signal is aborted', async () => {
    const registry = new FakeRegistry().addSubject('slow', [
      { version: 1, id: 1, schema: body(5) },
      { version: 2, id: 2, schema: body(5) },
    ]);
    const controller = new AbortController();
    controller.abort(new Error('stop'));

    await expect(analyzeSubject(registry, 'slow', { signal: controller.signal })).rejects.toThrow('stop');
    expect(registry.countCalls('getSchema')).toBe(0);
  });
});

describe('firstSuccessful', () => {
  it('returns the first successful attempt without running the rest', async () => {
    let ran = 0;
    const outcome = await firstSuccessful<number>([
      async () => {
        throw new Error('first');
      },
      async () => 2,
      async () => {
        ran++;
        return 3;
      },
    ]);

    expect(outcome).toEqual({ ok: true, value: 2 });
    expect(ran).toBe(0);
  });

  it('collects every failure message in order', async () => {
    const outcome = await firstSuccessful<number>([
      async () => {
        throw new Error('a');
      },
      async () => {
        throw new Error('b');
      },
    ]);

    expect(outcome).toEqual({ ok: false, errors: ['a', 'b'] });
  });
});
