import { test } from 'node:test';
import assert from 'node:assert/strict';

import { SampleSet } from '../stats/sample_set.ts';

function stats(set: SampleSet) {
  return {
    count: set.count,
    min: set.min(),
    max: set.max(),
    avg: set.avg(),
    stdev: set.stdev(),
    p50: set.percentile(50),
    p95: set.percentile(95),
    sorted: set.toArray().sort((a, b) => a - b),
  };
}

test('reductions match direct computation', () => {
  const set = new SampleSet([1, 2, 3, 4]);
  assert.equal(set.count, 4);
  assert.equal(set.min(), 1);
  assert.equal(set.max(), 4);
  assert.equal(set.avg(), 2.5);
  assert.equal(set.stdev(), Math.sqrt(1.25));
});

test('percentile uses nearest rank on a sorted copy', () => {
  const set = new SampleSet([50, 10, 40, 20, 30]);
  assert.equal(set.percentile(50), 30);
  assert.equal(set.percentile(25), 20);
  assert.equal(set.percentile(99), 40);
  assert.equal(set.percentile(0), set.min());
  assert.equal(set.percentile(100), set.max());
  assert.deepEqual(set.toArray(), [50, 10, 40, 20, 30]);
});

test('every percentile of a single sample is that sample', () => {
  const set = new SampleSet();
  set.add(7);
  for (const p of [0, 12.5, 50, 99.9, 100]) {
    assert.equal(set.percentile(p), 7);
  }
});

test('percentile rejects p outside [0, 100]', () => {
  const set = new SampleSet([1]);
  assert.throws(() => set.percentile(-1), RangeError);
  assert.throws(() => set.percentile(100.5), RangeError);
  assert.throws(() => set.percentile(Number.NaN), RangeError);
});

test('empty set reductions are NaN', () => {
  const set = new SampleSet();
  assert.equal(set.count, 0);
  assert.ok(Number.isNaN(set.min()));
  assert.ok(Number.isNaN(set.max()));
  assert.ok(Number.isNaN(set.avg()));
  assert.ok(Number.isNaN(set.stdev()));
  assert.ok(Number.isNaN(set.percentile(50)));
});

test('merge count is the sum of both counts', () => {
  const merged = new SampleSet([1, 2]).merge(new SampleSet([3, 4, 5]));
  assert.equal(merged.count, 5);
  assert.deepEqual(merged.toArray(), [1, 2, 3, 4, 5]);
});

test('merge is associative and commutative', () => {
  const a = () => new SampleSet([1, 5]);
  const b = () => new SampleSet([3]);
  const c = () => new SampleSet([2, 9, 4]);

  const left = stats(a().merge(b()).merge(c()));
  const right = stats(a().merge(b().merge(c())));
  const swapped = stats(b().merge(a()).merge(c()));

  assert.deepEqual(left, right);
  assert.deepEqual(left, swapped);
  assert.deepEqual(left.sorted, [1, 2, 3, 4, 5, 9]);
});

test('merge consumes both inputs', () => {
  const a = new SampleSet([1]);
  const b = new SampleSet([2]);
  a.merge(b);
  assert.throws(() => a.add(3), /consumed/);
  assert.throws(() => b.avg(), /consumed/);
  assert.throws(() => a.merge(a), /itself/);
});
