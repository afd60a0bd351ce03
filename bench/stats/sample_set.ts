/**
 * Append-only collection of observations for one measured quantity (bandwidth,
 * latency or operation rate).
 *
 * Statistics are computed on demand. Every reduction over an empty set yields
 * `NaN`; callers that render results must treat `NaN` as "no data".
 */
export class SampleSet {
  #values: number[];
  #consumed = false;

  constructor(values: Iterable<number> = []) {
    this.#values = [...values];
  }

  get count(): number {
    return this.#values.length;
  }

  add(value: number): void {
    this.#assertLive();
    this.#values.push(value);
  }

  /**
   * Concatenates `this` and `other` into a new set. Both inputs are consumed and
   * throw if used afterwards, so a merged worker result cannot be double counted.
   */
  merge(other: SampleSet): SampleSet {
    if (other === this) throw new Error('Cannot merge a SampleSet with itself');
    this.#assertLive();
    other.#assertLive();

    const merged = new SampleSet();
    merged.#values = this.#values.concat(other.#values);
    this.#consume();
    other.#consume();
    return merged;
  }

  min(): number {
    this.#assertLive();
    if (this.#values.length === 0) return Number.NaN;
    let min = Number.POSITIVE_INFINITY;
    for (const v of this.#values) if (v < min) min = v;
    return min;
  }

  max(): number {
    this.#assertLive();
    if (this.#values.length === 0) return Number.NaN;
    let max = Number.NEGATIVE_INFINITY;
    for (const v of this.#values) if (v > max) max = v;
    return max;
  }

  avg(): number {
    this.#assertLive();
    if (this.#values.length === 0) return Number.NaN;
    let sum = 0;
    for (const v of this.#values) sum += v;
    return sum / this.#values.length;
  }

  /** Population standard deviation (divides by N). */
  stdev(): number {
    const mean = this.avg();
    if (Number.isNaN(mean)) return Number.NaN;
    let sumSq = 0;
    for (const v of this.#values) sumSq += (v - mean) ** 2;
    return Math.sqrt(sumSq / this.#values.length);
  }

  /**
   * Nearest-rank percentile: the element at `floor((N - 1) * p / 100)` of a sorted
   * copy. Sorts on every call; not for use inside a timed loop.
   */
  percentile(p: number): number {
    this.#assertLive();
    if (!Number.isFinite(p) || p < 0 || p > 100) {
      throw new RangeError(`percentile must be within [0, 100], got ${p}`);
    }
    if (this.#values.length === 0) return Number.NaN;
    const sorted = Float64Array.from(this.#values).sort();
    return sorted[Math.floor(((sorted.length - 1) * p) / 100)] ?? Number.NaN;
  }

  toArray(): number[] {
    this.#assertLive();
    return [...this.#values];
  }

  #consume(): void {
    this.#values = [];
    this.#consumed = true;
  }

  #assertLive(): void {
    if (this.#consumed) throw new Error('SampleSet was consumed by merge()');
  }
}
