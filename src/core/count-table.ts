/** Number of distinct byte values. */
export const BYTE_VALUES = 256;

/**
 * Occurrences of every byte value, indexed directly by the byte.
 * Immutable: the backing array is copied in and never handed out.
 */
export class CountTable {
  private readonly counts: Float64Array;
  /** Sum of all counts, i.e. the number of bytes tallied. */
  readonly total: number;

  private constructor(counts: Float64Array) {
    this.counts = counts;
    let total = 0;
    for (let i = 0; i < BYTE_VALUES; i++) total += counts[i];
    this.total = total;
  }

  static empty(): CountTable {
    return new CountTable(new Float64Array(BYTE_VALUES));
  }

  /** Throws RangeError unless `counts` is 256 non-negative integers. */
  static fromCounts(counts: ArrayLike<number>): CountTable {
    if (counts.length !== BYTE_VALUES) {
      throw new RangeError(`Expected ${BYTE_VALUES} counts, got ${counts.length}`);
    }
    const copy = new Float64Array(BYTE_VALUES);
    for (let i = 0; i < BYTE_VALUES; i++) {
      const count = counts[i];
      if (!Number.isSafeInteger(count) || count < 0) {
        throw new RangeError(`Invalid count ${count} for byte ${i}`);
      }
      copy[i] = count;
    }
    return new CountTable(copy);
  }

  get(byte: number): number {
    if (!Number.isInteger(byte) || byte < 0 || byte >= BYTE_VALUES) {
      throw new RangeError(`Not a byte value: ${byte}`);
    }
    return this.counts[byte];
  }

  /** How many byte values occur at least once. */
  get distinct(): number {
    let n = 0;
    for (let i = 0; i < BYTE_VALUES; i++) if (this.counts[i] > 0) n++;
    return n;
  }

  /** `[byte, count]` for every nonzero count, ascending by byte. */
  *entries(): IterableIterator<[number, number]> {
    for (let byte = 0; byte < BYTE_VALUES; byte++) {
      const count = this.counts[byte];
      if (count > 0) yield [byte, count];
    }
  }

  toArray(): number[] {
    return Array.from(this.counts);
  }

  /** Elementwise sum; tables of disjoint ranges of one file merge into the whole. */
  merge(other: CountTable): CountTable {
    const sum = new Float64Array(BYTE_VALUES);
    for (let i = 0; i < BYTE_VALUES; i++) sum[i] = this.counts[i] + other.counts[i];
    return new CountTable(sum);
  }

  equals(other: CountTable): boolean {
    for (let i = 0; i < BYTE_VALUES; i++) {
      if (this.counts[i] !== other.counts[i]) return false;
    }
    return true;
  }
}
