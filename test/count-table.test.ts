import { describe, it, expect } from "vitest";
import { BYTE_VALUES, CountTable } from "../src/core/count-table";

const countsWith = (entries: Record<number, number>) => {
  const counts = new Array<number>(BYTE_VALUES).fill(0);
  for (const [byte, count] of Object.entries(entries)) counts[Number(byte)] = count;
  return counts;
};

describe("CountTable", () => {
  it("starts empty", () => {
    const table = CountTable.empty();
    expect(table.total).toBe(0);
    expect(table.distinct).toBe(0);
    expect([...table.entries()]).toEqual([]);
    expect(table.toArray()).toHaveLength(256);
  });

  it("totals and lists nonzero counts in byte order", () => {
    const table = CountTable.fromCounts(countsWith({ 0xff: 1, 0x41: 2, 0x00: 3 }));
    expect(table.total).toBe(6);
    expect(table.distinct).toBe(3);
    expect([...table.entries()]).toEqual([[0x00, 3], [0x41, 2], [0xff, 1]]);
    expect(table.get(0x41)).toBe(2);
    expect(table.get(0x42)).toBe(0);
  });

  it("copies its input", () => {
    const counts = countsWith({ 7: 1 });
    const table = CountTable.fromCounts(counts);
    counts[7] = 99;
    expect(table.get(7)).toBe(1);

    const out = table.toArray();
    out[7] = 42;
    expect(table.get(7)).toBe(1);
  });

  it("rejects malformed counts", () => {
    expect(() => CountTable.fromCounts([1, 2, 3])).toThrow(RangeError);
    expect(() => CountTable.fromCounts(countsWith({ 3: -1 }))).toThrow(/Invalid count -1 for byte 3/);
    expect(() => CountTable.fromCounts(countsWith({ 3: 1.5 }))).toThrow(RangeError);
  });

  it("rejects lookups outside 0..255", () => {
    const table = CountTable.empty();
    expect(() => table.get(256)).toThrow(RangeError);
    expect(() => table.get(-1)).toThrow(RangeError);
  });

  it("merges elementwise without touching either side", () => {
    const a = CountTable.fromCounts(countsWith({ 0x61: 2, 0x62: 1 }));
    const b = CountTable.fromCounts(countsWith({ 0x62: 4, 0x0a: 1 }));
    const merged = a.merge(b);

    expect([...merged.entries()]).toEqual([[0x0a, 1], [0x61, 2], [0x62, 5]]);
    expect(merged.total).toBe(a.total + b.total);
    expect(a.get(0x62)).toBe(1);
    expect(b.get(0x61)).toBe(0);
  });

  it("compares by content", () => {
    const a = CountTable.fromCounts(countsWith({ 1: 1 }));
    expect(a.equals(CountTable.fromCounts(countsWith({ 1: 1 })))).toBe(true);
    expect(a.equals(CountTable.empty())).toBe(false);
  });
});
