import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { FileByteSource } from "../src/sources/file-byte-source";
import { MemoryByteSource } from "../src/sources/memory-byte-source";
import { ChunkedCounter } from "../src/core/chunked-counter";
import { ReadError, SourceOpenError } from "../src/utils/errors";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "freqs-source-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

const writeFixture = (name: string, bytes: Uint8Array) => {
  const file = path.join(dir, name);
  fs.writeFileSync(file, bytes);
  return file;
};

describe("MemoryByteSource", () => {
  it("hands out bytes in order and then 0", () => {
    const source = new MemoryByteSource(Uint8Array.of(1, 2, 3));
    const buf = new Uint8Array(2);

    expect(source.read(buf, 0, 2)).toBe(2);
    expect([...buf]).toEqual([1, 2]);
    expect(source.read(buf, 0, 2)).toBe(1);
    expect(buf[0]).toBe(3);
    expect(source.read(buf, 0, 2)).toBe(0);
    expect(source.position).toBe(3);
    expect(source.size).toBe(3);
  });
});

describe("FileByteSource", () => {
  it("reads the whole file", () => {
    const file = writeFixture("abc.bin", Uint8Array.of(0x00, 0x41, 0x41, 0x0a));
    const source = FileByteSource.open(file);
    const buf = new Uint8Array(16);

    expect(source.size).toBe(4);
    expect(source.read(buf, 0, 16)).toBe(4);
    expect([...buf.subarray(0, 4)]).toEqual([0x00, 0x41, 0x41, 0x0a]);
    expect(source.read(buf, 0, 16)).toBe(0);
    source.close();
  });

  it("restricts reads to a range", () => {
    const file = writeFixture("range.bin", Uint8Array.of(10, 11, 12, 13, 14, 15));
    const source = FileByteSource.open(file, { start: 2, end: 5 });
    const buf = new Uint8Array(8);

    expect(source.size).toBe(3);
    expect(source.read(buf, 0, 8)).toBe(3);
    expect([...buf.subarray(0, 3)]).toEqual([12, 13, 14]);
    expect(source.read(buf, 0, 8)).toBe(0);
    source.close();
  });

  it("clamps a range past the end of the file", () => {
    const file = writeFixture("short.bin", Uint8Array.of(1, 2));
    const source = FileByteSource.open(file, { start: 5, end: 50 });
    expect(source.size).toBe(0);
    source.close();
  });

  it("counts disjoint ranges that merge into the whole file", () => {
    const bytes = new Uint8Array(1_000);
    for (let i = 0; i < bytes.length; i++) bytes[i] = (i * 7) % 251;
    const file = writeFixture("split.bin", bytes);

    const count = (start?: number, end?: number) => {
      const source = FileByteSource.open(file, { start, end });
      try {
        return new ChunkedCounter(64).consumeAll(source).table;
      } finally {
        source.close();
      }
    };

    const whole = count();
    const merged = count(0, 400).merge(count(400, 1_000));
    expect(merged.equals(whole)).toBe(true);
    expect(whole.total).toBe(1_000);
  });

  it("fails to open a missing file", () => {
    expect(() => FileByteSource.open(path.join(dir, "missing.bin"))).toThrow(SourceOpenError);
  });

  it("opens a directory but fails on the first read", () => {
    const source = FileByteSource.open(dir);
    expect(source.size).toBeUndefined();
    expect(() => new ChunkedCounter().consumeAll(source)).toThrow(ReadError);
    source.close();
  });

  it.runIf(fs.existsSync("/proc/self/status"))("reads files whose stat size is zero", () => {
    const source = FileByteSource.open("/proc/self/status");
    try {
      const { table, totalBytes } = new ChunkedCounter(64).consumeAll(source);
      expect(totalBytes).toBeGreaterThan(0);
      expect(table.get(0x0a)).toBeGreaterThan(0);
    } finally {
      source.close();
    }
  });

  it.runIf(fs.existsSync("/dev/null"))("reads a character device to its end", () => {
    const source = FileByteSource.open("/dev/null");
    try {
      expect(new ChunkedCounter().consumeAll(source).totalBytes).toBe(0);
    } finally {
      source.close();
    }
  });

  it("keeps reading past the size seen at open", () => {
    const file = writeFixture("growing.bin", Uint8Array.of(1, 2, 3));
    const source = FileByteSource.open(file);
    fs.appendFileSync(file, Uint8Array.of(4, 5));
    try {
      const { table, totalBytes } = new ChunkedCounter(2).consumeAll(source);
      expect(source.size).toBe(3);
      expect(totalBytes).toBe(5);
      expect([...table.entries()]).toEqual([[1, 1], [2, 1], [3, 1], [4, 1], [5, 1]]);
    } finally {
      source.close();
    }
  });

  it("refuses reads after close", () => {
    const source = FileByteSource.open(writeFixture("closed.bin", Uint8Array.of(1)));
    source.close();
    source.close();
    expect(() => source.read(new Uint8Array(1), 0, 1)).toThrow(/is closed/);
  });
});
