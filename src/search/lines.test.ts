import { describe, expect, it } from "vitest";
import { advanceColumn, splitLines } from "./lines.js";

describe("splitLines", () => {
  it("returns no lines for empty content", () => {
    expect(splitLines("")).toEqual([]);
  });

  it("returns a single unterminated line", () => {
    expect(splitLines("foo")).toEqual(["foo"]);
  });

  it("does not add an empty line after a trailing newline", () => {
    expect(splitLines("foo\n")).toEqual(["foo"]);
  });

  it("keeps empty lines between terminators", () => {
    expect(splitLines("foo\n\n")).toEqual(["foo", ""]);
    expect(splitLines("\n")).toEqual([""]);
    expect(splitLines("a\n\nb")).toEqual(["a", "", "b"]);
  });

  it("keeps the final line when there is no trailing newline", () => {
    expect(splitLines("foo\nbar\nfoo")).toEqual(["foo", "bar", "foo"]);
  });

  it("strips the carriage return of CRLF terminators", () => {
    expect(splitLines("a\r\nb\r\n")).toEqual(["a", "b"]);
    expect(splitLines("a\r\nb")).toEqual(["a", "b"]);
  });

  it("keeps a carriage return that is not followed by a newline", () => {
    expect(splitLines("a\rb\r")).toEqual(["a\rb\r"]);
  });
});

describe("advanceColumn", () => {
  it("counts ASCII characters", () => {
    expect(advanceColumn("abc", 0, 0, 1)).toBe(1);
    expect(advanceColumn("abc", 0, 2, 1)).toBe(3);
  });

  it("counts a surrogate pair as one column", () => {
    expect(advanceColumn("😀x", 0, 2, 1)).toBe(2);
    expect(advanceColumn("é😀😀x", 0, 5, 1)).toBe(4);
  });

  it("continues from a known column", () => {
    expect(advanceColumn("ab😀c", 2, 4, 3)).toBe(4);
  });

  it("returns the same column for an empty range", () => {
    expect(advanceColumn("abc", 1, 1, 2)).toBe(2);
  });
});
