import { describe, it, expect } from "vitest";
import { readPath, removePath, splitPath, writePath } from "./path.js";

describe("splitPath", () => {
  it("should split on dots", () => {
    expect(splitPath("a.b.c")).toEqual(["a", "b", "c"]);
    expect(splitPath("single")).toEqual(["single"]);
  });
});

describe("readPath", () => {
  const doc = { seo: { title: "Hello", robots: { index: false } }, tags: ["x", "y"] };

  it("should resolve nested mapping keys", () => {
    expect(readPath(doc, ["seo", "title"])).toBe("Hello");
    expect(readPath(doc, ["seo", "robots", "index"])).toBe(false);
    expect(readPath(doc, ["seo"])).toEqual({ title: "Hello", robots: { index: false } });
  });

  it("should miss on absent keys", () => {
    expect(readPath(doc, ["seo", "missing"])).toBeUndefined();
  });

  it("should not traverse sequences or scalars", () => {
    expect(readPath(doc, ["tags", "0"])).toBeUndefined();
    expect(readPath(doc, ["seo", "title", "length"])).toBeUndefined();
    expect(readPath("plain", ["a"])).toBeUndefined();
  });

  it("should not resolve inherited properties", () => {
    expect(readPath({}, ["toString"])).toBeUndefined();
  });
});

describe("writePath", () => {
  it("should create missing intermediates", () => {
    expect(writePath(null, ["a", "b"], 1)).toEqual({ a: { b: 1 } });
  });

  it("should replace non-mapping intermediates and roots", () => {
    expect(writePath({ a: "text" }, ["a", "b"], 1)).toEqual({ a: { b: 1 } });
    expect(writePath([1, 2], ["a"], true)).toEqual({ a: true });
  });

  it("should keep siblings and leave the input untouched", () => {
    const input = { a: { keep: 1, change: 2 }, other: "x" };
    const output = writePath(input, ["a", "change"], 3);

    expect(output).toEqual({ a: { keep: 1, change: 3 }, other: "x" });
    expect(input).toEqual({ a: { keep: 1, change: 2 }, other: "x" });
  });
});

describe("removePath", () => {
  it("should remove the leaf and keep the rest", () => {
    const input = { a: { b: 1, c: 2 } };
    expect(removePath(input, ["a", "b"])).toEqual({ a: { c: 2 } });
    expect(input).toEqual({ a: { b: 1, c: 2 } });
  });

  it("should return null when the path does not resolve", () => {
    expect(removePath({ a: { b: 1 } }, ["a", "x"])).toBeNull();
    expect(removePath({ a: "text" }, ["a", "b"])).toBeNull();
    expect(removePath(["a"], ["0"])).toBeNull();
  });
});
