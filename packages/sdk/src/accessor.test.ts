import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createAccessor } from "./accessor.js";
import { MemoryBackend } from "./backends/memory.js";
import { InvalidEntityTypeError, UnknownEntityTypeError } from "./errors.js";
import { defaultSerializer } from "./format.js";
import { logger } from "./observability/logs.js";
import { MetricsCollector } from "./observability/metrics.js";
import type { AttributeAccessor } from "./types.js";

describe("attribute accessor", () => {
  let backend: MemoryBackend;
  let metrics: MetricsCollector;
  let attrs: AttributeAccessor;

  beforeEach(() => {
    logger.setEnabled(false);
    backend = new MemoryBackend();
    metrics = new MetricsCollector();
    attrs = createAccessor(
      backend,
      { entityTypes: ["post", "user"], largeValueLimit: 1048576, serialize: defaultSerializer },
      metrics
    );
  });

  afterEach(() => {
    vi.restoreAllMocks();
    logger.setEnabled(true);
  });

  describe("reads", () => {
    it("should report absence as null", async () => {
      expect(await attrs.get("post", 1, "title")).toBeNull();
      expect(await attrs.exists("post", 1, "title")).toBe(false);
    });

    it("should treat the empty-string sentinel as absent", async () => {
      await backend.set("post", 1, "title", "");

      expect(await attrs.exists("post", 1, "title")).toBe(false);
      expect(await attrs.get("post", 1, "title")).toBeNull();
      expect(await attrs.getWithDefault("post", 1, "title", "untitled")).toBe("untitled");
    });

    it("should return stored values with their type", async () => {
      await attrs.update("post", 1, "rating", 4.5);
      await attrs.update("post", 1, "tags", ["a", "b"]);

      expect(await attrs.get("post", 1, "rating")).toBe(4.5);
      expect(await attrs.get("post", 1, "tags")).toEqual(["a", "b"]);
      expect(await attrs.exists("post", 1, "rating")).toBe(true);
    });

    it("should return every value in multi-value mode", async () => {
      await attrs.update("post", 1, "title", "Hello");

      expect(await attrs.get("post", 1, "title", false)).toEqual(["Hello"]);
      expect(await attrs.get("post", 1, "missing", false)).toBeNull();
    });

    it("should not alias stored containers", async () => {
      const tags = ["a"];
      await attrs.update("post", 1, "tags", tags);
      tags.push("b");

      expect(await attrs.get("post", 1, "tags")).toEqual(["a"]);
    });
  });

  describe("invalid input", () => {
    it("should read invalid ids and empty keys as absent", async () => {
      expect(await attrs.get("post", 0, "title")).toBeNull();
      expect(await attrs.get("post", -5, "title")).toBeNull();
      expect(await attrs.get("post", 1.5, "title")).toBeNull();
      expect(await attrs.get("post", 1, "")).toBeNull();
    });

    it("should refuse writes for invalid ids and keys", async () => {
      expect(await attrs.update("post", 0, "title", "x")).toBe(false);
      expect(await attrs.update("post", 1, "", "x")).toBe(false);
      expect(await attrs.delete("post", -1, "title")).toBe(false);
      expect(await attrs.increment("post", 0, "count")).toBe(false);
      expect(await attrs.toggle("post", 0, "flag")).toBeNull();
    });

    it("should refuse non-finite numbers", async () => {
      expect(await attrs.update("post", 1, "ratio", Number.NaN)).toBe(false);
      expect(await attrs.update("post", 1, "ratio", [Infinity])).toBe(false);
      expect(await attrs.exists("post", 1, "ratio")).toBe(false);
    });

    it("should throw for an empty entity type", async () => {
      await expect(attrs.get("", 1, "title")).rejects.toBeInstanceOf(InvalidEntityTypeError);
    });

    it("should throw for a type outside the configured set", async () => {
      await expect(attrs.update("comment", 1, "title", "x")).rejects.toBeInstanceOf(UnknownEntityTypeError);
      await expect(attrs.exists("comment", 1, "title")).rejects.toBeInstanceOf(UnknownEntityTypeError);
    });
  });

  describe("getCast", () => {
    it("should cast absent values to the kind's empty value", async () => {
      expect(await attrs.getCast("post", 1, "view_count", "int")).toBe(0);
      expect(await attrs.getCast("post", 1, "view_count", "bool")).toBe(false);
      expect(await attrs.getCast("post", 1, "view_count", "array")).toEqual([]);
      expect(await attrs.getCast("post", 1, "view_count", "string")).toBe("");
    });

    it("should cast the fallback when the value is absent", async () => {
      expect(await attrs.getCast("post", 1, "limit", "int", "25 per page")).toBe(25);
    });

    it("should cast the stored value when present", async () => {
      await attrs.update("post", 1, "price", "19.99 USD");

      expect(await attrs.getCast("post", 1, "price", "float", 0)).toBe(19.99);
      expect(await attrs.getCast("post", 1, "price", "int")).toBe(19);
    });
  });

  describe("update and delete", () => {
    it("should count successful writes", async () => {
      expect(await attrs.update("post", 1, "title", "Hello")).toBe(true);

      expect(metrics.getCounters("post")).toMatchObject({ writes: 1, reads: 0 });
    });

    it("should turn backend exceptions into false", async () => {
      vi.spyOn(backend, "set").mockRejectedValueOnce(new Error("disk full"));

      expect(await attrs.update("post", 1, "title", "Hello")).toBe(false);
      expect(metrics.getCounters("post")).toMatchObject({ failedWrites: 1, writes: 0 });
    });

    it("should log failed writes", async () => {
      const spy = vi.spyOn(logger, "error");
      vi.spyOn(backend, "set").mockRejectedValueOnce(new Error("disk full"));

      await attrs.update("post", 7, "title", "Hello");

      expect(spy).toHaveBeenCalledWith("attr.write.failed", {
        type: "post",
        key: "title",
        message: "disk full",
        details: { id: 7, operation: "update" },
      });
    });

    it("should delete stored keys and report missing ones", async () => {
      await attrs.update("post", 1, "title", "Hello");

      expect(await attrs.delete("post", 1, "title")).toBe(true);
      expect(await attrs.delete("post", 1, "title")).toBe(false);
      expect(await attrs.get("post", 1, "title")).toBeNull();
    });

    it("should turn delete exceptions into false", async () => {
      vi.spyOn(backend, "delete").mockRejectedValueOnce(new Error("locked"));

      expect(await attrs.delete("post", 1, "title")).toBe(false);
      expect(metrics.getCounters("post")).toMatchObject({ failedDeletes: 1 });
    });
  });

  describe("updateIfChanged", () => {
    it("should skip writes of an equal value", async () => {
      await attrs.update("post", 1, "count", 5);
      const setSpy = vi.spyOn(backend, "set");

      expect(await attrs.updateIfChanged("post", 1, "count", 5)).toBe(false);
      expect(setSpy).not.toHaveBeenCalled();
      expect(metrics.getCounters("post")).toMatchObject({ skippedWrites: 1 });
    });

    it("should compare strictly", async () => {
      await attrs.update("post", 1, "count", 5);

      expect(await attrs.updateIfChanged("post", 1, "count", "5")).toBe(true);
      expect(await attrs.get("post", 1, "count")).toBe("5");
    });

    it("should ignore mapping key order", async () => {
      await attrs.update("post", 1, "seo", { title: "T", index: true });

      expect(await attrs.updateIfChanged("post", 1, "seo", { index: true, title: "T" })).toBe(false);
    });

    it("should treat an absent value as equal to the empty string", async () => {
      expect(await attrs.updateIfChanged("post", 1, "note", "")).toBe(false);
      expect(await attrs.updateIfChanged("post", 1, "note", "text")).toBe(true);
    });
  });

  describe("increment and decrement", () => {
    it("should count up from an absent value", async () => {
      expect(await attrs.getCast("post", 42, "view_count", "int")).toBe(0);
      expect(await attrs.increment("post", 42, "view_count")).toBe(1);
      expect(await attrs.get("post", 42, "view_count")).toBe(1);
    });

    it("should truncate the amount and cast the current value", async () => {
      await attrs.update("post", 1, "count", "12abc");

      expect(await attrs.increment("post", 1, "count", 2.9)).toBe(14);
    });

    it("should always subtract the magnitude on decrement", async () => {
      await attrs.update("post", 1, "stock", 10);

      expect(await attrs.decrement("post", 1, "stock", 3)).toBe(7);
      expect(await attrs.decrement("post", 1, "stock", -3)).toBe(4);
      expect(await attrs.decrement("post", 1, "stock", 10)).toBe(-6);
    });

    it("should return false when the write is rejected", async () => {
      vi.spyOn(backend, "set").mockResolvedValueOnce(false);

      expect(await attrs.increment("post", 1, "count")).toBe(false);
    });

    it("should restore the original value after incrementing and decrementing by the same amount", async () => {
      await attrs.update("post", 1, "stock", 17);

      expect(await attrs.increment("post", 1, "stock", 5)).toBe(22);
      expect(await attrs.decrement("post", 1, "stock", 5)).toBe(17);
      expect(await attrs.get("post", 1, "stock")).toBe(17);
    });
  });

  describe("array operations", () => {
    it("should append to absent and non-sequence values", async () => {
      expect(await attrs.arrayAppend("post", 1, "tags", "news")).toBe(true);
      expect(await attrs.get("post", 1, "tags")).toEqual(["news"]);

      await attrs.update("post", 1, "scalar", "text");
      expect(await attrs.arrayAppend("post", 1, "scalar", 1)).toBe(true);
      expect(await attrs.get("post", 1, "scalar")).toEqual([1]);
    });

    it("should use structural equality for containment", async () => {
      await attrs.update("post", 1, "items", [{ a: 1, b: 2 }, "1"]);

      expect(await attrs.arrayContains("post", 1, "items", { b: 2, a: 1 })).toBe(true);
      expect(await attrs.arrayContains("post", 1, "items", 1)).toBe(false);
      expect(await attrs.arrayContains("post", 1, "missing", 1)).toBe(false);
    });

    it("should remove only the first occurrence", async () => {
      await attrs.update("post", 1, "items", [1, 2, 1]);

      expect(await attrs.arrayRemove("post", 1, "items", 1)).toBe(true);
      expect(await attrs.get("post", 1, "items")).toEqual([2, 1]);
      expect(await attrs.arrayRemove("post", 1, "items", 3)).toBe(false);
    });

    it("should leave an array unchanged after appending and removing a value", async () => {
      await attrs.update("post", 1, "items", ["a", { b: 1 }]);

      expect(await attrs.arrayAppend("post", 1, "items", { c: [2] })).toBe(true);
      expect(await attrs.arrayRemove("post", 1, "items", { c: [2] })).toBe(true);
      expect(await attrs.get("post", 1, "items")).toEqual(["a", { b: 1 }]);
    });

    it("should remove every occurrence", async () => {
      await attrs.update("post", 1, "items", [1, 2, 1]);

      expect(await attrs.arrayRemoveAll("post", 1, "items", 1)).toBe(true);
      expect(await attrs.get("post", 1, "items")).toEqual([2]);
      expect(await attrs.arrayRemoveAll("post", 1, "items", 1)).toBe(false);
    });

    it("should de-duplicate keeping first occurrences, idempotently", async () => {
      await attrs.update("post", 1, "items", [1, { a: 1, b: 2 }, 1, { b: 2, a: 1 }, "1"]);

      expect(await attrs.arrayUnique("post", 1, "items")).toBe(true);
      expect(await attrs.get("post", 1, "items")).toEqual([1, { a: 1, b: 2 }, "1"]);
      expect(await attrs.arrayUnique("post", 1, "items")).toBe(false);
      expect(await attrs.get("post", 1, "items")).toEqual([1, { a: 1, b: 2 }, "1"]);
    });

    it("should count sequence items", async () => {
      await attrs.update("post", 1, "items", ["a", "b", "c"]);
      await attrs.update("post", 1, "scalar", "abc");

      expect(await attrs.arrayCount("post", 1, "items")).toBe(3);
      expect(await attrs.arrayCount("post", 1, "scalar")).toBe(0);
      expect(await attrs.arrayCount("post", 1, "missing")).toBe(0);
    });

    it("should refuse to remove from non-sequences", async () => {
      await attrs.update("post", 1, "scalar", 1);

      expect(await attrs.arrayRemove("post", 1, "scalar", 1)).toBe(false);
      expect(await attrs.arrayUnique("post", 1, "scalar")).toBe(false);
    });
  });

  describe("nested values", () => {
    it("should create the container chain on write", async () => {
      expect(await attrs.setNested("post", 1, "seo", "robots.index", false)).toBe(true);

      expect(await attrs.get("post", 1, "seo")).toEqual({ robots: { index: false } });
      expect(await attrs.getNested("post", 1, "seo", "robots.index")).toBe(false);
    });

    it("should return the fallback or null on a miss", async () => {
      await attrs.update("post", 1, "seo", { title: "T" });

      expect(await attrs.getNested("post", 1, "seo", "robots.index", "default")).toBe("default");
      expect(await attrs.getNested("post", 1, "seo", "robots.index")).toBeNull();
      expect(await attrs.getNested("post", 1, "missing", "a")).toBeNull();
    });

    it("should replace a scalar root on write", async () => {
      await attrs.update("post", 1, "seo", "legacy");

      await attrs.setNested("post", 1, "seo", "title", "T");

      expect(await attrs.get("post", 1, "seo")).toEqual({ title: "T" });
    });

    it("should remove existing leaves only", async () => {
      await attrs.update("post", 1, "seo", { robots: { index: false, follow: true } });

      expect(await attrs.removeNested("post", 1, "seo", "robots.index")).toBe(true);
      expect(await attrs.get("post", 1, "seo")).toEqual({ robots: { follow: true } });
      expect(await attrs.removeNested("post", 1, "seo", "robots.index")).toBe(false);
      expect(await attrs.removeNested("post", 1, "missing", "a")).toBe(false);
    });
  });

  describe("JSON values", () => {
    it("should return stored containers", async () => {
      await attrs.setJson("post", 1, "config", { layout: "grid" });

      expect(await attrs.getJson("post", 1, "config")).toEqual({ layout: "grid" });
    });

    it("should parse strings holding JSON containers", async () => {
      await attrs.update("post", 1, "object", '{"a":1}');
      await attrs.update("post", 1, "list", "[1,2]");

      expect(await attrs.getJson("post", 1, "object")).toEqual({ a: 1 });
      expect(await attrs.getJson("post", 1, "list")).toEqual([1, 2]);
    });

    it("should fall back for malformed or non-container content", async () => {
      await attrs.update("post", 1, "broken", "{nope");
      await attrs.update("post", 1, "quoted", '"text"');
      await attrs.update("post", 1, "number", 3);

      expect(await attrs.getJson("post", 1, "broken")).toEqual({});
      expect(await attrs.getJson("post", 1, "quoted", [])).toEqual([]);
      expect(await attrs.getJson("post", 1, "number")).toEqual({});
      expect(await attrs.getJson("post", 1, "missing", ["x"])).toEqual(["x"]);
    });
  });

  describe("booleans", () => {
    it("should use the fallback only when absent", async () => {
      await attrs.update("post", 1, "flag", "0");

      expect(await attrs.isTruthy("post", 1, "flag", true)).toBe(false);
      expect(await attrs.isTruthy("post", 1, "missing", true)).toBe(true);
      expect(await attrs.isTruthy("post", 1, "missing")).toBe(false);
    });

    it("should toggle and return the new value", async () => {
      expect(await attrs.toggle("post", 1, "featured")).toBe(true);
      expect(await attrs.get("post", 1, "featured")).toBe(true);
      expect(await attrs.toggle("post", 1, "featured")).toBe(false);
    });

    it("should return null when the toggle write fails", async () => {
      vi.spyOn(backend, "set").mockRejectedValueOnce(new Error("read-only"));

      expect(await attrs.toggle("post", 1, "featured")).toBeNull();
    });
  });

  describe("introspection", () => {
    it("should report value tags", async () => {
      await attrs.update("post", 1, "count", 3);
      await attrs.update("post", 1, "ratio", 0.5);
      await attrs.update("post", 1, "seo", {});

      expect(await attrs.getType("post", 1, "count")).toBe("integer");
      expect(await attrs.getType("post", 1, "ratio")).toBe("float");
      expect(await attrs.getType("post", 1, "missing")).toBeNull();
      expect(await attrs.isType("post", 1, "seo", "mapping")).toBe(true);
      expect(await attrs.isType("post", 1, "seo", "sequence")).toBe(false);
    });

    it("should measure serialized size", async () => {
      await attrs.update("post", 1, "title", "abc");
      await attrs.update("post", 1, "seo", { a: 1 });

      expect(await attrs.getSize("post", 1, "title")).toBe(3);
      expect(await attrs.getSize("post", 1, "seo")).toBe(7);
      expect(await attrs.getSize("post", 1, "missing")).toBe(0);
    });

    it("should compare size strictly against the limit", async () => {
      await attrs.update("post", 1, "title", "abc");

      expect(await attrs.isLarge("post", 1, "title", 2)).toBe(true);
      expect(await attrs.isLarge("post", 1, "title", 3)).toBe(false);
      expect(await attrs.isLarge("post", 1, "title")).toBe(false);
    });
  });

  describe("migrateKey", () => {
    it("should move a value to a new key", async () => {
      await attrs.update("user", 3, "old_name", "Ada");

      expect(await attrs.migrateKey("user", 3, "old_name", "display_name")).toBe(true);
      expect(await attrs.get("user", 3, "display_name")).toBe("Ada");
      expect(await attrs.exists("user", 3, "old_name")).toBe(false);
    });

    it("should keep the old key when asked", async () => {
      await attrs.update("user", 3, "old_name", "Ada");

      expect(await attrs.migrateKey("user", 3, "old_name", "display_name", false)).toBe(true);
      expect(await attrs.get("user", 3, "old_name")).toBe("Ada");
    });

    it("should copy the absence sentinel for an absent source", async () => {
      expect(await attrs.migrateKey("user", 3, "never_set", "dest")).toBe(false);
      expect(await attrs.exists("user", 3, "dest")).toBe(false);
      expect(await backend.get("user", 3, "dest")).toBe("");
    });
  });
});
