/**
 * Behavior every BackingStore must share; run by each adapter's test file
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { AttributeValue, BackingStore } from "../types.js";
import { UnknownEntityTypeError } from "../errors.js";

export function describeBackingStore(
  name: string,
  create: (entityTypes: readonly string[]) => Promise<BackingStore>,
  cleanup?: () => Promise<void>
): void {
  describe(`${name} backing store contract`, () => {
    let store: BackingStore;

    beforeEach(async () => {
      store = await create(["post", "user"]);
    });

    afterEach(async () => {
      await store.close();
      await cleanup?.();
    });

    describe("single keys", () => {
      it("should read a missing row as undefined", async () => {
        expect(await store.get("post", 1, "title")).toBeUndefined();
        expect(await store.getValues("post", 1, "title")).toEqual([]);
      });

      it("should round-trip every value kind with its type", async () => {
        const values: Record<string, AttributeValue> = {
          text: "Hello",
          empty: "",
          numeric_text: "12",
          integer: 42,
          negative: -7,
          float: 4.5,
          yes: true,
          no: false,
          list: [1, "a", false],
          tree: { seo: { robots: [true] }, count: 0 },
        };

        for (const [key, value] of Object.entries(values)) {
          expect(await store.set("post", 1, key, value)).toBe(true);
        }
        for (const [key, value] of Object.entries(values)) {
          expect(await store.get("post", 1, key)).toEqual(value);
        }
        expect(await store.getValues("post", 1, "integer")).toEqual([42]);
      });

      it("should overwrite on set (last write wins)", async () => {
        await store.set("post", 1, "status", "draft");
        await store.set("post", 1, "status", 3);

        expect(await store.get("post", 1, "status")).toBe(3);
      });

      it("should list an entity's attributes", async () => {
        await store.set("post", 1, "title", "T");
        await store.set("post", 1, "tags", ["a"]);
        await store.set("post", 2, "title", "Other");

        const all = await store.getAll("post", 1);

        expect(Object.fromEntries(all)).toEqual({ title: ["T"], tags: [["a"]] });
        expect((await store.getAll("post", 99)).size).toBe(0);
      });

      it("should delete one key and report whether it existed", async () => {
        await store.set("post", 1, "title", "T");
        await store.set("post", 1, "views", 1);

        expect(await store.delete("post", 1, "title")).toBe(true);
        expect(await store.delete("post", 1, "title")).toBe(false);
        expect(await store.get("post", 1, "views")).toBe(1);
      });

      it("should keep entity types apart", async () => {
        await store.set("post", 1, "title", "post title");
        await store.set("user", 1, "title", "user title");

        expect(await store.get("post", 1, "title")).toBe("post title");
        expect(await store.get("user", 1, "title")).toBe("user title");
      });

      it("should refuse entity types outside the configured set", async () => {
        await expect(store.get("comment", 1, "title")).rejects.toBeInstanceOf(UnknownEntityTypeError);
        await expect(store.set("comment", 1, "title", "x")).rejects.toBeInstanceOf(UnknownEntityTypeError);
      });
    });

    describe("key-wide operations", () => {
      beforeEach(async () => {
        await store.set("post", 1, "seo_title", "T");
        await store.set("post", 1, "seo_desc", "D");
        await store.set("post", 2, "seo_title", "U");
        await store.set("post", 2, "SEO_legacy", "L");
        await store.set("post", 3, "views", 10);
      });

      it("should list distinct keys by case-sensitive prefix", async () => {
        expect(await store.distinctKeysByPrefix("post", "seo_")).toEqual(["seo_desc", "seo_title"]);
        expect(await store.distinctKeysByPrefix("post", "SEO")).toEqual(["SEO_legacy"]);
        expect(await store.distinctKeysByPrefix("post", "none")).toEqual([]);
      });

      it("should treat prefix characters literally", async () => {
        await store.set("post", 4, "a%b", 1);
        await store.set("post", 4, "a_b", 1);
        await store.set("post", 4, "axb", 1);

        expect(await store.distinctKeysByPrefix("post", "a%")).toEqual(["a%b"]);
        expect(await store.distinctKeysByPrefix("post", "a_")).toEqual(["a_b"]);
      });

      it("should delete a key from every entity", async () => {
        expect(await store.deleteRowsByKey("post", "seo_title")).toBe(2);

        expect(await store.get("post", 1, "seo_title")).toBeUndefined();
        expect(await store.get("post", 2, "seo_title")).toBeUndefined();
        expect(await store.get("post", 1, "seo_desc")).toBe("D");
        expect(await store.deleteRowsByKey("post", "seo_title")).toBe(0);
      });
    });

    describe("findIds", () => {
      beforeEach(async () => {
        await store.set("post", 1, "score", 5);
        await store.set("post", 2, "score", 12);
        await store.set("post", 3, "score", "12");
        await store.set("post", 4, "score", [12]);
        await store.set("post", 5, "status", "Draft");
        await store.set("post", 6, "status", "100%");
        await store.set("post", 7, "flag", true);
        await store.set("post", 8, "flag", false);
      });

      it("should match equality on text forms", async () => {
        expect(await store.findIds("post", "score", 12, "eq")).toEqual([2, 3]);
        expect(await store.findIds("post", "score", "12", "eq")).toEqual([2, 3]);
        expect(await store.findIds("post", "flag", true, "eq")).toEqual([7]);
        expect(await store.findIds("post", "flag", false, "eq")).toEqual([8]);
      });

      it("should include containers in inequality", async () => {
        expect(await store.findIds("post", "score", 12, "ne")).toEqual([1, 4]);
      });

      it("should order numeric values for a numeric operand", async () => {
        expect(await store.findIds("post", "score", 10, "gt")).toEqual([2]);
        expect(await store.findIds("post", "score", 5, "le")).toEqual([1]);
        expect(await store.findIds("post", "score", 5, "ge")).toEqual([1, 2]);
        expect(await store.findIds("post", "score", 6, "lt")).toEqual([1]);
      });

      it("should order text for a string operand", async () => {
        expect(await store.findIds("post", "score", "2", "gt")).toEqual([1]);
      });

      it("should match LIKE as a literal case-insensitive substring", async () => {
        expect(await store.findIds("post", "status", "DRA", "like")).toEqual([5]);
        expect(await store.findIds("post", "status", "0%", "like")).toEqual([6]);
        expect(await store.findIds("post", "status", "%", "like")).toEqual([6]);
        expect(await store.findIds("post", "status", "_", "like")).toEqual([]);
      });

      it("should find nothing for an unused key", async () => {
        expect(await store.findIds("post", "missing", "x", "eq")).toEqual([]);
      });
    });
  });
}
