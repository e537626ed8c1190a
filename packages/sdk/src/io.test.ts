import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readdir, mkdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { atomicWrite, readDocument, removeDocument, ensureDirectory, listFiles } from "./io.js";
import {
  DocumentNotFoundError,
  DocumentReadError,
  DocumentRemoveError,
  DirectoryError,
  ListFilesError,
} from "./errors.js";

describe("io operations", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "attrstore-io-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("atomicWrite and readDocument", () => {
    it("should write and read file successfully", async () => {
      const filePath = join(testDir, "42.json");

      await atomicWrite(filePath, '{"id": 42}');

      expect(await readDocument(filePath)).toBe('{"id": 42}');
    });

    it("should not leave temp files after successful write", async () => {
      await atomicWrite(join(testDir, "1.json"), "{}");

      const files = await readdir(testDir);
      expect(files).toEqual(["1.json"]);
    });

    it("should overwrite existing file", async () => {
      const filePath = join(testDir, "7.json");

      await atomicWrite(filePath, "first");
      await atomicWrite(filePath, "second");

      expect(await readDocument(filePath)).toBe("second");
    });

    it("should keep one complete write under concurrency (last-writer-wins)", async () => {
      const filePath = join(testDir, "concurrent.json");

      await Promise.all(Array.from({ length: 20 }, (_, i) => atomicWrite(filePath, `write-${i}`)));

      expect(await readDocument(filePath)).toMatch(/^write-\d+$/);
      const files = await readdir(testDir);
      expect(files.filter((f) => f.endsWith(".tmp"))).toHaveLength(0);
    });

    it("should create parent directories automatically", async () => {
      const filePath = join(testDir, "post", "nested", "3.json");

      await atomicWrite(filePath, "auto-created");

      expect(await readDocument(filePath)).toBe("auto-created");
    });
  });

  describe("readDocument errors", () => {
    it("should throw DocumentNotFoundError for a missing file", async () => {
      const filePath = join(testDir, "missing.json");

      await expect(readDocument(filePath)).rejects.toBeInstanceOf(DocumentNotFoundError);
      await expect(readDocument(filePath)).rejects.toMatchObject({ code: "ENOENT" });
    });

    it("should throw DocumentReadError for a directory", async () => {
      const dirPath = join(testDir, "is-a-directory");
      await mkdir(dirPath);

      await expect(readDocument(dirPath)).rejects.toBeInstanceOf(DocumentReadError);
      await expect(readDocument(dirPath)).rejects.toMatchObject({ cause: { code: "EISDIR" } });
    });
  });

  describe("ensureDirectory", () => {
    it("should create nested directories and tolerate existing ones", async () => {
      const dirPath = join(testDir, "a", "b", "c");

      await ensureDirectory(dirPath);
      await ensureDirectory(dirPath);

      await atomicWrite(join(dirPath, "1.json"), "ok");
      expect(await readDocument(join(dirPath, "1.json"))).toBe("ok");
    });

    it("should reject an empty path", async () => {
      await expect(ensureDirectory("")).rejects.toBeInstanceOf(DirectoryError);
    });

    it("should throw DirectoryError when the path is a regular file", async () => {
      const filePath = join(testDir, "file.txt");
      await atomicWrite(filePath, "content");

      await expect(ensureDirectory(filePath)).rejects.toBeInstanceOf(DirectoryError);
    });
  });

  describe("removeDocument", () => {
    it("should remove an existing file and report it", async () => {
      const filePath = join(testDir, "9.json");
      await atomicWrite(filePath, "remove me");

      expect(await removeDocument(filePath)).toBe(true);
      await expect(readDocument(filePath)).rejects.toBeInstanceOf(DocumentNotFoundError);
    });

    it("should be idempotent", async () => {
      const filePath = join(testDir, "never-existed.json");

      expect(await removeDocument(filePath)).toBe(false);
      expect(await removeDocument(filePath)).toBe(false);
    });

    it("should throw DocumentRemoveError for a directory", async () => {
      const dirPath = join(testDir, "is-directory");
      await mkdir(dirPath);

      await expect(removeDocument(dirPath)).rejects.toBeInstanceOf(DocumentRemoveError);
    });
  });

  describe("listFiles", () => {
    it("should return sorted file names filtered by extension", async () => {
      await atomicWrite(join(testDir, "20.json"), "2");
      await atomicWrite(join(testDir, "10.json"), "1");
      await atomicWrite(join(testDir, "notes.txt"), "x");
      await mkdir(join(testDir, "subdir.json"));

      expect(await listFiles(testDir, ".json")).toEqual(["10.json", "20.json"]);
      expect(await listFiles(testDir, "txt")).toEqual(["notes.txt"]);
    });

    it("should return empty array for a missing directory", async () => {
      expect(await listFiles(join(testDir, "absent"))).toEqual([]);
    });

    it("should throw ListFilesError for a non-directory path", async () => {
      const filePath = join(testDir, "regular.txt");
      await atomicWrite(filePath, "content");

      await expect(listFiles(filePath)).rejects.toBeInstanceOf(ListFilesError);
    });
  });
});
