/**
 * Atomic file I/O for entity documents
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Reads are UTF-8 only; missing files throw DocumentNotFoundError
 * - Removes are idempotent
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import {
  DocumentNotFoundError,
  DocumentReadError,
  DocumentWriteError,
  DocumentRemoveError,
  DirectoryError,
  ListFilesError,
  errnoCode,
  errorMessage,
} from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Ensure a directory exists, creating it and parent directories as needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new DirectoryError(dirPath, {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content, "utf-8");

    // Prefer datasync, fall back to a full sync where it is unsupported
    try {
      await fileHandle.datasync();
    } catch (err) {
      const code = errnoCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    // Last writer wins for concurrent writes
    await fs.rename(tmp, filePath);

    await syncDirectory(dir);
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.close.failed", { details: { file: tmp, error: errorMessage(closeErr) } });
      });
    }

    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      if (errnoCode(unlinkErr) !== "ENOENT") {
        logger.debug("io.cleanup.failed", { details: { file: tmp, error: errorMessage(unlinkErr) } });
      }
    });

    throw new DocumentWriteError(filePath, { cause: err });
  }
}

/**
 * Fsync a directory so a rename inside it is durable (best-effort)
 */
async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // Some platforms do not support directory fsync
    const code = errnoCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR") {
      logger.debug("io.dirsync.failed", { details: { dir, error: errorMessage(err) } });
    }
  }
}

/**
 * Read a document from a file
 * @returns File contents as UTF-8 string
 * @throws DocumentNotFoundError if file doesn't exist
 * @throws DocumentReadError for other read failures
 */
export async function readDocument(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new DocumentNotFoundError(filePath, { cause: err });
    }
    throw new DocumentReadError(filePath, { cause: err });
  }
}

/**
 * Remove a document file (idempotent - no error if file doesn't exist)
 * @returns true when a file was removed
 */
export async function removeDocument(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return false;
    }
    throw new DocumentRemoveError(filePath, { cause: err });
  }
}

/**
 * List files in a directory, optionally filtering by extension
 * @param extension - Optional file extension to filter by (e.g., ".json")
 * @returns Sorted array of filenames (not full paths)
 */
export async function listFiles(dirPath: string, extension?: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });

    let files = entries
      .filter((entry) => entry.isFile() && !entry.isSymbolicLink())
      .map((entry) => entry.name);

    if (extension) {
      const ext = extension.startsWith(".") ? extension : `.${extension}`;
      files = files.filter((name) => name.endsWith(ext));
    }

    return files.sort();
  } catch (err) {
    // Missing directory lists as empty
    if (errnoCode(err) === "ENOENT") {
      return [];
    }

    throw new ListFilesError(dirPath, { cause: err });
  }
}
