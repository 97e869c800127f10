/**
 * Shared file I/O utilities for input tables and output files.
 */

import { randomUUID } from "node:crypto";
import { readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";

import { consoleLogger, type Logger, logWarn } from "@pequant/core";
import {
  getErrorMessage,
  InputFileNotFoundError,
  InputReadError,
  OutputWriteError,
  RunAbortedError,
} from "@pequant/errors";

/** Number of characters to check for null bytes (binary detection) */
const NULL_BYTE_CHECK_SIZE = 8192;

/**
 * Reads a text file, detecting binary content and stripping BOM.
 *
 * @throws {InputFileNotFoundError} if the file does not exist
 * @throws {InputReadError} if it cannot be read or looks binary
 */
export async function readTextFile(filePath: string): Promise<string> {
  const absolutePath = resolve(filePath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf-8");
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      throw new InputFileNotFoundError(absolutePath);
    }
    throw new InputReadError(
      absolutePath,
      getErrorMessage(error),
      error instanceof Error ? error : undefined,
    );
  }

  // Binary detection: check for null bytes in first 8KB
  if (content.slice(0, NULL_BYTE_CHECK_SIZE).includes("\0")) {
    throw new InputReadError(absolutePath, "File appears to be binary, not text");
  }

  // Strip BOM if present
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

/**
 * Checks whether a path points to an existing regular file.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const s = await stat(resolve(filePath));
    return s.isFile();
  } catch {
    return false;
  }
}

export interface WriteFileAtomicOptions {
  /** Aborts the write; honoured until the first rename */
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
}

export interface AtomicFile {
  readonly path: string;
  readonly content: string;
}

/**
 * Writes `content` to `filePath` all-or-nothing.
 *
 * The content goes to a temporary file in the destination directory,
 * which is then renamed over the destination. On failure or abort the
 * temporary file is removed and the destination keeps its previous
 * content (or stays absent).
 *
 * @throws {OutputWriteError} if the write or rename fails
 * @throws {RunAbortedError} if `signal` fires before the rename
 */
export async function writeFileAtomic(
  filePath: string,
  content: string,
  options?: WriteFileAtomicOptions,
): Promise<void> {
  await writeFilesAtomic([{ path: filePath, content }], options);
}

/**
 * Writes several files as one commit. Every temporary file is written
 * before the first rename, and renames run in the order given, so the
 * last file only appears once all the others are in place. A failure
 * or abort before the first rename leaves every destination as it was.
 *
 * @throws {OutputWriteError} naming the file whose write or rename failed
 * @throws {RunAbortedError} if `signal` fires before the first rename
 */
export async function writeFilesAtomic(
  files: readonly AtomicFile[],
  options?: WriteFileAtomicOptions,
): Promise<void> {
  const signal = options?.signal;
  const logger = options?.logger ?? consoleLogger;
  const staged = files.map((file) => {
    const absolutePath = resolve(file.path);
    return {
      absolutePath,
      content: file.content,
      tempPath: join(
        dirname(absolutePath),
        `.${basename(absolutePath)}.${process.pid}.${randomUUID()}.tmp`,
      ),
    };
  });

  if (signal?.aborted) {
    throw new RunAbortedError("write");
  }

  let current = staged[0]?.absolutePath ?? "";
  try {
    for (const file of staged) {
      current = file.absolutePath;
      await writeFile(file.tempPath, file.content, {
        encoding: "utf-8",
        ...(signal ? { signal } : {}),
      });
    }
    if (signal?.aborted) {
      throw new RunAbortedError("write");
    }
    for (const file of staged) {
      current = file.absolutePath;
      await rename(file.tempPath, file.absolutePath);
    }
  } catch (error: unknown) {
    for (const file of staged) {
      await removeTempFile(file.tempPath, logger);
    }
    if (error instanceof RunAbortedError || signal?.aborted) {
      throw error instanceof RunAbortedError ? error : new RunAbortedError("write");
    }
    throw new OutputWriteError(
      current,
      getErrorMessage(error),
      error instanceof Error ? error : undefined,
    );
  }
}

async function removeTempFile(tempPath: string, logger: Logger): Promise<void> {
  try {
    await rm(tempPath, { force: true });
  } catch (error: unknown) {
    logWarn(logger, "io", `Could not remove temporary file ${tempPath}: ${getErrorMessage(error)}`);
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
