/**
 * File I/O for framework documents.
 */

import { readFile } from "node:fs/promises";

import { FrameworksFileNotFoundError, FrameworksParseError } from "@benchdef/errors";

/** Number of characters to check for null bytes (binary detection) */
const NULL_BYTE_CHECK_SIZE = 8192;

/**
 * Reads a text file, detecting binary content and stripping BOM.
 *
 * @param absolutePath — already-resolved path
 * @throws {FrameworksFileNotFoundError} if the file does not exist
 * @throws {FrameworksParseError} if the file contains null bytes (binary)
 */
export async function readTextFile(
  absolutePath: string,
  encoding: BufferEncoding = "utf-8",
): Promise<string> {
  let content: string;
  try {
    content = await readFile(absolutePath, { encoding });
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      throw new FrameworksFileNotFoundError(absolutePath);
    }
    throw error;
  }

  if (content.slice(0, NULL_BYTE_CHECK_SIZE).includes("\0")) {
    throw new FrameworksParseError(absolutePath, "File appears to be binary, not text");
  }

  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
