/**
 * File System Utilities
 *
 * Synchronous helpers used by the project resolver and the file dispatcher.
 * Reads that can fail on a single file return a Result so that callers can
 * log and continue with the next file.
 */

import { type Dirent, existsSync, readdirSync, readFileSync, realpathSync, statSync } from "node:fs";
import { join, resolve, sep } from "node:path";
import { type Result, ok, err } from "../types/result.js";
import { DOT_XML } from "./constants.js";

// ============================================================================
// Types
// ============================================================================

export interface FileReadError {
  code: "NOT_FOUND" | "NOT_FILE" | "READ_FAILED" | "ARCHIVE_UNREADABLE";
  message: string;
  path: string;
}

// ============================================================================
// Queries
// ============================================================================

export function exists(path: string): boolean {
  return existsSync(path);
}

export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

export function isXmlFile(path: string): boolean {
  return path.toLowerCase().endsWith(DOT_XML);
}

/**
 * Resolve symlinks and relative segments. Falls back to the absolute path
 * when the file does not exist.
 */
export function canonicalPath(path: string): string {
  try {
    return realpathSync(path);
  } catch {
    return resolve(path);
  }
}

// ============================================================================
// Listing
// ============================================================================

/**
 * List the entries of a directory as full paths, in name order.
 * Returns an empty list when the directory cannot be read.
 */
export function listFiles(dir: string): string[] {
  try {
    return readdirSync(dir)
      .sort()
      .map((name) => join(dir, name));
  } catch {
    return [];
  }
}

/**
 * List the real subdirectories of a directory, in name order. Symbolic
 * links are not followed, so a recursive walk cannot loop.
 */
export function listDirectories(dir: string): string[] {
  try {
    return readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort()
      .map((name) => join(dir, name));
  } catch {
    return [];
  }
}

/**
 * Recursively collect every file under `dir` whose name ends with `suffix`,
 * appending to `result` in traversal order. Symbolic links are not followed.
 */
export function gatherFiles(dir: string, suffix: string, result: string[] = []): string[] {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch {
    return result;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isFile()) {
      if (entry.name.endsWith(suffix)) {
        result.push(path);
      }
    } else if (entry.isDirectory()) {
      gatherFiles(path, suffix, result);
    }
  }
  return result;
}

// ============================================================================
// Reading
// ============================================================================

/**
 * Read a whole file into memory.
 *
 * @example
 * ```ts
 * const result = readBytes("/project/bin/classes/Foo.class");
 * if (!result.ok) {
 *   console.error(result.error.code); // "NOT_FOUND"
 * }
 * ```
 */
export function readBytes(path: string): Result<Buffer, FileReadError> {
  if (!existsSync(path)) {
    return err({ code: "NOT_FOUND", message: `File not found: ${path}`, path });
  }
  if (!isFile(path)) {
    return err({ code: "NOT_FILE", message: `Path is not a file: ${path}`, path });
  }

  try {
    return ok(readFileSync(path));
  } catch (error) {
    return err({
      code: "READ_FAILED",
      message: `Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`,
      path,
    });
  }
}

// ============================================================================
// Path Arithmetic
// ============================================================================

/**
 * Nearest common ancestor of a set of paths (a path is its own ancestor).
 * Returns `null` for an empty list or when the paths share nothing.
 */
export function getCommonParent(paths: readonly string[]): string | null {
  if (paths.length === 0) {
    return null;
  }

  const [first, ...rest] = paths.map((path) => resolve(path).split(sep));
  if (first === undefined) {
    return null;
  }

  let length = first.length;
  for (const parts of rest) {
    let i = 0;
    while (i < length && i < parts.length && parts[i] === first[i]) {
      i++;
    }
    length = i;
  }

  if (length === 0) {
    return null;
  }

  const common = first.slice(0, length).join(sep);
  return common === "" ? sep : common;
}
