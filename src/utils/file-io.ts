/**
 * File I/O utilities.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import path from "node:path";

/**
 * Ensure a directory exists, creating it if necessary.
 *
 * @param dirPath - Path to directory
 */
export function ensureDir(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Read a text file.
 *
 * @param filePath - Path to file
 * @returns File content
 * @throws Error if the file cannot be read
 */
export function readText(filePath: string): string {
  return readFileSync(filePath, "utf-8");
}

/**
 * Write a text file, replacing any previous content.
 *
 * @param filePath - Path to file
 * @param content - Content to write
 */
export function writeText(filePath: string, content: string): void {
  ensureDir(path.dirname(filePath));
  writeFileSync(filePath, content, "utf-8");
}

/**
 * Check if a file exists.
 *
 * @param filePath - Path to file
 * @returns True if file exists
 */
export function fileExists(filePath: string): boolean {
  return existsSync(filePath);
}

/**
 * Resolve a path to absolute.
 *
 * @param filePath - Path to resolve
 * @returns Absolute path
 */
export function resolvePath(filePath: string): string {
  return path.resolve(filePath);
}

/**
 * Get the error code of a failed filesystem call, if any.
 *
 * @param error - Thrown value
 * @returns Code such as "ENOENT", or undefined
 */
export function fsErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}
