/**
 * File I/O utilities.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import path from "node:path";

import { stringify as stringifyYaml } from "yaml";

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
 * Write a JSON file.
 *
 * @param filePath - Path to file
 * @param data - Data to write
 * @param pretty - Whether to format with indentation (default: true)
 */
export function writeJson(
  filePath: string,
  data: unknown,
  pretty = true,
): void {
  ensureDir(path.dirname(filePath));
  const content = pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
  writeFileSync(filePath, content, "utf-8");
}

/**
 * Write a YAML file.
 *
 * @param filePath - Path to file
 * @param data - Data to write
 */
export function writeYaml(filePath: string, data: unknown): void {
  ensureDir(path.dirname(filePath));
  writeFileSync(filePath, stringifyYaml(data), "utf-8");
}

/**
 * Write structured data as JSON or YAML.
 *
 * @param filePathWithoutExt - Destination path without extension
 * @param data - Data to write
 * @param format - Output format
 * @returns The path written
 */
export function writeStructured(
  filePathWithoutExt: string,
  data: unknown,
  format: "json" | "yaml",
): string {
  const filePath = `${filePathWithoutExt}.${format}`;
  if (format === "yaml") {
    writeYaml(filePath, data);
  } else {
    writeJson(filePath, data);
  }
  return filePath;
}

/**
 * Read a text file.
 *
 * @param filePath - Path to file
 * @returns File content
 */
export function readText(filePath: string): string {
  return readFileSync(filePath, "utf-8");
}

/**
 * Write a text file.
 *
 * @param filePath - Path to file
 * @param content - Content to write
 */
export function writeText(filePath: string, content: string): void {
  ensureDir(path.dirname(filePath));
  writeFileSync(filePath, content, "utf-8");
}

/**
 * Get the results directory for a run.
 *
 * @param baseDir - Output base directory
 * @param runId - Run ID
 * @returns Results directory path
 */
export function getResultsDir(baseDir: string, runId?: string): string {
  const resolved = path.resolve(baseDir);

  if (runId) {
    return path.join(resolved, runId);
  }

  return resolved;
}
