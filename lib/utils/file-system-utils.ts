/**
 * File System Utilities
 *
 * Path handling and directory management for the bridge's data directory
 */

import { existsSync, mkdirSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

/**
 * Bridge data directory (config file, logs)
 */
export const DATA_DIR = join(homedir(), ".arena-bridge");

/**
 * Get standardized path inside the data directory
 * @param segments - Path segments relative to ~/.arena-bridge
 * @returns Full path to specified location
 */
export function getDataPath(...segments: string[]): string {
	return join(DATA_DIR, ...segments);
}

/**
 * Ensure directory exists, create if it doesn't
 * @param dirPath - Directory path to ensure exists
 */
export function ensureDirectory(dirPath: string): void {
	if (!existsSync(dirPath)) {
		mkdirSync(dirPath, { recursive: true });
	}
}

/**
 * Read file if it exists, return null if not found. Read errors other than
 * a missing file propagate.
 * @param filePath - Path to file to read
 * @param encoding - File encoding (default: "utf8")
 */
export function readFileIfExists(filePath: string, encoding: BufferEncoding = "utf8"): string | null {
	return existsSync(filePath) ? readFileSync(filePath, encoding) : null;
}
