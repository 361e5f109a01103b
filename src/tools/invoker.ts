/**
 * Tool Invoker: builds shell commands from ToolDefinition entries.
 */

import type { ToolDefinition } from "./registry.js";

/**
 * Escape a value for safe inclusion in a single-quoted shell string.
 * Handles embedded single quotes: file's → file'\''s
 */
export function shellEscape(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}

/**
 * Sleuth Kit metadata addresses: a plain inode number, or the
 * NTFS `inode-type-id` form (e.g. `128-128-2`).
 */
const INODE_ADDRESS = /^\d+(?:-\d+){0,2}$/;

export function isInodeAddress(value: string): boolean {
  return INODE_ADDRESS.test(value);
}

/**
 * Build a shell command string from a tool definition and image path.
 *
 * Examples:
 *   image:       fls -r -m / '/evidence/disk.dd'
 *   image-inode: istat '/evidence/disk.dd' 45
 */
export function buildCommandFromDefinition(
  tool: ToolDefinition,
  imagePath: string,
  inode?: string,
): string {
  const parts: string[] = [tool.command];

  if (tool.fixedArgs) {
    parts.push(...tool.fixedArgs);
  }

  parts.push(shellEscape(imagePath));

  if (tool.inputStyle === "image-inode") {
    if (inode === undefined || !isInodeAddress(inode)) {
      throw new Error(`${tool.name} requires an inode address, got: ${inode ?? "(none)"}`);
    }
    parts.push(inode);
  }

  return parts.join(" ");
}
