/**
 * Tool Registry: wrapped Sleuth Kit command definitions with lookup.
 */

import { TOOL_DEFINITIONS } from "./definitions.js";

/** `image` passes the image path; `image-inode` passes it followed by an inode address. */
export type InputStyle = "image" | "image-inode";
export type OutputFormat = "text" | "binary";

export interface ToolDefinition {
  /** Unique tool identifier (e.g., "fls-body") */
  name: string;
  /** One-line description of what the tool does */
  description: string;
  /** Base command to execute (without arguments) */
  command: string;
  /** How the image and inode are passed to the command */
  inputStyle: InputStyle;
  /** Fixed arguments placed before the image path */
  fixedArgs?: string[];
  /** `binary` output is redirected to a file, never captured */
  outputFormat: OutputFormat;
  /** Tags for filtering (e.g., ["files", "timeline"]) */
  tags?: string[];
}

class ToolRegistry {
  private tools: Map<string, ToolDefinition>;

  constructor(definitions: ToolDefinition[]) {
    this.tools = new Map();
    for (const def of definitions) {
      this.tools.set(def.name, def);
    }
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  /** Like get(), for names the modules hard-code. */
  require(name: string): ToolDefinition {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new Error(`Unknown tool: ${name}`);
    }
    return tool;
  }

  all(): ToolDefinition[] {
    return [...this.tools.values()];
  }

  byTag(tag: string): ToolDefinition[] {
    return this.all().filter((t) => t.tags?.includes(tag));
  }

  get size(): number {
    return this.tools.size;
  }
}

/** Singleton registry instance. */
export const toolRegistry = new ToolRegistry(TOOL_DEFINITIONS);
