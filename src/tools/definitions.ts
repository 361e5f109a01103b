import type { ToolDefinition } from "./registry.js";

/**
 * Sleuth Kit commands wrapped by the analysis modules.
 *
 * Output layouts are those of Sleuth Kit 4.x; the parsers depend on them.
 */
export const TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: "mmls",
    description: "Display the partition layout of a volume system",
    command: "mmls",
    inputStyle: "image",
    outputFormat: "text",
    tags: ["partitions", "volume"],
  },
  {
    name: "fsstat",
    description: "Display general details of a file system",
    command: "fsstat",
    inputStyle: "image",
    outputFormat: "text",
    tags: ["filesystem"],
  },
  {
    name: "fls-body",
    description: "Recursive file listing in body file format (also the timeline source)",
    command: "fls",
    fixedArgs: ["-r", "-m", "/"],
    inputStyle: "image",
    outputFormat: "text",
    tags: ["files", "timeline"],
  },
  {
    name: "fls-deleted",
    description: "Recursive listing of deleted entries only",
    command: "fls",
    fixedArgs: ["-r", "-d"],
    inputStyle: "image",
    outputFormat: "text",
    tags: ["files", "deleted"],
  },
  {
    name: "istat",
    description: "Display details of a metadata structure (inode)",
    command: "istat",
    inputStyle: "image-inode",
    outputFormat: "text",
    tags: ["inode"],
  },
  {
    name: "icat",
    description: "Output the contents of a file based on its inode number",
    command: "icat",
    inputStyle: "image-inode",
    outputFormat: "binary",
    tags: ["inode", "recovery"],
  },
];
