import { z } from "zod";
import { MODULE_SELECTIONS } from "../analysis/pipeline.js";

const imageField = z
  .string()
  .min(1)
  .describe("Path to the disk image (a path inside the container in docker mode)");

const inodeField = z
  .string()
  .describe("Metadata address as printed by fls, e.g. '45' or '128-128-2' for NTFS");

export const analyzeImageSchema = z.object({
  image: imageField,
  module: z.enum(MODULE_SELECTIONS).default("full").describe(
    "Analysis module: 'full' (partitions, filesystem, files, deleted, timeline) or a single module",
  ),
  html: z.boolean().optional().describe("Generate the HTML report (default: only for 'full')"),
});
export type AnalyzeImageArgs = z.infer<typeof analyzeImageSchema>;

export const getInodeMetadataSchema = z.object({
  image: imageField,
  inode: inodeField,
});
export type GetInodeMetadataArgs = z.infer<typeof getInodeMetadataSchema>;

export const recoverFileSchema = z.object({
  image: imageField,
  inode: inodeField,
  filename: z.string().describe("Plain file name to write under the output directory's recovered/ folder"),
});
export type RecoverFileArgs = z.infer<typeof recoverFileSchema>;
