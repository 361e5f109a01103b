/**
 * The HTML report as a tree of sections.
 *
 * Each section declares when it appears (a predicate over the view) and
 * how it renders; renderSections() walks the tree once. Every value taken
 * from the report goes through escapeHtml().
 */

import { escapeHtml, formatCount } from "./escape.js";
import { displayTimestamp, longTimestamp } from "../timestamp.js";
import { FILE_LISTING_LIMIT } from "./view.js";
import type { ReportView } from "./view.js";

export interface HtmlSection {
  id: string;
  /** Omitted means always rendered */
  when?: (view: ReportView) => boolean;
  render: (view: ReportView, children: string) => string;
  children?: readonly HtmlSection[];
}

export function renderSections(sections: readonly HtmlSection[], view: ReportView): string {
  return sections
    .filter((section) => section.when?.(view) ?? true)
    .map((section) => section.render(view, renderSections(section.children ?? [], view)))
    .join("\n");
}

function table(headings: readonly string[], rows: readonly string[]): string {
  return [
    `<div class="table-container">`,
    `<table>`,
    `<thead><tr>${headings.map((h) => `<th>${escapeHtml(h)}</th>`).join("")}</tr></thead>`,
    `<tbody>`,
    ...rows,
    `</tbody>`,
    `</table>`,
    `</div>`,
  ].join("\n");
}

function cells(values: readonly string[]): string {
  return `<tr>${values.map((v) => `<td>${v}</td>`).join("")}</tr>`;
}

function section(title: string, body: string): string {
  return [`<div class="section">`, `<h2>${escapeHtml(title)}</h2>`, body, `</div>`].join("\n");
}

function card(kind: string, title: string, value: string): string {
  const cls = kind ? `card ${kind}` : "card";
  return `<div class="${cls}"><h3>${title}</h3><div class="number">${value}</div></div>`;
}

const header: HtmlSection = {
  id: "header",
  render: () => [
    `<div class="header">`,
    `<h1>Digital Forensic Analysis Report</h1>`,
    `<p class="subtitle">Disk image analysis with The Sleuth Kit</p>`,
    `</div>`,
  ].join("\n"),
};

const meta: HtmlSection = {
  id: "meta",
  render: (view) => [
    `<div class="meta-info">`,
    `<p><strong>Analysis Date:</strong> ${escapeHtml(view.analysisDate)}</p>`,
    `<p><strong>Image Analyzed:</strong> ${escapeHtml(view.imageAnalyzed)}</p>`,
    `<p><strong>Output Directory:</strong> ${escapeHtml(view.outputDir)}</p>`,
    `<p><strong>Report Generated:</strong> ${displayTimestamp(view.generatedAt)}</p>`,
    `</div>`,
  ].join("\n"),
};

const summaryCards: HtmlSection = {
  id: "summary",
  render: (view) => [
    `<div class="summary-cards">`,
    card("success", "Total Files", formatCount(view.totalFiles)),
    card("warning", "Deleted Files", formatCount(view.deletedCount)),
    card("info", "Partitions", String(view.partitionCount)),
    card("", "Timeline Entries", formatCount(view.timelineEntries)),
    `</div>`,
  ].join("\n"),
};

const deletedBreakdown: HtmlSection = {
  id: "deleted-files",
  when: (view) => view.deletedCount > 0,
  render: (view) => section("Deleted Files Recovery Analysis", [
    table(["Category", "Count", "Status", "Description"], [
      cells([
        "<strong>Total Deleted</strong>",
        String(view.deletedCount),
        `<span class="badge warning">DELETED</span>`,
        "All files found in deleted state",
      ]),
      cells([
        "<strong>Potentially Recoverable</strong>",
        String(view.recoverableCount),
        `<span class="badge success">RECOVERABLE</span>`,
        "Files with intact metadata, good recovery chance",
      ]),
      cells([
        "<strong>Reallocated (Warning)</strong>",
        String(view.reallocCount),
        `<span class="badge error">OVERWRITTEN</span>`,
        "Metadata reused by another file, likely overwritten",
      ]),
    ]),
    `<div class="note">`,
    `<strong>Note about &quot;realloc&quot; files:</strong>`,
    `<p>Files marked with &quot;(realloc)&quot; have had their metadata structures reallocated to new files. ` +
      `The original data has likely been overwritten and cannot be recovered. ` +
      `Focus recovery efforts on files without the realloc indicator.</p>`,
    `</div>`,
  ].join("\n")),
};

const partitionTable: HtmlSection = {
  id: "partitions",
  when: (view) => view.partitions.length > 0,
  render: (view) => section("Disk Partitions", table(
    ["Slot", "Start Sector", "End Sector", "Length", "Description"],
    view.partitions.map((p) => cells([p.slot, p.start, p.end, p.length, p.description].map(escapeHtml))),
  )),
};

const filesystemInfo: HtmlSection = {
  id: "filesystem-info",
  render: (view) => section(
    "Filesystem Information",
    `<div class="code-block">${
      view.filesystemInfo === null
        ? "No filesystem information available"
        : escapeHtml(view.filesystemInfo)
    }</div>`,
  ),
};

const fileListing: HtmlSection = {
  id: "file-listing",
  when: (view) => view.files.length > 0,
  render: (view) => {
    const rows = view.files.slice(0, FILE_LISTING_LIMIT).map((f) =>
      `<tr><td>${escapeHtml(f.type)}</td><td>${escapeHtml(f.inode)}</td>` +
      `<td class="wrap">${escapeHtml(f.name)}</td><td>${escapeHtml(f.size)}</td>` +
      `<td>${escapeHtml(f.mtime)}</td><td><code>${escapeHtml(f.mode)}</code></td></tr>`,
    );
    const parts = [table(["Type", "Inode", "Name", "Size", "Modified Time", "Permissions"], rows)];
    if (view.files.length > FILE_LISTING_LIMIT) {
      parts.push(
        `<div class="pagination-info">Showing first ${FILE_LISTING_LIMIT} of ${formatCount(view.files.length)} files. ` +
          `See the CSV export for the complete file listing.</div>`,
      );
    }
    return section("File Listing", parts.join("\n"));
  },
};

const moduleStatus: HtmlSection = {
  id: "module-status",
  render: (view) => section("Analysis Module Status", table(
    ["Module", "Status", "Details"],
    view.modules.map((m) => cells([
      `<strong>${escapeHtml(m.label)}</strong>`,
      `<span class="badge ${m.succeeded ? "success" : "error"}">${escapeHtml(m.status)}</span>`,
      escapeHtml(m.detail),
    ])),
  )),
};

const warnings: HtmlSection = {
  id: "warnings",
  when: (view) => view.warnings.length > 0,
  render: (view) => section(
    "Warnings",
    `<ul>\n${view.warnings.map((w) => `<li>${escapeHtml(w)}</li>`).join("\n")}\n</ul>`,
  ),
};

const content: HtmlSection = {
  id: "content",
  render: (_view, children) => `<div class="content">\n${children}\n</div>`,
  children: [summaryCards, deletedBreakdown, partitionTable, filesystemInfo, fileListing, moduleStatus, warnings],
};

const footer: HtmlSection = {
  id: "footer",
  render: (view) => [
    `<div class="footer">`,
    `<p><strong>disk-forensics-reporter</strong></p>`,
    `<p>Powered by The Sleuth Kit</p>`,
    `<p>Report generated on ${longTimestamp(view.generatedAt)}</p>`,
    `</div>`,
  ].join("\n"),
};

export const REPORT_SECTIONS: readonly HtmlSection[] = [header, meta, content, footer];
