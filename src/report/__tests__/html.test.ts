import { describe, it, expect } from "vitest";
import { renderHtmlReport } from "../html/render.js";
import type { AnalysisReport } from "../../analysis/report.js";
import type { FileEntry } from "../../parsers/types.js";

const GENERATED = new Date(2026, 9, 18, 14, 3, 5);

function fileEntry(i: number): FileEntry {
  return {
    type: "r/r",
    inode: String(100 + i),
    name: `/data/file-${i}.bin`,
    mode: "r/rrw-r--r--",
    uid: "0",
    gid: "0",
    size: "512",
    atime: "1700000000",
    mtime: "1700000000",
    ctime: "1700000000",
  };
}

function baseReport(): AnalysisReport {
  return {
    analysis_date: "2026-10-18T12:00:00.000Z",
    image_analyzed: "/evidence/disk.dd",
    artifacts: {},
    warnings: [],
  };
}

function render(report: AnalysisReport): string {
  return renderHtmlReport(report, { outputDir: "/cases/42", generatedAt: GENERATED });
}

function count(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe("renderHtmlReport", () => {
  it("is byte-identical for the same report and generation time", () => {
    const report = baseReport();
    report.artifacts.file_listing = { status: "success", total_files: 1, files: [fileEntry(1)], skipped_lines: 0 };
    expect(render(report)).toBe(render(report));
  });

  it("shows the run metadata and timestamps", () => {
    const html = render(baseReport());
    expect(html).toContain("<p><strong>Image Analyzed:</strong> /evidence/disk.dd</p>");
    expect(html).toContain("<p><strong>Output Directory:</strong> /cases/42</p>");
    expect(html).toContain("<p><strong>Report Generated:</strong> 2026-10-18 14:03:05</p>");
    expect(html).toContain("<p>Report generated on October 18, 2026 at 14:03:05</p>");
  });

  it("caps the file table at 100 rows with a pagination note", () => {
    const report = baseReport();
    const files = Array.from({ length: 150 }, (_, i) => fileEntry(i));
    report.artifacts.file_listing = { status: "success", total_files: 150, files, skipped_lines: 0 };

    const html = render(report);

    expect(count(html, `<td class="wrap">`)).toBe(100);
    expect(html).toContain("/data/file-99.bin");
    expect(html).not.toContain("/data/file-100.bin");
    expect(html).toContain(
      `<div class="pagination-info">Showing first 100 of 150 files. See the CSV export for the complete file listing.</div>`,
    );
    expect(html).toContain(`<div class="card success"><h3>Total Files</h3><div class="number">150</div></div>`);
  });

  it("omits the pagination note at exactly 100 files", () => {
    const report = baseReport();
    const files = Array.from({ length: 100 }, (_, i) => fileEntry(i));
    report.artifacts.file_listing = { status: "success", total_files: 100, files, skipped_lines: 0 };

    expect(render(report)).not.toContain("pagination-info\">");
  });

  it("leaves out empty optional sections", () => {
    const html = render(baseReport());
    expect(html).not.toContain("Deleted Files Recovery Analysis");
    expect(html).not.toContain("<h2>Disk Partitions</h2>");
    expect(html).not.toContain("<h2>Warnings</h2>");
    expect(html).toContain(`<div class="code-block">No filesystem information available</div>`);
  });

  it("renders the deleted breakdown and partitions when present", () => {
    const report = baseReport();
    report.artifacts.deleted_files = {
      status: "success",
      count: 3,
      recoverable_count: 2,
      realloc_count: 1,
      files: ["a", "b", "c (realloc)"],
      recoverable: ["a", "b"],
      realloc_warning: ["c (realloc)"],
    };
    report.artifacts.partitions = {
      status: "success",
      count: 1,
      partitions: [{ slot: "1:0:00", start: "2048", end: "204800", length: "202753", description: "Linux (0x83)" }],
      skipped_lines: 0,
    };

    const html = render(report);

    expect(html).toContain("<h2>Deleted Files Recovery Analysis</h2>");
    expect(html).toContain(
      `<tr><td><strong>Potentially Recoverable</strong></td><td>2</td>` +
        `<td><span class="badge success">RECOVERABLE</span></td>` +
        `<td>Files with intact metadata, good recovery chance</td></tr>`,
    );
    expect(html).toContain(
      "<tr><td>1:0:00</td><td>2048</td><td>204800</td><td>202753</td><td>Linux (0x83)</td></tr>",
    );
  });

  it("shows only the first 2000 characters of filesystem info", () => {
    const report = baseReport();
    report.artifacts.filesystem_info = { status: "success", raw_output: "A".repeat(2000) + "B".repeat(500) };

    const html = render(report);

    expect(html).toContain(`<div class="code-block">${"A".repeat(2000)}</div>`);
    expect(html).not.toContain("AB");
  });

  it("cuts filesystem info by code point, keeping a surrogate pair whole", () => {
    const report = baseReport();
    report.artifacts.filesystem_info = { status: "success", raw_output: "A".repeat(1999) + "\u{1F4BE}" + "B" };

    const html = render(report);

    expect(html).toContain(`<div class="code-block">${"A".repeat(1999)}\u{1F4BE}</div>`);
  });

  it("escapes text taken from the evidence", () => {
    const report = baseReport();
    report.image_analyzed = `/evidence/<script>alert("x")</script>.dd`;
    report.artifacts.file_listing = {
      status: "success",
      total_files: 1,
      files: [{ ...fileEntry(1), name: "<img src=x onerror=alert(1)>" }],
      skipped_lines: 0,
    };

    const html = render(report);

    expect(html).toContain(
      "<p><strong>Image Analyzed:</strong> /evidence/&lt;script&gt;alert(&quot;x&quot;)&lt;/script&gt;.dd</p>",
    );
    expect(html).toContain(`<td class="wrap">&lt;img src=x onerror=alert(1)&gt;</td>`);
    expect(html).not.toContain("<script>");
  });

  it("lists module status with details and the failure reason", () => {
    const report = baseReport();
    report.artifacts.filesystem_info = { status: "failed", error: "Command timed out" };
    report.artifacts.timeline = {
      status: "success",
      entries: 1234,
      first_activity: null,
      last_activity: null,
    };

    const html = render(report);

    expect(html).toContain(
      `<tr><td><strong>Filesystem Info</strong></td>` +
        `<td><span class="badge error">FAILED</span></td><td>Command timed out</td></tr>`,
    );
    expect(html).toContain(
      `<tr><td><strong>Timeline</strong></td>` +
        `<td><span class="badge success">SUCCESS</span></td><td>1,234 entries</td></tr>`,
    );
  });

  it("lists report warnings", () => {
    const report = baseReport();
    report.warnings = ["High entropy files detected - may indicate encryption or compression"];

    expect(render(report)).toContain(
      "<li>High entropy files detected - may indicate encryption or compression</li>",
    );
  });
});
