/**
 * CSV export for list-valued artifacts.
 *
 * The header row comes from the field names of the first record. Quoting
 * follows RFC 4180: only fields containing a comma, quote, CR or LF.
 */

export type CsvRecord = Readonly<Record<string, string | number>>;

function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Returns null for an empty list: no records, no file. */
export function toCsv(records: readonly CsvRecord[]): string | null {
  if (records.length === 0) return null;

  const header = Object.keys(records[0]);
  const lines = [header.map(escapeCsvField).join(",")];
  for (const record of records) {
    lines.push(header.map((key) => escapeCsvField(String(record[key] ?? ""))).join(","));
  }
  return lines.join("\r\n") + "\r\n";
}
