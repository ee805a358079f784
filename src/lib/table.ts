export type ColumnAlign = "left" | "right";

export interface TableOptions {
  /** Per-column alignment; columns without an entry are left-aligned. */
  align?: ColumnAlign[];
  /** Printed in place of the table when there are no rows. */
  emptyText?: string;
}

export function renderTable(headers: string[], rows: string[][], options: TableOptions = {}): string {
  if (rows.length === 0) {
    return options.emptyText ?? "";
  }

  const widths = headers.map((header, idx) => {
    const cellLengths = rows.map((row) => (row[idx] ?? "").length);
    return Math.max(header.length, ...cellLengths);
  });
  const pad = (cell: string, idx: number) =>
    options.align?.[idx] === "right" ? cell.padStart(widths[idx]) : cell.padEnd(widths[idx]);

  const headerLine = headers.map((header, idx) => pad(header, idx)).join("  ").trimEnd();
  const divider = widths.map((width) => "-".repeat(width)).join("  ");
  const body = rows
    .map((row) => headers.map((_header, idx) => pad(row[idx] ?? "", idx)).join("  ").trimEnd())
    .join("\n");

  return `${headerLine}\n${divider}\n${body}`;
}
