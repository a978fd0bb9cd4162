/** Column-aligned text table; cells are padded to the widest value, trailing spaces trimmed. */
export function renderTable(headers: string[], rows: string[][]): string {
  if (rows.length === 0) {
    return "";
  }

  const widths = headers.map((header, idx) => Math.max(header.length, ...rows.map((row) => (row[idx] ?? "").length)));
  const line = (cells: string[]) => widths.map((width, idx) => (cells[idx] ?? "").padEnd(width)).join("  ").trimEnd();

  return [line(headers), line(widths.map((width) => "-".repeat(width))), ...rows.map(line)].join("\n");
}
