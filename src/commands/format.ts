import { formatList } from "../infra/parsers/documentLoader.js";

export function renderTable(headers: readonly string[], rows: ReadonlyArray<readonly string[]>): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? "").length)),
  );
  const line = (cells: readonly string[]) =>
    cells
      .map((cell, column) => cell.padEnd(widths[column]))
      .join("  ")
      .trimEnd();

  return [line(headers), line(widths.map((width) => "-".repeat(width))), ...rows.map(line)];
}

export function display(value: string | string[] | number | null | undefined, fallback = "N/A"): string {
  if (value === null || value === undefined) {
    return fallback;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return formatList(value) || fallback;
}

export function percent(score: number): string {
  return `${Math.round(score * 100)}%`;
}

export function heading(title: string): string[] {
  return [title, "=".repeat(title.length)];
}
