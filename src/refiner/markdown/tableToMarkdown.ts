import type { ColumnAlignment, TableData, TableElement } from "../../types";

/**
 * Resolved header row and data rows of a table, padded to a common width.
 */
export interface TableGrid {
  headers: string[];
  rows: string[][];
  columnCount: number;
}

/**
 * Escapes a cell for use inside a pipe table: pipes are escaped and embedded
 * line breaks become spaces.
 */
export function escapeTableCell(cell: string): string {
  return cell.replace(/\r/g, "").replace(/\n/g, " ").replace(/\|/g, "\\|").trim();
}

/**
 * Resolves headers the way the markdown rendering does: explicit `headers`
 * first, then the first row when `hasHeader` is set, otherwise synthesized
 * `ColN` labels. Headers are padded or truncated to the column count, which
 * is the widest row.
 */
export function resolveTableGrid(table: TableData): TableGrid {
  const explicitHeaders = table.headers && table.headers.length > 0 ? table.headers : null;
  const useFirstRow = !explicitHeaders && table.hasHeader && table.cells.length > 0;
  const dataRows = useFirstRow ? table.cells.slice(1) : table.cells;
  const columnCount = Math.max(0, ...table.cells.map((row) => row.length));

  const sourceHeaders = explicitHeaders ?? (useFirstRow ? table.cells[0] : []);
  const headers = Array.from(
    { length: columnCount },
    (_, i) => sourceHeaders[i]?.trim() || `Col${i + 1}`,
  );
  const rows = dataRows.map((row) =>
    Array.from({ length: columnCount }, (_, i) => row[i] ?? ""),
  );

  return { headers, rows, columnCount };
}

function separatorFor(alignment: ColumnAlignment | undefined): string {
  switch (alignment) {
    case "left":
      return ":---";
    case "right":
      return "---:";
    case "center":
    case "justify":
      return ":---:";
    default:
      return "---";
  }
}

function formatRow(cells: string[]): string {
  return `| ${cells.map(escapeTableCell).join(" | ")} |`;
}

/**
 * Renders a table as a GitHub-flavoured markdown pipe table. Tables without
 * cells fall back to their plain-text rendering. Low-confidence tables get a
 * trailing HTML comment so that readers of the markdown know to double-check.
 */
export function tableToMarkdown(table: TableData): string {
  if (table.cells.length === 0) {
    return table.plainTextFallback?.trim() ?? "";
  }

  const { headers, rows, columnCount } = resolveTableGrid(table);
  if (columnCount === 0) {
    return table.plainTextFallback?.trim() ?? "";
  }

  const separator = `| ${Array.from({ length: columnCount }, (_, i) =>
    separatorFor(table.columnAlignments?.[i]),
  ).join(" | ")} |`;

  const lines = [formatRow(headers), separator, ...rows.map(formatRow)];

  if (table.needsLlmAssist) {
    lines.push(
      `<!-- Table confidence: ${table.confidence.toFixed(2)} - may need verification -->`,
    );
  }

  return lines.join("\n");
}

/**
 * Builds the structured record for a reader-supplied table. Its location is
 * unknown once the table has been rendered into the text.
 */
export function tableToElement(table: TableData): TableElement {
  const { headers, rows } = resolveTableGrid(table);
  const records = rows.map((row) =>
    Object.fromEntries(headers.map((header, i) => [header, row[i] ?? ""])),
  );
  return {
    kind: "table",
    caption: `Table (${records.length} rows)`,
    data: { headers, rows: records },
    location: { start: 0, end: 0 },
  };
}
